import { parseScenario } from '../scenario'

describe('parseScenario', () => {
  // --- Happy Path Tests ---

  it('should parse every step type', () => {
    const scenario = parseScenario(`
name: buy-gumball
description: Buys a gumball
packages:
  gumball: gumball-machine
steps:
  - type: new-account
    account: alice
    use: true
  - type: new-token
    name: mint usd
    token: usd
    supply: 1000
    divisibility: 2
    symbol: USD
  - type: new-nft
    token: cars
    ids: [1, "#2#"]
    updater: admin
  - type: set-current
    package: gumball
  - type: new-component
    component: machine
    blueprint: GumballMachine
    function: instantiate
    args:
      - decimal: "5"
  - type: call
    name: buy
    method: buy_gumball
    args:
      - bucket: { resource: xrd, amount: 10 }
    fee_payer: { entity: alice, amount: 10 }
    deposit_to: bob
    manifest: buy.rtm
    expect:
      failure: Not enough XRD
  - type: transfer
    to: bob
    resource: cars
    ids: [1]
  - type: faucet
  - type: assert-balance
    owner: alice
    resource: usd
    amount: "1000"
  - type: jump-epochs
    epochs: -3
`)

    expect(scenario.name).toBe('buy-gumball')
    expect(scenario.description).toBe('Buys a gumball')
    expect(scenario.packages).toEqual([{ name: 'gumball', source: 'gumball-machine' }])
    expect(scenario.steps).toEqual([
      { type: 'new-account', name: 'new-account #1', account: 'alice', use: true },
      { type: 'new-token', name: 'mint usd', token: 'usd', supply: '1000', divisibility: 2, symbol: 'USD' },
      { type: 'new-nft', name: 'new-nft #3', token: 'cars', ids: [1, '#2#'], updater: 'admin' },
      { type: 'set-current', name: 'set-current #4', kind: 'package', target: 'gumball' },
      {
        type: 'new-component',
        name: 'new-component #5',
        component: 'machine',
        blueprint: 'GumballMachine',
        function: 'instantiate',
        args: [{ kind: 'decimal', value: '5' }]
      },
      {
        type: 'call',
        name: 'buy',
        method: 'buy_gumball',
        args: [{ kind: 'fungible', resource: 'xrd', amount: '10', source: 'account', form: 'bucket' }],
        feePayer: { entity: 'alice', amount: '10' },
        depositTo: 'bob',
        manifest: 'buy.rtm',
        expect: { outcome: 'failure', contains: 'Not enough XRD' }
      },
      { type: 'transfer', name: 'transfer #7', to: 'bob', resource: 'cars', ids: [1] },
      { type: 'faucet', name: 'faucet #8' },
      { type: 'assert-balance', name: 'assert-balance #9', owner: 'alice', resource: 'usd', amount: '1000' },
      { type: 'jump-epochs', name: 'jump-epochs #10', epochs: -3 }
    ])
  })

  it('should default to no packages and successful calls', () => {
    const scenario = parseScenario(`
name: minimal
steps:
  - type: call
    method: get_price
`)

    expect(scenario.packages).toEqual([])
    expect(scenario.steps).toEqual([
      { type: 'call', name: 'call #1', method: 'get_price', args: [], expect: { outcome: 'success' } }
    ])
  })

  // --- Error Handling and Validation Tests ---

  it('should throw an error for malformed YAML', () => {
    expect(() => parseScenario('name: bad\n  steps: - a')).toThrow(/^Failed to parse scenario YAML: /)
  })

  it('should require an object', () => {
    expect(() => parseScenario('- a\n- b')).toThrow('Invalid scenario: YAML content must resolve to an object.')
  })

  it('should require a name and at least one step', () => {
    expect(() => parseScenario('steps: []')).toThrow('Invalid scenario: "name" is required and must be a non-empty string.')
    expect(() => parseScenario('name: empty\nsteps: []')).toThrow('Invalid scenario "empty": "steps" must contain at least one step.')
  })

  it('should reject unknown step types', () => {
    expect(() => parseScenario('name: odd\nsteps:\n  - type: teleport'))
      .toThrow('Invalid step "teleport #1" of scenario "odd": unknown step type "teleport".')
  })

  it('should require exactly one of amount or ids', () => {
    const yaml = `
name: give
steps:
  - type: transfer
    name: give cars
    to: bob
    resource: cars
    amount: 1
    ids: [1]
`
    expect(() => parseScenario(yaml)).toThrow('Invalid step "give cars" of scenario "give": exactly one of "amount" or "ids" is required.')
  })

  it('should require a single target for set-current', () => {
    const yaml = `
name: switch
steps:
  - type: set-current
    account: alice
    component: pool
`
    expect(() => parseScenario(yaml))
      .toThrow('Invalid step "set-current #1" of scenario "switch": exactly one of "account", "package" or "component" is required.')
  })

  it('should reject an unknown expectation', () => {
    const yaml = `
name: expect
steps:
  - type: call
    method: buy
    expect: maybe
`
    expect(() => parseScenario(yaml))
      .toThrow('Invalid step "call #1" of scenario "expect": "expect" must be "success" or a mapping with a "failure" message.')
  })

  it('should reject fractional epoch jumps', () => {
    expect(() => parseScenario('name: clock\nsteps:\n  - type: jump-epochs\n    epochs: 1.5'))
      .toThrow('Invalid step "jump-epochs #1" of scenario "clock": "epochs" must be a whole number, got 1.5')
  })
})
