import { ScenarioExecutor } from '../scenario-executor'
import { MemoryManifestSink } from '../manifest-sink'
import { EngineEventEmitter } from '../../events'
import { parseScenario } from '../../parsers/scenario'
import { gumballMachinePackage } from '../../std'

const GUMBALL_STEPS = `
  - type: new-component
    component: machine
    blueprint: GumballMachine
    function: instantiate_gumball_machine
    args: [5]
  - type: call
    name: buy
    method: buy_gumball
    args:
      - bucket: { resource: xrd, amount: 10 }
    manifest: buy.rtm
`

describe('ScenarioExecutor', () => {
  let events: EngineEventEmitter
  let sink: MemoryManifestSink
  let executor: ScenarioExecutor

  beforeEach(() => {
    events = new EngineEventEmitter()
    sink = new MemoryManifestSink()
    executor = new ScenarioExecutor({
      packages: new Map([['gumball-machine', gumballMachinePackage]]),
      events,
      manifestSink: sink
    })
  })

  it('should run every step and report the scenario as passed', async () => {
    const seen: string[] = []
    events.onAnyEvent(event => {
      if (event.type === 'scenario_started' || event.type === 'step_started' || event.type === 'scenario_completed') {
        seen.push(event.type)
      }
    })
    const scenario = parseScenario(`
name: buy-gumball
packages:
  gumball: gumball-machine
steps:${GUMBALL_STEPS}
  - type: assert-balance
    resource: gumball
    amount: 1
  - type: assert-balance
    resource: xrd
    amount: "9995"
`)

    const result = await executor.run(scenario)

    expect(result).toEqual({ name: 'buy-gumball', status: 'passed', stepCount: 4 })
    expect(seen).toEqual(['scenario_started', 'step_started', 'step_started', 'step_started', 'step_started', 'scenario_completed'])
    expect([...sink.files.keys()]).toEqual(['manifests/buy.rtm'])
  })

  it('should pass a call that is expected to fail', async () => {
    const scenario = parseScenario(`
name: cheap
packages:
  gumball: gumball-machine
steps:
  - type: new-component
    component: machine
    blueprint: GumballMachine
    function: instantiate_gumball_machine
    args: [5]
  - type: call
    method: buy_gumball
    args:
      - bucket: { resource: xrd, amount: 1 }
    expect:
      failure: "Not enough XRD: a gumball costs 5, got 1"
`)

    const result = await executor.run(scenario)

    expect(result.status).toBe('passed')
  })

  it('should stop at the first failing step', async () => {
    const failures: string[] = []
    events.onEvent('scenario_failed', event => failures.push(event.data.stepName))
    const scenario = parseScenario(`
name: wrong-balance
packages:
  gumball: gumball-machine
steps:${GUMBALL_STEPS}
  - type: assert-balance
    name: count gumballs
    resource: gumball
    amount: 3
  - type: faucet
`)

    const result = await executor.run(scenario)

    expect(result).toEqual({
      name: 'wrong-balance',
      status: 'failed',
      stepCount: 4,
      failedStep: 'count gumballs',
      error: 'Expected the current account to hold 3 of gumball, found 1'
    })
    expect(failures).toEqual(['count gumballs'])
  })

  it('should report an unexpected outcome as the step failure', async () => {
    const scenario = parseScenario(`
name: unexpected
packages:
  gumball: gumball-machine
steps:${GUMBALL_STEPS}
  - type: call
    name: raise price
    method: set_price
    args: [7]
`)

    const result = await executor.run(scenario)

    expect(result.status).toBe('failed')
    if (result.status === 'failed') {
      expect(result.failedStep).toBe('raise price')
      expect(result.error).toMatch(/^Expected the transaction to succeed, but it failed: Unauthorized: /)
    }
  })

  it('should fail before the first step when a package is unknown', async () => {
    const scenario = parseScenario(`
name: missing
packages:
  gumball: gumball-v2
steps:
  - type: faucet
`)

    const result = await executor.run(scenario)

    expect(result).toEqual({
      name: 'missing',
      status: 'failed',
      stepCount: 1,
      failedStep: 'publish packages',
      error: 'Unknown blueprint package "gumball-v2" for "gumball". Available packages: gumball-machine'
    })
  })

  it('should run account, token and transfer steps', async () => {
    const scenario = parseScenario(`
name: transfers
steps:
  - type: new-account
    account: alice
  - type: new-nft
    token: cars
    ids: [1, 2]
  - type: transfer
    to: alice
    resource: xrd
    amount: 100
  - type: transfer
    to: alice
    resource: cars
    ids: [2]
  - type: assert-balance
    owner: alice
    resource: xrd
    amount: 10100
  - type: assert-balance
    owner: alice
    resource: cars
    ids: ["#2#"]
  - type: set-current
    account: alice
  - type: faucet
  - type: assert-balance
    resource: xrd
    amount: 20100
  - type: jump-epochs
    epochs: 3
`)

    const result = await executor.run(scenario)

    expect(result).toEqual({ name: 'transfers', status: 'passed', stepCount: 10 })
  })

  it('should compare non-fungible ids as sets', async () => {
    const scenario = parseScenario(`
name: ids
steps:
  - type: new-nft
    token: cars
    ids: [1, 2]
  - type: assert-balance
    name: check ids
    resource: cars
    ids: [2, 3]
`)

    const result = await executor.run(scenario)

    expect(result.status).toBe('failed')
    if (result.status === 'failed') {
      expect(result.error).toBe('Expected the current account to hold cars ids [#2#, #3#], found [#1#, #2#]')
    }
  })

  it('should refuse to move the clock before the first epoch', async () => {
    const scenario = parseScenario(`
name: clock
steps:
  - type: jump-epochs
    epochs: 2
  - type: jump-epochs
    name: rewind
    epochs: -5
`)

    const result = await executor.run(scenario)

    expect(result.status).toBe('failed')
    if (result.status === 'failed') {
      expect(result.failedStep).toBe('rewind')
    }
  })
})
