import * as fs from 'fs/promises'
import * as path from 'path'
import { randomBytes } from 'crypto'
import { ScenarioRunner } from '../runner'
import { EngineEventEmitter } from '../events'

describe('ScenarioRunner', () => {
  let tempDir: string
  let events: EngineEventEmitter

  const writeScenario = async (file: string, content: string): Promise<void> => {
    const scenariosDir = path.join(tempDir, 'scenarios')
    await fs.mkdir(scenariosDir, { recursive: true })
    await fs.writeFile(path.join(scenariosDir, file), content)
  }

  beforeEach(async () => {
    tempDir = path.join('/tmp/ledger_testing', `runner_${Date.now()}_${randomBytes(4).toString('hex')}`)
    await fs.mkdir(tempDir, { recursive: true })
    events = new EngineEventEmitter()

    await writeScenario('b-gumball.yaml', `name: gumball
packages:
  machine: gumball-machine
steps:
  - type: new-component
    component: machine
    blueprint: GumballMachine
    function: instantiate_gumball_machine
    args: [5]
  - type: call
    method: buy_gumball
    args:
      - bucket: { resource: xrd, amount: 5 }
    manifest: buy
`)
    await writeScenario('a-broken.yaml', `name: broken
steps:
  - type: assert-balance
    resource: xrd
    amount: 1
`)
    await writeScenario('c-faucet.yaml', `name: faucet
steps:
  - type: faucet
  - type: assert-balance
    resource: xrd
    amount: 20000
`)
  })

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true })
  })

  it('should run every scenario in name order and summarize', async () => {
    const summaries: string[][] = []
    events.onEvent('run_summary', event => summaries.push(event.data.failedScenarios))

    const runner = new ScenarioRunner({ projectRoot: tempDir, eventEmitter: events })
    const summary = await runner.run()

    expect(summary.results.map(result => `${result.name}:${result.status}`)).toEqual([
      'broken:failed',
      'faucet:passed',
      'gumball:passed'
    ])
    expect(summary.passed).toBe(2)
    expect(summary.failed).toBe(1)
    expect(summaries).toEqual([['broken']])
  })

  it('should write manifests under the project root', async () => {
    const runner = new ScenarioRunner({ projectRoot: tempDir, eventEmitter: events, runScenarios: ['gumball'] })
    await runner.run()

    const manifest = await fs.readFile(path.join(tempDir, 'manifests', 'buy.rtm'), 'utf-8')
    expect(manifest.startsWith('CALL_METHOD\n')).toBe(true)
    expect(manifest).toContain('"buy_gumball"')
  })

  it('should stop after the first failure when failing early', async () => {
    const runner = new ScenarioRunner({ projectRoot: tempDir, eventEmitter: events, failEarly: true })
    const summary = await runner.run()

    expect(summary.results.map(result => result.name)).toEqual(['broken'])
  })

  it('should run only the requested scenarios, in the requested order', async () => {
    const runner = new ScenarioRunner({ projectRoot: tempDir, eventEmitter: events, runScenarios: ['gumball', 'faucet'] })
    const summary = await runner.run()

    expect(summary.results.map(result => result.name)).toEqual(['gumball', 'faucet'])
  })

  it('should reject unknown scenario names', async () => {
    const runner = new ScenarioRunner({ projectRoot: tempDir, eventEmitter: events, runScenarios: ['auction'] })

    await expect(runner.run()).rejects.toThrow('Scenario "auction" not found. Available scenarios: broken, gumball, faucet')
  })

  it('should leave the summary out when asked', async () => {
    const listener = jest.fn()
    events.onEvent('run_summary', listener)

    const runner = new ScenarioRunner({ projectRoot: tempDir, eventEmitter: events, showSummary: false })
    await runner.run()

    expect(listener).not.toHaveBeenCalled()
  })
})
