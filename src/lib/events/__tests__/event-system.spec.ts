import { EngineEventEmitter, CLIEventAdapter } from '../index'
import { EngineEvent } from '../types'

describe('Event System', () => {
  let eventEmitter: EngineEventEmitter
  let cliAdapter: CLIEventAdapter
  let consoleLogSpy: jest.SpyInstance
  let consoleErrorSpy: jest.SpyInstance
  let consoleWarnSpy: jest.SpyInstance

  beforeEach(() => {
    eventEmitter = new EngineEventEmitter()
    cliAdapter = new CLIEventAdapter(eventEmitter, 3)

    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation(() => {})
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation(() => {})
    consoleWarnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    cliAdapter.destroy()
    consoleLogSpy.mockRestore()
    consoleErrorSpy.mockRestore()
    consoleWarnSpy.mockRestore()
  })

  describe('EngineEventEmitter', () => {
    it('should emit events with automatic timestamp', () => {
      const eventHandler = jest.fn()
      eventEmitter.onAnyEvent(eventHandler)

      eventEmitter.emitEvent({
        type: 'project_loading_started',
        level: 'info',
        data: { projectRoot: '/test/project' }
      })

      expect(eventHandler).toHaveBeenCalledWith(
        expect.objectContaining({
          type: 'project_loading_started',
          level: 'info',
          data: { projectRoot: '/test/project' },
          timestamp: expect.any(Date)
        })
      )
    })

    it('should emit on both specific event type and general event channel', () => {
      const specificHandler = jest.fn()
      const generalHandler = jest.fn()

      eventEmitter.onEvent('scenario_started', specificHandler)
      eventEmitter.onAnyEvent(generalHandler)

      eventEmitter.emitEvent({ type: 'scenario_started', level: 'info', data: { scenarioName: 'buy-gumball' } })

      expect(specificHandler).toHaveBeenCalledTimes(1)
      expect(generalHandler).toHaveBeenCalledTimes(1)
    })

    it('should stop delivering once a listener is removed', () => {
      const handler = jest.fn()
      eventEmitter.onEvent('transaction_fee', handler)
      eventEmitter.emitEvent({ type: 'transaction_fee', level: 'info', data: { fee: '0.5' } })
      eventEmitter.offEvent('transaction_fee', handler)
      eventEmitter.emitEvent({ type: 'transaction_fee', level: 'info', data: { fee: '0.5' } })

      expect(handler).toHaveBeenCalledTimes(1)
    })

    it('should deliver once-listeners a single time', () => {
      const handler = jest.fn()
      eventEmitter.onceEvent('run_summary', handler)
      const summary = { total: 1, passed: 1, failed: 0, failedScenarios: [] }
      eventEmitter.emitEvent({ type: 'run_summary', level: 'info', data: summary })
      eventEmitter.emitEvent({ type: 'run_summary', level: 'info', data: summary })

      expect(handler).toHaveBeenCalledTimes(1)
    })
  })

  describe('CLIEventAdapter', () => {
    it('should print scenario progress', () => {
      eventEmitter.emitEvent({ type: 'scenario_started', level: 'info', data: { scenarioName: 'swap' } })
      eventEmitter.emitEvent({ type: 'scenario_completed', level: 'info', data: { scenarioName: 'swap', stepCount: 4 } })

      expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('▶ Scenario: swap'))
      expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('Scenario "swap" passed (4 steps).'))
    })

    it('should print scenario failures to stderr', () => {
      eventEmitter.emitEvent({
        type: 'scenario_failed',
        level: 'error',
        data: { scenarioName: 'swap', stepName: 'swap usd', error: 'Panic: The pool has no liquidity' }
      })

      expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining('failed at step "swap usd"'))
      expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining('Error: Panic: The pool has no liquidity'))
    })

    it('should print collision warnings with console.warn', () => {
      eventEmitter.emitEvent({
        type: 'reference_collision_warning',
        level: 'warn',
        data: { kind: 'resource', name: 'Gumball', keptAddress: 'resource_a', droppedAddress: 'resource_b' }
      })

      expect(consoleWarnSpy).toHaveBeenCalledWith(expect.stringContaining('resource name "Gumball" is already bound to resource_a; ignoring resource_b'))
    })

    it('should print the run summary with failed scenarios', () => {
      eventEmitter.emitEvent({
        type: 'run_summary',
        level: 'info',
        data: { total: 3, passed: 2, failed: 1, failedScenarios: ['auction'] }
      })

      expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('Passed: 2/3'))
      expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('Failed: 1 (auction)'))
    })

    it('should print application logs and fees', () => {
      eventEmitter.emitEvent({ type: 'application_log', level: 'info', data: { logLevel: 'info', message: 'hello' } })
      eventEmitter.emitEvent({ type: 'transaction_fee', level: 'info', data: { fee: '0.45' } })

      expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('[info] hello'))
      expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('Transaction fee: 0.45 XRD'))
    })
  })

  describe('verbosity', () => {
    const committed: Omit<Extract<EngineEvent, { type: 'transaction_committed' }>, 'timestamp'> = {
      type: 'transaction_committed',
      level: 'info',
      data: { fee: '0.4', newEntityCount: 2 }
    }

    it('should hide entity and transaction events at verbosity 0', () => {
      cliAdapter.setVerbosity(0)
      eventEmitter.emitEvent(committed)
      eventEmitter.emitEvent({ type: 'account_created', level: 'info', data: { name: 'alice', address: 'account_x' } })

      expect(consoleLogSpy).not.toHaveBeenCalled()
    })

    it('should show transaction outcomes at verbosity 1', () => {
      cliAdapter.setVerbosity(1)
      eventEmitter.emitEvent(committed)

      expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('committed (fee 0.4 XRD, 2 new entities)'))
    })

    it('should keep registry bookkeeping for verbosity 3', () => {
      cliAdapter.setVerbosity(2)
      eventEmitter.emitEvent({
        type: 'reference_registered',
        level: 'debug',
        data: { kind: 'account', name: 'Alice', key: 'alice', address: 'account_x', origin: 'explicit' }
      })
      expect(consoleLogSpy).not.toHaveBeenCalled()

      cliAdapter.setVerbosity(3)
      eventEmitter.emitEvent({
        type: 'reference_registered',
        level: 'debug',
        data: { kind: 'account', name: 'Alice', key: 'alice', address: 'account_x', origin: 'explicit' }
      })
      expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('[explicit] account "alice" -> account_x'))
    })

    it('should always show errors', () => {
      cliAdapter.setVerbosity(0)
      eventEmitter.emitEvent({ type: 'cli_error', level: 'error', data: { message: 'boom' } })

      expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining('Error:'), 'boom')
    })
  })
})
