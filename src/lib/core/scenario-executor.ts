import { BalanceAssertionError } from '../errors'
import { EngineEventEmitter, engineEvents } from '../events'
import { formatNonFungibleId, toNonFungibleIdSet } from '../ids/non-fungible-id'
import { ManifestSink } from '../ledger/backend'
import { PackageDefinition } from '../ledger/runtime'
import { LedgerSimulator } from '../ledger/simulator'
import { AssertBalanceStep, CallStep, Scenario, ScenarioStep } from '../types/scenario'
import { formatDecimal, toAmount } from '../utils/decimal'
import { TestEngine } from './engine'
import { FileManifestSink } from './manifest-sink'

export interface ScenarioExecutorOptions {
  // Packages scenarios may bind by source name.
  packages: ReadonlyMap<string, PackageDefinition>
  feeLock?: string
  manifestDir?: string
  events?: EngineEventEmitter
  manifestSink?: ManifestSink
}

export type ScenarioResult =
  | { name: string; status: 'passed'; stepCount: number }
  | { name: string; status: 'failed'; stepCount: number; failedStep: string; error: string }

// Label used for failures while publishing a scenario's packages.
const PACKAGES_STEP = 'publish packages'

/**
 * Runs scenarios, each against a fresh simulated ledger.
 */
export class ScenarioExecutor {
  private readonly events: EngineEventEmitter
  private readonly manifestSink: ManifestSink

  constructor(private readonly options: ScenarioExecutorOptions) {
    this.events = options.events ?? engineEvents
    this.manifestSink = options.manifestSink ?? new FileManifestSink()
  }

  /**
   * Runs every step in order and stops at the first one that throws. Never throws itself;
   * the failure is reported in the result and as a `scenario_failed` event.
   */
  public async run(scenario: Scenario): Promise<ScenarioResult> {
    this.events.emitEvent({ type: 'scenario_started', level: 'info', data: { scenarioName: scenario.name } })

    let currentStep = PACKAGES_STEP
    try {
      const engine = new TestEngine({
        ledger: new LedgerSimulator(),
        events: this.events,
        manifestSink: this.manifestSink,
        feeLock: this.options.feeLock
      })
      for (const binding of scenario.packages) {
        const definition = this.options.packages.get(binding.source)
        if (!definition) {
          const available = [...this.options.packages.keys()].join(', ') || 'none'
          throw new Error(`Unknown blueprint package "${binding.source}" for "${binding.name}". Available packages: ${available}`)
        }
        engine.newPackage(binding.name, definition)
      }

      for (const step of scenario.steps) {
        currentStep = step.name
        this.events.emitEvent({
          type: 'step_started',
          level: 'info',
          data: { scenarioName: scenario.name, stepName: step.name, stepType: step.type }
        })
        await this.runStep(engine, step)
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      this.events.emitEvent({
        type: 'scenario_failed',
        level: 'error',
        data: { scenarioName: scenario.name, stepName: currentStep, error: message }
      })
      return { name: scenario.name, status: 'failed', stepCount: scenario.steps.length, failedStep: currentStep, error: message }
    }

    this.events.emitEvent({
      type: 'scenario_completed',
      level: 'info',
      data: { scenarioName: scenario.name, stepCount: scenario.steps.length }
    })
    return { name: scenario.name, status: 'passed', stepCount: scenario.steps.length }
  }

  private async runStep(engine: TestEngine, step: ScenarioStep): Promise<void> {
    switch (step.type) {
      case 'new-account':
        engine.newAccount(step.account)
        if (step.use) {
          engine.setCurrentAccount(step.account)
        }
        return

      case 'new-token':
        engine.newToken(step.token, step.supply, { divisibility: step.divisibility, symbol: step.symbol })
        return

      case 'new-nft':
        engine.newNonFungible(step.token, step.ids.map(id => ({ id })), { symbol: step.symbol, updater: step.updater })
        return

      case 'set-current':
        if (step.kind === 'account') {
          engine.setCurrentAccount(step.target)
        } else if (step.kind === 'package') {
          engine.setCurrentPackage(step.target)
        } else {
          engine.setCurrentComponent(step.target)
        }
        return

      case 'new-component': {
        if (step.package !== undefined) {
          engine.setCurrentPackage(step.package)
        }
        const { badge } = step
        await engine.newComponent(step.component, step.blueprint, step.function, step.args, builder => {
          builder.withLogTitle(step.name)
          if (badge !== undefined) {
            builder.withBadge(badge)
          }
        })
        return
      }

      case 'call':
        await this.runCall(engine, step)
        return

      case 'transfer': {
        const receipt = step.ids === undefined
          ? await engine.transfer(step.to, step.resource, step.amount ?? '0')
          : await engine.transferNonFungibles(step.to, step.resource, step.ids)
        receipt.assertSuccess()
        return
      }

      case 'faucet':
        (await engine.callFaucet()).assertSuccess()
        return

      case 'assert-balance':
        this.assertBalance(engine, step)
        return

      case 'jump-epochs':
        if (step.epochs >= 0) {
          engine.jumpEpochs(step.epochs)
        } else {
          engine.jumpBackEpochs(-step.epochs)
        }
        return
    }
  }

  private async runCall(engine: TestEngine, step: CallStep): Promise<void> {
    const builder = step.target === undefined
      ? engine.call(step.method, step.args)
      : engine.callFrom(step.target, step.method, step.args)
    builder.withLogTitle(step.name)
    if (step.badge !== undefined) {
      builder.withBadge(step.badge)
    }
    if (step.feePayer !== undefined) {
      builder.withFeePayer(step.feePayer.entity, step.feePayer.amount)
    }
    if (step.depositTo !== undefined) {
      builder.withDepositTarget(step.depositTo)
    }
    if (step.manifest !== undefined) {
      builder.withOutput(this.options.manifestDir ?? 'manifests', step.manifest.replace(/\.rtm$/, ''))
    }

    const receipt = await builder.execute()
    if (step.expect.outcome === 'success') {
      receipt.assertSuccess()
    } else {
      receipt.assertFailureContains(step.expect.contains)
    }
  }

  private assertBalance(engine: TestEngine, step: AssertBalanceStep): void {
    const owner = step.owner ?? 'the current account'
    if (step.amount !== undefined) {
      const actual = step.owner === undefined ? engine.balance(step.resource) : engine.balanceOf(step.owner, step.resource)
      if (actual !== toAmount(step.amount)) {
        throw new BalanceAssertionError(`Expected ${owner} to hold ${step.amount} of ${step.resource}, found ${formatDecimal(actual)}`)
      }
    }
    if (step.ids !== undefined) {
      const actual = step.owner === undefined ? engine.idsBalance(step.resource) : engine.idsBalanceOf(step.owner, step.resource)
      const expected = toNonFungibleIdSet(step.ids).map(formatNonFungibleId).sort()
      const found = actual.map(formatNonFungibleId).sort()
      if (expected.join(',') !== found.join(',')) {
        throw new BalanceAssertionError(`Expected ${owner} to hold ${step.resource} ids [${expected.join(', ')}], found [${found.join(', ')}]`)
      }
    }
  }
}
