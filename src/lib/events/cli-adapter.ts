import chalk from 'chalk'
import { EngineEvent, EngineEventType } from './types'
import { EngineEventEmitter } from './emitter'

/**
 * Verbosity levels for filtering console output:
 * 0 (default): scenario results, warnings and errors
 * 1 (-v): add entity creation, transaction titles and outcomes
 * 2 (-vv): add individual steps, fees, application logs and manifest files
 * 3 (-vvv): full debug, including registry bookkeeping
 */
export type VerbosityLevel = 0 | 1 | 2 | 3

const LEVEL_0_EVENTS: ReadonlySet<EngineEventType> = new Set<EngineEventType>([
  'scenario_started', 'scenario_completed', 'scenario_failed', 'run_summary',
  'reference_collision_warning', 'transaction_rejected',
  'unhandled_rejection', 'uncaught_exception', 'cli_error'
])

const LEVEL_1_EVENTS: ReadonlySet<EngineEventType> = new Set<EngineEventType>([
  'project_loading_started', 'project_loaded',
  'account_created', 'package_published', 'resource_created', 'component_instantiated',
  'transaction_title', 'transaction_committed', 'transaction_failed'
])

const LEVEL_2_EVENTS: ReadonlySet<EngineEventType> = new Set<EngineEventType>([
  'step_started', 'transaction_fee', 'application_log', 'manifest_written'
])

/**
 * CLI adapter that converts structured engine events into
 * formatted console output using chalk for colors.
 */
export class CLIEventAdapter {
  private emitter: EngineEventEmitter
  private verbosity: VerbosityLevel
  private readonly listener = (event: EngineEvent): void => this.handleEvent(event)

  constructor(emitter: EngineEventEmitter, verbosity: VerbosityLevel = 0) {
    this.emitter = emitter
    this.verbosity = verbosity
    this.emitter.onAnyEvent(this.listener)
  }

  /**
   * Updates the verbosity level for this adapter.
   */
  setVerbosity(verbosity: VerbosityLevel): void {
    this.verbosity = verbosity
  }

  /**
   * Determines the minimum verbosity level required to show an event.
   */
  private getEventVerbosityLevel(eventType: EngineEventType): VerbosityLevel {
    if (LEVEL_0_EVENTS.has(eventType)) return 0
    if (LEVEL_1_EVENTS.has(eventType)) return 1
    if (LEVEL_2_EVENTS.has(eventType)) return 2
    return 3
  }

  private handleEvent(event: EngineEvent): void {
    const requiredLevel = this.getEventVerbosityLevel(event.type)
    if (this.verbosity < requiredLevel) {
      return
    }
    switch (event.type) {
      case 'session_started':
        console.log(chalk.gray(`      session started, default account ${event.data.defaultAccount}`))
        break

      case 'project_loading_started':
        console.log(chalk.blue(`\nLoading project from: ${event.data.projectRoot}`))
        break

      case 'project_loaded':
        console.log(chalk.green(`   - Loaded ${event.data.scenarioCount} scenarios and ${event.data.blueprintPackageCount} blueprint packages.`))
        break

      case 'scenario_started':
        console.log(chalk.cyan.bold(`\n▶ Scenario: ${event.data.scenarioName}`))
        break

      case 'step_started':
        console.log(chalk.blue(`  - ${event.data.stepType}: ${event.data.stepName}`))
        break

      case 'scenario_completed':
        console.log(chalk.green.bold(`✅ Scenario "${event.data.scenarioName}" passed (${event.data.stepCount} steps).`))
        break

      case 'scenario_failed':
        console.error(chalk.red.bold(`❌ Scenario "${event.data.scenarioName}" failed at step "${event.data.stepName}"`))
        console.error(chalk.red(`   Error: ${event.data.error}`))
        break

      case 'account_created':
        console.log(chalk.gray(`      account ${event.data.name}: ${event.data.address}`))
        break

      case 'package_published':
        console.log(chalk.gray(`      package ${event.data.name}: ${event.data.address} [${event.data.blueprints.join(', ')}]`))
        break

      case 'resource_created':
        console.log(chalk.gray(`      ${event.data.resourceType === 'fungible' ? 'token' : 'non-fungible resource'} ${event.data.name}: ${event.data.address}`))
        break

      case 'component_instantiated':
        console.log(chalk.gray(`      component ${event.data.name} (${event.data.blueprint}): ${event.data.address}`))
        break

      case 'reference_registered':
        console.log(chalk.gray(`        [${event.data.origin}] ${event.data.kind} "${event.data.key}" -> ${event.data.address}`))
        break

      case 'metadata_reference_shadowed':
        console.log(chalk.gray(`        ${event.data.kind} "${event.data.name}" from metadata (${event.data.address}) ignored: explicitly bound to ${event.data.explicitAddress}`))
        break

      case 'reference_collision_warning':
        console.warn(chalk.yellow(`Warning: ${event.data.kind} name "${event.data.name}" is already bound to ${event.data.keptAddress}; ignoring ${event.data.droppedAddress}. Register it explicitly to refer to it by name.`))
        break

      case 'current_reference_changed':
        console.log(chalk.gray(`        current ${event.data.kind} is now "${event.data.name}" (${event.data.address})`))
        break

      case 'transaction_title':
        console.log(chalk.magenta(`\n===== ${event.data.title} =====`))
        break

      case 'transaction_submitted':
        console.log(chalk.gray(`        submitting ${event.data.instructionCount} instructions (${event.data.callCount} calls) signed by ${event.data.signer}`))
        break

      case 'manifest_written':
        console.log(chalk.gray(`        manifest written to ${event.data.path}`))
        break

      case 'transaction_committed':
        console.log(chalk.green(`      ✓ committed (fee ${event.data.fee} XRD, ${event.data.newEntityCount} new entities)`))
        break

      case 'transaction_failed':
        console.log(chalk.yellow(`      ✗ failed: ${event.data.message} (fee ${event.data.fee} XRD)`))
        break

      case 'transaction_rejected':
        console.error(chalk.red(`      ✗ rejected: ${event.data.reason}`))
        break

      case 'transaction_fee':
        console.log(chalk.gray(`      Transaction fee: ${event.data.fee} XRD`))
        break

      case 'application_log':
        console.log(chalk.gray(`      [${event.data.logLevel}] ${event.data.message}`))
        break

      case 'run_summary':
        console.log(chalk.blue('\nSummary'))
        console.log(chalk.green(`   ✓ Passed: ${event.data.passed}/${event.data.total}`))
        if (event.data.failed > 0) {
          console.log(chalk.red(`   ✗ Failed: ${event.data.failed} (${event.data.failedScenarios.join(', ')})`))
        }
        break

      case 'unhandled_rejection':
        console.error(chalk.red('Unhandled Rejection:'), event.data.reason)
        break

      case 'uncaught_exception':
        console.error(chalk.red('Uncaught Exception:'), event.data.error)
        break

      case 'cli_error':
        console.error(chalk.red('Error:'), event.data.message)
        break
    }
  }

  /**
   * Stop listening to events (cleanup method).
   */
  public destroy(): void {
    this.emitter.offAnyEvent(this.listener)
  }
}
