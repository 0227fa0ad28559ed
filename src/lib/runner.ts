import { ProjectLoader, ProjectLoaderOptions } from './core/loader'
import { ScenarioExecutor, ScenarioResult } from './core/scenario-executor'
import { FileManifestSink } from './core/manifest-sink'
import { EngineEventEmitter, engineEvents } from './events'
import { Scenario } from './types/scenario'

/**
 * Options for configuring a ScenarioRunner instance.
 */
export interface ScenarioRunnerOptions {
  /** The root directory of the project. */
  projectRoot: string

  /** Optional: names of the scenarios to run. If not provided, all scenarios are run. */
  runScenarios?: string[]

  /** Optional: Custom event emitter instance. If not provided, uses the global singleton. */
  eventEmitter?: EngineEventEmitter

  /** Optional: Project loader options (e.g., whether to load the std packages). */
  loaderOptions?: ProjectLoaderOptions

  /** Optional: Stop as soon as any scenario fails. Defaults to false. */
  failEarly?: boolean

  /** Optional: Show end-of-run summary (default: true). */
  showSummary?: boolean
}

export interface RunSummary {
  results: ScenarioResult[]
  passed: number
  failed: number
}

/**
 * Top-level orchestrator: loads a project and runs its scenarios in name order.
 */
export class ScenarioRunner {
  public readonly events: EngineEventEmitter
  private readonly loader: ProjectLoader

  constructor(private readonly options: ScenarioRunnerOptions) {
    this.events = options.eventEmitter ?? engineEvents
    this.loader = new ProjectLoader(options.projectRoot, options.loaderOptions)
  }

  /**
   * Runs the selected scenarios. Resolves with the summary even when scenarios fail; rejects
   * only when the project cannot be loaded or a requested scenario does not exist.
   */
  public async run(): Promise<RunSummary> {
    this.events.emitEvent({ type: 'project_loading_started', level: 'info', data: { projectRoot: this.options.projectRoot } })
    await this.loader.load()
    this.events.emitEvent({
      type: 'project_loaded',
      level: 'info',
      data: { scenarioCount: this.loader.scenarios.size, blueprintPackageCount: this.loader.packages.size }
    })

    const { config } = this.loader
    const executor = new ScenarioExecutor({
      packages: this.loader.packages,
      feeLock: config.feeLock,
      manifestDir: config.manifestDir,
      events: this.events,
      manifestSink: new FileManifestSink(this.options.projectRoot)
    })

    const results: ScenarioResult[] = []
    for (const scenario of this.getExecutionPlan()) {
      const result = await executor.run(scenario)
      results.push(result)
      if (result.status === 'failed' && this.options.failEarly) {
        break
      }
    }

    const failed = results.filter(result => result.status === 'failed')
    const summary: RunSummary = { results, passed: results.length - failed.length, failed: failed.length }
    if (this.options.showSummary !== false) {
      this.events.emitEvent({
        type: 'run_summary',
        level: 'info',
        data: {
          total: results.length,
          passed: summary.passed,
          failed: summary.failed,
          failedScenarios: failed.map(result => result.name)
        }
      })
    }
    return summary
  }

  private getExecutionPlan(): Scenario[] {
    const { runScenarios } = this.options
    if (!runScenarios || runScenarios.length === 0) {
      return [...this.loader.scenarios.values()].sort((a, b) => a.name.localeCompare(b.name))
    }
    return runScenarios.map(name => {
      const scenario = this.loader.scenarios.get(name)
      if (!scenario) {
        const available = [...this.loader.scenarios.keys()].join(', ') || 'none'
        throw new Error(`Scenario "${name}" not found. Available scenarios: ${available}`)
      }
      return scenario
    })
  }
}
