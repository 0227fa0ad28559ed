import { Command } from 'commander'
import { ScenarioRunner } from '../lib/runner'
import { engineEvents } from '../lib/events'
import { projectOption, dotenvOption, noStdOption, verbosityOption, loadDotenv, setVerbosity } from './common'

interface RunOptions {
  project: string
  dotenv?: string
  std: boolean
  verbose: number
  failEarly: boolean
}

export function makeRunCommand(): Command {
  const run = new Command('run')
    .description('Run scenarios against a fresh simulated ledger each')
    .argument('[scenarios...]', 'Names of the scenarios to run. If not provided, all scenarios are run.')
    .option('--fail-early', 'Stop as soon as any scenario fails. Default: false', false)

  projectOption(run)
  dotenvOption(run)
  noStdOption(run)
  verbosityOption(run)

  run.action(async (scenarios: string[], options: RunOptions) => {
    try {
      loadDotenv(options)
      setVerbosity(options.verbose)

      const runner = new ScenarioRunner({
        projectRoot: options.project,
        runScenarios: scenarios.length > 0 ? scenarios : undefined,
        failEarly: options.failEarly,
        loaderOptions: {
          loadStdPackages: options.std !== false
        }
      })
      const summary = await runner.run()
      if (summary.failed > 0) {
        process.exitCode = 1
      }
    } catch (error) {
      engineEvents.emitEvent({
        type: 'cli_error',
        level: 'error',
        data: {
          message: error instanceof Error ? error.message : String(error)
        }
      })
      process.exit(1)
    }
  })

  return run
}
