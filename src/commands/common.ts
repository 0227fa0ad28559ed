import { Command } from 'commander'
import * as dotenv from 'dotenv'
import * as path from 'path'
import { ProjectLoader, ProjectLoaderOptions } from '../lib/core/loader'
import { CLIEventAdapter, VerbosityLevel, engineEvents } from '../lib/events'

// Converts engine events to console output for every command
const cliAdapter = new CLIEventAdapter(engineEvents)

/**
 * Adds the --project option to a command.
 */
export const projectOption = (cmd: Command): Command =>
  cmd.option('-p, --project <path>', 'Project root directory', process.cwd())

/**
 * Adds the --dotenv option to a command.
 */
export const dotenvOption = (cmd: Command): Command =>
  cmd.option('--dotenv <path>', 'Path to a custom .env file')

/**
 * Adds the --no-std option to a command.
 */
export const noStdOption = (cmd: Command): Command =>
  cmd.option('--no-std', 'Disable the built-in std blueprint packages')

/**
 * Adds verbosity options to a command.
 */
export const verbosityOption = (cmd: Command): Command =>
  cmd.option('-v, --verbose', 'Enable verbose logging (use -vv or -vvv for more detail)', (_, previous: number) => previous + 1, 0)

export function setVerbosity(count: number): void {
  cliAdapter.setVerbosity(toVerbosity(count))
}

export function toVerbosity(count: number): VerbosityLevel {
  if (count >= 3) return 3
  if (count === 2) return 2
  if (count === 1) return 1
  return 0
}

/**
 * Loads the project using the ProjectLoader and emits corresponding events.
 */
export async function loadProject(projectRoot: string, options?: ProjectLoaderOptions): Promise<ProjectLoader> {
  engineEvents.emitEvent({
    type: 'project_loading_started',
    level: 'info',
    data: { projectRoot }
  })

  const loader = new ProjectLoader(projectRoot, options)
  await loader.load()

  engineEvents.emitEvent({
    type: 'project_loaded',
    level: 'info',
    data: {
      scenarioCount: loader.scenarios.size,
      blueprintPackageCount: loader.packages.size
    }
  })
  return loader
}

/**
 * Loads environment variables from the specified .env file path.
 */
export function loadDotenv(options: { dotenv?: string }): void {
  const dotenvPath = options.dotenv ? path.resolve(options.dotenv) : path.resolve(process.cwd(), '.env')
  dotenv.config({ path: dotenvPath })
}
