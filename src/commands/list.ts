import { Command } from 'commander'
import chalk from 'chalk'
import * as path from 'path'
import { loadProject, projectOption, noStdOption, verbosityOption, dotenvOption, loadDotenv, setVerbosity } from './common'

interface ListOptions {
  project: string
  dotenv?: string
  std: boolean
  verbose: number
}

export function makeListCommand(): Command {
  const list = new Command('list')
    .description('List project resources like scenarios and blueprint packages')

  const listScenarios = new Command('scenarios')
    .description('List all scenarios in the project')
  projectOption(listScenarios)
  dotenvOption(listScenarios)
  noStdOption(listScenarios)
  verbosityOption(listScenarios)
  listScenarios.action(async (options: ListOptions) => {
    try {
      loadDotenv(options)
      setVerbosity(options.verbose)
      const loader = await loadProject(options.project, {
        loadStdPackages: options.std !== false
      })
      console.log(chalk.bold.underline('Available Scenarios:'))
      if (loader.scenarios.size === 0) {
        console.log(chalk.yellow('No scenarios found in this project. Add YAML files under scenarios/.'))
        return
      }
      for (const scenario of loader.scenarios.values()) {
        const source = scenario._path ? ` (${path.relative(options.project, scenario._path)})` : ''
        console.log(`- ${chalk.cyan(scenario.name)}${chalk.gray(source)}`)
        if (scenario.description) {
          console.log(`  ${chalk.gray(scenario.description)}`)
        }
        if (options.verbose) {
          for (const step of scenario.steps) {
            console.log(`  • ${step.type}: ${step.name}`)
          }
        }
      }
    } catch (error) {
      console.error(chalk.red('Error listing scenarios:'), error instanceof Error ? error.message : String(error))
      process.exit(1)
    }
  })

  const listPackages = new Command('packages')
    .description('List the blueprint packages scenarios can publish')
  projectOption(listPackages)
  dotenvOption(listPackages)
  noStdOption(listPackages)
  verbosityOption(listPackages)
  listPackages.action(async (options: ListOptions) => {
    try {
      loadDotenv(options)
      setVerbosity(options.verbose)
      const loader = await loadProject(options.project, {
        loadStdPackages: options.std !== false
      })
      console.log(chalk.bold.underline('Available Blueprint Packages:'))
      if (loader.packages.size === 0) {
        console.log(chalk.yellow('No blueprint packages available.'))
        return
      }
      for (const [name, definition] of loader.packages) {
        const blueprints = Object.keys(definition.blueprints)
        console.log(`- ${chalk.cyan(name)} [${blueprints.join(', ')}]`)
        if (options.verbose) {
          for (const blueprint of blueprints) {
            const { functions = {}, methods = {} } = definition.blueprints[blueprint]
            console.log(`  ${chalk.gray(`${blueprint} functions:`)} ${Object.keys(functions).join(', ') || '-'}`)
            console.log(`  ${chalk.gray(`${blueprint} methods:`)} ${Object.keys(methods).join(', ') || '-'}`)
          }
        }
      }
    } catch (error) {
      console.error(chalk.red('Error listing packages:'), error instanceof Error ? error.message : String(error))
      process.exit(1)
    }
  })

  list.addCommand(listScenarios)
  list.addCommand(listPackages)

  return list
}
