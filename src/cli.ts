import { Command } from 'commander'
import { makeRunCommand } from './commands/run'
import { makeListCommand } from './commands/list'

export function setupCommands(program: Command): void {
  // Make run the default command when no subcommand is provided
  program.addCommand(makeRunCommand(), {
    isDefault: true,
    hidden: false // Keep it visible in help
  })

  program.addCommand(makeListCommand())
}
