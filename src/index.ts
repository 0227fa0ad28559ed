#!/usr/bin/env node

import { program } from 'commander'
import { setupCommands } from './cli'
import packageJson from '../package.json'

import { engineEvents } from './lib/events'

// Setup global error handling
process.on('unhandledRejection', (reason) => {
  engineEvents.emitEvent({
    type: 'unhandled_rejection',
    level: 'error',
    data: {
      reason
    }
  })
  process.exit(1)
})

process.on('uncaughtException', (error) => {
  engineEvents.emitEvent({
    type: 'uncaught_exception',
    level: 'error',
    data: {
      error
    }
  })
  process.exit(1)
})

async function main(): Promise<void> {
  try {
    program
      .name('ledger-test')
      .description('Run name-based test scenarios against a simulated ledger')
      .version(packageJson.version)

    setupCommands(program)

    await program.parseAsync(process.argv)
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
}

void main()
