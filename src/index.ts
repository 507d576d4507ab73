#!/usr/bin/env node

import { Command } from 'commander'
import {
  playCommand,
  profileCommand,
  resetCommand,
  logCommand,
  configCommand
} from './cli/commands.js'

const program = new Command()

program
  .name('dread')
  .description('An adaptive horror director: tracks the player, paces tension and generates what happens next')
  .version('0.1.0')

program
  .command('play', { isDefault: true })
  .description('Start an interactive session')
  .option('--config <path>', 'Path to config file')
  .action(async (options: { config?: string }) => {
    await playCommand(options)
  })

program
  .command('profile')
  .description('Print the saved player profile')
  .option('--config <path>', 'Path to config file')
  .action(async (options: { config?: string }) => {
    await profileCommand(options)
  })

program
  .command('reset')
  .description('Forget the saved player profile')
  .option('--config <path>', 'Path to config file')
  .option('--log', 'Also clear the generation log')
  .action(async (options: { config?: string; log?: boolean }) => {
    await resetCommand(options)
  })

program
  .command('log')
  .description('Show recent generation requests')
  .option('--config <path>', 'Path to config file')
  .option('--limit <n>', 'Number of entries', '20')
  .action(async (options: { config?: string; limit?: string }) => {
    await logCommand(options)
  })

program
  .command('config [action] [key] [value]')
  .description('Show or set configuration')
  .action(async (action?: string, key?: string, value?: string) => {
    await configCommand(action, key, value)
  })

program.parseAsync(process.argv).catch((err) => {
  console.error(err)
  process.exit(1)
})
