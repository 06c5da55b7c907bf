#!/usr/bin/env node
/**
 * repogen CLI
 *
 * Generate Go CRUD repositories from tagged struct declarations
 */

import { Command } from 'commander'
import { generateCommand } from './commands/generate.js'

const program = new Command()

program
  .name('repogen')
  .description('Generate Go CRUD repositories from tagged struct declarations')
  .version('0.1.0')

// Generate command
// Defaults can be set via environment variables (REPOGEN_*)
program
  .command('generate', { isDefault: true })
  .description('Generate <Type>_repository.go for every struct in a Go file or directory')
  .argument('[source]', 'Go file or directory (default: current directory)')
  .option('-o, --output <dir>', 'Output directory, must exist (env: REPOGEN_OUTPUT, default: repository)')
  .option('--table <name>', 'Table the statements target (env: REPOGEN_TABLE, default: testTable)')
  .option('--receiver <type>', 'Receiver type of the methods (env: REPOGEN_RECEIVER, default: PostgresRepository)')
  .option('--dry-run', 'Print generated files without writing them')
  .option('--verbose', 'Show parsed declarations')
  .action(generateCommand)

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error)
  process.exit(1)
})

export default program
