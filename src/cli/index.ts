#!/usr/bin/env node
/**
 * bmrs-codegen CLI
 *
 * Generate typed BMRS clients from OpenAPI specs
 */

import { Command } from 'commander'
import { auditRequiredCommand } from './commands/audit-required.js'
import { generateCommand } from './commands/generate.js'
import { validateCommand } from './commands/validate.js'

const program = new Command()

program
  .name('bmrs-codegen')
  .description('Generate typed BMRS API clients from OpenAPI specifications')
  .version('0.1.0')

// Generate command
// Defaults can be set via environment variables (BMRS_CODEGEN_*)
program
  .command('generate')
  .description('Generate models, methods and enums from an OpenAPI specification')
  .argument('<source>', 'OpenAPI specification (URL, file path or JSON string)')
  .option('-o, --output <dir>', 'Output directory', process.env.BMRS_CODEGEN_OUTPUT || './generated')
  .option('-t, --target <language>', 'Target language (python|typescript)', process.env.BMRS_CODEGEN_TARGET || 'python')
  .option('-c, --config <file>', 'JSON file overriding the default tables')
  .option('--dry-run', 'Preview without writing files')
  .option('--verbose', 'Show detailed output')
  .action(generateCommand)

// Validate command
program
  .command('validate')
  .description('Compare a hand-written client against the specification')
  .argument('<source>', 'OpenAPI specification (URL, file path or JSON string)')
  .requiredOption('-e, --existing <file>', 'Hand-written client source file')
  .option('-t, --target <language>', 'Language of the existing client (python|typescript)', process.env.BMRS_CODEGEN_TARGET || 'python')
  .option('-c, --config <file>', 'JSON file overriding the default tables')
  .option('-r, --report <file>', 'Also write the report to a file')
  .option('--preview <n>', 'Entries shown per report section')
  .option('--verbose', 'Show detailed output')
  .action(validateCommand)

// Audit command
program
  .command('audit-required')
  .description('Check the required-field allow-list against recorded responses')
  .argument('<samples>', 'JSON file mapping endpoint paths to response bodies')
  .option('--threshold <ratio>', 'Share of rows a field must be non-null in', '0.9')
  .option('--min-endpoints <n>', 'Endpoints a field must be required in to be suggested', '3')
  .option('-c, --config <file>', 'JSON file overriding the default tables')
  .option('--verbose', 'Show detailed output')
  .action(auditRequiredCommand)

// Parse arguments
if (process.argv.length < 3) {
  program.help()
} else {
  program.parse()
}

export default program
