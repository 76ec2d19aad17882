/**
 * Generate Command
 *
 * Main entry point for code generation from OpenAPI specs. Every file is
 * rendered and staged before the first one lands in the output directory.
 */

import { join } from 'path'
import { runCodegen } from '../../core/codegen.js'
import type { GenerationNote } from '../../core/context.js'
import type { Logger } from '../../core/logger.js'
import type { EmittedFile } from '../../emitters/types.js'
import { loadSpecSource } from '../../generators/parser.js'
import { codegenOptions, commandLogger, runCommand, writeFilesAtomically, type CommonOptions } from './shared.js'

export interface GenerateOptions extends CommonOptions {
  output?: string
  dryRun?: boolean
  logger?: Logger
}

export interface GenerateSummary {
  outputDir: string
  files: EmittedFile[]
  notes: readonly GenerationNote[]
  written: boolean
}

function logNotes(logger: Logger, notes: readonly GenerationNote[]): void {
  if (notes.length === 0) return
  logger.info(`\n${notes.length} note(s):`)
  for (const note of notes) {
    logger.warn(`[${note.kind}] ${note.subject}: ${note.message}`)
  }
}

export async function runGenerate(source: string, options: GenerateOptions = {}): Promise<GenerateSummary> {
  const logger = commandLogger(options)
  const outputDir = options.output ?? process.env.BMRS_CODEGEN_OUTPUT ?? './generated'
  const codegen = codegenOptions(options)

  logger.info(`Loading OpenAPI spec from: ${source}`)
  const { document, definitions, files } = runCodegen(await loadSpecSource(source), codegen)
  logger.info(`Loaded: ${document.info.title} v${document.info.version}`)
  for (const warning of document.warnings) {
    logger.warn(warning)
  }

  logger.debug(`Target: ${codegen.emitter.target}`)
  logger.info(
    `Generated ${definitions.models.length} models, ${definitions.methods.length} methods, ${definitions.enums.length} enums`,
  )
  logNotes(logger, definitions.notes)

  if (options.dryRun) {
    logger.info('\n[DRY RUN] Would write:')
    for (const file of files) {
      logger.info(`  - ${join(outputDir, file.path)}`)
    }
    return { outputDir, files, notes: definitions.notes, written: false }
  }

  for (const path of await writeFilesAtomically(outputDir, files)) {
    logger.debug(`  Written: ${path}`)
  }
  logger.success(`Generated ${files.length} files in: ${outputDir}`)
  return { outputDir, files, notes: definitions.notes, written: true }
}

export async function generateCommand(source: string, options: GenerateOptions): Promise<void> {
  await runCommand(commandLogger(options), 'Generation', async () => {
    await runGenerate(source, options)
  })
}
