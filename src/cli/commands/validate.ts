/**
 * Validate Command
 *
 * Compares a hand-written client with the document and prints the report.
 */

import { promises as fs } from 'fs'
import { resolve } from 'path'
import { validateClient } from '../../core/codegen.js'
import { CodegenError, errorMessage } from '../../core/errors.js'
import type { Logger } from '../../core/logger.js'
import { loadSpecSource } from '../../generators/parser.js'
import { formatReport, type ValidationResult } from '../../generators/spec-validator.js'
import {
  codegenOptions,
  commandLogger,
  parsePositiveInt,
  runCommand,
  writeFile,
  type CommonOptions,
} from './shared.js'

export interface ValidateOptions extends CommonOptions {
  existing: string
  report?: string
  preview?: string
  logger?: Logger
}

export interface ValidateSummary {
  result: ValidationResult
  report: string
}

export async function runValidate(source: string, options: ValidateOptions): Promise<ValidateSummary> {
  const logger = commandLogger(options)
  const codegen = codegenOptions(options)

  let existingSource: string
  try {
    existingSource = await fs.readFile(resolve(options.existing), 'utf8')
  } catch (error) {
    throw new CodegenError(`Could not read existing client ${options.existing}: ${errorMessage(error)}`, {
      cause: error,
    })
  }

  const result = validateClient(await loadSpecSource(source), existingSource, codegen)
  const previewLimit = parsePositiveInt(options.preview, 'preview') ?? codegen.config.previewLimit
  const report = formatReport(result, previewLimit)

  logger.info(report)
  if (options.report) {
    await writeFile(options.report, `${report}\n`)
    logger.success(`Report written to: ${options.report}`)
  }
  return { result, report }
}

export async function validateCommand(source: string, options: ValidateOptions): Promise<void> {
  await runCommand(commandLogger(options), 'Validation', async () => {
    await runValidate(source, options)
  })
}
