/**
 * Helpers shared by the CLI commands
 */

import { promises as fs } from 'fs'
import { dirname, join, resolve } from 'path'
import { loadGeneratorConfig } from '../../config/generator-config.js'
import { createEmitter, type CodegenOptions } from '../../core/codegen.js'
import { CodegenError, errorMessage } from '../../core/errors.js'
import { createLogger, type Logger } from '../../core/logger.js'
import { isTargetLanguage, TARGET_LANGUAGES, type TargetLanguage } from '../../emitters/types.js'

export interface CommonOptions {
  target?: string
  config?: string
  verbose?: boolean
}

export function resolveTarget(target: string | undefined): TargetLanguage {
  const value = target ?? process.env.BMRS_CODEGEN_TARGET ?? 'python'
  if (!isTargetLanguage(value)) {
    throw new CodegenError(`Unknown target "${value}" (expected one of: ${TARGET_LANGUAGES.join(', ')})`)
  }
  return value
}

export function codegenOptions(options: CommonOptions): CodegenOptions {
  const config = loadGeneratorConfig(options.config)
  return { config, emitter: createEmitter(resolveTarget(options.target), config) }
}

export function commandLogger(options: { verbose?: boolean; logger?: Logger }): Logger {
  return options.logger ?? createLogger(options.verbose ? { level: 'debug' } : {})
}

/** Parse a positive integer option, e.g. `--preview 5` */
export function parsePositiveInt(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new CodegenError(`--${name} must be a positive integer, got "${value}"`)
  }
  return parsed
}

export async function writeFile(path: string, content: string): Promise<void> {
  await fs.mkdir(dirname(path), { recursive: true })
  await fs.writeFile(path, content, 'utf8')
}

/**
 * Write a set of files under `outputDir`. Everything is staged in a sibling
 * directory first and renamed into place only once every write succeeded;
 * the staging directory is removed either way.
 */
export async function writeFilesAtomically(
  outputDir: string,
  files: readonly { path: string; content: string }[],
): Promise<string[]> {
  const target = resolve(outputDir)
  await fs.mkdir(dirname(target), { recursive: true })
  const staging = await fs.mkdtemp(join(dirname(target), '.bmrs-codegen-'))

  try {
    for (const file of files) {
      await writeFile(join(staging, file.path), file.content)
    }

    const written: string[] = []
    for (const file of files) {
      const destination = join(target, file.path)
      await fs.mkdir(dirname(destination), { recursive: true })
      await fs.rename(join(staging, file.path), destination)
      written.push(destination)
    }
    return written
  } finally {
    await fs.rm(staging, { recursive: true, force: true })
  }
}

/**
 * Run a command body; log failures and exit with code 1
 */
export async function runCommand(logger: Logger, label: string, body: () => Promise<void>): Promise<void> {
  try {
    await body()
  } catch (error) {
    logger.error(`${label} failed: ${errorMessage(error)}`)
    process.exit(1)
  }
}
