/**
 * CLI test helpers
 */

import chalk from 'chalk'
import { mkdtempSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { createLogger, type Logger } from '../../src/core/logger.js'

chalk.level = 0

export function tempDir(): string {
  return mkdtempSync(join(tmpdir(), 'bmrs-codegen-'))
}

export function captureLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = []
  const logger = createLogger({ level: 'info', sink: (_level, line) => lines.push(line) })
  return { logger, lines }
}
