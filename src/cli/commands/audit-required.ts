/**
 * Audit Required Command
 *
 * Checks the required-field allow-list against recorded responses. The
 * samples file maps an endpoint path to one response body or a list of them.
 */

import { promises as fs } from 'fs'
import { resolve } from 'path'
import { z } from 'zod'
import { loadGeneratorConfig, requiredFieldSet } from '../../config/generator-config.js'
import { CodegenError, errorMessage } from '../../core/errors.js'
import type { Logger } from '../../core/logger.js'
import { auditAllowList, FieldPresenceSampler, type AllowListAudit } from '../../generators/requiredness.js'
import { commandLogger, parsePositiveInt, runCommand } from './shared.js'

const samplesSchema = z.record(z.string(), z.unknown())

export interface AuditRequiredOptions {
  threshold?: string
  minEndpoints?: string
  config?: string
  verbose?: boolean
  logger?: Logger
}

function parseThreshold(value: string | undefined): number | undefined {
  if (value === undefined) return undefined
  const parsed = Number(value)
  if (!Number.isFinite(parsed) || parsed <= 0 || parsed > 1) {
    throw new CodegenError(`--threshold must be a number in (0, 1], got "${value}"`)
  }
  return parsed
}

function isEnvelope(value: unknown): boolean {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && 'data' in value
}

async function readSamples(path: string): Promise<Record<string, unknown>> {
  let parsed: unknown
  try {
    parsed = JSON.parse(await fs.readFile(resolve(path), 'utf8'))
  } catch (error) {
    throw new CodegenError(`Could not read samples ${path}: ${errorMessage(error)}`, { cause: error })
  }
  const result = samplesSchema.safeParse(parsed)
  if (!result.success) {
    throw new CodegenError(`Samples file ${path} must map endpoint paths to response bodies`)
  }
  return result.data
}

export async function runAuditRequired(samplesPath: string, options: AuditRequiredOptions = {}): Promise<AllowListAudit> {
  const logger = commandLogger(options)
  const config = loadGeneratorConfig(options.config)
  const sampler = new FieldPresenceSampler({
    threshold: parseThreshold(options.threshold),
    minEndpoints: parsePositiveInt(options.minEndpoints, 'min-endpoints'),
  })

  for (const [endpoint, body] of Object.entries(await readSamples(samplesPath))) {
    // A list of envelopes, or a single envelope / bare row array
    const responses: unknown[] = Array.isArray(body) && body.length > 0 && body.every(isEnvelope) ? body : [body]
    let rows = 0
    for (const response of responses) {
      rows += sampler.record(endpoint, response)
    }
    logger.debug(`  ${endpoint}: ${rows} rows`)
  }

  const audit = auditAllowList(requiredFieldSet(config), sampler)
  logger.info(`Sampled ${sampler.endpoints.length} endpoints`)
  logger.success(`${audit.confirmed.length} allow-listed fields confirmed`)
  for (const { field, endpoints } of audit.contradicted) {
    logger.warn(`${field} is often null in: ${endpoints.join(', ')}`)
  }
  if (audit.unobserved.length > 0) {
    logger.info(`Not observed: ${audit.unobserved.join(', ')}`)
  }
  if (audit.missing.length > 0) {
    logger.info(`Commonly required but not allow-listed: ${audit.missing.join(', ')}`)
  }
  return audit
}

export async function auditRequiredCommand(samplesPath: string, options: AuditRequiredOptions): Promise<void> {
  await runCommand(commandLogger(options), 'Audit', async () => {
    await runAuditRequired(samplesPath, options)
  })
}
