/**
 * Generator Configuration
 *
 * The curated tables the generators depend on: the always-required field
 * allow-list, enum value sets, mixin group definitions and reserved words.
 * Defaults ship as JSON under data/; a user file may replace any top-level key.
 */

import { readFileSync } from 'fs'
import { resolve } from 'path'
import { z } from 'zod'
import { ConfigError, errorMessage } from '../core/errors.js'

const identifier = z.string().min(1)

const multiFieldGroupSchema = z.object({
  name: identifier,
  fields: z.array(identifier).min(2),
})

const singleFieldGroupSchema = z.object({
  name: identifier,
  field: identifier,
})

const behavioralRuleSchema = z
  .object({
    name: identifier,
    all: z.array(identifier).min(1).optional(),
    any: z.array(identifier).min(1).optional(),
    unclaimedOnly: z.boolean().optional(),
  })
  .refine((rule) => (rule.all === undefined) !== (rule.any === undefined), {
    message: 'a behavioral rule needs exactly one of "all" or "any"',
  })

export const mixinTablesSchema = z.object({
  multiField: z.array(multiFieldGroupSchema),
  singleField: z.array(singleFieldGroupSchema),
  behavioral: z.array(behavioralRuleSchema),
})

export const generatorConfigSchema = z.object({
  /** Allow-list of field names known to always be populated, grouped by category */
  requiredFields: z.record(z.string(), z.array(identifier)),
  /** Field name → allowed values */
  enums: z.record(z.string(), z.array(z.string()).min(1)),
  mixins: mixinTablesSchema,
  /** Identifiers that get a trailing underscore */
  reservedWords: z.array(identifier),
  /** Path segments dropped when synthesizing method names */
  pathPrefixes: z.array(identifier),
  /** Number of entries listed per section of the validation report */
  previewLimit: z.number().int().positive(),
})

export type GeneratorConfig = z.infer<typeof generatorConfigSchema>
export type MixinTables = z.infer<typeof mixinTablesSchema>

export const DEFAULT_PATH_PREFIXES = ['api', 'v1', 'v2', 'bmrs']
export const DEFAULT_PREVIEW_LIMIT = 10

const DATA_DIR = new URL('../../data/', import.meta.url)

function readJson(path: string | URL, label: string): unknown {
  let content: string
  try {
    content = readFileSync(path, 'utf8')
  } catch (error) {
    throw new ConfigError(`Could not read ${label}: ${errorMessage(error)}`, { cause: error })
  }
  try {
    return JSON.parse(content)
  } catch (error) {
    throw new ConfigError(`${label} is not valid JSON: ${errorMessage(error)}`, { cause: error })
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ')
}

function validate<T>(schema: z.ZodType<T>, value: unknown, label: string): T {
  const result = schema.safeParse(value)
  if (!result.success) {
    throw new ConfigError(`Invalid ${label}: ${formatIssues(result.error)}`, { cause: result.error })
  }
  return result.data
}

let cachedDefaults: GeneratorConfig | undefined

/**
 * Load the bundled default tables. Cached after the first call.
 */
export function loadDefaultConfig(): GeneratorConfig {
  if (!cachedDefaults) {
    cachedDefaults = validate(
      generatorConfigSchema,
      {
        requiredFields: readJson(new URL('required-fields.json', DATA_DIR), 'required-fields.json'),
        enums: readJson(new URL('enums.json', DATA_DIR), 'enums.json'),
        mixins: readJson(new URL('mixins.json', DATA_DIR), 'mixins.json'),
        reservedWords: readJson(new URL('reserved-words.json', DATA_DIR), 'reserved-words.json'),
        pathPrefixes: DEFAULT_PATH_PREFIXES,
        previewLimit: DEFAULT_PREVIEW_LIMIT,
      },
      'default configuration',
    )
  }
  return cachedDefaults
}

/**
 * Merge user overrides over the defaults. Each top-level key replaces the default wholesale.
 */
export function resolveConfig(overrides: unknown = {}): GeneratorConfig {
  const partial = validate(generatorConfigSchema.partial(), overrides, 'configuration overrides')
  const defined = Object.fromEntries(
    Object.entries(partial).filter(([, value]) => value !== undefined),
  )
  return validate(generatorConfigSchema, { ...loadDefaultConfig(), ...defined }, 'configuration')
}

/**
 * Load configuration from an optional JSON file (falls back to BMRS_CODEGEN_CONFIG)
 */
export function loadGeneratorConfig(configPath?: string): GeneratorConfig {
  const path = configPath ?? process.env.BMRS_CODEGEN_CONFIG
  if (!path) return loadDefaultConfig()
  return resolveConfig(readJson(resolve(path), path))
}

/** Flatten the grouped allow-list */
export function requiredFieldSet(config: GeneratorConfig): Set<string> {
  return new Set(Object.values(config.requiredFields).flat())
}
