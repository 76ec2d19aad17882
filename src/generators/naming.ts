/**
 * Shared Naming Utilities
 *
 * Turns arbitrary schema, field, parameter and operation names into valid
 * identifiers. Type names use PascalCase-ish casing as found in the document;
 * fields, methods and parameters use snake_case.
 *
 * All functions here are pure. Collision tracking lives in GenerationContext.
 */

import type { HttpVerb } from '../core/definitions.js'

/**
 * Generic wrapper markers, checked in order against the *original* schema name
 */
const WRAPPER_MARKERS: ReadonlyArray<readonly [marker: string, suffix: string]> = [
  ['DatasetResponse-1_', '_DatasetResponse'],
  ['ResponseWithMetadata-1_', '_ResponseWithMetadata'],
  ['Response-1_', '_Response'],
]

const INVALID_CHARS = /[^A-Za-z0-9_]/g

/** Replace invalid characters, collapse underscores, trim them from both ends */
export function sanitizeIdentifier(str: string): string {
  return str
    .replace(INVALID_CHARS, '_')
    .replace(/_+/g, '_')
    .replace(/^_+|_+$/g, '')
}

function startsWithDigit(str: string): boolean {
  return /^[0-9]/.test(str)
}

const NO_RESERVED_WORDS: ReadonlySet<string> = new Set()

/** Append `_` to a reserved identifier. Case-sensitive: `None` and `none` differ. */
export function escapeReserved(name: string, reservedWords: ReadonlySet<string>): string {
  return reservedWords.has(name) ? `${name}_` : name
}

/**
 * Suffix that disambiguates a schema generated from a generic wrapper type
 *
 * @example
 * wrapperSuffix("Insights.Api.Models.Responses.DatasetResponse-1_Insights.Api.Models.DatasetRows.AbucDatasetRow")
 * // => "_DatasetResponse"
 */
export function wrapperSuffix(originalName: string): string {
  for (const [marker, suffix] of WRAPPER_MARKERS) {
    if (originalName.includes(marker)) return suffix
  }
  return ''
}

/**
 * Convert a schema name to a class name
 *
 * @example
 * toTypeName("Insights.Api.Models.DatasetRows.AbucDatasetRow") // => "AbucDatasetRow"
 * toTypeName("Insights.Api.Models.Responses.DatasetResponse-1_Insights.Api.Models.DatasetRows.AbucDatasetRow")
 * // => "AbucDatasetRow_DatasetResponse"
 * toTypeName("2024Report") // => "Model_2024Report"
 */
export function toTypeName(rawName: string, originalName: string = rawName): string {
  const lastSegment = rawName.split('.').pop() ?? ''
  let name = sanitizeIdentifier(lastSegment)
  if (startsWithDigit(name)) {
    name = `Model_${name}`
  }
  return `${name || 'UnnamedModel'}${wrapperSuffix(originalName)}`
}

/**
 * Convert a property name to a snake_case field name
 *
 * @example
 * toFieldName("settlementPeriod", reserved) // => "settlement_period"
 * toFieldName("from", reserved) // => "from_"
 * toFieldName("10mWindSpeed", reserved) // => "field_10m_wind_speed"
 */
export function toFieldName(rawName: string, reservedWords: ReadonlySet<string>): string {
  let name = sanitizeIdentifier(
    rawName.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toLowerCase(),
  )
  if (!name) return 'field'
  if (startsWithDigit(name)) {
    name = `field_${name}`
  }
  // Escape last: trimming would otherwise strip the marker on a second pass
  return escapeReserved(name, reservedWords)
}

/**
 * Insert underscores at word boundaries and lowercase
 *
 * @example
 * toSnakeCase("GetDatasetsABUC") // => "get_datasets_abuc"
 * toSnakeCase("HTTPResponseCode") // => "http_response_code"
 */
export function toSnakeCase(text: string): string {
  return text
    .replace(/(.)([A-Z][a-z]+)/g, '$1_$2')
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .toLowerCase()
}

function finishMethodName(name: string, fallback: string, reservedWords: ReadonlySet<string>): string {
  const cleaned = sanitizeIdentifier(toSnakeCase(name))
  if (!cleaned) return escapeReserved(fallback, reservedWords)
  return escapeReserved(startsWithDigit(cleaned) ? `op_${cleaned}` : cleaned, reservedWords)
}

/**
 * Convert an operationId to a method name
 *
 * @example
 * toMethodName("getDatasetsAbuc") // => "get_datasets_abuc"
 * toMethodName("balancing-settlement.stack") // => "balancing_settlement_stack"
 * toMethodName("import", reserved) // => "import_"
 */
export function toMethodName(operationId: string, reservedWords: ReadonlySet<string> = NO_RESERVED_WORDS): string {
  return finishMethodName(operationId.replace(INVALID_CHARS, '_'), 'operation', reservedWords)
}

const VERB_PREFIXES: Partial<Record<HttpVerb, string>> = {
  get: 'get',
  post: 'create',
  put: 'update',
  delete: 'delete',
}

/**
 * Synthesize a method name from the verb and the literal path segments
 *
 * @example
 * fallbackMethodName("/datasets/abuc", "get", ["api", "v1", "bmrs"]) // => "get_datasets_abuc"
 * fallbackMethodName("/bmrs/api/v1/balancing/bid-offer/{bmUnit}", "post", prefixes)
 * // => "create_balancing_bid_offer"
 */
export function fallbackMethodName(
  path: string,
  verb: HttpVerb,
  prefixes: readonly string[],
  reservedWords: ReadonlySet<string> = NO_RESERVED_WORDS,
): string {
  const stripped = new Set(prefixes.map((prefix) => prefix.toLowerCase()))
  const parts = path
    .split('/')
    .filter((part) => part && !part.startsWith('{'))
    .filter((part) => !stripped.has(part.toLowerCase()))
    .map((part) => part.replace(INVALID_CHARS, '_'))

  const prefix = VERB_PREFIXES[verb] ?? verb
  return finishMethodName([prefix, ...parts].join('_'), prefix, reservedWords)
}

/**
 * Parameter identifier for signatures and bodies. The wire key stays the original name.
 *
 * @example
 * escapeParameterName("from", reserved) // => "from_"
 * escapeParameterName("settlementPeriodFrom", reserved) // => "settlementPeriodFrom"
 * escapeParameterName("bm-unit", reserved) // => "bm_unit"
 * escapeParameterName("None", reserved) // => "None_"
 */
export function escapeParameterName(name: string, reservedWords: ReadonlySet<string>): string {
  let escaped = sanitizeIdentifier(name)
  if (!escaped) return 'param'
  if (startsWithDigit(escaped)) {
    escaped = `param_${escaped}`
  }
  return escapeReserved(escaped, reservedWords)
}

/**
 * Class name for the enum attached to a field
 *
 * @example
 * enumClassName("psrType") // => "PsrtypeEnum"
 * enumClassName("bid_offer_pair") // => "BidOfferPairEnum"
 */
export function enumClassName(fieldName: string): string {
  const base = fieldName
    .split(/[_\s]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join('')
  const name = sanitizeIdentifier(base) || 'Value'
  return name.endsWith('Enum') ? name : `${name}Enum`
}

/**
 * Enum member name for a value
 *
 * @example
 * toEnumMemberName("Wind Onshore") // => "WIND_ONSHORE"
 * toEnumMemberName("1-day") // => "_1_DAY"
 */
export function toEnumMemberName(value: string): string {
  let name = sanitizeIdentifier(value)
  if (startsWithDigit(name)) {
    name = `_${name}`
  }
  return name.toUpperCase() || 'UNKNOWN'
}
