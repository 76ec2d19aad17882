/**
 * Spec Validator
 *
 * Compares a hand-written client against the document and the generated
 * methods. Matching is heuristic: an endpoint counts as covered when some
 * existing method name contains one of its literal path segments, or
 * `<verb>_<segment>`. Method naming is not invertible, so exact matching
 * would report almost everything as missing.
 *
 * Informational only. Nothing here throws on a clean or empty diff.
 */

import type { HttpVerb } from '../core/definitions.js'
import type { ParsedEndpoint } from './parser.js'

export interface ExistingMethod {
  name: string
  /** Has a docstring / doc comment */
  documented: boolean
}

export interface MissingEndpoint {
  /** operationId, or `<verb>_<path>` when there is none */
  key: string
  path: string
  method: HttpVerb
  summary: string
}

export interface ValidationResult {
  endpointCount: number
  existingMethodCount: number
  generatedMethodCount: number
  missing: MissingEndpoint[]
  methodsOnlyInExisting: string[]
  methodsOnlyInGenerated: string[]
  undocumented: string[]
}

export interface SpecValidatorOptions {
  /** Path segments that carry no meaning for matching */
  pathPrefixes?: readonly string[]
}

/**
 * Name patterns that would indicate a method covers the endpoint
 */
export function endpointPatterns(endpoint: Pick<ParsedEndpoint, 'path' | 'method'>, prefixes: readonly string[]): string[] {
  const ignored = new Set(prefixes.map((prefix) => prefix.toLowerCase()))
  const parts = endpoint.path
    .split('/')
    .filter((part) => part && !part.startsWith('{'))
    .filter((part) => !ignored.has(part.toLowerCase()))
  return [...parts.map((part) => `${endpoint.method}_${part}`), ...parts].map((pattern) => pattern.toLowerCase())
}

export function diff(
  endpoints: readonly ParsedEndpoint[],
  existingMethods: readonly ExistingMethod[],
  generatedMethodNames: readonly string[],
  options: SpecValidatorOptions = {},
): ValidationResult {
  const prefixes = options.pathPrefixes ?? []
  const existing = existingMethods.filter((method) => !method.name.startsWith('_'))
  const existingNames = existing.map((method) => method.name.toLowerCase())

  const missing: MissingEndpoint[] = []
  for (const endpoint of endpoints) {
    const patterns = endpointPatterns(endpoint, prefixes)
    const covered = existingNames.some((name) => patterns.some((pattern) => name.includes(pattern)))
    if (!covered) {
      missing.push({
        key: endpoint.operationId ?? `${endpoint.method}_${endpoint.path}`,
        path: endpoint.path,
        method: endpoint.method,
        summary: endpoint.summary ?? '',
      })
    }
  }

  const existingSet = new Set(existing.map((method) => method.name))
  const generatedSet = new Set(generatedMethodNames.filter((name) => !name.startsWith('_')))

  return {
    endpointCount: endpoints.length,
    existingMethodCount: existingSet.size,
    generatedMethodCount: generatedSet.size,
    missing,
    methodsOnlyInExisting: [...existingSet].filter((name) => !generatedSet.has(name)).sort(),
    methodsOnlyInGenerated: [...generatedSet].filter((name) => !existingSet.has(name)).sort(),
    undocumented: existing.filter((method) => !method.documented).map((method) => method.name),
  }
}

const RULE = '='.repeat(70)
const DIVIDER = '-'.repeat(70)

function previewList(lines: string[], items: readonly string[], limit: number): void {
  for (const item of items.slice(0, limit)) {
    lines.push(item)
  }
  if (items.length > limit) {
    lines.push(`  ... and ${items.length - limit} more`)
  }
}

/**
 * Render the plain-text validation report
 */
export function formatReport(result: ValidationResult, previewLimit = 10): string {
  const lines: string[] = []

  lines.push(RULE)
  lines.push('BMRS Client Validation Report')
  lines.push(RULE)
  lines.push('')
  lines.push('Summary:')
  lines.push(`  - Spec endpoints: ${result.endpointCount}`)
  lines.push(`  - Client methods: ${result.existingMethodCount}`)
  lines.push(`  - Generated methods: ${result.generatedMethodCount}`)
  lines.push('')

  if (result.missing.length > 0) {
    lines.push(`Missing Endpoints (${result.missing.length}):`)
    lines.push(DIVIDER)
    for (const endpoint of result.missing.slice(0, previewLimit)) {
      lines.push(`  ✗ ${endpoint.method.toUpperCase().padEnd(6)} ${endpoint.path}`)
      lines.push(`    Summary: ${endpoint.summary}`)
      lines.push(`    Operation ID: ${endpoint.key}`)
      lines.push('')
    }
    if (result.missing.length > previewLimit) {
      lines.push(`  ... and ${result.missing.length - previewLimit} more`)
      lines.push('')
    }
  } else {
    lines.push('✓ No missing endpoints detected')
    lines.push('')
  }

  if (result.undocumented.length > 0) {
    lines.push(`Methods Without Docstrings (${result.undocumented.length}):`)
    lines.push(DIVIDER)
    previewList(lines, result.undocumented.map((name) => `  ⚠ ${name}`), previewLimit)
    lines.push('')
  } else {
    lines.push('✓ All methods have docstrings')
    lines.push('')
  }

  if (result.methodsOnlyInExisting.length > 0) {
    lines.push(`Only In Existing Client (${result.methodsOnlyInExisting.length}):`)
    lines.push(DIVIDER)
    previewList(lines, result.methodsOnlyInExisting.map((name) => `  - ${name}`), previewLimit)
    lines.push('')
  }

  if (result.methodsOnlyInGenerated.length > 0) {
    lines.push(`Only In Generated Client (${result.methodsOnlyInGenerated.length}):`)
    lines.push(DIVIDER)
    previewList(lines, result.methodsOnlyInGenerated.map((name) => `  + ${name}`), previewLimit)
    lines.push('')
  }

  lines.push(RULE)
  return lines.join('\n')
}

// =============================================================================
// METHOD EXTRACTION
// =============================================================================

const PYTHON_DEF = /^\s*(?:async\s+)?def\s+([A-Za-z_]\w*)\s*\(/
const DOCSTRING_START = /^[rRbBuU]?("""|''')/
const SIGNATURE_END = /:\s*$/

/** Drop a trailing `#` comment. A `#` inside a string literal is not told apart. */
function stripComment(line: string): string {
  const hash = line.indexOf('#')
  return hash < 0 ? line : line.slice(0, hash)
}

/**
 * Functions and methods defined in Python source, with docstring detection
 */
export function extractPythonMethods(source: string): ExistingMethod[] {
  const lines = source.split(/\r?\n/)
  const methods: ExistingMethod[] = []

  for (let index = 0; index < lines.length; index++) {
    const match = PYTHON_DEF.exec(lines[index] ?? '')
    if (!match?.[1]) continue

    // The signature ends at the first line whose code, comment removed, ends in ':'
    let end = index
    while (end < lines.length && !SIGNATURE_END.test(stripComment(lines[end] ?? ''))) end++

    let body = end + 1
    while (body < lines.length && (lines[body] ?? '').trim() === '') body++

    methods.push({
      name: match[1],
      documented: DOCSTRING_START.test((lines[body] ?? '').trim()),
    })
  }

  return methods
}

const TS_FUNCTION = /^\s*export\s+(?:default\s+)?(?:async\s+)?function\s*\*?\s*([A-Za-z_$][\w$]*)/
const TS_METHOD =
  /^\s+(?:(?:public|protected|static|async|override|readonly)\s+)*(?:get\s+|set\s+)?([A-Za-z_$][\w$]*)\s*(?:<[^>]*>)?\s*\([^;]*$/
const NOT_METHODS = new Set(['if', 'for', 'while', 'switch', 'catch', 'return', 'function', 'constructor', 'super'])

/**
 * Exported functions and class methods in TypeScript source. `private` and
 * `#` members are ignored. A doc comment directly above counts as documentation.
 */
export function extractTypeScriptMethods(source: string): ExistingMethod[] {
  const lines = source.split(/\r?\n/)
  const methods: ExistingMethod[] = []
  const seen = new Set<string>()

  for (let index = 0; index < lines.length; index++) {
    const line = lines[index] ?? ''
    if (/^\s*private\s/.test(line)) continue

    const match = TS_FUNCTION.exec(line) ?? TS_METHOD.exec(line)
    const name = match?.[1]
    if (!name || NOT_METHODS.has(name) || seen.has(name)) continue
    // Calls inside bodies look like methods; declarations end in `{` or continue a signature
    if (!/\{\s*$|\(\s*$|,\s*$/.test(line)) continue

    let previous = index - 1
    while (previous >= 0 && (lines[previous] ?? '').trim() === '') previous--

    seen.add(name)
    methods.push({ name, documented: (lines[previous] ?? '').trim().endsWith('*/') })
  }

  return methods
}
