/**
 * OpenAPI Parser
 *
 * Reads an OpenAPI 3.x (or Swagger 2) document into the read-only
 * intermediate representation used by the generators: schema nodes keyed by
 * component name, and one endpoint per path + verb in document order.
 */

import type { OpenAPIV3 } from 'openapi-types'
import { promises as fs } from 'fs'
import { resolve } from 'path'
import { SpecFormatError, errorMessage } from '../core/errors.js'
import type { CompositionKeyword, HttpVerb, SchemaNode } from '../core/definitions.js'
import { EMPTY_SCHEMA, HTTP_VERBS } from '../core/definitions.js'

export type ParameterIn = 'path' | 'query' | 'header' | 'cookie'

export interface ParsedParameter {
  name: string
  in: ParameterIn
  required: boolean
  schema: SchemaNode
  description?: string
}

export interface ParsedEndpoint {
  path: string
  method: HttpVerb
  operationId?: string
  summary?: string
  description?: string
  tags: string[]
  deprecated: boolean
  parameters: ParsedParameter[]
  /** Schema of the success response, if it declares a JSON body */
  responseSchema?: SchemaNode
}

export interface ParsedDocument {
  info: Pick<OpenAPIV3.InfoObject, 'title' | 'version' | 'description'>
  /** `openapi` or `swagger` version marker */
  specVersion: string
  /** Component schemas in document order */
  schemas: Map<string, SchemaNode>
  endpoints: ParsedEndpoint[]
  /** References that could not be followed */
  warnings: string[]
}

type JsonObject = Record<string, unknown>

const COMPOSITION_KEYWORDS: readonly CompositionKeyword[] = ['allOf', 'oneOf', 'anyOf']
const PARAMETER_LOCATIONS: readonly ParameterIn[] = ['path', 'query', 'header', 'cookie']

function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function stringOf(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

function isHttpVerb(key: string): key is HttpVerb {
  return HTTP_VERBS.some((verb) => verb === key)
}

function isParameterLocation(value: unknown): value is ParameterIn {
  return PARAMETER_LOCATIONS.some((location) => location === value)
}

export class OpenAPIParser {
  private document: JsonObject
  private warnings: string[] = []

  constructor(document: JsonObject) {
    this.document = document
  }

  parse(): ParsedDocument {
    this.warnings = []
    const info = isRecord(this.document.info) ? this.document.info : {}

    return {
      info: {
        title: stringOf(info.title) ?? 'Untitled API',
        version: stringOf(info.version) ?? '0.0.0',
        description: stringOf(info.description),
      },
      specVersion: stringOf(this.document.openapi) ?? stringOf(this.document.swagger) ?? '',
      schemas: this.parseSchemas(),
      endpoints: this.parseEndpoints(),
      warnings: this.warnings,
    }
  }

  /**
   * Convert a raw schema fragment into a SchemaNode
   */
  parseSchema(raw: unknown): SchemaNode {
    if (!isRecord(raw)) return EMPTY_SCHEMA

    const description = stringOf(raw.description)
    const ref = stringOf(raw.$ref)
    if (ref !== undefined) {
      return { kind: 'reference', ref, nullable: raw.nullable === true, required: [], description }
    }

    // OpenAPI 3.1 writes nullability into the type array
    let type: string | undefined
    let nullable = raw.nullable === true || raw['x-nullable'] === true
    if (Array.isArray(raw.type)) {
      const types = raw.type.filter((entry): entry is string => typeof entry === 'string')
      nullable = nullable || types.includes('null')
      type = types.find((entry) => entry !== 'null')
    } else {
      type = stringOf(raw.type)
    }

    const base = {
      type,
      format: stringOf(raw.format),
      nullable,
      description,
      example: raw.example,
      enum: Array.isArray(raw.enum) ? raw.enum : undefined,
    }

    const properties = isRecord(raw.properties) ? raw.properties : undefined
    const composition = COMPOSITION_KEYWORDS.find((keyword) => Array.isArray(raw[keyword]))
    if (composition && Object.keys(properties ?? {}).length === 0) {
      return { ...base, kind: 'composition', composition, required: [] }
    }

    if (type === 'array') {
      return { ...base, kind: 'array', items: this.parseSchema(raw.items), required: [] }
    }

    if (type === 'object' || properties) {
      const parsedProperties: Record<string, SchemaNode> = {}
      for (const [name, property] of Object.entries(properties ?? {})) {
        parsedProperties[name] = this.parseSchema(property)
      }
      const required = Array.isArray(raw.required)
        ? raw.required.filter((entry): entry is string => typeof entry === 'string')
        : []
      return { ...base, kind: 'object', properties: parsedProperties, required }
    }

    return { ...base, kind: 'primitive', required: [] }
  }

  private parseSchemas(): Map<string, SchemaNode> {
    const components = isRecord(this.document.components) ? this.document.components : {}
    const source = isRecord(components.schemas)
      ? components.schemas
      : isRecord(this.document.definitions)
        ? this.document.definitions
        : {}

    const schemas = new Map<string, SchemaNode>()
    for (const [name, schema] of Object.entries(source)) {
      schemas.set(name, this.parseSchema(schema))
    }
    return schemas
  }

  private parseEndpoints(): ParsedEndpoint[] {
    const endpoints: ParsedEndpoint[] = []
    const paths = isRecord(this.document.paths) ? this.document.paths : {}

    for (const [path, pathItem] of Object.entries(paths)) {
      if (!isRecord(pathItem)) continue
      const sharedParameters = this.parseParameters(pathItem.parameters)

      // Verbs in the path item's own key order
      for (const [key, operation] of Object.entries(pathItem)) {
        if (!isHttpVerb(key) || !isRecord(operation)) continue

        endpoints.push({
          path,
          method: key,
          operationId: stringOf(operation.operationId),
          summary: stringOf(operation.summary),
          description: stringOf(operation.description),
          tags: Array.isArray(operation.tags)
            ? operation.tags.filter((tag): tag is string => typeof tag === 'string')
            : [],
          deprecated: operation.deprecated === true,
          parameters: mergeParameters(sharedParameters, this.parseParameters(operation.parameters)),
          responseSchema: this.parseSuccessResponse(operation.responses, `${key.toUpperCase()} ${path}`),
        })
      }
    }

    return endpoints
  }

  private parseParameters(raw: unknown): ParsedParameter[] {
    if (!Array.isArray(raw)) return []

    const parameters: ParsedParameter[] = []
    for (const entry of raw) {
      const param = this.resolveRef(entry)
      if (!isRecord(param)) continue

      const name = stringOf(param.name)
      const location = param.in
      if (name === undefined || !isParameterLocation(location)) continue

      parameters.push({
        name,
        in: location,
        required: location === 'path' || param.required === true,
        // Swagger 2 declares the type on the parameter itself
        schema: this.parseSchema(param.schema ?? param),
        description: stringOf(param.description),
      })
    }
    return parameters
  }

  private parseSuccessResponse(raw: unknown, subject: string): SchemaNode | undefined {
    if (!isRecord(raw)) return undefined

    const status = '200' in raw ? '200' : Object.keys(raw).find((code) => /^2\d\d$/.test(code))
    if (status === undefined) return undefined

    const response = this.resolveRef(raw[status])
    if (!isRecord(response)) {
      this.warnings.push(`${subject}: response ${status} could not be resolved`)
      return undefined
    }

    if ('schema' in response) return this.parseSchema(response.schema)
    if (!isRecord(response.content)) return undefined

    const content = response.content
    const mediaType =
      'application/json' in content
        ? 'application/json'
        : Object.keys(content).find((type) => type.includes('json'))
    const media = mediaType === undefined ? undefined : content[mediaType]
    return isRecord(media) && 'schema' in media ? this.parseSchema(media.schema) : undefined
  }

  /**
   * Follow a local `$ref` (JSON pointer). Returns undefined when it cannot be followed.
   */
  private resolveRef(item: unknown): unknown {
    if (!isRecord(item) || typeof item.$ref !== 'string') return item

    const ref = item.$ref
    if (!ref.startsWith('#/')) {
      this.warnings.push(`Could not resolve reference: ${ref}`)
      return undefined
    }

    let current: unknown = this.document
    for (const segment of ref.slice(2).split('/')) {
      const key = segment.replace(/~1/g, '/').replace(/~0/g, '~')
      if (!isRecord(current) || !(key in current)) {
        this.warnings.push(`Could not resolve reference: ${ref}`)
        return undefined
      }
      current = current[key]
    }
    return current
  }
}

/** Operation-level parameters replace path-level ones with the same name and location */
function mergeParameters(shared: ParsedParameter[], own: ParsedParameter[]): ParsedParameter[] {
  const overridden = (param: ParsedParameter) =>
    own.some((candidate) => candidate.name === param.name && candidate.in === param.in)
  return [...shared.filter((param) => !overridden(param)), ...own]
}

/**
 * Accept a document or a single-element array wrapping one.
 * Anything that is not recognizably OpenAPI raises SpecFormatError.
 */
export function unwrapSpecDocument(value: unknown): JsonObject {
  let candidate = value
  if (Array.isArray(value)) {
    if (value.length !== 1) {
      throw new SpecFormatError(
        `Expected a single OpenAPI document, got an array of ${value.length} elements`,
      )
    }
    candidate = value[0]
  }

  if (!isRecord(candidate)) {
    throw new SpecFormatError('OpenAPI document must be a JSON object')
  }
  if (typeof candidate.openapi !== 'string' && typeof candidate.swagger !== 'string') {
    throw new SpecFormatError('Not an OpenAPI document: missing "openapi" or "swagger" version')
  }
  return candidate
}

export function parseSpecDocument(value: unknown): ParsedDocument {
  const parser = new OpenAPIParser(unwrapSpecDocument(value))
  return parser.parse()
}

/**
 * Load a document from a URL, a JSON string, or a file path
 */
export async function loadSpecSource(source: string): Promise<unknown> {
  if (source.startsWith('http://') || source.startsWith('https://')) {
    let response: Response
    try {
      response = await fetch(source)
    } catch (error) {
      throw new SpecFormatError(`Failed to fetch OpenAPI document from ${source}: ${errorMessage(error)}`, {
        cause: error,
      })
    }
    if (!response.ok) {
      throw new SpecFormatError(`Failed to load OpenAPI document from ${source}: ${response.status} ${response.statusText}`)
    }
    return response.json()
  }

  const trimmed = source.trimStart()
  if (trimmed.startsWith('{') || trimmed.startsWith('[')) {
    try {
      return JSON.parse(source)
    } catch (error) {
      throw new SpecFormatError(`Inline OpenAPI document is not valid JSON: ${errorMessage(error)}`, { cause: error })
    }
  }

  let content: string
  try {
    content = await fs.readFile(resolve(source), 'utf8')
  } catch (error) {
    throw new SpecFormatError(
      `Failed to load OpenAPI document: not a URL, JSON string, or readable file (${errorMessage(error)})`,
      { cause: error },
    )
  }
  try {
    return JSON.parse(content)
  } catch (error) {
    throw new SpecFormatError(`${source} is not valid JSON: ${errorMessage(error)}`, { cause: error })
  }
}
