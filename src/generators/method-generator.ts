/**
 * Method Generator
 *
 * One MethodDefinition per path + verb, in document order. Names come from
 * the operationId, or from the verb and path when there is none. The first
 * endpoint to produce a name keeps it; later ones are skipped with a note.
 */

import type { GenerationContext } from '../core/context.js'
import type {
  HttpVerb,
  MethodDefinition,
  ParameterDefinition,
  SchemaNode,
  TypeExpression,
} from '../core/definitions.js'
import { DATASET_WRAPPER, EMPTY_SCHEMA, FALLBACK_TYPE, isFallbackType, listOf } from '../core/definitions.js'
import { escapeParameterName, fallbackMethodName, toMethodName } from './naming.js'
import type { ParsedEndpoint, ParsedParameter } from './parser.js'
import type { TypeResolver } from './type-resolver.js'

const UPPERCASE_VERBS: Record<HttpVerb, Uppercase<HttpVerb>> = {
  get: 'GET',
  post: 'POST',
  put: 'PUT',
  patch: 'PATCH',
  delete: 'DELETE',
  head: 'HEAD',
  options: 'OPTIONS',
}

const PLACEHOLDER = /\{([^}]+)\}/g

export interface MethodGeneratorOptions {
  context: GenerationContext
  resolver: TypeResolver
  /** Identifiers escaped in parameter names */
  reservedWords: ReadonlySet<string>
  /** Identifiers escaped in method names; defaults to `reservedWords` */
  methodReservedWords?: ReadonlySet<string>
  /** Path segments ignored when synthesizing names */
  pathPrefixes: readonly string[]
}

export class MethodGenerator {
  private options: MethodGeneratorOptions

  constructor(options: MethodGeneratorOptions) {
    this.options = options
  }

  generate(endpoints: readonly ParsedEndpoint[]): MethodDefinition[] {
    const { context } = this.options
    const methods: MethodDefinition[] = []

    for (const endpoint of endpoints) {
      const name = this.methodName(endpoint)
      if (!context.claimMethodName(name)) {
        context.note(
          'duplicate-method',
          name,
          `${UPPERCASE_VERBS[endpoint.method]} ${endpoint.path} also maps to ${name}; skipped`,
        )
        continue
      }
      methods.push(this.generateMethod(name, endpoint))
    }

    return methods
  }

  /** Escaped before claiming, so `import` and a later `import_` collide */
  methodName(endpoint: ParsedEndpoint): string {
    const reserved = this.options.methodReservedWords ?? this.options.reservedWords
    return endpoint.operationId
      ? toMethodName(endpoint.operationId, reserved)
      : fallbackMethodName(endpoint.path, endpoint.method, this.options.pathPrefixes, reserved)
  }

  private generateMethod(name: string, endpoint: ParsedEndpoint): MethodDefinition {
    const parameters = this.buildParameters(endpoint)

    let path = endpoint.path
    for (const param of parameters) {
      if (param.location === 'path' && param.name !== param.wireName) {
        path = path.split(`{${param.wireName}}`).join(`{${param.name}}`)
      }
    }

    const responseType = this.resolveResponseType(endpoint.responseSchema)

    return {
      name,
      httpMethod: UPPERCASE_VERBS[endpoint.method],
      path,
      wirePath: endpoint.path,
      parameters,
      responseType,
      coerceResponse: !isFallbackType(responseType),
      operationId: endpoint.operationId,
      summary: endpoint.summary,
      description: endpoint.description,
      deprecated: endpoint.deprecated || undefined,
    }
  }

  /**
   * Path parameters in template order, then required query, then optional query
   */
  private buildParameters(endpoint: ParsedEndpoint): ParameterDefinition[] {
    const declaredPath = endpoint.parameters.filter((param) => param.in === 'path')
    const placeholders = [...endpoint.path.matchAll(PLACEHOLDER)].map((match) => match[1] ?? '')

    const pathParams: ParsedParameter[] = placeholders.map(
      (placeholder): ParsedParameter =>
        declaredPath.find((param) => param.name === placeholder) ?? {
          name: placeholder,
          in: 'path',
          required: true,
          schema: EMPTY_SCHEMA,
        },
    )
    for (const param of declaredPath) {
      if (!placeholders.includes(param.name)) pathParams.push(param)
    }

    const query = endpoint.parameters.filter((param) => param.in === 'query')
    const ordered = [
      ...pathParams,
      ...query.filter((param) => param.required),
      ...query.filter((param) => !param.required),
    ]

    const usedNames = new Set<string>()
    return ordered.map((param): ParameterDefinition => {
      let name = escapeParameterName(param.name, this.options.reservedWords)
      if (usedNames.has(name)) {
        let counter = 2
        while (usedNames.has(`${name}_${counter}`)) counter += 1
        name = `${name}_${counter}`
      }
      usedNames.add(name)

      return {
        name,
        wireName: param.name,
        location: param.in === 'path' ? 'path' : 'query',
        type: this.options.resolver.parameterType(param.schema),
        required: param.in === 'path' || param.required,
        description: param.description,
      }
    })
  }

  /**
   * `$ref` → model, array of `$ref` → list, `{ data: [$ref] }` → dataset envelope,
   * anything else → generic map
   */
  resolveResponseType(schema: SchemaNode | undefined): TypeExpression {
    if (!schema) return FALLBACK_TYPE
    const { resolver, context } = this.options

    if (schema.kind === 'reference' && schema.ref !== undefined) {
      return resolver.referenceType(schema.ref)
    }

    if (schema.kind === 'array' && schema.items?.kind === 'reference' && schema.items.ref !== undefined) {
      const item = resolver.referenceType(schema.items.ref)
      return isFallbackType(item) ? FALLBACK_TYPE : listOf(item)
    }

    const data = schema.kind === 'object' ? schema.properties?.data : undefined
    if (data?.kind === 'array' && data.items?.kind === 'reference' && data.items.ref !== undefined) {
      const item = resolver.referenceType(data.items.ref)
      if (item.kind !== 'model') return FALLBACK_TYPE

      const envelopeName = `${item.name}_${DATASET_WRAPPER}`
      if (context.hasTypeName(envelopeName)) {
        return { kind: 'model', name: envelopeName }
      }
      return { kind: 'wrapper', wrapper: DATASET_WRAPPER, item }
    }

    return FALLBACK_TYPE
  }
}

export function generateMethods(
  endpoints: readonly ParsedEndpoint[],
  options: MethodGeneratorOptions,
): MethodDefinition[] {
  const generator = new MethodGenerator(options)
  return generator.generate(endpoints)
}
