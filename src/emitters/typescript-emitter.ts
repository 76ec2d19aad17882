/**
 * TypeScript Emitter
 *
 * Zod schemas keyed by wire names (so no aliasing is needed), inferred
 * types, and a client class that calls a `Transport` and wraps coerced
 * responses with `coerceResponse` from `bmrs-codegen/runtime`.
 */

import { readFileSync } from 'fs'
import type { EnumDefinition, FieldSpec, MethodDefinition, ModelDefinition, PrimitiveType, TypeExpression } from '../core/definitions.js'
import { DATASET_WRAPPER, collectTypeNames } from '../core/definitions.js'
import { extractTypeScriptMethods } from '../generators/spec-validator.js'
import type { ExistingMethod } from '../generators/spec-validator.js'
import type { EmittedFile, Emitter, GeneratedDefinitions, TargetLanguage } from './types.js'

const ZOD_PRIMITIVES: Record<PrimitiveType, string> = {
  string: 'z.string()',
  integer: 'z.number().int()',
  number: 'z.number()',
  boolean: 'z.boolean()',
  date: 'z.string().date()',
  datetime: 'z.string().datetime({ offset: true })',
  object: 'z.record(z.string(), z.unknown())',
  any: 'z.unknown()',
}

const TS_PRIMITIVES: Record<PrimitiveType, string> = {
  string: 'string',
  integer: 'number',
  number: 'number',
  boolean: 'boolean',
  date: 'string',
  datetime: 'string',
  object: 'Record<string, unknown>',
  any: 'unknown',
}

// Locals of every generated method body
const METHOD_LOCALS = ['query', 'raw', 'path']

const RUNTIME_MODULE = 'bmrs-codegen/runtime'

function loadReservedWords(): string[] {
  const words: unknown = JSON.parse(
    readFileSync(new URL('../../data/typescript-reserved-words.json', import.meta.url), 'utf8'),
  )
  return Array.isArray(words) ? words.filter((word): word is string => typeof word === 'string') : []
}

function fileHeader(title: string): string[] {
  return [
    '/**',
    ` * ${title}`,
    ' *',
    ' * Auto-generated from OpenAPI specification',
    ' * Do not edit manually - regenerate using bmrs-codegen',
    ' */',
  ]
}

/** Single-quoted string literal */
export function tsString(value: string): string {
  const escaped = JSON.stringify(value).slice(1, -1).replace(/\\"/g, '"').replace(/'/g, "\\'")
  return `'${escaped}'`
}

/** Object key: bare when it is a valid identifier, quoted otherwise */
function propertyKey(name: string): string {
  return /^[A-Za-z_$][\w$]*$/.test(name) ? name : tsString(name)
}

/** Text safe to place inside a block comment */
function commentText(text: string): string {
  return text.replace(/\*\//g, '*\\/')
}

function requirednessComment(field: FieldSpec): string | undefined {
  if (field.requiredness === 'inferred') {
    return field.nullableOverridden ? 'inferred required (overrides nullable)' : 'inferred required'
  }
  return field.nullableOverridden ? 'required (overrides nullable)' : undefined
}

export interface TypeScriptEmitterOptions {
  /** Extra identifiers to escape in parameter names */
  reservedWords?: Iterable<string>
}

export class TypeScriptEmitter implements Emitter {
  readonly target: TargetLanguage = 'typescript'
  readonly reservedWords: ReadonlySet<string>

  constructor(options: TypeScriptEmitterOptions = {}) {
    this.reservedWords = new Set([...loadReservedWords(), ...METHOD_LOCALS, ...(options.reservedWords ?? [])])
  }

  /** TypeScript type annotation */
  renderType(type: TypeExpression): string {
    switch (type.kind) {
      case 'primitive':
        return TS_PRIMITIVES[type.name]
      case 'enum':
      case 'model':
        return type.name
      case 'list': {
        const item = this.renderType(type.item)
        return item.includes(' ') ? `Array<${item}>` : `${item}[]`
      }
      case 'optional':
        return `${this.renderType(type.inner)} | null`
      case 'wrapper':
        return `${type.wrapper}<${this.renderType(type.item)}>`
    }
  }

  /** Zod schema expression */
  renderSchema(type: TypeExpression): string {
    switch (type.kind) {
      case 'primitive':
        return ZOD_PRIMITIVES[type.name]
      case 'enum':
        return `${type.name}Schema`
      case 'model':
        // Lazy: models may reference schemas declared further down
        return `z.lazy(() => ${type.name}Schema)`
      case 'list':
        return `z.array(${this.renderSchema(type.item)})`
      case 'optional':
        return `${this.renderSchema(type.inner)}.nullable()`
      case 'wrapper':
        return `${type.wrapper}Schema(${this.renderSchema(type.item)})`
    }
  }

  emit(definitions: GeneratedDefinitions): EmittedFile[] {
    return [
      { path: 'enums.ts', kind: 'enums', content: this.emitEnums(definitions) },
      { path: 'models.ts', kind: 'models', content: this.emitModels(definitions) },
      { path: 'client.ts', kind: 'methods', content: this.emitClient(definitions) },
      { path: 'index.ts', kind: 'index', content: this.emitIndex() },
    ]
  }

  extractMethods(source: string): ExistingMethod[] {
    return extractTypeScriptMethods(source)
  }

  emitEnums(definitions: GeneratedDefinitions): string {
    const lines = [...fileHeader(`Enum types for ${definitions.info.title}`), '', "import { z } from 'zod'"]
    for (const definition of definitions.enums) {
      lines.push('', ...this.emitEnum(definition))
    }
    lines.push('')
    return lines.join('\n')
  }

  private emitEnum(definition: EnumDefinition): string[] {
    return [
      `/** Values of the ${definition.fieldName} field */`,
      `export const ${definition.name} = {`,
      ...definition.members.map((member) => `  ${propertyKey(member.name)}: ${tsString(member.value)},`),
      '} as const',
      '',
      `export const ${definition.name}Schema = z.nativeEnum(${definition.name})`,
      `export type ${definition.name} = z.infer<typeof ${definition.name}Schema>`,
    ]
  }

  emitModels(definitions: GeneratedDefinitions): string {
    const referenced = { enums: new Set<string>(), models: new Set<string>(), wrappers: new Set<string>() }
    for (const model of definitions.models) {
      for (const field of [...model.claimedFields, ...model.fields]) {
        collectTypeNames(field.type, referenced)
      }
    }

    const lines = [...fileHeader(`Models for ${definitions.info.title}`), '', "import { z } from 'zod'"]
    const enumNames = [...referenced.enums].sort()
    if (enumNames.length > 0) {
      lines.push(`import { ${enumNames.map((name) => `${name}Schema`).join(', ')} } from './enums'`)
    }

    lines.push('')
    lines.push('/** Dataset envelope: rows under `data`, anything else passed through */')
    lines.push(`export const ${DATASET_WRAPPER}Schema = <T extends z.ZodTypeAny>(item: T) =>`)
    lines.push('  z.object({ data: z.array(item) }).passthrough()')
    lines.push('')
    lines.push(`export interface ${DATASET_WRAPPER}<T> {`)
    lines.push('  data: T[]')
    lines.push('  [key: string]: unknown')
    lines.push('}')

    for (const model of definitions.models) {
      lines.push('', ...this.emitModel(model))
    }

    lines.push('')
    return lines.join('\n')
  }

  private emitModel(model: ModelDefinition): string[] {
    const lines: string[] = []
    if (model.description) {
      lines.push('/**', ` * ${commentText(model.description).split(/\r?\n/).join('\n * ')}`, ' */')
    }

    lines.push(`export const ${model.name}Schema = z`)
    lines.push('  .object({')
    for (const mixin of model.mixins) {
      const provided = model.claimedFields.filter((field) => field.providedBy === mixin.name)
      if (provided.length === 0) continue
      lines.push(`    // provided by ${mixin.name}`)
      lines.push(...provided.map((field) => this.emitField(field)))
    }
    lines.push(...model.fields.map((field) => this.emitField(field)))
    lines.push('  })')
    lines.push('  .passthrough()')
    lines.push('')
    lines.push(`export type ${model.name} = z.infer<typeof ${model.name}Schema>`)

    if (model.mixins.length > 0) {
      const names = model.mixins.map((mixin) => tsString(mixin.name)).join(', ')
      lines.push('')
      lines.push(`export const ${model.name}Mixins = [${names}] as const`)
    }
    return lines
  }

  private emitField(field: FieldSpec): string {
    let schema: string
    if (field.type.kind === 'optional') {
      const inner = this.renderSchema(field.type.inner)
      schema = field.required ? `${inner}.nullable()` : `${inner}.nullish()`
    } else {
      schema = this.renderSchema(field.type)
    }

    const comment = requirednessComment(field)
    const line = `    ${propertyKey(field.originalName)}: ${schema},`
    return comment ? `${line} // ${comment}` : line
  }

  emitClient(definitions: GeneratedDefinitions): string {
    const referenced = { enums: new Set<string>(), models: new Set<string>(), wrappers: new Set<string>() }
    for (const method of definitions.methods) {
      if (method.coerceResponse) collectTypeNames(method.responseType, referenced)
    }

    const imports = [
      ...[...referenced.models].sort().flatMap((name) => [`${name}Schema`, `type ${name}`]),
      ...[...referenced.wrappers].sort().flatMap((name) => [`${name}Schema`, `type ${name}`]),
    ]

    const lines = [...fileHeader(`API client for ${definitions.info.title}`), '']
    if (definitions.methods.some((method) => method.coerceResponse)) {
      lines.push("import { z } from 'zod'")
      lines.push(`import { coerceResponse, type CoercedResponse, type Transport } from '${RUNTIME_MODULE}'`)
    } else {
      lines.push(`import type { Transport } from '${RUNTIME_MODULE}'`)
    }
    if (imports.length > 0) {
      lines.push(`import { ${imports.join(', ')} } from './models'`)
    }

    lines.push('')
    lines.push('export class GeneratedClient {')
    lines.push('  private readonly transport: Transport')
    lines.push('')
    lines.push('  constructor(transport: Transport) {')
    lines.push('    this.transport = transport')
    lines.push('  }')

    for (const method of definitions.methods) {
      lines.push('', ...this.emitMethod(method))
    }

    lines.push('}')
    lines.push('')
    return lines.join('\n')
  }

  private emitMethod(method: MethodDefinition): string[] {
    const lines: string[] = ['  /**']
    lines.push(`   * ${commentText(method.summary ?? `${method.httpMethod} ${method.wirePath}`)}`)
    if (method.description && method.description !== method.summary) {
      lines.push('   *')
      for (const line of commentText(method.description).split(/\r?\n/)) {
        lines.push(`   * ${line}`.trimEnd())
      }
    }
    if (method.parameters.length > 0) lines.push('   *')
    for (const param of method.parameters) {
      lines.push(`   * @param ${param.name} ${commentText(param.description ?? param.wireName)}`.trimEnd())
    }
    if (method.deprecated) lines.push('   * @deprecated')
    lines.push('   */')

    const signature = method.parameters.map((param) => {
      const type = this.renderType(param.type)
      return param.required ? `${param.name}: ${type}` : `${param.name}?: ${type} | null`
    })
    const resultType = method.coerceResponse
      ? `CoercedResponse<${this.renderType(method.responseType)}>`
      : 'unknown'
    lines.push(`  async ${method.name}(${signature.join(', ')}): Promise<${resultType}> {`)

    let path = method.path.replace(/`/g, '\\`').replace(/\$\{/g, '\\${')
    for (const param of method.parameters.filter((candidate) => candidate.location === 'path')) {
      path = path.split(`{${param.name}}`).join(`\${encodeURIComponent(String(${param.name}))}`)
    }

    const query = method.parameters.filter((param) => param.location === 'query')
    lines.push('    const query: Record<string, unknown> = {}')
    for (const param of query) {
      if (param.required) {
        lines.push(`    query[${tsString(param.wireName)}] = ${param.name}`)
      } else {
        lines.push(`    if (${param.name} !== undefined && ${param.name} !== null) {`)
        lines.push(`      query[${tsString(param.wireName)}] = ${param.name}`)
        lines.push('    }')
      }
    }

    const request = `{ method: '${method.httpMethod}', path: \`${path}\`, query }`
    if (method.coerceResponse) {
      lines.push(`    const raw = await this.transport.request(${request})`)
      lines.push(`    return coerceResponse(raw, ${this.renderSchema(method.responseType)}, ${tsString(method.name)})`)
    } else {
      lines.push(`    return this.transport.request(${request})`)
    }
    lines.push('  }')
    return lines
  }

  private emitIndex(): string {
    return [
      ...fileHeader('Generated client entry point'),
      '',
      "export * from './enums'",
      "export * from './models'",
      "export * from './client'",
      '',
    ].join('\n')
  }
}
