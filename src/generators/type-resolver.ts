/**
 * Type Resolver
 *
 * Maps schema nodes to language-neutral type expressions. Rules apply in
 * priority order: enum override by field name, `$ref`, array, nullable or
 * optional primitive, plain primitive.
 */

import type { GenerationContext } from '../core/context.js'
import type { PrimitiveType, SchemaNode, TypeExpression } from '../core/definitions.js'
import { EMPTY_SCHEMA, FALLBACK_TYPE, listOf, optionalOf, primitive } from '../core/definitions.js'

// Format wins over the declared type
const FORMAT_TYPES = new Map<string, PrimitiveType>([
  ['date', 'date'],
  ['date-time', 'datetime'],
  ['int32', 'integer'],
  ['int64', 'integer'],
  ['float', 'number'],
  ['double', 'number'],
])

const SCHEMA_TYPES = new Map<string, PrimitiveType>([
  ['string', 'string'],
  ['integer', 'integer'],
  ['number', 'number'],
  ['boolean', 'boolean'],
  ['object', 'object'],
])

export interface TypeResolverOptions {
  context: GenerationContext
  /** Field name → enum class name */
  enumOverrides?: ReadonlyMap<string, string>
}

export class TypeResolver {
  private context: GenerationContext
  private enumOverrides: ReadonlyMap<string, string>
  private reportedRefs = new Set<string>()

  constructor(options: TypeResolverOptions) {
    this.context = options.context
    this.enumOverrides = options.enumOverrides ?? new Map()
  }

  /**
   * Resolve the type of a field or response schema
   */
  resolve(node: SchemaNode, required: boolean, fieldName?: string): TypeExpression {
    const enumName = fieldName === undefined ? undefined : this.enumOverrides.get(fieldName)

    let type: TypeExpression
    if (enumName !== undefined) {
      type = { kind: 'enum', name: enumName }
      if (node.nullable) return optionalOf(type)
    } else if (node.kind === 'reference' && node.ref !== undefined) {
      type = this.referenceType(node.ref)
    } else if (node.kind === 'array') {
      // Elements are never individually optional
      type = listOf(this.resolve(node.items ?? EMPTY_SCHEMA, true, fieldName))
    } else if (node.nullable || !required) {
      return optionalOf(this.baseType(node))
    } else {
      type = this.baseType(node)
    }

    return required ? type : optionalOf(type)
  }

  /**
   * Primitive mapping. Unknown type/format combinations become `any`.
   */
  baseType(node: SchemaNode): TypeExpression {
    if (node.kind === 'composition') return primitive('any')

    const byFormat = node.format === undefined ? undefined : FORMAT_TYPES.get(node.format)
    if (byFormat) return primitive(byFormat)

    const byType = node.type === undefined ? undefined : SCHEMA_TYPES.get(node.type)
    return primitive(byType ?? 'any')
  }

  /**
   * Type of a `$ref` through the run's schema → class-name table.
   * Skipped or unknown schemas fall back to the generic map type.
   */
  referenceType(ref: string): TypeExpression {
    const schemaName = schemaNameFromRef(ref)
    const typeName = this.context.typeNameFor(schemaName)
    if (typeName !== undefined) {
      return { kind: 'model', name: typeName }
    }

    if (!this.reportedRefs.has(ref)) {
      this.reportedRefs.add(ref)
      this.context.note(
        'unresolved-reference',
        schemaName,
        `${ref} has no generated model; using a generic map instead`,
      )
    }
    return FALLBACK_TYPE
  }

  /**
   * Request parameters pass through to the query string, so formats are ignored.
   * A missing or unknown type is treated as a string.
   */
  parameterType(node: SchemaNode): TypeExpression {
    if (node.kind === 'array') {
      return listOf(this.parameterType(node.items ?? EMPTY_SCHEMA))
    }
    const mapped = node.type === undefined ? undefined : SCHEMA_TYPES.get(node.type)
    return primitive(mapped ?? 'string')
  }
}

/** `#/components/schemas/Widget` → `Widget` */
export function schemaNameFromRef(ref: string): string {
  const segments = ref.split('/')
  return segments[segments.length - 1] ?? ref
}
