/**
 * Code Generation Definitions
 *
 * The intermediate representation shared by every generator and emitter.
 * Generators produce these definitions; emitters turn them into source text.
 * Nothing in here knows about a target language.
 */

// =============================================================================
// SCHEMA NODES
// Read-only view of an OpenAPI schema fragment, built once per run by the parser
// =============================================================================

export type SchemaKind = 'reference' | 'array' | 'object' | 'primitive' | 'composition'

export type CompositionKeyword = 'allOf' | 'oneOf' | 'anyOf'

export interface SchemaNode {
  readonly kind: SchemaKind
  /** Declared OpenAPI type, if any (first non-null entry for 3.1 type arrays) */
  readonly type?: string
  readonly format?: string
  readonly ref?: string
  readonly nullable: boolean
  /** Declared `required` list of an object schema */
  readonly required: readonly string[]
  /** Property map in document order */
  readonly properties?: Readonly<Record<string, SchemaNode>>
  readonly items?: SchemaNode
  readonly enum?: readonly unknown[]
  readonly composition?: CompositionKeyword
  readonly description?: string
  readonly example?: unknown
}

/** A schema that says nothing: no type, no constraints */
export const EMPTY_SCHEMA: SchemaNode = { kind: 'primitive', nullable: false, required: [] }

// =============================================================================
// TYPE EXPRESSIONS
// =============================================================================

/**
 * Language-neutral primitive types.
 * `object` is the generic string-keyed map, `any` the untyped fallback.
 */
export type PrimitiveType =
  | 'string'
  | 'integer'
  | 'number'
  | 'boolean'
  | 'date'
  | 'datetime'
  | 'object'
  | 'any'

export type TypeExpression =
  | { readonly kind: 'primitive'; readonly name: PrimitiveType }
  | { readonly kind: 'enum'; readonly name: string }
  | { readonly kind: 'model'; readonly name: string }
  | { readonly kind: 'list'; readonly item: TypeExpression }
  | { readonly kind: 'optional'; readonly inner: TypeExpression }
  | { readonly kind: 'wrapper'; readonly wrapper: 'DatasetResponse'; readonly item: TypeExpression }

/** Name of the generic dataset envelope every back end provides */
export const DATASET_WRAPPER = 'DatasetResponse'

// =============================================================================
// MODELS
// =============================================================================

/**
 * Where a field's requiredness came from.
 * - declared: listed in the schema's `required` array
 * - inferred: only the curated allow-list says so
 * - optional: neither
 */
export type RequirednessSource = 'declared' | 'inferred' | 'optional'

export interface FieldSpec {
  /** Name as it appears on the wire (API casing) */
  originalName: string
  /** Sanitized target-casing name */
  name: string
  type: TypeExpression
  required: boolean
  requiredness: RequirednessSource
  /** The allow-list forced a `nullable: true` node to non-nullable */
  nullableOverridden: boolean
  /** Set to the original name whenever `name` differs from it */
  alias?: string
  /** Structural mixin supplying this field, if claimed */
  providedBy?: string
  description?: string
  example?: unknown
}

export type MixinKind = 'structural' | 'behavioral'

export interface AppliedMixin {
  name: string
  kind: MixinKind
  /** Fields claimed (structural) or referenced (behavioral), original casing */
  fields: string[]
}

export interface ModelDefinition {
  /** Final class name after collision resolution */
  name: string
  /** Key of the schema in the document */
  schemaName: string
  /** Inheritance/composition order */
  mixins: AppliedMixin[]
  /** Fields supplied by structural mixins, flattened into the record */
  claimedFields: FieldSpec[]
  /** Fields not claimed by any mixin, in property order */
  fields: FieldSpec[]
  description?: string
}

// =============================================================================
// METHODS
// =============================================================================

export type HttpVerb = 'get' | 'post' | 'put' | 'patch' | 'delete' | 'head' | 'options'

export const HTTP_VERBS: readonly HttpVerb[] = ['get', 'post', 'put', 'patch', 'delete', 'head', 'options']

export type ParameterLocation = 'path' | 'query'

export interface ParameterDefinition {
  /** Identifier used in the signature and body (escaped if reserved) */
  name: string
  /** Key sent on the wire */
  wireName: string
  location: ParameterLocation
  type: TypeExpression
  required: boolean
  description?: string
}

export interface MethodDefinition {
  name: string
  httpMethod: Uppercase<HttpVerb>
  /** URL template using the escaped parameter names */
  path: string
  /** URL template exactly as it appears in the document */
  wirePath: string
  /** Path parameters first, then required query, then optional query */
  parameters: ParameterDefinition[]
  responseType: TypeExpression
  /** False when the response type is the generic fallback */
  coerceResponse: boolean
  operationId?: string
  summary?: string
  description?: string
  deprecated?: boolean
}

// =============================================================================
// ENUMS
// =============================================================================

export interface EnumMember {
  name: string
  value: string
}

export interface EnumDefinition {
  name: string
  fieldName: string
  members: EnumMember[]
}

// =============================================================================
// HELPERS
// =============================================================================

export function primitive(name: PrimitiveType): TypeExpression {
  return { kind: 'primitive', name }
}

export function listOf(item: TypeExpression): TypeExpression {
  return { kind: 'list', item }
}

/** Wrap in optional unless it already is */
export function optionalOf(inner: TypeExpression): TypeExpression {
  return inner.kind === 'optional' ? inner : { kind: 'optional', inner }
}

/** The generic map type used when nothing more specific can be resolved */
export const FALLBACK_TYPE: TypeExpression = primitive('object')

export function isFallbackType(type: TypeExpression): boolean {
  return type.kind === 'primitive' && type.name === 'object'
}

/**
 * Collect the named enum and model types an expression refers to
 */
export function collectTypeNames(
  type: TypeExpression,
  into: { enums: Set<string>; models: Set<string>; wrappers: Set<string> },
): void {
  switch (type.kind) {
    case 'enum':
      into.enums.add(type.name)
      return
    case 'model':
      into.models.add(type.name)
      return
    case 'list':
      collectTypeNames(type.item, into)
      return
    case 'optional':
      collectTypeNames(type.inner, into)
      return
    case 'wrapper':
      into.wrappers.add(type.wrapper)
      collectTypeNames(type.item, into)
      return
    case 'primitive':
      return
  }
}
