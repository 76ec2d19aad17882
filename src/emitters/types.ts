/**
 * Emitter contract
 *
 * An emitter turns the language-neutral definitions into source files for
 * one target language. Generators never produce source text themselves.
 */

import type { GenerationNote } from '../core/context.js'
import type {
  EnumDefinition,
  MethodDefinition,
  ModelDefinition,
  TypeExpression,
} from '../core/definitions.js'
import type { ExistingMethod } from '../generators/spec-validator.js'

export type TargetLanguage = 'python' | 'typescript'

export const TARGET_LANGUAGES: readonly TargetLanguage[] = ['python', 'typescript']

export function isTargetLanguage(value: string | undefined): value is TargetLanguage {
  return TARGET_LANGUAGES.some((target) => target === value)
}

export interface GeneratedDefinitions {
  info: { title: string; version: string; description?: string }
  enums: EnumDefinition[]
  models: ModelDefinition[]
  methods: MethodDefinition[]
  notes: readonly GenerationNote[]
}

export interface EmittedFile {
  /** Path relative to the output directory */
  path: string
  content: string
  kind: 'enums' | 'models' | 'methods' | 'index'
}

export interface Emitter {
  readonly target: TargetLanguage
  /** Identifiers that cannot be used as parameter names in this language */
  readonly reservedWords: ReadonlySet<string>
  renderType(type: TypeExpression): string
  emit(definitions: GeneratedDefinitions): EmittedFile[]
  /** Public method names (with documentation state) found in hand-written source */
  extractMethods(source: string): ExistingMethod[]
}
