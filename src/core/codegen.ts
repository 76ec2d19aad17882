/**
 * Codegen pipeline
 *
 * parse → enums → models → methods → emit, entirely in memory. A run either
 * returns every file or throws; callers write nothing until it returns.
 */

import { requiredFieldSet, type GeneratorConfig } from '../config/generator-config.js'
import { PythonEmitter } from '../emitters/python-emitter.js'
import { TypeScriptEmitter } from '../emitters/typescript-emitter.js'
import type { EmittedFile, Emitter, GeneratedDefinitions, TargetLanguage } from '../emitters/types.js'
import { enumOverrides, generateEnums } from '../generators/enum-generator.js'
import { generateMethods } from '../generators/method-generator.js'
import { MixinClassifier } from '../generators/mixin-classifier.js'
import { generateModels } from '../generators/model-generator.js'
import { parseSpecDocument, type ParsedDocument } from '../generators/parser.js'
import { RequirednessInferrer } from '../generators/requiredness.js'
import { diff, type ValidationResult } from '../generators/spec-validator.js'
import { TypeResolver } from '../generators/type-resolver.js'
import { GenerationContext } from './context.js'

export function createEmitter(target: TargetLanguage, config: GeneratorConfig): Emitter {
  switch (target) {
    case 'python':
      return new PythonEmitter({ reservedWords: config.reservedWords })
    case 'typescript':
      return new TypeScriptEmitter({ reservedWords: config.reservedWords })
  }
}

export interface CodegenOptions {
  config: GeneratorConfig
  emitter: Emitter
  /** Reused across runs if given; reset at the start of each */
  context?: GenerationContext
}

export interface CodegenResult {
  document: ParsedDocument
  definitions: GeneratedDefinitions
  files: EmittedFile[]
}

/**
 * Build the language-neutral definitions for a parsed document
 */
export function buildDefinitions(
  document: ParsedDocument,
  options: Pick<CodegenOptions, 'config' | 'context'> & { parameterReservedWords: ReadonlySet<string> },
): GeneratedDefinitions {
  const { config } = options
  const context = options.context ?? new GenerationContext()
  context.reset()

  const enums = generateEnums(config.enums, { context })
  const resolver = new TypeResolver({ context, enumOverrides: enumOverrides(enums) })

  const models = generateModels(document.schemas, {
    context,
    resolver,
    requiredness: new RequirednessInferrer(requiredFieldSet(config)),
    classifier: new MixinClassifier(config.mixins),
    reservedWords: new Set(config.reservedWords),
  })

  const methods = generateMethods(document.endpoints, {
    context,
    resolver,
    reservedWords: options.parameterReservedWords,
    // Method names are the same for every target
    methodReservedWords: new Set(config.reservedWords),
    pathPrefixes: config.pathPrefixes,
  })

  return {
    info: {
      title: document.info.title,
      version: document.info.version,
      description: document.info.description,
    },
    enums,
    models,
    methods,
    notes: [...context.notes],
  }
}

/**
 * Run the whole pipeline on a loaded (not yet parsed) document
 */
export function runCodegen(source: unknown, options: CodegenOptions): CodegenResult {
  const document = parseSpecDocument(source)
  const definitions = buildDefinitions(document, {
    config: options.config,
    context: options.context,
    parameterReservedWords: options.emitter.reservedWords,
  })
  return { document, definitions, files: options.emitter.emit(definitions) }
}

/**
 * Compare a hand-written client with the document and a fresh generation run
 */
export function validateClient(source: unknown, existingSource: string, options: CodegenOptions): ValidationResult {
  const { document, definitions } = runCodegen(source, options)
  return diff(
    document.endpoints,
    options.emitter.extractMethods(existingSource),
    definitions.methods.map((method) => method.name),
    { pathPrefixes: options.config.pathPrefixes },
  )
}
