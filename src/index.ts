/**
 * bmrs-codegen
 *
 * Generate typed BMRS API clients from OpenAPI specifications
 */

// Re-export generators
export * from './generators/index.js'

// Pipeline
export {
  buildDefinitions,
  createEmitter,
  runCodegen,
  validateClient,
  type CodegenOptions,
  type CodegenResult,
} from './core/codegen.js'
export { GenerationContext, type GenerationNote, type GenerationNoteKind } from './core/context.js'
export * from './core/definitions.js'
export { CodegenError, ConfigError, ResponseCoercionError, SpecFormatError } from './core/errors.js'
export { createLogger, type Logger, type LogLevel } from './core/logger.js'

// Configuration
export {
  loadDefaultConfig,
  loadGeneratorConfig,
  requiredFieldSet,
  resolveConfig,
  type GeneratorConfig,
  type MixinTables,
} from './config/generator-config.js'

// Emitters
export { PythonEmitter } from './emitters/python-emitter.js'
export { TypeScriptEmitter } from './emitters/typescript-emitter.js'
export { TARGET_LANGUAGES, isTargetLanguage, type EmittedFile, type Emitter, type GeneratedDefinitions, type TargetLanguage } from './emitters/types.js'
