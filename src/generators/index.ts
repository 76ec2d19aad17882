/**
 * bmrs-codegen Generators
 *
 * Language-neutral stages: document parsing, naming, type resolution,
 * requiredness, mixins, and the model, method and enum generators
 */

// Parser
export {
  OpenAPIParser,
  loadSpecSource,
  parseSpecDocument,
  unwrapSpecDocument,
  type ParameterIn,
  type ParsedDocument,
  type ParsedEndpoint,
  type ParsedParameter,
} from './parser.js'

// Naming utilities
export {
  enumClassName,
  escapeParameterName,
  fallbackMethodName,
  sanitizeIdentifier,
  toEnumMemberName,
  toFieldName,
  toMethodName,
  toSnakeCase,
  toTypeName,
  wrapperSuffix,
} from './naming.js'

// Type resolution
export { TypeResolver, schemaNameFromRef, type TypeResolverOptions } from './type-resolver.js'

// Requiredness
export {
  FieldPresenceSampler,
  RequirednessInferrer,
  auditAllowList,
  type AllowListAudit,
  type FieldPresenceSamplerOptions,
  type RequirednessDecision,
} from './requiredness.js'

// Mixins
export { MixinClassifier, type MixinClassification } from './mixin-classifier.js'

// Models, methods, enums
export { ModelGenerator, generateModels, type ModelGeneratorOptions } from './model-generator.js'
export { MethodGenerator, generateMethods, type MethodGeneratorOptions } from './method-generator.js'
export { EnumGenerator, enumOverrides, generateEnums, type EnumGeneratorOptions } from './enum-generator.js'

// Validation
export {
  diff,
  endpointPatterns,
  extractPythonMethods,
  extractTypeScriptMethods,
  formatReport,
  type ExistingMethod,
  type MissingEndpoint,
  type SpecValidatorOptions,
  type ValidationResult,
} from './spec-validator.js'
