/**
 * Shared test fixtures
 */

import { readFileSync } from 'fs'
import { fileURLToPath } from 'url'
import { loadDefaultConfig, requiredFieldSet, type GeneratorConfig } from '../../src/config/generator-config.js'
import { GenerationContext } from '../../src/core/context.js'
import { enumOverrides, generateEnums } from '../../src/generators/enum-generator.js'
import { MixinClassifier } from '../../src/generators/mixin-classifier.js'
import { ModelGenerator } from '../../src/generators/model-generator.js'
import { parseSpecDocument, type ParsedDocument } from '../../src/generators/parser.js'
import { RequirednessInferrer } from '../../src/generators/requiredness.js'
import { TypeResolver } from '../../src/generators/type-resolver.js'

export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url))
}

export function loadFixture(name = 'bmrs-sample.json'): unknown {
  return JSON.parse(readFileSync(fixturePath(name), 'utf-8'))
}

export function parseFixture(name?: string): ParsedDocument {
  return parseSpecDocument(loadFixture(name))
}

export interface TestPipeline {
  context: GenerationContext
  resolver: TypeResolver
  models: ModelGenerator
}

/** Context, resolver and model generator wired the way a run wires them */
export function createPipeline(config: GeneratorConfig = loadDefaultConfig()): TestPipeline {
  const context = new GenerationContext()
  const enums = generateEnums(config.enums, { context })
  const resolver = new TypeResolver({ context, enumOverrides: enumOverrides(enums) })
  const models = new ModelGenerator({
    context,
    resolver,
    requiredness: new RequirednessInferrer(requiredFieldSet(config)),
    classifier: new MixinClassifier(config.mixins),
    reservedWords: new Set(config.reservedWords),
  })
  return { context, resolver, models }
}
