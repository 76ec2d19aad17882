/**
 * Codegen pipeline Tests
 */

import { describe, it, expect } from 'vitest'
import { loadDefaultConfig, resolveConfig } from '../../src/config/generator-config.js'
import { createEmitter, runCodegen, validateClient } from '../../src/core/codegen.js'
import { GenerationContext } from '../../src/core/context.js'
import { SpecFormatError } from '../../src/core/errors.js'
import { PythonEmitter } from '../../src/emitters/python-emitter.js'
import { TypeScriptEmitter } from '../../src/emitters/typescript-emitter.js'
import { loadFixture } from '../support/fixtures.js'

const config = loadDefaultConfig()

describe('createEmitter', () => {
  it('builds the emitter for each target', () => {
    expect(createEmitter('python', config)).toBeInstanceOf(PythonEmitter)
    expect(createEmitter('typescript', config)).toBeInstanceOf(TypeScriptEmitter)
  })
})

describe('runCodegen', () => {
  it('builds the same models and methods for both targets', () => {
    const python = runCodegen(loadFixture(), { config, emitter: createEmitter('python', config) })
    const typescript = runCodegen(loadFixture(), { config, emitter: createEmitter('typescript', config) })

    expect(typescript.definitions.models).toEqual(python.definitions.models)
    expect(typescript.definitions.methods.map((method) => method.name)).toEqual(
      python.definitions.methods.map((method) => method.name),
    )
    expect(python.files.map((file) => file.path)).toEqual(['enums.py', 'models.py', 'methods.py', '__init__.py'])
    expect(typescript.files.map((file) => file.path)).toEqual(['enums.ts', 'models.ts', 'client.ts', 'index.ts'])
  })

  it('carries the document info and every recorded note', () => {
    const { definitions } = runCodegen(loadFixture(), { config, emitter: createEmitter('python', config) })

    expect(definitions.info).toEqual({ title: 'Insights.Api', version: 'v1', description: 'Sample balancing data API' })
    expect(new Set(definitions.notes.map((note) => note.kind))).toEqual(
      new Set(['schema-composition-unsupported', 'name-collision', 'required-override', 'duplicate-method']),
    )
  })

  it('creates one enum per configured field', () => {
    const { definitions } = runCodegen(loadFixture(), { config, emitter: createEmitter('python', config) })
    expect(definitions.enums).toHaveLength(Object.keys(config.enums).length)
  })

  it('produces identical output when a context is reused', () => {
    const context = new GenerationContext()
    const emitter = createEmitter('typescript', config)

    const first = runCodegen(loadFixture(), { config, emitter, context })
    const second = runCodegen(loadFixture(), { config, emitter, context })

    expect(second.files).toEqual(first.files)
    expect(second.definitions.notes).toEqual(first.definitions.notes)
  })

  it('follows configuration overrides', () => {
    const custom = resolveConfig({ enums: { fuelType: ['CCGT'] }, requiredFields: { core: [] } })
    const { definitions } = runCodegen(loadFixture(), { config: custom, emitter: createEmitter('python', custom) })
    const systemPrice = definitions.models.find((model) => model.name === 'SystemPrice_2')

    expect(definitions.enums.map((definition) => definition.name)).toEqual(['FueltypeEnum'])
    expect(systemPrice?.fields.find((field) => field.originalName === 'price')?.required).toBe(false)
  })

  it('fails as a whole on a malformed document', () => {
    expect(() => runCodegen([], { config, emitter: createEmitter('python', config) })).toThrow(SpecFormatError)
  })
})

describe('validateClient', () => {
  it('diffs a hand-written client against the generated methods', () => {
    const existing = [
      'export class Client {',
      '  /** ABUC rows */',
      '  async get_datasets_abuc(from: string) {',
      '    return null',
      '  }',
      '',
      '  async legacy_prices(date: string) {',
      '    return null',
      '  }',
      '}',
    ].join('\n')

    const result = validateClient(loadFixture(), existing, { config, emitter: createEmitter('typescript', config) })

    expect(result.endpointCount).toBe(5)
    expect(result.existingMethodCount).toBe(2)
    expect(result.generatedMethodCount).toBe(4)
    expect(result.missing.map((endpoint) => endpoint.key)).toEqual(['getSystemPrices', 'get-reference-abuc-rows'])
    expect(result.methodsOnlyInExisting).toEqual(['legacy_prices'])
    expect(result.methodsOnlyInGenerated).toEqual(['get_datasets_abuc_stream', 'get_reference_abuc_rows', 'get_system_prices'])
    expect(result.undocumented).toEqual(['legacy_prices'])
  })
})
