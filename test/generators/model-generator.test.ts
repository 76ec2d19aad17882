/**
 * ModelGenerator Tests
 */

import { describe, it, expect } from 'vitest'
import type { ModelDefinition, SchemaNode } from '../../src/core/definitions.js'
import { parseSpecDocument } from '../../src/generators/parser.js'
import { createPipeline, parseFixture } from '../support/fixtures.js'

function generateFixtureModels() {
  const pipeline = createPipeline()
  const models = pipeline.models.generate(parseFixture().schemas)
  return { ...pipeline, models }
}

function findModel(models: ModelDefinition[], name: string): ModelDefinition {
  const model = models.find((candidate) => candidate.name === name)
  if (!model) throw new Error(`No model named ${name}`)
  return model
}

function object(properties: Record<string, SchemaNode>, required: string[] = []): SchemaNode {
  return { kind: 'object', type: 'object', nullable: false, required, properties }
}

const integer: SchemaNode = { kind: 'primitive', type: 'integer', nullable: false, required: [] }

describe('ModelGenerator', () => {
  it('emits one model per non-composition schema in sorted schema order', () => {
    const { models } = generateFixtureModels()

    expect(models.map((model) => [model.schemaName, model.name])).toEqual([
      ['Insights.Api.Models.DatasetRows.AbucDatasetRow', 'AbucDatasetRow'],
      [
        'Insights.Api.Models.Responses.DatasetResponse-1_Insights.Api.Models.DatasetRows.AbucDatasetRow',
        'AbucDatasetRow_DatasetResponse',
      ],
      ['Legacy.SystemPrice', 'SystemPrice'],
      ['SystemPrice', 'SystemPrice_2'],
    ])
  })

  it('records skipped compositions and name collisions as notes', () => {
    const { context } = generateFixtureModels()

    expect(context.notes.filter((note) => note.kind !== 'required-override')).toEqual([
      {
        kind: 'schema-composition-unsupported',
        subject: 'PriceOrVolume',
        message: 'oneOf without own properties is not supported; schema skipped',
      },
      {
        kind: 'name-collision',
        subject: 'SystemPrice',
        message: 'class name SystemPrice already taken; using SystemPrice_2',
      },
    ])
  })

  it('skips a composition whose properties object is empty', () => {
    const { models, context } = createPipeline()
    const schemas = parseSpecDocument({
      openapi: '3.0.1',
      info: { title: 'Compositions', version: '1.0' },
      components: {
        schemas: {
          Extended: { type: 'object', allOf: [{ $ref: '#/components/schemas/Plain' }], properties: {} },
          Plain: { type: 'object', properties: { id: { type: 'integer' } } },
        },
      },
    }).schemas

    expect(models.generate(schemas).map((model) => model.name)).toEqual(['Plain'])
    expect(context.notes.filter((note) => note.kind === 'schema-composition-unsupported')).toEqual([
      {
        kind: 'schema-composition-unsupported',
        subject: 'Extended',
        message: 'allOf without own properties is not supported; schema skipped',
      },
    ])
  })

  it('keeps every property as either a claimed or an own field', () => {
    const { models } = generateFixtureModels()
    const schemas = parseFixture().schemas

    for (const model of models) {
      const names = [...model.claimedFields, ...model.fields].map((field) => field.originalName).sort()
      expect(names).toEqual(Object.keys(schemas.get(model.schemaName)?.properties ?? {}).sort())
    }
  })

  it('splits settlement and time-range fields into mixins and keeps price as an own field', () => {
    const model = findModel(generateFixtureModels().models, 'SystemPrice_2')

    expect(model.mixins.map((mixin) => mixin.name)).toEqual(['SettlementFields', 'TimeRangeFields', 'PriceMixin'])
    expect(model.claimedFields.map((field) => [field.originalName, field.providedBy])).toEqual([
      ['settlementDate', 'SettlementFields'],
      ['settlementPeriod', 'SettlementFields'],
      ['startTime', 'TimeRangeFields'],
      ['endTime', 'TimeRangeFields'],
    ])
    expect(model.fields.map((field) => field.originalName)).toEqual(['price', 'netImbalanceVolume'])
    expect(model.description).toBe('System buy and sell price for one settlement period')
  })

  it('forces allow-listed nullable fields to required', () => {
    const { models, context } = generateFixtureModels()
    const price = findModel(models, 'SystemPrice_2').fields[0]

    expect(price).toMatchObject({
      name: 'price',
      type: { kind: 'primitive', name: 'number' },
      required: true,
      requiredness: 'inferred',
      nullableOverridden: true,
    })
    expect(price.alias).toBeUndefined()
    expect(context.notes).toContainEqual({
      kind: 'required-override',
      subject: 'SystemPrice_2.price',
      message: 'declared nullable but always populated by the API; emitted as required',
    })
  })

  it('keeps nullable fields that are not allow-listed optional', () => {
    const volume = findModel(generateFixtureModels().models, 'SystemPrice_2').fields[1]

    expect(volume).toMatchObject({
      name: 'net_imbalance_volume',
      alias: 'netImbalanceVolume',
      type: { kind: 'optional', inner: { kind: 'primitive', name: 'number' } },
      required: false,
      requiredness: 'optional',
    })
  })

  it('records declared requiredness and aliases for renamed fields', () => {
    const model = findModel(generateFixtureModels().models, 'SystemPrice_2')
    const [settlementDate, settlementPeriod] = model.claimedFields

    expect(settlementDate).toMatchObject({
      name: 'settlement_date',
      alias: 'settlementDate',
      type: { kind: 'primitive', name: 'date' },
      requiredness: 'declared',
    })
    expect(settlementPeriod).toMatchObject({ required: true, requiredness: 'inferred' })
  })

  it('applies enum overrides and keeps examples and descriptions', () => {
    const model = findModel(generateFixtureModels().models, 'AbucDatasetRow')

    expect(model.claimedFields[0]).toMatchObject({
      originalName: 'dataset',
      type: { kind: 'enum', name: 'DatasetEnum' },
      example: 'ABUC',
      providedBy: 'DatasetFields',
    })
    expect(model.fields[0]).toMatchObject({
      name: 'psr_type',
      type: { kind: 'enum', name: 'PsrtypeEnum' },
      nullableOverridden: true,
    })
    expect(model.fields[1]).toMatchObject({
      name: 'field_10m_wind_speed',
      alias: '10mWindSpeed',
      description: 'Wind speed at 10 m',
    })
  })

  it('resolves references to other models', () => {
    const envelope = findModel(generateFixtureModels().models, 'AbucDatasetRow_DatasetResponse')

    expect(envelope.fields[0].type).toEqual({
      kind: 'optional',
      inner: { kind: 'list', item: { kind: 'model', name: 'AbucDatasetRow' } },
    })
  })

  it('gives the bare name to the first schema in sorted order', () => {
    const { models } = createPipeline()
    const result = models.generate(
      new Map([
        ['b.Widget', object({ id: integer })],
        ['a.Widget', object({ id: integer })],
        ['c.Widget', object({ id: integer })],
      ]),
    )

    expect(result.map((model) => [model.schemaName, model.name])).toEqual([
      ['a.Widget', 'Widget'],
      ['b.Widget', 'Widget_2'],
      ['c.Widget', 'Widget_3'],
    ])
  })

  it('never hands out the dataset envelope name', () => {
    const { models } = createPipeline()
    const [model] = models.generate(new Map([['DatasetResponse', object({ id: integer })]]))
    expect(model.name).toBe('DatasetResponse_2')
  })

  it('deduplicates field names that sanitize to the same identifier', () => {
    const { models, context } = createPipeline()
    const [model] = models.generate(new Map([['Row', object({ windSpeed: integer, wind_speed: integer })]]))

    expect(model.fields.map((field) => [field.name, field.alias])).toEqual([
      ['wind_speed', 'windSpeed'],
      ['wind_speed_2', 'wind_speed'],
    ])
    expect(context.notes).toContainEqual({
      kind: 'name-collision',
      subject: 'Row.wind_speed',
      message: 'field name wind_speed already used; using wind_speed_2',
    })
  })

  it('escapes reserved field names and aliases them', () => {
    const { models } = createPipeline()
    const [model] = models.generate(new Map([['Window', object({ from: integer, to: integer })]]))

    expect(model.fields.map((field) => [field.name, field.alias])).toEqual([
      ['from_', 'from'],
      ['to_', 'to'],
    ])
  })

  it('produces the same output for the same input after a reset', () => {
    const { models, context } = createPipeline()
    const schemas = parseFixture().schemas

    const first = models.generate(schemas)
    context.reset()
    const second = models.generate(schemas)

    expect(second).toEqual(first)
  })
})
