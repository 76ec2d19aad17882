/**
 * TypeResolver Tests
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { GenerationContext } from '../../src/core/context.js'
import type { SchemaNode } from '../../src/core/definitions.js'
import { TypeResolver, schemaNameFromRef } from '../../src/generators/type-resolver.js'

function node(partial: Partial<SchemaNode>): SchemaNode {
  return { kind: 'primitive', nullable: false, required: [], ...partial }
}

describe('TypeResolver', () => {
  let context: GenerationContext
  let resolver: TypeResolver

  beforeEach(() => {
    context = new GenerationContext()
    context.registerSchema('Widget', 'Widget')
    resolver = new TypeResolver({ context, enumOverrides: new Map([['psrType', 'PsrtypeEnum']]) })
  })

  it('maps primitives, letting the format win over the type', () => {
    expect(resolver.resolve(node({ type: 'string' }), true)).toEqual({ kind: 'primitive', name: 'string' })
    expect(resolver.resolve(node({ type: 'string', format: 'date-time' }), true)).toEqual({
      kind: 'primitive',
      name: 'datetime',
    })
    expect(resolver.resolve(node({ type: 'string', format: 'date' }), true)).toEqual({ kind: 'primitive', name: 'date' })
    expect(resolver.resolve(node({ type: 'number', format: 'int64' }), true)).toEqual({
      kind: 'primitive',
      name: 'integer',
    })
    expect(resolver.resolve(node({ type: 'boolean' }), true)).toEqual({ kind: 'primitive', name: 'boolean' })
  })

  it('falls back to any for unknown or missing types', () => {
    expect(resolver.resolve(node({ type: 'file' }), true)).toEqual({ kind: 'primitive', name: 'any' })
    expect(resolver.resolve(node({}), true)).toEqual({ kind: 'primitive', name: 'any' })
    expect(resolver.resolve(node({ kind: 'composition', composition: 'oneOf' }), true)).toEqual({
      kind: 'primitive',
      name: 'any',
    })
  })

  it('wraps optional and nullable fields exactly once', () => {
    const optional = resolver.resolve(node({ type: 'integer' }), false)
    expect(optional).toEqual({ kind: 'optional', inner: { kind: 'primitive', name: 'integer' } })

    const nullable = resolver.resolve(node({ type: 'integer', nullable: true }), true)
    expect(nullable).toEqual(optional)

    const both = resolver.resolve(node({ type: 'integer', nullable: true }), false)
    expect(both).toEqual(optional)
  })

  it('resolves references through the context', () => {
    const ref = node({ kind: 'reference', ref: '#/components/schemas/Widget' })
    expect(resolver.resolve(ref, true)).toEqual({ kind: 'model', name: 'Widget' })
    expect(resolver.resolve(ref, false)).toEqual({ kind: 'optional', inner: { kind: 'model', name: 'Widget' } })
  })

  it('uses the collision-resolved class name of a reference', () => {
    context.registerSchema('Legacy.Widget', 'Widget_2')
    const ref = node({ kind: 'reference', ref: '#/components/schemas/Legacy.Widget' })
    expect(resolver.resolve(ref, true)).toEqual({ kind: 'model', name: 'Widget_2' })
  })

  it('falls back to the generic map for unknown references and notes them once', () => {
    const ref = node({ kind: 'reference', ref: '#/components/schemas/Gone' })
    expect(resolver.resolve(ref, true)).toEqual({ kind: 'primitive', name: 'object' })
    resolver.resolve(ref, true)

    expect(context.notes).toEqual([
      {
        kind: 'unresolved-reference',
        subject: 'Gone',
        message: '#/components/schemas/Gone has no generated model; using a generic map instead',
      },
    ])
  })

  it('resolves array items as required', () => {
    const array = node({ kind: 'array', type: 'array', items: node({ type: 'string', nullable: true }) })
    expect(resolver.resolve(array, true)).toEqual({
      kind: 'list',
      item: { kind: 'optional', inner: { kind: 'primitive', name: 'string' } },
    })

    const refs = node({ kind: 'array', type: 'array', items: node({ kind: 'reference', ref: '#/x/Widget' }) })
    expect(resolver.resolve(refs, false)).toEqual({
      kind: 'optional',
      inner: { kind: 'list', item: { kind: 'model', name: 'Widget' } },
    })
  })

  it('applies enum overrides by field name before anything else', () => {
    expect(resolver.resolve(node({ type: 'integer' }), true, 'psrType')).toEqual({ kind: 'enum', name: 'PsrtypeEnum' })
    expect(resolver.resolve(node({ type: 'string' }), false, 'psrType')).toEqual({
      kind: 'optional',
      inner: { kind: 'enum', name: 'PsrtypeEnum' },
    })
    expect(resolver.resolve(node({ type: 'string' }), true, 'other')).toEqual({ kind: 'primitive', name: 'string' })
  })

  it('keeps an enum override optional when the node is nullable, even if required', () => {
    expect(resolver.resolve(node({ type: 'string', nullable: true }), true, 'psrType')).toEqual({
      kind: 'optional',
      inner: { kind: 'enum', name: 'PsrtypeEnum' },
    })
    expect(resolver.resolve(node({ nullable: true }), false, 'psrType')).toEqual({
      kind: 'optional',
      inner: { kind: 'enum', name: 'PsrtypeEnum' },
    })
  })

  it('resolves a node without a type to any', () => {
    expect(resolver.resolve(node({}), true)).toEqual({ kind: 'primitive', name: 'any' })
    expect(resolver.resolve(node({}), false)).toEqual({ kind: 'optional', inner: { kind: 'primitive', name: 'any' } })
  })

  it('maps parameter types, defaulting to string', () => {
    expect(resolver.parameterType(node({ type: 'integer', format: 'int32' }))).toEqual({
      kind: 'primitive',
      name: 'integer',
    })
    expect(resolver.parameterType(node({ type: 'string', format: 'date-time' }))).toEqual({
      kind: 'primitive',
      name: 'string',
    })
    expect(resolver.parameterType(node({}))).toEqual({ kind: 'primitive', name: 'string' })
    expect(resolver.parameterType(node({ kind: 'array', items: node({ type: 'number' }) }))).toEqual({
      kind: 'list',
      item: { kind: 'primitive', name: 'number' },
    })
  })

  it('takes the last segment of a reference', () => {
    expect(schemaNameFromRef('#/components/schemas/Insights.Api.Row')).toBe('Insights.Api.Row')
  })
})
