/**
 * Model Generator
 *
 * One ModelDefinition per component schema, in sorted schema-name order.
 *
 * Pass 1 assigns every class name up front so `$ref`s anywhere in the
 * document resolve to the collision-resolved name. Pass 2 classifies mixins
 * and builds fields.
 *
 * Pure compositions (allOf/oneOf/anyOf without own properties) are skipped
 * and recorded as notes.
 */

import type { GenerationContext } from '../core/context.js'
import type { FieldSpec, ModelDefinition, SchemaNode } from '../core/definitions.js'
import { DATASET_WRAPPER } from '../core/definitions.js'
import type { MixinClassifier } from './mixin-classifier.js'
import { toFieldName, toTypeName } from './naming.js'
import type { RequirednessInferrer } from './requiredness.js'
import type { TypeResolver } from './type-resolver.js'

export interface ModelGeneratorOptions {
  context: GenerationContext
  resolver: TypeResolver
  requiredness: RequirednessInferrer
  classifier: MixinClassifier
  reservedWords: ReadonlySet<string>
}

export class ModelGenerator {
  private options: ModelGeneratorOptions

  constructor(options: ModelGeneratorOptions) {
    this.options = options
  }

  generate(schemas: ReadonlyMap<string, SchemaNode>): ModelDefinition[] {
    const { context } = this.options
    const named: Array<[schemaName: string, typeName: string, node: SchemaNode]> = []

    // The generic envelope owns this name in every back end
    context.reserveTypeName(DATASET_WRAPPER)

    for (const schemaName of [...schemas.keys()].sort()) {
      const node = schemas.get(schemaName)
      if (!node) continue

      if (node.kind === 'composition') {
        context.note(
          'schema-composition-unsupported',
          schemaName,
          `${node.composition ?? 'composition'} without own properties is not supported; schema skipped`,
        )
        continue
      }

      const baseName = toTypeName(schemaName, schemaName)
      const typeName = context.claimTypeName(baseName)
      if (typeName !== baseName) {
        context.note('name-collision', schemaName, `class name ${baseName} already taken; using ${typeName}`)
      }
      context.registerSchema(schemaName, typeName)
      named.push([schemaName, typeName, node])
    }

    return named.map(([schemaName, typeName, node]) => this.generateModel(schemaName, typeName, node))
  }

  private generateModel(schemaName: string, typeName: string, node: SchemaNode): ModelDefinition {
    const properties = Object.entries(node.properties ?? {})
    const declared = new Set(node.required)
    const { mixins, claimed } = this.options.classifier.classify(properties.map(([name]) => name))

    const usedNames = new Set<string>()
    const claimedFields: FieldSpec[] = []
    const fields: FieldSpec[] = []

    for (const [propertyName, propertyNode] of properties) {
      const field = this.buildField(typeName, propertyName, propertyNode, declared, usedNames)
      const owner = claimed.get(propertyName)
      if (owner !== undefined) {
        claimedFields.push({ ...field, providedBy: owner })
      } else {
        fields.push(field)
      }
    }

    return {
      name: typeName,
      schemaName,
      mixins,
      claimedFields,
      fields,
      description: node.description,
    }
  }

  private buildField(
    typeName: string,
    originalName: string,
    node: SchemaNode,
    declared: ReadonlySet<string>,
    usedNames: Set<string>,
  ): FieldSpec {
    const { context, resolver, requiredness, reservedWords } = this.options

    let name = toFieldName(originalName, reservedWords)
    if (usedNames.has(name)) {
      let counter = 2
      while (usedNames.has(`${name}_${counter}`)) counter += 1
      const renamed = `${name}_${counter}`
      context.note('name-collision', `${typeName}.${originalName}`, `field name ${name} already used; using ${renamed}`)
      name = renamed
    }
    usedNames.add(name)

    const decision = requiredness.infer(originalName, node, declared)
    if (decision.nullableOverridden) {
      context.note(
        'required-override',
        `${typeName}.${originalName}`,
        'declared nullable but always populated by the API; emitted as required',
      )
    }

    return {
      originalName,
      name,
      type: resolver.resolve(decision.node, decision.required, originalName),
      required: decision.required,
      requiredness: decision.source,
      nullableOverridden: decision.nullableOverridden,
      alias: name !== originalName ? originalName : undefined,
      description: node.description,
      example: node.example,
    }
  }
}

export function generateModels(
  schemas: ReadonlyMap<string, SchemaNode>,
  options: ModelGeneratorOptions,
): ModelDefinition[] {
  const generator = new ModelGenerator(options)
  return generator.generate(schemas)
}
