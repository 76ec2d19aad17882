/**
 * Enum Generator
 *
 * Static value sets for classification fields. The same table drives the
 * TypeResolver's field-name overrides, so both always agree on class names.
 */

import type { GenerationContext } from '../core/context.js'
import type { EnumDefinition, EnumMember } from '../core/definitions.js'
import { enumClassName, toEnumMemberName } from './naming.js'

export interface EnumGeneratorOptions {
  context: GenerationContext
}

export class EnumGenerator {
  private context: GenerationContext

  constructor(options: EnumGeneratorOptions) {
    this.context = options.context
  }

  /**
   * One definition per field, in sorted field-name order. Class names are
   * claimed in the run's type namespace before any model is named.
   */
  generate(table: Readonly<Record<string, readonly string[]>>): EnumDefinition[] {
    return Object.keys(table)
      .sort()
      .map((fieldName) => {
        const baseName = enumClassName(fieldName)
        const name = this.context.claimTypeName(baseName)
        if (name !== baseName) {
          this.context.note('name-collision', fieldName, `enum name ${baseName} already taken; using ${name}`)
        }
        return { name, fieldName, members: buildMembers(table[fieldName] ?? []) }
      })
  }
}

function buildMembers(values: readonly string[]): EnumMember[] {
  const used = new Set<string>()
  const members: EnumMember[] = []

  for (const value of [...new Set(values)].sort()) {
    let name = toEnumMemberName(value)
    if (used.has(name)) {
      let counter = 2
      while (used.has(`${name}_${counter}`)) counter += 1
      name = `${name}_${counter}`
    }
    used.add(name)
    members.push({ name, value })
  }

  return members
}

/** Field name → enum class name, for the TypeResolver */
export function enumOverrides(definitions: readonly EnumDefinition[]): Map<string, string> {
  return new Map(definitions.map((definition) => [definition.fieldName, definition.name]))
}

export function generateEnums(
  table: Readonly<Record<string, readonly string[]>>,
  options: EnumGeneratorOptions,
): EnumDefinition[] {
  const generator = new EnumGenerator(options)
  return generator.generate(table)
}
