/**
 * Mixin Classifier
 *
 * Detects reusable field groups from a model's property names.
 *
 * 1. Multi-field groups, in declaration order: all key fields present → claim them
 * 2. Single-field groups, in declaration order: field present and unclaimed → claim it
 * 3. Behavioral rules: attach helpers, claim nothing
 *
 * The returned order is the composition order of the emitted model.
 */

import type { AppliedMixin } from '../core/definitions.js'
import type { MixinTables } from '../config/generator-config.js'

export interface MixinClassification {
  mixins: AppliedMixin[]
  /** Field name → structural mixin that owns it */
  claimed: Map<string, string>
}

export class MixinClassifier {
  private tables: MixinTables

  constructor(tables: MixinTables) {
    this.tables = tables
  }

  classify(fieldNames: Iterable<string>): MixinClassification {
    const present = new Set(fieldNames)
    const mixins: AppliedMixin[] = []
    const claimed = new Map<string, string>()

    for (const group of this.tables.multiField) {
      // A field already owned by an earlier group blocks the whole group
      if (!group.fields.every((field) => present.has(field) && !claimed.has(field))) continue
      mixins.push({ name: group.name, kind: 'structural', fields: [...group.fields] })
      for (const field of group.fields) claimed.set(field, group.name)
    }

    for (const group of this.tables.singleField) {
      if (!present.has(group.field) || claimed.has(group.field)) continue
      mixins.push({ name: group.name, kind: 'structural', fields: [group.field] })
      claimed.set(group.field, group.name)
    }

    for (const rule of this.tables.behavioral) {
      let fields: string[]
      if (rule.all) {
        fields = rule.all.every((field) => present.has(field)) ? [...rule.all] : []
      } else {
        fields = (rule.any ?? []).filter((field) => present.has(field))
      }
      if (rule.unclaimedOnly) {
        fields = fields.filter((field) => !claimed.has(field))
      }
      if (fields.length > 0) {
        mixins.push({ name: rule.name, kind: 'behavioral', fields })
      }
    }

    return { mixins, claimed }
  }
}
