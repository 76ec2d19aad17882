/**
 * GenerationContext
 *
 * Run-scoped mutable state: emitted type and method names, the schema to
 * class-name table, and the notes collected along the way. One context per
 * run; call reset() before reusing it.
 */

export type GenerationNoteKind =
  | 'schema-composition-unsupported'
  | 'name-collision'
  | 'duplicate-method'
  | 'unresolved-reference'
  | 'required-override'

export interface GenerationNote {
  kind: GenerationNoteKind
  /** Schema, field or method the note is about */
  subject: string
  message: string
}

export class GenerationContext {
  private typeNames = new Set<string>()
  private collisionCounts = new Map<string, number>()
  private schemaTypeNames = new Map<string, string>()
  private methodNames = new Set<string>()
  private collectedNotes: GenerationNote[] = []

  reset(): void {
    this.typeNames.clear()
    this.collisionCounts.clear()
    this.schemaTypeNames.clear()
    this.methodNames.clear()
    this.collectedNotes = []
  }

  /**
   * Claim a type name. The first claimant keeps the bare name; later ones get
   * `_2`, `_3`, ... in first-seen order.
   */
  claimTypeName(baseName: string): string {
    if (!this.typeNames.has(baseName)) {
      this.typeNames.add(baseName)
      return baseName
    }

    let counter = this.collisionCounts.get(baseName) ?? 1
    let candidate: string
    do {
      counter += 1
      candidate = `${baseName}_${counter}`
    } while (this.typeNames.has(candidate))

    this.collisionCounts.set(baseName, counter)
    this.typeNames.add(candidate)
    return candidate
  }

  /** Reserve a name up front so no schema can take it */
  reserveTypeName(name: string): void {
    this.typeNames.add(name)
  }

  hasTypeName(name: string): boolean {
    return this.typeNames.has(name)
  }

  registerSchema(schemaName: string, typeName: string): void {
    this.schemaTypeNames.set(schemaName, typeName)
  }

  /** Final class name of a schema, if one was generated */
  typeNameFor(schemaName: string): string | undefined {
    return this.schemaTypeNames.get(schemaName)
  }

  /** Returns false if the name was already emitted in this run */
  claimMethodName(name: string): boolean {
    if (this.methodNames.has(name)) return false
    this.methodNames.add(name)
    return true
  }

  note(kind: GenerationNoteKind, subject: string, message: string): void {
    this.collectedNotes.push({ kind, subject, message })
  }

  get notes(): readonly GenerationNote[] {
    return this.collectedNotes
  }
}
