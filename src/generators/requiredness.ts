/**
 * Requiredness Inference
 *
 * A field is required when the schema declares it, or when it is on the
 * curated allow-list of fields the API always populates. The allow-list
 * also overrides `nullable: true`; emitters annotate every such field.
 *
 * The sampler below checks the allow-list against recorded responses. It
 * reports; it never edits the list.
 */

import type { RequirednessSource, SchemaNode } from '../core/definitions.js'

export interface RequirednessDecision {
  required: boolean
  source: RequirednessSource
  /** The node to resolve: a copy with `nullable: false` when overridden */
  node: SchemaNode
  nullableOverridden: boolean
}

export class RequirednessInferrer {
  private allowList: ReadonlySet<string>

  constructor(allowList: Iterable<string>) {
    this.allowList = new Set(allowList)
  }

  isRequired(fieldName: string, declaredRequired: ReadonlySet<string>): boolean {
    return declaredRequired.has(fieldName) || this.allowList.has(fieldName)
  }

  infer(fieldName: string, node: SchemaNode, declaredRequired: ReadonlySet<string>): RequirednessDecision {
    const allowListed = this.allowList.has(fieldName)
    const source: RequirednessSource = declaredRequired.has(fieldName)
      ? 'declared'
      : allowListed
        ? 'inferred'
        : 'optional'

    if (allowListed && node.nullable) {
      return { required: true, source, node: { ...node, nullable: false }, nullableOverridden: true }
    }
    return { required: source !== 'optional', source, node, nullableOverridden: false }
  }
}

// =============================================================================
// FIELD PRESENCE SAMPLING
// =============================================================================

export interface FieldPresenceSamplerOptions {
  /** Share of sampled rows a field must be non-null in (default 0.9) */
  threshold?: number
  /** Endpoints a field must be required in to count as common (default 3) */
  minEndpoints?: number
  /** Rows sampled per response (default 10) */
  rowsPerResponse?: number
}

interface EndpointSamples {
  rows: number
  present: Map<string, number>
  seen: Set<string>
}

function isRow(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export class FieldPresenceSampler {
  readonly threshold: number
  readonly minEndpoints: number
  readonly rowsPerResponse: number
  private samples = new Map<string, EndpointSamples>()

  constructor(options: FieldPresenceSamplerOptions = {}) {
    this.threshold = options.threshold ?? 0.9
    this.minEndpoints = options.minEndpoints ?? 3
    this.rowsPerResponse = options.rowsPerResponse ?? 10
  }

  /**
   * Record one response body: a `{ data: [...] }` envelope or a bare array.
   * Returns the number of rows sampled (0 for an unrecognized shape).
   */
  record(endpoint: string, response: unknown): number {
    const rows = Array.isArray(response)
      ? response
      : isRow(response) && Array.isArray(response.data)
        ? response.data
        : undefined
    if (!rows) return 0

    let entry = this.samples.get(endpoint)
    if (!entry) {
      entry = { rows: 0, present: new Map(), seen: new Set() }
      this.samples.set(endpoint, entry)
    }

    let sampled = 0
    for (const row of rows.slice(0, this.rowsPerResponse)) {
      if (!isRow(row)) continue
      sampled += 1
      entry.rows += 1
      for (const [field, value] of Object.entries(row)) {
        entry.seen.add(field)
        if (value !== null && value !== undefined) {
          entry.present.set(field, (entry.present.get(field) ?? 0) + 1)
        }
      }
    }
    return sampled
  }

  get endpoints(): string[] {
    return [...this.samples.keys()]
  }

  /** Fields present in at least `threshold` of each endpoint's rows */
  requiredByEndpoint(): Map<string, Set<string>> {
    const result = new Map<string, Set<string>>()
    for (const [endpoint, entry] of this.samples) {
      if (entry.rows === 0) continue
      const required = new Set<string>()
      for (const [field, count] of entry.present) {
        if (count / entry.rows >= this.threshold) required.add(field)
      }
      result.set(endpoint, required)
    }
    return result
  }

  /** Fields required in at least `minEndpoints` endpoints */
  commonRequiredFields(): Set<string> {
    const frequency = new Map<string, number>()
    for (const fields of this.requiredByEndpoint().values()) {
      for (const field of fields) {
        frequency.set(field, (frequency.get(field) ?? 0) + 1)
      }
    }
    return new Set(
      [...frequency].filter(([, count]) => count >= this.minEndpoints).map(([field]) => field),
    )
  }

  /** Endpoints whose rows carry the field at all, null or not */
  endpointsSeeing(field: string): string[] {
    return [...this.samples]
      .filter(([, entry]) => entry.rows > 0 && entry.seen.has(field))
      .map(([endpoint]) => endpoint)
  }
}

export interface AllowListAudit {
  /** Required wherever observed */
  confirmed: string[]
  /** Below the threshold in at least one endpoint, with those endpoints */
  contradicted: Array<{ field: string; endpoints: string[] }>
  /** Never seen in any sample */
  unobserved: string[]
  /** Commonly required but not on the allow-list */
  missing: string[]
}

export function auditAllowList(allowList: Iterable<string>, sampler: FieldPresenceSampler): AllowListAudit {
  const requiredByEndpoint = sampler.requiredByEndpoint()
  const listed = new Set(allowList)
  const audit: AllowListAudit = { confirmed: [], contradicted: [], unobserved: [], missing: [] }

  for (const field of [...listed].sort()) {
    const observedIn = sampler.endpointsSeeing(field)
    if (observedIn.length === 0) {
      audit.unobserved.push(field)
      continue
    }
    const failing = observedIn.filter((endpoint) => !requiredByEndpoint.get(endpoint)?.has(field))
    if (failing.length > 0) {
      audit.contradicted.push({ field, endpoints: failing.sort() })
    } else {
      audit.confirmed.push(field)
    }
  }

  audit.missing = [...sampler.commonRequiredFields()].filter((field) => !listed.has(field)).sort()
  return audit
}
