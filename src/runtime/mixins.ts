/**
 * Mixin helpers
 *
 * Behaviour that generated records carry by mixin name. Generated models list
 * their mixins (`XMixins`), so callers can look the helpers up at runtime.
 */

/** Half-hour periods in a settlement day; 46 and 50 occur on clock-change days */
export const MAX_SETTLEMENT_PERIOD = 50

export function isValidSettlementPeriod(period: unknown): boolean {
  return typeof period === 'number' && Number.isInteger(period) && period >= 1 && period <= MAX_SETTLEMENT_PERIOD
}

/** Minutes between two ISO timestamps, or undefined if either is missing or invalid */
export function durationMinutes(start: string | null | undefined, end: string | null | undefined): number | undefined {
  if (!start || !end) return undefined
  const from = Date.parse(start)
  const to = Date.parse(end)
  if (Number.isNaN(from) || Number.isNaN(to)) return undefined
  return (to - from) / 60_000
}

export type FlowDirection = 'up' | 'down'

/** Accepts `up`/`upward` and `down`/`downward` in any case */
export function parseFlowDirection(value: unknown): FlowDirection | undefined {
  if (typeof value !== 'string') return undefined
  const normalized = value.trim().toLowerCase()
  if (normalized === 'up' || normalized === 'upward') return 'up'
  if (normalized === 'down' || normalized === 'downward') return 'down'
  return undefined
}

export function isUpwardFlow(value: unknown): boolean {
  return parseFlowDirection(value) === 'up'
}

/** Available capacity lies within [0, normal capacity] */
export function capacityWithinBounds(record: { normalCapacity?: number | null; availableCapacity?: number | null }): boolean {
  const { normalCapacity, availableCapacity } = record
  if (normalCapacity == null || availableCapacity == null) return true
  return availableCapacity >= 0 && availableCapacity <= normalCapacity
}

export function isNegativePrice(price: unknown): boolean {
  return typeof price === 'number' && price < 0
}

type Row = Readonly<Record<string, unknown>>

function numberField(row: Row, key: string): number | null | undefined {
  const value = row[key]
  return typeof value === 'number' || value === null ? value : undefined
}

function stringField(row: Row, key: string): string | undefined {
  const value = row[key]
  return typeof value === 'string' ? value : undefined
}

export interface MixinHelper {
  /** False when the record breaks the mixin's invariant */
  check(row: Row): boolean
}

/**
 * Helpers keyed by mixin name. Mixins without an invariant are absent.
 */
export const mixinHelpers: Readonly<Record<string, MixinHelper>> = {
  SettlementFields: { check: (row) => row.settlementPeriod == null || isValidSettlementPeriod(row.settlementPeriod) },
  TimeRangeFields: { check: (row) => (durationMinutes(stringField(row, 'startTime'), stringField(row, 'endTime')) ?? 0) >= 0 },
  TimeFromToFields: { check: (row) => (durationMinutes(stringField(row, 'timeFrom'), stringField(row, 'timeTo')) ?? 0) >= 0 },
  FlowDirectionMixin: { check: (row) => row.flowDirection == null || parseFlowDirection(row.flowDirection) !== undefined },
  CapacityMixin: {
    check: (row) =>
      capacityWithinBounds({
        normalCapacity: numberField(row, 'normalCapacity'),
        availableCapacity: numberField(row, 'availableCapacity'),
      }),
  },
}

/**
 * Names of the listed mixins whose invariant the record breaks
 */
export function failedMixinChecks(row: Row, mixins: readonly string[]): string[] {
  return mixins.filter((name) => {
    const helper = mixinHelpers[name]
    return helper !== undefined && !helper.check(row)
  })
}
