/**
 * Runtime Module
 *
 * Imported by generated TypeScript clients as `bmrs-codegen/runtime`.
 *
 * @example
 * ```ts
 * import { GeneratedClient } from './generated'
 * import { toSearchParams, type Transport } from 'bmrs-codegen/runtime'
 *
 * const transport: Transport = {
 *   async request({ method, path, query }) {
 *     const response = await fetch(`${baseUrl}${path}?${toSearchParams(query)}`, { method })
 *     return response.json()
 *   },
 * }
 *
 * const result = await new GeneratedClient(transport).get_demand()
 * if (result.valid) console.log(result.data.data.length)
 * ```
 */

export { toSearchParams, type Transport, type TransportMethod, type TransportRequest } from './transport.js'

export { coerceResponse, setCoercionLogger, type CoercedResponse } from './coerce.js'

export {
  MAX_SETTLEMENT_PERIOD,
  capacityWithinBounds,
  durationMinutes,
  failedMixinChecks,
  isNegativePrice,
  isUpwardFlow,
  isValidSettlementPeriod,
  mixinHelpers,
  parseFlowDirection,
  type FlowDirection,
  type MixinHelper,
} from './mixins.js'

export { ResponseCoercionError } from '../core/errors.js'
