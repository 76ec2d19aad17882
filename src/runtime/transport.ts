/**
 * Transport
 *
 * The only thing a generated client needs from the outside world. Retries,
 * sessions and authentication belong to the implementation.
 */

export type TransportMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD' | 'OPTIONS'

export interface TransportRequest {
  method: TransportMethod
  /** Path with parameters already substituted and encoded */
  path: string
  /** Query parameters; absent optional parameters are left out */
  query: Record<string, unknown>
}

export interface Transport {
  /** Resolve with the decoded response body */
  request(request: TransportRequest): Promise<unknown>
}

/**
 * Flatten query values into URLSearchParams. Arrays repeat the key.
 */
export function toSearchParams(query: Record<string, unknown>): URLSearchParams {
  const params = new URLSearchParams()
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined || value === null) continue
    const values: unknown[] = Array.isArray(value) ? value : [value]
    for (const item of values) {
      params.append(key, item instanceof Date ? item.toISOString() : String(item))
    }
  }
  return params
}
