/**
 * Response coercion
 *
 * Generated client methods validate response bodies against their zod schema.
 * A mismatch never throws: the raw body comes back flagged invalid and a
 * warning is logged.
 */

import type { z } from 'zod'
import { ResponseCoercionError } from '../core/errors.js'
import { createLogger, type Logger } from '../core/logger.js'

export type CoercedResponse<T> =
  | { valid: true; data: T }
  | { valid: false; data: unknown; error: ResponseCoercionError }

let logger: Logger = createLogger({ scope: 'bmrs-client' })

/** Replace the logger used for coercion warnings */
export function setCoercionLogger(next: Logger): void {
  logger = next
}

export function coerceResponse<S extends z.ZodTypeAny>(
  raw: unknown,
  schema: S,
  methodName: string,
): CoercedResponse<z.output<S>> {
  const result = schema.safeParse(raw)
  if (result.success) {
    return { valid: true, data: result.data }
  }

  const issues = result.error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  )
  const error = new ResponseCoercionError(methodName, issues, { cause: result.error })
  logger.warn(error.message)
  return { valid: false, data: raw, error }
}

