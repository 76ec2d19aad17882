/**
 * Error types
 *
 * Only a malformed document or configuration aborts a run. Everything else
 * is recorded as a GenerationNote and generation continues.
 */

export class CodegenError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Input is not a recognizable OpenAPI document */
export class SpecFormatError extends CodegenError {}

/** A configuration file or table failed validation */
export class ConfigError extends CodegenError {}

/**
 * A response body did not match the expected shape.
 * Generated clients report it alongside the raw data; it is never thrown to callers.
 */
export class ResponseCoercionError extends CodegenError {
  readonly methodName: string
  readonly issues: string[]

  constructor(methodName: string, issues: string[], options?: { cause?: unknown }) {
    super(`Response from ${methodName} did not match the expected type: ${issues.join('; ')}`, options)
    this.methodName = methodName
    this.issues = issues
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
