/**
 * Malformed or contradictory tool input, detected before any YNAB call.
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ValidationError'
  }
}

/**
 * Non-2xx answer from the YNAB API. `reason` is the detail YNAB sent, or the
 * HTTP status text.
 */
export class UpstreamError extends Error {
  constructor(
    readonly status: number,
    readonly reason: string
  ) {
    super(`YNAB API error ${status}: ${reason}`)
    this.name = 'UpstreamError'
  }
}

/**
 * File system failure while writing a spill file.
 */
export class LocalPersistenceError extends Error {
  constructor(
    readonly path: string,
    cause: unknown
  ) {
    super(cause instanceof Error ? cause.message : String(cause), { cause })
    this.name = 'LocalPersistenceError'
  }
}

/**
 * Every way a tool call can fail, after classification.
 */
export type Failure =
  | { kind: 'validation'; message: string }
  | { kind: 'unauthorized' }
  | { kind: 'forbidden' }
  | { kind: 'not_found' }
  | { kind: 'rate_limited' }
  | { kind: 'upstream'; status: number; reason: string }
  | { kind: 'persistence'; path: string; reason: string }
  | { kind: 'unknown'; name: string; message: string }

/**
 * Maps an HTTP status to its failure category.
 */
export const failureFromStatus = (status: number, reason: string): Failure => {
  switch (status) {
    case 401:
      return { kind: 'unauthorized' }
    case 403:
      return { kind: 'forbidden' }
    case 404:
      return { kind: 'not_found' }
    case 429:
      return { kind: 'rate_limited' }
    default:
      return { kind: 'upstream', status, reason }
  }
}

/**
 * Converts anything thrown during a tool call into a classified failure.
 */
export const toFailure = (error: unknown): Failure => {
  if (error instanceof ValidationError) {
    return { kind: 'validation', message: error.message }
  }
  if (error instanceof UpstreamError) {
    return failureFromStatus(error.status, error.reason)
  }
  if (error instanceof LocalPersistenceError) {
    return { kind: 'persistence', path: error.path, reason: error.message }
  }
  if (error instanceof Error) {
    return { kind: 'unknown', name: error.name, message: error.message }
  }
  return { kind: 'unknown', name: 'UnknownError', message: String(error) }
}

/**
 * Renders a failure as the text returned to the caller. Never throws.
 */
export const describeFailure = (failure: Failure): string => {
  switch (failure.kind) {
    case 'unauthorized':
      return 'Error: Invalid API key. Check YNAB_API_KEY environment variable.'
    case 'forbidden':
      return "Error: Access forbidden. You don't have permission for this resource."
    case 'not_found':
      return 'Error: Resource not found. Check the ID is correct.'
    case 'rate_limited':
      return 'Error: Rate limit exceeded. Wait before making more requests.'
    case 'upstream':
      return `Error: YNAB API error ${failure.status}: ${failure.reason}`
    case 'validation':
      return `Error: ValidationError: ${failure.message}`
    case 'persistence':
      return `Error: LocalPersistenceError: Could not write ${failure.path}: ${failure.reason}`
    case 'unknown':
      return `Error: ${failure.name}: ${failure.message}`
  }
}

/**
 * Shorthand for classifying and describing in one step.
 */
export const classifyError = (error: unknown): string => describeFailure(toFailure(error))
