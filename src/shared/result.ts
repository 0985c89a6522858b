import type { Failure } from '../errors/tool-errors.js'

/**
 * Outcome of a step that can fail without throwing.
 *
 * @example
 * const amount = requireAmount(params)
 * if (!amount.ok) return amount
 * useAmount(amount.value)
 */
export type Result<T> = { ok: true; value: T } | { ok: false; failure: Failure }

export const ok = <T>(value: T): Result<T> => ({ ok: true, value })

export const fail = <T = never>(failure: Failure): Result<T> => ({ ok: false, failure })
