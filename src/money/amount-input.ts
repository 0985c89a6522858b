import { toMilliunits } from './amount-codec.js'
import { ValidationError, toFailure } from '../errors/tool-errors.js'
import { ok, fail, type Result } from '../shared/result.js'

/**
 * The two ways a caller may state an amount. Tools accept both fields but
 * only one may be set.
 */
export interface AmountFields {
  amount_milliunits?: number | null
  amount_dollars?: number | null
}

export type AmountInput =
  | { kind: 'milliunits'; milliunits: number }
  | { kind: 'dollars'; dollars: number }

export const milliunitsAmount = (milliunits: number): AmountInput => ({ kind: 'milliunits', milliunits })

export const dollarsAmount = (dollars: number): AmountInput => ({ kind: 'dollars', dollars })

const invalid = (message: string) => fail(toFailure(new ValidationError(message)))

const presentFields = (fields: AmountFields): AmountInput[] => {
  const present: AmountInput[] = []
  if (fields.amount_milliunits !== undefined && fields.amount_milliunits !== null) {
    present.push(milliunitsAmount(fields.amount_milliunits))
  }
  if (fields.amount_dollars !== undefined && fields.amount_dollars !== null) {
    present.push(dollarsAmount(fields.amount_dollars))
  }
  return present
}

/**
 * For creation and single-amount mutations: exactly one field must be set.
 *
 * @example
 * requireAmount({ amount_milliunits: 5000 }) // => ok milliunits 5000
 * requireAmount({}) // => validation failure
 */
export const requireAmount = (fields: AmountFields): Result<AmountInput> => {
  const present = presentFields(fields)
  if (present.length !== 1) {
    return invalid('Provide exactly one of amount_milliunits or amount_dollars')
  }
  return ok(present[0])
}

/**
 * For partial updates: zero or one field may be set.
 */
export const optionalAmount = (fields: AmountFields): Result<AmountInput | undefined> => {
  const present = presentFields(fields)
  if (present.length > 1) {
    return invalid('Provide at most one of amount_milliunits or amount_dollars')
  }
  return present.length === 0 ? ok(undefined) : ok(present[0])
}

export const amountToMilliunits = (input: AmountInput): number =>
  input.kind === 'milliunits' ? input.milliunits : toMilliunits(input.dollars)
