/**
 * Conversions between YNAB milliunits (1000 = $1.00) and display strings.
 *
 * The integer is the source of truth. Display strings are derived on demand
 * and never parsed back into amounts.
 */

const MILLIUNITS_PER_UNIT = 1000

const groupFormatter = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 })

/**
 * Formats milliunits as a dollar string with thousands grouping.
 *
 * Rounds to the cent half away from zero, on the integer, so the result never
 * depends on binary floating point. Magnitudes above Number.MAX_SAFE_INTEGER
 * are not supported.
 *
 * @example
 * toDisplay(12340) // => '$12.34'
 * toDisplay(-500) // => '-$0.50'
 * toDisplay(1234567890) // => '$1,234,567.89'
 */
export const toDisplay = (milliunits: number): string => {
  const cents = Math.floor((Math.abs(milliunits) + 5) / 10)
  const whole = Math.floor(cents / 100)
  const fraction = String(cents % 100).padStart(2, '0')
  const formatted = `$${groupFormatter.format(whole)}.${fraction}`
  return milliunits < 0 ? `-${formatted}` : formatted
}

/**
 * Converts a dollar amount to milliunits, truncating toward zero.
 *
 * Lossy for inputs with more than three fractional digits.
 *
 * @example
 * toMilliunits(19.99) // => 19990
 * toMilliunits(-5.5) // => -5500
 */
export const toMilliunits = (dollars: number): number => Math.trunc(dollars * MILLIUNITS_PER_UNIT)
