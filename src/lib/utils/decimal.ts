import { ethers } from 'ethers'
import { InvalidAmountError } from '../errors'

/**
 * Ledger decimals are fixed-point numbers with 18 fractional digits, stored as a
 * bigint count of attos (10^-18).
 */
export type Decimal = bigint

export type DecimalLike = string | number | bigint

export const DECIMAL_PLACES = 18
export const ONE: Decimal = 10n ** 18n
export const ZERO: Decimal = 0n

// Signed 192-bit range of the ledger's decimal type.
const MAX_ATTOS = (1n << 191n) - 1n

export const MAX_DECIMAL: Decimal = MAX_ATTOS
export const MIN_DECIMAL: Decimal = -MAX_ATTOS - 1n

export const LN_2: Decimal = 693147180559945309n
export const LN_10: Decimal = 2302585092994045684n

// exp() of anything below this rounds to zero; exp(SMALLEST_NON_ZERO) is one atto.
export const SMALLEST_NON_ZERO: Decimal = -41446531673892822312n

// ln(MAX_DECIMAL) is just under 91.
const EXP_INPUT_LIMIT: Decimal = 91n * ONE
// 2^60 is the power of two just above ONE.
const POWER_OF_TWO_ABOVE_ONE = 1n << 60n
const MAX_HALLEY_ROUNDS = 100

/**
 * Parses a decimal-like value into attos. Bigints are taken as whole units, not attos.
 * Negative values are allowed here; callers that need amounts use `toAmount`.
 */
export function toDecimal(value: DecimalLike): Decimal {
  const text = typeof value === 'bigint' ? value.toString() : typeof value === 'number' ? numberToText(value) : value.trim()
  if (!/^-?\d+(\.\d+)?$/.test(text)) {
    throw new InvalidAmountError(String(value), 'not a decimal number')
  }
  let attos: bigint
  try {
    attos = ethers.parseUnits(text, DECIMAL_PLACES)
  } catch (error) {
    throw new InvalidAmountError(text, `more than ${DECIMAL_PLACES} fractional digits`)
  }
  if (attos > MAX_ATTOS || attos < -MAX_ATTOS - 1n) {
    throw new InvalidAmountError(text, 'out of the ledger decimal range')
  }
  return attos
}

/**
 * Parses a container amount: a decimal that must not be negative.
 */
export function toAmount(value: DecimalLike): Decimal {
  const attos = toDecimal(value)
  if (attos < 0n) {
    throw new InvalidAmountError(String(value), 'amounts must not be negative')
  }
  return attos
}

/**
 * Formats attos as a plain decimal string without trailing zeros, e.g. `89.5` or `100`.
 */
export function formatDecimal(value: Decimal): string {
  const text = ethers.formatUnits(value, DECIMAL_PLACES)
  return text.endsWith('.0') ? text.slice(0, -2) : text
}

export function mulDecimal(a: Decimal, b: Decimal): Decimal {
  return (a * b) / ONE
}

export function divDecimal(a: Decimal, b: Decimal): Decimal {
  if (b === 0n) {
    throw new RangeError('Division by zero')
  }
  return (a * ONE) / b
}

/**
 * e^x, summed as a Taylor series in fixed point. Throws a RangeError when the result does
 * not fit the ledger decimal range.
 */
export function expDecimal(x: Decimal): Decimal {
  if (x === 0n) {
    return ONE
  }
  if (x < 0n) {
    return x < SMALLEST_NON_ZERO ? 0n : divDecimal(ONE, expDecimal(-x))
  }
  if (x > EXP_INPUT_LIMIT) {
    throw overflow(`exp(${formatDecimal(x)})`)
  }
  let result = ONE
  let term = x
  let counter = 1n
  while (term !== 0n) {
    result += term
    counter += 1n
    term = (term * (x / counter)) / ONE
  }
  if (result > MAX_ATTOS) {
    throw overflow(`exp(${formatDecimal(x)})`)
  }
  return result
}

/**
 * Natural logarithm by Halley's method: x(n+1) = x(n) + 2 * (y - e^x(n)) / (y + e^x(n)).
 *
 * The input is first divided by a power of two 2^n to bring it near one, so that e^x(n)
 * stays small, and n * ln(2) is added back at the end. Inputs below one are computed as -ln(1/y).
 */
export function lnDecimal(y: Decimal): Decimal {
  if (y <= 0n) {
    throw new RangeError(`Logarithm is only defined for positive numbers, got ${formatDecimal(y)}`)
  }
  if (y < ONE) {
    return -lnDecimal(divDecimal(ONE, y))
  }

  const powerOfTwo = nextPowerOfTwo(y) / POWER_OF_TWO_ABOVE_ONE
  const exponent = BigInt(powerOfTwo.toString(2).length - 1)
  const scaled = divDecimal(y, powerOfTwo * ONE)

  let result = scaled
  let last = result + ONE
  for (let round = 0; last !== result && round < MAX_HALLEY_ROUNDS; round++) {
    last = result
    const estimate = expDecimal(last)
    result = last + divDecimal(scaled - estimate, scaled + estimate) * 2n
  }
  return result + exponent * LN_2
}

export function log2Decimal(y: Decimal): Decimal {
  return divDecimal(lnDecimal(y), LN_2)
}

export function log10Decimal(y: Decimal): Decimal {
  return divDecimal(lnDecimal(y), LN_10)
}

export function logBaseDecimal(y: Decimal, base: Decimal): Decimal {
  return divDecimal(lnDecimal(y), lnDecimal(base))
}

/**
 * base^exponent as e^(exponent * ln(base)); the base must be positive.
 */
export function powDecimal(base: Decimal, exponent: Decimal): Decimal {
  return expDecimal(mulDecimal(exponent, lnDecimal(base)))
}

/**
 * Checks that `value` is expressible with the given number of fractional digits.
 */
export function fitsDivisibility(value: Decimal, divisibility: number): boolean {
  const step = 10n ** BigInt(DECIMAL_PLACES - divisibility)
  return value % step === 0n
}

function nextPowerOfTwo(value: bigint): bigint {
  let power = 1n
  while (power < value) {
    power <<= 1n
  }
  return power
}

function overflow(operation: string): RangeError {
  return new RangeError(`Overflow: ${operation} is outside the ledger decimal range`)
}

function numberToText(value: number): string {
  if (!Number.isFinite(value)) {
    throw new InvalidAmountError(String(value), 'not a finite number')
  }
  if (Number.isInteger(value)) {
    return BigInt(value).toString()
  }
  // String() switches to exponent notation below 1e-6
  const text = String(value)
  return text.includes('e') ? value.toFixed(DECIMAL_PLACES).replace(/0+$/, '') : text
}
