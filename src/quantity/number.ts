import type { FractionNumber, RecipeNumber, RegularNumber } from "../types"

export interface FractionsConfig {
  enabled: boolean
  /** Maximum relative error accepted, 0..1 */
  accuracy: number
  maxDenominator: number
  maxWhole: number
}

export const DEFAULT_FRACTIONS: FractionsConfig = {
  enabled: false,
  accuracy: 0.05,
  maxDenominator: 4,
  maxWhole: Number.MAX_SAFE_INTEGER,
}

export function regular(value: number): RegularNumber {
  return { type: "regular", value }
}

export function fraction(whole: number, num: number, den: number, err = 0): FractionNumber {
  return { type: "fraction", whole, num, den, err }
}

export function toFloat(n: RecipeNumber): number {
  return n.type === "regular" ? n.value : n.whole + n.num / n.den
}

/**
 * Best `whole + num/den` approximation of `value` with `den <= maxDenominator`.
 *
 * Returns null when the relative error is above `accuracy` or the whole
 * part is larger than `maxWhole`.
 */
export function approxFraction(
  value: number,
  config: Pick<FractionsConfig, "accuracy" | "maxDenominator" | "maxWhole">,
): FractionNumber | null {
  if (!Number.isFinite(value) || value < 0) return null
  let whole = Math.floor(value)
  if (whole > config.maxWhole || !Number.isSafeInteger(whole)) return null
  const decimal = value - whole

  let bestNum = 0
  let bestDen = 1
  let bestErr = decimal
  for (let den = 1; den <= config.maxDenominator; den += 1) {
    const num = Math.round(decimal * den)
    const err = Math.abs(decimal - num / den)
    if (err < bestErr - Number.EPSILON) {
      bestNum = num
      bestDen = den
      bestErr = err
    }
  }

  const relative = value === 0 ? 0 : bestErr / value
  if (relative > config.accuracy) return null

  if (bestNum === bestDen) {
    whole += 1
    bestNum = 0
    bestDen = 1
  }
  const divisor = gcd(bestNum, bestDen)
  return fraction(whole, bestNum / divisor, bestDen / divisor, bestErr)
}

/**
 * Closest `whole + num/den` with a safe-integer denominator, from the
 * continued fraction of `value`. Stops at the first convergent within a
 * double's precision.
 */
export function continuedFraction(value: number): FractionNumber | null {
  if (!Number.isFinite(value) || value < 0) return null
  const whole = Math.floor(value)
  if (!Number.isSafeInteger(whole)) return null
  const decimal = value - whole
  const tolerance = Number.EPSILON * Math.max(value, 1)

  // convergents h/k, seeded with h(-1)/k(-1) = 1/0 and h(-2)/k(-2) = 0/1
  let num = 1
  let den = 0
  let prevNum = 0
  let prevDen = 1
  let x = decimal
  for (let i = 0; i < 64; i += 1) {
    const a = Math.floor(x)
    const nextNum = a * num + prevNum
    const nextDen = a * den + prevDen
    if (!Number.isSafeInteger(nextNum) || !Number.isSafeInteger(nextDen)) break
    prevNum = num
    prevDen = den
    num = nextNum
    den = nextDen
    const rest = x - a
    if (rest === 0 || Math.abs(decimal - num / den) <= tolerance) break
    x = 1 / rest
  }

  if (den === 0) return null
  if (num === den) return fraction(whole + 1, 0, 1, Math.abs(decimal - 1))
  return fraction(whole, num, den, Math.abs(decimal - num / den))
}

function gcd(a: number, b: number): number {
  return b === 0 ? a || 1 : gcd(b, a % b)
}

/** Denominators searched when keeping arithmetic results exact */
const MAX_EXACT_DENOMINATOR = 4096

function exactOrRegular(value: number, maxDenominator: number): RecipeNumber {
  if (Number.isFinite(value)) {
    const exact = approxFraction(value, {
      accuracy: 1e-9,
      maxDenominator: Math.min(maxDenominator, MAX_EXACT_DENOMINATOR),
      maxWhole: Number.MAX_SAFE_INTEGER,
    })
    if (exact && exact.num !== 0) return exact
  }
  return regular(value)
}

/**
 * Multiply keeping fractions exact when the result is still a small fraction.
 */
export function multiplyNumber(n: RecipeNumber, factor: number): RecipeNumber {
  const value = toFloat(n) * factor
  return n.type === "fraction" ? exactOrRegular(value, n.den * 16) : regular(value)
}

export function addNumbers(a: RecipeNumber, b: RecipeNumber): RecipeNumber {
  const value = toFloat(a) + toFloat(b)
  if (a.type === "fraction" && b.type === "fraction") {
    return exactOrRegular(value, a.den * b.den)
  }
  return regular(value)
}

/** Rounds away floating point noise, at most 3 decimals */
export function roundDisplay(value: number): number {
  return Math.round(value * 1000) / 1000
}

export function formatNumber(n: RecipeNumber): string {
  if (n.type === "regular") return String(roundDisplay(n.value))
  if (n.num === 0) return String(n.whole)
  if (n.whole === 0) return `${n.num}/${n.den}`
  return `${n.whole} ${n.num}/${n.den}`
}
