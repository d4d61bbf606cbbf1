import { readFileSync } from "node:fs"
import { dirname, join } from "node:path"
import { fileURLToPath } from "node:url"
import * as Ohm from "ohm-js"
import { approxFraction, continuedFraction, fraction, regular, toFloat } from "../quantity/number"
import { textValue } from "../quantity/value"
import type { RecipeNumber, Value } from "../types"

const __dirname = dirname(fileURLToPath(import.meta.url))

const grammarFile = readFileSync(join(__dirname, "../../grammars/quantity.ohm"), "utf-8")
const grammar = Ohm.grammar(grammarFile)

/** Digits a double keeps exactly */
const MAX_SIGNIFICANT_DIGITS = 15

type Literal<T> = { ok: true; value: T } | { ok: false; warning: string }

export interface ParsedValue {
  value: Value
  warnings: string[]
}

export interface ParsedValueWithUnit extends ParsedValue {
  unit: string
}

// ---------------------------------------------------------------------------
// Type guards
// ---------------------------------------------------------------------------

function isRecord(v: unknown): v is Record<string, unknown> {
  return v != null && typeof v === "object" && !Array.isArray(v)
}

function isRecipeNumber(v: unknown): v is RecipeNumber {
  return isRecord(v) && (v.type === "regular" || v.type === "fraction")
}

function isValue(v: unknown): v is Value {
  return isRecord(v) && (v.type === "number" || v.type === "range" || v.type === "text")
}

function isFailed(v: unknown): v is { ok: false; warning: string } {
  return isRecord(v) && v.ok === false && typeof v.warning === "string"
}

function numberOf(node: Ohm.Node): Literal<RecipeNumber> {
  const result: unknown = node["numberLiteral"]()
  if (isFailed(result)) return result
  if (isRecord(result) && isRecipeNumber(result.value)) return { ok: true, value: result.value }
  return { ok: false, warning: `Invalid number: '${node.sourceString}'` }
}

function valueOf(result: unknown, source: string): Literal<Value> {
  if (isFailed(result)) return result
  if (isRecord(result) && isValue(result.value)) return { ok: true, value: result.value }
  return { ok: false, warning: `Invalid quantity: '${source}'` }
}

// ---------------------------------------------------------------------------
// Literals
// ---------------------------------------------------------------------------

function significantDigits(text: string): number {
  let digits = text.replace(/^[0.]+/, "")
  if (text.includes(".")) digits = digits.replace(/0+$/, "")
  return digits.replace(".", "").length
}

function decimalLiteral(text: string): Literal<RecipeNumber> {
  const value = Number(text)
  if (significantDigits(text) <= MAX_SIGNIFICANT_DIGITS) return { ok: true, value: regular(value) }
  if (!text.includes(".") && Number.isSafeInteger(value)) return { ok: true, value: regular(value) }

  if (!Number.isFinite(value)) return { ok: false, warning: `Number '${text}' is too large` }

  // a close small fraction first, so 0.3333… reads as 1/3
  const approx =
    approxFraction(value, { accuracy: 1e-9, maxDenominator: 128, maxWhole: Number.MAX_SAFE_INTEGER }) ??
    continuedFraction(value)
  return { ok: true, value: approx ?? regular(value) }
}

function fractionLiteral(wholeText: string, numText: string, denText: string): Literal<RecipeNumber> {
  const whole = Number(wholeText)
  const num = Number(numText)
  const den = Number(denText)
  if (![whole, num, den].every(Number.isSafeInteger)) {
    return { ok: false, warning: `Number too large: '${numText}/${denText}'` }
  }
  if (den === 0) return { ok: false, warning: "Division by zero" }
  return { ok: true, value: fraction(whole, num, den) }
}

// ---------------------------------------------------------------------------
// Semantics
// ---------------------------------------------------------------------------

const semantics = grammar.createSemantics()

semantics.addOperation<Literal<RecipeNumber>>("numberLiteral", {
  mixed(whole, _sp, frac) {
    return fractionLiteral(whole.sourceString, frac.child(0).sourceString, frac.child(4).sourceString)
  },

  fraction(num, _sp1, _slash, _sp2, den) {
    return fractionLiteral("0", num.sourceString, den.sourceString)
  },

  decimal_point(_int, _dot, _frac) {
    return decimalLiteral(this.sourceString)
  },

  decimal_leading(_dot, _frac) {
    return decimalLiteral(this.sourceString)
  },

  decimal_whole(_int) {
    return decimalLiteral(this.sourceString)
  },
})

semantics.addOperation<Literal<Value>>("valueLiteral", {
  value(_lead, amount, _trail) {
    return valueOf(amount["valueLiteral"](), amount.sourceString)
  },

  valueWithUnit(_lead, amount, _sp, _unit) {
    return valueOf(amount["valueLiteral"](), amount.sourceString)
  },

  range(start, _sp1, _dash, _sp2, end) {
    const from = numberOf(start)
    if (!from.ok) return from
    const to = numberOf(end)
    if (!to.ok) return to
    if (toFloat(from.value) > toFloat(to.value)) {
      return { ok: false, warning: "Invalid range: the start is greater than the end" }
    }
    return { ok: true, value: { type: "range", start: from.value, end: to.value } }
  },

  number(inner) {
    const n = numberOf(inner)
    return n.ok ? { ok: true, value: { type: "number", value: n.value } } : n
  },
})

semantics.addOperation<string>("unitText", {
  valueWithUnit(_lead, _amount, _sp, unit) {
    return unit.sourceString.trim()
  },
})

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Parse a quantity value: integer, decimal, fraction, mixed number or range.
 *
 * Anything the grammar does not accept is a text value. Numbers that match
 * but cannot be represented keep the text and report a warning.
 */
export function parseValue(text: string): ParsedValue {
  const match = grammar.match(text, "value")
  if (match.failed()) return { value: textValue(text.trim()), warnings: [] }

  const literal = valueOf(semantics(match)["valueLiteral"](), text)
  if (literal.ok) return { value: literal.value, warnings: [] }
  return { value: textValue(text.trim()), warnings: [literal.warning] }
}

/**
 * Split `"200 g"` or `"1 1/2 cups"` into a value and a unit.
 * Returns null when the text does not start with a number followed by a space.
 */
export function parseValueWithUnit(text: string): ParsedValueWithUnit | null {
  const match = grammar.match(text, "valueWithUnit")
  if (match.failed()) return null

  const adapter = semantics(match)
  const unitResult: unknown = adapter["unitText"]()
  const unit = typeof unitResult === "string" ? unitResult : ""
  const literal = valueOf(adapter["valueLiteral"](), text)
  if (!literal.ok) return null
  return { value: literal.value, unit, warnings: [] }
}
