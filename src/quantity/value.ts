import type { Quantity, RecipeNumber, Value } from "../types"
import { addNumbers, formatNumber, multiplyNumber, regular, toFloat } from "./number"

export function numberValue(value: number | RecipeNumber): Value {
  return { type: "number", value: typeof value === "number" ? regular(value) : value }
}

export function rangeValue(start: number | RecipeNumber, end: number | RecipeNumber): Value {
  return {
    type: "range",
    start: typeof start === "number" ? regular(start) : start,
    end: typeof end === "number" ? regular(end) : end,
  }
}

export function textValue(value: string): Value {
  return { type: "text", value }
}

export function isNumeric(value: Value): value is Exclude<Value, { type: "text" }> {
  return value.type !== "text"
}

/** Apply `fn` to every number of a numeric value */
export function mapNumbers(value: Value, fn: (n: RecipeNumber) => RecipeNumber): Value {
  switch (value.type) {
    case "number":
      return { type: "number", value: fn(value.value) }
    case "range":
      return { type: "range", start: fn(value.start), end: fn(value.end) }
    case "text":
      return value
  }
}

export type ScaleValueResult = { ok: true; value: Value } | { ok: false; reason: string }

export function scaleValue(value: Value, factor: number): ScaleValueResult {
  if (value.type === "text") {
    return { ok: false, reason: `Text value '${value.value}' cannot be scaled` }
  }
  if (!Number.isFinite(factor) || factor <= 0) {
    return { ok: false, reason: `Invalid scaling factor: ${factor}` }
  }
  return { ok: true, value: mapNumbers(value, n => multiplyNumber(n, factor)) }
}

/** Sum of two numeric values, null when one of them is text */
export function addValues(a: Value, b: Value): Value | null {
  if (a.type === "text" || b.type === "text") return null
  if (a.type === "number" && b.type === "number") {
    return { type: "number", value: addNumbers(a.value, b.value) }
  }
  const [aStart, aEnd] = a.type === "range" ? [a.start, a.end] : [a.value, a.value]
  const [bStart, bEnd] = b.type === "range" ? [b.start, b.end] : [b.value, b.value]
  return { type: "range", start: addNumbers(aStart, bStart), end: addNumbers(aEnd, bEnd) }
}

/** Representative magnitude used to pick units: the number, or a range's start */
export function magnitude(value: Value): number | null {
  switch (value.type) {
    case "number":
      return toFloat(value.value)
    case "range":
      return toFloat(value.start)
    case "text":
      return null
  }
}

export function valuesEqual(a: Value, b: Value): boolean {
  if (a.type === "text" || b.type === "text") {
    return a.type === "text" && b.type === "text" && a.value === b.value
  }
  if (a.type === "number" && b.type === "number") {
    return toFloat(a.value) === toFloat(b.value)
  }
  if (a.type === "range" && b.type === "range") {
    return toFloat(a.start) === toFloat(b.start) && toFloat(a.end) === toFloat(b.end)
  }
  return false
}

export function formatValue(value: Value): string {
  switch (value.type) {
    case "number":
      return formatNumber(value.value)
    case "range":
      return `${formatNumber(value.start)}-${formatNumber(value.end)}`
    case "text":
      return value.value
  }
}

export function formatQuantity(quantity: Quantity): string {
  const value = formatValue(quantity.value)
  return quantity.unit ? `${value} ${quantity.unit}` : value
}
