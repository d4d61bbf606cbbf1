import { describe, expect, test } from "vitest"
import { parseValue, parseValueWithUnit } from "../src/parser/quantity"
import {
  addNumbers,
  approxFraction,
  continuedFraction,
  formatNumber,
  fraction,
  multiplyNumber,
  regular,
  toFloat,
} from "../src/quantity/number"
import { addValues, formatQuantity, numberValue, rangeValue, scaleValue, textValue } from "../src/quantity/value"

describe("parseValue", () => {
  test("integers and decimals", () => {
    expect(parseValue("3")).toEqual({ value: { type: "number", value: regular(3) }, warnings: [] })
    expect(parseValue("1.5").value).toEqual(numberValue(1.5))
    expect(parseValue(".5").value).toEqual(numberValue(0.5))
    expect(parseValue("  2 ").value).toEqual(numberValue(2))
  })

  test("fractions and mixed numbers", () => {
    expect(parseValue("1/2").value).toEqual({ type: "number", value: fraction(0, 1, 2) })
    expect(parseValue("1 1/2").value).toEqual({ type: "number", value: fraction(1, 1, 2) })
    expect(parseValue("3 / 4").value).toEqual({ type: "number", value: fraction(0, 3, 4) })
  })

  test("ranges", () => {
    expect(parseValue("2-3").value).toEqual(rangeValue(2, 3))
    expect(parseValue("1/2 - 1").value).toEqual({ type: "range", start: fraction(0, 1, 2), end: regular(1) })
  })

  test("anything else is text", () => {
    expect(parseValue("a pinch")).toEqual({ value: textValue("a pinch"), warnings: [] })
    expect(parseValue(" some ").value).toEqual(textValue("some"))
    expect(parseValue("2x").value).toEqual(textValue("2x"))
  })

  test("invalid numbers keep their text and warn", () => {
    expect(parseValue("1/0")).toEqual({ value: textValue("1/0"), warnings: ["Division by zero"] })
    expect(parseValue("3-2")).toEqual({
      value: textValue("3-2"),
      warnings: ["Invalid range: the start is greater than the end"],
    })
  })

  test("decimals with more digits than a double keeps become fractions", () => {
    const { value, warnings } = parseValue("0.333333333333333333")
    expect(warnings).toEqual([])
    expect(value).toMatchObject({ type: "number", value: { type: "fraction", whole: 0, num: 1, den: 3 } })

    expect(parseValue("1.00000000000000001").value).toEqual({ type: "number", value: fraction(1, 0, 1, 0) })
  })

  test("long decimals with no close fraction keep their precision as a fraction", () => {
    const { value, warnings } = parseValue("3.14159265358979323846")
    expect(warnings).toEqual([])
    if (value.type !== "number" || value.value.type !== "fraction") throw new Error("expected a fraction")
    expect(value.value.whole).toBe(3)
    expect(Number.isSafeInteger(value.value.den)).toBe(true)
    expect(value.value.den).toBeGreaterThan(128)
    expect(toFloat(value.value)).toBeCloseTo(Math.PI, 14)

    const small = parseValue("0.1234567890123456789")
    expect(small.warnings).toEqual([])
    expect(small.value).toMatchObject({ type: "number", value: { type: "fraction", whole: 0 } })
  })

  test("integers too long for a safe integer stay numbers", () => {
    expect(parseValue("12345678901234567890").value).toEqual(numberValue(12345678901234567890))
  })
})

describe("parseValueWithUnit", () => {
  test("splits the value from the unit", () => {
    expect(parseValueWithUnit("200 g")).toEqual({ value: numberValue(200), unit: "g", warnings: [] })
    expect(parseValueWithUnit("1 1/2 cups")).toEqual({
      value: { type: "number", value: fraction(1, 1, 2) },
      unit: "cups",
      warnings: [],
    })
  })

  test("needs a number, a space and a unit", () => {
    expect(parseValueWithUnit("200")).toBeNull()
    expect(parseValueWithUnit("2 3")).toBeNull()
    expect(parseValueWithUnit("some salt")).toBeNull()
  })
})

describe("numbers", () => {
  test("approximates fractions within the accuracy", () => {
    const config = { accuracy: 0.05, maxDenominator: 4, maxWhole: 100 }
    expect(approxFraction(0.5, config)).toEqual(fraction(0, 1, 2, 0))
    expect(approxFraction(2.25, config)).toEqual(fraction(2, 1, 4, 0))
    expect(approxFraction(0.1, config)).toBeNull()
    expect(approxFraction(101, config)).toBeNull()
  })

  test("rounds up to the next whole number", () => {
    expect(approxFraction(1.99, { accuracy: 0.05, maxDenominator: 4, maxWhole: 10 })).toMatchObject({
      whole: 2,
      num: 0,
      den: 1,
    })
  })

  test("continued fractions", () => {
    expect(continuedFraction(0.5)).toEqual(fraction(0, 1, 2, 0))
    expect(continuedFraction(2.75)).toEqual(fraction(2, 3, 4, 0))
    expect(continuedFraction(4)).toEqual(fraction(4, 0, 1, 0))
    expect(continuedFraction(-1)).toBeNull()
  })

  test("multiplying keeps fractions exact", () => {
    expect(multiplyNumber(fraction(0, 1, 2), 3)).toEqual(fraction(1, 1, 2, 0))
    expect(multiplyNumber(regular(1.5), 2)).toEqual(regular(3))
    expect(multiplyNumber(fraction(0, 1, 2), 2)).toEqual(regular(1))
  })

  test("adding fractions", () => {
    expect(addNumbers(fraction(0, 1, 3), fraction(0, 1, 3))).toMatchObject({ type: "fraction", whole: 0, num: 2, den: 3 })
    expect(addNumbers(regular(1), fraction(0, 1, 2))).toEqual(regular(1.5))
  })

  test("formatting", () => {
    expect(formatNumber(regular(2))).toBe("2")
    expect(formatNumber(regular(0.1 + 0.2))).toBe("0.3")
    expect(formatNumber(fraction(0, 3, 4))).toBe("3/4")
    expect(formatNumber(fraction(1, 1, 2))).toBe("1 1/2")
    expect(formatNumber(fraction(3, 0, 1))).toBe("3")
  })
})

describe("values", () => {
  test("scaling numbers and ranges", () => {
    expect(scaleValue(numberValue(2), 1.5)).toEqual({ ok: true, value: numberValue(3) })
    expect(scaleValue(rangeValue(1, 2), 2)).toEqual({ ok: true, value: rangeValue(2, 4) })
  })

  test("text and invalid factors cannot be scaled", () => {
    expect(scaleValue(textValue("some"), 2)).toEqual({ ok: false, reason: "Text value 'some' cannot be scaled" })
    expect(scaleValue(numberValue(1), 0)).toEqual({ ok: false, reason: "Invalid scaling factor: 0" })
    expect(scaleValue(numberValue(1), Number.NaN)).toEqual({ ok: false, reason: "Invalid scaling factor: NaN" })
  })

  test("adding a number to a range adds to both ends", () => {
    expect(addValues(numberValue(1), rangeValue(2, 3))).toEqual(rangeValue(3, 4))
    expect(addValues(numberValue(1), textValue("some"))).toBeNull()
  })

  test("formatting quantities", () => {
    expect(formatQuantity({ value: rangeValue(1, 2), unit: "cups", fixed: false })).toBe("1-2 cups")
    expect(formatQuantity({ value: numberValue(3), unit: null, fixed: false })).toBe("3")
  })
})
