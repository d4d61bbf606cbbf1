import { describe, expect, test } from "vitest"
import { bundledConverter } from "../src/convert/bundled"
import { parseRecipe } from "../src/parse-recipe"
import { groupQuantities } from "../src/quantity/grouped"
import { fraction, regular, toFloat } from "../src/quantity/number"
import { numberValue, rangeValue, textValue } from "../src/quantity/value"
import { scaleRecipe, scalingReport } from "../src/scale"
import type { Quantity } from "../src/types"

const converter = bundledConverter()

function q(value: number, unit: string | null, fixed = false): Quantity {
  return { value: numberValue(value), unit, fixed }
}

describe("scaleRecipe", () => {
  test("scales to a number of servings", () => {
    const { recipe } = parseRecipe(">> servings: 2\nMix @flour{200%g} and @milk{1/2%cup}.")
    const scaled = scaleRecipe(recipe, { type: "servings", servings: 6 })
    expect(scaled.scaling.factor).toBe(3)
    expect(scaled.ingredients.map(i => i.quantity?.value)).toEqual([
      numberValue(600),
      { type: "number", value: fraction(1, 1, 2, 0) },
    ])
    expect(scaled.scaling.ingredients).toEqual([{ type: "scaled" }, { type: "scaled" }])
  })

  test("scales ranges", () => {
    const { recipe } = parseRecipe("@eggs{2-3}")
    expect(scaleRecipe(recipe, { type: "factor", factor: 2 }).ingredients[0]?.quantity?.value).toEqual(rangeValue(4, 6))
  })

  test("fixed, text and missing quantities", () => {
    const { recipe } = parseRecipe("@salt{1%tsp}* @pepper{some} @water{} @flour{=100%g}")
    const scaled = scaleRecipe(recipe, { type: "factor", factor: 2 })
    expect(scaled.scaling.ingredients).toEqual([
      { type: "fixed" },
      { type: "error", reason: "Text value 'some' cannot be scaled" },
      { type: "noQuantity" },
      { type: "fixed" },
    ])
    expect(scaled.ingredients[0]?.quantity?.value).toEqual(numberValue(1))
    expect(scaled.ingredients[1]?.quantity?.value).toEqual(textValue("some"))
  })

  test("cookware and timers keep their quantities", () => {
    const { recipe } = parseRecipe("Use #pans{2} for ~{10%min}.")
    const scaled = scaleRecipe(recipe, { type: "factor", factor: 3 })
    expect(scaled.cookware[0]?.quantity?.value).toEqual(numberValue(2))
    expect(scaled.timers[0]?.quantity.value).toEqual(numberValue(10))
    expect(scaled.scaling.cookware).toEqual([{ type: "fixed" }])
    expect(scaled.scaling.timers).toEqual([{ type: "fixed" }])
  })

  test("scaling to servings needs declared servings", () => {
    const { recipe } = parseRecipe("@flour{200%g}")
    const scaled = scaleRecipe(recipe, { type: "servings", servings: 4 })
    expect(scaled.scaling.ingredients).toEqual([{ type: "error", reason: "The recipe does not declare its servings" }])
    expect(scaled.ingredients[0]?.quantity?.value).toEqual(numberValue(200))
  })

  test("invalid factors are errors", () => {
    const { recipe } = parseRecipe("@flour{200%g}")
    expect(scaleRecipe(recipe, { type: "factor", factor: -1 }).scaling.ingredients).toEqual([
      { type: "error", reason: "Invalid scaling factor: -1" },
    ])
  })

  test("factor 1 keeps every value", () => {
    const { recipe } = parseRecipe(">> servings: 4\n@flour{1 1/2%cups} @eggs{2-3} @salt{1%tsp}*")
    const scaled = scaleRecipe(recipe, { type: "servings", servings: 4 })
    expect(scaled.ingredients).toEqual(recipe.ingredients)
    expect(scaled.sections).toEqual(recipe.sections)
  })

  test("long decimals scale like any number", () => {
    const { recipe } = parseRecipe("@flour{0.12345678901234567%kg}")
    const scaled = scaleRecipe(recipe, { type: "factor", factor: 2 })
    expect(scaled.scaling.ingredients).toEqual([{ type: "scaled" }])
    const value = scaled.ingredients[0]?.quantity?.value
    if (value?.type !== "number") throw new Error("expected a number")
    expect(toFloat(value.value)).toBeCloseTo(0.24691358024691134, 12)
  })

  test("does not modify the recipe", () => {
    const { recipe } = parseRecipe("@flour{200%g}")
    scaleRecipe(recipe, { type: "factor", factor: 2 })
    expect(recipe.ingredients[0]?.quantity?.value).toEqual(numberValue(200))
  })

  test("fits scaled quantities to their best unit", () => {
    const { recipe } = parseRecipe("@flour{600%g}")
    const scaled = scaleRecipe(recipe, { type: "factor", factor: 2 }, { fit: true })
    expect(scaled.ingredients[0]?.quantity).toMatchObject({ value: numberValue(1.2), unit: "kg" })
  })

  test("list entries are regrouped with their outcome", () => {
    const { recipe } = parseRecipe("Add @flour{200%g}.\n\nAdd more @flour{1%kg}.\n\nAdd @salt{=1%tsp} and @water{}.")
    const scaled = scaleRecipe(recipe, { type: "factor", factor: 2 })
    expect(scaled.ingredientList).toEqual([
      { index: 0, outcome: "scaled", quantity: [{ value: numberValue(2400), unit: "g", fixed: false, physicalQuantity: "mass" }] },
      { index: 2, outcome: "fixed", quantity: [{ value: numberValue(1), unit: "tsp", fixed: true, physicalQuantity: "volume" }] },
      { index: 3, outcome: "noQuantity", quantity: [] },
    ])
  })

  test("scaling errors can be reported", () => {
    const { recipe } = parseRecipe("Add @pepper{some}.")
    const report = scalingReport(scaleRecipe(recipe, { type: "factor", factor: 2 }))
    expect(report.warnings().map(d => [d.stage, d.message, d.span])).toEqual([
      ["scale", "Cannot scale 'pepper': Text value 'some' cannot be scaled", { start: 4, end: 17 }],
    ])
  })
})

describe("groupQuantities", () => {
  test("adds compatible units in the first unit", () => {
    expect(groupQuantities([q(200, "g"), q(1, "kg")], converter)).toEqual([
      { value: numberValue(1200), unit: "g", fixed: false },
    ])
  })

  test("keeps different physical quantities apart", () => {
    expect(groupQuantities([q(200, "g"), q(1, "cup"), q(50, "g")], converter)).toEqual([
      q(250, "g"),
      q(1, "cup"),
    ])
  })

  test("unitless values and unknown units have their own slots", () => {
    expect(groupQuantities([q(2, null), q(1, "pinch"), q(3, null), q(2, "pinch")], converter)).toEqual([
      q(5, null),
      q(3, "pinch"),
    ])
  })

  test("text values are kept apart in order", () => {
    const some: Quantity = { value: textValue("some"), unit: null, fixed: false }
    expect(groupQuantities([some, q(1, null)], converter)).toEqual([q(1, null), some])
  })

  test("a slot stays fixed only if every quantity is", () => {
    expect(groupQuantities([q(1, "tsp", true), q(1, "tsp", true)], converter)).toEqual([q(2, "tsp", true)])
    expect(groupQuantities([q(1, "tsp", true), q(1, "tsp")], converter)).toEqual([q(2, "tsp")])
  })

  test("imperial fractions are added exactly", () => {
    const half: Quantity = { value: { type: "number", value: fraction(0, 1, 2) }, unit: "cup", fixed: false }
    const [sum] = groupQuantities([half, half], converter)
    expect(sum?.value).toEqual({ type: "number", value: regular(1) })
  })
})
