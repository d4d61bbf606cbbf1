import { describe, expect, test } from "vitest"
import { bundledConverter, bundledUnitsFile } from "../src/convert/bundled"
import { ConversionError, Converter, ConverterBuilder, unitName } from "../src/convert/converter"
import type { UnitsFileInput } from "../src/convert/units-file"
import { UnitsFileError, parseUnitsFile } from "../src/convert/units-file"
import { regular } from "../src/quantity/number"
import { formatQuantity, numberValue, textValue } from "../src/quantity/value"
import type { Quantity } from "../src/types"

const converter = bundledConverter()

function q(value: number, unit: string | null): Quantity {
  return { value: numberValue(value), unit, fixed: false }
}

function conversionError(fn: () => unknown): ConversionError {
  try {
    fn()
  } catch (err) {
    if (err instanceof ConversionError) return err
    throw err
  }
  throw new Error("expected a ConversionError")
}

describe("unit lookup", () => {
  test("finds units by name, symbol and alias", () => {
    expect(converter.findUnit("grams")?.symbols[0]).toBe("g")
    expect(converter.findUnit("tbs")?.names[0]).toBe("tablespoon")
    expect(converter.findUnit(" cup ")?.names[0]).toBe("cup")
  })

  test("names match in any case, symbols exactly", () => {
    expect(converter.findUnit("Cups")?.names[0]).toBe("cup")
    expect(converter.findUnit("G")).toBeNull()
  })

  test("short aliases match only in their own case", () => {
    expect(converter.findUnit("T")?.names[0]).toBe("tablespoon")
    expect(converter.findUnit("t")).toBeNull()
    expect(converter.findUnit("TBS")?.names[0]).toBe("tablespoon")
  })

  test("SI prefixes expand names and symbols", () => {
    const kg = converter.findUnit("kg")
    expect(kg?.names).toContain("kilogram")
    expect(kg?.ratio).toBe(1000)
    expect(kg?.system).toBe("metric")
    expect(converter.findUnit("millilitres")?.symbols).toEqual(["ml", "mL"])
  })

  test("unit names prefer a symbol", () => {
    const unit = converter.findUnit("teaspoons")
    expect(unit && unitName(unit)).toBe("tsp")
  })

  test("the empty converter knows nothing", () => {
    const empty = Converter.empty()
    expect(empty.isEmpty()).toBe(true)
    expect(empty.findUnit("g")).toBeNull()
    expect(converter.isEmpty()).toBe(false)
  })
})

describe("convert", () => {
  test("to a named unit", () => {
    expect(converter.convert(q(1, "kg"), "g")).toEqual({
      value: numberValue(1000),
      unit: "g",
      fixed: false,
      physicalQuantity: "mass",
    })
  })

  test("temperatures use the offset", () => {
    expect(formatQuantity(converter.convert(q(100, "°C"), "°F"))).toBe("212 °F")
    expect(formatQuantity(converter.convert(q(212, "F"), "celsius"))).toBe("100 °C")
  })

  test("imperial units use fractions", () => {
    const result = converter.convert(q(2, "tsp"), "tbsp")
    expect(result.value).toMatchObject({ type: "number", value: { type: "fraction", whole: 0, num: 2, den: 3 } })
    expect(formatQuantity(result)).toBe("2/3 tbsp")
  })

  test("to a system picks its best unit", () => {
    expect(formatQuantity(converter.convert(q(1, "cup"), "metric"))).toBe("236.588 ml")
    expect(formatQuantity(converter.convert(q(2, "kg"), "imperial"))).toBe("4 1/3 lb")
  })

  test("fit moves to the largest unit with a value of at least 1", () => {
    expect(converter.convert(q(1000, "g"), "fit")).toMatchObject({ value: numberValue(1), unit: "kg" })
    expect(converter.convert(q(750, "g"), "fit")).toMatchObject({ value: numberValue(750), unit: "g" })
    expect(converter.convert(q(90, "min"), "fit")).toMatchObject({ unit: "h", value: numberValue(1.5) })
  })

  test("fit keeps unknown units and text values", () => {
    const unknown = q(2, "smidge")
    expect(converter.fit(unknown)).toBe(unknown)
    const text: Quantity = { value: textValue("some"), unit: "g", fixed: false }
    expect(converter.fit(text)).toBe(text)
  })

  test("fit stays in the unit's system unless told otherwise", () => {
    expect(converter.fit(q(32, "oz"))).toMatchObject({ unit: "lb", value: { type: "number", value: regular(2) } })
    expect(converter.fit(q(0.5, "kg"))).toMatchObject({ unit: "g", value: numberValue(500) })
    expect(converter.fit(q(0.5, "kg"), { bestUnits: "any" }).unit).toBe("lb")
  })

  test("errors", () => {
    expect(conversionError(() => converter.convert(q(1, "g"), "cup"))).toMatchObject({
      kind: "incompatibleUnits",
      message: "Incompatible units: 'g' is mass and 'cup' is volume",
    })
    expect(conversionError(() => converter.convert(q(1, "g"), "smidge")).kind).toBe("unknownUnit")
    expect(conversionError(() => converter.convert(q(1, null), "g")).kind).toBe("missingUnit")
    expect(
      conversionError(() => converter.convert({ value: textValue("a bit"), unit: "g", fixed: false }, "kg")).message,
    ).toBe("Cannot convert the text value 'a bit'")
  })
})

describe("ConverterBuilder", () => {
  const base: UnitsFileInput = {
    si: {
      prefixes: { kilo: ["kilo"], hecto: [], deca: [], deci: [], centi: [], milli: ["milli"] },
      symbol_prefixes: { kilo: ["k"], hecto: [], deca: [], deci: [], centi: [], milli: ["m"] },
    },
    quantity: [
      {
        quantity: "mass",
        best: { metric: ["g", "kg"], imperial: ["oz"] },
        units: {
          metric: [{ names: ["gram"], symbols: ["g"], ratio: 1, expand_si: true }],
          imperial: [{ names: ["ounce"], symbols: ["oz"], ratio: 28.349523125 }],
        },
      },
    ],
  }

  test("builds a converter from a single file", () => {
    const built = new ConverterBuilder().add(base).finish()
    expect(built.size).toBe(4)
    expect(built.findUnit("milligram")?.ratio).toBe(0.001)
    expect(built.bestUnits("mass", "metric").map(unitName)).toEqual(["g", "kg"])
    expect(built.bestUnits("mass", null).map(unitName)).toEqual(["g", "oz", "kg"])
  })

  test("later layers extend units of earlier ones", () => {
    const built = new ConverterBuilder()
      .add(base)
      .add({ extend: { units: { ounce: { aliases: ["onzas"] }, kg: { aliases: ["kilo"] } } } })
      .finish()
    expect(built.findUnit("onzas")?.names).toEqual(["ounce"])
    expect(built.findUnit("kilo")?.symbols).toEqual(["kg"])
  })

  test("extending with override replaces lists", () => {
    const built = new ConverterBuilder()
      .add(base)
      .add({ extend: { precedence: "override", units: { oz: { names: ["onza"], ratio: 28 } } } })
      .finish()
    expect(built.findUnit("onza")?.ratio).toBe(28)
    expect(built.findUnit("ounce")).toBeNull()
  })

  test("generated units only take aliases", () => {
    const builder = new ConverterBuilder().add(base).add({ extend: { units: { kg: { ratio: 999 } } } })
    expect(() => builder.finish()).toThrow("Only aliases can be set on the generated unit 'kg'")
  })

  test("extending an unknown unit fails", () => {
    const builder = new ConverterBuilder().add(base).add({ extend: { units: { stone: { aliases: ["st"] } } } })
    expect(() => builder.finish()).toThrow("Cannot extend unknown unit 'stone'")
  })

  test("duplicate keys fail", () => {
    const builder = new ConverterBuilder()
      .add(base)
      .add({ quantity: [{ quantity: "mass", units: [{ names: ["gramo"], symbols: ["g"], ratio: 1 }] }] })
    expect(() => builder.finish()).toThrow("Duplicate unit: 'g'")
  })

  test("best units must exist and match the quantity", () => {
    const unknown = new ConverterBuilder().add({
      quantity: [{ quantity: "mass", best: ["g"], units: [{ names: ["ounce"], symbols: ["oz"], ratio: 28 }] }],
    })
    expect(() => unknown.finish()).toThrow("Unknown best unit 'g' for mass")

    const wrongQuantity = new ConverterBuilder()
      .add(base)
      .add({ quantity: [{ quantity: "volume", best: ["g"], units: [{ names: ["liter"], symbols: ["l"], ratio: 1 }] }] })
    expect(() => wrongQuantity.finish()).toThrow("Best unit 'g' is mass, not volume")
  })

  test("SI expansion needs prefixes", () => {
    const builder = new ConverterBuilder().add({
      quantity: [{ quantity: "mass", units: [{ names: ["gram"], symbols: ["g"], ratio: 1, expand_si: true }] }],
    })
    expect(() => builder.finish()).toThrow(UnitsFileError)
  })

  test("fraction settings layer from all to a single unit", () => {
    const built = new ConverterBuilder()
      .add(base)
      .add({
        fractions: {
          all: { enabled: true, max_denominator: 8 },
          metric: false,
          unit: { kg: { enabled: true, accuracy: 2, max_denominator: 64 } },
        },
      })
      .finish()
    const config = (text: string) => {
      const unit = built.findUnit(text)
      return unit && built.fractionsFor(unit)
    }
    expect(config("oz")).toMatchObject({ enabled: true, maxDenominator: 8, accuracy: 0.05 })
    expect(config("g")).toMatchObject({ enabled: false, maxDenominator: 8 })
    expect(config("kg")).toMatchObject({ enabled: true, maxDenominator: 16, accuracy: 1 })
  })

  test("fractions for unknown units fail", () => {
    const builder = new ConverterBuilder().add(base).add({ fractions: { unit: { stone: true } } })
    expect(() => builder.finish()).toThrow("Fractions configured for unknown unit 'stone'")
  })
})

describe("units file", () => {
  test("fills in defaults", () => {
    const file = parseUnitsFile({ quantity: [{ quantity: "time", units: [{ names: ["second"], symbols: ["s"], ratio: 1 }] }] })
    expect(file.quantity[0]?.units).toEqual([
      { names: ["second"], symbols: ["s"], aliases: [], ratio: 1, difference: 0, expand_si: false },
    ])
  })

  test("rejects invalid files with every issue", () => {
    expect(() => parseUnitsFile({ default_system: "nautical" })).toThrow(UnitsFileError)
    let error: unknown
    try {
      parseUnitsFile({ default_system: "nautical", unknown: 1 })
    } catch (err) {
      error = err
    }
    const issues = error instanceof UnitsFileError ? error.issues : []
    expect(issues).toHaveLength(2)
    expect(issues[0]).toMatch(/^default_system: /)
  })

  test("the bundled table validates and builds", () => {
    expect(bundledUnitsFile().default_system).toBe("metric")
    expect(converter.findUnit("tablespoon")?.system).toBe("imperial")
    expect(converter.bestUnits("time", null).map(unitName)).toEqual(["s", "min", "h", "d"])
  })

  test("fractions of the bundled table", () => {
    expect(converter.convert(q(0.75, "cup"), "cup").value).toMatchObject({
      type: "number",
      value: { type: "fraction", whole: 0, num: 3, den: 4 },
    })
    expect(converter.convert(q(1.5, "kg"), "kg").value).toEqual(numberValue(1.5))
  })
})
