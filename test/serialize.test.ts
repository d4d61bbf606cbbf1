import { describe, expect, test } from "vitest"
import { parseRecipe } from "../src/parse-recipe"
import { serializeMetadata, serializeRecipe } from "../src/serialize"

function roundTrip(source: string): string {
  return serializeRecipe(parseRecipe(source).recipe)
}

describe("serializeRecipe", () => {
  test("writes components back as they were written", () => {
    expect(roundTrip("Mix @flour{250%g} and @eggs{3}.")).toBe("Mix @flour{250%g} and @eggs{3}.\n")
  })

  test("metadata lines come first", () => {
    expect(roundTrip(">> title: Pancakes\n>> servings: 4\n\nMix.")).toBe(">> title: Pancakes\n>> servings: 4\n\nMix.\n")
  })

  test("sections", () => {
    const source = "= Dough\n\nMix @flour{200%g}.\n\n= Bake\n\nBake the @&(=1)dough{}.\n"
    expect(roundTrip(source)).toBe(source)
  })

  test("step references", () => {
    const source = "Mix @flour{200%g}.\n\nKnead @&(1)flour dough{}.\n"
    expect(roundTrip(source)).toBe(source)
  })

  test("modifiers and bare names", () => {
    const source = "Add @-?salt and @@pizza dough{1} then #+pan{}.\n"
    expect(roundTrip(source)).toBe(source)
  })

  test("notes, aliases and timers", () => {
    const source = "Melt @butter{1%tbsp}(softened) with @spring onion|onions{2} for ~{3%min} and ~rest{10%min}.\n"
    expect(roundTrip(source)).toBe(source)
  })

  test("inline quantities are written as text", () => {
    expect(roundTrip("Bake at 180 °C.")).toBe("Bake at 180 °C.\n")
  })

  test("markup symbols in text are escaped", () => {
    expect(roundTrip("Email me\\@home")).toBe("Email me\\@home\n")
  })

  test("text blocks", () => {
    expect(roundTrip("> Just some notes")).toBe("> Just some notes\n")
  })

  test("fixed quantities and ranges", () => {
    const source = "Add @salt{=1%tsp} and @eggs{2-3} and @milk{1 1/2%cups}.\n"
    expect(roundTrip(source)).toBe(source)
  })
})

describe("serializeMetadata", () => {
  test("nothing for empty metadata", () => {
    expect(serializeMetadata(parseRecipe("Mix.").recipe.metadata)).toBe("")
  })

  test("falls back to frontmatter for values that cannot be a line", () => {
    const { recipe } = parseRecipe("---\nnote: a -- b\n---\nMix.")
    expect([...recipe.metadata.map]).toEqual([["note", "a -- b"]])

    const written = serializeRecipe(recipe)
    expect(written.startsWith("---\n")).toBe(true)
    expect(written.endsWith("---\n\nMix.\n")).toBe(true)

    const reparsed = parseRecipe(written)
    expect(reparsed.report.isEmpty()).toBe(true)
    expect(reparsed.recipe.metadata.map).toEqual(recipe.metadata.map)
  })

  test("frontmatter can be asked for", () => {
    const { recipe } = parseRecipe(">> title: Soup")
    expect(serializeMetadata(recipe.metadata, "frontmatter")).toBe("---\ntitle: Soup\n---")
  })
})
