import { stringify } from "yaml"
import type {
  Cookware,
  Ingredient,
  Metadata,
  Quantity,
  RecipeModifiers,
  RecipeNumber,
  ScalableRecipe,
  Section,
  StepItem,
  Timer,
  Value,
} from "./types"

export type MetadataStyle = "lines" | "frontmatter"

export interface SerializeOptions {
  /**
   * `lines` writes `>> key: value` lines, falling back to a YAML
   * frontmatter when an entry cannot be written on one line
   */
  metadata?: MetadataStyle
}

function numberText(n: RecipeNumber): string {
  if (n.type === "regular") return String(n.value)
  if (n.num === 0) return String(n.whole)
  return n.whole === 0 ? `${n.num}/${n.den}` : `${n.whole} ${n.num}/${n.den}`
}

function valueText(value: Value): string {
  switch (value.type) {
    case "number":
      return numberText(value.value)
    case "range":
      return `${numberText(value.start)}-${numberText(value.end)}`
    case "text":
      return value.value
  }
}

function fitsOnLine(text: string): boolean {
  return text === text.trim() && !/[\n\r]|--|\[-/.test(text)
}

function canWriteLines(metadata: Metadata): boolean {
  return [...metadata.map].every(
    ([key, value]) => key !== "" && fitsOnLine(key) && !key.includes(":") && fitsOnLine(value),
  )
}

/** Metadata entries, raw keys and values kept verbatim */
export function serializeMetadata(metadata: Metadata, style: MetadataStyle = "lines"): string {
  const entries = [...metadata.map]
  if (entries.length === 0) return ""
  if (style === "lines" && canWriteLines(metadata)) {
    return entries.map(([key, value]) => (value ? `>> ${key}: ${value}` : `>> ${key}:`)).join("\n")
  }
  return `---\n${stringify(new Map(entries))}---`
}

/** Escape what the parser would read as markup */
function escapeText(text: string, atBlockStart: boolean): string {
  let escaped = text.replace(/[\\@#~]/g, ch => `\\${ch}`).replace(/--/g, "\\--").replace(/\[-/g, "\\[-")
  if (atBlockStart) escaped = escaped.replace(/^(\s*)([=>])/, "$1\\$2")
  return escaped
}

function modifierText(modifiers: RecipeModifiers): string {
  let text = ""
  if (modifiers.recipe) text += "@"
  if (modifiers.reference) text += "&"
  if (modifiers.hidden) text += "-"
  if (modifiers.optional) text += "?"
  if (modifiers.new) text += "+"
  return text
}

function quantityText(quantity: Quantity | null): string {
  if (!quantity) return ""
  const fixed = quantity.fixed ? "=" : ""
  const unit = quantity.unit === null ? "" : `%${quantity.unit}`
  return `${fixed}${valueText(quantity.value)}${unit}`
}

function isSingleWord(name: string): boolean {
  return /^[\p{L}\p{N}_]+$/u.test(name)
}

function componentText(
  marker: "@" | "#",
  component: Ingredient | Cookware,
  section: Section,
  next: StepItem | undefined,
  nextText: string,
): string {
  let modifiers = modifierText(component.modifiers)
  const { relation } = component
  if (relation.type === "reference" && relation.referenceTarget === "step") {
    const target = section.content[relation.referencesTo]
    if (target?.type === "step") modifiers = `${modifiers.replace("&", "")}&(${target.number})`
  } else if (relation.type === "reference" && relation.referenceTarget === "section") {
    modifiers = `${modifiers.replace("&", "")}&(=${relation.referencesTo + 1})`
  }

  const name = component.alias ? `${component.name}|${component.alias}` : component.name
  const note = component.note === null ? "" : `(${component.note})`
  const bare =
    component.quantity === null &&
    isSingleWord(name) &&
    (next === undefined || (next.type === "text" && /^\s/.test(nextText)))
  const body = bare ? name : `${name}{${quantityText(component.quantity)}}`
  return `${marker}${modifiers}${body}${note}`
}

function timerText(timer: Timer): string {
  return `~${timer.name ?? ""}{${quantityText({ ...timer.quantity, fixed: false })}}`
}

function stepText(recipe: ScalableRecipe, section: Section, items: StepItem[]): string {
  const texts = items.map(item => (item.type === "text" ? item.value : ""))
  return items
    .map((item, i) => {
      const next = items[i + 1]
      const nextText = texts[i + 1] ?? ""
      switch (item.type) {
        case "text":
          return escapeText(item.value, i === 0)
        case "ingredient": {
          const ingredient = recipe.ingredients[item.index]
          return ingredient ? componentText("@", ingredient, section, next, nextText) : ""
        }
        case "cookware": {
          const cookware = recipe.cookware[item.index]
          return cookware ? componentText("#", cookware, section, next, nextText) : ""
        }
        case "timer": {
          const timer = recipe.timers[item.index]
          return timer ? timerText(timer) : ""
        }
        case "inlineQuantity": {
          const quantity = recipe.inlineQuantities[item.index]
          if (!quantity) return ""
          return quantity.unit === null ? valueText(quantity.value) : `${valueText(quantity.value)} ${quantity.unit}`
        }
      }
    })
    .join("")
}

/**
 * Write a recipe back as markup. Parsing the result gives back the same
 * metadata, sections and components.
 */
export function serializeRecipe(recipe: ScalableRecipe, options: SerializeOptions = {}): string {
  const blocks: string[] = []
  const metadata = serializeMetadata(recipe.metadata, options.metadata)
  if (metadata) blocks.push(metadata)

  recipe.sections.forEach((section, i) => {
    if (section.name !== null) blocks.push(`= ${section.name}`)
    else if (i > 0) blocks.push("==")
    for (const content of section.content) {
      blocks.push(content.type === "text" ? `> ${content.value}` : stepText(recipe, section, content.items))
    }
  })

  return `${blocks.join("\n\n")}\n`
}
