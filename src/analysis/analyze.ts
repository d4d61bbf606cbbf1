import { bundledConverter } from "../convert/bundled"
import type { Converter } from "../convert/converter"
import { toBase } from "../convert/converter"
import type { ComponentEvent, ComponentKind, ComponentNode, IntermediateRef, MetadataEvent, ParseEvent } from "../parser/events"
import { resolveExtensions } from "../parser/extensions"
import { SourceReport } from "../report"
import { magnitude } from "../quantity/value"
import type {
  Cookware,
  Extensions,
  ExtensionsOption,
  Ingredient,
  IngredientRelation,
  MetadataValidator,
  Quantity,
  RecipeRefChecker,
  ScalableRecipe,
  Section,
  Span,
  StepItem,
  TimePrecedence,
  Timer,
} from "../types"
import { componentList } from "./ingredient-list"
import { extractInlineQuantities } from "./inline-quantities"
import { MetadataCollector } from "./metadata"

export interface AnalyzeOptions {
  extensions?: ExtensionsOption
  /** Unit table, the bundled one by default */
  converter?: Converter
  checkMetadata?: MetadataValidator
  checkRecipeRef?: RecipeRefChecker
  /** Which declared time wins when both a total and a composed time exist */
  timePrecedence?: TimePrecedence
}

export interface AnalysisResult {
  recipe: ScalableRecipe
  report: SourceReport
}

/**
 * How step blocks are read: `all` as steps, `components` as definitions
 * only, `steps` as steps whose components reference earlier definitions,
 * `text` as plain text.
 */
export type DefineMode = "all" | "components" | "steps" | "text"

export type DuplicateMode = "new" | "reference"

const DEFINE_MODES: Record<string, DefineMode> = {
  all: "all",
  default: "all",
  components: "components",
  ingredients: "components",
  steps: "steps",
  text: "text",
}

const DUPLICATE_MODES: Record<string, DuplicateMode> = {
  new: "new",
  reference: "reference",
  default: "reference",
  ref: "reference",
}

function normalizeName(name: string): string {
  return name.trim().replace(/\s+/g, " ").toLowerCase()
}

interface PendingIntermediate {
  ingredient: number
  ref: IntermediateRef
  section: number
  step: number
}

type Component = Ingredient | Cookware

/** Components of one kind with their lookup index by normalized name and alias */
class ComponentTable<T extends Component> {
  readonly items: T[] = []
  private readonly byName = new Map<string, number>()

  find(node: ComponentNode): number | undefined {
    const name = node.name ? normalizeName(node.name.value) : ""
    const alias = node.alias ? normalizeName(node.alias.value) : null
    return this.byName.get(name) ?? (alias === null ? undefined : this.byName.get(alias))
  }

  push(item: T): number {
    this.items.push(item)
    return this.items.length - 1
  }

  define(index: number): void {
    const item = this.items[index]
    if (!item) return
    this.byName.set(normalizeName(item.name), index)
    if (item.alias) this.byName.set(normalizeName(item.alias), index)
  }

  linkReference(reference: number, definition: number): void {
    const target = this.items[definition]
    if (target?.relation.type === "definition") target.relation.referencedFrom.push(reference)
  }
}

interface OpenBlock {
  isText: boolean
  items: StepItem[]
  ignoredText: Span | null
}

class Analyzer {
  private readonly report = new SourceReport()
  private readonly converter: Converter
  private readonly extensions: Extensions
  private readonly metadata: MetadataCollector

  private readonly sections: Section[] = [{ name: null, content: [] }]
  /** Content index of every step, per section */
  private readonly stepIndices: number[][] = [[]]
  private readonly ingredients = new ComponentTable<Ingredient>()
  private readonly cookware = new ComponentTable<Cookware>()
  private readonly timers: Timer[] = []
  private readonly inlineQuantities: Quantity[] = []
  private readonly intermediates: PendingIntermediate[] = []

  private defineMode: DefineMode = "all"
  private duplicateMode: DuplicateMode = "reference"
  private block: OpenBlock | null = null

  constructor(private readonly options: AnalyzeOptions) {
    this.converter = options.converter ?? bundledConverter()
    this.extensions = resolveExtensions(options.extensions)
    this.metadata = new MetadataCollector(this.report, this.converter, options.checkMetadata)
  }

  run(events: Iterable<ParseEvent>): AnalysisResult {
    for (const event of events) this.event(event)
    this.closeBlock()
    this.resolveIntermediates()

    const recipe: ScalableRecipe = {
      metadata: this.metadata.finish(this.options.timePrecedence ?? "total", this.timerMinutes()),
      sections: this.sections.filter(isVisible),
      ingredients: this.ingredients.items,
      cookware: this.cookware.items,
      timers: this.timers,
      inlineQuantities: this.inlineQuantities,
      ingredientList: componentList(this.ingredients.items, this.converter),
      cookwareList: componentList(this.cookware.items, this.converter),
    }
    return { recipe, report: this.report }
  }

  private get sectionIndex(): number {
    return this.sections.length - 1
  }

  private event(event: ParseEvent): void {
    switch (event.type) {
      case "metadata":
        this.metadataEntry(event)
        return
      case "section":
        this.closeBlock()
        this.section(event.name?.value ?? null)
        return
      case "startStep":
        this.closeBlock()
        this.block = { isText: event.isText || this.defineMode === "text", items: [], ignoredText: null }
        return
      case "endStep":
        this.closeBlock()
        return
      case "text":
        this.text(event.value, event.span)
        return
      case "ingredient":
      case "cookware":
      case "timer":
        this.component(event)
    }
  }

  private metadataEntry(event: MetadataEvent): void {
    const key = event.key.value.trim().toLowerCase()
    if (!this.extensions.modes || !key.startsWith("[") || !key.endsWith("]")) {
      this.metadata.add(event)
      return
    }

    const value = event.value.value.trim().toLowerCase()
    if (key === "[mode]" || key === "[define]") {
      const mode = DEFINE_MODES[value]
      if (mode) this.defineMode = mode
      else this.invalidConfig(event, "all, components, steps, text")
    } else if (key === "[duplicate]") {
      const mode = DUPLICATE_MODES[value]
      if (mode) this.duplicateMode = mode
      else this.invalidConfig(event, "new, reference")
    } else {
      this.report.warning("analysis", `Unknown config key: '${event.key.value}'`, event.key.span, {
        help: "Known keys are [mode], [define] and [duplicate]",
      })
    }
  }

  private invalidConfig(event: MetadataEvent, expected: string): void {
    this.report.warning("analysis", `Invalid value for config key '${event.key.value}': '${event.value.value}'`, event.value.span, {
      labels: [{ span: event.value.span, message: `expected one of: ${expected}` }],
    })
  }

  private section(name: string | null): void {
    const current = this.sections[this.sectionIndex]
    if (current && this.sections.length === 1 && current.name === null && current.content.length === 0) {
      current.name = name
      return
    }
    this.sections.push({ name, content: [] })
    this.stepIndices.push([])
  }

  private text(value: string, span: Span): void {
    const block = this.block
    if (!block) return
    if (!block.isText && this.defineMode === "components") {
      if (value.trim()) block.ignoredText ??= span
      return
    }
    const last = block.items[block.items.length - 1]
    if (last?.type === "text") last.value += value
    else block.items.push({ type: "text", value })
  }

  private closeBlock(): void {
    const block = this.block
    this.block = null
    if (!block) return

    const section = this.sections[this.sectionIndex]
    if (!section) return

    if (block.isText) {
      const value = block.items.map(item => (item.type === "text" ? item.value : "")).join("").trim()
      if (value) section.content.push({ type: "text", value })
      return
    }

    if (this.defineMode === "components") {
      if (block.ignoredText) {
        this.report.warning("analysis", "Ignoring text in components mode", block.ignoredText, {
          help: "Only component definitions are read in this mode",
        })
      }
      return
    }

    if (block.items.length === 0) return
    const items = this.extensions.inlineQuantities
      ? block.items.flatMap(item =>
          item.type === "text" ? extractInlineQuantities(item.value, this.converter, this.inlineQuantities) : [item],
        )
      : block.items

    const steps = this.stepIndices[this.sectionIndex]
    steps?.push(section.content.length)
    section.content.push({ type: "step", number: steps?.length ?? 1, items })
  }

  /** Number the open step will get in its section */
  private get currentStepNumber(): number {
    return (this.stepIndices[this.sectionIndex]?.length ?? 0) + 1
  }

  private component(event: ComponentEvent): void {
    const block = this.block
    if (!block) return

    if (block.isText) {
      if (this.defineMode === "text") {
        this.report.warning("analysis", `Ignoring ${event.type} in text mode`, event.span, {
          help: "Components are plain text in this mode",
        })
      }
      this.text(event.raw, event.span)
      return
    }

    const item = this.componentItem(event)
    if (item && this.defineMode !== "components") block.items.push(item)
  }

  private componentItem(event: ComponentEvent): StepItem | null {
    const node = event.component
    switch (event.type) {
      case "ingredient":
        return { type: "ingredient", index: this.ingredient(node, event.span) }
      case "cookware":
        return { type: "cookware", index: this.cookwareItem(node, event.span) }
      case "timer": {
        const quantity = node.quantity ? this.quantity(node, "timer") : null
        if (!quantity) return null
        this.timers.push({ name: node.name?.value ?? null, quantity, span: event.span })
        return { type: "timer", index: this.timers.length - 1 }
      }
    }
  }

  private ingredient(node: ComponentNode, span: Span): number {
    const name = node.name?.value ?? ""
    if (node.modifiers.recipe) this.checkRecipeRef(name, node.name?.span ?? span)

    const index = this.ingredients.push({
      name,
      alias: node.alias?.value ?? null,
      quantity: node.quantity ? this.quantity(node, "ingredient") : null,
      note: node.note?.value ?? null,
      modifiers: { ...node.modifiers },
      relation: this.definition(),
      span,
    })

    if (node.intermediate) {
      this.intermediates.push({
        ingredient: index,
        ref: node.intermediate,
        section: this.sectionIndex,
        step: this.currentStepNumber,
      })
      return index
    }

    this.relate(this.ingredients, node, index, span)
    return index
  }

  private cookwareItem(node: ComponentNode, span: Span): number {
    const index = this.cookware.push({
      name: node.name?.value ?? "",
      alias: node.alias?.value ?? null,
      quantity: node.quantity ? this.quantity(node, "cookware") : null,
      note: node.note?.value ?? null,
      modifiers: { ...node.modifiers },
      relation: this.definition(),
      span,
    })
    this.relate(this.cookware, node, index, span)
    return index
  }

  private definition(): IngredientRelation {
    return { type: "definition", referencedFrom: [], definedInStep: this.defineMode !== "components" }
  }

  /** Turn a new component into a reference to an earlier definition when it is one */
  private relate<T extends Component>(table: ComponentTable<T>, node: ComponentNode, index: number, span: Span): void {
    const existing = table.find(node)
    const name = node.name?.value ?? ""

    if (node.modifiers.new) {
      table.define(index)
      return
    }

    if (node.modifiers.reference || this.defineMode === "steps") {
      if (existing === undefined) {
        this.report.error("analysis", `Reference not found: ${name}`, node.name?.span ?? span, {
          labels: [{ span, message: "this needs an earlier definition" }],
          help: "Define it before referencing it, or remove the reference",
        })
        table.define(index)
        return
      }
      this.makeReference(table, index, existing)
      return
    }

    if (existing !== undefined && this.duplicateMode === "reference") {
      this.makeReference(table, index, existing)
      return
    }
    table.define(index)
  }

  private makeReference<T extends Component>(table: ComponentTable<T>, index: number, definition: number): void {
    const item = table.items[index]
    if (!item) return
    item.relation = { type: "reference", referencesTo: definition, referenceTarget: "ingredient" }
    table.linkReference(index, definition)
  }

  private checkRecipeRef(name: string, span: Span): void {
    const check = this.options.checkRecipeRef?.(name)
    if (!check || check.type === "found") return
    if (check.type === "notFound") {
      this.report.warning("analysis", check.message ?? `Referenced recipe not found: '${name}'`, span, {
        labels: [{ span, message: "this recipe" }],
        help: check.help,
      })
      return
    }
    this.report.warning("analysis", check.message ?? `Ambiguous recipe reference: '${name}'`, span, {
      labels: [{ span, message: "matches more than one recipe" }],
      help: check.help ?? `Candidates: ${check.candidates.join(", ")}`,
    })
  }

  private quantity(node: ComponentNode, kind: ComponentKind): Quantity | null {
    const syntax = node.quantity
    if (!syntax) return null
    const quantity: Quantity = { value: syntax.value, unit: null, fixed: syntax.fixed }

    const unit = syntax.unit
    if (unit === null) return quantity
    if (unit.value === "") {
      this.report.warning("analysis", "Empty unit", unit.span, {
        labels: [{ span: syntax.span, message: "'%' with no unit after it" }],
        help: "Remove the '%' or write a unit after it",
      })
      return quantity
    }

    quantity.unit = unit.value
    const known = this.converter.findUnit(unit.value)
    if (!known) {
      if (!this.converter.isEmpty()) {
        this.report.warning("analysis", `Unknown unit: '${unit.value}'`, unit.span, {
          labels: [{ span: unit.span }],
          help: "It is kept as written but it cannot be converted",
        })
      }
      return quantity
    }

    quantity.physicalQuantity = known.physicalQuantity
    if (kind === "timer" && known.physicalQuantity !== "time") {
      this.report.warning("analysis", `Timer unit is not a time unit: '${unit.value}'`, unit.span, {
        labels: [{ span: unit.span, message: `this is ${known.physicalQuantity}` }],
      })
    }
    return quantity
  }

  private resolveIntermediates(): void {
    for (const pending of this.intermediates) {
      const ingredient = this.ingredients.items[pending.ingredient]
      if (!ingredient) continue
      const { ref } = pending

      if (ref.kind === "section") {
        // numbered the way the returned recipe lists them, without empty unnamed sections
        const visible = this.sections.filter(isVisible).length
        const earlier = this.sections.slice(0, pending.section).filter(isVisible).length
        const target = ref.value - 1
        if (ref.value < 1 || ref.value > visible) {
          this.intermediateError(`Reference to section ${ref.value} is out of range`, ref, `The recipe has ${visible} sections`)
        } else if (target >= earlier) {
          this.intermediateError(`Reference to section ${ref.value} must point to an earlier section`, ref, "Only earlier sections can be referenced")
        } else {
          ingredient.relation = { type: "reference", referencesTo: target, referenceTarget: "section" }
        }
        continue
      }

      const steps = this.stepIndices[pending.section] ?? []
      const number = ref.kind === "step" ? ref.value : pending.step - ref.value
      const shown = ref.kind === "step" ? `step ${ref.value}` : `step ${ref.value} back`
      const content = steps[number - 1]
      if (number < 1 || content === undefined) {
        this.intermediateError(`Reference to ${shown} is out of range`, ref, `The section has ${steps.length} steps`)
      } else if (number >= pending.step) {
        this.intermediateError(`Reference to ${shown} must point to an earlier step`, ref, "Only earlier steps can be referenced")
      } else {
        ingredient.relation = { type: "reference", referencesTo: content, referenceTarget: "step" }
      }
    }
  }

  private intermediateError(message: string, ref: IntermediateRef, help: string): void {
    this.report.error("analysis", message, ref.span, { labels: [{ span: ref.span }], help })
  }

  /** Minutes of every timer with a time unit, null when there are none */
  private timerMinutes(): number | null {
    let seconds: number | null = null
    for (const timer of this.timers) {
      const unit = timer.quantity.unit === null ? null : this.converter.findUnit(timer.quantity.unit)
      const value = magnitude(timer.quantity.value)
      if (!unit || unit.physicalQuantity !== "time" || value === null) continue
      seconds = (seconds ?? 0) + toBase(value, unit)
    }
    return seconds === null ? null : seconds / 60
  }
}

function isVisible(section: Section): boolean {
  return section.name !== null || section.content.length > 0
}

/**
 * Build the recipe model from parse events.
 *
 * Never throws on recipe content: problems are diagnostics on the returned
 * report.
 */
export function analyze(events: Iterable<ParseEvent>, options: AnalyzeOptions = {}): AnalysisResult {
  return new Analyzer(options).run(events)
}
