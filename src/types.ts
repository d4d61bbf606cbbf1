/**
 * Shared type definitions for the recipe engine
 */

/**
 * Character range in the original source, end exclusive
 */
export interface Span {
  start: number
  end: number
}

/**
 * A value together with the source range it came from
 */
export interface Located<T> {
  value: T
  span: Span
}

/**
 * Source position in the original text (1-based line and column)
 */
export interface SourcePosition {
  line: number
  column: number
  offset: number
}

// ---------------------------------------------------------------------------
// Diagnostics
// ---------------------------------------------------------------------------

export type Severity = "error" | "warning"

export type DiagnosticStage = "parser" | "analysis" | "scale"

export interface DiagnosticLabel {
  span: Span
  message?: string
}

/**
 * An error or warning with location information
 */
export interface Diagnostic {
  severity: Severity
  message: string
  span: Span
  labels: DiagnosticLabel[]
  help?: string
  stage: DiagnosticStage
}

// ---------------------------------------------------------------------------
// Values & quantities
// ---------------------------------------------------------------------------

export interface RegularNumber {
  type: "regular"
  value: number
}

/**
 * `whole + num / den`, `err` is the distance to the value it approximates
 */
export interface FractionNumber {
  type: "fraction"
  whole: number
  num: number
  den: number
  err: number
}

export type RecipeNumber = RegularNumber | FractionNumber

export type Value =
  | { type: "number"; value: RecipeNumber }
  | { type: "range"; start: RecipeNumber; end: RecipeNumber }
  | { type: "text"; value: string }

export type System = "metric" | "imperial"

export type PhysicalQuantity = "volume" | "mass" | "length" | "temperature" | "time"

/**
 * A value with an optional unit
 *
 * `unit` is the text written in the recipe. When the converter knows it,
 * `physicalQuantity` is filled in by the analyzer.
 */
export interface Quantity {
  value: Value
  unit: string | null
  fixed: boolean
  physicalQuantity?: PhysicalQuantity
}

// ---------------------------------------------------------------------------
// Components
// ---------------------------------------------------------------------------

export interface RecipeModifiers {
  recipe?: boolean
  reference?: boolean
  hidden?: boolean
  optional?: boolean
  new?: boolean
}

export type ReferenceTarget = "ingredient" | "step" | "section"

export type IngredientRelation =
  | { type: "definition"; referencedFrom: number[]; definedInStep: boolean }
  | { type: "reference"; referencesTo: number; referenceTarget: ReferenceTarget }

export interface Ingredient {
  name: string
  alias: string | null
  quantity: Quantity | null
  note: string | null
  modifiers: RecipeModifiers
  relation: IngredientRelation
  span: Span
}

export interface Cookware {
  name: string
  alias: string | null
  quantity: Quantity | null
  note: string | null
  modifiers: RecipeModifiers
  relation: IngredientRelation
  span: Span
}

export interface Timer {
  name: string | null
  quantity: Quantity
  span: Span
}

// ---------------------------------------------------------------------------
// Sections & steps
// ---------------------------------------------------------------------------

export type StepItem =
  | { type: "text"; value: string }
  | { type: "ingredient"; index: number }
  | { type: "cookware"; index: number }
  | { type: "timer"; index: number }
  | { type: "inlineQuantity"; index: number }

export interface Step {
  type: "step"
  /** 1-indexed within its section */
  number: number
  items: StepItem[]
}

export interface TextBlock {
  type: "text"
  value: string
}

export type SectionContent = Step | TextBlock

export interface Section {
  name: string | null
  content: SectionContent[]
}

// ---------------------------------------------------------------------------
// Metadata
// ---------------------------------------------------------------------------

export interface NameAndUrl {
  name: string | null
  url: string | null
}

export type RecipeTime =
  | { type: "total"; minutes: number }
  | { type: "composed"; prepTime: number | null; cookTime: number | null }

export interface Locale {
  language: string
  country: string | null
}

/**
 * Parsed forms of recognized metadata keys
 */
export interface SpecialMetadata {
  servings?: number
  time?: RecipeTime
  prepTime?: number
  cookTime?: number
  tags?: string[]
  author?: NameAndUrl
  source?: NameAndUrl
  locale?: Locale
}

export interface Metadata {
  /** Every entry with its raw key and raw value, in source order */
  map: Map<string, string>
  special: SpecialMetadata
}

// ---------------------------------------------------------------------------
// Recipes
// ---------------------------------------------------------------------------

export interface ListEntry {
  /** Index of the definition in `ingredients` or `cookware` */
  index: number
  quantity: Quantity[]
}

export interface ScalableRecipe {
  metadata: Metadata
  sections: Section[]
  ingredients: Ingredient[]
  cookware: Cookware[]
  timers: Timer[]
  inlineQuantities: Quantity[]
  ingredientList: ListEntry[]
  cookwareList: ListEntry[]
}

export type ScaleTarget = { type: "factor"; factor: number } | { type: "servings"; servings: number }

export type ScaleOutcome =
  | { type: "scaled" }
  | { type: "fixed" }
  | { type: "noQuantity" }
  | { type: "error"; reason: string }

export interface ScaledListEntry extends ListEntry {
  outcome: ScaleOutcome["type"]
}

export interface Scaling {
  target: ScaleTarget
  factor: number
  ingredients: ScaleOutcome[]
  cookware: ScaleOutcome[]
  timers: ScaleOutcome[]
}

export interface ScaledRecipe extends Omit<ScalableRecipe, "ingredientList" | "cookwareList"> {
  ingredientList: ScaledListEntry[]
  cookwareList: ScaledListEntry[]
  scaling: Scaling
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface Extensions {
  multilineSteps: boolean
  componentModifiers: boolean
  componentNotes: boolean
  componentAliases: boolean
  advancedUnits: boolean
  intermediatePreparations: boolean
  modes: boolean
  inlineQuantities: boolean
  textSteps: boolean
}

export type ExtensionsOption = "all" | "canonical" | Partial<Extensions>

export type MetadataCheck =
  | { type: "accept" }
  | { type: "reject"; reason: string; severity?: Severity; help?: string }

export type MetadataValidator = (key: string, value: string) => MetadataCheck

export type RecipeRefCheck =
  | { type: "found" }
  | { type: "notFound"; message?: string; help?: string }
  | { type: "ambiguous"; candidates: string[]; message?: string; help?: string }

export type RecipeRefChecker = (name: string) => RecipeRefCheck

export type TimePrecedence = "total" | "composed"
