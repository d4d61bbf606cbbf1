import type { Located, RecipeModifiers, Span, Value } from "../types"

export type ComponentKind = "ingredient" | "cookware" | "timer"

/**
 * Quantity as written inside a component's braces
 */
export interface QuantityNode {
  value: Value
  /** Value text as written, before parsing */
  rawValue: string
  /** Unit text, `""` when the separator has nothing after it */
  unit: Located<string> | null
  fixed: boolean
  span: Span
}

/**
 * `&(N)` step N of the current section, `&(~N)` the Nth previous step,
 * `&(=N)` section N
 */
export interface IntermediateRef {
  kind: "step" | "relativeStep" | "section"
  value: number
  span: Span
}

export interface ComponentNode {
  kind: ComponentKind
  name: Located<string> | null
  alias: Located<string> | null
  modifiers: RecipeModifiers
  modifiersSpan: Span | null
  intermediate: IntermediateRef | null
  quantity: QuantityNode | null
  note: Located<string> | null
}

export interface MetadataEvent {
  type: "metadata"
  key: Located<string>
  value: Located<string>
  span: Span
}

export interface SectionEvent {
  type: "section"
  name: Located<string> | null
  span: Span
}

export interface StepBoundaryEvent {
  type: "startStep" | "endStep"
  isText: boolean
  span: Span
}

export interface TextEvent {
  type: "text"
  value: string
  span: Span
}

export interface ComponentEvent {
  type: ComponentKind
  component: ComponentNode
  /** Source text of the whole component */
  raw: string
  span: Span
}

export type ParseEvent = MetadataEvent | SectionEvent | StepBoundaryEvent | TextEvent | ComponentEvent
