import { componentList } from "./analysis/ingredient-list"
import { bundledConverter } from "./convert/bundled"
import type { BestUnitsMode, Converter } from "./convert/converter"
import { scaleValue } from "./quantity/value"
import { SourceReport } from "./report"
import type {
  Cookware,
  Ingredient,
  ListEntry,
  Quantity,
  ScalableRecipe,
  ScaledListEntry,
  ScaledRecipe,
  ScaleOutcome,
  ScaleTarget,
} from "./types"

export interface ScaleOptions {
  /** Unit table used to fit and regroup quantities, the bundled one by default */
  converter?: Converter
  /** Move every scaled quantity to its best unit */
  fit?: boolean
  bestUnits?: BestUnitsMode
}

type FactorResult = { ok: true; factor: number } | { ok: false; factor: number; reason: string }

function resolveFactor(recipe: ScalableRecipe, target: ScaleTarget): FactorResult {
  let factor: number
  if (target.type === "factor") {
    factor = target.factor
  } else {
    const declared = recipe.metadata.special.servings
    if (declared === undefined) {
      return { ok: false, factor: Number.NaN, reason: "The recipe does not declare its servings" }
    }
    factor = target.servings / declared
  }
  if (!Number.isFinite(factor) || factor <= 0) {
    return { ok: false, factor, reason: `Invalid scaling factor: ${factor}` }
  }
  return { ok: true, factor }
}

interface Scaled<T> {
  items: T[]
  outcomes: ScaleOutcome[]
}

function scaleComponents<T extends Ingredient | Cookware>(
  items: readonly T[],
  scale: (quantity: Quantity) => { quantity: Quantity; outcome: ScaleOutcome },
): Scaled<T> {
  const scaled: Scaled<T> = { items: [], outcomes: [] }
  for (const item of items) {
    if (!item.quantity) {
      scaled.items.push({ ...item })
      scaled.outcomes.push({ type: "noQuantity" })
      continue
    }
    const { quantity, outcome } = scale(item.quantity)
    scaled.items.push({ ...item, quantity })
    scaled.outcomes.push(outcome)
  }
  return scaled
}

const OUTCOME_RANK: Record<ScaleOutcome["type"], number> = { noQuantity: 0, fixed: 1, scaled: 2, error: 3 }

function withOutcomes(list: ListEntry[], members: (index: number) => number[], outcomes: ScaleOutcome[]): ScaledListEntry[] {
  return list.map(entry => {
    let outcome: ScaleOutcome["type"] = "noQuantity"
    for (const member of members(entry.index)) {
      const type = outcomes[member]?.type ?? "noQuantity"
      if (OUTCOME_RANK[type] > OUTCOME_RANK[outcome]) outcome = type
    }
    return { ...entry, outcome }
  })
}

function membersOf(items: readonly (Ingredient | Cookware)[]) {
  return (index: number): number[] => {
    const relation = items[index]?.relation
    return relation?.type === "definition" ? [index, ...relation.referencedFrom] : [index]
  }
}

/**
 * Scale a recipe to a factor or to a number of servings.
 *
 * Every quantity gets an outcome; failures are outcomes too, the recipe is
 * always returned. Cookware and timers keep their quantities. The input is
 * not modified.
 */
export function scaleRecipe(recipe: ScalableRecipe, target: ScaleTarget, options: ScaleOptions = {}): ScaledRecipe {
  const converter = options.converter ?? bundledConverter()
  const factor = resolveFactor(recipe, target)

  const scaleQuantity = (quantity: Quantity): { quantity: Quantity; outcome: ScaleOutcome } => {
    if (quantity.fixed) return { quantity, outcome: { type: "fixed" } }
    if (!factor.ok) return { quantity, outcome: { type: "error", reason: factor.reason } }
    const result = scaleValue(quantity.value, factor.factor)
    if (!result.ok) return { quantity, outcome: { type: "error", reason: result.reason } }
    let scaled: Quantity = { ...quantity, value: result.value }
    if (options.fit) scaled = converter.fit(scaled, { bestUnits: options.bestUnits })
    return { quantity: scaled, outcome: { type: "scaled" } }
  }

  const ingredients = scaleComponents(recipe.ingredients, scaleQuantity)
  const cookware = scaleComponents(recipe.cookware, quantity => ({ quantity, outcome: { type: "fixed" } }))

  return {
    ...recipe,
    ingredients: ingredients.items,
    cookware: cookware.items,
    timers: recipe.timers.map(timer => ({ ...timer })),
    ingredientList: withOutcomes(
      componentList(ingredients.items, converter),
      membersOf(ingredients.items),
      ingredients.outcomes,
    ),
    cookwareList: withOutcomes(componentList(cookware.items, converter), membersOf(cookware.items), cookware.outcomes),
    scaling: {
      target,
      factor: factor.factor,
      ingredients: ingredients.outcomes,
      cookware: cookware.outcomes,
      timers: recipe.timers.map((): ScaleOutcome => ({ type: "fixed" })),
    },
  }
}

/** Scaling errors as warnings located at their ingredients */
export function scalingReport(recipe: ScaledRecipe): SourceReport {
  const report = new SourceReport()
  recipe.scaling.ingredients.forEach((outcome, index) => {
    const ingredient = recipe.ingredients[index]
    if (outcome.type !== "error" || !ingredient) return
    report.warning("scale", `Cannot scale '${ingredient.name}': ${outcome.reason}`, ingredient.span, {
      labels: [{ span: ingredient.span }],
    })
  })
  return report
}
