import type { SourceReport } from "../src/report"
import type { ScalableRecipe, Step } from "../src/types"

/** Every step of the recipe, in order, across sections */
export function getSteps(recipe: Pick<ScalableRecipe, "sections">): Step[] {
  return recipe.sections.flatMap(section => section.content.filter((c): c is Step => c.type === "step"))
}

export function getSectionNames(recipe: Pick<ScalableRecipe, "sections">): (string | null)[] {
  return recipe.sections.map(section => section.name)
}

export function warningMessages(report: SourceReport): string[] {
  return report.warnings().map(d => d.message)
}

export function errorMessages(report: SourceReport): string[] {
  return report.errors().map(d => d.message)
}
