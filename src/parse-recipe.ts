import type { AnalyzeOptions } from "./analysis/analyze"
import { analyze } from "./analysis/analyze"
import { EventParser } from "./parser/event-parser"
import type { SourceReport } from "./report"
import type { Metadata, ScalableRecipe } from "./types"

export type ParseRecipeOptions = AnalyzeOptions

export interface ParseRecipeResult {
  recipe: ScalableRecipe
  /** Parser diagnostics followed by analysis diagnostics */
  report: SourceReport
}

/**
 * Parse recipe markup into a scalable recipe.
 *
 * @example
 * ```ts
 * const { recipe, report } = parseRecipe(">> servings: 2\nMix @flour{200%g} with @water{1%cup}.")
 * recipe.ingredients.map(i => i.name) // ["flour", "water"]
 * report.isEmpty() // true
 * ```
 */
export function parseRecipe(source: string, options: ParseRecipeOptions = {}): ParseRecipeResult {
  const parser = new EventParser(source, { extensions: options.extensions })
  const events = [...parser]
  const analysis = analyze(events, options)
  return { recipe: analysis.recipe, report: parser.report.zip(analysis.report) }
}

export type ParseMetadataOptions = Omit<AnalyzeOptions, "checkRecipeRef">

/** Only the metadata of a recipe, skipping everything else */
export function parseMetadata(
  source: string,
  options: ParseMetadataOptions = {},
): { metadata: Metadata; report: SourceReport } {
  const parser = new EventParser(source, { metadataOnly: true })
  const events = [...parser]
  const analysis = analyze(events, options)
  return { metadata: analysis.recipe.metadata, report: parser.report.zip(analysis.report) }
}
