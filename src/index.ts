/**
 * Recipe markup engine - Main API
 *
 * Parses recipe markup into a scalable, unit-aware model with located
 * diagnostics.
 */

export type * from "./types"

export { parseMetadata, parseRecipe } from "./parse-recipe"
export type { ParseMetadataOptions, ParseRecipeOptions, ParseRecipeResult } from "./parse-recipe"

export { tokenize, TokenStream } from "./parser/token-stream"
export type { Token, TokenKind } from "./parser/token-stream"
export { EventParser, parseEvents } from "./parser/event-parser"
export type { EventParserOptions } from "./parser/event-parser"
export type * from "./parser/events"
export { ALL_EXTENSIONS, CANONICAL_EXTENSIONS, resolveExtensions } from "./parser/extensions"
export { parseValue, parseValueWithUnit } from "./parser/quantity"
export type { ParsedValue, ParsedValueWithUnit } from "./parser/quantity"

export { analyze } from "./analysis/analyze"
export type { AnalysisResult, AnalyzeOptions, DefineMode, DuplicateMode } from "./analysis/analyze"
export { parseDuration, resolveSpecialKey } from "./analysis/metadata"

export { ConversionError, Converter, ConverterBuilder, unitName } from "./convert/converter"
export type { BestUnitsMode, ConversionErrorKind, FitOptions, Unit } from "./convert/converter"
export { bundledConverter, bundledUnitsFile } from "./convert/bundled"
export { parseUnitsFile, UnitsFileError } from "./convert/units-file"
export type { UnitsFile, UnitsFileInput } from "./convert/units-file"

export { DEFAULT_FRACTIONS, approxFraction, formatNumber } from "./quantity/number"
export type { FractionsConfig } from "./quantity/number"
export { formatQuantity, formatValue } from "./quantity/value"
export { GroupedQuantity, groupQuantities } from "./quantity/grouped"

export { scaleRecipe, scalingReport } from "./scale"
export type { ScaleOptions } from "./scale"

export { serializeMetadata, serializeRecipe } from "./serialize"
export type { MetadataStyle, SerializeOptions } from "./serialize"

export { LineIndex, SourceReport, createDiagnostic } from "./report"
export type { FormatOptions } from "./report"
