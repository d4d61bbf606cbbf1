import type { Extensions, ExtensionsOption } from "../types"

export const ALL_EXTENSIONS: Readonly<Extensions> = {
  multilineSteps: true,
  componentModifiers: true,
  componentNotes: true,
  componentAliases: true,
  advancedUnits: true,
  intermediatePreparations: true,
  modes: true,
  inlineQuantities: true,
  textSteps: true,
}

/** The subset every markup implementation understands */
export const CANONICAL_EXTENSIONS: Readonly<Extensions> = {
  multilineSteps: true,
  componentModifiers: false,
  componentNotes: true,
  componentAliases: false,
  advancedUnits: false,
  intermediatePreparations: false,
  modes: false,
  inlineQuantities: false,
  textSteps: true,
}

const NO_EXTENSIONS: Readonly<Extensions> = {
  multilineSteps: false,
  componentModifiers: false,
  componentNotes: false,
  componentAliases: false,
  advancedUnits: false,
  intermediatePreparations: false,
  modes: false,
  inlineQuantities: false,
  textSteps: false,
}

/**
 * Presets expand to their flag set, partial objects fill the rest with `false`.
 */
export function resolveExtensions(option: ExtensionsOption = "all"): Extensions {
  if (option === "all") return { ...ALL_EXTENSIONS }
  if (option === "canonical") return { ...CANONICAL_EXTENSIONS }
  return { ...NO_EXTENSIONS, ...option }
}
