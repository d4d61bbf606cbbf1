import type { FractionsConfig } from "../quantity/number"
import { DEFAULT_FRACTIONS, approxFraction, regular, roundDisplay, toFloat } from "../quantity/number"
import { magnitude, mapNumbers } from "../quantity/value"
import type { PhysicalQuantity, Quantity, RecipeNumber, System, Value } from "../types"
import type {
  ExtendUnitEntry,
  FractionsLayer,
  Precedence,
  SIPrefix,
  UnitEntry,
  UnitsFileInput,
} from "./units-file"
import { SI_PREFIXES, SI_RATIOS, UnitsFileError, parseUnitsFile } from "./units-file"

/**
 * A unit of the table. Conversion to the base unit of its physical
 * quantity is `value * ratio + difference`.
 */
export interface Unit {
  names: string[]
  symbols: string[]
  aliases: string[]
  ratio: number
  difference: number
  physicalQuantity: PhysicalQuantity
  system: System | null
}

export type ConversionErrorKind = "incompatibleUnits" | "unknownUnit" | "textValue" | "missingUnit"

export class ConversionError extends Error {
  constructor(
    readonly kind: ConversionErrorKind,
    message: string,
  ) {
    super(message)
    this.name = "ConversionError"
  }
}

/** `same` keeps a quantity in its unit's system, `any` may switch systems */
export type BestUnitsMode = "same" | "any"

export interface FitOptions {
  bestUnits?: BestUnitsMode
}

type BestUnits<T> = { type: "unified"; units: T[] } | { type: "bySystem"; metric: T[]; imperial: T[] }

interface ConverterTables {
  units: readonly Unit[]
  index: ReadonlyMap<string, number>
  lowercaseIndex: ReadonlyMap<string, number>
  best: ReadonlyMap<PhysicalQuantity, BestUnits<number>>
  fractions: readonly FractionsConfig[]
  defaultSystem: System
}

/** Name used when a converted quantity is written: the first symbol, else the first name */
export function unitName(unit: Unit): string {
  return unit.symbols[0] ?? unit.names[0] ?? unit.aliases[0] ?? ""
}

function fromBase(base: number, unit: Unit): number {
  return (base - unit.difference) / unit.ratio
}

export function toBase(value: number, unit: Unit): number {
  return value * unit.ratio + unit.difference
}

/**
 * Read-only unit table with conversion operations.
 *
 * Build one with `ConverterBuilder`; it can be shared freely once built.
 */
export class Converter {
  constructor(private readonly tables: ConverterTables) {}

  /** A converter that knows no units */
  static empty(): Converter {
    return new Converter({
      units: [],
      index: new Map(),
      lowercaseIndex: new Map(),
      best: new Map(),
      fractions: [],
      defaultSystem: "metric",
    })
  }

  get defaultSystem(): System {
    return this.tables.defaultSystem
  }

  get size(): number {
    return this.tables.units.length
  }

  isEmpty(): boolean {
    return this.tables.units.length === 0
  }

  allUnits(): readonly Unit[] {
    return this.tables.units
  }

  private unitIndex(text: string): number | undefined {
    const key = text.trim()
    return this.tables.index.get(key) ?? this.tables.lowercaseIndex.get(key.toLowerCase())
  }

  /** Unit by name, symbol or alias. Symbols match case-sensitively, names do not. */
  findUnit(text: string): Unit | null {
    const idx = this.unitIndex(text)
    return idx === undefined ? null : (this.tables.units[idx] ?? null)
  }

  fractionsFor(unit: Unit): FractionsConfig {
    const idx = this.tables.units.indexOf(unit)
    return this.tables.fractions[idx] ?? DEFAULT_FRACTIONS
  }

  /**
   * Best units of a physical quantity, smallest first. A null system means
   * the units of every system.
   */
  bestUnits(quantity: PhysicalQuantity, system: System | null): Unit[] {
    const best = this.tables.best.get(quantity)
    if (!best) return []
    let indices: number[]
    if (best.type === "unified") indices = best.units
    else if (system === null) indices = [...best.metric, ...best.imperial]
    else indices = best[system]
    return indices
      .map(i => this.tables.units[i])
      .filter((u): u is Unit => u !== undefined)
      .sort((a, b) => a.ratio - b.ratio)
  }

  /**
   * Convert a quantity to a unit (name, symbol or alias), to a system
   * (`"metric"` or `"imperial"`), or to its best unit (`"fit"`).
   *
   * @throws ConversionError
   */
  convert(quantity: Quantity, to: string): Quantity {
    if (quantity.value.type === "text") {
      throw new ConversionError("textValue", `Cannot convert the text value '${quantity.value.value}'`)
    }
    if (quantity.unit === null) {
      throw new ConversionError("missingUnit", "Cannot convert a quantity without a unit")
    }
    const from = this.findUnit(quantity.unit)
    if (!from) {
      throw new ConversionError("unknownUnit", `Unknown unit: '${quantity.unit}'`)
    }

    if (to === "fit") {
      const target = this.pickBest(quantity.value, from, this.bestUnits(from.physicalQuantity, from.system ?? this.defaultSystem))
      return this.withUnit(quantity, from, target ?? from)
    }

    if (to === "metric" || to === "imperial") {
      const target = this.pickBest(quantity.value, from, this.bestUnits(from.physicalQuantity, to))
      if (!target) {
        throw new ConversionError("incompatibleUnits", `There are no ${to} units for ${from.physicalQuantity}`)
      }
      return this.withUnit(quantity, from, target)
    }

    const target = this.findUnit(to)
    if (!target) {
      throw new ConversionError("unknownUnit", `Unknown unit: '${to}'`)
    }
    if (target.physicalQuantity !== from.physicalQuantity) {
      throw new ConversionError(
        "incompatibleUnits",
        `Incompatible units: '${quantity.unit}' is ${from.physicalQuantity} and '${to}' is ${target.physicalQuantity}`,
      )
    }
    return this.withUnit(quantity, from, target)
  }

  /**
   * Move a quantity to the unit that best fits its magnitude. Quantities
   * without a known unit or with a text value come back unchanged.
   */
  fit(quantity: Quantity, options: FitOptions = {}): Quantity {
    if (quantity.unit === null || quantity.value.type === "text") return quantity
    const from = this.findUnit(quantity.unit)
    if (!from) return quantity
    const system = options.bestUnits === "any" ? null : (from.system ?? this.defaultSystem)
    const target = this.pickBest(quantity.value, from, this.bestUnits(from.physicalQuantity, system))
    return target ? this.withUnit(quantity, from, target) : quantity
  }

  /** Largest candidate in which the value is at least 1, else the smallest */
  private pickBest(value: Value, from: Unit, candidates: Unit[]): Unit | null {
    const mag = magnitude(value)
    if (mag === null || candidates.length === 0) return null
    const base = toBase(mag, from)
    let chosen = candidates[0] ?? null
    for (const candidate of candidates) {
      if (roundDisplay(Math.abs(fromBase(base, candidate))) >= 1) chosen = candidate
    }
    return chosen
  }

  private withUnit(quantity: Quantity, from: Unit, to: Unit): Quantity {
    const fractions = this.fractionsFor(to)
    const value = mapNumbers(quantity.value, n => present(fromBase(toBase(toFloat(n), from), to), fractions))
    return { ...quantity, value, unit: unitName(to), physicalQuantity: to.physicalQuantity }
  }
}

function present(value: number, config: FractionsConfig): RecipeNumber {
  if (!config.enabled || Number.isInteger(roundDisplay(value))) return regular(value)
  const approx = approxFraction(value, config)
  if (!approx) return regular(value)
  return approx.num === 0 ? regular(approx.whole) : approx
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

interface PendingUnit extends Unit {
  expandSi: boolean
  layer: number
  generated: boolean
}

interface PendingExtend {
  layer: number
  precedence: Precedence
  key: string
  entry: ExtendUnitEntry
}

type FractionsPartial = Partial<FractionsConfig>

interface FractionsLayers {
  all: FractionsPartial
  metric: FractionsPartial
  imperial: FractionsPartial
  quantity: Map<PhysicalQuantity, FractionsPartial>
  unit: Map<string, FractionsPartial>
}

type PrefixTable = Record<SIPrefix, string[]>

function joinList(current: string[], added: string[], precedence: Precedence): string[] {
  switch (precedence) {
    case "before":
      return [...added, ...current]
    case "after":
      return [...current, ...added]
    case "override":
      return [...added]
  }
}

function joinPrefixes(current: PrefixTable | null, added: PrefixTable | undefined, precedence: Precedence): PrefixTable | null {
  if (!added) return current
  if (!current) return added
  const joined: PrefixTable = { kilo: [], hecto: [], deca: [], deci: [], centi: [], milli: [] }
  for (const prefix of SI_PREFIXES) joined[prefix] = joinList(current[prefix], added[prefix], precedence)
  return joined
}

function layerOf(layer: FractionsLayer): FractionsPartial {
  if (typeof layer === "boolean") return { enabled: layer }
  const partial: FractionsPartial = {}
  if (layer.enabled !== undefined) partial.enabled = layer.enabled
  if (layer.accuracy !== undefined) partial.accuracy = layer.accuracy
  if (layer.max_denominator !== undefined) partial.maxDenominator = layer.max_denominator
  if (layer.max_whole !== undefined) partial.maxWhole = layer.max_whole
  return partial
}

function defineFractions(partial: FractionsPartial): FractionsConfig {
  const clamp = (v: number, min: number, max: number) => Math.min(max, Math.max(min, v))
  return {
    enabled: partial.enabled ?? DEFAULT_FRACTIONS.enabled,
    accuracy: clamp(partial.accuracy ?? DEFAULT_FRACTIONS.accuracy, 0, 1),
    maxDenominator: clamp(Math.round(partial.maxDenominator ?? DEFAULT_FRACTIONS.maxDenominator), 1, 16),
    maxWhole: partial.maxWhole ?? DEFAULT_FRACTIONS.maxWhole,
  }
}

function keysOf(unit: Unit): string[] {
  return [...unit.names, ...unit.symbols, ...unit.aliases]
}

/**
 * Merges units files, in order, into a `Converter`.
 *
 * Later layers add units, extend the ones of earlier layers, replace best
 * units and refine fractions.
 */
export class ConverterBuilder {
  private readonly units: PendingUnit[] = []
  private readonly extensions: PendingExtend[] = []
  private readonly best = new Map<PhysicalQuantity, BestUnits<string>>()
  private readonly fractions: FractionsLayers = {
    all: {},
    metric: {},
    imperial: {},
    quantity: new Map(),
    unit: new Map(),
  }
  private prefixes: PrefixTable | null = null
  private symbolPrefixes: PrefixTable | null = null
  private defaultSystem: System = "metric"
  private layers = 0

  /**
   * Add a units file layer.
   *
   * @throws UnitsFileError when the file does not validate
   */
  add(input: UnitsFileInput): this {
    const file = parseUnitsFile(input)
    const layer = this.layers
    this.layers += 1

    if (file.default_system) this.defaultSystem = file.default_system

    if (file.si) {
      this.prefixes = joinPrefixes(this.prefixes, file.si.prefixes, file.si.precedence)
      this.symbolPrefixes = joinPrefixes(this.symbolPrefixes, file.si.symbol_prefixes, file.si.precedence)
    }

    if (file.fractions) {
      const { all, metric, imperial, quantity, unit } = file.fractions
      if (all !== undefined) this.fractions.all = { ...this.fractions.all, ...layerOf(all) }
      if (metric !== undefined) this.fractions.metric = { ...this.fractions.metric, ...layerOf(metric) }
      if (imperial !== undefined) this.fractions.imperial = { ...this.fractions.imperial, ...layerOf(imperial) }
      for (const [pq, config] of Object.entries(quantity)) {
        if (config === undefined || !isPhysicalQuantity(pq)) continue
        this.fractions.quantity.set(pq, { ...this.fractions.quantity.get(pq), ...layerOf(config) })
      }
      for (const [key, config] of Object.entries(unit)) {
        this.fractions.unit.set(key, { ...this.fractions.unit.get(key), ...layerOf(config) })
      }
    }

    if (file.extend) {
      for (const [key, entry] of Object.entries(file.extend.units)) {
        this.extensions.push({ layer, precedence: file.extend.precedence, key, entry })
      }
    }

    for (const group of file.quantity) {
      const add = (entries: UnitEntry[], system: System | null) => {
        for (const entry of entries) {
          this.units.push({
            names: entry.names,
            symbols: entry.symbols,
            aliases: entry.aliases,
            ratio: entry.ratio,
            difference: entry.difference,
            physicalQuantity: group.quantity,
            system,
            expandSi: entry.expand_si,
            layer,
            generated: false,
          })
        }
      }
      if (Array.isArray(group.units)) {
        add(group.units, null)
      } else {
        add(group.units.metric, "metric")
        add(group.units.imperial, "imperial")
        add(group.units.unspecified, null)
      }

      if (group.best) {
        this.best.set(
          group.quantity,
          Array.isArray(group.best)
            ? { type: "unified", units: group.best }
            : { type: "bySystem", metric: group.best.metric, imperial: group.best.imperial },
        )
      }
    }

    return this
  }

  /**
   * Build the converter.
   *
   * @throws UnitsFileError on conflicting or dangling definitions
   */
  finish(): Converter {
    const bases = this.units.map(u => ({ ...u }))
    const pending = [...this.extensions]

    const remaining = pending.filter(ext => !this.applyExtension(bases, ext, false))
    const units = this.expandSi(bases)
    for (const ext of remaining) {
      if (!this.applyExtension(units, ext, true)) {
        throw new UnitsFileError(`Cannot extend unknown unit '${ext.key}'`)
      }
    }

    const index = new Map<string, number>()
    const lowercaseIndex = new Map<string, number>()
    units.forEach((unit, i) => {
      for (const key of keysOf(unit)) {
        if (index.has(key)) throw new UnitsFileError(`Duplicate unit: '${key}'`)
        index.set(key, i)
      }
      for (const key of [...unit.names, ...unit.aliases]) {
        // short aliases such as T (tablespoon) and t (teaspoon) differ only by case
        if (key.length < 3) continue
        const lower = key.toLowerCase()
        if (!lowercaseIndex.has(lower)) lowercaseIndex.set(lower, i)
      }
    })

    const resolve = (pq: PhysicalQuantity, name: string, system: System | null): number => {
      const i = index.get(name)
      const unit = i === undefined ? undefined : units[i]
      if (i === undefined || !unit) throw new UnitsFileError(`Unknown best unit '${name}' for ${pq}`)
      if (unit.physicalQuantity !== pq) {
        throw new UnitsFileError(`Best unit '${name}' is ${unit.physicalQuantity}, not ${pq}`)
      }
      if (system) {
        if (unit.system && unit.system !== system) {
          throw new UnitsFileError(`Unit '${name}' is ${unit.system} but listed as ${system}`)
        }
        unit.system = system
      }
      return i
    }

    const best = new Map<PhysicalQuantity, BestUnits<number>>()
    for (const [pq, entry] of this.best) {
      best.set(
        pq,
        entry.type === "unified"
          ? { type: "unified", units: entry.units.map(name => resolve(pq, name, null)) }
          : {
              type: "bySystem",
              metric: entry.metric.map(name => resolve(pq, name, "metric")),
              imperial: entry.imperial.map(name => resolve(pq, name, "imperial")),
            },
      )
    }

    for (const key of this.fractions.unit.keys()) {
      if (!index.has(key)) throw new UnitsFileError(`Fractions configured for unknown unit '${key}'`)
    }
    const fractions = units.map(unit => {
      let layer: FractionsPartial = { ...this.fractions.all }
      if (unit.system) layer = { ...layer, ...this.fractions[unit.system] }
      layer = { ...layer, ...this.fractions.quantity.get(unit.physicalQuantity) }
      for (const key of keysOf(unit)) layer = { ...layer, ...this.fractions.unit.get(key) }
      return defineFractions(layer)
    })

    return new Converter({
      units: units.map(({ names, symbols, aliases, ratio, difference, physicalQuantity, system }) => ({
        names,
        symbols,
        aliases,
        ratio,
        difference,
        physicalQuantity,
        system,
      })),
      index,
      lowercaseIndex,
      best,
      fractions,
      defaultSystem: this.defaultSystem,
    })
  }

  private expandSi(bases: PendingUnit[]): PendingUnit[] {
    const units: PendingUnit[] = []
    for (const unit of bases) {
      units.push(unit)
      if (!unit.expandSi) continue
      const { prefixes, symbolPrefixes } = this
      if (!prefixes || !symbolPrefixes) {
        throw new UnitsFileError(`Unit '${unitName(unit)}' expands SI prefixes but no layer defines them`)
      }
      for (const prefix of SI_PREFIXES) {
        const names = unit.names.flatMap(name => prefixes[prefix].map(p => `${p}${name}`))
        const symbols = unit.symbols.flatMap(symbol => symbolPrefixes[prefix].map(p => `${p}${symbol}`))
        if (names.length === 0 && symbols.length === 0) continue
        units.push({
          ...unit,
          names,
          symbols,
          aliases: [],
          ratio: unit.ratio * SI_RATIOS[prefix],
          expandSi: false,
          generated: true,
        })
      }
    }
    return units
  }

  /** Apply an extension to a unit of an earlier layer. False when no unit matches. */
  private applyExtension(units: PendingUnit[], ext: PendingExtend, generatedOnly: boolean): boolean {
    const unit = units.find(u => u.layer < ext.layer && u.generated === generatedOnly && keysOf(u).includes(ext.key))
    if (!unit) return false
    const { entry, precedence } = ext
    if (unit.generated && (entry.ratio !== undefined || entry.difference !== undefined || entry.names || entry.symbols)) {
      throw new UnitsFileError(`Only aliases can be set on the generated unit '${ext.key}'`)
    }
    if (entry.ratio !== undefined) unit.ratio = entry.ratio
    if (entry.difference !== undefined) unit.difference = entry.difference
    if (entry.names) unit.names = joinList(unit.names, entry.names, precedence)
    if (entry.symbols) unit.symbols = joinList(unit.symbols, entry.symbols, precedence)
    if (entry.aliases) unit.aliases = joinList(unit.aliases, entry.aliases, precedence)
    return true
  }
}

const PHYSICAL_QUANTITIES: readonly string[] = ["volume", "mass", "length", "temperature", "time"]

function isPhysicalQuantity(value: string): value is PhysicalQuantity {
  return PHYSICAL_QUANTITIES.includes(value)
}
