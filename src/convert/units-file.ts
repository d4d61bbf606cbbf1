import { z } from "zod"

export const SystemSchema = z.enum(["metric", "imperial"])

export const PhysicalQuantitySchema = z.enum(["volume", "mass", "length", "temperature", "time"])

/**
 * How a list joins the one from earlier layers: in front of it, after it,
 * or replacing it
 */
export const PrecedenceSchema = z.enum(["before", "after", "override"])

export const SI_PREFIXES = ["kilo", "hecto", "deca", "deci", "centi", "milli"] as const

export type SIPrefix = (typeof SI_PREFIXES)[number]

export const SI_RATIOS: Record<SIPrefix, number> = {
  kilo: 1e3,
  hecto: 1e2,
  deca: 1e1,
  deci: 1e-1,
  centi: 1e-2,
  milli: 1e-3,
}

const PrefixListSchema = z.array(z.string())

const PrefixMapSchema = z
  .object({
    kilo: PrefixListSchema,
    hecto: PrefixListSchema,
    deca: PrefixListSchema,
    deci: PrefixListSchema,
    centi: PrefixListSchema,
    milli: PrefixListSchema,
  })
  .strict()

export const SISchema = z
  .object({
    prefixes: PrefixMapSchema.optional(),
    symbol_prefixes: PrefixMapSchema.optional(),
    precedence: PrecedenceSchema.default("before"),
  })
  .strict()

export const FractionsLayerSchema = z.union([
  z.boolean(),
  z
    .object({
      enabled: z.boolean().optional(),
      accuracy: z.number().optional(),
      max_denominator: z.number().int().positive().optional(),
      max_whole: z.number().int().nonnegative().optional(),
    })
    .strict(),
])

export const FractionsSchema = z
  .object({
    all: FractionsLayerSchema.optional(),
    metric: FractionsLayerSchema.optional(),
    imperial: FractionsLayerSchema.optional(),
    quantity: z.record(PhysicalQuantitySchema, FractionsLayerSchema).default({}),
    unit: z.record(z.string(), FractionsLayerSchema).default({}),
  })
  .strict()

export const ExtendUnitEntrySchema = z
  .object({
    ratio: z.number().positive().optional(),
    difference: z.number().optional(),
    names: z.array(z.string()).optional(),
    symbols: z.array(z.string()).optional(),
    aliases: z.array(z.string()).optional(),
  })
  .strict()

export const ExtendSchema = z
  .object({
    precedence: PrecedenceSchema.default("before"),
    units: z.record(z.string(), ExtendUnitEntrySchema).default({}),
  })
  .strict()

export const UnitEntrySchema = z
  .object({
    names: z.array(z.string()),
    symbols: z.array(z.string()),
    aliases: z.array(z.string()).default([]),
    ratio: z.number().positive(),
    difference: z.number().default(0),
    expand_si: z.boolean().default(false),
  })
  .strict()

export const BestUnitsSchema = z.union([
  z.array(z.string()),
  z.object({ metric: z.array(z.string()), imperial: z.array(z.string()) }).strict(),
])

export const UnitsSchema = z.union([
  z.array(UnitEntrySchema),
  z
    .object({
      metric: z.array(UnitEntrySchema).default([]),
      imperial: z.array(UnitEntrySchema).default([]),
      unspecified: z.array(UnitEntrySchema).default([]),
    })
    .strict(),
])

export const QuantityGroupSchema = z
  .object({
    quantity: PhysicalQuantitySchema,
    best: BestUnitsSchema.optional(),
    units: UnitsSchema,
  })
  .strict()

/**
 * A layer of unit definitions. Layers are merged in order by the
 * converter builder.
 */
export const UnitsFileSchema = z
  .object({
    default_system: SystemSchema.optional(),
    si: SISchema.optional(),
    fractions: FractionsSchema.optional(),
    extend: ExtendSchema.optional(),
    quantity: z.array(QuantityGroupSchema).default([]),
  })
  .strict()

export type Precedence = z.infer<typeof PrecedenceSchema>
export type FractionsLayer = z.infer<typeof FractionsLayerSchema>
export type UnitEntry = z.infer<typeof UnitEntrySchema>
export type ExtendUnitEntry = z.infer<typeof ExtendUnitEntrySchema>
export type QuantityGroup = z.infer<typeof QuantityGroupSchema>
export type UnitsFile = z.infer<typeof UnitsFileSchema>
/** Units file as written, before defaults are filled in */
export type UnitsFileInput = z.input<typeof UnitsFileSchema>

export class UnitsFileError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(message)
    this.name = "UnitsFileError"
  }
}

/** Validate a units file, throwing `UnitsFileError` with every issue found */
export function parseUnitsFile(data: unknown): UnitsFile {
  const result = UnitsFileSchema.safeParse(data)
  if (!result.success) {
    const issues = result.error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    )
    throw new UnitsFileError(`Invalid units file: ${issues.join("; ")}`, issues)
  }
  return result.data
}
