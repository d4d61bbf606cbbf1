import { YAMLError, parse as parseYaml } from "yaml"
import type { Converter } from "../convert/converter"
import { toBase } from "../convert/converter"
import type { MetadataEvent } from "../parser/events"
import { parseValue } from "../parser/quantity"
import { createDiagnostic } from "../report"
import type { SourceReport } from "../report"
import { magnitude } from "../quantity/value"
import type {
  Locale,
  Metadata,
  MetadataValidator,
  NameAndUrl,
  RecipeTime,
  Span,
  SpecialMetadata,
  TimePrecedence,
} from "../types"

export type SpecialKey = "servings" | "time" | "prepTime" | "cookTime" | "tags" | "author" | "source" | "locale"

/** Recognized keys and their aliases, lowercase */
const SPECIAL_KEYS: Record<string, SpecialKey> = {
  servings: "servings",
  serves: "servings",
  yield: "servings",
  time: "time",
  duration: "time",
  "time required": "time",
  prep_time: "prepTime",
  "prep time": "prepTime",
  "prep-time": "prepTime",
  cook_time: "cookTime",
  "cook time": "cookTime",
  "cook-time": "cookTime",
  tags: "tags",
  tag: "tags",
  author: "author",
  source: "source",
  locale: "locale",
}

/** Special key of a metadata key, or null for a regular entry */
export function resolveSpecialKey(key: string): SpecialKey | null {
  return SPECIAL_KEYS[key.trim().toLowerCase().replace(/\s+/g, " ")] ?? null
}

type Parsed<T> = { ok: true; value: T } | { ok: false }

const fail = { ok: false } as const

/**
 * Minutes in a duration such as `90`, `1 h 30 min` or `1.5 hours`.
 *
 * A bare number is minutes. Every other amount needs a time unit known to
 * the converter, which is expected to count time in seconds.
 */
export function parseDuration(text: string, converter: Converter): Parsed<number> {
  const trimmed = text.trim()
  if (!trimmed) return fail

  const bare = parseValue(trimmed)
  if (bare.warnings.length === 0 && bare.value.type === "number") {
    const minutes = magnitude(bare.value)
    return minutes === null ? fail : { ok: true, value: minutes }
  }

  const part = /(\d+(?:\.\d+)?(?:\s*\/\s*\d+)?)\s*([^\s\d,]+)/gy
  let seconds = 0
  let pos = 0
  while (pos < trimmed.length) {
    while (trimmed[pos] === " " || trimmed[pos] === ",") pos += 1
    if (pos >= trimmed.length) break
    part.lastIndex = pos
    const match = part.exec(trimmed)
    if (!match) return fail
    const [whole, amount = "", unitText = ""] = match
    const value = magnitude(parseValue(amount).value)
    const unit = converter.findUnit(unitText)
    if (value === null || !unit || unit.physicalQuantity !== "time") return fail
    seconds += toBase(value, unit)
    pos += whole.length
  }
  return { ok: true, value: seconds / 60 }
}

function parseServings(text: string): Parsed<number[]> {
  const amounts: number[] = []
  for (const part of text.split("|")) {
    const match = /^\s*(\d+)(?:\s+[^\d|]*)?$/.exec(part)
    const amount = match?.[1] === undefined ? Number.NaN : Number(match[1])
    if (!Number.isSafeInteger(amount) || amount <= 0) return fail
    amounts.push(amount)
  }
  return { ok: true, value: amounts }
}

function parseTags(text: string): Parsed<string[]> {
  const trimmed = text.trim()
  let tags: string[] = []
  if (trimmed.startsWith("[") || trimmed.startsWith("-")) {
    let data: unknown
    try {
      data = parseYaml(trimmed, { logLevel: "error" })
    } catch (err) {
      if (!(err instanceof YAMLError)) throw err
      return fail
    }
    if (!Array.isArray(data)) return fail
    for (const item of data) {
      if (typeof item !== "string" && typeof item !== "number") return fail
      tags.push(String(item).trim())
    }
  } else {
    tags = trimmed.split(",").map(tag => tag.trim())
  }
  tags = tags.filter(Boolean)
  return tags.length > 0 ? { ok: true, value: tags } : fail
}

function parseNameAndUrl(text: string): Parsed<NameAndUrl> {
  const trimmed = text.trim()
  if (!trimmed) return fail
  const withUrl = /^(.*?)\s*<([^<>\s]+)>$/.exec(trimmed)
  if (withUrl) {
    const [, name = "", url = ""] = withUrl
    return { ok: true, value: { name: name || null, url } }
  }
  if (/^https?:\/\/\S+$/.test(trimmed)) return { ok: true, value: { name: null, url: trimmed } }
  return { ok: true, value: { name: trimmed, url: null } }
}

function parseLocale(text: string): Parsed<Locale> {
  const match = /^([a-zA-Z]{2,3})(?:[_-]([a-zA-Z]{2}))?$/.exec(text.trim())
  if (!match?.[1]) return fail
  return { ok: true, value: { language: match[1].toLowerCase(), country: match[2]?.toUpperCase() ?? null } }
}

interface EntrySpans {
  key: Span
  value: Span
}

/**
 * Collects metadata entries in order, keeping every raw pair and the parsed
 * form of the recognized ones.
 */
export class MetadataCollector {
  private readonly map = new Map<string, string>()
  private readonly special: SpecialMetadata = {}
  private readonly spans = new Map<SpecialKey, EntrySpans>()
  private totalTime: number | null = null

  constructor(
    private readonly report: SourceReport,
    private readonly converter: Converter,
    private readonly checkMetadata?: MetadataValidator,
  ) {}

  add(event: MetadataEvent): void {
    const key = event.key.value
    const value = event.value.value
    this.map.set(key, value)

    const special = resolveSpecialKey(key)
    const spans = { key: event.key.span, value: event.value.span }
    const accepted = special ? this.addSpecial(special, key, value, spans) : true

    if (!this.checkMetadata) return
    const check = this.checkMetadata(key, value)
    if (check.type === "accept") return
    this.report.push(
      createDiagnostic(check.severity ?? "warning", "analysis", check.reason, event.span, {
        labels: [{ span: event.value.span, message: "rejected value" }],
        help: check.help,
      }),
    )
    // a repeated entry that changed nothing leaves the earlier value alone
    if (special && accepted && this.spans.get(special) === spans) this.removeSpecial(special)
  }

  /** Parse a recognized entry. False when it stays raw only. */
  private addSpecial(special: SpecialKey, key: string, value: string, spans: EntrySpans): boolean {
    switch (special) {
      case "servings":
        return this.addServings(key, value, spans)
      case "time":
        return this.set(special, key, parseDuration(value, this.converter), spans, minutes => {
          this.totalTime = minutes
        })
      case "prepTime":
        return this.set(special, key, parseDuration(value, this.converter), spans, minutes => {
          this.special.prepTime = minutes
        })
      case "cookTime":
        return this.set(special, key, parseDuration(value, this.converter), spans, minutes => {
          this.special.cookTime = minutes
        })
      case "tags":
        return this.set(special, key, parseTags(value), spans, tags => {
          this.special.tags = tags
        })
      case "author":
        return this.set(special, key, parseNameAndUrl(value), spans, author => {
          this.special.author = author
        })
      case "source":
        return this.set(special, key, parseNameAndUrl(value), spans, source => {
          this.special.source = source
        })
      case "locale":
        return this.set(special, key, parseLocale(value), spans, locale => {
          this.special.locale = locale
        })
    }
  }

  private set<T>(
    special: SpecialKey,
    key: string,
    parsed: Parsed<T>,
    spans: EntrySpans,
    store: (value: T) => void,
  ): boolean {
    if (!parsed.ok) {
      this.unsupported(key, spans)
      return false
    }
    store(parsed.value)
    this.spans.set(special, spans)
    return true
  }

  private unsupported(key: string, spans: EntrySpans): void {
    this.report.warning("analysis", `Unsupported value for key: '${key}'`, spans.value, {
      labels: [{ span: spans.key, message: "this key has a special meaning" }],
      help: "It will be a regular metadata entry",
    })
  }

  private addServings(key: string, value: string, spans: EntrySpans): boolean {
    const parsed = parseServings(value)
    if (!parsed.ok) {
      this.unsupported(key, spans)
      return false
    }

    const distinct = [...new Set(parsed.value)]
    const [amount] = distinct
    if (amount === undefined || distinct.length > 1) {
      this.report.error("analysis", `Conflicting servings amounts: ${distinct.join(", ")}`, spans.value, {
        labels: [{ span: spans.value, message: "more than one amount" }],
        help: "Declare a single number of servings",
      })
      return false
    }

    const previous = this.special.servings
    const previousSpans = this.spans.get("servings")
    if (previous !== undefined && previous !== amount) {
      this.report.error("analysis", `Conflicting servings amounts: ${previous}, ${amount}`, spans.value, {
        labels: previousSpans
          ? [{ span: previousSpans.value, message: "first declared here" }]
          : [],
        help: "Declare the number of servings once",
      })
      return false
    }

    this.special.servings = amount
    if (!previousSpans) this.spans.set("servings", spans)
    return true
  }

  private removeSpecial(special: SpecialKey): void {
    this.spans.delete(special)
    switch (special) {
      case "servings":
        delete this.special.servings
        return
      case "time":
        this.totalTime = null
        return
      case "prepTime":
        delete this.special.prepTime
        return
      case "cookTime":
        delete this.special.cookTime
        return
      case "tags":
        delete this.special.tags
        return
      case "author":
        delete this.special.author
        return
      case "source":
        delete this.special.source
        return
      case "locale":
        delete this.special.locale
    }
  }

  /**
   * Final metadata. `timerMinutes` is the sum of the step timers, used as
   * the composed time when there are no prep and cook times.
   */
  finish(precedence: TimePrecedence, timerMinutes: number | null): Metadata {
    const time = this.resolveTime(precedence, timerMinutes)
    if (time) this.special.time = time
    return { map: new Map(this.map), special: { ...this.special } }
  }

  private resolveTime(precedence: TimePrecedence, timerMinutes: number | null): RecipeTime | null {
    const { prepTime, cookTime } = this.special
    const declared = prepTime !== undefined || cookTime !== undefined
    const composed: RecipeTime | null = declared
      ? { type: "composed", prepTime: prepTime ?? null, cookTime: cookTime ?? null }
      : precedence === "composed" && timerMinutes !== null
        ? { type: "composed", prepTime: null, cookTime: timerMinutes }
        : null

    if (this.totalTime === null) return composed
    const total: RecipeTime = { type: "total", minutes: this.totalTime }
    if (!composed) return total

    if (precedence === "total") {
      for (const overridden of ["prepTime", "cookTime"] as const) {
        const spans = this.spans.get(overridden)
        if (!spans) continue
        this.report.warning("analysis", "The total time overrides this entry", spans.key, {
          labels: this.totalLabels(),
          help: "Remove the total time to compose it from prep and cook times",
        })
      }
      return total
    }

    const spans = this.spans.get("time")
    if (spans) {
      this.report.warning(
        "analysis",
        declared ? "The prep and cook times override this entry" : "The step timers override this entry",
        spans.key,
        { help: "Remove this entry or use the total time precedence" },
      )
    }
    return composed
  }

  private totalLabels() {
    const spans = this.spans.get("time")
    return spans ? [{ span: spans.key, message: "total time declared here" }] : []
  }
}
