import type { Converter } from "../convert/converter"
import { parseValue } from "../parser/quantity"
import type { Quantity, StepItem } from "../types"

const CANDIDATE = /(\d+(?:\.\d+)?(?:\/\d+)?)( ?)([^\s\d.,;:!?()[\]{}"']+)/g

/**
 * Split step text around numbers followed by a known unit, `180 °C` or
 * `2cm`. Found quantities are appended to `sink`, the returned items point
 * at them.
 */
export function extractInlineQuantities(text: string, converter: Converter, sink: Quantity[]): StepItem[] {
  const items: StepItem[] = []
  let cursor = 0

  for (const match of text.matchAll(CANDIDATE)) {
    const [whole, rawNumber = "", , rawUnit = ""] = match
    const start = match.index ?? 0
    if (start > 0 && /[\p{L}\p{N}._/-]/u.test(text[start - 1] ?? "")) continue

    const unit = converter.findUnit(rawUnit)
    if (!unit) continue
    const parsed = parseValue(rawNumber)
    if (parsed.value.type === "text" || parsed.warnings.length > 0) continue

    if (start > cursor) items.push({ type: "text", value: text.slice(cursor, start) })
    sink.push({ value: parsed.value, unit: rawUnit, fixed: false, physicalQuantity: unit.physicalQuantity })
    items.push({ type: "inlineQuantity", index: sink.length - 1 })
    cursor = start + whole.length
  }

  if (cursor === 0) return [{ type: "text", value: text }]
  if (cursor < text.length) items.push({ type: "text", value: text.slice(cursor) })
  return items
}
