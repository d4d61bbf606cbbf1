import { ConversionError } from "../convert/converter"
import type { Converter } from "../convert/converter"
import type { Quantity } from "../types"
import { addValues } from "./value"

/**
 * Sum of the quantities of one ingredient or cookware group.
 *
 * Quantities land in one slot per physical quantity and system, one per
 * unknown unit text and one for unitless values. Values that cannot be
 * added (text, failed conversions) are kept apart in order.
 */
export class GroupedQuantity {
  private readonly slots = new Map<string, Quantity>()
  private readonly other: Quantity[] = []

  constructor(private readonly converter: Converter) {}

  add(quantity: Quantity): void {
    if (quantity.value.type === "text") {
      this.other.push(quantity)
      return
    }

    const key = this.slotKey(quantity)
    const current = this.slots.get(key)
    if (!current) {
      this.slots.set(key, quantity)
      return
    }

    let addend = quantity
    if (key.startsWith("known:") && current.unit !== null && quantity.unit !== current.unit) {
      try {
        addend = this.converter.convert(quantity, current.unit)
      } catch (err) {
        if (!(err instanceof ConversionError)) throw err
        this.other.push(quantity)
        return
      }
    }

    const value = addValues(current.value, addend.value)
    if (!value) {
      this.other.push(quantity)
      return
    }
    this.slots.set(key, { ...current, value, fixed: current.fixed && quantity.fixed })
  }

  addAll(quantities: Iterable<Quantity>): this {
    for (const q of quantities) this.add(q)
    return this
  }

  isEmpty(): boolean {
    return this.slots.size === 0 && this.other.length === 0
  }

  /** Every slot in the order it was first filled, then the values that could not be added */
  toList(): Quantity[] {
    return [...this.slots.values(), ...this.other]
  }

  private slotKey(quantity: Quantity): string {
    if (quantity.unit === null) return "none"
    const unit = this.converter.findUnit(quantity.unit)
    if (!unit) return `unit:${quantity.unit}`
    return `known:${unit.physicalQuantity}:${unit.system ?? "any"}`
  }
}

/** Group a list of quantities, see `GroupedQuantity` */
export function groupQuantities(quantities: Iterable<Quantity>, converter: Converter): Quantity[] {
  return new GroupedQuantity(converter).addAll(quantities).toList()
}
