import type { Converter } from "../convert/converter"
import { GroupedQuantity } from "../quantity/grouped"
import type { Cookware, Ingredient, ListEntry } from "../types"

type Listed = Pick<Ingredient | Cookware, "quantity" | "modifiers" | "relation">

/**
 * One entry per listed definition with the grouped quantities of the
 * definition and every reference to it. Hidden definitions and references
 * to steps or sections are left out.
 */
export function componentList(components: readonly Listed[], converter: Converter): ListEntry[] {
  const list: ListEntry[] = []
  components.forEach((component, index) => {
    const { relation } = component
    if (relation.type !== "definition" || component.modifiers.hidden) return

    const group = new GroupedQuantity(converter)
    for (const member of [index, ...relation.referencedFrom]) {
      const quantity = components[member]?.quantity
      if (quantity) group.add(quantity)
    }
    list.push({ index, quantity: group.toList() })
  })
  return list
}
