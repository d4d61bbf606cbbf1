import { readFileSync } from "node:fs"
import { dirname, join } from "node:path"
import { fileURLToPath } from "node:url"
import type { Converter } from "./converter"
import { ConverterBuilder } from "./converter"
import type { UnitsFile } from "./units-file"
import { parseUnitsFile } from "./units-file"

const __dirname = dirname(fileURLToPath(import.meta.url))

const UNITS_PATH = join(__dirname, "../../data/units.json")

let bundled: Converter | undefined

/** The units file shipped with the package */
export function bundledUnitsFile(): UnitsFile {
  const data: unknown = JSON.parse(readFileSync(UNITS_PATH, "utf-8"))
  return parseUnitsFile(data)
}

/** Converter over the bundled units, built on first use and shared */
export function bundledConverter(): Converter {
  if (!bundled) {
    bundled = new ConverterBuilder().add(bundledUnitsFile()).finish()
  }
  return bundled
}
