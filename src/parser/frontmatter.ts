import YAML, { isMap, isNode, isScalar, isSeq } from "yaml"
import type { Located, Span } from "../types"

export interface FrontmatterBlock {
  /** Text between the `---` fences */
  content: string
  /** Offset of `content` in the source */
  contentStart: number
  /** Offset right after the closing fence line */
  end: number
}

export interface FrontmatterEntry {
  key: Located<string>
  value: Located<string>
}

interface FrontmatterResult {
  entries: FrontmatterEntry[]
  warning?: { message: string; span: Span }
}

/** Locate a `---` fenced block at the very start of the source */
export function findFrontmatter(source: string): FrontmatterBlock | null {
  const open = /^---[ \t]*\r?\n/.exec(source)
  if (!open) return null
  const closeRe = /^---[ \t]*\r?$/gm
  closeRe.lastIndex = open[0].length
  const close = closeRe.exec(source)
  if (!close) return null

  let end = close.index + close[0].length
  if (source[end] === "\n") end += 1
  return { content: source.slice(open[0].length, close.index), contentStart: open[0].length, end }
}

/** Lenient line-by-line `key: value` parser for frontmatter that isn't valid YAML. */
function parseFrontmatterLines(content: string, offset: number): FrontmatterEntry[] | null {
  const entries: FrontmatterEntry[] = []
  let lineStart = 0
  for (const line of content.split("\n")) {
    const start = offset + lineStart
    lineStart += line.length + 1
    if (!line.trim()) continue
    const colonIdx = line.indexOf(":")
    if (colonIdx <= 0) return null
    const rawKey = line.slice(0, colonIdx)
    const rawValue = line.slice(colonIdx + 1).replace(/\r$/, "")
    const key = rawKey.trim()
    if (!key) return null
    const value = rawValue.trim()
    const keyStart = start + rawKey.indexOf(key)
    const valueStart = start + colonIdx + 1 + (value ? rawValue.indexOf(value) : rawValue.length)
    entries.push({
      key: { value: key, span: { start: keyStart, end: keyStart + key.length } },
      value: { value, span: { start: valueStart, end: valueStart + value.length } },
    })
  }
  return entries.length > 0 ? entries : null
}

function describe(contents: unknown): string {
  if (isSeq(contents)) return "an array"
  if (isScalar(contents)) return `a ${typeof contents.value}`
  return "an unknown node"
}

/**
 * Top level entries of a YAML frontmatter block, with spans in the source.
 *
 * Scalars keep their string form, collections their source text.
 */
export function parseYamlFrontmatter(block: FrontmatterBlock): FrontmatterResult {
  const { content, contentStart } = block
  const doc = YAML.parseDocument(content)
  const firstError = doc.errors[0]

  if (!firstError && isMap(doc.contents)) {
    const entries: FrontmatterEntry[] = []
    for (const pair of doc.contents.items) {
      if (!isScalar(pair.key) || !pair.key.range) continue
      const [keyStart, keyEnd] = pair.key.range
      const key = { value: String(pair.key.value), span: { start: contentStart + keyStart, end: contentStart + keyEnd } }

      let value: Located<string> = { value: "", span: { start: key.span.end, end: key.span.end } }
      if (isScalar(pair.value) && pair.value.range) {
        const [start, end] = pair.value.range
        const raw = pair.value.value
        value = {
          value: raw == null ? "" : String(raw),
          span: { start: contentStart + start, end: contentStart + end },
        }
      } else if (isNode(pair.value) && pair.value.range) {
        const [start, end] = pair.value.range
        const text = content.slice(start, end).trimEnd()
        value = { value: text, span: { start: contentStart + start, end: contentStart + start + text.length } }
      }
      entries.push({ key, value })
    }
    return { entries }
  }

  if (!firstError && doc.contents == null) return { entries: [] }

  const fallback = parseFrontmatterLines(content, contentStart)
  if (fallback) return { entries: fallback }

  if (firstError) {
    const [start, end] = firstError.pos
    return {
      entries: [],
      warning: {
        message: `Invalid YAML frontmatter: ${firstError.message}`,
        span: { start: contentStart + start, end: contentStart + Math.max(start, end) },
      },
    }
  }
  return {
    entries: [],
    warning: {
      message: `Invalid YAML frontmatter: expected a key/value mapping, got ${describe(doc.contents)}`,
      span: { start: contentStart, end: contentStart + content.trimEnd().length },
    },
  }
}
