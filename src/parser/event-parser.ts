import { SourceReport } from "../report"
import type { Extensions, ExtensionsOption, Located } from "../types"
import type { BlockContext } from "./component-parser"
import { parseComponent, spanOf, tokensText, trimTokens } from "./component-parser"
import type { MetadataEvent, ParseEvent, SectionEvent } from "./events"
import { resolveExtensions } from "./extensions"
import { findFrontmatter, parseYamlFrontmatter } from "./frontmatter"
import type { Token } from "./token-stream"
import { tokenize } from "./token-stream"

export interface EventParserOptions {
  extensions?: ExtensionsOption
  /** Only produce metadata events, every other line is skipped */
  metadataOnly?: boolean
}

interface Line {
  tokens: Token[]
  newline: Token | null
}

function* splitLines(tokens: Iterable<Token>): Generator<Line, void, undefined> {
  let current: Token[] = []
  for (const token of tokens) {
    if (token.kind === "eof") {
      yield { tokens: current, newline: null }
      return
    }
    if (token.kind === "newline") {
      yield { tokens: current, newline: token }
      current = []
    } else {
      current.push(token)
    }
  }
}

/** Passes tokens through, warning about a block comment that never closes */
function* checkComments(
  tokens: Iterable<Token>,
  source: string,
  report: SourceReport,
): Generator<Token, void, undefined> {
  for (const token of tokens) {
    if (token.kind === "blockComment" && (token.end - token.start < 4 || !source.startsWith("-]", token.end - 2))) {
      const opening = { start: token.start, end: token.start + 2 }
      report.warning("parser", "Unclosed block comment", opening, {
        labels: [{ span: opening, message: "everything after this is a comment" }],
        help: "Close the comment with '-]'",
      })
    }
    yield token
  }
}

function isBlankLine(line: Line): boolean {
  return line.tokens.every(t => t.kind === "whitespace")
}

/**
 * Groups lines into blocks. Metadata and section lines are always a block of
 * their own; with multi-line steps the rest run until a blank line.
 */
function* splitBlocks(lines: Iterable<Line>, multiline: boolean): Generator<Token[], void, undefined> {
  let block: Token[] = []
  let pendingNewline: Token | null = null
  for (const line of lines) {
    if (isBlankLine(line)) {
      if (block.length > 0) yield block
      block = []
      continue
    }
    const first = line.tokens[0]
    if (!multiline || first?.kind === "meta" || first?.kind === "=") {
      if (block.length > 0) yield block
      block = []
      yield line.tokens
      continue
    }
    if (block.length > 0 && pendingNewline) block.push(pendingNewline)
    block.push(...line.tokens)
    pendingNewline = line.newline
  }
  if (block.length > 0) yield block
}

// ---------------------------------------------------------------------------
// Block rules
// ---------------------------------------------------------------------------

function rawLocated(source: string, tokens: readonly Token[], fallback: number): Located<string> {
  const span = spanOf(trimTokens(tokens), fallback)
  return { value: source.slice(span.start, span.end), span }
}

function blockSpan(tokens: readonly Token[]) {
  return spanOf(tokens, 0)
}

function metadataEntry(ctx: BlockContext): MetadataEvent | null {
  const { tokens, source, report } = ctx
  const span = blockSpan(tokens)
  const colon = tokens.findIndex(t => t.kind === ":")
  const colonToken = tokens[colon]
  if (!colonToken) {
    report.warning("parser", "Invalid metadata entry: missing ':'", span, {
      labels: [{ span, message: "expected key: value" }],
      help: "Write metadata as '>> key: value'",
    })
    return null
  }

  const key = rawLocated(source, tokens.slice(1, colon), colonToken.start)
  if (!key.value) {
    report.warning("parser", "Invalid metadata entry: empty key", span, {
      labels: [{ span: { start: colonToken.start, end: colonToken.start }, message: "expected a key" }],
    })
    return null
  }

  const comment = tokens.findIndex((t, i) => i > colon && (t.kind === "lineComment" || t.kind === "blockComment"))
  const value = rawLocated(source, tokens.slice(colon + 1, comment === -1 ? undefined : comment), colonToken.end)
  if (!value.value) {
    report.warning("parser", `Empty metadata value for key: ${key.value}`, key.span, {
      labels: [{ span: key.span }],
    })
  }
  return { type: "metadata", key, value, span: { start: span.start, end: Math.max(value.span.end, key.span.end) } }
}

function section(ctx: BlockContext): SectionEvent | null {
  const { tokens, source, report } = ctx
  const span = blockSpan(tokens)
  let start = 0
  while (tokens[start]?.kind === "=") start += 1

  let body = trimTokens(tokens.slice(start))
  let end = body.length
  while (end > 0 && body[end - 1]?.kind === "=") end -= 1
  body = trimTokens(body.slice(0, end))

  const stray = body.find(t => t.kind === "=")
  if (stray) {
    const straySpan = spanOf([stray], span.start)
    report.warning("parser", "Invalid section name: it cannot contain '='", span, {
      labels: [{ span: straySpan, message: "this is not allowed" }],
      help: "Escape it with '\\='",
    })
    return null
  }

  const name = body.length > 0 ? { value: tokensText(source, body), span: spanOf(body, span.start) } : null
  return { type: "section", name, span }
}

function textStep(ctx: BlockContext): ParseEvent[] {
  const span = blockSpan(ctx.tokens)
  return [
    { type: "startStep", isText: false, span: { start: span.start, end: span.start } },
    { type: "text", value: ctx.source.slice(span.start, span.end).trim(), span },
    { type: "endStep", isText: false, span: { start: span.end, end: span.end } },
  ]
}

interface PendingText {
  value: string
  start: number
  end: number
}

function step(ctx: BlockContext): ParseEvent[] {
  const { tokens, source, extensions } = ctx
  let i = 0
  let isText = false
  if (extensions.textSteps && tokens[0]?.kind === ">") {
    isText = true
    i = 1
  }

  const items: ParseEvent[] = []
  let text: PendingText | null = null
  let lineStart = true
  let softBreak = false

  const resolveSoftBreak = (at: number) => {
    if (!softBreak) return
    softBreak = false
    if (text) {
      text.value = `${text.value.trimEnd()} `
    } else if (items.length > 0) {
      text = { value: " ", start: at, end: at }
    }
  }

  const append = (value: string, start: number, end: number, meaningful: boolean) => {
    if (meaningful) {
      resolveSoftBreak(start)
      lineStart = false
    }
    if (text) {
      text.value += value
      if (meaningful) text.end = end
    } else {
      text = { value, start, end: meaningful ? end : start }
    }
  }

  const flush = (trim = false) => {
    const value = trim ? text?.value.trimEnd() : text?.value
    if (text && value) {
      items.push({ type: "text", value, span: { start: text.start, end: text.end } })
    }
    text = null
  }

  while (i < tokens.length) {
    const token = tokens[i]
    if (!token) break

    switch (token.kind) {
      case "lineComment":
      case "blockComment":
        i += 1
        continue
      case "newline":
        softBreak = true
        lineStart = true
        i += 1
        if (isText && tokens[i]?.kind === ">") i += 1
        continue
      case "whitespace":
        if (!lineStart) append(source.slice(token.start, token.end), token.start, token.end, false)
        i += 1
        continue
      case "escaped":
        append(source.slice(token.start + 1, token.end), token.start, token.end, true)
        i += 1
        continue
      case "@":
      case "#":
      case "~": {
        if (isText) break
        const parsed = parseComponent(ctx, i)
        if (parsed.type === "component") {
          resolveSoftBreak(token.start)
          flush()
          items.push(parsed.event)
          lineStart = false
          i = parsed.end
          continue
        }
        if (parsed.type === "degraded") {
          const last = tokens[parsed.end - 1]
          append(tokensText(source, tokens.slice(i, parsed.end)), token.start, last?.end ?? token.end, true)
          i = parsed.end
          continue
        }
        break
      }
    }

    append(source.slice(token.start, token.end), token.start, token.end, true)
    i += 1
  }

  flush(true)
  if (items.length === 0) return []

  const span = blockSpan(tokens)
  return [
    { type: "startStep", isText, span: { start: span.start, end: span.start } },
    ...items,
    { type: "endStep", isText, span: { start: span.end, end: span.end } },
  ]
}

function parseBlock(ctx: BlockContext): ParseEvent[] {
  switch (ctx.tokens[0]?.kind) {
    case "meta": {
      const entry = metadataEntry(ctx)
      return entry ? [entry] : textStep(ctx)
    }
    case "=": {
      const heading = section(ctx)
      return heading ? [heading] : textStep(ctx)
    }
    default:
      return step(ctx)
  }
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

/**
 * Iterable of the parse events of a recipe source.
 *
 * Diagnostics found while iterating land in `report`; every iteration starts
 * over with a fresh report.
 */
export class EventParser implements Iterable<ParseEvent> {
  private readonly extensions: Extensions
  private readonly metadataOnly: boolean
  report = new SourceReport()

  constructor(
    readonly source: string,
    options: EventParserOptions = {},
  ) {
    this.metadataOnly = options.metadataOnly ?? false
    this.extensions = this.metadataOnly
      ? resolveExtensions({})
      : resolveExtensions(options.extensions)
  }

  *[Symbol.iterator](): Generator<ParseEvent, void, undefined> {
    const report = new SourceReport()
    this.report = report
    const { source, extensions } = this

    let bodyStart = 0
    const frontmatter = findFrontmatter(source)
    if (frontmatter) {
      bodyStart = frontmatter.end
      const result = parseYamlFrontmatter(frontmatter)
      if (result.warning) report.warning("parser", result.warning.message, result.warning.span)
      for (const { key, value } of result.entries) {
        yield { type: "metadata", key, value, span: { start: key.span.start, end: value.span.end } }
      }
    }

    const lines = splitLines(checkComments(tokenize(source, bodyStart), source, report))

    if (this.metadataOnly) {
      for (const line of lines) {
        if (line.tokens[0]?.kind !== "meta") continue
        const entry = metadataEntry({ source, tokens: line.tokens, extensions, report })
        if (entry) yield entry
      }
      return
    }

    for (const tokens of splitBlocks(lines, extensions.multilineSteps)) {
      yield* parseBlock({ source, tokens, extensions, report })
    }
  }
}

/** Parse every event of `source` */
export function parseEvents(
  source: string,
  options: EventParserOptions = {},
): { events: ParseEvent[]; report: SourceReport } {
  const parser = new EventParser(source, options)
  const events = [...parser]
  return { events, report: parser.report }
}
