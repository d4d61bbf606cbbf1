import type {
  Diagnostic,
  DiagnosticLabel,
  DiagnosticStage,
  Severity,
  SourcePosition,
  Span,
} from "./types"

/**
 * Maps offsets in a source text to line/column positions
 */
export class LineIndex {
  private readonly starts: number[] = [0]

  constructor(private readonly source: string) {
    for (let i = 0; i < source.length; i += 1) {
      if (source[i] === "\n") this.starts.push(i + 1)
    }
  }

  /** 1-based line and column of an offset. Offsets past the end clamp to it. */
  locate(offset: number): SourcePosition {
    const clamped = Math.max(0, Math.min(offset, this.source.length))
    let lo = 0
    let hi = this.starts.length - 1
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1
      if ((this.starts[mid] ?? 0) <= clamped) lo = mid
      else hi = mid - 1
    }
    const lineStart = this.starts[lo] ?? 0
    return { line: lo + 1, column: clamped - lineStart + 1, offset: clamped }
  }

  /** Text of a 1-based line, without its line break */
  lineText(line: number): string {
    const start = this.starts[line - 1]
    if (start === undefined) return ""
    const next = this.starts[line]
    const end = next === undefined ? this.source.length : next - 1
    return this.source.slice(start, end).replace(/\r$/, "")
  }
}

interface DiagnosticExtras {
  labels?: DiagnosticLabel[]
  help?: string
}

export function createDiagnostic(
  severity: Severity,
  stage: DiagnosticStage,
  message: string,
  span: Span,
  extras: DiagnosticExtras = {},
): Diagnostic {
  const diagnostic: Diagnostic = {
    severity,
    message,
    span,
    labels: extras.labels ?? [],
    stage,
  }
  if (extras.help !== undefined) diagnostic.help = extras.help
  return diagnostic
}

export interface FormatOptions {
  /** Name shown in the `-->` location line */
  name?: string
}

/**
 * Ordered collection of the diagnostics raised for one source text
 */
export class SourceReport {
  private readonly items: Diagnostic[]

  constructor(diagnostics: Iterable<Diagnostic> = []) {
    this.items = [...diagnostics]
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.items
  }

  get size(): number {
    return this.items.length
  }

  push(diagnostic: Diagnostic): void {
    this.items.push(diagnostic)
  }

  error(stage: DiagnosticStage, message: string, span: Span, extras?: DiagnosticExtras): void {
    this.items.push(createDiagnostic("error", stage, message, span, extras))
  }

  warning(stage: DiagnosticStage, message: string, span: Span, extras?: DiagnosticExtras): void {
    this.items.push(createDiagnostic("warning", stage, message, span, extras))
  }

  append(other: SourceReport): void {
    this.items.push(...other.items)
  }

  errors(): Diagnostic[] {
    return this.items.filter(d => d.severity === "error")
  }

  warnings(): Diagnostic[] {
    return this.items.filter(d => d.severity === "warning")
  }

  hasErrors(): boolean {
    return this.items.some(d => d.severity === "error")
  }

  isEmpty(): boolean {
    return this.items.length === 0
  }

  /** A new report with only the errors */
  removeWarnings(): SourceReport {
    return new SourceReport(this.errors())
  }

  /** A new report with this report's diagnostics followed by `other`'s */
  zip(other: SourceReport): SourceReport {
    return new SourceReport([...this.items, ...other.items])
  }

  format(source: string, options: FormatOptions = {}): string {
    const index = new LineIndex(source)
    return this.items.map(d => formatDiagnostic(d, index, options.name ?? "recipe")).join("\n\n")
  }
}

interface Marker {
  span: Span
  char: "^" | "-"
  message?: string
}

function formatDiagnostic(diagnostic: Diagnostic, index: LineIndex, name: string): string {
  const primaryLabel = diagnostic.labels.find(
    l => l.span.start === diagnostic.span.start && l.span.end === diagnostic.span.end,
  )
  const markers: Marker[] = [
    { span: diagnostic.span, char: "^", message: primaryLabel?.message },
    ...diagnostic.labels
      .filter(l => l !== primaryLabel)
      .map(l => ({ span: l.span, char: "-" as const, message: l.message })),
  ]

  const start = index.locate(diagnostic.span.start)
  const lastLine = Math.max(...markers.map(m => index.locate(m.span.start).line))
  const gutter = " ".repeat(String(lastLine).length)

  const lines = [
    `${diagnostic.severity}: ${diagnostic.message}`,
    `${gutter}--> ${name}:${start.line}:${start.column}`,
    `${gutter} |`,
  ]

  for (const marker of markers) {
    const pos = index.locate(marker.span.start)
    const text = index.lineText(pos.line)
    const available = Math.max(1, text.length - (pos.column - 1))
    const width = Math.min(Math.max(1, marker.span.end - marker.span.start), available)
    const pointer = `${" ".repeat(pos.column - 1)}${marker.char.repeat(width)}`
    lines.push(`${String(pos.line).padStart(gutter.length)} | ${text}`)
    lines.push(`${gutter} | ${pointer}${marker.message ? ` ${marker.message}` : ""}`)
  }

  if (diagnostic.help) {
    lines.push(`${gutter} = help: ${diagnostic.help}`)
  }

  return lines.join("\n")
}
