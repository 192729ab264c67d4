import { inspect } from 'node:util'

export type OutputFormat = 'json' | 'text'

export type TableColumn = string | { key: string; label?: string }
export type TableRow = Record<string, unknown>

/** Anything lines can be written to; process.stdout qualifies */
export interface OutputStream {
  write(chunk: string): unknown
  isTTY?: boolean
}

export interface OutputFormatter {
  data(value: unknown): void
  table(rows: TableRow[], columns?: TableColumn[]): void
  /** One JSON document per line, regardless of format */
  lines(values: readonly unknown[]): void
  message(text: string): void
  success(text: string): void
  warn(text: string): void
  error(text: string): void
}

export interface OutputFormatterConfig {
  format?: OutputFormat
  stdout: OutputStream
  stderr: OutputStream
  quiet?: boolean
}

const writeLine = (stream: OutputStream, line: string): void => {
  stream.write(`${line}\n`)
}

const valueToCell = (value: unknown): string => {
  if (value === null || value === undefined) return ''
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value)
  }
  if (value instanceof Date) return value.toISOString()
  return JSON.stringify(value)
}

const normalizeColumns = (
  columns: TableColumn[] | undefined,
  rows: TableRow[]
): { key: string; label: string }[] => {
  if (columns && columns.length > 0) {
    return columns.map((column) =>
      typeof column === 'string'
        ? { key: column, label: column }
        : { key: column.key, label: column.label ?? column.key }
    )
  }
  const first = rows[0]
  if (!first) return []
  return Object.keys(first).map((key) => ({ key, label: key }))
}

export const renderTable = (
  rows: TableRow[],
  columns?: TableColumn[]
): string[] => {
  const normalized = normalizeColumns(columns, rows)
  if (normalized.length === 0) return []

  const widths = normalized.map((column) => column.label.length)
  for (const row of rows) {
    normalized.forEach((column, index) => {
      const cell = valueToCell(row[column.key])
      widths[index] = Math.max(widths[index] ?? 0, cell.length)
    })
  }

  const renderRow = (cells: string[]) =>
    cells
      .map((cell, index) => cell.padEnd(widths[index] ?? 0, ' '))
      .join('  ')
      .trimEnd()

  return [
    renderRow(normalized.map((column) => column.label)),
    ...rows.map((row) =>
      renderRow(normalized.map((column) => valueToCell(row[column.key])))
    ),
  ]
}

export const resolveOutputFormat = (
  format: OutputFormat | undefined,
  stdout: OutputStream
): OutputFormat => {
  if (format) return format
  return stdout.isTTY ? 'text' : 'json'
}

abstract class BaseFormatter implements OutputFormatter {
  protected stdout: OutputStream
  protected stderr: OutputStream
  protected quiet: boolean

  constructor(config: OutputFormatterConfig) {
    this.stdout = config.stdout
    this.stderr = config.stderr
    this.quiet = config.quiet ?? false
  }

  abstract data(value: unknown): void
  abstract table(rows: TableRow[], columns?: TableColumn[]): void

  lines(values: readonly unknown[]): void {
    for (const value of values) {
      writeLine(this.stdout, JSON.stringify(value))
    }
  }

  // status lines go to stderr so stdout stays pipeable
  message(text: string): void {
    if (!this.quiet) writeLine(this.stderr, text)
  }

  success(text: string): void {
    if (!this.quiet) writeLine(this.stderr, `SUCCESS: ${text}`)
  }

  warn(text: string): void {
    if (!this.quiet) writeLine(this.stderr, `WARN: ${text}`)
  }

  error(text: string): void {
    writeLine(this.stderr, `ERROR: ${text}`)
  }
}

export class JsonFormatter extends BaseFormatter {
  data(value: unknown): void {
    writeLine(this.stdout, JSON.stringify(value))
  }

  table(rows: TableRow[], columns?: TableColumn[]): void {
    const normalized = normalizeColumns(columns, rows)
    this.data({ columns: normalized.map((column) => column.label), rows })
  }
}

export class TextFormatter extends BaseFormatter {
  data(value: unknown): void {
    writeLine(
      this.stdout,
      typeof value === 'string'
        ? value
        : inspect(value, { depth: null, colors: false })
    )
  }

  table(rows: TableRow[], columns?: TableColumn[]): void {
    for (const line of renderTable(rows, columns)) {
      writeLine(this.stdout, line)
    }
  }
}

export const createOutputFormatter = (
  config: OutputFormatterConfig
): OutputFormatter => {
  const format = resolveOutputFormat(config.format, config.stdout)
  return format === 'json' ? new JsonFormatter(config) : new TextFormatter(config)
}
