import { type TriageRuntime, getRuntime } from '@support-triage/core'
import {
  type OutputFormat,
  type OutputFormatter,
  type OutputStream,
  createOutputFormatter,
  resolveOutputFormat,
} from './output'

export interface CommandContext {
  stdout: OutputStream
  stderr: OutputStream
  format: OutputFormat
  output: OutputFormatter
  quiet: boolean
  /** Resolved on first use so `--help` never opens a database connection */
  runtime: () => TriageRuntime
  now: () => Date
}

export function createContext(
  overrides: Partial<CommandContext> = {}
): CommandContext {
  const stdout = overrides.stdout ?? process.stdout
  const stderr = overrides.stderr ?? process.stderr
  const quiet = overrides.quiet ?? false
  const format = resolveOutputFormat(overrides.format, stdout)
  const output =
    overrides.output ??
    createOutputFormatter({ format, stdout, stderr, quiet })

  return {
    stdout,
    stderr,
    format,
    output,
    quiet,
    runtime: overrides.runtime ?? getRuntime,
    now: overrides.now ?? (() => new Date()),
  }
}
