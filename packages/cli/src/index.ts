#!/usr/bin/env tsx
import { closeDb } from '@support-triage/database'
import { flushAxiom } from '@support-triage/core'
import { EXIT_CODES, formatError, toCLIError } from './core/errors'
import { buildProgram } from './program'

async function main(): Promise<void> {
  try {
    await buildProgram().parseAsync(process.argv)
  } catch (error) {
    process.stderr.write(`ERROR: ${formatError(error)}\n`)
    process.exitCode = toCLIError(error).exitCode
  } finally {
    await flushAxiom()
    await closeDb()
  }
}

main().catch((error: unknown) => {
  process.stderr.write(`ERROR: ${formatError(error)}\n`)
  process.exitCode = EXIT_CODES.error
})
