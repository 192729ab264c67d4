import { Command } from 'commander'
import { approvalsListAction, approvalsResolveAction } from './commands/approvals'
import { sessionsShowAction } from './commands/sessions'
import { tracesExportAction } from './commands/traces'
import { type CommandContext, createContext } from './core/context'
import type { OutputFormat } from './core/output'

type ContextFactory = (overrides: Partial<CommandContext>) => CommandContext

function parseFormat(value: unknown): OutputFormat | undefined {
  return value === 'json' || value === 'text' ? value : undefined
}

/**
 * Build the `triage` command tree. `makeContext` lets tests swap in an
 * in-memory runtime and captured streams.
 */
export function buildProgram(makeContext: ContextFactory = createContext): Command {
  const program = new Command()

  program
    .name('triage')
    .description('Operator tools for the support triage engine')
    .option('--format <format>', 'Output format: text or json')
    .option('--json', 'Shorthand for --format json')
    .option('-q, --quiet', 'Suppress status messages')

  const buildContext = (command: Command): CommandContext => {
    const opts = command.optsWithGlobals()
    return makeContext({
      format: opts.json === true ? 'json' : parseFormat(opts.format),
      quiet: opts.quiet === true,
    })
  }

  const approvals = program
    .command('approvals')
    .description('Review tool calls waiting on a human')

  approvals
    .command('list')
    .description('List pending approvals, oldest first')
    .action(async (_options, command: Command) => {
      await approvalsListAction(buildContext(command))
    })

  approvals
    .command('resolve <executionId> <verdict>')
    .description('Approve or reject a pending tool call')
    .option('--reviewer <name>', 'Recorded as cli:<name> (defaults to $USER)')
    .option('--reason <text>', 'Why, kept on the execution')
    .action(
      async (
        executionId: string,
        verdict: string,
        options: { reviewer?: string; reason?: string },
        command: Command
      ) => {
        await approvalsResolveAction(
          buildContext(command),
          executionId,
          verdict,
          options
        )
      }
    )

  program
    .command('traces')
    .description('Decision traces')
    .command('export')
    .description('Write traces as JSON lines to stdout')
    .option('--since <date>', 'Only traces created at or after this time')
    .option('--session <id>', 'Only traces for one session')
    .option('--limit <n>', 'At most n traces')
    .action(
      async (
        options: { since?: string; session?: string; limit?: string },
        command: Command
      ) => {
        await tracesExportAction(buildContext(command), options)
      }
    )

  program
    .command('sessions')
    .description('Inspect sessions')
    .command('show <sessionId>')
    .description('Show state, transcript and decisions for a session')
    .action(async (sessionId: string, _options, command: Command) => {
      await sessionsShowAction(buildContext(command), sessionId)
    })

  return program
}
