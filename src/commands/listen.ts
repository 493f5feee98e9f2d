import { Command, InvalidArgumentError } from 'commander'
import { CommandBuilder } from '../core/command/builder'
import { Supervisor, type ListenSummary, type SupervisorOptions } from '../core/listener/supervisor'
import { resolveListenSettings, type ListenFlags, type ListenSettings } from '../core/config/load'
import type { ListenErrorEvent, ListenEvent, ListenOutputEvent, ListenSummaryJson, StopReason } from '../core/events/types'
import type { OutputSink, OutputStream } from '../types/output'
import { listenSummarySchema } from '../schemas/listen-summary.schema'
import { ajv, formatSchemaErrors } from '../utils/schema'
import { mapListenerError, type ErrorInfo } from '../utils/errors'
import { logger } from '../utils/logger'

interface ListenCommandOptions extends ListenFlags {
  readonly json?: boolean
}

function parseInteger(val: string): number {
  const n: number = Number(val)
  if (!/^\d+$/.test(val.trim()) || !Number.isSafeInteger(n)) throw new InvalidArgumentError('Expected a non-negative integer.')
  return n
}

function mb(n: number): string { return n.toFixed(1) }

/** Worker lines pass through unchanged in human mode and become NDJSON events under --json. */
export function createConsoleSink(json: boolean): OutputSink {
  if (json) {
    return {
      receive: (stream: OutputStream, line: string): void => {
        const evt: ListenOutputEvent = { action: 'listen', event: 'output', stream, line }
        logger.json(evt)
      }
    }
  }
  return {
    receive: (stream: OutputStream, line: string): void => {
      if (stream === 'stderr') process.stderr.write(`${line}\n`)
      else process.stdout.write(`${line}\n`)
    }
  }
}

const validateSummary = ajv.compile(listenSummarySchema)

export function buildSummary(reason: StopReason, runs: number, memoryMb: number, limitMb: number): ListenSummaryJson & { readonly schemaOk: boolean; readonly schemaErrors: readonly string[] } {
  const summary: ListenSummaryJson = { ok: true, action: 'listen', event: 'stop', reason, runs, memoryMb, limitMb, final: true }
  const ok: boolean = validateSummary(summary)
  return { ...summary, schemaOk: ok, schemaErrors: formatSchemaErrors(validateSummary.errors) }
}

/** Human logs or NDJSON for supervisor lifecycle events. */
export function createEventReporter(json: boolean, target: { readonly connection: string; readonly queue: string }): (evt: ListenEvent) => void {
  return (evt: ListenEvent): void => {
    if (json) {
      if (evt.event === 'memory-exceeded' || evt.event === 'max-runs') {
        logger.json(buildSummary(evt.event === 'memory-exceeded' ? 'memory' : 'max-runs', evt.runs, evt.memoryMb, evt.limitMb))
        return
      }
      logger.json(evt)
      return
    }
    switch (evt.event) {
      case 'start':
        logger.info(`Listening on ${target.connection} queue ${target.queue}`)
        logger.debug(`$ ${evt.commandLine}`)
        break
      case 'run':
        if (evt.timedOut) logger.warn(`Run #${evt.run} timed out after ${evt.durationMs}ms; continuing`)
        else if (!evt.ok) logger.warn(`Run #${evt.run} exited with ${evt.code !== null ? `code ${evt.code}` : `signal ${evt.signal ?? 'unknown'}`}; continuing`)
        else logger.debug(`Run #${evt.run} finished in ${evt.durationMs}ms (memory ${mb(evt.memoryMb)} MB)`)
        break
      case 'memory-exceeded':
        logger.note(`Memory ceiling reached (${mb(evt.memoryMb)} MB >= ${evt.limitMb} MB) after ${evt.runs} run(s); exiting for restart`)
        break
      case 'max-runs':
        logger.info(`Stopped after ${evt.runs} run(s)`)
        break
      case 'output':
      case 'error':
        break
    }
  }
}

export function reportError(err: unknown, json: boolean): ErrorInfo {
  const info: ErrorInfo = mapListenerError(err)
  if (json) {
    const evt: ListenErrorEvent = { action: 'listen', event: 'error', ...info }
    logger.json(evt)
  } else {
    logger.error(info.message)
    if (info.remedy !== undefined) logger.note(info.remedy)
  }
  return info
}

/** Resolve settings and supervise until the memory ceiling ends the process. */
export async function runListen(args: {
  readonly cwd: string
  readonly connection?: string
  readonly opts: ListenCommandOptions
  readonly supervisor?: Omit<SupervisorOptions, 'output' | 'onEvent'>
}): Promise<ListenSummary> {
  const json: boolean = args.opts.json === true
  const settings: ListenSettings = await resolveListenSettings({ cwd: args.cwd, connection: args.connection, flags: args.opts })
  const supervisor = new Supervisor(new CommandBuilder(settings.builder), {
    ...args.supervisor,
    onEvent: createEventReporter(json, settings)
  })
  supervisor.setOutputHandler(createConsoleSink(json))
  return await supervisor.listen(settings.connection, settings.queue, settings.options)
}

/**
 * Register the `listen` command.
 */
export function registerListenCommand(program: Command): void {
  program
    .command('listen')
    .description('Run the queue worker one job at a time, restarting it until the memory ceiling is reached')
    .argument('[connection]', 'Queue connection name (defaults to QUEUE_CONNECTION or config)')
    .option('--queue <name>', 'Queue to drain')
    .option('--delay <seconds>', 'Seconds before a failed job is retried', parseInteger)
    .option('--memory <mb>', 'Memory ceiling in megabytes', parseInteger)
    .option('--sleep <seconds>', 'Seconds the worker sleeps when the queue is empty', parseInteger)
    .option('--tries <n>', 'Attempts before a job is marked failed (0 = unlimited)', parseInteger)
    .option('--timeout <seconds>', 'Seconds a single worker run may take (0 disables)', parseInteger)
    .option('--env <name>', 'Environment the worker runs under')
    .option('--worker <path>', 'Worker executable')
    .option('--runtime <path>', 'Interpreter used to run the worker')
    .option('--subcommand <name>', 'Worker subcommand')
    .option('--command-path <dir>', 'Working directory for the worker')
    .option('--env-file <path>', 'Load extra env vars from a .env file and pass them to the worker')
    .option('--config <file>', 'Config file path')
    .option('--json', 'Output NDJSON events')
    .action(async (connection: string | undefined, opts: ListenCommandOptions): Promise<void> => {
      const json: boolean = opts.json === true || process.env.QL_JSON === '1'
      if (json) logger.setJsonOnly(true)
      try {
        await runListen({ cwd: process.cwd(), connection, opts: { ...opts, json } })
      } catch (err) {
        reportError(err, json)
        process.exitCode = 1
      }
    })
}
