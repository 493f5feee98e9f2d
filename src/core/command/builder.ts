import type { ProcessSpec } from '../../types/process-spec'
import type { RunOptions } from '../../types/run-options'
import { selectEscaper, shellFor, type ShellDialect, type ShellEscaper } from './escape'
import { constants } from '../../constants'

export interface CommandBuilderSettings {
  /** Working directory applied to every run. */
  readonly commandPath: string
  readonly workerBinary: string
  readonly runtime?: string
  readonly subcommand?: string
  readonly env?: Readonly<Record<string, string>>
  readonly dialect: ShellDialect
  /** Overrides the dialect's default shell. */
  readonly shell?: string
}

/**
 * Turns a connection, queue and run options into the worker command line.
 * Pure: no I/O, no errors for valid `RunOptions`.
 */
export class CommandBuilder {
  private readonly escape: ShellEscaper
  private readonly head: readonly string[]
  private readonly shell: string

  constructor(private readonly settings: CommandBuilderSettings) {
    this.escape = selectEscaper(settings.dialect)
    this.shell = settings.shell ?? shellFor(settings.dialect)
    const head: string[] = []
    if (settings.runtime !== undefined && settings.runtime.length > 0) head.push(this.escape(settings.runtime))
    head.push(this.escape(settings.workerBinary))
    head.push(settings.subcommand ?? constants.DEFAULT_SUBCOMMAND)
    this.head = head
  }

  private launchTarget(): Pick<ProcessSpec, 'program' | 'script'> {
    const { runtime, workerBinary } = this.settings
    if (runtime !== undefined && runtime.length > 0) return { program: runtime, script: workerBinary }
    return { program: workerBinary }
  }

  build(connection: string, queue: string, options: RunOptions): ProcessSpec {
    const argv: string[] = [...this.head]
    // Without --env the worker falls back to its own default environment.
    if (options.environment !== null) argv.push(`--env=${this.escape(options.environment)}`)
    argv.push(
      '--once',
      `--queue=${this.escape(queue)}`,
      `--delay=${options.delay}`,
      `--memory=${options.memory}`,
      `--sleep=${options.sleep}`,
      `--tries=${options.maxTries}`,
      this.escape(connection)
    )
    return {
      argv,
      commandLine: argv.join(' '),
      cwd: this.settings.commandPath,
      env: { ...(this.settings.env ?? {}) },
      timeoutMs: options.timeout === null ? undefined : options.timeout * 1000,
      shell: this.shell,
      dialect: this.settings.dialect,
      ...this.launchTarget()
    }
  }
}
