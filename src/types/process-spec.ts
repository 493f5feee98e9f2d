import type { ShellDialect } from '../core/command/escape'

/**
 * Ready-to-launch description of the worker process. Derived once per `listen`
 * call and reused unchanged by every run.
 */
export interface ProcessSpec {
  /** Escaped tokens, executable first. */
  readonly argv: readonly string[]
  /** `argv` joined by single spaces, as handed to the shell. */
  readonly commandLine: string
  readonly cwd: string
  /** Variables merged over the supervisor's own environment. */
  readonly env: Readonly<Record<string, string>>
  /** Undefined when runs are not time-limited. */
  readonly timeoutMs?: number
  /** Shell that interprets `commandLine`; must match the escaping dialect. */
  readonly shell: string
  readonly dialect: ShellDialect
  /** Unescaped first token: the runtime when set, otherwise the worker. */
  readonly program: string
  /** Unescaped worker path when it runs under a runtime. */
  readonly script?: string
}
