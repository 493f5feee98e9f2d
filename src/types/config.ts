import type { RunOptionsInput } from './run-options'

/** Shape of `queue-listener.config.json`. Every field is optional. */
export interface ListenerConfigFile {
  readonly connection?: string
  readonly queue?: string
  /** Working directory for every worker run; relative paths resolve against the config file's directory. */
  readonly commandPath?: string
  /** Worker executable; relative paths resolve against `commandPath`. */
  readonly workerBinary?: string
  /** Interpreter placed before the worker, e.g. a path to node. */
  readonly runtime?: string
  readonly subcommand?: string
  /** Extra variables for the worker process. */
  readonly env?: Readonly<Record<string, string>>
  readonly options?: RunOptionsInput
}
