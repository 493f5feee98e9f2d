/** Options handed to every worker run. Frozen once constructed; build a new one per `listen` call. */
export interface RunOptions {
  /** Deployment environment tag passed through as `--env`. */
  readonly environment: string | null
  /** Seconds before a failed item is retried. */
  readonly delay: number
  /** Memory ceiling in megabytes for the supervising process. */
  readonly memory: number
  /** Seconds the worker sleeps when the queue is empty. */
  readonly sleep: number
  /** Attempts before an item is marked failed (0 = unlimited). */
  readonly maxTries: number
  /** Wall-clock limit in seconds for a single worker run; null disables it. */
  readonly timeout: number | null
}

/** Loose input accepted by `createRunOptions`, e.g. from CLI flags or a config file. */
export interface RunOptionsInput {
  readonly environment?: string | null
  readonly delay?: number
  readonly memory?: number
  readonly sleep?: number
  readonly maxTries?: number
  readonly timeout?: number | null
}
