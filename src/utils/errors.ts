export interface ErrorInfo {
  readonly code: string
  readonly message: string
  readonly remedy?: string
}

export type LaunchErrorCode = 'WORKER_NOT_FOUND' | 'WORKER_NOT_EXECUTABLE' | 'WORKER_LAUNCH_FAILED'

/**
 * The worker could not be started at all. Never retried: retrying a launch
 * failure would spin forever.
 */
export class WorkerLaunchError extends Error {
  override readonly name = 'WorkerLaunchError'

  constructor(
    readonly code: LaunchErrorCode,
    readonly commandLine: string,
    readonly cwd: string,
    message: string,
    options?: { readonly cause?: unknown }
  ) {
    super(message, options)
  }
}

/** Invalid options or configuration. `problems` lists every failing field. */
export class ConfigError extends Error {
  override readonly name = 'ConfigError'

  constructor(message: string, readonly problems: readonly string[] = []) {
    super(problems.length > 0 ? `${message}: ${problems.join('; ')}` : message)
  }
}

export function errnoCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined
  const code: unknown = err.code
  return typeof code === 'string' ? code : undefined
}

/** Classify a spawn `error` event. */
export function launchErrorFromSpawn(err: unknown, commandLine: string, cwd: string): WorkerLaunchError {
  const code: string | undefined = errnoCode(err)
  const detail: string = err instanceof Error ? err.message : String(err)
  if (code === 'ENOENT') {
    return new WorkerLaunchError('WORKER_NOT_FOUND', commandLine, cwd, `Cannot launch worker (shell or working directory ${cwd} not found): ${detail}`, { cause: err })
  }
  if (code === 'EACCES' || code === 'EPERM') {
    return new WorkerLaunchError('WORKER_NOT_EXECUTABLE', commandLine, cwd, `Permission denied launching worker: ${detail}`, { cause: err })
  }
  return new WorkerLaunchError('WORKER_LAUNCH_FAILED', commandLine, cwd, `Failed to launch worker: ${detail}`, { cause: err })
}

/** Map anything thrown out of `listen` to a code, message and remedy for the CLI. */
export function mapListenerError(err: unknown): ErrorInfo {
  if (err instanceof WorkerLaunchError) {
    if (err.code === 'WORKER_NOT_FOUND') {
      return { code: err.code, message: err.message, remedy: 'Check --worker/--runtime paths and that --command-path exists.' }
    }
    if (err.code === 'WORKER_NOT_EXECUTABLE') {
      return { code: err.code, message: err.message, remedy: `Make the worker executable (chmod +x) or pass --runtime.` }
    }
    return { code: err.code, message: err.message }
  }
  if (err instanceof ConfigError) {
    return { code: 'CONFIG_INVALID', message: err.message, remedy: 'Fix the listed options in flags or queue-listener.config.json.' }
  }
  const message: string = err instanceof Error ? err.message : String(err)
  return { code: 'LISTENER_UNKNOWN_ERROR', message: message.trim() || 'Unknown listener error.' }
}
