import { spawn, type ChildProcess } from 'node:child_process'
import { createInterface } from 'node:readline'
import type { Readable } from 'node:stream'
import type { ProcessSpec } from '../../types/process-spec'
import type { OutputStream } from '../../types/output'
import { constants } from '../../constants'
import { errnoCode, launchErrorFromSpawn } from '../../utils/errors'
import { logger } from '../../utils/logger'
import { locateProgram } from './locate'

export interface RunResult {
  readonly ok: boolean
  readonly code: number | null
  readonly signal: NodeJS.Signals | null
  readonly timedOut: boolean
  readonly durationMs: number
}

export type LineHandler = (stream: OutputStream, line: string) => void

/**
 * Runs one worker process to completion. Resolves for every run that started,
 * whatever its exit status; rejects with `WorkerLaunchError` when it could not
 * start.
 */
export interface ProcessRunner {
  run(spec: ProcessSpec, onLine: LineHandler): Promise<RunResult>
}

export interface NodeProcessRunnerOptions {
  readonly killSignal?: NodeJS.Signals
  /** Milliseconds between `killSignal` and SIGKILL after a timeout. */
  readonly killGraceMs?: number
}

function readLines(input: Readable | null, stream: OutputStream, onLine: LineHandler): Promise<void> {
  if (input === null) return Promise.resolve()
  const rl = createInterface({ input, crlfDelay: Infinity })
  rl.on('line', (line: string) => { onLine(stream, line) })
  return new Promise<void>((resolve) => { rl.once('close', () => resolve()) })
}

export class NodeProcessRunner implements ProcessRunner {
  private readonly killSignal: NodeJS.Signals
  private readonly killGraceMs: number

  constructor(opts: NodeProcessRunnerOptions = {}) {
    this.killSignal = opts.killSignal ?? 'SIGTERM'
    this.killGraceMs = opts.killGraceMs ?? constants.KILL_GRACE_SECONDS * 1000
  }

  /**
   * Signal the shell and everything it started. POSIX workers run in their own
   * process group; cmd.exe trees are ended with taskkill.
   */
  private signalTree(child: ChildProcess, spec: ProcessSpec, signal: NodeJS.Signals): void {
    const pid: number | undefined = child.pid
    if (pid === undefined) return
    if (spec.dialect === 'native') {
      child.kill(signal)
      spawn('taskkill', ['/T', '/F', '/PID', String(pid)], { stdio: 'ignore', windowsHide: true })
        .once('error', (err: Error) => { logger.warn(`taskkill failed for pid ${pid}: ${err.message}`) })
      return
    }
    try {
      process.kill(-pid, signal)
    } catch (err) {
      if (errnoCode(err) === 'ESRCH') return
      logger.warn(`Could not signal worker group ${pid}: ${err instanceof Error ? err.message : String(err)}`)
      child.kill(signal)
    }
  }

  async run(spec: ProcessSpec, onLine: LineHandler): Promise<RunResult> {
    await locateProgram(spec)
    const started: number = Date.now()
    return await new Promise<RunResult>((resolve, reject) => {
      let settled = false
      let timedOut = false
      let timeoutTimer: NodeJS.Timeout | undefined
      let killTimer: NodeJS.Timeout | undefined
      const clearTimers = (): void => {
        if (timeoutTimer) clearTimeout(timeoutTimer)
        if (killTimer) clearTimeout(killTimer)
      }

      const child: ChildProcess = spawn(spec.commandLine, {
        cwd: spec.cwd,
        env: { ...process.env, ...spec.env },
        shell: spec.shell,
        detached: spec.dialect === 'posix',
        windowsHide: true,
        stdio: ['ignore', 'pipe', 'pipe']
      })
      // Drain both pipes while the worker runs so it never blocks on a full buffer.
      const drained: Promise<void> = Promise.all([
        readLines(child.stdout, 'stdout', onLine),
        readLines(child.stderr, 'stderr', onLine)
      ]).then(() => undefined)

      child.once('error', (err: Error) => {
        if (settled) return
        settled = true
        clearTimers()
        reject(launchErrorFromSpawn(err, spec.commandLine, spec.cwd))
      })

      child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
        if (settled) return
        settled = true
        clearTimers()
        void drained.then(() => {
          resolve({ ok: code === 0 && !timedOut, code, signal, timedOut, durationMs: Date.now() - started })
        }, reject)
      })

      if (spec.timeoutMs !== undefined && spec.timeoutMs > 0) {
        timeoutTimer = setTimeout(() => {
          timedOut = true
          this.signalTree(child, spec, this.killSignal)
          killTimer = setTimeout(() => { this.signalTree(child, spec, 'SIGKILL') }, this.killGraceMs)
        }, spec.timeoutMs)
      }
    })
  }
}
