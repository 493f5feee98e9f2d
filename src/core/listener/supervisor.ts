import type { CommandBuilder } from '../command/builder'
import type { ProcessRunner, RunResult } from '../process/runner'
import { NodeProcessRunner } from '../process/runner'
import type { ProcessSpec } from '../../types/process-spec'
import type { RunOptions } from '../../types/run-options'
import type { OutputSink, OutputStream } from '../../types/output'
import type { ListenEvent, StopReason } from '../events/types'
import { processMemoryProbe, type MemoryProbe } from './memory'
import { constants } from '../../constants'
import { logger } from '../../utils/logger'

export type ListenerState = 'idle' | 'running' | 'continuing' | 'stopping'

export interface RunOutcome {
  readonly kind: 'continue' | 'stop'
  readonly run: number
  readonly result: RunResult
  readonly memoryMb: number
  readonly limitMb: number
}

export interface ListenSummary {
  readonly runs: number
  readonly reason: StopReason
  readonly memoryMb: number
  readonly limitMb: number
}

/** Ends the whole program. Production exits; tests record and return. */
export type Terminator = (code: number) => void

export interface SupervisorOptions {
  readonly runner?: ProcessRunner
  readonly memory?: MemoryProbe
  readonly terminate?: Terminator
  readonly output?: OutputSink
  readonly onEvent?: (evt: ListenEvent) => void
  /** Bounds the loop. Unset in production, where only the memory ceiling stops it. */
  readonly maxRuns?: number
}

const exitProcess: Terminator = (code: number): void => { process.exit(code) }

/**
 * Supervises one worker at a time: run it once, check the supervisor's own
 * memory, repeat. The loop ends only by terminating the program.
 */
export class Supervisor {
  private readonly runner: ProcessRunner
  private readonly memory: MemoryProbe
  private readonly terminate: Terminator
  private readonly onEvent?: (evt: ListenEvent) => void
  private readonly maxRuns?: number
  private output?: OutputSink
  private runs = 0
  private stateValue: ListenerState = 'idle'

  constructor(private readonly builder: CommandBuilder, opts: SupervisorOptions = {}) {
    this.runner = opts.runner ?? new NodeProcessRunner()
    this.memory = opts.memory ?? processMemoryProbe
    this.terminate = opts.terminate ?? exitProcess
    this.onEvent = opts.onEvent
    this.maxRuns = opts.maxRuns
    this.output = opts.output
  }

  get state(): ListenerState { return this.stateValue }

  /** Replace the output sink. Set it before `listen`; `undefined` discards output. */
  setOutputHandler(sink: OutputSink | undefined): void {
    this.output = sink
  }

  async listen(connection: string, queue: string, options: RunOptions): Promise<ListenSummary> {
    const spec: ProcessSpec = this.builder.build(connection, queue, options)
    this.emit({ action: 'listen', event: 'start', commandLine: spec.commandLine, cwd: spec.cwd, timeoutMs: spec.timeoutMs })
    logger.debug(`Worker command: ${spec.commandLine} (cwd ${spec.cwd})`)
    let shouldStop = false
    let last: RunOutcome | undefined
    while (!shouldStop) {
      last = await this.runOnce(spec, options.memory)
      shouldStop = last.kind === 'stop'
      if (!shouldStop && this.maxRuns !== undefined && last.run >= this.maxRuns) {
        this.emit({ action: 'listen', event: 'max-runs', runs: last.run, memoryMb: last.memoryMb, limitMb: last.limitMb })
        this.stateValue = 'idle'
        return { runs: last.run, reason: 'max-runs', memoryMb: last.memoryMb, limitMb: last.limitMb }
      }
    }
    return { runs: last?.run ?? 0, reason: 'memory', memoryMb: last?.memoryMb ?? 0, limitMb: options.memory }
  }

  /**
   * Run the worker to completion, then stop the program when the supervisor's
   * memory has reached `memoryLimitMb`. Timeouts and failed exits only end the run.
   */
  async runOnce(spec: ProcessSpec, memoryLimitMb: number): Promise<RunOutcome> {
    this.stateValue = 'running'
    const result: RunResult = await this.runner.run(spec, (stream: OutputStream, line: string) => { this.handleWorkerOutput(stream, line) })
    const run: number = ++this.runs
    const memoryMb: number = this.memory.usageMb()
    this.emit({
      action: 'listen',
      event: 'run',
      run,
      ok: result.ok,
      code: result.code,
      signal: result.signal,
      timedOut: result.timedOut,
      durationMs: result.durationMs,
      memoryMb
    })
    if (memoryMb >= memoryLimitMb) {
      this.stateValue = 'stopping'
      this.emit({ action: 'listen', event: 'memory-exceeded', runs: run, memoryMb, limitMb: memoryLimitMb })
      this.stop()
      return { kind: 'stop', run, result, memoryMb, limitMb: memoryLimitMb }
    }
    this.stateValue = 'continuing'
    return { kind: 'continue', run, result, memoryMb, limitMb: memoryLimitMb }
  }

  memoryExceeded(memoryLimitMb: number): boolean {
    return this.memory.usageMb() >= memoryLimitMb
  }

  /** Terminate the whole program so the process manager restarts it with fresh memory. */
  stop(): void {
    this.stateValue = 'stopping'
    this.terminate(constants.MEMORY_EXIT_CODE)
  }

  private handleWorkerOutput(stream: OutputStream, line: string): void {
    this.output?.receive(stream, line)
  }

  private emit(evt: ListenEvent): void {
    this.onEvent?.(evt)
  }
}
