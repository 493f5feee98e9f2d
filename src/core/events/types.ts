/**
 * Lifecycle events emitted by the supervisor. Consumed by the CLI for human
 * logs or NDJSON output.
 */
import type { OutputStream } from '../../types/output'

export type StopReason = 'memory' | 'max-runs'

export interface ListenStartEvent {
  readonly action: 'listen'
  readonly event: 'start'
  readonly commandLine: string
  readonly cwd: string
  readonly timeoutMs?: number
}

export interface ListenRunEvent {
  readonly action: 'listen'
  readonly event: 'run'
  readonly run: number
  readonly ok: boolean
  readonly code: number | null
  readonly signal: string | null
  readonly timedOut: boolean
  readonly durationMs: number
  readonly memoryMb: number
}

export interface ListenOutputEvent {
  readonly action: 'listen'
  readonly event: 'output'
  readonly stream: OutputStream
  readonly line: string
}

/** Deliberate stop. Never reported as an error. */
export interface ListenStopEvent {
  readonly action: 'listen'
  readonly event: 'memory-exceeded' | 'max-runs'
  readonly runs: number
  readonly memoryMb: number
  readonly limitMb: number
}

export interface ListenErrorEvent {
  readonly action: 'listen'
  readonly event: 'error'
  readonly code: string
  readonly message: string
  readonly remedy?: string
}

export type ListenEvent = ListenStartEvent | ListenRunEvent | ListenOutputEvent | ListenStopEvent | ListenErrorEvent

/** Final JSON summary written when the listener stops. */
export interface ListenSummaryJson {
  readonly ok: boolean
  readonly action: 'listen'
  readonly event: 'stop'
  readonly reason: StopReason
  readonly runs: number
  readonly memoryMb: number
  readonly limitMb: number
  readonly final: true
}
