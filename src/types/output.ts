export type OutputStream = 'stdout' | 'stderr'

export interface OutputEvent {
  readonly stream: OutputStream
  readonly line: string
}

/** Receives worker output one line at a time, in emission order per stream. */
export interface OutputSink {
  receive(stream: OutputStream, line: string): void
}
