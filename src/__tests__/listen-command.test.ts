import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { Command } from 'commander'
import { buildSummary, createConsoleSink, createEventReporter, registerListenCommand, reportError, runListen } from '../commands/listen'
import { logger } from '../utils/logger'
import { setColorMode } from '../utils/colors'
import { WorkerLaunchError } from '../utils/errors'
import { FakeRunner, memoryReadings } from '../../tests/helpers/fakes'

async function withTemp<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), 'queue-listener-cmd-'))
  try { return await fn(dir) } finally { await rm(dir, { recursive: true, force: true }) }
}

function resetLogger(): void {
  logger.setJsonOnly(false)
  logger.setNoEmoji(true)
  logger.setLevel('info')
  logger.setTimestamps(false)
  setColorMode('never')
}

describe('listen command', () => {
  let logSpy: MockInstance<typeof console.log>
  let errSpy: MockInstance<typeof console.error>

  beforeEach(() => {
    resetLogger()
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {})
    errSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    resetLogger()
  })

  it('streams NDJSON events and a validated stop summary', async () => {
    await withTemp(async (dir) => {
      await writeFile(join(dir, 'queue-listener.config.json'), JSON.stringify({ workerBinary: 'worker' }))
      logger.setJsonOnly(true)
      const terminate = vi.fn()
      const summary = await runListen({
        cwd: dir,
        connection: 'redis',
        opts: { queue: 'emails', json: true },
        supervisor: { runner: new FakeRunner([{ lines: [['stdout', 'hello']] }]), memory: memoryReadings(500), terminate }
      })
      expect(summary).toEqual({ runs: 1, reason: 'memory', memoryMb: 500, limitMb: 128 })
      expect(terminate).toHaveBeenCalledWith(0)
      const lines: Record<string, unknown>[] = logSpy.mock.calls.map((c) => JSON.parse(String(c[0])))
      expect(lines.map((l) => l.event)).toEqual(['start', 'output', 'run', 'stop'])
      expect(lines[1]).toEqual({ action: 'listen', event: 'output', stream: 'stdout', line: 'hello' })
      expect(lines[3]).toEqual({
        ok: true, action: 'listen', event: 'stop', reason: 'memory', runs: 1, memoryMb: 500, limitMb: 128, final: true, schemaOk: true, schemaErrors: []
      })
    })
  })

  it('prints a note, not an error, when the memory ceiling stops the listener', async () => {
    await withTemp(async (dir) => {
      await writeFile(join(dir, 'queue-listener.config.json'), JSON.stringify({ workerBinary: 'worker' }))
      vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
      await runListen({
        cwd: dir,
        opts: { memory: 64 },
        supervisor: { runner: new FakeRunner(), memory: memoryReadings(64), terminate: vi.fn() }
      })
      const out = logSpy.mock.calls.map((c) => String(c[0]))
      expect(out).toEqual([
        '[info] Listening on default queue default',
        '[info] [note] Memory ceiling reached (64.0 MB >= 64 MB) after 1 run(s); exiting for restart'
      ])
      expect(errSpy).not.toHaveBeenCalled()
    })
  })

  it('rejects a non-integer --memory flag', async () => {
    const program = new Command()
    program.exitOverride()
    program.configureOutput({ writeErr: () => {}, writeOut: () => {} })
    registerListenCommand(program)
    await expect(program.parseAsync(['node', 'queue-listener', 'listen', '--memory', 'lots'])).rejects.toThrow(/non-negative integer/)
  })
})

describe('createConsoleSink', () => {
  it('writes stdout and stderr lines to the matching stream', () => {
    const out = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
    const err = vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
    const sink = createConsoleSink(false)
    sink.receive('stdout', 'Processed job 1')
    sink.receive('stderr', 'warning: slow')
    expect(out).toHaveBeenCalledWith('Processed job 1\n')
    expect(err).toHaveBeenCalledWith('warning: slow\n')
  })
})

describe('createEventReporter', () => {
  beforeEach(() => { resetLogger() })

  it('warns about timed-out and failed runs', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {})
    const report = createEventReporter(false, { connection: 'redis', queue: 'emails' })
    report({ action: 'listen', event: 'run', run: 2, ok: false, code: null, signal: 'SIGTERM', timedOut: true, durationMs: 1000, memoryMb: 10 })
    report({ action: 'listen', event: 'run', run: 3, ok: false, code: 2, signal: null, timedOut: false, durationMs: 5, memoryMb: 10 })
    expect(logSpy.mock.calls.map((c) => String(c[0]))).toEqual([
      '[warn] Run #2 timed out after 1000ms; continuing',
      '[warn] Run #3 exited with code 2; continuing'
    ])
  })
})

describe('reportError', () => {
  beforeEach(() => { resetLogger() })

  it('logs the message and remedy for launch failures', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {})
    const errSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
    const info = reportError(new WorkerLaunchError('WORKER_NOT_FOUND', 'w', '/srv', 'Worker not found: w'), false)
    expect(info.code).toBe('WORKER_NOT_FOUND')
    expect(errSpy).toHaveBeenCalledWith('[error] Worker not found: w')
    expect(logSpy).toHaveBeenCalledWith('[info] [note] Check --worker/--runtime paths and that --command-path exists.')
  })

  it('emits an error event in JSON mode', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {})
    reportError(new Error('boom'), true)
    expect(JSON.parse(String(logSpy.mock.calls[0]?.[0]))).toEqual({ action: 'listen', event: 'error', code: 'LISTENER_UNKNOWN_ERROR', message: 'boom' })
  })
})

describe('buildSummary', () => {
  it('marks the summary final and schema-valid', () => {
    expect(buildSummary('max-runs', 3, 12.5, 128)).toMatchObject({ final: true, reason: 'max-runs', schemaOk: true })
  })
})
