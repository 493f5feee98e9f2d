import { colorize, type ColorName } from './colors'

export type LogLevel = 'error' | 'warn' | 'info' | 'debug'

interface Logger {
  readonly debug: (msg: string) => void
  readonly info: (msg: string) => void
  readonly warn: (msg: string) => void
  readonly error: (msg: string) => void
  readonly success: (msg: string) => void
  readonly note: (msg: string) => void
  readonly highlight: (msg: string, color: ColorName) => string
  readonly json: (val: unknown) => void
  readonly setLevel: (lvl: LogLevel) => void
  readonly setJsonOnly: (on: boolean) => void
  readonly setNoEmoji: (on: boolean) => void
  readonly setTimestamps: (on: boolean) => void
}

const RANK: Readonly<Record<LogLevel, number>> = { error: 0, warn: 1, info: 2, debug: 3 }

let level: LogLevel = 'info'
let jsonOnly = false
let noEmoji = false
let timestampsOn = false

function enabled(kind: LogLevel): boolean {
  return !jsonOnly && RANK[kind] <= RANK[level]
}

function write(kind: LogLevel, msg: string): void {
  const prefix: string = noEmoji
    ? (kind === 'error' ? '[error]' : kind === 'warn' ? '[warn]' : kind === 'info' ? '[info]' : '[debug]')
    : (kind === 'error' ? '✖' : kind === 'warn' ? '⚠' : kind === 'info' ? 'ℹ' : '•')
  const ts: string = timestampsOn ? `${new Date().toISOString()} ` : ''
  // Leave already-colored messages alone
  const hasAnsi: boolean = msg.includes('\u001b[')
  const colored: string = hasAnsi ? msg : (kind === 'error'
    ? colorize('red', msg)
    : kind === 'warn'
      ? colorize('yellow', msg)
      : kind === 'info'
        ? colorize('cyan', msg)
        : colorize('dim', msg))
  // eslint-disable-next-line no-console
  console[kind === 'error' ? 'error' : 'log'](`${ts}${prefix} ${colored}`)
}

function enrichJson(val: unknown): unknown {
  if (!timestampsOn) return val
  if (val !== null && typeof val === 'object' && !Array.isArray(val)) {
    const obj: Record<string, unknown> = { ...val }
    if (obj.ts === undefined) obj.ts = new Date().toISOString()
    return obj
  }
  return val
}

export const logger: Logger = {
  debug: (msg: string): void => { if (enabled('debug')) write('debug', msg) },
  info: (msg: string): void => { if (enabled('info')) write('info', msg) },
  warn: (msg: string): void => { if (enabled('warn')) write('warn', msg) },
  error: (msg: string): void => { if (enabled('error')) write('error', msg) },
  success: (msg: string): void => { if (!enabled('info')) return; const text = `${noEmoji ? '[ok]' : '✓'} ${msg}`; write('info', colorize('green', text)) },
  note: (msg: string): void => { if (!enabled('info')) return; const text = `${noEmoji ? '[note]' : '✱'} ${msg}`; write('info', colorize('blue', text)) },
  highlight: (msg: string, color: ColorName): string => colorize(color, msg),
  json: (val: unknown): void => {
    // NDJSON: one compact object per line
    // eslint-disable-next-line no-console
    console.log(JSON.stringify(enrichJson(val)))
  },
  setLevel: (lvl: LogLevel): void => { level = lvl },
  setJsonOnly: (on: boolean): void => { jsonOnly = on },
  setNoEmoji: (on: boolean): void => { noEmoji = on },
  setTimestamps: (on: boolean): void => { timestampsOn = on }
}
