/**
 * Argument escaping for the shell that interprets the worker command line.
 * One escaper is selected at startup from the target platform; callers never
 * branch on the platform themselves.
 */

export type ShellDialect = 'posix' | 'native'

export type ShellEscaper = (arg: string) => string

/** Single-quote for /bin/sh. Embedded quotes close, emit `\'`, and reopen. */
export function escapePosix(arg: string): string {
  return `'${arg.replace(/'/g, `'\\''`)}'`
}

function isSurroundedBy(part: string, ch: string): boolean {
  return part.length > 2 && part.startsWith(ch) && part.endsWith(ch)
}

/**
 * Double-quote for cmd.exe. `%VAR%` pieces are caret-escaped so the
 * interpreter does not expand them.
 */
export function escapeNativeShell(arg: string): string {
  if (arg === '') return '""'
  let out = ''
  let quote = false
  const parts: readonly string[] = arg.split(/(")/).filter((p: string) => p.length > 0)
  for (const part of parts) {
    if (part === '"') {
      out += '\\"'
    } else if (isSurroundedBy(part, '%')) {
      out += `^%"${part.slice(1, -1)}"^%`
    } else {
      // a trailing backslash would escape the closing quote
      out += part.endsWith('\\') ? `${part}\\` : part
      quote = true
    }
  }
  return quote ? `"${out}"` : out
}

export function dialectFor(platform: NodeJS.Platform): ShellDialect {
  return platform === 'win32' ? 'native' : 'posix'
}

export function selectEscaper(dialect: ShellDialect): ShellEscaper {
  return dialect === 'native' ? escapeNativeShell : escapePosix
}

/** Shell matching the dialect: `%ComSpec%` (or cmd.exe) for native, /bin/sh otherwise. */
export function shellFor(dialect: ShellDialect, env: NodeJS.ProcessEnv = process.env): string {
  if (dialect === 'native') return env.ComSpec ?? 'cmd.exe'
  return '/bin/sh'
}
