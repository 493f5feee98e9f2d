import { parse } from 'dotenv'
import { join } from 'node:path'
import { readFile } from 'node:fs/promises'
import { fsx } from '../../utils/fs'

/**
 * Read `.env` from a directory without touching process.env. Missing file → {}.
 */
export async function readDotenv(dir: string): Promise<Readonly<Record<string, string>>> {
  const path: string = join(dir, '.env')
  if (!(await fsx.exists(path))) return {}
  return parse(await readFile(path, 'utf8'))
}

const REF_RE: RegExp = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g

/**
 * Layer an env file over the worker's env overlay. Entries apply in file
 * order; `${VAR}` sees the overlay built so far, then `base`. Blank values
 * leave the overlay untouched.
 */
export async function loadWorkerEnv(args: {
  readonly path: string
  readonly overlay?: Readonly<Record<string, string>>
  readonly base?: NodeJS.ProcessEnv
}): Promise<Readonly<Record<string, string>>> {
  const base: NodeJS.ProcessEnv = args.base ?? process.env
  const merged: Record<string, string> = { ...(args.overlay ?? {}) }
  for (const [key, raw] of Object.entries(parse(await readFile(args.path, 'utf8')))) {
    const value: string = raw.trim()
    if (value.length === 0) continue
    merged[key] = value.replace(REF_RE, (_m: string, name: string) => merged[name] ?? base[name] ?? '')
  }
  return merged
}
