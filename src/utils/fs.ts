import { readFile, stat } from 'node:fs/promises'
import { errnoCode } from './errors'

interface FSX {
  readonly exists: (path: string) => Promise<boolean>
  readonly isDirectory: (path: string) => Promise<boolean>
  readonly readJson: (path: string) => Promise<unknown>
}

async function exists(path: string): Promise<boolean> {
  try { const s = await stat(path); return s.isFile() || s.isDirectory() } catch { return false }
}

async function isDirectory(path: string): Promise<boolean> {
  try { return (await stat(path)).isDirectory() } catch { return false }
}

/** Parsed JSON, or null when the file does not exist. Other read errors and invalid JSON throw. */
async function readJson(path: string): Promise<unknown> {
  let buf: string
  try {
    buf = await readFile(path, 'utf8')
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return null
    throw err
  }
  const data: unknown = JSON.parse(buf)
  return data
}

export const fsx: FSX = { exists, isDirectory, readJson }
