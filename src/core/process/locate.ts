import { access, stat } from 'node:fs/promises'
import { constants as fsConstants } from 'node:fs'
import { extname, isAbsolute, join, resolve } from 'node:path'
import type { ProcessSpec } from '../../types/process-spec'
import { WorkerLaunchError, errnoCode, launchErrorFromSpawn } from '../../utils/errors'

type Probe = 'ok' | 'missing' | 'denied'

export type LaunchTarget = Pick<ProcessSpec, 'program' | 'script' | 'cwd' | 'env' | 'dialect' | 'commandLine'>

async function probe(path: string, mode: number): Promise<Probe> {
  try {
    if (!(await stat(path)).isFile()) return 'denied'
  } catch (err) {
    const code: string | undefined = errnoCode(err)
    if (code === 'ENOENT' || code === 'ENOTDIR') return 'missing'
    throw err
  }
  try {
    await access(path, mode)
    return 'ok'
  } catch (err) {
    const code: string | undefined = errnoCode(err)
    if (code === 'EACCES' || code === 'EPERM') return 'denied'
    throw err
  }
}

function candidates(file: string, target: LaunchTarget, env: NodeJS.ProcessEnv): string[] {
  const native: boolean = target.dialect === 'native'
  const hasDir: boolean = native ? /[\\/]/.test(file) : file.includes('/')
  const exts: string[] = native && extname(file) === ''
    ? ['', ...(env.PATHEXT ?? '.COM;.EXE;.BAT;.CMD').split(';').filter((e: string) => e.length > 0)]
    : ['']
  let dirs: string[]
  if (isAbsolute(file) || hasDir) {
    dirs = [resolve(target.cwd, file)]
  } else {
    const pathVar: string = env.PATH ?? env.Path ?? ''
    const found: string[] = pathVar.split(native ? ';' : ':').filter((d: string) => d.length > 0).map((d: string) => join(d, file))
    // cmd.exe looks in the working directory before PATH.
    dirs = native ? [join(target.cwd, file), ...found] : found
  }
  return dirs.flatMap((d: string) => exts.map((e: string) => d + e))
}

/**
 * Resolve the program the shell is about to run, the way the shell would,
 * and check the worker script when a runtime runs it. Throws
 * `WorkerLaunchError` when either cannot be started, so that exit statuses
 * from a running worker are never mistaken for launch failures.
 */
export async function locateProgram(target: LaunchTarget, baseEnv: NodeJS.ProcessEnv = process.env): Promise<string> {
  const env: NodeJS.ProcessEnv = { ...baseEnv, ...target.env }
  let denied: string | undefined
  try {
    for (const path of candidates(target.program, target, env)) {
      const res: Probe = await probe(path, fsConstants.X_OK)
      if (res === 'ok') {
        if (target.script !== undefined) await checkScript(target)
        return path
      }
      if (res === 'denied' && denied === undefined) denied = path
    }
  } catch (err) {
    if (err instanceof WorkerLaunchError) throw err
    throw launchErrorFromSpawn(err, target.commandLine, target.cwd)
  }
  if (denied !== undefined) {
    throw new WorkerLaunchError('WORKER_NOT_EXECUTABLE', target.commandLine, target.cwd, `Worker is not executable: ${denied}`)
  }
  throw new WorkerLaunchError('WORKER_NOT_FOUND', target.commandLine, target.cwd, `Worker not found: ${target.program}`)
}

async function checkScript(target: LaunchTarget): Promise<void> {
  if (target.script === undefined) return
  const path: string = resolve(target.cwd, target.script)
  const res: Probe = await probe(path, fsConstants.R_OK)
  if (res === 'missing') {
    throw new WorkerLaunchError('WORKER_NOT_FOUND', target.commandLine, target.cwd, `Worker script not found: ${path}`)
  }
  if (res === 'denied') {
    throw new WorkerLaunchError('WORKER_NOT_EXECUTABLE', target.commandLine, target.cwd, `Worker script is not readable: ${path}`)
  }
}
