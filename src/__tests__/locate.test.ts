import { describe, it, expect } from 'vitest'
import { chmod, mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { locateProgram, type LaunchTarget } from '../core/process/locate'
import { WorkerLaunchError } from '../utils/errors'

async function withTemp<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), 'queue-listener-locate-'))
  try { return await fn(dir) } finally { await rm(dir, { recursive: true, force: true }) }
}

async function script(path: string, mode: number): Promise<void> {
  await writeFile(path, '#!/bin/sh\nexit 0\n')
  await chmod(path, mode)
}

function target(dir: string, program: string, scriptPath?: string): LaunchTarget {
  return { program, script: scriptPath, cwd: dir, env: {}, dialect: 'posix', commandLine: program }
}

describe.skipIf(process.platform === 'win32')('locateProgram', () => {
  it('finds a bare name on PATH', async () => {
    await withTemp(async (dir) => {
      await script(join(dir, 'my-worker'), 0o755)
      expect(await locateProgram(target(dir, 'my-worker'), { PATH: `${join(dir, 'missing')}:${dir}` })).toBe(join(dir, 'my-worker'))
    })
  })

  it('resolves a relative path against the working directory', async () => {
    await withTemp(async (dir) => {
      await mkdir(join(dir, 'bin'))
      await script(join(dir, 'bin', 'w'), 0o755)
      expect(await locateProgram(target(dir, './bin/w'), {})).toBe(join(dir, 'bin', 'w'))
    })
  })

  it('rejects a missing worker as not found', async () => {
    await withTemp(async (dir) => {
      const err = await locateProgram(target(dir, 'no-such-worker'), { PATH: dir }).catch((e: unknown) => e)
      expect(err).toBeInstanceOf(WorkerLaunchError)
      expect(err).toMatchObject({ code: 'WORKER_NOT_FOUND', message: 'Worker not found: no-such-worker' })
    })
  })

  it('rejects a file without execute permission', async () => {
    await withTemp(async (dir) => {
      await script(join(dir, 'w'), 0o644)
      await expect(locateProgram(target(dir, join(dir, 'w')), {})).rejects.toMatchObject({
        code: 'WORKER_NOT_EXECUTABLE',
        message: `Worker is not executable: ${join(dir, 'w')}`
      })
    })
  })

  it('checks the worker script when a runtime runs it', async () => {
    await withTemp(async (dir) => {
      await expect(locateProgram(target(dir, process.execPath, 'artisan'), {})).rejects.toMatchObject({
        code: 'WORKER_NOT_FOUND',
        message: `Worker script not found: ${join(dir, 'artisan')}`
      })
      await writeFile(join(dir, 'artisan'), '')
      expect(await locateProgram(target(dir, process.execPath, 'artisan'), {})).toBe(process.execPath)
    })
  })
})
