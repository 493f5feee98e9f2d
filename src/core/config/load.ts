import { dirname, isAbsolute, resolve } from 'node:path'
import type { ListenerConfigFile } from '../../types/config'
import type { RunOptions, RunOptionsInput } from '../../types/run-options'
import type { CommandBuilderSettings } from '../command/builder'
import { dialectFor } from '../command/escape'
import { createRunOptions } from './run-options'
import { listenerConfigSchema } from '../../schemas/listener-config.schema'
import { ajv, formatSchemaErrors } from '../../utils/schema'
import { ConfigError } from '../../utils/errors'
import { fsx } from '../../utils/fs'
import { loadWorkerEnv, readDotenv } from '../secrets/env'
import { constants } from '../../constants'

/** Values taken from `listen` flags. Integers are already parsed. */
export interface ListenFlags {
  readonly queue?: string
  readonly delay?: number
  readonly memory?: number
  readonly sleep?: number
  readonly tries?: number
  readonly timeout?: number
  readonly env?: string
  readonly worker?: string
  readonly runtime?: string
  readonly subcommand?: string
  readonly commandPath?: string
  readonly envFile?: string
  readonly config?: string
}

export interface ListenSettings {
  readonly connection: string
  readonly queue: string
  readonly builder: CommandBuilderSettings
  readonly options: RunOptions
}

const validateConfig = ajv.compile<ListenerConfigFile>(listenerConfigSchema)

/** Load and validate the config file. A missing file is an empty config. */
export async function loadConfigFile(path: string): Promise<ListenerConfigFile> {
  let data: unknown
  try {
    data = await fsx.readJson(path)
  } catch (err) {
    throw new ConfigError(`Config could not be read: ${path}`, [err instanceof Error ? err.message : String(err)])
  }
  if (data === null) return {}
  if (!validateConfig(data)) {
    throw new ConfigError(`Config invalid: ${path}`, formatSchemaErrors(validateConfig.errors))
  }
  return data
}

function nonEmpty(...vals: readonly (string | undefined)[]): string | undefined {
  for (const v of vals) if (typeof v === 'string' && v.trim().length > 0) return v
  return undefined
}

/** Paths with a directory part resolve against `base`; bare names are left for PATH lookup. */
function resolveExecutable(base: string, file: string): string {
  if (isAbsolute(file)) return file
  if (!/[\\/]/.test(file)) return file
  return resolve(base, file)
}

/**
 * Merge flags, environment (process.env over `.env`), config file and
 * defaults, in that order of precedence.
 */
export async function resolveListenSettings(args: {
  readonly cwd: string
  readonly connection?: string
  readonly flags: ListenFlags
  readonly env?: NodeJS.ProcessEnv
  readonly platform?: NodeJS.Platform
}): Promise<ListenSettings> {
  const { cwd, flags } = args
  const configPath: string = resolve(cwd, flags.config ?? constants.CONFIG_FILE)
  const cfg: ListenerConfigFile = await loadConfigFile(configPath)
  const dotenv: Readonly<Record<string, string>> = await readDotenv(cwd)
  const procEnv: NodeJS.ProcessEnv = args.env ?? process.env
  const fromEnv = (key: string): string | undefined => procEnv[key] ?? dotenv[key]

  const commandPath: string = flags.commandPath !== undefined
    ? resolve(cwd, flags.commandPath)
    : cfg.commandPath !== undefined ? resolve(dirname(configPath), cfg.commandPath) : cwd
  if (!(await fsx.isDirectory(commandPath))) {
    throw new ConfigError(`Command path is not a directory: ${commandPath}`)
  }

  const worker: string | undefined = nonEmpty(flags.worker, fromEnv('QUEUE_WORKER'), cfg.workerBinary)
  if (worker === undefined) {
    throw new ConfigError('Missing worker executable. Pass --worker, set QUEUE_WORKER, or set workerBinary in the config file')
  }
  const runtime: string | undefined = nonEmpty(flags.runtime, cfg.runtime)
  const subcommand: string = nonEmpty(flags.subcommand, cfg.subcommand) ?? constants.DEFAULT_SUBCOMMAND
  if (!/^[A-Za-z0-9:_.-]+$/.test(subcommand)) {
    throw new ConfigError(`Invalid subcommand: ${subcommand}`, ['subcommand may only contain letters, digits, ":", "_", "." and "-"'])
  }

  const cfgEnv: Readonly<Record<string, string>> = cfg.env ?? {}
  const workerEnv: Readonly<Record<string, string>> = flags.envFile !== undefined
    ? await loadWorkerEnv({ path: resolve(cwd, flags.envFile), overlay: cfgEnv, base: procEnv }).catch((err: unknown) => {
      throw new ConfigError(`Cannot read env file: ${flags.envFile ?? ''}`, [err instanceof Error ? err.message : String(err)])
    })
    : { ...cfgEnv }

  const cfgOpts: RunOptionsInput = cfg.options ?? {}
  const options: RunOptions = createRunOptions({
    environment: nonEmpty(flags.env, fromEnv('QUEUE_ENV')) ?? cfgOpts.environment ?? null,
    delay: flags.delay ?? cfgOpts.delay,
    memory: flags.memory ?? cfgOpts.memory,
    sleep: flags.sleep ?? cfgOpts.sleep,
    maxTries: flags.tries ?? cfgOpts.maxTries,
    timeout: flags.timeout ?? cfgOpts.timeout
  })

  return {
    connection: nonEmpty(args.connection, fromEnv('QUEUE_CONNECTION'), cfg.connection) ?? constants.DEFAULT_CONNECTION,
    queue: nonEmpty(flags.queue, fromEnv('QUEUE_NAME'), cfg.queue) ?? constants.DEFAULT_QUEUE,
    builder: {
      commandPath,
      workerBinary: resolveExecutable(commandPath, worker),
      runtime: runtime !== undefined ? resolveExecutable(commandPath, runtime) : undefined,
      subcommand,
      env: workerEnv,
      dialect: dialectFor(args.platform ?? process.platform)
    },
    options
  }
}
