import type { RunOptions, RunOptionsInput } from '../../types/run-options'
import { runOptionsSchema } from '../../schemas/run-options.schema'
import { ajv, formatSchemaErrors } from '../../utils/schema'
import { ConfigError } from '../../utils/errors'

export const defaultRunOptions: RunOptions = Object.freeze({
  environment: null,
  delay: 0,
  memory: 128,
  sleep: 3,
  maxTries: 0,
  timeout: 60
})

const validate = ajv.compile<RunOptions>(runOptionsSchema)

/**
 * Fill defaults, validate and freeze. A timeout of 0 disables the limit and an
 * empty environment counts as unset.
 */
export function createRunOptions(input: RunOptionsInput = {}): RunOptions {
  const environment: string | null = input.environment === undefined || input.environment === '' ? defaultRunOptions.environment : input.environment
  const timeout: number | null = input.timeout === undefined ? defaultRunOptions.timeout : (input.timeout === 0 ? null : input.timeout)
  const candidate: RunOptions = {
    environment,
    delay: input.delay ?? defaultRunOptions.delay,
    memory: input.memory ?? defaultRunOptions.memory,
    sleep: input.sleep ?? defaultRunOptions.sleep,
    maxTries: input.maxTries ?? defaultRunOptions.maxTries,
    timeout
  }
  if (!validate(candidate)) {
    throw new ConfigError('Invalid run options', formatSchemaErrors(validate.errors))
  }
  return Object.freeze(candidate)
}
