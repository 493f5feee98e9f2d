import Ajv2020 from 'ajv/dist/2020'
import type { ErrorObject } from 'ajv'

/** Shared validator instance; schemas here are small and compiled once at module load. */
export const ajv = new Ajv2020({ allErrors: true, strict: false })

export function formatSchemaErrors(errors: readonly ErrorObject[] | null | undefined): string[] {
  if (!Array.isArray(errors)) return []
  return errors.map((e: ErrorObject) => `${e.instancePath || '/'} ${e.message ?? ''}`.trim())
}
