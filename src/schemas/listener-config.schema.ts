export const listenerConfigSchema = {
  $schema: "https://json-schema.org/draft/2020-12/schema",
  type: "object",
  additionalProperties: false,
  properties: {
    connection: { type: "string", minLength: 1 },
    queue: { type: "string", minLength: 1 },
    commandPath: { type: "string", minLength: 1 },
    workerBinary: { type: "string", minLength: 1 },
    runtime: { type: "string", minLength: 1 },
    subcommand: { type: "string", pattern: "^[A-Za-z0-9:_.-]+$" },
    env: { type: "object", additionalProperties: { type: "string" } },
    options: {
      type: "object",
      additionalProperties: false,
      properties: {
        environment: { type: ["string", "null"] },
        delay: { type: "integer", minimum: 0 },
        memory: { type: "integer", exclusiveMinimum: 0 },
        sleep: { type: "integer", minimum: 0 },
        maxTries: { type: "integer", minimum: 0 },
        timeout: { type: ["integer", "null"], minimum: 0 }
      }
    }
  }
} as const
