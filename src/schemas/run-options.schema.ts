export const runOptionsSchema = {
  $schema: "https://json-schema.org/draft/2020-12/schema",
  type: "object",
  additionalProperties: false,
  required: ["environment", "delay", "memory", "sleep", "maxTries", "timeout"],
  properties: {
    environment: { type: ["string", "null"] },
    delay: { type: "integer", minimum: 0 },
    memory: { type: "integer", exclusiveMinimum: 0 },
    sleep: { type: "integer", minimum: 0 },
    maxTries: { type: "integer", minimum: 0 },
    timeout: { anyOf: [{ type: "integer", exclusiveMinimum: 0 }, { type: "null" }] }
  }
} as const
