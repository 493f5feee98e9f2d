export const listenSummarySchema = {
  $schema: "https://json-schema.org/draft/2020-12/schema",
  type: "object",
  additionalProperties: true,
  required: ["ok", "action", "event", "reason", "runs", "final"],
  properties: {
    ok: { type: "boolean" },
    action: { const: "listen" },
    event: { const: "stop" },
    reason: { enum: ["memory", "max-runs"] },
    runs: { type: "integer", minimum: 0 },
    memoryMb: { type: "number" },
    limitMb: { type: "number" },
    final: { const: true }
  }
} as const
