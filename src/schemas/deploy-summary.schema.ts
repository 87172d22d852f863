/**
 * JSON Schema for the final JSON object emitted by `deploy --json`.
 * Keep broad to avoid breaking consumers; tests assert the stricter shape.
 */
export const deploySummarySchema = {
  $schema: "https://json-schema.org/draft/2020-12/schema",
  type: "object",
  additionalProperties: true,
  required: ["ok", "action", "environment", "operation", "outcome", "stages", "final"],
  properties: {
    ok: { type: "boolean" },
    action: { const: "deploy" },
    environment: { type: "string", minLength: 1 },
    operation: { type: "string", minLength: 1 },
    outcome: { enum: ["completed", "cancelled", "failed"] },
    final: { const: true },
    stages: {
      type: "array",
      items: {
        type: "object",
        required: ["stage", "status", "durationMs"],
        properties: {
          stage: { type: "string" },
          status: { enum: ["ok", "skipped", "warned", "failed"] },
          durationMs: { type: "integer", minimum: 0 },
          detail: { type: "string" }
        }
      }
    },
    summary: {
      type: "object",
      properties: {
        environment: { type: "string" },
        vmName: { type: "string" },
        publicIp: { type: "string" },
        resourceGroup: { type: "string" },
        sshCommand: { type: "string" },
        webUrl: { type: "string" }
      }
    },
    error: {
      type: "object",
      required: ["kind", "code", "message"],
      properties: {
        kind: { type: "string" },
        code: { type: "string" },
        message: { type: "string" },
        remedy: { type: "string" }
      }
    }
  }
} as const
