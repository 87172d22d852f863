/**
 * JSON Schema for envdeploy.config.json. Unknown keys are rejected so that
 * typos surface instead of silently falling back to defaults.
 */
export const projectConfigSchema = {
  $schema: "https://json-schema.org/draft/2020-12/schema",
  type: "object",
  additionalProperties: false,
  properties: {
    $schema: { type: "string" },
    provisioningDir: { type: "string", minLength: 1 },
    configurationDir: { type: "string", minLength: 1 },
    environmentsDir: { type: "string", minLength: 1 },
    testsDir: { type: "string", minLength: 1 },
    ssh: {
      type: "object",
      additionalProperties: false,
      properties: {
        user: { type: "string", minLength: 1, pattern: "^[a-z_][a-z0-9_-]*$" },
        privateKeyPath: { type: "string", minLength: 1 },
        pythonInterpreter: { type: "string", minLength: 1 }
      }
    },
    readiness: {
      type: "object",
      additionalProperties: false,
      properties: {
        maxAttempts: { type: "integer", minimum: 1, maximum: 10 },
        intervalMs: { type: "integer", minimum: 0 }
      }
    },
    verification: {
      type: "object",
      additionalProperties: false,
      properties: {
        testFile: { type: "string", minLength: 1 }
      }
    }
  }
} as const
