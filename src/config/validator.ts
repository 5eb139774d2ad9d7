import { configAjv, type ValidateFn } from "../schema/ajv.js";
import type { MigrateConfig } from "../types/config.js";
import { DEFAULT_API_ENDPOINT } from "../platform/client.js";

/** Config schema. Defaults are applied during validation. */
export const CONFIG_SCHEMA = {
  type: "object",
  additionalProperties: false,
  properties: {
    schema_version: { type: "string", enum: ["1"], default: "1" },
    api_endpoint: { type: "string", format: "uri", pattern: "^https?://", default: DEFAULT_API_ENDPOINT },
    token_env: { type: "string", pattern: "^[A-Za-z_][A-Za-z0-9_]*$", default: "MIGRATE_API_SECRET_HEROKU" },
    migration_tool: { type: "string", pattern: "\\S", default: "alembic" },
    settle_delay_seconds: { type: "integer", minimum: 0, default: 30 },
  },
};

export type ConfigValidationResult =
  | { valid: true; errors: null; config: MigrateConfig }
  | { valid: false; errors: string; config: null };

let compiled: ValidateFn | null = null;

/**
 * Validate a merged raw config. The input object is copied, then coerced and
 * defaulted in place by ajv before being returned as a {@link MigrateConfig}.
 */
export async function validateConfig(raw: Record<string, unknown>): Promise<ConfigValidationResult> {
  const ajv = configAjv();
  compiled ??= ajv.compile(CONFIG_SCHEMA);
  const validate = compiled;
  const candidate: Record<string, unknown> = { ...raw };
  if (!validate(candidate) || !isMigrateConfig(candidate)) {
    return { valid: false, errors: ajv.errorsText(validate.errors, { dataVar: "config" }), config: null };
  }
  return { valid: true, errors: null, config: candidate };
}

function isMigrateConfig(value: Record<string, unknown>): value is Record<string, unknown> & MigrateConfig {
  return (
    typeof value.schema_version === "string" &&
    typeof value.api_endpoint === "string" &&
    typeof value.token_env === "string" &&
    typeof value.migration_tool === "string" &&
    typeof value.settle_delay_seconds === "number"
  );
}
