import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type ValidateFn = ((data: unknown) => boolean) & { errors?: unknown };

export type ConfigAjv = {
  compile: (schema: unknown) => ValidateFn;
  errorsText: (errors: unknown, opts?: { dataVar?: string }) => string;
};

let shared: ConfigAjv | null = null;

/**
 * Ajv used for graceful-migrate config. Env overrides arrive as strings, so
 * scalars are coerced; a key left blank in YAML (null or "") takes its schema
 * default rather than being coerced to 0 or "".
 */
export function configAjv(): ConfigAjv {
  if (shared !== null) return shared;
  const Ctor = Ajv2020 as unknown as new (opts: Record<string, unknown>) => ConfigAjv;
  const withFormats = addFormats as unknown as (ajv: ConfigAjv, formats: string[]) => void;

  const ajv = new Ctor({ allErrors: true, strict: true, coerceTypes: true, useDefaults: "empty" });
  withFormats(ajv, ["uri"]);
  shared = ajv;
  return ajv;
}
