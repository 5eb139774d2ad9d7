import { resolveConfig } from "../config/loader.js";
import { ConfigError } from "../errors.js";
import type { MigrateConfig } from "../types/config.js";
import type { CommandDeps } from "./migrate.js";

export type ValidateResult =
  | { ok: true; config: MigrateConfig }
  | { ok: false; error: string };

/** Load and validate the layered configuration without running anything. */
export async function validateAll(
  opts: { configPath?: string },
  deps: Partial<Pick<CommandDeps, "cwd" | "env">> = {},
): Promise<ValidateResult> {
  try {
    const config = await resolveConfig({ configPath: opts.configPath, cwd: deps.cwd, env: deps.env });
    return { ok: true, config };
  } catch (e) {
    if (e instanceof ConfigError) return { ok: false, error: e.message };
    throw e;
  }
}
