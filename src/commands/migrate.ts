import { resolveConfig, resolveToken } from "../config/loader.js";
import { Orchestrator, type MigrationOutcome } from "../core/orchestrator.js";
import { ConfigError, describeError } from "../errors.js";
import { AlembicTool, MigrationRunner, type CommandExecutor } from "../migration/runner.js";
import { createReporter, type OutputFormat, type Reporter } from "../output/reporter.js";
import { PlatformClient } from "../platform/client.js";
import type { MigrateConfig } from "../types/config.js";
import { exitCodeFor, type ExitCode } from "./exit-codes.js";

export const DEFAULT_INI_FILE = "etc/production.ini";
export const DEFAULT_APP_SECTION = "app:main";

export type TargetOpts = {
  appName: string;
  iniFile?: string;
  appSection?: string;
  configPath?: string;
  /** Raw --delay value; validated with the rest of the config. */
  delay?: string;
  tool?: string;
  format?: OutputFormat;
};

/** Seams for tests; every field falls back to the real thing. */
export type CommandDeps = {
  reporter: Reporter;
  env: Record<string, string | undefined>;
  cwd: string;
  fetchImpl: typeof fetch;
  exec: CommandExecutor;
  sleep: (ms: number) => Promise<void>;
};

export type MigrateResult =
  | { ok: true; outcome: MigrationOutcome }
  | { ok: false; error: string; exitCode: ExitCode };

type Target = { appName: string; iniFile: string; appSection: string };

export function resolveTarget(opts: TargetOpts): Target {
  const appName = opts.appName.trim();
  if (!appName) throw new ConfigError("app_name must not be empty");
  const iniFile = opts.iniFile ?? DEFAULT_INI_FILE;
  const appSection = opts.appSection ?? DEFAULT_APP_SECTION;
  if (!iniFile.trim()) throw new ConfigError("ini_file must not be empty");
  if (!appSection.trim()) throw new ConfigError("app_section must not be empty");
  return { appName, iniFile, appSection };
}

export async function loadCommandConfig(opts: TargetOpts, deps: Partial<CommandDeps>): Promise<MigrateConfig> {
  return resolveConfig({
    configPath: opts.configPath,
    cwd: deps.cwd,
    env: deps.env,
    overrides: { settle_delay_seconds: opts.delay, migration_tool: opts.tool },
  });
}

export function buildRunner(config: MigrateConfig, target: Target, exec?: CommandExecutor): MigrationRunner {
  return new MigrationRunner(new AlembicTool(config.migration_tool, target.iniFile, target.appSection, exec));
}

/**
 * Migrate the app's database if the migration tool reports pending revisions,
 * with the app in maintenance mode and scaled to zero meanwhile.
 */
export async function migrate(opts: TargetOpts, deps: Partial<CommandDeps> = {}): Promise<MigrateResult> {
  const reporter = deps.reporter ?? createReporter(opts.format ?? "human");
  try {
    const target = resolveTarget(opts);
    const config = await loadCommandConfig(opts, deps);

    const platform = new PlatformClient({
      appName: target.appName,
      token: resolveToken(config, deps.env),
      endpoint: config.api_endpoint,
      fetchImpl: deps.fetchImpl,
      reporter,
    });

    const orch = new Orchestrator({
      ...target,
      platform,
      runner: buildRunner(config, target, deps.exec),
      reporter,
      settleDelayMs: config.settle_delay_seconds * 1000,
      sleep: deps.sleep,
    });

    return { ok: true, outcome: await orch.migrate() };
  } catch (e) {
    return { ok: false, error: describeError(e), exitCode: exitCodeFor(e) };
  }
}
