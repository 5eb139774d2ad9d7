import { describeError } from "../errors.js";
import { createReporter } from "../output/reporter.js";
import { exitCodeFor, type ExitCode } from "./exit-codes.js";
import { buildRunner, loadCommandConfig, resolveTarget, type CommandDeps, type TargetOpts } from "./migrate.js";

export type StatusResult =
  | { ok: true; upToDate: boolean; output: string }
  | { ok: false; error: string; exitCode: ExitCode };

/**
 * Ask the migration tool whether revisions are pending. Read-only: the
 * platform API is never called.
 */
export async function status(opts: TargetOpts, deps: Partial<CommandDeps> = {}): Promise<StatusResult> {
  const reporter = deps.reporter ?? createReporter(opts.format ?? "human");
  try {
    const target = resolveTarget(opts);
    const config = await loadCommandConfig(opts, deps);
    const report = await buildRunner(config, target, deps.exec).checkStatus();

    reporter.info("STATUS_OUTPUT", report.output, { output: report.output });
    if (report.upToDate) {
      reporter.info("UP_TO_DATE", `${target.appName}: database is at head`, { app: target.appName, up_to_date: true });
    } else {
      reporter.info("PENDING", `${target.appName}: migration pending`, { app: target.appName, up_to_date: false });
    }
    return { ok: true, upToDate: report.upToDate, output: report.output };
  } catch (e) {
    return { ok: false, error: describeError(e), exitCode: exitCodeFor(e) };
  }
}
