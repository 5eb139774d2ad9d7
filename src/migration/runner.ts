import { execFile } from "node:child_process";
import debug from "debug";
import { ProcessError } from "../errors.js";

const trace = debug("graceful-migrate:migration");

/** Marker in `current` output meaning the database is at the latest revision. */
export const HEAD_TOKEN = "head";

export type CommandOutput = {
  command: string[];
  stdout: string;
  stderr: string;
  exitCode: number;
};

export type CommandExecutor = (command: string, args: string[]) => Promise<CommandOutput>;

/** The two things the orchestration needs from a schema migration tool. */
export interface MigrationTool {
  checkStatus(): Promise<CommandOutput>;
  applyUpgrade(): Promise<CommandOutput>;
}

export type StatusReport = {
  upToDate: boolean;
  output: string;
};

/**
 * Run a command without a shell. A nonzero exit resolves with its code; a
 * process killed by a signal or one that never started (missing binary, bad
 * cwd) rejects.
 */
export const execCommand: CommandExecutor = (command, args) =>
  new Promise((resolve, reject) => {
    trace("exec %s %o", command, args);
    const argv = [command, ...args];
    execFile(command, args, { encoding: "utf8", maxBuffer: 16 * 1024 * 1024 }, (error, stdout, stderr) => {
      if (error === null) {
        resolve({ command: argv, stdout, stderr, exitCode: 0 });
      } else if (typeof error.code === "number") {
        resolve({ command: argv, stdout, stderr, exitCode: error.code });
      } else if (error.signal) {
        trace("killed by %s", error.signal);
        reject(new ProcessError(argv, null, stdout, stderr, error.signal));
      } else {
        trace("spawn failed: %s", error.message);
        reject(new ProcessError(argv, null, stdout, stderr || error.message));
      }
    });
  });

/**
 * Alembic-style command line: `<tool> -c <ini> -n <section> current` and
 * `... upgrade head`. `tool` may carry its own arguments (`python -m alembic`).
 */
export class AlembicTool implements MigrationTool {
  private readonly argv: string[];

  constructor(
    tool: string,
    iniFile: string,
    appSection: string,
    private readonly exec: CommandExecutor = execCommand,
  ) {
    const toolArgv = tool.trim().split(/\s+/).filter((s) => s.length > 0);
    this.argv = [...toolArgv, "-c", iniFile, "-n", appSection];
  }

  checkStatus(): Promise<CommandOutput> {
    return this.run(["current"]);
  }

  applyUpgrade(): Promise<CommandOutput> {
    return this.run(["upgrade", "head"]);
  }

  private run(subcommand: string[]): Promise<CommandOutput> {
    const [command, ...args] = [...this.argv, ...subcommand];
    return this.exec(command, args);
  }
}

/**
 * Yes/no gate and trigger over a {@link MigrationTool}. Any nonzero exit is a
 * {@link ProcessError}, never a "migration needed" answer.
 */
export class MigrationRunner {
  constructor(private readonly tool: MigrationTool) {}

  async checkStatus(): Promise<StatusReport> {
    const res = await this.tool.checkStatus();
    assertSucceeded(res);
    return { upToDate: res.stdout.includes(HEAD_TOKEN), output: res.stdout };
  }

  async isUpToDate(): Promise<boolean> {
    return (await this.checkStatus()).upToDate;
  }

  /** Upgrade to head; resolves to the tool's stdout, uninterpreted. */
  async applyMigrations(): Promise<string> {
    const res = await this.tool.applyUpgrade();
    assertSucceeded(res);
    return res.stdout;
  }
}

function assertSucceeded(res: CommandOutput): void {
  if (res.exitCode !== 0) {
    throw new ProcessError(res.command, res.exitCode, res.stdout, res.stderr);
  }
}
