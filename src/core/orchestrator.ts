import { setTimeout as delay } from "node:timers/promises";
import { describeError, errorFields } from "../errors.js";
import type { StatusReport } from "../migration/runner.js";
import type { Reporter } from "../output/reporter.js";
import { describeFormation, zeroed, type Formation, type PlatformApi } from "../platform/types.js";
import { leavesAppDown, nextState, type MigrationStatus, type TransitionEvent } from "./state-machine.js";

/** What the orchestrator needs from the migration tool wrapper. */
export interface MigrationGate {
  checkStatus(): Promise<StatusReport>;
  applyMigrations(): Promise<string>;
}

export type Transition = {
  from: MigrationStatus;
  to: MigrationStatus;
  at: string;
};

export type MigrationOutcome = {
  migrated: boolean;
  final_state: MigrationStatus;
  formation: Formation | null;
  output: string | null;
  transitions: Transition[];
};

export type OrchestratorOptions = {
  appName: string;
  iniFile: string;
  appSection: string;
  platform: PlatformApi;
  runner: MigrationGate;
  reporter: Reporter;
  settleDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
};

const sleepFor = async (ms: number): Promise<void> => {
  await delay(ms);
};

/**
 * Orchestrator — drives one migration run through the state machine.
 *
 * Sequence: check → formation → maintenance on → scale to zero → settle →
 * upgrade → scale back → settle → maintenance off. The first error aborts the
 * run and is rethrown as-is; nothing is rolled back.
 */
export class Orchestrator {
  private state: MigrationStatus = "idle";
  private readonly transitions: Transition[] = [];
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly opts: OrchestratorOptions) {
    this.sleep = opts.sleep ?? sleepFor;
  }

  get currentState(): MigrationStatus {
    return this.state;
  }

  get history(): readonly Transition[] {
    return this.transitions;
  }

  async migrate(): Promise<MigrationOutcome> {
    const { platform, runner, reporter } = this.opts;
    if (this.state !== "idle") {
      throw new Error(`Orchestrator already ran (state: ${this.state})`);
    }

    reporter.info("APP", `App: ${this.opts.appName}`, { app: this.opts.appName });
    reporter.info("INI_FILE", `Config: ${this.opts.iniFile}`, { ini_file: this.opts.iniFile });
    reporter.info("APP_SECTION", `Section: ${this.opts.appSection}`, { app_section: this.opts.appSection });

    this.advance("success");
    const status = await this.attempt(() => runner.checkStatus());
    reporter.info("STATUS_OUTPUT", status.output, { output: status.output });

    if (status.upToDate) {
      this.advance("up_to_date");
      reporter.info("NOT_NEEDED", "Database migration is not needed");
      return this.outcome(false, null, null);
    }

    this.advance("success");
    const formation = await this.attempt(() => platform.getFormation());
    reporter.info("FORMATION", `Current formation: ${describeFormation(formation)}`, { formation });

    await this.attempt(() => platform.setMaintenance(true));
    this.advance("success");

    await this.attempt(() => platform.scaleTo(zeroed(formation)));
    this.advance("success");

    await this.settle("drain");

    const output = await this.attempt(() => runner.applyMigrations());
    reporter.info("MIGRATION_OUTPUT", output, { output });
    this.advance("success");

    await this.attempt(() => platform.scaleTo(formation));
    this.advance("success");

    await this.settle("boot");

    await this.attempt(() => platform.setMaintenance(false));
    this.advance("success");

    reporter.info("DONE", "Database migration complete");
    return this.outcome(true, formation, output);
  }

  private advance(event: TransitionEvent): void {
    const from = this.state;
    this.state = nextState(from, event);
    this.transitions.push({ from, to: this.state, at: new Date().toISOString() });
  }

  /** Run one step; on error record the failure, report it, rethrow unchanged. */
  private async attempt<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (e) {
      const lastReached = this.state;
      this.advance("failure");
      this.opts.reporter.error("ABORTED", `Migration aborted after ${lastReached}: ${describeError(e)}`, {
        last_state: lastReached,
        ...errorFields(e),
      });
      if (leavesAppDown(lastReached)) {
        this.opts.reporter.warn(
          "MANUAL_INTERVENTION",
          `App ${this.opts.appName} is left in maintenance mode and may be scaled down; restore it manually`,
          { app: this.opts.appName },
        );
      }
      throw e;
    }
  }

  private async settle(reason: "drain" | "boot"): Promise<void> {
    const ms = this.opts.settleDelayMs;
    this.opts.reporter.info("WAIT", `Waiting ${ms / 1000}s for processes to ${reason}`, { wait_ms: ms, reason });
    await this.attempt(() => this.sleep(ms));
  }

  private outcome(migrated: boolean, formation: Formation | null, output: string | null): MigrationOutcome {
    return {
      migrated,
      final_state: this.state,
      formation,
      output,
      transitions: [...this.transitions],
    };
  }
}
