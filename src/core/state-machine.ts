/**
 * Steps of a migration run, in order. Each names the condition reached once
 * the step's remote call has succeeded.
 */
export const MIGRATION_STEPS = [
  "checking_status",
  "migrating",
  "maintenance_on",
  "scaled_down",
  "migrated",
  "scaled_up",
  "maintenance_off",
] as const;

export type MigrationStep = (typeof MIGRATION_STEPS)[number];

/**
 * Full run status. `up_to_date`, `maintenance_off` and `failed` are terminal.
 */
export type MigrationStatus = "idle" | MigrationStep | "up_to_date" | "failed";

/**
 * Events that drive state transitions.
 * `up_to_date` is only meaningful while checking status.
 */
export type TransitionEvent = "success" | "up_to_date" | "failure";

export type TerminalStatus = "up_to_date" | "maintenance_off" | "failed";

export function isTerminal(status: MigrationStatus): status is TerminalStatus {
  return status === "up_to_date" || status === "maintenance_off" || status === "failed";
}

/**
 * Once maintenance has been switched on, an abort leaves the app offline.
 */
export function leavesAppDown(lastReached: MigrationStatus): boolean {
  const idx = MIGRATION_STEPS.findIndex((s) => s === lastReached);
  return idx >= MIGRATION_STEPS.indexOf("maintenance_on") && lastReached !== "maintenance_off";
}

/**
 * Pure function: given current status + event, return next status.
 * Throws on any event from a terminal status.
 */
export function nextState(current: MigrationStatus, event: TransitionEvent): MigrationStatus {
  if (isTerminal(current)) {
    throw new Error(`Invalid transition: ${event} from terminal state ${current}`);
  }
  if (event === "failure") return "failed";

  if (event === "up_to_date") {
    if (current !== "checking_status") {
      throw new Error(`Invalid transition: up_to_date from ${current}`);
    }
    return "up_to_date";
  }

  if (current === "idle") return MIGRATION_STEPS[0];
  const idx = MIGRATION_STEPS.indexOf(current);
  return MIGRATION_STEPS[idx + 1];
}
