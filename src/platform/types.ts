/** Process type → replica count, e.g. `{ web: 2, worker: 1 }`. */
export type Formation = Record<string, number>;

/** Wire shape of a formation entry, as listed and patched by the Platform API. */
export interface FormationEntry {
  type: string;
  quantity: number;
}

/** The control-plane operations a migration run needs. */
export interface PlatformApi {
  getFormation(): Promise<Formation>;
  scaleTo(counts: Formation): Promise<Formation>;
  setMaintenance(enabled: boolean): Promise<void>;
}

export function isFormationList(value: unknown): value is FormationEntry[] {
  return (
    Array.isArray(value) &&
    value.every(
      (e: unknown) =>
        typeof e === "object" &&
        e !== null &&
        "type" in e &&
        typeof e.type === "string" &&
        "quantity" in e &&
        typeof e.quantity === "number",
    )
  );
}

export function toFormation(entries: FormationEntry[]): Formation {
  const formation: Formation = {};
  for (const e of entries) formation[e.type] = e.quantity;
  return formation;
}

export function toUpdates(counts: Formation): FormationEntry[] {
  return Object.entries(counts).map(([type, quantity]) => ({ type, quantity }));
}

/** Same process types, every count zero. */
export function zeroed(formation: Formation): Formation {
  return Object.fromEntries(Object.keys(formation).map((type) => [type, 0]));
}

/** `web=2, worker=1`; `(none)` for an empty formation. */
export function describeFormation(formation: Formation): string {
  const parts = Object.entries(formation).map(([type, quantity]) => `${type}=${quantity}`);
  return parts.length > 0 ? parts.join(", ") : "(none)";
}
