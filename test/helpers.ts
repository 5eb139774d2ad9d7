import type { CommandExecutor, CommandOutput } from "../src/migration/runner.js";
import type { Fields, LogLevel, Reporter } from "../src/output/reporter.js";
import type { Formation } from "../src/platform/types.js";

export type ReportedLine = { level: LogLevel; code: string; message: string; fields?: Fields };

export function captureReporter(): { reporter: Reporter; lines: ReportedLine[] } {
  const lines: ReportedLine[] = [];
  const push = (level: LogLevel) => (code: string, message: string, fields?: Fields) => {
    lines.push({ level, code, message, fields });
  };
  return { reporter: { info: push("info"), warn: push("warn"), error: push("error") }, lines };
}

export type RecordedRequest = {
  method: string;
  url: string;
  headers: Headers;
  body: unknown;
};

/**
 * In-process stand-in for the Platform API: one app with a formation and a
 * maintenance flag. `failOn` makes the matching request answer with an error.
 */
export function fakePlatformServer(opts: {
  app: string;
  formation: Formation;
  failOn?: { method: string; path: string; status: number; body?: unknown };
  log?: string[];
}): { fetchImpl: typeof fetch; requests: RecordedRequest[]; state: { formation: Formation; maintenance: boolean } } {
  const requests: RecordedRequest[] = [];
  const state = { formation: { ...opts.formation }, maintenance: false };
  const appPath = `/apps/${opts.app}`;

  const json = (status: number, body: unknown): Response =>
    new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
  const list = () => Object.entries(state.formation).map(([type, quantity]) => ({ type, quantity }));

  const fetchImpl: typeof fetch = async (input, init) => {
    const url = new URL(String(input));
    const method = init?.method ?? "GET";
    const raw = init?.body;
    const body: unknown = typeof raw === "string" ? JSON.parse(raw) : undefined;
    requests.push({ method, url: url.toString(), headers: new Headers(init?.headers), body });
    opts.log?.push(`${method} ${url.pathname}${body === undefined ? "" : " " + JSON.stringify(body)}`);

    const fail = opts.failOn;
    if (fail && fail.method === method && fail.path === url.pathname) {
      return json(fail.status, fail.body ?? { id: "error", message: "failed" });
    }

    if (url.pathname === `${appPath}/formation` && method === "GET") return json(200, list());
    if (url.pathname === `${appPath}/formation` && method === "PATCH" && isUpdates(body)) {
      for (const u of body.updates) state.formation[u.type] = u.quantity;
      return json(200, list());
    }
    if (url.pathname === appPath && method === "PATCH" && isMaintenance(body)) {
      state.maintenance = body.maintenance;
      return json(200, { name: opts.app, maintenance: state.maintenance });
    }
    return json(404, { id: "not_found", message: "Couldn't find that app." });
  };

  return { fetchImpl, requests, state };
}

function isUpdates(body: unknown): body is { updates: Array<{ type: string; quantity: number }> } {
  return typeof body === "object" && body !== null && "updates" in body && Array.isArray(body.updates);
}

function isMaintenance(body: unknown): body is { maintenance: boolean } {
  return typeof body === "object" && body !== null && "maintenance" in body && typeof body.maintenance === "boolean";
}

/** Executor answering `current` and `upgrade head` with canned results. */
export function fakeExec(opts: {
  current?: Partial<CommandOutput>;
  upgrade?: Partial<CommandOutput>;
  log?: string[];
}): { exec: CommandExecutor; calls: string[][] } {
  const calls: string[][] = [];
  const exec: CommandExecutor = async (command, args) => {
    const argv = [command, ...args];
    calls.push(argv);
    const isUpgrade = args.includes("upgrade");
    opts.log?.push(isUpgrade ? "exec upgrade head" : "exec current");
    const canned = (isUpgrade ? opts.upgrade : opts.current) ?? {};
    return { command: argv, stdout: "", stderr: "", exitCode: 0, ...canned };
  };
  return { exec, calls };
}
