import debug from "debug";
import { ApiError } from "../errors.js";
import { silentReporter, type Reporter } from "../output/reporter.js";
import {
  describeFormation,
  isFormationList,
  toFormation,
  toUpdates,
  zeroed,
  type Formation,
  type PlatformApi,
} from "./types.js";

const trace = debug("graceful-migrate:platform");

export const DEFAULT_API_ENDPOINT = "https://api.heroku.com";

export type PlatformClientOptions = {
  appName: string;
  token: string;
  endpoint?: string;
  fetchImpl?: typeof fetch;
  reporter?: Reporter;
};

type HttpMethod = "GET" | "PATCH";

/**
 * Platform API v3 client scoped to one app.
 *
 * The formation is read once and cached for the lifetime of the instance, so
 * scaling back up restores what was running before the first scale-down.
 */
export class PlatformClient implements PlatformApi {
  private readonly baseUrl: string;
  private readonly appPath: string;
  private readonly token: string;
  private readonly fetchImpl: typeof fetch;
  private readonly reporter: Reporter;
  private formation: Formation | null = null;

  constructor(opts: PlatformClientOptions) {
    this.baseUrl = (opts.endpoint ?? DEFAULT_API_ENDPOINT).replace(/\/+$/, "");
    this.appPath = `/apps/${encodeURIComponent(opts.appName)}`;
    this.token = opts.token;
    this.fetchImpl = opts.fetchImpl ?? ((input, init) => fetch(input, init));
    this.reporter = opts.reporter ?? silentReporter;
    if (!this.token) trace("no API token configured; requests will be sent unauthenticated");
  }

  /** Current formation; fetched on first call only. */
  async getFormation(): Promise<Formation> {
    if (this.formation !== null) return this.formation;
    const path = `${this.appPath}/formation`;
    const formation = this.parseFormation("GET", path, await this.request("GET", path));
    this.formation = formation;
    return formation;
  }

  /** Patch the formation to `counts`; resolves to what the API reports back. */
  async scaleTo(counts: Formation): Promise<Formation> {
    const path = `${this.appPath}/formation`;
    const body = await this.request("PATCH", path, { updates: toUpdates(counts) });
    const confirmed = this.parseFormation("PATCH", path, body);
    this.reporter.info("SCALED", `Scaled to: ${describeFormation(confirmed)}`, { formation: confirmed });
    return confirmed;
  }

  /** Scale every cached process type to zero. */
  async scaleDown(): Promise<Formation> {
    return this.scaleTo(zeroed(await this.getFormation()));
  }

  /** Restore the cached pre-migration counts. */
  async scaleUp(): Promise<Formation> {
    return this.scaleTo(await this.getFormation());
  }

  async setMaintenance(enabled: boolean): Promise<void> {
    await this.request("PATCH", this.appPath, { maintenance: enabled });
    this.reporter.info(
      enabled ? "MAINTENANCE_ON" : "MAINTENANCE_OFF",
      `Maintenance ${enabled ? "enabled" : "disabled"}`,
      { maintenance: enabled },
    );
  }

  private headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.token}`,
      Accept: "application/vnd.heroku+json; version=3",
      "Content-Type": "application/json",
    };
  }

  private async request(method: HttpMethod, path: string, body?: unknown): Promise<unknown> {
    trace("%s %s%s", method, this.baseUrl, path);
    const res = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method,
      headers: this.headers(),
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    trace("%s %s -> %d", method, path, res.status);
    const parsed = await readBody(res);
    if (res.status !== 200) {
      throw new ApiError(res.status, method, path, parsed);
    }
    return parsed;
  }

  private parseFormation(method: HttpMethod, path: string, body: unknown): Formation {
    if (!isFormationList(body)) {
      throw new ApiError(200, method, path, body);
    }
    return toFormation(body);
  }
}

/** JSON body when it parses, raw text otherwise. */
async function readBody(res: Response): Promise<unknown> {
  const text = await res.text();
  if (text.length === 0) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
