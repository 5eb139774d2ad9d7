import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { loadConfig, resolveConfig, resolveToken } from "../src/config/loader.js";
import { validateConfig } from "../src/config/validator.js";
import { ConfigError } from "../src/errors.js";

const DEFAULTS = {
  schema_version: "1",
  api_endpoint: "https://api.heroku.com",
  token_env: "MIGRATE_API_SECRET_HEROKU",
  migration_tool: "alembic",
  settle_delay_seconds: 30,
};

describe("config loader", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "graceful-migrate-cfg-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("uses defaults when no config file exists", async () => {
    expect(await resolveConfig({ cwd: tmpDir, env: {} })).toEqual(DEFAULTS);
  });

  it("reads graceful-migrate.yaml from the working directory", async () => {
    fs.writeFileSync(
      path.join(tmpDir, "graceful-migrate.yaml"),
      "schema_version: 1\nmigration_tool: python -m alembic\nsettle_delay_seconds: 5\n",
    );
    const config = await resolveConfig({ cwd: tmpDir, env: {} });
    expect(config).toEqual({ ...DEFAULTS, migration_tool: "python -m alembic", settle_delay_seconds: 5 });
  });

  it("gives keys left blank in the file their defaults", async () => {
    fs.writeFileSync(path.join(tmpDir, "graceful-migrate.yaml"), "settle_delay_seconds:\nmigration_tool: \"\"\n");
    expect(await resolveConfig({ cwd: tmpDir, env: {} })).toEqual(DEFAULTS);
  });

  it("applies MIGRATE_ environment overrides over the file, coercing numbers", async () => {
    fs.writeFileSync(path.join(tmpDir, "graceful-migrate.yaml"), "settle_delay_seconds: 5\n");
    const config = await resolveConfig({
      cwd: tmpDir,
      env: { MIGRATE_SETTLE_DELAY_SECONDS: "10", MIGRATE_API_ENDPOINT: "https://platform.example.test" },
    });
    expect(config.settle_delay_seconds).toBe(10);
    expect(config.api_endpoint).toBe("https://platform.example.test");
  });

  it("explicit overrides beat environment variables", async () => {
    const config = await resolveConfig({
      cwd: tmpDir,
      env: { MIGRATE_SETTLE_DELAY_SECONDS: "10" },
      overrides: { settle_delay_seconds: "0", migration_tool: undefined },
    });
    expect(config.settle_delay_seconds).toBe(0);
    expect(config.migration_tool).toBe("alembic");
  });

  it("ignores the token variable and unrelated MIGRATE_ variables", () => {
    const raw = loadConfig({ cwd: tmpDir, env: { MIGRATE_API_SECRET_HEROKU: "test-secret", MIGRATE_OTHER: "x" } });
    expect(raw).toEqual({});
  });

  it("loads an explicit config path relative to cwd", async () => {
    fs.mkdirSync(path.join(tmpDir, "etc"));
    fs.writeFileSync(path.join(tmpDir, "etc", "migrate.yaml"), "token_env: PLATFORM_TOKEN\n");
    const config = await resolveConfig({ cwd: tmpDir, configPath: "etc/migrate.yaml", env: {} });
    expect(config.token_env).toBe("PLATFORM_TOKEN");
  });

  it("fails when an explicit config path does not exist", () => {
    expect(() => loadConfig({ cwd: tmpDir, configPath: "missing.yaml", env: {} })).toThrow(ConfigError);
  });

  it("fails when the file is not a mapping", () => {
    fs.writeFileSync(path.join(tmpDir, "graceful-migrate.yaml"), "- a\n- b\n");
    expect(() => loadConfig({ cwd: tmpDir, env: {} })).toThrow(/must contain a mapping/);
  });

  it("fails on unparseable YAML", () => {
    fs.writeFileSync(path.join(tmpDir, "graceful-migrate.yaml"), "a: [1, 2\n");
    expect(() => loadConfig({ cwd: tmpDir, env: {} })).toThrow(/Invalid YAML/);
  });

  it("resolves the token from the configured variable", () => {
    expect(resolveToken(DEFAULTS, { MIGRATE_API_SECRET_HEROKU: "test-secret" })).toBe("test-secret");
    expect(resolveToken({ ...DEFAULTS, token_env: "PLATFORM_TOKEN" }, { PLATFORM_TOKEN: "test-token" })).toBe("test-token");
    expect(resolveToken(DEFAULTS, {})).toBe("");
  });
});

describe("config validator", () => {
  it("fills defaults into an empty config", async () => {
    const res = await validateConfig({});
    expect(res).toEqual({ valid: true, errors: null, config: DEFAULTS });
  });

  it("rejects a negative delay", async () => {
    const res = await validateConfig({ settle_delay_seconds: -1 });
    expect(res.valid).toBe(false);
    expect(res.errors).toContain("settle_delay_seconds");
  });

  it("rejects a non-numeric delay", async () => {
    const res = await validateConfig({ settle_delay_seconds: "soon" });
    expect(res.valid).toBe(false);
  });

  it("rejects unknown keys", async () => {
    const res = await validateConfig({ artifacts_dir: "x" });
    expect(res.valid).toBe(false);
    expect(res.errors).toContain("additional properties");
  });

  it("rejects a non-http endpoint and a blank tool", async () => {
    expect((await validateConfig({ api_endpoint: "ftp://example.test" })).valid).toBe(false);
    expect((await validateConfig({ migration_tool: "   " })).valid).toBe(false);
  });

  it("surfaces validation failures as ConfigError from resolveConfig", async () => {
    const tmp = fs.mkdtempSync(path.join(os.tmpdir(), "graceful-migrate-cfg-"));
    try {
      await expect(
        resolveConfig({ cwd: tmp, env: { MIGRATE_SETTLE_DELAY_SECONDS: "-5" } }),
      ).rejects.toBeInstanceOf(ConfigError);
    } finally {
      fs.rmSync(tmp, { recursive: true, force: true });
    }
  });
});
