/** Configuration types — layered config system. */
export type MigrateConfig = {
  schema_version: string;
  /** Platform API base URL. */
  api_endpoint: string;
  /** Name of the environment variable holding the API bearer token. */
  token_env: string;
  /** Migration tool command; may include leading arguments. */
  migration_tool: string;
  /** Dwell time after scaling down and after scaling up. */
  settle_delay_seconds: number;
};

export const CONFIG_KEYS = [
  "schema_version",
  "api_endpoint",
  "token_env",
  "migration_tool",
  "settle_delay_seconds",
] as const satisfies readonly (keyof MigrateConfig)[];
