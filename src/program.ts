import { Command, CommanderError, type OutputConfiguration } from "commander";
import { migrate, DEFAULT_APP_SECTION, DEFAULT_INI_FILE } from "./commands/migrate.js";
import { status } from "./commands/status.js";
import { validateAll } from "./commands/validate.js";
import { EXIT } from "./commands/exit-codes.js";
import { isOutputFormat, type OutputFormat } from "./output/reporter.js";

type CommonOpts = { config?: string; tool?: string; format: string };

function outputFormat(format: string): OutputFormat {
  if (isOutputFormat(format)) return format;
  console.error(`Unknown format: ${format} (expected human|jsonl)`);
  process.exit(EXIT.INVALID_ARGS);
}

function fail(format: OutputFormat, error: string, exitCode: number): never {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "error", code: "FAILED", message: error, exit_code: exitCode }) + "\n");
  } else {
    console.error(error);
  }
  process.exit(exitCode);
}

/** Codes commander uses when it prints help or the version and stops. */
const INFO_CODES = new Set(["commander.helpDisplayed", "commander.help", "commander.version"]);

/** Exit code for an error that escaped `parseAsync`. */
export function cliExitCode(err: unknown): number {
  if (err instanceof CommanderError) {
    return INFO_CODES.has(err.code) ? err.exitCode : EXIT.INVALID_ARGS;
  }
  return EXIT.UNEXPECTED;
}

/**
 * The graceful-migrate program. Usage errors throw a CommanderError instead of
 * exiting, so the caller picks the exit code.
 */
export function buildProgram(output?: OutputConfiguration): Command {
  const program = new Command();
  program.exitOverride();
  if (output) program.configureOutput(output);

  program
    .name("graceful-migrate")
    .description("Run pending database migrations with the app in maintenance mode and scaled to zero")
    .version("0.1.0");

  program
    .command("migrate", { isDefault: true })
    .description("Migrate the database if needed, taking the app offline meanwhile")
    .argument("<app_name>", "Platform app name or id")
    .argument("[ini_file]", "Path to the migration tool's configuration file", DEFAULT_INI_FILE)
    .argument("[app_section]", "Section name in the configuration file", DEFAULT_APP_SECTION)
    .option("--config <path>", "Path to graceful-migrate YAML config")
    .option("--delay <seconds>", "Seconds to wait after scaling down and after scaling up")
    .option("--tool <command>", "Migration tool command")
    .option("--format <format>", "Output format: human|jsonl", "human")
    .action(async (appName: string, iniFile: string, appSection: string, opts: CommonOpts & { delay?: string }) => {
      const format = outputFormat(opts.format);
      const res = await migrate({
        appName,
        iniFile,
        appSection,
        configPath: opts.config,
        delay: opts.delay,
        tool: opts.tool,
        format,
      });
      if (!res.ok) fail(format, res.error, res.exitCode);

      if (format === "jsonl") {
        process.stdout.write(
          JSON.stringify({ level: "info", code: "OK", migrated: res.outcome.migrated, final_state: res.outcome.final_state }) + "\n",
        );
      }
    });

  program
    .command("status")
    .description("Report whether a migration is pending (does not touch the app)")
    .argument("<app_name>", "Platform app name or id")
    .argument("[ini_file]", "Path to the migration tool's configuration file", DEFAULT_INI_FILE)
    .argument("[app_section]", "Section name in the configuration file", DEFAULT_APP_SECTION)
    .option("--config <path>", "Path to graceful-migrate YAML config")
    .option("--tool <command>", "Migration tool command")
    .option("--format <format>", "Output format: human|jsonl", "human")
    .action(async (appName: string, iniFile: string, appSection: string, opts: CommonOpts) => {
      const format = outputFormat(opts.format);
      const res = await status({ appName, iniFile, appSection, configPath: opts.config, tool: opts.tool, format });
      if (!res.ok) fail(format, res.error, res.exitCode);
    });

  program
    .command("validate")
    .description("Validate graceful-migrate configuration")
    .option("--config <path>", "Path to graceful-migrate YAML config")
    .option("--format <format>", "Output format: human|jsonl", "human")
    .action(async (opts: { config?: string; format: string }) => {
      const format = outputFormat(opts.format);
      const res = await validateAll({ configPath: opts.config });
      if (!res.ok) fail(format, res.error, EXIT.INVALID_ARGS);

      if (format === "jsonl") {
        process.stdout.write(JSON.stringify({ level: "info", code: "OK", message: "OK", config: res.config }) + "\n");
      } else {
        console.log("OK");
      }
    });

  return program;
}
