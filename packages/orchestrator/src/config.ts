import { resolve } from "node:path";
import { parseArgs } from "node:util";
import type { Level } from "pino";
import { z } from "zod";
import { ConfigurationError, NCBI_DATASETS_URL } from "@refseq-db/core";

export interface OrchestratorConfig {
  outputDir: string;
  manifestPath: string;
  stateDbPath: string | null;
  backupDir: string | null;
  datasetsUrl: string;
  apiKey: string | null;
  fetchTimeoutMs: number;
  logLevel: Level;
}

const DEFAULT_CONFIG = {
  outputDir: "./data",
  manifestPath: "./data/ftp_reference_genomes.tsv",
  fetchTimeoutMs: 10 * 60 * 1000,
  logLevel: "info",
} as const;

const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace"]);

function envValue(env: NodeJS.ProcessEnv, key: string): string | null {
  const value = env[key];
  return value !== undefined && value !== "" ? value : null;
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): OrchestratorConfig {
  const timeout = envValue(env, "FETCH_TIMEOUT_MS");
  const fetchTimeoutMs = timeout === null ? DEFAULT_CONFIG.fetchTimeoutMs : Number.parseInt(timeout, 10);
  if (Number.isNaN(fetchTimeoutMs) || fetchTimeoutMs <= 0) {
    throw new ConfigurationError(`FETCH_TIMEOUT_MS must be a positive integer, got: ${timeout}`);
  }

  const level = LogLevelSchema.safeParse(envValue(env, "LOG_LEVEL") ?? DEFAULT_CONFIG.logLevel);
  if (!level.success) {
    throw new ConfigurationError(`Invalid LOG_LEVEL: ${env.LOG_LEVEL}`);
  }

  return {
    outputDir: envValue(env, "REFSEQ_OUTPUT_DIR") ?? DEFAULT_CONFIG.outputDir,
    manifestPath: envValue(env, "REFSEQ_MANIFEST") ?? DEFAULT_CONFIG.manifestPath,
    stateDbPath: envValue(env, "STATE_DB_PATH"),
    backupDir: envValue(env, "BACKUP_DIR"),
    datasetsUrl: envValue(env, "NCBI_DATASETS_URL") ?? NCBI_DATASETS_URL,
    apiKey: envValue(env, "NCBI_API_KEY"),
    fetchTimeoutMs,
    logLevel: level.data,
  };
}

const VersionSchema = z
  .string({ required_error: "--version is required" })
  .refine((value) => value.trim().length > 0, "--version is required")
  .refine((value) => !/[\\/]/.test(value), "--version must not contain path separators");

export const RunOptionsSchema = z.object({
  version: VersionSchema,
  backupDir: z.string().min(1, "--backup-dir must not be empty").nullable(),
});

export type RunOptions = z.infer<typeof RunOptionsSchema>;

/** Unconfigured -> Validated. Backup directory existence is not checked. */
export function validateRunOptions(input: { version?: string; backupDir?: string | null }): RunOptions {
  const result = RunOptionsSchema.safeParse({ version: input.version, backupDir: input.backupDir ?? null });
  if (!result.success) {
    throw new ConfigurationError(result.error.issues.map((issue) => issue.message).join("; "));
  }
  return result.data;
}

export type CliCommand =
  | { command: "help" }
  | { command: "status"; outputDir: string | null }
  | {
      command: "run";
      options: RunOptions;
      manifestPath: string | null;
      outputDir: string | null;
      compress: boolean;
    }
  | { command: "compress"; options: RunOptions; outputDir: string | null };

const COMMANDS = ["run", "compress", "status", "help"] as const;

function parseFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        version: { type: "string" },
        "backup-dir": { type: "string" },
        manifest: { type: "string" },
        "output-dir": { type: "string" },
        "skip-compress": { type: "boolean", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
    });
  } catch (error) {
    throw new ConfigurationError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Parses `<command> [flags]`. Unknown commands or flags raise `ConfigurationError`.
 */
export function parseCliArgs(argv: string[], config: OrchestratorConfig): CliCommand {
  const parsed = parseFlags(argv);
  const { values, positionals } = parsed;
  const [command, ...extra] = positionals;

  if (values.help || command === undefined || command === "help") {
    return { command: "help" };
  }

  if (!COMMANDS.some((known) => known === command)) {
    throw new ConfigurationError(`Unknown command: ${command}`);
  }

  if (extra.length > 0) {
    throw new ConfigurationError(`Unexpected argument: ${extra[0]}`);
  }

  const outputDir = values["output-dir"] ?? null;

  switch (command) {
    case "status":
      return { command: "status", outputDir };
    case "compress":
      return {
        command: "compress",
        options: validateRunOptions({ version: values.version, backupDir: values["backup-dir"] ?? config.backupDir }),
        outputDir,
      };
    default:
      return {
        command: "run",
        options: validateRunOptions({ version: values.version, backupDir: values["backup-dir"] ?? config.backupDir }),
        manifestPath: values.manifest ?? null,
        outputDir,
        compress: !values["skip-compress"],
      };
  }
}

export function resolvePaths(
  config: OrchestratorConfig,
  overrides: { outputDir?: string | null; manifestPath?: string | null } = {}
): { outputDir: string; manifestPath: string; stateDbPath: string | undefined } {
  return {
    outputDir: resolve(overrides.outputDir ?? config.outputDir),
    manifestPath: resolve(overrides.manifestPath ?? config.manifestPath),
    stateDbPath: config.stateDbPath ? resolve(config.stateDbPath) : undefined,
  };
}
