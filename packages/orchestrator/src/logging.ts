import { join } from "node:path";
import pino, { type Level, type Logger } from "pino";
import pretty from "pino-pretty";
import { formatRunTimestamp } from "@refseq-db/core";

export interface RunLogOptions {
  logsDir: string;
  /** File name prefix, e.g. `job` or `compress`. */
  label: string;
  version: string;
  level?: Level;
  /** Mirror records to the terminal. Defaults to true. */
  console?: boolean;
  now?: Date;
}

export interface RunLog {
  logger: Logger;
  outPath: string;
  errPath: string;
  close(): void;
}

export function runLogBasePath(options: Pick<RunLogOptions, "logsDir" | "label" | "version" | "now">): string {
  const timestamp = formatRunTimestamp(options.now ?? new Date());
  return join(options.logsDir, `${options.label}_${options.version}_${timestamp}`);
}

/**
 * Opens a logger that writes every record to `<label>_<version>_<ts>.out`,
 * warnings and errors also to `.err`, and mirrors to the terminal.
 */
export function openRunLog(options: RunLogOptions): RunLog {
  const level = options.level ?? "info";
  const base = runLogBasePath(options);
  const outPath = `${base}.out`;
  const errPath = `${base}.err`;

  const out = pino.destination({ dest: outPath, sync: true, mkdir: true, append: true });
  const err = pino.destination({ dest: errPath, sync: true, mkdir: true, append: true });

  const streams: pino.StreamEntry[] = [
    { level, stream: out },
    { level: "warn", stream: err },
  ];

  if (options.console ?? true) {
    streams.push({
      level,
      stream: pretty({ colorize: true, ignore: "pid,hostname", translateTime: "HH:MM:ss", sync: true }),
    });
  }

  const logger = pino({ level, base: { version: options.version } }, pino.multistream(streams));
  let closed = false;

  return {
    logger,
    outPath,
    errPath,
    close: () => {
      if (closed) return;
      closed = true;
      out.end();
      err.end();
    },
  };
}

/**
 * Runs `fn` with a run-scoped logger. The log files are closed however `fn`
 * exits, so no output stays redirected afterwards.
 */
export async function withRunLog<T>(
  options: RunLogOptions,
  fn: (logger: Logger, log: RunLog) => Promise<T>
): Promise<T> {
  const log = openRunLog(options);
  try {
    return await fn(log.logger, log);
  } finally {
    log.close();
  }
}
