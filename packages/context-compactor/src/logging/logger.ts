import { createWriteStream, mkdirSync, type WriteStream } from "node:fs";
import { dirname } from "node:path";
import { type ILogObj, Logger } from "tslog";

const LEVEL_NAME_TO_ID: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

/**
 * Parses a level given either by name ("debug") or by id ("2").
 * Numeric values are clamped to the 0-6 range.
 */
export function parseLogLevel(value?: string): number | undefined {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) {
    return undefined;
  }

  const numericLevel = Number(normalized);
  if (Number.isFinite(numericLevel)) {
    return Math.max(0, Math.min(6, Math.floor(numericLevel)));
  }

  return LEVEL_NAME_TO_ID[normalized];
}

/**
 * Logger configuration options.
 */
export interface LoggerOptions {
  /**
   * Log level: 0=silly, 1=trace, 2=debug, 3=info, 4=warn, 5=error, 6=fatal
   * @default 4 (warn)
   */
  minLevel?: number;

  /**
   * Output type: 'pretty' for development, 'json' for production
   * @default 'pretty'
   */
  type?: "pretty" | "json" | "hidden";

  /** Logger name (appears in logs) */
  name?: string;

  /**
   * Truncate the log file instead of appending to it.
   * @default false
   */
  logReset?: boolean;
}

function parseEnvBoolean(value?: string): boolean | undefined {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  return undefined;
}

// All loggers share one file stream per path
let sharedLogFilePath: string | undefined;
let sharedLogFileStream: WriteStream | undefined;

const LOG_TEMPLATE =
  "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}}:{{ms}}\t{{logLevelName}}\t[{{name}}]\t";

/**
 * Strips ANSI color codes from a string.
 */
export function stripAnsi(str: string): string {
  // biome-ignore lint/suspicious/noControlCharactersInRegex: ANSI escape codes use control characters
  return str.replace(/\x1b\[[0-9;]*m/g, "");
}

/**
 * Closes the shared log file stream. Used by tests.
 * @internal
 */
export function _resetFileLoggingState(): void {
  sharedLogFileStream?.end();
  sharedLogFileStream = undefined;
  sharedLogFilePath = undefined;
}

function openLogFile(path: string, reset: boolean): void {
  if (sharedLogFileStream && sharedLogFilePath === path) {
    return;
  }
  sharedLogFileStream?.end();
  sharedLogFileStream = undefined;

  try {
    mkdirSync(dirname(path), { recursive: true });
    const stream = createWriteStream(path, { flags: reset ? "w" : "a" });
    stream.on("error", (error) => {
      console.error(`[context-compactor] Log file write error, disabling file logging: ${error.message}`);
      if (sharedLogFileStream === stream) {
        sharedLogFileStream = undefined;
        sharedLogFilePath = undefined;
      }
    });
    sharedLogFileStream = stream;
    sharedLogFilePath = path;
  } catch (error) {
    console.error("Failed to initialize COMPACTOR_LOG_FILE output:", error);
  }
}

/**
 * Create a logger.
 *
 * Environment variables `COMPACTOR_LOG_LEVEL`, `COMPACTOR_LOG_FILE` and
 * `COMPACTOR_LOG_RESET` apply when the matching option is not given.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ name: "compactor", minLevel: 2 });
 * const silent = createLogger({ type: "hidden" });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger<ILogObj> {
  const envMinLevel = parseLogLevel(process.env.COMPACTOR_LOG_LEVEL);
  const envLogFile = process.env.COMPACTOR_LOG_FILE?.trim() ?? "";
  const envLogReset = parseEnvBoolean(process.env.COMPACTOR_LOG_RESET);

  const minLevel = options.minLevel ?? envMinLevel ?? 4;
  const defaultType = options.type ?? "pretty";
  const name = options.name ?? "compactor";

  if (envLogFile) {
    openLogFile(envLogFile, options.logReset ?? envLogReset ?? false);
  }

  const useFileLogging = Boolean(sharedLogFileStream);

  return new Logger<ILogObj>({
    name,
    minLevel,
    type: useFileLogging ? "pretty" : defaultType,
    hideLogPositionForProduction: useFileLogging || defaultType !== "pretty",
    prettyLogTemplate: LOG_TEMPLATE,
    overwrite: useFileLogging
      ? {
          transportFormatted: (logMetaMarkup: string, logArgs: unknown[]) => {
            if (!sharedLogFileStream) return;
            const meta = stripAnsi(logMetaMarkup);
            const args = logArgs.map((arg) =>
              typeof arg === "string" ? stripAnsi(arg) : JSON.stringify(arg),
            );
            sharedLogFileStream.write(`${meta}${args.join(" ")}\n`);
          },
        }
      : undefined,
  });
}
