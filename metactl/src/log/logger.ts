export type LogLevel = "debug" | "info" | "warn" | "error";

export type OutputFormat = "human" | "jsonl";

export type Diagnostic = {
  level: LogLevel;
  code: string;
  message: string;
  details?: Record<string, unknown>;
};

export interface Logger {
  log(entry: Diagnostic): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function diag(
  level: LogLevel,
  code: string,
  message: string,
  details?: Record<string, unknown>,
): Diagnostic {
  return details ? { level, code, message, details } : { level, code, message };
}

/** Render one diagnostic the way the CLI prints it. */
export function formatDiagnostic(entry: Diagnostic, format: OutputFormat): string {
  if (format === "jsonl") return JSON.stringify(entry);
  const details = entry.details && Object.keys(entry.details).length > 0 ? ` ${JSON.stringify(entry.details)}` : "";
  return `${entry.level.toUpperCase()} ${entry.code}: ${entry.message}${details}`;
}

export type StreamLoggerOptions = {
  format: OutputFormat;
  minLevel?: LogLevel;
  write?: (line: string) => void;
};

/** Writes diagnostics at or above `minLevel`, one per line (stderr by default). */
export function createStreamLogger(opts: StreamLoggerOptions): Logger {
  const min = LEVEL_RANK[opts.minLevel ?? "info"];
  const write = opts.write ?? ((line: string) => process.stderr.write(line + "\n"));
  return {
    log(entry) {
      if (LEVEL_RANK[entry.level] < min) return;
      write(formatDiagnostic(entry, opts.format));
    },
  };
}

/** Keeps every diagnostic in memory. */
export class MemoryLogger implements Logger {
  readonly entries: Diagnostic[] = [];

  log(entry: Diagnostic): void {
    this.entries.push(entry);
  }

  codes(): string[] {
    return this.entries.map((e) => e.code);
  }
}

export const silentLogger: Logger = {
  log() {},
};
