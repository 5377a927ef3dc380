/**
 * Cost Analyzer Logging Subsystem
 *
 * Leveled logging with pluggable transports and secret redaction. Loggers
 * are created by the caller and passed down; the analysis core never
 * reaches for a global instance.
 */

import { createWriteStream, type WriteStream } from "node:fs";

// =============================================================================
// Logger Types
// =============================================================================

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export type LogEntry = {
  timestamp: Date;
  level: LogLevel;
  subsystem: string;
  message: string;
  metadata?: Record<string, unknown>;
  /** Billing provider the entry concerns, when there is one. */
  providerId?: string;
};

export type LogFormatter = (entry: LogEntry) => string;

export interface LogTransport {
  name: string;
  write(entry: LogEntry): void;
  close?(): Promise<void>;
}

type LogMethod = (message: string, meta?: Record<string, unknown>) => void;

export interface CostAnalyzerLogger {
  readonly subsystem: string;

  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  fatal: LogMethod;

  child(name: string): CostAnalyzerLogger;
  withContext(context: LogContext): CostAnalyzerLogger;
  isLevelEnabled(level: LogLevel): boolean;
  /** Flush and close every transport. */
  close(): Promise<void>;
}

export type LogContext = {
  providerId?: string;
};

export type LoggingOptions = {
  level?: LogLevel;
  /** Regex sources; matches are replaced with [REDACTED]. */
  redactPatterns?: string[];
  /** Append plain-text log lines to this file as well as the console. */
  file?: string;
  colors?: boolean;
};

// =============================================================================
// Levels and Redaction
// =============================================================================

export const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(minLevel);
}

/**
 * Secrets that show up in cost-analyzer logs: AWS access key ids, webhook
 * hook tokens and bearer tokens.
 */
export const DEFAULT_REDACT_PATTERNS = [
  "AKIA[0-9A-Z]{16}",
  "(?<=/hook/)[A-Za-z0-9-]+",
  "(?<=Bearer )[A-Za-z0-9._~+/-]+=*",
];

const REDACTED = "[REDACTED]";

function redactValue(value: unknown, patterns: readonly RegExp[]): unknown {
  if (typeof value === "string") {
    return patterns.reduce((text, pattern) => text.replace(pattern, REDACTED), value);
  }
  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item, patterns));
  }
  if (typeof value === "object" && value !== null) {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, redactValue(v, patterns)]));
  }
  return value;
}

// =============================================================================
// Formatter
// =============================================================================

const ANSI = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  blue: "\x1b[34m",
};

const LEVEL_ANSI: Record<LogLevel, string> = {
  trace: "\x1b[2m",
  debug: "\x1b[36m",
  info: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
  fatal: "\x1b[35m",
};

/**
 * One line per entry: `[timestamp] LEVEL [subsystem] message (provider=id) {metadata}`.
 */
export function createDefaultFormatter(options: { colors?: boolean; timestamps?: boolean } = {}): LogFormatter {
  const colors = options.colors ?? process.stderr.isTTY ?? false;
  const timestamps = options.timestamps ?? true;
  const paint = (code: string, text: string) => (colors ? `${code}${text}${ANSI.reset}` : text);

  return (entry) => {
    const head = [
      ...(timestamps ? [paint(ANSI.dim, entry.timestamp.toISOString())] : []),
      paint(LEVEL_ANSI[entry.level], entry.level.toUpperCase().padEnd(5)),
      paint(ANSI.blue, `[${entry.subsystem}]`),
      entry.message,
    ];
    if (entry.providerId) head.push(paint(ANSI.dim, `(provider=${entry.providerId})`));
    if (entry.metadata && Object.keys(entry.metadata).length > 0) {
      head.push(paint(ANSI.dim, JSON.stringify(entry.metadata)));
    }
    return head.join(" ");
  };
}

// =============================================================================
// Transports
// =============================================================================

/**
 * Writes to stderr, leaving stdout to the report.
 */
export class ConsoleTransport implements LogTransport {
  name = "console";

  constructor(private readonly format: LogFormatter = createDefaultFormatter()) {}

  write(entry: LogEntry): void {
    process.stderr.write(`${this.format(entry)}\n`);
  }
}

/**
 * Appends uncolored lines to a file, opened on first write. If the file
 * cannot be opened or written, the failure is reported once on stderr and
 * later entries are dropped.
 */
export class FileTransport implements LogTransport {
  name = "file";
  private stream: WriteStream | null = null;
  private failed = false;

  constructor(
    private readonly filePath: string,
    private readonly format: LogFormatter = createDefaultFormatter({ colors: false }),
  ) {}

  write(entry: LogEntry): void {
    if (this.failed) return;
    this.stream ??= this.open();
    this.stream.write(`${this.format(entry)}\n`);
  }

  async close(): Promise<void> {
    const stream = this.stream;
    this.stream = null;
    if (!stream || stream.destroyed) return;
    await new Promise<void>((resolve) => {
      stream.once("close", () => resolve());
      stream.end();
    });
  }

  private open(): WriteStream {
    const stream = createWriteStream(this.filePath, { flags: "a" });
    stream.on("error", (err) => {
      if (!this.failed) {
        process.stderr.write(`log file "${this.filePath}" unavailable: ${err.message}\n`);
      }
      this.failed = true;
      this.stream = null;
    });
    return stream;
  }
}

/** Keeps entries in memory for inspection. */
export class MemoryTransport implements LogTransport {
  name = "memory";
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter((e) => !level || e.level === level).map((e) => e.message);
  }
}

// =============================================================================
// Logger
// =============================================================================

type LoggerState = {
  subsystem: string;
  level: LogLevel;
  transports: readonly LogTransport[];
  redact: readonly RegExp[];
  context: LogContext;
};

export class CostAnalyzerLoggerImpl implements CostAnalyzerLogger {
  readonly trace = this.at("trace");
  readonly debug = this.at("debug");
  readonly info = this.at("info");
  readonly warn = this.at("warn");
  readonly error = this.at("error");
  readonly fatal = this.at("fatal");

  constructor(private readonly state: LoggerState) {}

  get subsystem(): string {
    return this.state.subsystem;
  }

  child(name: string): CostAnalyzerLogger {
    return new CostAnalyzerLoggerImpl({ ...this.state, subsystem: `${this.state.subsystem}/${name}` });
  }

  withContext(context: LogContext): CostAnalyzerLogger {
    return new CostAnalyzerLoggerImpl({ ...this.state, context: { ...this.state.context, ...context } });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return shouldLog(level, this.state.level);
  }

  async close(): Promise<void> {
    await Promise.all(this.state.transports.map((t) => t.close?.()));
  }

  private at(level: LogLevel): LogMethod {
    return (message, meta) => {
      if (!this.isLevelEnabled(level)) return;
      const metadata = meta ? redactValue(meta, this.state.redact) : undefined;
      const entry: LogEntry = {
        timestamp: new Date(),
        level,
        subsystem: this.state.subsystem,
        message: String(redactValue(message, this.state.redact)),
        metadata: isRecord(metadata) ? metadata : undefined,
        providerId: this.state.context.providerId,
      };
      for (const transport of this.state.transports) {
        try {
          transport.write(entry);
        } catch (err) {
          process.stderr.write(`log transport "${transport.name}" failed: ${String(err)}\n`);
        }
      }
    };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// =============================================================================
// Factories
// =============================================================================

/**
 * Create a logger for a cost-analyzer subsystem. Without explicit
 * transports it logs to stderr, and also to `file` when one is given.
 */
export function createLogger(
  subsystem: string,
  options: LoggingOptions & { transports?: LogTransport[] } = {},
): CostAnalyzerLogger {
  const transports = options.transports ?? [
    new ConsoleTransport(createDefaultFormatter({ colors: options.colors })),
    ...(options.file ? [new FileTransport(options.file)] : []),
  ];

  return new CostAnalyzerLoggerImpl({
    subsystem: `cost-analyzer/${subsystem}`,
    level: options.level ?? "info",
    transports,
    redact: [...DEFAULT_REDACT_PATTERNS, ...(options.redactPatterns ?? [])].map((p) => new RegExp(p, "g")),
    context: {},
  });
}

/** Drops everything. Default for library calls that were not handed a logger. */
export function createSilentLogger(): CostAnalyzerLogger {
  return new CostAnalyzerLoggerImpl({
    subsystem: "cost-analyzer",
    level: "fatal",
    transports: [],
    redact: [],
    context: {},
  });
}
