/**
 * Process-wide log sink.
 *
 * Lines are written to stderr because stdout carries the MCP stdio transport.
 * Format: `[timestamp |] LEVEL [| name] | message [json]`.
 */

export type LogLevelName = "debug" | "info" | "warn" | "error";

export interface LoggingOptions {
  level?: LogLevelName;
  useColors?: boolean;
  showTimestamps?: boolean;
  showModule?: boolean;
}

export interface LogWriter {
  write(line: string): unknown;
}

const LEVEL_WEIGHTS: Record<LogLevelName, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_COLORS: Record<LogLevelName, number> = {
  debug: 36, // cyan
  info: 32, // green
  warn: 33, // yellow
  error: 31, // red
};

interface LoggingState {
  level: LogLevelName;
  useColors: boolean;
  showTimestamps: boolean;
  showModule: boolean;
  writer: LogWriter;
}

const state: LoggingState = {
  level: "info",
  useColors: false,
  showTimestamps: true,
  showModule: false,
  writer: process.stderr,
};

export function setupLogging(options: LoggingOptions = {}, writer?: LogWriter): void {
  state.level = options.level ?? "info";
  state.useColors = options.useColors ?? process.stderr.isTTY === true;
  state.showTimestamps = options.showTimestamps ?? true;
  state.showModule = options.showModule ?? false;
  if (writer) {
    state.writer = writer;
  }
}

export class Logger {
  constructor(private readonly name: string) {}

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log("error", message, data);
  }

  private log(level: LogLevelName, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_WEIGHTS[level] < LEVEL_WEIGHTS[state.level]) {
      return;
    }
    state.writer.write(`${formatLine(this.name, level, message, data)}\n`);
  }
}

export function getLogger(name: string): Logger {
  return new Logger(name);
}

export function formatLine(
  name: string,
  level: LogLevelName,
  message: string,
  data?: Record<string, unknown>,
): string {
  const parts: string[] = [];
  if (state.showTimestamps) {
    parts.push(new Date().toISOString());
  }

  const levelLabel = level.toUpperCase().padEnd(5);
  parts.push(state.useColors ? colorize(levelLabel, LEVEL_COLORS[level]) : levelLabel);

  if (state.showModule) {
    parts.push(`[${name}]`);
  }

  const extra = data && Object.keys(data).length > 0 ? ` ${JSON.stringify(data)}` : "";
  parts.push(`${message}${extra}`);
  return parts.join(" | ");
}

function colorize(text: string, colorCode: number): string {
  return `\x1b[${colorCode}m${text}\x1b[0m`;
}
