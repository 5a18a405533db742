import { LogFields, LogLevel } from "./types";

export interface LoggerContext {
  component: string;
  runId: string;
}

export interface LogWriter {
  write(line: string): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  writer?: LogWriter;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const stderrWriter: LogWriter = {
  write(line: string): void {
    process.stderr.write(`${line}\n`);
  },
};

export function parseLogLevel(raw: string | undefined): LogLevel | undefined {
  if (raw === "debug" || raw === "info" || raw === "warn" || raw === "error") {
    return raw;
  }
  return undefined;
}

// Diagnostics go to stderr; stdout is reserved for command output such as the stats report.
export class Logger {
  private readonly context: LoggerContext;
  private readonly level: LogLevel;
  private readonly writer: LogWriter;

  constructor(context: LoggerContext, options: LoggerOptions = {}) {
    this.context = context;
    this.level = options.level ?? "info";
    this.writer = options.writer ?? stderrWriter;
  }

  child(component: string): Logger {
    return new Logger({ component, runId: this.context.runId }, { level: this.level, writer: this.writer });
  }

  debug(msg: string, fields?: LogFields): void {
    this.write("debug", msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.write("info", msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.write("warn", msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.write("error", msg, fields);
  }

  private write(level: LogLevel, msg: string, fields?: LogFields): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }

    const payload = {
      ts: new Date().toISOString(),
      level,
      msg,
      component: this.context.component,
      runId: this.context.runId,
      ...(fields ?? {}),
    };

    this.writer.write(JSON.stringify(payload));
  }
}
