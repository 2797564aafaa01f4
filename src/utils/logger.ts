/**
 * Structured logger shared by the explorer handler and the demo service.
 *
 * Every line carries a component tag so an embedding application can grep
 * the explorer's output out of its own logs:
 *   [2026-01-01T00:00:00.000Z] [WARN] [EXPLORER] Description document unavailable {"instance":"swagger"}
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4
}

export type Component = 'EXPLORER' | 'REGISTRY' | 'ASSETS' | 'SERVICE' | 'CONFIG';

export type LogContext = Record<string, unknown>;

/** Destination of formatted lines; stderr unless replaced. */
export type LogSink = (line: string) => void;

function parseLevel(raw: string | undefined): LogLevel {
  switch ((raw ?? '').trim().toUpperCase()) {
    case 'DEBUG': return LogLevel.DEBUG;
    case 'WARN': return LogLevel.WARN;
    case 'ERROR': return LogLevel.ERROR;
    case 'SILENT': return LogLevel.SILENT;
    default: return LogLevel.INFO;
  }
}

function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }
  return String(error);
}

class Logger {
  private level: LogLevel = parseLevel(process.env.EXPLORER_LOG_LEVEL);
  private sink: LogSink = (line) => { process.stderr.write(line + '\n'); };

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /** Redirect output (tests, or an application that forwards to its own logger). */
  setSink(sink: LogSink): void {
    this.sink = sink;
  }

  debug(component: Component, message: string, context?: LogContext, error?: unknown): void {
    this.log(LogLevel.DEBUG, component, message, context, error);
  }

  info(component: Component, message: string, context?: LogContext, error?: unknown): void {
    this.log(LogLevel.INFO, component, message, context, error);
  }

  warn(component: Component, message: string, context?: LogContext, error?: unknown): void {
    this.log(LogLevel.WARN, component, message, context, error);
  }

  error(component: Component, message: string, context?: LogContext, error?: unknown): void {
    this.log(LogLevel.ERROR, component, message, context, error);
  }

  private log(
    level: LogLevel,
    component: Component,
    message: string,
    context?: LogContext,
    error?: unknown
  ): void {
    if (level < this.level) return;

    let line = `[${new Date().toISOString()}] [${LogLevel[level]}] [${component}] ${message}`;
    if (context && Object.keys(context).length > 0) {
      line += ` ${JSON.stringify(context)}`;
    }
    if (error !== undefined) {
      line += `\n${formatError(error)}`;
    }
    this.sink(line);
  }
}

export const logger = new Logger();
