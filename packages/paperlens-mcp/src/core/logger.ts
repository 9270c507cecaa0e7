export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

export type LogSink = (line: string) => void;

const PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

// stdout belongs to the MCP stdio transport.
const writeStderr: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

export class Logger {
  constructor(
    private readonly minLevel: LogLevel,
    private readonly bindings: LogContext = {},
    private readonly sink: LogSink = writeStderr
  ) {}

  child(bindings: LogContext): Logger {
    return new Logger(this.minLevel, { ...this.bindings, ...bindings }, this.sink);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (PRIORITY[level] < PRIORITY[this.minLevel]) {
      return;
    }

    const merged = { ...this.bindings, ...(context ?? {}) };
    const payload = {
      ts: new Date().toISOString(),
      level,
      message,
      ...(Object.keys(merged).length > 0 ? { context: merged } : {})
    };

    this.sink(JSON.stringify(payload));
  }
}

export const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));
