export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const ORDER: LogLevel[] = ['debug', 'info', 'warn', 'error'];

type LogSink = (line: string) => void;

let threshold: LogLevel = 'warn';
let sink: LogSink = (line) => console.error(line);

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function levelFromFlags(flags: { verbose: boolean; debug: boolean }): LogLevel {
  if (flags.debug) {
    return 'debug';
  }
  return flags.verbose ? 'info' : 'warn';
}

// Returns the previous sink.
export function setLogSink(next: LogSink): LogSink {
  const previous = sink;
  sink = next;
  return previous;
}

function logEnabled(level: LogLevel): boolean {
  return ORDER.indexOf(level) >= ORDER.indexOf(threshold);
}

function formatValue(value: unknown): string {
  if (value instanceof Error) {
    return `${value.name}: ${value.message}`;
  }
  if (typeof value === 'string') {
    return value;
  }
  return JSON.stringify(value) ?? String(value);
}

export class Logger {
  private constructor(private readonly scope: string) {}

  static scope(scope: string): Logger {
    return new Logger(scope.toUpperCase());
  }

  private write(level: LogLevel, message: string, rest: unknown[]): void {
    if (!logEnabled(level)) {
      return;
    }

    const tag = `[${this.scope}:${level.toUpperCase()}]`;
    const extra = rest.map(formatValue).join(' ');
    sink(extra.length > 0 ? `${tag} ${message} ${extra}` : `${tag} ${message}`);
  }

  debug(message: string, ...rest: unknown[]): void {
    this.write('debug', message, rest);
  }

  info(message: string, ...rest: unknown[]): void {
    this.write('info', message, rest);
  }

  warn(message: string, ...rest: unknown[]): void {
    this.write('warn', message, rest);
  }

  error(message: string, ...rest: unknown[]): void {
    this.write('error', message, rest);
  }
}
