/**
 * Component: Application Logger
 * Documentation: documentation/operations.md
 *
 * Context-scoped console logger. Every line is prefixed with the component name.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isThresholdLevel(value: string): value is LogLevel | 'silent' {
  return value in LEVEL_ORDER;
}

// Read on every call; tests change LOG_LEVEL at runtime
function currentThreshold(): number {
  const configured = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return isThresholdLevel(configured) ? LEVEL_ORDER[configured] : LEVEL_ORDER.info;
}

export class AppLogger {
  private readonly context: string;

  private constructor(context: string) {
    this.context = context;
  }

  static create(context: string): AppLogger {
    return new AppLogger(context);
  }

  /**
   * Derive a logger for a sub-component, e.g. `Cleanup` -> `Cleanup:Sonarr`
   */
  child(name: string): AppLogger {
    return new AppLogger(`${this.context}:${name}`);
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.write('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.write('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.write('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.write('error', message, metadata);
  }

  private write(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (LEVEL_ORDER[level] < currentThreshold()) {
      return;
    }

    const timestamp = new Date().toISOString();
    const line = `${timestamp} ${level.toUpperCase().padEnd(5)} [${this.context}] ${message}`;
    const extra = metadata && Object.keys(metadata).length > 0 ? [JSON.stringify(metadata)] : [];

    switch (level) {
      case 'debug':
        console.debug(line, ...extra);
        break;
      case 'info':
        console.log(line, ...extra);
        break;
      case 'warn':
        console.warn(line, ...extra);
        break;
      case 'error':
        console.error(line, ...extra);
        break;
    }
  }
}

/**
 * Render an unknown thrown value for a log line
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
