// Système de logs structurés avec niveaux et contexte

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  FATAL = 4
}

export interface LogContext {
  component?: string;
  operation?: string;
  runId?: string;
  isin?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  context: LogContext;
  error?: Error;
  performance?: {
    durationMs: number;
  };
}

export type LogFormat = 'json' | 'pretty';

export interface StructuredLoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  context?: LogContext;
  /** Sortie des lignes formatées, console par défaut */
  sink?: (level: LogLevel, line: string) => void;
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  switch ((value || '').trim().toLowerCase()) {
    case 'debug': return LogLevel.DEBUG;
    case 'info': return LogLevel.INFO;
    case 'warn':
    case 'warning': return LogLevel.WARN;
    case 'error': return LogLevel.ERROR;
    case 'fatal': return LogLevel.FATAL;
    default: return fallback;
  }
}

const COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '\x1b[36m', // Cyan
  [LogLevel.INFO]: '\x1b[32m',  // Green
  [LogLevel.WARN]: '\x1b[33m',  // Yellow
  [LogLevel.ERROR]: '\x1b[31m', // Red
  [LogLevel.FATAL]: '\x1b[35m'  // Magenta
};

const consoleSink = (level: LogLevel, line: string): void => {
  if (level >= LogLevel.ERROR) {
    console.error(line);
  } else {
    console.log(line);
  }
};

export class StructuredLogger {
  private readonly logLevel: LogLevel;
  private readonly format: LogFormat;
  private readonly baseContext: LogContext;
  private readonly sink: (level: LogLevel, line: string) => void;
  private performanceMetrics: Map<string, number> = new Map();

  constructor(options: StructuredLoggerOptions = {}) {
    this.logLevel = options.level ?? LogLevel.INFO;
    this.format = options.format ?? 'pretty';
    this.baseContext = options.context ?? {};
    this.sink = options.sink ?? consoleSink;
  }

  /**
   * Logger enfant partageant niveau, format et sortie, avec un contexte enrichi
   */
  child(context: LogContext): StructuredLogger {
    const child = new StructuredLogger({
      level: this.logLevel,
      format: this.format,
      context: { ...this.baseContext, ...context },
      sink: this.sink
    });
    return child;
  }

  debug(message: string, context: LogContext = {}): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context: LogContext = {}): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context: LogContext = {}): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, error?: Error, context: LogContext = {}): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  fatal(message: string, error?: Error, context: LogContext = {}): void {
    this.log(LogLevel.FATAL, message, context, error);
  }

  /**
   * Démarrer le chronométrage d'une opération
   */
  startTimer(operation: string): void {
    this.performanceMetrics.set(operation, Date.now());
  }

  /**
   * Arrêter le chronométrage et log avec la durée
   */
  endTimer(operation: string, message: string, context: LogContext = {}): number | null {
    const startTime = this.performanceMetrics.get(operation);
    if (startTime === undefined) {
      return null;
    }

    const durationMs = Date.now() - startTime;
    this.performanceMetrics.delete(operation);
    this.log(LogLevel.INFO, message, { ...context, operation }, undefined, { durationMs });
    return durationMs;
  }

  private log(
    level: LogLevel,
    message: string,
    context: LogContext,
    error?: Error,
    performance?: LogEntry['performance']
  ): void {
    if (level < this.logLevel) {
      return;
    }

    const logEntry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LogLevel[level],
      message,
      context: { ...this.baseContext, ...context }
    };

    if (error) {
      logEntry.error = error;
    }

    if (performance) {
      logEntry.performance = performance;
    }

    const line = this.format === 'json' ? this.formatJson(logEntry) : this.formatPretty(level, logEntry);
    this.sink(level, line);
  }

  private formatJson(logEntry: LogEntry): string {
    const { timestamp, level, message, context, error, performance } = logEntry;
    return JSON.stringify({
      timestamp,
      level,
      message,
      ...context,
      ...(error ? { error: { name: error.name, message: error.message } } : {}),
      ...(performance ? { durationMs: performance.durationMs } : {})
    });
  }

  private formatPretty(level: LogLevel, logEntry: LogEntry): string {
    const { timestamp, message, context, error, performance } = logEntry;

    let formatted = `[${timestamp}] ${logEntry.level}: ${message}`;

    if (Object.keys(context).length > 0) {
      formatted += ` | Context: ${JSON.stringify(context)}`;
    }

    if (error) {
      formatted += ` | Error: ${error.message}`;
      if (error.stack && level >= LogLevel.FATAL) {
        formatted += ` | Stack: ${error.stack}`;
      }
    }

    if (performance) {
      formatted += ` | Duration: ${performance.durationMs}ms`;
    }

    return `${COLORS[level]}${formatted}\x1b[0m`;
  }
}

export function createLogger(level: string, format: LogFormat, context: LogContext = {}): StructuredLogger {
  return new StructuredLogger({ level: parseLogLevel(level), format, context });
}
