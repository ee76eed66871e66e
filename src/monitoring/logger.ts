import winston from 'winston';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export const LOG_LEVELS: readonly LogLevel[] = ['DEBUG', 'INFO', 'WARN', 'ERROR'];

export interface LogData {
  formId?: string;
  event?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: string;
  formId?: string;
  event?: string;
  message?: string;
  data?: Record<string, unknown>;
  error?: {
    code?: string;
    message: string;
    stack?: string;
  };
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

class Logger {
  private winstonLogger: winston.Logger;
  private logLevel: LogLevel;

  constructor(logLevel: LogLevel = 'INFO') {
    this.logLevel = logLevel;

    const transports: winston.transport[] = [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.printf(formatConsoleOutput)
        ),
      }),
    ];

    // Jest sets NODE_ENV=test; keep test runs off the filesystem
    if (process.env.NODE_ENV !== 'test') {
      transports.push(
        new winston.transports.File({
          filename: 'logs/combined.log',
          format: winston.format.json(),
        })
      );
    }

    this.winstonLogger = winston.createLogger({
      level: this.mapLogLevel(logLevel),
      format: winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      transports,
    });

    if (process.env.NODE_ENV === 'production') {
      this.winstonLogger.add(
        new winston.transports.File({
          filename: 'logs/error.log',
          level: 'error',
          format: winston.format.json(),
        })
      );
    }
  }

  private mapLogLevel(level: LogLevel): string {
    const levelMap: Record<LogLevel, string> = {
      DEBUG: 'debug',
      INFO: 'info',
      WARN: 'warn',
      ERROR: 'error',
    };
    return levelMap[level];
  }

  createLogEntry(
    level: LogLevel,
    message: string,
    data?: LogData,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
    };

    if (data?.formId) {
      entry.formId = data.formId;
    }

    if (data?.event) {
      entry.event = data.event;
    }

    if (message) {
      entry.message = message;
    }

    if (data) {
      const { formId: _formId, event: _event, ...rest } = data;
      if (Object.keys(rest).length > 0) {
        entry.data = rest;
      }
    }

    if (error) {
      entry.error = {
        message: error.message,
        stack: error.stack,
      };

      if ('code' in error && typeof error.code === 'string') {
        entry.error.code = error.code;
      }
    }

    return entry;
  }

  debug(message: string, data?: LogData): void {
    this.winstonLogger.debug(this.createLogEntry('DEBUG', message, data));
  }

  info(message: string, data?: LogData): void {
    this.winstonLogger.info(this.createLogEntry('INFO', message, data));
  }

  warn(message: string, data?: LogData): void {
    this.winstonLogger.warn(this.createLogEntry('WARN', message, data));
  }

  error(message: string, dataOrError?: LogData | Error, error?: Error): void {
    let logData: LogData | undefined;
    let logError: Error | undefined;

    if (dataOrError instanceof Error) {
      logError = dataOrError;
    } else {
      logData = dataOrError;
      logError = error;
    }

    this.winstonLogger.error(this.createLogEntry('ERROR', message, logData, logError));
  }

  setLogLevel(level: LogLevel): void {
    this.logLevel = level;
    this.winstonLogger.level = this.mapLogLevel(level);
  }

  getLogLevel(): LogLevel {
    return this.logLevel;
  }
}

function formatConsoleOutput(info: winston.Logform.TransformableInfo): string {
  const { timestamp, level, message, formId, event, ...rest } = info;
  let output = `${String(timestamp)} [${level}]`;

  if (formId) {
    output += ` [${String(formId)}]`;
  }

  if (event) {
    output += ` ${String(event)}`;
  }

  if (message) {
    output += `: ${String(message)}`;
  }

  if (Object.keys(rest).length > 0) {
    output += ` ${JSON.stringify(rest)}`;
  }

  return output;
}

let loggerInstance: Logger | null = null;

function levelFromEnv(): LogLevel {
  const envLogLevel = process.env.LOG_LEVEL;
  return isLogLevel(envLogLevel) ? envLogLevel : 'INFO';
}

export function createLogger(logLevel?: LogLevel): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger(logLevel ?? levelFromEnv());
  } else if (logLevel) {
    loggerInstance.setLogLevel(logLevel);
  }
  return loggerInstance;
}

export function getLogger(): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger(levelFromEnv());
  }
  return loggerInstance;
}

export { Logger };
export default Logger;
