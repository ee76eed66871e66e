/**
 * Error handler middleware.
 * The only place where failure kinds become HTTP status codes.
 */

import { NextFunction, Request, RequestHandler, Response, ErrorRequestHandler } from 'express';
import { ERROR_CODES, getErrorCode } from './codes';
import { FeedbackError, ValidationError } from './types';
import { createErrorLogEntry, formatErrorResponse } from './formatter';
import type { LogData } from '../monitoring/logger';

/**
 * Logger interface for error handling.
 */
interface Logger {
  error(message: string, data?: LogData, error?: Error): void;
  warn(message: string, data?: LogData): void;
}

/**
 * Metrics emitter interface for error handling.
 */
interface MetricsEmitter {
  emitError(errorCode?: string): Promise<void>;
}

export interface ErrorHandlerConfig {
  logger: Logger;
  metricsEmitter?: MetricsEmitter;
}

/**
 * body-parser rejects malformed JSON with a 400 SyntaxError carrying
 * `type: 'entity.parse.failed'`.
 */
function isJsonParseError(error: Error): boolean {
  return (
    error instanceof SyntaxError &&
    'type' in error &&
    error.type === 'entity.parse.failed'
  );
}

/**
 * Normalise anything thrown by a route into an Error.
 */
export function toError(thrown: unknown): Error {
  if (thrown instanceof Error) {
    return thrown;
  }
  return new Error(typeof thrown === 'string' ? thrown : 'Unknown error');
}

export class ErrorHandler {
  private logger: Logger;
  private metricsEmitter?: MetricsEmitter;

  constructor(config: ErrorHandlerConfig) {
    this.logger = config.logger;
    this.metricsEmitter = config.metricsEmitter;
  }

  /**
   * Log, count and answer an error.
   */
  async handleError(thrown: unknown, req: Request, res: Response): Promise<void> {
    let error = toError(thrown);

    if (isJsonParseError(error)) {
      error = new ValidationError('Request body must be valid JSON');
    }

    const context = {
      method: req.method,
      path: req.originalUrl,
    };

    if (error instanceof FeedbackError && error.code !== ERROR_CODES.STORAGE_ERROR) {
      // Expected outcomes of the workflow; not server faults
      this.logger.warn('Request failed', createErrorLogEntry(error, context));
    } else {
      this.logger.error('Unhandled error while serving request', createErrorLogEntry(error, context), error);
    }

    if (this.metricsEmitter) {
      await this.metricsEmitter.emitError(getErrorCode(error));
    }

    if (res.headersSent) {
      return;
    }

    const { status, body } = formatErrorResponse(error);
    res.status(status).json(body);
  }

  /**
   * Express error middleware bound to this handler.
   */
  middleware(): ErrorRequestHandler {
    return (err: unknown, req: Request, res: Response, next: NextFunction) => {
      this.handleError(err, req, res).catch(next);
    };
  }

  /**
   * Fallback for unmatched routes.
   */
  notFound(): RequestHandler {
    return (req: Request, res: Response) => {
      const { status, body } = formatErrorResponse(
        new FeedbackError(ERROR_CODES.NOT_FOUND, `Route ${req.method} ${req.path} not found`, false)
      );
      res.status(status).json(body);
    };
  }
}

/**
 * Wrap an async route so rejections reach the error middleware.
 */
export function asyncHandler(
  handler: (req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}
