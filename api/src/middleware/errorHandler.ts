import { Request, Response, NextFunction } from 'express';
import { config } from '../config';
import { HttpError } from '../errors';
import { logger } from '../logger';
import { renderErrorPage } from '../views/battlePage';

export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction) {
  const statusCode = err instanceof HttpError ? err.statusCode : 500;

  logger.error({
    module: 'middleware.errorHandler',
    error_message: err.message,
    stack_trace: err.stack,
    request_id: req.id,
    path: req.path,
    error_type: err.name,
    status_code: statusCode,
  }, statusCode === 500 ? 'Unhandled error' : 'Request failed');

  const message = statusCode === 500 ? 'Internal server error' : err.message;

  if (!req.path.startsWith('/api/') && req.accepts(['json', 'html']) === 'html') {
    res.status(statusCode).type('html').send(renderErrorPage(message));
    return;
  }

  res.status(statusCode).json({
    error: {
      message,
      type: err.name,
      ...(config.exposeStack && { stack: err.stack }),
    },
  });
}
