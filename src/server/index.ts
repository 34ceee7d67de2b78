import { randomUUID } from 'crypto';
import express, { type ErrorRequestHandler, type Express, type RequestHandler } from 'express';
import { createExtractHandler } from '../handlers/extract.js';
import type { MetadataService } from '../services/metadata.js';
import type { ErrorResponse } from '../types/index.js';
import { toAppError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const requestLogger: RequestHandler = (req, res, next) => {
  const requestId = randomUUID();
  const started = Date.now();
  res.locals.requestId = requestId;
  res.setHeader('X-Request-Id', requestId);

  res.on('finish', () => {
    logger.info('Request completed', {
      requestId,
      method: req.method,
      path: req.path,
      status: res.statusCode,
      ms: Date.now() - started,
    });
  });
  next();
};

const notFound: RequestHandler = (_req, res: express.Response<ErrorResponse>) => {
  res.status(404).json({ detail: 'Not Found' });
};

const errorHandler: ErrorRequestHandler = (error: unknown, req, res: express.Response<ErrorResponse>, _next) => {
  const appError = toAppError(error);
  const context = { requestId: res.locals.requestId, method: req.method, path: req.path, status: appError.statusCode };

  if (appError.statusCode >= 500) {
    logger.error('Request failed', appError, context);
  } else {
    logger.warn(`Request rejected: ${appError.message}`, context);
  }

  res.status(appError.statusCode).json({
    detail: appError.expose ? appError.message : 'Internal server error',
  });
};

export function createApp(service: MetadataService): Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(requestLogger);

  app.get('/', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.get('/extract/', createExtractHandler(service));

  app.use(notFound);
  app.use(errorHandler);
  return app;
}
