import { ErrorRequestHandler, RequestHandler } from 'express';
import { config } from '../core/config';
import { logger } from '../utils/logger';

export const errorHandler: ErrorRequestHandler = (err, _req, res, next) => {
  logger.error('Unhandled error:', err);
  if (res.headersSent) {
    next(err);
    return;
  }
  res.status(500).json({
    ok: false,
    error: 'Internal server error',
    message: config.env === 'development' && err instanceof Error ? err.message : 'Something went wrong',
  });
};

export const notFoundHandler: RequestHandler = (req, res) => {
  res.status(404).json({ ok: false, error: `Not found: ${req.method} ${req.path}` });
};
