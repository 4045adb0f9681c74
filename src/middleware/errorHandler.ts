import { Request, Response, NextFunction } from 'express';
import { SpoilageError } from '@/utils/errors';
import { logger } from '@/utils/logger';

interface IError extends Error {
  statusCode?: number;
  status?: number;
  code?: string;
  type?: string; // set by body-parser
}

export const errorHandler = (err: IError, req: Request, res: Response, _next: NextFunction) => {
  let statusCode = 500;
  let code = 'SERVER_ERROR';
  let message = 'Server Error';

  if (err instanceof SpoilageError) {
    statusCode = err.statusCode;
    code = err.code;
    message = err.message;
  } else if (err.type === 'entity.parse.failed') {
    statusCode = 400;
    code = 'INVALID_JSON';
    message = 'Request body is not valid JSON';
  } else if (err.type === 'entity.too.large') {
    statusCode = 413;
    code = 'PAYLOAD_TOO_LARGE';
    message = 'Request body too large';
  } else {
    logger.error(`Unhandled error on ${req.method} ${req.originalUrl}: ${err.message}`);
  }

  res.status(statusCode).json({
    success: false,
    error: { code, message },
  });
};
