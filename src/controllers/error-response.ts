import { Response } from 'express';
import { SpoilageError } from '@/utils/errors';
import { logger } from '@/utils/logger';

export const sendError = (res: Response, error: unknown, context: string): void => {
  if (error instanceof SpoilageError) {
    res.status(error.statusCode).json({
      success: false,
      error: { code: error.code, message: error.message }
    });
    return;
  }

  logger.error(`${context}:`, { error: error instanceof Error ? error.message : 'Unknown error' });
  res.status(500).json({
    success: false,
    error: { code: 'SERVER_ERROR', message: 'Server error' }
  });
};
