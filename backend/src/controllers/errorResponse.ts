import type { Response } from 'express';
import { SessionError } from '../errors/session.errors';
import type { ErrorResponse } from '../types/api.types';

export const sendError = (res: Response, error: unknown, failureMessage: string): void => {
  if (error instanceof SessionError) {
    const body: ErrorResponse = { error: error.code, message: error.message };
    res.status(error.status).json(body);
    return;
  }

  console.error(`${failureMessage}:`, error);
  const body: ErrorResponse = { error: 'INTERNAL_SERVER_ERROR', message: failureMessage };
  res.status(500).json(body);
};
