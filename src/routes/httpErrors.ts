import { Response } from 'express';
import { TailspotterError } from '../utils/errorHandler';
import { logger } from '../utils/logger';

/**
 * Sends a JSON error. Taxonomy errors keep their status code; anything else
 * is logged and reported as a 500.
 */
export function sendError(res: Response, error: unknown, context: string): Response {
  if (error instanceof TailspotterError) {
    if (error.statusCode >= 500) {
      logger.error(`${context}: ${error.message}`);
    }
    return res.status(error.statusCode).json({ error: error.message, code: error.code });
  }
  logger.error(`${context}:`, error);
  return res.status(500).json({ error: 'Internal server error' });
}

export function queryString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
}

export function optionalNumber(value: unknown): number | undefined | null {
  if (value === undefined || value === null || value === '') return undefined;
  const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN;
  return Number.isFinite(parsed) ? parsed : null;
}
