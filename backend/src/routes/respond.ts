import type { Response } from 'express';
import { ContractViolationError, UpstreamError } from '../utils/contracts.js';

export const respondWithError = (res: Response, error: unknown, tag: string) => {
  if (error instanceof ContractViolationError) {
    return res.status(error.statusCode).json({ error: error.message, details: error.details });
  }
  if (error instanceof UpstreamError) {
    console.error(`[${tag}] Upstream failure:`, error.message);
    return res.status(error.statusCode).json({ error: error.message });
  }
  console.error(`[${tag}] API Error:`, error);
  return res.status(500).json({ error: 'Internal server error' });
};

export const parseFormat = <F extends string>(value: unknown, allowed: readonly F[], fallback: F): F => {
  if (value === undefined) {
    return fallback;
  }
  const match = allowed.find((format) => format === value);
  if (!match) {
    throw new ContractViolationError('Unsupported format', `Use one of: ${allowed.join(', ')}.`);
  }
  return match;
};

export const parseBooleanFlag = (value: unknown): boolean => value === 'true' || value === '1';
