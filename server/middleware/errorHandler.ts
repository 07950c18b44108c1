import type { NextFunction, Request, Response } from 'express';
import { SimulationInvariantError, SimulationLimitError } from '../../simulation/engine/errors.js';
import { HttpError } from '../types.js';

export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new HttpError(404, `Route not found: ${req.method} ${req.path}`));
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof HttpError) {
    res.status(err.status).json(err.details ? { error: err.message, details: err.details } : { error: err.message });
    return;
  }
  if (err instanceof SimulationLimitError) {
    res.status(422).json({ error: err.message });
    return;
  }
  if (err instanceof SimulationInvariantError) {
    console.error('[simulation] invariant violated:', err);
  }
  const message = err instanceof Error ? err.message : 'Unexpected server error';
  res.status(500).json({ error: message });
}
