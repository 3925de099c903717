import type { Response } from 'express';
import { StoreError, UnsupportedResourceError } from '@tasklist/core';
import { z } from 'zod';

/** Map a failure from the provider or from request validation onto an HTTP response. */
export function sendError(res: Response, error: unknown, fallbackMessage: string): void {
  if (error instanceof z.ZodError) {
    res.status(400).json({ error: 'Validation failed', details: error.errors });
    return;
  }
  if (error instanceof UnsupportedResourceError) {
    res.status(404).json({ error: error.message });
    return;
  }
  if (error instanceof StoreError) {
    switch (error.kind) {
      case 'constraint':
        res.status(409).json({ error: 'Constraint violation', details: error.message });
        return;
      case 'statement':
        res.status(400).json({ error: 'Invalid request', details: error.message });
        return;
      case 'infrastructure':
        console.error(`${fallbackMessage}:`, error);
        res.status(500).json({ error: fallbackMessage });
        return;
    }
  }
  console.error(`${fallbackMessage}:`, error);
  res.status(500).json({ error: fallbackMessage });
}
