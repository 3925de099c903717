import { Router } from 'express';
import type { TaskProvider } from '@tasklist/core';
import { z } from 'zod';
import { sendError } from './errors.js';

const typeQuerySchema = z.object({
  uri: z.string().min(1),
});

export function typeRoutes(provider: TaskProvider): Router {
  const router = Router();

  // GET /api/types?uri=tasks/3 - Content type of a resource uri
  router.get('/', (req, res) => {
    try {
      const { uri } = typeQuerySchema.parse(req.query);
      res.json({ uri, type: provider.getType(uri) });
    } catch (error) {
      sendError(res, error, 'Failed to resolve type');
    }
  });

  return router;
}
