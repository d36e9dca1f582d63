import { Router } from 'express';
import { z } from 'zod';
import { getEnv } from '../env.js';
import { EmptyItemListError, searchStores } from '../services/search.js';

const router = Router();

const searchBodySchema = z.object({
  query: z.string(),
  lat: z.number().finite(),
  lng: z.number().finite(),
  radiusMiles: z.number().finite().nullable().optional()
});

router.post('/api/search', (req, res) => {
  const parsed = searchBodySchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({ error: 'VALIDATION_ERROR', details: parsed.error.flatten() });
  }

  try {
    const result = searchStores(parsed.data, getEnv().DEFAULT_RADIUS_MILES);
    return res.json(result);
  } catch (err) {
    if (err instanceof EmptyItemListError) {
      return res.status(400).json({ error: 'VALIDATION_ERROR', message: err.message });
    }
    throw err;
  }
});

export default router;
