import { Router } from 'express';
import { z } from 'zod';
import type { DistrictReference } from '../reference/districts.js';

const lookupQuerySchema = z.object({
  name: z.string().trim().min(1).max(100)
});

export function createDistrictsRouter(districts: DistrictReference): Router {
  const router = Router();

  router.get('/v1/districts', (_req, res) => {
    const items = districts.listDistricts().map((district) => ({
      district,
      neighborhoods: districts.neighborhoodsIn(district),
      stats: districts.getStats(district)
    }));
    return res.json({ districts: items });
  });

  router.get('/v1/districts/lookup', (req, res) => {
    const parsed = lookupQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ error: 'VALIDATION_ERROR', details: z.flattenError(parsed.error) });
    }

    const name = parsed.data.name;
    const district = districts.resolveDistrict(name);
    if (!district) {
      return res.status(404).json({ error: 'NOT_FOUND', message: `Unknown Prague neighborhood: ${name}` });
    }

    return res.json({
      neighborhood: name,
      district,
      stats: districts.getStats(district),
      neighborhoods: districts.neighborhoodsIn(district)
    });
  });

  return router;
}
