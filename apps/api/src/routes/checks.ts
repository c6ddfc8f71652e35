import { Router } from 'express';
import { z } from 'zod';
import { errorMessage } from '../errors.js';
import { getLatestCheck, listRecentChecks, saveListingCheck } from '../repositories/checkRepository.js';
import { runListingCheck } from '../services/pipeline.js';
import type { PipelineDeps } from '../services/pipeline.js';
import type { Outcome } from '../types.js';
import { fail, succeed } from '../types.js';

const checkBodySchema = z.object({
  url: z.string().url().max(2000),
  // Raw scraper output; its shape is resolved by the pipeline.
  property: z.record(z.string(), z.unknown()).optional(),
  scrapeError: z.string().min(1).max(500).optional()
});

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10)
});

function scrapedOutcome(body: z.infer<typeof checkBodySchema>): Outcome<unknown> {
  if (body.scrapeError) return fail(body.scrapeError);
  if (body.property) return succeed(body.property);
  return fail('No scraped data supplied');
}

export function createChecksRouter(deps: PipelineDeps): Router {
  const router = Router();

  router.post('/v1/checks', async (req, res) => {
    const parsed = checkBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'VALIDATION_ERROR', details: z.flattenError(parsed.error) });
    }

    const report = await runListingCheck({ url: parsed.data.url, scraped: scrapedOutcome(parsed.data) }, deps);

    let persisted = true;
    try {
      await saveListingCheck(report);
    } catch (err) {
      persisted = false;
      console.error('[checks] failed to persist check', {
        listingId: report.result.listing_id,
        error: errorMessage(err)
      });
    }

    return res.json({
      listingId: report.result.listing_id,
      listing: report.listing,
      result: report.result,
      district: report.district,
      persisted
    });
  });

  router.get('/v1/checks', async (req, res) => {
    const parsed = listQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ error: 'VALIDATION_ERROR', details: z.flattenError(parsed.error) });
    }

    try {
      const checks = await listRecentChecks(parsed.data.limit);
      return res.json({ checks });
    } catch (err) {
      return res.status(500).json({ error: 'CHECKS_UNAVAILABLE', message: errorMessage(err) });
    }
  });

  router.get('/v1/checks/:listingId', async (req, res) => {
    const listingId = req.params.listingId;
    try {
      const check = await getLatestCheck(listingId);
      if (!check) return res.status(404).json({ error: 'NOT_FOUND', message: `No check stored for ${listingId}` });
      return res.json(check);
    } catch (err) {
      return res.status(500).json({ error: 'CHECKS_UNAVAILABLE', message: errorMessage(err) });
    }
  });

  return router;
}
