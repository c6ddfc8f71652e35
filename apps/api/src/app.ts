import express from 'express';
import cors from 'cors';
import { errorMessage } from './errors.js';
import { getFirestore } from './firebase.js';
import { createChecksRouter } from './routes/checks.js';
import { createDistrictsRouter } from './routes/districts.js';
import type { PipelineDeps } from './services/pipeline.js';

export interface AppDeps extends PipelineDeps {
  // Comma-separated allow-list; empty allows every origin.
  corsOrigin?: string;
}

export function createApp(deps: AppDeps) {
  const normalizeOrigin = (value: string) => value.trim().replace(/\/+$/, '');
  const allowedOrigins = (deps.corsOrigin ? deps.corsOrigin.split(',') : [])
    .map((o) => o.trim())
    .filter(Boolean)
    .map(normalizeOrigin);

  const app = express();
  app.use(express.json({ limit: '2mb' }));

  app.use(
    cors({
      origin: (origin, callback) => {
        // Scrapers and health checks send no Origin.
        if (!origin) return callback(null, true);
        if (allowedOrigins.length === 0) return callback(null, true);
        return callback(null, allowedOrigins.includes(normalizeOrigin(origin)));
      }
    })
  );

  app.get('/health', (_req, res) => res.json({ ok: true }));

  app.get('/health/firestore', async (_req, res) => {
    try {
      await getFirestore().doc('_health/ping').get();
      return res.json({ ok: true });
    } catch (err) {
      return res.status(500).json({ ok: false, error: 'FIRESTORE_UNAVAILABLE', message: errorMessage(err) });
    }
  });

  const { completions, districts, settings } = deps;
  app.use(createChecksRouter({ completions, districts, settings }));
  app.use(createDistrictsRouter(districts));

  return app;
}
