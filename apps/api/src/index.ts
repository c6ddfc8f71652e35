import dotenv from 'dotenv';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { createApp } from './app.js';
import { getEnv } from './env.js';
import { createOpenAiCompletionService } from './providers/completions.js';
import { loadDistrictReference } from './reference/districts.js';
import { pipelineSettingsFromEnv } from './services/pipeline.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// Repo-root .env first, then apps/api/.env (the working directory under npm scripts) overrides it.
dotenv.config({ path: path.resolve(__dirname, '../../../.env') });
dotenv.config({ override: true });

const env = getEnv();

const app = createApp({
  completions: createOpenAiCompletionService(env),
  districts: loadDistrictReference(env.DISTRICT_DATA_DIR),
  settings: pipelineSettingsFromEnv(env),
  corsOrigin: env.CORS_ORIGIN
});

app.listen(env.PORT, () => {
  // eslint-disable-next-line no-console
  console.log(`API listening on http://localhost:${env.PORT} (model ${env.LLM_MODEL})`);
});
