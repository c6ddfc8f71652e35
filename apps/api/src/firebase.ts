import fs from 'node:fs';
import admin from 'firebase-admin';
import { z } from 'zod';
import { getEnv } from './env.js';
import { ValidationError } from './errors.js';

// Google's key files use snake_case; firebase-admin accepts either form.
const serviceAccountSchema = z.object({
  project_id: z.string().min(1),
  client_email: z.string().min(1),
  private_key: z.string().min(1)
});

let app: admin.app.App | undefined;

function parseServiceAccount(json: string, source: string): admin.ServiceAccount {
  const parsed = serviceAccountSchema.safeParse(JSON.parse(json));
  if (!parsed.success) throw ValidationError.fromZod(`service account (${source})`, parsed.error);
  return {
    projectId: parsed.data.project_id,
    clientEmail: parsed.data.client_email,
    privateKey: parsed.data.private_key
  };
}

function initFirebaseApp(): admin.app.App {
  if (app) return app;

  const env = getEnv();

  if (env.FIREBASE_SERVICE_ACCOUNT_JSON) {
    app = admin.initializeApp({
      credential: admin.credential.cert(parseServiceAccount(env.FIREBASE_SERVICE_ACCOUNT_JSON, 'FIREBASE_SERVICE_ACCOUNT_JSON'))
    });
    return app;
  }

  if (env.FIREBASE_SERVICE_ACCOUNT_PATH) {
    const json = fs.readFileSync(env.FIREBASE_SERVICE_ACCOUNT_PATH, { encoding: 'utf8' });
    app = admin.initializeApp({
      credential: admin.credential.cert(parseServiceAccount(json, env.FIREBASE_SERVICE_ACCOUNT_PATH))
    });
    return app;
  }

  // Application default credentials (GOOGLE_APPLICATION_CREDENTIALS, emulator, GCP runtime).
  app = admin.initializeApp({
    credential: admin.credential.applicationDefault(),
    projectId: env.FIREBASE_PROJECT_ID
  });
  return app;
}

export function getFirestore(): admin.firestore.Firestore {
  initFirebaseApp();
  return admin.firestore();
}
