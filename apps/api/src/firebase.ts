import admin from 'firebase-admin';
import { z } from 'zod';
import { getEnv, type Env } from './env.js';

// Firebase is only reached by the GET /test diagnostic; searches never touch it.
let app: admin.app.App | undefined;

const serviceAccountSchema = z
  .object({
    project_id: z.string().optional(),
    client_email: z.string(),
    private_key: z.string()
  })
  .transform(
    (raw): admin.ServiceAccount => ({
      projectId: raw.project_id,
      clientEmail: raw.client_email,
      privateKey: raw.private_key
    })
  );

export function hasServiceAccount(env: Env): boolean {
  return Boolean(env.FIREBASE_SERVICE_ACCOUNT_JSON || env.FIREBASE_SERVICE_ACCOUNT_PATH);
}

export function isFirebaseConfigured(env: Env): boolean {
  return hasServiceAccount(env) || Boolean(env.FIREBASE_PROJECT_ID);
}

function resolveCredential(env: Env): admin.credential.Credential {
  if (env.FIREBASE_SERVICE_ACCOUNT_JSON) {
    const parsed = serviceAccountSchema.safeParse(JSON.parse(env.FIREBASE_SERVICE_ACCOUNT_JSON));
    if (!parsed.success) {
      throw new Error(`Invalid FIREBASE_SERVICE_ACCOUNT_JSON: ${parsed.error.message}`);
    }
    return admin.credential.cert(parsed.data);
  }

  if (env.FIREBASE_SERVICE_ACCOUNT_PATH) {
    return admin.credential.cert(env.FIREBASE_SERVICE_ACCOUNT_PATH);
  }

  // ADC (e.g. GOOGLE_APPLICATION_CREDENTIALS)
  return admin.credential.applicationDefault();
}

export function getFirestore() {
  if (!app) {
    const env = getEnv();
    app = admin.initializeApp({
      credential: resolveCredential(env),
      projectId: env.FIREBASE_PROJECT_ID
    });
  }
  return admin.firestore(app);
}
