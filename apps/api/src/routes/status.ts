import { Router } from 'express';
import { getEnv } from '../env.js';
import { getFirestore, hasServiceAccount, isFirebaseConfigured } from '../firebase.js';

const router = Router();

const MAX_LISTED_COLLECTIONS = 10;

export interface DatastoreStatus {
  backend: string;
  database: string;
  database_url: string;
  database_name: string;
  connection_status: 'Connected' | 'Not Connected';
  collections: string[];
}

function shortMessage(err: unknown): string {
  const message = err instanceof Error ? err.message : String(err);
  return message.slice(0, 50);
}

router.get('/', (_req, res) => res.json({ message: 'CheapStop backend running' }));

router.get('/health', (_req, res) => res.json({ ok: true }));

// Datastore diagnostic. Nothing in the search pipeline depends on it.
router.get('/test', async (_req, res) => {
  const env = getEnv();

  const status: DatastoreStatus = {
    backend: 'Running',
    database: 'Not Available',
    database_url: hasServiceAccount(env) ? 'Set' : 'Not Set',
    database_name: env.FIREBASE_PROJECT_ID ? 'Set' : 'Not Set',
    connection_status: 'Not Connected',
    collections: []
  };

  if (!isFirebaseConfigured(env)) {
    return res.json(status);
  }

  let db: ReturnType<typeof getFirestore>;
  try {
    db = getFirestore();
  } catch (err) {
    status.database = `Error: ${shortMessage(err)}`;
    return res.json(status);
  }

  status.database = 'Available';
  status.connection_status = 'Connected';

  try {
    const collections = await db.listCollections();
    status.collections = collections.slice(0, MAX_LISTED_COLLECTIONS).map((c) => c.id);
    status.database = 'Connected & Working';
  } catch (err) {
    status.database = `Connected but Error: ${shortMessage(err)}`;
  }

  return res.json(status);
});

export default router;
