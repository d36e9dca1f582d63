import dotenv from 'dotenv';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { getEnv } from './env.js';
import { createApp } from './app.js';

// src/ (or dist/) sits three levels below the repo root.
const apiDir = path.dirname(fileURLToPath(import.meta.url));

// Repo-root .env first; a .env in the working directory wins.
dotenv.config({ path: path.resolve(apiDir, '../../../.env') });
dotenv.config({ override: true });

const env = getEnv();

const server = createApp().listen(env.PORT, () => {
  // eslint-disable-next-line no-console
  console.log(
    JSON.stringify({
      level: 'info',
      ts: new Date().toISOString(),
      msg: 'CheapStop API listening',
      port: env.PORT,
      default_radius_miles: env.DEFAULT_RADIUS_MILES,
      cors_origin: env.CORS_ORIGIN || '*',
      datastore: env.FIREBASE_PROJECT_ID ?? null
    })
  );
});

server.on('error', (err) => {
  console.error('[api] server failed to start', { port: env.PORT, error: err.message });
  process.exitCode = 1;
});
