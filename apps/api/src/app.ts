import express, { type ErrorRequestHandler } from 'express';
import cors from 'cors';
import searchRouter from './routes/search.js';
import statusRouter from './routes/status.js';
import { requestLog } from './middleware/requestLog.js';
import { getEnv } from './env.js';

const CLIENT_ERROR_CODES: Partial<Record<number, string>> = {
  400: 'BAD_REQUEST',
  413: 'PAYLOAD_TOO_LARGE',
  415: 'UNSUPPORTED_MEDIA_TYPE'
};

// body-parser raises http-errors: `expose` marks messages safe to show the client.
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  if (!('expose' in err) || err.expose !== true) return undefined;

  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  if (typeof status !== 'number' || status < 400 || status > 499) return undefined;
  return status;
}

function isBodyParseError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}

const errorHandler: ErrorRequestHandler = (err, _req, res, next) => {
  if (res.headersSent) return next(err);

  if (isBodyParseError(err)) {
    return res.status(400).json({ error: 'INVALID_JSON' });
  }

  const clientStatus = clientErrorStatus(err);
  if (clientStatus !== undefined) {
    const message = err instanceof Error ? err.message : undefined;
    return res.status(clientStatus).json({ error: CLIENT_ERROR_CODES[clientStatus] ?? 'BAD_REQUEST', message });
  }

  const message = err instanceof Error ? err.message : 'Unknown error';
  console.error('[api] unhandled error', { requestId: res.locals.requestId, error: message });
  return res.status(500).json({ error: 'INTERNAL_ERROR', message });
};

export function createApp() {
  const env = getEnv();

  const normalizeOrigin = (value: string) => value.trim().replace(/\/+$/, '');
  const allowedOrigins = (env.CORS_ORIGIN ? env.CORS_ORIGIN.split(',') : [])
    .map((o) => o.trim())
    .filter(Boolean)
    .map(normalizeOrigin);

  const app = express();
  app.use(requestLog);
  app.use(express.json({ limit: '100kb' }));

  app.use(
    cors({
      origin: (origin, callback) => {
        // Non-browser requests (curl/health checks) may omit Origin.
        if (!origin) return callback(null, true);

        // If not configured, allow all origins.
        if (allowedOrigins.length === 0) return callback(null, true);

        const normalized = normalizeOrigin(origin);
        return callback(null, allowedOrigins.includes(normalized));
      }
    })
  );

  app.use(statusRouter);
  app.use(searchRouter);

  app.use(errorHandler);

  return app;
}
