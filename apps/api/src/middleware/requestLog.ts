import { randomUUID } from 'node:crypto';
import type { RequestHandler } from 'express';

function getOrCreateRequestId(header: string | undefined): string {
  const incoming = header?.trim();
  return incoming ? incoming : randomUUID();
}

export const requestLog: RequestHandler = (req, res, next) => {
  const requestId = getOrCreateRequestId(req.header('x-request-id'));
  res.locals.requestId = requestId;
  res.setHeader('x-request-id', requestId);

  const start = Date.now();

  res.on('finish', () => {
    // eslint-disable-next-line no-console
    console.log(
      JSON.stringify({
        level: 'info',
        ts: new Date().toISOString(),
        request_id: requestId,
        method: req.method,
        route: typeof req.route?.path === 'string' ? req.route.path : req.path,
        status: res.statusCode,
        latency_ms: Date.now() - start
      })
    );
  });

  next();
};
