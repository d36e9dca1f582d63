import { afterEach, describe, expect, it } from 'vitest';
import request from 'supertest';

import { createApp } from '../src/app.js';

const app = createApp();

describe('POST /api/search', () => {
  afterEach(() => {
    delete process.env.DEFAULT_RADIUS_MILES;
  });

  it('returns ranked stores for a valid request', async () => {
    const res = await request(app)
      .post('/api/search')
      .send({ query: 'eggs, milk', lat: 40, lng: -74, radiusMiles: 5 });

    expect(res.status).toBe(200);
    expect(res.body.query).toBe('eggs, milk');
    expect(res.body.mode).toBe('live');
    expect(res.body.totalStores).toBe(3);
    expect(res.body.stores).toHaveLength(3);
    expect(res.body.stores[0]).toEqual({
      storeId: 'walmart-40010-73988',
      storeName: 'Walmart Supercenter',
      distanceMiles: 0.94,
      lat: 40.01,
      lng: -73.988,
      totalPrice: 10.03,
      items: [
        { name: 'eggs', price: 4.99, quantity: 1 },
        { name: 'milk', price: 5.04, quantity: 1 }
      ]
    });
  });

  it('applies the default radius when radiusMiles is omitted', async () => {
    const res = await request(app).post('/api/search').send({ query: 'eggs', lat: 40, lng: -74 });

    expect(res.status).toBe(200);
    expect(res.body.totalStores).toBe(3);
  });

  it('reads the default radius from DEFAULT_RADIUS_MILES', async () => {
    process.env.DEFAULT_RADIUS_MILES = '0.7';

    const res = await request(app).post('/api/search').send({ query: 'eggs', lat: 40, lng: -74 });

    expect(res.status).toBe(200);
    expect(res.body.totalStores).toBe(1);
    expect(res.body.stores[0].storeId).toBe('kroger-40006-74010');
  });

  it('accepts long shopping lists', async () => {
    const names = Array.from({ length: 400 }, (_, i) => `item${i}`);
    const query = names.join(', ');
    expect(query.length).toBeGreaterThan(2000);

    const res = await request(app).post('/api/search').send({ query, lat: 40, lng: -74 });

    expect(res.status).toBe(200);
    expect(res.body.totalStores).toBe(3);
    expect(res.body.stores[0].items).toHaveLength(400);
    expect(res.body.stores[0].items[399].name).toBe('item399');
  });

  it('treats a null radius as no filter', async () => {
    const res = await request(app)
      .post('/api/search')
      .send({ query: 'eggs', lat: 40, lng: -74, radiusMiles: null });

    expect(res.status).toBe(200);
    expect(res.body.totalStores).toBe(3);
  });

  it('returns an empty list when every store is out of range', async () => {
    const res = await request(app)
      .post('/api/search')
      .send({ query: 'eggs, milk', lat: 40, lng: -74, radiusMiles: 0.001 });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ query: 'eggs, milk', mode: 'live', totalStores: 0, stores: [] });
  });

  it('returns 400 when the query has no items', async () => {
    const res = await request(app).post('/api/search').send({ query: ' , ,', lat: 40, lng: -74 });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      error: 'VALIDATION_ERROR',
      message: 'Please provide at least one item in the query.'
    });
  });

  it('returns 400 on invalid body', async () => {
    const res = await request(app).post('/api/search').send({ query: 'eggs', lat: 'north' });

    expect(res.status).toBe(400);
    expect(res.body?.error).toBe('VALIDATION_ERROR');
    expect(Object.keys(res.body.details.fieldErrors).sort()).toEqual(['lat', 'lng']);
  });

  it('returns 400 on malformed JSON', async () => {
    const res = await request(app)
      .post('/api/search')
      .set('Content-Type', 'application/json')
      .send('{"query": "eggs"');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'INVALID_JSON' });
  });

  it('returns 413 when the body is too large', async () => {
    const res = await request(app)
      .post('/api/search')
      .send({ query: 'a'.repeat(120_000), lat: 40, lng: -74 });

    expect(res.status).toBe(413);
    expect(res.body).toEqual({ error: 'PAYLOAD_TOO_LARGE', message: 'request entity too large' });
  });

  it('returns 415 for a non-UTF JSON charset', async () => {
    const res = await request(app)
      .post('/api/search')
      .set('Content-Type', 'application/json; charset=latin1')
      .send('{"query": "eggs", "lat": 40, "lng": -74}');

    expect(res.status).toBe(415);
    expect(res.body.error).toBe('UNSUPPORTED_MEDIA_TYPE');
  });

  it('echoes the caller request id', async () => {
    const res = await request(app)
      .post('/api/search')
      .set('x-request-id', 'req-123')
      .send({ query: 'eggs', lat: 40, lng: -74 });

    expect(res.headers['x-request-id']).toBe('req-123');
  });
});
