import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { buildApp } from './app.js';

describe('Health endpoint', () => {
  const app = buildApp({ logger: false });

  beforeAll(async () => {
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it('GET /health returns ok status', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/health',
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      ok: true,
      service: 'delivery-calc',
    });
  });

  it('does not register calculator routes without reference data', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/v1/calculator/estimate',
      payload: {},
    });

    expect(response.statusCode).toBe(404);
  });
});
