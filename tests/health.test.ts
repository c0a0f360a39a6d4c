import request from 'supertest';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { buildServer } from '../src/server';
import { StorageUnavailableError } from '../src/errors';
import { InMemoryStore } from '../src/store';

describe('health endpoints', () => {
  let app = buildServer({ storage: 'memory' });

  beforeEach(async () => {
    app = buildServer({ storage: 'memory' });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it('reports liveness and readiness', async () => {
    const health = await request(app.server).get('/healthz');
    expect(health.status).toBe(200);
    expect(health.body.code).toBe(0);
    expect(health.body.data.status).toBe('ok');
    expect(typeof health.body.data.uptime_sec).toBe('number');

    const ready = await request(app.server).get('/readyz');
    expect(ready.body.data).toEqual({ status: 'ready' });
  });

  it('maps storage outages to 503', async () => {
    const store = new InMemoryStore();
    store.listEntries = async () => {
      throw new StorageUnavailableError(new Error('connect ECONNREFUSED'));
    };
    const broken = buildServer({ store });
    await broken.ready();
    try {
      const signup = await request(broken.server)
        .post('/v1/auth/signup')
        .send({ username: 'dave', password: 'test-secret', confirm_password: 'test-secret' });
      const resp = await request(broken.server)
        .get('/v1/diary')
        .set('authorization', `Bearer ${String(signup.body.data.session_token)}`);
      expect(resp.status).toBe(503);
      expect(resp.body.code).toBe(50301);
      expect(resp.body.details).toEqual({ reason: 'connect ECONNREFUSED' });
    } finally {
      await broken.close();
    }
  });
});
