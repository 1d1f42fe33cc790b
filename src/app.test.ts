import request from 'supertest';
import type { Application } from 'express';
import { beforeEach, describe, expect, test, vi } from 'vitest';
import { createApp, type AppOptions } from './app';
import { TokenManager } from './security/tokenManager';
import { MemoryKeyValueStore } from './utils/memoryKeyValueStore';
import { tamperSignature, unsignedToken } from './testUtils';

const OPTIONS: AppOptions = {
  accessTokenTtlSeconds: 3600,
  statefulTokenTtlSeconds: 900,
  storeTimeoutMs: 1000,
  rateLimit: { windowMs: 60_000, maxRequests: 1000 },
  corsOrigins: ['https://app.example.com'],
};

/** JSON log lines written through a mocked console method */
function loggedEntries(spy: { mock: { calls: unknown[][] } }): Record<string, unknown>[] {
  const entries: Record<string, unknown>[] = [];
  for (const [line] of spy.mock.calls) {
    try {
      entries.push(JSON.parse(String(line)) as Record<string, unknown>);
    } catch {
      // not one of ours
    }
  }
  return entries;
}

describe('token service HTTP API', () => {
  let kv: MemoryKeyValueStore;
  let manager: TokenManager;
  let app: Application;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});

    kv = new MemoryKeyValueStore();
    manager = new TokenManager(kv, { privateKey: 'test-secret' });
    app = createApp(manager, OPTIONS);
  });

  test('GET /health', async () => {
    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('healthy');
    expect(res.body.service).toBe('token-lifecycle-service');
  });

  describe('access tokens', () => {
    test('issues a token that verifies', async () => {
      const issued = await request(app).post('/api/tokens/access').send({ subject: 'u2' });

      expect(issued.status).toBe(201);
      expect(issued.body.expiresIn).toBe(3600);

      const verified = await request(app).post('/api/tokens/access/verify').send({ token: issued.body.token });
      expect(verified.status).toBe(200);
      expect(verified.body).toEqual({ success: true, valid: true });
    });

    test('reports a tampered token as invalid', async () => {
      const issued = await request(app).post('/api/tokens/access').send({ subject: 'u2' });

      const verified = await request(app)
        .post('/api/tokens/access/verify')
        .send({ token: tamperSignature(issued.body.token) });

      expect(verified.body).toEqual({ success: true, valid: false, error: 'invalid_token' });
    });

    test('logs a forged algorithm as a critical event', async () => {
      const token = unsignedToken({ sub: 'u2', createdAt: 1, tokenType: 'access_token' });

      const verified = await request(app).post('/api/tokens/access/verify').send({ token });

      expect(verified.body).toEqual({ success: true, valid: false, error: 'invalid_token' });
      const critical = loggedEntries(vi.mocked(console.error)).find((entry) => entry.level === 'CRITICAL');
      expect(critical?.type).toBe('signing_method_mismatch');
      expect(critical?.algorithm).toBe('none');
    });

    test('rejects requests without a subject or with a bad TTL', async () => {
      expect((await request(app).post('/api/tokens/access').send({})).status).toBe(400);
      expect((await request(app).post('/api/tokens/access').send({ subject: 'u2', ttlSeconds: -5 })).status).toBe(400);
      expect((await request(app).post('/api/tokens/access').send({ subject: 'u2', ttlSeconds: '60' })).status).toBe(400);
    });

    test('GET /api/me requires a valid bearer access token', async () => {
      const issued = await request(app).post('/api/tokens/access').send({ subject: 'u2', ttlSeconds: 60 });

      const me = await request(app).get('/api/me').set('Authorization', `Bearer ${issued.body.token}`);
      expect(me.status).toBe(200);
      expect(me.body).toEqual({ success: true, subject: 'u2', tokenType: 'access_token' });

      const missing = await request(app).get('/api/me');
      expect(missing.status).toBe(401);
      expect(missing.body.error).toBe('missing_token');

      const refresh = await request(app).post('/api/tokens/refresh-token').send({ subject: 'u2' });
      const wrong = await request(app).get('/api/me').set('Authorization', `Bearer ${refresh.body.token}`);
      expect(wrong.status).toBe(401);
      expect(wrong.body.error).toBe('invalid_token');
    });
  });

  describe('stateful tokens', () => {
    test('verify-email token: decode, wrong type, revoke', async () => {
      const issued = await request(app).post('/api/tokens/verify-email').send({ subject: 'u1', ttlSeconds: 5 });
      expect(issued.status).toBe(201);
      expect(issued.body.token).toMatch(/^[0-9a-f]{64}$/);
      expect(issued.body.expiresIn).toBe(5);

      const token = issued.body.token;

      const decoded = await request(app).post('/api/tokens/verify-email/decode').send({ token });
      expect(decoded.status).toBe(200);
      expect(decoded.body.claims).toMatchObject({ subject: 'u1', tokenType: 'verify_email' });

      const wrongType = await request(app).post('/api/tokens/reset-password/decode').send({ token });
      expect(wrongType.status).toBe(401);
      expect(wrongType.body).toEqual({ success: false, error: 'invalid_token_type' });

      const revoked = await request(app).delete(`/api/tokens/${token}`);
      expect(revoked.status).toBe(204);

      const afterRevoke = await request(app).post('/api/tokens/verify-email/decode').send({ token });
      expect(afterRevoke.status).toBe(401);
      expect(afterRevoke.body).toEqual({ success: false, error: 'invalid_token' });
    });

    test('consume works once', async () => {
      const issued = await request(app).post('/api/tokens/reset-password').send({ subject: 'u1' });
      expect(issued.body.expiresIn).toBe(900);

      const first = await request(app).post('/api/tokens/reset-password/consume').send({ token: issued.body.token });
      expect(first.status).toBe(200);
      expect(first.body.claims.subject).toBe('u1');

      const second = await request(app).post('/api/tokens/reset-password/consume').send({ token: issued.body.token });
      expect(second.status).toBe(401);
    });

    test('revoking an unknown token succeeds', async () => {
      expect((await request(app).delete('/api/tokens/never-issued')).status).toBe(204);
    });

    test('unknown token types are 404', async () => {
      const res = await request(app).post('/api/tokens/session').send({ subject: 'u1' });

      expect(res.status).toBe(404);
      expect(res.body.error).toBe('unknown_token_type');
    });

    test('store failures are 503', async () => {
      vi.spyOn(kv, 'get').mockRejectedValue(new Error('ECONNREFUSED'));

      const res = await request(app).post('/api/tokens/verify-email/decode').send({ token: 'abc' });

      expect(res.status).toBe(503);
      expect(res.body).toEqual({ success: false, error: 'store_unavailable' });
    });
  });
});
