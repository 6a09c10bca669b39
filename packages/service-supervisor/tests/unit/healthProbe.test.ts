import { after, before, beforeEach, describe, test } from 'node:test';
import assert from 'node:assert';
import { HealthProbe, parseHealth, parseStats } from '../../src/services/HealthProbe.js';
import { HealthTimeout } from '../../src/errors.js';
import { FakeBackend } from '../fixtures/fakeBackend.js';

describe('HealthProbe', () => {
  const backend = new FakeBackend();
  let baseUrl = '';

  before(async () => {
    baseUrl = await backend.start();
  });

  after(async () => {
    await backend.close();
  });

  beforeEach(() => {
    backend.healthMode = 'ok';
    backend.statsStatus = 200;
    backend.statsBody = { items: { total: 42 } };
    backend.healthRequests = 0;
  });

  describe('checkOnce', () => {
    test('should return the parsed health body on 200', async () => {
      const probe = new HealthProbe({ baseUrl });

      const health = await probe.checkOnce();

      assert.deepStrictEqual(health, { status: 'ok', version: '1.2.3' });
    });

    test('should return null on a non-2xx status', async () => {
      backend.healthMode = 'error';
      const probe = new HealthProbe({ baseUrl });

      assert.strictEqual(await probe.checkOnce(), null);
    });

    test('should return null when the body is not JSON', async () => {
      backend.healthMode = 'malformed';
      const probe = new HealthProbe({ baseUrl });

      assert.strictEqual(await probe.checkOnce(), null);
    });

    test('should return null when the body lacks a version', async () => {
      backend.healthMode = 'incomplete';
      const probe = new HealthProbe({ baseUrl });

      assert.strictEqual(await probe.checkOnce(), null);
    });

    test('should return null after the timeout when the backend never answers', async () => {
      backend.healthMode = 'hang';
      const probe = new HealthProbe({ baseUrl, timeoutMs: 100 });

      const startedAt = Date.now();
      const health = await probe.checkOnce();

      assert.strictEqual(health, null);
      assert.ok(Date.now() - startedAt < 1000, 'probe should give up near its timeout');
    });

    test('should return null when nothing listens on the port', async () => {
      const closed = new FakeBackend();
      const closedUrl = await closed.start();
      await closed.close();

      const probe = new HealthProbe({ baseUrl: closedUrl });

      assert.strictEqual(await probe.checkOnce(), null);
    });

    test('should honor a custom health path', async () => {
      const probe = new HealthProbe({ baseUrl, healthPath: '/v2/stats' });

      // The stats body has no status field
      assert.strictEqual(await probe.checkOnce(), null);
      assert.strictEqual(probe.url, `${baseUrl}/v2/stats`);
    });
  });

  describe('waitUntilHealthy', () => {
    test('should resolve once the backend turns healthy', async () => {
      backend.healthMode = 'error';
      const probe = new HealthProbe({ baseUrl, pollIntervalMs: 25 });
      const flip = setTimeout(() => {
        backend.healthMode = 'ok';
      }, 200);

      try {
        const health = await probe.waitUntilHealthy(3000);

        assert.deepStrictEqual(health, { status: 'ok', version: '1.2.3' });
        assert.ok(backend.healthRequests >= 2, 'should have polled more than once');
      } finally {
        clearTimeout(flip);
      }
    });

    test('should throw HealthTimeout when the deadline passes', async () => {
      backend.healthMode = 'error';
      const probe = new HealthProbe({ baseUrl, pollIntervalMs: 25 });

      await assert.rejects(
        probe.waitUntilHealthy(400),
        (error: unknown) =>
          error instanceof HealthTimeout &&
          error.code === 'HEALTH_TIMEOUT' &&
          error.elapsedMs >= 400
      );
    });

    test('should bound a hanging probe by the remaining deadline', async () => {
      backend.healthMode = 'hang';
      const probe = new HealthProbe({ baseUrl, timeoutMs: 2000, pollIntervalMs: 25 });

      const startedAt = Date.now();
      await assert.rejects(probe.waitUntilHealthy(300), HealthTimeout);

      assert.ok(Date.now() - startedAt < 1500, 'deadline should cut the probe short');
    });
  });

  describe('fetchStats', () => {
    test('should return the item total', async () => {
      const probe = new HealthProbe({ baseUrl });

      assert.deepStrictEqual(await probe.fetchStats(), { total: 42 });
    });

    test('should treat a zero total as data', async () => {
      backend.statsBody = { items: { total: 0 } };
      const probe = new HealthProbe({ baseUrl });

      assert.deepStrictEqual(await probe.fetchStats(), { total: 0 });
    });

    test('should return null when the total is missing', async () => {
      backend.statsBody = { items: {} };
      const probe = new HealthProbe({ baseUrl });

      assert.strictEqual(await probe.fetchStats(), null);
    });

    test('should return null on a server error', async () => {
      backend.statsStatus = 500;
      backend.statsBody = { error: 'internal' };
      const probe = new HealthProbe({ baseUrl });

      assert.strictEqual(await probe.fetchStats(), null);
    });
  });
});

describe('parseHealth', () => {
  test('should accept extra fields', () => {
    assert.deepStrictEqual(
      parseHealth({ status: 'degraded', version: '0.9.0', uptime: 12 }),
      { status: 'degraded', version: '0.9.0' }
    );
  });

  test('should reject non-object bodies', () => {
    assert.strictEqual(parseHealth(null), null);
    assert.strictEqual(parseHealth('ok'), null);
    assert.strictEqual(parseHealth([{ status: 'ok', version: '1' }]), null);
  });

  test('should reject a numeric version', () => {
    assert.strictEqual(parseHealth({ status: 'ok', version: 2 }), null);
  });
});

describe('parseStats', () => {
  test('should reject negative and fractional totals', () => {
    assert.strictEqual(parseStats({ items: { total: -1 } }), null);
    assert.strictEqual(parseStats({ items: { total: 1.5 } }), null);
  });

  test('should reject a string total', () => {
    assert.strictEqual(parseStats({ items: { total: '12' } }), null);
  });
});
