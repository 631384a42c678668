import { afterEach, describe, expect, it } from 'vitest';
import { CORRELATION_ID_HEADER } from '../../middleware/correlation';
import { FakeBroker } from '../../test-utils/fake-broker';
import { createTestApp, type TestApp } from '../../test-utils/test-app';

describe('Health and broker routes', () => {
  let ctx: TestApp | undefined;

  afterEach(async () => {
    await ctx?.cleanup();
    ctx = undefined;
  });

  it('reports healthy with mock data before any login', async () => {
    ctx = await createTestApp();

    const res = await ctx.app.request('/health');

    expect(res.status).toBe(200);
    const body = (await res.json()) as { status: string; timestamp: string; broker_status: string };
    expect(body.status).toBe('healthy');
    expect(body.broker_status).toBe('Mock Data');
    expect(Number.isNaN(Date.parse(body.timestamp))).toBe(false);
  });

  it('reports Connected after a successful manual login', async () => {
    ctx = await createTestApp(new FakeBroker({}, true));

    const login = await ctx.app.request('/api/broker/login', { method: 'POST' });
    expect(login.status).toBe(200);
    expect(await login.json()).toEqual({ broker_status: 'Connected' });
    expect(ctx.broker.loginAttempts).toBe(1);

    const health = (await (await ctx.app.request('/health')).json()) as { broker_status: string };
    expect(health.broker_status).toBe('Connected');
  });

  it('falls back to Mock Data once the session is gone', async () => {
    ctx = await createTestApp(new FakeBroker({}, true));
    await ctx.broker.login();
    await ctx.broker.logout();

    const health = (await (await ctx.app.request('/health')).json()) as { broker_status: string };
    expect(health.broker_status).toBe('Mock Data');
  });

  it('echoes the correlation id header', async () => {
    ctx = await createTestApp();

    const res = await ctx.app.request('/health', { headers: { [CORRELATION_ID_HEADER]: 'corr-health' } });

    expect(res.headers.get(CORRELATION_ID_HEADER)).toBe('corr-health');
  });
});
