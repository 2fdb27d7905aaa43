import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { setupTestContext, type TestContext } from '../test-setup.js';

describe('Rate limiting', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-03-02T08:00:00.000Z'));
    ctx = await setupTestContext({ rateLimit: { windowMs: 60000, maxRequests: 2 } });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function health(address: string): Promise<Response> {
    return Promise.resolve(ctx.app.request('/health', { headers: { 'X-Forwarded-For': address } }));
  }

  it('should count down the remaining requests', async () => {
    const first = await health('10.0.0.1');
    const second = await health('10.0.0.1');

    expect(first.headers.get('X-RateLimit-Limit')).toBe('2');
    expect(first.headers.get('X-RateLimit-Remaining')).toBe('1');
    expect(second.headers.get('X-RateLimit-Remaining')).toBe('0');
  });

  it('should answer 503 once the window is used up', async () => {
    await health('10.0.0.1');
    await health('10.0.0.1');

    const res = await health('10.0.0.1');

    expect(res.status).toBe(503);
    expect(res.headers.get('Retry-After')).toBe('60');
    expect(await res.json()).toEqual({
      error: 'temporarily_unavailable',
      error_description: 'Rate limit exceeded. Try again in 60 seconds.',
    });
  });

  it('should count each client address separately', async () => {
    await health('10.0.0.1');
    await health('10.0.0.1');

    const res = await health('10.0.0.2');

    expect(res.status).toBe(200);
  });

  it('should start a new window once the old one has passed', async () => {
    await health('10.0.0.1');
    await health('10.0.0.1');

    vi.setSystemTime(Date.now() + 60000);
    const res = await health('10.0.0.1');

    expect(res.status).toBe(200);
  });
});
