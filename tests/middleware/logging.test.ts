import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createLoggingMiddleware } from '../../src/middleware/logging.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import type { Handler, HandlerContext } from '../../src/middleware/pipeline.js';

const anonymous: HandlerContext = { clientAddress: null };
const addressed: HandlerContext = { clientAddress: '10.0.0.7' };

function respondWith(status: number): Handler {
  return async () => new Response(null, { status });
}

describe('logging middleware', () => {
  let logProvider: ConsoleLogProvider;
  let logging: ReturnType<typeof createLoggingMiddleware>;

  beforeEach(() => {
    logProvider = new ConsoleLogProvider();
    logging = createLoggingMiddleware(logProvider);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should record one event per request', async () => {
    vi.spyOn(performance, 'now').mockReturnValueOnce(1000).mockReturnValueOnce(1012.4);

    await logging(respondWith(200))(new Request('https://example.com/api/v1/faq?q=x'), anonymous);

    expect(logProvider.events).toEqual([
      {
        level: 'info',
        message: 'GET /api/v1/faq → 200 (12ms)',
        method: 'GET',
        path: '/api/v1/faq',
        status: 200,
        durationMs: 12,
        timestamp: expect.any(String),
      },
    ]);
  });

  it('should return the handler response untouched', async () => {
    const handler: Handler = async () =>
      new Response('{"ok":true}', { status: 201, headers: { 'X-Custom': 'yes' } });

    const res = await logging(handler)(
      new Request('https://example.com/api/v1/admin/filter-rules', { method: 'POST' }),
      anonymous
    );

    expect(res.status).toBe(201);
    expect(res.headers.get('X-Custom')).toBe('yes');
    expect(await res.text()).toBe('{"ok":true}');
  });

  it('should include the client address when known', async () => {
    await logging(respondWith(200))(new Request('https://example.com/api/v1/chat'), addressed);

    expect(logProvider.events[0]).toMatchObject({ clientAddress: '10.0.0.7' });
  });

  it('should leave the client address out when unknown', async () => {
    await logging(respondWith(200))(new Request('https://example.com/api/v1/chat'), anonymous);

    expect(logProvider.events[0]).not.toHaveProperty('clientAddress');
  });

  it.each([
    [204, 'info'],
    [404, 'warn'],
    [429, 'warn'],
    [502, 'error'],
  ] as const)('should log status %i at %s', async (status, level) => {
    await logging(respondWith(status))(new Request('https://example.com/api/v1/chat'), anonymous);

    expect(logProvider.events[0]).toMatchObject({ level, status });
  });

  it('should log a thrown error as a 500 and re-throw it', async () => {
    const handler: Handler = async () => {
      throw new Error('boom');
    };

    await expect(
      logging(handler)(new Request('https://example.com/api/v1/chat', { method: 'POST' }), addressed)
    ).rejects.toThrow('boom');

    expect(logProvider.events).toHaveLength(1);
    expect(logProvider.events[0]).toMatchObject({
      level: 'error',
      method: 'POST',
      path: '/api/v1/chat',
      status: 500,
      fields: { error: 'boom' },
      clientAddress: '10.0.0.7',
    });
  });
});
