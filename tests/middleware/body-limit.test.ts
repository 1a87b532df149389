import { describe, it, expect } from 'vitest';
import { bodyLimit, MAX_BODY_BYTES } from '../../src/middleware/body-limit.js';
import { errorHandler } from '../../src/middleware/error-handler.js';
import type { Handler, HandlerContext } from '../../src/middleware/pipeline.js';

describe('bodyLimit', () => {
  const ctx: HandlerContext = { clientAddress: null };

  const echoHandler: Handler = async (req) => new Response(await req.text(), { status: 200 });

  function post(body: string, headers: Record<string, string> = {}): Request {
    return new Request('http://test/api/v1/chat', { method: 'POST', body, headers });
  }

  it('should default to 16 KB', () => {
    expect(MAX_BODY_BYTES).toBe(16384);
  });

  it('should pass a body within the limit through intact', async () => {
    const wrapped = errorHandler(bodyLimit(64)(echoHandler));

    const res = await wrapped(post('{"message":"hi"}'), ctx);

    expect(res.status).toBe(200);
    expect(await res.text()).toBe('{"message":"hi"}');
  });

  it('should reject a declared Content-Length over the limit', async () => {
    const wrapped = errorHandler(bodyLimit(8)(echoHandler));

    const res = await wrapped(post('{}', { 'Content-Length': '100' }), ctx);

    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({
      error: {
        code: 'PAYLOAD_TOO_LARGE',
        message: 'Request body exceeds 8 bytes',
        details: { maxBytes: 8 },
      },
    });
  });

  it('should reject a body over the limit', async () => {
    const wrapped = errorHandler(bodyLimit(8)(echoHandler));

    const res = await wrapped(post('x'.repeat(9)), ctx);

    expect(res.status).toBe(413);
  });

  it('should count bytes rather than characters', async () => {
    const wrapped = errorHandler(bodyLimit(8)(echoHandler));

    // five Cyrillic letters take ten bytes
    const res = await wrapped(post('привет'.slice(0, 5)), ctx);

    expect(res.status).toBe(413);
  });

  it('should skip GET requests', async () => {
    const wrapped = errorHandler(bodyLimit(1)(echoHandler));

    const res = await wrapped(new Request('http://test/api/v1/faq?q=stipend'), ctx);

    expect(res.status).toBe(200);
  });
});
