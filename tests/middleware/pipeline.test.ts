import { describe, it, expect } from 'vitest';
import { pipeline } from '../../src/middleware/pipeline.js';
import type { Handler, HandlerContext, Middleware } from '../../src/middleware/pipeline.js';

describe('pipeline', () => {
  const ctx: HandlerContext = { clientAddress: null };
  const req = new Request('http://test/api/v1/faq');

  /** Middleware that records when it runs around the rest of the chain. */
  function tracer(name: string, trace: string[]): Middleware {
    return (next) => async (r, c) => {
      trace.push(`${name}:in`);
      const res = await next(r, c);
      trace.push(`${name}:out`);
      return res;
    };
  }

  it('should return the bare handler when given no middleware', async () => {
    const handler: Handler = async () => new Response('plain', { status: 202 });

    const res = await pipeline()(handler)(req, ctx);

    expect(res.status).toBe(202);
    expect(await res.text()).toBe('plain');
  });

  it('should run the first middleware outermost', async () => {
    const trace: string[] = [];
    const handler: Handler = async () => {
      trace.push('handler');
      return new Response(null, { status: 204 });
    };

    await pipeline(tracer('logging', trace), tracer('auth', trace))(handler)(req, ctx);

    expect(trace).toEqual(['logging:in', 'auth:in', 'handler', 'auth:out', 'logging:out']);
  });

  it('should let a middleware answer without calling the rest', async () => {
    const trace: string[] = [];
    const refuse: Middleware = () => async () => new Response('refused', { status: 401 });
    const handler: Handler = async () => {
      trace.push('handler');
      return new Response('ok');
    };

    const res = await pipeline(tracer('outer', trace), refuse)(handler)(req, ctx);

    expect(res.status).toBe(401);
    expect(trace).toEqual(['outer:in', 'outer:out']);
  });

  it('should hand a replaced context to everything below', async () => {
    const forwarded: Middleware = (next) => async (r, c) => next(r, { ...c, clientAddress: '10.0.0.9' });
    const handler: Handler = async (_r, c) => new Response(JSON.stringify(c));

    const res = await pipeline(forwarded)(handler)(req, { clientAddress: '10.0.0.1' });

    expect(await res.json()).toEqual({ clientAddress: '10.0.0.9' });
  });
});
