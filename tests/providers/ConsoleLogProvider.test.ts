import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import type { LogEvent } from '../../src/providers/ILogProvider.js';

describe('ConsoleLogProvider', () => {
  let provider: ConsoleLogProvider;

  beforeEach(() => {
    provider = new ConsoleLogProvider();
  });

  // --- log() ---

  it('should accept a log event', () => {
    const event: LogEvent = { level: 'info', message: 'test' };
    provider.log(event);
    expect(provider.events).toHaveLength(1);
    expect(provider.events[0]).toMatchObject({ level: 'info', message: 'test' });
  });

  it('should auto-set timestamp if omitted', () => {
    provider.log({ level: 'info', message: 'no ts' });
    const ts = provider.events[0].timestamp ?? '';
    // Should be a valid ISO string
    expect(new Date(ts).toISOString()).toBe(ts);
  });

  it('should preserve provided timestamp', () => {
    const ts = '2026-01-15T12:00:00.000Z';
    provider.log({ level: 'warn', message: 'with ts', timestamp: ts });
    expect(provider.events[0].timestamp).toBe(ts);
  });

  it('should preserve fields on events', () => {
    provider.log({ level: 'error', message: 'boom', fields: { code: 500, path: '/api' } });
    expect(provider.events[0].fields).toEqual({ code: 500, path: '/api' });
  });

  it('should accumulate multiple events', () => {
    provider.log({ level: 'info', message: 'first' });
    provider.log({ level: 'warn', message: 'second' });
    provider.log({ level: 'error', message: 'third' });
    expect(provider.events).toHaveLength(3);
  });

  // --- convenience methods ---

  it('info() should log at info level', () => {
    provider.info('hello');
    expect(provider.events[0]).toMatchObject({ level: 'info', message: 'hello' });
  });

  it('warn() should log at warn level with fields', () => {
    provider.warn('careful', { detail: 'test' });
    expect(provider.events[0]).toMatchObject({
      level: 'warn',
      message: 'careful',
      fields: { detail: 'test' },
    });
  });

  it('error() should log at error level', () => {
    provider.error('broken', { stack: 'trace' });
    expect(provider.events[0]).toMatchObject({
      level: 'error',
      message: 'broken',
      fields: { stack: 'trace' },
    });
  });

  it('debug() should log at debug level', () => {
    provider.debug('verbose');
    expect(provider.events[0]).toMatchObject({ level: 'debug', message: 'verbose' });
  });

  // --- flush() ---

  it('flush() should resolve immediately', async () => {
    provider.info('test');
    await expect(provider.flush()).resolves.toBeUndefined();
  });

  // --- console output ---

  it('should write to console when outputToConsole is true', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const loud = new ConsoleLogProvider({ outputToConsole: true });
    loud.info('hello console');
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0][0]).toContain('hello console');
    spy.mockRestore();
  });

  it('should not write to console by default', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    provider.info('silent');
    expect(spy).not.toHaveBeenCalled();
    spy.mockRestore();
  });

  it('should skip console output below minLevel', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const quiet = new ConsoleLogProvider({ outputToConsole: true, minLevel: 'warn' });
    quiet.info('ignored');
    quiet.warn('kept');
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0][0]).toContain('kept');
    expect(quiet.events).toHaveLength(2);
    spy.mockRestore();
  });

  it('should merge base fields and event fields into the written line', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const loud = new ConsoleLogProvider({
      outputToConsole: true,
      baseFields: { service: 'unidesk' },
    });
    loud.log({
      level: 'info',
      message: 'answered',
      timestamp: '2026-01-15T12:00:00.000Z',
      fields: { tokensUsed: 42 },
    });
    expect(JSON.parse(String(spy.mock.calls[0][0]))).toEqual({
      service: 'unidesk',
      tokensUsed: 42,
      level: 'info',
      message: 'answered',
      timestamp: '2026-01-15T12:00:00.000Z',
    });
    spy.mockRestore();
  });

  it('should not keep events when buffering is off', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const streaming = new ConsoleLogProvider({ outputToConsole: true, bufferEvents: false });
    streaming.info('written only');
    expect(streaming.events).toHaveLength(0);
    expect(spy).toHaveBeenCalledTimes(1);
    spy.mockRestore();
  });

  // --- eventsAt() ---

  it('eventsAt() should filter by level', () => {
    provider.info('a');
    provider.warn('b');
    provider.warn('c');
    expect(provider.eventsAt('warn').map((e) => e.message)).toEqual(['b', 'c']);
  });

  // --- clear() ---

  it('clear() should empty the events buffer', () => {
    provider.info('one');
    provider.info('two');
    expect(provider.events).toHaveLength(2);
    provider.clear();
    expect(provider.events).toHaveLength(0);
  });
});
