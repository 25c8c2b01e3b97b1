import { describe, it, expect, vi, afterEach } from 'vitest';
import { attachGlobalHandlers } from '../src/errorHandler.js';
import { createLogger } from '../src/createLogger.js';
import { captureStream, parseLine, flush } from './helpers.js';

describe('attachGlobalHandlers', () => {
  let detach: (() => void) | null = null;

  afterEach(() => {
    detach?.();
    detach = null;
  });

  it('should register and remove process listeners', () => {
    const before = process.listenerCount('unhandledRejection');
    const logger = createLogger({ level: 'info', console: false });

    detach = attachGlobalHandlers(logger, { exit: vi.fn() });
    expect(process.listenerCount('unhandledRejection')).toBe(before + 1);

    detach();
    detach = null;
    expect(process.listenerCount('unhandledRejection')).toBe(before);
  });

  it('should not attach twice', () => {
    const before = process.listenerCount('uncaughtException');
    const logger = createLogger({ level: 'info', console: false });

    detach = attachGlobalHandlers(logger, { exit: vi.fn() });
    const second = attachGlobalHandlers(logger, { exit: vi.fn() });

    expect(second).toBe(detach);
    expect(process.listenerCount('uncaughtException')).toBe(before + 1);
  });

  it('should log an uncaught exception and exit with code 1', async () => {
    const { stream, lines } = captureStream();
    const logger = createLogger({ level: 'info', json: true, console: false, stream });
    const exit = vi.fn();

    detach = attachGlobalHandlers(logger, { exit });
    const listeners = process.listeners('uncaughtException');
    const handler = listeners[listeners.length - 1];
    handler?.(new Error('boom'), 'uncaughtException');
    await flush();

    const entry = parseLine(lines[0]);
    expect(entry['message']).toBe('Uncaught exception, exiting');
    expect(entry['event']).toBe('uncaughtException');
    expect(entry['fatal']).toBe(true);
    await vi.waitFor(() => expect(exit).toHaveBeenCalledWith(1));
  });

  it('should log non-error rejection reasons as strings', async () => {
    const { stream, lines } = captureStream();
    const logger = createLogger({ level: 'info', json: true, console: false, stream });

    detach = attachGlobalHandlers(logger, { exit: vi.fn() });
    const listeners = process.listeners('unhandledRejection');
    const handler = listeners[listeners.length - 1];
    handler?.('provider went away', Promise.resolve());
    await flush();

    const entry = parseLine(lines[0]);
    expect(entry['event']).toBe('unhandledRejection');
    expect(entry['error']).toEqual({ message: 'provider went away' });
  });
});
