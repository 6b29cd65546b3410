import { describe, it, expect, vi, afterEach } from 'vitest';
import { Logger } from '../logger.js';
import { closeWithTimeout, handleShutdownSignals } from '../shutdown.js';

const log = new Logger('test', 'error');

describe('closeWithTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('resolves 0 once the server has closed', async () => {
    const server = { close: vi.fn().mockResolvedValue(undefined) };

    await expect(closeWithTimeout(server, 1000, log)).resolves.toBe(0);
    expect(server.close).toHaveBeenCalledTimes(1);
  });

  it('resolves 1 when closing fails', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const server = { close: vi.fn().mockRejectedValue(new Error('busy')) };

    await expect(closeWithTimeout(server, 1000, log)).resolves.toBe(1);
  });

  it('resolves 1 when closing outlasts the timeout', async () => {
    vi.useFakeTimers();
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const server = { close: () => new Promise<never>(() => {}) };

    const result = closeWithTimeout(server, 500, log);
    await vi.advanceTimersByTimeAsync(500);

    await expect(result).resolves.toBe(1);
    expect(console.error).toHaveBeenCalledWith(expect.stringMatching(/Server did not close within 500ms$/));
  });
});

describe('handleShutdownSignals', () => {
  it('closes the server once however often the signal repeats', async () => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    const server = { close: vi.fn().mockResolvedValue(undefined) };
    const exit = vi.fn();

    const dispose = handleShutdownSignals(server, { timeoutMs: 1000, log, signals: ['SIGUSR2'], exit });
    try {
      process.emit('SIGUSR2', 'SIGUSR2');
      process.emit('SIGUSR2', 'SIGUSR2');
      expect(process.listenerCount('SIGUSR2')).toBeGreaterThan(0);

      await vi.waitFor(() => expect(exit).toHaveBeenCalledWith(0));
      expect(server.close).toHaveBeenCalledTimes(1);
      expect(exit).toHaveBeenCalledTimes(1);
    } finally {
      dispose();
      vi.restoreAllMocks();
    }
  });

  it('removes its handlers when disposed', () => {
    const before = process.listenerCount('SIGUSR2');
    const dispose = handleShutdownSignals({ close: vi.fn() }, { timeoutMs: 1000, log, signals: ['SIGUSR2'] });

    expect(process.listenerCount('SIGUSR2')).toBe(before + 1);
    dispose();
    expect(process.listenerCount('SIGUSR2')).toBe(before);
  });
});
