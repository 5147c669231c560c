import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { HeartbeatDriver } from './HeartbeatDriver';
import { createLogger } from '../observability/logger';

const logger = createLogger({ level: 'silent' });

describe('HeartbeatDriver', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should ping once per interval while running', async () => {
    const ping = vi.fn().mockResolvedValue(undefined);
    const driver = new HeartbeatDriver({ intervalMs: 1000, ping, onFailure: vi.fn(), logger });

    driver.start();
    await vi.advanceTimersByTimeAsync(999);
    expect(ping).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(ping).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(2000);
    expect(ping).toHaveBeenCalledTimes(3);

    driver.stop();
  });

  it('should not ping after stop', async () => {
    const ping = vi.fn().mockResolvedValue(undefined);
    const driver = new HeartbeatDriver({ intervalMs: 1000, ping, onFailure: vi.fn(), logger });

    driver.start();
    await vi.advanceTimersByTimeAsync(1000);
    driver.stop();
    await vi.advanceTimersByTimeAsync(5000);

    expect(ping).toHaveBeenCalledTimes(1);
    expect(driver.running).toBe(false);
  });

  it('should wait for a slow ping before scheduling the next one', async () => {
    let release: () => void = () => undefined;
    const ping = vi
      .fn<() => Promise<void>>()
      .mockImplementationOnce(() => new Promise<void>((resolve) => (release = resolve)))
      .mockResolvedValue(undefined);
    const driver = new HeartbeatDriver({ intervalMs: 1000, ping, onFailure: vi.fn(), logger });

    driver.start();
    await vi.advanceTimersByTimeAsync(3000);
    expect(ping).toHaveBeenCalledTimes(1);

    release();
    await vi.advanceTimersByTimeAsync(1000);
    expect(ping).toHaveBeenCalledTimes(2);

    driver.stop();
  });

  it('should stop and report the first failed ping', async () => {
    const failure = new Error('socket gone');
    const ping = vi.fn().mockRejectedValue(failure);
    const onFailure = vi.fn();
    const driver = new HeartbeatDriver({ intervalMs: 1000, ping, onFailure, logger });

    driver.start();
    await vi.advanceTimersByTimeAsync(1000);

    expect(onFailure).toHaveBeenCalledTimes(1);
    expect(onFailure).toHaveBeenCalledWith(failure);
    expect(driver.running).toBe(false);

    await vi.advanceTimersByTimeAsync(5000);
    expect(ping).toHaveBeenCalledTimes(1);
  });

  it('should ignore a failure from a ping started before stop', async () => {
    let rejectPing: (error: Error) => void = () => undefined;
    const ping = vi.fn(() => new Promise<void>((_resolve, reject) => (rejectPing = reject)));
    const onFailure = vi.fn();
    const driver = new HeartbeatDriver({ intervalMs: 1000, ping, onFailure, logger });

    driver.start();
    await vi.advanceTimersByTimeAsync(1000);
    driver.stop();
    rejectPing(new Error('late failure'));
    await vi.advanceTimersByTimeAsync(0);

    expect(onFailure).not.toHaveBeenCalled();
  });
});
