import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { SessionRegistry } from './sessions';

describe('SessionRegistry', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('hands out distinct ids', () => {
    const registry = new SessionRegistry();
    const a = registry.open('10.0.0.1:5000', () => {});
    const b = registry.open('10.0.0.2:5000', () => {});
    expect(a.id).not.toBe(b.id);
    expect(registry.size).toBe(2);
    expect(registry.list().map(e => e.remote)).toEqual(['10.0.0.1:5000', '10.0.0.2:5000']);
  });

  it('returns the entry only on the first close', () => {
    const registry = new SessionRegistry();
    const entry = registry.open('10.0.0.1:5000', () => {}, 1234);
    expect(registry.close(entry.id)).toEqual(entry);
    expect(registry.close(entry.id)).toBeUndefined();
    expect(registry.size).toBe(0);
  });

  it('drains an empty registry at once', async () => {
    const registry = new SessionRegistry();
    await expect(registry.drain(30_000)).resolves.toBe(0);
  });

  it('waits for sessions that end within the grace period', async () => {
    const registry = new SessionRegistry();
    const terminate = vi.fn();
    const entry = registry.open('10.0.0.1:5000', terminate);

    const drained = registry.drain(30_000);
    await vi.advanceTimersByTimeAsync(5_000);
    registry.close(entry.id);

    await expect(drained).resolves.toBe(0);
    expect(terminate).not.toHaveBeenCalled();
    expect(vi.getTimerCount()).toBe(0);
  });

  it('terminates sessions still open after the grace period', async () => {
    const registry = new SessionRegistry();
    const slow = vi.fn();
    const quick = vi.fn();
    registry.open('10.0.0.1:5000', slow);
    const done = registry.open('10.0.0.2:5000', quick);

    const drained = registry.drain(30_000);
    registry.close(done.id);
    await vi.advanceTimersByTimeAsync(30_000);

    await expect(drained).resolves.toBe(1);
    expect(slow).toHaveBeenCalledTimes(1);
    expect(quick).not.toHaveBeenCalled();
    expect(registry.size).toBe(0);
  });

  it('resolves every whenEmpty waiter', async () => {
    const registry = new SessionRegistry();
    const entry = registry.open('10.0.0.1:5000', () => {});
    const first = registry.whenEmpty();
    const second = registry.whenEmpty();

    registry.close(entry.id);

    await expect(Promise.all([first, second])).resolves.toEqual([undefined, undefined]);
  });
});
