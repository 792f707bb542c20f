import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';

import { FlushScheduler } from '../services/scheduler/flush-scheduler.js';

describe('FlushScheduler', () => {
  let pending: boolean;
  let fired: number;
  let scheduler: FlushScheduler;

  beforeEach(() => {
    jest.useFakeTimers();
    pending = false;
    fired = 0;
    scheduler = new FlushScheduler({
      intervalMs: 1000,
      hasPending: () => pending,
      onFire: () => {
        fired++;
      },
    });
  });

  afterEach(() => {
    scheduler.cancel();
    jest.useRealTimers();
  });

  it('rejects a non-positive interval', () => {
    expect(() => new FlushScheduler({ intervalMs: 0, hasPending: () => true, onFire: () => undefined })).toThrow(
      RangeError,
    );
  });

  it('stays idle until the first append', () => {
    jest.advanceTimersByTime(5000);
    expect(scheduler.armed).toBe(false);
    expect(fired).toBe(0);
  });

  it('fires once the interval elapses after the first append', () => {
    pending = true;
    scheduler.notifyAppended();

    jest.advanceTimersByTime(999);
    expect(fired).toBe(0);
    jest.advanceTimersByTime(1);
    expect(fired).toBe(1);
    expect(scheduler.armed).toBe(false);
  });

  it('is not pushed back by further appends', () => {
    pending = true;
    scheduler.notifyAppended();
    jest.advanceTimersByTime(600);
    scheduler.notifyAppended();
    jest.advanceTimersByTime(400);

    expect(fired).toBe(1);
  });

  it('does nothing when the buffer is empty at fire time', () => {
    pending = false;
    scheduler.notifyAppended();
    jest.advanceTimersByTime(1000);

    expect(fired).toBe(0);
    expect(scheduler.fireCount).toBe(0);
  });

  it('disarms when a drain empties the buffer', () => {
    pending = true;
    scheduler.notifyAppended();
    jest.advanceTimersByTime(500);
    scheduler.notifyDrained(true);
    jest.advanceTimersByTime(1000);

    expect(fired).toBe(0);
  });

  it('keeps running when a drain leaves records behind', () => {
    pending = true;
    scheduler.notifyAppended();
    scheduler.notifyDrained(false);
    jest.advanceTimersByTime(1000);

    expect(fired).toBe(1);
  });

  it('never fires again after cancel', () => {
    pending = true;
    scheduler.notifyAppended();
    scheduler.cancel();
    scheduler.notifyAppended();
    jest.advanceTimersByTime(5000);

    expect(fired).toBe(0);
    expect(scheduler.armed).toBe(false);
  });

  it('re-arms on the next append after firing', () => {
    pending = true;
    scheduler.notifyAppended();
    jest.advanceTimersByTime(1000);
    scheduler.notifyAppended();
    jest.advanceTimersByTime(1000);

    expect(scheduler.fireCount).toBe(2);
  });
});
