import { describe, expect, it, vi } from 'vitest';
import type { RefreshReport } from '../knowledge_index.js';
import { RefreshTask } from '../refresh_task.js';

function report(added: string[] = []): RefreshReport {
  return {
    added,
    updated: [],
    removed: [],
    unchanged: [],
    failed: [],
    aborted: false,
    startedAt: '2026-01-01T00:00:00.000Z',
    completedAt: '2026-01-01T00:00:01.000Z',
  };
}

describe('RefreshTask', () => {
  it('should return the report of a manual cycle', async () => {
    const task = new RefreshTask(async () => report(['a.md']), { intervalMs: 1000 });

    const result = await task.runOnce();

    expect(result?.added).toEqual(['a.md']);
    expect(task.lastReport?.added).toEqual(['a.md']);
    expect(task.lastError).toBeNull();
  });

  it('should return null and record the error when a cycle fails', async () => {
    const runner = vi.fn<(signal: AbortSignal) => Promise<RefreshReport>>()
      .mockResolvedValueOnce(report(['a.md']))
      .mockRejectedValueOnce(new Error('disk gone'));
    const task = new RefreshTask(runner, { intervalMs: 1000 });

    await task.runOnce();
    const failed = await task.runOnce();

    expect(failed).toBeNull();
    expect(task.lastError).toBe('disk gone');
    expect(task.lastReport?.added).toEqual(['a.md']);
  });

  it('should join a cycle already in flight', async () => {
    let release: () => void = () => {};
    const runner = vi.fn(() => new Promise<RefreshReport>((resolve) => {
      release = () => resolve(report());
    }));
    const task = new RefreshTask(runner, { intervalMs: 1000 });

    const first = task.runOnce();
    const second = task.runOnce();
    release();
    await Promise.all([first, second]);

    expect(runner).toHaveBeenCalledTimes(1);
  });

  it('should run periodically from the end of the previous cycle', async () => {
    vi.useFakeTimers();
    const runner = vi.fn(async () => report());
    const task = new RefreshTask(runner, { intervalMs: 1000, runImmediately: true });

    task.start();
    task.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(runner).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(999);
    expect(runner).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(runner).toHaveBeenCalledTimes(2);

    await task.stop();
    await vi.advanceTimersByTimeAsync(5000);
    expect(runner).toHaveBeenCalledTimes(2);
    expect(task.isRunning()).toBe(false);
  });

  it('should wait one interval before the first cycle by default', async () => {
    vi.useFakeTimers();
    const runner = vi.fn(async () => report());
    const task = new RefreshTask(runner, { intervalMs: 500 });

    task.start();
    await vi.advanceTimersByTimeAsync(499);
    expect(runner).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    expect(runner).toHaveBeenCalledTimes(1);

    await task.stop();
  });

  it('should abort the in-flight cycle on stop and wait for it', async () => {
    let seenSignal: AbortSignal | null = null;
    const runner = vi.fn((signal: AbortSignal) => new Promise<RefreshReport>((resolve) => {
      seenSignal = signal;
      signal.addEventListener('abort', () => resolve({ ...report(), aborted: true }), { once: true });
    }));
    const task = new RefreshTask(runner, { intervalMs: 1000 });

    const cycle = task.runOnce();
    await task.stop();
    const result = await cycle;

    expect(seenSignal).not.toBeNull();
    expect(result?.aborted).toBe(true);
  });

  it('should keep running after a failed periodic cycle', async () => {
    vi.useFakeTimers();
    const runner = vi.fn<(signal: AbortSignal) => Promise<RefreshReport>>()
      .mockRejectedValueOnce(new Error('transient'))
      .mockResolvedValue(report());
    const task = new RefreshTask(runner, { intervalMs: 100, runImmediately: true });

    task.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(task.lastError).toBe('transient');
    await vi.advanceTimersByTimeAsync(100);

    expect(runner).toHaveBeenCalledTimes(2);
    expect(task.lastError).toBeNull();
    await task.stop();
  });

  it('should keep a single refresh chain when restarted before stop settles', async () => {
    vi.useFakeTimers();
    let release: () => void = () => {};
    const runner = vi.fn<(signal: AbortSignal) => Promise<RefreshReport>>()
      .mockImplementationOnce(() => new Promise<RefreshReport>((resolve) => {
        release = () => resolve(report());
      }))
      .mockResolvedValue(report());
    const task = new RefreshTask(runner, { intervalMs: 1000, runImmediately: true });

    task.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(runner).toHaveBeenCalledTimes(1);

    const stopping = task.stop();
    task.start();
    release();
    await stopping;

    await vi.advanceTimersByTimeAsync(0);
    expect(runner).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(1000);
    expect(runner).toHaveBeenCalledTimes(3);
    await vi.advanceTimersByTimeAsync(1000);
    expect(runner).toHaveBeenCalledTimes(4);

    await task.stop();
  });

  it('should not run a cycle from a timer that outlived stop', async () => {
    vi.useFakeTimers();
    const runner = vi.fn(async () => report());
    const task = new RefreshTask(runner, { intervalMs: 200 });

    task.start();
    const stopping = task.stop();
    await vi.advanceTimersByTimeAsync(1000);
    await stopping;

    expect(runner).not.toHaveBeenCalled();
  });
});
