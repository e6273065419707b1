import { describe, it, expect, vi, afterEach } from 'vitest';
import { ExecutionMonitor } from './monitor.js';

function mockLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('ExecutionMonitor', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('aggregates timings per operation', () => {
    const monitor = new ExecutionMonitor(mockLogger());
    monitor.record('echo', 4);
    monitor.record('echo', 2, false);
    monitor.record('echo', 6);

    expect(monitor.get('echo')).toEqual({
      count: 3,
      errors: 1,
      totalMs: 12,
      avgMs: 4,
      minMs: 2,
      maxMs: 6,
      lastMs: 6,
    });
    expect(monitor.get('other')).toBeUndefined();
  });

  it('hands out copies', () => {
    const monitor = new ExecutionMonitor(mockLogger());
    monitor.record('echo', 1);
    const snapshot = monitor.snapshot();
    snapshot.echo.count = 99;

    expect(monitor.get('echo')?.count).toBe(1);
  });

  it('reset forgets everything', () => {
    const monitor = new ExecutionMonitor(mockLogger());
    monitor.record('echo', 1);
    monitor.reset();

    expect(monitor.snapshot()).toEqual({});
  });

  it('reports one line per operation on an interval', () => {
    vi.useFakeTimers();
    const logger = mockLogger();
    const monitor = new ExecutionMonitor(logger);
    monitor.record('echo', 1.234);

    monitor.startReporting(1000);
    vi.advanceTimersByTime(1000);
    monitor.stopReporting();
    vi.advanceTimersByTime(5000);

    expect(logger.info).toHaveBeenCalledTimes(2);
    expect(logger.info).toHaveBeenNthCalledWith(1, 'Execution report', { operations: 1 });
    expect(logger.info).toHaveBeenNthCalledWith(2, 'echo', {
      count: 1,
      errors: 0,
      avgMs: 1.23,
      minMs: 1.23,
      maxMs: 1.23,
      lastMs: 1.23,
    });
  });

  it('stays quiet with nothing recorded', () => {
    const logger = mockLogger();
    new ExecutionMonitor(logger).report();
    expect(logger.info).not.toHaveBeenCalled();
  });
});
