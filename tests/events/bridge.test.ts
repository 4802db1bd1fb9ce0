/**
 * tests/events/bridge.test.ts
 *
 * Event records arriving from outside the engine.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { EventBridge } from '../../src/events/bridge';
import { Scheduler } from '../../src/runtime/scheduler';
import { ErrorReporter } from '../../src/runtime/error-reporter';
import type { BridgeEventRecord } from '../../src/events/bridge';

afterEach(() => {
  vi.restoreAllMocks();
});

const record = (handlerId: string, type = 'click'): BridgeEventRecord => ({
  handlerId,
  type,
  target: { id: 'btn', value: 'v' },
  timestamp: 1_700_000_000_000,
});

describe('EventBridge', () => {
  it('should route a record to the handler registered under its id', () => {
    const bridge = new EventBridge({ scheduler: new Scheduler() });
    const handler = vi.fn();
    const id = bridge.register(handler);

    expect(bridge.dispatch(record(id))).toBe(true);
    expect(handler).toHaveBeenCalledWith(record(id));
  });

  it('should hand out distinct ids', () => {
    const bridge = new EventBridge({ scheduler: new Scheduler() });
    expect(bridge.register(() => {})).toBe('h1');
    expect(bridge.register(() => {})).toBe('h2');
    expect(bridge.size).toBe(2);
  });

  it('should refuse an id that is already taken', () => {
    const bridge = new EventBridge({
      scheduler: new Scheduler(),
      generateId: () => 'fixed',
    });
    bridge.register(() => {});
    expect(() => bridge.register(() => {})).toThrow(/already registered/);
  });

  it('should report an unknown handler id without throwing', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const bridge = new EventBridge({ scheduler: new Scheduler() });

    expect(bridge.dispatch(record('ghost', 'input'))).toBe(false);
    expect(warn).toHaveBeenCalledWith(
      '[Trellis:events]',
      'No handler registered for "ghost" (event "input")'
    );
  });

  it('should stop routing after remove()', () => {
    const bridge = new EventBridge({ scheduler: new Scheduler() });
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const handler = vi.fn();
    const id = bridge.register(handler);

    expect(bridge.remove(id)).toBe(true);
    expect(bridge.remove(id)).toBe(false);
    expect(bridge.dispatch(record(id))).toBe(false);
    expect(handler).not.toHaveBeenCalled();
  });

  it('should run handlers inside the scheduler handler window', () => {
    const scheduler = new Scheduler();
    const bridge = new EventBridge({ scheduler });
    let inside = false;
    const id = bridge.register(() => {
      inside = scheduler.isInHandler();
    });

    bridge.dispatch(record(id));

    expect(inside).toBe(true);
    expect(scheduler.isInHandler()).toBe(false);
  });

  it('should coalesce work enqueued by several records into one flush', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const scheduler = new Scheduler();
    const bridge = new EventBridge({ scheduler });
    const task = vi.fn();
    const id = bridge.register(() => scheduler.enqueue(task));

    expect(bridge.dispatchAll([record(id), record(id), record('missing')])).toBe(2);
    expect(task).not.toHaveBeenCalled();

    await Promise.resolve();
    expect(task).toHaveBeenCalledTimes(2);
  });

  it('should report handler errors to the reporter', () => {
    const reporter = new ErrorReporter({ log: false });
    const bridge = new EventBridge({ scheduler: new Scheduler(), reporter });
    const id = bridge.register(() => {
      throw new Error('handler broke');
    });

    expect(bridge.dispatch(record(id, 'submit'))).toBe(true);

    const [report] = reporter.getHistory();
    expect(report.message).toBe('handler broke');
    expect(report.context).toEqual({ phase: 'event', handlerId: id, type: 'submit' });
  });
});
