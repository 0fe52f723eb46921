import { describe, it, expect, vi } from 'vitest';
import type { ToolCallRecord } from '@costwise/shared';
import { BudgetTracker } from '../src/budget-tracker.js';
import { StreamInterceptor } from '../src/stream-interceptor.js';
import type { ProgressUpdate } from '../src/display.js';
import { TraceLogger } from '../src/trace-logger.js';

function start(interceptor: StreamInterceptor, callId: string, toolName = 'redshift__execute_query') {
  return interceptor.observe({ type: 'tool_call_start', callId, toolName, payload: { sql: callId } });
}

function end(interceptor: StreamInterceptor, callId: string, toolName = 'redshift__execute_query', success = true) {
  return interceptor.observe({ type: 'tool_call_end', callId, toolName, success });
}

function complete(interceptor: StreamInterceptor, callId: string, toolName?: string) {
  expect(start(interceptor, callId, toolName)).toBe('continue');
  expect(end(interceptor, callId, toolName)).toBe('continue');
}

describe('StreamInterceptor', () => {
  it('lets calls through while under the limit', () => {
    const budget = new BudgetTracker({ limit: 5 });
    const interceptor = new StreamInterceptor(budget);

    complete(interceptor, 'c1');
    complete(interceptor, 'c2');
    complete(interceptor, 'c3');

    expect(budget.isExhausted()).toBe(false);
    expect(interceptor.wasInterrupted()).toBe(false);
    expect(interceptor.getToolLog().map(r => r.status)).toEqual(['completed', 'completed', 'completed']);
  });

  it('interrupts the call after the limit and suppresses the rest', () => {
    const budget = new BudgetTracker({ limit: 2 });
    const interceptor = new StreamInterceptor(budget);

    complete(interceptor, 'c1');
    complete(interceptor, 'c2');

    expect(start(interceptor, 'c3')).toBe('interrupt');
    expect(start(interceptor, 'c4')).toBe('suppress');
    expect(interceptor.wasInterrupted()).toBe(true);
    expect(interceptor.getToolLog().map(r => r.callId)).toEqual(['c1', 'c2']);
    expect(budget.getState()).toEqual({ count: 2, limit: 2 });
  });

  it('counts on completion, not on start', () => {
    const budget = new BudgetTracker({ limit: 1 });
    const interceptor = new StreamInterceptor(budget);

    expect(start(interceptor, 'c1')).toBe('continue');
    expect(budget.getState().count).toBe(0);
    expect(end(interceptor, 'c1')).toBe('continue');
    expect(budget.getState().count).toBe(1);
  });

  it('counts failed tool results as completed calls', () => {
    const budget = new BudgetTracker({ limit: 3 });
    const interceptor = new StreamInterceptor(budget);

    start(interceptor, 'c1');
    end(interceptor, 'c1', 'redshift__execute_query', false);

    expect(budget.getState().count).toBe(1);
    expect(interceptor.getToolLog()[0]).toMatchObject({ callId: 'c1', status: 'completed', success: false });
  });

  it('neither counts nor gates tools outside the filter', () => {
    const budget = new BudgetTracker({ limit: 1, countedTools: ['execute_query'] });
    const interceptor = new StreamInterceptor(budget);

    complete(interceptor, 'q1');
    complete(interceptor, 'm1', 'redshift__list_schemas');

    expect(budget.getState().count).toBe(1);
    expect(start(interceptor, 'q2')).toBe('interrupt');
    expect(interceptor.getToolLog().map(r => r.toolName)).toEqual([
      'redshift__execute_query',
      'redshift__list_schemas',
    ]);
  });

  it('ignores an end event without a matching start', () => {
    const budget = new BudgetTracker({ limit: 2 });
    const interceptor = new StreamInterceptor(budget);

    expect(end(interceptor, 'ghost')).toBe('continue');
    expect(budget.getState().count).toBe(0);
    expect(interceptor.getToolLog()).toEqual([]);
  });

  it('accumulates text', () => {
    const interceptor = new StreamInterceptor(new BudgetTracker());
    interceptor.observe({ type: 'text', text: 'Total: ' });
    interceptor.observe({ type: 'text', text: '$42' });
    expect(interceptor.getText()).toBe('Total: $42');
  });

  it('logs unknown events at debug level and carries on', () => {
    const sink = vi.fn();
    const tracer = new TraceLogger({ level: 'debug', sink });
    tracer.createTrace('t1', 't1', { count: 0, limit: 5 });
    const interceptor = new StreamInterceptor(new BudgetTracker(), { log: tracer.forTrace('t1') });

    expect(interceptor.observe({ type: 'unknown', raw: { toolName: 42 } })).toBe('continue');
    expect(sink).toHaveBeenCalledTimes(1);
    expect(sink.mock.calls[0][0]).toMatchObject({
      type: 'malformed_event',
      level: 'debug',
      data: { raw: { toolName: 42 } },
    });
  });

  it('reports progress for each observed call', () => {
    const updates: ProgressUpdate[] = [];
    const budget = new BudgetTracker({ limit: 1 });
    const interceptor = new StreamInterceptor(budget, { onProgress: u => updates.push(u) });

    complete(interceptor, 'c1');
    start(interceptor, 'c2');

    expect(updates.map(u => u.type)).toEqual(['tool_started', 'tool_completed', 'tool_blocked']);
    expect(updates[1]).toMatchObject({ type: 'tool_completed', ordinal: 1, budget: { count: 1, limit: 1 } });
  });

  it('continues the log it was seeded with', () => {
    const earlier: ToolCallRecord[] = [{
      callId: 'c1',
      toolName: 'redshift__execute_query',
      payload: { sql: 'c1' },
      status: 'completed',
      timestamp: '2026-01-01T00:00:00.000Z',
      success: true,
    }];
    const budget = new BudgetTracker({ limit: 1 });
    const interceptor = new StreamInterceptor(budget, { initialLog: earlier });

    complete(interceptor, 'c2');

    expect(interceptor.getToolLog().map(r => r.callId)).toEqual(['c1', 'c2']);
    expect(earlier).toHaveLength(1);
  });
});
