import {
  isoNow,
  type AgentEvent,
  type AgentObserver,
  type ObserveAction,
  type ToolCallEndEvent,
  type ToolCallRecord,
  type ToolCallStartEvent,
} from '@costwise/shared';
import type { BudgetTracker } from './budget-tracker.js';
import type { ProgressUpdate } from './display.js';
import type { TurnLog } from './trace-logger.js';

export interface StreamInterceptorOptions {
  /** Records already gathered earlier in the turn, e.g. before an interruption. */
  initialLog?: ToolCallRecord[];
  log?: TurnLog;
  onProgress?: (update: ProgressUpdate) => void;
}

/**
 * Watches one agent run. Keeps the tool log, counts completed calls and
 * answers `interrupt` to the first call that would go past the budget.
 * After that every further call is suppressed.
 */
export class StreamInterceptor implements AgentObserver {
  private records: ToolCallRecord[];
  private text = '';
  private interrupted = false;

  constructor(
    private readonly budget: BudgetTracker,
    private readonly options: StreamInterceptorOptions = {},
  ) {
    this.records = (options.initialLog ?? []).map(r => ({ ...r }));
  }

  observe(event: AgentEvent): ObserveAction {
    switch (event.type) {
      case 'tool_call_start':
        return this.onStart(event);
      case 'tool_call_end':
        return this.onEnd(event);
      case 'text':
        this.text += event.text;
        this.options.onProgress?.({ type: 'text', text: event.text });
        return 'continue';
      case 'unknown':
        this.options.log?.event('malformed_event', { raw: event.raw }, 'debug');
        return 'continue';
    }
  }

  getToolLog(): ToolCallRecord[] {
    return this.records.map(r => ({ ...r }));
  }

  getText(): string {
    return this.text;
  }

  wasInterrupted(): boolean {
    return this.interrupted;
  }

  private onStart(event: ToolCallStartEvent): ObserveAction {
    if (this.interrupted) {
      this.options.log?.event('interruption', {
        suppressed: event.toolName,
        callId: event.callId,
      }, 'debug');
      return 'suppress';
    }

    if (this.budget.counts(event.toolName) && this.budget.isExhausted()) {
      this.interrupted = true;
      const budget = this.budget.getState();
      this.options.log?.event('interruption', { toolName: event.toolName, ...budget });
      this.options.onProgress?.({ type: 'tool_blocked', toolName: event.toolName, budget });
      return 'interrupt';
    }

    const record: ToolCallRecord = {
      callId: event.callId,
      toolName: event.toolName,
      payload: event.payload,
      status: 'started',
      timestamp: isoNow(),
    };
    this.records.push(record);
    this.options.log?.event('tool_call', { callId: record.callId, toolName: record.toolName, status: 'started' }, 'debug');
    this.options.onProgress?.({ type: 'tool_started', record: { ...record }, ordinal: this.records.length });
    return 'continue';
  }

  private onEnd(event: ToolCallEndEvent): ObserveAction {
    const index = this.records.findIndex(r => r.callId === event.callId && r.status === 'started');
    if (index === -1) {
      this.options.log?.event('malformed_event', { unmatchedEnd: event.callId, toolName: event.toolName }, 'debug');
      return 'continue';
    }

    const record = this.records[index];
    record.status = 'completed';
    record.success = event.success;
    if (this.budget.counts(record.toolName)) {
      this.budget.increment();
    }

    const budget = this.budget.getState();
    this.options.log?.event('tool_call', {
      callId: record.callId,
      toolName: record.toolName,
      status: 'completed',
      success: event.success,
      error: event.error,
      ...budget,
    });
    this.options.onProgress?.({ type: 'tool_completed', record: { ...record }, ordinal: index + 1, budget });
    return 'continue';
  }
}
