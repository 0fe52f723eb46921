import {
  generateId,
  monotonicNow,
  isoNow,
  type BudgetState,
  type LogLevel,
  type TraceEvent,
  type TraceEventType,
  type TraceSpan,
  type TurnTrace,
} from '@costwise/shared';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type TraceSink = (event: TraceEvent) => void;

export interface TraceLoggerOptions {
  /** Events below this level are dropped. */
  level?: LogLevel;
  /** Receives every event that passes the level filter, traced or not. */
  sink?: TraceSink;
}

/** Event logging bound to a single trace. */
export interface TurnLog {
  readonly traceId: string;
  event(type: TraceEventType, data: Record<string, unknown>, level?: LogLevel): void;
}

export class TraceLogger {
  private traces = new Map<string, TraceState>();
  private readonly level: LogLevel;
  private sink?: TraceSink;

  constructor(options: TraceLoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.sink = options.sink;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  createTrace(traceId: string, turnId: string, budget: BudgetState): void {
    this.traces.set(traceId, {
      traceId,
      turnId,
      startedAt: isoNow(),
      startTime: monotonicNow(),
      budget: { ...budget },
      spans: [],
      spanStack: [],
    });
  }

  startSpan(traceId: string, name: string, data?: Record<string, unknown>): string {
    const state = this.getState(traceId);
    const spanId = generateId('span');
    const parentSpanId = state.spanStack.length > 0
      ? state.spanStack[state.spanStack.length - 1]
      : undefined;

    const span: TraceSpan = {
      id: spanId,
      traceId,
      name,
      startTime: monotonicNow(),
      events: [],
      children: [],
    };

    if (parentSpanId) {
      const parent = this.findSpan(state.spans, parentSpanId);
      parent?.children.push(span);
    } else {
      state.spans.push(span);
    }

    state.spanStack.push(spanId);

    if (data) {
      this.logEvent(traceId, 'info', data, 'debug', spanId);
    }
    return spanId;
  }

  endSpan(traceId: string, spanId: string): void {
    const state = this.getState(traceId);
    const span = this.findSpan(state.spans, spanId);
    if (span) {
      span.endTime = monotonicNow();
    }
    const idx = state.spanStack.indexOf(spanId);
    if (idx !== -1) {
      state.spanStack.splice(idx, 1);
    }
  }

  /**
   * Records an event on the innermost open span of the trace. Events for a
   * trace that is not open still reach the sink.
   */
  logEvent(
    traceId: string,
    type: TraceEventType,
    data: Record<string, unknown>,
    level: LogLevel = 'info',
    parentSpanId?: string,
  ): void {
    if (!this.isEnabled(level)) return;

    const state = this.traces.get(traceId);
    const event: TraceEvent = {
      id: generateId('evt'),
      traceId,
      parentSpanId: parentSpanId ?? state?.spanStack[state.spanStack.length - 1],
      type,
      level,
      timestamp: monotonicNow(),
      wallClock: isoNow(),
      data,
    };

    if (state && event.parentSpanId) {
      this.findSpan(state.spans, event.parentSpanId)?.events.push(event);
    }

    this.sink?.(event);
  }

  forTrace(traceId: string): TurnLog {
    return {
      traceId,
      event: (type, data, level) => this.logEvent(traceId, type, data, level),
    };
  }

  /** Closes the trace and hands it back. */
  getTrace(traceId: string, budget: BudgetState): TurnTrace {
    const state = this.getState(traceId);
    const trace: TurnTrace = {
      traceId: state.traceId,
      turnId: state.turnId,
      startedAt: state.startedAt,
      completedAt: isoNow(),
      totalDurationMs: monotonicNow() - state.startTime,
      budget: { ...budget },
      spans: state.spans,
    };

    this.traces.delete(traceId);
    return trace;
  }

  hasTrace(traceId: string): boolean {
    return this.traces.has(traceId);
  }

  private getState(traceId: string): TraceState {
    const state = this.traces.get(traceId);
    if (!state) throw new Error(`Trace not found: ${traceId}`);
    return state;
  }

  private findSpan(spans: TraceSpan[], id: string): TraceSpan | undefined {
    for (const span of spans) {
      if (span.id === id) return span;
      const found = this.findSpan(span.children, id);
      if (found) return found;
    }
    return undefined;
  }
}

interface TraceState {
  traceId: string;
  turnId: string;
  startedAt: string;
  startTime: number;
  budget: BudgetState;
  spans: TraceSpan[];
  spanStack: string[];
}
