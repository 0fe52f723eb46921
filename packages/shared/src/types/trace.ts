import type { BudgetState } from './turn.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type TraceEventType =
  | 'model_call'
  | 'tool_call'
  | 'interruption'
  | 'resume'
  | 'finalize'
  | 'malformed_event'
  | 'stale_interruption'
  | 'error'
  | 'info';

export interface TraceEvent {
  id: string;
  traceId: string;
  parentSpanId?: string;
  type: TraceEventType;
  level: LogLevel;
  timestamp: number;
  wallClock: string;
  data: Record<string, unknown>;
}

export interface TraceSpan {
  id: string;
  traceId: string;
  name: string;
  startTime: number;
  endTime?: number;
  events: TraceEvent[];
  children: TraceSpan[];
}

export interface TurnTrace {
  traceId: string;
  turnId: string;
  startedAt: string;
  completedAt?: string;
  totalDurationMs?: number;
  budget: BudgetState;
  spans: TraceSpan[];
}
