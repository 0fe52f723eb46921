/**
 * Events an agent reports while it runs. The set is closed: anything the
 * agent cannot map onto a known kind is delivered as `unknown` and ignored
 * by consumers.
 */
export type AgentEvent =
  | ToolCallStartEvent
  | ToolCallEndEvent
  | TextEvent
  | UnknownEvent;

/** A tool call is about to be dispatched. Observers see it before the tool runs. */
export interface ToolCallStartEvent {
  readonly type: 'tool_call_start';
  readonly callId: string;
  readonly toolName: string;
  readonly payload: unknown;
}

/** A dispatched tool call has returned (successfully or not). */
export interface ToolCallEndEvent {
  readonly type: 'tool_call_end';
  readonly callId: string;
  readonly toolName: string;
  readonly success: boolean;
  readonly error?: string;
}

export interface TextEvent {
  readonly type: 'text';
  readonly text: string;
}

export interface UnknownEvent {
  readonly type: 'unknown';
  readonly raw: unknown;
}

export type ObserveAction = 'continue' | 'suppress' | 'interrupt';

export interface AgentObserver {
  observe(event: AgentEvent): ObserveAction;
}

export type InterruptName = 'tool_limit_reached';

export interface InterruptDescriptor {
  id: string;
  name: InterruptName;
  reason: {
    toolName: string;
    payload: unknown;
    toolCalls: number;
  };
}

export interface InterruptResponse {
  decision: 'continue';
}

/** Responses to a run's interrupts, keyed by interrupt id. */
export type InterruptResponses = Record<string, InterruptResponse>;
