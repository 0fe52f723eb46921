export type ToolCallStatus = 'started' | 'completed';

export interface ToolCallRecord {
  callId: string;
  toolName: string;
  /** Tool input as issued by the agent; rendered, never interpreted. */
  payload?: unknown;
  status: ToolCallStatus;
  timestamp: string;
  success?: boolean;
}

export interface BudgetState {
  count: number;
  limit: number;
}

export type UserDecision = 'approve_continue' | 'stop';

export type InterruptionPhase = 'running' | 'limit_reached' | 'resumed' | 'finalized';

export type AssistantStatus = 'completed' | 'stopped' | 'failed';
