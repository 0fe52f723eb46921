import type { AssistantStatus, ToolCallRecord } from './turn.js';

export interface SessionMessage {
  role: 'user' | 'assistant';
  content: string;
  timestamp: string;
  /** Only present on assistant messages. */
  toolLog?: ToolCallRecord[];
  status?: AssistantStatus;
}

export interface SessionMetadata {
  messageCount: number;
  toolCallCount: number;
  interruptionCount: number;
}

export interface ChatSession {
  id: string;
  createdAt: string;
  updatedAt: string;
  messages: SessionMessage[];
  metadata: SessionMetadata;
}

export interface SessionListEntry {
  id: string;
  createdAt: string;
  updatedAt: string;
  messageCount: number;
  preview: string;
}
