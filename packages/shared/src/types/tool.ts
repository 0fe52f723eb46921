import type { ZodType } from 'zod';

export interface ToolDefinition<TInput = unknown, TOutput = unknown> {
  name: string;
  description: string;
  inputSchema: ZodType<TInput>;
  execute(input: TInput): Promise<TOutput>;
  tags?: string[];
}

export interface ToolInvocation {
  toolName: string;
  input: unknown;
}

export interface ToolResult {
  toolName: string;
  success: boolean;
  output?: unknown;
  error?: string;
  durationMs: number;
}

/**
 * Remote tool transport. One instance per chat session, started lazily and
 * reused for every turn of that session.
 */
export interface ToolClient {
  start(): Promise<void>;
  listTools(): Promise<ToolDefinition[]>;
  close(): Promise<void>;
  isConnected(): boolean;
}
