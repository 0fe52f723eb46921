import { modelReplySchema, toolCallRequestSchema } from '@costwise/shared';

export interface ParsedToolCall {
  toolName: string;
  toolArgs: Record<string, unknown>;
}

export type ParsedReply =
  | { type: 'final_answer'; answer: string; malformed: unknown[] }
  | { type: 'tool_calls'; toolCalls: ParsedToolCall[]; malformed: unknown[] };

export function stripCodeFences(content: string): string {
  return content.trim()
    .replace(/^```json\s*/i, '')
    .replace(/^```\s*/i, '')
    .replace(/\s*```$/i, '')
    .trim();
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Reads a model reply as tool calls or a final answer. Anything that is not
 * the expected JSON envelope is taken as the answer itself. Tool call
 * entries that do not validate are returned in `malformed`.
 */
export function parseReply(content: string): ParsedReply {
  const envelope = modelReplySchema.safeParse(parseJson(stripCodeFences(content)));
  if (!envelope.success) {
    return { type: 'final_answer', answer: content, malformed: [] };
  }

  const { answer, tool_calls: entries } = envelope.data;
  if (answer !== undefined) {
    return {
      type: 'final_answer',
      answer: typeof answer === 'string' ? answer : JSON.stringify(answer),
      malformed: [],
    };
  }

  const toolCalls: ParsedToolCall[] = [];
  const malformed: unknown[] = [];
  for (const entry of entries ?? []) {
    const call = toolCallRequestSchema.safeParse(entry);
    if (call.success) {
      toolCalls.push(call.data);
    } else {
      malformed.push(entry);
    }
  }

  if (toolCalls.length > 0) {
    return { type: 'tool_calls', toolCalls, malformed };
  }
  return { type: 'final_answer', answer: content, malformed };
}
