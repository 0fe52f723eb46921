import {
  clockTime,
  type BudgetState,
  type SessionListEntry,
  type SessionMessage,
  type ToolCallRecord,
  type TraceEvent,
} from '@costwise/shared';
import type { ProgressUpdate } from '@costwise/core';

/** Label for one tool call in live output, e.g. "query". */
export const CALL_LABEL = 'query';

export function formatPayload(payload: unknown): string {
  if (typeof payload === 'object' && payload !== null && 'sql' in payload && typeof payload.sql === 'string') {
    return payload.sql.trim();
  }
  if (typeof payload === 'string') return payload;
  return JSON.stringify(payload);
}

function indent(text: string, prefix = '    '): string {
  return text.split('\n').map(line => prefix + line).join('\n');
}

/** Lines to print for one progress update; empty when nothing is shown. */
export function formatProgress(update: ProgressUpdate): string[] {
  switch (update.type) {
    case 'tool_started':
      return [
        `[${CALL_LABEL} ${update.ordinal}] running... (${clockTime(update.record.timestamp)})`,
        indent(formatPayload(update.record.payload)),
      ];
    case 'tool_completed':
      return [
        `[${CALL_LABEL} ${update.ordinal}] ${update.record.success === false ? 'failed' : 'done'} `
        + `(${formatBudget(update.budget)})`,
      ];
    case 'tool_blocked':
      return [`[limit] ${formatBudget(update.budget)}; paused before ${update.toolName}`];
    case 'limit_reached':
      return [
        '',
        `[!] ${update.message}`,
        '',
        'Partial summary:',
        indent(update.summary, '  '),
        '',
      ];
    case 'text':
      return [];
  }
}

export function formatBudget(budget: BudgetState): string {
  return `${budget.count}/${budget.limit} calls`;
}

export function formatToolLog(log: ToolCallRecord[]): string {
  if (log.length === 0) return 'No tool calls.';
  return log.map((record, i) => {
    const outcome = record.status === 'started'
      ? 'not finished'
      : record.success === false ? 'failed' : 'ok';
    return `[${CALL_LABEL} ${i + 1}] ${record.toolName} ${outcome} (${clockTime(record.timestamp)})\n`
      + indent(formatPayload(record.payload));
  }).join('\n');
}

export function formatHistory(messages: SessionMessage[]): string {
  if (messages.length === 0) return 'No messages in this session.';
  return messages.map(msg => {
    const prefix = msg.role === 'user' ? 'You' : 'Assistant';
    const preview = msg.content.length > 120 ? msg.content.slice(0, 120) + '...' : msg.content;
    const calls = msg.toolLog?.length ? ` [${msg.toolLog.length} calls]` : '';
    return `  [${prefix}]${calls} ${preview}`;
  }).join('\n');
}

export function formatSessionList(entries: SessionListEntry[]): string {
  if (entries.length === 0) return 'No saved sessions.';
  return ['Previous sessions:', ...entries.map(entry =>
    `  ${entry.id} | ${entry.messageCount} msgs | ${entry.updatedAt} | ${entry.preview}`,
  )].join('\n');
}

export function formatTraceEvent(event: TraceEvent): string {
  return `[${event.level}] ${event.type} ${JSON.stringify(event.data)}`;
}
