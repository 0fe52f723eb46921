import type { BudgetState, ToolCallRecord, UserDecision } from '@costwise/shared';

export type ProgressUpdate =
  | { type: 'tool_started'; record: ToolCallRecord; ordinal: number }
  | { type: 'tool_completed'; record: ToolCallRecord; ordinal: number; budget: BudgetState }
  | { type: 'tool_blocked'; toolName: string; budget: BudgetState }
  | { type: 'text'; text: string }
  | { type: 'limit_reached'; message: string; summary: string; budget: BudgetState };

export interface ChoiceOption<T extends string> {
  value: T;
  label: string;
}

/** Where a turn's progress is shown and where the user answers an interruption. */
export interface Display {
  renderProgress(update: ProgressUpdate): void;
  presentChoice(prompt: string, options: ChoiceOption<UserDecision>[]): Promise<UserDecision>;
}

export const INTERRUPTION_CHOICES: ChoiceOption<UserDecision>[] = [
  { value: 'approve_continue', label: 'Continue' },
  { value: 'stop', label: 'Stop here' },
];
