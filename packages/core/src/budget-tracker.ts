import {
  ConfigError,
  DEFAULT_TOOL_CALL_LIMIT,
  type BudgetState,
} from '@costwise/shared';

export interface BudgetTrackerOptions {
  limit?: number;
  /**
   * Substrings of tool names that count toward the limit, e.g. `execute_query`
   * for a server that also exposes cheap metadata tools. Empty counts all.
   */
  countedTools?: string[];
}

/**
 * Counts completed tool calls within one turn against a fixed limit.
 * Owned by the turn controller; the interceptor only reads and increments it.
 */
export class BudgetTracker {
  readonly limit: number;
  private count = 0;
  private readonly countedTools: string[];

  constructor(options: BudgetTrackerOptions = {}) {
    const limit = options.limit ?? DEFAULT_TOOL_CALL_LIMIT;
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ConfigError(`tool call limit must be a positive integer, got ${limit}`);
    }
    this.limit = limit;
    this.countedTools = options.countedTools ?? [];
  }

  counts(toolName: string): boolean {
    return this.countedTools.length === 0
      || this.countedTools.some(fragment => toolName.includes(fragment));
  }

  increment(): number {
    this.count++;
    return this.count;
  }

  isExhausted(): boolean {
    return this.count >= this.limit;
  }

  reset(): void {
    this.count = 0;
  }

  getState(): BudgetState {
    return { count: this.count, limit: this.limit };
  }
}
