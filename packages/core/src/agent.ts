import {
  StaleInterruptionError,
  type AgentObserver,
  type ChatMessage,
  type InterruptDescriptor,
  type InterruptResponses,
} from '@costwise/shared';

export type AgentRunResult =
  | {
      stopReason: 'completed';
      text: string;
      messages: ChatMessage[];
      /** True when the run stopped at its iteration cap instead of answering. */
      partial: boolean;
    }
  | {
      stopReason: 'interrupt_requested';
      interrupts: InterruptDescriptor[];
      run: SuspendedRun;
    };

export type InterruptedRun = Extract<AgentRunResult, { stopReason: 'interrupt_requested' }>;

/** A tool call the model asked for that has not been dispatched yet. */
export interface PendingToolCall {
  callId: string;
  toolName: string;
  toolArgs: Record<string, unknown>;
}

export interface RunState {
  messages: ChatMessage[];
  pendingCalls: PendingToolCall[];
  /** Results of the current batch not yet handed back to the model. */
  batchResults: string[];
  iteration: number;
  dispatched: number;
}

/**
 * Everything needed to pick an interrupted run back up. Resuming consumes
 * the handle; a second resume is rejected.
 */
export class SuspendedRun {
  private consumed = false;

  constructor(
    readonly interruptId: string,
    private readonly state: RunState,
  ) {}

  isConsumed(): boolean {
    return this.consumed;
  }

  take(): RunState {
    if (this.consumed) {
      throw new StaleInterruptionError(this.interruptId);
    }
    this.consumed = true;
    return this.state;
  }

  /** Read-only view of the conversation so far, for summaries. */
  transcript(): { messages: ChatMessage[]; batchResults: string[] } {
    return {
      messages: this.state.messages.map(m => ({ ...m })),
      batchResults: [...this.state.batchResults],
    };
  }
}

/** A prompt, or a conversation whose last message is the current question. */
export type AgentInput = string | ChatMessage[];

export interface Agent {
  run(input: AgentInput, observer: AgentObserver): Promise<AgentRunResult>;
  resume(run: SuspendedRun, responses: InterruptResponses, observer: AgentObserver): Promise<AgentRunResult>;
  /** Answers `instruction` from what the run has gathered, without tool access. */
  summarize(run: SuspendedRun, instruction: string): Promise<string>;
}
