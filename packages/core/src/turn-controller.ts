import {
  StaleInterruptionError,
  errorMessage,
  generateId,
  isoNow,
  type AssistantStatus,
  type ChatSession,
  type ToolCallRecord,
  type TurnTrace,
  type UserDecision,
} from '@costwise/shared';
import type { Agent, AgentRunResult } from './agent.js';
import type { BudgetTracker } from './budget-tracker.js';
import { INTERRUPTION_CHOICES, type Display } from './display.js';
import {
  InterruptionCoordinator,
  type InterruptionCoordinatorOptions,
  type InterruptionSnapshot,
} from './interruption-coordinator.js';
import { buildTurnPrompt } from './prompt-builder.js';
import { newSession, withMessage } from './session-manager.js';
import { StreamInterceptor } from './stream-interceptor.js';
import { TraceLogger, type TurnLog } from './trace-logger.js';

/** Everything a session carries between interactions. */
export interface SessionState {
  readonly session: ChatSession;
  readonly pending: InterruptionSnapshot | null;
  readonly contextPairs: number;
}

export type TurnOutcome =
  | { kind: 'completed'; content: string; toolLog: ToolCallRecord[] }
  | { kind: 'interrupted'; snapshot: InterruptionSnapshot }
  | { kind: 'stopped'; content: string; toolLog: ToolCallRecord[] }
  | { kind: 'failed'; content: string; toolLog: ToolCallRecord[]; error: unknown }
  | { kind: 'ignored'; reason: string };

export interface TurnResult {
  state: SessionState;
  outcome: TurnOutcome;
}

export interface TurnControllerOptions {
  agent: Agent;
  budget: BudgetTracker;
  tracer?: TraceLogger;
  coordinator?: InterruptionCoordinatorOptions;
  /** Called with the log of each turn before it starts, for agents that trace. */
  onTurnLog?: (log: TurnLog) => void;
  /** Makes the tools available before a turn runs; a rejection fails the turn. */
  prepareTools?: () => Promise<unknown>;
}

/**
 * Runs one user turn at a time against the agent and carries a possible
 * interruption over to the next call. All session data travels in the
 * SessionState passed in and handed back; the controller keeps none.
 */
export class TurnController {
  private readonly agent: Agent;
  private readonly budget: BudgetTracker;
  private readonly tracer: TraceLogger;
  private readonly coordinator: InterruptionCoordinator;
  private lastTrace: TurnTrace | null = null;
  private turnSpans = new Map<string, string>();

  constructor(private readonly options: TurnControllerOptions) {
    this.agent = options.agent;
    this.budget = options.budget;
    this.tracer = options.tracer ?? new TraceLogger();
    this.coordinator = new InterruptionCoordinator(options.agent, options.budget, options.coordinator);
  }

  createState(session: ChatSession = newSession(), contextPairs = 3): SessionState {
    return { session, pending: null, contextPairs };
  }

  getBudget(): BudgetTracker {
    return this.budget;
  }

  getLastTrace(): TurnTrace | null {
    return this.lastTrace;
  }

  async submit(state: SessionState, userText: string, display?: Display): Promise<TurnResult> {
    if (state.pending) {
      return { state, outcome: { kind: 'ignored', reason: 'An interruption is waiting for a decision.' } };
    }

    const history = state.session.messages;
    const session = withMessage(state.session, { role: 'user', content: userText, timestamp: isoNow() });

    // Per-turn budget
    this.budget.reset();
    const log = this.openTrace();
    log.event('info', { phase: 'submit', contextPairs: state.contextPairs });

    const interceptor = new StreamInterceptor(this.budget, {
      log,
      onProgress: display ? update => display.renderProgress(update) : undefined,
    });

    try {
      await this.options.prepareTools?.();
      const prompt = buildTurnPrompt(history, userText, state.contextPairs);
      const result = await this.agent.run(prompt, interceptor);
      return await this.settle({ ...state, session }, result, interceptor, log, display);
    } catch (err) {
      return this.fail({ ...state, session, pending: null }, interceptor.getToolLog(), err, log);
    }
  }

  async resolve(state: SessionState, decision: UserDecision, display?: Display): Promise<TurnResult> {
    const snapshot = state.pending;
    if (!snapshot) {
      this.tracer.logEvent('session', 'stale_interruption', { decision }, 'warn');
      return { state, outcome: { kind: 'ignored', reason: 'No interruption is pending.' } };
    }

    const log = this.openTrace();
    const cleared: SessionState = { ...state, pending: null };
    const interceptor = new StreamInterceptor(this.budget, {
      initialLog: [...snapshot.partialToolLog],
      log,
      onProgress: display ? update => display.renderProgress(update) : undefined,
    });

    try {
      const resolution = await this.coordinator.resolve(snapshot, decision, interceptor, log);
      if (resolution.kind === 'finalized') {
        return this.finish(cleared, 'stopped', resolution.content, resolution.toolLog, log);
      }
      return await this.settle(cleared, resolution.result, interceptor, log, display);
    } catch (err) {
      if (err instanceof StaleInterruptionError) {
        log.event('stale_interruption', { interruptionId: err.interruptionId, decision }, 'warn');
        this.closeTrace(log);
        return { state: cleared, outcome: { kind: 'ignored', reason: err.message } };
      }
      return this.fail(cleared, interceptor.getToolLog(), err, log);
    }
  }

  /**
   * Submits a message and, whenever the turn is interrupted, asks the
   * display for a decision until the turn ends.
   */
  async converse(state: SessionState, userText: string, display: Display): Promise<TurnResult> {
    let result = await this.submit(state, userText, display);
    while (result.outcome.kind === 'interrupted') {
      const { snapshot } = result.outcome;
      const decision = await display.presentChoice(
        `${snapshot.message} Continue running more?`,
        INTERRUPTION_CHOICES,
      );
      result = await this.resolve(result.state, decision, display);
    }
    return result;
  }

  /** Drops the history and any pending interruption. */
  clear(state: SessionState): SessionState {
    if (state.pending) {
      state.pending.handle = null;
      state.pending.phase = 'finalized';
    }
    return {
      ...state,
      pending: null,
      session: {
        ...state.session,
        updatedAt: isoNow(),
        messages: [],
        metadata: { messageCount: 0, toolCallCount: 0, interruptionCount: 0 },
      },
    };
  }

  private async settle(
    state: SessionState,
    result: AgentRunResult,
    interceptor: StreamInterceptor,
    log: TurnLog,
    display?: Display,
  ): Promise<TurnResult> {
    if (result.stopReason === 'completed') {
      return this.finish(state, 'completed', result.text, interceptor.getToolLog(), log);
    }

    const snapshot = await this.coordinator.capture(result, interceptor, log);
    display?.renderProgress({
      type: 'limit_reached',
      message: snapshot.message,
      summary: snapshot.partialSummary,
      budget: this.budget.getState(),
    });
    this.closeTrace(log);

    const session: ChatSession = {
      ...state.session,
      metadata: {
        ...state.session.metadata,
        interruptionCount: state.session.metadata.interruptionCount + 1,
      },
    };
    return { state: { ...state, session, pending: snapshot }, outcome: { kind: 'interrupted', snapshot } };
  }

  private finish(
    state: SessionState,
    status: Exclude<AssistantStatus, 'failed'>,
    content: string,
    toolLog: ToolCallRecord[],
    log: TurnLog,
  ): TurnResult {
    const session = withMessage(state.session, {
      role: 'assistant',
      content,
      timestamp: isoNow(),
      toolLog,
      status,
    });
    log.event('finalize', { status, toolCalls: toolLog.length });
    this.closeTrace(log);
    return { state: { ...state, session, pending: null }, outcome: { kind: status, content, toolLog } };
  }

  /** Error boundary: whatever failed becomes the assistant's reply. */
  private fail(state: SessionState, toolLog: ToolCallRecord[], err: unknown, log: TurnLog): TurnResult {
    const detail = errorMessage(err);
    const content = `❌ Error: ${detail}`;
    log.event('error', { error: detail, toolCalls: toolLog.length }, 'error');
    this.closeTrace(log);

    const session = withMessage(state.session, {
      role: 'assistant',
      content,
      timestamp: isoNow(),
      toolLog,
      status: 'failed',
    });
    return { state: { ...state, session, pending: null }, outcome: { kind: 'failed', content, toolLog, error: err } };
  }

  private openTrace(): TurnLog {
    const turnId = generateId('turn');
    this.tracer.createTrace(turnId, turnId, this.budget.getState());
    const log = this.tracer.forTrace(turnId);
    this.turnSpans.set(turnId, this.tracer.startSpan(turnId, 'turn'));
    this.options.onTurnLog?.(log);
    return log;
  }

  private closeTrace(log: TurnLog): void {
    const spanId = this.turnSpans.get(log.traceId);
    this.turnSpans.delete(log.traceId);
    if (this.tracer.hasTrace(log.traceId)) {
      if (spanId) this.tracer.endSpan(log.traceId, spanId);
      this.lastTrace = this.tracer.getTrace(log.traceId, this.budget.getState());
    }
  }
}
