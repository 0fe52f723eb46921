import {
  PARTIAL_SUMMARY_INSTRUCTION,
  StaleInterruptionError,
  generateId,
  type InterruptName,
  type InterruptionPhase,
  type ToolCallRecord,
  type UserDecision,
} from '@costwise/shared';
import type { Agent, AgentRunResult, InterruptedRun, SuspendedRun } from './agent.js';
import type { BudgetTracker } from './budget-tracker.js';
import type { StreamInterceptor } from './stream-interceptor.js';
import type { TurnLog } from './trace-logger.js';

export interface InterruptionSnapshot {
  readonly id: string;
  readonly reason: InterruptName;
  readonly message: string;
  readonly partialToolLog: readonly ToolCallRecord[];
  readonly partialSummary: string;
  readonly interruptId: string;
  phase: InterruptionPhase;
  /** The suspended run; null once the interruption is resolved. */
  handle: SuspendedRun | null;
}

export type Resolution =
  | { kind: 'resumed'; result: AgentRunResult }
  | { kind: 'finalized'; content: string; toolLog: ToolCallRecord[] };

export interface InterruptionCoordinatorOptions {
  summaryInstruction?: string;
  /** Unit shown in the notice, e.g. "queries". */
  callNoun?: string;
}

/**
 * Owns an interruption from the moment the budget runs out until the user
 * decides: running -> limit_reached -> resumed | finalized.
 */
export class InterruptionCoordinator {
  private readonly summaryInstruction: string;
  private readonly callNoun: string;

  constructor(
    private readonly agent: Agent,
    private readonly budget: BudgetTracker,
    options: InterruptionCoordinatorOptions = {},
  ) {
    this.summaryInstruction = options.summaryInstruction ?? PARTIAL_SUMMARY_INSTRUCTION;
    this.callNoun = options.callNoun ?? 'queries';
  }

  /** Summarizes what the interrupted run found so far. Never touches the budget. */
  async capture(
    result: InterruptedRun,
    interceptor: StreamInterceptor,
    log?: TurnLog,
  ): Promise<InterruptionSnapshot> {
    const [interrupt] = result.interrupts;
    const partialSummary = await this.agent.summarize(result.run, this.summaryInstruction);
    const { count } = this.budget.getState();

    const snapshot: InterruptionSnapshot = {
      id: generateId('intr'),
      reason: interrupt?.name ?? 'tool_limit_reached',
      message: `Already ran ${count} ${this.callNoun}.`,
      partialToolLog: interceptor.getToolLog(),
      partialSummary,
      interruptId: interrupt?.id ?? result.run.interruptId,
      phase: 'limit_reached',
      handle: result.run,
    };

    log?.event('interruption', {
      snapshotId: snapshot.id,
      interruptId: snapshot.interruptId,
      toolName: interrupt?.reason.toolName,
      count,
    });
    return snapshot;
  }

  /**
   * Applies the user's decision. The snapshot is spent before anything is
   * awaited, so a second resolve fails with StaleInterruptionError even while
   * the first is still running.
   */
  async resolve(
    snapshot: InterruptionSnapshot,
    decision: UserDecision,
    interceptor: StreamInterceptor,
    log?: TurnLog,
  ): Promise<Resolution> {
    const handle = snapshot.handle;
    if (!handle || snapshot.phase !== 'limit_reached') {
      throw new StaleInterruptionError(snapshot.id);
    }
    snapshot.handle = null;

    if (decision === 'stop') {
      snapshot.phase = 'finalized';
      log?.event('finalize', { snapshotId: snapshot.id, toolCalls: snapshot.partialToolLog.length });
      return {
        kind: 'finalized',
        content: snapshot.partialSummary,
        toolLog: snapshot.partialToolLog.map(r => ({ ...r })),
      };
    }

    snapshot.phase = 'resumed';
    this.budget.reset();
    log?.event('resume', { snapshotId: snapshot.id, interruptId: snapshot.interruptId });
    const result = await this.agent.resume(
      handle,
      { [snapshot.interruptId]: { decision: 'continue' } },
      interceptor,
    );
    return { kind: 'resumed', result };
  }
}
