export { BudgetTracker, type BudgetTrackerOptions } from './budget-tracker.js';
export { StreamInterceptor, type StreamInterceptorOptions } from './stream-interceptor.js';
export {
  InterruptionCoordinator,
  type InterruptionCoordinatorOptions,
  type InterruptionSnapshot,
  type Resolution,
} from './interruption-coordinator.js';
export {
  TurnController,
  type SessionState,
  type TurnControllerOptions,
  type TurnOutcome,
  type TurnResult,
} from './turn-controller.js';
export {
  SuspendedRun,
  type Agent,
  type AgentInput,
  type AgentRunResult,
  type InterruptedRun,
  type PendingToolCall,
  type RunState,
} from './agent.js';
export { ToolCallingAgent, type ToolCallingAgentOptions } from './tool-calling-agent.js';
export { parseReply, stripCodeFences, type ParsedReply, type ParsedToolCall } from './reply-parser.js';
export { INTERRUPTION_CHOICES, type ChoiceOption, type Display, type ProgressUpdate } from './display.js';
export { buildSystemPrompt, buildTurnPrompt, type SystemPromptOptions } from './prompt-builder.js';
export { loadCostRules, type CostRules, type CostRulesLoadResult } from './cost-rules.js';
export { ConfigManager, type ConfigOverrides } from './config-manager.js';
export { SessionManager, newSession, withMessage } from './session-manager.js';
export { TraceLogger, type TraceLoggerOptions, type TraceSink, type TurnLog } from './trace-logger.js';
export { ToolRegistry } from './tool-registry.js';
