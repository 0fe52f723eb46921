import {
  ToolNotFoundError,
  generateId,
  type AgentObserver,
  type ChatMessage,
  type InterruptResponses,
  type ModelRequest,
  type ModelResponse,
  type ToolResult,
} from '@costwise/shared';
import type { ModelProvider } from '@costwise/models';
import { SuspendedRun, type Agent, type AgentInput, type AgentRunResult, type RunState } from './agent.js';
import { parseReply } from './reply-parser.js';
import type { ToolRegistry } from './tool-registry.js';
import type { TurnLog } from './trace-logger.js';

/** Maximum number of messages before the sliding window kicks in. */
const MAX_MESSAGE_HISTORY = 30;

/** Maximum size of one tool result handed back to the model, in characters. */
const MAX_TOOL_RESULT_SIZE = 8_000;

/** Maximum size for a single tool argument value in characters. */
const MAX_TOOL_ARG_SIZE = 50_000;

export interface ToolCallingAgentOptions {
  provider: ModelProvider;
  model: string;
  tools: ToolRegistry;
  /** Domain instructions; the reply format and tool list are appended. */
  instructions: string;
  maxIterations?: number;
  maxTokens?: number;
  temperature?: number;
  log?: TurnLog;
}

/**
 * Reactive tool-use loop over a plain chat model:
 *
 *   1. Call the model with the conversation so far
 *   2. Parse the JSON reply into tool calls or a final answer
 *   3. Report each tool call to the observer, then dispatch it
 *   4. Hand the results back inside `<tool_results>` and loop
 *
 * The observer may interrupt before a call is dispatched. The run then
 * returns a SuspendedRun that `resume` continues from that very call.
 */
export class ToolCallingAgent implements Agent {
  private readonly maxIterations: number;

  constructor(private readonly options: ToolCallingAgentOptions) {
    this.maxIterations = options.maxIterations ?? 20;
  }

  setLog(log: TurnLog | undefined): void {
    this.options.log = log;
  }

  async run(input: AgentInput, observer: AgentObserver): Promise<AgentRunResult> {
    return this.loop({
      messages: typeof input === 'string' ? [{ role: 'user', content: input }] : [...input],
      pendingCalls: [],
      batchResults: [],
      iteration: 0,
      dispatched: 0,
    }, observer);
  }

  async resume(
    run: SuspendedRun,
    responses: InterruptResponses,
    observer: AgentObserver,
  ): Promise<AgentRunResult> {
    if (!responses[run.interruptId]) {
      throw new Error(`No response given for interrupt ${run.interruptId}`);
    }
    const state = run.take();
    this.options.log?.event('resume', { interruptId: run.interruptId, pending: state.pendingCalls.length });
    return this.loop(state, observer);
  }

  async summarize(run: SuspendedRun, instruction: string): Promise<string> {
    const { messages, batchResults } = run.transcript();
    const content = batchResults.length > 0
      ? `${this.formatResults(batchResults)}\n\n${instruction}`
      : instruction;

    const response = await this.chat([...messages, { role: 'user', content }], false);
    const reply = parseReply(response.content);
    return reply.type === 'final_answer' ? reply.answer : response.content;
  }

  private async loop(state: RunState, observer: AgentObserver): Promise<AgentRunResult> {
    const interrupted = await this.dispatchBatch(state, observer);
    if (interrupted) return interrupted;

    while (state.iteration < this.maxIterations) {
      state.iteration++;

      const response = await this.chat(state.messages, true);
      const reply = parseReply(response.content);
      for (const raw of reply.malformed) {
        observer.observe({ type: 'unknown', raw });
      }

      state.messages.push({ role: 'assistant', content: response.content });

      if (reply.type === 'final_answer') {
        observer.observe({ type: 'text', text: reply.answer });
        return { stopReason: 'completed', text: reply.answer, messages: state.messages, partial: false };
      }

      state.pendingCalls = reply.toolCalls.map(call => ({
        callId: generateId('call'),
        toolName: call.toolName,
        toolArgs: this.sanitizeToolArgs(call.toolArgs),
      }));
      state.batchResults = [];

      const batchInterrupted = await this.dispatchBatch(state, observer);
      if (batchInterrupted) return batchInterrupted;
    }

    const lastAssistant = [...state.messages].reverse().find(m => m.role === 'assistant');
    const text = lastAssistant
      ? `(Partial - max iterations reached) ${this.truncate(lastAssistant.content, 500)}`
      : '(Partial - max iterations reached)';
    return { stopReason: 'completed', text, messages: state.messages, partial: true };
  }

  /**
   * Dispatches the pending calls in order. Returns the interrupted result if
   * the observer stops the batch, otherwise appends the results to the
   * conversation and returns null.
   */
  private async dispatchBatch(state: RunState, observer: AgentObserver): Promise<AgentRunResult | null> {
    if (state.pendingCalls.length === 0) return null;

    while (state.pendingCalls.length > 0) {
      const call = state.pendingCalls[0];
      const action = observer.observe({
        type: 'tool_call_start',
        callId: call.callId,
        toolName: call.toolName,
        payload: call.toolArgs,
      });

      if (action === 'interrupt') {
        const interruptId = generateId('interrupt');
        return {
          stopReason: 'interrupt_requested',
          interrupts: [{
            id: interruptId,
            name: 'tool_limit_reached',
            reason: { toolName: call.toolName, payload: call.toolArgs, toolCalls: state.dispatched },
          }],
          run: new SuspendedRun(interruptId, state),
        };
      }

      state.pendingCalls.shift();

      if (action === 'suppress') {
        state.batchResults.push(`[${call.toolName}] Skipped: call was not dispatched.`);
        continue;
      }

      state.dispatched++;
      const result = await this.invokeTool(call.toolName, call.toolArgs);
      observer.observe({
        type: 'tool_call_end',
        callId: call.callId,
        toolName: call.toolName,
        success: result.success,
        error: result.error,
      });

      state.batchResults.push(result.success
        ? `[${call.toolName}] Success: ${this.truncate(this.stringify(result.output), MAX_TOOL_RESULT_SIZE)}`
        : `[${call.toolName}] Error: ${result.error ?? 'Unknown error'}`);
    }

    state.messages.push({
      role: 'user',
      content: `${this.formatResults(state.batchResults)}\n\nContinue with the task. If done, respond with {"answer": "your final answer"}.`,
    });
    state.batchResults = [];
    return null;
  }

  private async invokeTool(toolName: string, input: Record<string, unknown>): Promise<ToolResult> {
    try {
      return await this.options.tools.invoke({ toolName, input });
    } catch (err) {
      if (err instanceof ToolNotFoundError) {
        return { toolName, success: false, error: `Unknown tool: ${toolName}`, durationMs: 0 };
      }
      throw err;
    }
  }

  private async chat(messages: ChatMessage[], withTools: boolean): Promise<ModelResponse> {
    const request: ModelRequest = {
      model: this.options.model,
      provider: this.options.provider.name,
      system: this.buildSystemPrompt(withTools),
      messages: this.applyMessageWindow(messages),
      maxTokens: this.options.maxTokens,
      temperature: this.options.temperature ?? 0.2,
      responseFormat: 'json',
    };
    const response = await this.options.provider.chat(request);
    this.options.log?.event('model_call', {
      model: response.model,
      totalTokens: response.tokenUsage.totalTokens,
      latencyMs: response.latencyMs,
      withTools,
    }, 'debug');
    return response;
  }

  private buildSystemPrompt(withTools: boolean): string {
    let prompt = `${this.options.instructions}

## Response Format

You MUST respond with ONLY a raw JSON object (no markdown, no code fences, no extra text).`;

    const toolDescriptions = withTools ? this.options.tools.getToolDescriptions() : [];
    if (toolDescriptions.length === 0) {
      return `${prompt}\n\nYou have NO tools available. Respond directly with {"answer": "..."}.`;
    }

    prompt += `

### When you need to use tools:
Respond with:
{"tool_calls": [{"toolName": "<tool_name>", "toolArgs": {<arguments>}}]}

You can call multiple tools at once. Tool results will be sent back to you.

### When you are done:
Respond with:
{"answer": "<your final answer>"}

## Available Tools
`;
    for (const tool of toolDescriptions) {
      prompt += `\n- **${tool.name}**: ${tool.description}`;
    }
    return prompt;
  }

  /** Keeps the first message (the question) and the most recent ones. */
  private applyMessageWindow(messages: ChatMessage[]): ChatMessage[] {
    if (messages.length <= MAX_MESSAGE_HISTORY) {
      return messages;
    }
    return [messages[0], ...messages.slice(-(MAX_MESSAGE_HISTORY - 1))];
  }

  /** Wraps results in delimiters the results themselves cannot close. */
  private formatResults(results: string[]): string {
    const sanitized = results.map(r => r
      .replace(/<\/tool_results>/gi, '&lt;/tool_results&gt;')
      .replace(/<tool_results>/gi, '&lt;tool_results&gt;'));
    return `<tool_results>\n${sanitized.join('\n')}\n</tool_results>`;
  }

  private sanitizeToolArgs(args: Record<string, unknown>): Record<string, unknown> {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(args)) {
      sanitized[key] = typeof value === 'string' && value.length > MAX_TOOL_ARG_SIZE
        ? value.slice(0, MAX_TOOL_ARG_SIZE)
        : value;
    }
    return sanitized;
  }

  private stringify(output: unknown): string {
    if (output === undefined || output === null) return 'OK';
    return typeof output === 'string' ? output : JSON.stringify(output);
  }

  private truncate(str: string, maxLen: number): string {
    return str.length > maxLen ? str.slice(0, maxLen) + '...[truncated]' : str;
  }
}
