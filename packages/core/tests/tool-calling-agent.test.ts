import { describe, it, expect } from 'vitest';
import {
  StaleInterruptionError,
  TransportError,
  type AgentEvent,
  type AgentObserver,
  type ObserveAction,
} from '@costwise/shared';
import { ToolCallingAgent } from '../src/tool-calling-agent.js';
import { ToolRegistry } from '../src/tool-registry.js';
import {
  QUERY_TOOL,
  ScriptedProvider,
  answerReply,
  callReply,
  fakeQueryTool,
} from './helpers/fakes.js';

class RecordingObserver implements AgentObserver {
  readonly events: AgentEvent[] = [];

  constructor(private readonly decide: (event: AgentEvent, starts: number) => ObserveAction = () => 'continue') {}

  observe(event: AgentEvent): ObserveAction {
    this.events.push(event);
    const starts = this.events.filter(e => e.type === 'tool_call_start').length;
    return this.decide(event, starts);
  }

  types(): string[] {
    return this.events.map(e => e.type);
  }
}

function setup(replies: ConstructorParameters<typeof ScriptedProvider>[0], maxIterations?: number) {
  const provider = new ScriptedProvider(replies);
  const tool = fakeQueryTool();
  const tools = new ToolRegistry();
  tools.register(tool.definition);
  const agent = new ToolCallingAgent({
    provider,
    model: 'test-model',
    tools,
    instructions: 'You analyze cloud costs.',
    maxIterations,
  });
  return { provider, tool, agent };
}

describe('ToolCallingAgent', () => {
  it('returns a direct answer as text', async () => {
    const { agent, provider } = setup([answerReply('Nothing to query.')]);
    const observer = new RecordingObserver();

    const result = await agent.run('Hi', observer);

    expect(result).toMatchObject({ stopReason: 'completed', text: 'Nothing to query.', partial: false });
    expect(observer.events).toEqual([{ type: 'text', text: 'Nothing to query.' }]);
    expect(provider.requests[0].system).toContain('You analyze cloud costs.');
    expect(provider.requests[0].system).toContain(`**${QUERY_TOOL}**: Run a read-only SQL query | Args: sql: SQL statement`);
  });

  it('announces each call before dispatching it and feeds results back', async () => {
    const { agent, provider, tool } = setup([callReply('SELECT 1'), answerReply('done')]);
    const observer = new RecordingObserver();

    const result = await agent.run('How much?', observer);

    expect(result).toMatchObject({ stopReason: 'completed', text: 'done' });
    expect(tool.executed).toEqual(['SELECT 1']);
    expect(observer.types()).toEqual(['tool_call_start', 'tool_call_end', 'text']);
    expect(observer.events[0]).toMatchObject({ toolName: QUERY_TOOL, payload: { sql: 'SELECT 1' } });

    const followUp = provider.requests[1].messages[2];
    expect(followUp.role).toBe('user');
    expect(followUp.content).toBe(
      `<tool_results>\n[${QUERY_TOOL}] Success: rows for SELECT 1\n</tool_results>\n\n`
      + 'Continue with the task. If done, respond with {"answer": "your final answer"}.',
    );
  });

  it('reports malformed tool call entries as unknown events', async () => {
    const { agent } = setup([
      JSON.stringify({ tool_calls: [{ toolName: QUERY_TOOL, toolArgs: { sql: 'SELECT 2' } }, { bogus: true }] }),
      answerReply('ok'),
    ]);
    const observer = new RecordingObserver();

    await agent.run('q', observer);

    expect(observer.events[0]).toEqual({ type: 'unknown', raw: { bogus: true } });
    expect(observer.types()).toEqual(['unknown', 'tool_call_start', 'tool_call_end', 'text']);
  });

  it('stops before the interrupted call and resumes from it', async () => {
    const { agent, provider, tool } = setup([
      callReply('SELECT 1', 'SELECT 2', 'SELECT 3'),
      answerReply('three queries'),
    ]);
    const first = new RecordingObserver((event, starts) =>
      event.type === 'tool_call_start' && starts === 2 ? 'interrupt' : 'continue');

    const interrupted = await agent.run('q', first);

    expect(interrupted.stopReason).toBe('interrupt_requested');
    if (interrupted.stopReason !== 'interrupt_requested') return;
    expect(tool.executed).toEqual(['SELECT 1']);
    expect(interrupted.interrupts).toEqual([{
      id: interrupted.run.interruptId,
      name: 'tool_limit_reached',
      reason: { toolName: QUERY_TOOL, payload: { sql: 'SELECT 2' }, toolCalls: 1 },
    }]);

    const second = new RecordingObserver();
    const resumed = await agent.resume(
      interrupted.run,
      { [interrupted.run.interruptId]: { decision: 'continue' } },
      second,
    );

    expect(resumed).toMatchObject({ stopReason: 'completed', text: 'three queries' });
    expect(tool.executed).toEqual(['SELECT 1', 'SELECT 2', 'SELECT 3']);
    expect(provider.requests).toHaveLength(2);
    expect(provider.requests[1].messages[0].content).toBe('q');
    expect(provider.requests[1].messages[2].content).toContain(
      `[${QUERY_TOOL}] Success: rows for SELECT 1\n[${QUERY_TOOL}] Success: rows for SELECT 2\n[${QUERY_TOOL}] Success: rows for SELECT 3`,
    );
  });

  it('rejects a second resume of the same run', async () => {
    const { agent } = setup([callReply('SELECT 1'), answerReply('a')]);
    const interrupted = await agent.run('q', new RecordingObserver(() => 'interrupt'));
    if (interrupted.stopReason !== 'interrupt_requested') throw new Error('expected an interrupt');

    const responses = { [interrupted.run.interruptId]: { decision: 'continue' as const } };
    await agent.resume(interrupted.run, responses, new RecordingObserver());

    await expect(agent.resume(interrupted.run, responses, new RecordingObserver()))
      .rejects.toBeInstanceOf(StaleInterruptionError);
  });

  it('requires a response for the interrupt being resumed', async () => {
    const { agent } = setup([callReply('SELECT 1')]);
    const interrupted = await agent.run('q', new RecordingObserver(() => 'interrupt'));
    if (interrupted.stopReason !== 'interrupt_requested') throw new Error('expected an interrupt');

    await expect(agent.resume(interrupted.run, {}, new RecordingObserver()))
      .rejects.toThrow(`No response given for interrupt ${interrupted.run.interruptId}`);
    expect(interrupted.run.isConsumed()).toBe(false);
  });

  it('skips suppressed calls without dispatching them', async () => {
    const { agent, tool, provider } = setup([callReply('SELECT 1', 'SELECT 2'), answerReply('a')]);
    const observer = new RecordingObserver((event, starts) =>
      event.type === 'tool_call_start' && starts === 2 ? 'suppress' : 'continue');

    await agent.run('q', observer);

    expect(tool.executed).toEqual(['SELECT 1']);
    expect(provider.requests[1].messages[2].content).toContain(`[${QUERY_TOOL}] Skipped: call was not dispatched.`);
  });

  it('summarizes without tools, including results not yet returned to the model', async () => {
    const { agent, provider } = setup([callReply('SELECT 1', 'SELECT 2'), answerReply('so far: one query')]);
    const interrupted = await agent.run('q', new RecordingObserver((event, starts) =>
      event.type === 'tool_call_start' && starts === 2 ? 'interrupt' : 'continue'));
    if (interrupted.stopReason !== 'interrupt_requested') throw new Error('expected an interrupt');

    const summary = await agent.summarize(interrupted.run, 'Summarize.');

    expect(summary).toBe('so far: one query');
    const request = provider.requests[1];
    expect(request.system).toContain('You have NO tools available.');
    expect(request.system).not.toContain('## Available Tools');
    expect(request.messages[request.messages.length - 1].content).toBe(
      `<tool_results>\n[${QUERY_TOOL}] Success: rows for SELECT 1\n</tool_results>\n\nSummarize.`,
    );
    expect(interrupted.run.isConsumed()).toBe(false);
  });

  it('returns a tool error to the model for unknown tools', async () => {
    const { agent, provider } = setup([
      JSON.stringify({ tool_calls: [{ toolName: 'drop_table', toolArgs: {} }] }),
      answerReply('sorry'),
    ]);

    await agent.run('q', new RecordingObserver());

    expect(provider.requests[1].messages[2].content).toContain('[drop_table] Error: Unknown tool: drop_table');
  });

  it('propagates transport failures from the model', async () => {
    const { agent } = setup([new TransportError('model', 'connection refused')]);
    await expect(agent.run('q', new RecordingObserver())).rejects.toBeInstanceOf(TransportError);
  });

  it('marks the answer partial when it runs out of iterations', async () => {
    const { agent } = setup([callReply('SELECT 1'), callReply('SELECT 2')], 2);

    const result = await agent.run('q', new RecordingObserver());

    expect(result).toMatchObject({ stopReason: 'completed', partial: true });
    if (result.stopReason === 'completed') {
      expect(result.text).toBe(`(Partial - max iterations reached) ${callReply('SELECT 2')}`);
    }
  });
});
