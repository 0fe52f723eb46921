import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ToolNotFoundError, TransportError, type ToolDefinition } from '@costwise/shared';
import { ToolRegistry } from '../src/tool-registry.js';

const echoTool: ToolDefinition<{ message: string }, { echoed: string }> = {
  name: 'echo',
  description: 'Echo input back',
  inputSchema: z.object({ message: z.string().describe('text to echo') }),
  async execute(input) {
    return { echoed: input.message };
  },
};

const failTool: ToolDefinition = {
  name: 'fail',
  description: 'Always fails',
  inputSchema: z.object({}),
  async execute() {
    throw new Error('intentional failure');
  },
};

const disconnectedTool: ToolDefinition = {
  name: 'remote',
  description: 'Remote tool whose server is gone',
  inputSchema: z.object({}),
  async execute() {
    throw new TransportError('tool_client', 'not connected');
  },
};

describe('ToolRegistry', () => {
  it('registers and lists tools', () => {
    const registry = new ToolRegistry();
    registry.register(echoTool);
    expect(registry.list()).toHaveLength(1);
    expect(registry.has('echo')).toBe(true);
    expect(registry.has('nonexistent')).toBe(false);
  });

  it('invokes a tool successfully', async () => {
    const registry = new ToolRegistry();
    registry.register(echoTool);

    const result = await registry.invoke({ toolName: 'echo', input: { message: 'hello' } });

    expect(result.success).toBe(true);
    expect(result.output).toEqual({ echoed: 'hello' });
    expect(result.durationMs).toBeGreaterThanOrEqual(0);
  });

  it('returns error result on tool failure', async () => {
    const registry = new ToolRegistry();
    registry.register(failTool);

    const result = await registry.invoke({ toolName: 'fail', input: {} });

    expect(result.success).toBe(false);
    expect(result.error).toBe('intentional failure');
  });

  it('rethrows transport failures', async () => {
    const registry = new ToolRegistry();
    registry.register(disconnectedTool);

    await expect(registry.invoke({ toolName: 'remote', input: {} })).rejects.toBeInstanceOf(TransportError);
  });

  it('throws ToolNotFoundError for unknown tool', async () => {
    const registry = new ToolRegistry();
    await expect(
      registry.invoke({ toolName: 'nonexistent', input: {} }),
    ).rejects.toThrow(ToolNotFoundError);
  });

  it('validates input against schema', async () => {
    const registry = new ToolRegistry();
    registry.register(echoTool);

    const result = await registry.invoke({ toolName: 'echo', input: { wrong: 'field' } });

    expect(result.success).toBe(false);
  });

  it('returns tool descriptions with argument info', () => {
    const registry = new ToolRegistry();
    registry.register(echoTool);
    registry.register(failTool);
    expect(registry.getToolDescriptions()).toEqual([
      { name: 'echo', description: 'Echo input back | Args: message: text to echo' },
      { name: 'fail', description: 'Always fails' },
    ]);
  });
});
