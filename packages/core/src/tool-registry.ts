import { ZodObject } from 'zod';
import {
  type ToolDefinition,
  type ToolInvocation,
  type ToolResult,
  ToolNotFoundError,
  TransportError,
  errorMessage,
  monotonicNow,
} from '@costwise/shared';

export class ToolRegistry {
  private tools = new Map<string, ToolDefinition>();

  register(tool: ToolDefinition): void {
    this.tools.set(tool.name, tool);
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  getToolDescriptions(): Array<{ name: string; description: string }> {
    return this.list().map(t => {
      let desc = t.description;

      // Argument names and descriptions from object schemas, for the prompt
      if (t.inputSchema instanceof ZodObject) {
        const shape: Record<string, { description?: string }> = t.inputSchema.shape;
        const args = Object.entries(shape).map(([key, field]) =>
          field.description ? `${key}: ${field.description}` : key,
        );
        if (args.length > 0) {
          desc += ` | Args: ${args.join(', ')}`;
        }
      }

      return { name: t.name, description: desc };
    });
  }

  /**
   * Validates the input and runs the tool. Tool failures come back as an
   * unsuccessful result; a transport failure is rethrown since no later call
   * in the turn could succeed either.
   */
  async invoke(invocation: ToolInvocation): Promise<ToolResult> {
    const tool = this.tools.get(invocation.toolName);
    if (!tool) {
      throw new ToolNotFoundError(invocation.toolName);
    }

    const startTime = monotonicNow();

    try {
      const parsedInput = tool.inputSchema.parse(invocation.input);
      const output = await tool.execute(parsedInput);

      return {
        toolName: invocation.toolName,
        success: true,
        output,
        durationMs: monotonicNow() - startTime,
      };
    } catch (error) {
      if (error instanceof TransportError) throw error;
      return {
        toolName: invocation.toolName,
        success: false,
        error: errorMessage(error),
        durationMs: monotonicNow() - startTime,
      };
    }
  }
}
