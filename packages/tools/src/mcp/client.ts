import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  type McpServerConfig,
  type ToolClient,
  type ToolDefinition,
  TransportError,
  errorMessage,
} from '@costwise/shared';
import { createTransport } from './transport.js';
import { mcpToolToToolDefinition } from './schema-bridge.js';

interface TextContent {
  type: 'text';
  text: string;
}

function isTextContent(value: unknown): value is TextContent {
  return typeof value === 'object' && value !== null
    && 'type' in value && value.type === 'text'
    && 'text' in value && typeof value.text === 'string';
}

/**
 * ToolClient over the Model Context Protocol. Connects on first use and keeps
 * the connection for the lifetime of the session that owns it.
 */
export class McpToolClient implements ToolClient {
  private client: Client;
  private transport: Transport | null = null;
  private connected = false;
  private starting: Promise<void> | null = null;

  constructor(
    private serverName: string,
    private config: McpServerConfig,
  ) {
    this.client = new Client(
      { name: 'costwise', version: '0.1.0' },
      { capabilities: {} },
    );
  }

  async start(): Promise<void> {
    if (this.connected) return;
    // Concurrent callers share one connection attempt
    if (!this.starting) {
      this.starting = this.connect().finally(() => {
        this.starting = null;
      });
    }
    return this.starting;
  }

  async listTools(): Promise<ToolDefinition[]> {
    await this.start();

    let result;
    try {
      result = await this.client.listTools();
    } catch (err) {
      throw new TransportError('tool_client', `listing tools on ${this.serverName}: ${errorMessage(err)}`, err);
    }

    return result.tools.map(tool =>
      mcpToolToToolDefinition(
        {
          name: `${this.serverName}__${tool.name}`,
          description: tool.description,
          inputSchema: tool.inputSchema,
        },
        args => this.callTool(tool.name, args),
      ),
    );
  }

  async callTool(name: string, args: Record<string, unknown>): Promise<unknown> {
    if (!this.connected) {
      throw new TransportError('tool_client', `MCP client not connected: ${this.serverName}`);
    }

    let result;
    try {
      result = await this.client.callTool({ name, arguments: args });
    } catch (err) {
      throw new TransportError('tool_client', `calling ${name}: ${errorMessage(err)}`, err);
    }

    // Extract text content from MCP response
    const content: unknown[] = Array.isArray(result.content) ? result.content : [];
    const textParts = content.filter(isTextContent).map(c => c.text);
    const text = textParts.join('\n');

    if (result.isError === true) {
      throw new Error(text || `Tool ${name} reported an error`);
    }
    if (textParts.length > 0) return text;

    return result;
  }

  async close(): Promise<void> {
    if (this.connected) {
      await this.client.close();
      this.connected = false;
      this.transport = null;
    }
  }

  isConnected(): boolean {
    return this.connected;
  }

  getName(): string {
    return this.serverName;
  }

  private async connect(): Promise<void> {
    try {
      this.transport = createTransport(this.config);
      await this.client.connect(this.transport);
      this.connected = true;
    } catch (err) {
      this.transport = null;
      throw new TransportError('tool_client', `connecting to ${this.serverName}: ${errorMessage(err)}`, err);
    }
  }
}
