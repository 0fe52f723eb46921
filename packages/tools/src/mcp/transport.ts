import { StdioClientTransport, getDefaultEnvironment } from '@modelcontextprotocol/sdk/client/stdio.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type { McpServerConfig } from '@costwise/shared';
import { ConfigError } from '@costwise/shared';

export function createTransport(config: McpServerConfig): Transport {
  if (config.transport === 'stdio') {
    if (!config.command) {
      throw new ConfigError('MCP stdio transport requires a command');
    }
    return new StdioClientTransport({
      command: config.command,
      args: config.args,
      // The server process only inherits the SDK's safe default variables
      env: config.env ? { ...getDefaultEnvironment(), ...config.env } : undefined,
    });
  }

  if (!config.url) {
    throw new ConfigError('MCP sse transport requires a url');
  }
  return new SSEClientTransport(new URL(config.url));
}
