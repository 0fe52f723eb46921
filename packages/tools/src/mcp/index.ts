export { McpToolClient } from './client.js';
export { jsonSchemaToZod, mcpToolToToolDefinition } from './schema-bridge.js';
export { createTransport } from './transport.js';
