export { McpToolClient, jsonSchemaToZod, mcpToolToToolDefinition, createTransport } from './mcp/index.js';
