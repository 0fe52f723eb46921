import { z } from 'zod';
import type { CostwiseConfig } from '../types/config.js';
import { modelProviderNameSchema } from './model.schema.js';

const providerConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1),
  enabled: z.boolean().default(true),
});

export const providersConfigSchema = z.object({
  anthropic: providerConfigSchema.optional(),
  openai: providerConfigSchema.optional(),
});

export const agentConfigSchema = z.object({
  provider: modelProviderNameSchema.default('anthropic'),
  maxIterations: z.number().int().min(1).max(100).default(20),
  maxTokens: z.number().int().positive().default(4096),
  temperature: z.number().min(0).max(2).default(0.2),
});

export const budgetConfigSchema = z.object({
  toolCallLimit: z.number().int().positive().default(5),
  countedTools: z.array(z.string().min(1)).default([]),
});

export const conversationConfigSchema = z.object({
  contextPairs: z.number().int().min(0).max(10).default(3),
  sessionsDir: z.string().optional(),
});

export const costRulesConfigSchema = z.object({
  path: z.string().min(1).default('cost_calculation_rules.json'),
});

export const datasetConfigSchema = z.object({
  cluster: z.string().default('redshift'),
  database: z.string().default('cur_database'),
  schema: z.string().default('cur'),
  table: z.string().default('cost_and_usage_report'),
});

export const mcpServerConfigSchema = z.object({
  transport: z.enum(['stdio', 'sse']),
  command: z.string().optional(),
  args: z.array(z.string()).optional(),
  env: z.record(z.string()).optional(),
  url: z.string().url().optional(),
}).refine(
  s => (s.transport === 'stdio' ? Boolean(s.command) : Boolean(s.url)),
  { message: 'stdio servers need a command, sse servers need a url' },
);

export const mcpConfigSchema = z.object({
  name: z.string().min(1).default('redshift'),
  server: mcpServerConfigSchema.default({
    transport: 'stdio',
    command: 'uvx',
    args: ['awslabs.redshift-mcp-server@latest'],
    env: { AWS_DEFAULT_REGION: 'us-east-1', FASTMCP_LOG_LEVEL: 'ERROR' },
  }),
});

export const loggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export const costwiseConfigSchema: z.ZodType<CostwiseConfig, z.ZodTypeDef, unknown> = z.object({
  providers: providersConfigSchema.default({}),
  agent: agentConfigSchema.default({}),
  budget: budgetConfigSchema.default({}),
  conversation: conversationConfigSchema.default({}),
  costRules: costRulesConfigSchema.default({}),
  dataset: datasetConfigSchema.default({}),
  mcp: mcpConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
});
