import type { CostwiseConfig } from './types/config.js';

export const DEFAULT_TOOL_CALL_LIMIT = 5;

export const MAX_CONTEXT_PAIRS = 10;

/** Instruction for the tool-less run that summarizes an interrupted turn. */
export const PARTIAL_SUMMARY_INSTRUCTION =
  'Based on the information gathered so far, briefly summarize what is known at this point.';

export const DEFAULT_MODELS = {
  anthropic: 'claude-sonnet-4-20250514',
  openai: 'gpt-4o',
} as const;

export const CONFIG_FILE_NAMES = [
  'costwise.config.yaml',
  'costwise.config.yml',
  'costwise.config.json',
] as const;

export const DEFAULT_SESSIONS_DIR = '.costwise/sessions';

export const DEFAULT_CONFIG: CostwiseConfig = {
  providers: {},
  agent: {
    provider: 'anthropic',
    maxIterations: 20,
    maxTokens: 4096,
    temperature: 0.2,
  },
  budget: {
    toolCallLimit: DEFAULT_TOOL_CALL_LIMIT,
    countedTools: [],
  },
  conversation: {
    contextPairs: 3,
  },
  costRules: {
    path: 'cost_calculation_rules.json',
  },
  dataset: {
    cluster: 'redshift',
    database: 'cur_database',
    schema: 'cur',
    table: 'cost_and_usage_report',
  },
  mcp: {
    name: 'redshift',
    server: {
      transport: 'stdio',
      command: 'uvx',
      args: ['awslabs.redshift-mcp-server@latest'],
      env: { AWS_DEFAULT_REGION: 'us-east-1', FASTMCP_LOG_LEVEL: 'ERROR' },
    },
  },
  logging: {
    level: 'info',
  },
};
