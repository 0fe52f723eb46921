import type { ModelProviderName } from './model.js';
import type { LogLevel } from './trace.js';

export interface ProviderConfig {
  apiKey?: string;
  model: string;
  enabled: boolean;
}

export interface ProvidersConfig {
  anthropic?: ProviderConfig;
  openai?: ProviderConfig;
}

export interface AgentConfig {
  provider: ModelProviderName;
  maxIterations: number;
  maxTokens: number;
  temperature: number;
}

export interface BudgetConfig {
  /** Tool calls allowed per turn before the run is interrupted. */
  toolCallLimit: number;
  /** Substrings of tool names that count toward the limit. Empty counts every tool. */
  countedTools: string[];
}

export interface ConversationConfig {
  contextPairs: number;
  sessionsDir?: string;
}

export interface CostRulesConfig {
  path: string;
}

export interface DatasetConfig {
  cluster: string;
  database: string;
  schema: string;
  table: string;
}

export interface McpServerConfig {
  transport: 'stdio' | 'sse';
  command?: string;
  args?: string[];
  env?: Record<string, string>;
  url?: string;
}

export interface McpConfig {
  name: string;
  server: McpServerConfig;
}

export interface LoggingConfig {
  level: LogLevel;
}

export interface CostwiseConfig {
  providers: ProvidersConfig;
  agent: AgentConfig;
  budget: BudgetConfig;
  conversation: ConversationConfig;
  costRules: CostRulesConfig;
  dataset: DatasetConfig;
  mcp: McpConfig;
  logging: LoggingConfig;
}
