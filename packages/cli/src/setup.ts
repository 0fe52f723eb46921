import {
  ProviderNotAvailableError,
  type CostwiseConfig,
  type TraceEvent,
} from '@costwise/shared';
import {
  AnthropicProvider,
  ModelProviderRegistry,
  OpenAIProvider,
  type ModelProvider,
} from '@costwise/models';
import { McpToolClient } from '@costwise/tools';
import {
  BudgetTracker,
  ToolCallingAgent,
  ToolRegistry,
  TraceLogger,
  TurnController,
  buildSystemPrompt,
  loadCostRules,
  type CostRules,
} from '@costwise/core';

export interface Runtime {
  config: CostwiseConfig;
  controller: TurnController;
  tools: ToolRegistry;
  client: McpToolClient;
  rules: CostRules | null;
  tracer: TraceLogger;
  shutdown(): Promise<void>;
}

export interface RuntimeOptions {
  /** Receives log events; defaults to stderr. */
  onLog?: (event: TraceEvent) => void;
  onWarning?: (message: string) => void;
}

export function createProviders(config: CostwiseConfig): ModelProviderRegistry {
  const providers = new ModelProviderRegistry();
  const { anthropic, openai } = config.providers;

  if (anthropic?.enabled && anthropic.apiKey) {
    providers.register(new AnthropicProvider({ apiKey: anthropic.apiKey, model: anthropic.model }));
  }
  if (openai?.enabled && openai.apiKey) {
    providers.register(new OpenAIProvider({ apiKey: openai.apiKey, model: openai.model }));
  }
  return providers;
}

export function createToolClient(config: CostwiseConfig): McpToolClient {
  return new McpToolClient(config.mcp.name, config.mcp.server);
}

export async function createRuntime(config: CostwiseConfig, options: RuntimeOptions = {}): Promise<Runtime> {
  const tracer = new TraceLogger({ level: config.logging.level, sink: options.onLog });

  const providers = createProviders(config);
  const provider: ModelProvider | undefined = providers.get(config.agent.provider);
  if (!provider) {
    throw new ProviderNotAvailableError(config.agent.provider);
  }
  const model = config.providers[config.agent.provider]?.model ?? '';

  const { rules, warning } = await loadCostRules(config.costRules.path);
  if (warning) {
    options.onWarning?.(warning);
  }

  const tools = new ToolRegistry();
  const client = createToolClient(config);

  const agent = new ToolCallingAgent({
    provider,
    model,
    tools,
    instructions: buildSystemPrompt({ rules, dataset: config.dataset }),
    maxIterations: config.agent.maxIterations,
    maxTokens: config.agent.maxTokens,
    temperature: config.agent.temperature,
  });

  const budget = new BudgetTracker({
    limit: config.budget.toolCallLimit,
    countedTools: config.budget.countedTools,
  });

  // Connects on the first turn; a failed start fails that turn only
  let toolsLoaded = false;
  const prepareTools = async (): Promise<void> => {
    if (toolsLoaded) return;
    for (const tool of await client.listTools()) {
      tools.register(tool);
    }
    toolsLoaded = true;
  };

  const controller = new TurnController({
    agent,
    budget,
    tracer,
    onTurnLog: log => agent.setLog(log),
    prepareTools,
  });

  return {
    config,
    controller,
    tools,
    client,
    rules,
    tracer,
    async shutdown() {
      await client.close();
    },
  };
}
