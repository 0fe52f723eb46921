import Anthropic from '@anthropic-ai/sdk';
import {
  type ModelRequest,
  type ModelResponse,
  type ModelProviderName,
  DEFAULT_MODELS,
  TransportError,
  errorMessage,
  monotonicNow,
} from '@costwise/shared';
import { ModelProvider } from '../provider.js';

export class AnthropicProvider extends ModelProvider {
  readonly name: ModelProviderName = 'anthropic';

  private client: Anthropic;
  private model: string;

  constructor(config: { apiKey: string; model?: string }) {
    super();
    this.client = new Anthropic({ apiKey: config.apiKey });
    this.model = config.model ?? DEFAULT_MODELS.anthropic;
  }

  async chat(request: ModelRequest): Promise<ModelResponse> {
    const startTime = monotonicNow();

    // System turns travel in the dedicated `system` field
    const messages = request.messages
      .filter(m => m.role !== 'system')
      .map(m => ({
        role: m.role === 'assistant' ? 'assistant' as const : 'user' as const,
        content: m.content,
      }));

    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create({
        model: request.model,
        max_tokens: request.maxTokens ?? 1024,
        ...(request.system ? { system: request.system } : {}),
        ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
        messages,
      });
    } catch (err) {
      throw new TransportError('model', errorMessage(err), err);
    }

    const latencyMs = monotonicNow() - startTime;
    const tokenUsage = {
      promptTokens: response.usage.input_tokens,
      completionTokens: response.usage.output_tokens,
      totalTokens: response.usage.input_tokens + response.usage.output_tokens,
    };

    const content = response.content
      .flatMap(block => (block.type === 'text' ? [block.text] : []))
      .join('');

    return {
      model: request.model,
      provider: 'anthropic',
      content,
      tokenUsage,
      latencyMs,
      finishReason: response.stop_reason === 'end_turn' ? 'stop' : 'length',
    };
  }
}
