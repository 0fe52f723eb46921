import OpenAI from 'openai';
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

export class OpenAIProvider extends ModelProvider {
  readonly name: ModelProviderName = 'openai';

  private client: OpenAI;
  private model: string;

  constructor(config: { apiKey: string; model?: string }) {
    super();
    this.client = new OpenAI({ apiKey: config.apiKey });
    this.model = config.model ?? DEFAULT_MODELS.openai;
  }

  async chat(request: ModelRequest): Promise<ModelResponse> {
    const startTime = monotonicNow();

    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (request.system) {
      messages.push({ role: 'system', content: request.system });
    }
    for (const msg of request.messages) {
      messages.push({ role: msg.role, content: msg.content });
    }

    let response: OpenAI.Chat.ChatCompletion;
    try {
      response = await this.client.chat.completions.create({
        model: request.model,
        messages,
        max_tokens: request.maxTokens ?? 1024,
        temperature: request.temperature ?? 0.1,
        ...(request.responseFormat === 'json' ? { response_format: { type: 'json_object' as const } } : {}),
      });
    } catch (err) {
      throw new TransportError('model', errorMessage(err), err);
    }

    const latencyMs = monotonicNow() - startTime;
    const choice = response.choices[0];
    const tokenUsage = {
      promptTokens: response.usage?.prompt_tokens ?? 0,
      completionTokens: response.usage?.completion_tokens ?? 0,
      totalTokens: response.usage?.total_tokens ?? 0,
    };

    return {
      model: request.model,
      provider: 'openai',
      content: choice?.message?.content ?? '',
      tokenUsage,
      latencyMs,
      finishReason: choice?.finish_reason === 'stop' ? 'stop' : 'length',
    };
  }
}
