import type {
  ModelRequest,
  ModelResponse,
  ModelProviderName,
} from '@costwise/shared';

export abstract class ModelProvider {
  abstract readonly name: ModelProviderName;

  abstract chat(request: ModelRequest): Promise<ModelResponse>;
}
