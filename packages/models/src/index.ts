export { ModelProvider } from './provider.js';
export { ModelProviderRegistry } from './registry.js';
export { AnthropicProvider } from './providers/anthropic.js';
export { OpenAIProvider } from './providers/openai.js';
