import { LLMClient, LLMConfig, LLMProvider } from '../../types/agent';
import { AnthropicAdapter } from './anthropic.adapter';
import { OpenAIAdapter } from './openai.adapter';

export class LLMFactory {
  static create(provider: LLMProvider | string, config: LLMConfig): LLMClient {
    switch (provider) {
      case 'anthropic':
        return new AnthropicAdapter(config);
      case 'openai':
        return new OpenAIAdapter(config);
      default:
        throw new Error(`Unsupported LLM provider: ${provider}`);
    }
  }
}
