import Anthropic from '@anthropic-ai/sdk';
import { AgentStep, CompletionRequest, LLMClient, LLMConfig } from '../../types/agent';
import { callProvider } from './llm.adapter';
import { logger } from '../../utils/logger';

const DEFAULT_MODEL = 'claude-3-5-haiku-latest';

export class AnthropicAdapter implements LLMClient {
  readonly provider = 'anthropic' as const;
  private client: Anthropic;

  constructor(private config: LLMConfig) {
    this.client = new Anthropic({ apiKey: config.apiKey });
  }

  async complete(request: CompletionRequest): Promise<AgentStep> {
    const tools = request.tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      input_schema: {
        type: 'object' as const,
        properties: tool.parameters.properties,
        required: tool.parameters.required,
      },
    }));

    const response = await callProvider(
      () =>
        this.client.messages.create({
          model: this.config.model || DEFAULT_MODEL,
          system: request.system,
          messages: this.toMessages(request),
          tools: tools.length > 0 ? tools : undefined,
          temperature: this.config.temperature ?? 0.7,
          max_tokens: this.config.maxTokens ?? 1024,
        }),
      {
        service: 'Anthropic',
        operation: 'complete',
        statusOf: (error) => (error instanceof Anthropic.APIError ? error.status : undefined),
      }
    );

    const text = response.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('')
      .trim();

    const toolUses = response.content.filter(
      (block): block is Anthropic.ToolUseBlock => block.type === 'tool_use'
    );

    const tokensUsed = {
      prompt: response.usage?.input_tokens || 0,
      completion: response.usage?.output_tokens || 0,
    };

    logger.debug('Anthropic response generated', { tokens: tokensUsed, toolCalls: toolUses.length });

    if (toolUses.length > 0) {
      return {
        type: 'tool_calls',
        text,
        calls: toolUses.map((block) => ({ id: block.id, name: block.name, arguments: block.input })),
        tokensUsed,
      };
    }

    return { type: 'final', text, tokensUsed };
  }

  private toMessages(request: CompletionRequest): Anthropic.MessageParam[] {
    const messages: Anthropic.MessageParam[] = request.history.map((turn) => ({
      role: turn.role,
      content: turn.content,
    }));

    for (const step of request.scratchpad) {
      const assistantContent: Anthropic.ContentBlockParam[] = [];
      if (step.text) {
        assistantContent.push({ type: 'text', text: step.text });
      }
      for (const call of step.calls) {
        assistantContent.push({ type: 'tool_use', id: call.id, name: call.name, input: call.arguments });
      }

      messages.push({ role: 'assistant', content: assistantContent });
      messages.push({
        role: 'user',
        content: step.results.map((result) => ({
          type: 'tool_result' as const,
          tool_use_id: result.callId,
          content: result.output,
        })),
      });
    }

    return messages;
  }
}
