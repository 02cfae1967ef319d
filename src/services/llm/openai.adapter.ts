import OpenAI from 'openai';
import { AgentStep, CompletionRequest, LLMClient, LLMConfig, ToolCall } from '../../types/agent';
import { callProvider } from './llm.adapter';
import { logger } from '../../utils/logger';

const DEFAULT_MODEL = 'gpt-4o';

function parseArguments(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    // left for the tool's schema to reject
    return raw;
  }
}

export class OpenAIAdapter implements LLMClient {
  readonly provider = 'openai' as const;
  private client: OpenAI;

  constructor(private config: LLMConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey });
  }

  async complete(request: CompletionRequest): Promise<AgentStep> {
    const tools = request.tools.map((tool) => ({
      type: 'function' as const,
      function: {
        name: tool.name,
        description: tool.description,
        parameters: {
          type: 'object',
          properties: tool.parameters.properties,
          required: tool.parameters.required,
        },
      },
    }));

    const response = await callProvider(
      () =>
        this.client.chat.completions.create({
          model: this.config.model || DEFAULT_MODEL,
          messages: this.toMessages(request),
          tools: tools.length > 0 ? tools : undefined,
          temperature: this.config.temperature ?? 0.7,
          max_tokens: this.config.maxTokens ?? 1024,
        }),
      {
        service: 'OpenAI',
        operation: 'complete',
        statusOf: (error) => (error instanceof OpenAI.APIError ? error.status : undefined),
      }
    );

    const message = response.choices[0]?.message;
    const text = message?.content?.trim() || '';
    const tokensUsed = {
      prompt: response.usage?.prompt_tokens || 0,
      completion: response.usage?.completion_tokens || 0,
    };

    const calls: ToolCall[] = (message?.tool_calls ?? []).map((call) => ({
      id: call.id,
      name: call.function.name,
      arguments: parseArguments(call.function.arguments),
    }));

    logger.debug('OpenAI response generated', { tokens: tokensUsed, toolCalls: calls.length });

    if (calls.length > 0) {
      return { type: 'tool_calls', text, calls, tokensUsed };
    }

    return { type: 'final', text, tokensUsed };
  }

  private toMessages(request: CompletionRequest): OpenAI.Chat.ChatCompletionMessageParam[] {
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [
      { role: 'system', content: request.system },
      ...request.history.map((turn): OpenAI.Chat.ChatCompletionMessageParam =>
        turn.role === 'user'
          ? { role: 'user', content: turn.content }
          : { role: 'assistant', content: turn.content }
      ),
    ];

    for (const step of request.scratchpad) {
      messages.push({
        role: 'assistant',
        content: step.text || null,
        tool_calls: step.calls.map((call) => ({
          id: call.id,
          type: 'function' as const,
          function: {
            name: call.name,
            arguments: typeof call.arguments === 'string' ? call.arguments : JSON.stringify(call.arguments ?? {}),
          },
        })),
      });
      for (const result of step.results) {
        messages.push({ role: 'tool', tool_call_id: result.callId, content: result.output });
      }
    }

    return messages;
  }
}
