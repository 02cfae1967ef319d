const mockAnthropicCreate = jest.fn();
const mockOpenAICreate = jest.fn();

jest.mock('@anthropic-ai/sdk', () => {
  class APIError extends Error {
    constructor(
      public status: number,
      message: string
    ) {
      super(message);
    }
  }
  return {
    __esModule: true,
    default: Object.assign(
      jest.fn().mockImplementation(() => ({ messages: { create: mockAnthropicCreate } })),
      { APIError }
    ),
  };
});

jest.mock('openai', () => {
  class APIError extends Error {
    constructor(
      public status: number,
      message: string
    ) {
      super(message);
    }
  }
  return {
    __esModule: true,
    default: Object.assign(
      jest.fn().mockImplementation(() => ({ chat: { completions: { create: mockOpenAICreate } } })),
      { APIError }
    ),
  };
});

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { AnthropicAdapter } from '../../src/services/llm/anthropic.adapter';
import { OpenAIAdapter } from '../../src/services/llm/openai.adapter';
import { LLMFactory } from '../../src/services/llm/llm.factory';
import { callProvider } from '../../src/services/llm/llm.adapter';
import { CompletionRequest } from '../../src/types/agent';
import { ServiceError } from '../../src/utils/errors';

const request: CompletionRequest = {
  system: 'You schedule meetings.',
  history: [
    { role: 'user', content: 'Cancel my 9am' },
    { role: 'assistant', content: 'Which email?' },
    { role: 'user', content: 'ada@example.com' },
  ],
  scratchpad: [
    {
      text: 'Checking.',
      calls: [{ id: 'call-1', name: 'list_bookings', arguments: { email: 'ada@example.com' } }],
      results: [{ callId: 'call-1', output: 'No bookings found for ada@example.com.' }],
    },
  ],
  tools: [
    {
      name: 'list_bookings',
      description: 'List bookings',
      parameters: {
        type: 'object',
        properties: { email: { type: 'string', description: 'Email' } },
        required: ['email'],
      },
    },
  ],
};

describe('LLMFactory', () => {
  it('should create the configured provider', () => {
    expect(LLMFactory.create('anthropic', { apiKey: 'test-key' })).toBeInstanceOf(AnthropicAdapter);
    expect(LLMFactory.create('openai', { apiKey: 'test-key' })).toBeInstanceOf(OpenAIAdapter);
  });

  it('should throw for unsupported provider', () => {
    expect(() => LLMFactory.create('cohere', { apiKey: 'test-key' })).toThrow('Unsupported LLM provider: cohere');
  });
});

describe('AnthropicAdapter', () => {
  beforeEach(() => {
    mockAnthropicCreate.mockReset();
  });

  it('should return tool calls', async () => {
    mockAnthropicCreate.mockResolvedValueOnce({
      content: [
        { type: 'text', text: 'One moment.' },
        { type: 'tool_use', id: 'toolu_1', name: 'cancel_booking', input: { email: 'ada@example.com' } },
      ],
      usage: { input_tokens: 120, output_tokens: 30 },
    });

    const step = await new AnthropicAdapter({ apiKey: 'test-key' }).complete(request);

    expect(step).toEqual({
      type: 'tool_calls',
      text: 'One moment.',
      calls: [{ id: 'toolu_1', name: 'cancel_booking', arguments: { email: 'ada@example.com' } }],
      tokensUsed: { prompt: 120, completion: 30 },
    });
  });

  it('should replay tool rounds as tool_use and tool_result blocks', async () => {
    mockAnthropicCreate.mockResolvedValueOnce({
      content: [{ type: 'text', text: 'Nothing booked.' }],
      usage: { input_tokens: 1, output_tokens: 1 },
    });

    const step = await new AnthropicAdapter({ apiKey: 'test-key', model: 'test-model' }).complete(request);

    expect(step).toEqual({ type: 'final', text: 'Nothing booked.', tokensUsed: { prompt: 1, completion: 1 } });

    const params = mockAnthropicCreate.mock.calls[0][0];
    expect(params.model).toBe('test-model');
    expect(params.system).toBe('You schedule meetings.');
    expect(params.tools).toEqual([
      {
        name: 'list_bookings',
        description: 'List bookings',
        input_schema: {
          type: 'object',
          properties: { email: { type: 'string', description: 'Email' } },
          required: ['email'],
        },
      },
    ]);
    expect(params.messages.slice(3)).toEqual([
      {
        role: 'assistant',
        content: [
          { type: 'text', text: 'Checking.' },
          { type: 'tool_use', id: 'call-1', name: 'list_bookings', input: { email: 'ada@example.com' } },
        ],
      },
      {
        role: 'user',
        content: [{ type: 'tool_result', tool_use_id: 'call-1', content: 'No bookings found for ada@example.com.' }],
      },
    ]);
  });

  it('should omit tools when none are offered', async () => {
    mockAnthropicCreate.mockResolvedValueOnce({
      content: [{ type: 'text', text: 'Booked.' }],
      usage: { input_tokens: 1, output_tokens: 1 },
    });

    await new AnthropicAdapter({ apiKey: 'test-key' }).complete({ ...request, scratchpad: [], tools: [] });

    const params = mockAnthropicCreate.mock.calls[0][0];
    expect(params.tools).toBeUndefined();
    expect(params.messages).toHaveLength(3);
  });
});

describe('OpenAIAdapter', () => {
  beforeEach(() => {
    mockOpenAICreate.mockReset();
  });

  it('should parse function calls', async () => {
    mockOpenAICreate.mockResolvedValueOnce({
      choices: [
        {
          message: {
            content: null,
            tool_calls: [
              {
                id: 'call_9',
                type: 'function',
                function: { name: 'list_bookings', arguments: '{"email":"ada@example.com"}' },
              },
              { id: 'call_10', type: 'function', function: { name: 'list_bookings', arguments: 'not json' } },
            ],
          },
        },
      ],
      usage: { prompt_tokens: 50, completion_tokens: 5 },
    });

    const step = await new OpenAIAdapter({ apiKey: 'test-key' }).complete(request);

    expect(step).toEqual({
      type: 'tool_calls',
      text: '',
      calls: [
        { id: 'call_9', name: 'list_bookings', arguments: { email: 'ada@example.com' } },
        { id: 'call_10', name: 'list_bookings', arguments: 'not json' },
      ],
      tokensUsed: { prompt: 50, completion: 5 },
    });
  });

  it('should send the system prompt first and tool results as tool messages', async () => {
    mockOpenAICreate.mockResolvedValueOnce({
      choices: [{ message: { content: 'Done.' } }],
      usage: { prompt_tokens: 1, completion_tokens: 1 },
    });

    await new OpenAIAdapter({ apiKey: 'test-key' }).complete(request);

    const { model, messages } = mockOpenAICreate.mock.calls[0][0];
    expect(model).toBe('gpt-4o');
    expect(messages[0]).toEqual({ role: 'system', content: 'You schedule meetings.' });
    expect(messages.slice(4)).toEqual([
      {
        role: 'assistant',
        content: 'Checking.',
        tool_calls: [
          {
            id: 'call-1',
            type: 'function',
            function: { name: 'list_bookings', arguments: '{"email":"ada@example.com"}' },
          },
        ],
      },
      { role: 'tool', tool_call_id: 'call-1', content: 'No bookings found for ada@example.com.' },
    ]);
  });

  it('should omit tools when none are offered', async () => {
    mockOpenAICreate.mockResolvedValueOnce({
      choices: [{ message: { content: 'Booked.' } }],
      usage: { prompt_tokens: 1, completion_tokens: 1 },
    });

    await new OpenAIAdapter({ apiKey: 'test-key' }).complete({ ...request, scratchpad: [], tools: [] });

    const params = mockOpenAICreate.mock.calls[0][0];
    expect(params.tools).toBeUndefined();
    expect(params.messages).toHaveLength(4);
  });
});

describe('callProvider', () => {
  const sleep = jest.fn(async (_ms: number) => undefined);
  const statusOf = (error: unknown) =>
    error instanceof Error && 'status' in error && typeof error.status === 'number' ? error.status : undefined;
  const httpError = (status: number) => Object.assign(new Error(`HTTP ${status}`), { status });

  beforeEach(() => {
    sleep.mockClear();
  });

  it('should not retry authentication failures', async () => {
    const fn = jest.fn().mockRejectedValue(httpError(401));

    const error = await callProvider(fn, { service: 'Anthropic', operation: 'complete', statusOf, sleep }).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(ServiceError);
    expect(error).toMatchObject({ retryable: false, message: 'Anthropic.complete failed: HTTP 401' });
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should back off on rate limits and recover', async () => {
    const fn = jest.fn().mockRejectedValueOnce(httpError(429)).mockResolvedValueOnce('ok');

    await expect(callProvider(fn, { service: 'OpenAI', operation: 'complete', statusOf, sleep })).resolves.toBe('ok');
    expect(sleep).toHaveBeenCalledWith(2000);
  });

  it('should give up after three attempts', async () => {
    const fn = jest.fn().mockRejectedValue(httpError(500));

    const error = await callProvider(fn, { service: 'OpenAI', operation: 'complete', statusOf, sleep }).catch(
      (e: unknown) => e
    );

    expect(error).toMatchObject({ retryable: true });
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000]);
  });
});
