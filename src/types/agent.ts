import { ChatTurn } from './conversation';

export type LLMProvider = 'anthropic' | 'openai';

export interface JsonSchemaProperty {
  type: 'string' | 'integer' | 'number' | 'boolean';
  description: string;
}

export interface JsonSchemaObject {
  type: 'object';
  properties: Record<string, JsonSchemaProperty>;
  required: string[];
}

export interface ToolSpec {
  name: string;
  description: string;
  parameters: JsonSchemaObject;
}

export interface ToolCall {
  id: string;
  name: string;
  arguments: unknown;
}

export interface ToolResult {
  callId: string;
  output: string;
}

/** One tool round inside a single user turn. */
export interface ScratchpadStep {
  text: string;
  calls: ToolCall[];
  results: ToolResult[];
}

export interface TokenUsage {
  prompt: number;
  completion: number;
}

export type AgentStep =
  | { type: 'final'; text: string; tokensUsed: TokenUsage }
  | { type: 'tool_calls'; text: string; calls: ToolCall[]; tokensUsed: TokenUsage };

export interface CompletionRequest {
  system: string;
  history: ChatTurn[];
  scratchpad: ScratchpadStep[];
  tools: ToolSpec[];
}

export interface LLMClient {
  readonly provider: LLMProvider;
  complete(request: CompletionRequest): Promise<AgentStep>;
}

export interface LLMConfig {
  apiKey: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface IncomingMessage {
  session_id?: string;
  message: string;
}

export interface AgentResponse {
  success: boolean;
  session_id: string;
  response: string;
  tools_used: string[];
  tokens_used: TokenUsage;
}
