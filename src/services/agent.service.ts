import { DateTime } from 'luxon';
import { v4 as uuidv4 } from 'uuid';
import { ToolRegistry } from '../tools/registry';
import {
  AgentResponse,
  IncomingMessage,
  LLMClient,
  ScratchpadStep,
  TokenUsage,
  ToolResult,
} from '../types/agent';
import { ChatTurn, ConversationStore } from '../types/conversation';
import { buildSystemPrompt } from '../utils/prompts';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

const FALLBACK_RESPONSE =
  "Sorry, I couldn't finish that request. Could you rephrase it or give me the details again?";

const WRAP_UP_INSTRUCTIONS =
  'No more tools are available for this message. Using only the tool results below, tell the user what was done and what is still missing. Do not claim anything the results do not show.';

function toolOutputs(scratchpad: ScratchpadStep[]): string[] {
  return scratchpad.flatMap((step) => step.results.map((result) => result.output));
}

/** Used when the model cannot summarize its own tool rounds. */
function partialResponse(scratchpad: ScratchpadStep[]): string {
  const outputs = toolOutputs(scratchpad);
  if (outputs.length === 0) return FALLBACK_RESPONSE;
  return `I couldn't finish everything in one go. Here is what happened so far:\n${outputs
    .map((output) => `- ${output}`)
    .join('\n')}`;
}

export interface AgentOptions {
  hostName: string;
  timezone: string;
  maxToolIterations: number;
  now?: () => DateTime;
}

export class AgentService {
  private inFlight = new Map<string, Promise<void>>();

  constructor(
    private llm: LLMClient,
    private tools: ToolRegistry,
    private store: ConversationStore,
    private options: AgentOptions
  ) {}

  async handleMessage(incoming: IncomingMessage): Promise<AgentResponse> {
    const sessionId = incoming.session_id || uuidv4();
    return this.serialize(sessionId, () => this.runTurn(sessionId, incoming.message));
  }

  async resetSession(sessionId: string): Promise<void> {
    await this.serialize(sessionId, () => this.store.clear(sessionId));
  }

  private async runTurn(sessionId: string, message: string): Promise<AgentResponse> {
    try {
      // 1. Load prior turns and add the new one
      const history = await this.store.getHistory(sessionId);
      const conversation: ChatTurn[] = [...history, { role: 'user', content: message }];

      // 2. Prompt is rebuilt every turn so "today" stays current
      const now = (this.options.now ?? (() => DateTime.now()))().setZone(this.options.timezone);
      const system = buildSystemPrompt({
        hostName: this.options.hostName,
        today: now.toISODate() ?? now.toFormat('yyyy-MM-dd'),
        timezone: this.options.timezone,
      });

      // 3. Let the model call tools until it answers in text
      const scratchpad: ScratchpadStep[] = [];
      const toolsUsed: string[] = [];
      const tokensUsed: TokenUsage = { prompt: 0, completion: 0 };
      let reply = '';

      for (let iteration = 0; iteration < this.options.maxToolIterations; iteration++) {
        const step = await this.llm.complete({
          system,
          history: conversation,
          scratchpad,
          tools: this.tools.specs(),
        });

        tokensUsed.prompt += step.tokensUsed.prompt;
        tokensUsed.completion += step.tokensUsed.completion;

        if (step.type === 'final') {
          reply = step.text;
          break;
        }

        const results: ToolResult[] = [];
        for (const call of step.calls) {
          toolsUsed.push(call.name);
          const output = await this.tools.invoke(call.name, call.arguments);
          results.push({ callId: call.id, output });
        }
        scratchpad.push({ text: step.text, calls: step.calls, results });
      }

      // 4. Out of tool rounds: report what the tools already did
      if (!reply && scratchpad.length > 0) {
        logger.warn('Agent reached tool round limit', { sessionId, toolRounds: scratchpad.length });
        const wrapUp = await this.llm.complete({
          system: `${system}\n\n${WRAP_UP_INSTRUCTIONS}\n\nTOOL RESULTS:\n${toolOutputs(scratchpad).join('\n\n')}`,
          history: conversation,
          scratchpad: [],
          tools: [],
        });
        tokensUsed.prompt += wrapUp.tokensUsed.prompt;
        tokensUsed.completion += wrapUp.tokensUsed.completion;
        reply = wrapUp.type === 'final' ? wrapUp.text : '';
      }

      if (!reply) {
        logger.warn('Agent produced no final answer', { sessionId, toolRounds: scratchpad.length });
        reply = partialResponse(scratchpad);
      }

      // 5. Persist the exchange
      await this.store.append(sessionId, [
        { role: 'user', content: message },
        { role: 'assistant', content: reply },
      ]);

      logger.info('Message handled', {
        sessionId,
        provider: this.llm.provider,
        toolsUsed,
        tokensUsed,
      });

      return {
        success: true,
        session_id: sessionId,
        response: reply,
        tools_used: toolsUsed,
        tokens_used: tokensUsed,
      };
    } catch (error) {
      logger.error('Failed to handle message', { sessionId, error: errorMessage(error) });
      throw error;
    }
  }

  /** Turns of one session run one after another; different sessions do not wait on each other. */
  private serialize<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.inFlight.get(sessionId) ?? Promise.resolve();
    const run = previous.then(task);
    const settled = run.then(
      () => undefined,
      () => undefined
    );

    this.inFlight.set(sessionId, settled);
    void settled.then(() => {
      if (this.inFlight.get(sessionId) === settled) {
        this.inFlight.delete(sessionId);
      }
    });

    return run;
  }
}
