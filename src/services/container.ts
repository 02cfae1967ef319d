import { env } from '../config/env';
import { redisKeyValue } from '../config/redis';
import { RetryingTransport } from './calcom/retrying.transport';
import { CalcomClient } from './calcom/calcom.client';
import { BookingLookupService } from './lookup.service';
import { BookingService } from './booking.service';
import { ReconciliationService } from './reconciliation.service';
import { AgentService } from './agent.service';
import { InMemoryConversationStore, RedisConversationStore } from './conversation.store';
import { LLMFactory } from './llm/llm.factory';
import { ToolRegistry } from '../tools/registry';
import { createBookingTools } from '../tools/booking.tools';
import { ConversationStore } from '../types/conversation';
import { assertValidTimezone } from '../utils/timeResolver';
import { logger } from '../utils/logger';

export interface Services {
  bookings: BookingService;
  reconciliation: ReconciliationService;
  agent: AgentService;
}

let services: Services | null = null;

function buildStore(): ConversationStore {
  const kv = redisKeyValue();
  if (kv) {
    return new RedisConversationStore(kv, env.CONVERSATION_MAX_TURNS, env.CONVERSATION_TTL_SECONDS);
  }
  return new InMemoryConversationStore(env.CONVERSATION_MAX_TURNS, env.CONVERSATION_TTL_SECONDS);
}

function buildServices(): Services {
  assertValidTimezone(env.BOOKING_TIMEZONE);

  const transport = new RetryingTransport({
    baseUrl: env.CAL_API_BASE_URL,
    apiKey: env.CAL_API_KEY,
    timeoutMs: env.CAL_REQUEST_TIMEOUT_MS,
  });
  const client = new CalcomClient(transport);
  const lookup = new BookingLookupService(client);

  const bookings = new BookingService(client, lookup, {
    timezone: env.BOOKING_TIMEZONE,
    language: env.BOOKING_LANGUAGE,
    eventTypeId: env.CAL_EVENT_TYPE_ID,
  });
  const reconciliation = new ReconciliationService(client);

  const apiKey = env.LLM_PROVIDER === 'anthropic' ? env.ANTHROPIC_API_KEY : env.OPENAI_API_KEY;
  const llm = LLMFactory.create(env.LLM_PROVIDER, { apiKey: apiKey ?? '', model: env.LLM_MODEL });

  const agent = new AgentService(llm, new ToolRegistry(createBookingTools(bookings)), buildStore(), {
    hostName: env.HOST_NAME,
    timezone: env.BOOKING_TIMEZONE,
    maxToolIterations: env.AGENT_MAX_TOOL_ITERATIONS,
  });

  logger.info('Services initialized', {
    provider: llm.provider,
    timezone: env.BOOKING_TIMEZONE,
    eventTypeId: env.CAL_EVENT_TYPE_ID,
    historyStore: env.REDIS_URL ? 'redis' : 'memory',
  });

  return { bookings, reconciliation, agent };
}

/** Built on first use so importing a route does not require a complete environment. */
export function getServices(): Services {
  if (!services) {
    services = buildServices();
  }
  return services;
}
