import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().min(1).optional()
);

const positiveInt = (fallback: number) =>
  z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.coerce.number().int().positive().default(fallback)
  );

const hostTimezone = Intl.DateTimeFormat().resolvedOptions().timeZone || 'UTC';

const envSchema = z
  .object({
    PORT: z.string().default('3000'),
    NODE_ENV: z.enum(['development', 'staging', 'production', 'test']).default('development'),
    CAL_API_KEY: z.string().min(1),
    CAL_API_BASE_URL: z.string().url().default('https://api.cal.com/v1'),
    CAL_EVENT_TYPE_ID: positiveInt(1202446),
    CAL_REQUEST_TIMEOUT_MS: positiveInt(15000),
    BOOKING_TIMEZONE: z.string().min(1).default(hostTimezone),
    BOOKING_LANGUAGE: z.string().min(2).default('en'),
    HOST_NAME: z.string().min(1).default('the host'),
    LLM_PROVIDER: z.enum(['anthropic', 'openai']).default('anthropic'),
    LLM_MODEL: optionalString,
    ANTHROPIC_API_KEY: optionalString,
    OPENAI_API_KEY: optionalString,
    AGENT_MAX_TOOL_ITERATIONS: positiveInt(5),
    CONVERSATION_MAX_TURNS: positiveInt(40),
    CONVERSATION_TTL_SECONDS: positiveInt(60 * 60 * 24),
    REDIS_URL: optionalString,
    RECONCILE_CRON: z.string().min(1).default('0 3 * * *'),
    SENTRY_DSN: optionalString,
  })
  .superRefine((value, ctx) => {
    if (value.LLM_PROVIDER === 'anthropic' && !value.ANTHROPIC_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['ANTHROPIC_API_KEY'],
        message: 'Required when LLM_PROVIDER is anthropic',
      });
    }
    if (value.LLM_PROVIDER === 'openai' && !value.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['OPENAI_API_KEY'],
        message: 'Required when LLM_PROVIDER is openai',
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env: Env = parsed.data;
