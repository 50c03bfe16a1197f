import dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables
dotenv.config();

export const CONTEXT_FIELDS = [
  'targetAudience',
  'brandTone',
  'campaignGoals',
  'preferredPlatforms',
  'productDetails',
  'competitors',
  'trendingKeywords',
  'productReferences',
  'keyMessages',
  'budget',
  'timeline',
  'uniqueSellingPoints',
] as const;

export type ContextFieldName = (typeof CONTEXT_FIELDS)[number];

export const DEFAULT_REQUIRED_FIELDS: ContextFieldName[] = [
  'targetAudience',
  'brandTone',
  'campaignGoals',
  'preferredPlatforms',
  'productDetails',
];

export const DEFAULT_OPTIONAL_FIELDS: ContextFieldName[] = [
  'competitors',
  'trendingKeywords',
  'productReferences',
  'keyMessages',
  'budget',
  'timeline',
];

const TRUTHY = ['1', 'true', 'yes', 'on'];

// z.coerce.boolean() turns "false" into true, so flags are parsed by hand
const flag = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((value) =>
      value === undefined || value.trim() === ''
        ? defaultValue
        : TRUTHY.includes(value.trim().toLowerCase())
    );

const fieldList = (defaults: ContextFieldName[]) =>
  z
    .string()
    .optional()
    .transform((value) =>
      value === undefined || value.trim() === ''
        ? [...defaults]
        : value
            .split(',')
            .map((item) => item.trim())
            .filter(Boolean)
    )
    .pipe(z.array(z.enum(CONTEXT_FIELDS)));

// Configuration schema
const configSchema = z.object({
  app: z.object({
    name: z.string().default('Marketing AI Assistant'),
    version: z.string().default('1.0.0'),
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
    logLevel: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  }),

  // Any OpenAI-compatible endpoint: Ollama's /v1, OpenRouter, OpenAI
  ai: z.object({
    baseUrl: z.string().url().default('http://localhost:11434/v1'),
    apiKey: z.string().default('ollama'),
    model: z.string().default('deepseek-v3.1:671b-cloud'),
    timeoutSeconds: z.coerce.number().positive().default(300),
    temperature: z.coerce.number().min(0).max(2).default(0.7),
    maxTokens: z.coerce.number().int().positive().default(4000),
    assistedExtraction: flag(false),
  }),

  search: z.object({
    enabled: flag(true),
    serperApiKey: z.string().optional(),
    serperApiUrl: z.string().url().default('https://google.serper.dev/search'),
    resultLimit: z.coerce.number().int().positive().default(5),
  }),

  banner: z.object({
    enabled: flag(true),
    falApiKey: z.string().optional(),
    modelId: z.string().default('fal-ai/flux/schnell'),
    endpoint: z.string().url().default('https://fal.run'),
    defaultAspectRatio: z.string().default('16:9'),
    platformDelayMs: z.coerce.number().int().min(0).default(1000),
  }),

  conversation: z.object({
    maxAgeSeconds: z.coerce.number().int().positive().default(36000),
    historyLimit: z.coerce.number().int().positive().default(20),
    requiredFields: fieldList(DEFAULT_REQUIRED_FIELDS),
    optionalFields: fieldList(DEFAULT_OPTIONAL_FIELDS),
    sweepCron: z.string().optional(),
  }),

  store: z.object({
    driver: z.enum(['memory', 'redis']).default('memory'),
    redisHost: z.string().default('localhost'),
    redisPort: z.coerce.number().int().positive().default(6379),
    redisPassword: z.string().optional(),
  }),

  telegram: z.object({
    botToken: z.string().optional(),
  }),

  debug: z.object({
    logAIPrompts: flag(false),
    logAIResponses: flag(false),
  }),
});

export type Config = z.infer<typeof configSchema>;

// Parse and validate configuration
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig = {
    app: {
      name: env.APP_NAME,
      version: env.APP_VERSION,
      nodeEnv: env.NODE_ENV,
      logLevel: env.LOG_LEVEL,
    },
    ai: {
      baseUrl: env.AI_BASE_URL,
      apiKey: env.AI_API_KEY,
      model: env.AI_MODEL,
      timeoutSeconds: env.AI_TIMEOUT_SECONDS,
      temperature: env.AI_TEMPERATURE,
      maxTokens: env.AI_MAX_TOKENS,
      assistedExtraction: env.AI_ASSISTED_EXTRACTION,
    },
    search: {
      enabled: env.ENABLE_WEB_SEARCH,
      serperApiKey: env.SERPER_API_KEY || undefined,
      serperApiUrl: env.SERPER_API_URL,
      resultLimit: env.SEARCH_RESULT_LIMIT,
    },
    banner: {
      enabled: env.ENABLE_BANNERS,
      falApiKey: env.FAL_KEY || undefined,
      modelId: env.FAL_MODEL_ID,
      endpoint: env.FAL_ENDPOINT,
      defaultAspectRatio: env.BANNER_DEFAULT_ASPECT_RATIO,
      platformDelayMs: env.BANNER_PLATFORM_DELAY_MS,
    },
    conversation: {
      maxAgeSeconds: env.MAX_CONVERSATION_AGE,
      historyLimit: env.CONVERSATION_HISTORY_LIMIT,
      requiredFields: env.REQUIRED_FIELDS,
      optionalFields: env.OPTIONAL_FIELDS,
      sweepCron: env.SESSION_SWEEP_CRON || undefined,
    },
    store: {
      driver: env.SESSION_STORE,
      redisHost: env.REDIS_HOST,
      redisPort: env.REDIS_PORT,
      redisPassword: env.REDIS_PASSWORD || undefined,
    },
    telegram: {
      botToken: env.TELEGRAM_BOT_TOKEN || undefined,
    },
    debug: {
      logAIPrompts: env.DEBUG_LOG_AI_PROMPTS,
      logAIResponses: env.DEBUG_LOG_AI_RESPONSES,
    },
  };

  return configSchema.parse(rawConfig);
}

// Export singleton config
export const config = loadConfig();

export default config;
