import { config } from './config';
import { logger } from './utils/logger';
import { OpenAIChatClient, createAssistedExtraction } from './modules/ai';
import { BannerComposer, FalImageProvider } from './modules/banner';
import { CampaignComposer } from './modules/campaign';
import { FieldExtractor } from './modules/context';
import { MemorySessionStore, RedisSessionStore, SessionStore } from './modules/conversation';
import { createRedisConnection } from './modules/conversation/redis';
import { InsightEnricher, SerperSearchProvider } from './modules/insights';
import { Orchestrator } from './modules/orchestrator';
import { initScheduler, startScheduler, stopScheduler } from './modules/scheduler';
import { TelegramBot } from './modules/telegram';

interface SessionBackend {
  store: SessionStore;
  close: () => Promise<void>;
}

async function createSessionBackend(): Promise<SessionBackend> {
  if (config.store.driver === 'redis') {
    const connection = await createRedisConnection();
    return {
      store: new RedisSessionStore(connection, config.conversation.maxAgeSeconds),
      close: async () => {
        await connection.quit();
      },
    };
  }

  return { store: new MemorySessionStore(), close: async () => undefined };
}

// Main entry point
async function main(): Promise<void> {
  logger.info(`🚀 ${config.app.name} v${config.app.version}`);
  logger.info('Starting application...');

  try {
    // 1. Validate required config
    if (!config.telegram.botToken) {
      throw new Error('TELEGRAM_BOT_TOKEN is required');
    }

    // 2. Session store
    logger.info('Initializing session store...', { driver: config.store.driver });
    const sessions = await createSessionBackend();
    logger.info('✅ Session store ready');

    // 3. Language model
    const llm = new OpenAIChatClient({
      baseUrl: config.ai.baseUrl,
      apiKey: config.ai.apiKey,
      model: config.ai.model,
      timeoutSeconds: config.ai.timeoutSeconds,
      temperature: config.ai.temperature,
      maxTokens: config.ai.maxTokens,
    });
    logger.info('✅ Language model client initialized', { model: llm.model, baseUrl: config.ai.baseUrl });

    // 4. Collaborators
    const extractor = new FieldExtractor(
      config.ai.assistedExtraction ? createAssistedExtraction(llm) : undefined
    );

    const search = config.search.enabled
      ? new SerperSearchProvider({
          apiKey: config.search.serperApiKey,
          apiUrl: config.search.serperApiUrl,
          resultLimit: config.search.resultLimit,
        })
      : undefined;
    if (search && !config.search.serperApiKey) {
      logger.warn('SERPER_API_KEY is not set, research will use built-in industry insights');
    }

    const images = config.banner.enabled
      ? new FalImageProvider({
          apiKey: config.banner.falApiKey,
          modelId: config.banner.modelId,
          endpoint: config.banner.endpoint,
        })
      : undefined;
    if (images && !config.banner.falApiKey) {
      logger.warn('FAL_KEY is not set, banner requests will be refused');
    }

    // 5. Orchestrator
    const orchestrator = new Orchestrator(
      {
        store: sessions.store,
        llm,
        extractor,
        enricher: new InsightEnricher(search),
        campaigns: new CampaignComposer(llm),
        banners: new BannerComposer(images, {
          enabled: config.banner.enabled,
          defaultAspectRatio: config.banner.defaultAspectRatio,
          platformDelayMs: config.banner.platformDelayMs,
        }),
      },
      {
        requiredFields: config.conversation.requiredFields,
        optionalFields: config.conversation.optionalFields,
        maxAgeSeconds: config.conversation.maxAgeSeconds,
        historyLimit: config.conversation.historyLimit,
      }
    );
    logger.info('✅ Orchestrator initialized');

    // 6. Scheduler
    initScheduler(orchestrator);
    startScheduler(config.conversation.sweepCron);

    // 7. Telegram Bot
    const telegramBot = new TelegramBot({ token: config.telegram.botToken });
    telegramBot.setOrchestrator(orchestrator);
    await telegramBot.start();
    logger.info('✅ Application started successfully');

    // Graceful shutdown handlers
    const shutdown = async (signal: string): Promise<void> => {
      logger.info(`Received ${signal}, shutting down...`);

      try {
        stopScheduler();
        await telegramBot.stop();
        await sessions.close();
        logger.info('Shutdown complete');
        process.exit(0);
      } catch (error) {
        logger.error('Error during shutdown', { error });
        process.exit(1);
      }
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));

    // Handle uncaught errors
    process.on('uncaughtException', (error) => {
      logger.error('Uncaught exception', { error });
      void shutdown('uncaughtException');
    });

    process.on('unhandledRejection', (reason) => {
      logger.error('Unhandled rejection', { reason });
    });
  } catch (error) {
    logger.error('Failed to start application', { error });
    process.exit(1);
  }
}

void main();
