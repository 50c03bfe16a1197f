import { Telegraf } from 'telegraf';
import { createModuleLogger } from '../../utils/logger';
import {
  BotContext,
  Orchestrator,
  setOrchestrator,
  parseBannerArgs,
  handleStart,
  handleHelp,
  handleAbout,
  handlePlatforms,
  handleShowContext,
  handleReset,
  handleBanner,
  handleAllBanners,
  handleMessage,
  handleCallback,
} from './handlers';

const logger = createModuleLogger('telegram-bot');

export interface TelegramBotConfig {
  token: string;
}

export class TelegramBot {
  private bot: Telegraf<BotContext>;
  private isRunning = false;

  constructor(config: TelegramBotConfig) {
    this.bot = new Telegraf<BotContext>(config.token);

    this.setupMiddleware();
    this.setupCommands();
    this.setupCallbacks();
    this.setupMessages();
    this.setupErrorHandling();
  }

  /**
   * Set orchestrator for handlers
   */
  setOrchestrator(orchestrator: Orchestrator): void {
    setOrchestrator(orchestrator);
  }

  /**
   * Setup middleware
   */
  private setupMiddleware(): void {
    // Logging middleware
    this.bot.use(async (ctx, next) => {
      const start = Date.now();
      await next();
      const duration = Date.now() - start;
      logger.debug('Request processed', {
        userId: ctx.from?.id,
        type: ctx.updateType,
        duration,
      });
    });
  }

  /**
   * Setup command handlers
   */
  private setupCommands(): void {
    this.bot.command('start', handleStart);
    this.bot.command('help', handleHelp);
    this.bot.command('about', handleAbout);
    this.bot.command('context', handleShowContext);
    this.bot.command('reset', handleReset);
    this.bot.command('banners', handleAllBanners);
    this.bot.command('platforms', handlePlatforms);

    this.bot.command('banner', async (ctx) => {
      await handleBanner(ctx, parseBannerArgs(ctx.message.text));
    });
  }

  /**
   * Setup callback query handlers
   */
  private setupCallbacks(): void {
    this.bot.on('callback_query', handleCallback);
  }

  /**
   * Setup message handlers
   */
  private setupMessages(): void {
    this.bot.on('text', handleMessage);
  }

  /**
   * Setup error handling
   */
  private setupErrorHandling(): void {
    this.bot.catch((err, ctx) => {
      logger.error('Bot error', {
        error: err,
        userId: ctx.from?.id,
        updateType: ctx.updateType,
      });
    });
  }

  /**
   * Start the bot
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      logger.warn('Bot is already running');
      return;
    }

    logger.info('Starting Telegram bot...');

    try {
      await this.bot.telegram.setMyCommands([
        { command: 'start', description: '🚀 Introduction' },
        { command: 'context', description: '📍 Campaign context so far' },
        { command: 'reset', description: '🔄 Start over' },
        { command: 'banner', description: '🎨 Generate a banner' },
        { command: 'banners', description: '🖼️ Banners for all platforms' },
        { command: 'platforms', description: '📐 Banner platforms and sizes' },
        { command: 'about', description: 'ℹ️ Models in use' },
        { command: 'help', description: '❔ Help' },
      ]);
      logger.info('Bot commands menu set');

      // launch() resolves only when polling stops
      this.bot.launch().catch((error: unknown) => {
        logger.error('Telegram polling stopped with an error', { error });
        this.isRunning = false;
      });
      this.isRunning = true;
      logger.info('Telegram bot started successfully');
    } catch (error) {
      logger.error('Failed to start Telegram bot', { error });
      throw error;
    }
  }

  /**
   * Stop the bot
   */
  async stop(): Promise<void> {
    if (!this.isRunning) {
      return;
    }

    logger.info('Stopping Telegram bot...');
    this.bot.stop('SIGTERM');
    this.isRunning = false;
    logger.info('Telegram bot stopped');
  }
}

export default TelegramBot;
