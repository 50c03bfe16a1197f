export { TelegramBot } from './bot';
export type { TelegramBotConfig } from './bot';
export type { Orchestrator as BotOrchestrator, BotContext } from './handlers';
