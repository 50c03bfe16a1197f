import { Context, Input } from 'telegraf';
import { InlineKeyboardMarkup } from 'telegraf/types';
import config from '../../config';
import { createModuleLogger } from '../../utils/logger';
import { SessionNotFoundError } from '../../utils/errors';
import { truncate } from '../../utils/helpers';
import { BannerResult, aspectRatioForPlatform } from '../banner/composer';
import { ASPECT_RATIO_DIMENSIONS } from '../banner/presets';
import { CampaignDocument } from '../campaign/types';
import { UserContext } from '../context/types';
import { ChatReply } from '../conversation/types';
import { CAMPAIGN_COMPLETE_MESSAGE, SessionSnapshot } from '../orchestrator';
import {
  MAX_MESSAGE_LENGTH,
  campaignDocumentFile,
  formatBannerCaption,
  formatBannerFailure,
  formatCampaignSummary,
  formatContextSummary,
  formatPlatformList,
} from './formatters';
import { createAspectRatioKeyboard, createMainMenuKeyboard, keyboardForState } from './keyboards';

const logger = createModuleLogger('telegram-handlers');

export type BotContext = Context;

// Orchestrator interface (will be injected)
export interface Orchestrator {
  readonly modelName: string;
  sendMessage(userId: string, text: string): Promise<ChatReply>;
  reset(userId: string): Promise<string>;
  getContext(userId: string): Promise<SessionSnapshot>;
  generateBanner(context: UserContext, aspectRatio?: string, platform?: string): Promise<BannerResult>;
  generateAllPlatformBanners(context: UserContext): Promise<Record<string, BannerResult>>;
}

export interface BannerRequest {
  aspectRatio?: string;
  platform?: string;
}

const NOT_READY_MESSAGE = '⚠️ The assistant is still starting up';
const NO_SESSION_MESSAGE = "📭 We haven't started yet. Tell me about your product to begin.";
const EARLY_EXIT_COMMAND = 'generate campaign now';

let orchestrator: Orchestrator | null = null;

/**
 * Set orchestrator instance
 */
export function setOrchestrator(orch: Orchestrator): void {
  orchestrator = orch;
}

function userIdOf(ctx: BotContext): string | undefined {
  return ctx.from ? String(ctx.from.id) : undefined;
}

/**
 * Parse the arguments of /banner: an aspect ratio like 9:16 and a platform name, in any order
 */
export function parseBannerArgs(text: string): BannerRequest {
  const request: BannerRequest = {};
  const args = text.replace(/^\/banner(@\w+)?/, '').trim().split(/\s+/).filter(Boolean);

  for (const arg of args) {
    if (/^\d+:\d+$/.test(arg)) {
      request.aspectRatio = arg;
    } else {
      request.platform = arg.toLowerCase();
    }
  }

  if (!request.aspectRatio && request.platform) {
    request.aspectRatio = aspectRatioForPlatform(request.platform);
  }

  return request;
}

/**
 * Reply with legacy Markdown, resending as plain text when Telegram rejects the entities
 */
async function replyMarkdown(ctx: BotContext, text: string, keyboard?: InlineKeyboardMarkup): Promise<void> {
  try {
    await ctx.reply(text, { parse_mode: 'Markdown', reply_markup: keyboard });
  } catch (error) {
    logger.warn('Markdown reply rejected, sending plain text', {
      error: error instanceof Error ? error.message : String(error),
    });
    await ctx.reply(text, { reply_markup: keyboard });
  }
}

async function replyWithFailure(ctx: BotContext, error: unknown, action: string): Promise<void> {
  if (error instanceof SessionNotFoundError) {
    await ctx.reply(NO_SESSION_MESSAGE);
    return;
  }

  logger.error(`Failed to ${action}`, { error, userId: ctx.from?.id });
  await ctx.reply(`❌ Could not ${action}. Please try again.`);
}

async function sendCampaign(ctx: BotContext, document: CampaignDocument): Promise<void> {
  await replyMarkdown(ctx, formatCampaignSummary(document));

  const file = campaignDocumentFile(document);
  await ctx.replyWithDocument(Input.fromBuffer(file.content, file.filename), {
    caption: '📎 Full campaign document',
  });
}

async function sendBanner(ctx: BotContext, result: BannerResult): Promise<void> {
  if (!result.success) {
    await ctx.reply(formatBannerFailure(result));
    return;
  }

  await ctx.replyWithPhoto(Input.fromBuffer(Buffer.from(result.imageData, 'base64'), `${result.platform}.png`), {
    caption: formatBannerCaption(result),
  });
}

async function deliverReply(ctx: BotContext, reply: ChatReply): Promise<void> {
  const justGenerated = reply.isComplete && reply.response === CAMPAIGN_COMPLETE_MESSAGE;

  await replyMarkdown(
    ctx,
    truncate(reply.response, MAX_MESSAGE_LENGTH),
    justGenerated ? undefined : keyboardForState(reply.state)
  );

  if (justGenerated && reply.campaignDocument) {
    await sendCampaign(ctx, reply.campaignDocument);
    await ctx.reply('What next?', { reply_markup: keyboardForState(reply.state) });
  }
}

async function converse(ctx: BotContext, text: string): Promise<void> {
  const userId = userIdOf(ctx);
  if (!orchestrator || !userId) {
    await ctx.reply(NOT_READY_MESSAGE);
    return;
  }

  await ctx.sendChatAction('typing');

  try {
    const reply = await orchestrator.sendMessage(userId, text);
    await deliverReply(ctx, reply);
  } catch (error) {
    await replyWithFailure(ctx, error, 'process your message');
  }
}

/**
 * Handle /start command
 */
export async function handleStart(ctx: BotContext): Promise<void> {
  logger.info('Start command received', { userId: ctx.from?.id });

  const welcomeMessage = `🤖 *${config.app.name}*

I'll help you plan a marketing campaign step by step. Tell me about your product and who it's for, and I'll ask about whatever is still missing.

*What you get:*
• 📣 Strategy, positioning and success metrics
• ✍️ Ad copy per platform, emails and social posts
• 🗓️ A four-week content calendar
• 🎨 Banner images for each platform

Just start typing, or pick an action:`;

  await replyMarkdown(ctx, welcomeMessage, createMainMenuKeyboard());
}

/**
 * Handle /help command
 */
export async function handleHelp(ctx: BotContext): Promise<void> {
  const helpMessage = `📚 *Commands*

/start — introduction
/context — what I know about your campaign so far
/reset — forget everything and start over
/banner RATIO PLATFORM — one banner, e.g. /banner 9:16 instagram\\_stories
/banners — banners for every major platform
/platforms — banner platforms and their sizes
/about — the models behind the assistant

*Tips:*
• Mention several details in one message, I'll pick them all up
• Ask me to "research" competitors and trends once the basics are in
• Say "generate campaign now" to skip the remaining questions`;

  await replyMarkdown(ctx, helpMessage);
}

/**
 * Handle /platforms command
 */
export async function handlePlatforms(ctx: BotContext): Promise<void> {
  await replyMarkdown(ctx, formatPlatformList());
}

/**
 * Handle /about command
 */
export async function handleAbout(ctx: BotContext): Promise<void> {
  if (!orchestrator) {
    await ctx.reply(NOT_READY_MESSAGE);
    return;
  }

  const lines = [
    `🤖 ${config.app.name} v${config.app.version}`,
    `Language model: ${orchestrator.modelName}`,
    `Web research: ${config.search.enabled ? 'on' : 'off'}`,
    `Banners: ${config.banner.enabled ? config.banner.modelId : 'off'}`,
  ];

  await ctx.reply(lines.join('\n'));
}

/**
 * Handle free text: every message is a conversation turn
 */
export async function handleMessage(ctx: BotContext): Promise<void> {
  const message = ctx.message;
  if (!message || !('text' in message)) return;

  logger.info('Message received', { userId: ctx.from?.id, text: message.text.substring(0, 50) });
  await converse(ctx, message.text);
}

/**
 * Handle /context command
 */
export async function handleShowContext(ctx: BotContext): Promise<void> {
  const userId = userIdOf(ctx);
  if (!orchestrator || !userId) {
    await ctx.reply(NOT_READY_MESSAGE);
    return;
  }

  try {
    const snapshot = await orchestrator.getContext(userId);
    await replyMarkdown(
      ctx,
      formatContextSummary(
        snapshot.context,
        snapshot.state,
        snapshot.missingFields,
        snapshot.missingOptionalFields
      ),
      keyboardForState(snapshot.state)
    );
  } catch (error) {
    await replyWithFailure(ctx, error, 'load your campaign context');
  }
}

/**
 * Handle /reset command
 */
export async function handleReset(ctx: BotContext): Promise<void> {
  const userId = userIdOf(ctx);
  if (!orchestrator || !userId) {
    await ctx.reply(NOT_READY_MESSAGE);
    return;
  }

  try {
    const welcome = await orchestrator.reset(userId);
    await replyMarkdown(ctx, `🔄 Starting over.\n\n${welcome}`);
  } catch (error) {
    await replyWithFailure(ctx, error, 'reset the conversation');
  }
}

/**
 * Handle /banner command
 */
export async function handleBanner(ctx: BotContext, request: BannerRequest): Promise<void> {
  const userId = userIdOf(ctx);
  if (!orchestrator || !userId) {
    await ctx.reply(NOT_READY_MESSAGE);
    return;
  }

  if (!request.aspectRatio && !request.platform) {
    await ctx.reply('🖼️ Pick an aspect ratio:', { reply_markup: createAspectRatioKeyboard() });
    return;
  }

  if (request.aspectRatio && !ASPECT_RATIO_DIMENSIONS[request.aspectRatio]) {
    await ctx.reply(`ℹ️ ${request.aspectRatio} is not a preset, rendering a square banner instead.`);
  }

  try {
    const snapshot = await orchestrator.getContext(userId);
    await ctx.sendChatAction('upload_photo');
    const result = await orchestrator.generateBanner(snapshot.context, request.aspectRatio, request.platform);
    await sendBanner(ctx, result);
  } catch (error) {
    await replyWithFailure(ctx, error, 'generate the banner');
  }
}

/**
 * Handle /banners command
 */
export async function handleAllBanners(ctx: BotContext): Promise<void> {
  const userId = userIdOf(ctx);
  if (!orchestrator || !userId) {
    await ctx.reply(NOT_READY_MESSAGE);
    return;
  }

  try {
    const snapshot = await orchestrator.getContext(userId);
    await ctx.reply('⏳ Rendering banners for every platform, this takes a minute...');
    await ctx.sendChatAction('upload_photo');

    const results = await orchestrator.generateAllPlatformBanners(snapshot.context);
    const outcomes = Object.values(results);

    // Refusals are the same for every platform, so say it once
    const refused = outcomes.find(
      (result) => !result.success && (result.reason === 'disabled' || result.reason === 'invalid_context')
    );
    if (refused) {
      await sendBanner(ctx, refused);
      return;
    }

    for (const result of outcomes) {
      await sendBanner(ctx, result);
    }

    const rendered = outcomes.filter((result) => result.success).length;
    await ctx.reply(`✅ ${rendered} of ${outcomes.length} banners rendered`);
  } catch (error) {
    await replyWithFailure(ctx, error, 'generate the banners');
  }
}

/**
 * Handle menu callbacks
 */
async function handleMenuCallback(ctx: BotContext, action: string): Promise<void> {
  await ctx.answerCbQuery();

  switch (action) {
    case 'context':
      await handleShowContext(ctx);
      break;
    case 'reset':
      await handleReset(ctx);
      break;
    case 'banner':
      await handleBanner(ctx, {});
      break;
    case 'banners':
      await handleAllBanners(ctx);
      break;
    case 'help':
      await handleHelp(ctx);
      break;
    default:
      logger.warn('Unknown menu action', { action });
  }
}

/**
 * Handle callback queries (button clicks)
 */
export async function handleCallback(ctx: BotContext): Promise<void> {
  if (!orchestrator) {
    await ctx.answerCbQuery(NOT_READY_MESSAGE);
    return;
  }

  const callbackQuery = ctx.callbackQuery;
  if (!callbackQuery || !('data' in callbackQuery)) return;

  const data = callbackQuery.data;
  logger.info('Callback received', { userId: ctx.from?.id, data });

  const [action, ...params] = data.split(':');
  const param = params.join(':');

  try {
    switch (action) {
      case 'generate':
        await ctx.answerCbQuery('Generating...');
        await converse(ctx, EARLY_EXIT_COMMAND);
        break;

      case 'banner':
        await ctx.answerCbQuery(`Rendering ${param}...`);
        await handleBanner(ctx, { aspectRatio: param });
        break;

      case 'menu':
        await handleMenuCallback(ctx, param);
        break;

      default:
        await ctx.answerCbQuery('Unknown action');
    }
  } catch (error) {
    logger.error('Failed to handle callback', { error, data });
    await ctx.reply('❌ Something went wrong. Please try again.');
  }
}

export default {
  setOrchestrator,
  parseBannerArgs,
  handleStart,
  handleHelp,
  handleAbout,
  handleMessage,
  handleShowContext,
  handleReset,
  handleBanner,
  handleAllBanners,
  handleCallback,
};
