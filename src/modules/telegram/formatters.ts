import { CampaignDocument } from '../campaign/types';
import { ConversationState } from '../conversation/types';
import { FIELD_LABELS, contextToPromptText, enumLabel } from '../context/model';
import { BannerResult, resolveDimensions } from '../banner/composer';
import { PLATFORM_ASPECT_RATIOS } from '../banner/presets';
import { ContextFieldName } from '../../config';
import { UserContext } from '../context/types';
import { escapeMarkdown, truncate } from '../../utils/helpers';

// Telegram rejects messages longer than 4096 characters
export const MAX_MESSAGE_LENGTH = 4000;

const STATE_LABELS: Record<ConversationState, string> = {
  [ConversationState.COLLECTING_CONTEXT]: '📝 Collecting context',
  [ConversationState.GATHERING_INSIGHTS]: '🔍 Gathering insights',
  [ConversationState.READY_FOR_CAMPAIGN]: '✅ Ready for campaign',
  [ConversationState.GENERATING_CAMPAIGN]: '🎉 Campaign generated',
};

export function formatState(state: ConversationState): string {
  return STATE_LABELS[state];
}

export function formatContextSummary(
  context: UserContext,
  state: ConversationState,
  missingFields: ContextFieldName[],
  missingOptionalFields: ContextFieldName[] = []
): string {
  const known = contextToPromptText(context);

  let message = `📍 *Campaign context*\n${formatState(state)}\n\n`;
  message += known ? escapeMarkdown(known) : 'Nothing collected yet.';

  if (missingFields.length > 0) {
    message += `\n\n*Still needed:* ${missingFields.map((field) => FIELD_LABELS[field]).join(', ')}`;
  }

  if (missingOptionalFields.length > 0) {
    message += `\n*Nice to have:* ${missingOptionalFields.map((field) => FIELD_LABELS[field]).join(', ')}`;
  }

  return truncate(message, MAX_MESSAGE_LENGTH);
}

function bulletList(items: string[]): string {
  return items.map((item) => `• ${escapeMarkdown(item)}`).join('\n');
}

export function formatCampaignSummary(document: CampaignDocument): string {
  const strategy = document.campaign_strategy;
  const sections: string[] = [];

  sections.push(`📣 *Strategy*\n${escapeMarkdown(strategy.overview)}`);

  if (strategy.positioning) {
    sections.push(`🧭 *Positioning*\n${escapeMarkdown(strategy.positioning)}`);
  }

  if (strategy.success_metrics.length > 0) {
    sections.push(`📊 *Success metrics*\n${bulletList(strategy.success_metrics)}`);
  }

  const adCopy = Object.entries(document.ad_copy)
    .filter(([, lines]) => lines.length > 0)
    .map(([platform, lines]) => `_${escapeMarkdown(enumLabel(platform))}:_ ${escapeMarkdown(lines[0])}`);
  if (adCopy.length > 0) {
    sections.push(`✍️ *Ad copy*\n${adCopy.join('\n')}`);
  }

  if (document.key_messaging.length > 0) {
    sections.push(`💡 *Key messaging*\n${bulletList(document.key_messaging)}`);
  }

  const calendar = Object.entries(document.content_calendar).map(
    ([week, tasks]) => `_${escapeMarkdown(enumLabel(week))}:_ ${escapeMarkdown(tasks.join(', '))}`
  );
  if (calendar.length > 0) {
    sections.push(`🗓️ *Content calendar*\n${calendar.join('\n')}`);
  }

  sections.push(
    `📧 ${document.email_drafts.length} email drafts and 📱 ${document.social_media_posts.length} social posts are in the attached file.`
  );

  return truncate(sections.join('\n\n'), MAX_MESSAGE_LENGTH);
}

export function campaignDocumentFile(document: CampaignDocument): { filename: string; content: Buffer } {
  return {
    filename: 'campaign.json',
    content: Buffer.from(JSON.stringify(document, null, 2), 'utf-8'),
  };
}

export function formatBannerCaption(result: Extract<BannerResult, { success: true }>): string {
  return `🎨 ${enumLabel(result.platform)} banner, ${result.aspectRatio} (${result.dimensions})`;
}

export function formatBannerFailure(result: Extract<BannerResult, { success: false }>): string {
  switch (result.reason) {
    case 'disabled':
      return '⚠️ Banner generation is turned off.';
    case 'invalid_context':
      return '⚠️ Tell me about your product and target audience first, then ask for a banner again.';
    default:
      return `❌ Could not generate the ${enumLabel(result.platform)} banner. Please try again later.`;
  }
}

export function formatPlatformList(): string {
  const lines = Object.entries(PLATFORM_ASPECT_RATIOS).map(([platform, ratio]) => {
    const { width, height } = resolveDimensions(ratio);
    return `• ${escapeMarkdown(platform)}: ${ratio} (${width}x${height})`;
  });

  return `🖼️ *Banner platforms*\n${lines.join('\n')}\n\nUse /banner RATIO PLATFORM, e.g. /banner 9:16 instagram\\_stories`;
}
