import { createModuleLogger } from '../../utils/logger';
import { capitalize } from '../../utils/helpers';
import { BrandTone, CampaignGoal, Platform, UserContext, ContextUpdate } from './types';

const logger = createModuleLogger('field-extractor');

type PatternTextField = 'targetAudience' | 'productDetails' | 'budget' | 'timeline';
type PatternListField = 'competitors' | 'keyMessages';

interface FieldPatterns<F> {
  field: F;
  patterns: RegExp[];
}

// Matched against the lower-cased message; the first pattern that matches wins per field
const TEXT_PATTERNS: FieldPatterns<PatternTextField>[] = [
  {
    field: 'targetAudience',
    patterns: [
      /(?:audience|target|customers?|users?).{0,20}?(?:is|are|:)\s*([^.!?]+)/,
      /(?:reach|targeting|focusing on)\s+([^.!?]+?)(?:audience|market|demographic)/,
    ],
  },
  {
    field: 'productDetails',
    patterns: [
      /(?:product|service|business|offering).{0,30}?(?:is|are|:)\s*([^.!?]+)/,
      /(?:sell|offer|provide).{0,30}?([^.!?]+)/,
    ],
  },
  {
    field: 'budget',
    patterns: [
      /budget.{0,20}?(?:is|of|:|around|about)\s*([^.!?]+)/,
      /(\$\s?\d[\d,]*\s?(?:k|m)?)/,
    ],
  },
  {
    field: 'timeline',
    patterns: [
      /(?:timeline|deadline|duration).{0,20}?(?:is|of|:|by)\s*([^.!?]+)/,
      /(?:launch(?:ing)?|run(?:ning)?)\s+((?:in|on|by|for|next|this)\s+[^.!?]+)/,
    ],
  },
];

const LIST_PATTERNS: FieldPatterns<PatternListField>[] = [
  {
    field: 'competitors',
    patterns: [
      /(?:competitors?|competition).{0,30}?(?:is|are|:)\s*([^.!?]+)/,
      /(?:competing (?:against|with)|rivals? (?:are|include))\s+([^.!?]+)/,
    ],
  },
  {
    field: 'keyMessages',
    patterns: [
      /(?:message|value|benefit|proposition).{0,30}?(?:is|are|:)\s*([^.!?]+)/,
      /(?:highlight|emphasize|focus on).{0,30}?([^.!?]+)/,
    ],
  },
];

export const TONE_KEYWORDS: [string, BrandTone][] = [
  ['professional', BrandTone.PROFESSIONAL],
  ['casual', BrandTone.CASUAL],
  ['funny', BrandTone.FUNNY],
  ['inspirational', BrandTone.INSPIRATIONAL],
  ['authoritative', BrandTone.AUTHORITATIVE],
];

export const GOAL_KEYWORDS: [string, CampaignGoal][] = [
  ['brand awareness', CampaignGoal.AWARENESS],
  ['awareness', CampaignGoal.AWARENESS],
  ['conversions', CampaignGoal.CONVERSION],
  ['conversion', CampaignGoal.CONVERSION],
  ['engagement', CampaignGoal.ENGAGEMENT],
  ['lead generation', CampaignGoal.LEAD_GENERATION],
  ['leads', CampaignGoal.LEAD_GENERATION],
];

export const PLATFORM_KEYWORDS: [string, Platform][] = [
  ['facebook', Platform.FACEBOOK],
  ['instagram', Platform.INSTAGRAM],
  ['twitter', Platform.TWITTER],
  ['linkedin', Platform.LINKEDIN],
  ['email', Platform.EMAIL],
  ['google ads', Platform.GOOGLE_ADS],
  ['tiktok', Platform.TIKTOK],
  ['youtube', Platform.YOUTUBE],
];

function firstCapture(patterns: RegExp[], text: string): string | undefined {
  for (const pattern of patterns) {
    const match = text.match(pattern);
    const value = match?.[1]?.trim();
    if (value && value.length > 2) {
      return value;
    }
  }
  return undefined;
}

export function splitListValue(value: string): string[] {
  return value
    .split(/[,;]|\band\b/)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function collectKeywords<T>(table: [string, T][], text: string): T[] {
  const found: T[] = [];
  for (const [keyword, value] of table) {
    if (text.includes(keyword) && !found.includes(value)) {
      found.push(value);
    }
  }
  return found;
}

/**
 * Keyword scans for tone (first match), goals and platforms (all matches)
 */
export function extractEnumFields(message: string): ContextUpdate {
  const text = message.toLowerCase();
  const updates: ContextUpdate = {};

  const tone = TONE_KEYWORDS.find(([keyword]) => text.includes(keyword));
  if (tone) {
    updates.brandTone = tone[1];
  }

  const goals = collectKeywords(GOAL_KEYWORDS, text);
  if (goals.length > 0) {
    updates.campaignGoals = goals;
  }

  const platforms = collectKeywords(PLATFORM_KEYWORDS, text);
  if (platforms.length > 0) {
    updates.preferredPlatforms = platforms;
  }

  return updates;
}

/**
 * Pattern-based extraction of context fields from a free-text message.
 * Fields without a match are left out of the update.
 */
export function extractFieldsFromMessage(message: string): ContextUpdate {
  const text = message.toLowerCase();
  const updates: ContextUpdate = {};

  for (const { field, patterns } of TEXT_PATTERNS) {
    const value = firstCapture(patterns, text);
    if (value) {
      updates[field] = capitalize(value);
    }
  }

  for (const { field, patterns } of LIST_PATTERNS) {
    const value = firstCapture(patterns, text);
    if (value) {
      const items = splitListValue(value);
      if (items.length > 0) {
        updates[field] = items;
      }
    }
  }

  return { ...updates, ...extractEnumFields(message) };
}

export type AssistedExtraction = (message: string, context: UserContext) => Promise<ContextUpdate>;

export class FieldExtractor {
  private assist?: AssistedExtraction;

  constructor(assist?: AssistedExtraction) {
    this.assist = assist;
  }

  /**
   * Pattern extraction always runs; assisted results are laid over it
   */
  async extract(message: string, context: UserContext): Promise<ContextUpdate> {
    const patternUpdates = extractFieldsFromMessage(message);

    if (!this.assist) {
      return patternUpdates;
    }

    const assisted = await this.assist(message, context);
    logger.debug('Assisted extraction finished', {
      patternFields: Object.keys(patternUpdates),
      assistedFields: Object.keys(assisted),
    });

    return { ...patternUpdates, ...assisted };
  }
}
