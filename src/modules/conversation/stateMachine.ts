import { ContextFieldName, DEFAULT_REQUIRED_FIELDS } from '../../config';
import { getMissingFields, isFieldMissing } from '../context/model';
import { UserContext } from '../context/types';
import { ConversationState } from './types';

export const EARLY_EXIT_TRIGGERS = [
  'generate campaign now',
  'generate the campaign now',
  'use what you have',
  'skip the questions',
  'just generate',
  'create it now',
];

export const AFFIRMATIVE_TRIGGERS = [
  'create campaign',
  'yes',
  'generate',
  'make campaign',
  'proceed',
  'go ahead',
  'ready',
  'start',
];

export const RESEARCH_TRIGGERS = ['research', 'suggest', 'find some', 'look up', 'automate'];

export const FIELD_QUESTIONS: Record<ContextFieldName, string> = {
  targetAudience:
    "🎯 *Target Audience*: Who are you trying to reach? (e.g., 'Young professionals aged 25-35 interested in fitness')",
  brandTone:
    "🎭 *Brand Tone*: How would you describe your brand's personality? (professional, casual, funny, inspirational, authoritative)",
  campaignGoals:
    '🎯 *Campaign Goals*: What do you want to achieve? (brand awareness, conversions, engagement, lead generation)',
  preferredPlatforms:
    '📱 *Platforms*: Where will you market? (Facebook, Instagram, Twitter, LinkedIn, Email, Google Ads, TikTok, YouTube)',
  productDetails: "📦 *Product/Service*: Tell me about what you're offering and its key benefits",
  competitors:
    '🔍 *Competitor Research*: Who are your main competitors? (I can also research some based on your industry)',
  trendingKeywords:
    '📈 *Market Trends*: Any specific keywords or trends you want to target? (I can research current trends in your space)',
  keyMessages: '💡 *Key Messages*: What are your main value propositions or unique selling points?',
  productReferences: '🧭 *References*: Are there similar products or campaigns you admire?',
  uniqueSellingPoints: '⭐ *Unique Selling Points*: What makes your offer stand out?',
  budget: '💰 *Budget*: What budget do you have for this campaign?',
  timeline: '🗓️ *Timeline*: When should the campaign launch and how long should it run?',
};

// Interview order while collecting context
const COLLECTION_PRIORITY: ContextFieldName[] = [
  'targetAudience',
  'brandTone',
  'campaignGoals',
  'preferredPlatforms',
  'productDetails',
];

const INSIGHT_PRIORITY: ContextFieldName[] = ['competitors', 'trendingKeywords', 'keyMessages'];

export const INSIGHTS_INTRO =
  "Great! I have the basics. Now let's gather some strategic insights.\n\nDo you have any specific competitors I should know about, or would you like me to research some based on your industry?";

export const READY_PROMPT =
  "✅ I have everything I need. Reply *yes* when you're ready and I'll generate your campaign, or keep adding details.";

export const CAMPAIGN_DONE_PROMPT =
  'Your campaign has already been generated. Use /reset to plan a new one.';

export interface NextQuestion {
  question: string;
  field?: ContextFieldName;
}

export interface StateAdvance {
  state: ConversationState;
  // States entered during this step, in order
  entered: ConversationState[];
  earlyExit: boolean;
}

export function matchesTrigger(message: string, triggers: readonly string[]): boolean {
  const text = message.toLowerCase();
  return triggers.some((trigger) => text.includes(trigger));
}

export const isEarlyExit = (message: string) => matchesTrigger(message, EARLY_EXIT_TRIGGERS);
export const isAffirmative = (message: string) => matchesTrigger(message, AFFIRMATIVE_TRIGGERS);
export const isResearchRequest = (message: string) => matchesTrigger(message, RESEARCH_TRIGGERS);

export function hasInsights(context: UserContext): boolean {
  return context.competitors.length > 0 && context.trendingKeywords.length > 0;
}

/**
 * Move a conversation forward after the message's updates have been merged.
 * States only move forward; generating_campaign is terminal.
 */
export function advanceState(
  current: ConversationState,
  context: UserContext,
  message: string,
  requiredFields: readonly ContextFieldName[] = DEFAULT_REQUIRED_FIELDS
): StateAdvance {
  if (current === ConversationState.GENERATING_CAMPAIGN) {
    return { state: current, entered: [], earlyExit: false };
  }

  if (isEarlyExit(message)) {
    return {
      state: ConversationState.GENERATING_CAMPAIGN,
      entered: [ConversationState.GENERATING_CAMPAIGN],
      earlyExit: true,
    };
  }

  if (current === ConversationState.READY_FOR_CAMPAIGN) {
    return isAffirmative(message)
      ? {
          state: ConversationState.GENERATING_CAMPAIGN,
          entered: [ConversationState.GENERATING_CAMPAIGN],
          earlyExit: false,
        }
      : { state: current, entered: [], earlyExit: false };
  }

  let state: ConversationState = current;
  const entered: ConversationState[] = [];

  if (
    state === ConversationState.COLLECTING_CONTEXT &&
    getMissingFields(context, requiredFields).length === 0
  ) {
    state = ConversationState.GATHERING_INSIGHTS;
    entered.push(state);
  }

  if (state === ConversationState.GATHERING_INSIGHTS && hasInsights(context)) {
    state = ConversationState.READY_FOR_CAMPAIGN;
    entered.push(state);

    if (isAffirmative(message)) {
      state = ConversationState.GENERATING_CAMPAIGN;
      entered.push(state);
    }
  }

  return { state, entered, earlyExit: false };
}

/**
 * Pick what to ask next for the given state
 */
export function selectNextQuestion(
  state: ConversationState,
  context: UserContext,
  requiredFields: readonly ContextFieldName[] = DEFAULT_REQUIRED_FIELDS
): NextQuestion {
  switch (state) {
    case ConversationState.COLLECTING_CONTEXT: {
      const missing = getMissingFields(context, requiredFields);
      const ordered = [
        ...COLLECTION_PRIORITY.filter((field) => missing.includes(field)),
        ...missing.filter((field) => !COLLECTION_PRIORITY.includes(field)),
      ];
      const field = ordered[0];
      return field ? { question: FIELD_QUESTIONS[field], field } : { question: INSIGHTS_INTRO };
    }

    case ConversationState.GATHERING_INSIGHTS: {
      const field = INSIGHT_PRIORITY.find((candidate) => isFieldMissing(context, candidate));
      return field ? { question: FIELD_QUESTIONS[field], field } : { question: READY_PROMPT };
    }

    case ConversationState.READY_FOR_CAMPAIGN:
      return { question: READY_PROMPT };

    case ConversationState.GENERATING_CAMPAIGN:
      return { question: CAMPAIGN_DONE_PROMPT };
  }
}
