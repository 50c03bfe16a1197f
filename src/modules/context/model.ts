import { ContextFieldName, DEFAULT_REQUIRED_FIELDS } from '../../config';
import { isEmpty, unionPreservingOrder } from '../../utils/helpers';
import { UserContext, ContextUpdate } from './types';

export const FIELD_LABELS: Record<ContextFieldName, string> = {
  targetAudience: 'Target Audience',
  brandTone: 'Brand Tone',
  campaignGoals: 'Campaign Goals',
  preferredPlatforms: 'Preferred Platforms',
  productDetails: 'Product Details',
  competitors: 'Competitors',
  trendingKeywords: 'Trending Keywords',
  productReferences: 'Product References',
  keyMessages: 'Key Messages',
  uniqueSellingPoints: 'Unique Selling Points',
  budget: 'Budget',
  timeline: 'Timeline',
};

// Order used when the context is written into prompts
const PROMPT_FIELD_ORDER: ContextFieldName[] = [
  'targetAudience',
  'brandTone',
  'campaignGoals',
  'preferredPlatforms',
  'productDetails',
  'competitors',
  'trendingKeywords',
  'productReferences',
  'keyMessages',
  'uniqueSellingPoints',
  'budget',
  'timeline',
];

export function createEmptyContext(): UserContext {
  return {
    campaignGoals: [],
    preferredPlatforms: [],
    competitors: [],
    trendingKeywords: [],
    productReferences: [],
    keyMessages: [],
    uniqueSellingPoints: [],
    webEnhanced: false,
  };
}

/**
 * Canonical display form of an enum value: "lead_generation" -> "lead generation"
 */
export function enumLabel(value: string): string {
  return value.replace(/_/g, ' ');
}

/**
 * A longer text is treated as the more specific one
 */
function mergeText(current: string | undefined, incoming: string | undefined): string | undefined {
  if (incoming === undefined || isEmpty(incoming)) return current;
  if (current === undefined || isEmpty(current)) return incoming;
  return incoming.length > current.length ? incoming : current;
}

function mergeList<T>(current: T[], incoming: T[] | undefined): T[] {
  if (!incoming || incoming.length === 0) return [...current];
  return unionPreservingOrder(current, incoming);
}

/**
 * Merge an update into a context without losing anything already known.
 * Lists are unioned in first-seen order, text is replaced only by longer text,
 * everything else is only filled when still unset.
 */
export function mergeContext(current: UserContext, update: ContextUpdate): UserContext {
  return {
    targetAudience: mergeText(current.targetAudience, update.targetAudience),
    brandTone: current.brandTone || update.brandTone,
    campaignGoals: mergeList(current.campaignGoals, update.campaignGoals),
    preferredPlatforms: mergeList(current.preferredPlatforms, update.preferredPlatforms),
    productDetails: mergeText(current.productDetails, update.productDetails),
    competitors: mergeList(current.competitors, update.competitors),
    trendingKeywords: mergeList(current.trendingKeywords, update.trendingKeywords),
    productReferences: mergeList(current.productReferences, update.productReferences),
    keyMessages: mergeList(current.keyMessages, update.keyMessages),
    budget: mergeText(current.budget, update.budget),
    timeline: mergeText(current.timeline, update.timeline),
    uniqueSellingPoints: mergeList(current.uniqueSellingPoints, update.uniqueSellingPoints),
    webEnhanced: current.webEnhanced || update.webEnhanced === true,
  };
}

export function isFieldMissing(context: UserContext, field: ContextFieldName): boolean {
  return isEmpty(context[field]);
}

export function getMissingFields(
  context: UserContext,
  requiredFields: readonly ContextFieldName[] = DEFAULT_REQUIRED_FIELDS
): ContextFieldName[] {
  return requiredFields.filter((field) => isFieldMissing(context, field));
}

export function isContextComplete(
  context: UserContext,
  requiredFields: readonly ContextFieldName[] = DEFAULT_REQUIRED_FIELDS
): boolean {
  return getMissingFields(context, requiredFields).length === 0;
}

function formatFieldValue(context: UserContext, field: ContextFieldName): string {
  switch (field) {
    case 'brandTone':
      return context.brandTone ? enumLabel(context.brandTone) : '';
    case 'campaignGoals':
      return context.campaignGoals.map(enumLabel).join(', ');
    case 'preferredPlatforms':
      return context.preferredPlatforms.map(enumLabel).join(', ');
    case 'targetAudience':
    case 'productDetails':
    case 'budget':
    case 'timeline':
      return context[field] ?? '';
    default:
      return context[field].join(', ');
  }
}

/**
 * One "Label: value" line per known field, in a fixed order, skipping missing fields
 */
export function contextToPromptText(context: UserContext): string {
  const lines = PROMPT_FIELD_ORDER.filter((field) => !isFieldMissing(context, field)).map(
    (field) => `${FIELD_LABELS[field]}: ${formatFieldValue(context, field)}`
  );

  if (context.webEnhanced) {
    lines.push('Web Research: included');
  }

  return lines.join('\n');
}
