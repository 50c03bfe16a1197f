import { createModuleLogger } from '../../utils/logger';
import { CollaboratorFailure } from '../../utils/errors';
import { UserContext } from '../context/types';
import { SearchProvider } from './search';
import industries from './industries.json';

const logger = createModuleLogger('insight-enricher');

export interface IndustryBucket {
  name: string;
  keywords: string[];
  competitors: string[];
  trends: string[];
}

export const INDUSTRY_BUCKETS: IndustryBucket[] = industries.buckets;

export const GENERAL_BUCKET: IndustryBucket = { ...industries.general, keywords: [] };

export type InsightKind = 'competitors' | 'trends';

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Keywords match at the start of a word ("gadgets", "healthy")
function mentions(text: string, keyword: string): boolean {
  return new RegExp(`\\b${escapeRegExp(keyword)}`).test(text);
}

/**
 * First bucket whose name appears anywhere in the product description ("edtech")
 * or whose keyword starts a word in it, "general" otherwise
 */
export function classifyIndustry(productDetails: string): IndustryBucket {
  const text = productDetails.toLowerCase();
  return (
    INDUSTRY_BUCKETS.find(
      (bucket) => text.includes(bucket.name) || bucket.keywords.some((keyword) => mentions(text, keyword))
    ) ?? GENERAL_BUCKET
  );
}

export function buildInsightQuery(kind: InsightKind, bucket: IndustryBucket, productDetails: string): string {
  return kind === 'competitors'
    ? `top ${bucket.name} competitors for ${productDetails}`
    : `trending ${bucket.name} marketing keywords for ${productDetails}`;
}

/**
 * Static list used when a search cannot produce results, whatever the failure
 */
export function fallbackInsights(
  bucket: IndustryBucket,
  kind: InsightKind,
  failure: CollaboratorFailure
): string[] {
  logger.info('Using static insights', {
    bucket: bucket.name,
    kind,
    reason: failure.kind,
  });
  return kind === 'competitors' ? [...bucket.competitors] : [...bucket.trends];
}

export class InsightEnricher {
  private search?: SearchProvider;

  /**
   * Without a search provider the static bucket lists are used directly
   */
  constructor(search?: SearchProvider) {
    this.search = search;
  }

  private async lookup(kind: InsightKind, bucket: IndustryBucket, productDetails: string): Promise<string[]> {
    if (!this.search) {
      return fallbackInsights(bucket, kind, {
        collaborator: 'search',
        kind: 'disabled',
        message: 'Web search is disabled',
      });
    }

    const result = await this.search.search(buildInsightQuery(kind, bucket, productDetails));
    return result.ok ? result.value : fallbackInsights(bucket, kind, result.error);
  }

  /**
   * Fill competitors and trending keywords once per context.
   * Existing lists are replaced, and the context is marked as enhanced either way.
   */
  async enhance(context: UserContext): Promise<UserContext> {
    if (context.webEnhanced || !context.productDetails) {
      return context;
    }

    const bucket = classifyIndustry(context.productDetails);
    const competitors = await this.lookup('competitors', bucket, context.productDetails);
    const trendingKeywords = await this.lookup('trends', bucket, context.productDetails);

    logger.info('Context enhanced with market insights', {
      bucket: bucket.name,
      competitors: competitors.length,
      trends: trendingKeywords.length,
    });

    return {
      ...context,
      competitors,
      trendingKeywords,
      webEnhanced: true,
    };
  }
}
