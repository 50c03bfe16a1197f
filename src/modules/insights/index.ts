export {
  InsightEnricher,
  classifyIndustry,
  fallbackInsights,
  buildInsightQuery,
  INDUSTRY_BUCKETS,
  GENERAL_BUCKET,
} from './enricher';
export { SerperSearchProvider } from './search';
export type { IndustryBucket, InsightKind } from './enricher';
export type { SearchProvider, SerperConfig } from './search';
