// Campaign Context Types

export enum BrandTone {
  PROFESSIONAL = 'professional',
  CASUAL = 'casual',
  FUNNY = 'funny',
  INSPIRATIONAL = 'inspirational',
  AUTHORITATIVE = 'authoritative',
}

export enum CampaignGoal {
  AWARENESS = 'brand_awareness',
  CONVERSION = 'conversions',
  ENGAGEMENT = 'engagement',
  LEAD_GENERATION = 'lead_generation',
}

export enum Platform {
  FACEBOOK = 'facebook',
  INSTAGRAM = 'instagram',
  TWITTER = 'twitter',
  LINKEDIN = 'linkedin',
  EMAIL = 'email',
  GOOGLE_ADS = 'google_ads',
  TIKTOK = 'tiktok',
  YOUTUBE = 'youtube',
}

export interface UserContext {
  // Interview fields
  targetAudience?: string;
  brandTone?: BrandTone;
  campaignGoals: CampaignGoal[];
  preferredPlatforms: Platform[];
  productDetails?: string;

  // Enrichment fields
  competitors: string[];
  trendingKeywords: string[];
  productReferences: string[];
  keyMessages: string[];
  budget?: string;
  timeline?: string;
  uniqueSellingPoints: string[];
  webEnhanced: boolean;
}

/**
 * Partial update produced by extraction; merged into a context by mergeContext
 */
export type ContextUpdate = Partial<UserContext>;
