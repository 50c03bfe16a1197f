import { BrandTone } from '../context/types';

export interface Dimensions {
  width: number;
  height: number;
}

export const ASPECT_RATIO_DIMENSIONS: Record<string, Dimensions> = {
  '1:1': { width: 1024, height: 1024 },
  '16:9': { width: 1024, height: 576 },
  '9:16': { width: 576, height: 1024 },
  '4:3': { width: 1024, height: 768 },
  '3:4': { width: 768, height: 1024 },
  '2:3': { width: 682, height: 1024 },
};

// Unrecognized ratios render at this ratio's size
export const FALLBACK_ASPECT_RATIO = '1:1';

export const PLATFORM_ASPECT_RATIOS: Record<string, string> = {
  facebook: '1:1',
  instagram: '1:1',
  instagram_stories: '9:16',
  twitter: '16:9',
  linkedin: '1:1',
  youtube: '16:9',
  tiktok: '9:16',
  pinterest: '2:3',
  website: '16:9',
};

export const PLATFORM_PROMPTS: Record<string, string> = {
  facebook: 'Facebook ad banner, optimized for news feed',
  instagram: 'Instagram post, visually appealing and shareable',
  instagram_stories: 'Instagram story, vertical format, engaging',
  twitter: 'Twitter header or promoted post banner',
  linkedin: 'LinkedIn professional banner, corporate style',
  youtube: 'YouTube channel art or video thumbnail',
  tiktok: 'TikTok video thumbnail, trendy and eye-catching',
  pinterest: 'Pinterest pin, inspirational and detailed',
  website: 'Website header banner, professional and clean',
};

export const GENERIC_PLATFORM_PROMPT = 'digital marketing banner';

export const TONE_STYLES: Record<BrandTone, string> = {
  [BrandTone.PROFESSIONAL]:
    'clean corporate design, modern layout, professional typography, sophisticated',
  [BrandTone.CASUAL]: 'friendly design, warm colors, relatable imagery, approachable',
  [BrandTone.FUNNY]: 'playful design, bright colors, engaging composition, humorous elements',
  [BrandTone.INSPIRATIONAL]:
    'uplifting design, motivational imagery, elegant composition, inspiring',
  [BrandTone.AUTHORITATIVE]: 'bold design, strong typography, premium aesthetic, trustworthy',
};

export const QUALITY_DESCRIPTORS = [
  'high quality marketing design',
  'professional photography style',
  'excellent composition',
  'vibrant colors',
  'clear typography',
  'no text overlay needed',
  'marketing and advertising style',
];

// Rendered in this order by the all-platforms request
export const ALL_PLATFORM_BANNERS: [string, string][] = [
  ['facebook', '1:1'],
  ['instagram', '1:1'],
  ['instagram_stories', '9:16'],
  ['twitter', '16:9'],
  ['linkedin', '1:1'],
  ['website', '16:9'],
];
