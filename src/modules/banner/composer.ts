import { createModuleLogger } from '../../utils/logger';
import { CollaboratorFailureKind } from '../../utils/errors';
import { sleep } from '../../utils/helpers';
import { enumLabel } from '../context/model';
import { BrandTone, UserContext } from '../context/types';
import { ImageProvider } from './fal';
import {
  ALL_PLATFORM_BANNERS,
  ASPECT_RATIO_DIMENSIONS,
  Dimensions,
  FALLBACK_ASPECT_RATIO,
  GENERIC_PLATFORM_PROMPT,
  PLATFORM_ASPECT_RATIOS,
  PLATFORM_PROMPTS,
  QUALITY_DESCRIPTORS,
  TONE_STYLES,
} from './presets';

const logger = createModuleLogger('banner-composer');

export interface BannerSpec {
  prompt: string;
  dimensions: Dimensions;
}

export type BannerResult =
  | {
      success: true;
      imageData: string;
      imageUrl: string;
      prompt: string;
      aspectRatio: string;
      dimensions: string;
      platform: string;
      model: string;
    }
  | {
      success: false;
      reason: CollaboratorFailureKind | 'invalid_context';
      error: string;
      platform: string;
      aspectRatio: string;
    };

export interface BannerComposerOptions {
  enabled: boolean;
  defaultAspectRatio: string;
  platformDelayMs: number;
}

export function resolveDimensions(aspectRatio: string): Dimensions {
  return ASPECT_RATIO_DIMENSIONS[aspectRatio] ?? ASPECT_RATIO_DIMENSIONS[FALLBACK_ASPECT_RATIO];
}

export function aspectRatioForPlatform(platform: string): string | undefined {
  return PLATFORM_ASPECT_RATIOS[platform];
}

function toneStyle(tone: BrandTone | undefined): string {
  return TONE_STYLES[tone ?? BrandTone.PROFESSIONAL] ?? TONE_STYLES[BrandTone.PROFESSIONAL];
}

export function buildBannerPrompt(context: UserContext, platform: string): string {
  const parts = [
    `Professional marketing banner for ${context.productDetails || 'our product/service'}`,
    `targeting ${context.targetAudience || 'target customers'}`,
    PLATFORM_PROMPTS[platform] ?? GENERIC_PLATFORM_PROMPT,
    toneStyle(context.brandTone),
  ];

  if (context.campaignGoals.length > 0) {
    parts.push(`campaign goals: ${context.campaignGoals.map(enumLabel).join(', ')}`);
  }

  if (context.keyMessages.length > 0) {
    parts.push(`key message: ${context.keyMessages[0]}`);
  }

  parts.push(...QUALITY_DESCRIPTORS);
  return parts.join(', ');
}

export function composeBanner(context: UserContext, aspectRatio: string, platform = 'general'): BannerSpec {
  return {
    prompt: buildBannerPrompt(context, platform),
    dimensions: resolveDimensions(aspectRatio),
  };
}

export function hasBannerContext(context: UserContext): boolean {
  return Boolean(context.productDetails && context.targetAudience);
}

export class BannerComposer {
  private image?: ImageProvider;
  private options: BannerComposerOptions;

  constructor(image: ImageProvider | undefined, options: BannerComposerOptions) {
    this.image = image;
    this.options = options;
  }

  async generateBanner(
    context: UserContext,
    aspectRatio: string = this.options.defaultAspectRatio,
    platform = 'general'
  ): Promise<BannerResult> {
    if (!this.options.enabled || !this.image) {
      return {
        success: false,
        reason: 'disabled',
        error: 'Banner generation is disabled',
        platform,
        aspectRatio,
      };
    }

    if (!hasBannerContext(context)) {
      return {
        success: false,
        reason: 'invalid_context',
        error: 'Product details and target audience are needed for a banner',
        platform,
        aspectRatio,
      };
    }

    const { prompt, dimensions } = composeBanner(context, aspectRatio, platform);
    logger.info('Generating banner', { platform, aspectRatio, ...dimensions });

    const result = await this.image.generate(prompt, dimensions.width, dimensions.height);
    if (!result.ok) {
      return {
        success: false,
        reason: result.error.kind,
        error: result.error.message,
        platform,
        aspectRatio,
      };
    }

    return {
      success: true,
      imageData: result.value.imageData,
      imageUrl: result.value.url,
      prompt,
      aspectRatio,
      dimensions: `${dimensions.width}x${dimensions.height}`,
      platform,
      model: this.image.modelLabel,
    };
  }

  async generateAllPlatformBanners(context: UserContext): Promise<Record<string, BannerResult>> {
    const results: Record<string, BannerResult> = {};

    for (const [index, [platform, aspectRatio]] of ALL_PLATFORM_BANNERS.entries()) {
      if (index > 0 && this.options.platformDelayMs > 0) {
        await sleep(this.options.platformDelayMs);
      }
      results[platform] = await this.generateBanner(context, aspectRatio, platform);
    }

    return results;
  }
}
