import { createEmptyContext } from '../context/model';
import { BrandTone, CampaignGoal, UserContext } from '../context/types';
import { BannerComposer, buildBannerPrompt, resolveDimensions } from './composer';
import { ImageProvider } from './fal';

jest.mock('../../utils/logger', () => ({
  createModuleLogger: () => ({
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  }),
}));

function bannerContext(overrides: Partial<UserContext> = {}): UserContext {
  return {
    ...createEmptyContext(),
    productDetails: 'Ergonomic standing desks',
    targetAudience: 'Remote workers',
    ...overrides,
  };
}

function fakeImages(): ImageProvider & { generate: jest.Mock } {
  return {
    modelLabel: 'test-model via fal.ai',
    generate: jest.fn().mockResolvedValue({
      ok: true,
      value: { imageData: 'aW1hZ2U=', url: 'https://images.example.test/banner.png' },
    }),
  };
}

describe('banner composition', () => {
  describe('resolveDimensions', () => {
    it('should map known ratios to their preset size', () => {
      expect(resolveDimensions('2:3')).toEqual({ width: 682, height: 1024 });
      expect(resolveDimensions('16:9')).toEqual({ width: 1024, height: 576 });
    });

    it('should fall back to a square for unknown ratios', () => {
      expect(resolveDimensions('5:4')).toEqual({ width: 1024, height: 1024 });
    });
  });

  describe('buildBannerPrompt', () => {
    it('should combine product, audience, platform, tone, goals and the lead message', () => {
      const context = bannerContext({
        brandTone: BrandTone.CASUAL,
        campaignGoals: [CampaignGoal.CONVERSION],
        keyMessages: ['Work standing up', 'Ships flat'],
      });

      expect(buildBannerPrompt(context, 'linkedin')).toBe(
        [
          'Professional marketing banner for Ergonomic standing desks',
          'targeting Remote workers',
          'LinkedIn professional banner, corporate style',
          'friendly design, warm colors, relatable imagery, approachable',
          'campaign goals: conversions',
          'key message: Work standing up',
          'high quality marketing design',
          'professional photography style',
          'excellent composition',
          'vibrant colors',
          'clear typography',
          'no text overlay needed',
          'marketing and advertising style',
        ].join(', ')
      );
    });

    it('should default to a professional style and a generic platform', () => {
      const prompt = buildBannerPrompt(bannerContext(), 'general');

      expect(prompt).toContain(
        'targeting Remote workers, digital marketing banner, clean corporate design, modern layout, professional typography, sophisticated, high quality'
      );
    });
  });

  describe('BannerComposer', () => {
    const options = { enabled: true, defaultAspectRatio: '16:9', platformDelayMs: 0 };

    it('should refuse when banners are disabled', async () => {
      const images = fakeImages();
      const composer = new BannerComposer(images, { ...options, enabled: false });

      const result = await composer.generateBanner(bannerContext());

      expect(result).toEqual({
        success: false,
        reason: 'disabled',
        error: 'Banner generation is disabled',
        platform: 'general',
        aspectRatio: '16:9',
      });
      expect(images.generate).not.toHaveBeenCalled();
    });

    it('should refuse without product details and audience', async () => {
      const images = fakeImages();
      const composer = new BannerComposer(images, options);

      const result = await composer.generateBanner(bannerContext({ targetAudience: undefined }), '1:1');

      expect(result.success).toBe(false);
      expect(!result.success && result.reason).toBe('invalid_context');
      expect(images.generate).not.toHaveBeenCalled();
    });

    it('should render at the default ratio', async () => {
      const images = fakeImages();
      const composer = new BannerComposer(images, options);

      const result = await composer.generateBanner(bannerContext());

      expect(images.generate).toHaveBeenCalledWith(expect.any(String), 1024, 576);
      expect(result).toEqual({
        success: true,
        imageData: 'aW1hZ2U=',
        imageUrl: 'https://images.example.test/banner.png',
        prompt: buildBannerPrompt(bannerContext(), 'general'),
        aspectRatio: '16:9',
        dimensions: '1024x576',
        platform: 'general',
        model: 'test-model via fal.ai',
      });
    });

    it('should pass image failures through', async () => {
      const images = fakeImages();
      images.generate.mockResolvedValue({
        ok: false,
        error: { collaborator: 'image', kind: 'unavailable', message: 'Request failed with status code 503' },
      });
      const composer = new BannerComposer(images, options);

      const result = await composer.generateBanner(bannerContext(), '9:16', 'tiktok');

      expect(result).toEqual({
        success: false,
        reason: 'unavailable',
        error: 'Request failed with status code 503',
        platform: 'tiktok',
        aspectRatio: '9:16',
      });
    });

    it('should render every platform preset in order', async () => {
      const images = fakeImages();
      const composer = new BannerComposer(images, options);

      const results = await composer.generateAllPlatformBanners(bannerContext());

      expect(Object.keys(results)).toEqual([
        'facebook',
        'instagram',
        'instagram_stories',
        'twitter',
        'linkedin',
        'website',
      ]);
      expect(images.generate).toHaveBeenCalledTimes(6);
      expect(results.instagram_stories.success && results.instagram_stories.dimensions).toBe('576x1024');
    });
  });
});
