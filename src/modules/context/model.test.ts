import {
  contextToPromptText,
  createEmptyContext,
  getMissingFields,
  isContextComplete,
  mergeContext,
} from './model';
import { BrandTone, CampaignGoal, Platform, UserContext } from './types';

function buildContext(overrides: Partial<UserContext> = {}): UserContext {
  return { ...createEmptyContext(), ...overrides };
}

describe('context model', () => {
  describe('mergeContext', () => {
    it('should replace text only with a longer value', () => {
      const current = buildContext({ targetAudience: 'Students' });

      expect(mergeContext(current, { targetAudience: 'College students in Boston' }).targetAudience).toBe(
        'College students in Boston'
      );
      expect(mergeContext(current, { targetAudience: 'Kids' }).targetAudience).toBe('Students');
    });

    it('should fill empty text fields and ignore blank updates', () => {
      const current = buildContext({ productDetails: 'Meal kits' });

      expect(mergeContext(buildContext(), { budget: '$5k' }).budget).toBe('$5k');
      expect(mergeContext(current, { productDetails: '   ' }).productDetails).toBe('Meal kits');
    });

    it('should union lists in first-seen order', () => {
      const current = buildContext({ competitors: ['Acme', 'Globex'] });
      const merged = mergeContext(current, { competitors: ['Globex', 'Initech'] });

      expect(merged.competitors).toEqual(['Acme', 'Globex', 'Initech']);
      expect(current.competitors).toEqual(['Acme', 'Globex']);
    });

    it('should replace product details only when the new text is longer', () => {
      const current = buildContext({ productDetails: 'Shoes' });

      expect(mergeContext(current, { productDetails: 'Sneakers' }).productDetails).toBe('Sneakers');
      expect(mergeContext(current, { productDetails: 'Shoe' }).productDetails).toBe('Shoes');
    });

    it('should be idempotent', () => {
      const update = { targetAudience: 'Busy parents', competitors: ['Acme'], brandTone: BrandTone.FUNNY };
      const once = mergeContext(createEmptyContext(), update);

      expect(mergeContext(once, update)).toEqual(once);
    });

    it('should not duplicate or reorder known list items', () => {
      const current = buildContext({ competitors: ['Acme', 'Globex'] });

      expect(mergeContext(current, { competitors: ['Acme'] }).competitors).toEqual(['Acme', 'Globex']);
    });

    it('should keep the first brand tone', () => {
      const current = buildContext({ brandTone: BrandTone.CASUAL });

      expect(mergeContext(current, { brandTone: BrandTone.FUNNY }).brandTone).toBe(BrandTone.CASUAL);
      expect(mergeContext(buildContext(), { brandTone: BrandTone.FUNNY }).brandTone).toBe(BrandTone.FUNNY);
    });

    it('should never clear the web research flag', () => {
      const researched = buildContext({ webEnhanced: true });

      expect(mergeContext(researched, { webEnhanced: false }).webEnhanced).toBe(true);
      expect(mergeContext(buildContext(), { webEnhanced: true }).webEnhanced).toBe(true);
      expect(mergeContext(buildContext(), {}).webEnhanced).toBe(false);
    });
  });

  describe('getMissingFields', () => {
    it('should list every default required field for an empty context', () => {
      expect(getMissingFields(createEmptyContext())).toEqual([
        'targetAudience',
        'brandTone',
        'campaignGoals',
        'preferredPlatforms',
        'productDetails',
      ]);
    });

    it('should agree with isContextComplete', () => {
      const partial = buildContext({ productDetails: 'Meal kits' });
      const full = buildContext({
        targetAudience: 'Young professionals',
        brandTone: BrandTone.CASUAL,
        campaignGoals: [CampaignGoal.ENGAGEMENT],
        preferredPlatforms: [Platform.TIKTOK],
        productDetails: 'Meal kits',
      });

      expect(isContextComplete(partial)).toBe(false);
      expect(getMissingFields(partial)).not.toHaveLength(0);
      expect(isContextComplete(full)).toBe(true);
      expect(getMissingFields(full)).toEqual([]);
    });

    it('should respect a custom required list', () => {
      const context = buildContext({ productDetails: 'Meal kits' });

      expect(getMissingFields(context, ['productDetails', 'budget'])).toEqual(['budget']);
      expect(isContextComplete(context, ['productDetails'])).toBe(true);
    });
  });

  describe('contextToPromptText', () => {
    it('should write known fields in a fixed order with readable enum values', () => {
      const context = buildContext({
        productDetails: 'Meal kits',
        preferredPlatforms: [Platform.GOOGLE_ADS, Platform.INSTAGRAM],
        campaignGoals: [CampaignGoal.AWARENESS, CampaignGoal.LEAD_GENERATION],
        brandTone: BrandTone.CASUAL,
        targetAudience: 'Young professionals',
      });

      expect(contextToPromptText(context)).toBe(
        [
          'Target Audience: Young professionals',
          'Brand Tone: casual',
          'Campaign Goals: brand awareness, lead generation',
          'Preferred Platforms: google ads, instagram',
          'Product Details: Meal kits',
        ].join('\n')
      );
    });

    it('should note web research', () => {
      const context = buildContext({ competitors: ['Acme', 'Globex'], webEnhanced: true });

      expect(contextToPromptText(context)).toBe('Competitors: Acme, Globex\nWeb Research: included');
    });

    it('should be empty for an empty context', () => {
      expect(contextToPromptText(createEmptyContext())).toBe('');
    });
  });
});
