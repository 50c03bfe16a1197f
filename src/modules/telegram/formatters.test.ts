import { createDefaultCampaign } from '../campaign/composer';
import { createEmptyContext } from '../context/model';
import { ConversationState } from '../conversation/types';
import {
  campaignDocumentFile,
  formatBannerFailure,
  formatCampaignSummary,
  formatContextSummary,
  formatPlatformList,
} from './formatters';

jest.mock('../../utils/logger', () => ({
  createModuleLogger: () => ({
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  }),
}));

describe('telegram formatters', () => {
  describe('formatContextSummary', () => {
    it('should list known fields, escaped, and what is still needed', () => {
      const context = { ...createEmptyContext(), productDetails: 'Snacks_for_dogs' };

      expect(
        formatContextSummary(context, ConversationState.COLLECTING_CONTEXT, ['targetAudience', 'brandTone'], ['budget'])
      ).toBe(
        '📍 *Campaign context*\n📝 Collecting context\n\n' +
          'Product Details: Snacks\\_for\\_dogs\n\n' +
          '*Still needed:* Target Audience, Brand Tone\n' +
          '*Nice to have:* Budget'
      );
    });

    it('should say when nothing is known yet', () => {
      expect(formatContextSummary(createEmptyContext(), ConversationState.COLLECTING_CONTEXT, [])).toBe(
        '📍 *Campaign context*\n📝 Collecting context\n\nNothing collected yet.'
      );
    });
  });

  describe('formatCampaignSummary', () => {
    it('should summarise each deliverable of the document', () => {
      const summary = formatCampaignSummary(createDefaultCampaign());

      expect(summary.startsWith('📣 *Strategy*\nData-driven marketing campaign')).toBe(true);
      expect(summary).toContain('_google ads:_ High-converting Google Ads copy with relevant keywords');
      expect(summary).toContain('_week 1:_ Platform setup, Content creation, Audience research');
      expect(summary.endsWith('📧 2 email drafts and 📱 3 social posts are in the attached file.')).toBe(true);
    });
  });

  it('should serialise the document as pretty JSON', () => {
    const document = createDefaultCampaign();
    const file = campaignDocumentFile(document);

    expect(file.filename).toBe('campaign.json');
    expect(JSON.parse(file.content.toString('utf-8'))).toEqual(document);
  });

  it('should explain banner refusals', () => {
    expect(
      formatBannerFailure({
        success: false,
        reason: 'invalid_context',
        error: 'missing',
        platform: 'general',
        aspectRatio: '1:1',
      })
    ).toBe('⚠️ Tell me about your product and target audience first, then ask for a banner again.');
    expect(
      formatBannerFailure({
        success: false,
        reason: 'timeout',
        error: 'slow',
        platform: 'instagram_stories',
        aspectRatio: '9:16',
      })
    ).toBe('❌ Could not generate the instagram stories banner. Please try again later.');
  });

  describe('formatPlatformList', () => {
    it('should list every banner platform with its ratio and size', () => {
      const lines = formatPlatformList().split('\n');

      expect(lines).toHaveLength(12);
      expect(lines.slice(0, 4)).toEqual([
        '🖼️ *Banner platforms*',
        '• facebook: 1:1 (1024x1024)',
        '• instagram: 1:1 (1024x1024)',
        '• instagram\\_stories: 9:16 (576x1024)',
      ]);
      expect(lines).toContain('• pinterest: 2:3 (682x1024)');
      expect(lines[11]).toBe('Use /banner RATIO PLATFORM, e.g. /banner 9:16 instagram\\_stories');
    });
  });
});
