import { LLMClient } from '../ai/client';
import { createEmptyContext } from '../context/model';
import { CampaignComposer, createDefaultCampaign, parseCampaignDocument } from './composer';

jest.mock('../../utils/logger', () => ({
  createModuleLogger: () => ({
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  }),
}));

const generatedDocument = {
  campaign_strategy: {
    overview: 'Own the home-office upgrade moment',
    targeting: 'Remote workers 25-45',
    positioning: 'Premium but practical',
    success_metrics: ['CTR above 2%'],
  },
  ad_copy: { linkedin: ['Stand up for your back'] },
  email_drafts: ['Subject: Your desk, upgraded'],
  social_media_posts: ['Day 1 of standing: surprisingly great'],
  content_calendar: { week_1: ['Teaser posts'] },
  key_messaging: ['Health without effort'],
};

function fakeLLM(chat: LLMClient['chat']): LLMClient {
  return { model: 'test-model', chat };
}

describe('CampaignComposer', () => {
  describe('parseCampaignDocument', () => {
    it('should read a document wrapped in prose and a code fence', () => {
      const output = `Here is your campaign:\n\`\`\`json\n${JSON.stringify(generatedDocument)}\n\`\`\`\nGood luck!`;

      expect(parseCampaignDocument(output)).toEqual(generatedDocument);
    });

    it('should default missing strategy fields', () => {
      const document = parseCampaignDocument(
        JSON.stringify({ ...generatedDocument, campaign_strategy: { overview: 'Short' } })
      );

      expect(document?.campaign_strategy).toEqual({
        overview: 'Short',
        targeting: '',
        positioning: '',
        success_metrics: [],
      });
    });

    it('should reject JSON missing a deliverable', () => {
      const { key_messaging: _omitted, ...partial } = generatedDocument;

      expect(parseCampaignDocument(JSON.stringify(partial))).toBeUndefined();
    });

    it('should reject output without JSON', () => {
      expect(parseCampaignDocument('I could not write a campaign this time.')).toBeUndefined();
    });
  });

  it('should return the generated document', async () => {
    const chat = jest.fn().mockResolvedValue({ ok: true, value: JSON.stringify(generatedDocument) });
    const composer = new CampaignComposer(fakeLLM(chat));

    await expect(composer.compose(createEmptyContext())).resolves.toEqual(generatedDocument);
    expect(chat).toHaveBeenCalledWith(expect.any(String), [expect.objectContaining({ role: 'user' })], {
      task: 'generate-campaign',
    });
  });

  it('should fall back to the default document when the model is unreachable', async () => {
    const chat = jest.fn().mockResolvedValue({
      ok: false,
      error: { collaborator: 'llm', kind: 'unavailable', message: 'connect ECONNREFUSED' },
    });
    const composer = new CampaignComposer(fakeLLM(chat));

    await expect(composer.compose(createEmptyContext())).resolves.toEqual(createDefaultCampaign());
  });

  it('should fall back to the default document on unusable output', async () => {
    const chat = jest.fn().mockResolvedValue({ ok: true, value: '{"campaign_strategy": "just do it"}' });
    const composer = new CampaignComposer(fakeLLM(chat));

    const document = await composer.compose(createEmptyContext());

    expect(Object.keys(document).sort()).toEqual([
      'ad_copy',
      'campaign_strategy',
      'content_calendar',
      'email_drafts',
      'key_messaging',
      'social_media_posts',
    ]);
    expect(document.key_messaging).toEqual([
      'Clear value proposition',
      'Compelling unique selling points',
      'Strong call-to-action messaging',
    ]);
  });
});
