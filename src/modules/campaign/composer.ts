import { createModuleLogger } from '../../utils/logger';
import { CollaboratorFailure } from '../../utils/errors';
import { extractJson } from '../../utils/json';
import { LLMClient } from '../ai/client';
import { SYSTEM_PROMPT, buildCampaignPrompt } from '../ai/prompts';
import { contextToPromptText } from '../context/model';
import { UserContext } from '../context/types';
import { CampaignDocument, campaignDocumentSchema } from './types';

const logger = createModuleLogger('campaign-composer');

export function createDefaultCampaign(): CampaignDocument {
  return {
    campaign_strategy: {
      overview:
        'Data-driven marketing campaign focused on your target audience and business goals.',
      targeting: 'Precision targeting based on audience demographics and behaviors.',
      positioning: 'Clear market positioning highlighting unique value propositions.',
      success_metrics: ['Engagement rate', 'Conversion rate', 'ROI', 'Brand awareness'],
    },
    ad_copy: {
      facebook: ['Engaging Facebook ad copy tailored to your audience'],
      instagram: ['Visual Instagram content with compelling captions'],
      email: ['Professional email campaigns with clear CTAs'],
      google_ads: ['High-converting Google Ads copy with relevant keywords'],
    },
    email_drafts: [
      'Subject: Welcome to Our Campaign\n\nEngaging email content...',
      'Subject: Special Offer Inside\n\nCompelling follow-up content...',
    ],
    social_media_posts: [
      'Engaging social media post with relevant hashtags',
      'Educational content about your industry',
      'Promotional post with clear call-to-action',
    ],
    content_calendar: {
      week_1: ['Platform setup', 'Content creation', 'Audience research'],
      week_2: ['Campaign launch', 'Initial promotions', 'Engagement tracking'],
      week_3: ['Performance analysis', 'Content optimization', 'A/B testing'],
      week_4: ['Scale successful tactics', 'Audience expansion', 'ROI calculation'],
    },
    key_messaging: [
      'Clear value proposition',
      'Compelling unique selling points',
      'Strong call-to-action messaging',
    ],
  };
}

/**
 * Read a campaign document out of model output, or undefined when none fits the schema
 */
export function parseCampaignDocument(output: string): CampaignDocument | undefined {
  const extraction = extractJson(output);
  if (!extraction.found) {
    return undefined;
  }

  const parsed = campaignDocumentSchema.safeParse(extraction.value);
  if (!parsed.success) {
    logger.debug('Campaign JSON does not match the deliverable schema', {
      strategy: extraction.strategy,
      issues: parsed.error.issues.map((issue) => issue.path.join('.')),
    });
    return undefined;
  }

  return parsed.data;
}

/**
 * The default document stands in for every kind of failure
 */
export function campaignFallback(failure: CollaboratorFailure): CampaignDocument {
  logger.warn('Using default campaign document', {
    collaborator: failure.collaborator,
    reason: failure.kind,
    error: failure.message,
  });
  return createDefaultCampaign();
}

export class CampaignComposer {
  private llm: LLMClient;

  constructor(llm: LLMClient) {
    this.llm = llm;
  }

  async compose(context: UserContext): Promise<CampaignDocument> {
    const prompt = buildCampaignPrompt(contextToPromptText(context));

    const result = await this.llm.chat(SYSTEM_PROMPT, [{ role: 'user', content: prompt }], {
      task: 'generate-campaign',
    });

    if (!result.ok) {
      return campaignFallback(result.error);
    }

    const document = parseCampaignDocument(result.value);
    if (!document) {
      return campaignFallback({
        collaborator: 'llm',
        kind: 'malformed',
        message: 'Response did not contain a campaign document',
      });
    }

    logger.info('Campaign document generated', {
      platforms: Object.keys(document.ad_copy),
      emails: document.email_drafts.length,
      posts: document.social_media_posts.length,
    });

    return document;
  }
}
