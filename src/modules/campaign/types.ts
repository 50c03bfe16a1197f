import { z } from 'zod';

const textList = z.array(z.string());

export const campaignDocumentSchema = z.object({
  campaign_strategy: z.object({
    overview: z.string().default(''),
    targeting: z.string().default(''),
    positioning: z.string().default(''),
    success_metrics: textList.default([]),
  }),
  ad_copy: z.record(textList),
  email_drafts: textList,
  social_media_posts: textList,
  content_calendar: z.record(textList),
  key_messaging: textList,
});

export type CampaignDocument = z.infer<typeof campaignDocumentSchema>;
