export {
  CampaignComposer,
  createDefaultCampaign,
  parseCampaignDocument,
  campaignFallback,
} from './composer';
export { campaignDocumentSchema } from './types';
export type { CampaignDocument } from './types';
