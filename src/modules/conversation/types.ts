import { UserContext } from '../context/types';
import { CampaignDocument } from '../campaign/types';

export enum ConversationState {
  COLLECTING_CONTEXT = 'collecting_context',
  GATHERING_INSIGHTS = 'gathering_insights',
  READY_FOR_CAMPAIGN = 'ready_for_campaign',
  GENERATING_CAMPAIGN = 'generating_campaign',
}

export interface HistoryEntry {
  role: 'user' | 'assistant';
  content: string;
  timestamp: string;
}

export interface Session {
  userId: string;
  context: UserContext;
  state: ConversationState;
  history: HistoryEntry[];
  lastActivity: number;
  campaignDocument?: CampaignDocument;
}

export interface ChatReply {
  response: string;
  context: UserContext;
  state: ConversationState;
  isComplete: boolean;
  campaignDocument?: CampaignDocument;
}
