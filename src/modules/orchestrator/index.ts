import { createModuleLogger } from '../../utils/logger';
import { SessionNotFoundError } from '../../utils/errors';
import { ContextFieldName } from '../../config';
import { LLMClient, ChatTurn } from '../ai/client';
import { SYSTEM_PROMPT, WELCOME_MESSAGE, buildConversationPrompt } from '../ai/prompts';
import { BannerComposer, BannerResult } from '../banner/composer';
import { CampaignComposer } from '../campaign/composer';
import { CampaignDocument } from '../campaign/types';
import { FieldExtractor } from '../context/extractor';
import {
  contextToPromptText,
  createEmptyContext,
  enumLabel,
  getMissingFields,
  mergeContext,
} from '../context/model';
import { UserContext } from '../context/types';
import { InsightEnricher } from '../insights/enricher';
import { withSessionLock } from '../conversation/locks';
import {
  CAMPAIGN_DONE_PROMPT,
  INSIGHTS_INTRO,
  READY_PROMPT,
  StateAdvance,
  advanceState,
  isResearchRequest,
  selectNextQuestion,
} from '../conversation/stateMachine';
import { SessionStore } from '../conversation/store';
import { ChatReply, ConversationState, HistoryEntry, Session } from '../conversation/types';

const logger = createModuleLogger('orchestrator');

export const CAMPAIGN_COMPLETE_MESSAGE =
  "🎉 *Campaign Generation Complete!*\n\nI've created a comprehensive marketing campaign tailored to your needs. Here are your deliverables:";

export interface OrchestratorConfig {
  requiredFields: ContextFieldName[];
  optionalFields: ContextFieldName[];
  maxAgeSeconds: number;
  historyLimit: number;
}

export interface OrchestratorDeps {
  store: SessionStore;
  llm: LLMClient;
  extractor: FieldExtractor;
  enricher: InsightEnricher;
  campaigns: CampaignComposer;
  banners: BannerComposer;
  now?: () => number;
}

export interface SessionSnapshot {
  context: UserContext;
  state: ConversationState;
  isComplete: boolean;
  missingFields: ContextFieldName[];
  missingOptionalFields: ContextFieldName[];
  history: HistoryEntry[];
  campaignDocument?: CampaignDocument;
}

export class Orchestrator {
  private store: SessionStore;
  private llm: LLMClient;
  private extractor: FieldExtractor;
  private enricher: InsightEnricher;
  private campaigns: CampaignComposer;
  private banners: BannerComposer;
  private now: () => number;
  private config: OrchestratorConfig;

  constructor(deps: OrchestratorDeps, config: OrchestratorConfig) {
    this.store = deps.store;
    this.llm = deps.llm;
    this.extractor = deps.extractor;
    this.enricher = deps.enricher;
    this.campaigns = deps.campaigns;
    this.banners = deps.banners;
    this.now = deps.now ?? Date.now;
    this.config = config;
  }

  get modelName(): string {
    return this.llm.model;
  }

  /**
   * Handle one user message: extract, merge, transition, then reply or generate
   */
  async sendMessage(userId: string, text: string): Promise<ChatReply> {
    return withSessionLock(userId, async () => {
      const now = this.now();
      const existing = await this.loadActiveSession(userId, now);
      const session = existing ?? (await this.startSession(userId, now));
      const isNew = !existing;

      session.lastActivity = now;
      this.appendHistory(session, 'user', text, now);

      if (session.state === ConversationState.GENERATING_CAMPAIGN) {
        logger.debug('Message after campaign generation', { userId });
        return this.finish(session, CAMPAIGN_DONE_PROMPT, now);
      }

      const updates = await this.extractor.extract(text, session.context);
      let context = mergeContext(session.context, updates);

      let researched = false;
      if (
        session.state === ConversationState.GATHERING_INSIGHTS &&
        isResearchRequest(text) &&
        !context.webEnhanced
      ) {
        context = await this.enricher.enhance(context);
        researched = context.webEnhanced;
      }

      const advance = advanceState(session.state, context, text, this.config.requiredFields);
      if (advance.entered.length > 0) {
        logger.info('Conversation state changed', {
          userId,
          from: session.state,
          to: advance.state,
          earlyExit: advance.earlyExit,
        });
      }

      session.context = context;
      session.state = advance.state;

      if (advance.state === ConversationState.GENERATING_CAMPAIGN) {
        session.campaignDocument = await this.campaigns.compose(context);
        return this.finish(session, CAMPAIGN_COMPLETE_MESSAGE, now);
      }

      const reply = await this.composeReply(session, text, advance, researched, isNew);
      return this.finish(session, isNew ? `${WELCOME_MESSAGE}\n\n${reply}` : reply, now);
    });
  }

  /**
   * Drop a conversation; the next message starts a new one
   */
  async reset(userId: string): Promise<string> {
    return withSessionLock(userId, async () => {
      const removed = await this.store.delete(userId);
      if (!removed) {
        throw new SessionNotFoundError(userId);
      }
      logger.info('Conversation reset', { userId });
      return WELCOME_MESSAGE;
    });
  }

  async getContext(userId: string): Promise<SessionSnapshot> {
    const session = await this.store.get(userId);
    if (!session) {
      throw new SessionNotFoundError(userId);
    }

    return {
      context: session.context,
      state: session.state,
      isComplete: session.state === ConversationState.GENERATING_CAMPAIGN,
      missingFields: getMissingFields(session.context, this.config.requiredFields),
      missingOptionalFields: getMissingFields(session.context, this.config.optionalFields),
      history: session.history,
      campaignDocument: session.campaignDocument,
    };
  }

  async generateBanner(context: UserContext, aspectRatio?: string, platform?: string): Promise<BannerResult> {
    return this.banners.generateBanner(context, aspectRatio, platform);
  }

  async generateAllPlatformBanners(context: UserContext): Promise<Record<string, BannerResult>> {
    return this.banners.generateAllPlatformBanners(context);
  }

  /**
   * Purge idle conversations; returns how many were dropped
   */
  async sweepExpiredSessions(): Promise<number> {
    const expired = await this.store.sweepExpired(this.config.maxAgeSeconds * 1000, this.now());
    return expired.length;
  }

  /**
   * The user's session, or undefined when there is none or it sat idle past the max age
   */
  private async loadActiveSession(userId: string, now: number): Promise<Session | undefined> {
    const session = await this.store.get(userId);
    if (!session) return undefined;

    if (now - session.lastActivity > this.config.maxAgeSeconds * 1000) {
      await this.store.delete(userId);
      logger.info('Expired conversation dropped', { userId, lastActivity: session.lastActivity });
      return undefined;
    }

    return session;
  }

  private async startSession(userId: string, now: number): Promise<Session> {
    await this.sweepExpiredSessions();
    logger.info('Conversation started', { userId });

    return {
      userId,
      context: createEmptyContext(),
      state: ConversationState.COLLECTING_CONTEXT,
      history: [],
      lastActivity: now,
    };
  }

  private appendHistory(session: Session, role: HistoryEntry['role'], content: string, now: number): void {
    session.history.push({ role, content, timestamp: new Date(now).toISOString() });
    if (session.history.length > this.config.historyLimit) {
      session.history.splice(0, session.history.length - this.config.historyLimit);
    }
  }

  private async finish(session: Session, response: string, now: number): Promise<ChatReply> {
    this.appendHistory(session, 'assistant', response, now);
    await this.store.put(session);

    const isComplete = session.state === ConversationState.GENERATING_CAMPAIGN;
    return {
      response,
      context: session.context,
      state: session.state,
      isComplete,
      campaignDocument: isComplete ? session.campaignDocument : undefined,
    };
  }

  private async composeReply(
    session: Session,
    text: string,
    advance: StateAdvance,
    researched: boolean,
    isNew: boolean
  ): Promise<string> {
    const context = session.context;
    const next = selectNextQuestion(session.state, context, this.config.requiredFields);
    const research = researched ? formatResearchSummary(context) : undefined;

    let body: string;
    if (advance.entered.includes(ConversationState.READY_FOR_CAMPAIGN)) {
      body = READY_PROMPT;
    } else if (advance.entered.includes(ConversationState.GATHERING_INSIGHTS)) {
      body = INSIGHTS_INTRO;
    } else if (isNew || researched) {
      body = next.question;
    } else {
      body = await this.conversationalReply(session, text, next.question);
    }

    return research ? `${research}\n\n${body}` : body;
  }

  /**
   * Ask the model for a natural reply steering toward the next question; the question itself is the fallback
   */
  private async conversationalReply(session: Session, text: string, nextQuestion: string): Promise<string> {
    const earlier: ChatTurn[] = session.history
      .slice(0, -1)
      .map((entry) => ({ role: entry.role, content: entry.content }));

    const prompt = buildConversationPrompt(
      contextToPromptText(session.context),
      enumLabel(session.state),
      text,
      nextQuestion
    );

    const result = await this.llm.chat(SYSTEM_PROMPT, [...earlier, { role: 'user', content: prompt }], {
      task: 'conversation',
    });

    if (!result.ok) {
      logger.warn('Falling back to the scripted question', {
        userId: session.userId,
        reason: result.error.kind,
      });
      return nextQuestion;
    }

    return result.value;
  }
}

export function formatResearchSummary(context: UserContext): string {
  return [
    '🔍 I researched your market.',
    `*Competitors:* ${context.competitors.join(', ')}`,
    `*Trends:* ${context.trendingKeywords.join(', ')}`,
  ].join('\n');
}

export default Orchestrator;
