import { z } from 'zod';
import { createModuleLogger } from '../../utils/logger';
import { campaignDocumentSchema } from '../campaign/types';
import { BrandTone, CampaignGoal, Platform } from '../context/types';
import { ConversationState, Session } from './types';

const logger = createModuleLogger('session-store');

/**
 * Where conversations live between messages
 */
export interface SessionStore {
  get(userId: string): Promise<Session | undefined>;
  put(session: Session): Promise<void>;
  delete(userId: string): Promise<boolean>;
  /** Drop every session idle longer than maxAgeMs; returns the purged user ids */
  sweepExpired(maxAgeMs: number, now?: number): Promise<string[]>;
}

function cloneSession(session: Session): Session {
  return structuredClone(session);
}

export class MemorySessionStore implements SessionStore {
  private sessions = new Map<string, Session>();

  async get(userId: string): Promise<Session | undefined> {
    const session = this.sessions.get(userId);
    return session ? cloneSession(session) : undefined;
  }

  async put(session: Session): Promise<void> {
    this.sessions.set(session.userId, cloneSession(session));
  }

  async delete(userId: string): Promise<boolean> {
    return this.sessions.delete(userId);
  }

  async sweepExpired(maxAgeMs: number, now: number = Date.now()): Promise<string[]> {
    const expired: string[] = [];
    for (const [userId, session] of this.sessions) {
      if (now - session.lastActivity > maxAgeMs) {
        expired.push(userId);
      }
    }
    for (const userId of expired) {
      this.sessions.delete(userId);
    }
    if (expired.length > 0) {
      logger.info('Expired sessions purged', { count: expired.length });
    }
    return expired;
  }

  size(): number {
    return this.sessions.size;
  }
}

/**
 * The subset of the ioredis client the Redis store relies on
 */
export interface SessionRedisClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  zadd(key: string, score: number, member: string): Promise<unknown>;
  zrem(key: string, ...members: string[]): Promise<number>;
  zrangebyscore(key: string, min: number | string, max: number | string): Promise<string[]>;
}

const textList = z.array(z.string());

// Shape of a stored session; records written by an older release fail it and are dropped
const storedSessionSchema = z.object({
  userId: z.string(),
  context: z.object({
    targetAudience: z.string().optional(),
    brandTone: z.nativeEnum(BrandTone).optional(),
    campaignGoals: z.array(z.nativeEnum(CampaignGoal)),
    preferredPlatforms: z.array(z.nativeEnum(Platform)),
    productDetails: z.string().optional(),
    competitors: textList,
    trendingKeywords: textList,
    productReferences: textList,
    keyMessages: textList,
    budget: z.string().optional(),
    timeline: z.string().optional(),
    uniqueSellingPoints: textList,
    webEnhanced: z.boolean(),
  }),
  state: z.nativeEnum(ConversationState),
  history: z.array(
    z.object({
      role: z.enum(['user', 'assistant']),
      content: z.string(),
      timestamp: z.string(),
    })
  ),
  lastActivity: z.number(),
  campaignDocument: campaignDocumentSchema.optional(),
});

const SESSION_PREFIX = 'campaign-session:';
const ACTIVITY_INDEX = 'campaign-session:activity';

/**
 * Sessions as JSON values with a TTL; a sorted set of last-activity times drives the sweep
 */
export class RedisSessionStore implements SessionStore {
  private redis: SessionRedisClient;
  private ttlSeconds: number;

  constructor(redis: SessionRedisClient, ttlSeconds: number) {
    this.redis = redis;
    this.ttlSeconds = ttlSeconds;
  }

  private key(userId: string): string {
    return `${SESSION_PREFIX}${userId}`;
  }

  async get(userId: string): Promise<Session | undefined> {
    const raw = await this.redis.get(this.key(userId));
    if (!raw) return undefined;

    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch (error) {
      logger.error('Stored session is not valid JSON, discarding', { userId, error });
      await this.delete(userId);
      return undefined;
    }

    const parsed = storedSessionSchema.safeParse(value);
    if (!parsed.success) {
      logger.warn('Stored session has an unknown shape, discarding', {
        userId,
        issues: parsed.error.issues.map((issue) => issue.path.join('.')),
      });
      await this.delete(userId);
      return undefined;
    }

    const session: Session = parsed.data;
    return session;
  }

  async put(session: Session): Promise<void> {
    await this.redis.set(this.key(session.userId), JSON.stringify(session), 'EX', this.ttlSeconds);
    await this.redis.zadd(ACTIVITY_INDEX, session.lastActivity, session.userId);
  }

  async delete(userId: string): Promise<boolean> {
    const removed = await this.redis.del(this.key(userId));
    await this.redis.zrem(ACTIVITY_INDEX, userId);
    return removed > 0;
  }

  async sweepExpired(maxAgeMs: number, now: number = Date.now()): Promise<string[]> {
    // Strictly older than the cutoff, matching the in-memory store
    const expired = await this.redis.zrangebyscore(ACTIVITY_INDEX, '-inf', `(${now - maxAgeMs}`);
    if (expired.length === 0) return [];

    await this.redis.del(...expired.map((userId) => this.key(userId)));
    await this.redis.zrem(ACTIVITY_INDEX, ...expired);

    logger.info('Expired sessions purged', { count: expired.length });
    return expired;
  }
}
