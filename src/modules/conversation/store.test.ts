import { createDefaultCampaign } from '../campaign/composer';
import { createEmptyContext } from '../context/model';
import { MemorySessionStore, RedisSessionStore, SessionRedisClient } from './store';
import { ConversationState, Session } from './types';

jest.mock('../../utils/logger', () => ({
  createModuleLogger: () => ({
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  }),
}));

function buildSession(userId: string, lastActivity: number): Session {
  return {
    userId,
    context: createEmptyContext(),
    state: ConversationState.COLLECTING_CONTEXT,
    history: [],
    lastActivity,
  };
}

function parseBound(bound: number | string): { value: number; exclusive: boolean } {
  if (typeof bound === 'number') return { value: bound, exclusive: false };
  if (bound === '-inf') return { value: -Infinity, exclusive: false };
  if (bound === '+inf') return { value: Infinity, exclusive: false };
  if (bound.startsWith('(')) return { value: Number(bound.slice(1)), exclusive: true };
  return { value: Number(bound), exclusive: false };
}

// In-process stand-in for the handful of Redis commands the store uses
class FakeRedis implements SessionRedisClient {
  values = new Map<string, string>();
  ttls = new Map<string, number>();
  sortedSets = new Map<string, Map<string, number>>();

  async get(key: string): Promise<string | null> {
    return this.values.get(key) ?? null;
  }

  async set(key: string, value: string, _mode: 'EX', seconds: number): Promise<string> {
    this.values.set(key, value);
    this.ttls.set(key, seconds);
    return 'OK';
  }

  async del(...keys: string[]): Promise<number> {
    let removed = 0;
    for (const key of keys) {
      if (this.values.delete(key)) removed++;
    }
    return removed;
  }

  private sortedSet(key: string): Map<string, number> {
    const existing = this.sortedSets.get(key);
    if (existing) return existing;
    const created = new Map<string, number>();
    this.sortedSets.set(key, created);
    return created;
  }

  async zadd(key: string, score: number, member: string): Promise<number> {
    this.sortedSet(key).set(member, score);
    return 1;
  }

  async zrem(key: string, ...members: string[]): Promise<number> {
    const set = this.sortedSet(key);
    return members.filter((member) => set.delete(member)).length;
  }

  async zrangebyscore(key: string, min: number | string, max: number | string): Promise<string[]> {
    const low = parseBound(min);
    const high = parseBound(max);
    return [...this.sortedSet(key).entries()]
      .filter(([, score]) => (low.exclusive ? score > low.value : score >= low.value))
      .filter(([, score]) => (high.exclusive ? score < high.value : score <= high.value))
      .sort((a, b) => a[1] - b[1])
      .map(([member]) => member);
  }
}

describe('session stores', () => {
  describe('MemorySessionStore', () => {
    let store: MemorySessionStore;

    beforeEach(() => {
      store = new MemorySessionStore();
    });

    it('should round-trip a session by user id', async () => {
      await store.put(buildSession('u1', 1000));

      const session = await store.get('u1');
      expect(session?.userId).toBe('u1');
      expect(await store.get('u2')).toBeUndefined();
    });

    it('should hand out copies', async () => {
      await store.put(buildSession('u1', 1000));

      const session = await store.get('u1');
      session?.context.competitors.push('Acme');

      expect((await store.get('u1'))?.context.competitors).toEqual([]);
    });

    it('should report whether a delete removed anything', async () => {
      await store.put(buildSession('u1', 1000));

      expect(await store.delete('u1')).toBe(true);
      expect(await store.delete('u1')).toBe(false);
    });

    it('should sweep only sessions idle longer than the max age', async () => {
      await store.put(buildSession('stale', 1000));
      await store.put(buildSession('edge', 5000));
      await store.put(buildSession('fresh', 9000));

      const purged = await store.sweepExpired(5000, 10000);

      expect(purged).toEqual(['stale']);
      expect(store.size()).toBe(2);
    });
  });

  describe('RedisSessionStore', () => {
    let redis: FakeRedis;
    let store: RedisSessionStore;

    beforeEach(() => {
      redis = new FakeRedis();
      store = new RedisSessionStore(redis, 3600);
    });

    it('should store sessions as JSON under a prefixed key with a TTL', async () => {
      await store.put(buildSession('u1', 1000));

      expect(redis.ttls.get('campaign-session:u1')).toBe(3600);
      expect((await store.get('u1'))?.state).toBe(ConversationState.COLLECTING_CONTEXT);
    });

    it('should discard a value that is not JSON', async () => {
      redis.values.set('campaign-session:u1', '{broken');

      expect(await store.get('u1')).toBeUndefined();
      expect(redis.values.has('campaign-session:u1')).toBe(false);
    });

    it('should discard a session stored in an older shape', async () => {
      redis.values.set(
        'campaign-session:u1',
        JSON.stringify({ userId: 'u1', context: { productDetails: 'Desks' }, state: 'collecting', lastActivity: 1000 })
      );

      expect(await store.get('u1')).toBeUndefined();
      expect(redis.values.has('campaign-session:u1')).toBe(false);
    });

    it('should restore a stored campaign document', async () => {
      const session: Session = {
        ...buildSession('u1', 1000),
        state: ConversationState.GENERATING_CAMPAIGN,
        campaignDocument: createDefaultCampaign(),
      };
      await store.put(session);

      expect(await store.get('u1')).toEqual(session);
    });

    it('should delete and report removal', async () => {
      await store.put(buildSession('u1', 1000));

      expect(await store.delete('u1')).toBe(true);
      expect(await store.delete('u1')).toBe(false);
    });

    it('should sweep by last activity with the same cutoff as memory', async () => {
      await store.put(buildSession('stale', 1000));
      await store.put(buildSession('edge', 5000));
      await store.put(buildSession('fresh', 9000));

      const purged = await store.sweepExpired(5000, 10000);

      expect(purged).toEqual(['stale']);
      expect(await store.get('stale')).toBeUndefined();
      expect(await store.get('edge')).toBeDefined();
    });
  });
});
