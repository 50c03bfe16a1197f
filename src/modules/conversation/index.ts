export { MemorySessionStore, RedisSessionStore } from './store';
export { withSessionLock, getActiveSessionLocks } from './locks';
export * from './stateMachine';
export * from './types';
export type { SessionStore, SessionRedisClient } from './store';
