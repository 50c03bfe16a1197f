import IORedis from 'ioredis';
import { config } from '../../config';
import { createModuleLogger } from '../../utils/logger';

const logger = createModuleLogger('redis');

export const redisConfig = {
  host: config.store.redisHost,
  port: config.store.redisPort,
  password: config.store.redisPassword,
  lazyConnect: true,
};

/**
 * Open the connection backing the Redis session store
 */
export async function createRedisConnection(): Promise<IORedis> {
  const connection = new IORedis(redisConfig);

  connection.on('connect', () => {
    logger.info('Connected to Redis', { host: redisConfig.host, port: redisConfig.port });
  });

  connection.on('error', (error) => {
    logger.error('Redis connection error', { error });
  });

  await connection.connect();
  return connection;
}
