// Notification sink barrel export, factory, and authority wiring.

import type { FastifyBaseLogger } from 'fastify';

import { MemoryNotificationSink } from './memory-sink.js';
import { createRedisClient } from './redis-client.js';
import { RedisNotificationSink } from './redis-sink.js';
import type { NotificationSink } from './types.js';
import type { TokenAuthority } from '../authority/token-authority.js';
import type { NotificationsConfig } from '../config/schema.js';

export type { NotificationSink } from './types.js';
export { MemoryNotificationSink } from './memory-sink.js';
export { RedisNotificationSink } from './redis-sink.js';
export { createRedisClient } from './redis-client.js';
export { serializeEvent } from './serialize.js';

/**
 * Create a notification sink based on configuration.
 * The Redis sink connects before it is returned.
 */
export async function createNotificationSink(
  config: NotificationsConfig,
  logger: FastifyBaseLogger
): Promise<NotificationSink> {
  switch (config.backend) {
    case 'redis': {
      const redis = createRedisClient(config.redis, logger);
      await redis.connect();
      return new RedisNotificationSink(redis, config.channel);
    }
    case 'memory':
    default:
      return new MemoryNotificationSink(config.memoryCapacity);
  }
}

/**
 * Forward every authority notification to `sink`. Delivery failures are
 * logged; the authority state they describe is already committed.
 *
 * @returns function that detaches the sink
 */
export function attachSink(
  authority: TokenAuthority,
  sink: NotificationSink,
  logger: FastifyBaseLogger
): () => void {
  return authority.subscribe((event) => {
    sink.publish(event).catch((err: unknown) => {
      logger.error(
        { err: err instanceof Error ? err.message : 'Unknown error', event: event.type },
        'Notification delivery failed'
      );
    });
  });
}
