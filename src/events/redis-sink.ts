// Redis pub/sub notification sink.
//
// Each notification is published as JSON on one channel. Subscribers (indexers,
// other services) see events in the order the authority emitted them.

import type Redis from 'ioredis';

import { serializeEvent } from './serialize.js';
import type { NotificationSink } from './types.js';
import type { AuthorityEvent } from '../authority/types.js';

export class RedisNotificationSink implements NotificationSink {
  private readonly redis: Redis;
  private readonly channel: string;

  constructor(redis: Redis, channel: string) {
    this.redis = redis;
    this.channel = channel;
  }

  async publish(event: AuthorityEvent): Promise<void> {
    await this.redis.publish(this.channel, serializeEvent(event));
  }

  async healthy(): Promise<boolean> {
    try {
      const pong = await this.redis.ping();
      return pong === 'PONG';
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
