// In-process notification sink. Keeps the most recent events in memory.

import type { NotificationSink } from './types.js';
import type { AuthorityEvent } from '../authority/types.js';

export class MemoryNotificationSink implements NotificationSink {
  private readonly capacity: number;
  private readonly buffer: AuthorityEvent[] = [];

  constructor(capacity = 1000) {
    this.capacity = capacity;
  }

  async publish(event: AuthorityEvent): Promise<void> {
    this.buffer.push(event);
    if (this.buffer.length > this.capacity) {
      this.buffer.splice(0, this.buffer.length - this.capacity);
    }
  }

  /** Retained events, oldest first */
  events(): AuthorityEvent[] {
    return [...this.buffer];
  }

  async healthy(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.buffer.length = 0;
  }
}
