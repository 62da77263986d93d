// Notification sink interface.
//
// A sink receives every notification the authority emits after the emitting
// operation committed. Sinks deliver to external observers (indexers, other
// services); they never feed back into the authority.

import type { AuthorityEvent } from '../authority/types.js';

export interface NotificationSink {
  /** Deliver one notification */
  publish(event: AuthorityEvent): Promise<void>;

  /** Health check -- returns true if the sink can deliver */
  healthy(): Promise<boolean>;

  /** Release connections held by the sink */
  close(): Promise<void>;
}
