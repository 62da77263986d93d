// JSON wire form of authority notifications. bigint fields become decimal strings.

import type { AuthorityEvent } from '../authority/types.js';

export function serializeEvent(event: AuthorityEvent): string {
  return JSON.stringify(event, (_key, value: unknown) =>
    typeof value === 'bigint' ? value.toString(10) : value
  );
}
