// Request ID reference counter for generating monotonically increasing request IDs

import { RequestId } from '../types.js';

/**
 * Mutable reference to the last issued request ID
 */
export interface RequestIdRef {
  /** Last issued request ID (0 before the first allocation) */
  readonly current: RequestId;

  /** Get the next request ID (increments current) */
  next(): RequestId;
}

/**
 * Create a new RequestIdRef starting at `start`
 */
export function createRequestIdRef(start: RequestId = RequestId.zero): RequestIdRef {
  let current: RequestId = start;

  return {
    get current(): RequestId {
      return current;
    },

    next(): RequestId {
      current = RequestId.next(current);
      return current;
    },
  };
}
