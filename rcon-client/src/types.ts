// Branded types for type-safe identifiers

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;

/**
 * Request identifier (signed 32-bit integer echoed by the server)
 */
export type RequestId = number & { readonly __brand: 'RequestId' };

export const RequestId = {
  zero: 0 as RequestId,

  /**
   * Id servers put on an auth response when the password is wrong
   */
  authFailure: -1 as RequestId,

  fromNumber: (value: number): RequestId => {
    if (!Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
      throw new Error(`RequestId must be a 32-bit signed integer, got ${value}`);
    }
    return value as RequestId;
  },

  /**
   * Successor of an id, wrapping from INT32_MAX back to 1.
   * Never yields -1 so an auth failure can always be told apart.
   */
  next: (id: RequestId): RequestId => {
    let value = id >= INT32_MAX ? 1 : id + 1;
    if (value === -1) {
      value = 0;
    }
    return value as RequestId;
  },

  unwrap: (id: RequestId): number => id as number,
};
