import createError from '@fastify/error';

// Issuance authority errors (AUTHORITY_*)
//
// All are fail-fast precondition violations. When one is thrown the
// authority state is unchanged.

/** Caller lacks the role the operation requires (403) */
export const NotAuthorizedError = createError<[string, string]>(
  'AUTHORITY_NOT_AUTHORIZED',
  'Account %s is missing role %s',
  403
);

/** Principal already holds the role being granted (409) */
export const AlreadyMemberError = createError<[string, string]>(
  'AUTHORITY_ALREADY_MEMBER',
  'Account %s already holds role %s',
  409
);

/** Principal does not hold the role being revoked (409) */
export const NotMemberError = createError<[string, string]>(
  'AUTHORITY_NOT_MEMBER',
  'Account %s does not hold role %s',
  409
);

/** Receiver is the zero address (400) */
export const InvalidReceiverError = createError<[string]>(
  'AUTHORITY_INVALID_RECEIVER',
  'Invalid receiver: %s',
  400
);

/** Parallel input arrays differ in length (400) */
export const LengthMismatchError = createError<[string]>(
  'AUTHORITY_LENGTH_MISMATCH',
  'Array length mismatch: %s',
  400
);

/** Quantity is negative, above uint256, or would overflow a balance (400) */
export const InvalidQuantityError = createError<[string]>(
  'AUTHORITY_INVALID_QUANTITY',
  'Invalid quantity: %s',
  400
);

/** Account tried to approve itself as operator (400) */
export const InvalidOperatorError = createError<[string]>(
  'AUTHORITY_INVALID_OPERATOR',
  'Invalid operator: %s',
  400
);

/** Sender balance does not cover the transfer (400) */
export const InsufficientBalanceError = createError<[string, string, string, string]>(
  'AUTHORITY_INSUFFICIENT_BALANCE',
  'Insufficient balance for %s on token %s: has %s, needs %s',
  400
);

/** Value is not a 20-byte hex address (400) */
export const InvalidAddressError = createError<[string, string]>(
  'AUTHORITY_INVALID_ADDRESS',
  'Invalid %s address: %s',
  400
);
