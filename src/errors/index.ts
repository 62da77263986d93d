import createError from '@fastify/error';

// Configuration errors (CONFIG_*)
export const ConfigInvalidError = createError<[string]>(
  'CONFIG_INVALID',
  'Invalid configuration: %s',
  500
);

export const ConfigMissingError = createError<[string]>(
  'CONFIG_MISSING',
  'Missing configuration file: %s',
  500
);

export const ConfigParseError = createError<[string]>(
  'CONFIG_PARSE_ERROR',
  'Failed to parse configuration: %s',
  500
);

// Mint intake errors (MINT_*)
export const MintMissingParametersError = createError<[string]>(
  'MINT_MISSING_PARAMETERS',
  'Missing required parameters: %s',
  400
);

export const MintInvalidRequestError = createError<[string]>(
  'MINT_INVALID_REQUEST',
  'Invalid mint request: %s',
  400
);

export const MintInvalidAddressError = createError<[string]>(
  'MINT_INVALID_ADDRESS',
  'Invalid ethAddress: %s',
  400
);

// Storage errors (STORAGE_*)
export const StorageWriteError = createError<[string]>(
  'STORAGE_WRITE_ERROR',
  'Failed to store metadata: %s',
  502
);

// Issuance authority errors (AUTHORITY_*) - re-exported from authority domain
export {
  NotAuthorizedError,
  AlreadyMemberError,
  NotMemberError,
  InvalidReceiverError,
  LengthMismatchError,
  InvalidQuantityError,
  InvalidOperatorError,
  InsufficientBalanceError,
  InvalidAddressError,
} from '../authority/errors.js';
