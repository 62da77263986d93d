// Barrel exports for the issuance authority module

// Types
export type {
  RoleId,
  AuthorityEvent,
  AuthorityEventType,
  AuthorityListener,
  TransactionReceipt,
  BatchIssueReceipt,
  AuthorityLogger,
  TokenAuthorityOptions,
  RoleGrantedEvent,
  RoleRevokedEvent,
  TransferSingleEvent,
  TransferBatchEvent,
  ApprovalForAllEvent,
  UriEvent,
} from './types.js';
export { MAX_UINT256 } from './types.js';

// Roles and capability ids
export { DEFAULT_ADMIN_ROLE, MINTER_ROLE, INTERFACE_IDS, roleName, isSupportedInterface } from './roles.js';

// Errors
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
} from './errors.js';

// Authority
export { TokenAuthority } from './token-authority.js';
