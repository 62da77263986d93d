// TokenAuthority -- role-gated multi-token issuance.
//
// Holds two role sets (AdminRole, MinterRole), one global token id counter,
// the balance/pointer ledger, and operator approvals. Every mutating method
// takes the calling principal first, checks all of its preconditions, then
// applies its writes and emits notifications. A thrown error means nothing
// changed. A listener that throws does not undo a committed operation; the
// failure goes to the configured logger and the remaining listeners still run.

import { getAddress, hexToBigInt, isAddress, isHex, zeroAddress } from 'viem';
import type { Address } from 'viem';

import {
  assertRole,
  createRoleRegistry,
  getRoleAdmin,
  grantRole,
  hasRole,
  revokeRole,
  roleMembers,
  setRoleAdmin,
} from './access-control.js';
import type { RoleRegistry } from './access-control.js';
import {
  AlreadyMemberError,
  InsufficientBalanceError,
  InvalidAddressError,
  InvalidOperatorError,
  InvalidQuantityError,
  InvalidReceiverError,
  LengthMismatchError,
  NotAuthorizedError,
  NotMemberError,
} from './errors.js';
import { MultiTokenLedger, assertUint256 } from './ledger.js';
import { DEFAULT_ADMIN_ROLE, MINTER_ROLE, isSupportedInterface, roleName } from './roles.js';
import { MAX_UINT256 } from './types.js';
import type {
  AuthorityEvent,
  AuthorityListener,
  AuthorityLogger,
  BatchIssueReceipt,
  RoleId,
  TokenAuthorityOptions,
  TransactionReceipt,
} from './types.js';

export class TokenAuthority {
  /** Creator; holds AdminRole for the lifetime of the authority */
  readonly admin: Address;
  readonly address: Address;

  private readonly roles: RoleRegistry = createRoleRegistry();
  private readonly ledger = new MultiTokenLedger();
  private readonly listeners = new Set<AuthorityListener>();
  private readonly logger: AuthorityLogger | undefined;
  private counter = 0n;
  private base: string;

  constructor(creator: Address, initialMinter: Address, options: TokenAuthorityOptions = {}) {
    this.admin = normalize(creator, 'creator');
    this.address = options.address ? normalize(options.address, 'authority') : zeroAddress;
    this.base = options.baseUri ?? '';
    this.logger = options.logger;

    setRoleAdmin(this.roles, DEFAULT_ADMIN_ROLE, DEFAULT_ADMIN_ROLE);
    setRoleAdmin(this.roles, MINTER_ROLE, DEFAULT_ADMIN_ROLE);
    grantRole(this.roles, DEFAULT_ADMIN_ROLE, this.admin);
    grantRole(this.roles, MINTER_ROLE, normalize(initialMinter, 'minter'));
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  get baseUri(): string {
    return this.base;
  }

  /** Id the next issuance will allocate */
  get nextTokenId(): bigint {
    return this.counter;
  }

  hasRole(role: RoleId, account: Address): boolean {
    return hasRole(this.roles, role, normalize(account, 'account'));
  }

  getRoleAdmin(role: RoleId): RoleId {
    return getRoleAdmin(this.roles, role);
  }

  isMinter(account: Address): boolean {
    return this.hasRole(MINTER_ROLE, account);
  }

  minters(): Address[] {
    return roleMembers(this.roles, MINTER_ROLE);
  }

  balanceOf(owner: Address, id: bigint): bigint {
    return this.ledger.balanceOf(normalize(owner, 'owner'), id);
  }

  balanceOfBatch(owners: readonly Address[], ids: readonly bigint[]): bigint[] {
    if (owners.length !== ids.length) {
      throw new LengthMismatchError(`owners=${owners.length}, ids=${ids.length}`);
    }
    return owners.map((owner, i) => this.balanceOf(owner, ids[i] ?? 0n));
  }

  isApprovedForAll(owner: Address, operator: Address): boolean {
    return this.ledger.isApprovedForAll(normalize(owner, 'owner'), normalize(operator, 'operator'));
  }

  /**
   * Metadata pointer for `id`: the per-id pointer when one is set, otherwise
   * the base prefix followed by the decimal id.
   */
  uri(id: bigint): string {
    const pointer = this.ledger.pointerOf(id);
    if (pointer) {
      return pointer;
    }
    return `${this.base}${id.toString(10)}`;
  }

  supportsInterface(interfaceId: string): boolean {
    return isSupportedInterface(interfaceId);
  }

  // ---------------------------------------------------------------------------
  // Role management
  // ---------------------------------------------------------------------------

  grantMinter(caller: Address, account: Address): TransactionReceipt {
    const sender = normalize(caller, 'caller');
    const target = normalize(account, 'account');
    assertRole(this.roles, getRoleAdmin(this.roles, MINTER_ROLE), sender);
    if (hasRole(this.roles, MINTER_ROLE, target)) {
      throw new AlreadyMemberError(target, roleName(MINTER_ROLE));
    }

    grantRole(this.roles, MINTER_ROLE, target);
    return this.commit([{ type: 'RoleGranted', role: MINTER_ROLE, account: target, sender }]);
  }

  revokeMinter(caller: Address, account: Address): TransactionReceipt {
    const sender = normalize(caller, 'caller');
    const target = normalize(account, 'account');
    assertRole(this.roles, getRoleAdmin(this.roles, MINTER_ROLE), sender);
    if (!hasRole(this.roles, MINTER_ROLE, target)) {
      throw new NotMemberError(target, roleName(MINTER_ROLE));
    }

    revokeRole(this.roles, MINTER_ROLE, target);
    return this.commit([{ type: 'RoleRevoked', role: MINTER_ROLE, account: target, sender }]);
  }

  /** Replaces the prefix uri() falls back to. No notification is emitted. */
  setBaseUri(caller: Address, baseUri: string): TransactionReceipt {
    const sender = normalize(caller, 'caller');
    assertRole(this.roles, getRoleAdmin(this.roles, MINTER_ROLE), sender);

    this.base = baseUri;
    return this.commit([]);
  }

  // ---------------------------------------------------------------------------
  // Issuance
  // ---------------------------------------------------------------------------

  /**
   * Issues `quantity` units of a freshly allocated token id to `receiver` and
   * records `pointer` as its metadata pointer. With `claimable`, the calling
   * minter becomes an approved operator of the receiver (skipped when the
   * minter is the receiver).
   */
  issueSingle(
    caller: Address,
    receiver: Address,
    claimable: boolean,
    quantity: bigint,
    pointer: string
  ): TransactionReceipt {
    const operator = normalize(caller, 'caller');
    assertRole(this.roles, MINTER_ROLE, operator);
    const to = this.assertReceiver(receiver);
    assertUint256(quantity, 'quantity');
    this.assertIdsAvailable(1n);

    const id = this.counter;
    this.counter += 1n;
    this.ledger.credit(to, id, quantity);

    const events: AuthorityEvent[] = [
      { type: 'TransferSingle', operator, from: zeroAddress, to, id, value: quantity },
    ];
    if (pointer) {
      this.ledger.setPointer(id, pointer);
      events.push({ type: 'URI', value: pointer, id });
    }
    if (claimable && to !== operator) {
      events.push(this.approve(to, operator));
    }
    return this.commit(events);
  }

  /**
   * Issues one fresh token id per element of `quantities`, with the pointer at
   * the same index. `prices` must match in length; the values are echoed in
   * the receipt and not otherwise used.
   */
  issueBatch(
    caller: Address,
    receiver: Address,
    claimable: boolean,
    quantities: readonly bigint[],
    prices: readonly bigint[],
    pointers: readonly string[]
  ): BatchIssueReceipt {
    const operator = normalize(caller, 'caller');
    assertRole(this.roles, MINTER_ROLE, operator);
    const to = this.assertReceiver(receiver);
    if (quantities.length !== prices.length || quantities.length !== pointers.length) {
      throw new LengthMismatchError(
        `quantities=${quantities.length}, prices=${prices.length}, pointers=${pointers.length}`
      );
    }
    quantities.forEach((quantity, i) => assertUint256(quantity, `quantities[${i}]`));
    prices.forEach((price, i) => assertUint256(price, `prices[${i}]`));
    this.assertIdsAvailable(BigInt(quantities.length));

    const ids: bigint[] = [];
    const uriEvents: AuthorityEvent[] = [];
    quantities.forEach((quantity, i) => {
      const id = this.counter;
      this.counter += 1n;
      this.ledger.credit(to, id, quantity);
      const pointer = pointers[i] ?? '';
      if (pointer) {
        this.ledger.setPointer(id, pointer);
        uriEvents.push({ type: 'URI', value: pointer, id });
      }
      ids.push(id);
    });

    const events: AuthorityEvent[] = [
      {
        type: 'TransferBatch',
        operator,
        from: zeroAddress,
        to,
        ids: [...ids],
        values: [...quantities],
      },
      ...uriEvents,
    ];
    if (claimable && to !== operator) {
      events.push(this.approve(to, operator));
    }
    return { ...this.commit(events), ids, prices: [...prices] };
  }

  // ---------------------------------------------------------------------------
  // Ledger operations
  // ---------------------------------------------------------------------------

  setApprovalForAll(caller: Address, operator: Address, approved: boolean): TransactionReceipt {
    const owner = normalize(caller, 'caller');
    const target = normalize(operator, 'operator');
    if (owner === target) {
      throw new InvalidOperatorError(`${owner} cannot approve itself`);
    }

    this.ledger.setApproval(owner, target, approved);
    return this.commit([{ type: 'ApprovalForAll', account: owner, operator: target, approved }]);
  }

  /**
   * Moves `amount` of `id` from `from` to `to`. The caller must be `from` or
   * one of its approved operators.
   */
  safeTransferFrom(
    caller: Address,
    from: Address,
    to: Address,
    id: bigint,
    amount: bigint
  ): TransactionReceipt {
    const operator = normalize(caller, 'caller');
    const source = normalize(from, 'from');
    if (operator !== source && !this.ledger.isApprovedForAll(source, operator)) {
      throw new NotAuthorizedError(operator, `operator approval of ${source}`);
    }
    const target = this.assertReceiver(to);
    assertUint256(amount, 'amount');
    const balance = this.ledger.balanceOf(source, id);
    if (balance < amount) {
      throw new InsufficientBalanceError(source, id.toString(), balance.toString(), amount.toString());
    }
    if (source !== target) {
      this.ledger.assertCanCredit(target, id, amount);
    }

    this.ledger.debit(source, id, amount);
    this.ledger.credit(target, id, amount);
    return this.commit([
      { type: 'TransferSingle', operator, from: source, to: target, id, value: amount },
    ]);
  }

  // ---------------------------------------------------------------------------
  // Notifications
  // ---------------------------------------------------------------------------

  /**
   * Registers a listener for every notification emitted after this call.
   * Listeners run synchronously once the emitting operation has committed.
   */
  subscribe(listener: AuthorityListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private assertReceiver(receiver: Address): Address {
    // Short forms of the null principal ('0x0') are not 20-byte addresses
    if (isHex(receiver) && receiver.length > 2 && hexToBigInt(receiver) === 0n) {
      throw new InvalidReceiverError('receiver is the zero address');
    }
    const to = normalize(receiver, 'receiver');
    if (to === zeroAddress) {
      throw new InvalidReceiverError('receiver is the zero address');
    }
    return to;
  }

  private assertIdsAvailable(count: bigint): void {
    if (this.counter + count - 1n > MAX_UINT256) {
      throw new InvalidQuantityError('token id space exhausted');
    }
  }

  private approve(owner: Address, operator: Address): AuthorityEvent {
    this.ledger.setApproval(owner, operator, true);
    return { type: 'ApprovalForAll', account: owner, operator, approved: true };
  }

  private commit(events: AuthorityEvent[]): TransactionReceipt {
    for (const event of events) {
      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (error) {
          this.reportListenerError(error, event);
        }
      }
    }
    return { events };
  }

  private reportListenerError(error: unknown, event: AuthorityEvent): void {
    const err = error instanceof Error ? error.message : String(error);
    if (this.logger) {
      this.logger.error({ err, event: event.type }, 'Authority listener failed');
    } else {
      process.emitWarning(`Authority listener failed on ${event.type}: ${err}`);
    }
  }
}

function normalize(address: string, label: string): Address {
  if (!isAddress(address, { strict: false })) {
    throw new InvalidAddressError(label, address);
  }
  return getAddress(address);
}
