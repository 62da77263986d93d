// Multi-token balance ledger: (owner, id) -> quantity, per-id metadata
// pointers, and operator approvals.
//
// The ledger does no authorization. Callers validate first and then apply
// the mutations, so a thrown precondition never leaves a half-written state.

import type { Address } from 'viem';

import { InvalidQuantityError } from './errors.js';
import { MAX_UINT256 } from './types.js';

export class MultiTokenLedger {
  private readonly balances = new Map<bigint, Map<Address, bigint>>();
  private readonly pointers = new Map<bigint, string>();
  private readonly approvals = new Map<Address, Set<Address>>();

  balanceOf(owner: Address, id: bigint): bigint {
    return this.balances.get(id)?.get(owner) ?? 0n;
  }

  /** Throws InvalidQuantityError if crediting `amount` would overflow uint256 */
  assertCanCredit(owner: Address, id: bigint, amount: bigint): void {
    if (this.balanceOf(owner, id) + amount > MAX_UINT256) {
      throw new InvalidQuantityError(`balance of token ${id} would exceed uint256`);
    }
  }

  credit(owner: Address, id: bigint, amount: bigint): void {
    let holders = this.balances.get(id);
    if (!holders) {
      holders = new Map();
      this.balances.set(id, holders);
    }
    holders.set(owner, (holders.get(owner) ?? 0n) + amount);
  }

  debit(owner: Address, id: bigint, amount: bigint): void {
    const holders = this.balances.get(id);
    const current = holders?.get(owner) ?? 0n;
    holders?.set(owner, current - amount);
  }

  pointerOf(id: bigint): string | undefined {
    return this.pointers.get(id);
  }

  setPointer(id: bigint, pointer: string): void {
    this.pointers.set(id, pointer);
  }

  isApprovedForAll(owner: Address, operator: Address): boolean {
    return this.approvals.get(owner)?.has(operator) ?? false;
  }

  setApproval(owner: Address, operator: Address, approved: boolean): void {
    let operators = this.approvals.get(owner);
    if (!operators) {
      operators = new Set();
      this.approvals.set(owner, operators);
    }
    if (approved) {
      operators.add(operator);
    } else {
      operators.delete(operator);
    }
  }
}

/** Throws InvalidQuantityError unless 0 <= value <= 2^256 - 1 */
export function assertUint256(value: bigint, label: string): void {
  if (value < 0n || value > MAX_UINT256) {
    throw new InvalidQuantityError(`${label} must be within uint256 range, got ${value}`);
  }
}
