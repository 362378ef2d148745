// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { ZERO_ADDRESS } from './constants.js';
import {
  InsufficientAllowanceError,
  InsufficientBalanceError,
  InvalidAddressError,
} from './errors.js';
import { UINT256_MAX, assertUint256, checkedAdd } from './math.js';
import type { Address, EventSink, StatefulParticipant } from './types.js';

interface LedgerSnapshot {
  readonly balances: ReadonlyMap<Address, bigint>;
  readonly allowances: ReadonlyMap<Address, ReadonlyMap<Address, bigint>>;
  readonly totalSupply: bigint;
}

/**
 * Balance and allowance bookkeeping for one fungible asset.
 *
 * Every balance change goes through `moveValue()` (or `mint()`), so the sum
 * of all balances always equals `totalSupply()`. The ledger knows nothing
 * about levies; contracts that need one wrap `moveValue()` instead of
 * overriding it.
 */
export class Ledger implements StatefulParticipant<LedgerSnapshot> {
  readonly decimals: number;
  readonly #emit: EventSink;
  #balances = new Map<Address, bigint>();
  #allowances = new Map<Address, Map<Address, bigint>>();
  #totalSupply = 0n;

  constructor(decimals: number, emit: EventSink) {
    this.decimals = decimals;
    this.#emit = emit;
  }

  // ─── Reads ──────────────────────────────────────────────────────────────

  totalSupply(): bigint {
    return this.#totalSupply;
  }

  balanceOf(holder: Address): bigint {
    return this.#balances.get(holder) ?? 0n;
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.#allowances.get(owner)?.get(spender) ?? 0n;
  }

  /** One whole token expressed in base units: 10^decimals. */
  decimalsScale(): bigint {
    return 10n ** BigInt(this.decimals);
  }

  /** Every identity that has ever held a balance, in first-seen order. */
  holders(): readonly Address[] {
    return Array.from(this.#balances.keys());
  }

  // ─── Writes ─────────────────────────────────────────────────────────────

  mint(to: Address, amount: bigint): void {
    if (to === ZERO_ADDRESS) throw new InvalidAddressError('mint recipient');
    assertUint256(amount, 'mint amount');

    this.#totalSupply = checkedAdd(this.#totalSupply, amount, 'total supply');
    this.#balances.set(to, this.balanceOf(to) + amount);
    this.#emit({ type: 'Transfer', from: ZERO_ADDRESS, to, amount });
  }

  /**
   * Move `amount` from `from` to `to`.
   * Throws InsufficientBalanceError if `from` holds less than `amount`.
   */
  moveValue(from: Address, to: Address, amount: bigint): void {
    if (from === ZERO_ADDRESS) throw new InvalidAddressError('sender');
    if (to === ZERO_ADDRESS) throw new InvalidAddressError('recipient');
    assertUint256(amount, 'transfer amount');

    const fromBalance = this.balanceOf(from);
    if (fromBalance < amount) {
      throw new InsufficientBalanceError(from, fromBalance, amount);
    }

    this.#balances.set(from, fromBalance - amount);
    // Read the recipient after the debit so a self-transfer nets to zero.
    this.#balances.set(to, checkedAdd(this.balanceOf(to), amount, 'recipient balance'));
    this.#emit({ type: 'Transfer', from, to, amount });
  }

  approve(owner: Address, spender: Address, amount: bigint): void {
    if (owner === ZERO_ADDRESS) throw new InvalidAddressError('approver');
    if (spender === ZERO_ADDRESS) throw new InvalidAddressError('spender');
    assertUint256(amount, 'allowance');

    this.#setAllowance(owner, spender, amount);
    this.#emit({ type: 'Approval', owner, spender, amount });
  }

  /**
   * Consume `amount` of the spender's allowance. An allowance of
   * UINT256_MAX is infinite and left untouched. No Approval is published.
   */
  spendAllowance(owner: Address, spender: Address, amount: bigint): void {
    const current = this.allowance(owner, spender);
    if (current === UINT256_MAX) return;
    if (current < amount) {
      throw new InsufficientAllowanceError(owner, spender, current, amount);
    }
    this.#setAllowance(owner, spender, current - amount);
  }

  // ─── Transaction participation ──────────────────────────────────────────

  snapshot(): LedgerSnapshot {
    const allowances = new Map<Address, ReadonlyMap<Address, bigint>>();
    for (const [owner, spenders] of this.#allowances) {
      allowances.set(owner, new Map(spenders));
    }
    return {
      balances: new Map(this.#balances),
      allowances,
      totalSupply: this.#totalSupply,
    };
  }

  restore(snapshot: LedgerSnapshot): void {
    this.#balances = new Map(snapshot.balances);
    this.#allowances = new Map();
    for (const [owner, spenders] of snapshot.allowances) {
      this.#allowances.set(owner, new Map(spenders));
    }
    this.#totalSupply = snapshot.totalSupply;
  }

  #setAllowance(owner: Address, spender: Address, amount: bigint): void {
    const spenders = this.#allowances.get(owner);
    if (spenders !== undefined) {
      spenders.set(spender, amount);
    } else {
      this.#allowances.set(owner, new Map([[spender, amount]]));
    }
  }
}
