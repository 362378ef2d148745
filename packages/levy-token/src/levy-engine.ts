// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { assertUint256, checkedMul } from './math.js';
import type { ExemptionRegistry } from './exemptions.js';
import type { ReentrancyGuard } from './guard.js';
import type { Ledger } from './ledger.js';
import type { TaxWindow } from './tax-window.js';
import type { Address, EventSink, LevyAssessment } from './types.js';

/** Turns withheld value into liquidity. Failures abort the enclosing transfer. */
export interface LiquidityConversion {
  convert(taxAmount: bigint, now: number): void;
}

export interface LevyEngineOptions {
  readonly ledger: Ledger;
  readonly exemptions: ExemptionRegistry;
  readonly window: TaxWindow;
  readonly guard: ReentrancyGuard;
  readonly converter: LiquidityConversion;
  /** Protocol custody: where withheld value is staged before conversion. */
  readonly custody: Address;
  readonly taxPercent: bigint;
  readonly emit: EventSink;
}

/**
 * Split `amount` into the withheld share and the delivered share.
 *
 * The multiplication is range-checked. The subtraction is not: the tax is
 * a floor of at most 100% of the amount, so it cannot exceed it.
 */
export function computeLevy(
  amount: bigint,
  taxPercent: bigint,
): { readonly taxAmount: bigint; readonly netAmount: bigint } {
  const taxAmount = checkedMul(amount, taxPercent, 'levy') / 100n;
  return { taxAmount, netAmount: amount - taxAmount };
}

/**
 * LevyEngine: intercepts every value move of the levy token.
 *
 * Decision order, first match wins:
 *  1. window closed (`now > end`)        → move unmodified
 *  2. sender exempt                      → move unmodified
 *  3. recipient exempt                   → move unmodified
 *  4. conversion guard held              → move unmodified
 *  5. otherwise                          → net to recipient, tax to custody,
 *                                          then convert the tax under the guard
 *
 * Sender and recipient are not compared with each other: a non-exempt
 * self-transfer is levied like any other transfer.
 */
export class LevyEngine {
  readonly #ledger: Ledger;
  readonly #exemptions: ExemptionRegistry;
  readonly #window: TaxWindow;
  readonly #guard: ReentrancyGuard;
  readonly #converter: LiquidityConversion;
  readonly #custody: Address;
  readonly #taxPercent: bigint;
  readonly #emit: EventSink;

  constructor(options: LevyEngineOptions) {
    if (options.taxPercent < 0n || options.taxPercent > 100n) {
      throw new RangeError('taxPercent must be between 0 and 100.');
    }
    this.#ledger = options.ledger;
    this.#exemptions = options.exemptions;
    this.#window = options.window;
    this.#guard = options.guard;
    this.#converter = options.converter;
    this.#custody = options.custody;
    this.#taxPercent = options.taxPercent;
    this.#emit = options.emit;
  }

  /**
   * Decide how a move would be treated, without moving anything.
   *
   * This method is PURELY READ-ONLY; `intercept()` acts on its verdict.
   * Amounts outside the uint256 range are rejected the same way a transfer
   * rejects them.
   */
  assess(from: Address, to: Address, amount: bigint, now: number): LevyAssessment {
    assertUint256(amount, 'transfer amount');

    const untaxed = (reason: LevyAssessment['reason']): LevyAssessment => ({
      reason,
      amount,
      taxAmount: 0n,
      netAmount: amount,
    });

    if (!this.#window.isOpen(now)) return untaxed('window_closed');
    if (this.#exemptions.isExempt(from)) return untaxed('exempt_sender');
    if (this.#exemptions.isExempt(to)) return untaxed('exempt_recipient');
    if (this.#guard.held) return untaxed('conversion_in_progress');

    const { taxAmount, netAmount } = computeLevy(amount, this.#taxPercent);
    return { reason: 'levied', amount, taxAmount, netAmount };
  }

  /**
   * Perform the value move(s) for a transfer of `amount` from `from` to `to`.
   *
   * Never fails except by propagating a ledger or conversion error; the
   * caller's transaction is then expected to unwind every effect.
   */
  intercept(from: Address, to: Address, amount: bigint, now: number): void {
    const assessment = this.assess(from, to, amount, now);

    if (assessment.reason !== 'levied') {
      this.#ledger.moveValue(from, to, amount);
      return;
    }

    this.#ledger.moveValue(from, to, assessment.netAmount);

    if (assessment.taxAmount > 0n) {
      this.#ledger.moveValue(from, this.#custody, assessment.taxAmount);
      this.#emit({ type: 'TaxCollected', from, amount: assessment.taxAmount });
      this.#guard.run(() => this.#converter.convert(assessment.taxAmount, now));
    }
  }

  /** Whether a conversion currently holds the guard. */
  get converting(): boolean {
    return this.#guard.held;
  }
}
