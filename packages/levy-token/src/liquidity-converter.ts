// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { Chain } from './chain.js';
import type { Ledger } from './ledger.js';
import type { LiquidityConversion } from './levy-engine.js';
import type { Address, EventSink, ExchangeGateway } from './types.js';

export interface LiquidityConverterOptions {
  readonly chain: Chain;
  /** The levy token's own ledger; custody approvals are written directly. */
  readonly ledger: Ledger;
  readonly token: Address;
  readonly custody: Address;
  readonly gateway: ExchangeGateway;
  /** Resolved at conversion time so an ownership change redirects the position. */
  readonly liquidityRecipient: () => Address;
  readonly emit: EventSink;
}

/**
 * Turns withheld tax into a paired liquidity position.
 *
 * Half of the tax (rounded down) is swapped for the paired asset; the other
 * half plus the custody's entire paired-asset balance is deposited. Both
 * gateway calls accept any price (zero minimums) and must execute at the
 * current moment. The position is credited to the administrator.
 *
 * There is no fallback: a rejected swap or deposit propagates and aborts
 * the transfer that triggered the conversion.
 */
export class LiquidityConverter implements LiquidityConversion {
  readonly #options: LiquidityConverterOptions;

  constructor(options: LiquidityConverterOptions) {
    this.#options = options;
  }

  convert(taxAmount: bigint, now: number): void {
    const { chain, ledger, token, custody, gateway, emit } = this.#options;

    const half = taxAmount / 2n;
    const remainder = taxAmount - half;

    const pairedAddress = gateway.pairedAsset();
    const pairedAsset = chain.asset(pairedAddress);

    ledger.approve(custody, gateway.address, half);
    gateway.swapExactInputSupportingFeeOnTransfer(custody, {
      amountIn: half,
      amountOutMin: 0n,
      path: [token, pairedAddress],
      recipient: custody,
      deadline: now,
    });

    // Sweeps any paired asset custody already held, not just this swap's output.
    const pairedBalance = pairedAsset.balanceOf(custody);

    ledger.approve(custody, gateway.address, remainder);
    pairedAsset.approve(custody, gateway.address, pairedBalance);

    const receipt = gateway.addLiquidity(custody, {
      tokenA: token,
      tokenB: pairedAddress,
      amountADesired: remainder,
      amountBDesired: pairedBalance,
      amountAMin: 0n,
      amountBMin: 0n,
      recipient: this.#options.liquidityRecipient(),
      deadline: now,
    });

    emit({
      type: 'LiquidityAdded',
      tokenAmount: receipt.amountA,
      pairedAssetAmount: receipt.amountB,
    });
  }
}
