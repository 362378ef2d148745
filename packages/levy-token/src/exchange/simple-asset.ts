// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { Chain } from '../chain.js';
import { parseSimpleAssetConfig, type SimpleAssetConfigInput } from '../config.js';
import { NotAdministratorError } from '../errors.js';
import { Ledger } from '../ledger.js';
import type { Address, FungibleAsset } from '../types.js';

/**
 * A plain fungible asset with no levy: the paired asset of the exchange
 * (a wrapped native coin, say) or any foreign asset sent to the token.
 *
 * Methods are overridable so tests can attach behaviour to transfers.
 */
export class SimpleAsset implements FungibleAsset {
  readonly address: Address;
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  readonly minter: Address;

  protected readonly chain: Chain;
  protected readonly ledger: Ledger;

  constructor(chain: Chain, config: SimpleAssetConfigInput) {
    const resolved = parseSimpleAssetConfig(config);

    this.chain = chain;
    this.address = resolved.address ?? chain.allocateAddress();
    this.name = resolved.name;
    this.symbol = resolved.symbol;
    this.decimals = resolved.decimals;
    this.minter = resolved.minter;
    this.ledger = new Ledger(resolved.decimals, chain.events.sinkFor(this.address));

    chain.register(this.ledger);
    chain.registerAsset(this);
  }

  totalSupply(): bigint {
    return this.ledger.totalSupply();
  }

  balanceOf(holder: Address): bigint {
    return this.ledger.balanceOf(holder);
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.ledger.allowance(owner, spender);
  }

  mint(caller: Address, to: Address, amount: bigint): void {
    this.chain.atomic(() => {
      if (caller !== this.minter) {
        throw new NotAdministratorError(caller, this.minter);
      }
      this.ledger.mint(to, amount);
    });
  }

  transfer(caller: Address, to: Address, amount: bigint): void {
    this.chain.atomic(() => {
      this.ledger.moveValue(caller, to, amount);
    });
  }

  approve(caller: Address, spender: Address, amount: bigint): void {
    this.chain.atomic(() => {
      this.ledger.approve(caller, spender, amount);
    });
  }

  transferFrom(caller: Address, from: Address, to: Address, amount: bigint): void {
    this.chain.atomic(() => {
      this.ledger.spendAllowance(from, caller, amount);
      this.ledger.moveValue(from, to, amount);
    });
  }
}
