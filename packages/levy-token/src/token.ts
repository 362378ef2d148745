// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { Chain } from './chain.js';
import { parseLevyTokenConfig, type LevyTokenConfig, type LevyTokenConfigInput } from './config.js';
import { ZERO_ADDRESS } from './constants.js';
import { InsufficientAllowanceError, InvalidAddressError, SelfRecoveryForbiddenError } from './errors.js';
import { ExemptionRegistry } from './exemptions.js';
import { ReentrancyGuard } from './guard.js';
import { Ledger } from './ledger.js';
import { LevyEngine } from './levy-engine.js';
import { LiquidityConverter } from './liquidity-converter.js';
import { assertUint256, checkedAdd, checkedMul } from './math.js';
import { Ownership } from './ownership.js';
import { TaxWindow } from './tax-window.js';
import type {
  Address,
  EventSink,
  ExchangeGateway,
  FungibleAsset,
  LevyAssessment,
  StatefulParticipant,
} from './types.js';

/**
 * LevyToken: a fungible token with a time-bounded transfer levy.
 *
 * For `taxWindowSeconds` after construction, every transfer between two
 * non-exempt holders withholds `taxPercent` of the amount into the token's
 * own custody and immediately converts it into a liquidity position on the
 * exchange gateway, credited to the administrator. Once the window has
 * closed the token behaves as a plain fungible token.
 *
 * Every state-changing call runs inside `chain.atomic()`: if any step fails
 * (including the exchange rejecting the conversion), nothing moves, no tax
 * is collected and no observation is published.
 *
 * @example
 * ```typescript
 * const chain = new Chain();
 * const paired = new SimpleAsset(chain, { name: 'Wrapped Ether', symbol: 'WETH', minter: admin });
 * const exchange = new MemoryExchange(chain, { pairedAsset: paired.address });
 * const token = new LevyToken(chain, exchange, { administrator: admin });
 *
 * token.transfer(admin, alice, 1_000n * token.unit);   // exempt sender: no levy
 * token.transfer(alice, bob, 100n * token.unit);       // bob receives 95
 * ```
 */
export class LevyToken implements FungibleAsset, StatefulParticipant<bigint> {
  readonly address: Address;
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  /** One whole token in base units. */
  readonly unit: bigint;
  /** Pair created with the gateway's paired asset at construction. */
  readonly pair: Address;
  readonly taxPercent: bigint;

  readonly #chain: Chain;
  readonly #gateway: ExchangeGateway;
  readonly #ledger: Ledger;
  readonly #ownership: Ownership;
  readonly #exemptions: ExemptionRegistry;
  readonly #window: TaxWindow;
  readonly #engine: LevyEngine;
  #nativeBalance = 0n;

  constructor(chain: Chain, gateway: ExchangeGateway, config: LevyTokenConfigInput) {
    const resolved: LevyTokenConfig = parseLevyTokenConfig(config);

    this.#chain = chain;
    this.#gateway = gateway;
    this.address = resolved.address ?? chain.allocateAddress();
    this.name = resolved.name;
    this.symbol = resolved.symbol;
    this.decimals = resolved.decimals;
    this.taxPercent = resolved.taxPercent;

    const emit: EventSink = chain.events.sinkFor(this.address);
    const guard = new ReentrancyGuard();

    this.#ledger = new Ledger(resolved.decimals, emit);
    this.unit = this.#ledger.decimalsScale();
    this.#window = new TaxWindow(chain.now(), resolved.taxWindowSeconds);
    this.#exemptions = new ExemptionRegistry([
      resolved.administrator,
      gateway.address,
      this.address,
    ]);

    const converter = new LiquidityConverter({
      chain,
      ledger: this.#ledger,
      token: this.address,
      custody: this.address,
      gateway,
      liquidityRecipient: () => this.#ownership.owner,
      emit,
    });

    this.#engine = new LevyEngine({
      ledger: this.#ledger,
      exemptions: this.#exemptions,
      window: this.#window,
      guard,
      converter,
      custody: this.address,
      taxPercent: resolved.taxPercent,
      emit,
    });

    // Deployment is one unit: a failed pair creation leaves nothing registered.
    const deployed = chain.atomic(() => {
      const ownership = new Ownership(resolved.administrator, emit);
      this.#ledger.mint(
        resolved.administrator,
        checkedMul(resolved.initialSupplyUnits, this.unit, 'initial supply'),
      );
      chain.register(this.#ledger);
      chain.register(ownership);
      chain.register(this);
      chain.registerAsset(this);
      const pair = gateway.factory().createPair(this.address, gateway.pairedAsset());
      return { ownership, pair };
    });
    this.#ownership = deployed.ownership;
    this.pair = deployed.pair;
  }

  // ─── Ledger reads ─────────────────────────────────────────────────────────

  totalSupply(): bigint {
    return this.#ledger.totalSupply();
  }

  balanceOf(holder: Address): bigint {
    return this.#ledger.balanceOf(holder);
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.#ledger.allowance(owner, spender);
  }

  /** Every identity that has held a balance, in first-seen order. */
  holders(): readonly Address[] {
    return this.#ledger.holders();
  }

  // ─── Transfers ────────────────────────────────────────────────────────────

  transfer(caller: Address, to: Address, amount: bigint): void {
    this.#chain.atomic(() => {
      this.#move(caller, to, amount);
    });
  }

  transferFrom(caller: Address, from: Address, to: Address, amount: bigint): void {
    this.#chain.atomic(() => {
      assertUint256(amount, 'transfer amount');
      this.#ledger.spendAllowance(from, caller, amount);
      this.#move(from, to, amount);
    });
  }

  approve(caller: Address, spender: Address, amount: bigint): void {
    this.#chain.atomic(() => {
      this.#ledger.approve(caller, spender, amount);
    });
  }

  increaseAllowance(caller: Address, spender: Address, addedValue: bigint): void {
    this.#chain.atomic(() => {
      assertUint256(addedValue, 'allowance increase');
      const current = this.#ledger.allowance(caller, spender);
      this.#ledger.approve(caller, spender, checkedAdd(current, addedValue, 'allowance'));
    });
  }

  decreaseAllowance(caller: Address, spender: Address, subtractedValue: bigint): void {
    this.#chain.atomic(() => {
      assertUint256(subtractedValue, 'allowance decrease');
      const current = this.#ledger.allowance(caller, spender);
      if (current < subtractedValue) {
        throw new InsufficientAllowanceError(caller, spender, current, subtractedValue);
      }
      this.#ledger.approve(caller, spender, current - subtractedValue);
    });
  }

  // ─── Levy surface ─────────────────────────────────────────────────────────

  /** The last moment (seconds) at which transfers are still levied. */
  get taxEndTime(): number {
    return this.#window.end;
  }

  /** Seconds until the levy stops applying, never negative. */
  remainingTaxWindow(now: number = this.#chain.now()): number {
    return this.#window.remaining(now);
  }

  isExempt(identity: Address): boolean {
    return this.#exemptions.isExempt(identity);
  }

  exemptIdentities(): readonly Address[] {
    return this.#exemptions.list();
  }

  /** How a transfer would be treated right now, without executing it. */
  previewTransfer(from: Address, to: Address, amount: bigint): LevyAssessment {
    return this.#engine.assess(from, to, amount, this.#chain.now());
  }

  /** Whether a liquidity conversion is currently executing. */
  get converting(): boolean {
    return this.#engine.converting;
  }

  // ─── Administration ───────────────────────────────────────────────────────

  get owner(): Address {
    return this.#ownership.owner;
  }

  transferOwnership(caller: Address, newOwner: Address): void {
    this.#chain.atomic(() => this.#ownership.transfer(caller, newOwner));
  }

  renounceOwnership(caller: Address): void {
    this.#chain.atomic(() => this.#ownership.renounce(caller));
  }

  /**
   * Send `amount` of a foreign asset held by the token's custody to the
   * administrator. The token's own asset can never be recovered; whether
   * custody actually holds `amount` is left to the foreign asset's rules.
   */
  recoverForeignAsset(caller: Address, asset: Address, amount: bigint): void {
    this.#chain.atomic(() => {
      this.#ownership.requireOwner(caller);
      if (asset === this.address) {
        throw new SelfRecoveryForbiddenError(asset);
      }
      this.#chain.asset(asset).transfer(this.address, caller, amount);
    });
  }

  /** Passive receipt of native value; no other logic. */
  receiveNative(_from: Address, amount: bigint): void {
    this.#chain.atomic(() => {
      assertUint256(amount, 'native amount');
      this.#nativeBalance = checkedAdd(this.#nativeBalance, amount, 'native balance');
    });
  }

  nativeBalance(): bigint {
    return this.#nativeBalance;
  }

  get gateway(): Address {
    return this.#gateway.address;
  }

  // ─── Transaction participation ────────────────────────────────────────────

  snapshot(): bigint {
    return this.#nativeBalance;
  }

  restore(snapshot: bigint): void {
    this.#nativeBalance = snapshot;
  }

  #move(from: Address, to: Address, amount: bigint): void {
    if (from === ZERO_ADDRESS) throw new InvalidAddressError('sender');
    if (to === ZERO_ADDRESS) throw new InvalidAddressError('recipient');
    assertUint256(amount, 'transfer amount');
    this.#engine.intercept(from, to, amount, this.#chain.now());
  }
}
