// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { Chain } from '../chain.js';
import {
  DEFAULT_GATEWAY_ADDRESS,
  EXCHANGE_FEE_DENOMINATOR,
  EXCHANGE_FEE_NUMERATOR,
  LOCKED_LIQUIDITY_ADDRESS,
  MINIMUM_LIQUIDITY,
  ZERO_ADDRESS,
} from '../constants.js';
import { ExchangeError } from '../errors.js';
import { Ledger } from '../ledger.js';
import { minBigInt, sqrt } from '../math.js';
import type {
  Address,
  ExchangeGateway,
  LiquidityReceipt,
  LiquidityRequest,
  PairFactory,
  StatefulParticipant,
  SwapRequest,
} from '../types.js';

// ─── Pricing ─────────────────────────────────────────────────────────────────

/**
 * Output of a constant-product swap after the 0.3% input fee.
 */
export function getAmountOut(amountIn: bigint, reserveIn: bigint, reserveOut: bigint): bigint {
  if (amountIn <= 0n) throw new ExchangeError('INSUFFICIENT_INPUT_AMOUNT');
  if (reserveIn <= 0n || reserveOut <= 0n) throw new ExchangeError('INSUFFICIENT_LIQUIDITY');

  const amountInWithFee = amountIn * EXCHANGE_FEE_NUMERATOR;
  const numerator = amountInWithFee * reserveOut;
  const denominator = reserveIn * EXCHANGE_FEE_DENOMINATOR + amountInWithFee;
  return numerator / denominator;
}

/** Amount of B worth `amountA` at the current reserve ratio. */
export function quote(amountA: bigint, reserveA: bigint, reserveB: bigint): bigint {
  if (amountA <= 0n) throw new ExchangeError('INSUFFICIENT_AMOUNT');
  if (reserveA <= 0n || reserveB <= 0n) throw new ExchangeError('INSUFFICIENT_LIQUIDITY');
  return (amountA * reserveB) / reserveA;
}

// ─── Pair ────────────────────────────────────────────────────────────────────

interface PairState {
  readonly reserve0: bigint;
  readonly reserve1: bigint;
  readonly locked: boolean;
}

/**
 * A constant-product pool for two assets. Tokens are sorted so that
 * `token0 < token1`. Reserves are only synced at the end of `mint()` and
 * `swap()`; anything transferred in between counts as input to the next call.
 */
export class LiquidityPair implements StatefulParticipant<PairState> {
  readonly address: Address;
  readonly token0: Address;
  readonly token1: Address;
  /** Liquidity-position units. */
  readonly positions: Ledger;

  readonly #chain: Chain;
  #reserve0 = 0n;
  #reserve1 = 0n;
  #locked = false;

  constructor(chain: Chain, address: Address, tokenA: Address, tokenB: Address) {
    this.#chain = chain;
    this.address = address;
    const ordered = tokenA < tokenB;
    this.token0 = ordered ? tokenA : tokenB;
    this.token1 = ordered ? tokenB : tokenA;
    this.positions = new Ledger(18, chain.events.sinkFor(address));
    chain.register(this.positions);
    chain.register(this);
  }

  getReserves(): readonly [bigint, bigint] {
    return [this.#reserve0, this.#reserve1];
  }

  /** Reserves ordered as (reserve of `token`, reserve of the other token). */
  reservesFor(token: Address): readonly [bigint, bigint] {
    return token === this.token0
      ? [this.#reserve0, this.#reserve1]
      : [this.#reserve1, this.#reserve0];
  }

  /**
   * Credit liquidity for whatever was transferred in since the last sync.
   * The first deposit permanently locks MINIMUM_LIQUIDITY.
   */
  mint(to: Address): bigint {
    return this.#withLock(() => {
      const [balance0, balance1] = this.#balances();
      const amount0 = balance0 - this.#reserve0;
      const amount1 = balance1 - this.#reserve1;
      const supply = this.positions.totalSupply();

      let liquidity: bigint;
      if (supply === 0n) {
        liquidity = sqrt(amount0 * amount1) - MINIMUM_LIQUIDITY;
        this.positions.mint(LOCKED_LIQUIDITY_ADDRESS, MINIMUM_LIQUIDITY);
      } else {
        liquidity = minBigInt(
          (amount0 * supply) / this.#reserve0,
          (amount1 * supply) / this.#reserve1,
        );
      }
      if (liquidity <= 0n) throw new ExchangeError('INSUFFICIENT_LIQUIDITY_MINTED');

      // A position credited to nobody is as good as locked.
      this.positions.mint(to === ZERO_ADDRESS ? LOCKED_LIQUIDITY_ADDRESS : to, liquidity);
      this.#sync(balance0, balance1);
      return liquidity;
    });
  }

  /**
   * Send out the requested amounts, then require that what came in keeps the
   * fee-adjusted product at or above its previous value.
   */
  swap(amount0Out: bigint, amount1Out: bigint, to: Address): void {
    this.#withLock(() => {
      if (amount0Out <= 0n && amount1Out <= 0n) {
        throw new ExchangeError('INSUFFICIENT_OUTPUT_AMOUNT');
      }
      if (amount0Out >= this.#reserve0 || amount1Out >= this.#reserve1) {
        throw new ExchangeError('INSUFFICIENT_LIQUIDITY');
      }

      if (amount0Out > 0n) this.#chain.asset(this.token0).transfer(this.address, to, amount0Out);
      if (amount1Out > 0n) this.#chain.asset(this.token1).transfer(this.address, to, amount1Out);

      const [balance0, balance1] = this.#balances();
      const retained0 = this.#reserve0 - amount0Out;
      const retained1 = this.#reserve1 - amount1Out;
      const amount0In = balance0 > retained0 ? balance0 - retained0 : 0n;
      const amount1In = balance1 > retained1 ? balance1 - retained1 : 0n;
      if (amount0In <= 0n && amount1In <= 0n) {
        throw new ExchangeError('INSUFFICIENT_INPUT_AMOUNT');
      }

      const feeTaken = EXCHANGE_FEE_DENOMINATOR - EXCHANGE_FEE_NUMERATOR;
      const adjusted0 = balance0 * EXCHANGE_FEE_DENOMINATOR - amount0In * feeTaken;
      const adjusted1 = balance1 * EXCHANGE_FEE_DENOMINATOR - amount1In * feeTaken;
      const previous = this.#reserve0 * this.#reserve1 * EXCHANGE_FEE_DENOMINATOR ** 2n;
      if (adjusted0 * adjusted1 < previous) {
        throw new ExchangeError('K');
      }

      this.#sync(balance0, balance1);
    });
  }

  snapshot(): PairState {
    return { reserve0: this.#reserve0, reserve1: this.#reserve1, locked: this.#locked };
  }

  restore(snapshot: PairState): void {
    this.#reserve0 = snapshot.reserve0;
    this.#reserve1 = snapshot.reserve1;
    this.#locked = snapshot.locked;
  }

  #balances(): [bigint, bigint] {
    return [
      this.#chain.asset(this.token0).balanceOf(this.address),
      this.#chain.asset(this.token1).balanceOf(this.address),
    ];
  }

  #sync(balance0: bigint, balance1: bigint): void {
    this.#reserve0 = balance0;
    this.#reserve1 = balance1;
  }

  #withLock<T>(fn: () => T): T {
    if (this.#locked) throw new ExchangeError('LOCKED');
    this.#locked = true;
    try {
      return fn();
    } finally {
      this.#locked = false;
    }
  }
}

// ─── Factory ─────────────────────────────────────────────────────────────────

function pairKey(tokenA: Address, tokenB: Address): string {
  return tokenA < tokenB ? `${tokenA}/${tokenB}` : `${tokenB}/${tokenA}`;
}

export class MemoryPairFactory
  implements PairFactory, StatefulParticipant<ReadonlyMap<string, LiquidityPair>>
{
  readonly address: Address;
  readonly #chain: Chain;
  #pairs = new Map<string, LiquidityPair>();

  constructor(chain: Chain) {
    this.#chain = chain;
    this.address = chain.allocateAddress();
    chain.register(this);
  }

  createPair(tokenA: Address, tokenB: Address): Address {
    return this.#chain.atomic(() => {
      if (tokenA === tokenB) throw new ExchangeError('IDENTICAL_ADDRESSES');
      if (this.#pairs.has(pairKey(tokenA, tokenB))) throw new ExchangeError('PAIR_EXISTS');

      const pair = new LiquidityPair(this.#chain, this.#chain.allocateAddress(), tokenA, tokenB);
      this.#pairs.set(pairKey(tokenA, tokenB), pair);
      return pair.address;
    });
  }

  getPair(tokenA: Address, tokenB: Address): Address | null {
    return this.#pairs.get(pairKey(tokenA, tokenB))?.address ?? null;
  }

  pairFor(tokenA: Address, tokenB: Address): LiquidityPair | undefined {
    return this.#pairs.get(pairKey(tokenA, tokenB));
  }

  snapshot(): ReadonlyMap<string, LiquidityPair> {
    return new Map(this.#pairs);
  }

  restore(snapshot: ReadonlyMap<string, LiquidityPair>): void {
    this.#pairs = new Map(snapshot);
  }
}

// ─── Router ──────────────────────────────────────────────────────────────────

export interface MemoryExchangeOptions {
  /** The asset every pool of interest is paired against. */
  readonly pairedAsset: Address;
  readonly address?: Address;
}

/**
 * MemoryExchange: an in-process constant-product exchange gateway.
 *
 * Assets are pulled from the caller with `transferFrom`, so callers approve
 * the exchange first. Swaps measure their input as the pair's balance
 * increase, which tolerates assets that withhold part of a transfer.
 * Every call runs inside `chain.atomic()`.
 */
export class MemoryExchange implements ExchangeGateway {
  readonly address: Address;
  readonly #chain: Chain;
  readonly #pairedAsset: Address;
  readonly #factory: MemoryPairFactory;

  constructor(chain: Chain, options: MemoryExchangeOptions) {
    this.#chain = chain;
    this.address = options.address ?? DEFAULT_GATEWAY_ADDRESS;
    this.#pairedAsset = options.pairedAsset;
    this.#factory = new MemoryPairFactory(chain);
  }

  pairedAsset(): Address {
    return this.#pairedAsset;
  }

  factory(): MemoryPairFactory {
    return this.#factory;
  }

  swapExactInputSupportingFeeOnTransfer(caller: Address, request: SwapRequest): void {
    this.#chain.atomic(() => {
      this.#ensureDeadline(request.deadline);
      if (request.path.length !== 2) {
        throw new ExchangeError('INVALID_PATH', 'exactly one hop is supported');
      }
      const [input, output] = request.path;

      const pair = this.#requirePair(input, output);
      const inputAsset = this.#chain.asset(input);
      const outputAsset = this.#chain.asset(output);

      inputAsset.transferFrom(this.address, caller, pair.address, request.amountIn);

      const balanceBefore = outputAsset.balanceOf(request.recipient);
      const [reserveIn, reserveOut] = pair.reservesFor(input);
      const amountInput = inputAsset.balanceOf(pair.address) - reserveIn;
      const amountOutput = getAmountOut(amountInput, reserveIn, reserveOut);
      const [amount0Out, amount1Out] =
        input === pair.token0 ? [0n, amountOutput] : [amountOutput, 0n];
      pair.swap(amount0Out, amount1Out, request.recipient);

      const received = outputAsset.balanceOf(request.recipient) - balanceBefore;
      if (received < request.amountOutMin) {
        throw new ExchangeError(
          'INSUFFICIENT_OUTPUT_AMOUNT',
          `received ${received}, minimum ${request.amountOutMin}`,
        );
      }
    });
  }

  addLiquidity(caller: Address, request: LiquidityRequest): LiquidityReceipt {
    return this.#chain.atomic(() => {
      this.#ensureDeadline(request.deadline);

      if (this.#factory.getPair(request.tokenA, request.tokenB) === null) {
        this.#factory.createPair(request.tokenA, request.tokenB);
      }
      const pair = this.#requirePair(request.tokenA, request.tokenB);
      const [amountA, amountB] = this.#optimalAmounts(pair, request);

      this.#chain.asset(request.tokenA).transferFrom(this.address, caller, pair.address, amountA);
      this.#chain.asset(request.tokenB).transferFrom(this.address, caller, pair.address, amountB);
      const liquidity = pair.mint(request.recipient);

      return { amountA, amountB, liquidity };
    });
  }

  // ─── Queries ──────────────────────────────────────────────────────────────

  /** Reserves ordered as (tokenA, tokenB). Zero for a missing pair. */
  reserves(tokenA: Address, tokenB: Address): readonly [bigint, bigint] {
    return this.#factory.pairFor(tokenA, tokenB)?.reservesFor(tokenA) ?? [0n, 0n];
  }

  liquidityBalance(tokenA: Address, tokenB: Address, holder: Address): bigint {
    return this.#factory.pairFor(tokenA, tokenB)?.positions.balanceOf(holder) ?? 0n;
  }

  // ─── Private helpers ──────────────────────────────────────────────────────

  #requirePair(tokenA: Address, tokenB: Address): LiquidityPair {
    const pair = this.#factory.pairFor(tokenA, tokenB);
    if (pair === undefined) {
      throw new ExchangeError('PAIR_NOT_FOUND', `${tokenA} / ${tokenB}`);
    }
    return pair;
  }

  #ensureDeadline(deadline: number): void {
    if (deadline < this.#chain.now()) {
      throw new ExchangeError('EXPIRED', `deadline ${deadline} is before ${this.#chain.now()}`);
    }
  }

  /**
   * Deposit at the current reserve ratio: keep the desired amount of one
   * side and quote the other, never exceeding either desired amount.
   */
  #optimalAmounts(pair: LiquidityPair, request: LiquidityRequest): readonly [bigint, bigint] {
    const [reserveA, reserveB] = pair.reservesFor(request.tokenA);
    if (reserveA === 0n && reserveB === 0n) {
      return [request.amountADesired, request.amountBDesired];
    }

    const amountBOptimal = quote(request.amountADesired, reserveA, reserveB);
    if (amountBOptimal <= request.amountBDesired) {
      if (amountBOptimal < request.amountBMin) throw new ExchangeError('INSUFFICIENT_B_AMOUNT');
      return [request.amountADesired, amountBOptimal];
    }

    const amountAOptimal = quote(request.amountBDesired, reserveB, reserveA);
    if (amountAOptimal < request.amountAMin) throw new ExchangeError('INSUFFICIENT_A_AMOUNT');
    return [amountAOptimal, request.amountBDesired];
  }
}
