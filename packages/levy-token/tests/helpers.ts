// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { Chain, ManualClock } from '../src/chain.js';
import { MemoryExchange } from '../src/exchange/memory-exchange.js';
import { SimpleAsset } from '../src/exchange/simple-asset.js';
import { UINT256_MAX } from '../src/math.js';
import { LevyToken } from '../src/token.js';
import type {
  Address,
  ExchangeGateway,
  LiquidityReceipt,
  LiquidityRequest,
  PairFactory,
  SwapRequest,
} from '../src/types.js';

export const START = 1_700_000_000;
export const ONE = 10n ** 18n;

export const ADMIN = 'admin';
export const ALICE = 'alice';
export const BOB = 'bob';
export const CAROL = 'carol';
export const DAVE = 'dave';

export interface RecordedSwap {
  readonly caller: Address;
  readonly request: SwapRequest;
  /** Caller's balance of the input asset when the swap was requested. */
  readonly callerBalance: bigint;
  /** Allowance the caller had granted the gateway for the input asset. */
  readonly allowance: bigint;
}

export interface RecordedDeposit {
  readonly caller: Address;
  readonly request: LiquidityRequest;
  readonly allowanceA: bigint;
  readonly allowanceB: bigint;
}

/**
 * A gateway that moves nothing and records what it was asked to do.
 * Deposits report the desired amounts as consumed.
 */
export class RecordingGateway implements ExchangeGateway {
  readonly address = 'recording-gateway';
  readonly swaps: RecordedSwap[] = [];
  readonly deposits: RecordedDeposit[] = [];
  failWith: Error | undefined;

  readonly #chain: Chain;
  readonly #pairedAsset: Address;

  constructor(chain: Chain, pairedAsset: Address) {
    this.#chain = chain;
    this.#pairedAsset = pairedAsset;
  }

  pairedAsset(): Address {
    return this.#pairedAsset;
  }

  factory(): PairFactory {
    return {
      address: 'recording-factory',
      createPair: () => 'recording-pair',
      getPair: () => 'recording-pair',
    };
  }

  swapExactInputSupportingFeeOnTransfer(caller: Address, request: SwapRequest): void {
    if (this.failWith !== undefined) throw this.failWith;
    const input = this.#chain.asset(request.path[0] ?? '');
    this.swaps.push({
      caller,
      request,
      callerBalance: input.balanceOf(caller),
      allowance: input.allowance(caller, this.address),
    });
  }

  addLiquidity(caller: Address, request: LiquidityRequest): LiquidityReceipt {
    if (this.failWith !== undefined) throw this.failWith;
    this.deposits.push({
      caller,
      request,
      allowanceA: this.#chain.asset(request.tokenA).allowance(caller, this.address),
      allowanceB: this.#chain.asset(request.tokenB).allowance(caller, this.address),
    });
    return { amountA: request.amountADesired, amountB: request.amountBDesired, liquidity: 1n };
  }
}

export function setupWithRecordingGateway() {
  const clock = new ManualClock(START);
  const chain = new Chain(clock);
  const paired = new SimpleAsset(chain, { name: 'Wrapped Ether', symbol: 'WETH', minter: ADMIN });
  const gateway = new RecordingGateway(chain, paired.address);
  const token = new LevyToken(chain, gateway, { administrator: ADMIN });
  return { clock, chain, paired, gateway, token };
}

/**
 * Token deployed against the in-process exchange. When `seedLiquidity` is
 * set, the administrator seeds 100,000 tokens against 100 paired units.
 */
export function setupWithExchange(
  options: { seedLiquidity?: boolean; paired?: (chain: Chain) => SimpleAsset } = {},
) {
  const clock = new ManualClock(START);
  const chain = new Chain(clock);
  const paired =
    options.paired?.(chain) ??
    new SimpleAsset(chain, { name: 'Wrapped Ether', symbol: 'WETH', minter: ADMIN });
  const exchange = new MemoryExchange(chain, { pairedAsset: paired.address });
  const token = new LevyToken(chain, exchange, { administrator: ADMIN });

  paired.mint(ADMIN, ADMIN, 1_000n * ONE);
  token.approve(ADMIN, exchange.address, UINT256_MAX);
  paired.approve(ADMIN, exchange.address, UINT256_MAX);

  const seed = (): void => {
    exchange.addLiquidity(ADMIN, {
      tokenA: token.address,
      tokenB: paired.address,
      amountADesired: 100_000n * ONE,
      amountBDesired: 100n * ONE,
      amountAMin: 0n,
      amountBMin: 0n,
      recipient: ADMIN,
      deadline: clock.now(),
    });
  };
  if (options.seedLiquidity ?? true) seed();

  return { clock, chain, paired, exchange, token, seed };
}

export function sumOfBalances(token: LevyToken): bigint {
  return token.holders().reduce((sum, holder) => sum + token.balanceOf(holder), 0n);
}

/** Run `fn` and return what it threw, or undefined when it returned. */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}
