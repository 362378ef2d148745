// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';

// ─── Identities ─────────────────────────────────────────────────────────────

export const AddressSchema = z.string().min(1, 'address must be a non-empty string');
export type Address = z.infer<typeof AddressSchema>;

// ─── Time ───────────────────────────────────────────────────────────────────

/** Source of the current moment, in whole seconds since the Unix epoch. */
export interface Clock {
  now(): number;
}

// ─── Transactions ───────────────────────────────────────────────────────────

/**
 * State that takes part in chain transactions. The chain snapshots every
 * participant before a transaction and restores the snapshot if it aborts.
 */
export interface StatefulParticipant<S> {
  snapshot(): S;
  restore(snapshot: S): void;
  /** Called once the outermost transaction has committed. */
  commit?(): void;
}

// ─── Assets ─────────────────────────────────────────────────────────────────

/**
 * The call surface every fungible asset on the chain exposes.
 *
 * State-changing calls name their `caller` explicitly: it is the identity
 * whose balance or allowance the call acts on behalf of.
 */
export interface FungibleAsset {
  readonly address: Address;
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  totalSupply(): bigint;
  balanceOf(holder: Address): bigint;
  allowance(owner: Address, spender: Address): bigint;
  transfer(caller: Address, to: Address, amount: bigint): void;
  approve(caller: Address, spender: Address, amount: bigint): void;
  transferFrom(caller: Address, from: Address, to: Address, amount: bigint): void;
}

// ─── Exchange gateway ───────────────────────────────────────────────────────

export interface PairFactory {
  readonly address: Address;
  createPair(tokenA: Address, tokenB: Address): Address;
  getPair(tokenA: Address, tokenB: Address): Address | null;
}

export interface SwapRequest {
  readonly amountIn: bigint;
  readonly amountOutMin: bigint;
  readonly path: readonly Address[];
  readonly recipient: Address;
  /** Latest moment (seconds) at which the swap may execute. */
  readonly deadline: number;
}

export interface LiquidityRequest {
  readonly tokenA: Address;
  readonly tokenB: Address;
  readonly amountADesired: bigint;
  readonly amountBDesired: bigint;
  readonly amountAMin: bigint;
  readonly amountBMin: bigint;
  readonly recipient: Address;
  readonly deadline: number;
}

export interface LiquidityReceipt {
  /** Amount of tokenA the pool actually took. */
  readonly amountA: bigint;
  /** Amount of tokenB the pool actually took. */
  readonly amountB: bigint;
  /** Liquidity-position units credited to the recipient. */
  readonly liquidity: bigint;
}

/**
 * External exchange used to swap and deposit liquidity. Owned by a
 * separate system; the levy token only relies on this surface.
 */
export interface ExchangeGateway {
  readonly address: Address;
  pairedAsset(): Address;
  factory(): PairFactory;
  swapExactInputSupportingFeeOnTransfer(caller: Address, request: SwapRequest): void;
  addLiquidity(caller: Address, request: LiquidityRequest): LiquidityReceipt;
}

// ─── Levy assessment ────────────────────────────────────────────────────────

export type LevyReason =
  | 'window_closed'
  | 'exempt_sender'
  | 'exempt_recipient'
  | 'conversion_in_progress'
  | 'levied';

export interface LevyAssessment {
  readonly reason: LevyReason;
  readonly amount: bigint;
  /** Share withheld into protocol custody. Zero unless reason is 'levied'. */
  readonly taxAmount: bigint;
  /** Share delivered to the recipient. */
  readonly netAmount: bigint;
}

// ─── Observations ───────────────────────────────────────────────────────────

export interface TransferEvent {
  readonly type: 'Transfer';
  readonly from: Address;
  readonly to: Address;
  readonly amount: bigint;
}

export interface ApprovalEvent {
  readonly type: 'Approval';
  readonly owner: Address;
  readonly spender: Address;
  readonly amount: bigint;
}

export interface TaxCollectedEvent {
  readonly type: 'TaxCollected';
  readonly from: Address;
  readonly amount: bigint;
}

export interface LiquidityAddedEvent {
  readonly type: 'LiquidityAdded';
  readonly tokenAmount: bigint;
  readonly pairedAssetAmount: bigint;
}

export interface OwnershipTransferredEvent {
  readonly type: 'OwnershipTransferred';
  readonly previousOwner: Address;
  readonly newOwner: Address;
}

export type LedgerEvent =
  | TransferEvent
  | ApprovalEvent
  | TaxCollectedEvent
  | LiquidityAddedEvent
  | OwnershipTransferredEvent;

export type LedgerEventName = LedgerEvent['type'];

export type LedgerEventOf<N extends LedgerEventName> = Extract<LedgerEvent, { type: N }>;

/** Callback a contract uses to publish an observation under its own address. */
export type EventSink = (event: LedgerEvent) => void;

export interface EventRecord<E extends LedgerEvent = LedgerEvent> {
  readonly id: string;
  /** Position in the chain-wide log, starting at 1. */
  readonly sequence: number;
  /** Address of the contract that published the observation. */
  readonly emitter: Address;
  /** Chain time (seconds) when the observation was published. */
  readonly timestamp: number;
  readonly event: E;
}

export const LedgerEventNameSchema = z.enum([
  'Transfer',
  'Approval',
  'TaxCollected',
  'LiquidityAdded',
  'OwnershipTransferred',
]);

export const EventFilterSchema = z.object({
  type: LedgerEventNameSchema.optional(),
  emitter: AddressSchema.optional(),
  since: z.number().int().optional(),
  until: z.number().int().optional(),
}).optional();
export type EventFilter = z.infer<typeof EventFilterSchema>;
