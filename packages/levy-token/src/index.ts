// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * @levy-ledger/token
 *
 * A fungible token with a time-bounded transfer levy, modelled on an
 * in-process serialized execution environment.
 *
 * Public surface:
 *   LevyToken           token facade: transfers, allowances, levy queries, administration
 *   LevyEngine          per-move levy decision and routing
 *   LiquidityConverter  swaps half the tax and deposits liquidity for the administrator
 *   Chain               clock, asset directory, all-or-nothing transactions, event log
 *   MemoryExchange      in-process constant-product exchange gateway
 */

// ─── Core classes ────────────────────────────────────────────────────────────
export { LevyToken } from './token.js';
export { LevyEngine, computeLevy } from './levy-engine.js';
export type { LevyEngineOptions, LiquidityConversion } from './levy-engine.js';
export { LiquidityConverter } from './liquidity-converter.js';
export type { LiquidityConverterOptions } from './liquidity-converter.js';
export { Ledger } from './ledger.js';
export { ExemptionRegistry } from './exemptions.js';
export { ReentrancyGuard } from './guard.js';
export { TaxWindow } from './tax-window.js';
export { Ownership } from './ownership.js';

// ─── Execution environment ───────────────────────────────────────────────────
export { Chain, SystemClock, ManualClock } from './chain.js';
export { EventLog, filterRecords, isRecordOf } from './events.js';
export type { EventLogOptions, LedgerEventListener } from './events.js';

// ─── Exchange ────────────────────────────────────────────────────────────────
export {
  MemoryExchange,
  MemoryPairFactory,
  LiquidityPair,
  SimpleAsset,
  getAmountOut,
  quote,
} from './exchange/index.js';
export type { MemoryExchangeOptions } from './exchange/index.js';

// ─── Types ───────────────────────────────────────────────────────────────────
export type {
  Address,
  Clock,
  StatefulParticipant,
  FungibleAsset,
  PairFactory,
  SwapRequest,
  LiquidityRequest,
  LiquidityReceipt,
  ExchangeGateway,
  LevyReason,
  LevyAssessment,
  TransferEvent,
  ApprovalEvent,
  TaxCollectedEvent,
  LiquidityAddedEvent,
  OwnershipTransferredEvent,
  LedgerEvent,
  LedgerEventName,
  LedgerEventOf,
  EventSink,
  EventRecord,
  EventFilter,
} from './types.js';

// ─── Zod schemas & config ────────────────────────────────────────────────────
export { AddressSchema, EventFilterSchema, LedgerEventNameSchema } from './types.js';
export {
  LevyTokenConfigSchema,
  SimpleAssetConfigSchema,
  parseLevyTokenConfig,
  parseSimpleAssetConfig,
} from './config.js';
export type {
  LevyTokenConfig,
  LevyTokenConfigInput,
  SimpleAssetConfig,
  SimpleAssetConfigInput,
} from './config.js';

// ─── Errors ──────────────────────────────────────────────────────────────────
export {
  LevyLedgerError,
  InvalidConfigError,
  NotAdministratorError,
  SelfRecoveryForbiddenError,
  InsufficientBalanceError,
  InsufficientAllowanceError,
  InvalidAddressError,
  ArithmeticOverflowError,
  UnknownAssetError,
  ListenerError,
  ReentrancyError,
  ExchangeError,
} from './errors.js';
export type { ExchangeFailureReason } from './errors.js';

// ─── Constants & math ────────────────────────────────────────────────────────
export {
  ZERO_ADDRESS,
  LOCKED_LIQUIDITY_ADDRESS,
  DEFAULT_GATEWAY_ADDRESS,
  DEFAULT_TOKEN_NAME,
  DEFAULT_TOKEN_SYMBOL,
  DEFAULT_DECIMALS,
  DEFAULT_INITIAL_SUPPLY_UNITS,
  DEFAULT_TAX_PERCENT,
  DEFAULT_TAX_WINDOW_SECONDS,
  MINIMUM_LIQUIDITY,
} from './constants.js';
export { UINT256_MAX, assertUint256, checkedAdd, checkedSub, checkedMul, sqrt } from './math.js';
