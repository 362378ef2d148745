// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { Address, EventRecord } from './types.js';

/**
 * Base class for all @levy-ledger/token errors.
 *
 * Every error carries a machine-readable `code` that calling code can
 * switch on without parsing human-readable messages.
 */
export class LevyLedgerError extends Error {
  /** Machine-readable error code. Always a SCREAMING_SNAKE_CASE string. */
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'LevyLedgerError';
    this.code = code;
    // Maintain proper prototype chain for instanceof checks.
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when token configuration is structurally or semantically invalid.
 *
 * `details` carries one entry per Zod issue, formatted as `path: message`.
 */
export class InvalidConfigError extends LevyLedgerError {
  readonly details: readonly string[];

  constructor(details: readonly string[]) {
    super('INVALID_CONFIG', `Token configuration is invalid: ${details.join('; ')}`);
    this.name = 'InvalidConfigError';
    this.details = details;
  }
}

/** Thrown when a privileged call comes from anyone but the administrator. */
export class NotAdministratorError extends LevyLedgerError {
  readonly caller: Address;
  readonly administrator: Address;

  constructor(caller: Address, administrator: Address) {
    super(
      'NOT_ADMINISTRATOR',
      `Caller "${caller}" is not the administrator ("${administrator}").`,
    );
    this.name = 'NotAdministratorError';
    this.caller = caller;
    this.administrator = administrator;
  }
}

/** Thrown when the administrator tries to recover the levy token itself. */
export class SelfRecoveryForbiddenError extends LevyLedgerError {
  readonly asset: Address;

  constructor(asset: Address) {
    super('SELF_RECOVERY_FORBIDDEN', `Cannot recover the token's own asset "${asset}".`);
    this.name = 'SelfRecoveryForbiddenError';
    this.asset = asset;
  }
}

export class InsufficientBalanceError extends LevyLedgerError {
  readonly holder: Address;
  readonly balance: bigint;
  readonly requested: bigint;

  constructor(holder: Address, balance: bigint, requested: bigint) {
    super(
      'INSUFFICIENT_BALANCE',
      `Holder "${holder}" has balance ${balance} but ${requested} was requested.`,
    );
    this.name = 'InsufficientBalanceError';
    this.holder = holder;
    this.balance = balance;
    this.requested = requested;
  }
}

export class InsufficientAllowanceError extends LevyLedgerError {
  readonly owner: Address;
  readonly spender: Address;
  readonly allowance: bigint;
  readonly requested: bigint;

  constructor(owner: Address, spender: Address, allowance: bigint, requested: bigint) {
    super(
      'INSUFFICIENT_ALLOWANCE',
      `Spender "${spender}" may move ${allowance} on behalf of "${owner}" but ${requested} was requested.`,
    );
    this.name = 'InsufficientAllowanceError';
    this.owner = owner;
    this.spender = spender;
    this.allowance = allowance;
    this.requested = requested;
  }
}

/** Thrown when the zero address is used where a real identity is required. */
export class InvalidAddressError extends LevyLedgerError {
  readonly role: string;

  constructor(role: string) {
    super('INVALID_ADDRESS', `The zero address cannot act as ${role}.`);
    this.name = 'InvalidAddressError';
    this.role = role;
  }
}

export class ArithmeticOverflowError extends LevyLedgerError {
  readonly operation: string;
  readonly value: bigint;

  constructor(operation: string, value: bigint) {
    super('ARITHMETIC_OVERFLOW', `Arithmetic overflow in ${operation} (result ${value}).`);
    this.name = 'ArithmeticOverflowError';
    this.operation = operation;
    this.value = value;
  }
}

/** Thrown when the chain has no asset registered at the given address. */
export class UnknownAssetError extends LevyLedgerError {
  readonly asset: Address;

  constructor(asset: Address) {
    super('UNKNOWN_ASSET', `No asset is registered at "${asset}".`);
    this.name = 'UnknownAssetError';
    this.asset = asset;
  }
}

/** Thrown when a conversion is started while another one still holds the guard. */
export class ReentrancyError extends LevyLedgerError {
  constructor() {
    super('REENTRANT_CALL', 'A liquidity conversion is already in progress.');
    this.name = 'ReentrancyError';
  }
}

/**
 * Wraps an exception thrown by an event listener during delivery.
 *
 * Delivery happens after the transaction has committed, so the error is
 * reported through `EventLog.listenerErrors()` and the `onListenerError`
 * option instead of being thrown back at the caller.
 */
export class ListenerError extends LevyLedgerError {
  readonly record: EventRecord;
  override readonly cause: unknown;

  constructor(record: EventRecord, cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super(
      'LISTENER_FAILED',
      `Listener for ${record.event.type} #${record.sequence} threw: ${message}`,
    );
    this.name = 'ListenerError';
    this.record = record;
    this.cause = cause;
  }
}

export type ExchangeFailureReason =
  | 'EXPIRED'
  | 'INVALID_PATH'
  | 'IDENTICAL_ADDRESSES'
  | 'PAIR_EXISTS'
  | 'PAIR_NOT_FOUND'
  | 'LOCKED'
  | 'INSUFFICIENT_AMOUNT'
  | 'INSUFFICIENT_A_AMOUNT'
  | 'INSUFFICIENT_B_AMOUNT'
  | 'INSUFFICIENT_INPUT_AMOUNT'
  | 'INSUFFICIENT_OUTPUT_AMOUNT'
  | 'INSUFFICIENT_LIQUIDITY'
  | 'INSUFFICIENT_LIQUIDITY_MINTED'
  | 'K';

/**
 * Thrown by the in-process exchange when a swap or deposit is rejected.
 * The code is `EXCHANGE_<reason>`.
 */
export class ExchangeError extends LevyLedgerError {
  readonly reason: ExchangeFailureReason;

  constructor(reason: ExchangeFailureReason, detail?: string) {
    const suffix = detail !== undefined ? `: ${detail}` : '';
    super(`EXCHANGE_${reason}`, `Exchange rejected the call (${reason})${suffix}.`);
    this.name = 'ExchangeError';
    this.reason = reason;
  }
}
