// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect } from 'vitest';
import { Ledger } from '../src/ledger.js';
import { ZERO_ADDRESS } from '../src/constants.js';
import {
  ArithmeticOverflowError,
  InsufficientAllowanceError,
  InsufficientBalanceError,
  InvalidAddressError,
} from '../src/errors.js';
import { UINT256_MAX, assertUint256, checkedSub, sqrt } from '../src/math.js';
import type { LedgerEvent } from '../src/types.js';
import { thrownBy } from './helpers.js';

function makeLedger() {
  const events: LedgerEvent[] = [];
  const ledger = new Ledger(18, (event) => events.push(event));
  return { ledger, events };
}

describe('Ledger', () => {
  describe('mint', () => {
    it('credits the recipient and raises total supply', () => {
      const { ledger, events } = makeLedger();
      ledger.mint('alice', 500n);
      expect(ledger.balanceOf('alice')).toBe(500n);
      expect(ledger.totalSupply()).toBe(500n);
      expect(events).toEqual([{ type: 'Transfer', from: ZERO_ADDRESS, to: 'alice', amount: 500n }]);
    });

    it('rejects the zero address as recipient', () => {
      const { ledger } = makeLedger();
      expect(() => ledger.mint(ZERO_ADDRESS, 1n)).toThrow(InvalidAddressError);
    });

    it('throws ArithmeticOverflowError when supply would exceed the uint256 range', () => {
      const { ledger } = makeLedger();
      ledger.mint('alice', UINT256_MAX);
      expect(() => ledger.mint('bob', 1n)).toThrow(ArithmeticOverflowError);
      expect(ledger.balanceOf('bob')).toBe(0n);
    });
  });

  describe('moveValue', () => {
    it('moves value and publishes a Transfer', () => {
      const { ledger, events } = makeLedger();
      ledger.mint('alice', 100n);
      ledger.moveValue('alice', 'bob', 40n);
      expect(ledger.balanceOf('alice')).toBe(60n);
      expect(ledger.balanceOf('bob')).toBe(40n);
      expect(events[1]).toEqual({ type: 'Transfer', from: 'alice', to: 'bob', amount: 40n });
    });

    it('nets a self-transfer to zero', () => {
      const { ledger } = makeLedger();
      ledger.mint('alice', 100n);
      ledger.moveValue('alice', 'alice', 70n);
      expect(ledger.balanceOf('alice')).toBe(100n);
    });

    it('throws InsufficientBalanceError carrying balance and request', () => {
      const { ledger } = makeLedger();
      ledger.mint('alice', 10n);
      const error = thrownBy(() => ledger.moveValue('alice', 'bob', 11n));
      expect(error).toBeInstanceOf(InsufficientBalanceError);
      expect(error).toMatchObject({ code: 'INSUFFICIENT_BALANCE', balance: 10n, requested: 11n });
    });

    it('rejects the zero address on either side', () => {
      const { ledger } = makeLedger();
      ledger.mint('alice', 10n);
      expect(() => ledger.moveValue('alice', ZERO_ADDRESS, 1n)).toThrow(InvalidAddressError);
      expect(() => ledger.moveValue(ZERO_ADDRESS, 'alice', 1n)).toThrow(InvalidAddressError);
    });

    it('allows a zero-amount move', () => {
      const { ledger, events } = makeLedger();
      ledger.moveValue('alice', 'bob', 0n);
      expect(ledger.balanceOf('bob')).toBe(0n);
      expect(events).toHaveLength(1);
    });

    it('lists holders in first-seen order', () => {
      const { ledger } = makeLedger();
      ledger.mint('alice', 10n);
      ledger.moveValue('alice', 'carol', 5n);
      ledger.moveValue('alice', 'bob', 5n);
      expect(ledger.holders()).toEqual(['alice', 'carol', 'bob']);
    });
  });

  describe('allowances', () => {
    it('records an approval and publishes it', () => {
      const { ledger, events } = makeLedger();
      ledger.approve('alice', 'spender', 25n);
      expect(ledger.allowance('alice', 'spender')).toBe(25n);
      expect(events).toEqual([{ type: 'Approval', owner: 'alice', spender: 'spender', amount: 25n }]);
    });

    it('consumes a finite allowance without publishing an Approval', () => {
      const { ledger, events } = makeLedger();
      ledger.approve('alice', 'spender', 25n);
      ledger.spendAllowance('alice', 'spender', 10n);
      expect(ledger.allowance('alice', 'spender')).toBe(15n);
      expect(events).toHaveLength(1);
    });

    it('leaves an infinite allowance untouched', () => {
      const { ledger } = makeLedger();
      ledger.approve('alice', 'spender', UINT256_MAX);
      ledger.spendAllowance('alice', 'spender', 10n ** 30n);
      expect(ledger.allowance('alice', 'spender')).toBe(UINT256_MAX);
    });

    it('throws InsufficientAllowanceError when spending more than granted', () => {
      const { ledger } = makeLedger();
      ledger.approve('alice', 'spender', 5n);
      expect(() => ledger.spendAllowance('alice', 'spender', 6n)).toThrow(
        InsufficientAllowanceError,
      );
    });
  });

  describe('snapshot / restore', () => {
    it('restores balances, allowances and supply', () => {
      const { ledger } = makeLedger();
      ledger.mint('alice', 100n);
      ledger.approve('alice', 'spender', 30n);
      const snapshot = ledger.snapshot();

      ledger.moveValue('alice', 'bob', 60n);
      ledger.spendAllowance('alice', 'spender', 30n);
      ledger.mint('carol', 5n);
      ledger.restore(snapshot);

      expect(ledger.balanceOf('alice')).toBe(100n);
      expect(ledger.balanceOf('bob')).toBe(0n);
      expect(ledger.allowance('alice', 'spender')).toBe(30n);
      expect(ledger.totalSupply()).toBe(100n);
    });
  });

  it('reports one whole unit as 10^decimals', () => {
    expect(new Ledger(6, () => undefined).decimalsScale()).toBe(1_000_000n);
  });
});

describe('math helpers', () => {
  it('computes the floor square root', () => {
    expect(sqrt(0n)).toBe(0n);
    expect(sqrt(1n)).toBe(1n);
    expect(sqrt(15n)).toBe(3n);
    expect(sqrt(16n)).toBe(4n);
    expect(sqrt(4_000_000_000_000n)).toBe(2_000_000n);
    expect(sqrt(10n ** 36n)).toBe(10n ** 18n);
  });

  it('rejects negative amounts with RangeError', () => {
    expect(() => assertUint256(-1n, 'amount')).toThrow(RangeError);
  });

  it('rejects amounts above the uint256 range', () => {
    expect(() => assertUint256(UINT256_MAX + 1n, 'amount')).toThrow(ArithmeticOverflowError);
  });

  it('reports underflow from checkedSub', () => {
    expect(checkedSub(5n, 5n)).toBe(0n);
    expect(() => checkedSub(4n, 5n)).toThrow(ArithmeticOverflowError);
  });
});
