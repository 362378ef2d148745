// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect, vi } from 'vitest';
import { Chain, ManualClock } from '../src/chain.js';
import { ListenerError, UnknownAssetError } from '../src/errors.js';
import { SimpleAsset } from '../src/exchange/simple-asset.js';
import type { Address, EventRecord, LedgerEventOf } from '../src/types.js';
import { START } from './helpers.js';

function setup() {
  const clock = new ManualClock(START);
  const chain = new Chain(clock);
  const asset = new SimpleAsset(chain, { name: 'Test Asset', symbol: 'TST', minter: 'minter' });
  asset.mint('minter', 'minter', 1_000n);
  return { clock, chain, asset };
}

describe('Chain', () => {
  describe('allocateAddress', () => {
    it('hands out sequential 20-byte hex addresses', () => {
      const chain = new Chain(new ManualClock(START));
      expect(chain.allocateAddress()).toBe('0x0000000000000000000000000000000000000001');
      expect(chain.allocateAddress()).toBe('0x0000000000000000000000000000000000000002');
    });
  });

  describe('atomic', () => {
    it('returns the callback result', () => {
      const { chain } = setup();
      expect(chain.atomic(() => 'done')).toBe('done');
    });

    it('restores every participant and rethrows when the callback throws', () => {
      const { chain, asset } = setup();
      const countBefore = chain.events.count();

      expect(() =>
        chain.atomic(() => {
          asset.transfer('minter', 'bob', 5n);
          throw new Error('abort');
        }),
      ).toThrow('abort');

      expect(asset.balanceOf('bob')).toBe(0n);
      expect(asset.balanceOf('minter')).toBe(1_000n);
      expect(chain.events.count()).toBe(countBefore);
    });

    it('unwinds only the inner call when the caller catches its failure', () => {
      const { chain, asset } = setup();

      chain.atomic(() => {
        asset.transfer('minter', 'bob', 5n);
        try {
          chain.atomic(() => {
            asset.transfer('minter', 'bob', 3n);
            throw new Error('inner');
          });
        } catch {
          // inner failure is tolerated here
        }
      });

      expect(asset.balanceOf('bob')).toBe(5n);
    });

    it('unregisters participants and assets added by a call that fails', () => {
      const { chain } = setup();
      const participants = chain.participantCount;
      const created: Address[] = [];

      expect(() =>
        chain.atomic(() => {
          const extra = new SimpleAsset(chain, { name: 'Extra', symbol: 'EXT', minter: 'minter' });
          created.push(extra.address);
          throw new Error('abort');
        }),
      ).toThrow('abort');

      expect(created).toHaveLength(1);
      expect(chain.hasAsset(created[0] ?? '')).toBe(false);
      expect(chain.participantCount).toBe(participants);
    });

    it('keeps participants registered by a call that commits', () => {
      const { chain } = setup();
      const participants = chain.participantCount;

      const extra = chain.atomic(
        () => new SimpleAsset(chain, { name: 'Extra', symbol: 'EXT', minter: 'minter' }),
      );

      expect(chain.hasAsset(extra.address)).toBe(true);
      expect(chain.participantCount).toBe(participants + 1);
    });

    it('reports whether a transaction is executing', () => {
      const { chain } = setup();
      expect(chain.inTransaction).toBe(false);
      expect(chain.atomic(() => chain.inTransaction)).toBe(true);
      expect(chain.inTransaction).toBe(false);
    });

    it('reuses event sequence numbers freed by a rollback', () => {
      const { chain, asset } = setup();
      const before = chain.events.count();

      expect(() =>
        chain.atomic(() => {
          asset.transfer('minter', 'bob', 1n);
          throw new Error('abort');
        }),
      ).toThrow('abort');
      asset.transfer('minter', 'carol', 1n);

      const last = chain.events.query().at(-1);
      expect(last?.sequence).toBe(before + 1);
    });
  });

  describe('asset directory', () => {
    it('resolves registered assets', () => {
      const { chain, asset } = setup();
      expect(chain.hasAsset(asset.address)).toBe(true);
      expect(chain.asset(asset.address)).toBe(asset);
    });

    it('throws UnknownAssetError for an unregistered address', () => {
      const { chain } = setup();
      expect(() => chain.asset('0xnothing')).toThrow(UnknownAssetError);
    });
  });
});

describe('ManualClock', () => {
  it('moves only when set or advanced', () => {
    const clock = new ManualClock(START);
    clock.advance(30);
    expect(clock.now()).toBe(START + 30);
    clock.set(START + 5);
    expect(clock.now()).toBe(START + 5);
  });
});

describe('EventLog', () => {
  it('delivers to listeners only after the outermost transaction commits', () => {
    const { chain, asset } = setup();
    const amounts: bigint[] = [];
    chain.events.on('Transfer', (record) => amounts.push(record.event.amount));

    chain.atomic(() => {
      asset.transfer('minter', 'bob', 7n);
      expect(amounts).toEqual([]);
    });

    expect(amounts).toEqual([7n]);
  });

  it('never delivers records that were rolled back', () => {
    const { chain, asset } = setup();
    const listener = vi.fn();
    chain.events.on('Transfer', listener);

    expect(() =>
      chain.atomic(() => {
        asset.transfer('minter', 'bob', 7n);
        throw new Error('abort');
      }),
    ).toThrow('abort');

    expect(listener).not.toHaveBeenCalled();
  });

  it('keeps delivering after a listener throws and reports the wrapped error', () => {
    const reported: ListenerError[] = [];
    const chain = new Chain(new ManualClock(START), {
      onListenerError: (error) => reported.push(error),
    });
    const asset = new SimpleAsset(chain, { name: 'Test Asset', symbol: 'TST', minter: 'minter' });
    asset.mint('minter', 'minter', 1_000n);
    const failure = new Error('listener failed');
    const amounts: bigint[] = [];
    chain.events.once('Transfer', () => {
      throw failure;
    });
    chain.events.on('Transfer', (record) => amounts.push(record.event.amount));

    chain.atomic(() => {
      asset.transfer('minter', 'bob', 2n);
      asset.transfer('minter', 'carol', 3n);
    });

    expect(asset.balanceOf('bob')).toBe(2n);
    expect(asset.balanceOf('carol')).toBe(3n);
    expect(amounts).toEqual([2n, 3n]);
    expect(reported).toHaveLength(1);
    expect(reported[0]).toBeInstanceOf(ListenerError);
    expect(reported[0]).toMatchObject({ code: 'LISTENER_FAILED', cause: failure });
    expect(reported[0]?.record.event).toEqual({
      type: 'Transfer',
      from: 'minter',
      to: 'bob',
      amount: 2n,
    });
    expect(chain.events.listenerErrors()).toEqual(reported);
  });

  it('does not fail the committed call when a listener throws', () => {
    const { chain, asset } = setup();
    chain.events.on('Transfer', () => {
      throw new Error('listener failed');
    });

    asset.transfer('minter', 'bob', 5n);
    asset.transfer('minter', 'bob', 5n);

    expect(asset.balanceOf('bob')).toBe(10n);
    expect(chain.events.listenerErrors().map((error) => error.code)).toEqual([
      'LISTENER_FAILED',
      'LISTENER_FAILED',
    ]);
  });

  it('invokes a once-listener a single time', () => {
    const { chain, asset } = setup();
    const listener = vi.fn();
    chain.events.once('Transfer', listener);

    asset.transfer('minter', 'bob', 1n);
    asset.transfer('minter', 'bob', 1n);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(chain.events.listenerCount('Transfer')).toBe(0);
  });

  it('stops invoking a listener after off()', () => {
    const { chain, asset } = setup();
    const listener = vi.fn();
    chain.events.on('Approval', listener);
    asset.approve('minter', 'spender', 1n);
    chain.events.off('Approval', listener);
    asset.approve('minter', 'spender', 2n);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(chain.events.listenerCount('Approval')).toBe(0);
  });

  it('stamps records with the emitter and the current time', () => {
    const { chain, clock, asset } = setup();
    clock.advance(60);
    asset.transfer('minter', 'bob', 1n);

    const last = chain.events.query().at(-1);
    expect(last?.emitter).toBe(asset.address);
    expect(last?.timestamp).toBe(START + 60);
    expect(last?.event).toEqual({ type: 'Transfer', from: 'minter', to: 'bob', amount: 1n });
  });

  it('filters by type, emitter and time range', () => {
    const { chain, clock, asset } = setup();
    const other = new SimpleAsset(chain, { name: 'Other', symbol: 'OTH', minter: 'minter' });

    clock.advance(10);
    other.mint('minter', 'minter', 5n);
    clock.advance(10);
    asset.approve('minter', 'spender', 3n);

    expect(chain.events.query({ type: 'Approval' })).toHaveLength(1);
    expect(chain.events.query({ emitter: other.address })).toHaveLength(1);
    expect(chain.events.query({ since: START + 10, until: START + 10 })).toHaveLength(1);
    expect(chain.events.query({ since: START + 1 })).toHaveLength(2);
  });

  it('returns typed records from ofType', () => {
    const { chain } = setup();
    const mints: ReadonlyArray<EventRecord<LedgerEventOf<'Transfer'>>> =
      chain.events.ofType('Transfer');
    expect(mints).toHaveLength(1);
    expect(mints[0]?.event.amount).toBe(1_000n);
  });
});
