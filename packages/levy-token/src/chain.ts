// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { EventLog } from './events.js';
import type { EventLogOptions } from './events.js';
import { UnknownAssetError } from './errors.js';
import type { Address, Clock, FungibleAsset, StatefulParticipant } from './types.js';

/** Wall-clock time in whole seconds. */
export class SystemClock implements Clock {
  now(): number {
    return Math.floor(Date.now() / 1000);
  }
}

/** A clock that only moves when told to. */
export class ManualClock implements Clock {
  #now: number;

  constructor(start: number) {
    this.#now = start;
  }

  now(): number {
    return this.#now;
  }

  set(moment: number): void {
    this.#now = moment;
  }

  advance(seconds: number): void {
    this.#now += seconds;
  }
}

interface RegisteredParticipant {
  /** Take a snapshot and return the thunk that restores it. */
  readonly capture: () => () => void;
  readonly commit: () => void;
}

/**
 * The serialized execution environment contracts live on.
 *
 * Design contract:
 *  - Execution is synchronous and single-threaded. There is no interleaving
 *    between independent calls; nesting only happens when one contract calls
 *    another.
 *  - `atomic()` is all-or-nothing. Every registered participant is
 *    snapshotted on entry and restored if the callback throws, then the
 *    error is rethrown unchanged.
 *  - Nested `atomic()` calls snapshot independently. A failing inner call
 *    unwinds only its own effects when the caller chooses to catch.
 *  - Registrations made inside a failed call are undone with the rest of
 *    its state.
 *  - Participants are told to `commit()` only when the outermost call
 *    returns, which is when the event log delivers to listeners.
 */
export class Chain {
  readonly events: EventLog;
  readonly #clock: Clock;
  readonly #participants: RegisteredParticipant[] = [];
  readonly #assets = new Map<Address, FungibleAsset>();
  #depth = 0;
  #nextAddress = 0n;

  constructor(clock: Clock = new SystemClock(), options: EventLogOptions = {}) {
    this.#clock = clock;
    this.events = new EventLog(clock, options);
    this.register(this.events);
  }

  /** The current moment in seconds. */
  now(): number {
    return this.#clock.now();
  }

  /** Whether a transaction is currently executing. */
  get inTransaction(): boolean {
    return this.#depth > 0;
  }

  /** Hand out a fresh, deterministic 20-byte hex address. */
  allocateAddress(): Address {
    this.#nextAddress += 1n;
    return `0x${this.#nextAddress.toString(16).padStart(40, '0')}`;
  }

  // ─── Transactions ───────────────────────────────────────────────────────

  register<S>(participant: StatefulParticipant<S>): void {
    this.#participants.push({
      capture: () => {
        const snapshot = participant.snapshot();
        return () => participant.restore(snapshot);
      },
      commit: () => participant.commit?.(),
    });
  }

  /**
   * Run `fn` as one indivisible unit. Any error restores every participant
   * to its state on entry and propagates to the caller. Participants and
   * assets registered inside a failed unit are unregistered again.
   */
  atomic<T>(fn: () => T): T {
    const rollbacks = this.#participants.map((participant) => participant.capture());
    const participantCount = this.#participants.length;
    const assets = new Map(this.#assets);

    let result: T;
    this.#depth += 1;
    try {
      result = fn();
    } catch (error) {
      for (const rollback of rollbacks.reverse()) {
        rollback();
      }
      this.#participants.length = participantCount;
      this.#assets.clear();
      for (const [address, asset] of assets) {
        this.#assets.set(address, asset);
      }
      throw error;
    } finally {
      this.#depth -= 1;
    }

    if (this.#depth === 0) {
      for (const participant of this.#participants) {
        participant.commit();
      }
    }
    return result;
  }

  /** Number of registered transaction participants, the event log included. */
  get participantCount(): number {
    return this.#participants.length;
  }

  // ─── Asset directory ────────────────────────────────────────────────────

  registerAsset(asset: FungibleAsset): void {
    this.#assets.set(asset.address, asset);
  }

  hasAsset(address: Address): boolean {
    return this.#assets.has(address);
  }

  /** Resolve an asset by address. Throws UnknownAssetError if absent. */
  asset(address: Address): FungibleAsset {
    const asset = this.#assets.get(address);
    if (asset === undefined) {
      throw new UnknownAssetError(address);
    }
    return asset;
  }
}
