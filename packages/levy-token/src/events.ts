// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * @levy-ledger/token event log
 *
 * `EventLog` is the chain-wide, append-only record of every observation
 * published by a contract (Transfer, Approval, TaxCollected, LiquidityAdded,
 * OwnershipTransferred). It is the only logging surface of the library.
 *
 * Records written inside a transaction that later aborts are discarded
 * together with the rest of the transaction's state. Listeners are invoked
 * only after the outermost transaction commits, so a subscriber never sees
 * an observation that was rolled back. A listener that throws cannot undo
 * that commit: its error is wrapped in a `ListenerError`, kept in
 * `listenerErrors()` and handed to `onListenerError`, and delivery carries
 * on with the remaining listeners and records.
 *
 * Usage:
 * ```ts
 * chain.events.on('TaxCollected', (record) => {
 *   console.log(record.event.from, record.event.amount);
 * });
 *
 * const levies = chain.events.ofType('TaxCollected');
 * ```
 */

import { randomUUID } from 'crypto';
import { ListenerError } from './errors.js';
import { EventFilterSchema } from './types.js';
import type {
  Address,
  Clock,
  EventFilter,
  EventRecord,
  EventSink,
  LedgerEvent,
  LedgerEventName,
  LedgerEventOf,
  StatefulParticipant,
} from './types.js';

/**
 * Typed listener for a specific observation.
 *
 * @template N - The event name; constrains the record type automatically.
 */
export type LedgerEventListener<N extends LedgerEventName> = (
  record: EventRecord<LedgerEventOf<N>>,
) => void;

interface ListenerEntry {
  readonly type: LedgerEventName;
  /** The callback as registered by the caller, kept for `off()`. */
  readonly original: object;
  readonly invoke: (record: EventRecord) => void;
  readonly once: boolean;
}

export interface EventLogOptions {
  /** Called with every error a listener throws during delivery. */
  readonly onListenerError?: (error: ListenerError) => void;
}

interface EventLogSnapshot {
  readonly recordCount: number;
  readonly pendingCount: number;
  readonly sequence: number;
}

export function isRecordOf<N extends LedgerEventName>(
  record: EventRecord,
  type: N,
): record is EventRecord<LedgerEventOf<N>> {
  return record.event.type === type;
}

/**
 * Apply an optional EventFilter to a list of records.
 * All filter fields are AND-ed together.
 */
export function filterRecords(
  records: readonly EventRecord[],
  filter: EventFilter,
): readonly EventRecord[] {
  if (filter === undefined) return records;

  return records.filter((record) => {
    if (filter.type !== undefined && record.event.type !== filter.type) {
      return false;
    }
    if (filter.emitter !== undefined && record.emitter !== filter.emitter) {
      return false;
    }
    if (filter.since !== undefined && record.timestamp < filter.since) {
      return false;
    }
    if (filter.until !== undefined && record.timestamp > filter.until) {
      return false;
    }
    return true;
  });
}

export class EventLog implements StatefulParticipant<EventLogSnapshot> {
  readonly #clock: Clock;
  readonly #records: EventRecord[] = [];
  /** Records not yet delivered to listeners. */
  #pending: EventRecord[] = [];
  #sequence = 0;
  #listeners: ListenerEntry[] = [];
  readonly #listenerErrors: ListenerError[] = [];
  readonly #onListenerError: ((error: ListenerError) => void) | undefined;

  constructor(clock: Clock, options: EventLogOptions = {}) {
    this.#clock = clock;
    this.#onListenerError = options.onListenerError;
  }

  // ─── Writing ────────────────────────────────────────────────────────────

  /** Append an observation published by `emitter`. */
  record(emitter: Address, event: LedgerEvent): EventRecord {
    this.#sequence += 1;
    const record: EventRecord = {
      id: randomUUID(),
      sequence: this.#sequence,
      emitter,
      timestamp: this.#clock.now(),
      event,
    };
    this.#records.push(record);
    this.#pending.push(record);
    return record;
  }

  /** Bind an emitter address, producing the sink a contract publishes through. */
  sinkFor(emitter: Address): EventSink {
    return (event) => {
      this.record(emitter, event);
    };
  }

  // ─── Reading ────────────────────────────────────────────────────────────

  /**
   * Return records in publication order, optionally filtered.
   * Pass undefined to return every record.
   */
  query(filter?: EventFilter): readonly EventRecord[] {
    const validated = EventFilterSchema.parse(filter);
    return filterRecords(this.#records, validated);
  }

  /** Return every record of one observation type, typed accordingly. */
  ofType<N extends LedgerEventName>(type: N): ReadonlyArray<EventRecord<LedgerEventOf<N>>> {
    const matches: Array<EventRecord<LedgerEventOf<N>>> = [];
    for (const record of this.#records) {
      if (isRecordOf(record, type)) matches.push(record);
    }
    return matches;
  }

  count(): number {
    return this.#records.length;
  }

  // ─── Listeners ──────────────────────────────────────────────────────────

  /**
   * Register a persistent listener. It runs after each committed
   * transaction, once per matching record, in publication order.
   */
  on<N extends LedgerEventName>(type: N, listener: LedgerEventListener<N>): this {
    this.#addListener(type, listener, false);
    return this;
  }

  /** Register a listener that is removed after its first invocation. */
  once<N extends LedgerEventName>(type: N, listener: LedgerEventListener<N>): this {
    this.#addListener(type, listener, true);
    return this;
  }

  off<N extends LedgerEventName>(type: N, listener: LedgerEventListener<N>): this {
    const index = this.#listeners.findIndex(
      (entry) => entry.type === type && entry.original === listener,
    );
    if (index !== -1) {
      this.#listeners.splice(index, 1);
    }
    return this;
  }

  listenerCount(type: LedgerEventName): number {
    return this.#listeners.filter((entry) => entry.type === type).length;
  }

  /** Errors thrown by listeners so far, oldest first. */
  listenerErrors(): readonly ListenerError[] {
    return [...this.#listenerErrors];
  }

  // ─── Transaction participation ──────────────────────────────────────────

  snapshot(): EventLogSnapshot {
    return {
      recordCount: this.#records.length,
      pendingCount: this.#pending.length,
      sequence: this.#sequence,
    };
  }

  restore(snapshot: EventLogSnapshot): void {
    this.#records.length = snapshot.recordCount;
    this.#pending.length = snapshot.pendingCount;
    this.#sequence = snapshot.sequence;
  }

  /** Deliver every committed record to the matching listeners. */
  commit(): void {
    const delivered = this.#pending;
    this.#pending = [];

    for (const record of delivered) {
      // Snapshot so that listeners added or removed during delivery do not
      // affect the current record.
      const entries = this.#listeners.filter((entry) => entry.type === record.event.type);
      if (entries.length === 0) continue;

      const onceEntries = new Set(entries.filter((entry) => entry.once));
      if (onceEntries.size > 0) {
        this.#listeners = this.#listeners.filter((entry) => !onceEntries.has(entry));
      }

      for (const entry of entries) {
        try {
          entry.invoke(record);
        } catch (cause) {
          this.#reportListenerError(new ListenerError(record, cause));
        }
      }
    }
  }

  #reportListenerError(error: ListenerError): void {
    this.#listenerErrors.push(error);
    this.#onListenerError?.(error);
  }

  #addListener<N extends LedgerEventName>(
    type: N,
    listener: LedgerEventListener<N>,
    once: boolean,
  ): void {
    this.#listeners.push({
      type,
      original: listener,
      once,
      invoke: (record) => {
        if (isRecordOf(record, type)) listener(record);
      },
    });
  }
}
