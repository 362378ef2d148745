// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { ZERO_ADDRESS } from './constants.js';
import { InvalidAddressError, NotAdministratorError } from './errors.js';
import type { Address, EventSink, StatefulParticipant } from './types.js';

/**
 * Single-administrator access control.
 *
 * After `renounce()` the owner is the zero address and every privileged
 * call fails for good.
 */
export class Ownership implements StatefulParticipant<Address> {
  readonly #emit: EventSink;
  #owner: Address;

  constructor(initialOwner: Address, emit: EventSink) {
    if (initialOwner === ZERO_ADDRESS) throw new InvalidAddressError('owner');
    this.#emit = emit;
    this.#owner = initialOwner;
    this.#emit({ type: 'OwnershipTransferred', previousOwner: ZERO_ADDRESS, newOwner: initialOwner });
  }

  get owner(): Address {
    return this.#owner;
  }

  requireOwner(caller: Address): void {
    if (caller !== this.#owner) {
      throw new NotAdministratorError(caller, this.#owner);
    }
  }

  transfer(caller: Address, newOwner: Address): void {
    this.requireOwner(caller);
    if (newOwner === ZERO_ADDRESS) throw new InvalidAddressError('owner');
    this.#setOwner(newOwner);
  }

  renounce(caller: Address): void {
    this.requireOwner(caller);
    this.#setOwner(ZERO_ADDRESS);
  }

  snapshot(): Address {
    return this.#owner;
  }

  restore(snapshot: Address): void {
    this.#owner = snapshot;
  }

  #setOwner(newOwner: Address): void {
    const previousOwner = this.#owner;
    this.#owner = newOwner;
    this.#emit({ type: 'OwnershipTransferred', previousOwner, newOwner });
  }
}
