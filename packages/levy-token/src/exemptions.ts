// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { Address } from './types.js';

/**
 * Identities the levy never applies to, regardless of the window.
 *
 * The set is fixed at construction and has no add/remove entry point.
 * Ownership changes do not move the administrator's exemption.
 */
export class ExemptionRegistry {
  readonly #exempt: ReadonlySet<Address>;

  constructor(identities: Iterable<Address>) {
    this.#exempt = new Set(identities);
  }

  isExempt(identity: Address): boolean {
    return this.#exempt.has(identity);
  }

  list(): readonly Address[] {
    return Array.from(this.#exempt);
  }
}
