// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { ReentrancyError } from './errors.js';

/**
 * Scoped reentrancy guard for liquidity conversion.
 *
 * `run()` holds the guard for exactly the duration of its callback and
 * releases it on every exit path, including a throw. While held, the levy
 * engine lets value moves through untaxed.
 */
export class ReentrancyGuard {
  #held = false;

  get held(): boolean {
    return this.#held;
  }

  run<T>(fn: () => T): T {
    if (this.#held) {
      throw new ReentrancyError();
    }
    this.#held = true;
    try {
      return fn();
    } finally {
      this.#held = false;
    }
  }
}
