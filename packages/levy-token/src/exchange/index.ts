// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export {
  MemoryExchange,
  MemoryPairFactory,
  LiquidityPair,
  getAmountOut,
  quote,
} from './memory-exchange.js';
export type { MemoryExchangeOptions } from './memory-exchange.js';
export { SimpleAsset } from './simple-asset.js';
