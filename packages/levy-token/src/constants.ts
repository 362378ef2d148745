// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/** Identity that never holds value; minting starts here, renouncement ends here. */
export const ZERO_ADDRESS = '0x0000000000000000000000000000000000000000';

/** Holder of the exchange's permanently locked minimum liquidity. */
export const LOCKED_LIQUIDITY_ADDRESS = '0x000000000000000000000000000000000000dEaD';

/** Network address of the exchange gateway the token is deployed against. */
export const DEFAULT_GATEWAY_ADDRESS = '0x7a250d5630B4cF539739dF2C5dAcb4c659F2488D';

export const DEFAULT_TOKEN_NAME = 'Levy Token';
export const DEFAULT_TOKEN_SYMBOL = 'LEVY';
export const DEFAULT_DECIMALS = 18;

/** Whole tokens minted to the administrator at construction. */
export const DEFAULT_INITIAL_SUPPLY_UNITS = 1_000_000n;

/** Percentage of a qualifying transfer withheld while the window is open. */
export const DEFAULT_TAX_PERCENT = 5n;

/** Length of the tax window: one hour. */
export const DEFAULT_TAX_WINDOW_SECONDS = 3_600;

// Constant-product exchange parameters.
export const EXCHANGE_FEE_NUMERATOR = 997n;
export const EXCHANGE_FEE_DENOMINATOR = 1_000n;
export const MINIMUM_LIQUIDITY = 1_000n;
