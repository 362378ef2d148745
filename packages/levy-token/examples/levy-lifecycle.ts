// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * levy-lifecycle.ts
 *
 * Walks a LevyToken through its whole life on the in-process exchange:
 *   1. Deploy the paired asset, the exchange and the token.
 *   2. Seed the pair with liquidity from the administrator.
 *   3. Transfer between ordinary holders while the window is open.
 *   4. Show a rejected transfer leaving balances untouched.
 *   5. Let the window close and transfer again, untaxed.
 *
 * Run: npx tsx examples/levy-lifecycle.ts
 */

import {
  Chain,
  LevyLedgerError,
  LevyToken,
  ManualClock,
  MemoryExchange,
  SimpleAsset,
  UINT256_MAX,
} from '../src/index.js';

const ADMIN = 'admin';
const ALICE = 'alice';
const BOB = 'bob';
const CAROL = 'carol';

function main(): void {
  // --------------------------------------------------------------------------
  // 1. Deploy.
  // --------------------------------------------------------------------------
  const clock = new ManualClock(1_700_000_000);
  const chain = new Chain(clock);
  const weth = new SimpleAsset(chain, { name: 'Wrapped Ether', symbol: 'WETH', minter: ADMIN });
  const exchange = new MemoryExchange(chain, { pairedAsset: weth.address });
  const token = new LevyToken(chain, exchange, { administrator: ADMIN });
  const unit = token.unit;

  chain.events.on('TaxCollected', (record) => {
    console.log(`  [event] TaxCollected from=${record.event.from} amount=${record.event.amount}`);
  });
  chain.events.on('LiquidityAdded', (record) => {
    console.log(
      `  [event] LiquidityAdded token=${record.event.tokenAmount} paired=${record.event.pairedAssetAmount}`,
    );
  });

  console.log(`Deployed ${token.symbol} at ${token.address}, pair ${token.pair}`);
  console.log(`Levy window closes at ${token.taxEndTime} (${token.remainingTaxWindow()}s left)`);

  // --------------------------------------------------------------------------
  // 2. Seed liquidity. The administrator is exempt, so nothing is withheld.
  // --------------------------------------------------------------------------
  weth.mint(ADMIN, ADMIN, 100n * unit);
  token.approve(ADMIN, exchange.address, UINT256_MAX);
  weth.approve(ADMIN, exchange.address, UINT256_MAX);
  exchange.addLiquidity(ADMIN, {
    tokenA: token.address,
    tokenB: weth.address,
    amountADesired: 100_000n * unit,
    amountBDesired: 100n * unit,
    amountAMin: 0n,
    amountBMin: 0n,
    recipient: ADMIN,
    deadline: clock.now(),
  });
  token.transfer(ADMIN, ALICE, 10_000n * unit);

  // --------------------------------------------------------------------------
  // 3. In-window transfer between ordinary holders.
  // --------------------------------------------------------------------------
  console.log('\nalice -> bob, 1000 tokens, window open');
  token.transfer(ALICE, BOB, 1_000n * unit);
  console.log(`  bob received ${token.balanceOf(BOB) / unit} tokens`);
  console.log(
    `  administrator LP units: ${exchange.liquidityBalance(token.address, weth.address, ADMIN)}`,
  );

  // --------------------------------------------------------------------------
  // 4. A rejected transfer leaves no trace.
  // --------------------------------------------------------------------------
  console.log('\nbob -> carol, more than bob holds');
  try {
    token.transfer(BOB, CAROL, 10_000n * unit);
  } catch (error) {
    if (!(error instanceof LevyLedgerError)) throw error;
    console.log(`  rejected: ${error.code}; carol holds ${token.balanceOf(CAROL)}`);
  }

  // --------------------------------------------------------------------------
  // 5. After the window.
  // --------------------------------------------------------------------------
  clock.set(token.taxEndTime + 1);
  console.log(`\nalice -> carol, 1000 tokens, window closed (${token.remainingTaxWindow()}s left)`);
  token.transfer(ALICE, CAROL, 1_000n * unit);
  console.log(`  carol received ${token.balanceOf(CAROL) / unit} tokens`);
  console.log(`  levies collected overall: ${chain.events.ofType('TaxCollected').length}`);
}

main();
