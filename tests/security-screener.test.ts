import { describe, it, beforeEach } from "node:test";
import assert from "node:assert/strict";
import type { Address } from "viem";
import type { RouteQuote, Side } from "../src/dex/types.js";
import { SecurityScreener, type Quoter } from "../src/security-screener.js";
import { toWei } from "../src/utils.js";
import {
  FakeClock,
  FakeIntel,
  FakeMarket,
  FakeRouteClient,
  HOUR,
  TOKEN_A,
  TOKEN_B,
  candidate,
  makeAggregator,
  testConfig,
} from "./helpers.js";

/** Buys at 1:1 and pays back a fixed share of the probe on the sell. */
function lossyQuoter(sellBack: number): Quoter {
  return {
    async quote(_token: Address, side: Side, amountIn: bigint): Promise<RouteQuote> {
      const amountOut = side === "buy" ? amountIn : toWei(sellBack);
      return { routeId: "route-a", side, amountIn, amountOut, priceImpactBps: 0 };
    },
  };
}

describe("SecurityScreener", () => {
  let clock: FakeClock;
  let intel: FakeIntel;
  let client: FakeRouteClient;
  let screener: SecurityScreener;

  beforeEach(() => {
    clock = new FakeClock();
    intel = new FakeIntel(clock);
    const market = new FakeMarket();
    market.set(TOKEN_A, 0.5);
    client = new FakeRouteClient("route-a", 1, market);
    screener = new SecurityScreener(intel, makeAggregator([client]), testConfig().screener, clock.now);
  });

  it("passes a clean token with a full score", async () => {
    const verdict = await screener.evaluate(candidate(TOKEN_A, clock));
    assert.equal(verdict.pass, true);
    assert.equal(verdict.score, 100);
    assert.deepEqual(verdict.reasons, []);
    assert.equal(verdict.token.symbol, "DMOON");
    assert.equal(verdict.token.securityScore, 100);
    assert.equal(verdict.transient, false);
  });

  it("subtracts soft penalties and still passes above the minimum", async () => {
    intel.overrides.set(TOKEN_A.toLowerCase(), { verified: false, ownerRenounced: false });
    const verdict = await screener.evaluate(candidate(TOKEN_A, clock, 0.07));
    assert.equal(verdict.pass, true);
    assert.equal(verdict.score, 70);
    assert.deepEqual(verdict.reasons, [
      "Contract source is not verified",
      "Liquidity 0.07 is thin",
      "Ownership not renounced",
    ]);
    assert.deepEqual(verdict.hardFails, []);
  });

  it("fails on score alone when unknowns pile up", async () => {
    intel.overrides.set(TOKEN_A.toLowerCase(), {
      verified: false,
      buyTaxPct: null,
      isHoneypot: null,
      canPause: true,
    });
    const verdict = await screener.evaluate(candidate(TOKEN_A, clock, 0.07));
    assert.equal(verdict.score, 50);
    assert.equal(verdict.pass, false);
    assert.deepEqual(verdict.hardFails, []);
  });

  it("rejects outright on a hard rule", async () => {
    intel.overrides.set(TOKEN_A.toLowerCase(), { sellTaxPct: 0.15 });
    const verdict = await screener.evaluate(candidate(TOKEN_A, clock));
    assert.equal(verdict.pass, false);
    assert.equal(verdict.score, 100);
    assert.deepEqual(verdict.hardFails, ["HIGH_SELL_TAX"]);
    assert.deepEqual(verdict.reasons, ["Sell tax 15.0% above 10.0%"]);
  });

  it("rejects scam names, old tokens and drain risk", async () => {
    intel.overrides.set(TOKEN_A.toLowerCase(), {
      name: "Rug Pull",
      createdAt: clock.now() - 25 * HOUR,
      ownerRenounced: false,
      canMint: true,
      liquidityLocked: false,
    });
    const verdict = await screener.evaluate(candidate(TOKEN_A, clock));
    assert.deepEqual(verdict.hardFails, ["TOO_OLD", "DRAIN_RISK", "SCAM_NAME"]);
    assert.equal(verdict.reasons[0], "Token is 25h old");
    assert.equal(verdict.reasons[2], 'Name or symbol contains "rug"');
  });

  it("rejects low liquidity", async () => {
    const verdict = await screener.evaluate(candidate(TOKEN_A, clock, 0.01));
    assert.deepEqual(verdict.hardFails, ["LOW_LIQUIDITY"]);
    assert.deepEqual(verdict.reasons, ["Liquidity 0.01 below 0.05"]);
  });

  it("rejects a token that can be bought but not sold", async () => {
    client.blockSells = true;
    const verdict = await screener.evaluate(candidate(TOKEN_A, clock));
    assert.deepEqual(verdict.hardFails, ["HONEYPOT_SIMULATION"]);
    assert.deepEqual(verdict.reasons, ["Sell simulation failed: no route accepts a sell"]);
  });

  it("rejects a token no route can buy", async () => {
    const verdict = await screener.evaluate(candidate(TOKEN_B, clock));
    assert.deepEqual(verdict.hardFails, ["NO_ROUTE"]);
  });

  it("tolerates round-trip loss up to taxes plus the allowance", async () => {
    const config = testConfig().screener;
    const lossy = new SecurityScreener(intel, lossyQuoter(0.0004), config, clock.now);
    const rejected = await lossy.evaluate(candidate(TOKEN_A, clock));
    assert.deepEqual(rejected.hardFails, ["HONEYPOT_SIMULATION"]);
    assert.deepEqual(rejected.reasons, ["Round trip loses 60.0% (max 54.0%)"]);

    const tolerable = new SecurityScreener(intel, lossyQuoter(0.0005), config, clock.now);
    assert.equal((await tolerable.evaluate(candidate(TOKEN_A, clock))).pass, true);
  });

  it("requires verification when configured", async () => {
    intel.overrides.set(TOKEN_A.toLowerCase(), { verified: false });
    const strict = new SecurityScreener(intel, makeAggregator([client]), testConfig({ REQUIRE_VERIFIED: "true" }).screener, clock.now);
    const verdict = await strict.evaluate(candidate(TOKEN_A, clock));
    assert.deepEqual(verdict.hardFails, ["UNVERIFIED"]);
  });

  it("marks missing intel as transient and does not cache it", async () => {
    intel.failing.add(TOKEN_A.toLowerCase());
    const verdict = await screener.evaluate(candidate(TOKEN_A, clock));
    assert.equal(verdict.pass, false);
    assert.equal(verdict.transient, true);
    assert.equal(verdict.intel, null);
    assert.deepEqual(verdict.hardFails, ["INTEL_UNAVAILABLE"]);
    assert.deepEqual(verdict.reasons, ["Token data unavailable: intel backend down"]);

    intel.failing.clear();
    assert.equal((await screener.evaluate(candidate(TOKEN_A, clock))).pass, true);
    assert.equal(intel.calls, 2);
  });

  it("caches verdicts until they expire", async () => {
    const first = await screener.evaluate(candidate(TOKEN_A, clock));
    assert.equal(await screener.evaluate(candidate(TOKEN_A, clock)), first);
    assert.equal(intel.calls, 1);

    clock.advance(5 * 60_000);
    await screener.evaluate(candidate(TOKEN_A, clock));
    assert.equal(intel.calls, 2);
  });

  it("shares one check between concurrent callers", async () => {
    const [x, y] = await Promise.all([
      screener.evaluate(candidate(TOKEN_A, clock)),
      screener.evaluate(candidate(TOKEN_A, clock)),
    ]);
    assert.equal(x, y);
    assert.equal(intel.calls, 1);
  });
});
