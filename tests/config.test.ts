import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { isAddress } from "viem";
import { getAccount, loadConfig, WETH_BASE } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

describe("loadConfig", () => {
  it("fills every default", () => {
    const cfg = loadConfig({});
    assert.equal(cfg.activeMode, "NORMAL");
    assert.equal(cfg.modeSwitchPolicy, "fixed-at-entry");
    assert.equal(cfg.baseToken, WETH_BASE);
    assert.equal(cfg.modes.NORMAL.tradeSize, 0.0008);
    assert.equal(cfg.modes.TURBO.maxPositions, 3);
    assert.equal(cfg.screener.maxTaxPct, 0.1);
    assert.equal(cfg.screener.maxRoundTripLossPct, 0.5);
    assert.equal(cfg.discovery.minLiquidity, cfg.screener.minLiquidity);
    assert.equal(cfg.risk.maxExposure, 0.01);
    assert.equal(cfg.risk.circuitBreakerCooldownMs, 1_800_000);
    assert.deepEqual(cfg.routes.map((r) => r.id), ["uniswap-v2", "baseswap", "uniswap-v3"]);
    assert.equal(cfg.stateFile, "data/state.md");
    assert.equal(cfg.exits.closedHistory, 100);
    assert.equal(Object.isFrozen(cfg), true);
  });

  it("reads modes and percentages from the environment", () => {
    const cfg = loadConfig({
      SNIPER_MODE: "turbo",
      MODE_SWITCH_POLICY: "adopt-new",
      NORMAL_TAKE_PROFIT: "50@30,50@60",
      NORMAL_STOP_LOSS: "0.2",
      MAX_TAX_PCT: "5",
      REQUIRE_VERIFIED: "yes",
    });
    assert.equal(cfg.activeMode, "TURBO");
    assert.equal(cfg.modeSwitchPolicy, "adopt-new");
    assert.deepEqual(cfg.modes.NORMAL.takeProfit, [
      { fraction: 0.5, threshold: 0.3 },
      { fraction: 0.5, threshold: 0.6 },
    ]);
    assert.equal(cfg.modes.NORMAL.stopLossPct, 0.2);
    assert.equal(cfg.screener.maxTaxPct, 0.05);
    assert.equal(cfg.screener.requireVerified, true);
  });

  it("orders selected routes by position", () => {
    const cfg = loadConfig({ DEX_ROUTES: "uniswap-v3, baseswap" });
    assert.deepEqual(
      cfg.routes.map((r) => [r.id, r.priority]),
      [
        ["uniswap-v3", 1],
        ["baseswap", 2],
      ],
    );
  });

  it("rejects malformed values", () => {
    assert.throws(() => loadConfig({ MAX_EXPOSURE: "abc" }), {
      name: "ConfigError",
      message: 'MAX_EXPOSURE must be a number, got "abc"',
    });
    assert.throws(() => loadConfig({ SNIPER_MODE: "fast" }), ConfigError);
    assert.throws(() => loadConfig({ MODE_SWITCH_POLICY: "sometimes" }), ConfigError);
    assert.throws(() => loadConfig({ REQUIRE_VERIFIED: "maybe" }), ConfigError);
    assert.throws(() => loadConfig({ BASE_TOKEN: "0x1234" }), ConfigError);
    assert.throws(() => loadConfig({ DEX_ROUTES: "sushiswap" }), /Unknown DEX route "sushiswap"/);
    assert.throws(() => loadConfig({ MIN_SECURITY_SCORE: "120" }), ConfigError);
  });

  it("refuses a trade size above the exposure cap", () => {
    assert.throws(() => loadConfig({ NORMAL_TRADE_SIZE: "0.02" }), {
      message: "NORMAL trade size 0.02 exceeds MAX_EXPOSURE 0.01",
    });
  });
});

describe("getAccount", () => {
  it("loads a private key with or without the 0x prefix", () => {
    const key = "11".repeat(32);
    const a = getAccount({ PRIVATE_KEY: key });
    const b = getAccount({ PRIVATE_KEY: `0x${key}` });
    assert.ok(isAddress(a.address));
    assert.equal(a.address, b.address);
  });

  it("requires a key", () => {
    assert.throws(() => getAccount({}), ConfigError);
    assert.throws(() => getAccount({ PRIVATE_KEY: "0xabc" }), { message: "PRIVATE_KEY must be 32 bytes of hex" });
  });
});
