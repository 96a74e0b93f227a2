import { describe, it, beforeEach } from "node:test";
import assert from "node:assert/strict";
import type { RiskConfig } from "../../src/config.js";
import { RiskManager, type ClosedTrade } from "../../src/trading/risk-manager.js";
import { FakeClock, HOUR, TOKEN_A } from "../helpers.js";

const DAY = 24 * HOUR;

const config: RiskConfig = {
  maxExposure: 0.01,
  dailyLossLimit: 0.003,
  maxConsecutiveLosses: 3,
  circuitBreakerCooldownMs: 30 * 60_000,
  maxTradesPerDay: 5,
  windowMs: DAY,
};

function trade(positionId: string, pnl: number, closedAt: number): ClosedTrade {
  return {
    positionId,
    token: TOKEN_A,
    entrySize: 0.001,
    proceeds: 0.001 + pnl,
    pnl,
    reason: pnl < 0 ? "STOP_LOSS" : "TAKE_PROFIT_FULL",
    closedAt,
  };
}

describe("RiskManager", () => {
  let clock: FakeClock;
  let risk: RiskManager;

  beforeEach(() => {
    clock = new FakeClock();
    risk = new RiskManager(config, clock.now);
  });

  it("reserves budget on approval and commits it to a position", () => {
    const decision = risk.approveEntry(0.004);
    assert.deepEqual(decision, { allowed: true, reservationId: "r1", size: 0.004 });
    assert.equal(risk.reserved, 0.004);
    assert.ok(Math.abs(risk.remainingBudget() - 0.006) < 1e-12);

    risk.commitEntry("r1", "001");
    assert.equal(risk.reserved, 0);
    assert.equal(risk.exposure, 0.004);
    assert.equal(risk.stats().entries24h, 1);
  });

  it("counts reservations against exposure", () => {
    risk.approveEntry(0.006);
    const denied = risk.approveEntry(0.005);
    assert.equal(denied.allowed, false);
    assert.equal(denied.allowed ? null : denied.reason, "EXPOSURE_EXCEEDED");
    assert.equal(risk.approveEntry(0.004).allowed, true);
  });

  it("returns released budget", () => {
    const decision = risk.approveEntry(0.01);
    assert.ok(decision.allowed);
    risk.releaseReservation(decision.reservationId);
    assert.equal(risk.remainingBudget(), 0.01);
  });

  it("rejects invalid sizes", () => {
    const decision = risk.approveEntry(0);
    assert.deepEqual(decision, { allowed: false, reason: "INVALID_SIZE", message: "Invalid entry size 0" });
  });

  it("frees exposure when a position closes", () => {
    const decision = risk.approveEntry(0.004);
    assert.ok(decision.allowed);
    risk.commitEntry(decision.reservationId, "001");
    risk.recordClose(trade("001", 0.001, clock.now()));
    assert.equal(risk.exposure, 0);
  });

  it("raises the level with the loss streak and trips the breaker", () => {
    assert.equal(risk.recordClose(trade("001", -0.0005, clock.now())), null);
    assert.equal(risk.recordClose(trade("002", -0.0005, clock.now())), "MEDIUM");
    assert.equal(risk.recordClose(trade("003", -0.0005, clock.now())), "CRITICAL");

    const denied = risk.approveEntry(0.001);
    assert.deepEqual(denied, {
      allowed: false,
      reason: "LOSS_STREAK",
      message: "Cooling down for 1800s (LOSS_STREAK)",
    });
    assert.equal(risk.stats().lossStreak, 0);

    clock.advance(30 * 60_000);
    assert.equal(risk.approveEntry(0.001).allowed, true);
    assert.equal(risk.stats().riskLevel, "LOW");
  });

  it("a win resets the streak", () => {
    risk.recordClose(trade("001", -0.0005, clock.now()));
    risk.recordClose(trade("002", -0.0005, clock.now()));
    assert.equal(risk.riskLevel, "MEDIUM");
    assert.equal(risk.recordClose(trade("003", 0.0002, clock.now())), "LOW");
    assert.equal(risk.stats().lossStreak, 0);
  });

  it("blocks entries once the rolling loss limit is hit", () => {
    assert.equal(risk.recordClose(trade("001", -0.003, clock.now())), "CRITICAL");
    const denied = risk.approveEntry(0.001);
    assert.equal(denied.allowed ? null : denied.reason, "DAILY_LOSS_LIMIT");

    clock.advance(DAY);
    assert.equal(risk.approveEntry(0.001).allowed, true);
    assert.equal(risk.stats().pnl24h, 0);
  });

  it("reports level changes from cooldowns it starts and from cooldowns running out", () => {
    risk.restore(
      {
        history: [trade("001", -0.003, clock.now())],
        entryTimes: [],
        lossStreak: 0,
        cooldownUntil: 0,
        cooldownReason: null,
        totals: { trades: 1, wins: 0, losses: 1, realizedPnl: -0.003, grossProfit: 0, grossLoss: 0.003, peakPnl: 0, maxDrawdown: 0.003 },
      },
      [],
    );
    assert.equal(risk.riskLevel, "LOW");

    const denied = risk.approveEntry(0.001);
    assert.equal(denied.allowed ? null : denied.reason, "DAILY_LOSS_LIMIT");
    assert.deepEqual(risk.refreshLevel(), { from: "LOW", to: "CRITICAL" });
    assert.equal(risk.refreshLevel(), null);

    clock.advance(DAY);
    assert.deepEqual(risk.refreshLevel(), { from: "CRITICAL", to: "LOW" });
    assert.equal(risk.riskLevel, "LOW");
  });

  it("limits entries per rolling day, reservations included", () => {
    const limited = new RiskManager({ ...config, maxTradesPerDay: 2 }, clock.now);
    const first = limited.approveEntry(0.001);
    assert.ok(first.allowed);
    limited.commitEntry(first.reservationId, "001");
    assert.equal(limited.approveEntry(0.001).allowed, true);
    const denied = limited.approveEntry(0.001);
    assert.deepEqual(denied, {
      allowed: false,
      reason: "DAILY_TRADE_LIMIT",
      message: "2 entries already in the last 24h",
    });
  });

  it("reports performance", () => {
    risk.recordClose(trade("001", 0.001, clock.now()));
    risk.recordClose(trade("002", -0.0005, clock.now()));
    const stats = risk.stats();
    assert.equal(stats.totalTrades, 2);
    assert.equal(stats.wins, 1);
    assert.equal(stats.losses, 1);
    assert.equal(stats.winRate, 0.5);
    assert.equal(stats.profitFactor, 2);
    assert.equal(stats.realizedPnl, 0.0005);
    assert.equal(stats.maxDrawdown, 0.0005);
    assert.equal(stats.trades24h, 2);
  });

  it("restores history and rebuilds exposure from open positions", () => {
    risk.recordClose(trade("001", -0.0005, clock.now()));
    risk.recordClose(trade("002", -0.0005, clock.now()));
    const snap = risk.snapshot();

    const restored = new RiskManager(config, clock.now);
    restored.restore(snap, [{ id: "003", entrySize: 0.002 }]);
    assert.equal(restored.exposure, 0.002);
    assert.equal(restored.riskLevel, "MEDIUM");
    assert.equal(restored.stats().totalTrades, 2);
    assert.equal(restored.stats().lossStreak, 2);
  });
});
