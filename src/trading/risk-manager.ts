import type { RiskConfig } from "../config.js";
import type { CloseReason } from "./types.js";

const EPSILON = 1e-12;

export type RiskLevel = "LOW" | "MEDIUM" | "HIGH" | "CRITICAL";

export type DenyReason =
  | "INVALID_SIZE"
  | "COOLDOWN"
  | "DAILY_LOSS_LIMIT"
  | "LOSS_STREAK"
  | "DAILY_TRADE_LIMIT"
  | "EXPOSURE_EXCEEDED";

export type EntryDecision =
  | { allowed: true; reservationId: string; size: number }
  | { allowed: false; reason: DenyReason; message: string };

export interface ClosedTrade {
  positionId: string;
  token: string;
  entrySize: number;
  proceeds: number;
  pnl: number;
  reason: CloseReason;
  closedAt: number;
}

export interface RiskStats {
  totalTrades: number;
  wins: number;
  losses: number;
  winRate: number;
  realizedPnl: number;
  profitFactor: number | null;
  maxDrawdown: number;
  trades24h: number;
  entries24h: number;
  pnl24h: number;
  exposure: number;
  reserved: number;
  maxExposure: number;
  openPositions: number;
  lossStreak: number;
  cooldownUntil: number | null;
  cooldownReason: DenyReason | null;
  riskLevel: RiskLevel;
}

export interface RiskSnapshot {
  history: ClosedTrade[];
  entryTimes: number[];
  lossStreak: number;
  cooldownUntil: number;
  cooldownReason: DenyReason | null;
  totals: {
    trades: number;
    wins: number;
    losses: number;
    realizedPnl: number;
    grossProfit: number;
    grossLoss: number;
    peakPnl: number;
    maxDrawdown: number;
  };
}

/**
 * Rolling performance and exposure book. Every method is synchronous, so a
 * decision and the bookkeeping it implies (reserve, commit, release) happen
 * in one event-loop turn and can never interleave with a concurrent close.
 */
export class RiskManager {
  private exposureByPosition = new Map<string, number>();
  private reservations = new Map<string, number>();
  private nextReservation = 1;

  private history: ClosedTrade[] = [];   // closes inside the rolling window
  private entryTimes: number[] = [];     // entries inside the rolling window
  private lossStreak = 0;
  private cooldownUntil = 0;
  private cooldownReason: DenyReason | null = null;
  private level: RiskLevel = "LOW";

  private totals = {
    trades: 0,
    wins: 0,
    losses: 0,
    realizedPnl: 0,
    grossProfit: 0,
    grossLoss: 0,
    peakPnl: 0,
    maxDrawdown: 0,
  };

  constructor(
    private readonly config: RiskConfig,
    private readonly now: () => number = Date.now,
  ) {}

  get exposure(): number {
    let sum = 0;
    for (const size of this.exposureByPosition.values()) sum += size;
    return sum;
  }

  get reserved(): number {
    let sum = 0;
    for (const size of this.reservations.values()) sum += size;
    return sum;
  }

  get riskLevel(): RiskLevel {
    return this.level;
  }

  /** Native units still available for new entries. */
  remainingBudget(): number {
    return Math.max(0, this.config.maxExposure - this.exposure - this.reserved);
  }

  // ─── Entry ───

  /**
   * Check every entry rule and, when allowed, reserve `size` against the
   * exposure budget in the same step.
   */
  approveEntry(size: number, now = this.now()): EntryDecision {
    if (!Number.isFinite(size) || size <= 0) {
      return { allowed: false, reason: "INVALID_SIZE", message: `Invalid entry size ${size}` };
    }

    this.prune(now);

    if (now < this.cooldownUntil) {
      const reason = this.cooldownReason ?? "COOLDOWN";
      const secs = Math.ceil((this.cooldownUntil - now) / 1000);
      return { allowed: false, reason, message: `Cooling down for ${secs}s (${reason})` };
    }

    const windowPnl = this.windowPnl();
    if (windowPnl <= -this.config.dailyLossLimit) {
      this.enterCooldown(this.windowClearsAt(), "DAILY_LOSS_LIMIT");
      return {
        allowed: false,
        reason: "DAILY_LOSS_LIMIT",
        message: `24h P&L ${windowPnl.toFixed(6)} breached limit -${this.config.dailyLossLimit}`,
      };
    }

    if (this.entryTimes.length + this.reservations.size >= this.config.maxTradesPerDay) {
      return {
        allowed: false,
        reason: "DAILY_TRADE_LIMIT",
        message: `${this.config.maxTradesPerDay} entries already in the last 24h`,
      };
    }

    const committed = this.exposure + this.reserved;
    if (committed + size > this.config.maxExposure + EPSILON) {
      return {
        allowed: false,
        reason: "EXPOSURE_EXCEEDED",
        message: `Exposure ${committed} + ${size} would exceed ${this.config.maxExposure}`,
      };
    }

    const reservationId = `r${this.nextReservation++}`;
    this.reservations.set(reservationId, size);
    return { allowed: true, reservationId, size };
  }

  /** Turn a reservation into exposure owned by an open position. */
  commitEntry(reservationId: string, positionId: string, size?: number, now = this.now()): void {
    const reserved = this.reservations.get(reservationId);
    if (reserved === undefined) {
      throw new Error(`Unknown reservation ${reservationId}`);
    }
    this.reservations.delete(reservationId);
    this.exposureByPosition.set(positionId, size ?? reserved);
    this.entryTimes.push(now);
  }

  releaseReservation(reservationId: string): void {
    this.reservations.delete(reservationId);
  }

  // ─── Close ───

  /**
   * Record a fully closed position. Returns the new risk level when it
   * changed, otherwise null.
   */
  recordClose(trade: ClosedTrade): RiskLevel | null {
    this.exposureByPosition.delete(trade.positionId);
    this.prune(trade.closedAt);
    this.history.push(trade);

    const t = this.totals;
    t.trades++;
    t.realizedPnl += trade.pnl;
    if (trade.pnl < 0) {
      t.losses++;
      t.grossLoss += -trade.pnl;
      this.lossStreak++;
    } else {
      t.wins++;
      t.grossProfit += trade.pnl;
      this.lossStreak = 0;
    }
    t.peakPnl = Math.max(t.peakPnl, t.realizedPnl);
    t.maxDrawdown = Math.max(t.maxDrawdown, t.peakPnl - t.realizedPnl);

    if (this.lossStreak >= this.config.maxConsecutiveLosses) {
      this.enterCooldown(trade.closedAt + this.config.circuitBreakerCooldownMs, "LOSS_STREAK");
      console.log(`[risk] Circuit breaker: ${this.lossStreak} consecutive losses`);
      this.lossStreak = 0;
    }

    const windowPnl = this.windowPnl();
    if (windowPnl <= -this.config.dailyLossLimit) {
      this.enterCooldown(this.windowClearsAt(), "DAILY_LOSS_LIMIT");
      console.log(`[risk] Daily loss limit hit (${windowPnl.toFixed(6)})`);
    }

    return this.updateLevel(trade.closedAt);
  }

  // ─── Rolling window ───

  private prune(now: number): void {
    const cutoff = now - this.config.windowMs;
    this.history = this.history.filter((t) => t.closedAt > cutoff);
    this.entryTimes = this.entryTimes.filter((t) => t > cutoff);
  }

  private windowPnl(): number {
    return this.history.reduce((sum, t) => sum + t.pnl, 0);
  }

  /** Earliest time enough old trades roll out for the window P&L to clear the limit. */
  private windowClearsAt(): number {
    const trades = [...this.history].sort((a, b) => a.closedAt - b.closedAt);
    let after = this.windowPnl();
    for (const trade of trades) {
      after -= trade.pnl;
      if (after > -this.config.dailyLossLimit) return trade.closedAt + this.config.windowMs;
    }
    return trades[trades.length - 1].closedAt + this.config.windowMs;
  }

  private enterCooldown(until: number, reason: DenyReason): void {
    if (until > this.cooldownUntil) {
      this.cooldownUntil = until;
      this.cooldownReason = reason;
    }
  }

  /**
   * Re-derive the level at `now`. Cooldowns start inside `approveEntry` and
   * run out with the clock, so callers poll this to see those changes.
   */
  refreshLevel(now = this.now()): { from: RiskLevel; to: RiskLevel } | null {
    const from = this.level;
    const to = this.updateLevel(now);
    return to ? { from, to } : null;
  }

  private updateLevel(now: number): RiskLevel | null {
    const next = this.computeLevel(now);
    if (next === this.level) return null;
    console.log(`[risk] Risk level ${this.level} -> ${next}`);
    this.level = next;
    return next;
  }

  private computeLevel(now: number): RiskLevel {
    if (now < this.cooldownUntil) return "CRITICAL";
    if (this.lossStreak >= 3) return "HIGH";
    if (this.lossStreak >= 2) return "MEDIUM";
    return "LOW";
  }

  // ─── Observability ───

  stats(now = this.now()): RiskStats {
    this.prune(now);
    const t = this.totals;
    const cooling = now < this.cooldownUntil;
    return {
      totalTrades: t.trades,
      wins: t.wins,
      losses: t.losses,
      winRate: t.trades > 0 ? t.wins / t.trades : 0,
      realizedPnl: t.realizedPnl,
      profitFactor: t.grossLoss > 0 ? t.grossProfit / t.grossLoss : null,
      maxDrawdown: t.maxDrawdown,
      trades24h: this.history.length,
      entries24h: this.entryTimes.length,
      pnl24h: this.windowPnl(),
      exposure: this.exposure,
      reserved: this.reserved,
      maxExposure: this.config.maxExposure,
      openPositions: this.exposureByPosition.size,
      lossStreak: this.lossStreak,
      cooldownUntil: cooling ? this.cooldownUntil : null,
      cooldownReason: cooling ? this.cooldownReason : null,
      riskLevel: this.computeLevel(now),
    };
  }

  // ─── Persistence ───

  snapshot(): RiskSnapshot {
    return {
      history: [...this.history],
      entryTimes: [...this.entryTimes],
      lossStreak: this.lossStreak,
      cooldownUntil: this.cooldownUntil,
      cooldownReason: this.cooldownReason,
      totals: { ...this.totals },
    };
  }

  restore(snap: RiskSnapshot, openPositions: Array<{ id: string; entrySize: number }>): void {
    this.history = [...snap.history];
    this.entryTimes = [...snap.entryTimes];
    this.lossStreak = snap.lossStreak;
    this.cooldownUntil = snap.cooldownUntil;
    this.cooldownReason = snap.cooldownReason;
    this.totals = { ...snap.totals };
    this.restoreExposure(openPositions);
    this.level = this.computeLevel(this.now());
  }

  /** Exposure is always rebuilt from the live positions, never trusted from disk. */
  restoreExposure(openPositions: Array<{ id: string; entrySize: number }>): void {
    this.exposureByPosition.clear();
    for (const p of openPositions) this.exposureByPosition.set(p.id, p.entrySize);
  }
}
