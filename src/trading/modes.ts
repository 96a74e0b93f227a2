import { ConfigError } from "../errors.js";
import type { Mode, ModeName, TakeProfitLevel } from "./types.js";

const FRACTION_EPSILON = 1e-9;

// ─── Presets ───

export const DEFAULT_MODES: Readonly<Record<ModeName, Mode>> = Object.freeze({
  NORMAL: freezeMode({
    name: "NORMAL",
    tradeSize: 0.0008,
    takeProfit: [
      { threshold: 0.25, fraction: 0.25 },
      { threshold: 0.5, fraction: 0.25 },
      { threshold: 1.0, fraction: 0.25 },
      { threshold: 2.0, fraction: 0.25 },
    ],
    stopLossPct: 0.12,
    trailingStopPct: 0.12,
    mempoolIntervalMs: 200,
    maxPositions: 2,
    maxSlippageBps: 500,
  }),
  TURBO: freezeMode({
    name: "TURBO",
    tradeSize: 0.0012,
    takeProfit: [
      { threshold: 0.5, fraction: 0.25 },
      { threshold: 1.0, fraction: 0.25 },
      { threshold: 2.0, fraction: 0.25 },
      { threshold: 4.0, fraction: 0.25 },
    ],
    stopLossPct: 0.15,
    trailingStopPct: 0.15,
    mempoolIntervalMs: 50,
    maxPositions: 3,
    maxSlippageBps: 1000,
  }),
});

function freezeMode(mode: Mode): Mode {
  return Object.freeze({
    ...mode,
    takeProfit: Object.freeze(mode.takeProfit.map((l) => Object.freeze({ ...l }))),
  });
}

// ─── Validation ───

export function validateTakeProfit(levels: readonly TakeProfitLevel[]): void {
  if (levels.length === 0) throw new ConfigError("At least one take-profit level is required");
  let prev = 0;
  let total = 0;
  for (const [i, level] of levels.entries()) {
    if (!Number.isFinite(level.threshold) || level.threshold <= prev) {
      throw new ConfigError(`Take-profit level ${i + 1}: thresholds must be positive and strictly ascending`);
    }
    if (!Number.isFinite(level.fraction) || level.fraction <= 0 || level.fraction > 1) {
      throw new ConfigError(`Take-profit level ${i + 1}: fraction must be in (0, 1]`);
    }
    prev = level.threshold;
    total += level.fraction;
  }
  if (total > 1 + FRACTION_EPSILON) {
    throw new ConfigError(`Take-profit fractions sum to ${(total * 100).toFixed(1)}%, above 100%`);
  }
}

function requirePct(value: number, label: string): void {
  if (!Number.isFinite(value) || value <= 0 || value >= 1) {
    throw new ConfigError(`${label} must be between 0 and 1 (exclusive), got ${value}`);
  }
}

function requirePositiveInt(value: number, label: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${label} must be a positive integer, got ${value}`);
  }
}

/** Returns a frozen copy or throws ConfigError. */
export function validateMode(mode: Mode): Mode {
  if (!Number.isFinite(mode.tradeSize) || mode.tradeSize <= 0) {
    throw new ConfigError(`${mode.name}: trade size must be positive, got ${mode.tradeSize}`);
  }
  validateTakeProfit(mode.takeProfit);
  requirePct(mode.stopLossPct, `${mode.name}: stop loss`);
  requirePct(mode.trailingStopPct, `${mode.name}: trailing stop`);
  requirePositiveInt(mode.mempoolIntervalMs, `${mode.name}: mempool interval`);
  requirePositiveInt(mode.maxPositions, `${mode.name}: max positions`);
  if (!Number.isInteger(mode.maxSlippageBps) || mode.maxSlippageBps < 1 || mode.maxSlippageBps > 10_000) {
    throw new ConfigError(`${mode.name}: max slippage must be 1..10000 bps, got ${mode.maxSlippageBps}`);
  }
  return freezeMode(mode);
}

export type ModeOverrides = Partial<Omit<Mode, "name">>;

export function withOverrides(mode: Mode, overrides: ModeOverrides): Mode {
  return validateMode({ ...mode, ...overrides, name: mode.name });
}

export function isModeName(value: string): value is ModeName {
  return value === "NORMAL" || value === "TURBO";
}

/**
 * Parse levels like "25@25,25@50,50@100": sell 25% of what is left at +25%,
 * another 25% at +50%, half the rest at +100%.
 */
export function parseTakeProfit(input: string): TakeProfitLevel[] {
  const levels = input.split(",").map((part) => {
    const match = part.trim().match(/^(\d+(?:\.\d+)?)%?@\+?(\d+(?:\.\d+)?)%?$/);
    if (!match) throw new ConfigError(`Invalid take-profit level "${part.trim()}", use "25@50" (sell 25% at +50%)`);
    return {
      fraction: parseFloat(match[1]) / 100,
      threshold: parseFloat(match[2]) / 100,
    };
  });
  validateTakeProfit(levels);
  return levels;
}

export function describeTakeProfit(levels: readonly TakeProfitLevel[]): string {
  return levels.map((l) => `${+(l.fraction * 100).toFixed(2)}%@+${+(l.threshold * 100).toFixed(2)}%`).join(", ");
}
