import type { Address, Hash } from "viem";
import type {
  CloseReason,
  Fill,
  Mode,
  Position,
  TokenClass,
  TokenClassPolicy,
} from "./types.js";
import { fromWei, toWei } from "../utils.js";

const MAX_LOG_ENTRIES = 100;
const BPS = 10_000n;

// Position state machine. Every function here is synchronous: the engine
// calls them while holding the position's lock, so a transition never
// interleaves with another loop.

export interface OpenParams {
  id: string;
  token: Address;
  symbol: string;
  decimals: number;
  tokenClass: TokenClass;
  mode: Mode;
  entryPrice: number;
  entrySize: number;
  amount: bigint;
  routeId: string;
  txHash: Hash;
  now: number;
}

export function openPosition(p: OpenParams): Position {
  const pos: Position = {
    id: p.id,
    token: p.token,
    symbol: p.symbol,
    decimals: p.decimals,
    tokenClass: p.tokenClass,
    modeName: p.mode.name,
    entryPrice: p.entryPrice,
    entrySize: p.entrySize,
    entryAmount: p.amount.toString(),
    remainingAmount: p.amount.toString(),
    openedAt: p.now,
    takeProfit: p.mode.takeProfit.map((l) => ({ ...l })),
    trailingStopPct: p.mode.trailingStopPct,
    triggered: p.mode.takeProfit.map(() => false),
    stopPrice: p.entryPrice * (1 - p.mode.stopLossPct),
    highWaterMarkPrice: p.entryPrice,
    lastPrice: p.entryPrice,
    status: "OPEN",
    closeReason: null,
    closedAt: null,
    proceeds: 0,
    routeId: p.routeId,
    fills: [
      {
        time: p.now,
        side: "buy",
        amountIn: toWei(p.entrySize).toString(),
        amountOut: p.amount.toString(),
        price: p.entryPrice,
        routeId: p.routeId,
        txHash: p.txHash,
      },
    ],
    pendingClose: null,
    pendingSell: null,
    log: [],
  };
  addLog(pos, `Opened ${p.symbol} at ${p.entryPrice} via ${p.routeId} (${p.mode.name})`, "info", p.now);
  return pos;
}

export function addLog(pos: Position, message: string, type: "info" | "sell" | "error", time: number): void {
  pos.log.push({ time, message, type });
  if (pos.log.length > MAX_LOG_ENTRIES) pos.log.splice(0, pos.log.length - MAX_LOG_ENTRIES);
  console.log(`[position:${pos.id}] ${message}`);
}

export function isActive(pos: Position): boolean {
  return pos.status === "OPEN" || pos.status === "PARTIAL";
}

export function remaining(pos: Position): bigint {
  return BigInt(pos.remainingAmount);
}

/**
 * Record a new observed price. Raises the high-water mark and trails the
 * stop behind it; the stop never moves down.
 */
export function markPrice(pos: Position, price: number): void {
  pos.lastPrice = price;
  if (price > pos.highWaterMarkPrice) {
    pos.highWaterMarkPrice = price;
  }
  const trailed = pos.highWaterMarkPrice * (1 - pos.trailingStopPct);
  if (trailed > pos.stopPrice) {
    pos.stopPrice = trailed;
  }
}

export type ExitPlan =
  | { kind: "full"; reason: CloseReason; amount: bigint }
  | { kind: "partial"; level: number; amount: bigint };

/** Index of the next take-profit level that has not fired, or -1. */
export function nextLevel(pos: Position): number {
  return pos.triggered.indexOf(false);
}

/**
 * Decide what (if anything) to sell at `price`. At most one take-profit level
 * is returned per call; levels strictly follow their order.
 */
export function planExit(
  pos: Position,
  price: number,
  now: number,
  policy: TokenClassPolicy,
): ExitPlan | null {
  if (!isActive(pos)) return null;
  const held = remaining(pos);

  if (pos.pendingClose) {
    return { kind: "full", reason: pos.pendingClose, amount: held };
  }
  if (held === 0n) {
    return { kind: "full", reason: "TAKE_PROFIT_FULL", amount: 0n };
  }
  if (price <= pos.stopPrice) {
    return { kind: "full", reason: "STOP_LOSS", amount: held };
  }

  const idx = nextLevel(pos);
  if (idx >= 0) {
    const level = pos.takeProfit[idx];
    if (price >= pos.entryPrice * (1 + level.threshold)) {
      const fractionBps = BigInt(Math.round(level.fraction * 10_000));
      return { kind: "partial", level: idx, amount: (held * fractionBps) / BPS };
    }
  }

  const gain = pos.entryPrice > 0 ? price / pos.entryPrice - 1 : 0;
  if (now - pos.openedAt >= policy.maxAgeMs && gain < policy.timeoutMinProfitPct) {
    return { kind: "full", reason: "TIMEOUT", amount: held };
  }

  return null;
}

/** Apply a take-profit sell (or a zero-amount level skip). */
export function applyPartialFill(pos: Position, level: number, sold: bigint, fill: Fill | null, now: number): void {
  pos.triggered[level] = true;
  const left = remaining(pos) - sold;
  pos.remainingAmount = (left > 0n ? left : 0n).toString();
  if (fill) {
    pos.fills.push(fill);
    pos.proceeds += fromWei(BigInt(fill.amountOut));
  }
  const pct = (pos.takeProfit[level].threshold * 100).toFixed(0);
  addLog(pos, fill ? `Take-profit level ${level + 1} (+${pct}%) sold ${sold}` : `Take-profit level ${level + 1} (+${pct}%) reached, nothing to sell`, "sell", now);

  if (left <= 0n) {
    closeAs(pos, "TAKE_PROFIT_FULL", now);
  } else {
    pos.status = "PARTIAL";
  }
}

/** Apply a full-amount exit and close the position. */
export function applyFullClose(pos: Position, reason: CloseReason, fill: Fill | null, now: number): void {
  if (fill) {
    pos.fills.push(fill);
    pos.proceeds += fromWei(BigInt(fill.amountOut));
  }
  pos.remainingAmount = "0";
  addLog(pos, `Closed (${reason}) at ${pos.lastPrice}`, "sell", now);
  closeAs(pos, reason, now);
}

function closeAs(pos: Position, reason: CloseReason, now: number): void {
  pos.status = "CLOSED";
  pos.closeReason = reason;
  pos.closedAt = now;
  pos.pendingClose = null;
}

export function realizedPnl(pos: Position): number {
  return pos.proceeds - pos.entrySize;
}

/** Mark-to-market value of what is still held plus what was already sold. */
export function unrealizedPnl(pos: Position): number {
  const held = Number(remaining(pos)) / 10 ** pos.decimals;
  return pos.proceeds + held * pos.lastPrice - pos.entrySize;
}

/**
 * Re-parent an open position onto a new mode's exit levels. Triggered flags
 * carry over by index and the stop never loosens.
 */
export function adoptMode(pos: Position, mode: Mode, now: number): void {
  pos.modeName = mode.name;
  pos.takeProfit = mode.takeProfit.map((l) => ({ ...l }));
  pos.triggered = mode.takeProfit.map((_, i) => pos.triggered[i] ?? false);
  pos.trailingStopPct = mode.trailingStopPct;
  const floor = Math.max(
    pos.entryPrice * (1 - mode.stopLossPct),
    pos.highWaterMarkPrice * (1 - mode.trailingStopPct),
  );
  if (floor > pos.stopPrice) pos.stopPrice = floor;
  addLog(pos, `Adopted ${mode.name} exit levels`, "info", now);
}
