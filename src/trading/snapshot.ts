import { isAddress, isHash, type Address, type Hash } from "viem";
import { PersistenceError } from "../errors.js";
import type { ClosedTrade, DenyReason, RiskSnapshot } from "./risk-manager.js";
import { isModeName, validateMode } from "./modes.js";
import type {
  CloseReason,
  EngineState,
  Fill,
  Mode,
  ModeName,
  PendingSell,
  Position,
  PositionStatus,
  TakeProfitLevel,
  TokenClass,
} from "./types.js";

// Readers for the state file sections. Each throws PersistenceError naming
// the offending field; nothing from disk reaches the engine unchecked.

export interface EngineSnapshot {
  state: EngineState;
  activeMode: ModeName;
  modes: Record<ModeName, Mode>;
  nextPositionNum: number;
  rejected: string[];
}

export interface PositionsSnapshot {
  open: Position[];
  closed: Position[];
}

const ENGINE_STATES: readonly EngineState[] = ["IDLE", "RUNNING", "PAUSED", "STOPPED"];
const CLOSE_REASONS: readonly CloseReason[] = ["TAKE_PROFIT_FULL", "STOP_LOSS", "TIMEOUT", "EMERGENCY", "MANUAL"];
const STATUSES: readonly PositionStatus[] = ["OPEN", "PARTIAL", "CLOSED"];
const CLASSES: readonly TokenClass[] = ["memecoin", "altcoin"];
const DENY_REASONS: readonly DenyReason[] = [
  "INVALID_SIZE",
  "COOLDOWN",
  "DAILY_LOSS_LIMIT",
  "LOSS_STREAK",
  "DAILY_TRADE_LIMIT",
  "EXPOSURE_EXCEEDED",
];

// ─── Field readers ───

type Obj = object;

function fail(where: string, what: string): never {
  throw new PersistenceError(`Invalid state: ${where} ${what}`);
}

function obj(value: unknown, where: string): Obj {
  if (typeof value !== "object" || value === null || Array.isArray(value)) fail(where, "is not an object");
  return value;
}

function field(o: Obj, key: string): unknown {
  return Reflect.get(o, key);
}

function arr(value: unknown, where: string): unknown[] {
  if (!Array.isArray(value)) fail(where, "is not an array");
  return value;
}

function str(o: Obj, key: string, where: string): string {
  const v = field(o, key);
  if (typeof v !== "string") fail(`${where}.${key}`, "is not a string");
  return v;
}

function num(o: Obj, key: string, where: string): number {
  const v = field(o, key);
  if (typeof v !== "number" || !Number.isFinite(v)) fail(`${where}.${key}`, "is not a number");
  return v;
}

function numOrNull(o: Obj, key: string, where: string): number | null {
  return field(o, key) === null ? null : num(o, key, where);
}

function oneOf<T extends string>(o: Obj, key: string, allowed: readonly T[], where: string): T {
  const v = field(o, key);
  const match = allowed.find((a) => a === v);
  if (match === undefined) fail(`${where}.${key}`, `must be one of ${allowed.join(", ")}`);
  return match;
}

function oneOfOrNull<T extends string>(o: Obj, key: string, allowed: readonly T[], where: string): T | null {
  return field(o, key) === null || field(o, key) === undefined ? null : oneOf(o, key, allowed, where);
}

function addr(o: Obj, key: string, where: string): Address {
  const v = str(o, key, where);
  if (!isAddress(v)) fail(`${where}.${key}`, "is not an address");
  return v;
}

function hash(o: Obj, key: string, where: string): Hash {
  const v = str(o, key, where);
  if (!isHash(v)) fail(`${where}.${key}`, "is not a transaction hash");
  return v;
}

function rawAmount(o: Obj, key: string, where: string): string {
  const v = str(o, key, where);
  if (!/^\d+$/.test(v)) fail(`${where}.${key}`, "is not an integer amount");
  return v;
}

// ─── Sections ───

function readLevel(value: unknown, where: string): TakeProfitLevel {
  const o = obj(value, where);
  return { threshold: num(o, "threshold", where), fraction: num(o, "fraction", where) };
}

function readMode(value: unknown, name: ModeName): Mode {
  const where = `Engine.modes.${name}`;
  const o = obj(value, where);
  try {
    return validateMode({
      name,
      tradeSize: num(o, "tradeSize", where),
      takeProfit: arr(field(o, "takeProfit"), `${where}.takeProfit`).map((l, i) => readLevel(l, `${where}.takeProfit[${i}]`)),
      stopLossPct: num(o, "stopLossPct", where),
      trailingStopPct: num(o, "trailingStopPct", where),
      mempoolIntervalMs: num(o, "mempoolIntervalMs", where),
      maxPositions: num(o, "maxPositions", where),
      maxSlippageBps: num(o, "maxSlippageBps", where),
    });
  } catch (err) {
    if (err instanceof PersistenceError) throw err;
    throw new PersistenceError(`Invalid state: ${where} fails validation`, err);
  }
}

export function readEngineSection(value: unknown): EngineSnapshot {
  const o = obj(value, "Engine");
  const activeMode = str(o, "activeMode", "Engine");
  if (!isModeName(activeMode)) fail("Engine.activeMode", "is not a mode");
  const modes = obj(field(o, "modes"), "Engine.modes");
  const rejected = arr(field(o, "rejected") ?? [], "Engine.rejected").map((r, i) => {
    if (typeof r !== "string") fail(`Engine.rejected[${i}]`, "is not a string");
    return r;
  });
  const nextPositionNum = num(o, "nextPositionNum", "Engine");
  if (!Number.isInteger(nextPositionNum) || nextPositionNum < 1) fail("Engine.nextPositionNum", "must be a positive integer");
  return {
    state: oneOf(o, "state", ENGINE_STATES, "Engine"),
    activeMode,
    modes: {
      NORMAL: readMode(field(modes, "NORMAL"), "NORMAL"),
      TURBO: readMode(field(modes, "TURBO"), "TURBO"),
    },
    nextPositionNum,
    rejected,
  };
}

function readFill(value: unknown, where: string): Fill {
  const o = obj(value, where);
  const fill: Fill = {
    time: num(o, "time", where),
    side: oneOf(o, "side", ["buy", "sell"] as const, where),
    amountIn: rawAmount(o, "amountIn", where),
    amountOut: rawAmount(o, "amountOut", where),
    price: num(o, "price", where),
    routeId: str(o, "routeId", where),
    txHash: hash(o, "txHash", where),
  };
  if (field(o, "level") !== undefined) fill.level = num(o, "level", where);
  const reason = oneOfOrNull(o, "reason", CLOSE_REASONS, where);
  if (reason) fill.reason = reason;
  return fill;
}

function readLog(value: unknown, where: string): Position["log"][number] {
  const o = obj(value, where);
  return {
    time: num(o, "time", where),
    message: str(o, "message", where),
    type: oneOf(o, "type", ["info", "sell", "error"] as const, where),
  };
}

function readPendingSell(value: unknown, where: string): PendingSell | null {
  if (value === null || value === undefined) return null;
  const o = obj(value, where);
  const level = numOrNull(o, "level", where);
  const reason = oneOfOrNull(o, "reason", CLOSE_REASONS, where);
  if ((level === null) === (reason === null)) fail(where, "needs exactly one of level and reason");
  return {
    txHash: hash(o, "txHash", where),
    routeId: str(o, "routeId", where),
    amountIn: rawAmount(o, "amountIn", where),
    quotedOut: rawAmount(o, "quotedOut", where),
    level,
    reason,
  };
}

export function readPosition(value: unknown, where: string): Position {
  const o = obj(value, where);
  const takeProfit = arr(field(o, "takeProfit"), `${where}.takeProfit`).map((l, i) => readLevel(l, `${where}.takeProfit[${i}]`));
  const triggered = arr(field(o, "triggered"), `${where}.triggered`).map((t, i) => {
    if (typeof t !== "boolean") fail(`${where}.triggered[${i}]`, "is not a boolean");
    return t;
  });
  if (triggered.length !== takeProfit.length) fail(`${where}.triggered`, "does not match its take-profit levels");
  const modeName = str(o, "modeName", where);
  if (!isModeName(modeName)) fail(`${where}.modeName`, "is not a mode");

  return {
    id: str(o, "id", where),
    token: addr(o, "token", where),
    symbol: str(o, "symbol", where),
    decimals: num(o, "decimals", where),
    tokenClass: oneOf(o, "tokenClass", CLASSES, where),
    modeName,
    entryPrice: num(o, "entryPrice", where),
    entrySize: num(o, "entrySize", where),
    entryAmount: rawAmount(o, "entryAmount", where),
    remainingAmount: rawAmount(o, "remainingAmount", where),
    openedAt: num(o, "openedAt", where),
    takeProfit,
    trailingStopPct: num(o, "trailingStopPct", where),
    triggered,
    stopPrice: num(o, "stopPrice", where),
    highWaterMarkPrice: num(o, "highWaterMarkPrice", where),
    lastPrice: num(o, "lastPrice", where),
    status: oneOf(o, "status", STATUSES, where),
    closeReason: oneOfOrNull(o, "closeReason", CLOSE_REASONS, where),
    closedAt: numOrNull(o, "closedAt", where),
    proceeds: num(o, "proceeds", where),
    routeId: str(o, "routeId", where),
    fills: arr(field(o, "fills"), `${where}.fills`).map((f, i) => readFill(f, `${where}.fills[${i}]`)),
    pendingClose: oneOfOrNull(o, "pendingClose", CLOSE_REASONS, where),
    pendingSell: readPendingSell(field(o, "pendingSell"), `${where}.pendingSell`),
    log: arr(field(o, "log") ?? [], `${where}.log`).map((l, i) => readLog(l, `${where}.log[${i}]`)),
  };
}

export function readPositionsSection(value: unknown): PositionsSnapshot {
  const o = obj(value, "Positions");
  return {
    open: arr(field(o, "open"), "Positions.open").map((p, i) => readPosition(p, `Positions.open[${i}]`)),
    closed: arr(field(o, "closed"), "Positions.closed").map((p, i) => readPosition(p, `Positions.closed[${i}]`)),
  };
}

function readClosedTrade(value: unknown, where: string): ClosedTrade {
  const o = obj(value, where);
  return {
    positionId: str(o, "positionId", where),
    token: str(o, "token", where),
    entrySize: num(o, "entrySize", where),
    proceeds: num(o, "proceeds", where),
    pnl: num(o, "pnl", where),
    reason: oneOf(o, "reason", CLOSE_REASONS, where),
    closedAt: num(o, "closedAt", where),
  };
}

export function readRiskSection(value: unknown): RiskSnapshot {
  const o = obj(value, "Risk");
  const t = obj(field(o, "totals"), "Risk.totals");
  const w = "Risk.totals";
  return {
    history: arr(field(o, "history"), "Risk.history").map((h, i) => readClosedTrade(h, `Risk.history[${i}]`)),
    entryTimes: arr(field(o, "entryTimes"), "Risk.entryTimes").map((e, i) => {
      if (typeof e !== "number") fail(`Risk.entryTimes[${i}]`, "is not a number");
      return e;
    }),
    lossStreak: num(o, "lossStreak", "Risk"),
    cooldownUntil: num(o, "cooldownUntil", "Risk"),
    cooldownReason: oneOfOrNull(o, "cooldownReason", DENY_REASONS, "Risk"),
    totals: {
      trades: num(t, "trades", w),
      wins: num(t, "wins", w),
      losses: num(t, "losses", w),
      realizedPnl: num(t, "realizedPnl", w),
      grossProfit: num(t, "grossProfit", w),
      grossLoss: num(t, "grossLoss", w),
      peakPnl: num(t, "peakPnl", w),
      maxDrawdown: num(t, "maxDrawdown", w),
    },
  };
}
