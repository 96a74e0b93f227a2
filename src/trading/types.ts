import type { Address, Hash } from "viem";

export type ModeName = "NORMAL" | "TURBO";

export interface TakeProfitLevel {
  threshold: number; // gain over entry price, 0.25 = +25%
  fraction: number;  // share of the remaining amount to sell
}

/** Immutable parameter bundle. Replaced as a whole, never mutated. */
export interface Mode {
  readonly name: ModeName;
  readonly tradeSize: number;        // native units per entry
  readonly takeProfit: readonly TakeProfitLevel[];
  readonly stopLossPct: number;      // initial stop below entry, 0.12 = 12%
  readonly trailingStopPct: number;  // distance below high-water mark
  readonly mempoolIntervalMs: number;
  readonly maxPositions: number;
  readonly maxSlippageBps: number;
}

export type TokenClass = "memecoin" | "altcoin";

export interface TokenClassPolicy {
  sizeMultiplier: number;
  maxInvestment: number;      // native units cap per position
  maxAgeMs: number;           // position age before the timeout check applies
  timeoutMinProfitPct: number; // close on timeout when unrealized gain is below this
}

export type CandidateSource = "pool" | "mempool" | "manual";

export interface Candidate {
  token: Address;
  pool: Address | null;
  routeId: string;
  liquidity: number; // base token held by the pool, native units
  source: CandidateSource;
  discoveredAt: number;
  txHash?: Hash;
}

export interface Token {
  address: Address;
  symbol: string;
  name: string;
  decimals: number;
  pool: Address | null;
  routeId: string;
  discoveredAt: number;
  liquidity: number;
  holders: number | null;
  buyTaxPct: number | null;
  sellTaxPct: number | null;
  topHolderPct: number | null;
  verified: boolean | null;
  securityScore: number;
}

export type PositionStatus = "OPEN" | "PARTIAL" | "CLOSED";

export type CloseReason = "TAKE_PROFIT_FULL" | "STOP_LOSS" | "TIMEOUT" | "EMERGENCY" | "MANUAL";

export interface Fill {
  time: number;
  side: "buy" | "sell";
  amountIn: string;  // raw integer string
  amountOut: string; // raw integer string
  price: number;
  routeId: string;
  txHash: Hash;
  level?: number;    // take-profit level index
  reason?: CloseReason;
}

/** A sell that was broadcast but not yet seen in a block. */
export interface PendingSell {
  txHash: Hash;
  routeId: string;
  amountIn: string;  // raw integer string
  quotedOut: string; // raw integer string
  level: number | null;       // take-profit level it was selling
  reason: CloseReason | null; // or the full exit it was making
}

export interface Position {
  id: string;
  token: Address;
  symbol: string;
  decimals: number;
  tokenClass: TokenClass;
  modeName: ModeName;
  entryPrice: number;
  entrySize: number;       // native units spent
  entryAmount: string;     // raw token amount bought
  remainingAmount: string; // raw token amount still held
  openedAt: number;
  takeProfit: TakeProfitLevel[];
  trailingStopPct: number;
  triggered: boolean[];
  stopPrice: number;
  highWaterMarkPrice: number;
  lastPrice: number;
  status: PositionStatus;
  closeReason: CloseReason | null;
  closedAt: number | null;
  proceeds: number;        // native units realized so far
  routeId: string;
  fills: Fill[];
  pendingClose: CloseReason | null;
  pendingSell: PendingSell | null;
  log: Array<{ time: number; message: string; type: "info" | "sell" | "error" }>;
}

export type EngineState = "IDLE" | "RUNNING" | "PAUSED" | "STOPPED";

export type ModeSwitchPolicy = "fixed-at-entry" | "adopt-new";
