import type { Address, Hash } from "viem";
import type { RouteAttempt } from "../errors.js";

export type DexProtocol = "v2" | "v3";

export interface DexRoute {
  id: string;
  protocol: DexProtocol;
  router: Address;
  factory: Address;
  quoter?: Address;   // v3 only
  feeTiers: readonly number[]; // v3 only
  priority: number;   // lower tries first
}

export type Side = "buy" | "sell";

export interface RouteQuote {
  routeId: string;
  side: Side;
  amountIn: bigint;
  amountOut: bigint;
  priceImpactBps: number;
  fee?: number;        // v3 fee tier the quote came from
}

export interface SwapRequest {
  token: Address;
  quote: RouteQuote;
  minAmountOut: bigint;
  signal?: AbortSignal;
}

export interface SwapReceipt {
  txHash: Hash;
  amountOut: bigint;
  gasCostEth: number;
}

/** A swap that reached the mempool but has no receipt yet. */
export interface PendingSwap {
  routeId: string;
  txHash: Hash;
  token: Address;
  side: Side;
  amountIn: bigint;
  quotedOut: bigint;
}

/**
 * One router/factory pair. Quotes never broadcast. `execute` throws
 * ExecutionAbortedError when the signal fires before broadcast and
 * ExecutionPendingError when a broadcast cannot be confirmed; `confirm`
 * waits for such a broadcast again.
 */
export interface DexRouteClient {
  readonly route: DexRoute;
  quote(token: Address, side: Side, amountIn: bigint): Promise<RouteQuote>;
  execute(req: SwapRequest): Promise<SwapReceipt>;
  confirm(swap: PendingSwap): Promise<SwapReceipt>;
}

export interface ExecuteParams {
  token: Address;
  side: Side;
  amountIn: bigint;
  maxSlippageBps: number;
  maxGasPriceGwei: number;
  signal?: AbortSignal;
}

export interface ExecutionResult {
  routeId: string;
  side: Side;
  amountIn: bigint;
  amountOut: bigint;
  txHash: Hash;
  gasCostEth: number;
  attempts: RouteAttempt[];
}
