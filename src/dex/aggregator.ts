import type { Address } from "viem";
import {
  AppError,
  ExecutionAbortedError,
  ExecutionPendingError,
  ExecutionRevertedError,
  GasPriceExceededError,
  RoutesExhaustedError,
  SlippageExceededError,
  errorMessage,
  type AttemptReason,
  type RouteAttempt,
} from "../errors.js";
import { withTimeout } from "../utils.js";
import { minAmountOut } from "./route-client.js";
import type { DexRouteClient, ExecuteParams, ExecutionResult, PendingSwap, RouteQuote, Side } from "./types.js";

export interface AggregatorOptions {
  quoteTimeoutMs: number;
  getGasPriceGwei: () => Promise<number>;
}

function attemptReason(err: unknown): AttemptReason {
  if (err instanceof SlippageExceededError) return "SLIPPAGE_EXCEEDED";
  if (err instanceof GasPriceExceededError) return "GAS_PRICE_EXCEEDED";
  if (err instanceof ExecutionRevertedError) return "EXECUTION_REVERTED";
  if (err instanceof AppError && err.code === "QUOTE_UNAVAILABLE") return "QUOTE_FAILED";
  return "NETWORK";
}

/**
 * Routes ordered by priority. Quotes fan out across every route; execution
 * walks them in order and stops at the first success.
 */
export class DexAggregator {
  private readonly clients: DexRouteClient[];

  constructor(
    clients: DexRouteClient[],
    private readonly options: AggregatorOptions,
  ) {
    this.clients = [...clients].sort((a, b) => a.route.priority - b.route.priority);
  }

  get routeIds(): string[] {
    return this.clients.map((c) => c.route.id);
  }

  /** Best quote across every route that can price the pair, or null. */
  async quote(token: Address, side: Side, amountIn: bigint): Promise<RouteQuote | null> {
    const results = await Promise.allSettled(
      this.clients.map((c) =>
        withTimeout(c.quote(token, side, amountIn), this.options.quoteTimeoutMs, `${c.route.id} quote`),
      ),
    );
    let best: RouteQuote | null = null;
    for (const r of results) {
      if (r.status === "fulfilled" && r.value.amountOut > 0n && (!best || r.value.amountOut > best.amountOut)) {
        best = r.value;
      }
    }
    return best;
  }

  /**
   * Try each route in priority order until one fills. A route is skipped on
   * a failed quote, excess price impact, excess gas price, a revert or a
   * timeout. Aborts and unconfirmed broadcasts end the request immediately;
   * an unconfirmed one carries the swap to hand back to `settle`.
   */
  async executeWithFallback(params: ExecuteParams): Promise<ExecutionResult> {
    const attempts: RouteAttempt[] = [];

    for (const client of this.clients) {
      if (params.signal?.aborted) throw new ExecutionAbortedError();
      const routeId = client.route.id;
      let quote: RouteQuote | null = null;

      try {
        quote = await withTimeout(
          client.quote(params.token, params.side, params.amountIn),
          this.options.quoteTimeoutMs,
          `${routeId} quote`,
        );
        if (quote.priceImpactBps > params.maxSlippageBps) {
          throw new SlippageExceededError(quote.priceImpactBps, params.maxSlippageBps);
        }
        const gasPrice = await withTimeout(this.options.getGasPriceGwei(), this.options.quoteTimeoutMs, "gas price");
        if (gasPrice > params.maxGasPriceGwei) {
          throw new GasPriceExceededError(gasPrice, params.maxGasPriceGwei);
        }

        const receipt = await client.execute({
          token: params.token,
          quote,
          minAmountOut: minAmountOut(quote.amountOut, params.maxSlippageBps),
          signal: params.signal,
        });

        console.log(`[aggregator] ${params.side} ${params.token.slice(0, 10)}... filled via ${routeId}`);
        return {
          routeId,
          side: params.side,
          amountIn: params.amountIn,
          amountOut: receipt.amountOut,
          txHash: receipt.txHash,
          gasCostEth: receipt.gasCostEth,
          attempts,
        };
      } catch (err) {
        if (err instanceof ExecutionAbortedError) throw err;
        if (err instanceof ExecutionPendingError) {
          console.log(`[aggregator] ${params.side} via ${routeId} unconfirmed: ${err.txHash}`);
          throw new ExecutionPendingError(err.txHash, err.cause, {
            routeId,
            txHash: err.txHash,
            token: params.token,
            side: params.side,
            amountIn: params.amountIn,
            quotedOut: quote ? quote.amountOut : 0n,
          });
        }
        const attempt: RouteAttempt = { routeId, reason: attemptReason(err), message: errorMessage(err) };
        attempts.push(attempt);
        console.log(`[aggregator] ${routeId} skipped: ${attempt.reason} (${attempt.message})`);
      }
    }

    throw new RoutesExhaustedError(attempts);
  }

  /**
   * Wait once more for a swap `executeWithFallback` left unconfirmed.
   * Throws ExecutionPendingError while it is still out, and
   * ExecutionRevertedError once it is known to have failed.
   */
  async settle(swap: PendingSwap): Promise<ExecutionResult> {
    const client = this.clients.find((c) => c.route.id === swap.routeId);
    if (!client) throw new AppError(`Unknown route ${swap.routeId} for ${swap.txHash}`, "ROUTE_UNKNOWN");
    const receipt = await client.confirm(swap);
    console.log(`[aggregator] ${swap.side} ${swap.token.slice(0, 10)}... settled via ${swap.routeId}`);
    return {
      routeId: swap.routeId,
      side: swap.side,
      amountIn: swap.amountIn,
      amountOut: receipt.amountOut,
      txHash: receipt.txHash,
      gasCostEth: receipt.gasCostEth,
      attempts: [],
    };
  }
}
