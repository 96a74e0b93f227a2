import {
  encodeFunctionData,
  erc20Abi,
  maxUint256,
  parseEventLogs,
  type Address,
  type Hash,
  type Hex,
} from "viem";
import type { ChainClient } from "../config.js";
import {
  AppError,
  ExecutionAbortedError,
  ExecutionPendingError,
  ExecutionRevertedError,
  QuoteUnavailableError,
  classifyRpcError,
  errorMessage,
} from "../errors.js";
import { baseScanTxUrl, fromWei } from "../utils.js";
import type { PreparedTx, ViemWallet } from "../wallet.js";
import { v2FactoryAbi, v2PairAbi, v2RouterAbi, v3QuoterAbi, v3RouterAbi } from "./abis.js";
import type {
  DexRoute,
  DexRouteClient,
  PendingSwap,
  RouteQuote,
  Side,
  SwapReceipt,
  SwapRequest,
} from "./types.js";

const DEADLINE_SECONDS = 300;
const PROBE_DIVISOR = 100n;

export interface RouteClientDeps {
  client: ChainClient;
  wallet: ViemWallet;
  baseToken: Address;
  receiptTimeoutMs: number;
}

// ─── Pure helpers ───

/**
 * Shortfall of the quoted output against the pool's spot rate, in bps.
 * Includes the pool fee.
 */
export function priceImpactFromReserves(
  amountIn: bigint,
  amountOut: bigint,
  reserveIn: bigint,
  reserveOut: bigint,
): number {
  if (amountIn === 0n || reserveIn === 0n) return 10_000;
  const spotOut = (amountIn * reserveOut) / reserveIn;
  if (spotOut === 0n || amountOut >= spotOut) return 0;
  return Number(((spotOut - amountOut) * 10_000n) / spotOut);
}

/** Same measure for pools without readable reserves: compare against a small probe's rate. */
export function priceImpactFromProbe(
  amountIn: bigint,
  amountOut: bigint,
  probeIn: bigint,
  probeOut: bigint,
): number {
  if (probeIn === 0n || probeOut === 0n) return 0;
  // amountOut/amountIn vs probeOut/probeIn, cross-multiplied
  const actual = amountOut * probeIn;
  const ideal = amountIn * probeOut;
  if (ideal === 0n || actual >= ideal) return 0;
  return Number(((ideal - actual) * 10_000n) / ideal);
}

export function minAmountOut(amountOut: bigint, slippageBps: number): bigint {
  return (amountOut * BigInt(10_000 - slippageBps)) / 10_000n;
}

function deadline(): bigint {
  return BigInt(Math.floor(Date.now() / 1000) + DEADLINE_SECONDS);
}

function sameAddress(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

function asQuoteError(err: unknown, routeId: string, context: string): AppError {
  if (err instanceof AppError) return err;
  return new QuoteUnavailableError(`${context}: ${errorMessage(err)}`, routeId, err);
}

// ─── Broadcast + confirm ───

/**
 * Approve `spender` for max if the current allowance is short. Waits for
 * the approval to land before returning.
 */
export async function ensureApproval(
  deps: RouteClientDeps,
  token: Address,
  spender: Address,
  amount: bigint,
): Promise<void> {
  const allowance = await deps.client.readContract({
    address: token,
    abi: erc20Abi,
    functionName: "allowance",
    args: [deps.wallet.address, spender],
  });
  if (allowance >= amount) return;

  console.log(`[swap] Approving ${spender.slice(0, 10)}... for ${token.slice(0, 10)}...`);
  const tx: PreparedTx = {
    to: token,
    data: encodeFunctionData({ abi: erc20Abi, functionName: "approve", args: [spender, maxUint256] }),
    value: 0n,
  };
  const hash = await deps.wallet.send(tx, await deps.wallet.estimateGas(tx));
  const receipt = await deps.client.waitForTransactionReceipt({ hash, timeout: deps.receiptTimeoutMs });
  if (receipt.status === "reverted") throw new ExecutionRevertedError(`Approve reverted: ${hash}`, hash);
  console.log(`[swap] Approved in block ${receipt.blockNumber}`);
}

/** Where the swap's own Transfer log pays out. */
interface Settlement {
  routeId: string;
  outToken: Address;
  recipient: Address;
  quoted: bigint;
}

async function submitSwap(
  deps: RouteClientDeps,
  tx: PreparedTx,
  settlement: Settlement,
  signal?: AbortSignal,
): Promise<SwapReceipt> {
  const gas = await deps.wallet.estimateGas(tx);

  // Last point at which the request can still be withdrawn.
  if (signal?.aborted) throw new ExecutionAbortedError();

  const hash = await deps.wallet.send(tx, gas);
  console.log(`[swap:${settlement.routeId}] TX ${baseScanTxUrl(hash)}`);
  return settleSwap(deps, hash, settlement);
}

/**
 * Wait for a broadcast swap and read what it paid out. A missing receipt
 * is ExecutionPendingError: the swap may still land.
 */
async function settleSwap(deps: RouteClientDeps, hash: Hash, settlement: Settlement): Promise<SwapReceipt> {
  const { routeId, outToken, recipient, quoted } = settlement;
  const receipt = await deps.client
    .waitForTransactionReceipt({ hash, timeout: deps.receiptTimeoutMs })
    .catch((err: unknown) => {
      throw new ExecutionPendingError(hash, err);
    });
  if (receipt.status === "reverted") throw new ExecutionRevertedError(`Swap reverted: ${hash}`, hash);

  const gasCostEth = fromWei(receipt.gasUsed * receipt.effectiveGasPrice);

  // Actual received amount from Transfer events; fee-on-transfer tokens deliver less than quoted.
  let amountOut = quoted;
  const transfers = parseEventLogs({ abi: erc20Abi, eventName: "Transfer", logs: receipt.logs });
  for (const log of transfers) {
    if (sameAddress(log.address, outToken) && sameAddress(log.args.to, recipient)) {
      amountOut = log.args.value;
      break;
    }
  }
  if (amountOut !== quoted) {
    console.log(`[swap:${routeId}] Actual received: ${amountOut} (quoted: ${quoted})`);
  }
  console.log(`[swap:${routeId}] Confirmed in block ${receipt.blockNumber} (gas: ${gasCostEth.toFixed(6)} ETH)`);

  return { txHash: hash, amountOut, gasCostEth };
}

// ─── Constant-product routers ───

export class V2RouteClient implements DexRouteClient {
  constructor(
    readonly route: DexRoute,
    private readonly deps: RouteClientDeps,
  ) {}

  private path(token: Address, side: Side): [Address, Address] {
    return side === "buy" ? [this.deps.baseToken, token] : [token, this.deps.baseToken];
  }

  async quote(token: Address, side: Side, amountIn: bigint): Promise<RouteQuote> {
    const path = this.path(token, side);
    try {
      const { client } = this.deps;
      const amounts = await client.readContract({
        address: this.route.router,
        abi: v2RouterAbi,
        functionName: "getAmountsOut",
        args: [amountIn, path],
      });
      const amountOut = amounts[amounts.length - 1];
      if (amountOut === undefined || amountOut === 0n) {
        throw new QuoteUnavailableError(`${this.route.id}: zero output`, this.route.id);
      }

      const pair = await client.readContract({
        address: this.route.factory,
        abi: v2FactoryAbi,
        functionName: "getPair",
        args: path,
      });
      const [[reserve0, reserve1], token0] = await Promise.all([
        client.readContract({ address: pair, abi: v2PairAbi, functionName: "getReserves" }),
        client.readContract({ address: pair, abi: v2PairAbi, functionName: "token0" }),
      ]);
      const [reserveIn, reserveOut] = sameAddress(token0, path[0]) ? [reserve0, reserve1] : [reserve1, reserve0];

      return {
        routeId: this.route.id,
        side,
        amountIn,
        amountOut,
        priceImpactBps: priceImpactFromReserves(amountIn, amountOut, reserveIn, reserveOut),
      };
    } catch (err) {
      throw asQuoteError(err, this.route.id, `${this.route.id} quote`);
    }
  }

  /** The pair pays wrapped native to the router on a sell, which unwraps it to us. */
  private settlement(token: Address, side: Side, quoted: bigint): Settlement {
    return {
      routeId: this.route.id,
      outToken: side === "buy" ? token : this.deps.baseToken,
      recipient: side === "buy" ? this.deps.wallet.address : this.route.router,
      quoted,
    };
  }

  async execute(req: SwapRequest): Promise<SwapReceipt> {
    const { quote, token } = req;
    const me = this.deps.wallet.address;
    const settlement = this.settlement(token, quote.side, quote.amountOut);
    try {
      if (quote.side === "buy") {
        const data: Hex = encodeFunctionData({
          abi: v2RouterAbi,
          functionName: "swapExactETHForTokensSupportingFeeOnTransferTokens",
          args: [req.minAmountOut, this.path(token, "buy"), me, deadline()],
        });
        return await submitSwap(this.deps, { to: this.route.router, data, value: quote.amountIn }, settlement, req.signal);
      }

      await ensureApproval(this.deps, token, this.route.router, quote.amountIn);
      const data: Hex = encodeFunctionData({
        abi: v2RouterAbi,
        functionName: "swapExactTokensForETHSupportingFeeOnTransferTokens",
        args: [quote.amountIn, req.minAmountOut, this.path(token, "sell"), me, deadline()],
      });
      return await submitSwap(this.deps, { to: this.route.router, data, value: 0n }, settlement, req.signal);
    } catch (err) {
      throw classifyRpcError(err, `${this.route.id} execute`);
    }
  }

  async confirm(swap: PendingSwap): Promise<SwapReceipt> {
    try {
      return await settleSwap(this.deps, swap.txHash, this.settlement(swap.token, swap.side, swap.quotedOut));
    } catch (err) {
      throw classifyRpcError(err, `${this.route.id} confirm`);
    }
  }
}

// ─── Concentrated-liquidity routers ───

export class V3RouteClient implements DexRouteClient {
  constructor(
    readonly route: DexRoute,
    private readonly deps: RouteClientDeps,
  ) {}

  private async quoteTier(tokenIn: Address, tokenOut: Address, amountIn: bigint, fee: number): Promise<bigint> {
    const quoter = this.route.quoter;
    if (!quoter) throw new QuoteUnavailableError(`${this.route.id}: no quoter configured`, this.route.id);
    const { result } = await this.deps.client.simulateContract({
      address: quoter,
      abi: v3QuoterAbi,
      functionName: "quoteExactInputSingle",
      args: [{ tokenIn, tokenOut, amountIn, fee, sqrtPriceLimitX96: 0n }],
    });
    return result[0];
  }

  async quote(token: Address, side: Side, amountIn: bigint): Promise<RouteQuote> {
    const [tokenIn, tokenOut] = side === "buy" ? [this.deps.baseToken, token] : [token, this.deps.baseToken];

    const tiers = await Promise.allSettled(
      this.route.feeTiers.map(async (fee) => ({ fee, amountOut: await this.quoteTier(tokenIn, tokenOut, amountIn, fee) })),
    );
    let best: { fee: number; amountOut: bigint } | null = null;
    for (const tier of tiers) {
      if (tier.status === "fulfilled" && tier.value.amountOut > 0n && (!best || tier.value.amountOut > best.amountOut)) {
        best = tier.value;
      }
    }
    if (!best) throw new QuoteUnavailableError(`${this.route.id}: no fee tier can price ${token}`, this.route.id);

    let priceImpactBps = 0;
    const probeIn = amountIn / PROBE_DIVISOR;
    if (probeIn > 0n) {
      try {
        const probeOut = await this.quoteTier(tokenIn, tokenOut, probeIn, best.fee);
        priceImpactBps = priceImpactFromProbe(amountIn, best.amountOut, probeIn, probeOut);
      } catch (err) {
        throw asQuoteError(err, this.route.id, `${this.route.id} probe`);
      }
    }

    return { routeId: this.route.id, side, amountIn, amountOut: best.amountOut, priceImpactBps, fee: best.fee };
  }

  async execute(req: SwapRequest): Promise<SwapReceipt> {
    const { quote, token } = req;
    const me = this.deps.wallet.address;
    const fee = quote.fee;
    if (fee === undefined) throw new QuoteUnavailableError(`${this.route.id}: quote has no fee tier`, this.route.id);

    try {
      const buy = quote.side === "buy";
      if (!buy) await ensureApproval(this.deps, token, this.route.router, quote.amountIn);
      const tokenIn = buy ? this.deps.baseToken : token;
      const tokenOut = buy ? token : this.deps.baseToken;
      const data: Hex = encodeFunctionData({
        abi: v3RouterAbi,
        functionName: "exactInputSingle",
        args: [{
          tokenIn,
          tokenOut,
          fee,
          recipient: me,
          amountIn: quote.amountIn,
          amountOutMinimum: req.minAmountOut,
          sqrtPriceLimitX96: 0n,
        }],
      });
      return await submitSwap(
        this.deps,
        { to: this.route.router, data, value: buy ? quote.amountIn : 0n },
        this.settlement(token, quote.side, quote.amountOut),
        req.signal,
      );
    } catch (err) {
      throw classifyRpcError(err, `${this.route.id} execute`);
    }
  }

  async confirm(swap: PendingSwap): Promise<SwapReceipt> {
    try {
      return await settleSwap(this.deps, swap.txHash, this.settlement(swap.token, swap.side, swap.quotedOut));
    } catch (err) {
      throw classifyRpcError(err, `${this.route.id} confirm`);
    }
  }

  // Sells settle in wrapped native.
  private settlement(token: Address, side: Side, quoted: bigint): Settlement {
    return {
      routeId: this.route.id,
      outToken: side === "buy" ? token : this.deps.baseToken,
      recipient: this.deps.wallet.address,
      quoted,
    };
  }
}

export function createRouteClient(route: DexRoute, deps: RouteClientDeps): DexRouteClient {
  return route.protocol === "v2" ? new V2RouteClient(route, deps) : new V3RouteClient(route, deps);
}
