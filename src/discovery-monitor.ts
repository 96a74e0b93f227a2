import { decodeFunctionData, type Address, type Hex } from "viem";
import type { ChainDataProvider, PendingTx } from "./chain.js";
import type { DiscoveryConfig } from "./config.js";
import { v2RouterAbi } from "./dex/abis.js";
import type { DexRoute } from "./dex/types.js";
import { AppError, classifyRpcError, errorMessage, isFatal } from "./errors.js";
import type { Candidate, CandidateSource } from "./trading/types.js";
import { backoffDelay, fromWei, shortAddr, startPolling, type PollHandle } from "./utils.js";

const MAX_PROCESSED_TXS = 5_000;
const PROCESSED_TX_RETENTION_MS = 10 * 60_000;

// ─── Seen set ───

/** Insertion-ordered keys with an age limit and a size cap (oldest evicted first). */
export class SeenSet {
  private entries = new Map<string, number>();

  constructor(
    private readonly retentionMs: number,
    private readonly max: number,
  ) {}

  get size(): number {
    return this.entries.size;
  }

  has(key: string, now: number): boolean {
    const at = this.entries.get(key.toLowerCase());
    return at !== undefined && now - at < this.retentionMs;
  }

  add(key: string, now: number): void {
    const k = key.toLowerCase();
    this.entries.delete(k);
    this.entries.set(k, now);
    this.prune(now);
  }

  prune(now: number): void {
    for (const [key, at] of this.entries) {
      if (now - at < this.retentionMs && this.entries.size <= this.max) break;
      this.entries.delete(key);
    }
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }
}

// ─── Mempool decoding ───

export type PendingSignal =
  | { kind: "add-liquidity"; routeId: string; token: Address; value: bigint }
  | { kind: "buy"; routeId: string; token: Address; value: bigint };

function decodeRouterCall(input: Hex) {
  try {
    return decodeFunctionData({ abi: v2RouterAbi, data: input });
  } catch {
    return null; // not a router call we know
  }
}

/**
 * Recognise pending router calls worth reacting to: a new token getting
 * native liquidity, or a native-for-token buy. Everything else is null.
 */
export function decodePendingSwap(tx: PendingTx, routes: readonly DexRoute[], baseToken: Address): PendingSignal | null {
  if (!tx.to) return null;
  const to = tx.to.toLowerCase();
  const route = routes.find((r) => r.protocol === "v2" && r.router.toLowerCase() === to);
  if (!route) return null;

  const call = decodeRouterCall(tx.input);
  if (!call) return null;

  switch (call.functionName) {
    case "addLiquidityETH":
      return { kind: "add-liquidity", routeId: route.id, token: call.args[0], value: tx.value };
    case "swapExactETHForTokens":
    case "swapExactETHForTokensSupportingFeeOnTransferTokens": {
      const path = call.args[1];
      if (path.length < 2 || path[0].toLowerCase() !== baseToken.toLowerCase()) return null;
      return { kind: "buy", routeId: route.id, token: path[path.length - 1], value: tx.value };
    }
    default:
      return null;
  }
}

// ─── Monitor ───

export interface DiscoveryDeps {
  chain: ChainDataProvider;
  routes: readonly DexRoute[];
  baseToken: Address;
  config: DiscoveryConfig;
  mempoolIntervalMs: () => number;
  onCandidate: (candidate: Candidate) => Promise<void>;
  onFatal: (err: AppError) => void;
  isTracked?: (token: Address) => boolean;
  now?: () => number;
}

type LoopName = "pools" | "mempool";

/**
 * Two pollers: pool-creation logs on a fixed interval, and the pending block
 * on the active mode's mempool interval. Transient RPC errors back off per
 * loop; auth or config errors stop both loops and go to `onFatal`.
 */
export class DiscoveryMonitor {
  private seen: SeenSet;
  private processedTxs = new SeenSet(PROCESSED_TX_RETENTION_MS, MAX_PROCESSED_TXS);
  private lastBlock: bigint | null = null;
  private failures: Record<LoopName, number> = { pools: 0, mempool: 0 };
  private pollers: PollHandle[] = [];
  private stopped = false;
  private emitted = 0;

  constructor(private readonly deps: DiscoveryDeps) {
    this.seen = new SeenSet(deps.config.seenRetentionMs, deps.config.maxSeen);
  }

  private now(): number {
    return this.deps.now ? this.deps.now() : Date.now();
  }

  get running(): boolean {
    return this.pollers.length > 0;
  }

  get stats() {
    return {
      lastBlock: this.lastBlock === null ? null : this.lastBlock.toString(),
      seen: this.seen.size,
      emitted: this.emitted,
      poolFailures: this.failures.pools,
      mempoolFailures: this.failures.mempool,
    };
  }

  start(): void {
    if (this.running) return;
    this.stopped = false;
    this.pollers = [
      startPolling("discovery", () => this.deps.config.intervalMs, () => this.pollPools()),
      startPolling("mempool", this.deps.mempoolIntervalMs, () => this.pollMempool()),
    ];
    console.log(`[discovery] Watching ${this.deps.routes.length} routes`);
  }

  stop(): void {
    this.stopped = true;
    for (const p of this.pollers) p.stop();
    this.pollers = [];
  }

  /** One pool-log tick. Returns a backoff delay after a transient failure. */
  async pollPools(): Promise<number | void> {
    if (this.stopped) return;
    try {
      const head = await this.deps.chain.getBlockNumber();
      const lookback = BigInt(this.deps.config.lookbackBlocks);
      const from = this.lastBlock === null ? (head > lookback ? head - lookback : 0n) : this.lastBlock + 1n;
      if (from <= head) {
        for (const route of this.deps.routes) {
          const created = await this.deps.chain.getPoolCreations(route, from, head);
          for (const pool of created) {
            if (this.seen.has(pool.token, this.now())) continue;
            const liquidity = await this.deps.chain.getPoolLiquidity(pool.pool);
            this.consider({
              token: pool.token,
              pool: pool.pool,
              routeId: route.id,
              liquidity,
              source: "pool",
              discoveredAt: this.now(),
            });
          }
        }
        this.lastBlock = head;
      }
      this.failures.pools = 0;
    } catch (err) {
      return this.handleError("pools", err);
    }
  }

  /** One pending-block tick. */
  async pollMempool(): Promise<number | void> {
    if (this.stopped) return;
    try {
      const txs = await this.deps.chain.getPendingTransactions();
      const now = this.now();
      for (const tx of txs) {
        if (this.processedTxs.has(tx.hash, now)) continue;
        this.processedTxs.add(tx.hash, now);

        const signal = decodePendingSwap(tx, this.deps.routes, this.deps.baseToken);
        if (!signal || this.seen.has(signal.token, now)) continue;

        if (signal.kind === "add-liquidity") {
          this.consider({
            token: signal.token,
            pool: null,
            routeId: signal.routeId,
            liquidity: fromWei(signal.value),
            source: "mempool",
            discoveredAt: now,
            txHash: tx.hash,
          });
          continue;
        }

        if (fromWei(signal.value) < this.deps.config.largeSwapMin) continue;
        if (this.deps.isTracked?.(signal.token)) continue;
        const route = this.deps.routes.find((r) => r.id === signal.routeId);
        if (!route) continue;
        const pool = await this.deps.chain.findPool(route, signal.token);
        if (!pool) continue;
        this.consider({
          token: signal.token,
          pool,
          routeId: route.id,
          liquidity: await this.deps.chain.getPoolLiquidity(pool),
          source: "mempool",
          discoveredAt: now,
          txHash: tx.hash,
        });
      }
      this.failures.mempool = 0;
    } catch (err) {
      return this.handleError("mempool", err);
    }
  }

  private consider(candidate: Candidate): void {
    if (candidate.liquidity < this.deps.config.minLiquidity) {
      console.log(`[discovery] ${shortAddr(candidate.token)} skipped: liquidity ${candidate.liquidity} below ${this.deps.config.minLiquidity}`);
      return;
    }
    this.seen.add(candidate.token, candidate.discoveredAt);
    this.emitted++;
    console.log(`[discovery] Candidate ${shortAddr(candidate.token)} via ${candidate.routeId} (${candidate.source}, liquidity ${candidate.liquidity})`);
    this.deps.onCandidate(candidate).catch((err: unknown) => {
      console.error(`[discovery] Candidate handler failed for ${candidate.token}:`, errorMessage(err));
    });
  }

  private handleError(loop: LoopName, err: unknown): number | void {
    const classified = classifyRpcError(err, `discovery ${loop}`);
    if (isFatal(classified)) {
      console.error(`[discovery] Fatal error, stopping: ${classified.message}`);
      this.stop();
      this.deps.onFatal(classified);
      return;
    }
    this.failures[loop]++;
    const delay = backoffDelay(this.failures[loop], this.deps.config.backoffBaseMs, this.deps.config.backoffMaxMs);
    console.error(`[discovery] ${loop} poll failed (${this.failures[loop]}x), retrying in ${delay}ms: ${classified.message}`);
    return delay;
  }

  /** Locate the deepest pool for an arbitrary token across all routes. */
  async inspect(token: Address, source: CandidateSource = "manual"): Promise<Candidate> {
    let best: Candidate | null = null;
    for (const route of this.deps.routes) {
      try {
        const pool = await this.deps.chain.findPool(route, token);
        if (!pool) continue;
        const liquidity = await this.deps.chain.getPoolLiquidity(pool);
        if (!best || liquidity > best.liquidity) {
          best = { token, pool, routeId: route.id, liquidity, source, discoveredAt: this.now() };
        }
      } catch (err) {
        console.error(`[discovery] ${route.id} lookup failed for ${token}:`, errorMessage(err));
      }
    }
    return best ?? {
      token,
      pool: null,
      routeId: this.deps.routes[0]?.id ?? "none",
      liquidity: 0,
      source,
      discoveredAt: this.now(),
    };
  }
}
