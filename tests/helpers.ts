import type { Address, Hash } from "viem";
import { loadConfig, type AppConfig } from "../src/config.js";
import { DexAggregator } from "../src/dex/aggregator.js";
import type {
  DexRoute,
  DexRouteClient,
  PendingSwap,
  RouteQuote,
  Side,
  SwapReceipt,
  SwapRequest,
} from "../src/dex/types.js";
import { ExecutionAbortedError, QuoteUnavailableError } from "../src/errors.js";
import { MemoryAlertSink } from "../src/notify.js";
import type { StateFile } from "../src/persistence.js";
import { SecurityScreener } from "../src/security-screener.js";
import type { TokenIntel, TokenIntelSource } from "../src/token-intel.js";
import { StrategyEngine } from "../src/trading/engine.js";
import { RiskManager } from "../src/trading/risk-manager.js";
import type { Candidate } from "../src/trading/types.js";
import { toWei } from "../src/utils.js";
import type { WalletBalances, WalletService } from "../src/wallet.js";

export const T0 = 1_700_000_000_000;
export const HOUR = 3_600_000;

export const TOKEN_A: Address = "0x1111111111111111111111111111111111111111";
export const TOKEN_B: Address = "0x2222222222222222222222222222222222222222";
export const TOKEN_C: Address = "0x3333333333333333333333333333333333333333";
export const TOKEN_D: Address = "0x4444444444444444444444444444444444444444";
export const POOL: Address = "0x5555555555555555555555555555555555555555";
export const WALLET: Address = "0x9999999999999999999999999999999999999999";

const ONE = 10n ** 18n;

export function txHash(n: number): Hash {
  return `0x${n.toString(16).padStart(64, "0")}`;
}

export class FakeClock {
  t = T0;
  now = (): number => this.t;
  advance(ms: number): void {
    this.t += ms;
  }
}

export interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
}

export function deferred(): Deferred {
  let resolve = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

// ─── Market & routes ───

/** Native units per whole token (18 decimals), per token. */
export class FakeMarket {
  prices = new Map<string, number>();

  set(token: Address, price: number): void {
    this.prices.set(token.toLowerCase(), price);
  }

  get(token: Address): number | undefined {
    return this.prices.get(token.toLowerCase());
  }
}

export function route(id: string, priority: number): DexRoute {
  return {
    id,
    protocol: "v2",
    router: "0x00000000000000000000000000000000000000a1",
    factory: "0x00000000000000000000000000000000000000f1",
    feeTiers: [],
    priority,
  };
}

export class FakeRouteClient implements DexRouteClient {
  readonly route: DexRoute;
  quoteError: Error | null = null;
  executeError: Error | null = null;
  blockSells = false;
  impactBps = 0;
  quoteCalls = 0;
  executed: SwapRequest[] = [];
  /** Called as each swap goes out, before any hold. */
  onExecute: ((req: SwapRequest) => void) | null = null;
  /** When set, execute waits here (after `entered` resolves) before checking the signal. */
  hold: { entered: Deferred; release: Deferred } | null = null;
  /** The swap is already broadcast when it reaches the hold, so an abort comes too late. */
  broadcastBeforeHold = false;
  /** One entry per `confirm` call: an error to throw, or null to confirm. Confirms once empty. */
  confirmResults: Array<Error | null> = [];
  confirmed: PendingSwap[] = [];
  private nextTx = 1;

  constructor(
    id: string,
    priority: number,
    private readonly market: FakeMarket,
  ) {
    this.route = route(id, priority);
  }

  async quote(token: Address, side: Side, amountIn: bigint): Promise<RouteQuote> {
    this.quoteCalls++;
    if (this.quoteError) throw this.quoteError;
    const price = this.market.get(token);
    if (price === undefined) throw new QuoteUnavailableError(`no pool for ${token}`, this.route.id);
    if (side === "sell" && this.blockSells) throw new QuoteUnavailableError("transfer reverted", this.route.id);
    const p = toWei(price);
    const amountOut = side === "buy" ? (amountIn * ONE) / p : (amountIn * p) / ONE;
    return { routeId: this.route.id, side, amountIn, amountOut, priceImpactBps: this.impactBps };
  }

  async execute(req: SwapRequest): Promise<SwapReceipt> {
    this.executed.push(req);
    this.onExecute?.(req);
    if (this.broadcastBeforeHold && req.signal?.aborted) throw new ExecutionAbortedError();
    if (this.hold) {
      this.hold.entered.resolve();
      await this.hold.release.promise;
    }
    if (!this.broadcastBeforeHold && req.signal?.aborted) throw new ExecutionAbortedError();
    if (this.executeError) throw this.executeError;
    return { txHash: txHash(this.nextTx++), amountOut: req.quote.amountOut, gasCostEth: 0 };
  }

  async confirm(swap: PendingSwap): Promise<SwapReceipt> {
    this.confirmed.push(swap);
    const next = this.confirmResults.shift();
    if (next) throw next;
    return { txHash: swap.txHash, amountOut: swap.quotedOut, gasCostEth: 0 };
  }
}

export function makeAggregator(clients: DexRouteClient[]): DexAggregator {
  return new DexAggregator(clients, { quoteTimeoutMs: 1_000, getGasPriceGwei: async () => 1 });
}

// ─── Token intel ───

export function goodIntel(token: Address, now: number, overrides: Partial<TokenIntel> = {}): TokenIntel {
  return {
    address: token,
    name: "Doge Moon",
    symbol: "DMOON",
    decimals: 18,
    totalSupply: 1_000_000_000n * ONE,
    holderCount: 60,
    buyTaxPct: 0.02,
    sellTaxPct: 0.02,
    topHolderPct: 0.1,
    verified: true,
    createdAt: now - 2 * HOUR,
    ownerRenounced: true,
    canMint: false,
    canBlacklist: false,
    canPause: false,
    liquidityLocked: true,
    isHoneypot: false,
    ...overrides,
  };
}

export class FakeIntel implements TokenIntelSource {
  overrides = new Map<string, Partial<TokenIntel>>();
  failing = new Set<string>();
  calls = 0;

  constructor(private readonly clock: FakeClock) {}

  async getIntel(token: Address): Promise<TokenIntel> {
    this.calls++;
    if (this.failing.has(token.toLowerCase())) throw new Error("intel backend down");
    return goodIntel(token, this.clock.now(), this.overrides.get(token.toLowerCase()));
  }
}

// ─── Wallet ───

export class FakeWallet implements WalletService {
  readonly address = WALLET;
  balances: WalletBalances = { native: 1, wrapped: 0 };

  async getBalances(): Promise<WalletBalances> {
    return { ...this.balances };
  }
}

// ─── Engine harness ───

export function candidate(token: Address, clock: FakeClock, liquidity = 0.1): Candidate {
  return { token, pool: POOL, routeId: "route-a", liquidity, source: "pool", discoveredAt: clock.now() };
}

export function testConfig(env: Record<string, string> = {}): AppConfig {
  return loadConfig({ EXIT_POLL_INTERVAL_MS: "600000", ...env });
}

export function makeHarness(options: { env?: Record<string, string>; routes?: number; stateFile?: StateFile } = {}) {
  const clock = new FakeClock();
  const config = testConfig(options.env);
  const market = new FakeMarket();
  const clients = Array.from({ length: options.routes ?? 1 }, (_, i) =>
    new FakeRouteClient(`route-${String.fromCharCode(97 + i)}`, i + 1, market),
  );
  const aggregator = makeAggregator(clients);
  const intel = new FakeIntel(clock);
  const screener = new SecurityScreener(intel, aggregator, config.screener, clock.now);
  let screened = 0;
  const risk = new RiskManager(config.risk, clock.now);
  const alerts = new MemoryAlertSink();
  const wallet = new FakeWallet();
  const engine = new StrategyEngine({
    config,
    aggregator,
    screener: {
      evaluate: (c) => {
        screened++;
        return screener.evaluate(c);
      },
    },
    risk,
    wallet,
    alerts,
    stateFile: options.stateFile,
    now: clock.now,
  });

  return {
    clock,
    config,
    market,
    clients,
    aggregator,
    intel,
    screener,
    risk,
    alerts,
    wallet,
    engine,
    screenCount: () => screened,
  };
}
