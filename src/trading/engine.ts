import type { Address } from "viem";
import type { AppConfig } from "../config.js";
import type { DexAggregator } from "../dex/aggregator.js";
import type { ExecutionResult, PendingSwap } from "../dex/types.js";
import {
  AppError,
  ConfigError,
  ExecutionAbortedError,
  ExecutionPendingError,
  ExecutionRevertedError,
  InsufficientBalanceError,
  errorMessage,
} from "../errors.js";
import type { AlertSink } from "../notify.js";
import type { LoadedState, StateFile } from "../persistence.js";
import type { SecurityScreener, SecurityVerdict } from "../security-screener.js";
import { classifyToken } from "../token-class.js";
import type { TokenIntel } from "../token-intel.js";
import { fromWei, shortAddr, startPolling, toWei, unitPrice, type PollHandle } from "../utils.js";
import type { WalletBalances, WalletService } from "../wallet.js";
import { KeyedMutex, Mutex } from "./lock.js";
import { isModeName, withOverrides, type ModeOverrides } from "./modes.js";
import {
  addLog,
  adoptMode,
  applyFullClose,
  applyPartialFill,
  isActive,
  markPrice,
  openPosition,
  planExit,
  realizedPnl,
  remaining,
  unrealizedPnl,
} from "./position.js";
import type { RiskManager, RiskStats } from "./risk-manager.js";
import { readEngineSection, readPositionsSection, readRiskSection } from "./snapshot.js";
import type {
  Candidate,
  CloseReason,
  EngineState,
  Fill,
  Mode,
  ModeName,
  PendingSell,
  Position,
  TakeProfitLevel,
  TokenClass,
} from "./types.js";

// ─── Collaborators ───

export type TradeRouter = Pick<DexAggregator, "quote" | "executeWithFallback" | "settle">;
export type Screener = Pick<SecurityScreener, "evaluate">;

/** The parts of discovery the engine drives. */
export interface CandidateFeed {
  start(): void;
  stop(): void;
  inspect(token: Address): Promise<Candidate>;
}

export interface EngineDeps {
  config: AppConfig;
  aggregator: TradeRouter;
  screener: Screener;
  risk: RiskManager;
  wallet: WalletService;
  alerts: AlertSink;
  stateFile?: StateFile;
  classify?: (intel: TokenIntel) => TokenClass;
  now?: () => number;
}

export interface EngineStatus {
  state: EngineState;
  mode: Mode;
  modeSwitchPolicy: AppConfig["modeSwitchPolicy"];
  wallet: Address;
  openPositions: number;
  pendingEntries: number;
  exposure: number;
  maxExposure: number;
  riskLevel: RiskStats["riskLevel"];
  startedAt: number | null;
}

export interface EngineStats {
  risk: RiskStats;
  openPositions: number;
  closedPositions: number;
  rejectedTokens: number;
  unrealizedPnl: number;
}

/** What a sell was for: one take-profit level or a full exit. */
type SellPurpose = Pick<PendingSell, "level" | "reason">;

type Settled =
  | { kind: "filled"; result: ExecutionResult }
  | { kind: "failed"; error: unknown }
  | { kind: "unknown"; error: unknown };

export interface Analysis {
  candidate: Candidate;
  verdict: SecurityVerdict;
  tokenClass: TokenClass | null;
  price: number | null;
  held: boolean;
}

// ─── Engine ───

/**
 * Owns the position book, the active mode and the engine state. Entries come
 * from `onCandidate`; exits from the supervisor loop. Each position is
 * mutated only under its own lock; risk bookkeeping is synchronous.
 */
export class StrategyEngine {
  private state: EngineState = "IDLE";
  private restoredState: EngineState | null = null;
  private startedAt: number | null = null;

  private modes: Record<ModeName, Mode>;
  private activeModeName: ModeName;

  private open = new Map<string, Position>();
  private closed: Position[] = [];
  private pendingEntries = new Set<string>();
  private rejected = new Set<string>();
  private nextPositionNum = 1;

  private entryController = new AbortController();
  private positionLocks = new KeyedMutex();
  private controlLock = new Mutex();
  private entryGate = new Mutex();
  private exitPoller: PollHandle | null = null;
  private feed: CandidateFeed | null = null;

  private readonly classify: (intel: TokenIntel) => TokenClass;
  private readonly now: () => number;

  constructor(private readonly deps: EngineDeps) {
    this.modes = { ...deps.config.modes };
    this.activeModeName = deps.config.activeMode;
    this.classify = deps.classify ?? classifyToken;
    this.now = deps.now ?? Date.now;

    deps.stateFile?.registerCollector(() => ({
      section: "Engine",
      data: {
        state: this.restoredState ?? this.state,
        activeMode: this.activeModeName,
        modes: this.modes,
        nextPositionNum: this.nextPositionNum,
        rejected: [...this.rejected],
      },
    }));
    deps.stateFile?.registerCollector(() => ({
      section: "Positions",
      data: { open: [...this.open.values()], closed: this.closed },
    }));
    deps.stateFile?.registerCollector(() => ({
      section: "Risk",
      data: deps.risk.snapshot(),
    }));
  }

  attachFeed(feed: CandidateFeed): void {
    this.feed = feed;
  }

  get activeMode(): Mode {
    return this.modes[this.activeModeName];
  }

  get engineState(): EngineState {
    return this.state;
  }

  /** Used by discovery to skip tokens already held. */
  isHolding(token: Address): boolean {
    const key = token.toLowerCase();
    for (const pos of this.open.values()) {
      if (pos.token.toLowerCase() === key) return true;
    }
    return false;
  }

  // ─── Lifecycle ───

  start(): void {
    if (!this.exitPoller) {
      this.exitPoller = startPolling("exits", () => this.deps.config.exits.intervalMs, () => this.superviseExits());
      this.feed?.start();
    }
    if (this.startedAt === null) this.startedAt = this.now();
    const target = this.restoredState === "PAUSED" || this.restoredState === "STOPPED" ? this.restoredState : "RUNNING";
    this.restoredState = null;
    if (this.state === "IDLE") this.setState(target);
  }

  /**
   * Stop all loops. Open positions stay open and are picked up on the next
   * start; a paused or stopped engine comes back the same way.
   */
  stop(): void {
    this.feed?.stop();
    this.exitPoller?.stop();
    this.exitPoller = null;
    this.abortEntries();
    if (this.state === "PAUSED" || this.state === "STOPPED") this.restoredState = this.state;
    this.setState("IDLE");
    this.startedAt = null;
    this.flush();
  }

  pause(): boolean {
    if (this.state !== "RUNNING") return false;
    this.setState("PAUSED");
    return true;
  }

  resume(): boolean {
    if (this.state !== "PAUSED" && this.state !== "STOPPED") return false;
    this.setState("RUNNING");
    return true;
  }

  /**
   * Block entries, abort in-flight buys that have not broadcast, and sell
   * every open position. Returns how many positions this call closed.
   */
  emergencyStop(): Promise<number> {
    return this.controlLock.runExclusive(async () => {
      this.setState("STOPPED");
      this.abortEntries();
      const targets = [...this.open.values()];
      console.log(`[engine] EMERGENCY STOP: closing ${targets.length} positions`);
      const results = await Promise.all(
        targets.map((pos) =>
          this.positionLocks.runExclusive(pos.id, async () => (isActive(pos) ? this.exitFully(pos, "EMERGENCY") : false)),
        ),
      );
      this.markDirty();
      return results.filter(Boolean).length;
    });
  }

  private setState(next: EngineState): void {
    const from = this.state;
    if (from === next) return;
    this.state = next;
    console.log(`[engine] ${from} -> ${next}`);
    this.deps.alerts.emit({ type: "engine_state", from, to: next });
    this.markDirty();
  }

  private abortEntries(): void {
    this.entryController.abort();
    this.entryController = new AbortController();
  }

  // ─── Mode & overrides ───

  async setMode(name: string): Promise<Mode> {
    const upper = name.toUpperCase();
    if (!isModeName(upper)) throw new ConfigError(`Unknown mode "${name}" (NORMAL or TURBO)`);
    return this.controlLock.runExclusive(async () => {
      this.activeModeName = upper;
      const mode = this.activeMode;
      console.log(`[engine] Mode set to ${upper}`);
      if (this.deps.config.modeSwitchPolicy === "adopt-new") {
        for (const pos of [...this.open.values()]) {
          await this.positionLocks.runExclusive(pos.id, () => {
            if (isActive(pos)) adoptMode(pos, mode, this.now());
          });
        }
      }
      this.markDirty();
      return mode;
    });
  }

  private override(overrides: ModeOverrides): Mode {
    const next = withOverrides(this.activeMode, overrides);
    this.modes = { ...this.modes, [next.name]: next };
    console.log(`[engine] ${next.name} updated: ${JSON.stringify(overrides)}`);
    this.markDirty();
    return next;
  }

  setTradeSize(size: number): Mode {
    if (size > this.deps.config.risk.maxExposure) {
      throw new ConfigError(`Trade size ${size} exceeds max exposure ${this.deps.config.risk.maxExposure}`);
    }
    return this.override({ tradeSize: size });
  }

  setStopLoss(pct: number): Mode {
    return this.override({ stopLossPct: pct });
  }

  setTakeProfit(levels: TakeProfitLevel[]): Mode {
    return this.override({ takeProfit: levels });
  }

  setMaxPositions(n: number): Mode {
    return this.override({ maxPositions: n });
  }

  // ─── Entry ───

  /** Screen and, when everything allows it, buy a discovered token. */
  async onCandidate(candidate: Candidate): Promise<void> {
    const key = candidate.token.toLowerCase();
    if (this.state !== "RUNNING") {
      console.log(`[engine] ${shortAddr(candidate.token)} discarded: engine ${this.state}`);
      return;
    }
    if (this.isHolding(candidate.token) || this.pendingEntries.has(key) || this.rejected.has(key)) return;

    const mode = this.activeMode;
    if (this.open.size + this.pendingEntries.size >= mode.maxPositions) {
      console.log(`[engine] ${shortAddr(candidate.token)} skipped: ${mode.maxPositions} positions already open or pending`);
      return;
    }

    this.pendingEntries.add(key);
    try {
      await this.enter(candidate);
    } finally {
      this.pendingEntries.delete(key);
    }
  }

  private async enter(candidate: Candidate): Promise<void> {
    const verdict = await this.deps.screener.evaluate(candidate);
    const intel = verdict.intel;
    if (!verdict.pass || !intel) {
      if (!verdict.transient) this.rejected.add(candidate.token.toLowerCase());
      this.deps.alerts.emit({
        type: "candidate_rejected",
        token: candidate.token,
        symbol: verdict.token.symbol,
        score: verdict.score,
        reasons: verdict.reasons,
      });
      this.markDirty();
      return;
    }
    if (this.state !== "RUNNING") return;

    const mode = this.activeMode;
    const tokenClass = this.classify(intel);
    const policy = this.deps.config.classes[tokenClass];
    const wanted = Math.min(mode.tradeSize * policy.sizeMultiplier, policy.maxInvestment);
    const budget = this.deps.risk.remainingBudget();
    const size = budget > 0 ? Math.min(wanted, budget) : wanted;

    const reservationId = await this.entryGate.runExclusive(() => this.reserveEntry(candidate.token, intel.symbol, size));
    if (reservationId === null) return;

    const signal = this.entryController.signal;
    let result: ExecutionResult;
    try {
      result = await this.deps.aggregator.executeWithFallback({
        token: candidate.token,
        side: "buy",
        amountIn: toWei(size),
        maxSlippageBps: mode.maxSlippageBps,
        maxGasPriceGwei: this.deps.config.execution.maxGasPriceGwei,
        signal,
      });
    } catch (err) {
      if (!(err instanceof ExecutionPendingError && err.swap)) {
        this.deps.risk.releaseReservation(reservationId);
        this.reportEntryFailure(candidate.token, err);
        return;
      }
      const settled = await this.awaitSwap(err.swap);
      if (settled.kind === "failed") {
        this.deps.risk.releaseReservation(reservationId);
        this.reportEntryFailure(candidate.token, settled.error);
        return;
      }
      if (settled.kind === "unknown") {
        // It may still land, so its budget stays reserved.
        const message = `Buy ${err.txHash} unresolved, ${size} stays reserved`;
        console.error(`[engine] ${message}`);
        this.deps.alerts.emit({ type: "execution_failed", token: candidate.token, side: "buy", positionId: null, message });
        return;
      }
      result = settled.result;
    }

    const now = this.now();
    const id = String(this.nextPositionNum++).padStart(3, "0");
    this.deps.risk.commitEntry(reservationId, id, size, now);
    const pos = openPosition({
      id,
      token: candidate.token,
      symbol: intel.symbol,
      decimals: intel.decimals,
      tokenClass,
      mode,
      entryPrice: unitPrice(result.amountIn, result.amountOut, intel.decimals),
      entrySize: size,
      amount: result.amountOut,
      routeId: result.routeId,
      txHash: result.txHash,
      now,
    });
    this.open.set(id, pos);
    this.deps.alerts.emit({
      type: "position_opened",
      positionId: id,
      token: pos.token,
      symbol: pos.symbol,
      size,
      price: pos.entryPrice,
      routeId: pos.routeId,
      txHash: result.txHash,
    });
    this.markDirty();

    // The buy landed after an emergency stop or a shutdown.
    const landedIn = this.engineState;
    if (landedIn === "STOPPED" || landedIn === "IDLE") {
      await this.positionLocks.runExclusive(id, async () => {
        if (isActive(pos)) await this.exitFully(pos, "EMERGENCY");
      });
      if (landedIn === "IDLE") this.flush();
    }
  }

  /**
   * Balance check and budget reservation, one entry at a time. Buys still in
   * flight count against the balance, which may not show them yet.
   */
  private async reserveEntry(token: Address, symbol: string, size: number): Promise<string | null> {
    const inFlight = this.deps.risk.reserved;
    try {
      const balances = await this.deps.wallet.getBalances();
      const spendable = balances.native - this.deps.config.execution.gasReserve - inFlight;
      if (spendable < size) throw new InsufficientBalanceError(size, Math.max(0, spendable));
    } catch (err) {
      this.reportEntryFailure(token, err);
      return null;
    }
    if (this.state !== "RUNNING") return null;

    const decision = this.deps.risk.approveEntry(size, this.now());
    this.syncRiskLevel(decision.allowed ? "cooldown ended" : decision.reason);
    if (!decision.allowed) {
      console.log(`[risk] Entry denied for ${symbol}: ${decision.reason} (${decision.message})`);
      return null;
    }
    return decision.reservationId;
  }

  /**
   * Keep waiting on a swap that broadcast without a receipt. Only a revert
   * counts as failed; anything else leaves the outcome unknown.
   */
  private async awaitSwap(swap: PendingSwap): Promise<Settled> {
    const checks = this.deps.config.execution.confirmChecks;
    let last: unknown = null;
    for (let check = 1; check <= checks; check++) {
      try {
        return { kind: "filled", result: await this.deps.aggregator.settle(swap) };
      } catch (err) {
        if (err instanceof ExecutionRevertedError) return { kind: "failed", error: err };
        last = err;
        console.log(`[engine] ${swap.side} ${swap.txHash} unconfirmed (${check}/${checks}): ${errorMessage(err)}`);
      }
    }
    return { kind: "unknown", error: last };
  }

  private reportEntryFailure(token: Address, err: unknown): void {
    if (err instanceof ExecutionAbortedError) {
      console.log(`[engine] Entry for ${shortAddr(token)} aborted before broadcast`);
      return;
    }
    console.error(`[engine] Entry for ${shortAddr(token)} failed:`, errorMessage(err));
    this.deps.alerts.emit({ type: "execution_failed", token, side: "buy", positionId: null, message: errorMessage(err) });
  }

  // ─── Exit supervision ───

  /** One pass over every open position. Busy positions wait for the next pass. */
  async superviseExits(): Promise<void> {
    this.syncRiskLevel("cooldown ended");
    for (const pos of [...this.open.values()]) {
      if (!isActive(pos) || this.positionLocks.isLocked(pos.id)) continue;
      await this.positionLocks.runExclusive(pos.id, async () => {
        try {
          await this.checkPosition(pos);
        } catch (err) {
          addLog(pos, `Exit check failed: ${errorMessage(err)}`, "error", this.now());
        }
      });
    }
  }

  private async checkPosition(pos: Position): Promise<void> {
    if (!isActive(pos)) return;
    if (!(await this.settlePendingSell(pos))) return;
    let price = pos.lastPrice;

    if (remaining(pos) > 0n) {
      const oneToken = 10n ** BigInt(pos.decimals);
      const quote = await this.deps.aggregator.quote(pos.token, "sell", oneToken);
      if (quote) {
        price = unitPrice(quote.amountOut, oneToken, pos.decimals);
        markPrice(pos, price);
      } else if (!pos.pendingClose) {
        console.log(`[engine] No price for ${pos.symbol} (#${pos.id}), deferring`);
        return;
      }
    }

    const plan = planExit(pos, price, this.now(), this.deps.config.classes[pos.tokenClass]);
    if (!plan) return;

    if (plan.kind === "partial") {
      await this.takeProfit(pos, plan.level, plan.amount);
    } else {
      await this.exitFully(pos, plan.reason);
    }
    this.markDirty();
  }

  private async takeProfit(pos: Position, level: number, amount: bigint): Promise<void> {
    let fill: Fill | null = null;
    if (amount > 0n) {
      const result = await this.sell(pos, amount, { level, reason: null });
      if (!result) return; // level stays armed
      fill = this.toFill(pos, result, { level, reason: null });
    }
    this.recordPartial(pos, level, amount, fill);
  }

  private recordPartial(pos: Position, level: number, amount: bigint, fill: Fill | null): void {
    applyPartialFill(pos, level, amount, fill, this.now());
    this.deps.alerts.emit({
      type: "position_partial",
      positionId: pos.id,
      symbol: pos.symbol,
      level,
      threshold: pos.takeProfit[level].threshold,
      proceeds: fill ? fromWei(BigInt(fill.amountOut)) : 0,
      txHash: fill ? fill.txHash : null,
    });
    if (!isActive(pos)) this.onClosed(pos);
  }

  /** Sell whatever is left and close. False when the sell failed. */
  private async exitFully(pos: Position, reason: CloseReason): Promise<boolean> {
    if (!(await this.settlePendingSell(pos))) {
      if (isActive(pos)) this.deferClose(pos, reason);
      return false;
    }
    const held = remaining(pos);
    let fill: Fill | null = null;
    if (held > 0n) {
      const result = await this.sell(pos, held, { level: null, reason });
      if (!result) {
        this.deferClose(pos, reason);
        return false;
      }
      fill = this.toFill(pos, result, { level: null, reason });
    }
    applyFullClose(pos, reason, fill, this.now());
    this.onClosed(pos);
    return true;
  }

  private deferClose(pos: Position, reason: CloseReason): void {
    if (reason !== "EMERGENCY" && reason !== "MANUAL") return;
    pos.pendingClose = reason;
    addLog(pos, `${reason} close failed, will retry`, "error", this.now());
  }

  private async sell(pos: Position, amount: bigint, purpose: SellPurpose): Promise<ExecutionResult | null> {
    let failure: unknown;
    try {
      return await this.deps.aggregator.executeWithFallback({
        token: pos.token,
        side: "sell",
        amountIn: amount,
        maxSlippageBps: this.modes[pos.modeName].maxSlippageBps,
        maxGasPriceGwei: this.deps.config.execution.maxGasPriceGwei,
      });
    } catch (err) {
      failure = err;
      if (err instanceof ExecutionPendingError && err.swap) {
        const settled = await this.awaitSwap(err.swap);
        if (settled.kind === "filled") return settled.result;
        if (settled.kind === "unknown") {
          // No further sells until this one resolves.
          pos.pendingSell = {
            txHash: err.swap.txHash,
            routeId: err.swap.routeId,
            amountIn: err.swap.amountIn.toString(),
            quotedOut: err.swap.quotedOut.toString(),
            ...purpose,
          };
          this.markDirty();
        } else {
          failure = settled.error;
        }
      }
    }
    addLog(pos, `Sell of ${amount} failed: ${errorMessage(failure)}`, "error", this.now());
    this.deps.alerts.emit({
      type: "execution_failed",
      token: pos.token,
      side: "sell",
      positionId: pos.id,
      message: errorMessage(failure),
    });
    return null;
  }

  /**
   * Resolve a sell left unconfirmed before this position trades again.
   * True when it is clear to trade: nothing was pending, the sell reverted,
   * or it landed and the position is still open.
   */
  private async settlePendingSell(pos: Position): Promise<boolean> {
    const pending = pos.pendingSell;
    if (!pending) return true;
    const swap: PendingSwap = {
      routeId: pending.routeId,
      txHash: pending.txHash,
      token: pos.token,
      side: "sell",
      amountIn: BigInt(pending.amountIn),
      quotedOut: BigInt(pending.quotedOut),
    };

    let result: ExecutionResult;
    try {
      result = await this.deps.aggregator.settle(swap);
    } catch (err) {
      if (!(err instanceof ExecutionRevertedError)) {
        addLog(pos, `Sell ${pending.txHash} still unconfirmed: ${errorMessage(err)}`, "info", this.now());
        return false;
      }
      pos.pendingSell = null;
      addLog(pos, `Sell ${pending.txHash} reverted`, "error", this.now());
      this.markDirty();
      return true;
    }

    pos.pendingSell = null;
    const fill = this.toFill(pos, result, pending);
    if (pending.level !== null) {
      this.recordPartial(pos, pending.level, swap.amountIn, fill);
    } else {
      applyFullClose(pos, pending.reason ?? "MANUAL", fill, this.now());
      this.onClosed(pos);
    }
    this.markDirty();
    return isActive(pos);
  }

  private toFill(pos: Position, result: ExecutionResult, purpose: SellPurpose): Fill {
    const fill: Fill = {
      time: this.now(),
      side: "sell",
      amountIn: result.amountIn.toString(),
      amountOut: result.amountOut.toString(),
      price: unitPrice(result.amountOut, result.amountIn, pos.decimals),
      routeId: result.routeId,
      txHash: result.txHash,
    };
    if (purpose.level !== null) fill.level = purpose.level;
    if (purpose.reason !== null) fill.reason = purpose.reason;
    return fill;
  }

  private syncRiskLevel(reason: string): void {
    const change = this.deps.risk.refreshLevel(this.now());
    if (change) this.deps.alerts.emit({ type: "risk_level_changed", ...change, reason });
  }

  private onClosed(pos: Position): void {
    this.open.delete(pos.id);
    this.closed.unshift(pos);
    if (this.closed.length > this.deps.config.exits.closedHistory) {
      this.closed.length = this.deps.config.exits.closedHistory;
    }

    const reason = pos.closeReason ?? "MANUAL";
    const pnl = realizedPnl(pos);
    const from = this.deps.risk.riskLevel;
    const to = this.deps.risk.recordClose({
      positionId: pos.id,
      token: pos.token,
      entrySize: pos.entrySize,
      proceeds: pos.proceeds,
      pnl,
      reason,
      closedAt: pos.closedAt ?? this.now(),
    });

    this.deps.alerts.emit({
      type: "position_closed",
      positionId: pos.id,
      symbol: pos.symbol,
      reason,
      pnl,
      pnlPct: pos.entrySize > 0 ? pnl / pos.entrySize : 0,
    });
    if (to) {
      this.deps.alerts.emit({ type: "risk_level_changed", from, to, reason: `${reason} on #${pos.id}` });
    }
    this.markDirty();
  }

  // ─── Manual close ───

  async closePosition(id: string): Promise<Position> {
    const pos = this.open.get(id);
    if (!pos) throw new AppError(`No open position ${id}`, "POSITION_NOT_FOUND");
    await this.positionLocks.runExclusive(id, async () => {
      if (isActive(pos)) await this.exitFully(pos, "MANUAL");
    });
    this.markDirty();
    return pos;
  }

  // ─── Queries ───

  status(): EngineStatus {
    return {
      state: this.state,
      mode: this.activeMode,
      modeSwitchPolicy: this.deps.config.modeSwitchPolicy,
      wallet: this.deps.wallet.address,
      openPositions: this.open.size,
      pendingEntries: this.pendingEntries.size,
      exposure: this.deps.risk.exposure,
      maxExposure: this.deps.config.risk.maxExposure,
      riskLevel: this.deps.risk.stats(this.now()).riskLevel,
      startedAt: this.startedAt,
    };
  }

  async balance(): Promise<WalletBalances & { exposure: number }> {
    const balances = await this.deps.wallet.getBalances();
    return { ...balances, exposure: this.deps.risk.exposure };
  }

  /** Open positions first, then recently closed, newest first. */
  positions(): Position[] {
    return [...this.open.values(), ...this.closed];
  }

  getPosition(id: string): Position | undefined {
    return this.open.get(id) ?? this.closed.find((p) => p.id === id);
  }

  stats(): EngineStats {
    let unrealized = 0;
    for (const pos of this.open.values()) unrealized += unrealizedPnl(pos);
    return {
      risk: this.deps.risk.stats(this.now()),
      openPositions: this.open.size,
      closedPositions: this.closed.length,
      rejectedTokens: this.rejected.size,
      unrealizedPnl: unrealized,
    };
  }

  /** Screen and price a token without trading it. */
  async analyze(token: Address): Promise<Analysis> {
    const candidate: Candidate = this.feed
      ? await this.feed.inspect(token)
      : { token, pool: null, routeId: "none", liquidity: 0, source: "manual", discoveredAt: this.now() };
    const verdict = await this.deps.screener.evaluate(candidate);

    let price: number | null = null;
    if (verdict.intel) {
      const oneToken = 10n ** BigInt(verdict.intel.decimals);
      const quote = await this.deps.aggregator.quote(token, "sell", oneToken);
      price = quote ? unitPrice(quote.amountOut, oneToken, verdict.intel.decimals) : null;
    }
    return {
      candidate,
      verdict,
      tokenClass: verdict.intel ? this.classify(verdict.intel) : null,
      price,
      held: this.isHolding(token),
    };
  }

  // ─── Persistence ───

  /** Rebuild from the state file. Call before `start()`. */
  restore(loaded: LoadedState): void {
    if (loaded["Engine"] !== undefined) {
      const engine = readEngineSection(loaded["Engine"]);
      this.modes = engine.modes;
      this.activeModeName = engine.activeMode;
      this.nextPositionNum = engine.nextPositionNum;
      this.rejected = new Set(engine.rejected);
      this.restoredState = engine.state;
    }

    if (loaded["Positions"] !== undefined) {
      const { open, closed } = readPositionsSection(loaded["Positions"]);
      this.open = new Map(open.filter(isActive).map((p) => [p.id, p]));
      this.closed = closed.slice(0, this.deps.config.exits.closedHistory);
      for (const p of [...open, ...closed]) {
        const n = parseInt(p.id, 10);
        if (!isNaN(n) && n >= this.nextPositionNum) this.nextPositionNum = n + 1;
      }
    }

    const live = [...this.open.values()];
    if (loaded["Risk"] !== undefined) {
      this.deps.risk.restore(readRiskSection(loaded["Risk"]), live);
    } else {
      this.deps.risk.restoreExposure(live);
    }
    console.log(`[engine] Restored ${this.open.size} open positions (${this.activeModeName})`);
  }

  private markDirty(): void {
    this.deps.stateFile?.markDirty();
  }

  flush(): void {
    try {
      this.deps.stateFile?.flush();
    } catch (err) {
      console.error("[engine] State flush failed:", errorMessage(err));
    }
  }
}
