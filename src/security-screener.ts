import type { Address } from "viem";
import type { ScreenerConfig } from "./config.js";
import type { RouteQuote, Side } from "./dex/types.js";
import { errorMessage } from "./errors.js";
import { scamKeyword } from "./token-class.js";
import type { TokenIntel, TokenIntelSource } from "./token-intel.js";
import type { Candidate, Token } from "./trading/types.js";
import { fromWei, toWei } from "./utils.js";

const YOUNG_TOKEN_MS = 10 * 60_000;

export interface SecurityVerdict {
  pass: boolean;
  score: number;          // 0..100
  reasons: string[];      // every rule that fired, hard or soft
  hardFails: string[];    // rule codes that reject outright
  token: Token;
  intel: TokenIntel | null;
  transient: boolean;     // failed for lack of data, worth re-checking later
  checkedAt: number;
}

/** The slice of DexAggregator the screener needs. */
export interface Quoter {
  quote(token: Address, side: Side, amountIn: bigint): Promise<RouteQuote | null>;
}

type RoundTrip =
  | { kind: "ok"; lossPct: number }
  | { kind: "no-buy-route" }
  | { kind: "sell-blocked"; message: string };

interface RuleContext {
  candidate: Candidate;
  intel: TokenIntel;
  config: ScreenerConfig;
  roundTrip: RoundTrip;
  now: number;
}

interface RuleOutcome {
  code: string;
  hard: boolean;
  penalty: number;
  reason: string;
}

type Rule = (ctx: RuleContext) => RuleOutcome | null;

const hard = (code: string, reason: string): RuleOutcome => ({ code, hard: true, penalty: 0, reason });
const soft = (code: string, penalty: number, reason: string): RuleOutcome => ({ code, hard: false, penalty, reason });

const pct = (v: number) => `${(v * 100).toFixed(1)}%`;

// ─── Rules ───
// Each rule is pure and independent; a rule that does not apply returns null.

export const RULES: readonly Rule[] = [
  ({ intel, config }) => {
    if (intel.verified === true) return null;
    if (config.requireVerified) return hard("UNVERIFIED", "Contract source is not verified");
    return intel.verified === false
      ? soft("UNVERIFIED", 10, "Contract source is not verified")
      : soft("VERIFICATION_UNKNOWN", 5, "Verification status unknown");
  },

  ({ intel, config }) => {
    if (intel.buyTaxPct === null || intel.sellTaxPct === null) {
      return soft("TAX_UNKNOWN", 10, "Buy/sell tax unknown");
    }
    if (intel.buyTaxPct > config.maxTaxPct) return hard("HIGH_BUY_TAX", `Buy tax ${pct(intel.buyTaxPct)} above ${pct(config.maxTaxPct)}`);
    if (intel.sellTaxPct > config.maxTaxPct) return hard("HIGH_SELL_TAX", `Sell tax ${pct(intel.sellTaxPct)} above ${pct(config.maxTaxPct)}`);
    return null;
  },

  ({ intel, config }) => {
    if (intel.topHolderPct === null) return soft("TOP_HOLDER_UNKNOWN", 5, "Holder concentration unknown");
    if (intel.topHolderPct > config.maxTopHolderPct) {
      return hard("TOP_HOLDER", `Top holder owns ${pct(intel.topHolderPct)} (max ${pct(config.maxTopHolderPct)})`);
    }
    return null;
  },

  ({ candidate, config }) => {
    if (candidate.liquidity < config.minLiquidity) {
      return hard("LOW_LIQUIDITY", `Liquidity ${candidate.liquidity} below ${config.minLiquidity}`);
    }
    if (candidate.liquidity < config.minLiquidity * 2) {
      return soft("THIN_LIQUIDITY", 10, `Liquidity ${candidate.liquidity} is thin`);
    }
    return null;
  },

  ({ intel, config }) => {
    if (intel.holderCount === null) return soft("HOLDERS_UNKNOWN", 10, "Holder count unknown");
    if (intel.holderCount < config.minHolders) {
      return hard("FEW_HOLDERS", `${intel.holderCount} holders (min ${config.minHolders})`);
    }
    return null;
  },

  ({ candidate, intel, config, now }) => {
    const age = now - (intel.createdAt ?? candidate.discoveredAt);
    if (age > config.maxTokenAgeMs) {
      return hard("TOO_OLD", `Token is ${Math.round(age / 3_600_000)}h old`);
    }
    if (age < YOUNG_TOKEN_MS) return soft("VERY_YOUNG", 5, "Token is under 10 minutes old");
    return null;
  },

  ({ intel }) => {
    if (intel.isHoneypot === true) return hard("HONEYPOT_FLAGGED", "External scanner flags honeypot");
    if (intel.isHoneypot === null) return soft("HONEYPOT_UNKNOWN", 5, "No external honeypot result");
    return null;
  },

  ({ intel, config, roundTrip }) => {
    switch (roundTrip.kind) {
      case "no-buy-route":
        return hard("NO_ROUTE", "No route can price a buy");
      case "sell-blocked":
        return hard("HONEYPOT_SIMULATION", `Sell simulation failed: ${roundTrip.message}`);
      case "ok": {
        const allowed = (intel.buyTaxPct ?? 0) + (intel.sellTaxPct ?? 0) + config.maxRoundTripLossPct;
        if (roundTrip.lossPct > allowed) {
          return hard("HONEYPOT_SIMULATION", `Round trip loses ${pct(roundTrip.lossPct)} (max ${pct(allowed)})`);
        }
        return null;
      }
    }
  },

  ({ intel }) => {
    const owned = intel.ownerRenounced === false;
    const privileged = intel.canMint === true || intel.canBlacklist === true;
    if (owned && privileged && intel.liquidityLocked !== true) {
      return hard("DRAIN_RISK", "Active owner can mint or blacklist and liquidity is not locked");
    }
    if (intel.canPause === true) return soft("PAUSABLE", 15, "Owner can pause trading");
    if (owned) return soft("OWNER_ACTIVE", 10, "Ownership not renounced");
    if (intel.ownerRenounced === null) return soft("OWNER_UNKNOWN", 5, "Ownership status unknown");
    return null;
  },

  ({ intel }) => {
    const word = scamKeyword(intel);
    return word ? hard("SCAM_NAME", `Name or symbol contains "${word}"`) : null;
  },
];

// ─── Screener ───

interface CacheEntry {
  verdict: SecurityVerdict;
  expiresAt: number;
}

/**
 * Hard/soft rule evaluation over token intel plus a quote-only buy-then-sell
 * round trip. Verdicts are values; nothing here throws for an ordinary
 * rejection. Results are cached per token and concurrent evaluations share
 * one in-flight check.
 */
export class SecurityScreener {
  private cache = new Map<string, CacheEntry>();
  private inFlight = new Map<string, Promise<SecurityVerdict>>();

  constructor(
    private readonly intel: TokenIntelSource,
    private readonly quoter: Quoter,
    private readonly config: ScreenerConfig,
    private readonly now: () => number = Date.now,
  ) {}

  evaluate(candidate: Candidate): Promise<SecurityVerdict> {
    const key = candidate.token.toLowerCase();
    const cached = this.cache.get(key);
    if (cached && cached.expiresAt > this.now()) return Promise.resolve(cached.verdict);

    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const run = this.check(candidate).finally(() => this.inFlight.delete(key));
    this.inFlight.set(key, run);
    return run;
  }

  private async check(candidate: Candidate): Promise<SecurityVerdict> {
    const now = this.now();
    let intel: TokenIntel;
    try {
      intel = await this.intel.getIntel(candidate.token, candidate.pool);
    } catch (err) {
      console.error(`[screener] Intel unavailable for ${candidate.token}:`, errorMessage(err));
      return {
        pass: false,
        score: 0,
        reasons: [`Token data unavailable: ${errorMessage(err)}`],
        hardFails: ["INTEL_UNAVAILABLE"],
        token: this.toToken(candidate, null, 0),
        intel: null,
        transient: true,
        checkedAt: now,
      };
    }

    const roundTrip = await this.simulateRoundTrip(candidate.token);
    const ctx: RuleContext = { candidate, intel, config: this.config, roundTrip, now };

    const reasons: string[] = [];
    const hardFails: string[] = [];
    let score = 100;
    for (const rule of RULES) {
      const outcome = rule(ctx);
      if (!outcome) continue;
      reasons.push(outcome.reason);
      if (outcome.hard) hardFails.push(outcome.code);
      score -= outcome.penalty;
    }
    score = Math.max(0, Math.min(100, score));

    const verdict: SecurityVerdict = {
      pass: hardFails.length === 0 && score >= this.config.minScore,
      score,
      reasons,
      hardFails,
      token: this.toToken(candidate, intel, score),
      intel,
      transient: false,
      checkedAt: now,
    };
    if (!verdict.pass) {
      console.log(`[screener] ${intel.symbol} rejected (score ${score}): ${hardFails.join(", ") || "score below minimum"}`);
    }
    this.cache.set(candidate.token.toLowerCase(), { verdict, expiresAt: now + this.config.cacheTtlMs });
    return verdict;
  }

  /** Buy a probe then sell what it bought, quotes only. */
  private async simulateRoundTrip(token: Address): Promise<RoundTrip> {
    const probe = toWei(this.config.honeypotProbe);
    let buy: RouteQuote | null;
    try {
      buy = await this.quoter.quote(token, "buy", probe);
    } catch (err) {
      console.error(`[screener] Buy quote failed for ${token}:`, errorMessage(err));
      buy = null;
    }
    if (!buy) return { kind: "no-buy-route" };

    try {
      const sell = await this.quoter.quote(token, "sell", buy.amountOut);
      if (!sell) return { kind: "sell-blocked", message: "no route accepts a sell" };
      return { kind: "ok", lossPct: 1 - fromWei(sell.amountOut) / this.config.honeypotProbe };
    } catch (err) {
      return { kind: "sell-blocked", message: errorMessage(err) };
    }
  }

  private toToken(candidate: Candidate, intel: TokenIntel | null, score: number): Token {
    return {
      address: candidate.token,
      symbol: intel?.symbol ?? "?",
      name: intel?.name ?? "",
      decimals: intel?.decimals ?? 18,
      pool: candidate.pool,
      routeId: candidate.routeId,
      discoveredAt: candidate.discoveredAt,
      liquidity: candidate.liquidity,
      holders: intel?.holderCount ?? null,
      buyTaxPct: intel?.buyTaxPct ?? null,
      sellTaxPct: intel?.sellTaxPct ?? null,
      topHolderPct: intel?.topHolderPct ?? null,
      verified: intel?.verified ?? null,
      securityScore: score,
    };
  }
}
