import { config } from "dotenv";
import { createPublicClient, createWalletClient, getAddress, http, isAddress, type Address } from "viem";
import { base } from "viem/chains";
import { privateKeyToAccount, mnemonicToAccount } from "viem/accounts";
import { ConfigError } from "./errors.js";
import { DEFAULT_MODES, isModeName, parseTakeProfit, validateMode } from "./trading/modes.js";
import type { DexRoute } from "./dex/types.js";
import type { Mode, ModeName, ModeSwitchPolicy, TokenClass, TokenClassPolicy } from "./trading/types.js";

config();

export const WETH_BASE = "0x4200000000000000000000000000000000000006" as const;

const HOUR_MS = 3_600_000;
const DAY_MS = 24 * HOUR_MS;

export const DEFAULT_ROUTES: readonly DexRoute[] = [
  {
    id: "uniswap-v2",
    protocol: "v2",
    router: "0x4752ba5DBc23f44D87826276BF6Fd6b1C372aD24",
    factory: "0x8909Dc15e40173Ff4699343b6eB8132c65e18eC6",
    feeTiers: [],
    priority: 1,
  },
  {
    id: "baseswap",
    protocol: "v2",
    router: "0x327Df1E6de05895d2ab08525862d053346e2f5FB",
    factory: "0xFDa619b6d20975be80A10332cD39b9a4b0FAa8BB",
    feeTiers: [],
    priority: 2,
  },
  {
    id: "uniswap-v3",
    protocol: "v3",
    router: "0x2626664c2603336E57B271c5C0b26F421741e481",
    factory: "0x33128a8fC17869897dcE68Ed026d694621f6FDfD",
    quoter: "0x3d4e44Eb1374240CE5F1B871ab261CD16335B76a",
    feeTiers: [500, 3000, 10000],
    priority: 3,
  },
];

// ─── Types ───

export interface ExecutionConfig {
  maxGasPriceGwei: number;
  gasReserve: number;       // native units never committed to entries
  rpcTimeoutMs: number;
  receiptTimeoutMs: number;
  confirmChecks: number;    // extra receipt waits for a swap that broadcast but did not confirm
}

export interface DiscoveryConfig {
  intervalMs: number;
  minLiquidity: number;
  largeSwapMin: number;     // native value of a pending buy worth following
  lookbackBlocks: number;   // first poll starts this far behind head
  seenRetentionMs: number;
  maxSeen: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
}

export interface ScreenerConfig {
  requireVerified: boolean;
  maxTaxPct: number;
  maxTopHolderPct: number;
  minLiquidity: number;
  minHolders: number;
  maxTokenAgeMs: number;
  maxRoundTripLossPct: number;
  honeypotProbe: number;
  minScore: number;
  cacheTtlMs: number;
}

export interface RiskConfig {
  maxExposure: number;
  dailyLossLimit: number;
  maxConsecutiveLosses: number;
  circuitBreakerCooldownMs: number;
  maxTradesPerDay: number;
  windowMs: number;
}

export interface ExitConfig {
  intervalMs: number;
  closedHistory: number;
}

export interface IntelConfig {
  honeypotApiUrl: string;
  explorerApiUrl: string;
  explorerApiKey: string;
  timeoutMs: number;
}

export interface AppConfig {
  rpcUrl: string;
  baseToken: Address;
  routes: readonly DexRoute[];
  modes: Readonly<Record<ModeName, Mode>>;
  activeMode: ModeName;
  modeSwitchPolicy: ModeSwitchPolicy;
  execution: ExecutionConfig;
  discovery: DiscoveryConfig;
  exits: ExitConfig;
  classes: Readonly<Record<TokenClass, TokenClassPolicy>>;
  screener: ScreenerConfig;
  risk: RiskConfig;
  intel: IntelConfig;
  stateFile: string;
  port: number;
  authToken: string;
  telegram: { token: string; chatId: string };
}

type Env = Record<string, string | undefined>;

// ─── Env parsing ───

function num(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) throw new ConfigError(`${key} must be a number, got "${raw}"`);
  return value;
}

function bool(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (raw === "true" || raw === "1" || raw === "yes") return true;
  if (raw === "false" || raw === "0" || raw === "no") return false;
  throw new ConfigError(`${key} must be true or false, got "${env[key]}"`);
}

function address(env: Env, key: string, fallback: Address): Address {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  if (!isAddress(raw)) throw new ConfigError(`${key} is not a valid address: ${raw}`);
  return getAddress(raw);
}

function positive(value: number, key: string): number {
  if (value <= 0) throw new ConfigError(`${key} must be positive, got ${value}`);
  return value;
}

function fraction(value: number, key: string): number {
  if (value < 0 || value > 1) throw new ConfigError(`${key} must be between 0 and 1, got ${value}`);
  return value;
}

function loadMode(env: Env, name: ModeName): Mode {
  const preset = DEFAULT_MODES[name];
  const tp = env[`${name}_TAKE_PROFIT`];
  return validateMode({
    name,
    tradeSize: num(env, `${name}_TRADE_SIZE`, preset.tradeSize),
    takeProfit: tp ? parseTakeProfit(tp) : preset.takeProfit,
    stopLossPct: num(env, `${name}_STOP_LOSS`, preset.stopLossPct),
    trailingStopPct: num(env, `${name}_TRAILING_STOP`, preset.trailingStopPct),
    mempoolIntervalMs: num(env, `${name}_MEMPOOL_INTERVAL_MS`, preset.mempoolIntervalMs),
    maxPositions: num(env, `${name}_MAX_POSITIONS`, preset.maxPositions),
    maxSlippageBps: num(env, `${name}_MAX_SLIPPAGE_BPS`, preset.maxSlippageBps),
  });
}

function loadRoutes(env: Env): readonly DexRoute[] {
  const enabled = env.DEX_ROUTES?.split(",").map((s) => s.trim()).filter(Boolean);
  if (!enabled) return DEFAULT_ROUTES;
  const routes = enabled.map((id, i) => {
    const route = DEFAULT_ROUTES.find((r) => r.id === id);
    if (!route) throw new ConfigError(`Unknown DEX route "${id}" (known: ${DEFAULT_ROUTES.map((r) => r.id).join(", ")})`);
    return { ...route, priority: i + 1 };
  });
  if (routes.length === 0) throw new ConfigError("DEX_ROUTES must name at least one route");
  return routes;
}

/**
 * Build the full, validated configuration from the environment. Nothing is
 * read from process.env after this returns.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const activeMode = (env.SNIPER_MODE ?? "NORMAL").toUpperCase();
  if (!isModeName(activeMode)) throw new ConfigError(`SNIPER_MODE must be NORMAL or TURBO, got "${env.SNIPER_MODE}"`);

  const policy = env.MODE_SWITCH_POLICY ?? "fixed-at-entry";
  if (policy !== "fixed-at-entry" && policy !== "adopt-new") {
    throw new ConfigError(`MODE_SWITCH_POLICY must be fixed-at-entry or adopt-new, got "${policy}"`);
  }

  const modes = { NORMAL: loadMode(env, "NORMAL"), TURBO: loadMode(env, "TURBO") };

  const screener: ScreenerConfig = {
    requireVerified: bool(env, "REQUIRE_VERIFIED", false),
    maxTaxPct: fraction(num(env, "MAX_TAX_PCT", 10) / 100, "MAX_TAX_PCT"),
    maxTopHolderPct: fraction(num(env, "MAX_TOP_HOLDER_PCT", 20) / 100, "MAX_TOP_HOLDER_PCT"),
    minLiquidity: num(env, "MIN_LIQUIDITY", 0.05),
    minHolders: num(env, "MIN_HOLDERS", 50),
    maxTokenAgeMs: positive(num(env, "MAX_TOKEN_AGE_HOURS", 24), "MAX_TOKEN_AGE_HOURS") * HOUR_MS,
    maxRoundTripLossPct: fraction(num(env, "MAX_ROUND_TRIP_LOSS_PCT", 50) / 100, "MAX_ROUND_TRIP_LOSS_PCT"),
    honeypotProbe: positive(num(env, "HONEYPOT_PROBE", 0.001), "HONEYPOT_PROBE"),
    minScore: num(env, "MIN_SECURITY_SCORE", 60),
    cacheTtlMs: num(env, "SECURITY_CACHE_TTL_MS", 5 * 60_000),
  };
  if (screener.minScore < 0 || screener.minScore > 100) {
    throw new ConfigError(`MIN_SECURITY_SCORE must be 0..100, got ${screener.minScore}`);
  }

  const discovery: DiscoveryConfig = {
    intervalMs: positive(num(env, "DISCOVERY_INTERVAL_MS", 1_000), "DISCOVERY_INTERVAL_MS"),
    minLiquidity: screener.minLiquidity,
    largeSwapMin: num(env, "LARGE_SWAP_MIN", 0.5),
    lookbackBlocks: num(env, "DISCOVERY_LOOKBACK_BLOCKS", 5),
    seenRetentionMs: num(env, "SEEN_RETENTION_HOURS", 24) * HOUR_MS,
    maxSeen: positive(num(env, "MAX_SEEN_TOKENS", 10_000), "MAX_SEEN_TOKENS"),
    backoffBaseMs: positive(num(env, "BACKOFF_BASE_MS", 1_000), "BACKOFF_BASE_MS"),
    backoffMaxMs: positive(num(env, "BACKOFF_MAX_MS", 60_000), "BACKOFF_MAX_MS"),
  };
  if (discovery.backoffMaxMs < discovery.backoffBaseMs) {
    throw new ConfigError("BACKOFF_MAX_MS must not be below BACKOFF_BASE_MS");
  }

  const risk: RiskConfig = {
    maxExposure: positive(num(env, "MAX_EXPOSURE", 0.01), "MAX_EXPOSURE"),
    dailyLossLimit: positive(num(env, "DAILY_LOSS_LIMIT", 0.003), "DAILY_LOSS_LIMIT"),
    maxConsecutiveLosses: positive(num(env, "MAX_CONSECUTIVE_LOSSES", 5), "MAX_CONSECUTIVE_LOSSES"),
    circuitBreakerCooldownMs: num(env, "CIRCUIT_BREAKER_COOLDOWN_MIN", 30) * 60_000,
    maxTradesPerDay: positive(num(env, "MAX_TRADES_PER_DAY", 20), "MAX_TRADES_PER_DAY"),
    windowMs: DAY_MS,
  };

  const classes: Record<TokenClass, TokenClassPolicy> = {
    memecoin: {
      sizeMultiplier: 1,
      maxInvestment: positive(num(env, "MEMECOIN_MAX_INVESTMENT", 0.008), "MEMECOIN_MAX_INVESTMENT"),
      maxAgeMs: num(env, "MEMECOIN_MAX_AGE_HOURS", 24) * HOUR_MS,
      timeoutMinProfitPct: num(env, "MEMECOIN_TIMEOUT_MIN_PROFIT_PCT", 50) / 100,
    },
    altcoin: {
      sizeMultiplier: positive(num(env, "ALTCOIN_SIZE_MULTIPLIER", 2), "ALTCOIN_SIZE_MULTIPLIER"),
      maxInvestment: positive(num(env, "ALTCOIN_MAX_INVESTMENT", 0.01), "ALTCOIN_MAX_INVESTMENT"),
      maxAgeMs: num(env, "ALTCOIN_MAX_AGE_DAYS", 7) * DAY_MS,
      timeoutMinProfitPct: num(env, "ALTCOIN_TIMEOUT_MIN_PROFIT_PCT", 20) / 100,
    },
  };

  const cfg: AppConfig = {
    rpcUrl: env.BASE_RPC_URL || "https://mainnet.base.org",
    baseToken: address(env, "BASE_TOKEN", WETH_BASE),
    routes: loadRoutes(env),
    modes,
    activeMode,
    modeSwitchPolicy: policy,
    execution: {
      maxGasPriceGwei: positive(num(env, "MAX_GAS_PRICE_GWEI", 5), "MAX_GAS_PRICE_GWEI"),
      gasReserve: num(env, "GAS_RESERVE", 0.0005),
      rpcTimeoutMs: positive(num(env, "RPC_TIMEOUT_MS", 8_000), "RPC_TIMEOUT_MS"),
      receiptTimeoutMs: positive(num(env, "RECEIPT_TIMEOUT_MS", 60_000), "RECEIPT_TIMEOUT_MS"),
      confirmChecks: positive(num(env, "CONFIRM_CHECKS", 3), "CONFIRM_CHECKS"),
    },
    discovery,
    exits: {
      intervalMs: positive(num(env, "EXIT_POLL_INTERVAL_MS", 3_000), "EXIT_POLL_INTERVAL_MS"),
      closedHistory: num(env, "CLOSED_POSITION_HISTORY", 100),
    },
    classes,
    screener,
    risk,
    intel: {
      honeypotApiUrl: env.HONEYPOT_API_URL || "https://api.honeypot.is/v2/IsHoneypot",
      explorerApiUrl: env.EXPLORER_API_URL || "https://api.basescan.org/api",
      explorerApiKey: env.EXPLORER_API_KEY || "",
      timeoutMs: num(env, "INTEL_TIMEOUT_MS", 5_000),
    },
    stateFile: env.STATE_FILE || "data/state.md",
    port: num(env, "PORT", 3000),
    authToken: env.AUTH_TOKEN || "",
    telegram: {
      token: env.TELEGRAM_BOT_TOKEN || "",
      chatId: env.TELEGRAM_CHAT_ID || "",
    },
  };

  for (const name of ["NORMAL", "TURBO"] as const) {
    if (cfg.modes[name].tradeSize > cfg.risk.maxExposure) {
      throw new ConfigError(`${name} trade size ${cfg.modes[name].tradeSize} exceeds MAX_EXPOSURE ${cfg.risk.maxExposure}`);
    }
  }

  return Object.freeze(cfg);
}

// ─── Clients ───

export function createChainClient(rpcUrl: string, timeoutMs: number) {
  return createPublicClient({
    chain: base,
    transport: http(rpcUrl, { timeout: timeoutMs, retryCount: 1 }),
  });
}

export type ChainClient = ReturnType<typeof createChainClient>;

export function getAccount(env: Env = process.env) {
  const mnemonic = env.MNEMONIC;
  if (mnemonic) {
    return mnemonicToAccount(mnemonic);
  }

  const key = env.PRIVATE_KEY;
  if (key) {
    const hex = key.startsWith("0x") ? key : `0x${key}`;
    if (!/^0x[0-9a-fA-F]{64}$/.test(hex)) throw new ConfigError("PRIVATE_KEY must be 32 bytes of hex");
    return privateKeyToAccount(`0x${hex.slice(2)}`);
  }

  throw new ConfigError("Set MNEMONIC or PRIVATE_KEY in .env");
}

export type SignerAccount = ReturnType<typeof getAccount>;

export function createSignerClient(account: SignerAccount, rpcUrl: string, timeoutMs: number) {
  return createWalletClient({
    account,
    chain: base,
    transport: http(rpcUrl, { timeout: timeoutMs, retryCount: 0 }),
  });
}

export type SignerClient = ReturnType<typeof createSignerClient>;
