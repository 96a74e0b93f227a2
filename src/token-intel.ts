import { erc20Abi, toFunctionSelector, zeroAddress, type Address } from "viem";
import type { ChainClient, IntelConfig } from "./config.js";
import { tokenPrivilegeAbi } from "./dex/abis.js";
import { NetworkError, classifyRpcError, errorMessage } from "./errors.js";

/**
 * Everything the screener knows about a token. `null` means the source could
 * not tell; the screener penalises unknowns rather than guessing.
 */
export interface TokenIntel {
  address: Address;
  name: string;
  symbol: string;
  decimals: number;
  totalSupply: bigint;
  holderCount: number | null;
  buyTaxPct: number | null;   // 0.02 = 2%
  sellTaxPct: number | null;
  topHolderPct: number | null;
  verified: boolean | null;
  createdAt: number | null;   // ms
  ownerRenounced: boolean | null;
  canMint: boolean | null;
  canBlacklist: boolean | null;
  canPause: boolean | null;
  liquidityLocked: boolean | null;
  isHoneypot: boolean | null;
}

export interface TokenIntelSource {
  getIntel(token: Address, pool: Address | null): Promise<TokenIntel>;
}

type ApiIntel = Pick<
  TokenIntel,
  "holderCount" | "buyTaxPct" | "sellTaxPct" | "topHolderPct" | "createdAt" | "liquidityLocked" | "isHoneypot"
>;

// Privileged functions looked for in deployed bytecode.
const MINT_SELECTORS = [
  "function mint(address,uint256)",
  "function mint(uint256)",
  "function _mint(address,uint256)",
].map((sig) => toFunctionSelector(sig).slice(2));

const BLACKLIST_SELECTORS = [
  "function blacklist(address)",
  "function addToBlacklist(address)",
  "function setBlacklist(address,bool)",
  "function addBot(address)",
  "function setBots(address[],bool)",
].map((sig) => toFunctionSelector(sig).slice(2));

const PAUSE_SELECTORS = [
  "function pause()",
  "function setTradingEnabled(bool)",
].map((sig) => toFunctionSelector(sig).slice(2));

const DEAD_ADDRESSES = new Set([zeroAddress, "0x000000000000000000000000000000000000dead"]);

function hasAnySelector(code: string, selectors: string[]): boolean {
  // PUSH4 <selector> in the dispatcher
  return selectors.some((s) => code.includes(`63${s}`));
}

// ─── Untyped JSON access ───

function pick(obj: unknown, ...path: string[]): unknown {
  let cur = obj;
  for (const key of path) {
    if (typeof cur !== "object" || cur === null || !(key in cur)) return undefined;
    cur = Reflect.get(cur, key);
  }
  return cur;
}

function numberOrNull(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value))) return Number(value);
  return null;
}

function boolOrNull(value: unknown): boolean | null {
  return typeof value === "boolean" ? value : null;
}

async function fetchJson(url: string, timeoutMs: number): Promise<unknown> {
  const res = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
  if (!res.ok) throw new NetworkError(`${new URL(url).host} returned HTTP ${res.status}`);
  return res.json();
}

/**
 * On-chain reads (metadata, owner, bytecode privileges) merged with the
 * honeypot.is simulation and the explorer's verification flag. HTTP sources
 * are best effort: a failure leaves their fields unknown.
 */
export class OnchainTokenIntel implements TokenIntelSource {
  constructor(
    private readonly client: ChainClient,
    private readonly config: IntelConfig,
    private readonly chainId: number,
  ) {}

  async getIntel(token: Address, pool: Address | null): Promise<TokenIntel> {
    const base = await this.readOnchain(token);
    const [honeypot, verified] = await Promise.all([
      this.readHoneypotApi(token, pool),
      this.readVerification(token),
    ]);
    return { ...base, ...honeypot, verified };
  }

  private async readOnchain(token: Address): Promise<Omit<TokenIntel, keyof ApiIntel | "verified">> {
    try {
      const [name, symbol, decimals, totalSupply, code] = await Promise.all([
        this.client.readContract({ address: token, abi: erc20Abi, functionName: "name" }),
        this.client.readContract({ address: token, abi: erc20Abi, functionName: "symbol" }),
        this.client.readContract({ address: token, abi: erc20Abi, functionName: "decimals" }),
        this.client.readContract({ address: token, abi: erc20Abi, functionName: "totalSupply" }),
        this.client.getCode({ address: token }),
      ]);

      let ownerRenounced: boolean | null = null;
      try {
        const owner = await this.client.readContract({ address: token, abi: tokenPrivilegeAbi, functionName: "owner" });
        ownerRenounced = DEAD_ADDRESSES.has(owner.toLowerCase());
      } catch (err) {
        // Not Ownable at all: nobody can call owner-gated functions.
        console.log(`[intel] ${symbol} has no owner(): ${errorMessage(err).slice(0, 60)}`);
        ownerRenounced = true;
      }

      const bytecode = code ?? "0x";
      return {
        address: token,
        name,
        symbol,
        decimals,
        totalSupply,
        ownerRenounced,
        canMint: hasAnySelector(bytecode, MINT_SELECTORS),
        canBlacklist: hasAnySelector(bytecode, BLACKLIST_SELECTORS),
        canPause: hasAnySelector(bytecode, PAUSE_SELECTORS),
      };
    } catch (err) {
      throw classifyRpcError(err, `token metadata ${token}`);
    }
  }

  private async readHoneypotApi(token: Address, pool: Address | null): Promise<ApiIntel> {
    const unknown: ApiIntel = {
      holderCount: null,
      buyTaxPct: null,
      sellTaxPct: null,
      topHolderPct: null,
      createdAt: null,
      liquidityLocked: null,
      isHoneypot: null,
    };
    const params = new URLSearchParams({ address: token, chainID: String(this.chainId) });
    if (pool) params.set("pair", pool);
    try {
      const body = await fetchJson(`${this.config.honeypotApiUrl}?${params}`, this.config.timeoutMs);
      const buyTax = numberOrNull(pick(body, "simulationResult", "buyTax"));
      const sellTax = numberOrNull(pick(body, "simulationResult", "sellTax"));
      const createdAt = numberOrNull(pick(body, "pair", "createdAtTimestamp"));
      return {
        holderCount: numberOrNull(pick(body, "token", "totalHolders")),
        buyTaxPct: buyTax === null ? null : buyTax / 100,
        sellTaxPct: sellTax === null ? null : sellTax / 100,
        topHolderPct: null,
        createdAt: createdAt === null ? null : createdAt * 1000,
        liquidityLocked: null,
        isHoneypot: boolOrNull(pick(body, "honeypotResult", "isHoneypot")),
      };
    } catch (err) {
      console.error(`[intel] honeypot API failed for ${token}:`, errorMessage(err));
      return unknown;
    }
  }

  private async readVerification(token: Address): Promise<boolean | null> {
    if (!this.config.explorerApiKey) return null;
    const params = new URLSearchParams({
      module: "contract",
      action: "getsourcecode",
      address: token,
      apikey: this.config.explorerApiKey,
    });
    try {
      const body = await fetchJson(`${this.config.explorerApiUrl}?${params}`, this.config.timeoutMs);
      const result = pick(body, "result");
      if (!Array.isArray(result) || result.length === 0) return null;
      const source = pick(result[0], "SourceCode");
      return typeof source === "string" ? source.length > 0 : null;
    } catch (err) {
      console.error(`[intel] explorer verification failed for ${token}:`, errorMessage(err));
      return null;
    }
  }
}
