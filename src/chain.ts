import { erc20Abi, formatGwei, zeroAddress, type Address, type Hash, type Hex } from "viem";
import type { ChainClient } from "./config.js";
import { v2FactoryAbi, v3FactoryAbi } from "./dex/abis.js";
import type { DexRoute } from "./dex/types.js";
import { classifyRpcError } from "./errors.js";
import { fromWei } from "./utils.js";

export interface PoolCreation {
  routeId: string;
  token: Address;
  pool: Address;
  blockNumber: bigint;
  fee?: number;
}

export interface PendingTx {
  hash: Hash;
  from: Address;
  to: Address | null;
  input: Hex;
  value: bigint;
}

/** Read-only chain access used by discovery, screening and execution checks. */
export interface ChainDataProvider {
  getBlockNumber(): Promise<bigint>;
  /** New pools on `route` pairing some token with the base token. */
  getPoolCreations(route: DexRoute, fromBlock: bigint, toBlock: bigint): Promise<PoolCreation[]>;
  getPendingTransactions(): Promise<PendingTx[]>;
  /** Base token held by the pool, in native units. */
  getPoolLiquidity(pool: Address): Promise<number>;
  findPool(route: DexRoute, token: Address): Promise<Address | null>;
  getGasPriceGwei(): Promise<number>;
}

function sameAddress(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export class ViemChainData implements ChainDataProvider {
  constructor(
    private readonly client: ChainClient,
    private readonly baseToken: Address,
  ) {}

  async getBlockNumber(): Promise<bigint> {
    try {
      return await this.client.getBlockNumber({ cacheTime: 0 });
    } catch (err) {
      throw classifyRpcError(err, "getBlockNumber");
    }
  }

  async getPoolCreations(route: DexRoute, fromBlock: bigint, toBlock: bigint): Promise<PoolCreation[]> {
    try {
      if (route.protocol === "v2") {
        const logs = await this.client.getContractEvents({
          address: route.factory,
          abi: v2FactoryAbi,
          eventName: "PairCreated",
          fromBlock,
          toBlock,
        });
        const out: PoolCreation[] = [];
        for (const log of logs) {
          const { token0, token1, pair } = log.args;
          if (!token0 || !token1 || !pair) continue;
          const token = this.otherSide(token0, token1);
          if (token) out.push({ routeId: route.id, token, pool: pair, blockNumber: log.blockNumber });
        }
        return out;
      }

      const logs = await this.client.getContractEvents({
        address: route.factory,
        abi: v3FactoryAbi,
        eventName: "PoolCreated",
        fromBlock,
        toBlock,
      });
      const out: PoolCreation[] = [];
      for (const log of logs) {
        const { token0, token1, pool, fee } = log.args;
        if (!token0 || !token1 || !pool) continue;
        const token = this.otherSide(token0, token1);
        if (token) out.push({ routeId: route.id, token, pool, blockNumber: log.blockNumber, fee });
      }
      return out;
    } catch (err) {
      throw classifyRpcError(err, `${route.id} pool logs`);
    }
  }

  private otherSide(token0: Address, token1: Address): Address | null {
    if (sameAddress(token0, this.baseToken)) return token1;
    if (sameAddress(token1, this.baseToken)) return token0;
    return null;
  }

  async getPendingTransactions(): Promise<PendingTx[]> {
    try {
      const block = await this.client.getBlock({ blockTag: "pending", includeTransactions: true });
      return block.transactions.map((tx) => ({
        hash: tx.hash,
        from: tx.from,
        to: tx.to,
        input: tx.input,
        value: tx.value,
      }));
    } catch (err) {
      throw classifyRpcError(err, "pending block");
    }
  }

  async getPoolLiquidity(pool: Address): Promise<number> {
    try {
      const balance = await this.client.readContract({
        address: this.baseToken,
        abi: erc20Abi,
        functionName: "balanceOf",
        args: [pool],
      });
      return fromWei(balance);
    } catch (err) {
      throw classifyRpcError(err, "pool liquidity");
    }
  }

  async findPool(route: DexRoute, token: Address): Promise<Address | null> {
    try {
      if (route.protocol === "v2") {
        const pair = await this.client.readContract({
          address: route.factory,
          abi: v2FactoryAbi,
          functionName: "getPair",
          args: [token, this.baseToken],
        });
        return pair === zeroAddress ? null : pair;
      }

      // Deepest fee tier wins.
      let best: { pool: Address; liquidity: number } | null = null;
      for (const fee of route.feeTiers) {
        const pool = await this.client.readContract({
          address: route.factory,
          abi: v3FactoryAbi,
          functionName: "getPool",
          args: [token, this.baseToken, fee],
        });
        if (pool === zeroAddress) continue;
        const liquidity = await this.getPoolLiquidity(pool);
        if (!best || liquidity > best.liquidity) best = { pool, liquidity };
      }
      return best ? best.pool : null;
    } catch (err) {
      throw classifyRpcError(err, `${route.id} pool lookup`);
    }
  }

  async getGasPriceGwei(): Promise<number> {
    try {
      return Number(formatGwei(await this.client.getGasPrice()));
    } catch (err) {
      throw classifyRpcError(err, "gas price");
    }
  }
}
