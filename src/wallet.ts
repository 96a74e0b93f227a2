import { generatePrivateKey, privateKeyToAccount } from "viem/accounts";
import {
  BaseError,
  HttpRequestError,
  TimeoutError,
  erc20Abi,
  keccak256,
  type Address,
  type Hash,
  type Hex,
} from "viem";
import type { ChainClient, SignerClient } from "./config.js";
import { ExecutionPendingError, classifyRpcError, errorMessage } from "./errors.js";
import { fromWei, sleep } from "./utils.js";

export interface WalletBalances {
  native: number;
  wrapped: number;
}

/** What the engine needs from a wallet: who we are and what we hold. */
export interface WalletService {
  readonly address: Address;
  getBalances(): Promise<WalletBalances>;
}

export interface PreparedTx {
  to: Address;
  data: Hex;
  value: bigint;
}

const GAS_ESTIMATE_ATTEMPTS = 3;

/**
 * Signs locally and broadcasts through the configured RPC. Gas is estimated
 * explicitly (with retries for post-approval RPC lag) plus a 20% buffer.
 */
export class ViemWallet implements WalletService {
  constructor(
    private readonly client: ChainClient,
    private readonly signer: SignerClient,
    private readonly wrappedToken: Address,
  ) {}

  get address(): Address {
    return this.signer.account.address;
  }

  async getBalances(): Promise<WalletBalances> {
    try {
      const [native, wrapped] = await Promise.all([
        this.client.getBalance({ address: this.address }),
        this.client.readContract({
          address: this.wrappedToken,
          abi: erc20Abi,
          functionName: "balanceOf",
          args: [this.address],
        }),
      ]);
      return { native: fromWei(native), wrapped: fromWei(wrapped) };
    } catch (err) {
      throw classifyRpcError(err, "getBalances");
    }
  }

  async estimateGas(tx: PreparedTx): Promise<bigint> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.client.estimateGas({ account: this.address, ...tx });
      } catch (err) {
        if (attempt >= GAS_ESTIMATE_ATTEMPTS) throw classifyRpcError(err, "estimateGas");
        console.log(`[wallet] Gas estimation failed (attempt ${attempt}/${GAS_ESTIMATE_ATTEMPTS}), retrying... (${errorMessage(err).slice(0, 60)})`);
        await sleep(attempt * 1_000);
      }
    }
  }

  /**
   * Sign locally, then broadcast. The hash is fixed before the request goes
   * out, so a broadcast that fails in a way a node may still have seen
   * becomes ExecutionPendingError. Anything else thrown here means nothing
   * reached the mempool.
   */
  async send(tx: PreparedTx, gas: bigint): Promise<Hash> {
    let serializedTransaction: Hex;
    try {
      const nonce = await this.client.getTransactionCount({ address: this.address, blockTag: "pending" });
      const request = await this.signer.prepareTransactionRequest({
        to: tx.to,
        data: tx.data,
        value: tx.value,
        gas: gas + gas / 5n,
        nonce,
      });
      serializedTransaction = await this.signer.signTransaction(request);
    } catch (err) {
      throw classifyRpcError(err, "signTransaction");
    }

    const hash = keccak256(serializedTransaction);
    try {
      await this.signer.sendRawTransaction({ serializedTransaction });
    } catch (err) {
      if (mayHaveBroadcast(err)) throw new ExecutionPendingError(hash, err);
      throw classifyRpcError(err, "sendRawTransaction");
    }
    return hash;
  }
}

/** A timeout or a dropped/5xx HTTP exchange says nothing about whether the node took the tx. */
export function mayHaveBroadcast(err: unknown): boolean {
  if (!(err instanceof BaseError)) return true;
  if (err.walk((e) => e instanceof TimeoutError)) return true;
  const http = err.walk((e) => e instanceof HttpRequestError);
  return http instanceof HttpRequestError && (http.status === undefined || http.status >= 500);
}

// ─── CLI helpers ───

export function generateWallet(): void {
  const privateKey = generatePrivateKey();
  const account = privateKeyToAccount(privateKey);
  console.log("New wallet generated:\n");
  console.log(`  Address:     ${account.address}`);
  console.log(`  Private Key: ${privateKey}`);
  console.log("\nAdd the private key to your .env file:");
  console.log(`  PRIVATE_KEY=${privateKey}`);
  console.log("\nFund this wallet with ETH on Base before starting the sniper.");
}

export async function showBalance(wallet: WalletService): Promise<void> {
  const balances = await wallet.getBalances();
  console.log(`Wallet: ${wallet.address}\n`);
  console.log(`  ETH:  ${balances.native}`);
  console.log(`  WETH: ${balances.wrapped}`);
}
