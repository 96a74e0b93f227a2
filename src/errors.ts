import {
  BaseError,
  ContractFunctionRevertedError,
  ExecutionRevertedError as RpcExecutionRevertedError,
  HttpRequestError,
  TimeoutError,
} from "viem";
import type { Hash } from "viem";
import type { PendingSwap } from "./dex/types.js";

/**
 * Base application error. Every failure the engine reasons about carries a
 * stable `code` so adapters can branch without string matching.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Transient RPC / HTTP failure. Retried with backoff by the pollers. */
export class NetworkError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "NETWORK_ERROR", cause);
  }
}

/** Credentials rejected by the RPC provider. Fatal. */
export class AuthError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "AUTH_ERROR", cause);
  }
}

export class ConfigError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIG_ERROR", cause);
  }
}

/** The state file exists but cannot be trusted. Fatal at start-up. */
export class PersistenceError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "PERSISTENCE_ERROR", cause);
  }
}

export class QuoteUnavailableError extends AppError {
  constructor(
    message: string,
    public readonly routeId?: string,
    cause?: unknown,
  ) {
    super(message, "QUOTE_UNAVAILABLE", cause);
  }
}

export class SlippageExceededError extends AppError {
  constructor(
    public readonly priceImpactBps: number,
    public readonly maxSlippageBps: number,
  ) {
    super(`Price impact ${priceImpactBps}bps exceeds ${maxSlippageBps}bps`, "SLIPPAGE_EXCEEDED");
  }
}

export class GasPriceExceededError extends AppError {
  constructor(
    public readonly gasPriceGwei: number,
    public readonly maxGasPriceGwei: number,
  ) {
    super(`Gas price ${gasPriceGwei.toFixed(3)} gwei above ${maxGasPriceGwei} gwei`, "GAS_PRICE_EXCEEDED");
  }
}

export class ExecutionRevertedError extends AppError {
  constructor(
    message: string,
    public readonly txHash?: Hash,
    cause?: unknown,
  ) {
    super(message, "EXECUTION_REVERTED", cause);
  }
}

/** Request cancelled before anything was broadcast. */
export class ExecutionAbortedError extends AppError {
  constructor(message = "Execution aborted before broadcast") {
    super(message, "EXECUTION_ABORTED");
  }
}

/**
 * A transaction was broadcast but its outcome could not be confirmed in time.
 * It may still land, so no other route may be tried for the same request.
 * The aggregator fills in `swap` so the caller can keep waiting on it.
 */
export class ExecutionPendingError extends AppError {
  constructor(
    public readonly txHash: Hash,
    cause?: unknown,
    public readonly swap?: PendingSwap,
  ) {
    super(`Transaction ${txHash} broadcast but not confirmed`, "EXECUTION_PENDING", cause);
  }
}

export type AttemptReason =
  | "QUOTE_FAILED"
  | "SLIPPAGE_EXCEEDED"
  | "GAS_PRICE_EXCEEDED"
  | "EXECUTION_REVERTED"
  | "NETWORK";

export interface RouteAttempt {
  routeId: string;
  reason: AttemptReason;
  message: string;
}

function summarizeAttempts(attempts: RouteAttempt[]): string {
  if (attempts.length === 0) return "no routes";
  return attempts.map((a) => `${a.routeId}: ${a.reason}`).join(", ");
}

export class RoutesExhaustedError extends AppError {
  constructor(public readonly attempts: RouteAttempt[]) {
    super(`All routes failed (${summarizeAttempts(attempts)})`, "ROUTES_EXHAUSTED");
  }
}

export class InsufficientBalanceError extends AppError {
  constructor(
    public readonly required: number,
    public readonly available: number,
  ) {
    super(`Insufficient balance: need ${required}, have ${available}`, "INSUFFICIENT_BALANCE");
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof BaseError) return err.shortMessage;
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Map a raw viem / fetch failure onto the error taxonomy. AppErrors pass
 * through untouched.
 */
export function classifyRpcError(err: unknown, context: string): AppError {
  if (err instanceof AppError) return err;

  if (err instanceof BaseError) {
    const http = err.walk((e) => e instanceof HttpRequestError);
    if (http instanceof HttpRequestError && (http.status === 401 || http.status === 403)) {
      return new AuthError(`${context}: RPC rejected credentials (HTTP ${http.status})`, err);
    }
    if (err.walk((e) => e instanceof ContractFunctionRevertedError || e instanceof RpcExecutionRevertedError)) {
      return new ExecutionRevertedError(`${context}: ${err.shortMessage}`, undefined, err);
    }
    if (err.walk((e) => e instanceof TimeoutError)) {
      return new NetworkError(`${context}: request timed out`, err);
    }
    return new NetworkError(`${context}: ${err.shortMessage}`, err);
  }

  return new NetworkError(`${context}: ${errorMessage(err)}`, err);
}

/** Auth and config failures stop the process; everything else is retried or dropped. */
export function isFatal(err: unknown): boolean {
  return err instanceof AuthError || err instanceof ConfigError || err instanceof PersistenceError;
}
