import { formatUnits, parseUnits } from "viem";
import { NetworkError, errorMessage } from "./errors.js";

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

/**
 * Race a promise against a deadline. The timer is always cleared so a
 * settled call leaves nothing behind on the event loop.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new NetworkError(`${label} timed out after ${ms}ms`)), ms);
  });
  try {
    return await Promise.race([promise, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/** base · 2^failures, capped. */
export function backoffDelay(failures: number, baseMs: number, maxMs: number): number {
  if (failures <= 0) return 0;
  return Math.min(maxMs, baseMs * 2 ** (failures - 1));
}

// ─── Amount conversion ───

/**
 * Native-unit decimal to wei. Goes through the shortest 15-digit form so
 * binary noise (0.4 -> 0.400000000000000022) never reaches the integer.
 */
export function toWei(amount: number, decimals = 18): bigint {
  if (!Number.isFinite(amount) || amount < 0) throw new RangeError(`Invalid amount: ${amount}`);
  const [mantissa, exponent] = amount.toPrecision(15).split("e");
  const places = decimals + (exponent === undefined ? 0 : Number(exponent));
  // below one base unit
  if (places < 0) return 0n;
  return parseUnits(mantissa, places);
}

export function fromWei(raw: bigint, decimals = 18): number {
  return Number(formatUnits(raw, decimals));
}

/** Native units paid (or received) per whole token. */
export function unitPrice(nativeRaw: bigint, tokenRaw: bigint, tokenDecimals: number): number {
  if (tokenRaw === 0n) return 0;
  return fromWei(nativeRaw) / fromWei(tokenRaw, tokenDecimals);
}

// ─── Formatting ───

export function formatEth(n: number): string {
  if (n === 0) return "0";
  if (Math.abs(n) >= 1) return n.toFixed(4);
  return n.toFixed(6);
}

export function formatPct(fraction: number): string {
  const pct = fraction * 100;
  return `${pct >= 0 ? "+" : ""}${pct.toFixed(1)}%`;
}

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  if (seconds <= 0) return "0s";
  const d = Math.floor(seconds / 86400);
  const h = Math.floor((seconds % 86400) / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  const s = seconds % 60;
  const parts: string[] = [];
  if (d > 0) parts.push(`${d}d`);
  if (h > 0) parts.push(`${h}h`);
  if (m > 0) parts.push(`${m}m`);
  if (s > 0 && d === 0) parts.push(`${s}s`);
  return parts.join(" ");
}

export function shortAddr(a: string): string {
  return a.length > 14 ? a.slice(0, 6) + ".." + a.slice(-4) : a;
}

export function baseScanTxUrl(txHash: string): string {
  return `https://basescan.org/tx/${txHash}`;
}

// ─── Poll loops ───

export interface PollHandle {
  stop(): void;
  readonly running: boolean;
}

/**
 * Run `tick` forever on a setTimeout chain so ticks never overlap. The first
 * tick fires after one interval. A tick may return a delay to use instead of
 * the interval (backoff). Interval is re-read every tick so mode switches
 * take effect without a restart.
 */
export function startPolling(
  tag: string,
  intervalMs: () => number,
  tick: () => Promise<number | void>,
): PollHandle {
  let timer: ReturnType<typeof setTimeout> | null = null;
  let running = true;

  const schedule = (delay: number) => {
    if (!running) return;
    timer = setTimeout(run, delay);
  };

  const run = () => {
    timer = null;
    tick().then(
      (delay) => schedule(typeof delay === "number" ? delay : intervalMs()),
      (err: unknown) => {
        console.error(`[${tag}] Tick failed:`, errorMessage(err));
        schedule(intervalMs());
      },
    );
  };

  schedule(intervalMs());

  return {
    stop() {
      running = false;
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
    },
    get running() {
      return running;
    },
  };
}
