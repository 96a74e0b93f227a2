import type { Address } from "viem";
import { errorMessage } from "./errors.js";
import type { RiskLevel } from "./trading/risk-manager.js";
import type { CloseReason, EngineState } from "./trading/types.js";
import { formatEth, formatPct, shortAddr } from "./utils.js";

// ─── Events ───

export type EngineEvent =
  | { type: "position_opened"; positionId: string; token: Address; symbol: string; size: number; price: number; routeId: string; txHash: string }
  | { type: "position_partial"; positionId: string; symbol: string; level: number; threshold: number; proceeds: number; txHash: string | null }
  | { type: "position_closed"; positionId: string; symbol: string; reason: CloseReason; pnl: number; pnlPct: number }
  | { type: "risk_level_changed"; from: RiskLevel; to: RiskLevel; reason: string }
  | { type: "execution_failed"; token: Address; side: "buy" | "sell"; positionId: string | null; message: string }
  | { type: "candidate_rejected"; token: Address; symbol: string; score: number; reasons: string[] }
  | { type: "engine_state"; from: EngineState; to: EngineState };

export interface AlertSink {
  emit(event: EngineEvent): void;
}

export function formatEvent(event: EngineEvent): string {
  switch (event.type) {
    case "position_opened":
      return `🟢 *Bought ${event.symbol}* #${event.positionId}\n${formatEth(event.size)} ETH @ ${event.price.toPrecision(6)} via ${event.routeId}`;
    case "position_partial":
      return `💰 *${event.symbol}* #${event.positionId} take-profit ${event.level + 1} (${formatPct(event.threshold)}) → ${formatEth(event.proceeds)} ETH`;
    case "position_closed": {
      const icon = event.pnl >= 0 ? "✅" : "🔴";
      return `${icon} *Closed ${event.symbol}* #${event.positionId} (${event.reason})\nP&L ${formatEth(event.pnl)} ETH (${formatPct(event.pnlPct)})`;
    }
    case "risk_level_changed":
      return `⚠️ Risk level ${event.from} → *${event.to}*: ${event.reason}`;
    case "execution_failed":
      return `❌ ${event.side} ${shortAddr(event.token)} failed${event.positionId ? ` (#${event.positionId})` : ""}: ${event.message}`;
    case "candidate_rejected":
      return `🚫 ${event.symbol} ${shortAddr(event.token)} rejected (score ${event.score}): ${event.reasons.slice(0, 3).join("; ")}`;
    case "engine_state":
      return `⚙️ Engine ${event.from} → *${event.to}*`;
  }
}

// ─── Sinks ───

export class ConsoleAlertSink implements AlertSink {
  emit(event: EngineEvent): void {
    console.log(`[alert] ${event.type}: ${formatEvent(event).replace(/\*/g, "")}`);
  }
}

/** Rejections are noisy; only the rest goes to the chat unless asked. */
const QUIET_EVENTS = new Set<EngineEvent["type"]>(["candidate_rejected"]);

export interface TelegramSinkOptions {
  token: string;
  chatId: string;
  includeRejections?: boolean;
  fetchImpl?: typeof fetch;
}

export class TelegramAlertSink implements AlertSink {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: TelegramSinkOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  get enabled(): boolean {
    return this.options.token !== "" && this.options.chatId !== "";
  }

  emit(event: EngineEvent): void {
    if (!this.enabled) return;
    if (QUIET_EVENTS.has(event.type) && !this.options.includeRejections) return;
    this.send(formatEvent(event)).catch((err: unknown) => {
      console.error("[notify] Telegram send failed:", errorMessage(err));
    });
  }

  /** Send a Telegram message via Bot API HTTP POST. */
  async send(text: string): Promise<void> {
    if (!this.enabled) return;
    const url = `https://api.telegram.org/bot${this.options.token}/sendMessage`;
    const res = await this.fetchImpl(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        chat_id: this.options.chatId,
        text,
        parse_mode: "Markdown",
      }),
    });
    if (!res.ok) {
      const body = await res.text();
      console.error("[notify] Telegram API error:", res.status, body);
    }
  }
}

/** Fan one event out to several sinks; a failing sink does not stop the rest. */
export class MultiAlertSink implements AlertSink {
  constructor(private readonly sinks: AlertSink[]) {}

  emit(event: EngineEvent): void {
    for (const sink of this.sinks) {
      try {
        sink.emit(event);
      } catch (err) {
        console.error(`[notify] Sink failed on ${event.type}:`, errorMessage(err));
      }
    }
  }
}

/** Collects events in memory. */
export class MemoryAlertSink implements AlertSink {
  readonly events: EngineEvent[] = [];

  emit(event: EngineEvent): void {
    this.events.push(event);
  }

  ofType<T extends EngineEvent["type"]>(type: T): Extract<EngineEvent, { type: T }>[] {
    return this.events.filter((e): e is Extract<EngineEvent, { type: T }> => e.type === type);
  }
}
