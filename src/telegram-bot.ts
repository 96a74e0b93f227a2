import { Bot, GrammyError } from "grammy";
import { isAddress } from "viem";
import { ConfigError, errorMessage } from "./errors.js";
import { describeTakeProfit, parseTakeProfit } from "./trading/modes.js";
import type { StrategyEngine } from "./trading/engine.js";
import { realizedPnl, unrealizedPnl } from "./trading/position.js";
import type { Position } from "./trading/types.js";
import { formatDuration, formatEth, formatPct, shortAddr } from "./utils.js";

export interface Command {
  description: string;
  usage?: string;
  run(args: string[]): Promise<string> | string;
}

export type CommandTable = Record<string, Command>;

// ─── Formatting ───

const STATUS_ICON: Record<Position["status"], string> = {
  OPEN: "🟢",
  PARTIAL: "🟡",
  CLOSED: "⚪",
};

export function describePosition(pos: Position): string {
  const pnl = pos.status === "CLOSED" ? realizedPnl(pos) : unrealizedPnl(pos);
  const pnlPct = pos.entrySize > 0 ? pnl / pos.entrySize : 0;
  const fired = pos.triggered.filter(Boolean).length;
  const lines = [
    `${STATUS_ICON[pos.status]} \`${pos.id}\` *${pos.symbol}* ${shortAddr(pos.token)}`,
    `  ${formatEth(pos.entrySize)} ETH @ ${pos.entryPrice.toPrecision(4)} → ${pos.lastPrice.toPrecision(4)} (${formatPct(pnlPct)})`,
  ];
  if (pos.status === "CLOSED") {
    lines.push(`  Closed: ${pos.closeReason ?? "?"} | P&L ${formatEth(pnl)} ETH`);
  } else {
    const flags = [pos.pendingClose ? ` | closing (${pos.pendingClose})` : "", pos.pendingSell ? " | sell unconfirmed" : ""].join("");
    lines.push(`  Stop ${pos.stopPrice.toPrecision(4)} | TP ${fired}/${pos.takeProfit.length}${flags}`);
  }
  return lines.join("\n");
}

function parsePercent(raw: string | undefined, label: string): number {
  const n = Number((raw ?? "").replace(/%$/, ""));
  if (!raw || !Number.isFinite(n)) throw new ConfigError(`${label} must be a number like 12 (percent)`);
  return n / 100;
}

function parseNumber(raw: string | undefined, label: string): number {
  const n = Number(raw);
  if (!raw || !Number.isFinite(n)) throw new ConfigError(`${label} must be a number`);
  return n;
}

function requireToken(raw: string | undefined): `0x${string}` {
  if (!raw || !isAddress(raw)) throw new ConfigError("Give a token address (0x...)");
  return raw;
}

// ─── Commands ───

/** Every chat command maps to one engine operation. */
export function createCommandTable(engine: StrategyEngine): CommandTable {
  const table: CommandTable = {
    status: {
      description: "Engine state and mode",
      run: () => {
        const s = engine.status();
        return [
          `*Sniper* ${s.state} | ${s.mode.name}`,
          `Positions: ${s.openPositions}/${s.mode.maxPositions} (+${s.pendingEntries} pending)`,
          `Exposure: ${formatEth(s.exposure)} / ${formatEth(s.maxExposure)} ETH`,
          `Risk: ${s.riskLevel}`,
          s.startedAt ? `Uptime: ${formatDuration(Date.now() - s.startedAt)}` : "Not started",
        ].join("\n");
      },
    },
    balance: {
      description: "Wallet balances",
      run: async () => {
        const b = await engine.balance();
        return `*Wallet*\nETH: ${formatEth(b.native)}\nWETH: ${formatEth(b.wrapped)}\nIn positions: ${formatEth(b.exposure)}`;
      },
    },
    positions: {
      description: "Open and recent positions",
      run: () => {
        const all = engine.positions().slice(0, 10);
        if (all.length === 0) return "No positions";
        return ["*Positions*", "", ...all.map(describePosition)].join("\n");
      },
    },
    stats: {
      description: "Performance statistics",
      run: () => {
        const { risk, unrealizedPnl: unrealized } = engine.stats();
        return [
          "*Stats*",
          `Trades: ${risk.totalTrades} (${risk.wins}W / ${risk.losses}L, ${(risk.winRate * 100).toFixed(0)}%)`,
          `Realized: ${formatEth(risk.realizedPnl)} ETH | Unrealized: ${formatEth(unrealized)} ETH`,
          `24h: ${risk.trades24h} closes, ${formatEth(risk.pnl24h)} ETH`,
          `Profit factor: ${risk.profitFactor === null ? "n/a" : risk.profitFactor.toFixed(2)} | Max DD: ${formatEth(risk.maxDrawdown)}`,
          `Loss streak: ${risk.lossStreak}${risk.cooldownUntil ? ` | cooling down (${risk.cooldownReason})` : ""}`,
        ].join("\n");
      },
    },
    config: {
      description: "Active mode settings",
      run: () => {
        const m = engine.activeMode;
        return [
          `*${m.name}*`,
          `Trade size: ${m.tradeSize} ETH`,
          `Take profit: ${describeTakeProfit(m.takeProfit)}`,
          `Stop loss: ${(m.stopLossPct * 100).toFixed(1)}% | Trailing: ${(m.trailingStopPct * 100).toFixed(1)}%`,
          `Max positions: ${m.maxPositions} | Slippage: ${m.maxSlippageBps} bps`,
        ].join("\n");
      },
    },
    snipe: {
      description: "Start or resume sniping",
      run: () => {
        if (!engine.resume()) engine.start();
        return `🎯 Sniping (${engine.engineState}, ${engine.activeMode.name})`;
      },
    },
    stop: {
      description: "Stop new entries (exits keep running)",
      run: () => (engine.pause() ? "⏸️ Entries stopped, exits still managed" : `Already ${engine.engineState}`),
    },
    resume: {
      description: "Resume entries",
      run: () => (engine.resume() ? "▶️ Resumed" : `Cannot resume from ${engine.engineState}`),
    },
    emergency: {
      description: "Sell everything and stop",
      run: async () => {
        const closed = await engine.emergencyStop();
        const left = engine.positions().filter((p) => p.status !== "CLOSED").length;
        return `🛑 Emergency stop: ${closed} closed${left > 0 ? `, ${left} still closing` : ""}`;
      },
    },
    turbo: {
      description: "Switch to TURBO",
      run: async () => `⚡ Mode ${(await engine.setMode("TURBO")).name}`,
    },
    normal: {
      description: "Switch to NORMAL",
      run: async () => `Mode ${(await engine.setMode("NORMAL")).name}`,
    },
    analyze: {
      description: "Screen a token without buying",
      usage: "analyze <token>",
      run: async ([raw]) => {
        const a = await engine.analyze(requireToken(raw));
        const v = a.verdict;
        const lines = [
          `${v.pass ? "✅" : "🚫"} *${v.token.symbol}* score ${v.score}/100${a.tokenClass ? ` (${a.tokenClass})` : ""}`,
          `Liquidity: ${formatEth(a.candidate.liquidity)} ETH via ${a.candidate.routeId}`,
          `Price: ${a.price === null ? "no route" : `${a.price.toPrecision(6)} ETH`}`,
        ];
        if (v.hardFails.length > 0) lines.push(`Hard fails: ${v.hardFails.join(", ")}`);
        lines.push(...v.reasons.map((r) => `• ${r}`));
        return lines.join("\n");
      },
    },
    price: {
      description: "Current sell price of one token",
      usage: "price <token>",
      run: async ([raw]) => {
        const a = await engine.analyze(requireToken(raw));
        return a.price === null ? "No route can price this token" : `${a.verdict.token.symbol}: ${a.price.toPrecision(6)} ETH`;
      },
    },
    set_trade_size: {
      description: "Trade size in ETH",
      usage: "set_trade_size <eth>",
      run: ([raw]) => `Trade size ${engine.setTradeSize(parseNumber(raw, "Trade size")).tradeSize} ETH`,
    },
    set_stop_loss: {
      description: "Initial stop in percent",
      usage: "set_stop_loss <pct>",
      run: ([raw]) => `Stop loss ${(engine.setStopLoss(parsePercent(raw, "Stop loss")).stopLossPct * 100).toFixed(1)}%`,
    },
    set_take_profit: {
      description: "Levels as sell%@gain%",
      usage: "set_take_profit 25@25,25@50,50@100",
      run: ([raw]) => {
        if (!raw) throw new ConfigError("Give levels like 25@25,25@50");
        return `Take profit ${describeTakeProfit(engine.setTakeProfit(parseTakeProfit(raw)).takeProfit)}`;
      },
    },
    set_max_positions: {
      description: "Concurrent positions",
      usage: "set_max_positions <n>",
      run: ([raw]) => `Max positions ${engine.setMaxPositions(parseNumber(raw, "Max positions")).maxPositions}`,
    },
    close: {
      description: "Sell one position now",
      usage: "close <id>",
      run: async ([id]) => {
        if (!id) throw new ConfigError("Give a position id");
        const pos = await engine.closePosition(id);
        return pos.status === "CLOSED"
          ? `Closed \`${pos.id}\` (${formatEth(realizedPnl(pos))} ETH)`
          : `Sell for \`${pos.id}\` failed, retrying on the next exit check`;
      },
    },
  };

  table.pause = table.stop;
  table.check = table.analyze;
  table.report = {
    description: "Status and stats together",
    run: async () => `${await table.status.run([])}\n\n${await table.stats.run([])}`,
  };
  table.mode = {
    description: "Switch mode",
    usage: "mode <normal|turbo>",
    run: async ([name]) => {
      if (!name) return `Mode ${engine.activeMode.name}`;
      return `Mode ${(await engine.setMode(name)).name}`;
    },
  };
  table.help = {
    description: "Show all commands",
    run: () => ["*Sniper commands*", "", ...Object.entries(table).map(([name, c]) => `\`${c.usage ?? name}\` ${c.description}`)].join("\n"),
  };
  table.start = table.help;
  return table;
}

/** Route one line of chat text. Unknown commands get a hint, bad input throws. */
export async function handleCommand(table: CommandTable, raw: string): Promise<string> {
  const parts = raw.trim().split(/\s+/);
  const cmd = parts[0].replace(/^\//, "").replace(/@\w+$/, "").toLowerCase();
  const command = Object.hasOwn(table, cmd) ? table[cmd] : undefined;
  if (!command) return `Unknown command: ${cmd}\nSend \`help\` for available commands.`;
  return command.run(parts.slice(1));
}

// ─── Bot ───

export function startTelegramBot(engine: StrategyEngine, token: string, chatId: string): Bot | null {
  if (!token) {
    console.log("[telegram] No TELEGRAM_BOT_TOKEN, bot disabled");
    return null;
  }

  const bot = new Bot(token);
  const table = createCommandTable(engine);

  const allowed = (id: number | undefined) => !chatId || String(id) === chatId;

  bot.api
    .setMyCommands(Object.entries(table).map(([command, c]) => ({ command, description: c.description })))
    .catch((err: unknown) => console.error("[telegram] setMyCommands failed:", errorMessage(err)));

  for (const name of Object.keys(table)) {
    bot.command(name, async (ctx) => {
      if (!allowed(ctx.chat?.id)) return;
      try {
        const reply = await handleCommand(table, ctx.match ? `${name} ${ctx.match}` : name);
        await ctx.reply(reply, { parse_mode: "Markdown" });
      } catch (err) {
        await ctx.reply(`Error: ${errorMessage(err)}`);
      }
    });
  }

  // Plain text works like a slash command
  bot.on("message:text", async (ctx) => {
    const raw = ctx.message.text.trim();
    if (raw.startsWith("/") || !allowed(ctx.chat.id)) return;
    try {
      await ctx.reply(await handleCommand(table, raw), { parse_mode: "Markdown" });
    } catch (err) {
      await ctx.reply(`Error: ${errorMessage(err)}`);
    }
  });

  bot.catch((err) => {
    console.error("[telegram] Bot error:", errorMessage(err.error));
  });

  // Start with retry: during deploys, old and new instances overlap briefly
  async function startWithRetry(attempts = 5): Promise<void> {
    for (let i = 0; i < attempts; i++) {
      try {
        await bot.start({
          onStart: () => console.log("[telegram] Bot polling started"),
        });
        return;
      } catch (err) {
        if (err instanceof GrammyError && err.error_code === 409 && i < attempts - 1) {
          const delay = (i + 1) * 3000;
          console.log(`[telegram] Conflict with other instance, retrying in ${delay / 1000}s...`);
          await new Promise((r) => setTimeout(r, delay));
        } else {
          console.error("[telegram] Bot start failed:", errorMessage(err));
          return;
        }
      }
    }
  }

  startWithRetry().catch((err: unknown) => console.error("[telegram] Bot stopped:", errorMessage(err)));
  return bot;
}
