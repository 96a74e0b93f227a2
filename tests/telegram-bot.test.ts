import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { ConfigError } from "../src/errors.js";
import { createCommandTable, describePosition, handleCommand, type CommandTable } from "../src/telegram-bot.js";
import { TOKEN_A, candidate, makeHarness } from "./helpers.js";

describe("chat commands", () => {
  let h: ReturnType<typeof makeHarness>;
  let table: CommandTable;

  const send = (text: string) => handleCommand(table, text);

  beforeEach(() => {
    h = makeHarness();
    h.engine.start();
    table = createCommandTable(h.engine);
  });

  afterEach(() => {
    h.engine.stop();
  });

  it("accepts slash commands with a bot suffix", async () => {
    const lines = (await send("/status@SniperBot")).split("\n");
    assert.deepEqual(lines.slice(0, 4), [
      "*Sniper* RUNNING | NORMAL",
      "Positions: 0/2 (+0 pending)",
      "Exposure: 0 / 0.010000 ETH",
      "Risk: LOW",
    ]);
  });

  it("answers unknown commands with a hint", async () => {
    assert.equal(await send("frobnicate now"), "Unknown command: frobnicate\nSend `help` for available commands.");
    assert.equal(await send("constructor"), "Unknown command: constructor\nSend `help` for available commands.");
  });

  it("pauses entries and resumes them", async () => {
    assert.equal(await send("stop"), "⏸️ Entries stopped, exits still managed");
    assert.equal(await send("pause"), "Already PAUSED");
    assert.equal(h.engine.engineState, "PAUSED");
    assert.equal(await send("/resume"), "▶️ Resumed");
    assert.equal(await send("resume"), "Cannot resume from RUNNING");
  });

  it("switches modes", async () => {
    assert.equal(await send("turbo"), "⚡ Mode TURBO");
    assert.equal(await send("mode"), "Mode TURBO");
    assert.equal(await send("mode normal"), "Mode NORMAL");
    await assert.rejects(send("mode fast"), ConfigError);
  });

  it("updates the active mode settings", async () => {
    assert.equal(await send("set_trade_size 0.001"), "Trade size 0.001 ETH");
    assert.equal(await send("set_stop_loss 15"), "Stop loss 15.0%");
    assert.equal(await send("set_take_profit 50@50"), "Take profit 50%@+50%");
    assert.equal(await send("set_max_positions 4"), "Max positions 4");
    assert.equal(h.engine.activeMode.maxPositions, 4);

    await assert.rejects(send("set_stop_loss abc"), { message: "Stop loss must be a number like 12 (percent)" });
    await assert.rejects(send("set_trade_size"), { message: "Trade size must be a number" });
    await assert.rejects(send("set_take_profit"), { message: "Give levels like 25@25,25@50" });
  });

  it("lists and closes positions", async () => {
    assert.equal(await send("positions"), "No positions");

    h.market.set(TOKEN_A, 0.5);
    await h.engine.onCandidate(candidate(TOKEN_A, h.clock));
    const [pos] = h.engine.positions();
    assert.equal(
      describePosition(pos),
      ["🟢 `001` *DMOON* 0x1111..1111", "  0.000800 ETH @ 0.5000 → 0.5000 (+0.0%)", "  Stop 0.4400 | TP 0/4"].join("\n"),
    );

    assert.equal(await send("close 001"), "Closed `001` (0 ETH)");
    await assert.rejects(send("close"), { message: "Give a position id" });
  });

  it("runs the emergency stop", async () => {
    h.market.set(TOKEN_A, 0.5);
    await h.engine.onCandidate(candidate(TOKEN_A, h.clock));
    assert.equal(await send("emergency"), "🛑 Emergency stop: 1 closed");
    assert.equal(h.engine.engineState, "STOPPED");
    assert.equal(await send("snipe"), "🎯 Sniping (RUNNING, NORMAL)");
  });

  it("prices and screens tokens", async () => {
    h.market.set(TOKEN_A, 0.5);
    assert.equal(await send(`price ${TOKEN_A}`), "DMOON: 0.500000 ETH");
    await assert.rejects(send("check 0x123"), { message: "Give a token address (0x...)" });

    const lines = (await send(`analyze ${TOKEN_A}`)).split("\n");
    assert.equal(lines[0], "🚫 *DMOON* score 100/100 (memecoin)");
    assert.equal(lines[3], "Hard fails: LOW_LIQUIDITY");
  });

  it("shares handlers between aliases", () => {
    assert.equal(table.pause, table.stop);
    assert.equal(table.check, table.analyze);
    assert.equal(table.start, table.help);
  });

  it("lists every command in help", async () => {
    const help = await send("help");
    assert.ok(help.startsWith("*Sniper commands*\n\n"));
    assert.ok(help.split("\n").includes("`set_trade_size <eth>` Trade size in ETH"));
  });
});
