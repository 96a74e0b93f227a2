#!/usr/bin/env node
import { Command } from "commander";
import { isAddress } from "viem";
import { generatePrivateKey, privateKeyToAccount } from "viem/accounts";
import { base } from "viem/chains";
import {
  createChainClient,
  createSignerClient,
  getAccount,
  loadConfig,
  type AppConfig,
  type SignerAccount,
} from "./config.js";
import { ViemChainData } from "./chain.js";
import { DexAggregator } from "./dex/aggregator.js";
import { createRouteClient } from "./dex/route-client.js";
import { DiscoveryMonitor } from "./discovery-monitor.js";
import { ConfigError, errorMessage, isFatal } from "./errors.js";
import { ConsoleAlertSink, MultiAlertSink, TelegramAlertSink } from "./notify.js";
import { StateFile } from "./persistence.js";
import { SecurityScreener } from "./security-screener.js";
import { startServer } from "./server.js";
import { startTelegramBot } from "./telegram-bot.js";
import { OnchainTokenIntel } from "./token-intel.js";
import { StrategyEngine } from "./trading/engine.js";
import { RiskManager } from "./trading/risk-manager.js";
import { ViemWallet, generateWallet, showBalance } from "./wallet.js";

// ─── Wiring ───

function buildEngine(cfg: AppConfig, account: SignerAccount, stateFile?: StateFile) {
  const client = createChainClient(cfg.rpcUrl, cfg.execution.rpcTimeoutMs);
  const signer = createSignerClient(account, cfg.rpcUrl, cfg.execution.rpcTimeoutMs);
  const wallet = new ViemWallet(client, signer, cfg.baseToken);
  const chain = new ViemChainData(client, cfg.baseToken);

  const routeDeps = {
    client,
    wallet,
    baseToken: cfg.baseToken,
    receiptTimeoutMs: cfg.execution.receiptTimeoutMs,
  };
  const aggregator = new DexAggregator(
    cfg.routes.map((route) => createRouteClient(route, routeDeps)),
    { quoteTimeoutMs: cfg.execution.rpcTimeoutMs, getGasPriceGwei: () => chain.getGasPriceGwei() },
  );

  const screener = new SecurityScreener(new OnchainTokenIntel(client, cfg.intel, base.id), aggregator, cfg.screener);
  const alerts = new MultiAlertSink([
    new ConsoleAlertSink(),
    new TelegramAlertSink({ token: cfg.telegram.token, chatId: cfg.telegram.chatId }),
  ]);

  const engine = new StrategyEngine({
    config: cfg,
    aggregator,
    screener,
    risk: new RiskManager(cfg.risk),
    wallet,
    alerts,
    stateFile,
  });
  return { engine, chain, wallet };
}

/** Quotes and screening need no key; fall back to a throwaway address. */
function readOnlyAccount(): SignerAccount {
  try {
    return getAccount();
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    console.log("[cli] No key configured, using a throwaway address for quotes");
    return privateKeyToAccount(generatePrivateKey());
  }
}

// ─── CLI ───

const program = new Command();

program
  .name("base-sniper")
  .description("New-listing sniper for Base DEXes")
  .version("0.1.0");

program
  .command("run")
  .description("Start discovery, trading, the HTTP API and the Telegram bot")
  .option("-p, --port <port>", "API port (defaults to PORT)")
  .option("--paused", "Start with entries paused")
  .action((opts: { port?: string; paused?: boolean }) => {
    process.on("uncaughtException", (err) => {
      console.error("[FATAL] Uncaught exception:", err);
    });
    process.on("unhandledRejection", (err) => {
      console.error("[FATAL] Unhandled rejection:", err);
    });

    const cfg = loadConfig();
    const stateFile = new StateFile(cfg.stateFile);
    const { engine, chain } = buildEngine(cfg, getAccount(), stateFile);

    const discovery = new DiscoveryMonitor({
      chain,
      routes: cfg.routes,
      baseToken: cfg.baseToken,
      config: cfg.discovery,
      mempoolIntervalMs: () => engine.activeMode.mempoolIntervalMs,
      onCandidate: (candidate) => engine.onCandidate(candidate),
      onFatal: (err) => shutdown(`discovery failed: ${err.message}`, 1),
      isTracked: (token) => engine.isHolding(token),
    });
    engine.attachFeed(discovery);

    // A corrupt state file stops start-up here.
    engine.restore(stateFile.load());

    const port = opts.port ? Number(opts.port) : cfg.port;
    const server = startServer(engine, { authToken: cfg.authToken, port });
    const bot = startTelegramBot(engine, cfg.telegram.token, cfg.telegram.chatId);

    engine.start();
    if (opts.paused) engine.pause();

    let stopping = false;
    function shutdown(reason: string, code: number): void {
      if (stopping) return;
      stopping = true;
      console.log(`[boot] Shutting down: ${reason}`);
      engine.stop();
      stateFile.close();
      server.close();
      const done = () => process.exit(code);
      if (bot) {
        bot.stop().then(done, (err: unknown) => {
          console.error("[telegram] Stop failed:", errorMessage(err));
          done();
        });
      } else {
        done();
      }
    }

    process.once("SIGINT", () => shutdown("SIGINT", 0));
    process.once("SIGTERM", () => shutdown("SIGTERM", 0));
  });

program
  .command("analyze <token>")
  .description("Screen and price a token without trading")
  .action(async (token: string) => {
    if (!isAddress(token)) throw new ConfigError(`Not an address: ${token}`);
    const cfg = loadConfig();
    const { engine, chain } = buildEngine(cfg, readOnlyAccount());
    engine.attachFeed(
      new DiscoveryMonitor({
        chain,
        routes: cfg.routes,
        baseToken: cfg.baseToken,
        config: cfg.discovery,
        mempoolIntervalMs: () => engine.activeMode.mempoolIntervalMs,
        onCandidate: async () => {},
        onFatal: (err) => console.error("[discovery]", err.message),
      }),
    );
    const a = await engine.analyze(token);
    const v = a.verdict;
    console.log(`${v.token.symbol} (${v.token.name}) ${token}`);
    console.log(`  Verdict:   ${v.pass ? "PASS" : "REJECT"} (score ${v.score})`);
    console.log(`  Class:     ${a.tokenClass ?? "unknown"}`);
    console.log(`  Pool:      ${a.candidate.pool ?? "none"} via ${a.candidate.routeId} (${a.candidate.liquidity} ETH)`);
    console.log(`  Price:     ${a.price === null ? "no route" : `${a.price} ETH`}`);
    for (const reason of v.reasons) console.log(`  - ${reason}`);
  });

// --- Wallet commands ---
const wallet = program.command("wallet").description("Wallet management");

wallet
  .command("generate")
  .description("Generate a new wallet keypair")
  .action(() => {
    generateWallet();
  });

wallet
  .command("balance")
  .description("Show ETH and WETH balance")
  .action(async () => {
    const cfg = loadConfig();
    const { wallet: service } = buildEngine(cfg, getAccount());
    await showBalance(service);
  });

wallet
  .command("address")
  .description("Show wallet address from .env key")
  .action(() => {
    console.log(getAccount().address);
  });

program.parseAsync().catch((err: unknown) => {
  console.error(isFatal(err) ? `[FATAL] ${errorMessage(err)}` : err);
  process.exit(1);
});
