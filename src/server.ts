import express, { type Request, type RequestHandler, type Response } from "express";
import { isAddress } from "viem";
import { AppError, ConfigError, errorMessage } from "./errors.js";
import { parseTakeProfit } from "./trading/modes.js";
import type { StrategyEngine } from "./trading/engine.js";
import type { TakeProfitLevel } from "./trading/types.js";

export interface ServerOptions {
  authToken: string;
}

// ─── Helpers ───

export function isLocalAddress(ip: string): boolean {
  return ip === "127.0.0.1" || ip === "::1" || ip === "::ffff:127.0.0.1";
}

/** Localhost passes without a token (telegram bot, internal). */
export function isAuthorized(authToken: string, authorization: string | undefined, ip: string): boolean {
  if (!authToken || isLocalAddress(ip)) return true;
  const header = authorization || "";
  const token = header.startsWith("Bearer ") ? header.slice(7) : "";
  return token === authToken;
}

export function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

export function errorStatus(err: unknown): number {
  if (err instanceof ConfigError) return 400;
  if (err instanceof AppError && err.code === "POSITION_NOT_FOUND") return 404;
  return 500;
}

export interface ConfigUpdate {
  tradeSize?: number;
  stopLossPct?: number;
  takeProfit?: TakeProfitLevel[];
  maxPositions?: number;
}

function numberField(body: object, key: string): number | undefined {
  const value: unknown = Reflect.get(body, key);
  if (value === undefined) return undefined;
  const n = typeof value === "string" ? Number(value) : value;
  if (typeof n !== "number" || !Number.isFinite(n)) throw new ConfigError(`${key} must be a number`);
  return n;
}

/** Validate a POST /api/config body. takeProfit is "25@25,25@50" form. */
export function parseConfigUpdate(body: unknown): ConfigUpdate {
  if (typeof body !== "object" || body === null) throw new ConfigError("Expected a JSON object");
  const update: ConfigUpdate = {};
  const tradeSize = numberField(body, "tradeSize");
  if (tradeSize !== undefined) update.tradeSize = tradeSize;
  const stopLossPct = numberField(body, "stopLossPct");
  if (stopLossPct !== undefined) update.stopLossPct = stopLossPct;
  const maxPositions = numberField(body, "maxPositions");
  if (maxPositions !== undefined) update.maxPositions = maxPositions;
  const takeProfit: unknown = Reflect.get(body, "takeProfit");
  if (takeProfit !== undefined) {
    if (typeof takeProfit !== "string") throw new ConfigError('takeProfit must look like "25@25,25@50"');
    update.takeProfit = parseTakeProfit(takeProfit);
  }
  if (Object.keys(update).length === 0) throw new ConfigError("Nothing to update");
  return update;
}

/** Apply each field through the engine's validated setters. */
export function applyConfigUpdate(engine: StrategyEngine, update: ConfigUpdate): void {
  if (update.tradeSize !== undefined) engine.setTradeSize(update.tradeSize);
  if (update.stopLossPct !== undefined) engine.setStopLoss(update.stopLossPct);
  if (update.takeProfit !== undefined) engine.setTakeProfit(update.takeProfit);
  if (update.maxPositions !== undefined) engine.setMaxPositions(update.maxPositions);
}

function handle(fn: (req: Request, res: Response) => Promise<unknown> | unknown): RequestHandler {
  return (req, res) => {
    Promise.resolve()
      .then(() => fn(req, res))
      .then(
        (body) => res.json(body),
        (err: unknown) => {
          const status = errorStatus(err);
          if (status === 500) console.error(`[server] ${req.method} ${req.path} failed:`, errorMessage(err));
          res.status(status).json({ error: errorMessage(err) });
        },
      );
  };
}

// ─── App ───

export function createServer(engine: StrategyEngine, options: ServerOptions) {
  const app = express();
  app.use(express.json());
  app.set("json replacer", jsonReplacer);

  if (options.authToken) {
    app.use("/api", (req, res, next) => {
      const ip = req.ip || req.socket.remoteAddress || "";
      if (!isAuthorized(options.authToken, req.headers.authorization, ip)) {
        res.status(401).json({ error: "Unauthorized" });
        return;
      }
      next();
    });
    console.log("[auth] API protected with AUTH_TOKEN");
  } else {
    console.log("[auth] No AUTH_TOKEN set, API is open (local-only)");
  }

  app.get("/health", (_req, res) => {
    res.json({ ok: true, state: engine.engineState });
  });

  // ─── Queries ───
  app.get("/api/status", handle(() => engine.status()));
  app.get("/api/balance", handle(() => engine.balance()));
  app.get("/api/positions", handle(() => engine.positions()));
  app.get(
    "/api/positions/:id",
    handle((req) => {
      const pos = engine.getPosition(req.params.id);
      if (!pos) throw new AppError(`No position ${req.params.id}`, "POSITION_NOT_FOUND");
      return pos;
    }),
  );
  app.get("/api/stats", handle(() => engine.stats()));
  app.get(
    "/api/analyze/:token",
    handle((req) => {
      const token = req.params.token;
      if (!isAddress(token)) throw new ConfigError(`Not an address: ${token}`);
      return engine.analyze(token);
    }),
  );

  // ─── Control ───
  app.post("/api/start", handle(() => {
    if (!engine.resume()) engine.start();
    return engine.status();
  }));
  app.post("/api/stop", handle(() => {
    engine.stop();
    return engine.status();
  }));
  app.post("/api/pause", handle(() => ({ changed: engine.pause(), state: engine.engineState })));
  app.post("/api/resume", handle(() => ({ changed: engine.resume(), state: engine.engineState })));
  app.post("/api/emergency", handle(async () => ({ closed: await engine.emergencyStop(), state: engine.engineState })));
  app.post(
    "/api/mode",
    handle((req) => {
      const mode: unknown = req.body?.mode;
      if (typeof mode !== "string") throw new ConfigError("Missing mode");
      return engine.setMode(mode);
    }),
  );
  app.post(
    "/api/config",
    handle((req) => {
      applyConfigUpdate(engine, parseConfigUpdate(req.body));
      return engine.activeMode;
    }),
  );
  app.post("/api/positions/:id/close", handle((req) => engine.closePosition(req.params.id)));

  return app;
}

export function startServer(engine: StrategyEngine, options: ServerOptions & { port: number }) {
  const app = createServer(engine, options);
  const host = options.authToken ? "0.0.0.0" : "127.0.0.1";
  return app.listen(options.port, host, () => {
    console.log(`[server] Sniper API on http://localhost:${options.port}`);
  });
}
