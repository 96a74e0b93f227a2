import { describe, it, before, after } from "node:test";
import assert from "node:assert/strict";
import type { Server } from "http";
import { AppError, ConfigError } from "../src/errors.js";
import {
  applyConfigUpdate,
  createServer,
  errorStatus,
  isAuthorized,
  isLocalAddress,
  jsonReplacer,
  parseConfigUpdate,
} from "../src/server.js";
import { TOKEN_A, candidate, makeHarness } from "./helpers.js";

describe("auth", () => {
  it("recognises loopback addresses", () => {
    assert.equal(isLocalAddress("127.0.0.1"), true);
    assert.equal(isLocalAddress("::ffff:127.0.0.1"), true);
    assert.equal(isLocalAddress("10.0.0.2"), false);
  });

  it("requires the bearer token from remote callers", () => {
    assert.equal(isAuthorized("", undefined, "10.0.0.2"), true);
    assert.equal(isAuthorized("test-secret", undefined, "::1"), true);
    assert.equal(isAuthorized("test-secret", "Bearer test-secret", "10.0.0.2"), true);
    assert.equal(isAuthorized("test-secret", "Bearer wrong", "10.0.0.2"), false);
    assert.equal(isAuthorized("test-secret", "test-secret", "10.0.0.2"), false);
    assert.equal(isAuthorized("test-secret", undefined, "10.0.0.2"), false);
  });
});

describe("helpers", () => {
  it("serialises bigints as strings", () => {
    assert.equal(JSON.stringify({ amount: 10n ** 18n }, jsonReplacer), '{"amount":"1000000000000000000"}');
  });

  it("maps errors to status codes", () => {
    assert.equal(errorStatus(new ConfigError("bad")), 400);
    assert.equal(errorStatus(new AppError("gone", "POSITION_NOT_FOUND")), 404);
    assert.equal(errorStatus(new Error("boom")), 500);
  });
});

describe("parseConfigUpdate", () => {
  it("accepts numbers and numeric strings", () => {
    assert.deepEqual(parseConfigUpdate({ tradeSize: "0.001", maxPositions: 3 }), { tradeSize: 0.001, maxPositions: 3 });
  });

  it("parses take-profit levels", () => {
    assert.deepEqual(parseConfigUpdate({ takeProfit: "50@50,50@100" }), {
      takeProfit: [
        { fraction: 0.5, threshold: 0.5 },
        { fraction: 0.5, threshold: 1 },
      ],
    });
  });

  it("rejects malformed bodies", () => {
    assert.throws(() => parseConfigUpdate(null), { message: "Expected a JSON object" });
    assert.throws(() => parseConfigUpdate({}), { message: "Nothing to update" });
    assert.throws(() => parseConfigUpdate({ stopLossPct: "lots" }), { message: "stopLossPct must be a number" });
    assert.throws(() => parseConfigUpdate({ takeProfit: 25 }), { message: 'takeProfit must look like "25@25,25@50"' });
  });

  it("applies through the engine setters", () => {
    const h = makeHarness();
    applyConfigUpdate(h.engine, parseConfigUpdate({ tradeSize: 0.002, stopLossPct: 0.1 }));
    assert.equal(h.engine.activeMode.tradeSize, 0.002);
    assert.equal(h.engine.activeMode.stopLossPct, 0.1);
    assert.throws(() => applyConfigUpdate(h.engine, { tradeSize: 1 }), ConfigError);
  });
});

describe("HTTP API", () => {
  const h = makeHarness();
  let server: Server;
  let baseUrl: string;

  before(async () => {
    h.engine.start();
    server = createServer(h.engine, { authToken: "" }).listen(0, "127.0.0.1");
    await new Promise<void>((resolve) => server.once("listening", () => resolve()));
    const address = server.address();
    assert.ok(address !== null && typeof address === "object");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  after(async () => {
    h.engine.stop();
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  const post = (path: string, body: unknown) =>
    fetch(baseUrl + path, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(body),
    });

  it("reports health", async () => {
    const res = await fetch(`${baseUrl}/health`);
    assert.equal(res.status, 200);
    assert.deepEqual(await res.json(), { ok: true, state: "RUNNING" });
  });

  it("returns positions with amounts as strings", async () => {
    h.market.set(TOKEN_A, 0.5);
    await h.engine.onCandidate(candidate(TOKEN_A, h.clock));
    const res = await fetch(`${baseUrl}/api/positions/001`);
    assert.equal(res.status, 200);
    const body: unknown = await res.json();
    assert.ok(typeof body === "object" && body !== null);
    assert.equal(Reflect.get(body, "remainingAmount"), "1600000000000000");
  });

  it("answers 404 for unknown positions", async () => {
    const res = await fetch(`${baseUrl}/api/positions/999`);
    assert.equal(res.status, 404);
    assert.deepEqual(await res.json(), { error: "No position 999" });
  });

  it("answers 400 for bad input", async () => {
    const mode = await post("/api/mode", { mode: "fast" });
    assert.equal(mode.status, 400);
    assert.deepEqual(await mode.json(), { error: 'Unknown mode "fast" (NORMAL or TURBO)' });

    const config = await post("/api/config", {});
    assert.equal(config.status, 400);
    assert.deepEqual(await config.json(), { error: "Nothing to update" });

    const analyze = await fetch(`${baseUrl}/api/analyze/nope`);
    assert.equal(analyze.status, 400);
  });

  it("pauses and resumes", async () => {
    const paused = await post("/api/pause", {});
    assert.deepEqual(await paused.json(), { changed: true, state: "PAUSED" });
    const resumed = await post("/api/resume", {});
    assert.deepEqual(await resumed.json(), { changed: true, state: "RUNNING" });
  });
});
