import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { BaseError, HttpRequestError, TimeoutError } from "viem";
import {
  AuthError,
  ConfigError,
  ExecutionRevertedError,
  InsufficientBalanceError,
  NetworkError,
  PersistenceError,
  QuoteUnavailableError,
  RoutesExhaustedError,
  SlippageExceededError,
  classifyRpcError,
  errorMessage,
  isFatal,
} from "../src/errors.js";

describe("classifyRpcError", () => {
  it("passes application errors through", () => {
    const err = new QuoteUnavailableError("no pool", "v2-main");
    assert.equal(classifyRpcError(err, "quote"), err);
  });

  it("treats rejected credentials as fatal auth errors", () => {
    const err = new HttpRequestError({ status: 401, url: "http://rpc.local" });
    const classified = classifyRpcError(err, "getBlockNumber");
    assert.ok(classified instanceof AuthError);
    assert.equal(classified.message, "getBlockNumber: RPC rejected credentials (HTTP 401)");
    assert.equal(isFatal(classified), true);
  });

  it("treats server errors as transient", () => {
    const err = new HttpRequestError({ status: 502, url: "http://rpc.local" });
    const classified = classifyRpcError(err, "getLogs");
    assert.ok(classified instanceof NetworkError);
    assert.equal(classified.message, "getLogs: HTTP request failed.");
    assert.equal(isFatal(classified), false);
  });

  it("reports timeouts", () => {
    const err = new TimeoutError({ body: {}, url: "http://rpc.local" });
    const classified = classifyRpcError(err, "getBlock");
    assert.ok(classified instanceof NetworkError);
    assert.equal(classified.message, "getBlock: request timed out");
  });

  it("uses the short message of other viem errors", () => {
    const classified = classifyRpcError(new BaseError("boom"), "call");
    assert.ok(classified instanceof NetworkError);
    assert.equal(classified.message, "call: boom");
    assert.equal(classified.code, "NETWORK_ERROR");
  });

  it("wraps plain errors", () => {
    const cause = new Error("socket hang up");
    const classified = classifyRpcError(cause, "fetch");
    assert.equal(classified.message, "fetch: socket hang up");
    assert.equal(classified.cause, cause);
  });
});

describe("error messages", () => {
  it("summarizes every failed route", () => {
    const err = new RoutesExhaustedError([
      { routeId: "v2-main", reason: "QUOTE_FAILED", message: "no pool" },
      { routeId: "v3-main", reason: "SLIPPAGE_EXCEEDED", message: "too deep" },
    ]);
    assert.equal(err.message, "All routes failed (v2-main: QUOTE_FAILED, v3-main: SLIPPAGE_EXCEEDED)");
    assert.equal(new RoutesExhaustedError([]).message, "All routes failed (no routes)");
  });

  it("formats slippage and balance failures", () => {
    assert.equal(new SlippageExceededError(700, 500).message, "Price impact 700bps exceeds 500bps");
    assert.equal(new InsufficientBalanceError(0.5, 0.1).message, "Insufficient balance: need 0.5, have 0.1");
  });

  it("names subclasses and keeps codes stable", () => {
    const err = new ExecutionRevertedError("reverted");
    assert.equal(err.name, "ExecutionRevertedError");
    assert.equal(err.code, "EXECUTION_REVERTED");
  });

  it("extracts messages from anything", () => {
    assert.equal(errorMessage(new BaseError("short")), "short");
    assert.equal(errorMessage(new Error("plain")), "plain");
    assert.equal(errorMessage("text"), "text");
  });

  it("marks configuration and persistence failures fatal", () => {
    assert.equal(isFatal(new ConfigError("bad")), true);
    assert.equal(isFatal(new PersistenceError("corrupt")), true);
    assert.equal(isFatal(new Error("other")), false);
  });
});
