import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { privateKeyToAccount } from "viem/accounts";
import { DEFAULT_ROUTES, WETH_BASE, createChainClient, createSignerClient } from "../../src/config.js";
import {
  V2RouteClient,
  V3RouteClient,
  createRouteClient,
  minAmountOut,
  priceImpactFromProbe,
  priceImpactFromReserves,
  type RouteClientDeps,
} from "../../src/dex/route-client.js";
import type { DexRoute } from "../../src/dex/types.js";
import { QuoteUnavailableError } from "../../src/errors.js";
import { ViemWallet } from "../../src/wallet.js";
import { TOKEN_A } from "../helpers.js";

const ONE = 10n ** 18n;

// Nothing below reaches the RPC: every case fails or returns before a request.
function offlineDeps(): RouteClientDeps {
  const client = createChainClient("http://127.0.0.1:8545", 500);
  const signer = createSignerClient(privateKeyToAccount(`0x${"11".repeat(32)}`), "http://127.0.0.1:8545", 500);
  return { client, wallet: new ViemWallet(client, signer, WETH_BASE), baseToken: WETH_BASE, receiptTimeoutMs: 500 };
}

describe("price impact", () => {
  it("measures shortfall against the reserve rate", () => {
    assert.equal(priceImpactFromReserves(ONE, (ONE * 9n) / 10n, 100n * ONE, 100n * ONE), 1000);
    assert.equal(priceImpactFromReserves(ONE, ONE, 100n * ONE, 100n * ONE), 0);
    assert.equal(priceImpactFromReserves(ONE, ONE, 0n, 100n * ONE), 10_000);
  });

  it("measures shortfall against a probe's rate", () => {
    assert.equal(priceImpactFromProbe(100n, 90n, 1n, 1n), 1000);
    assert.equal(priceImpactFromProbe(100n, 100n, 1n, 1n), 0);
    assert.equal(priceImpactFromProbe(100n, 90n, 1n, 0n), 0);
  });

  it("applies slippage to the quoted output", () => {
    assert.equal(minAmountOut(1_000_000n, 500), 950_000n);
    assert.equal(minAmountOut(1_000_000n, 10_000), 0n);
  });
});

describe("createRouteClient", () => {
  it("picks the client by protocol", () => {
    const deps = offlineDeps();
    assert.ok(createRouteClient(DEFAULT_ROUTES[0], deps) instanceof V2RouteClient);
    assert.ok(createRouteClient(DEFAULT_ROUTES[2], deps) instanceof V3RouteClient);
  });

  it("cannot quote a concentrated-liquidity route without a quoter", async () => {
    const route: DexRoute = {
      id: "v3-no-quoter",
      protocol: "v3",
      router: DEFAULT_ROUTES[2].router,
      factory: DEFAULT_ROUTES[2].factory,
      feeTiers: [500, 3000],
      priority: 1,
    };
    await assert.rejects(new V3RouteClient(route, offlineDeps()).quote(TOKEN_A, "buy", ONE), (err: unknown) => {
      assert.ok(err instanceof QuoteUnavailableError);
      assert.equal(err.message, `v3-no-quoter: no fee tier can price ${TOKEN_A}`);
      assert.equal(err.routeId, "v3-no-quoter");
      return true;
    });
  });

  it("refuses to execute a concentrated-liquidity quote without a fee tier", async () => {
    const client = new V3RouteClient(DEFAULT_ROUTES[2], offlineDeps());
    await assert.rejects(
      client.execute({
        token: TOKEN_A,
        quote: { routeId: "uniswap-v3", side: "buy", amountIn: ONE, amountOut: ONE, priceImpactBps: 0 },
        minAmountOut: 0n,
      }),
      { name: "QuoteUnavailableError", message: "uniswap-v3: quote has no fee tier" },
    );
  });
});
