import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { NetworkError } from "../src/errors.js";
import {
  backoffDelay,
  formatDuration,
  formatEth,
  formatPct,
  fromWei,
  shortAddr,
  sleep,
  startPolling,
  toWei,
  unitPrice,
  withTimeout,
} from "../src/utils.js";

describe("amounts", () => {
  it("converts native units to wei and back", () => {
    assert.equal(toWei(0.0008), 800_000_000_000_000n);
    assert.equal(toWei(1.5, 6), 1_500_000n);
    assert.equal(fromWei(2_500_000_000_000_000_000n), 2.5);
  });

  it("keeps float noise out of wei amounts", () => {
    assert.equal(toWei(0.4), 400_000_000_000_000_000n);
    assert.equal(toWei(0.1 + 0.2), 300_000_000_000_000_000n);
    assert.equal(toWei(1e-7), 100_000_000_000n);
    assert.equal(toWei(1e-19), 0n);
  });

  it("rejects negative and non-finite amounts", () => {
    assert.throws(() => toWei(-1), RangeError);
    assert.throws(() => toWei(Number.NaN), RangeError);
  });

  it("prices per whole token", () => {
    assert.equal(unitPrice(500_000_000_000_000_000n, 10n ** 18n, 18), 0.5);
    assert.equal(unitPrice(10n ** 18n, 4_000_000n, 6), 0.25);
    assert.equal(unitPrice(10n ** 18n, 0n, 18), 0);
  });
});

describe("formatting", () => {
  it("formats native amounts", () => {
    assert.equal(formatEth(0), "0");
    assert.equal(formatEth(0.0008), "0.000800");
    assert.equal(formatEth(1.5), "1.5000");
  });

  it("formats signed percentages", () => {
    assert.equal(formatPct(0.25), "+25.0%");
    assert.equal(formatPct(-0.125), "-12.5%");
  });

  it("formats durations", () => {
    assert.equal(formatDuration(0), "0s");
    assert.equal(formatDuration(3_661_000), "1h 1m 1s");
    assert.equal(formatDuration(90_061_000), "1d 1h 1m");
  });

  it("shortens addresses", () => {
    assert.equal(shortAddr("0x1111111111111111111111111111111111111111"), "0x1111..1111");
    assert.equal(shortAddr("v2-main"), "v2-main");
  });
});

describe("backoffDelay", () => {
  it("doubles per failure up to the cap", () => {
    assert.equal(backoffDelay(0, 1_000, 30_000), 0);
    assert.equal(backoffDelay(1, 1_000, 30_000), 1_000);
    assert.equal(backoffDelay(3, 1_000, 30_000), 4_000);
    assert.equal(backoffDelay(10, 1_000, 30_000), 30_000);
  });
});

describe("withTimeout", () => {
  it("returns the value when it settles in time", async () => {
    assert.equal(await withTimeout(Promise.resolve(7), 50, "fast"), 7);
  });

  it("rejects with a network error at the deadline", async () => {
    const never = new Promise<number>(() => {});
    await assert.rejects(withTimeout(never, 10, "slow call"), (err: unknown) => {
      assert.ok(err instanceof NetworkError);
      assert.equal(err.message, "slow call timed out after 10ms");
      return true;
    });
  });
});

describe("startPolling", () => {
  it("runs ticks until stopped", async () => {
    let ticks = 0;
    const handle = startPolling("test", () => 5, async () => {
      ticks++;
    });
    await sleep(60);
    handle.stop();
    const seen = ticks;
    assert.ok(seen >= 2);
    assert.equal(handle.running, false);
    await sleep(20);
    assert.equal(ticks, seen);
  });

  it("keeps polling after a failed tick", async () => {
    let ticks = 0;
    const handle = startPolling("test", () => 5, async () => {
      ticks++;
      if (ticks === 1) throw new Error("first tick fails");
    });
    await sleep(60);
    handle.stop();
    assert.ok(ticks >= 2);
  });
});
