import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { FetchOrchestrator, type FetchOrchestratorOptions } from "../../src/upstream/orchestrator";
import { createLogger } from "../../src/utils/logger";
import { sleep } from "../../src/utils/retry";
import type { MetricsSink } from "../../src/metrics/types";
import {
  CapturedOutput,
  ok200,
  PIKACHU,
  recordingSleep,
  RecordingSink,
  status,
  StubTransport,
} from "../helpers/stubs";

function setup(transport: StubTransport, overrides: Partial<FetchOrchestratorOptions> = {}) {
  const metrics = new RecordingSink();
  const sleeper = recordingSleep();
  const orchestrator = new FetchOrchestrator({
    transport,
    metrics,
    maxAttempts: 3,
    sleep: sleeper.sleep,
    random: () => 0,
    ...overrides,
  });
  return { orchestrator, metrics, delays: sleeper.delays };
}

describe("FetchOrchestrator", () => {
  it("returns the decoded result on the first success", async () => {
    const transport = new StubTransport([ok200()]);
    const { orchestrator, metrics, delays } = setup(transport);

    const res = await orchestrator.fetch("pikachu");

    assert.deepEqual(res, { ok: true, value: PIKACHU });
    assert.deepEqual(transport.calls, ["pikachu"]);
    assert.deepEqual(metrics.requests, [{ target: "pokeapi", status: "200" }]);
    assert.equal(metrics.durations.length, 1);
    assert.deepEqual(delays, []);
  });

  it("performs exactly maxAttempts attempts against a failing upstream", async () => {
    const transport = new StubTransport([], status(503));
    const { orchestrator, metrics, delays } = setup(transport, { maxAttempts: 4 });

    const res = await orchestrator.fetch("pikachu");

    assert.equal(transport.calls.length, 4);
    assert.equal(res.ok, false);
    assert.ok(!res.ok);
    assert.equal(res.error.kind, "upstream_unavailable");
    assert.equal(res.error.message, "upstream retries exhausted: upstream status 503");
    assert.deepEqual(metrics.statuses(), [
      "retryable_error",
      "retryable_error",
      "retryable_error",
      "retryable_error",
      "error",
    ]);
    assert.equal(metrics.durations.length, 4);
    assert.deepEqual(delays, [100, 200, 400]);
  });

  it("carries the last status and reason when retries are exhausted", async () => {
    const transport = new StubTransport([new Error("connection reset"), status(502)]);
    const { orchestrator } = setup(transport, { maxAttempts: 2 });

    const res = await orchestrator.fetch("pikachu");

    assert.ok(!res.ok);
    assert.equal(res.error.kind, "upstream_unavailable");
    if (res.error.kind === "upstream_unavailable") {
      assert.equal(res.error.lastReason, "upstream status 502");
      assert.equal(res.error.lastStatus, 502);
    }
  });

  it("returns not found after one attempt without sleeping", async () => {
    const transport = new StubTransport([status(404)], ok200());
    const { orchestrator, metrics, delays } = setup(transport);

    const res = await orchestrator.fetch("missingno");

    assert.deepEqual(res, {
      ok: false,
      error: { kind: "not_found", message: "missingno not found upstream", status: 404 },
    });
    assert.equal(transport.calls.length, 1);
    assert.deepEqual(delays, []);
    assert.deepEqual(metrics.statuses(), ["404"]);
  });

  it("does not retry other client errors and keeps the status", async () => {
    const transport = new StubTransport([status(429)], ok200());
    const { orchestrator, metrics, delays } = setup(transport);

    const res = await orchestrator.fetch("pikachu");

    assert.deepEqual(res, {
      ok: false,
      error: { kind: "upstream_status", message: "upstream returned status 429", status: 429 },
    });
    assert.equal(transport.calls.length, 1);
    assert.deepEqual(delays, []);
    assert.deepEqual(metrics.statuses(), ["429"]);
  });

  it("recovers after a transient transport error", async () => {
    const transport = new StubTransport([new Error("socket hang up"), ok200()]);
    const { orchestrator, metrics, delays } = setup(transport);

    const res = await orchestrator.fetch("pikachu");

    assert.deepEqual(res, { ok: true, value: PIKACHU });
    assert.equal(transport.calls.length, 2);
    assert.deepEqual(metrics.statuses(), ["retryable_error", "200"]);
    assert.equal(metrics.durations.length, 2);
    assert.deepEqual(delays, [100]);
  });

  it("treats an undecodable 200 body as terminal", async () => {
    const transport = new StubTransport([ok200("<html>")], ok200());
    const { orchestrator, metrics } = setup(transport);

    const res = await orchestrator.fetch("pikachu");

    assert.ok(!res.ok);
    assert.equal(res.error.kind, "decode_failure");
    assert.equal(transport.calls.length, 1);
    assert.deepEqual(metrics.statuses(), ["parse_error"]);
  });

  it("does not retry transport errors known to be permanent", async () => {
    const permanent = Object.assign(new Error("Invalid URL"), { code: "ERR_INVALID_URL" });
    const transport = new StubTransport([permanent], ok200());
    const { orchestrator, metrics } = setup(transport);

    const res = await orchestrator.fetch("pikachu");

    assert.ok(!res.ok);
    assert.equal(res.error.kind, "upstream_status");
    assert.equal(res.error.message, "Invalid URL (ERR_INVALID_URL)");
    assert.equal(transport.calls.length, 1);
    assert.deepEqual(metrics.statuses(), ["error"]);
  });

  it("uses the configured backoff shape and jitter source", async () => {
    const transport = new StubTransport([], status(500));
    const { orchestrator, delays } = setup(transport, {
      maxAttempts: 3,
      backoff: { baseMs: 10, capMs: 15, jitterMs: 4 },
      random: () => 0.5,
    });

    await orchestrator.fetch("pikachu");

    assert.deepEqual(delays, [8, 13]);
  });

  it("labels metrics with the configured target", async () => {
    const transport = new StubTransport([ok200()]);
    const { orchestrator, metrics } = setup(transport, { target: "pokeapi-mirror" });

    await orchestrator.fetch("pikachu");

    assert.deepEqual(metrics.requests, [{ target: "pokeapi-mirror", status: "200" }]);
    assert.equal(metrics.durations[0]?.target, "pokeapi-mirror");
  });

  it("measures attempt latency with the injected clock", async () => {
    let t = 0;
    const transport = new StubTransport([
      async () => {
        t += 250;
        return ok200();
      },
    ]);
    const { orchestrator, metrics } = setup(transport, { clock: () => t });

    await orchestrator.fetch("pikachu");

    assert.deepEqual(metrics.durations, [{ target: "pokeapi", seconds: 0.25 }]);
  });

  it("keeps going when the metrics sink throws", async () => {
    const out = new CapturedOutput();
    const broken: MetricsSink = {
      recordRequest: () => {
        throw new Error("sink down");
      },
      observeDuration: () => {
        throw new Error("sink down");
      },
    };
    const transport = new StubTransport([ok200()]);
    const { orchestrator } = setup(transport, { metrics: broken, logger: createLogger("warn", out) });

    const res = await orchestrator.fetch("pikachu");

    assert.deepEqual(res, { ok: true, value: PIKACHU });
    assert.deepEqual(
      out.lines.map((l) => l.line),
      [
        '[pokegate][warn] Metrics sink failed {"target":"pokeapi","error":"sink down"}',
        '[pokegate][warn] Metrics sink failed {"target":"pokeapi","error":"sink down"}',
      ],
    );
  });

  it("returns cancelled without calling the upstream when already aborted", async () => {
    const transport = new StubTransport([ok200()]);
    const { orchestrator, metrics } = setup(transport);
    const controller = new AbortController();
    controller.abort();

    const res = await orchestrator.fetch("pikachu", controller.signal);

    assert.ok(!res.ok);
    assert.equal(res.error.kind, "cancelled");
    assert.deepEqual(transport.calls, []);
    assert.deepEqual(metrics.requests, []);
  });

  it("aborts promptly while waiting on the upstream", async () => {
    const controller = new AbortController();
    const transport = new StubTransport([
      (_key, signal) =>
        new Promise((_resolve, reject) => {
          signal?.addEventListener("abort", () => reject(signal?.reason));
        }),
    ]);
    const { orchestrator, metrics } = setup(transport);
    setTimeout(() => controller.abort(), 10);

    const res = await orchestrator.fetch("pikachu", controller.signal);

    assert.ok(!res.ok);
    assert.equal(res.error.kind, "cancelled");
    assert.equal(transport.calls.length, 1);
    assert.deepEqual(metrics.requests, []);
    assert.equal(metrics.durations.length, 1);
  });

  it("aborts promptly during the backoff sleep", async () => {
    const controller = new AbortController();
    const transport = new StubTransport([], status(503));
    const { orchestrator, metrics } = setup(transport, {
      sleep,
      backoff: { baseMs: 60_000, capMs: 60_000, jitterMs: 0 },
    });
    const started = Date.now();
    setTimeout(() => controller.abort(), 10);

    const res = await orchestrator.fetch("pikachu", controller.signal);

    assert.ok(!res.ok);
    assert.equal(res.error.kind, "cancelled");
    assert.equal(transport.calls.length, 1);
    assert.ok(Date.now() - started < 5000);
    assert.deepEqual(metrics.statuses(), ["retryable_error"]);
  });

  it("propagates sleep failures that are not cancellations", async () => {
    const transport = new StubTransport([], status(503));
    const { orchestrator } = setup(transport, {
      sleep: async () => {
        throw new Error("timer broke");
      },
    });

    await assert.rejects(orchestrator.fetch("pikachu"), /timer broke/);
  });

  it("runs attempts strictly one after another", async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const slow503 = async () => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise((r) => setTimeout(r, 5));
      inFlight--;
      return status(503);
    };
    const transport = new StubTransport([], slow503);
    const { orchestrator } = setup(transport);

    await orchestrator.fetch("pikachu");

    assert.equal(transport.calls.length, 3);
    assert.equal(maxInFlight, 1);
  });

  it("rejects a non-positive attempt bound", () => {
    assert.throws(
      () => new FetchOrchestrator({ transport: new StubTransport([]), metrics: new RecordingSink(), maxAttempts: 0 }),
      RangeError,
    );
  });
});
