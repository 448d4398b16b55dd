/**
 * Quote Aggregator Unit Test
 *
 * Requirement: gather returns within the global deadline, keeps every quote
 * that arrived, cancels what is still running and never surfaces late quotes
 */

import { describe, expect, it } from "vitest";
import { SourceError } from "../../services/meta-router/src/errors";
import type { LogLevel } from "../../services/meta-router/src/logger";
import { QuoteAggregator } from "../../services/meta-router/src/quoteAggregator";
import { SourceRegistry } from "../../services/meta-router/src/registry";
import { makeRequest, makeStrategy, registryFile, scriptedAdapters } from "./helpers";
import type { QuoteBehaviour } from "./helpers";

interface LoggedEvent {
  level: LogLevel;
  event: string;
  data?: Record<string, unknown>;
}

function setup(script: Record<string, QuoteBehaviour>) {
  const scripted = scriptedAdapters(script);
  const events: LoggedEvent[] = [];
  const aggregator = new QuoteAggregator({
    registry: new SourceRegistry(registryFile()),
    adapters: scripted.adapters,
    log: (level, event, data) => events.push({ level, event, data }),
  });
  return { aggregator, events, ...scripted };
}

describe("QuoteAggregator", () => {
  it("returns by the global deadline even when every source hangs", async () => {
    const { aggregator, dex, builtin, external, events } = setup({});
    const strategy = makeStrategy({ quoteTimeoutPerSourceMs: 5_000, globalTimeoutMs: 100 });

    const startedAt = Date.now();
    const outcome = await aggregator.gather(makeRequest(), strategy);
    const elapsed = Date.now() - startedAt;

    expect(elapsed).toBeLessThan(100 + 250);
    expect(outcome.kind).toBe("NoViableRoute");
    expect(outcome.outcomes.map((o) => [o.sourceId, o.status])).toEqual([
      ["dex_v2", "cancelled"],
      ["local", "cancelled"],
      ["ext", "cancelled"],
    ]);
    expect([...dex.aborted, ...builtin.aborted, ...external.aborted]).toEqual(["dex_v2", "local", "ext"]);
    expect(events.find((e) => e.event === "gather_deadline_reached")?.data).toMatchObject({
      cancelled: 3,
      received: 0,
    });
  });

  it("keeps the quotes that arrived and records why the rest failed", async () => {
    const { aggregator } = setup({
      dex_v2: { type: "quote", quote: { amountOut: "970" }, delayMs: 10 },
      local: { type: "fail", error: new SourceError("SourceUnavailable", "local", "rpc down") },
    });

    const outcome = await aggregator.gather(makeRequest(), makeStrategy());

    expect(outcome.kind).toBe("Quotes");
    if (outcome.kind !== "Quotes") return;
    expect(outcome.quotes.map((q) => q.quote.sourceId)).toEqual(["dex_v2"]);
    expect(outcome.quotes[0].quote.amountOut).toBe("970");
    expect(outcome.quotes[0].risk).toEqual({ riskLevel: "Low", warnings: [] });
    expect(outcome.outcomes).toMatchObject([
      { sourceId: "dex_v2", status: "ok" },
      { sourceId: "local", status: "failed", errorCode: "SourceUnavailable", message: "rpc down" },
      { sourceId: "ext", status: "failed", errorCode: "SourceTimeout", message: "no quote within 200ms" },
    ]);
  });

  it("reports NoViableRoute when every source times out", async () => {
    const { aggregator, events } = setup({});
    const strategy = makeStrategy({ quoteTimeoutPerSourceMs: 30, globalTimeoutMs: 1_000 });

    const outcome = await aggregator.gather(makeRequest(), strategy);

    expect(outcome.kind).toBe("NoViableRoute");
    expect(outcome.outcomes.map((o) => o.errorCode)).toEqual(["SourceTimeout", "SourceTimeout", "SourceTimeout"]);
    expect(events.filter((e) => e.event === "source_quote_failed")).toHaveLength(3);
    expect(events.some((e) => e.event === "gather_deadline_reached")).toBe(false);
  });

  it("queries only the sources the execution mode allows", async () => {
    const { aggregator, dex, builtin, external } = setup({
      dex_v2: { type: "quote", quote: {} },
    });

    const outcome = await aggregator.gather(makeRequest(), makeStrategy({ mode: "DirectDex" }));

    expect(outcome.kind).toBe("Quotes");
    expect(dex.calls).toEqual(["dex_v2"]);
    expect(builtin.calls).toEqual([]);
    expect(external.calls).toEqual([]);
  });

  it("has no route on a network no source serves", async () => {
    const { aggregator, dex, events } = setup({});

    const outcome = await aggregator.gather(makeRequest({ networkId: "arbitrum" }), makeStrategy());

    expect(outcome).toEqual({ kind: "NoViableRoute", outcomes: [] });
    expect(dex.calls).toEqual([]);
    expect(events.map((e) => e.event)).toEqual(["no_candidate_sources"]);
  });

  it("numbers quotes in arrival order", async () => {
    const { aggregator } = setup({
      dex_v2: { type: "quote", quote: {}, delayMs: 60 },
      local: { type: "quote", quote: {}, delayMs: 5 },
      ext: { type: "quote", quote: {}, delayMs: 30 },
    });

    const outcome = await aggregator.gather(makeRequest(), makeStrategy());

    if (outcome.kind !== "Quotes") throw new Error("expected quotes");
    expect(outcome.quotes.map((q) => [q.quote.sourceId, q.arrivalIndex])).toEqual([
      ["local", 0],
      ["ext", 1],
      ["dex_v2", 2],
    ]);
    // outcomes stay in candidate order
    expect(outcome.outcomes.map((o) => o.sourceId)).toEqual(["dex_v2", "local", "ext"]);
  });

  it("drops a quote that lands after the deadline", async () => {
    const { aggregator, external } = setup({
      dex_v2: { type: "quote", quote: {}, delayMs: 5 },
      local: { type: "quote", quote: {}, delayMs: 5 },
      ext: { type: "quote", quote: { amountOut: "5000" }, delayMs: 150 },
    });
    const strategy = makeStrategy({ quoteTimeoutPerSourceMs: 1_000, globalTimeoutMs: 60 });

    const outcome = await aggregator.gather(makeRequest(), strategy);
    await new Promise((resolve) => setTimeout(resolve, 120));

    if (outcome.kind !== "Quotes") throw new Error("expected quotes");
    expect(outcome.quotes.map((q) => q.quote.sourceId)).toEqual(["dex_v2", "local"]);
    expect(outcome.outcomes[2]).toMatchObject({
      sourceId: "ext",
      status: "cancelled",
      message: "global timeout of 60ms reached",
    });
    expect(external.aborted).toEqual(["ext"]);
  });

  it("turns a rejected adapter call into a source failure", async () => {
    const scripted = scriptedAdapters({
      local: { type: "quote", quote: {} },
      ext: { type: "quote", quote: {} },
    });
    const aggregator = new QuoteAggregator({
      registry: new SourceRegistry(registryFile()),
      adapters: {
        ...scripted.adapters,
        DirectDex: {
          kind: "DirectDex",
          fetchQuote: () => Promise.reject(new Error("provider exploded")),
          buildTransaction: () => Promise.reject(new Error("unused")),
        },
      },
      log: () => undefined,
    });

    const outcome = await aggregator.gather(makeRequest(), makeStrategy());

    expect(outcome.kind).toBe("Quotes");
    expect(outcome.outcomes[0]).toMatchObject({
      sourceId: "dex_v2",
      status: "failed",
      errorCode: "SourceUnavailable",
      message: "provider exploded",
    });
  });
});
