import { fetchFromSource } from "./adapters";
import type { AdapterSet } from "./adapters";
import { toSourceError } from "./adapters/base";
import { SourceError } from "./errors";
import type { LogFn } from "./logger";
import type { SourceDescriptor, SourceRegistry } from "./registry";
import { assess } from "./riskAssessor";
import type { AssessedQuote, ExecutionStrategy, Quote, SourceOutcome, TradeRequest } from "./schemas";

// ============================================================================
// Quote Aggregator
// Fans a request out to every candidate source, each bounded by its own
// timeout, the whole run bounded by a global deadline. Quotes are assessed as
// they arrive; anything still running at the deadline is cancelled.
// ============================================================================

export type GatherOutcome =
  | { kind: "Quotes"; quotes: AssessedQuote[]; outcomes: SourceOutcome[] }
  | { kind: "NoViableRoute"; outcomes: SourceOutcome[] };

export interface QuoteAggregatorOptions {
  registry: SourceRegistry;
  adapters: AdapterSet;
  log: LogFn;
  now?: () => number;
}

interface InFlight {
  descriptor: SourceDescriptor;
  controller: AbortController;
  timer: NodeJS.Timeout;
  startedAt: number;
  resolve: () => void;
}

export class QuoteAggregator {
  private readonly registry: SourceRegistry;
  private readonly adapters: AdapterSet;
  private readonly log: LogFn;
  private readonly now: () => number;

  constructor(options: QuoteAggregatorOptions) {
    this.registry = options.registry;
    this.adapters = options.adapters;
    this.log = options.log;
    this.now = options.now ?? Date.now;
  }

  async gather(request: TradeRequest, strategy: ExecutionStrategy): Promise<GatherOutcome> {
    // Snapshot: a registry reload mid-gather does not change this run
    const candidates = this.registry.candidates(request.networkId, strategy.mode);

    if (candidates.length === 0) {
      this.log("warn", "no_candidate_sources", {
        requestId: request.requestId,
        network: request.networkId,
        mode: strategy.mode,
      });
      return { kind: "NoViableRoute", outcomes: [] };
    }

    const quotes: AssessedQuote[] = [];
    const outcomes = new Map<string, SourceOutcome>();
    const inFlight = new Map<string, InFlight>();
    // Once closed, late deliveries are dropped
    let closed = false;

    const settle = (sourceId: string, outcome: SourceOutcome, quote?: Quote): void => {
      const entry = inFlight.get(sourceId);
      if (closed || !entry) return;

      inFlight.delete(sourceId);
      clearTimeout(entry.timer);
      outcomes.set(sourceId, outcome);
      if (quote) {
        quotes.push({ quote, risk: assess(quote), arrivalIndex: quotes.length });
      } else {
        this.log("warn", "source_quote_failed", {
          requestId: request.requestId,
          sourceId,
          code: outcome.errorCode,
          error: outcome.message,
          latencyMs: outcome.latencyMs,
        });
      }
      entry.resolve();
    };

    const fail = (descriptor: SourceDescriptor, startedAt: number, error: SourceError): void => {
      settle(descriptor.id, {
        sourceId: descriptor.id,
        kind: descriptor.kind,
        status: "failed",
        errorCode: error.code,
        message: error.message,
        latencyMs: this.now() - startedAt,
      });
    };

    const runs = candidates.map(
      (descriptor) =>
        new Promise<void>((resolve) => {
          const controller = new AbortController();
          const startedAt = this.now();

          const timer = setTimeout(() => {
            controller.abort();
            fail(
              descriptor,
              startedAt,
              new SourceError(
                "SourceTimeout",
                descriptor.id,
                `no quote within ${strategy.quoteTimeoutPerSourceMs}ms`
              )
            );
          }, strategy.quoteTimeoutPerSourceMs);

          inFlight.set(descriptor.id, { descriptor, controller, timer, startedAt, resolve });

          Promise.resolve()
            .then(() => fetchFromSource(this.adapters, request, descriptor, controller.signal))
            .then(
              (result) => {
                if (result.ok) {
                  settle(
                    descriptor.id,
                    {
                      sourceId: descriptor.id,
                      kind: descriptor.kind,
                      status: "ok",
                      latencyMs: this.now() - startedAt,
                    },
                    result.value
                  );
                } else {
                  fail(descriptor, startedAt, result.error);
                }
              },
              (error: unknown) => fail(descriptor, startedAt, toSourceError(error, descriptor.id))
            );
        })
    );

    let globalTimer: NodeJS.Timeout | undefined;
    const deadline = new Promise<"deadline">((resolve) => {
      globalTimer = setTimeout(() => resolve("deadline"), strategy.globalTimeoutMs);
    });

    try {
      const finished = await Promise.race([Promise.all(runs).then(() => "done" as const), deadline]);

      if (finished === "deadline") {
        for (const entry of inFlight.values()) {
          clearTimeout(entry.timer);
          entry.controller.abort();
          outcomes.set(entry.descriptor.id, {
            sourceId: entry.descriptor.id,
            kind: entry.descriptor.kind,
            status: "cancelled",
            message: `global timeout of ${strategy.globalTimeoutMs}ms reached`,
            latencyMs: this.now() - entry.startedAt,
          });
        }
        this.log("info", "gather_deadline_reached", {
          requestId: request.requestId,
          cancelled: inFlight.size,
          received: quotes.length,
        });
      }
    } finally {
      closed = true;
      clearTimeout(globalTimer);
      for (const entry of inFlight.values()) {
        clearTimeout(entry.timer);
      }
      inFlight.clear();
    }

    const ordered = candidates.map(
      (d): SourceOutcome =>
        outcomes.get(d.id) ?? { sourceId: d.id, kind: d.kind, status: "cancelled", latencyMs: 0 }
    );

    if (quotes.length === 0) {
      return { kind: "NoViableRoute", outcomes: ordered };
    }
    return { kind: "Quotes", quotes, outcomes: ordered };
  }
}
