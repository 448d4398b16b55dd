import { v4 as uuidv4 } from "uuid";
import type { AdapterSet } from "./adapters";
import type { SigningCollaborator } from "./collaborators";
import { err, ok, Result, TradeError } from "./errors";
import type { LogFn } from "./logger";
import { QuoteAggregator } from "./quoteAggregator";
import type { SourceRegistry } from "./registry";
import { select } from "./routeSelector";
import type { AggregationResult, ExecutionStrategy, Quote, TradeRequest, TradeResult } from "./schemas";
import { PerformanceStats, StatsCollector } from "./statsCollector";
import type { ExecutionJournal, TradeRecord } from "./tradeJournal";
import { TransactionExecutor } from "./transactionExecutor";

// ============================================================================
// Meta Trading Engine
// Caller-facing entry point: quote, execute, stats. Each engine owns its
// aggregator, executor and stats; nothing is process-wide.
// ============================================================================

export interface EngineSettings {
  maxQuoteAgeSeconds: number;
  minConfirmations: number;
  maxExecutionRetries: number;
  gasBumpPercent: number;
  receiptPollIntervalMs: number;
  receiptTimeoutMs: number;
  globalTimeoutMs: number;
  minSavingsThresholdPercent: number;
}

export interface MetaTradingEngineOptions {
  registry: SourceRegistry;
  adapters: AdapterSet;
  settings: EngineSettings;
  log: LogFn;
  /** Without a signer the engine only quotes */
  signer?: SigningCollaborator;
  journal?: ExecutionJournal;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface CreateRequestParams {
  networkId: string;
  tokenIn: string;
  tokenOut: string;
  amountIn: string;
  outputPerGasUnit?: number;
}

// Results kept for lookup and execution; older ones are dropped first
const MAX_RETAINED_RESULTS = 1000;

export class MetaTradingEngine {
  private readonly registry: SourceRegistry;
  private readonly settings: EngineSettings;
  private readonly log: LogFn;
  private readonly now: () => number;
  private readonly aggregator: QuoteAggregator;
  private readonly executor: TransactionExecutor | null;
  private readonly journal: ExecutionJournal | null;
  private readonly collector = new StatsCollector();
  private readonly results = new Map<string, AggregationResult>();

  constructor(options: MetaTradingEngineOptions) {
    this.registry = options.registry;
    this.settings = options.settings;
    this.log = options.log;
    this.now = options.now ?? Date.now;
    this.journal = options.journal ?? null;

    this.aggregator = new QuoteAggregator({
      registry: options.registry,
      adapters: options.adapters,
      log: options.log,
      now: this.now,
    });

    this.executor = options.signer
      ? new TransactionExecutor({
          registry: options.registry,
          adapters: options.adapters,
          signer: options.signer,
          log: options.log,
          journal: options.journal,
          maxQuoteAgeSeconds: options.settings.maxQuoteAgeSeconds,
          maxRetries: options.settings.maxExecutionRetries,
          gasBumpPercent: options.settings.gasBumpPercent,
          receiptPollIntervalMs: options.settings.receiptPollIntervalMs,
          receiptTimeoutMs: options.settings.receiptTimeoutMs,
          now: this.now,
          sleep: options.sleep,
        })
      : null;
  }

  get canExecute(): boolean {
    return this.executor !== null;
  }

  createRequest(params: CreateRequestParams): TradeRequest {
    return {
      requestId: uuidv4(),
      networkId: params.networkId.toLowerCase(),
      tokenIn: params.tokenIn,
      tokenOut: params.tokenOut,
      amountIn: params.amountIn,
      createdAt: this.now(),
      outputPerGasUnit: params.outputPerGasUnit,
    };
  }

  /** Registry settings and service config folded into a complete strategy. */
  defaultStrategy(): ExecutionStrategy {
    const settings = this.registry.settings;
    return {
      mode: "MetaAggregation",
      maxSlippagePercent: settings.maxPriceImpactPercent,
      quoteTimeoutPerSourceMs: Math.round(settings.quoteTimeoutSeconds * 1000),
      globalTimeoutMs: this.settings.globalTimeoutMs,
      preferSpeedOverSavings: !settings.prioritizeSavingsOverSpeed,
      minSavingsThresholdPercent: this.settings.minSavingsThresholdPercent,
      minConfirmations: this.settings.minConfirmations,
    };
  }

  async quote(
    request: TradeRequest,
    strategy: ExecutionStrategy = this.defaultStrategy()
  ): Promise<Result<AggregationResult, TradeError>> {
    const startedAt = this.now();
    const outcome = await this.aggregator.gather(request, strategy);
    const latencyMs = this.now() - startedAt;

    if (outcome.kind === "NoViableRoute") {
      this.collector.recordQuoteCycle({ quotes: [], outcomes: outcome.outcomes, latencyMs });
      this.log("warn", "no_viable_route", {
        requestId: request.requestId,
        network: request.networkId,
        sources: outcome.outcomes.length,
        latencyMs,
      });
      return err(new TradeError("NoViableRoute", "no source returned a usable quote", request.requestId));
    }

    this.collector.recordQuoteCycle({ quotes: outcome.quotes, outcomes: outcome.outcomes, latencyMs });

    const selection = select(outcome.quotes, strategy, request, {
      defaultMinConfirmations: this.settings.minConfirmations,
    });

    const result: AggregationResult = {
      requestId: request.requestId,
      request,
      quotes: outcome.quotes,
      bestQuote: selection.best.quote,
      bestRisk: selection.best.risk,
      recommendedExecution: selection.recommendation,
      sourceOutcomes: outcome.outcomes,
      completedAt: this.now(),
    };

    this.retain(result);
    this.log("info", "quote_selected", {
      requestId: request.requestId,
      sourceId: result.bestQuote.sourceId,
      amountOut: result.bestQuote.amountOut,
      quotes: outcome.quotes.length,
      shouldExecute: result.recommendedExecution.shouldExecute,
      rationale: result.recommendedExecution.rationale,
      latencyMs,
    });

    return ok(result);
  }

  /**
   * Executes the best quote of a result or a caller-chosen alternative from the
   * same result. At most one call per result reaches the chain.
   */
  async execute(
    quote: Quote,
    strategy: ExecutionStrategy = this.defaultStrategy()
  ): Promise<Result<TradeResult, TradeError>> {
    if (!this.executor) {
      return err(
        new TradeError("ExecutionDisabled", "no signing collaborator configured; engine is quote-only", quote.requestId)
      );
    }

    const outcome = await this.executor.execute(quote, strategy);
    this.collector.recordExecution(outcome);
    return outcome;
  }

  getResult(requestId: string): AggregationResult | undefined {
    return this.results.get(requestId);
  }

  stats(): PerformanceStats {
    return this.collector.snapshot();
  }

  /** Most recent journaled executions; empty without a journal. */
  trades(limit: number): TradeRecord[] {
    return this.journal ? this.journal.history(limit) : [];
  }

  private retain(result: AggregationResult): void {
    this.results.set(result.requestId, result);
    this.executor?.track(result);

    while (this.results.size > MAX_RETAINED_RESULTS) {
      const oldest = this.results.keys().next();
      if (oldest.done) break;
      this.results.delete(oldest.value);
      this.executor?.forget(oldest.value);
    }
  }
}
