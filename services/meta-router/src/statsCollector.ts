import type { Result, SourceErrorCode, TradeError } from "./errors";
import type { AssessedQuote, SourceOutcome, TradeResult } from "./schemas";

// ============================================================================
// Stats Collector
// Additive counters and running averages, owned by one engine instance
// ============================================================================

export interface SourceStats {
  requested: number;
  succeeded: number;
  failed: number;
  cancelled: number;
  averageLatencyMs: number;
}

export interface PerformanceStats {
  quoteCycles: { requested: number; succeeded: number; noRoute: number };
  sourceQuotes: { requested: number; succeeded: number; failed: number; cancelled: number };
  failuresByCode: Partial<Record<SourceErrorCode, number>>;
  executions: { attempted: number; succeeded: number; failed: number; rejected: number };
  /** Best minus worst output per cycle, summed, in raw output units */
  cumulativeSavings: string;
  averageSavingsPercent: number;
  averageGatherLatencyMs: number;
  sources: Record<string, SourceStats>;
}

export interface QuoteCycle {
  quotes: readonly AssessedQuote[];
  outcomes: readonly SourceOutcome[];
  latencyMs: number;
}

// Incremental mean over n samples
function runningAverage(current: number, sample: number, n: number): number {
  return current + (sample - current) / n;
}

export class StatsCollector {
  private quoteCycles = { requested: 0, succeeded: 0, noRoute: 0 };
  private sourceQuotes = { requested: 0, succeeded: 0, failed: 0, cancelled: 0 };
  private failuresByCode: Partial<Record<SourceErrorCode, number>> = {};
  private executions = { attempted: 0, succeeded: 0, failed: 0, rejected: 0 };
  private cumulativeSavings = 0n;
  private averageSavingsPercent = 0;
  private averageGatherLatencyMs = 0;
  private readonly sources = new Map<string, SourceStats>();

  recordQuoteCycle(cycle: QuoteCycle): void {
    this.quoteCycles.requested++;
    this.averageGatherLatencyMs = runningAverage(
      this.averageGatherLatencyMs,
      cycle.latencyMs,
      this.quoteCycles.requested
    );

    for (const outcome of cycle.outcomes) {
      this.recordSourceOutcome(outcome);
    }

    if (cycle.quotes.length === 0) {
      this.quoteCycles.noRoute++;
      return;
    }

    this.quoteCycles.succeeded++;
    const outputs = cycle.quotes.map((q) => BigInt(q.quote.amountOut));
    const best = outputs.reduce((a, b) => (b > a ? b : a));
    const worst = outputs.reduce((a, b) => (b < a ? b : a));
    const savings = best - worst;
    this.cumulativeSavings += savings;

    const percent = worst > 0n ? (Number(savings) / Number(worst)) * 100 : 0;
    this.averageSavingsPercent = runningAverage(this.averageSavingsPercent, percent, this.quoteCycles.succeeded);
  }

  recordExecution(outcome: Result<TradeResult, TradeError>): void {
    this.executions.attempted++;
    if (!outcome.ok) {
      this.executions.rejected++;
    } else if (outcome.value.confirmed) {
      this.executions.succeeded++;
    } else {
      this.executions.failed++;
    }
  }

  snapshot(): PerformanceStats {
    const sources: Record<string, SourceStats> = {};
    for (const [id, stats] of this.sources) {
      sources[id] = { ...stats };
    }

    return {
      quoteCycles: { ...this.quoteCycles },
      sourceQuotes: { ...this.sourceQuotes },
      failuresByCode: { ...this.failuresByCode },
      executions: { ...this.executions },
      cumulativeSavings: this.cumulativeSavings.toString(),
      averageSavingsPercent: this.averageSavingsPercent,
      averageGatherLatencyMs: this.averageGatherLatencyMs,
      sources,
    };
  }

  private recordSourceOutcome(outcome: SourceOutcome): void {
    let stats = this.sources.get(outcome.sourceId);
    if (!stats) {
      stats = { requested: 0, succeeded: 0, failed: 0, cancelled: 0, averageLatencyMs: 0 };
      this.sources.set(outcome.sourceId, stats);
    }

    stats.requested++;
    this.sourceQuotes.requested++;
    stats.averageLatencyMs = runningAverage(stats.averageLatencyMs, outcome.latencyMs, stats.requested);

    switch (outcome.status) {
      case "ok":
        stats.succeeded++;
        this.sourceQuotes.succeeded++;
        break;
      case "failed":
        stats.failed++;
        this.sourceQuotes.failed++;
        if (outcome.errorCode) {
          this.failuresByCode[outcome.errorCode] = (this.failuresByCode[outcome.errorCode] ?? 0) + 1;
        }
        break;
      case "cancelled":
        stats.cancelled++;
        this.sourceQuotes.cancelled++;
        break;
    }
  }
}
