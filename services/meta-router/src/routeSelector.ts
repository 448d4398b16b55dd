import { compareRisk, riskIndex } from "./riskAssessor";
import type { AssessedQuote, ExecutionRecommendation, ExecutionStrategy, TradeRequest } from "./schemas";

// ============================================================================
// Route Selector
// Ranks assessed quotes by effective value (output minus gas in output terms)
// and decides whether the winner should be executed.
// ============================================================================

export const DEFAULT_MIN_CONFIRMATIONS = 2;

export const GAS_IGNORED_WARNING = "gas cost ignored in ranking: no output-per-gas rate supplied";

// Fixed-point scales for the fractional inputs; amounts themselves are raw base units
const RATE_SCALE = 1_000_000_000n;
const PERCENT_SCALE = 1_000_000n;

export type RationaleCode =
  | "best_effective_value"
  | "first_qualifying_arrival"
  | "speed_fallback_best_value"
  | "tie_break_lower_risk"
  | "tie_break_higher_confidence"
  | "no_candidate_within_slippage"
  | "risk_very_high"
  | "slippage_exceeded"
  | "insufficient_confirmations";

export interface Selection {
  best: AssessedQuote;
  effectiveValue: bigint;
  recommendation: ExecutionRecommendation;
}

export interface SelectOptions {
  /** Used when the strategy does not set minConfirmations */
  defaultMinConfirmations?: number;
}

interface Ranked {
  entry: AssessedQuote;
  value: bigint;
}

/** Output minus gas priced in output units, in the output token's base units. */
export function effectiveValue(entry: AssessedQuote, request: TradeRequest): bigint {
  const out = BigInt(entry.quote.amountOut);
  if (request.outputPerGasUnit === undefined) return out;
  const rate = BigInt(Math.round(request.outputPerGasUnit * Number(RATE_SCALE)));
  return out - (BigInt(entry.quote.gasEstimate) * rate) / RATE_SCALE;
}

function abs(value: bigint): bigint {
  return value < 0n ? -value : value;
}

// Value desc, then risk asc, then confidence desc, then source id asc
function byPreference(a: Ranked, b: Ranked): number {
  if (a.value !== b.value) return b.value > a.value ? 1 : -1;
  const risk = compareRisk(a.entry.risk.riskLevel, b.entry.risk.riskLevel);
  if (risk !== 0) return risk;
  if (a.entry.quote.confidence !== b.entry.quote.confidence) {
    return b.entry.quote.confidence - a.entry.quote.confidence;
  }
  return a.entry.quote.sourceId < b.entry.quote.sourceId ? -1 : a.entry.quote.sourceId > b.entry.quote.sourceId ? 1 : 0;
}

function withinSlippage(entry: AssessedQuote, strategy: ExecutionStrategy): boolean {
  return entry.quote.priceImpactPercent <= strategy.maxSlippagePercent;
}

interface Choice {
  ranked: Ranked;
  code: RationaleCode;
  text: string;
}

function pickForSavings(ranked: Ranked[], strategy: ExecutionStrategy): Choice {
  const eligible = ranked.filter((r) => withinSlippage(r.entry, strategy));
  if (eligible.length === 0) {
    return {
      ranked: ranked[0],
      code: "no_candidate_within_slippage",
      text: `no quote within ${strategy.maxSlippagePercent}% slippage, ${ranked[0].entry.quote.sourceId} has the highest effective value`,
    };
  }

  const [top, runnerUp] = eligible;
  if (runnerUp) {
    const gap = top.value - runnerUp.value;
    const percent = BigInt(Math.round(strategy.minSavingsThresholdPercent * Number(PERCENT_SCALE)));

    // gap < |runnerUp| * percent / 100, kept in integers
    if (gap * 100n * PERCENT_SCALE < abs(runnerUp.value) * percent) {
      const risk = compareRisk(runnerUp.entry.risk.riskLevel, top.entry.risk.riskLevel);
      if (risk < 0) {
        return {
          ranked: runnerUp,
          code: "tie_break_lower_risk",
          text: `${runnerUp.entry.quote.sourceId} is within ${strategy.minSavingsThresholdPercent}% of ${top.entry.quote.sourceId} at lower risk`,
        };
      }
      if (risk === 0 && runnerUp.entry.quote.confidence > top.entry.quote.confidence) {
        return {
          ranked: runnerUp,
          code: "tie_break_higher_confidence",
          text: `${runnerUp.entry.quote.sourceId} is within ${strategy.minSavingsThresholdPercent}% of ${top.entry.quote.sourceId} with higher confidence`,
        };
      }
    }
  }

  return {
    ranked: top,
    code: "best_effective_value",
    text: `${top.entry.quote.sourceId} has the highest effective value (${top.value.toString()})`,
  };
}

function pickForSpeed(ranked: Ranked[], strategy: ExecutionStrategy): Choice {
  const byArrival = [...ranked].sort((a, b) => a.entry.arrivalIndex - b.entry.arrivalIndex);
  const first = byArrival.find(
    (r) => riskIndex(r.entry.risk.riskLevel) <= riskIndex("Medium") && withinSlippage(r.entry, strategy)
  );

  if (first) {
    return {
      ranked: first,
      code: "first_qualifying_arrival",
      text: `${first.entry.quote.sourceId} was the first acceptable quote to arrive`,
    };
  }
  return {
    ranked: ranked[0],
    code: "speed_fallback_best_value",
    text: `no early quote qualified, ${ranked[0].entry.quote.sourceId} has the highest effective value`,
  };
}

export function select(
  assessed: readonly AssessedQuote[],
  strategy: ExecutionStrategy,
  request: TradeRequest,
  options: SelectOptions = {}
): Selection {
  if (assessed.length === 0) {
    throw new Error("select() needs at least one quote");
  }

  const ranked = assessed
    .map((entry) => ({ entry, value: effectiveValue(entry, request) }))
    .sort(byPreference);

  const pick = strategy.preferSpeedOverSavings
    ? pickForSpeed(ranked, strategy)
    : pickForSavings(ranked, strategy);

  const best = pick.ranked.entry;
  const minConfirmations =
    strategy.minConfirmations ?? options.defaultMinConfirmations ?? DEFAULT_MIN_CONFIRMATIONS;

  let blocker: { code: RationaleCode; text: string } | null = null;
  if (best.risk.riskLevel === "VeryHigh") {
    blocker = { code: "risk_very_high", text: `${best.quote.sourceId} is rated VeryHigh risk` };
  } else if (!withinSlippage(best, strategy)) {
    blocker = {
      code: "slippage_exceeded",
      text: `price impact ${best.quote.priceImpactPercent}% exceeds max slippage ${strategy.maxSlippagePercent}%`,
    };
  } else if (strategy.mode === "MetaAggregation" && assessed.length < minConfirmations) {
    blocker = {
      code: "insufficient_confirmations",
      text: `${assessed.length} quote(s) received, ${minConfirmations} required`,
    };
  }

  const warnings = [...best.risk.warnings];
  if (request.outputPerGasUnit === undefined) {
    warnings.push(GAS_IGNORED_WARNING);
  }

  const decisive = blocker ?? pick;
  return {
    best,
    effectiveValue: pick.ranked.value,
    recommendation: {
      shouldExecute: blocker === null,
      riskLevel: best.risk.riskLevel,
      rationale: `${decisive.code}: ${decisive.text}`,
      warnings,
    },
  };
}
