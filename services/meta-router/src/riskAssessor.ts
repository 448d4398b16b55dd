import { Quote, RISK_LEVELS, RiskAssessment, RiskLevel } from "./schemas";

// ============================================================================
// Risk Assessor
// Pure mapping from a quote to a risk level and the warnings behind it.
// The final level is the maximum of the impact, hop and confidence levels.
// ============================================================================

export const LOW_CONFIDENCE_THRESHOLD = 0.5;

const MAX_INDEX = RISK_LEVELS.length - 1;

export function riskIndex(level: RiskLevel): number {
  return RISK_LEVELS.indexOf(level);
}

export function compareRisk(a: RiskLevel, b: RiskLevel): number {
  return riskIndex(a) - riskIndex(b);
}

function levelAt(index: number): RiskLevel {
  return RISK_LEVELS[Math.min(Math.max(index, 0), MAX_INDEX)];
}

export function impactLevel(priceImpactPercent: number): RiskLevel {
  if (priceImpactPercent < 0.5) return "Low";
  if (priceImpactPercent < 2) return "Medium";
  if (priceImpactPercent <= 5) return "High";
  return "VeryHigh";
}

// A route with no declared hops is still one swap
function hopCount(quote: Quote): number {
  return Math.max(1, quote.route.length);
}

function round2(value: number): number {
  return Number(value.toFixed(2));
}

export function assess(quote: Quote): RiskAssessment {
  const warnings: string[] = [];

  const impact = impactLevel(quote.priceImpactPercent);
  if (impact !== "Low") {
    warnings.push(`price impact ${round2(quote.priceImpactPercent)}% exceeds comfortable threshold`);
  }

  const hops = hopCount(quote);
  const hopIndex = hops - 1;
  if (hops > 1) {
    warnings.push(`route traverses ${hops} hops`);
  }

  const lowConfidence = quote.confidence < LOW_CONFIDENCE_THRESHOLD;
  const confidenceIndex = lowConfidence ? riskIndex("Medium") : 0;
  if (lowConfidence) {
    warnings.push(`source confidence low (${round2(quote.confidence)})`);
  }

  return {
    riskLevel: levelAt(Math.max(riskIndex(impact), hopIndex, confidenceIndex)),
    warnings,
  };
}
