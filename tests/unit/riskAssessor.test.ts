/**
 * Risk Assessor Unit Test
 *
 * Requirement: risk level is the maximum of the impact, hop and confidence
 * levels, with one warning per contributing factor
 */

import { describe, expect, it } from "vitest";
import { assess, impactLevel, riskIndex } from "../../services/meta-router/src/riskAssessor";
import type { RouteHop } from "../../services/meta-router/src/schemas";
import { makeQuote, TOKEN_W, TOKEN_X, TOKEN_Y } from "./helpers";

function hops(count: number): RouteHop[] {
  return Array.from({ length: count }, (_, i) => ({
    protocol: "test",
    tokenIn: i === 0 ? TOKEN_X : TOKEN_W,
    tokenOut: i === count - 1 ? TOKEN_Y : TOKEN_W,
  }));
}

describe("RiskAssessor", () => {
  it("rates a single-hop, low-impact, confident quote Low with no warnings", () => {
    const result = assess(makeQuote({ priceImpactPercent: 0.2, confidence: 0.9 }));
    expect(result).toEqual({ riskLevel: "Low", warnings: [] });
  });

  it("maps price impact onto the four levels", () => {
    expect(impactLevel(0.49)).toBe("Low");
    expect(impactLevel(0.5)).toBe("Medium");
    expect(impactLevel(1.99)).toBe("Medium");
    expect(impactLevel(2)).toBe("High");
    expect(impactLevel(5)).toBe("High");
    expect(impactLevel(5.01)).toBe("VeryHigh");
  });

  it("describes high impact in its warning", () => {
    const result = assess(makeQuote({ priceImpactPercent: 3.2 }));
    expect(result.riskLevel).toBe("High");
    expect(result.warnings).toEqual(["price impact 3.2% exceeds comfortable threshold"]);
  });

  it("raises the floor one level per extra hop", () => {
    expect(assess(makeQuote({ route: hops(2) })).riskLevel).toBe("Medium");
    expect(assess(makeQuote({ route: hops(3) })).riskLevel).toBe("High");
    expect(assess(makeQuote({ route: hops(4) })).riskLevel).toBe("VeryHigh");
    expect(assess(makeQuote({ route: hops(6) })).riskLevel).toBe("VeryHigh");
    expect(assess(makeQuote({ route: hops(3) })).warnings).toEqual(["route traverses 3 hops"]);
  });

  it("treats an empty route as a single hop", () => {
    expect(assess(makeQuote({ route: [] }))).toEqual({ riskLevel: "Low", warnings: [] });
  });

  it("raises low confidence to at least Medium", () => {
    const result = assess(makeQuote({ confidence: 0.4 }));
    expect(result.riskLevel).toBe("Medium");
    expect(result.warnings).toEqual(["source confidence low (0.4)"]);
  });

  it("lists every contributing factor in order", () => {
    const result = assess(makeQuote({ priceImpactPercent: 1.234, route: hops(2), confidence: 0.3 }));
    expect(result.riskLevel).toBe("Medium");
    expect(result.warnings).toEqual([
      "price impact 1.23% exceeds comfortable threshold",
      "route traverses 2 hops",
      "source confidence low (0.3)",
    ]);
  });

  it("never lowers risk as impact or hops grow, or as confidence falls", () => {
    const impacts = [0, 0.3, 0.5, 1, 2, 4, 5, 7, 20];
    const hopCounts = [1, 2, 3, 4, 5];
    const confidences = [1, 0.8, 0.5, 0.49, 0.1, 0];

    const level = (impact: number, hopCount: number, confidence: number): number =>
      riskIndex(
        assess(makeQuote({ priceImpactPercent: impact, route: hops(hopCount), confidence })).riskLevel
      );

    for (const h of hopCounts) {
      for (const c of confidences) {
        for (let i = 1; i < impacts.length; i++) {
          expect(level(impacts[i], h, c)).toBeGreaterThanOrEqual(level(impacts[i - 1], h, c));
        }
      }
    }
    for (const p of impacts) {
      for (const c of confidences) {
        for (let i = 1; i < hopCounts.length; i++) {
          expect(level(p, hopCounts[i], c)).toBeGreaterThanOrEqual(level(p, hopCounts[i - 1], c));
        }
      }
    }
    for (const p of impacts) {
      for (const h of hopCounts) {
        for (let i = 1; i < confidences.length; i++) {
          expect(level(p, h, confidences[i])).toBeGreaterThanOrEqual(level(p, h, confidences[i - 1]));
        }
      }
    }
  });
});
