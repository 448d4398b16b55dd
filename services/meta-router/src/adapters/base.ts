import { BigNumber, ethers } from "ethers";
import { errorMessage, SourceError } from "../errors";
import { SourceDescriptor } from "../registry";
import { RouteHop, TradeRequest } from "../schemas";

// ============================================================================
// Shared adapter helpers: applicability, constant-product math, calldata
// ============================================================================

// Per-hop gas for v2-style swaps, used where no quoter reports gas
export const V2_HOP_GAS = 120000;

export const V2_ROUTER = new ethers.utils.Interface([
  "function swapExactTokensForTokens(uint256 amountIn, uint256 amountOutMin, address[] path, address to, uint256 deadline) external returns (uint256[] amounts)",
]);

export interface PricedRoute {
  amountOut: string;
  gasEstimate: number;
  priceImpactPercent: number;
  route: RouteHop[];
}

/**
 * The aggregator only hands a source requests for networks it serves; anything
 * else is a wiring bug, not a source failure.
 */
export function assertApplicable(request: TradeRequest, descriptor: SourceDescriptor): void {
  if (!descriptor.supportedNetworks.has(request.networkId.toLowerCase())) {
    throw new Error(`Source ${descriptor.id} does not serve network ${request.networkId}`);
  }
}

export function throwIfAborted(signal: AbortSignal, sourceId: string): void {
  if (signal.aborted) {
    throw new SourceError("SourceTimeout", sourceId, "quote cancelled");
  }
}

export function toSourceError(error: unknown, sourceId: string): SourceError {
  if (error instanceof SourceError) return error;
  return new SourceError("SourceUnavailable", sourceId, errorMessage(error));
}

export function sameToken(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

// Uniswap v2 getAmountOut with a fee in bps
export function getAmountOut(
  amountIn: BigNumber,
  reserveIn: BigNumber,
  reserveOut: BigNumber,
  feeBps: number
): BigNumber {
  if (amountIn.isZero() || reserveIn.isZero() || reserveOut.isZero()) {
    return BigNumber.from(0);
  }
  const amountInWithFee = amountIn.mul(10000 - feeBps);
  return amountInWithFee.mul(reserveOut).div(reserveIn.mul(10000).add(amountInWithFee));
}

// Share of the input-side reserve the trade adds, in percent
export function reservePriceImpact(amountIn: BigNumber, reserveIn: BigNumber): number {
  const denominator = reserveIn.add(amountIn);
  if (denominator.isZero()) return 100;
  return amountIn.mul(1_000_000).div(denominator).toNumber() / 10_000;
}

// Impacts of consecutive hops compound multiplicatively
export function compoundImpact(impacts: number[]): number {
  const retained = impacts.reduce((acc, impact) => acc * (1 - impact / 100), 1);
  return Math.round((1 - retained) * 100 * 10_000) / 10_000;
}

export function minimumAmountOut(amountOut: string, maxSlippagePercent: number): BigNumber {
  const keepBps = Math.max(0, 10000 - Math.round(maxSlippagePercent * 100));
  return BigNumber.from(amountOut).mul(keepBps).div(10000);
}

export function tokenPath(route: readonly RouteHop[]): string[] {
  if (route.length === 0) {
    throw new Error("Cannot build a swap for an empty route");
  }
  return [route[0].tokenIn, ...route.map((hop) => hop.tokenOut)];
}

export function encodeV2Swap(
  amountIn: string,
  minOut: BigNumber,
  route: readonly RouteHop[],
  recipient: string,
  deadline: number
): string {
  return V2_ROUTER.encodeFunctionData("swapExactTokensForTokens", [
    BigNumber.from(amountIn),
    minOut,
    tokenPath(route),
    recipient,
    deadline,
  ]);
}
