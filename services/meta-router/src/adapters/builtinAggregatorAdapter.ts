import { BigNumber } from "ethers";
import { OnChainQuoter } from "../collaborators";
import { err, ok, Result, SourceError } from "../errors";
import { BuiltinAggregatorDescriptor, PoolDescriptor } from "../registry";
import { Quote, RouteHop, TradeRequest, UnsignedTransaction } from "../schemas";
import {
  assertApplicable,
  compoundImpact,
  encodeV2Swap,
  getAmountOut,
  minimumAmountOut,
  PricedRoute,
  reservePriceImpact,
  sameToken,
  throwIfAborted,
  toSourceError,
  V2_HOP_GAS,
} from "./base";
import { AdapterContext, BuildContext, QuoteSourceAdapter } from "./types";

// ============================================================================
// Built-in aggregator
// Snapshots reserves of its known pools, then searches direct and two-hop
// routes in-process with constant-product math
// ============================================================================

const DEFAULT_CONFIDENCE = 0.8;

export interface PoolState {
  pool: PoolDescriptor;
  reserve0: BigNumber;
  reserve1: BigNumber;
}

function touches(state: PoolState, token: string): boolean {
  return sameToken(state.pool.token0, token) || sameToken(state.pool.token1, token);
}

function otherToken(state: PoolState, token: string): string {
  return sameToken(state.pool.token0, token) ? state.pool.token1 : state.pool.token0;
}

function swapThrough(state: PoolState, tokenIn: string, amountIn: BigNumber): { out: BigNumber; impact: number } {
  const inIsToken0 = sameToken(state.pool.token0, tokenIn);
  const reserveIn = inIsToken0 ? state.reserve0 : state.reserve1;
  const reserveOut = inIsToken0 ? state.reserve1 : state.reserve0;
  return {
    out: getAmountOut(amountIn, reserveIn, reserveOut, state.pool.feeBps),
    impact: reservePriceImpact(amountIn, reserveIn),
  };
}

function pricePath(
  path: PoolState[],
  tokenIn: string,
  amountIn: BigNumber,
  protocol: string
): { out: BigNumber; priced: PricedRoute } | null {
  let amount = amountIn;
  let token = tokenIn;
  const impacts: number[] = [];
  const route: RouteHop[] = [];

  for (const state of path) {
    const next = otherToken(state, token);
    const step = swapThrough(state, token, amount);
    if (step.out.isZero()) return null;
    route.push({ protocol, pool: state.pool.address, tokenIn: token, tokenOut: next, fee: state.pool.feeBps });
    impacts.push(step.impact);
    amount = step.out;
    token = next;
  }

  return {
    out: amount,
    priced: {
      amountOut: amount.toString(),
      gasEstimate: V2_HOP_GAS * path.length,
      priceImpactPercent: compoundImpact(impacts),
      route,
    },
  };
}

/**
 * Best route over the snapshot: every direct pool, then every two-hop path
 * through a token shared by an input-side and an output-side pool. Direct
 * routes win ties.
 */
export function findBestRoute(
  states: PoolState[],
  tokenIn: string,
  tokenOut: string,
  amountIn: BigNumber,
  protocol: string
): PricedRoute | null {
  const inputSide = states.filter((s) => touches(s, tokenIn));
  const outputSide = states.filter((s) => touches(s, tokenOut));
  const paths: PoolState[][] = [];

  for (const state of inputSide) {
    if (touches(state, tokenOut)) paths.push([state]);
  }

  for (const first of inputSide) {
    const middle = otherToken(first, tokenIn);
    if (sameToken(middle, tokenOut)) continue;
    for (const second of outputSide) {
      if (second === first || !touches(second, middle)) continue;
      paths.push([first, second]);
    }
  }

  let best: { out: BigNumber; priced: PricedRoute } | null = null;
  for (const path of paths) {
    const candidate = pricePath(path, tokenIn, amountIn, protocol);
    if (candidate && (!best || candidate.out.gt(best.out))) {
      best = candidate;
    }
  }

  return best ? best.priced : null;
}

export class BuiltinAggregatorAdapter implements QuoteSourceAdapter<BuiltinAggregatorDescriptor> {
  readonly kind = "BuiltinAggregator" as const;
  private readonly chain: OnChainQuoter;
  private readonly ctx: AdapterContext;

  constructor(chain: OnChainQuoter, ctx: AdapterContext) {
    this.chain = chain;
    this.ctx = ctx;
  }

  async fetchQuote(
    request: TradeRequest,
    descriptor: BuiltinAggregatorDescriptor,
    signal: AbortSignal
  ): Promise<Result<Quote, SourceError>> {
    assertApplicable(request, descriptor);
    const startedAt = this.ctx.now();

    try {
      const states = await this.snapshot(request, descriptor);
      throwIfAborted(signal, descriptor.id);

      const priced = findBestRoute(
        states,
        request.tokenIn,
        request.tokenOut,
        BigNumber.from(request.amountIn),
        descriptor.name
      );
      if (!priced) {
        return err(new SourceError("Unsupported", descriptor.id, "no route through known pools"));
      }

      const fetchedAt = this.ctx.now();
      return ok({
        requestId: request.requestId,
        sourceId: descriptor.id,
        sourceKind: "BuiltinAggregator",
        networkId: request.networkId,
        tokenIn: request.tokenIn,
        tokenOut: request.tokenOut,
        amountIn: request.amountIn,
        amountOut: priced.amountOut,
        gasEstimate: priced.gasEstimate,
        priceImpactPercent: priced.priceImpactPercent,
        route: priced.route,
        confidence: descriptor.confidence ?? DEFAULT_CONFIDENCE,
        fetchedAt,
        latencyMs: fetchedAt - startedAt,
      });
    } catch (error) {
      return err(toSourceError(error, descriptor.id));
    }
  }

  async buildTransaction(
    quote: Quote,
    descriptor: BuiltinAggregatorDescriptor,
    context: BuildContext
  ): Promise<UnsignedTransaction> {
    const minOut = minimumAmountOut(quote.amountOut, context.maxSlippagePercent);
    return {
      networkId: quote.networkId,
      to: descriptor.routerAddress,
      data: encodeV2Swap(quote.amountIn, minOut, quote.route, context.recipient, context.deadline),
      value: "0",
    };
  }

  // Reserves for the pools that can sit on a route of at most two hops
  private async snapshot(
    request: TradeRequest,
    descriptor: BuiltinAggregatorDescriptor
  ): Promise<PoolState[]> {
    const network = request.networkId.toLowerCase();
    const relevant = descriptor.pools.filter(
      (pool) =>
        pool.networkId === network &&
        [pool.token0, pool.token1].some((t) => sameToken(t, request.tokenIn) || sameToken(t, request.tokenOut))
    );

    if (relevant.length === 0) {
      throw new SourceError("Unsupported", descriptor.id, "no known pools for this pair");
    }

    const settled = await Promise.allSettled(
      relevant.map(async (pool): Promise<PoolState> => {
        const reserves = await this.chain.readPoolReserves(network, pool.address, pool.token0);
        return {
          pool,
          reserve0: BigNumber.from(reserves.reserveIn),
          reserve1: BigNumber.from(reserves.reserveOut),
        };
      })
    );

    const states: PoolState[] = [];
    let lastError: unknown = null;
    for (const outcome of settled) {
      if (outcome.status === "fulfilled") {
        states.push(outcome.value);
      } else {
        lastError = outcome.reason;
      }
    }

    if (states.length === 0) {
      throw toSourceError(lastError ?? new Error("no reserves read"), descriptor.id);
    }
    if (lastError) {
      this.ctx.log("debug", "pool_reserves_partial", {
        sourceId: descriptor.id,
        read: states.length,
        failed: relevant.length - states.length,
      });
    }
    return states;
  }
}
