import { BigNumber, ethers } from "ethers";
import { OnChainQuoter } from "../collaborators";
import { err, ok, Result, SourceError } from "../errors";
import { DirectDexDescriptor } from "../registry";
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
// Direct DEX adapter
// uniswap_v3: QuoterV2 simulation across fee tiers, WETH-style two-hop fallback
// uniswap_v2: factory pair lookup + reserve math
// ============================================================================

// SwapRouter02: deadline is enforced through multicall(uint256,bytes[])
const SWAP_ROUTER_02 = new ethers.utils.Interface([
  "function exactInputSingle((address tokenIn, address tokenOut, uint24 fee, address recipient, uint256 amountIn, uint256 amountOutMinimum, uint160 sqrtPriceLimitX96)) external payable returns (uint256 amountOut)",
  "function exactInput((bytes path, address recipient, uint256 amountIn, uint256 amountOutMinimum)) external payable returns (uint256 amountOut)",
  "function multicall(uint256 deadline, bytes[] data) external payable returns (bytes[] results)",
]);

const QUOTER_CONFIDENCE = 0.9;
const RESERVES_CONFIDENCE = 0.85;

// Reference trade size for v3 price impact: amountIn / 1000
const REFERENCE_DIVISOR = 1000;

interface TierQuote {
  fee: number;
  amountOut: BigNumber;
  gasEstimate: number;
}

interface V2Hop {
  pool: string;
  amountOut: BigNumber;
  priceImpactPercent: number;
}

function isRevert(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "CALL_EXCEPTION"
  );
}

export class DirectDexAdapter implements QuoteSourceAdapter<DirectDexDescriptor> {
  readonly kind = "DirectDex" as const;
  private readonly chain: OnChainQuoter;
  private readonly ctx: AdapterContext;

  constructor(chain: OnChainQuoter, ctx: AdapterContext) {
    this.chain = chain;
    this.ctx = ctx;
  }

  async fetchQuote(
    request: TradeRequest,
    descriptor: DirectDexDescriptor,
    signal: AbortSignal
  ): Promise<Result<Quote, SourceError>> {
    assertApplicable(request, descriptor);
    const startedAt = this.ctx.now();

    try {
      const priced =
        descriptor.protocolType === "uniswap_v3"
          ? await this.quoteV3(request, descriptor, signal)
          : await this.quoteV2(request, descriptor, signal);

      throwIfAborted(signal, descriptor.id);

      if (BigNumber.from(priced.amountOut).isZero()) {
        return err(new SourceError("Unsupported", descriptor.id, "quoted output is zero"));
      }

      const fetchedAt = this.ctx.now();
      const defaultConfidence =
        descriptor.protocolType === "uniswap_v3" ? QUOTER_CONFIDENCE : RESERVES_CONFIDENCE;

      return ok({
        requestId: request.requestId,
        sourceId: descriptor.id,
        sourceKind: "DirectDex",
        networkId: request.networkId,
        tokenIn: request.tokenIn,
        tokenOut: request.tokenOut,
        amountIn: request.amountIn,
        amountOut: priced.amountOut,
        gasEstimate: priced.gasEstimate,
        priceImpactPercent: priced.priceImpactPercent,
        route: priced.route,
        confidence: descriptor.confidence ?? defaultConfidence,
        fetchedAt,
        latencyMs: fetchedAt - startedAt,
      });
    } catch (error) {
      return err(toSourceError(error, descriptor.id));
    }
  }

  async buildTransaction(
    quote: Quote,
    descriptor: DirectDexDescriptor,
    context: BuildContext
  ): Promise<UnsignedTransaction> {
    const minOut = minimumAmountOut(quote.amountOut, context.maxSlippagePercent);

    if (descriptor.protocolType === "uniswap_v2") {
      return {
        networkId: quote.networkId,
        to: descriptor.contracts.router,
        data: encodeV2Swap(quote.amountIn, minOut, quote.route, context.recipient, context.deadline),
        value: "0",
      };
    }

    const inner =
      quote.route.length === 1
        ? SWAP_ROUTER_02.encodeFunctionData("exactInputSingle", [
            {
              tokenIn: quote.route[0].tokenIn,
              tokenOut: quote.route[0].tokenOut,
              fee: this.hopFee(quote.route[0]),
              recipient: context.recipient,
              amountIn: BigNumber.from(quote.amountIn),
              amountOutMinimum: minOut,
              sqrtPriceLimitX96: 0,
            },
          ])
        : SWAP_ROUTER_02.encodeFunctionData("exactInput", [
            {
              path: this.encodeV3Path(quote.route),
              recipient: context.recipient,
              amountIn: BigNumber.from(quote.amountIn),
              amountOutMinimum: minOut,
            },
          ]);

    return {
      networkId: quote.networkId,
      to: descriptor.contracts.router,
      data: SWAP_ROUTER_02.encodeFunctionData("multicall", [context.deadline, [inner]]),
      value: "0",
    };
  }

  // --------------------------------------------------------------------------
  // Uniswap v3
  // --------------------------------------------------------------------------

  private async quoteV3(
    request: TradeRequest,
    descriptor: DirectDexDescriptor,
    signal: AbortSignal
  ): Promise<PricedRoute> {
    const quoter = descriptor.contracts.quoter;
    if (!quoter) {
      throw new SourceError("Unsupported", descriptor.id, "no quoter configured");
    }

    const network = request.networkId.toLowerCase();
    const amountIn = BigNumber.from(request.amountIn);
    const protocol = descriptor.name;

    const direct = await this.bestTier(network, quoter, request.tokenIn, request.tokenOut, amountIn, descriptor.feeTiers);
    if (direct) {
      const route: RouteHop[] = [
        { protocol, tokenIn: request.tokenIn, tokenOut: request.tokenOut, fee: direct.fee },
      ];
      return {
        amountOut: direct.amountOut.toString(),
        gasEstimate: direct.gasEstimate,
        priceImpactPercent: await this.referenceImpact(
          descriptor.id,
          network,
          quoter,
          route,
          amountIn,
          direct.amountOut
        ),
        route,
      };
    }

    const via = this.intermediate(descriptor, request);
    throwIfAborted(signal, descriptor.id);

    const first = await this.bestTier(network, quoter, request.tokenIn, via, amountIn, descriptor.feeTiers);
    if (!first) {
      throw new SourceError("Unsupported", descriptor.id, "no liquidity on direct or intermediate path");
    }
    throwIfAborted(signal, descriptor.id);

    const second = await this.bestTier(network, quoter, via, request.tokenOut, first.amountOut, descriptor.feeTiers);
    if (!second) {
      throw new SourceError("Unsupported", descriptor.id, "no liquidity on direct or intermediate path");
    }

    const route: RouteHop[] = [
      { protocol, tokenIn: request.tokenIn, tokenOut: via, fee: first.fee },
      { protocol, tokenIn: via, tokenOut: request.tokenOut, fee: second.fee },
    ];

    return {
      amountOut: second.amountOut.toString(),
      gasEstimate: first.gasEstimate + second.gasEstimate,
      priceImpactPercent: await this.referenceImpact(
        descriptor.id,
        network,
        quoter,
        route,
        amountIn,
        second.amountOut
      ),
      route,
    };
  }

  /**
   * Best output across fee tiers. Null when every tier reverts (no pool);
   * any non-revert failure with no successful tier is rethrown.
   */
  private async bestTier(
    networkId: string,
    quoter: string,
    tokenIn: string,
    tokenOut: string,
    amountIn: BigNumber,
    feeTiers: readonly number[]
  ): Promise<TierQuote | null> {
    const settled = await Promise.allSettled(
      feeTiers.map(async (fee): Promise<TierQuote> => {
        const result = await this.chain.simulateQuote({
          networkId,
          quoter,
          tokenIn,
          tokenOut,
          amountIn: amountIn.toString(),
          fee,
        });
        return { fee, amountOut: BigNumber.from(result.amountOut), gasEstimate: result.gasEstimate };
      })
    );

    let best: TierQuote | null = null;
    let failure: unknown = null;

    for (const outcome of settled) {
      if (outcome.status === "fulfilled") {
        if (!outcome.value.amountOut.isZero() && (!best || outcome.value.amountOut.gt(best.amountOut))) {
          best = outcome.value;
        }
      } else if (!isRevert(outcome.reason)) {
        failure = outcome.reason;
      }
    }

    if (!best && failure) {
      throw failure;
    }
    return best;
  }

  // Impact = shortfall of the trade's price against a 1/1000-size trade on the same path
  private async referenceImpact(
    sourceId: string,
    networkId: string,
    quoter: string,
    route: RouteHop[],
    amountIn: BigNumber,
    amountOut: BigNumber
  ): Promise<number> {
    const referenceIn = amountIn.div(REFERENCE_DIVISOR);
    if (referenceIn.isZero()) return 0;

    try {
      let referenceOut = referenceIn;
      for (const hop of route) {
        const result = await this.chain.simulateQuote({
          networkId,
          quoter,
          tokenIn: hop.tokenIn,
          tokenOut: hop.tokenOut,
          amountIn: referenceOut.toString(),
          fee: this.hopFee(hop),
        });
        referenceOut = BigNumber.from(result.amountOut);
      }
      if (referenceOut.isZero()) {
        throw new Error("reference output is zero");
      }

      // ratio = (out / in) / (refOut / refIn), scaled by 1e6
      const ratio = amountOut.mul(referenceIn).mul(1_000_000).div(amountIn.mul(referenceOut));
      const capped = ratio.gt(1_000_000) ? 1_000_000 : ratio.toNumber();
      return (1_000_000 - capped) / 10_000;
    } catch (error) {
      // Unmeasured impact fails the source
      const reason = error instanceof Error ? error.message : String(error);
      this.ctx.log("warn", "reference_quote_failed", { sourceId, networkId, error: reason });
      throw new SourceError("SourceUnavailable", sourceId, `price impact could not be measured: ${reason}`);
    }
  }

  private hopFee(hop: RouteHop): number {
    if (hop.fee === undefined) {
      throw new Error(`Route hop ${hop.tokenIn} -> ${hop.tokenOut} has no fee tier`);
    }
    return hop.fee;
  }

  private encodeV3Path(route: readonly RouteHop[]): string {
    const types: string[] = ["address"];
    const values: Array<string | number> = [route[0].tokenIn];
    for (const hop of route) {
      types.push("uint24", "address");
      values.push(this.hopFee(hop), hop.tokenOut);
    }
    return ethers.utils.solidityPack(types, values);
  }

  // --------------------------------------------------------------------------
  // Uniswap v2
  // --------------------------------------------------------------------------

  private async quoteV2(
    request: TradeRequest,
    descriptor: DirectDexDescriptor,
    signal: AbortSignal
  ): Promise<PricedRoute> {
    const network = request.networkId.toLowerCase();
    const amountIn = BigNumber.from(request.amountIn);
    const protocol = descriptor.name;

    const direct = await this.v2Hop(network, descriptor, request.tokenIn, request.tokenOut, amountIn);
    if (direct) {
      return {
        amountOut: direct.amountOut.toString(),
        gasEstimate: V2_HOP_GAS,
        priceImpactPercent: direct.priceImpactPercent,
        route: [
          { protocol, pool: direct.pool, tokenIn: request.tokenIn, tokenOut: request.tokenOut, fee: descriptor.feeBps },
        ],
      };
    }

    const via = this.intermediate(descriptor, request);
    throwIfAborted(signal, descriptor.id);

    const first = await this.v2Hop(network, descriptor, request.tokenIn, via, amountIn);
    if (!first) {
      throw new SourceError("Unsupported", descriptor.id, "no pair on direct or intermediate path");
    }
    throwIfAborted(signal, descriptor.id);

    const second = await this.v2Hop(network, descriptor, via, request.tokenOut, first.amountOut);
    if (!second) {
      throw new SourceError("Unsupported", descriptor.id, "no pair on direct or intermediate path");
    }

    return {
      amountOut: second.amountOut.toString(),
      gasEstimate: V2_HOP_GAS * 2,
      priceImpactPercent: compoundImpact([first.priceImpactPercent, second.priceImpactPercent]),
      route: [
        { protocol, pool: first.pool, tokenIn: request.tokenIn, tokenOut: via, fee: descriptor.feeBps },
        { protocol, pool: second.pool, tokenIn: via, tokenOut: request.tokenOut, fee: descriptor.feeBps },
      ],
    };
  }

  private async v2Hop(
    networkId: string,
    descriptor: DirectDexDescriptor,
    tokenIn: string,
    tokenOut: string,
    amountIn: BigNumber
  ): Promise<V2Hop | null> {
    const pool = await this.chain.getPairAddress(networkId, descriptor.contracts.factory, tokenIn, tokenOut);
    if (!pool) return null;

    const reserves = await this.chain.readPoolReserves(networkId, pool, tokenIn);
    const reserveIn = BigNumber.from(reserves.reserveIn);
    const reserveOut = BigNumber.from(reserves.reserveOut);
    const amountOut = getAmountOut(amountIn, reserveIn, reserveOut, descriptor.feeBps);
    if (amountOut.isZero()) return null;

    return { pool, amountOut, priceImpactPercent: reservePriceImpact(amountIn, reserveIn) };
  }

  private intermediate(descriptor: DirectDexDescriptor, request: TradeRequest): string {
    const via = descriptor.intermediateTokens[request.networkId.toLowerCase()];
    if (!via || sameToken(via, request.tokenIn) || sameToken(via, request.tokenOut)) {
      throw new SourceError("Unsupported", descriptor.id, "pair not tradable on this source");
    }
    return via;
  }
}
