import axios, { AxiosInstance } from "axios";
import { err, errorMessage, ok, Result, SourceError } from "../errors";
import { RateLimiter } from "../rateLimiter";
import { ExternalAggregatorDescriptor } from "../registry";
import {
  ExternalQuoteResponse,
  ExternalQuoteResponseSchema,
  ExternalSwapResponseSchema,
  Quote,
  RouteHop,
  TradeRequest,
  UnsignedTransaction,
} from "../schemas";
import { assertApplicable, minimumAmountOut, toSourceError } from "./base";
import { AdapterContext, BuildContext, QuoteSourceAdapter } from "./types";

// ============================================================================
// External aggregator adapter
// POST {api_url}/quote for pricing, POST {api_url}/swap for unsigned tx fields
// Every HTTP call is gated by the source's token bucket
// ============================================================================

export type HttpClient = Pick<AxiosInstance, "post">;

const DEFAULT_CONFIDENCE = 0.75;
// Confidence discount when the aggregator does not report price impact
const MISSING_IMPACT_FACTOR = 0.8;

const UNSUPPORTED_STATUSES = new Set([400, 404, 422]);

function retryAfterMs(header: unknown): number | undefined {
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds > 0 ? seconds * 1000 : undefined;
}

export class ExternalAggregatorAdapter implements QuoteSourceAdapter<ExternalAggregatorDescriptor> {
  readonly kind = "ExternalAggregator" as const;
  private readonly http: HttpClient;
  private readonly limiter: RateLimiter;
  private readonly ctx: AdapterContext;
  private readonly env: NodeJS.ProcessEnv;

  constructor(
    http: HttpClient,
    limiter: RateLimiter,
    ctx: AdapterContext,
    env: NodeJS.ProcessEnv = process.env
  ) {
    this.http = http;
    this.limiter = limiter;
    this.ctx = ctx;
    this.env = env;
  }

  async fetchQuote(
    request: TradeRequest,
    descriptor: ExternalAggregatorDescriptor,
    signal: AbortSignal
  ): Promise<Result<Quote, SourceError>> {
    assertApplicable(request, descriptor);
    const startedAt = this.ctx.now();

    const gate = this.limiter.tryAcquire(descriptor.id, descriptor.rateLimitPerMinute);
    if (!gate.allowed) {
      return err(
        new SourceError(
          "RateLimited",
          descriptor.id,
          `rate limit of ${descriptor.rateLimitPerMinute}/min reached`,
          gate.retryAfterMs
        )
      );
    }

    const headers = this.authHeaders(descriptor);
    if (!headers.ok) {
      return err(headers.error);
    }

    let data: unknown;
    try {
      const response = await this.http.post<unknown>(
        `${descriptor.apiUrl}/quote`,
        {
          token_in: request.tokenIn,
          token_out: request.tokenOut,
          amount_in: request.amountIn,
          network: request.networkId,
        },
        { headers: headers.value, signal }
      );
      data = response.data;
    } catch (error) {
      return err(this.classify(error, descriptor.id));
    }

    const parsed = ExternalQuoteResponseSchema.safeParse(data);
    if (!parsed.success) {
      return err(
        new SourceError(
          "InvalidSourceResponse",
          descriptor.id,
          parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")
        )
      );
    }

    const body = parsed.data;
    if (BigInt(body.amount_out) === 0n) {
      return err(new SourceError("Unsupported", descriptor.id, "aggregator returned zero output"));
    }

    const fetchedAt = this.ctx.now();
    const baseConfidence = body.confidence ?? descriptor.confidence ?? DEFAULT_CONFIDENCE;

    return ok({
      requestId: request.requestId,
      sourceId: descriptor.id,
      sourceKind: "ExternalAggregator",
      networkId: request.networkId,
      tokenIn: request.tokenIn,
      tokenOut: request.tokenOut,
      amountIn: request.amountIn,
      amountOut: body.amount_out,
      gasEstimate: body.gas_estimate,
      priceImpactPercent: body.price_impact_percent ?? 0,
      route: this.toRoute(body, request, descriptor),
      confidence:
        body.price_impact_percent === undefined ? baseConfidence * MISSING_IMPACT_FACTOR : baseConfidence,
      fetchedAt,
      latencyMs: fetchedAt - startedAt,
      calldata: body.calldata,
      txTarget: body.to,
      txValue: body.value,
    });
  }

  async buildTransaction(
    quote: Quote,
    descriptor: ExternalAggregatorDescriptor,
    context: BuildContext
  ): Promise<UnsignedTransaction> {
    if (quote.calldata && quote.txTarget) {
      return {
        networkId: quote.networkId,
        to: quote.txTarget,
        data: quote.calldata,
        value: quote.txValue ?? "0",
      };
    }

    const gate = this.limiter.tryAcquire(descriptor.id, descriptor.rateLimitPerMinute);
    if (!gate.allowed) {
      throw new SourceError(
        "RateLimited",
        descriptor.id,
        `rate limit of ${descriptor.rateLimitPerMinute}/min reached`,
        gate.retryAfterMs
      );
    }

    const headers = this.authHeaders(descriptor);
    if (!headers.ok) {
      throw headers.error;
    }

    // Bounded by the client's own timeout; the executor has no gather deadline
    let data: unknown;
    try {
      const response = await this.http.post<unknown>(
        `${descriptor.apiUrl}/swap`,
        {
          token_in: quote.tokenIn,
          token_out: quote.tokenOut,
          amount_in: quote.amountIn,
          network: quote.networkId,
          min_amount_out: minimumAmountOut(quote.amountOut, context.maxSlippagePercent).toString(),
          recipient: context.recipient,
          deadline: context.deadline,
        },
        { headers: headers.value }
      );
      data = response.data;
    } catch (error) {
      throw this.classify(error, descriptor.id);
    }

    const parsed = ExternalSwapResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new SourceError("InvalidSourceResponse", descriptor.id, "swap response is malformed");
    }

    return {
      networkId: quote.networkId,
      to: parsed.data.to,
      data: parsed.data.data,
      value: parsed.data.value,
      gasLimit: parsed.data.gas_limit,
    };
  }

  private authHeaders(descriptor: ExternalAggregatorDescriptor): Result<Record<string, string>, SourceError> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (!descriptor.requiresApiKey) {
      return ok(headers);
    }

    const key = this.env[descriptor.apiKeyEnv];
    if (!key) {
      return err(
        new SourceError("SourceUnavailable", descriptor.id, `missing API key (${descriptor.apiKeyEnv})`)
      );
    }
    headers.Authorization = `Bearer ${key}`;
    return ok(headers);
  }

  private classify(error: unknown, sourceId: string): SourceError {
    if (axios.isCancel(error)) {
      return new SourceError("SourceTimeout", sourceId, "request cancelled");
    }
    if (!axios.isAxiosError(error)) {
      return toSourceError(error, sourceId);
    }

    if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT" || error.code === "ERR_CANCELED") {
      return new SourceError("SourceTimeout", sourceId, error.message);
    }

    const status = error.response?.status;
    if (status === 429) {
      return new SourceError(
        "RateLimited",
        sourceId,
        "aggregator rejected request with 429",
        retryAfterMs(error.response?.headers["retry-after"])
      );
    }
    if (status !== undefined && UNSUPPORTED_STATUSES.has(status)) {
      return new SourceError("Unsupported", sourceId, `aggregator answered ${status}`);
    }

    this.ctx.log("debug", "external_quote_http_error", {
      sourceId,
      status,
      error: errorMessage(error),
    });
    return new SourceError(
      "SourceUnavailable",
      sourceId,
      status !== undefined ? `aggregator answered ${status}` : errorMessage(error)
    );
  }

  private toRoute(
    body: ExternalQuoteResponse,
    request: TradeRequest,
    descriptor: ExternalAggregatorDescriptor
  ): RouteHop[] {
    if (body.route.length === 0) {
      return [{ protocol: descriptor.name, tokenIn: request.tokenIn, tokenOut: request.tokenOut }];
    }

    const last = body.route.length - 1;
    return body.route.map((hop, index) => ({
      protocol: hop.protocol,
      pool: hop.pool,
      tokenIn: hop.token_in ?? (index === 0 ? request.tokenIn : "unknown"),
      tokenOut: hop.token_out ?? (index === last ? request.tokenOut : "unknown"),
      fee: hop.fee,
    }));
  }
}
