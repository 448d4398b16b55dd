import { z } from "zod";
import { SourceErrorCode } from "./errors";

// ============================================================================
// Meta Router Schemas
// Shared domain types for requests, quotes, strategies and results
// Amounts are raw token base units carried as decimal strings
// ============================================================================

export const SOURCE_KINDS = ["DirectDex", "BuiltinAggregator", "ExternalAggregator"] as const;
export type SourceKind = (typeof SOURCE_KINDS)[number];

export const EXECUTION_MODES = ["DirectDex", "NormalAggregation", "MetaAggregation"] as const;
export type ExecutionMode = (typeof EXECUTION_MODES)[number];

export const RISK_LEVELS = ["Low", "Medium", "High", "VeryHigh"] as const;
export type RiskLevel = (typeof RISK_LEVELS)[number];

export const AddressSchema = z
  .string()
  .regex(/^0x[0-9a-fA-F]{40}$/, "expected a 20-byte hex address");

export const RawAmountSchema = z
  .string()
  .regex(/^\d+$/, "expected an integer amount in base units");

// ----------------------------------------------------------------------------
// Trade request
// ----------------------------------------------------------------------------

export interface TradeRequest {
  readonly requestId: string;
  readonly networkId: string;
  readonly tokenIn: string;
  readonly tokenOut: string;
  readonly amountIn: string;
  readonly createdAt: number;
  /** Output-token base units per gas unit; gas is ignored in ranking without it */
  readonly outputPerGasUnit?: number;
}

export const QuoteRequestBodySchema = z
  .object({
    network: z.string().min(1),
    token_in: AddressSchema,
    token_out: AddressSchema,
    amount_in: RawAmountSchema.refine((v) => BigInt(v) > 0n, "amount_in must be positive"),
    output_per_gas_unit: z.number().nonnegative().optional(),
    strategy: z.unknown().optional(),
  })
  .refine((body) => body.token_in.toLowerCase() !== body.token_out.toLowerCase(), {
    message: "token_in and token_out must differ",
  });

export type QuoteRequestBody = z.infer<typeof QuoteRequestBodySchema>;

export const ExecuteRequestBodySchema = z.object({
  request_id: z.string().uuid(),
  source_id: z.string().optional(),
  strategy: z.unknown().optional(),
});

// ----------------------------------------------------------------------------
// Execution strategy (caller supplied, immutable per call)
// ----------------------------------------------------------------------------

export const ExecutionStrategySchema = z.object({
  mode: z.enum(EXECUTION_MODES),
  maxSlippagePercent: z.number().positive().max(100),
  quoteTimeoutPerSourceMs: z.number().int().positive(),
  globalTimeoutMs: z.number().int().positive(),
  preferSpeedOverSavings: z.boolean(),
  minSavingsThresholdPercent: z.number().min(0),
  // Quorum of quotes required before MetaAggregation recommends execution
  minConfirmations: z.number().int().min(1).optional(),
});

export type ExecutionStrategy = Readonly<z.infer<typeof ExecutionStrategySchema>>;

export const PartialExecutionStrategySchema = ExecutionStrategySchema.partial();

// ----------------------------------------------------------------------------
// Quotes
// ----------------------------------------------------------------------------

export interface RouteHop {
  readonly protocol: string;
  readonly pool?: string;
  readonly tokenIn: string;
  readonly tokenOut: string;
  /** Uniswap v3 fee tier (hundredths of a bip) or v2 fee in bps */
  readonly fee?: number;
}

export interface Quote {
  readonly requestId: string;
  readonly sourceId: string;
  readonly sourceKind: SourceKind;
  readonly networkId: string;
  readonly tokenIn: string;
  readonly tokenOut: string;
  readonly amountIn: string;
  readonly amountOut: string;
  readonly gasEstimate: number;
  readonly priceImpactPercent: number;
  readonly route: readonly RouteHop[];
  readonly confidence: number;
  readonly fetchedAt: number;
  readonly latencyMs: number;
  /** External aggregators only: ready-made swap call */
  readonly calldata?: string;
  readonly txTarget?: string;
  readonly txValue?: string;
}

export interface RiskAssessment {
  readonly riskLevel: RiskLevel;
  readonly warnings: readonly string[];
}

export interface AssessedQuote {
  readonly quote: Quote;
  readonly risk: RiskAssessment;
  /** Completion order within one gather run, starting at 0 */
  readonly arrivalIndex: number;
}

export interface SourceOutcome {
  readonly sourceId: string;
  readonly kind: SourceKind;
  readonly status: "ok" | "failed" | "cancelled";
  readonly errorCode?: SourceErrorCode;
  readonly message?: string;
  readonly latencyMs: number;
}

export interface ExecutionRecommendation {
  readonly shouldExecute: boolean;
  readonly riskLevel: RiskLevel;
  readonly rationale: string;
  readonly warnings: readonly string[];
}

export interface AggregationResult {
  readonly requestId: string;
  readonly request: TradeRequest;
  readonly quotes: readonly AssessedQuote[];
  readonly bestQuote: Quote;
  readonly bestRisk: RiskAssessment;
  readonly recommendedExecution: ExecutionRecommendation;
  readonly sourceOutcomes: readonly SourceOutcome[];
  readonly completedAt: number;
}

// ----------------------------------------------------------------------------
// Execution
// ----------------------------------------------------------------------------

export interface UnsignedTransaction {
  readonly networkId: string;
  readonly to: string;
  readonly data: string;
  readonly value: string;
  readonly gasLimit?: string;
  readonly maxFeePerGas?: string;
  readonly maxPriorityFeePerGas?: string;
}

export type TradeFailureCode =
  | "ExecutionFailed"
  | "SigningError"
  | "SubmissionError"
  | "Reverted"
  | "ReceiptTimeout";

export interface TradeResult {
  readonly requestId: string;
  readonly sourceId: string;
  readonly confirmed: boolean;
  readonly txHash?: string;
  readonly failureCode?: TradeFailureCode;
  readonly failureReason?: string;
  readonly actualAmountOut?: string;
  readonly attempts: number;
}

// ----------------------------------------------------------------------------
// External aggregator HTTP payloads
// ----------------------------------------------------------------------------

const IntegerLikeSchema = z.union([
  RawAmountSchema,
  z.number().int().nonnegative().transform((n) => BigInt(n).toString()),
]);

interface ExternalRouteHop {
  protocol: string;
  pool?: string;
  token_in?: string;
  token_out?: string;
  fee?: number;
}

// Hops arrive either as bare pool ids or as objects
export const ExternalRouteHopSchema = z.union([
  z.string().transform((pool): ExternalRouteHop => ({ protocol: "external", pool })),
  z
    .object({
      protocol: z.string().default("external"),
      pool: z.string().optional(),
      token_in: z.string().optional(),
      token_out: z.string().optional(),
      fee: z.number().optional(),
    })
    .transform((hop): ExternalRouteHop => hop),
]);

export const ExternalQuoteResponseSchema = z.object({
  amount_out: IntegerLikeSchema,
  gas_estimate: z.coerce.number().nonnegative(),
  route: z.array(ExternalRouteHopSchema).default([]),
  calldata: z.string().regex(/^0x[0-9a-fA-F]*$/).optional(),
  to: AddressSchema.optional(),
  value: IntegerLikeSchema.optional(),
  price_impact_percent: z.coerce.number().min(0).optional(),
  confidence: z.number().min(0).max(1).optional(),
});

export type ExternalQuoteResponse = z.infer<typeof ExternalQuoteResponseSchema>;

export const ExternalSwapResponseSchema = z.object({
  to: AddressSchema,
  data: z.string().regex(/^0x[0-9a-fA-F]*$/),
  value: IntegerLikeSchema.default("0"),
  gas_limit: IntegerLikeSchema.optional(),
});

export type ExternalSwapResponse = z.infer<typeof ExternalSwapResponseSchema>;
