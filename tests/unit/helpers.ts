import type { AdapterSet, QuoteSourceAdapter } from "../../services/meta-router/src/adapters";
import { err, ok, Result, SourceError } from "../../services/meta-router/src/errors";
import type { RegistryFile, SourceDescriptor } from "../../services/meta-router/src/registry";
import type {
  AssessedQuote,
  ExecutionStrategy,
  Quote,
  RiskLevel,
  TradeRequest,
  UnsignedTransaction,
} from "../../services/meta-router/src/schemas";

// Shared fixtures for unit tests

export const TOKEN_X = "0x1111111111111111111111111111111111111111";
export const TOKEN_Y = "0x2222222222222222222222222222222222222222";
export const TOKEN_W = "0x3333333333333333333333333333333333333333";
export const ROUTER = "0x4444444444444444444444444444444444444444";
export const FACTORY = "0x5555555555555555555555555555555555555555";
export const QUOTER = "0x6666666666666666666666666666666666666666";
export const WALLET = "0x7777777777777777777777777777777777777777";

export const REQUEST_ID = "2f1b6c1e-8f4e-4c1a-9a43-0c2b5f8d9e10";

export function makeRequest(overrides: Partial<TradeRequest> = {}): TradeRequest {
  return {
    requestId: REQUEST_ID,
    networkId: "ethereum",
    tokenIn: TOKEN_X,
    tokenOut: TOKEN_Y,
    amountIn: "1000",
    createdAt: 1_700_000_000_000,
    ...overrides,
  };
}

export function makeQuote(overrides: Partial<Quote> = {}): Quote {
  return {
    requestId: REQUEST_ID,
    sourceId: "source_a",
    sourceKind: "DirectDex",
    networkId: "ethereum",
    tokenIn: TOKEN_X,
    tokenOut: TOKEN_Y,
    amountIn: "1000",
    amountOut: "950",
    gasEstimate: 2,
    priceImpactPercent: 0.1,
    route: [{ protocol: "test", tokenIn: TOKEN_X, tokenOut: TOKEN_Y, fee: 3000 }],
    confidence: 0.9,
    fetchedAt: 1_700_000_000_000,
    latencyMs: 10,
    ...overrides,
  };
}

export function assessed(
  quote: Quote,
  arrivalIndex: number,
  riskLevel: RiskLevel = "Low",
  warnings: string[] = []
): AssessedQuote {
  return { quote, risk: { riskLevel, warnings }, arrivalIndex };
}

export function makeStrategy(overrides: Partial<ExecutionStrategy> = {}): ExecutionStrategy {
  return {
    mode: "MetaAggregation",
    maxSlippagePercent: 3,
    quoteTimeoutPerSourceMs: 200,
    globalTimeoutMs: 500,
    preferSpeedOverSavings: false,
    minSavingsThresholdPercent: 0,
    ...overrides,
  };
}

/** Registry with one source of each kind on ethereum. */
export function registryFile(overrides: Partial<RegistryFile> = {}): RegistryFile {
  return {
    builtin_dex: {
      dex_v2: {
        name: "Test V2",
        router_address: ROUTER,
        factory_address: FACTORY,
        protocol_type: "uniswap_v2",
        supported_networks: ["ethereum"],
        intermediate_tokens: { ethereum: TOKEN_W },
      },
    },
    builtin_aggregators: {
      local: {
        name: "Local Router",
        router_address: ROUTER,
        supported_networks: ["ethereum"],
        pools: [
          {
            address: "0x8888888888888888888888888888888888888888",
            network: "ethereum",
            token0: TOKEN_X,
            token1: TOKEN_Y,
          },
        ],
      },
    },
    external_aggregators: {
      ext: {
        name: "External",
        api_url: "https://aggregator.test/api",
        supported_networks: ["ethereum"],
        rate_limit_per_minute: 10,
      },
    },
    aggregation_settings: {
      enable_meta_aggregation: true,
      quote_timeout_seconds: 2,
      max_price_impact_percent: 3,
      prioritize_savings_over_speed: true,
    },
    ...overrides,
  };
}

export type QuoteBehaviour =
  | { type: "quote"; quote: Partial<Quote>; delayMs?: number }
  | { type: "fail"; error: SourceError; delayMs?: number }
  | { type: "hang" };

/**
 * Adapter driven by a per-source script. Hanging sources resolve only when
 * aborted, and then with a timeout error the aggregator must discard.
 */
export class ScriptedAdapter<D extends SourceDescriptor> implements QuoteSourceAdapter<D> {
  readonly kind: D["kind"];
  readonly calls: string[] = [];
  readonly built: string[] = [];
  readonly aborted: string[] = [];
  private readonly script: Record<string, QuoteBehaviour>;

  constructor(kind: D["kind"], script: Record<string, QuoteBehaviour>) {
    this.kind = kind;
    this.script = script;
  }

  fetchQuote(request: TradeRequest, descriptor: D, signal: AbortSignal): Promise<Result<Quote, SourceError>> {
    this.calls.push(descriptor.id);
    const behaviour = this.script[descriptor.id] ?? { type: "hang" };

    return new Promise((resolve) => {
      signal.addEventListener("abort", () => {
        this.aborted.push(descriptor.id);
        resolve(err(new SourceError("SourceTimeout", descriptor.id, "aborted")));
      });

      if (behaviour.type === "hang") return;

      setTimeout(() => {
        if (behaviour.type === "fail") {
          resolve(err(behaviour.error));
          return;
        }
        resolve(
          ok(
            makeQuote({
              requestId: request.requestId,
              sourceId: descriptor.id,
              sourceKind: descriptor.kind,
              ...behaviour.quote,
            })
          )
        );
      }, behaviour.delayMs ?? 0);
    });
  }

  async buildTransaction(quote: Quote): Promise<UnsignedTransaction> {
    this.built.push(quote.sourceId);
    return { networkId: quote.networkId, to: ROUTER, data: "0xdeadbeef", value: "0" };
  }
}

export function scriptedAdapters(script: Record<string, QuoteBehaviour>): {
  adapters: AdapterSet;
  dex: ScriptedAdapter<Extract<SourceDescriptor, { kind: "DirectDex" }>>;
  builtin: ScriptedAdapter<Extract<SourceDescriptor, { kind: "BuiltinAggregator" }>>;
  external: ScriptedAdapter<Extract<SourceDescriptor, { kind: "ExternalAggregator" }>>;
} {
  const dex = new ScriptedAdapter<Extract<SourceDescriptor, { kind: "DirectDex" }>>("DirectDex", script);
  const builtin = new ScriptedAdapter<Extract<SourceDescriptor, { kind: "BuiltinAggregator" }>>(
    "BuiltinAggregator",
    script
  );
  const external = new ScriptedAdapter<Extract<SourceDescriptor, { kind: "ExternalAggregator" }>>(
    "ExternalAggregator",
    script
  );
  return {
    adapters: { DirectDex: dex, BuiltinAggregator: builtin, ExternalAggregator: external },
    dex,
    builtin,
    external,
  };
}
