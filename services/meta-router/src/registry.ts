import fs from "fs";
import { z } from "zod";
import { AddressSchema, ExecutionMode, SourceKind } from "./schemas";

// ============================================================================
// Source Registry
// Static catalog of quote sources, loaded once and swapped atomically on reload
// ============================================================================

const NetworkListSchema = z
  .array(z.string().min(1))
  .min(1)
  .transform((networks) => networks.map((n) => n.toLowerCase()));

const RateLimitSchema = z.number().int().min(0);
const ConfidenceSchema = z.number().min(0).max(1);

const DirectDexEntrySchema = z
  .object({
    name: z.string().min(1),
    router_address: AddressSchema,
    factory_address: AddressSchema,
    quoter_address: AddressSchema.optional(),
    position_manager_address: AddressSchema.optional(),
    multicall_address: AddressSchema.optional(),
    protocol_type: z.enum(["uniswap_v2", "uniswap_v3"]),
    supported_networks: NetworkListSchema,
    enabled: z.boolean().default(true),
    // v3 fee tiers in hundredths of a bip (500 = 0.05%)
    fee_tiers: z.array(z.number().int().positive()).min(1).default([500, 3000, 10000]),
    // v2 pool fee in bps
    fee_bps: z.number().int().min(0).max(10000).default(30),
    // Two-hop fallback token per network, usually the wrapped native token
    intermediate_tokens: z.record(z.string(), AddressSchema).default({}),
    rate_limit_per_minute: RateLimitSchema.default(0),
    confidence: ConfidenceSchema.optional(),
    contracts: z.record(z.string(), z.string()).default({}),
  })
  .refine((entry) => entry.protocol_type !== "uniswap_v3" || entry.quoter_address, {
    message: "uniswap_v3 sources need a quoter_address",
  });

const PoolEntrySchema = z.object({
  address: AddressSchema,
  network: z.string().min(1).transform((n) => n.toLowerCase()),
  token0: AddressSchema,
  token1: AddressSchema,
  fee_bps: z.number().int().min(0).max(10000).default(30),
});

const BuiltinAggregatorEntrySchema = z.object({
  name: z.string().min(1),
  router_address: AddressSchema,
  supported_networks: NetworkListSchema,
  enabled: z.boolean().default(true),
  pools: z.array(PoolEntrySchema).min(1),
  rate_limit_per_minute: RateLimitSchema.default(0),
  confidence: ConfidenceSchema.optional(),
});

const ExternalAggregatorEntrySchema = z.object({
  name: z.string().min(1),
  api_url: z.string().url(),
  supported_networks: NetworkListSchema,
  enabled: z.boolean().default(true),
  rate_limit_per_minute: RateLimitSchema.default(60),
  requires_api_key: z.boolean().default(false),
  api_key_env: z.string().optional(),
  confidence: ConfidenceSchema.optional(),
});

const AggregationSettingsSchema = z.object({
  enable_meta_aggregation: z.boolean().default(true),
  quote_timeout_seconds: z.number().positive().default(5),
  max_price_impact_percent: z.number().positive().default(3),
  prioritize_savings_over_speed: z.boolean().default(true),
});

export const RegistryFileSchema = z.object({
  builtin_dex: z.record(z.string(), DirectDexEntrySchema).default({}),
  builtin_aggregators: z.record(z.string(), BuiltinAggregatorEntrySchema).default({}),
  external_aggregators: z.record(z.string(), ExternalAggregatorEntrySchema).default({}),
  aggregation_settings: AggregationSettingsSchema.default({}),
});

export type RegistryFile = z.input<typeof RegistryFileSchema>;

// ----------------------------------------------------------------------------
// Descriptors
// ----------------------------------------------------------------------------

interface BaseDescriptor {
  readonly id: string;
  readonly kind: SourceKind;
  readonly name: string;
  readonly supportedNetworks: ReadonlySet<string>;
  readonly enabled: boolean;
  /** 0 = not limited */
  readonly rateLimitPerMinute: number;
  readonly confidence?: number;
}

export interface DexContracts {
  readonly router: string;
  readonly factory: string;
  readonly quoter?: string;
  readonly positionManager?: string;
  readonly multicall?: string;
  readonly extra: Readonly<Record<string, string>>;
}

export interface DirectDexDescriptor extends BaseDescriptor {
  readonly kind: "DirectDex";
  readonly protocolType: "uniswap_v2" | "uniswap_v3";
  readonly contracts: DexContracts;
  readonly feeTiers: readonly number[];
  readonly feeBps: number;
  readonly intermediateTokens: Readonly<Record<string, string>>;
}

export interface PoolDescriptor {
  readonly address: string;
  readonly networkId: string;
  readonly token0: string;
  readonly token1: string;
  readonly feeBps: number;
}

export interface BuiltinAggregatorDescriptor extends BaseDescriptor {
  readonly kind: "BuiltinAggregator";
  readonly routerAddress: string;
  readonly pools: readonly PoolDescriptor[];
}

export interface ExternalAggregatorDescriptor extends BaseDescriptor {
  readonly kind: "ExternalAggregator";
  readonly apiUrl: string;
  readonly requiresApiKey: boolean;
  readonly apiKeyEnv: string;
}

export type SourceDescriptor =
  | DirectDexDescriptor
  | BuiltinAggregatorDescriptor
  | ExternalAggregatorDescriptor;

export interface AggregationSettings {
  readonly enableMetaAggregation: boolean;
  readonly quoteTimeoutSeconds: number;
  readonly maxPriceImpactPercent: number;
  readonly prioritizeSavingsOverSpeed: boolean;
}

export class RegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RegistryError";
  }
}

const MODE_KINDS: Record<ExecutionMode, readonly SourceKind[]> = {
  DirectDex: ["DirectDex"],
  NormalAggregation: ["BuiltinAggregator"],
  MetaAggregation: ["DirectDex", "BuiltinAggregator", "ExternalAggregator"],
};

interface RegistrySnapshot {
  readonly descriptors: ReadonlyMap<string, SourceDescriptor>;
  readonly settings: AggregationSettings;
}

function defaultApiKeyEnv(id: string): string {
  return `${id.toUpperCase().replace(/[^A-Z0-9]/g, "_")}_API_KEY`;
}

export function parseRegistry(raw: unknown): RegistrySnapshot {
  const parsed = RegistryFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new RegistryError(`Invalid source registry: ${issues}`);
  }

  const file = parsed.data;
  const descriptors = new Map<string, SourceDescriptor>();

  const add = (descriptor: SourceDescriptor): void => {
    if (descriptors.has(descriptor.id)) {
      throw new RegistryError(`Duplicate source id: ${descriptor.id}`);
    }
    descriptors.set(descriptor.id, Object.freeze(descriptor));
  };

  for (const [id, entry] of Object.entries(file.builtin_dex)) {
    add({
      id,
      kind: "DirectDex",
      name: entry.name,
      supportedNetworks: new Set(entry.supported_networks),
      enabled: entry.enabled,
      rateLimitPerMinute: entry.rate_limit_per_minute,
      confidence: entry.confidence,
      protocolType: entry.protocol_type,
      contracts: Object.freeze({
        router: entry.router_address,
        factory: entry.factory_address,
        quoter: entry.quoter_address,
        positionManager: entry.position_manager_address,
        multicall: entry.multicall_address,
        extra: Object.freeze({ ...entry.contracts }),
      }),
      feeTiers: Object.freeze([...entry.fee_tiers]),
      feeBps: entry.fee_bps,
      intermediateTokens: Object.freeze(
        Object.fromEntries(
          Object.entries(entry.intermediate_tokens).map(([network, token]) => [network.toLowerCase(), token])
        )
      ),
    });
  }

  for (const [id, entry] of Object.entries(file.builtin_aggregators)) {
    add({
      id,
      kind: "BuiltinAggregator",
      name: entry.name,
      supportedNetworks: new Set(entry.supported_networks),
      enabled: entry.enabled,
      rateLimitPerMinute: entry.rate_limit_per_minute,
      confidence: entry.confidence,
      routerAddress: entry.router_address,
      pools: Object.freeze(
        entry.pools.map((pool) =>
          Object.freeze({
            address: pool.address,
            networkId: pool.network,
            token0: pool.token0,
            token1: pool.token1,
            feeBps: pool.fee_bps,
          })
        )
      ),
    });
  }

  for (const [id, entry] of Object.entries(file.external_aggregators)) {
    add({
      id,
      kind: "ExternalAggregator",
      name: entry.name,
      supportedNetworks: new Set(entry.supported_networks),
      enabled: entry.enabled,
      rateLimitPerMinute: entry.rate_limit_per_minute,
      confidence: entry.confidence,
      apiUrl: entry.api_url.replace(/\/+$/, ""),
      requiresApiKey: entry.requires_api_key,
      apiKeyEnv: entry.api_key_env ?? defaultApiKeyEnv(id),
    });
  }

  const settings = file.aggregation_settings;

  return {
    descriptors,
    settings: Object.freeze({
      enableMetaAggregation: settings.enable_meta_aggregation,
      quoteTimeoutSeconds: settings.quote_timeout_seconds,
      maxPriceImpactPercent: settings.max_price_impact_percent,
      prioritizeSavingsOverSpeed: settings.prioritize_savings_over_speed,
    }),
  };
}

export class SourceRegistry {
  private snapshot: RegistrySnapshot;

  constructor(raw: unknown) {
    this.snapshot = parseRegistry(raw);
  }

  static fromFile(path: string): SourceRegistry {
    return new SourceRegistry(readRegistryFile(path));
  }

  /** Replaces the catalog; gathers already running keep their candidate list. */
  reload(raw: unknown): void {
    this.snapshot = parseRegistry(raw);
  }

  get settings(): AggregationSettings {
    return this.snapshot.settings;
  }

  get(id: string): SourceDescriptor | undefined {
    return this.snapshot.descriptors.get(id);
  }

  list(): SourceDescriptor[] {
    return [...this.snapshot.descriptors.values()];
  }

  candidates(networkId: string, mode: ExecutionMode): SourceDescriptor[] {
    const network = networkId.toLowerCase();
    const kinds = MODE_KINDS[mode].filter(
      (kind) => kind !== "ExternalAggregator" || this.snapshot.settings.enableMetaAggregation
    );

    return this.list().filter(
      (d) => d.enabled && kinds.includes(d.kind) && d.supportedNetworks.has(network)
    );
  }
}

export function readRegistryFile(path: string): unknown {
  let text: string;
  try {
    text = fs.readFileSync(path, "utf8");
  } catch (error) {
    throw new RegistryError(
      `Cannot read source registry at ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new RegistryError(
      `Source registry at ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}
