/**
 * Source Registry Unit Test
 *
 * Requirement: the registry file is validated, descriptors are frozen, and
 * candidates are filtered by network, enablement and execution mode
 */

import path from "path";
import { describe, expect, it } from "vitest";
import { RegistryError, SourceRegistry } from "../../services/meta-router/src/registry";
import { FACTORY, QUOTER, registryFile, ROUTER } from "./helpers";

const ids = (registry: SourceRegistry, network: string, mode: "DirectDex" | "NormalAggregation" | "MetaAggregation") =>
  registry.candidates(network, mode).map((d) => d.id);

describe("SourceRegistry", () => {
  it("restricts candidates by execution mode", () => {
    const registry = new SourceRegistry(registryFile());

    expect(ids(registry, "ethereum", "DirectDex")).toEqual(["dex_v2"]);
    expect(ids(registry, "ethereum", "NormalAggregation")).toEqual(["local"]);
    expect(ids(registry, "ethereum", "MetaAggregation")).toEqual(["dex_v2", "local", "ext"]);
  });

  it("matches networks case-insensitively and skips unsupported ones", () => {
    const registry = new SourceRegistry(registryFile());

    expect(ids(registry, "Ethereum", "DirectDex")).toEqual(["dex_v2"]);
    expect(ids(registry, "arbitrum", "MetaAggregation")).toEqual([]);
  });

  it("drops external aggregators when meta aggregation is disabled", () => {
    const registry = new SourceRegistry(
      registryFile({ aggregation_settings: { enable_meta_aggregation: false } })
    );

    expect(ids(registry, "ethereum", "MetaAggregation")).toEqual(["dex_v2", "local"]);
  });

  it("skips disabled sources", () => {
    const file = registryFile();
    const registry = new SourceRegistry({
      ...file,
      external_aggregators: {
        ext: {
          name: "External",
          api_url: "https://aggregator.test/api",
          supported_networks: ["ethereum"],
          enabled: false,
        },
      },
    });

    expect(ids(registry, "ethereum", "MetaAggregation")).toEqual(["dex_v2", "local"]);
  });

  it("fills descriptor defaults", () => {
    const registry = new SourceRegistry(
      registryFile({
        external_aggregators: {
          "my-agg": { name: "Mine", api_url: "https://aggregator.test/api/", supported_networks: ["ethereum"] },
        },
      })
    );

    const external = registry.get("my-agg");
    expect(external?.kind).toBe("ExternalAggregator");
    if (external?.kind !== "ExternalAggregator") return;
    expect(external.apiUrl).toBe("https://aggregator.test/api");
    expect(external.apiKeyEnv).toBe("MY_AGG_API_KEY");
    expect(external.rateLimitPerMinute).toBe(60);
    expect(external.requiresApiKey).toBe(false);

    const dex = registry.get("dex_v2");
    if (dex?.kind !== "DirectDex") throw new Error("expected a DirectDex descriptor");
    expect(dex.feeBps).toBe(30);
    expect(dex.rateLimitPerMinute).toBe(0);
    expect(dex.contracts.router).toBe(ROUTER);
    expect(dex.contracts.factory).toBe(FACTORY);
    expect(dex.intermediateTokens).toEqual({ ethereum: "0x3333333333333333333333333333333333333333" });
  });

  it("freezes descriptors", () => {
    const registry = new SourceRegistry(registryFile());
    expect(Object.isFrozen(registry.get("dex_v2"))).toBe(true);
    expect(Object.isFrozen(registry.get("ext"))).toBe(true);
  });

  it("rejects duplicate ids across sections", () => {
    const file = registryFile();
    expect(
      () =>
        new SourceRegistry({
          ...file,
          external_aggregators: {
            local: { name: "Clash", api_url: "https://aggregator.test", supported_networks: ["ethereum"] },
          },
        })
    ).toThrow("Duplicate source id: local");
  });

  it("requires a quoter for uniswap_v3 sources", () => {
    const v3 = {
      name: "V3",
      router_address: ROUTER,
      factory_address: FACTORY,
      protocol_type: "uniswap_v3" as const,
      supported_networks: ["ethereum"],
    };

    expect(() => new SourceRegistry(registryFile({ builtin_dex: { v3 } }))).toThrow(RegistryError);
    expect(
      () => new SourceRegistry(registryFile({ builtin_dex: { v3: { ...v3, quoter_address: QUOTER } } }))
    ).not.toThrow();
  });

  it("rejects malformed addresses", () => {
    expect(
      () =>
        new SourceRegistry({
          builtin_dex: {
            bad: {
              name: "Bad",
              router_address: "0x1234",
              factory_address: FACTORY,
              protocol_type: "uniswap_v2",
              supported_networks: ["ethereum"],
            },
          },
        })
    ).toThrow(/builtin_dex\.bad\.router_address/);
  });

  it("swaps the catalog on reload", () => {
    const registry = new SourceRegistry(registryFile());
    registry.reload(registryFile({ external_aggregators: {} }));

    expect(registry.get("ext")).toBeUndefined();
    expect(registry.list()).toHaveLength(2);
  });

  it("loads the bundled sample registry", () => {
    const registry = SourceRegistry.fromFile(
      path.join(process.cwd(), "services/meta-router/config/sources.json")
    );

    expect(registry.settings).toEqual({
      enableMetaAggregation: true,
      quoteTimeoutSeconds: 5,
      maxPriceImpactPercent: 3,
      prioritizeSavingsOverSpeed: true,
    });
    expect(ids(registry, "ethereum", "MetaAggregation")).toEqual([
      "uniswap_v3",
      "uniswap_v2",
      "sushiswap",
      "local_router",
    ]);
  });

  it("reports a missing registry file", () => {
    expect(() => SourceRegistry.fromFile("/nonexistent/sources.json")).toThrow(/Cannot read source registry/);
  });
});
