import axios from "axios";
import {
  BuiltinAggregatorAdapter,
  DirectDexAdapter,
  ExternalAggregatorAdapter,
} from "./adapters";
import { EthersChainClient, EthersWalletSigner } from "./chain";
import { loadConfig, parseRpcUrls } from "./config";
import { createLogger } from "./logger";
import { MetaTradingEngine } from "./metaTradingEngine";
import { RateLimiter } from "./rateLimiter";
import { SourceRegistry } from "./registry";
import { createServer } from "./server";
import { TradeJournal } from "./tradeJournal";

// ============================================================================
// Meta Router Service
// Loads the source registry, wires adapters to the chain and HTTP clients,
// serves quotes and executions over HTTP
// ============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const log = createLogger("meta-router", config.LOG_LEVEL);

  log("info", "starting", { env: config.NODE_ENV, port: config.HTTP_PORT });

  const registry = SourceRegistry.fromFile(config.SOURCES_CONFIG_PATH);
  const chain = new EthersChainClient(parseRpcUrls(config.RPC_URLS));

  log("info", "config_loaded", {
    sources: registry.list().length,
    networks: chain.networks,
    defaultNetwork: config.DEFAULT_NETWORK,
    executionEnabled: Boolean(config.PRIVATE_KEY),
  });

  const connected = await chain.testConnection(config.DEFAULT_NETWORK);
  if (!connected) {
    log("warn", "rpc_unreachable", { network: config.DEFAULT_NETWORK });
  }

  const journal = new TradeJournal(config.TRADE_DB_PATH);
  const adapterContext = { now: Date.now, log };
  const http = axios.create({ timeout: registry.settings.quoteTimeoutSeconds * 1000 });

  const engine = new MetaTradingEngine({
    registry,
    adapters: {
      DirectDex: new DirectDexAdapter(chain, adapterContext),
      BuiltinAggregator: new BuiltinAggregatorAdapter(chain, adapterContext),
      ExternalAggregator: new ExternalAggregatorAdapter(http, new RateLimiter(), adapterContext),
    },
    settings: {
      maxQuoteAgeSeconds: config.MAX_QUOTE_AGE_SECONDS,
      minConfirmations: config.MIN_CONFIRMATIONS,
      maxExecutionRetries: config.MAX_EXECUTION_RETRIES,
      gasBumpPercent: config.GAS_BUMP_PERCENT,
      receiptPollIntervalMs: config.RECEIPT_POLL_INTERVAL_MS,
      receiptTimeoutMs: config.RECEIPT_TIMEOUT_MS,
      globalTimeoutMs: config.GLOBAL_TIMEOUT_MS,
      minSavingsThresholdPercent: config.MIN_SAVINGS_THRESHOLD_PERCENT,
    },
    log,
    signer: config.PRIVATE_KEY ? new EthersWalletSigner(chain, config.PRIVATE_KEY) : undefined,
    journal,
  });

  const server = createServer(engine, registry, log).listen(config.HTTP_PORT, () => {
    log("info", "http_server_started", { port: config.HTTP_PORT });
  });

  const shutdown = (): void => {
    log("info", "shutting_down");
    server.close(() => {
      journal.close();
      process.exit(0);
    });
  };

  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
}

main().catch((error) => {
  console.error(JSON.stringify({ level: "error", service: "meta-router", event: "startup_failed", error: String(error) }));
  process.exit(1);
});
