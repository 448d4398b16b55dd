import cors from "cors";
import express, { Express, NextFunction, Request, Response } from "express";
import { z } from "zod";
import type { ZodError } from "zod";
import { TradeError, TradeErrorCode, errorMessage, err, ok, Result } from "./errors";
import type { LogFn } from "./logger";
import type { MetaTradingEngine } from "./metaTradingEngine";
import type { SourceDescriptor, SourceRegistry } from "./registry";
import {
  ExecuteRequestBodySchema,
  ExecutionStrategy,
  ExecutionStrategySchema,
  PartialExecutionStrategySchema,
  QuoteRequestBodySchema,
} from "./schemas";

// ============================================================================
// HTTP surface for the meta router
// /health, /stats, /sources, /trades, POST /quote, POST /execute
// ============================================================================

const SERVICE = "meta-router";

const TradesQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

const TRADE_ERROR_STATUS: Record<TradeErrorCode, number> = {
  NoViableRoute: 404,
  UnknownQuote: 404,
  QuoteExpired: 409,
  SlippageExceeded: 409,
  AlreadyExecuted: 409,
  ExecutionDisabled: 503,
};

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`);
}

/** Overlays caller overrides on the default strategy and validates the result. */
export function resolveStrategy(base: ExecutionStrategy, overrides: unknown): Result<ExecutionStrategy, string[]> {
  const partial = PartialExecutionStrategySchema.safeParse(overrides ?? {});
  if (!partial.success) {
    return err(formatIssues(partial.error).map((issue) => `strategy.${issue}`));
  }

  const merged = ExecutionStrategySchema.safeParse({ ...base, ...partial.data });
  if (!merged.success) {
    return err(formatIssues(merged.error).map((issue) => `strategy.${issue}`));
  }
  return ok(merged.data);
}

function describeSource(descriptor: SourceDescriptor): Record<string, unknown> {
  return {
    id: descriptor.id,
    kind: descriptor.kind,
    name: descriptor.name,
    enabled: descriptor.enabled,
    supported_networks: [...descriptor.supportedNetworks],
    rate_limit_per_minute: descriptor.rateLimitPerMinute,
  };
}

function sendTradeError(res: Response, error: TradeError): void {
  res.status(TRADE_ERROR_STATUS[error.code]).json({
    error: error.code,
    message: error.message,
    request_id: error.requestId,
  });
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

export function createServer(engine: MetaTradingEngine, registry: SourceRegistry, log: LogFn): Express {
  const app = express();
  app.use(cors());
  app.use(express.json());

  // Express 4 does not route rejected handler promises to error middleware
  const handle =
    (handler: AsyncHandler) =>
    (req: Request, res: Response, next: NextFunction): void => {
      handler(req, res).catch(next);
    };

  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: "ok",
      service: SERVICE,
      ts: new Date().toISOString(),
      can_execute: engine.canExecute,
      sources: registry.list().filter((d) => d.enabled).length,
    });
  });

  app.get("/stats", (_req: Request, res: Response) => {
    res.json(engine.stats());
  });

  app.get("/sources", (_req: Request, res: Response) => {
    res.json({
      sources: registry.list().map(describeSource),
      settings: registry.settings,
    });
  });

  app.get("/trades", (req: Request, res: Response) => {
    const query = TradesQuerySchema.safeParse(req.query);
    if (!query.success) {
      res.status(400).json({ error: "validation_error", issues: formatIssues(query.error) });
      return;
    }
    res.json({ trades: engine.trades(query.data.limit) });
  });

  app.post(
    "/quote",
    handle(async (req, res) => {
      const body = QuoteRequestBodySchema.safeParse(req.body);
      if (!body.success) {
        res.status(400).json({ error: "validation_error", issues: formatIssues(body.error) });
        return;
      }

      const strategy = resolveStrategy(engine.defaultStrategy(), body.data.strategy);
      if (!strategy.ok) {
        res.status(400).json({ error: "validation_error", issues: strategy.error });
        return;
      }

      const request = engine.createRequest({
        networkId: body.data.network,
        tokenIn: body.data.token_in,
        tokenOut: body.data.token_out,
        amountIn: body.data.amount_in,
        outputPerGasUnit: body.data.output_per_gas_unit,
      });

      const result = await engine.quote(request, strategy.value);
      if (!result.ok) {
        sendTradeError(res, result.error);
        return;
      }
      res.json(result.value);
    })
  );

  app.post(
    "/execute",
    handle(async (req, res) => {
      if (!engine.canExecute) {
        res.status(503).json({ error: "execution_disabled", message: "no signing wallet configured" });
        return;
      }

      const body = ExecuteRequestBodySchema.safeParse(req.body);
      if (!body.success) {
        res.status(400).json({ error: "validation_error", issues: formatIssues(body.error) });
        return;
      }

      const aggregation = engine.getResult(body.data.request_id);
      if (!aggregation) {
        sendTradeError(res, new TradeError("UnknownQuote", "unknown request id", body.data.request_id));
        return;
      }

      const sourceId = body.data.source_id;
      const chosen =
        sourceId === undefined
          ? aggregation.bestQuote
          : aggregation.quotes.find((q) => q.quote.sourceId === sourceId)?.quote;
      if (!chosen) {
        sendTradeError(
          res,
          new TradeError("UnknownQuote", `no quote from ${sourceId} for this request`, aggregation.requestId)
        );
        return;
      }

      const strategy = resolveStrategy(engine.defaultStrategy(), body.data.strategy);
      if (!strategy.ok) {
        res.status(400).json({ error: "validation_error", issues: strategy.error });
        return;
      }

      const result = await engine.execute(chosen, strategy.value);
      if (!result.ok) {
        sendTradeError(res, result.error);
        return;
      }
      res.json(result.value);
    })
  );

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    // Malformed JSON from express.json()
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: "validation_error", issues: ["body: malformed JSON"] });
      return;
    }
    log("error", "http_handler_failed", { error: errorMessage(error) });
    res.status(500).json({ error: "internal_error", message: errorMessage(error) });
  });

  return app;
}
