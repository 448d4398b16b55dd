import { BigNumber } from "ethers";
import { isDeepStrictEqual } from "util";
import { buildForSource } from "./adapters";
import type { AdapterSet } from "./adapters";
import type { FeeData, SigningCollaborator } from "./collaborators";
import { err, errorMessage, ok, Result, SigningError, TradeError } from "./errors";
import type { LogFn } from "./logger";
import type { SourceRegistry } from "./registry";
import type { ExecutionJournal } from "./tradeJournal";
import type {
  AggregationResult,
  ExecutionStrategy,
  Quote,
  TradeFailureCode,
  TradeResult,
  UnsignedTransaction,
} from "./schemas";

// ============================================================================
// Transaction Executor
// At most one execution per aggregation result. All pre-chain checks run
// before the result is marked consumed; signing and receipts are delegated
// to the signing collaborator. Checks, calldata and the journal row all use
// the tracked copy of the quote, never the caller's.
// ============================================================================

// Swap deadline handed to routers, seconds from submission
const SWAP_DEADLINE_SECONDS = 1200;

const TRANSIENT_PATTERNS = [/nonce too low/i, /underpriced/i, /fee too low/i];
const TRANSIENT_CODES = new Set(["NONCE_EXPIRED", "REPLACEMENT_UNDERPRICED"]);

export function isTransientFailure(error: unknown): boolean {
  if (error instanceof SigningError) return false;
  if (typeof error === "object" && error !== null && "code" in error) {
    if (typeof error.code === "string" && TRANSIENT_CODES.has(error.code)) return true;
  }
  const message = errorMessage(error);
  return TRANSIENT_PATTERNS.some((pattern) => pattern.test(message));
}

export function bumpFees(fees: FeeData, percent: number): FeeData {
  const bump = (value: string): string => BigNumber.from(value).mul(100 + percent).div(100).toString();
  return {
    maxFeePerGas: bump(fees.maxFeePerGas),
    maxPriorityFeePerGas: bump(fees.maxPriorityFeePerGas),
  };
}

export interface TransactionExecutorOptions {
  registry: SourceRegistry;
  adapters: AdapterSet;
  signer: SigningCollaborator;
  log: LogFn;
  /** Durable claim and outcome record; the in-memory ledger alone is per process */
  journal?: ExecutionJournal;
  maxQuoteAgeSeconds: number;
  maxRetries: number;
  gasBumpPercent: number;
  receiptPollIntervalMs: number;
  receiptTimeoutMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

interface LedgerEntry {
  result: AggregationResult;
  consumed: boolean;
}

type Submission =
  | { submitted: true; txHash: string; attempts: number }
  | { submitted: false; code: TradeFailureCode; reason: string; attempts: number };

export class TransactionExecutor {
  private readonly options: TransactionExecutorOptions;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly ledger = new Map<string, LedgerEntry>();

  constructor(options: TransactionExecutorOptions) {
    this.options = options;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  /** Registers an aggregation result so one of its quotes may be executed once. */
  track(result: AggregationResult): void {
    if (!this.ledger.has(result.requestId)) {
      this.ledger.set(result.requestId, { result, consumed: false });
    }
  }

  forget(requestId: string): void {
    this.ledger.delete(requestId);
  }

  isConsumed(requestId: string): boolean {
    return this.ledger.get(requestId)?.consumed ?? false;
  }

  async execute(quote: Quote, strategy: ExecutionStrategy): Promise<Result<TradeResult, TradeError>> {
    const validation = this.validateExecution(quote, strategy);
    if (!validation.valid) {
      return this.reject(quote, validation.error);
    }

    validation.entry.consumed = true;
    const tracked = validation.quote;

    const journal = this.options.journal;
    if (journal && !journal.claim(tracked, this.now())) {
      return this.reject(
        tracked,
        new TradeError("AlreadyExecuted", "request was already executed by an earlier run", tracked.requestId)
      );
    }

    const result = await this.perform(tracked, strategy);
    journal?.complete(result, this.now());
    return ok(result);
  }

  private reject(quote: Quote, error: TradeError): Result<TradeResult, TradeError> {
    this.options.log("warn", "execution_rejected", {
      requestId: quote.requestId,
      sourceId: quote.sourceId,
      code: error.code,
      reason: error.message,
    });
    return err(error);
  }

  private async perform(quote: Quote, strategy: ExecutionStrategy): Promise<TradeResult> {
    this.options.log("info", "execution_started", {
      requestId: quote.requestId,
      sourceId: quote.sourceId,
      amountOut: quote.amountOut,
    });

    const descriptor = this.options.registry.get(quote.sourceId);
    if (!descriptor) {
      return this.failed(quote, "ExecutionFailed", `source ${quote.sourceId} is no longer registered`, 0);
    }

    let tx: UnsignedTransaction;
    let fees: FeeData;
    try {
      const recipient = await this.options.signer.getAddress(quote.networkId);
      tx = await buildForSource(this.options.adapters, quote, descriptor, {
        recipient,
        maxSlippagePercent: strategy.maxSlippagePercent,
        deadline: Math.floor(this.now() / 1000) + SWAP_DEADLINE_SECONDS,
      });
      fees = await this.options.signer.getFeeData(quote.networkId);
    } catch (error) {
      return this.failed(quote, "ExecutionFailed", errorMessage(error), 0);
    }

    const submission = await this.submit(quote, tx, fees);
    if (!submission.submitted) {
      return this.failed(quote, submission.code, submission.reason, submission.attempts);
    }

    return this.awaitReceipt(quote, submission.txHash, submission.attempts);
  }

  private validateExecution(
    quote: Quote,
    strategy: ExecutionStrategy
  ): { valid: true; entry: LedgerEntry; quote: Quote } | { valid: false; error: TradeError } {
    const entry = this.ledger.get(quote.requestId);
    if (!entry) {
      return {
        valid: false,
        error: new TradeError("UnknownQuote", "quote does not belong to a known aggregation result", quote.requestId),
      };
    }
    if (entry.consumed) {
      return {
        valid: false,
        error: new TradeError("AlreadyExecuted", "aggregation result was already executed", quote.requestId),
      };
    }
    const tracked = entry.result.quotes.find((q) => q.quote.sourceId === quote.sourceId)?.quote;
    if (!tracked) {
      return {
        valid: false,
        error: new TradeError("UnknownQuote", `no quote from ${quote.sourceId} in this result`, quote.requestId),
      };
    }
    if (!isDeepStrictEqual(tracked, quote)) {
      return {
        valid: false,
        error: new TradeError(
          "UnknownQuote",
          `quote from ${quote.sourceId} differs from the one issued for this result`,
          quote.requestId
        ),
      };
    }

    const ageMs = this.now() - tracked.fetchedAt;
    if (ageMs > this.options.maxQuoteAgeSeconds * 1000) {
      return {
        valid: false,
        error: new TradeError(
          "QuoteExpired",
          `quote is ${Math.floor(ageMs / 1000)}s old, limit is ${this.options.maxQuoteAgeSeconds}s`,
          quote.requestId
        ),
      };
    }

    if (tracked.priceImpactPercent > strategy.maxSlippagePercent) {
      return {
        valid: false,
        error: new TradeError(
          "SlippageExceeded",
          `price impact ${tracked.priceImpactPercent}% exceeds max slippage ${strategy.maxSlippagePercent}%`,
          quote.requestId
        ),
      };
    }

    return { valid: true, entry, quote: tracked };
  }

  private async submit(quote: Quote, tx: UnsignedTransaction, initialFees: FeeData): Promise<Submission> {
    let fees = initialFees;
    const maxAttempts = this.options.maxRetries + 1;

    for (let attempt = 1; ; attempt++) {
      try {
        const txHash = await this.options.signer.signAndSubmit({ ...tx, ...fees });
        this.options.log("info", "transaction_submitted", {
          requestId: quote.requestId,
          sourceId: quote.sourceId,
          txHash,
          attempt,
        });
        return { submitted: true, txHash, attempts: attempt };
      } catch (error) {
        const reason = errorMessage(error);

        if (error instanceof SigningError) {
          return { submitted: false, code: "SigningError", reason, attempts: attempt };
        }
        if (!isTransientFailure(error)) {
          return { submitted: false, code: "SubmissionError", reason, attempts: attempt };
        }
        if (attempt >= maxAttempts) {
          return { submitted: false, code: "ExecutionFailed", reason, attempts: attempt };
        }

        fees = bumpFees(fees, this.options.gasBumpPercent);
        this.options.log("warn", "transaction_retry", {
          requestId: quote.requestId,
          attempt,
          reason,
          maxFeePerGas: fees.maxFeePerGas,
        });
      }
    }
  }

  private async awaitReceipt(quote: Quote, txHash: string, attempts: number): Promise<TradeResult> {
    const giveUpAt = this.now() + this.options.receiptTimeoutMs;

    for (;;) {
      try {
        const receipt = await this.options.signer.getReceipt(quote.networkId, txHash, quote.tokenOut);
        if (receipt.status === "Confirmed") {
          this.options.log("info", "transaction_confirmed", {
            requestId: quote.requestId,
            txHash,
            blockNumber: receipt.blockNumber,
          });
          return {
            requestId: quote.requestId,
            sourceId: quote.sourceId,
            confirmed: true,
            txHash,
            actualAmountOut: receipt.amountOut,
            attempts,
          };
        }
        if (receipt.status === "Reverted") {
          return { ...this.failed(quote, "Reverted", receipt.reason ?? "transaction reverted", attempts), txHash };
        }
      } catch (error) {
        this.options.log("debug", "receipt_poll_failed", { txHash, error: errorMessage(error) });
      }

      if (this.now() >= giveUpAt) {
        return {
          ...this.failed(quote, "ReceiptTimeout", `no receipt within ${this.options.receiptTimeoutMs}ms`, attempts),
          txHash,
        };
      }
      await this.sleep(this.options.receiptPollIntervalMs);
    }
  }

  private failed(quote: Quote, code: TradeFailureCode, reason: string, attempts: number): TradeResult {
    this.options.log("error", "execution_failed", {
      requestId: quote.requestId,
      sourceId: quote.sourceId,
      code,
      reason,
    });
    return {
      requestId: quote.requestId,
      sourceId: quote.sourceId,
      confirmed: false,
      failureCode: code,
      failureReason: reason,
      attempts,
    };
  }
}
