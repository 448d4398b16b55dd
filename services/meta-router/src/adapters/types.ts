import { Result, SourceError } from "../errors";
import { LogFn } from "../logger";
import {
  BuiltinAggregatorDescriptor,
  DirectDexDescriptor,
  ExternalAggregatorDescriptor,
  SourceDescriptor,
} from "../registry";
import { Quote, TradeRequest, UnsignedTransaction } from "../schemas";

export interface AdapterContext {
  now: () => number;
  log: LogFn;
}

export interface BuildContext {
  recipient: string;
  maxSlippagePercent: number;
  /** Unix seconds */
  deadline: number;
}

export interface QuoteSourceAdapter<D extends SourceDescriptor> {
  readonly kind: D["kind"];
  fetchQuote(request: TradeRequest, descriptor: D, signal: AbortSignal): Promise<Result<Quote, SourceError>>;
  buildTransaction(quote: Quote, descriptor: D, context: BuildContext): Promise<UnsignedTransaction>;
}

/** One adapter per source kind. */
export interface AdapterSet {
  DirectDex: QuoteSourceAdapter<DirectDexDescriptor>;
  BuiltinAggregator: QuoteSourceAdapter<BuiltinAggregatorDescriptor>;
  ExternalAggregator: QuoteSourceAdapter<ExternalAggregatorDescriptor>;
}
