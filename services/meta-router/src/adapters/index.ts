import type { Result, SourceError } from "../errors";
import type { SourceDescriptor } from "../registry";
import type { Quote, TradeRequest, UnsignedTransaction } from "../schemas";
import type { AdapterSet, BuildContext } from "./types";

export { BuiltinAggregatorAdapter, findBestRoute } from "./builtinAggregatorAdapter";
export { DirectDexAdapter } from "./directDexAdapter";
export { ExternalAggregatorAdapter } from "./externalAggregatorAdapter";
export type { HttpClient } from "./externalAggregatorAdapter";
export type { AdapterContext, AdapterSet, BuildContext, QuoteSourceAdapter } from "./types";

// Closed dispatch over source kinds; a new kind fails to compile here until handled

export function fetchFromSource(
  adapters: AdapterSet,
  request: TradeRequest,
  descriptor: SourceDescriptor,
  signal: AbortSignal
): Promise<Result<Quote, SourceError>> {
  switch (descriptor.kind) {
    case "DirectDex":
      return adapters.DirectDex.fetchQuote(request, descriptor, signal);
    case "BuiltinAggregator":
      return adapters.BuiltinAggregator.fetchQuote(request, descriptor, signal);
    case "ExternalAggregator":
      return adapters.ExternalAggregator.fetchQuote(request, descriptor, signal);
  }
}

export function buildForSource(
  adapters: AdapterSet,
  quote: Quote,
  descriptor: SourceDescriptor,
  context: BuildContext
): Promise<UnsignedTransaction> {
  switch (descriptor.kind) {
    case "DirectDex":
      return adapters.DirectDex.buildTransaction(quote, descriptor, context);
    case "BuiltinAggregator":
      return adapters.BuiltinAggregator.buildTransaction(quote, descriptor, context);
    case "ExternalAggregator":
      return adapters.ExternalAggregator.buildTransaction(quote, descriptor, context);
  }
}
