import { UnsignedTransaction } from "./schemas";

// ============================================================================
// Collaborator interfaces
// The provider layer (contract reads) and the wallet layer (signing and
// submission) live outside the router and are reached only through these.
// ============================================================================

export interface SimulateQuoteParams {
  networkId: string;
  quoter: string;
  tokenIn: string;
  tokenOut: string;
  amountIn: string;
  fee: number;
}

export interface SimulatedQuote {
  amountOut: string;
  gasEstimate: number;
}

export interface PoolReserves {
  reserveIn: string;
  reserveOut: string;
}

export interface OnChainQuoter {
  /** Read-only quoter simulation; rejects when the pool has no liquidity. */
  simulateQuote(params: SimulateQuoteParams): Promise<SimulatedQuote>;
  /** Pair lookup on a v2-style factory; null when no pair exists. */
  getPairAddress(networkId: string, factory: string, tokenA: string, tokenB: string): Promise<string | null>;
  /** Reserves oriented to the given input token. */
  readPoolReserves(networkId: string, pool: string, tokenIn: string): Promise<PoolReserves>;
}

export type ReceiptStatus =
  | { status: "Confirmed"; blockNumber?: number; amountOut?: string }
  | { status: "Pending" }
  | { status: "Reverted"; reason?: string };

export interface FeeData {
  maxFeePerGas: string;
  maxPriorityFeePerGas: string;
}

export interface SigningCollaborator {
  getAddress(networkId: string): Promise<string>;
  getFeeData(networkId: string): Promise<FeeData>;
  /**
   * Signs and broadcasts; resolves to the transaction hash. Throws
   * SigningError when signing itself fails, any other error for submission.
   */
  signAndSubmit(tx: UnsignedTransaction): Promise<string>;
  /** `tokenOut` lets the wallet report the received amount from transfer logs. */
  getReceipt(networkId: string, txHash: string, tokenOut?: string): Promise<ReceiptStatus>;
}
