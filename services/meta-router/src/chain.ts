import { BigNumber, constants, Contract, ethers, providers, Wallet } from "ethers";
import {
  FeeData,
  OnChainQuoter,
  PoolReserves,
  ReceiptStatus,
  SigningCollaborator,
  SimulatedQuote,
  SimulateQuoteParams,
} from "./collaborators";
import { errorMessage, SigningError } from "./errors";
import { UnsignedTransaction } from "./schemas";

// ============================================================================
// Ethers-backed collaborators
// EthersChainClient: read-only quoting through QuoterV2 and v2 pair reserves
// EthersWalletSigner: local key signing for the execution endpoint
// ============================================================================

// QuoterV2 ABI - only the function we need
const QUOTER_V2_ABI = [
  "function quoteExactInputSingle((address tokenIn, address tokenOut, uint256 amountIn, uint24 fee, uint160 sqrtPriceLimitX96)) external returns (uint256 amountOut, uint160 sqrtPriceX96After, uint32 initializedTicksCrossed, uint256 gasEstimate)",
];

const FACTORY_V2_ABI = [
  "function getPair(address tokenA, address tokenB) external view returns (address pair)",
];

const PAIR_V2_ABI = [
  "function getReserves() external view returns (uint112 reserve0, uint112 reserve1, uint32 blockTimestampLast)",
  "function token0() external view returns (address)",
];

const ERC20_TRANSFER = new ethers.utils.Interface([
  "event Transfer(address indexed from, address indexed to, uint256 value)",
]);

const DEFAULT_QUOTER_GAS = 150000;

function asBigNumber(value: unknown, field: string): BigNumber {
  if (BigNumber.isBigNumber(value)) return value;
  throw new Error(`Unexpected ${field} in contract response`);
}

export class EthersChainClient implements OnChainQuoter {
  private readonly providers = new Map<string, providers.JsonRpcProvider>();

  constructor(rpcUrls: Record<string, string>) {
    for (const [network, url] of Object.entries(rpcUrls)) {
      this.providers.set(network.toLowerCase(), new providers.JsonRpcProvider(url));
    }
  }

  get networks(): string[] {
    return [...this.providers.keys()];
  }

  provider(networkId: string): providers.JsonRpcProvider {
    const provider = this.providers.get(networkId.toLowerCase());
    if (!provider) {
      throw new Error(`No RPC configured for network ${networkId}`);
    }
    return provider;
  }

  async simulateQuote(params: SimulateQuoteParams): Promise<SimulatedQuote> {
    const quoter = new Contract(params.quoter, QUOTER_V2_ABI, this.provider(params.networkId));

    // callStatic simulates the quote without sending a transaction
    const result = await quoter.callStatic.quoteExactInputSingle({
      tokenIn: params.tokenIn,
      tokenOut: params.tokenOut,
      amountIn: BigNumber.from(params.amountIn),
      fee: params.fee,
      sqrtPriceLimitX96: 0,
    });

    const amountOut = asBigNumber(result.amountOut ?? result[0], "amountOut");
    const gasEstimate = result.gasEstimate ?? result[3];

    return {
      amountOut: amountOut.toString(),
      gasEstimate: BigNumber.isBigNumber(gasEstimate) ? gasEstimate.toNumber() : DEFAULT_QUOTER_GAS,
    };
  }

  async getPairAddress(
    networkId: string,
    factory: string,
    tokenA: string,
    tokenB: string
  ): Promise<string | null> {
    const contract = new Contract(factory, FACTORY_V2_ABI, this.provider(networkId));
    const pair: unknown = await contract.getPair(tokenA, tokenB);

    if (typeof pair !== "string" || pair === constants.AddressZero) {
      return null;
    }
    return pair;
  }

  async readPoolReserves(networkId: string, pool: string, tokenIn: string): Promise<PoolReserves> {
    const pair = new Contract(pool, PAIR_V2_ABI, this.provider(networkId));
    const [reserves, token0] = await Promise.all([pair.getReserves(), pair.token0()]);

    const reserve0 = asBigNumber(reserves.reserve0 ?? reserves[0], "reserve0");
    const reserve1 = asBigNumber(reserves.reserve1 ?? reserves[1], "reserve1");
    const inIsToken0 = String(token0).toLowerCase() === tokenIn.toLowerCase();

    return inIsToken0
      ? { reserveIn: reserve0.toString(), reserveOut: reserve1.toString() }
      : { reserveIn: reserve1.toString(), reserveOut: reserve0.toString() };
  }

  async testConnection(networkId: string): Promise<boolean> {
    try {
      await this.provider(networkId).getBlockNumber();
      return true;
    } catch {
      return false;
    }
  }
}

export class EthersWalletSigner implements SigningCollaborator {
  private readonly chain: EthersChainClient;
  private readonly privateKey: string;
  private readonly wallets = new Map<string, Wallet>();

  constructor(chain: EthersChainClient, privateKey: string) {
    this.chain = chain;
    this.privateKey = privateKey.startsWith("0x") ? privateKey : `0x${privateKey}`;
  }

  private wallet(networkId: string): Wallet {
    const key = networkId.toLowerCase();
    let wallet = this.wallets.get(key);
    if (!wallet) {
      wallet = new Wallet(this.privateKey, this.chain.provider(key));
      this.wallets.set(key, wallet);
    }
    return wallet;
  }

  async getAddress(networkId: string): Promise<string> {
    return this.wallet(networkId).address;
  }

  async getFeeData(networkId: string): Promise<FeeData> {
    const fees = await this.chain.provider(networkId).getFeeData();
    const fallback = fees.gasPrice ?? BigNumber.from(0);

    return {
      maxFeePerGas: (fees.maxFeePerGas ?? fallback).toString(),
      maxPriorityFeePerGas: (fees.maxPriorityFeePerGas ?? fallback).toString(),
    };
  }

  async signAndSubmit(tx: UnsignedTransaction): Promise<string> {
    const wallet = this.wallet(tx.networkId);

    // Gas estimation and nonce lookup happen here; their errors are submission errors
    const populated = await wallet.populateTransaction({
      to: tx.to,
      data: tx.data,
      value: BigNumber.from(tx.value),
      gasLimit: tx.gasLimit ? BigNumber.from(tx.gasLimit) : undefined,
      maxFeePerGas: tx.maxFeePerGas ? BigNumber.from(tx.maxFeePerGas) : undefined,
      maxPriorityFeePerGas: tx.maxPriorityFeePerGas ? BigNumber.from(tx.maxPriorityFeePerGas) : undefined,
    });

    let signed: string;
    try {
      signed = await wallet.signTransaction(populated);
    } catch (error) {
      throw new SigningError(errorMessage(error));
    }

    const response = await this.chain.provider(tx.networkId).sendTransaction(signed);
    return response.hash;
  }

  async getReceipt(networkId: string, txHash: string, tokenOut?: string): Promise<ReceiptStatus> {
    const receipt = await this.chain.provider(networkId).getTransactionReceipt(txHash);
    if (!receipt) {
      return { status: "Pending" };
    }
    if (receipt.status !== 1) {
      return { status: "Reverted", reason: `status ${receipt.status ?? "unknown"}` };
    }

    return {
      status: "Confirmed",
      blockNumber: receipt.blockNumber,
      amountOut: tokenOut ? this.receivedAmount(receipt, tokenOut, this.wallet(networkId).address) : undefined,
    };
  }

  private receivedAmount(
    receipt: providers.TransactionReceipt,
    token: string,
    recipient: string
  ): string | undefined {
    let total = BigNumber.from(0);
    let seen = false;

    for (const entry of receipt.logs) {
      if (entry.address.toLowerCase() !== token.toLowerCase()) continue;
      try {
        const parsed = ERC20_TRANSFER.parseLog(entry);
        if (String(parsed.args.to).toLowerCase() === recipient.toLowerCase()) {
          total = total.add(asBigNumber(parsed.args.value, "value"));
          seen = true;
        }
      } catch {
        // Not a Transfer event
        continue;
      }
    }

    return seen ? total.toString() : undefined;
  }
}
