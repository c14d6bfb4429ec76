import { BigNumber } from "ethers";

import { OracleError } from "../errors";
import type { ChainEndpoint, HexString, RpcTransaction, TransactionReceipt } from "../types";
import type { JsonRpcLimits } from "./jsonRpc";
import { DEFAULT_RPC_LIMITS, jsonRpcCall } from "./jsonRpc";

/** The subset of the eth JSON-RPC surface the relay consumes. */
export interface ChainClient {
  readonly endpoint: ChainEndpoint;
  chainId(): Promise<number>;
  call(tx: { to: string; data: string }): Promise<HexString>;
  getTransactionCount(address: string): Promise<number>;
  gasPrice(): Promise<BigNumber>;
  sendRawTransaction(raw: string): Promise<HexString>;
  getTransactionByHash(hash: string): Promise<RpcTransaction | null>;
  getTransactionReceipt(hash: string): Promise<TransactionReceipt | null>;
}

export type ChainClientFactory = (endpoint: ChainEndpoint) => ChainClient;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isHex(value: unknown): value is HexString {
  return typeof value === "string" && /^0x[0-9a-fA-F]*$/.test(value);
}

function requireHex(method: string, value: unknown): HexString {
  if (!isHex(value)) throw new OracleError(`RPC ${method} returned a non-hex value`, "Http", value);
  return value;
}

function quantityToNumber(value: unknown): number | null {
  if (!isHex(value)) return null;
  return BigNumber.from(value).toNumber();
}

function coerceTransaction(raw: unknown): RpcTransaction | null {
  if (!isRecord(raw)) return null;
  if (!isHex(raw.hash) || typeof raw.from !== "string") return null;
  return {
    hash: raw.hash,
    from: raw.from,
    to: typeof raw.to === "string" ? raw.to : null,
    nonce: quantityToNumber(raw.nonce) ?? 0,
    blockNumber: quantityToNumber(raw.blockNumber),
  };
}

function coerceReceipt(raw: unknown): TransactionReceipt | null {
  if (!isRecord(raw)) return null;
  if (!isHex(raw.transactionHash) || !isHex(raw.blockHash)) return null;
  const blockNumber = quantityToNumber(raw.blockNumber);
  if (blockNumber === null) return null;
  return {
    transactionHash: raw.transactionHash,
    blockHash: raw.blockHash,
    blockNumber,
    status: quantityToNumber(raw.status),
    gasUsed: isHex(raw.gasUsed) ? BigNumber.from(raw.gasUsed).toString() : "0",
    contractAddress: typeof raw.contractAddress === "string" ? raw.contractAddress : null,
  };
}

export class JsonRpcChainClient implements ChainClient {
  constructor(
    readonly endpoint: ChainEndpoint,
    private readonly limits: JsonRpcLimits = DEFAULT_RPC_LIMITS,
  ) {}

  private rpc(method: string, params: unknown[]): Promise<unknown> {
    return jsonRpcCall(this.endpoint.hostname, method, params, this.limits);
  }

  async chainId(): Promise<number> {
    return BigNumber.from(requireHex("eth_chainId", await this.rpc("eth_chainId", []))).toNumber();
  }

  async call(tx: { to: string; data: string }): Promise<HexString> {
    return requireHex("eth_call", await this.rpc("eth_call", [tx, "latest"]));
  }

  async getTransactionCount(address: string): Promise<number> {
    const count = await this.rpc("eth_getTransactionCount", [address, "pending"]);
    return BigNumber.from(requireHex("eth_getTransactionCount", count)).toNumber();
  }

  async gasPrice(): Promise<BigNumber> {
    return BigNumber.from(requireHex("eth_gasPrice", await this.rpc("eth_gasPrice", [])));
  }

  async sendRawTransaction(raw: string): Promise<HexString> {
    return requireHex("eth_sendRawTransaction", await this.rpc("eth_sendRawTransaction", [raw]));
  }

  async getTransactionByHash(hash: string): Promise<RpcTransaction | null> {
    const raw = await this.rpc("eth_getTransactionByHash", [hash]);
    if (raw === null) return null;
    const tx = coerceTransaction(raw);
    if (!tx) throw new OracleError("RPC eth_getTransactionByHash returned a malformed transaction", "Http", raw);
    return tx;
  }

  async getTransactionReceipt(hash: string): Promise<TransactionReceipt | null> {
    const raw = await this.rpc("eth_getTransactionReceipt", [hash]);
    if (raw === null) return null;
    const receipt = coerceReceipt(raw);
    if (!receipt) throw new OracleError("RPC eth_getTransactionReceipt returned a malformed receipt", "Http", raw);
    return receipt;
  }
}

export function jsonRpcClientFactory(limits: JsonRpcLimits = DEFAULT_RPC_LIMITS): ChainClientFactory {
  return (endpoint) => new JsonRpcChainClient(endpoint, limits);
}
