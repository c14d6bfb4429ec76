export type HexString = `0x${string}`;

/** JSON-RPC endpoint of a chain. `hostname` is the full RPC URL. */
export type ChainEndpoint = {
  chainId: number;
  hostname: string;
};

export type HttpOrigin = {
  kind: "http";
  url: string;
  jsonPath: string; // dot separated, e.g. "data.amount"
};

export type EvmOrigin = {
  kind: "evm";
  provider: ChainEndpoint;
  targetAddress: string;
  method: string; // no-arg view function name, e.g. "latestAnswer"
};

export type Origin = HttpOrigin | EvmOrigin;

export type EvmDestination = {
  contract: string;
  provider: ChainEndpoint;
};

export type OracleMetadata = {
  origin: Origin;
  timerInterval: number; // seconds
  evm: EvmDestination;
  scheduleHandle: number | null;
};

export type UpdateOracleMetadata = {
  origin?: Origin;
  timerInterval?: number;
  evm?: EvmDestination;
};

export type Settings = {
  owner: string;
};

export type PriceUpdateCallback = {
  kind: "priceUpdate";
  owner: string;
  contract: string;
  price: string; // decimal string, fixed point 1e8
};

export type PriceFeedCreationCallback = {
  kind: "priceFeedCreation";
  pairId: string;
};

export type TxCallback = PriceUpdateCallback | PriceFeedCreationCallback;

export type PendingTransaction = {
  txHash: HexString;
  chain: ChainEndpoint;
  callback: TxCallback;
  registeredAt: number; // ts sec
};

export type Publication = {
  lastTxHash: HexString | null;
  lastPrice: string | null;
  lastBlockNumber: number | null;
  lastConfirmedAt: number | null;
  confirmed: number;
  dropped: number;
};

export type PriceFeed = {
  pairId: string;
  base: string;
  quote: string;
  decimals: number;
  description: string;
  version: number;
  chain: ChainEndpoint;
  address: string | null;
  txHash: HexString | null;
};

export type RpcTransaction = {
  hash: HexString;
  from: string;
  to: string | null;
  nonce: number;
  blockNumber: number | null;
};

export type TransactionReceipt = {
  transactionHash: HexString;
  blockHash: HexString;
  blockNumber: number;
  status: number | null; // 1 success, 0 reverted, null pre-byzantium
  gasUsed: string;
  contractAddress: string | null;
};

/** Outcome of polling one pending transaction. */
export type TransactionStatus =
  | { kind: "unknown" }
  | { kind: "skipped" }
  | { kind: "processed"; receipt: TransactionReceipt };
