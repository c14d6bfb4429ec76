import { ethers } from "ethers";

import { OracleError } from "./errors";
import type {
  ChainEndpoint,
  EvmDestination,
  HexString,
  OracleMetadata,
  Origin,
  PendingTransaction,
  PriceFeed,
  Publication,
  TxCallback,
  UpdateOracleMetadata,
} from "./types";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Checksummed form of `value`; the zero address is allowed here and rejected where it matters. */
export function normalizeAddress(value: string, field = "address"): string {
  if (!ethers.utils.isAddress(value)) throw new OracleError(`invalid ${field}: ${value}`, "InvalidParams");
  return ethers.utils.getAddress(value);
}

export function isZeroAddress(value: string): boolean {
  return value.toLowerCase() === ethers.constants.AddressZero;
}

function isHash(value: unknown): value is HexString {
  return typeof value === "string" && /^0x[0-9a-fA-F]{64}$/.test(value);
}

function optionalString(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

function optionalNumber(value: unknown): number | null {
  return typeof value === "number" ? value : null;
}

export function coerceChainEndpoint(raw: unknown): ChainEndpoint | null {
  if (!isRecord(raw)) return null;
  if (typeof raw.chainId !== "number" || !Number.isSafeInteger(raw.chainId) || raw.chainId <= 0) return null;
  if (typeof raw.hostname !== "string" || raw.hostname.length === 0) return null;
  return { chainId: raw.chainId, hostname: raw.hostname };
}

export function coerceOrigin(raw: unknown): Origin | null {
  if (!isRecord(raw)) return null;
  if (raw.kind === "http") {
    if (typeof raw.url !== "string" || typeof raw.jsonPath !== "string") return null;
    return { kind: "http", url: raw.url, jsonPath: raw.jsonPath };
  }
  if (raw.kind === "evm") {
    const provider = coerceChainEndpoint(raw.provider);
    if (!provider || typeof raw.targetAddress !== "string" || typeof raw.method !== "string") return null;
    return { kind: "evm", provider, targetAddress: raw.targetAddress, method: raw.method };
  }
  return null;
}

export function coerceDestination(raw: unknown): EvmDestination | null {
  if (!isRecord(raw)) return null;
  const provider = coerceChainEndpoint(raw.provider);
  if (!provider || typeof raw.contract !== "string") return null;
  return { contract: raw.contract, provider };
}

export function coerceOracleMetadata(raw: unknown): OracleMetadata | null {
  if (!isRecord(raw)) return null;
  const origin = coerceOrigin(raw.origin);
  const evm = coerceDestination(raw.evm);
  if (!origin || !evm || typeof raw.timerInterval !== "number") return null;
  return {
    origin,
    timerInterval: raw.timerInterval,
    evm,
    scheduleHandle: optionalNumber(raw.scheduleHandle),
  };
}

/** Returns null for malformed input; an all-empty patch is still a valid value. */
export function coerceUpdateMetadata(raw: unknown): UpdateOracleMetadata | null {
  if (!isRecord(raw)) return null;
  const patch: UpdateOracleMetadata = {};
  if (raw.origin != null) {
    const origin = coerceOrigin(raw.origin);
    if (!origin) return null;
    patch.origin = origin;
  }
  if (raw.timerInterval != null) {
    if (typeof raw.timerInterval !== "number") return null;
    patch.timerInterval = raw.timerInterval;
  }
  if (raw.evm != null) {
    const evm = coerceDestination(raw.evm);
    if (!evm) return null;
    patch.evm = evm;
  }
  return patch;
}

export function coerceTxCallback(raw: unknown): TxCallback | null {
  if (!isRecord(raw)) return null;
  switch (raw.kind) {
    case "priceUpdate":
      if (typeof raw.owner !== "string" || typeof raw.contract !== "string" || typeof raw.price !== "string") return null;
      return { kind: "priceUpdate", owner: raw.owner, contract: raw.contract, price: raw.price };
    case "priceFeedCreation":
      if (typeof raw.pairId !== "string") return null;
      return { kind: "priceFeedCreation", pairId: raw.pairId };
    default:
      return null;
  }
}

export function coercePendingTransaction(raw: unknown): PendingTransaction | null {
  if (!isRecord(raw)) return null;
  const chain = coerceChainEndpoint(raw.chain);
  const callback = coerceTxCallback(raw.callback);
  if (!isHash(raw.txHash) || !chain || !callback || typeof raw.registeredAt !== "number") return null;
  return { txHash: raw.txHash, chain, callback, registeredAt: raw.registeredAt };
}

export function coercePublication(raw: unknown): Publication | null {
  if (!isRecord(raw)) return null;
  if (typeof raw.confirmed !== "number" || typeof raw.dropped !== "number") return null;
  return {
    lastTxHash: isHash(raw.lastTxHash) ? raw.lastTxHash : null,
    lastPrice: optionalString(raw.lastPrice),
    lastBlockNumber: optionalNumber(raw.lastBlockNumber),
    lastConfirmedAt: optionalNumber(raw.lastConfirmedAt),
    confirmed: raw.confirmed,
    dropped: raw.dropped,
  };
}

export function coercePriceFeed(raw: unknown): PriceFeed | null {
  if (!isRecord(raw)) return null;
  const chain = coerceChainEndpoint(raw.chain);
  if (!chain) return null;
  if (typeof raw.pairId !== "string" || typeof raw.base !== "string" || typeof raw.quote !== "string") return null;
  if (typeof raw.decimals !== "number" || typeof raw.description !== "string" || typeof raw.version !== "number") return null;
  return {
    pairId: raw.pairId,
    base: raw.base,
    quote: raw.quote,
    decimals: raw.decimals,
    description: raw.description,
    version: raw.version,
    chain,
    address: optionalString(raw.address),
    txHash: isHash(raw.txHash) ? raw.txHash : null,
  };
}

/** Decodes `Record<string, T>` entry by entry; any bad entry rejects the whole map. */
export function coerceRecordOf<T>(raw: unknown, coerce: (value: unknown) => T | null): Record<string, T> | null {
  if (!isRecord(raw)) return null;
  const out: Record<string, T> = {};
  for (const [key, value] of Object.entries(raw)) {
    const coerced = coerce(value);
    if (coerced === null) return null;
    out[key] = coerced;
  }
  return out;
}
