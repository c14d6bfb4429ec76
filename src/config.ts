import path from "node:path";

import { ethers } from "ethers";

export type RelayConfig = {
  host: string;
  port: number;
  dataDir?: string;

  ownerAddress: string;
  signerSeed: string;

  processorIntervalSec: number;
  rpcTimeoutMs: number;
  rpcMaxResponseBytes: number;
  httpMaxResponseBytes: number;
  gasLimit: number;
  authWindowSec: number;

  logRetentionMax: number;
  monitorUrl?: string;
  priceFeedArtifactPath?: string;
};

function parseIntEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0) throw new Error(`Invalid ${name}: ${raw}`);
  return parsed;
}

function parsePositiveIntEnv(name: string, fallback: number): number {
  const parsed = parseIntEnv(name, fallback);
  if (!Number.isInteger(parsed) || parsed === 0) throw new Error(`Invalid ${name}: ${parsed}`);
  return parsed;
}

export function readConfigFromEnv(): RelayConfig {
  const host = process.env.HOST ?? "127.0.0.1";
  const port = parseIntEnv("PORT", 3004);
  const dataDir = process.env.DATA_DIR ? path.resolve(process.env.DATA_DIR) : undefined;

  const ownerAddress = process.env.OWNER_ADDRESS;
  if (!ownerAddress) throw new Error("OWNER_ADDRESS is required");
  if (!ethers.utils.isAddress(ownerAddress)) throw new Error(`Invalid OWNER_ADDRESS: ${ownerAddress}`);
  if (ethers.utils.getAddress(ownerAddress) === ethers.constants.AddressZero) {
    throw new Error("OWNER_ADDRESS must not be the zero address");
  }

  const signerSeed = process.env.SIGNER_SEED;
  if (!signerSeed) throw new Error("SIGNER_SEED is required");
  if (!ethers.utils.isHexString(signerSeed, 32)) throw new Error("SIGNER_SEED must be a 32-byte hex string");

  const processorIntervalSec = parsePositiveIntEnv("PROCESSOR_INTERVAL_SEC", 5);
  const rpcTimeoutMs = parsePositiveIntEnv("RPC_TIMEOUT_MS", 10_000);
  const rpcMaxResponseBytes = parsePositiveIntEnv("RPC_MAX_RESPONSE_BYTES", 80_000);
  const httpMaxResponseBytes = parsePositiveIntEnv("HTTP_MAX_RESPONSE_BYTES", 64_000);
  const gasLimit = parsePositiveIntEnv("GAS_LIMIT", 1_000_000);
  const authWindowSec = parsePositiveIntEnv("AUTH_WINDOW_SEC", 300);
  const logRetentionMax = parseIntEnv("LOG_RETENTION_MAX", 1000);

  const monitorUrl = process.env.MONITOR_URL || undefined;
  const priceFeedArtifactPath = process.env.PRICE_FEED_ARTIFACT ? path.resolve(process.env.PRICE_FEED_ARTIFACT) : undefined;

  return {
    host,
    port,
    dataDir,
    ownerAddress: ethers.utils.getAddress(ownerAddress),
    signerSeed,
    processorIntervalSec,
    rpcTimeoutMs,
    rpcMaxResponseBytes,
    httpMaxResponseBytes,
    gasLimit,
    authWindowSec,
    logRetentionMax,
    monitorUrl,
    priceFeedArtifactPath,
  };
}
