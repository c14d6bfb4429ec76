import fs from "node:fs";

import { BigNumber } from "ethers";

import type { ContractArtifact } from "./chain/abi";
import { encodeDeployment } from "./chain/abi";
import type { ChainClientFactory } from "./chain/ChainClient";
import { isRecord } from "./codec";
import { OracleError } from "./errors";
import type { Logger } from "./logging";
import { nowSec } from "./logging";
import { buildAndSign } from "./oracle/txBuilder";
import type { SignerProvider } from "./signer/DerivedKeySigner";
import type { PendingTxRegistry } from "./stores/PendingTxRegistry";
import type { PriceFeedRegistry } from "./stores/PriceFeedRegistry";
import { pairIdOf } from "./stores/PriceFeedRegistry";
import type { SettingsStore } from "./stores/SettingsStore";
import type { ChainEndpoint, HexString, PriceFeed } from "./types";

export type CreateFeedRequest = {
  base: string;
  quote: string;
  decimals: number;
  description: string;
  version: number;
  chain: ChainEndpoint;
};

export type PriceFeedDeps = {
  feeds: PriceFeedRegistry;
  pending: PendingTxRegistry;
  settings: SettingsStore;
  chains: ChainClientFactory;
  signers: SignerProvider;
  logger: Logger;
  artifact: ContractArtifact | null;
  gasLimit?: number;
};

/** Reads a compiled `{ abi, bytecode }` artifact of the price-feed contract. */
export function readPriceFeedArtifact(filePath: string): ContractArtifact {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  if (!isRecord(raw) || !Array.isArray(raw.abi)) throw new Error(`Invalid price feed artifact: ${filePath}`);
  const bytecode = isRecord(raw.bytecode) ? raw.bytecode.object : raw.bytecode;
  if (typeof bytecode !== "string" || !/^0x[0-9a-fA-F]+$/.test(bytecode)) {
    throw new Error(`Invalid price feed artifact bytecode: ${filePath}`);
  }
  return { abi: JSON.stringify(raw.abi), bytecode };
}

/**
 * Deploys one price-feed contract per currency pair, signed by the service owner's
 * derived key. The pair is reserved before the broadcast; its address is filled in
 * when the deployment is mined.
 */
export class PriceFeedService {
  constructor(private readonly deps: PriceFeedDeps) {}

  async createFeed(caller: string, req: CreateFeedRequest): Promise<{ pairId: string; txHash: HexString }> {
    const { feeds, pending, settings, chains, signers, logger } = this.deps;
    if (!settings.isOwner(caller)) throw OracleError.unauthorized("caller is not the service owner");
    const artifact = this.deps.artifact;
    if (!artifact) throw new OracleError("price feed artifact is not configured", "Internal");
    validateFeedRequest(req);

    const pairId = pairIdOf(req.base, req.quote);
    if (feeds.has(pairId)) throw new OracleError(`pair ${pairId} already exists`, "PairAlreadyExists");

    const client = chains(req.chain);
    const actual = await client.chainId();
    if (actual !== req.chain.chainId) {
      throw new OracleError(`chain id mismatch: expected ${req.chain.chainId}, got ${actual}`, "InvalidParams");
    }

    const feed: PriceFeed = {
      pairId,
      base: req.base,
      quote: req.quote,
      decimals: req.decimals,
      description: req.description,
      version: req.version,
      chain: req.chain,
      address: null,
      txHash: null,
    };
    feeds.add(feed);

    let txHash: HexString;
    try {
      const signed = await buildAndSign(signers.forOwner(settings.owner), client, {
        to: null,
        value: BigNumber.from(0),
        data: encodeDeployment(artifact, [req.description, req.decimals, req.version]),
        gasLimit: this.deps.gasLimit,
      });
      txHash = await client.sendRawTransaction(signed.raw);
    } catch (err) {
      feeds.remove(pairId);
      throw err;
    }

    pending.register({ txHash, chain: req.chain, callback: { kind: "priceFeedCreation", pairId }, registeredAt: nowSec() });
    if (feeds.has(pairId)) feeds.setTxHash(pairId, txHash);
    else await logger.warn("price feed removed during deployment", { txHash, meta: { pairId } });
    await logger.info("price feed deployment broadcast", { txHash, chainId: req.chain.chainId, meta: { pairId } });
    return { pairId, txHash };
  }

  removeFeed(caller: string, pairId: string): PriceFeed {
    if (!this.deps.settings.isOwner(caller)) throw OracleError.unauthorized("caller is not the service owner");
    return this.deps.feeds.remove(pairId);
  }

  listFeeds(): PriceFeed[] {
    return this.deps.feeds.list();
  }
}

function validateFeedRequest(req: CreateFeedRequest): void {
  const symbol = /^[A-Za-z0-9]{1,16}$/;
  if (!symbol.test(req.base) || !symbol.test(req.quote)) {
    throw new OracleError(`invalid pair: ${req.base}/${req.quote}`, "InvalidParams");
  }
  if (!Number.isInteger(req.decimals) || req.decimals < 0 || req.decimals > 255) {
    throw new OracleError(`decimals must fit in uint8, got ${req.decimals}`, "InvalidParams");
  }
  if (!Number.isSafeInteger(req.version) || req.version < 0) {
    throw new OracleError(`invalid version: ${req.version}`, "InvalidParams");
  }
}
