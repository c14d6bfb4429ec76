import Debug from "debug";

import type { Logger } from "../logging";
import { nowSec } from "../logging";
import type { OracleRegistry } from "../stores/OracleRegistry";
import type { PriceFeedRegistry } from "../stores/PriceFeedRegistry";
import type { PublicationStore } from "../stores/PublicationStore";
import type { HexString, TransactionReceipt, TxCallback } from "../types";

const debug = Debug("oracle-relay:callbacks");

/** Registries a callback may read or write when its transaction settles. */
export type CallbackContext = {
  oracles: OracleRegistry;
  publications: PublicationStore;
  feeds: PriceFeedRegistry;
  logger: Logger;
};

export async function handleProcessed(
  callback: TxCallback,
  receipt: TransactionReceipt,
  ctx: CallbackContext,
): Promise<void> {
  const txHash = receipt.transactionHash;
  switch (callback.kind) {
    case "priceUpdate": {
      const { owner, contract, price } = callback;
      if (!ctx.oracles.has(owner, contract)) {
        debug("oracle %s/%s was deleted, ignoring %s", owner, contract, txHash);
        return;
      }
      if (receipt.status === 0) {
        ctx.publications.recordDropped(owner, contract, txHash);
        await ctx.logger.warn("price update reverted", { owner, contract, txHash, meta: { price } });
        return;
      }
      ctx.publications.recordConfirmed(owner, contract, price, receipt, nowSec());
      await ctx.logger.info("price update confirmed", {
        owner,
        contract,
        txHash,
        meta: { price, blockNumber: receipt.blockNumber },
      });
      return;
    }
    case "priceFeedCreation": {
      const { pairId } = callback;
      if (receipt.status === 0 || !receipt.contractAddress) {
        await ctx.logger.warn("price feed deployment produced no contract", { txHash, meta: { pairId } });
        return;
      }
      ctx.feeds.setAddress(pairId, receipt.contractAddress);
      await ctx.logger.info("price feed deployed", { contract: receipt.contractAddress, txHash, meta: { pairId } });
      return;
    }
  }
}

export async function handleSkipped(callback: TxCallback, txHash: HexString, ctx: CallbackContext): Promise<void> {
  switch (callback.kind) {
    case "priceUpdate":
      if (!ctx.oracles.has(callback.owner, callback.contract)) {
        debug("oracle %s/%s was deleted, ignoring %s", callback.owner, callback.contract, txHash);
        return;
      }
      ctx.publications.recordDropped(callback.owner, callback.contract, txHash);
      await ctx.logger.warn("price update dropped", { owner: callback.owner, contract: callback.contract, txHash });
      return;
    case "priceFeedCreation":
      await ctx.logger.warn("price feed deployment dropped", { txHash, meta: { pairId: callback.pairId } });
      return;
  }
}
