import Debug from "debug";

import type { ChainClient, ChainClientFactory } from "../chain/ChainClient";
import { errorMessage } from "../errors";
import type { Logger } from "../logging";
import type { PendingTxRegistry } from "../stores/PendingTxRegistry";
import type { PendingTransaction, TransactionStatus } from "../types";
import type { CallbackContext } from "./callbacks";
import { handleProcessed, handleSkipped } from "./callbacks";

const debug = Debug("oracle-relay:processor");

export type ProcessorDeps = {
  pending: PendingTxRegistry;
  chains: ChainClientFactory;
  callbacks: CallbackContext;
  logger: Logger;
  intervalSec: number;
};

export type ProcessOutcome = {
  processed: number;
  skipped: number;
  unknown: number;
};

/**
 * Polls every pending transaction and settles the ones that reached a terminal state.
 * Each hash is acted on as soon as its own lookup returns; the entry is extracted
 * before its callback runs, so a callback fires at most once.
 */
export class TxLifecycleProcessor {
  private timer?: NodeJS.Timeout;
  private inFlight = false;

  constructor(private readonly deps: ProcessorDeps) {}

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => void this.processOnce(), this.deps.intervalSec * 1000);
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = undefined;
  }

  get running(): boolean {
    return Boolean(this.timer);
  }

  async processOnce(): Promise<ProcessOutcome> {
    const outcome: ProcessOutcome = { processed: 0, skipped: 0, unknown: 0 };
    if (this.inFlight) {
      debug("previous tick still running, skipping");
      return outcome;
    }
    this.inFlight = true;
    try {
      const snapshot = this.deps.pending.list();
      await Promise.all(
        snapshot.map(async (entry) => {
          outcome[await this.check(entry)] += 1;
        }),
      );
      if (snapshot.length > 0) debug("tick: %o", outcome);
      return outcome;
    } finally {
      this.inFlight = false;
    }
  }

  async status(entry: PendingTransaction): Promise<TransactionStatus> {
    let client: ChainClient;
    try {
      client = this.deps.chains(entry.chain);
    } catch (err) {
      debug("no client for %s: %s", entry.chain.hostname, errorMessage(err));
      return { kind: "unknown" };
    }

    try {
      const tx = await client.getTransactionByHash(entry.txHash);
      if (!tx) return { kind: "skipped" };
    } catch (err) {
      debug("lookup of %s failed: %s", entry.txHash, errorMessage(err));
      return { kind: "unknown" };
    }

    try {
      const receipt = await client.getTransactionReceipt(entry.txHash);
      return receipt ? { kind: "processed", receipt } : { kind: "unknown" };
    } catch (err) {
      debug("receipt of %s failed: %s", entry.txHash, errorMessage(err));
      return { kind: "unknown" };
    }
  }

  /** Settles one entry; a failure leaves it tracked for the next tick. */
  private async check(entry: PendingTransaction): Promise<TransactionStatus["kind"]> {
    try {
      const status = await this.status(entry);
      await this.settle(entry, status);
      return status.kind;
    } catch (err) {
      await this.deps.logger.error("pending transaction check failed", {
        txHash: entry.txHash,
        chainId: entry.chain.chainId,
        meta: { callback: entry.callback.kind, error: errorMessage(err) },
      });
      return "unknown";
    }
  }

  private async settle(entry: PendingTransaction, status: TransactionStatus): Promise<void> {
    if (status.kind === "unknown") return;

    const extracted = this.deps.pending.extract(entry.txHash);
    if (!extracted) return;

    try {
      if (status.kind === "processed") await handleProcessed(extracted.callback, status.receipt, this.deps.callbacks);
      else await handleSkipped(extracted.callback, extracted.txHash, this.deps.callbacks);
    } catch (err) {
      await this.deps.logger.error("transaction callback failed", {
        txHash: extracted.txHash,
        chainId: extracted.chain.chainId,
        meta: { callback: extracted.callback.kind, status: status.kind, error: errorMessage(err) },
      });
    }
  }
}
