import { BigNumber } from "ethers";
import Debug from "debug";

import { encodeUpdatePrice } from "../chain/abi";
import type { ChainClientFactory } from "../chain/ChainClient";
import { errorMessage, OracleError } from "../errors";
import type { Logger } from "../logging";
import { nowSec } from "../logging";
import type { SignerProvider } from "../signer/DerivedKeySigner";
import type { OracleRegistry } from "../stores/OracleRegistry";
import type { PendingTxRegistry } from "../stores/PendingTxRegistry";
import type { HexString, OracleMetadata } from "../types";
import type { PriceResolver } from "./origin";
import { buildAndSign } from "./txBuilder";

const debug = Debug("oracle-relay:scheduler");

export type SchedulerDeps = {
  oracles: OracleRegistry;
  pending: PendingTxRegistry;
  resolver: PriceResolver;
  signers: SignerProvider;
  chains: ChainClientFactory;
  logger: Logger;
  gasLimit?: number;
};

/** Longest interval a Node timer holds; larger delays are clamped to 1 ms. */
export const MAX_TIMER_INTERVAL_SEC = Math.floor(0x7fffffff / 1000);

/**
 * One interval timer per oracle. A fire runs resolve -> sign -> broadcast on its own;
 * fires of the same oracle may overlap and failures never cancel the timer.
 */
export class OracleScheduler {
  private readonly timers = new Map<number, NodeJS.Timeout>();
  private nextHandle = 1;

  constructor(private readonly deps: SchedulerDeps) {}

  /** Starts a timer firing every `metadata.timerInterval` seconds and returns its handle. */
  arm(owner: string, metadata: OracleMetadata): number {
    if (metadata.timerInterval > MAX_TIMER_INTERVAL_SEC) {
      throw new OracleError(`timer interval ${metadata.timerInterval}s exceeds ${MAX_TIMER_INTERVAL_SEC}s`, "InvalidParams");
    }
    const handle = this.nextHandle++;
    const snapshot = structuredClone(metadata);
    const timer = setInterval(() => void this.tick(owner, snapshot), snapshot.timerInterval * 1000);
    this.timers.set(handle, timer);
    debug("armed #%d for %s/%s every %ds", handle, owner, snapshot.evm.contract, snapshot.timerInterval);
    return handle;
  }

  /** Stops future fires; a fire already running completes. Unknown handles are ignored. */
  disarm(handle: number | null): void {
    if (handle === null) return;
    const timer = this.timers.get(handle);
    if (!timer) return;
    clearInterval(timer);
    this.timers.delete(handle);
    debug("disarmed #%d", handle);
  }

  isArmed(handle: number | null): boolean {
    return handle !== null && this.timers.has(handle);
  }

  activeTimers(): number {
    return this.timers.size;
  }

  /** Publishes the current price once. Resolves to the broadcast hash, or null after a logged failure. */
  async tick(owner: string, metadata: OracleMetadata): Promise<HexString | null> {
    const { contract, provider } = metadata.evm;
    const { chains, resolver, signers, pending, logger } = this.deps;
    try {
      const price = await resolver.resolve(metadata.origin);
      const client = chains(provider);
      const signed = await buildAndSign(signers.forOwner(owner), client, {
        to: contract,
        value: BigNumber.from(0),
        data: encodeUpdatePrice(price),
        gasLimit: this.deps.gasLimit,
      });
      const txHash = await client.sendRawTransaction(signed.raw);

      pending.register({
        txHash,
        chain: provider,
        callback: { kind: "priceUpdate", owner, contract, price: price.toString() },
        registeredAt: nowSec(),
      });
      await logger.info("price update broadcast", {
        owner,
        contract,
        txHash,
        chainId: provider.chainId,
        meta: { price: price.toString(), nonce: signed.nonce },
      });
      return txHash;
    } catch (err) {
      await logger.error("price update failed", {
        owner,
        contract,
        chainId: provider.chainId,
        meta: { error: errorMessage(err) },
      });
      return null;
    }
  }

  /** Arms a fresh timer for every stored oracle and persists the new handles. */
  rearmAll(): number {
    let armed = 0;
    for (const { owner, contract, metadata } of this.deps.oracles.entries()) {
      this.deps.oracles.setScheduleHandle(owner, contract, this.arm(owner, metadata));
      armed += 1;
    }
    return armed;
  }

  stopAll(): void {
    for (const timer of this.timers.values()) clearInterval(timer);
    this.timers.clear();
  }
}
