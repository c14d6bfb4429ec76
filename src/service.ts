import Debug from "debug";

import { isValidMethodName } from "./chain/abi";
import type { ChainClientFactory } from "./chain/ChainClient";
import { isZeroAddress, normalizeAddress } from "./codec";
import { OracleError } from "./errors";
import { Logger } from "./logging";
import type { LogEvent } from "./logging";
import { MAX_TIMER_INTERVAL_SEC } from "./oracle/scheduler";
import type { OracleScheduler } from "./oracle/scheduler";
import type { SignerProvider } from "./signer/DerivedKeySigner";
import type { OracleRegistry } from "./stores/OracleRegistry";
import type { PendingTxRegistry } from "./stores/PendingTxRegistry";
import type { PublicationStore } from "./stores/PublicationStore";
import type { SettingsStore } from "./stores/SettingsStore";
import type {
  ChainEndpoint,
  EvmDestination,
  OracleMetadata,
  Origin,
  PendingTransaction,
  Publication,
  UpdateOracleMetadata,
} from "./types";

const debug = Debug("oracle-relay:service");

export type OracleServiceDeps = {
  oracles: OracleRegistry;
  pending: PendingTxRegistry;
  publications: PublicationStore;
  settings: SettingsStore;
  scheduler: OracleScheduler;
  chains: ChainClientFactory;
  signers: SignerProvider;
  logger: Logger;
};

export type OracleStatus = {
  metadata: OracleMetadata;
  publication: Publication;
  armed: boolean;
};

export type HealthReport = {
  ok: boolean;
  oracles: number;
  pending: number;
  timers: number;
};

function sameAddress(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/**
 * Caller-facing operations. Every mutation validates first (including the network checks
 * on the endpoints) and commits last, re-reading the registry after the last await.
 */
export class OracleService {
  constructor(private readonly deps: OracleServiceDeps) {}

  async createOracle(caller: string, origin: Origin, timerInterval: number, evm: EvmDestination): Promise<OracleMetadata> {
    const owner = this.requireCaller(caller);
    const contract = normalizeAddress(evm.contract, "contract");
    if (this.deps.oracles.has(owner, contract)) throw OracleError.oracleAlreadyExists();

    validateInterval(timerInterval);
    const checkedOrigin = await this.validateOrigin(origin);
    const destination: EvmDestination = { contract, provider: await this.validateEndpoint(evm.provider) };

    if (this.deps.oracles.has(owner, contract)) throw OracleError.oracleAlreadyExists();
    const metadata: OracleMetadata = { origin: checkedOrigin, timerInterval, evm: destination, scheduleHandle: null };
    metadata.scheduleHandle = this.deps.scheduler.arm(owner, metadata);
    try {
      this.deps.oracles.add(owner, metadata);
    } catch (err) {
      this.deps.scheduler.disarm(metadata.scheduleHandle);
      throw err;
    }

    await this.deps.logger.info("oracle created", {
      owner,
      contract,
      chainId: destination.provider.chainId,
      meta: { origin: checkedOrigin.kind, timerInterval },
    });
    return metadata;
  }

  /** Merges `patch` into the stored metadata and replaces the oracle's timer. The key never changes. */
  async updateOracle(caller: string, owner: string, contract: string, patch: UpdateOracleMetadata): Promise<OracleMetadata> {
    if (patch.origin === undefined && patch.timerInterval === undefined && patch.evm === undefined) {
      throw new OracleError("nothing to update", "InvalidParams");
    }
    this.deps.oracles.get(owner, contract);
    if (!sameAddress(caller, owner)) throw OracleError.unauthorized();

    const checked: UpdateOracleMetadata = {};
    if (patch.timerInterval !== undefined) {
      validateInterval(patch.timerInterval);
      checked.timerInterval = patch.timerInterval;
    }
    if (patch.evm !== undefined) {
      if (!sameAddress(normalizeAddress(patch.evm.contract, "contract"), contract)) {
        throw new OracleError("destination contract cannot change; delete and recreate the oracle", "InvalidParams");
      }
      checked.evm = { contract: normalizeAddress(contract, "contract"), provider: await this.validateEndpoint(patch.evm.provider) };
    }
    if (patch.origin !== undefined) checked.origin = await this.validateOrigin(patch.origin);

    const current = this.deps.oracles.get(owner, contract);
    const merged: OracleMetadata = {
      origin: checked.origin ?? current.origin,
      timerInterval: checked.timerInterval ?? current.timerInterval,
      evm: checked.evm ?? current.evm,
      scheduleHandle: null,
    };
    this.deps.scheduler.disarm(current.scheduleHandle);
    const handle = this.deps.scheduler.arm(owner, merged);
    const updated = this.deps.oracles.update(owner, contract, checked, handle);

    await this.deps.logger.info("oracle updated", {
      owner,
      contract,
      meta: { fields: Object.keys(checked), timerInterval: updated.timerInterval },
    });
    return updated;
  }

  async deleteOracle(caller: string, owner: string, contract: string): Promise<void> {
    const current = this.deps.oracles.get(owner, contract);
    if (!sameAddress(caller, owner)) throw OracleError.unauthorized();

    this.deps.scheduler.disarm(current.scheduleHandle);
    this.deps.oracles.remove(owner, contract);
    this.deps.publications.forget(owner, contract);
    await this.deps.logger.info("oracle deleted", { owner, contract });
  }

  getUserOracles(owner: string): Array<[string, OracleMetadata]> {
    return this.deps.oracles.getUserOracles(owner);
  }

  getAllOracles(): Array<[string, Record<string, OracleMetadata>]> {
    return this.deps.oracles.getAll();
  }

  getOracleMetadata(owner: string, contract: string): OracleMetadata {
    return this.deps.oracles.get(owner, contract);
  }

  getOracleStatus(owner: string, contract: string): OracleStatus {
    const metadata = this.deps.oracles.get(owner, contract);
    return {
      metadata,
      publication: this.deps.publications.get(owner, contract),
      armed: this.deps.scheduler.isArmed(metadata.scheduleHandle),
    };
  }

  /** Address that signs the price updates of `owner`'s oracles; it needs gas on each destination chain. */
  signerAddress(owner: string): Promise<string> {
    return this.deps.signers.forOwner(normalizeAddress(owner, "owner")).getAddress();
  }

  pendingTransactions(): PendingTransaction[] {
    return this.deps.pending.list();
  }

  owner(caller: string): string {
    this.requireServiceOwner(caller);
    return this.deps.settings.owner;
  }

  async setOwner(caller: string, next: string): Promise<string> {
    this.requireServiceOwner(caller);
    this.deps.settings.setOwner(next);
    await this.deps.logger.warn("service owner changed", { owner: this.deps.settings.owner });
    return this.deps.settings.owner;
  }

  setLogFilter(caller: string, filter: string): void {
    this.requireServiceOwner(caller);
    Logger.setFilter(filter);
    debug("log filter set to %s", filter);
  }

  recentLogs(caller: string, count: number): LogEvent[] {
    this.requireServiceOwner(caller);
    return this.deps.logger.recent(count);
  }

  health(): HealthReport {
    return {
      ok: true,
      oracles: this.deps.oracles.count(),
      pending: this.deps.pending.count(),
      timers: this.deps.scheduler.activeTimers(),
    };
  }

  requireServiceOwner(caller: string): void {
    if (!this.deps.settings.isOwner(caller)) throw OracleError.unauthorized("caller is not the service owner");
  }

  private requireCaller(caller: string): string {
    const normalized = normalizeAddress(caller, "caller");
    if (isZeroAddress(normalized)) throw OracleError.unauthorized("anonymous caller");
    return normalized;
  }

  private async validateOrigin(origin: Origin): Promise<Origin> {
    switch (origin.kind) {
      case "http": {
        validateHttpUrl(origin.url);
        if (origin.jsonPath.trim() === "" || origin.jsonPath.split(".").some((key) => key === "")) {
          throw new OracleError(`invalid json path: ${origin.jsonPath}`, "InvalidParams");
        }
        return { kind: "http", url: origin.url, jsonPath: origin.jsonPath };
      }
      case "evm": {
        if (!isValidMethodName(origin.method)) {
          throw new OracleError(`invalid method name: ${origin.method}`, "InvalidParams");
        }
        return {
          kind: "evm",
          provider: await this.validateEndpoint(origin.provider),
          targetAddress: normalizeAddress(origin.targetAddress, "targetAddress"),
          method: origin.method,
        };
      }
    }
  }

  /** The endpoint must answer eth_chainId with the declared chain id. */
  private async validateEndpoint(endpoint: ChainEndpoint): Promise<ChainEndpoint> {
    validateHttpUrl(endpoint.hostname);
    const actual = await this.deps.chains(endpoint).chainId();
    if (actual !== endpoint.chainId) {
      throw new OracleError(`chain id mismatch at ${endpoint.hostname}: expected ${endpoint.chainId}, got ${actual}`, "InvalidParams");
    }
    return { chainId: endpoint.chainId, hostname: endpoint.hostname };
  }
}

function validateInterval(seconds: number): void {
  if (!Number.isSafeInteger(seconds) || seconds <= 0) {
    throw new OracleError(`timer interval must be a positive whole number of seconds, got ${seconds}`, "InvalidParams");
  }
  if (seconds > MAX_TIMER_INTERVAL_SEC) {
    throw new OracleError(`timer interval must be at most ${MAX_TIMER_INTERVAL_SEC} seconds, got ${seconds}`, "InvalidParams");
  }
}

function validateHttpUrl(raw: string): void {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new OracleError(`invalid url: ${raw}`, "InvalidParams");
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new OracleError(`unsupported url scheme: ${url.protocol}`, "InvalidParams");
  }
}
