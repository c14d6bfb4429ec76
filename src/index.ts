import path from "node:path";

import { jsonRpcClientFactory } from "./chain/ChainClient";
import type { ChainClientFactory } from "./chain/ChainClient";
import type { RelayConfig } from "./config";
import { PriceFeedService, readPriceFeedArtifact } from "./feeds";
import { Logger } from "./logging";
import { OriginResolver } from "./oracle/origin";
import type { PriceResolver } from "./oracle/origin";
import { TxLifecycleProcessor } from "./oracle/processor";
import { OracleScheduler } from "./oracle/scheduler";
import { OracleRelayServer } from "./server";
import { OracleService } from "./service";
import { DerivedKeySigner } from "./signer/DerivedKeySigner";
import type { SignerProvider } from "./signer/DerivedKeySigner";
import { OracleRegistry } from "./stores/OracleRegistry";
import { PendingTxRegistry } from "./stores/PendingTxRegistry";
import { PriceFeedRegistry } from "./stores/PriceFeedRegistry";
import { PublicationStore } from "./stores/PublicationStore";
import { SettingsStore } from "./stores/SettingsStore";

/** Collaborators swapped out by tests. */
export type RelayOverrides = {
  chains?: ChainClientFactory;
  resolver?: PriceResolver;
  signers?: SignerProvider;
  logger?: Logger;
};

function stateFile(dataDir: string | undefined, name: string): string | undefined {
  return dataDir ? path.join(dataDir, name) : undefined;
}

export class OracleRelay {
  readonly logger: Logger;
  readonly settings: SettingsStore;
  readonly oracles: OracleRegistry;
  readonly pending: PendingTxRegistry;
  readonly publications: PublicationStore;
  readonly feeds: PriceFeedRegistry;
  readonly scheduler: OracleScheduler;
  readonly processor: TxLifecycleProcessor;
  readonly service: OracleService;
  readonly feedService: PriceFeedService;
  readonly server: OracleRelayServer;

  constructor(
    readonly config: RelayConfig,
    overrides: RelayOverrides = {},
  ) {
    const { dataDir } = config;
    this.logger =
      overrides.logger ?? new Logger({ service: "oracle-relay", monitorUrl: config.monitorUrl, retention: config.logRetentionMax });

    this.settings = new SettingsStore({ filePath: stateFile(dataDir, "settings.json"), defaultOwner: config.ownerAddress });
    this.oracles = new OracleRegistry({ filePath: stateFile(dataDir, "oracles.json") });
    this.pending = new PendingTxRegistry({ filePath: stateFile(dataDir, "pending_txs.json") });
    this.publications = new PublicationStore({ filePath: stateFile(dataDir, "publications.json") });
    this.feeds = new PriceFeedRegistry({ filePath: stateFile(dataDir, "price_feeds.json") });

    const chains =
      overrides.chains ?? jsonRpcClientFactory({ timeoutMs: config.rpcTimeoutMs, maxResponseBytes: config.rpcMaxResponseBytes });
    const resolver =
      overrides.resolver ??
      new OriginResolver(chains, { timeoutMs: config.rpcTimeoutMs, maxResponseBytes: config.httpMaxResponseBytes });
    const signers = overrides.signers ?? new DerivedKeySigner(config.signerSeed);

    this.scheduler = new OracleScheduler({
      oracles: this.oracles,
      pending: this.pending,
      resolver,
      signers,
      chains,
      logger: this.logger,
      gasLimit: config.gasLimit,
    });
    this.processor = new TxLifecycleProcessor({
      pending: this.pending,
      chains,
      callbacks: { oracles: this.oracles, publications: this.publications, feeds: this.feeds, logger: this.logger },
      logger: this.logger,
      intervalSec: config.processorIntervalSec,
    });
    this.service = new OracleService({
      oracles: this.oracles,
      pending: this.pending,
      publications: this.publications,
      settings: this.settings,
      scheduler: this.scheduler,
      chains,
      signers,
      logger: this.logger,
    });
    this.feedService = new PriceFeedService({
      feeds: this.feeds,
      pending: this.pending,
      settings: this.settings,
      chains,
      signers,
      logger: this.logger,
      artifact: config.priceFeedArtifactPath ? readPriceFeedArtifact(config.priceFeedArtifactPath) : null,
      gasLimit: config.gasLimit,
    });
    this.server = new OracleRelayServer(this.service, this.feedService, {
      host: config.host,
      port: config.port,
      authWindowSec: config.authWindowSec,
    });
  }

  /** Re-arms every stored oracle, then starts the processor and the RPC server. */
  async start(): Promise<void> {
    const armed = this.scheduler.rearmAll();
    this.processor.start();
    await this.server.start();
    await this.logger.info("oracle relay started", {
      meta: { url: this.server.url, oracles: armed, pending: this.pending.count(), persistent: Boolean(this.config.dataDir) },
    });
  }

  async stop(): Promise<void> {
    this.scheduler.stopAll();
    this.processor.stop();
    await this.server.stop();
  }
}

export async function startOracleRelay(config: RelayConfig, overrides: RelayOverrides = {}): Promise<OracleRelay> {
  const relay = new OracleRelay(config, overrides);
  await relay.start();
  return relay;
}

export { OracleRelayServer, OracleService, OracleScheduler, TxLifecycleProcessor };
