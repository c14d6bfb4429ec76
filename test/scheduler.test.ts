import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { ethers } from "ethers";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { encodeUpdatePrice } from "../src/chain/abi";
import { OracleError } from "../src/errors";
import { MAX_TIMER_INTERVAL_SEC, OracleScheduler } from "../src/oracle/scheduler";
import { OracleService } from "../src/service";
import { DerivedKeySigner } from "../src/signer/DerivedKeySigner";
import { OracleRegistry } from "../src/stores/OracleRegistry";
import { PendingTxRegistry } from "../src/stores/PendingTxRegistry";
import { PublicationStore } from "../src/stores/PublicationStore";
import { SettingsStore } from "../src/stores/SettingsStore";
import {
  CONTRACT_A,
  CONTRACT_B,
  FakeChain,
  fakeChains,
  fakeEndpoint,
  FakeResolver,
  flush,
  HTTP_ORIGIN,
  OTHER,
  OWNER,
  quietLogger,
  TEST_SEED,
} from "./support/fakes";

const A = ethers.utils.getAddress(CONTRACT_A);
const B = ethers.utils.getAddress(CONTRACT_B);

function setup(opts: { oraclesFile?: string } = {}) {
  const chain = new FakeChain(fakeEndpoint(1));
  const resolver = new FakeResolver();
  const logger = quietLogger();
  const oracles = new OracleRegistry({ filePath: opts.oraclesFile });
  const pending = new PendingTxRegistry();
  const chains = fakeChains(chain);
  const signers = new DerivedKeySigner(TEST_SEED);
  const scheduler = new OracleScheduler({ oracles, pending, resolver, signers, chains, logger });
  const service = new OracleService({
    oracles,
    pending,
    publications: new PublicationStore(),
    settings: new SettingsStore({ defaultOwner: OWNER }),
    scheduler,
    chains,
    signers,
    logger,
  });
  return { chain, resolver, logger, oracles, pending, scheduler, service };
}

async function advance(ms: number): Promise<void> {
  await vi.advanceTimersByTimeAsync(ms);
  await flush();
}

describe("OracleScheduler", () => {
  let ctx: ReturnType<typeof setup>;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["setInterval", "clearInterval", "setTimeout", "clearTimeout", "Date"] });
    ctx = setup();
  });

  afterEach(() => {
    ctx.scheduler.stopAll();
    vi.useRealTimers();
  });

  it("publishes once per interval", async () => {
    await ctx.service.createOracle(OWNER, HTTP_ORIGIN, 5, { contract: CONTRACT_A, provider: ctx.chain.endpoint });

    await advance(5_000);
    expect(ctx.chain.sent).toHaveLength(1);

    await advance(15_000);
    expect(ctx.chain.sent).toHaveLength(4);
    expect(ctx.chain.sent.map((tx) => tx.nonce)).toEqual([0, 1, 2, 3]);

    const [first] = ctx.chain.sent;
    expect(first.to).toBe(A);
    expect(first.data).toBe(encodeUpdatePrice(ctx.resolver.price));
    expect(first.from).toBe(await new DerivedKeySigner(TEST_SEED).forOwner(OWNER).getAddress());
    expect(ctx.pending.count()).toBe(4);
    expect(ctx.pending.list()[0].callback).toEqual({ kind: "priceUpdate", owner: OWNER, contract: A, price: "123456000000" });
  });

  it("keeps the timer after a failed fire", async () => {
    const { scheduler, service, chain, resolver, logger } = ctx;
    const created = await service.createOracle(OWNER, HTTP_ORIGIN, 5, { contract: CONTRACT_A, provider: chain.endpoint });
    resolver.failures.push(new OracleError("url is not valid, status: 500", "Http"));

    await advance(5_000);
    expect(chain.sent).toHaveLength(0);
    expect(scheduler.isArmed(created.scheduleHandle)).toBe(true);
    expect(logger.recent(1)[0]).toMatchObject({ level: "error", msg: "price update failed", owner: OWNER, contract: A });

    await advance(5_000);
    expect(chain.sent).toHaveLength(1);
  });

  it("reports a failed broadcast without registering it", async () => {
    const { service, chain, pending } = ctx;
    await service.createOracle(OWNER, HTTP_ORIGIN, 5, { contract: CONTRACT_A, provider: chain.endpoint });
    chain.sendError = new OracleError("RPC eth_sendRawTransaction: nonce too low", "JsonRpc");

    await advance(5_000);
    expect(pending.count()).toBe(0);
  });

  it("re-arms exactly one timer when the interval changes", async () => {
    const { scheduler, service, chain, oracles } = ctx;
    const created = await service.createOracle(OWNER, HTTP_ORIGIN, 5, { contract: CONTRACT_A, provider: chain.endpoint });

    const updated = await service.updateOracle(OWNER, OWNER, CONTRACT_A, { timerInterval: 10 });

    expect(scheduler.isArmed(created.scheduleHandle)).toBe(false);
    expect(scheduler.isArmed(updated.scheduleHandle)).toBe(true);
    expect(scheduler.activeTimers()).toBe(1);
    expect(oracles.get(OWNER, CONTRACT_A)).toEqual({ ...created, timerInterval: 10, scheduleHandle: updated.scheduleHandle });

    await advance(10_000);
    expect(chain.sent).toHaveLength(1);
  });

  it("rejects an empty patch without touching the timer", async () => {
    const { scheduler, service, chain, oracles } = ctx;
    const created = await service.createOracle(OWNER, HTTP_ORIGIN, 5, { contract: CONTRACT_A, provider: chain.endpoint });

    await expect(service.updateOracle(OWNER, OWNER, CONTRACT_A, {})).rejects.toMatchObject({ kind: "InvalidParams" });
    expect(oracles.get(OWNER, CONTRACT_A)).toEqual(created);
    expect(scheduler.isArmed(created.scheduleHandle)).toBe(true);
    expect(scheduler.activeTimers()).toBe(1);
  });

  it("deleting one oracle leaves the other running", async () => {
    const { scheduler, service, chain, oracles } = ctx;
    await service.createOracle(OWNER, HTTP_ORIGIN, 5, { contract: CONTRACT_A, provider: chain.endpoint });
    const kept = await service.createOracle(OWNER, HTTP_ORIGIN, 5, { contract: CONTRACT_B, provider: chain.endpoint });

    await service.deleteOracle(OWNER, OWNER, CONTRACT_A);

    expect(oracles.getUserOracles(OWNER)).toEqual([[B, kept]]);
    expect(scheduler.isArmed(kept.scheduleHandle)).toBe(true);
    expect(scheduler.activeTimers()).toBe(1);

    await advance(5_000);
    expect(chain.sent.map((tx) => tx.to)).toEqual([B]);
  });

  it("only lets the owner change or delete an oracle", async () => {
    const { scheduler, service, chain, oracles } = ctx;
    const created = await service.createOracle(OWNER, HTTP_ORIGIN, 5, { contract: CONTRACT_A, provider: chain.endpoint });

    await expect(service.updateOracle(OTHER, OWNER, CONTRACT_A, { timerInterval: 60 })).rejects.toMatchObject({
      kind: "Unauthorized",
    });
    await expect(service.deleteOracle(OTHER, OWNER, CONTRACT_A)).rejects.toMatchObject({ kind: "Unauthorized" });

    expect(oracles.get(OWNER, CONTRACT_A)).toEqual(created);
    expect(scheduler.isArmed(created.scheduleHandle)).toBe(true);
  });

  it("reports a second delete as not found", async () => {
    const { scheduler, service, chain, oracles } = ctx;
    await service.createOracle(OWNER, HTTP_ORIGIN, 5, { contract: CONTRACT_A, provider: chain.endpoint });

    await service.deleteOracle(OWNER, OWNER, CONTRACT_A);
    await expect(service.deleteOracle(OWNER, OWNER, CONTRACT_A)).rejects.toMatchObject({ kind: "OracleNotFound" });
    await expect(service.deleteOracle(OWNER, OWNER, CONTRACT_B)).rejects.toMatchObject({ kind: "OracleNotFound" });
    expect(oracles.count()).toBe(0);
    expect(scheduler.activeTimers()).toBe(0);
  });

  it("rejects duplicates, anonymous callers and bad input on create", async () => {
    const { service, chain, scheduler } = ctx;
    const evm = { contract: CONTRACT_A, provider: chain.endpoint };
    await service.createOracle(OWNER, HTTP_ORIGIN, 5, evm);

    await expect(service.createOracle(OWNER, HTTP_ORIGIN, 5, evm)).rejects.toMatchObject({ kind: "OracleAlreadyExists" });
    await expect(service.createOracle(ethers.constants.AddressZero, HTTP_ORIGIN, 5, evm)).rejects.toMatchObject({
      kind: "Unauthorized",
    });
    const other = { contract: CONTRACT_B, provider: chain.endpoint };
    await expect(service.createOracle(OWNER, HTTP_ORIGIN, 0, other)).rejects.toMatchObject({ kind: "InvalidParams" });
    await expect(service.createOracle(OWNER, HTTP_ORIGIN, 2.5, other)).rejects.toMatchObject({ kind: "InvalidParams" });
    await expect(service.createOracle(OWNER, { ...HTTP_ORIGIN, url: "ftp://prices.test" }, 5, other)).rejects.toThrow(
      "unsupported url scheme: ftp:",
    );
    await expect(service.createOracle(OWNER, HTTP_ORIGIN, 5, { contract: "0x1234", provider: chain.endpoint })).rejects.toThrow(
      "invalid contract: 0x1234",
    );

    chain.reportedChainId = 5;
    await expect(service.createOracle(OWNER, HTTP_ORIGIN, 5, other)).rejects.toThrow(
      "chain id mismatch at http://chain-1.test: expected 1, got 5",
    );
    await expect(
      service.createOracle(OWNER, HTTP_ORIGIN, 5, { contract: CONTRACT_B, provider: fakeEndpoint(99) }),
    ).rejects.toMatchObject({ kind: "Transport" });
    expect(scheduler.activeTimers()).toBe(1);
  });

  it("refuses to move an oracle to another contract", async () => {
    const { service, chain } = ctx;
    await service.createOracle(OWNER, HTTP_ORIGIN, 5, { contract: CONTRACT_A, provider: chain.endpoint });
    await expect(
      service.updateOracle(OWNER, OWNER, CONTRACT_A, { evm: { contract: CONTRACT_B, provider: chain.endpoint } }),
    ).rejects.toMatchObject({ kind: "InvalidParams" });
  });

  it("accepts intervals up to the longest a timer can hold", async () => {
    const { service, chain, resolver, scheduler } = ctx;
    const evm = { contract: CONTRACT_A, provider: chain.endpoint };

    await expect(service.createOracle(OWNER, HTTP_ORIGIN, MAX_TIMER_INTERVAL_SEC + 1, evm)).rejects.toMatchObject({
      kind: "InvalidParams",
      message: "timer interval must be at most 2147483 seconds, got 2147484",
    });
    expect(scheduler.activeTimers()).toBe(0);

    await service.createOracle(OWNER, HTTP_ORIGIN, MAX_TIMER_INTERVAL_SEC, evm);
    await advance(60_000);
    expect(resolver.calls).toHaveLength(0);
    expect(chain.sent).toHaveLength(0);

    await expect(service.updateOracle(OWNER, OWNER, CONTRACT_A, { timerInterval: 30 * 24 * 3600 })).rejects.toMatchObject({
      kind: "InvalidParams",
    });
  });

  it("reports an unknown oracle on update", async () => {
    await expect(ctx.service.updateOracle(OWNER, OWNER, CONTRACT_A, { timerInterval: 5 })).rejects.toMatchObject({
      kind: "OracleNotFound",
    });
  });
});

describe("OracleScheduler restart", () => {
  let dir: string;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["setInterval", "clearInterval", "setTimeout", "clearTimeout", "Date"] });
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "oracle-relay-"));
  });

  afterEach(() => {
    vi.useRealTimers();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("arms one fresh timer per stored oracle", async () => {
    const oraclesFile = path.join(dir, "oracles.json");
    const before = setup({ oraclesFile });
    await before.service.createOracle(OWNER, HTTP_ORIGIN, 5, { contract: CONTRACT_A, provider: before.chain.endpoint });
    before.scheduler.stopAll();

    const after = setup({ oraclesFile });
    expect(after.scheduler.activeTimers()).toBe(0);
    expect(after.scheduler.rearmAll()).toBe(1);
    expect(after.scheduler.activeTimers()).toBe(1);

    const stored = after.oracles.get(OWNER, CONTRACT_A);
    expect(after.scheduler.isArmed(stored.scheduleHandle)).toBe(true);

    await advance(5_000);
    expect(after.chain.sent).toHaveLength(1);
    after.scheduler.stopAll();
  });
});
