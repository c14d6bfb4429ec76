import { BigNumber, ethers } from "ethers";
import { describe, expect, it } from "vitest";

import { encodeUpdatePrice } from "../src/chain/abi";
import { buildAndSign } from "../src/oracle/txBuilder";
import { DerivedKeySigner, LocalKeySigner } from "../src/signer/DerivedKeySigner";
import type { TransactionSigner } from "../src/signer/DerivedKeySigner";
import { CONTRACT_A, FakeChain, fakeEndpoint, OTHER, OWNER, TEST_SEED } from "./support/fakes";

const PRIVATE_KEY = `0x${"22".repeat(32)}`;

describe("buildAndSign", () => {
  it("signs a legacy transaction for the client's chain", async () => {
    const chain = new FakeChain(fakeEndpoint(43113));
    const signer = new LocalKeySigner(PRIVATE_KEY);
    const data = encodeUpdatePrice(BigNumber.from(42));

    const signed = await buildAndSign(signer, chain, { to: CONTRACT_A, value: BigNumber.from(0), data, gasLimit: 200_000 });
    const parsed = ethers.utils.parseTransaction(signed.raw);

    expect(signed.from).toBe(new ethers.Wallet(PRIVATE_KEY).address);
    expect(parsed.from).toBe(signed.from);
    expect(parsed.type).toBe(0);
    expect(parsed.chainId).toBe(43113);
    expect(parsed.nonce).toBe(0);
    expect(parsed.to).toBe(ethers.utils.getAddress(CONTRACT_A));
    expect(parsed.data).toBe(data);
    expect(parsed.gasLimit.toNumber()).toBe(200_000);
    expect(parsed.gasPrice?.toString()).toBe("1000000000");
    expect(signed.hash).toBe(ethers.utils.keccak256(signed.raw));
  });

  it("uses the pending nonce of the signer", async () => {
    const chain = new FakeChain(fakeEndpoint(1));
    const signer = new LocalKeySigner(PRIVATE_KEY);
    const req = { to: CONTRACT_A, value: BigNumber.from(0), data: "0x" };

    await chain.sendRawTransaction((await buildAndSign(signer, chain, req)).raw);
    const second = await buildAndSign(signer, chain, req);

    expect(second.nonce).toBe(1);
    expect(ethers.utils.parseTransaction(second.raw).gasLimit.toNumber()).toBe(1_000_000);
  });

  it("builds contract creations without a recipient", async () => {
    const chain = new FakeChain(fakeEndpoint(1));
    const signed = await buildAndSign(new LocalKeySigner(PRIVATE_KEY), chain, { to: null, value: BigNumber.from(0), data: "0x6000" });
    expect(ethers.utils.parseTransaction(signed.raw).to ?? null).toBeNull();
    expect(signed.to).toBeNull();
  });

  it("wraps signer failures", async () => {
    const chain = new FakeChain(fakeEndpoint(1));
    const broken: TransactionSigner = {
      getAddress: async () => OWNER,
      signTransaction: async () => {
        throw new Error("boom");
      },
    };
    await expect(buildAndSign(broken, chain, { to: CONTRACT_A, value: BigNumber.from(0), data: "0x" })).rejects.toThrow(
      "failed to sign transaction: boom",
    );
  });
});

describe("DerivedKeySigner", () => {
  it("derives a stable, distinct key per owner", async () => {
    const signers = new DerivedKeySigner(TEST_SEED);
    const a = await signers.forOwner(OWNER).getAddress();
    const b = await signers.forOwner(OTHER).getAddress();

    expect(a).not.toBe(b);
    expect(await new DerivedKeySigner(TEST_SEED).forOwner(OWNER).getAddress()).toBe(a);
    const expectedKey = ethers.utils.keccak256(ethers.utils.solidityPack(["bytes32", "address"], [TEST_SEED, OWNER]));
    expect(a).toBe(ethers.utils.computeAddress(expectedKey));
  });

  it("rejects a malformed seed", () => {
    expect(() => new DerivedKeySigner("0x1234")).toThrow("signer seed must be a 32-byte hex string");
  });
});
