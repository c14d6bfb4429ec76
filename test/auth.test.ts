import { ethers } from "ethers";
import { describe, expect, it } from "vitest";

import { ANONYMOUS, authMessage, recoverCaller, signAuth } from "../src/signer/auth";

const wallet = new ethers.Wallet(`0x${"03".repeat(32)}`);

describe("recoverCaller", () => {
  it("recovers the signer of a fresh message", async () => {
    const auth = await signAuth(wallet, "oracle_create", 1_000);
    expect(auth.message).toBe("oracle-relay:oracle_create:1000");
    expect(recoverCaller(auth, "oracle_create", 300, 1_100)).toBe(wallet.address);
  });

  it("treats a missing auth as anonymous", () => {
    expect(recoverCaller(undefined, "oracle_create", 300)).toBe(ANONYMOUS);
    expect(ANONYMOUS).toBe(ethers.constants.AddressZero);
  });

  it("rejects expired, mismatched and malformed auth", async () => {
    const auth = await signAuth(wallet, "oracle_delete", 1_000);
    expect(() => recoverCaller(auth, "oracle_delete", 300, 1_301)).toThrow("auth message expired");
    expect(() => recoverCaller(auth, "oracle_update", 300, 1_000)).toThrow("auth message does not match oracle_update");
    expect(() => recoverCaller({ message: authMessage("oracle_delete", 1_000) }, "oracle_delete", 300, 1_000)).toThrow(
      "auth must be { message, signature }",
    );
    expect(() => recoverCaller({ message: auth.message, signature: "0x1234" }, "oracle_delete", 300, 1_000)).toThrow(
      "invalid auth signature",
    );
  });

  it("does not accept a signature over another message", async () => {
    const other = await signAuth(wallet, "oracle_delete", 999);
    const forged = { message: authMessage("oracle_delete", 1_000), signature: other.signature };
    expect(recoverCaller(forged, "oracle_delete", 300, 1_000)).not.toBe(wallet.address);
  });
});
