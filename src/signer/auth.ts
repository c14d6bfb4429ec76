import { ethers } from "ethers";

import { isRecord } from "../codec";
import { errorMessage, OracleError } from "../errors";
import { nowSec } from "../logging";

export type SignedAuth = {
  message: string;
  signature: string;
};

/** Anonymous callers are reported as the zero address. */
export const ANONYMOUS = ethers.constants.AddressZero;

export function authMessage(method: string, ts: number): string {
  return `oracle-relay:${method}:${ts}`;
}

export async function signAuth(wallet: ethers.Signer, method: string, ts = nowSec()): Promise<SignedAuth> {
  const message = authMessage(method, ts);
  return { message, signature: await wallet.signMessage(message) };
}

/**
 * Recovers the caller of `method` from an EIP-191 signed `oracle-relay:<method>:<ts>` message.
 * A missing auth object yields ANONYMOUS; a malformed, stale or mismatched one is rejected.
 */
export function recoverCaller(raw: unknown, method: string, windowSec: number, now = nowSec()): string {
  if (raw === undefined || raw === null) return ANONYMOUS;
  if (!isRecord(raw) || typeof raw.message !== "string" || typeof raw.signature !== "string") {
    throw OracleError.unauthorized("auth must be { message, signature }");
  }

  const parts = raw.message.split(":");
  if (parts.length !== 3 || parts[0] !== "oracle-relay" || parts[1] !== method) {
    throw OracleError.unauthorized(`auth message does not match ${method}`);
  }
  const ts = Number(parts[2]);
  if (!Number.isSafeInteger(ts) || Math.abs(now - ts) > windowSec) {
    throw OracleError.unauthorized("auth message expired");
  }

  try {
    return ethers.utils.verifyMessage(raw.message, raw.signature);
  } catch (err) {
    throw OracleError.unauthorized(`invalid auth signature: ${errorMessage(err)}`);
  }
}
