import { BigNumber, ethers } from "ethers";
import Debug from "debug";

import type { ChainClient } from "../chain/ChainClient";
import { errorMessage, OracleError } from "../errors";
import type { TransactionSigner } from "../signer/DerivedKeySigner";
import type { HexString } from "../types";

const debug = Debug("oracle-relay:builder");

export const DEFAULT_GAS_LIMIT = 1_000_000;

export type SignedTransaction = {
  from: string;
  to: string | null;
  nonce: number;
  chainId: number;
  raw: HexString;
  hash: HexString;
};

export type BuildRequest = {
  to: string | null;
  value: BigNumber;
  data: string;
  gasLimit?: number;
};

/**
 * Builds and signs a legacy (EIP-155) transaction for `client`'s chain.
 * Reads the nonce and gas price, asks the signer for one signature; touches no stored state.
 */
export async function buildAndSign(
  signer: TransactionSigner,
  client: ChainClient,
  req: BuildRequest,
): Promise<SignedTransaction> {
  let from: string;
  try {
    from = await signer.getAddress();
  } catch (err) {
    throw new OracleError(`failed to get address: ${errorMessage(err)}`, "Internal");
  }

  const nonce = await client.getTransactionCount(from);
  const gasPrice = await client.gasPrice();
  const chainId = client.endpoint.chainId;

  const unsigned: ethers.utils.UnsignedTransaction = {
    type: 0,
    to: req.to ?? undefined,
    nonce,
    gasLimit: BigNumber.from(req.gasLimit ?? DEFAULT_GAS_LIMIT),
    gasPrice,
    data: req.data,
    value: req.value,
    chainId,
  };

  let signature: ethers.Signature;
  try {
    signature = await signer.signTransaction(unsigned);
  } catch (err) {
    throw new OracleError(`failed to sign transaction: ${errorMessage(err)}`, "Internal");
  }

  const raw = ethers.utils.serializeTransaction(unsigned, signature);
  const hash = ethers.utils.keccak256(raw);
  debug("signed tx %s from %s nonce %d chain %d", hash, from, nonce, chainId);

  return { from, to: req.to, nonce, chainId, raw: toHex(raw), hash: toHex(hash) };
}

function toHex(value: string): HexString {
  if (!value.startsWith("0x")) throw new OracleError(`expected hex string, got ${value}`, "Internal");
  return `0x${value.slice(2)}`;
}
