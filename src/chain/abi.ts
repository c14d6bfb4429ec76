import type { JsonFragment } from "@ethersproject/abi";
import { BigNumber, ethers } from "ethers";

import { OracleError } from "../errors";

export const PRICE_CONSUMER_ABI = ["function updatePrice(int256 _price) external"];

const priceConsumer = new ethers.utils.Interface(PRICE_CONSUMER_ABI);

const METHOD_NAME = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export function isValidMethodName(method: string): boolean {
  return METHOD_NAME.test(method);
}

export function encodeUpdatePrice(price: BigNumber): string {
  return priceConsumer.encodeFunctionData("updatePrice", [price]);
}

/** Calldata for a view function that takes no arguments. */
export function encodeNoArgCall(method: string): string {
  if (!isValidMethodName(method)) throw new OracleError(`invalid method name: ${method}`, "InvalidParams");
  return ethers.utils.id(`${method}()`).slice(0, 10);
}

export function decodeUint256(data: string): BigNumber {
  try {
    const [value] = ethers.utils.defaultAbiCoder.decode(["uint256"], data);
    return BigNumber.from(value);
  } catch (err) {
    throw new OracleError(`cannot decode uint256 from ${data}`, "Internal", err instanceof Error ? err.message : err);
  }
}

/** `abi` is a fragment list or its JSON text. */
export type ContractArtifact = {
  abi: string | ReadonlyArray<JsonFragment | string>;
  bytecode: string;
};

export function encodeDeployment(artifact: ContractArtifact, args: unknown[]): string {
  const iface = new ethers.utils.Interface(artifact.abi);
  return ethers.utils.hexConcat([artifact.bytecode, iface.encodeDeploy(args)]);
}
