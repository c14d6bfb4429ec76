import { BigNumber } from "ethers";
import Debug from "debug";

import { decodeUint256, encodeNoArgCall } from "../chain/abi";
import type { ChainClientFactory } from "../chain/ChainClient";
import type { JsonRpcLimits } from "../chain/jsonRpc";
import { fetchTextCapped } from "../chain/jsonRpc";
import { OracleError } from "../errors";
import type { EvmOrigin, HttpOrigin, Origin } from "../types";
import { numericLeaf, readJsonPath } from "./jsonPath";

const debug = Debug("oracle-relay:origin");

/** Fixed-point scale applied to HTTP prices (8 decimals). */
export const PRICE_MULTIPLE = 100_000_000;

export interface PriceResolver {
  resolve(origin: Origin): Promise<BigNumber>;
}

export function scalePrice(value: number): BigNumber {
  if (value < 0) throw new OracleError(`price is negative: ${value}`, "ParseError");
  const scaled = Math.round(value * PRICE_MULTIPLE);
  if (!Number.isFinite(scaled)) throw new OracleError(`price out of range: ${value}`, "ParseError");
  return BigNumber.from(BigInt(scaled).toString());
}

export class OriginResolver implements PriceResolver {
  constructor(
    private readonly chains: ChainClientFactory,
    private readonly httpLimits: JsonRpcLimits,
  ) {}

  async resolve(origin: Origin): Promise<BigNumber> {
    switch (origin.kind) {
      case "http":
        return this.resolveHttp(origin);
      case "evm":
        return this.resolveEvm(origin);
    }
  }

  private async resolveHttp(origin: HttpOrigin): Promise<BigNumber> {
    const { status, text } = await fetchTextCapped(
      origin.url,
      { method: "GET", headers: { accept: "application/json", "user-agent": "oracle-relay" } },
      this.httpLimits,
    );
    if (status !== 200) {
      throw new OracleError(`url is not valid, status: ${status}`, "Http", { url: origin.url, status });
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (err) {
      throw new OracleError(`malformed JSON from ${origin.url}`, "Http", err instanceof Error ? err.message : err);
    }

    const price = scalePrice(numericLeaf(readJsonPath(body, origin.jsonPath)));
    debug("http price %s from %s", price.toString(), origin.url);
    return price;
  }

  private async resolveEvm(origin: EvmOrigin): Promise<BigNumber> {
    const client = this.chains(origin.provider);
    const result = await client.call({ to: origin.targetAddress, data: encodeNoArgCall(origin.method) });
    const price = decodeUint256(result);
    debug("evm price %s from %s.%s()", price.toString(), origin.targetAddress, origin.method);
    return price;
  }
}
