import http from "node:http";

import { afterAll, beforeAll, describe, expect, it } from "vitest";

import { JsonRpcChainClient } from "../src/chain/ChainClient";
import { txHash } from "./support/fakes";

type RpcRequest = { id: number; method: string; params: unknown[] };

function handle(req: RpcRequest): Record<string, unknown> {
  switch (req.method) {
    case "eth_chainId":
      return { result: "0xa869" };
    case "eth_gasPrice":
      return { result: "0x3b9aca00" };
    case "eth_getTransactionByHash":
      return { result: req.params[0] === txHash(1) ? { hash: txHash(1), from: "0x01", nonce: "0x2", blockNumber: null } : null };
    case "eth_getTransactionReceipt":
      return {
        result: {
          transactionHash: txHash(1),
          blockHash: txHash(2),
          blockNumber: "0x10",
          status: "0x1",
          gasUsed: "0x5208",
          contractAddress: null,
        },
      };
    case "eth_sendRawTransaction":
      return { error: { code: -32000, message: "nonce too low" } };
    default:
      return { result: "not-hex" };
  }
}

describe("JsonRpcChainClient", () => {
  let server: http.Server;
  let url = "";

  beforeAll(async () => {
    server = http.createServer((req, res) => {
      if (req.url === "/hang") return;
      if (req.url === "/stream") {
        res.writeHead(200, { "content-type": "application/json" });
        const pump = setInterval(() => res.write(" ".repeat(1_000)), 5);
        res.on("close", () => clearInterval(pump));
        return;
      }
      const chunks: Buffer[] = [];
      req.on("data", (c) => chunks.push(Buffer.from(c)));
      req.on("end", () => {
        const body: RpcRequest = JSON.parse(Buffer.concat(chunks).toString("utf8"));
        res.setHeader("content-type", "application/json");
        res.end(JSON.stringify({ jsonrpc: "2.0", id: body.id, ...handle(body) }));
      });
    });
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
    const addr = server.address();
    const port = typeof addr === "object" && addr ? addr.port : 0;
    url = `http://127.0.0.1:${port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  const client = () => new JsonRpcChainClient({ chainId: 43113, hostname: url }, { timeoutMs: 2_000, maxResponseBytes: 10_000 });

  it("decodes quantities", async () => {
    expect(await client().chainId()).toBe(43113);
    expect((await client().gasPrice()).toString()).toBe("1000000000");
  });

  it("decodes transactions and receipts", async () => {
    expect(await client().getTransactionByHash(txHash(1))).toEqual({
      hash: txHash(1),
      from: "0x01",
      to: null,
      nonce: 2,
      blockNumber: null,
    });
    expect(await client().getTransactionByHash(txHash(3))).toBeNull();
    expect(await client().getTransactionReceipt(txHash(1))).toEqual({
      transactionHash: txHash(1),
      blockHash: txHash(2),
      blockNumber: 16,
      status: 1,
      gasUsed: "21000",
      contractAddress: null,
    });
  });

  it("surfaces JSON-RPC errors", async () => {
    await expect(client().sendRawTransaction("0x00")).rejects.toMatchObject({
      kind: "JsonRpc",
      message: "RPC eth_sendRawTransaction: nonce too low",
      data: { code: -32000 },
    });
  });

  it("rejects non-hex results", async () => {
    await expect(client().call({ to: "0x01", data: "0x" })).rejects.toThrow("RPC eth_call returned a non-hex value");
  });

  it("stops reading a chunked body at the byte cap", async () => {
    const streaming = new JsonRpcChainClient({ chainId: 1, hostname: `${url}/stream` }, { timeoutMs: 2_000, maxResponseBytes: 10_000 });
    await expect(streaming.chainId()).rejects.toMatchObject({
      kind: "Http",
      message: `response from ${url}/stream exceeds 10000 bytes`,
    });
  });

  it("times out", async () => {
    const slow = new JsonRpcChainClient({ chainId: 1, hostname: `${url}/hang` }, { timeoutMs: 100, maxResponseBytes: 10_000 });
    await expect(slow.chainId()).rejects.toMatchObject({ kind: "Transport" });
  });
});
