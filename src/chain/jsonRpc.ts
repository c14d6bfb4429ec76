import Debug from "debug";

import { OracleError } from "../errors";

const debug = Debug("oracle-relay:rpc");

export type JsonRpcLimits = {
  timeoutMs: number;
  maxResponseBytes: number;
};

export const DEFAULT_RPC_LIMITS: JsonRpcLimits = { timeoutMs: 10_000, maxResponseBytes: 80_000 };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
}

/**
 * Fetches `url` and returns the body as text, bounded by a timeout and a byte cap.
 * Transport failures and timeouts are `Transport` errors, oversized bodies are `Http` errors.
 */
export async function fetchTextCapped(
  url: string,
  init: RequestInit,
  limits: JsonRpcLimits,
): Promise<{ status: number; text: string }> {
  let res: Response;
  try {
    res = await fetch(url, { ...init, signal: AbortSignal.timeout(limits.timeoutMs) });
  } catch (err) {
    if (isTimeout(err)) throw new OracleError(`request to ${url} timed out after ${limits.timeoutMs}ms`, "Transport");
    throw new OracleError(`request to ${url} failed: ${err instanceof Error ? err.message : String(err)}`, "Transport");
  }

  const declared = Number(res.headers.get("content-length") ?? "0");
  if (declared > limits.maxResponseBytes) {
    await res.body?.cancel().catch((err: unknown) => debug("cancel of %s failed: %o", url, err));
    throw tooLarge(url, limits);
  }

  return { status: res.status, text: await readCapped(res, url, limits) };
}

function tooLarge(url: string, limits: JsonRpcLimits): OracleError {
  return new OracleError(`response from ${url} exceeds ${limits.maxResponseBytes} bytes`, "Http");
}

/** Reads the body chunk by chunk and cancels the stream once it passes the cap. */
async function readCapped(res: Response, url: string, limits: JsonRpcLimits): Promise<string> {
  if (!res.body) return "";
  const reader = res.body.getReader();
  const chunks: Uint8Array[] = [];
  let received = 0;

  for (;;) {
    let chunk: Uint8Array | undefined;
    try {
      const step = await reader.read();
      if (step.done) break;
      chunk = step.value;
    } catch (err) {
      if (isTimeout(err)) throw new OracleError(`reading ${url} timed out after ${limits.timeoutMs}ms`, "Transport");
      throw new OracleError(`reading ${url} failed: ${err instanceof Error ? err.message : String(err)}`, "Transport");
    }
    if (!chunk) continue;

    received += chunk.byteLength;
    if (received > limits.maxResponseBytes) {
      await reader.cancel().catch((err: unknown) => debug("cancel of %s failed: %o", url, err));
      throw tooLarge(url, limits);
    }
    chunks.push(chunk);
  }

  return Buffer.concat(chunks).toString("utf8");
}

export async function jsonRpcCall(
  rpcUrl: string,
  method: string,
  params: unknown[] = [],
  limits: JsonRpcLimits = DEFAULT_RPC_LIMITS,
): Promise<unknown> {
  debug(">> %s %s %o", rpcUrl, method, params);
  const { status, text } = await fetchTextCapped(
    rpcUrl,
    {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ jsonrpc: "2.0", id: 1, method, params }),
    },
    limits,
  );
  if (status !== 200) throw new OracleError(`RPC ${method} failed: HTTP ${status}`, "Http");

  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    throw new OracleError(`RPC ${method} returned malformed JSON`, "Http");
  }
  if (!isRecord(body)) throw new OracleError(`RPC ${method} returned a non-object response`, "Http");

  if (isRecord(body.error)) {
    const message = typeof body.error.message === "string" ? body.error.message : "RPC error";
    debug("<< %s err %s", method, message);
    throw new OracleError(`RPC ${method}: ${message}`, "JsonRpc", { code: body.error.code, data: body.error.data });
  }
  if (!("result" in body)) throw new OracleError(`RPC ${method} returned neither result nor error`, "Http");

  debug("<< %s ok", method);
  return body.result;
}
