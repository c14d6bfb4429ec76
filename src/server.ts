import bodyParser from "body-parser";
import cors from "cors";
import Debug from "debug";
import express from "express";
import type { Express, NextFunction, Request, Response } from "express";

import { coerceChainEndpoint, coerceDestination, coerceOrigin, coerceUpdateMetadata, isRecord } from "./codec";
import { OracleError, RpcError, RpcErrorCodes, toRpcError } from "./errors";
import type { CreateFeedRequest, PriceFeedService } from "./feeds";
import type { OracleService } from "./service";
import { recoverCaller } from "./signer/auth";

const debug = Debug("oracle-relay:server");

export type ServerConfig = {
  host: string;
  port: number;
  authWindowSec: number;
};

type RpcId = string | number | null;

type RpcResponse =
  | { jsonrpc: "2.0"; id: RpcId; result: unknown }
  | { jsonrpc: "2.0"; id: RpcId; error: { code: number; message: string; data?: unknown } };

function invalidParams(message: string): OracleError {
  return new OracleError(message, "InvalidParams");
}

function stringParam(params: unknown[], index: number, name: string): string {
  const value = params[index];
  if (typeof value !== "string" || value.length === 0) throw invalidParams(`${name} must be a non-empty string`);
  return value;
}

function numberParam(params: unknown[], index: number, name: string, fallback?: number): number {
  const value = params[index];
  if (value === undefined && fallback !== undefined) return fallback;
  if (typeof value !== "number") throw invalidParams(`${name} must be a number`);
  return value;
}

function recordParam(params: unknown[], index: number, name: string): Record<string, unknown> {
  const value = params[index];
  if (!isRecord(value)) throw invalidParams(`${name} must be an object`);
  return value;
}

function decoded<T>(value: T | null, name: string): T {
  if (value === null) throw invalidParams(`malformed ${name}`);
  return value;
}

function feedRequestParam(params: unknown[], index: number): CreateFeedRequest {
  const raw = recordParam(params, index, "feed");
  const chain = decoded(coerceChainEndpoint(raw.chain), "chain");
  if (typeof raw.base !== "string" || typeof raw.quote !== "string") throw invalidParams("base and quote are required");
  if (typeof raw.decimals !== "number" || typeof raw.version !== "number") throw invalidParams("decimals and version must be numbers");
  const description = typeof raw.description === "string" ? raw.description : `${raw.base} / ${raw.quote}`;
  return { base: raw.base, quote: raw.quote, decimals: raw.decimals, description, version: raw.version, chain };
}

function rpcId(value: unknown): RpcId {
  return typeof value === "string" || typeof value === "number" ? value : null;
}

/**
 * JSON-RPC 2.0 over `POST /rpc`. Mutating methods take `{ message, signature }` as their
 * first param and act on behalf of the recovered address.
 */
export class OracleRelayServer {
  private readonly app: Express;
  private httpServer?: ReturnType<Express["listen"]>;

  constructor(
    readonly service: OracleService,
    readonly feeds: PriceFeedService,
    readonly config: ServerConfig,
  ) {
    this.app = express();
    this.app.use(cors());
    this.app.use(bodyParser.json({ limit: "1mb" }));

    this.app.get("/", (_req, res) => res.send("oracle-relay: use POST /rpc"));
    this.app.get("/health", (_req, res) => res.json(this.service.health()));
    this.app.post("/rpc", async (req, res) => this._rpc(req, res));
    this.app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
      if (res.headersSent) return next(err);
      debug("request failed: %o", err);
      res.status(400).json({
        jsonrpc: "2.0",
        id: null,
        error: { code: RpcErrorCodes.ParseError, message: "Parse error" },
      });
    });
  }

  /** Base URL once listening, e.g. `http://127.0.0.1:3004`. */
  get url(): string {
    const addr = this.httpServer?.address();
    const port = typeof addr === "object" && addr ? addr.port : this.config.port;
    return `http://${this.config.host}:${port}`;
  }

  async start(): Promise<void> {
    await new Promise<void>((resolve) => {
      this.httpServer = this.app.listen(this.config.port, this.config.host, () => resolve());
    });
  }

  async stop(): Promise<void> {
    const server = this.httpServer;
    if (!server) return;
    this.httpServer = undefined;
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private async _rpc(req: Request, res: Response): Promise<void> {
    const body: unknown = req.body;
    const result = Array.isArray(body)
      ? await Promise.all(body.map((item: unknown) => this._handleRpcItem(item)))
      : await this._handleRpcItem(body);

    res.json(result);
  }

  private async _handleRpcItem(item: unknown): Promise<RpcResponse> {
    const request = isRecord(item) ? item : {};
    const id = rpcId(request.id);
    const method = typeof request.method === "string" ? request.method : "";
    const params = Array.isArray(request.params) ? request.params : [];
    debug(">> %s %o", method, params);
    try {
      const result = await this._handleMethod(method, params);
      debug("<< %s ok", method);
      return { jsonrpc: "2.0", id, result: result ?? null };
    } catch (err) {
      const rpcErr = toRpcError(err);
      debug("<< %s err %s", method, rpcErr.message);
      return { jsonrpc: "2.0", id, error: { code: rpcErr.code, message: rpcErr.message, data: rpcErr.data } };
    }
  }

  private caller(params: unknown[], method: string): string {
    return recoverCaller(params[0], method, this.config.authWindowSec);
  }

  private async _handleMethod(method: string, params: unknown[]): Promise<unknown> {
    switch (method) {
      case "oracle_create": {
        const caller = this.caller(params, method);
        const req = recordParam(params, 1, "oracle");
        const origin = decoded(coerceOrigin(req.origin), "origin");
        const evm = decoded(coerceDestination(req.evm), "evm");
        if (typeof req.timerInterval !== "number") throw invalidParams("timerInterval must be a number");
        return await this.service.createOracle(caller, origin, req.timerInterval, evm);
      }
      case "oracle_update": {
        const caller = this.caller(params, method);
        const patch = decoded(coerceUpdateMetadata(params[3]), "patch");
        return await this.service.updateOracle(
          caller,
          stringParam(params, 1, "owner"),
          stringParam(params, 2, "contract"),
          patch,
        );
      }
      case "oracle_delete": {
        const caller = this.caller(params, method);
        await this.service.deleteOracle(caller, stringParam(params, 1, "owner"), stringParam(params, 2, "contract"));
        return true;
      }
      case "oracle_getUserOracles":
        return this.service.getUserOracles(stringParam(params, 0, "owner"));
      case "oracle_getAll":
        return this.service.getAllOracles();
      case "oracle_getMetadata":
        return this.service.getOracleMetadata(stringParam(params, 0, "owner"), stringParam(params, 1, "contract"));
      case "oracle_getStatus":
        return this.service.getOracleStatus(stringParam(params, 0, "owner"), stringParam(params, 1, "contract"));
      case "oracle_signerAddress":
        return await this.service.signerAddress(stringParam(params, 0, "owner"));
      case "pending_list":
        return this.service.pendingTransactions();
      case "feed_create":
        return await this.feeds.createFeed(this.caller(params, method), feedRequestParam(params, 1));
      case "feed_remove":
        return this.feeds.removeFeed(this.caller(params, method), stringParam(params, 1, "pairId"));
      case "feed_list":
        return this.feeds.listFeeds();
      case "admin_owner":
        return this.service.owner(this.caller(params, method));
      case "admin_setOwner":
        return await this.service.setOwner(this.caller(params, method), stringParam(params, 1, "owner"));
      case "admin_setLogFilter":
        this.service.setLogFilter(this.caller(params, method), stringParam(params, 1, "filter"));
        return true;
      case "admin_logs":
        return this.service.recentLogs(this.caller(params, method), numberParam(params, 1, "count", 100));
      default:
        throw new RpcError(`Method ${method} is not supported`, RpcErrorCodes.MethodNotFound);
    }
  }
}
