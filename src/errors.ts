export type OracleErrorKind =
  | "Internal"
  | "Http"
  | "Transport"
  | "JsonRpc"
  | "OracleNotFound"
  | "OracleAlreadyExists"
  | "ParseError"
  | "Unauthorized"
  | "InvalidParams"
  | "PairNotFound"
  | "PairAlreadyExists";

export class OracleError extends Error {
  constructor(
    message: string,
    public readonly kind: OracleErrorKind,
    public readonly data?: unknown,
  ) {
    super(message);
    this.name = "OracleError";
  }

  static oracleNotFound(): OracleError {
    return new OracleError("oracle not found", "OracleNotFound");
  }

  static oracleAlreadyExists(): OracleError {
    return new OracleError("oracle already exists", "OracleAlreadyExists");
  }

  static unauthorized(message = "caller is not the owner of the oracle"): OracleError {
    return new OracleError(message, "Unauthorized");
  }
}

export class RpcError extends Error {
  constructor(
    message: string,
    public readonly code: number,
    public readonly data?: unknown,
  ) {
    super(message);
  }
}

export const RpcErrorCodes = {
  ParseError: -32700,
  InvalidParams: -32602,
  MethodNotFound: -32601,
  InternalError: -32603,
  Unauthorized: -32001,
  NotFound: -32004,
  AlreadyExists: -32009,
} as const;

export function rpcCodeForKind(kind: OracleErrorKind): number {
  switch (kind) {
    case "InvalidParams":
    case "ParseError":
      return RpcErrorCodes.InvalidParams;
    case "Unauthorized":
      return RpcErrorCodes.Unauthorized;
    case "OracleNotFound":
    case "PairNotFound":
      return RpcErrorCodes.NotFound;
    case "OracleAlreadyExists":
    case "PairAlreadyExists":
      return RpcErrorCodes.AlreadyExists;
    default:
      return RpcErrorCodes.InternalError;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function toRpcError(err: unknown): RpcError {
  if (err instanceof RpcError) return err;
  if (err instanceof OracleError) return new RpcError(err.message, rpcCodeForKind(err.kind), { kind: err.kind, detail: err.data });
  return new RpcError(errorMessage(err) || "Internal error", RpcErrorCodes.InternalError);
}
