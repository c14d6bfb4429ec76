import Debug from "debug";

const debug = Debug("oracle-relay:logs");

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEvent = {
  ts: number;
  level: LogLevel;
  service: string;
  msg: string;

  owner?: string;
  contract?: string;
  txHash?: string;
  chainId?: number;

  meta?: Record<string, unknown>;
};

/** Per-event fields; `ts` defaults to now. */
export type LogFields = Omit<LogEvent, "ts" | "service" | "level" | "msg"> & { ts?: number };

export type LoggerOptions = {
  service: string;
  monitorUrl?: string;
  retention?: number;
  stdout?: boolean;
};

function joinUrl(base: string, suffix: string): string {
  const b = base.endsWith("/") ? base.slice(0, -1) : base;
  const s = suffix.startsWith("/") ? suffix : `/${suffix}`;
  return `${b}${s}`;
}

export function nowSec(): number {
  return Math.floor(Date.now() / 1000);
}

export class Logger {
  private readonly service: string;
  private readonly logIngestUrl?: string;
  private readonly retention: number;
  private readonly stdout: boolean;
  private recentEvents: LogEvent[] = [];

  constructor(opts: LoggerOptions) {
    this.service = opts.service;
    this.logIngestUrl = opts.monitorUrl ? joinUrl(opts.monitorUrl, "/api/logs/ingest") : undefined;
    this.retention = opts.retention ?? 1000;
    this.stdout = opts.stdout ?? true;
  }

  async log(event: Omit<LogEvent, "ts" | "service"> & { ts?: number; service?: string }): Promise<void> {
    const full: LogEvent = {
      ts: event.ts ?? nowSec(),
      level: event.level,
      service: event.service ?? this.service,
      msg: event.msg,
      owner: event.owner,
      contract: event.contract,
      txHash: event.txHash,
      chainId: event.chainId,
      meta: event.meta ?? {},
    };

    this.recentEvents.push(full);
    if (this.recentEvents.length > this.retention) this.recentEvents.shift();

    debug("[%s] %s", full.level, full.msg);
    if (this.stdout) {
      // eslint-disable-next-line no-console
      console.log(JSON.stringify(full));
    }

    if (!this.logIngestUrl) return;
    try {
      await fetch(this.logIngestUrl, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(full),
        signal: AbortSignal.timeout(3_000),
      });
    } catch (err) {
      debug("log ingest failed: %s", err instanceof Error ? err.message : String(err));
    }
  }

  info(msg: string, fields: LogFields = {}): Promise<void> {
    return this.log({ ...fields, level: "info", msg });
  }

  warn(msg: string, fields: LogFields = {}): Promise<void> {
    return this.log({ ...fields, level: "warn", msg });
  }

  error(msg: string, fields: LogFields = {}): Promise<void> {
    return this.log({ ...fields, level: "error", msg });
  }

  /** Most recent events, newest last. */
  recent(count: number): LogEvent[] {
    if (count <= 0) return [];
    return this.recentEvents.slice(-count);
  }

  /** Replaces the active `debug` namespace filter, e.g. `oracle-relay:*,-oracle-relay:rpc`. */
  static setFilter(filter: string): void {
    Debug.enable(filter);
  }
}
