import { coercePriceFeed, coerceRecordOf } from "../codec";
import { OracleError } from "../errors";
import type { HexString, PriceFeed } from "../types";
import { JsonStateFile } from "./JsonStateFile";

type FeedMap = Record<string, PriceFeed>;

/** "ETH", "usd" -> "eth-usd" */
export function pairIdOf(base: string, quote: string): string {
  return `${base.toLowerCase()}-${quote.toLowerCase()}`;
}

/** Price-feed contracts per currency pair; `address` stays null until the deployment is mined. */
export class PriceFeedRegistry {
  private readonly file: JsonStateFile<FeedMap>;

  constructor(opts: { filePath?: string } = {}) {
    this.file = new JsonStateFile<FeedMap>({
      filePath: opts.filePath,
      initial: () => ({}),
      coerce: (raw) => coerceRecordOf(raw, coercePriceFeed),
    });
  }

  has(pairId: string): boolean {
    return Boolean(this.file.read()[pairId]);
  }

  add(feed: PriceFeed): void {
    if (this.has(feed.pairId)) throw new OracleError(`pair ${feed.pairId} already exists`, "PairAlreadyExists");
    this.file.write({ ...this.file.read(), [feed.pairId]: structuredClone(feed) });
  }

  get(pairId: string): PriceFeed {
    const found = this.file.read()[pairId];
    if (!found) throw new OracleError(`pair ${pairId} not found`, "PairNotFound");
    return structuredClone(found);
  }

  setTxHash(pairId: string, txHash: HexString): void {
    this.file.write({ ...this.file.read(), [pairId]: { ...this.get(pairId), txHash } });
  }

  setAddress(pairId: string, address: string): void {
    this.file.write({ ...this.file.read(), [pairId]: { ...this.get(pairId), address } });
  }

  list(): PriceFeed[] {
    return Object.values(structuredClone(this.file.read()));
  }

  remove(pairId: string): PriceFeed {
    const removed = this.get(pairId);
    const map = { ...this.file.read() };
    delete map[pairId];
    this.file.write(map);
    return removed;
  }
}
