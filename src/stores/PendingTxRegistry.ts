import { coercePendingTransaction, coerceRecordOf } from "../codec";
import type { PendingTransaction } from "../types";
import { JsonStateFile } from "./JsonStateFile";

type PendingMap = Record<string, PendingTransaction>;

/**
 * Broadcast transactions awaiting a terminal state, keyed by lowercase tx hash.
 * An entry leaves the registry only through `extract`, which persists the removal
 * before handing the entry out.
 */
export class PendingTxRegistry {
  private readonly file: JsonStateFile<PendingMap>;

  constructor(opts: { filePath?: string } = {}) {
    this.file = new JsonStateFile<PendingMap>({
      filePath: opts.filePath,
      initial: () => ({}),
      coerce: (raw) => coerceRecordOf(raw, coercePendingTransaction),
    });
  }

  register(entry: PendingTransaction): void {
    const map = { ...this.file.read() };
    map[entry.txHash.toLowerCase()] = structuredClone(entry);
    this.file.write(map);
  }

  get(txHash: string): PendingTransaction | null {
    const found = this.file.read()[txHash.toLowerCase()];
    return found ? structuredClone(found) : null;
  }

  /** Removes and returns the entry; null when another path already extracted it. */
  extract(txHash: string): PendingTransaction | null {
    const key = txHash.toLowerCase();
    const current = this.file.read();
    const found = current[key];
    if (!found) return null;

    const map = { ...current };
    delete map[key];
    this.file.write(map);
    return found;
  }

  list(): PendingTransaction[] {
    return Object.values(structuredClone(this.file.read()));
  }

  count(): number {
    return Object.keys(this.file.read()).length;
  }
}
