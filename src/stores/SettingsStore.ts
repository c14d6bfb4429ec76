import { isRecord, isZeroAddress, normalizeAddress } from "../codec";
import { OracleError } from "../errors";
import type { Settings } from "../types";
import { JsonStateFile } from "./JsonStateFile";

function coerceSettings(raw: unknown): Settings | null {
  if (!isRecord(raw) || typeof raw.owner !== "string") return null;
  return { owner: raw.owner };
}

export class SettingsStore {
  private readonly file: JsonStateFile<Settings>;

  /** A persisted owner wins over `defaultOwner`. */
  constructor(opts: { filePath?: string; defaultOwner: string }) {
    const owner = SettingsStore.validOwner(opts.defaultOwner);
    this.file = new JsonStateFile<Settings>({ filePath: opts.filePath, initial: () => ({ owner }), coerce: coerceSettings });
  }

  get owner(): string {
    return this.file.read().owner;
  }

  setOwner(owner: string): void {
    this.file.write({ ...this.file.read(), owner: SettingsStore.validOwner(owner) });
  }

  isOwner(address: string): boolean {
    return this.owner.toLowerCase() === address.toLowerCase();
  }

  private static validOwner(owner: string): string {
    const normalized = normalizeAddress(owner, "owner");
    if (isZeroAddress(normalized)) throw new OracleError("owner must not be the zero address", "InvalidParams");
    return normalized;
  }
}
