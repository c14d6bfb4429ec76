import { coerceOracleMetadata, coerceRecordOf, isRecord, normalizeAddress } from "../codec";
import { OracleError } from "../errors";
import type { OracleMetadata, UpdateOracleMetadata } from "../types";
import { JsonStateFile } from "./JsonStateFile";

/** owner -> contract -> metadata */
type OracleMap = Record<string, Record<string, OracleMetadata>>;

function coerceOracleMap(raw: unknown): OracleMap | null {
  if (!isRecord(raw)) return null;
  const out: OracleMap = {};
  for (const [owner, byContract] of Object.entries(raw)) {
    const decoded = coerceRecordOf(byContract, coerceOracleMetadata);
    if (!decoded) return null;
    out[owner] = decoded;
  }
  return out;
}

export type OracleEntry = {
  owner: string;
  contract: string;
  metadata: OracleMetadata;
};

/**
 * Durable map of oracles keyed by (owner, destination contract).
 * Values handed out are copies; every mutation is written through before returning.
 */
export class OracleRegistry {
  private readonly file: JsonStateFile<OracleMap>;

  constructor(opts: { filePath?: string } = {}) {
    this.file = new JsonStateFile<OracleMap>({ filePath: opts.filePath, initial: () => ({}), coerce: coerceOracleMap });
  }

  has(owner: string, contract: string): boolean {
    const map = this.file.read();
    return Boolean(map[normalizeAddress(owner, "owner")]?.[normalizeAddress(contract, "contract")]);
  }

  add(owner: string, metadata: OracleMetadata): void {
    const ownerKey = normalizeAddress(owner, "owner");
    const contractKey = normalizeAddress(metadata.evm.contract, "contract");
    const map = structuredClone(this.file.read());
    const byContract = map[ownerKey] ?? {};
    if (byContract[contractKey]) throw OracleError.oracleAlreadyExists();

    byContract[contractKey] = structuredClone({ ...metadata, evm: { ...metadata.evm, contract: contractKey } });
    map[ownerKey] = byContract;
    this.file.write(map);
  }

  get(owner: string, contract: string): OracleMetadata {
    const found = this.file.read()[normalizeAddress(owner, "owner")]?.[normalizeAddress(contract, "contract")];
    if (!found) throw OracleError.oracleNotFound();
    return structuredClone(found);
  }

  getUserOracles(owner: string): Array<[string, OracleMetadata]> {
    const byContract = this.file.read()[normalizeAddress(owner, "owner")] ?? {};
    return Object.entries(byContract).map(([contract, md]) => [contract, structuredClone(md)]);
  }

  getAll(): Array<[string, Record<string, OracleMetadata>]> {
    return Object.entries(structuredClone(this.file.read()));
  }

  entries(): OracleEntry[] {
    const out: OracleEntry[] = [];
    for (const [owner, byContract] of this.getAll()) {
      for (const [contract, metadata] of Object.entries(byContract)) out.push({ owner, contract, metadata });
    }
    return out;
  }

  count(): number {
    return Object.values(this.file.read()).reduce((n, byContract) => n + Object.keys(byContract).length, 0);
  }

  /** Merges the set fields of `patch`; unset fields keep their stored values. */
  update(owner: string, contract: string, patch: UpdateOracleMetadata, scheduleHandle?: number | null): OracleMetadata {
    const ownerKey = normalizeAddress(owner, "owner");
    const contractKey = normalizeAddress(contract, "contract");
    const map = structuredClone(this.file.read());
    const current = map[ownerKey]?.[contractKey];
    if (!current) throw OracleError.oracleNotFound();

    const next: OracleMetadata = {
      origin: patch.origin ?? current.origin,
      timerInterval: patch.timerInterval ?? current.timerInterval,
      evm: patch.evm ?? current.evm,
      scheduleHandle: scheduleHandle === undefined ? current.scheduleHandle : scheduleHandle,
    };
    map[ownerKey][contractKey] = structuredClone(next);
    this.file.write(map);
    return next;
  }

  setScheduleHandle(owner: string, contract: string, handle: number | null): void {
    this.update(owner, contract, {}, handle);
  }

  remove(owner: string, contract: string): OracleMetadata {
    const ownerKey = normalizeAddress(owner, "owner");
    const contractKey = normalizeAddress(contract, "contract");
    const map = structuredClone(this.file.read());
    const byContract = map[ownerKey];
    const removed = byContract?.[contractKey];
    if (!byContract || !removed) throw OracleError.oracleNotFound();

    delete byContract[contractKey];
    if (Object.keys(byContract).length === 0) delete map[ownerKey];
    this.file.write(map);
    return removed;
  }
}
