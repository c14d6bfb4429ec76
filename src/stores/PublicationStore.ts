import { coercePublication, coerceRecordOf, normalizeAddress } from "../codec";
import type { HexString, Publication, TransactionReceipt } from "../types";
import { JsonStateFile } from "./JsonStateFile";

type PublicationMap = Record<string, Publication>;

function emptyPublication(): Publication {
  return {
    lastTxHash: null,
    lastPrice: null,
    lastBlockNumber: null,
    lastConfirmedAt: null,
    confirmed: 0,
    dropped: 0,
  };
}

function keyOf(owner: string, contract: string): string {
  return `${normalizeAddress(owner, "owner")}:${normalizeAddress(contract, "contract")}`;
}

/** Outcome of the price updates published for each oracle. */
export class PublicationStore {
  private readonly file: JsonStateFile<PublicationMap>;

  constructor(opts: { filePath?: string } = {}) {
    this.file = new JsonStateFile<PublicationMap>({
      filePath: opts.filePath,
      initial: () => ({}),
      coerce: (raw) => coerceRecordOf(raw, coercePublication),
    });
  }

  get(owner: string, contract: string): Publication {
    const found = this.file.read()[keyOf(owner, contract)];
    return found ? { ...found } : emptyPublication();
  }

  recordConfirmed(owner: string, contract: string, price: string, receipt: TransactionReceipt, ts: number): Publication {
    const key = keyOf(owner, contract);
    const current = this.file.read()[key] ?? emptyPublication();
    const next: Publication = {
      ...current,
      lastTxHash: receipt.transactionHash,
      lastPrice: price,
      lastBlockNumber: receipt.blockNumber,
      lastConfirmedAt: ts,
      confirmed: current.confirmed + 1,
    };
    this.file.write({ ...this.file.read(), [key]: next });
    return next;
  }

  recordDropped(owner: string, contract: string, txHash: HexString): Publication {
    const key = keyOf(owner, contract);
    const current = this.file.read()[key] ?? emptyPublication();
    const next: Publication = { ...current, lastTxHash: txHash, dropped: current.dropped + 1 };
    this.file.write({ ...this.file.read(), [key]: next });
    return next;
  }

  forget(owner: string, contract: string): void {
    const key = keyOf(owner, contract);
    const map = { ...this.file.read() };
    if (!map[key]) return;
    delete map[key];
    this.file.write(map);
  }
}
