import fs from "node:fs";
import path from "node:path";

/**
 * A single JSON value persisted to one file. Writes are synchronous and go through a
 * temp file plus rename, so a crash leaves either the old or the new content on disk.
 * Without a `filePath` the value lives only in memory.
 */
export class JsonStateFile<T> {
  private value: T;

  constructor(
    private readonly cfg: {
      filePath?: string;
      initial: () => T;
      coerce: (raw: unknown) => T | null;
    },
  ) {
    this.value = this._load();
  }

  read(): T {
    return this.value;
  }

  write(next: T): void {
    if (this.cfg.filePath) {
      const dir = path.dirname(this.cfg.filePath);
      fs.mkdirSync(dir, { recursive: true });
      const tmp = `${this.cfg.filePath}.tmp`;
      fs.writeFileSync(tmp, JSON.stringify(next, null, 2));
      fs.renameSync(tmp, this.cfg.filePath);
    }
    this.value = next;
  }

  private _load(): T {
    if (!this.cfg.filePath || !fs.existsSync(this.cfg.filePath)) return this.cfg.initial();
    const raw: unknown = JSON.parse(fs.readFileSync(this.cfg.filePath, "utf8"));
    const coerced = this.cfg.coerce(raw);
    if (coerced === null) throw new Error(`corrupt state file: ${this.cfg.filePath}`);
    return coerced;
  }
}
