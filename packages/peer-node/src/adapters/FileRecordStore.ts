import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { join } from "node:path";

import {
  decodeInputRecord,
  encodeInputRecord,
  RecordStoreError,
  type InputRecord,
  type Logger,
  type RecordStore,
  type SavePolicy,
  type TargetText,
} from "../core.js";

const EXTENSION = ".kdr";

interface FileRecordStoreOptions {
  readonly directory: string;
  readonly keyLength?: number;
  readonly logger?: Logger;
}

/**
 * One binary record file per target text, named after the first characters
 * of the text digest.
 */
export class FileRecordStore implements RecordStore {
  readonly directory: string;
  readonly #keyLength: number;
  readonly #logger: Logger | undefined;

  constructor({ directory, keyLength = 10, logger }: FileRecordStoreOptions) {
    this.directory = directory;
    this.#keyLength = keyLength;
    this.#logger = logger;
  }

  pathFor(text: TargetText): string {
    return join(this.directory, `${text.recordKey(this.#keyLength)}${EXTENSION}`);
  }

  async save(text: TargetText, record: InputRecord, policy: SavePolicy): Promise<boolean> {
    if (policy === "best") {
      const existing = await this.loadBestOrLatest(text);
      if (existing && existing.averageWpm() >= record.averageWpm()) {
        this.#logger?.info?.("Kept existing record; it is at least as fast", {
          path: this.pathFor(text),
        });
        return false;
      }
    }

    const path = this.pathFor(text);
    const temporary = `${path}.tmp`;
    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(temporary, encodeInputRecord(record));
      await rename(temporary, path);
    } catch (error) {
      throw new RecordStoreError(`Failed to write record ${path}`, error);
    }

    this.#logger?.info?.("Record written", { path, entries: record.size });
    return true;
  }

  async loadBestOrLatest(text: TargetText): Promise<InputRecord | undefined> {
    const path = this.pathFor(text);

    let bytes: Buffer;
    try {
      bytes = await readFile(path);
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw new RecordStoreError(`Failed to read record ${path}`, error);
    }

    return decodeInputRecord(bytes);
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
