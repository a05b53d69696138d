import { decodeInputRecord, encodeInputRecord } from "../../domain/entities/InputRecordCodec.js";
import type { InputRecord } from "../../domain/entities/InputRecord.js";
import type { TargetText } from "../../domain/entities/TargetText.js";
import type { RecordStore } from "../../domain/ports/RecordStore.js";
import type { SavePolicy } from "../../domain/typedefs.js";

/**
 * Keeps encoded records in a map, so loads go through the same codec as the
 * file-backed store.
 */
export class InMemoryRecordStore implements RecordStore {
  readonly #records = new Map<string, Uint8Array>();
  readonly #keyLength: number;

  constructor(keyLength = 10) {
    this.#keyLength = keyLength;
  }

  get keys(): string[] {
    return [...this.#records.keys()];
  }

  async save(text: TargetText, record: InputRecord, policy: SavePolicy): Promise<boolean> {
    const key = text.recordKey(this.#keyLength);

    if (policy === "best") {
      const existing = await this.loadBestOrLatest(text);
      if (existing && existing.averageWpm() >= record.averageWpm()) {
        return false;
      }
    }

    this.#records.set(key, encodeInputRecord(record));
    return true;
  }

  async loadBestOrLatest(text: TargetText): Promise<InputRecord | undefined> {
    const bytes = this.#records.get(text.recordKey(this.#keyLength));
    return bytes ? decodeInputRecord(bytes) : undefined;
  }
}
