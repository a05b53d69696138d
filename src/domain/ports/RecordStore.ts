import type { InputRecord } from "../entities/InputRecord.js";
import type { TargetText } from "../entities/TargetText.js";
import type { SavePolicy } from "../typedefs.js";

/**
 * Persists one record per target text, keyed by the text's content digest.
 */
export interface RecordStore {
  /**
   * Stores `record` for `text`. Under the `best` policy an existing record
   * with a higher or equal average WPM is kept. Resolves whether anything
   * was written.
   */
  save(text: TargetText, record: InputRecord, policy: SavePolicy): Promise<boolean>;

  /** Resolves `undefined` when nothing was stored for this text yet */
  loadBestOrLatest(text: TargetText): Promise<InputRecord | undefined>;
}
