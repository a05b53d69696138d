import { RecordStoreError } from "../errors/RecordStoreError.js";
import { InputRecord, type RecordedInput } from "./InputRecord.js";

const MAGIC = [0x4b, 0x44, 0x52, 0x31] as const; // "KDR1"
const VERSION = 1;
const HEADER_BYTES = MAGIC.length + 1 + 4;
const ENTRY_BYTES = 4 + 1 + 4 + 4;
const MAX_UINT32 = 0xffff_ffff;
const MAX_CODE_POINT = 0x10ffff;

const TAG_CORRECT = 0;
const TAG_WRONG = 1;

function codePointOf(char: string): number {
  const codePoint = char.codePointAt(0);
  if (codePoint === undefined || String.fromCodePoint(codePoint) !== char) {
    throw new RecordStoreError(`Cannot encode ${JSON.stringify(char)} as a single character`);
  }
  return codePoint;
}

function charOf(codePoint: number, offset: number): string {
  if (codePoint > MAX_CODE_POINT) {
    throw new RecordStoreError(`Invalid code point at byte ${offset}`);
  }
  return String.fromCodePoint(codePoint);
}

export function encodeInputRecord(record: InputRecord): Uint8Array {
  const bytes = new Uint8Array(HEADER_BYTES + record.size * ENTRY_BYTES);
  const view = new DataView(bytes.buffer);

  bytes.set(MAGIC, 0);
  view.setUint8(MAGIC.length, VERSION);
  view.setUint32(MAGIC.length + 1, record.size);

  let offset = HEADER_BYTES;
  for (const { elapsedMs, input } of record) {
    if (!Number.isInteger(elapsedMs) || elapsedMs > MAX_UINT32) {
      throw new RecordStoreError(`Cannot encode elapsed time ${elapsedMs}ms`);
    }

    const expected = input.kind === "Correct" ? input.char : input.expected;
    const typed = input.kind === "Correct" ? input.char : input.typed;

    view.setUint32(offset, elapsedMs);
    view.setUint8(offset + 4, input.kind === "Correct" ? TAG_CORRECT : TAG_WRONG);
    view.setUint32(offset + 5, codePointOf(expected));
    view.setUint32(offset + 9, codePointOf(typed));
    offset += ENTRY_BYTES;
  }

  return bytes;
}

export function decodeInputRecord(bytes: Uint8Array): InputRecord {
  if (bytes.length < HEADER_BYTES || MAGIC.some((byte, index) => bytes[index] !== byte)) {
    throw new RecordStoreError("Not an input record");
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const version = view.getUint8(MAGIC.length);
  if (version !== VERSION) {
    throw new RecordStoreError(`Unsupported input record version ${version}`);
  }

  const count = view.getUint32(MAGIC.length + 1);
  if (bytes.length !== HEADER_BYTES + count * ENTRY_BYTES) {
    throw new RecordStoreError(
      `Input record truncated: expected ${count} entries in ${bytes.length} bytes`,
    );
  }

  const record = new InputRecord();
  let offset = HEADER_BYTES;
  for (let index = 0; index < count; index += 1) {
    const elapsedMs = view.getUint32(offset);
    const tag = view.getUint8(offset + 4);
    const expected = charOf(view.getUint32(offset + 5), offset + 5);
    const typed = charOf(view.getUint32(offset + 9), offset + 9);

    let input: RecordedInput;
    if (tag === TAG_CORRECT) {
      input = { kind: "Correct", char: expected };
    } else if (tag === TAG_WRONG) {
      input = { kind: "Wrong", expected, typed };
    } else {
      throw new RecordStoreError(`Unknown entry tag ${tag} at byte ${offset + 4}`);
    }

    try {
      record.append(elapsedMs, input);
    } catch (error) {
      throw new RecordStoreError("Input record entries are out of order", error);
    }
    offset += ENTRY_BYTES;
  }

  return record;
}
