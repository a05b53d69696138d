import { describe, expect, it } from "vitest";

import { InMemoryRecordStore } from "../src/adapters/in-memory/InMemoryRecordStore.js";
import { InputRecord } from "../src/domain/entities/InputRecord.js";
import { TargetText } from "../src/domain/entities/TargetText.js";

const slow = new InputRecord([{ elapsedMs: 1_000, input: { kind: "Correct", char: "a" } }]);
const fast = new InputRecord([
  { elapsedMs: 500, input: { kind: "Correct", char: "a" } },
  { elapsedMs: 1_000, input: { kind: "Correct", char: "b" } },
]);

describe("InMemoryRecordStore", () => {
  it("returns nothing for an unknown text", async () => {
    const store = new InMemoryRecordStore();

    expect(await store.loadBestOrLatest(new TargetText("ab"))).toBeUndefined();
  });

  it("keeps the faster record under the best policy", async () => {
    const store = new InMemoryRecordStore();
    const text = new TargetText("ab");

    expect(await store.save(text, fast, "best")).toBe(true);
    expect(await store.save(text, slow, "best")).toBe(false);
    expect(await store.save(text, fast, "best")).toBe(false);

    const loaded = await store.loadBestOrLatest(text);
    expect(loaded?.entries()).toEqual(fast.entries());
  });

  it("replaces the record under the override policy", async () => {
    const store = new InMemoryRecordStore(6);
    const text = new TargetText("ab");

    await store.save(text, fast, "best");
    expect(await store.save(text, slow, "override")).toBe(true);

    const loaded = await store.loadBestOrLatest(text);
    expect(loaded?.entries()).toEqual(slow.entries());
    expect(store.keys).toEqual([text.recordKey(6)]);
  });

  it("stores records per text", async () => {
    const store = new InMemoryRecordStore();

    await store.save(new TargetText("ab"), fast, "override");

    expect(await store.loadBestOrLatest(new TargetText("abc"))).toBeUndefined();
  });
});
