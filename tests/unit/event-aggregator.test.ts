import { describe, expect, it } from "vitest";

import { Channel } from "../../src/domain/events/Channel.js";
import { EventAggregator } from "../../src/domain/events/EventAggregator.js";

type Item =
  | { readonly from: "numbers"; readonly value: number }
  | { readonly from: "words"; readonly value: string };

function setup(): {
  readonly aggregator: EventAggregator<Item>;
  readonly numbers: Channel<number>;
  readonly words: Channel<string>;
} {
  const aggregator = new EventAggregator<Item>();
  const numbers = new Channel<number>();
  const words = new Channel<string>();
  aggregator.add(numbers, (value) => ({ from: "numbers", value }));
  aggregator.add(words, (value) => ({ from: "words", value }));
  return { aggregator, numbers, words };
}

describe("EventAggregator", () => {
  it("yields items from whichever source produces them", async () => {
    const { aggregator, numbers, words } = setup();

    const first = aggregator.next();
    words.send("hi");
    expect(await first).toEqual({ done: false, value: { from: "words", value: "hi" } });

    numbers.send(7);
    expect(await aggregator.next()).toEqual({
      done: false,
      value: { from: "numbers", value: 7 },
    });
  });

  it("keeps each source in order", async () => {
    const { aggregator, numbers } = setup();
    numbers.send(1);
    numbers.send(2);
    numbers.send(3);

    const values: unknown[] = [];
    for (let index = 0; index < 3; index += 1) {
      const result = await aggregator.next();
      if (!result.done) values.push(result.value.value);
    }

    expect(values).toEqual([1, 2, 3]);
  });

  it("hands out items in the order they arrived across sources", async () => {
    const { aggregator, numbers, words } = setup();
    words.send("first");
    numbers.send(2);

    expect(await aggregator.next()).toEqual({
      done: false,
      value: { from: "words", value: "first" },
    });
    expect(await aggregator.next()).toEqual({
      done: false,
      value: { from: "numbers", value: 2 },
    });
  });

  it("keeps a quiet source waiting across many items from another", async () => {
    const { aggregator, numbers, words } = setup();

    for (let index = 0; index < 100; index += 1) {
      words.send(`w${index}`);
      expect(await aggregator.next()).toEqual({
        done: false,
        value: { from: "words", value: `w${index}` },
      });
    }

    numbers.send(7);
    expect(await aggregator.next()).toEqual({
      done: false,
      value: { from: "numbers", value: 7 },
    });
    expect(aggregator.size).toBe(2);
  });

  it("ends once every source has ended", async () => {
    const { aggregator, numbers, words } = setup();
    numbers.close();
    words.send("last");
    words.close();

    expect(await aggregator.next()).toEqual({
      done: false,
      value: { from: "words", value: "last" },
    });
    expect(await aggregator.next()).toEqual({ done: true, value: undefined });
    expect(aggregator.size).toBe(0);
  });

  it("picks up sources added while waiting", async () => {
    const { aggregator } = setup();
    const pending = aggregator.next();

    const late = new Channel<number>();
    late.send(42);
    aggregator.add(late, (value) => ({ from: "numbers", value }));

    expect(await pending).toEqual({ done: false, value: { from: "numbers", value: 42 } });
    expect(aggregator.size).toBe(3);
  });

  it("raises a source failure once and drops the source", async () => {
    const { aggregator, numbers, words } = setup();
    const failure = new Error("socket closed");

    numbers.fail(failure);
    await expect(aggregator.next()).rejects.toBe(failure);
    expect(aggregator.size).toBe(1);

    words.send("still here");
    expect(await aggregator.next()).toEqual({
      done: false,
      value: { from: "words", value: "still here" },
    });
  });

  it("is done immediately without sources", async () => {
    expect(await new EventAggregator<number>().next()).toEqual({
      done: true,
      value: undefined,
    });
  });
});
