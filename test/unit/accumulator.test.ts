/**
 * Tests for FrequencyTable and the worker loop
 */

import { describe, test, expect } from "vitest";
import { FrequencyTable, runWorker } from "../../src/ts/accumulator";
import { WorkChannel } from "../../src/ts/channel";
import { generateLines } from "../../src/ts/testing";

describe("FrequencyTable", () => {
  test("inserts then increments", async () => {
    const table = new FrequencyTable();
    await table.increment("a");
    await table.increment("b");
    await table.increment("a");

    expect(table.get("a")).toBe(2);
    expect(table.get("b")).toBe(1);
    expect(table.get("missing")).toBe(0);
    expect(table.size).toBe(2);
    expect(table.total).toBe(3);
  });

  test("concurrent increments are never lost", async () => {
    const table = new FrequencyTable();
    const keys = ["x", "y", "z"];

    await Promise.all(
      Array.from({ length: 3000 }, (_, i) => table.increment(keys[i % keys.length] ?? "x"))
    );

    expect(table.get("x")).toBe(1000);
    expect(table.get("y")).toBe(1000);
    expect(table.get("z")).toBe(1000);
    expect(table.total).toBe(3000);
  });

  test("empty line is a key like any other", async () => {
    const table = new FrequencyTable();
    await table.increment("");
    await table.increment("");

    expect(table.get("")).toBe(2);
  });

  test("snapshot is a copy", async () => {
    const table = new FrequencyTable();
    await table.increment("a");
    const snapshot = table.snapshot();
    await table.increment("a");

    expect(snapshot.get("a")).toBe(1);
    expect(table.get("a")).toBe(2);
  });
});

describe("runWorker", () => {
  test("workers drain the channel into one table", async () => {
    const { content, expected } = generateLines({ lines: 5000, distinct: 40, seed: 7 });
    const lines = content.split("\n").slice(0, -1);
    const channel = new WorkChannel<string>();
    const table = new FrequencyTable();

    const workers = Array.from({ length: 6 }, () => runWorker(channel, table));
    for (const line of lines) {
      channel.send(line);
    }
    channel.close();

    const processed = await Promise.all(workers);

    expect(processed.reduce((sum, n) => sum + n, 0)).toBe(5000);
    expect(table.total).toBe(5000);
    expect(new Map(table.snapshot())).toEqual(expected);
  });

  test("a worker on a closed empty channel processes nothing", async () => {
    const channel = new WorkChannel<string>();
    channel.close();

    expect(await runWorker(channel, new FrequencyTable())).toBe(0);
  });
});
