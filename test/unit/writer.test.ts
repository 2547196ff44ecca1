/**
 * Tests for CSVWriter quoting and flushing
 */

import { describe, test, expect, beforeAll, afterAll } from "vitest";
import { readFileSync, writeFileSync } from "fs";
import { join } from "path";
import { CSVWriter, type CSVWriterOptions } from "../../src/ts/writer";
import { makeTempDir, removeDir } from "../helpers/tmp";

let dir: string;

beforeAll(() => {
  dir = makeTempDir();
});

afterAll(() => {
  removeDir(dir);
});

function writeAll(name: string, rows: (string | number | null)[][], options: CSVWriterOptions = {}): string {
  const path = join(dir, name);
  const writer = new CSVWriter(path, options);
  for (const row of rows) writer.writeRow(row);
  writer.close();
  return readFileSync(path, "utf-8");
}

describe("Quote styles", () => {
  test("minimal quotes only fields that need it", () => {
    const out = writeAll("minimal.csv", [["plain", "a,b", 'say "hi"', "two\nlines"]]);
    expect(out).toBe('plain,"a,b","say ""hi""","two\nlines"\n');
  });

  test("all quotes every field", () => {
    const out = writeAll("all.csv", [["a", 1]], { quoteStyle: "all" });
    expect(out).toBe('"a","1"\n');
  });

  test("none writes fields verbatim", () => {
    const out = writeAll("none.csv", [["a,b", '"q"', 3]], { quoteStyle: "none" });
    expect(out).toBe('a,b,"q",3\n');
  });

  test("null and undefined become empty fields", () => {
    const out = writeAll("nulls.csv", [["a", null, "c"]]);
    expect(out).toBe("a,,c\n");
  });
});

describe("Output options", () => {
  test("custom delimiter and line ending", () => {
    const out = writeAll("tabs.csv", [["a", "b"], ["c", "d"]], { delimiter: "\t", lineEnding: "\r\n" });
    expect(out).toBe("a\tb\r\nc\td\r\n");
  });

  test("append keeps existing content", () => {
    const path = join(dir, "append.csv");
    writeFileSync(path, "first\n");

    const writer = new CSVWriter(path, { append: true });
    writer.writeRow(["second"]);
    writer.close();

    expect(readFileSync(path, "utf-8")).toBe("first\nsecond\n");
  });

  test("closing an empty writer leaves an empty file", () => {
    const path = join(dir, "nothing.csv");
    writeFileSync(path, "old\n");

    new CSVWriter(path).close();

    expect(readFileSync(path, "utf-8")).toBe("");
  });
});

describe("Writer state", () => {
  test("row count includes buffered rows", () => {
    const writer = new CSVWriter(join(dir, "count.csv"), { flushEvery: 10 });
    writer.writeRow(["a"]);
    writer.writeRow(["b"]);

    expect(writer.getRowCount()).toBe(2);
    writer.close();
    expect(writer.getRowCount()).toBe(2);
  });

  test("writing after close throws", () => {
    const writer = new CSVWriter(join(dir, "closed.csv"));
    writer.close();

    expect(() => writer.writeRow(["late"])).toThrow("Writer is closed");
  });

  test("onFlush reports rows on disk after each non-empty flush", () => {
    const flushed: number[] = [];
    const writer = new CSVWriter(join(dir, "on-flush.csv"), {
      flushEvery: 2,
      onFlush: (rowsWritten) => flushed.push(rowsWritten),
    });
    writer.writeRow(["a"]);
    writer.writeRow(["b"]);
    writer.writeRow(["c"]);
    writer.flush();
    writer.close();

    expect(flushed).toEqual([2, 3]);
  });
});
