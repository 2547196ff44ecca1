import { mkdtempSync, rmSync, writeFileSync, readFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";

/** Fresh scratch directory for one test file */
export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), "linefreq-"));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** Write a fixture and return its path */
export function writeFixture(dir: string, name: string, content: string | Uint8Array): string {
  const path = join(dir, name);
  writeFileSync(path, content);
  return path;
}

/** Parse a report back into rows, splitting on the last comma */
export function readReport(path: string): { header: string; rows: [string, number][] } {
  const lines = readFileSync(path, "utf-8").split("\n");
  // Trailing terminator leaves an empty last element
  lines.pop();
  const [header = "", ...data] = lines;
  const rows = data.map((line): [string, number] => {
    const comma = line.lastIndexOf(",");
    return [line.slice(0, comma), Number(line.slice(comma + 1))];
  });
  return { header, rows };
}

/** Deferred promise for controlling interleavings */
export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let settle: () => void = () => {};
  const promise = new Promise<void>((resolve) => {
    settle = resolve;
  });
  return { promise, resolve: () => settle() };
}
