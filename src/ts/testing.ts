/**
 * Testing utilities for linefreq
 */

export interface GenerateLinesOptions {
  /** Total lines to emit */
  lines: number;
  /** Size of the vocabulary lines are drawn from */
  distinct: number;
  seed?: number;
  lineEnding?: "\n" | "\r\n";
  /** End the last line with a terminator (default: true) */
  trailingNewline?: boolean;
}

export interface GeneratedCorpus {
  content: string;
  /** Occurrences of every line in `content` */
  expected: Map<string, number>;
}

/** Simple seeded random number generator */
export class SeededRandom {
  private seed: number;

  constructor(seed: number) {
    this.seed = seed;
  }

  next(): number {
    this.seed = (this.seed * 1103515245 + 12345) & 0x7fffffff;
    return this.seed / 0x7fffffff;
  }

  nextInt(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  pick<T>(array: readonly T[]): T {
    const item = array[this.nextInt(0, array.length - 1)];
    if (item === undefined) throw new Error("Cannot pick from an empty array");
    return item;
  }
}

const METHODS = ["GET", "POST", "PUT", "DELETE"] as const;
const RESOURCES = ["users", "orders", "items", "carts", "sessions"] as const;

/**
 * Generate a log-like corpus with a skewed line distribution, together with
 * the count of every line in it.
 */
export function generateLines(options: GenerateLinesOptions): GeneratedCorpus {
  const rng = new SeededRandom(options.seed ?? 42);
  const lineEnding = options.lineEnding ?? "\n";

  const vocabulary: string[] = [];
  for (let i = 0; i < options.distinct; i++) {
    vocabulary.push(`${rng.pick(METHODS)} /${rng.pick(RESOURCES)}/${i}`);
  }

  const expected = new Map<string, number>();
  const lines: string[] = [];
  for (let i = 0; i < options.lines; i++) {
    // Squaring the draw favours low indices, giving a long tail
    const draw = rng.next();
    const index = Math.min(vocabulary.length - 1, Math.floor(draw * draw * vocabulary.length));
    const line = vocabulary[index] ?? "";
    lines.push(line);
    expected.set(line, (expected.get(line) ?? 0) + 1);
  }

  let content = lines.join(lineEnding);
  if (lines.length > 0 && options.trailingNewline !== false) {
    content += lineEnding;
  }

  return { content, expected };
}

/** Lines that exercise splitting and report formatting */
export function edgeCaseLines(): string[] {
  return [
    "",
    " ",
    "leading space",
    "leading space ",
    "tab\tseparated",
    "comma, inside",
    '"quoted"',
    "日本語",
    "émoji 😀",
    "mixed CASE",
    "mixed case",
  ];
}
