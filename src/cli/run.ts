/**
 * CLI entry logic, separated from process wiring
 */

import { parseArgs } from "util";
import { resolve } from "path";
import { countLineFrequencies } from "../ts/pipeline";
import { LineFreqError } from "../ts/errors";
import type { RunPhase, RunSummary } from "../ts/types";
import { loadConfig, mergeConfig, parseConcurrency, type CLIConfig } from "./config";
import { ProgressBar, type ProgressOutput } from "./progress";

export const VERSION = "0.1.0";

export const HELP = `
linefreq - Count how often each line occurs in a text file

Usage: linefreq [options] [file]

Options:
  -f, --file-path <path>     Input file (default: JXJ.txt)
  -r, --result-path <path>   Output CSV (default: result.csv)
  -c, --concurrency <n>      Counting workers (default: 5)
  -q, --quiet                No progress bar or summary
  -h, --help                 Show this help message
  -v, --version              Show version

The report has a "Line,Count" header and one row per distinct line,
most frequent first. Lines are written as-is, without CSV quoting.

Examples:
  linefreq access.log
  linefreq -f access.log -r top-requests.csv -c 8
`;

/** Process context for a CLI run */
export interface CLIContext {
  env?: NodeJS.ProcessEnv;
  /** Relative paths and the config search start here */
  cwd?: string;
  /** Home directory searched for ~/.linefreqrc */
  home?: string;
  /** Progress output (default: process.stderr) */
  progressOutput?: ProgressOutput;
}

const PHASE_MESSAGES: Partial<Record<RunPhase, string>> = {
  Counting: "counting lines",
  Dispatching: "counting",
  Reporting: "writing",
};

/** Print summary stats after a run */
export function printSummary(summary: RunSummary): void {
  const elapsed = (summary.elapsedMs / 1000).toFixed(2);
  console.error(
    `✓ Counted ${summary.totalLines.toLocaleString()} lines ` +
      `(${summary.distinctLines.toLocaleString()} distinct) in ${elapsed}s`
  );
}

const OPTIONS = {
  help: { type: "boolean", short: "h" },
  version: { type: "boolean", short: "v" },
  "file-path": { type: "string", short: "f" },
  "result-path": { type: "string", short: "r" },
  concurrency: { type: "string", short: "c" },
  quiet: { type: "boolean", short: "q" },
} as const;

function parseCliArgs(argv: string[]) {
  return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true });
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run the CLI with the given arguments. Resolves with the exit code.
 */
export async function run(argv: string[], context: CLIContext = {}): Promise<number> {
  const env = context.env ?? process.env;
  const cwd = context.cwd ?? process.cwd();

  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    console.error("Run 'linefreq --help' for usage.");
    return 1;
  }
  const { values, positionals } = parsed;

  // Version first, then help
  if (values.version) {
    console.log(`linefreq v${VERSION}`);
    return 0;
  }

  if (values.help) {
    console.log(HELP);
    return 0;
  }

  if (positionals.length > 1) {
    console.error(`Error: Expected at most one input file, got ${positionals.length}`);
    return 1;
  }

  const { config: fileConfig, path: configPath } = loadConfig(cwd, context.home);
  if (configPath && env.LINEFREQ_DEBUG) {
    console.error(`Loaded config from: ${configPath}`);
  }

  let config: Required<CLIConfig>;
  try {
    const cliArgs: Partial<CLIConfig> = {
      filePath: values["file-path"] ?? positionals[0],
      resultPath: values["result-path"],
      concurrency:
        values.concurrency !== undefined
          ? parseConcurrency(values.concurrency, "--concurrency")
          : undefined,
      progress: values.quiet ? false : undefined,
    };
    config = mergeConfig(cliArgs, fileConfig, env);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    return 1;
  }

  const quiet = values.quiet ?? false;
  const bar = new ProgressBar(context.progressOutput ?? process.stderr, {
    enabled: config.progress ? undefined : false,
  });

  try {
    const summary = await countLineFrequencies({
      inputPath: resolve(cwd, config.filePath),
      outputPath: resolve(cwd, config.resultPath),
      concurrency: config.concurrency,
      onPhase: (phase) => {
        const message = PHASE_MESSAGES[phase];
        if (message !== undefined) bar.reset(undefined, message);
      },
      onProgress: (event) => {
        bar.update(event.position, event.length);
      },
    });

    bar.finish("done");
    if (!quiet) printSummary(summary);
    return 0;
  } catch (error) {
    bar.abandon("failed");
    console.error(`Error: ${errorMessage(error)}`);
    if (error instanceof LineFreqError && env.LINEFREQ_DEBUG) {
      console.error(JSON.stringify(error.toJSON()));
    }
    return 1;
  }
}
