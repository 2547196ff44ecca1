/**
 * Config file loader for linefreq CLI
 * Supports .linefreqrc (JSON) in current directory or parent directories
 */

import { existsSync, readFileSync } from "fs";
import { join, dirname } from "path";
import { homedir } from "os";
import { LineFreqError } from "../ts/errors";

export interface CLIConfig {
  filePath?: string;
  resultPath?: string;
  concurrency?: number;
  progress?: boolean;
}

const CONFIG_FILENAMES = [".linefreqrc", ".linefreqrc.json", "linefreq.config.json"];

/**
 * Search for config file starting from the given directory,
 * walking up to parent directories and finally home directory.
 */
export function findConfigFile(startDir: string = process.cwd(), home: string = homedir()): string | null {
  let currentDir = startDir;

  while (true) {
    for (const filename of CONFIG_FILENAMES) {
      const configPath = join(currentDir, filename);
      if (existsSync(configPath)) {
        return configPath;
      }
    }
    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) break;
    currentDir = parentDir;
  }

  const homeConfig = join(home, ".linefreqrc");
  if (existsSync(homeConfig)) {
    return homeConfig;
  }

  return null;
}

/**
 * Keep only the known keys, with the right types.
 */
function pickConfig(raw: unknown): CLIConfig {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new Error("expected a JSON object");
  }

  const config: CLIConfig = {};
  const entries = new Map<string, unknown>(Object.entries(raw));

  const filePath = entries.get("filePath");
  if (typeof filePath === "string") config.filePath = filePath;

  const resultPath = entries.get("resultPath");
  if (typeof resultPath === "string") config.resultPath = resultPath;

  const concurrency = entries.get("concurrency");
  if (typeof concurrency === "number") config.concurrency = concurrency;

  const progress = entries.get("progress");
  if (typeof progress === "boolean") config.progress = progress;

  return config;
}

/**
 * Load configuration from file.
 */
export function loadConfig(
  startDir?: string,
  home?: string
): { config: CLIConfig; path: string | null } {
  const configPath = findConfigFile(startDir, home);

  if (!configPath) {
    return { config: {}, path: null };
  }

  try {
    const content = readFileSync(configPath, "utf-8");
    return { config: pickConfig(JSON.parse(content)), path: configPath };
  } catch (error) {
    console.error(
      `Warning: Failed to parse config file ${configPath}: ${error instanceof Error ? error.message : String(error)}`
    );
    return { config: {}, path: configPath };
  }
}

/**
 * Parse a worker count given as text.
 */
export function parseConcurrency(value: string, source: string): number {
  const parsed = /^\d+$/.test(value.trim()) ? Number(value.trim()) : NaN;
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new LineFreqError(
      "InvalidOption",
      "configure",
      `Invalid concurrency from ${source}: "${value}" (expected a positive integer)`
    );
  }
  return parsed;
}

/**
 * Read overrides from the environment.
 */
export function envConfig(env: NodeJS.ProcessEnv = process.env): Partial<CLIConfig> {
  const config: Partial<CLIConfig> = {};

  if (env.LINEFREQ_FILE_PATH) {
    config.filePath = env.LINEFREQ_FILE_PATH;
  }
  if (env.LINEFREQ_RESULT_PATH) {
    config.resultPath = env.LINEFREQ_RESULT_PATH;
  }
  if (env.LINEFREQ_CONCURRENCY) {
    config.concurrency = parseConcurrency(env.LINEFREQ_CONCURRENCY, "LINEFREQ_CONCURRENCY");
  }
  if (env.LINEFREQ_NO_PROGRESS === "1" || env.LINEFREQ_NO_PROGRESS === "true") {
    config.progress = false;
  }

  return config;
}

/**
 * Merge configuration sources with proper precedence.
 * CLI args > environment variables > config file > defaults
 */
export function mergeConfig(
  cliArgs: Partial<CLIConfig>,
  fileConfig: CLIConfig,
  env: NodeJS.ProcessEnv = process.env
): Required<CLIConfig> {
  const merged: CLIConfig = { ...getDefaults(), ...fileConfig };

  for (const layer of [envConfig(env), cliArgs]) {
    if (layer.filePath !== undefined) merged.filePath = layer.filePath;
    if (layer.resultPath !== undefined) merged.resultPath = layer.resultPath;
    if (layer.concurrency !== undefined) merged.concurrency = layer.concurrency;
    if (layer.progress !== undefined) merged.progress = layer.progress;
  }

  const defaults = getDefaults();
  return {
    filePath: merged.filePath ?? defaults.filePath,
    resultPath: merged.resultPath ?? defaults.resultPath,
    concurrency: merged.concurrency ?? defaults.concurrency,
    progress: merged.progress ?? defaults.progress,
  };
}

/**
 * Get default configuration values.
 */
export function getDefaults(): Required<CLIConfig> {
  return {
    filePath: "JXJ.txt",
    resultPath: "result.csv",
    concurrency: 5,
    progress: true,
  };
}
