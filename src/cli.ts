#!/usr/bin/env node
import { realpathSync } from "node:fs";
import process from "node:process";
import { fileURLToPath } from "node:url";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.
import { analyseNetwork, classifierOptionsFromConfig } from "./analysis/index.js";
import type { AnalysisOutcome } from "./analysis/types.js";
import { type AnalysisConfig, loadAnalysisConfig } from "./config/analysis.js";
import type { EnvSource } from "./config/env.js";
import { AttractorError, UsageError } from "./errors.js";
import { StructuredLogger } from "./logger.js";
import { formatState } from "./network/codec.js";
import { loadNetworkFile } from "./network/descriptor.js";
import { UPDATE_MODES, type UpdateMode } from "./network/model.js";

type ModeSelection = UpdateMode | "both";

interface CliOptions {
  readonly file: string;
  readonly mode: ModeSelection;
  readonly format: "text" | "json";
  readonly maxStates?: number;
  readonly timeLimitMs?: number;
}

/** Output channels, injectable so tests can capture what the CLI prints. */
export interface CliIo {
  readonly stdout: (line: string) => void;
  readonly stderr: (line: string) => void;
  readonly env: EnvSource;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_ABORTED = 2;

const defaultIo: CliIo = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
  env: process.env,
};

/**
 * Runs the CLI and resolves to its exit code: 0 when every requested
 * classification completed, 2 when one hit a ceiling, 1 on errors.
 */
export async function runCli(argv: string[], io: CliIo = defaultIo): Promise<number> {
  if (argv.length === 0) {
    printUsage(io);
    return EXIT_FAILURE;
  }

  try {
    const options = parseArgs(argv);
    const config = loadAnalysisConfig(io.env, buildConfigOverrides(options));
    const logger = new StructuredLogger({
      minLevel: config.logLevel,
      logFile: config.logFile,
      sink: (line) => io.stderr(line.trimEnd()),
    });
    const network = await loadNetworkFile(options.file);
    const modes: UpdateMode[] = options.mode === "both" ? [...UPDATE_MODES] : [options.mode];
    const outcomes = modes.map((mode) => analyseNetwork(network, mode, classifierOptionsFromConfig(config, logger)));
    await logger.flush();

    if (options.format === "json") {
      io.stdout(JSON.stringify({ file: options.file, analyses: outcomes.map(serialiseOutcome) }, null, 2));
    } else {
      outcomes.forEach((outcome, index) => {
        if (index > 0) {
          io.stdout("");
        }
        formatTextReport(outcome, io);
      });
    }

    return outcomes.some((outcome) => outcome.status === "aborted") ? EXIT_ABORTED : EXIT_OK;
  } catch (error) {
    if (error instanceof AttractorError) {
      io.stderr(`${error.code}: ${error.message}`);
    } else {
      io.stderr(error instanceof Error ? error.message : String(error));
    }
    return EXIT_FAILURE;
  }
}

/**
 * Drops flags the user did not pass so the environment still applies. An
 * explicit `0` lifts the corresponding ceiling.
 */
function buildConfigOverrides(options: CliOptions): Partial<AnalysisConfig> {
  const overrides: Partial<AnalysisConfig> = {};
  if (options.maxStates !== undefined) {
    overrides.maxStates = options.maxStates === 0 ? null : options.maxStates;
  }
  if (options.timeLimitMs !== undefined) {
    overrides.timeLimitMs = options.timeLimitMs === 0 ? null : options.timeLimitMs;
  }
  return overrides;
}

function serialiseOutcome(outcome: AnalysisOutcome): Record<string, unknown> {
  return {
    mode: outcome.store.mode,
    status: outcome.status,
    ...(outcome.status === "aborted" ? { reason: outcome.reason } : {}),
    summary: outcome.store.summary(),
    store: outcome.store.toJSON(),
  };
}

function formatTextReport(outcome: AnalysisOutcome, io: CliIo): void {
  const store = outcome.store;
  const summary = store.summary();
  io.stdout(`# ${store.mode}`);
  if (outcome.status === "aborted") {
    io.stdout(`Aborted on the ${outcome.reason} ceiling: ${summary.classifiedCount}/${summary.stateCount} states classified`);
  }
  io.stdout(`States: ${summary.stateCount} (${summary.nodeCount} nodes)`);
  io.stdout(`Attractors: ${summary.attractorCount}`);
  store.allAttractors().forEach((members, id) => {
    io.stdout(`  Attractor ${id} (${members.size} ${members.size === 1 ? "state" : "states"}):`);
    for (const state of members) {
      io.stdout(`    ${state} ${formatState(state, store.nodeCount)}`);
    }
  });
  if (summary.maxDistance !== null) {
    io.stdout(`Max distance to an attractor: ${summary.maxDistance}`);
  }
}

function parseNonNegativeInt(flag: string, value: string | undefined): number {
  if (value === undefined || !/^\d+$/.test(value)) {
    throw new UsageError(`${flag} expects a non-negative integer`);
  }
  return Number.parseInt(value, 10);
}

function parseArgs(argv: string[]): CliOptions {
  const [file, ...rest] = argv;
  if (!file || file.startsWith("--")) {
    throw new UsageError("First positional argument must be the path to a network JSON file");
  }
  let mode: ModeSelection = "both";
  let format: "text" | "json" = "text";
  let maxStates: number | undefined;
  let timeLimitMs: number | undefined;

  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    switch (token) {
      case "--mode": {
        const value = rest[++i];
        if (value !== "synchronous" && value !== "asynchronous" && value !== "both") {
          throw new UsageError("--mode must be 'synchronous', 'asynchronous' or 'both'");
        }
        mode = value;
        break;
      }
      case "--format": {
        const value = rest[++i];
        if (value !== "json" && value !== "text") {
          throw new UsageError("--format must be 'json' or 'text'");
        }
        format = value;
        break;
      }
      case "--max-states":
        maxStates = parseNonNegativeInt(token, rest[++i]);
        break;
      case "--time-limit-ms":
        timeLimitMs = parseNonNegativeInt(token, rest[++i]);
        break;
      default:
        throw new UsageError(`Unknown argument '${token}'`);
    }
  }

  return {
    file,
    mode,
    format,
    ...(maxStates === undefined ? {} : { maxStates }),
    ...(timeLimitMs === undefined ? {} : { timeLimitMs }),
  };
}

function printUsage(io: CliIo): void {
  io.stdout(
    "Usage: attractors <network.json> [--mode synchronous|asynchronous|both] [--format text|json] [--max-states n] [--time-limit-ms n]",
  );
  io.stdout("Examples:");
  io.stdout("  attractors network.json");
  io.stdout("  attractors network.json --mode asynchronous --format json");
}

/**
 * Whether `scriptPath` (normally `process.argv[1]`) is this module. Both sides
 * are resolved through symlinks, as npm installs bins as links.
 */
function isThisModule(scriptPath: string | undefined): boolean {
  if (!scriptPath) {
    return false;
  }
  try {
    return realpathSync(scriptPath) === realpathSync(fileURLToPath(import.meta.url));
  } catch (error) {
    if (isMissingPath(error)) {
      return false;
    }
    throw error;
  }
}

function isMissingPath(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

const isCliEntryPoint = isThisModule(process.argv[1]);

if (isCliEntryPoint) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : error);
      process.exitCode = EXIT_FAILURE;
    });
}

/** Internal helpers exposed for the CLI test suite. */
export const __testing = {
  parseArgs,
  buildConfigOverrides,
  isThisModule,
};
