#!/usr/bin/env node
import { realpathSync } from "node:fs";
import process from "node:process";
import { fileURLToPath } from "node:url";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.
import { runAlgorithm } from "./algorithms/index.js";
import { loadSimulationConfig } from "./config/simulation.js";
import { GraphInputError, loadNodeGrid } from "./graph/loader.js";
import { StructuredLogger } from "./logger.js";
import { isErrnoException } from "./nodePrimitives.js";
import { ALGORITHMS, ERROR_CODES, type AlgorithmName } from "./types.js";

/** Raised for malformed command lines; the message is shown with the usage. */
export class CliUsageError extends Error {
  public readonly code = ERROR_CODES.CLI_USAGE;

  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

interface CliOptions {
  readonly algorithm: AlgorithmName;
  readonly file: string;
  readonly format: "text" | "json";
  readonly seed?: string;
}

/** Output channels, swapped for collectors in tests. */
export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/** Accepts both `chandy-lamport` and `chandy_lamport`. */
function parseAlgorithm(token: string): AlgorithmName {
  const normalised = token.trim().toLowerCase().replace(/-/g, "_");
  const match = ALGORITHMS.find((candidate) => candidate === normalised);
  if (!match) {
    throw new CliUsageError(`Unknown algorithm '${token}'`);
  }
  return match;
}

function parseArgs(argv: readonly string[]): CliOptions {
  const [algorithmToken, file, ...rest] = argv;
  if (!algorithmToken || algorithmToken.startsWith("--")) {
    throw new CliUsageError("First positional argument must be the algorithm");
  }
  if (!file || file.startsWith("--")) {
    throw new CliUsageError("Second positional argument must be the path to a grid file");
  }
  const algorithm = parseAlgorithm(algorithmToken);
  let format: "text" | "json" = "text";
  let seed: string | undefined;

  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    switch (token) {
      case "--format": {
        const value = rest[++i];
        if (value !== "json" && value !== "text") {
          throw new CliUsageError("--format must be 'json' or 'text'");
        }
        format = value;
        break;
      }
      case "--seed": {
        const value = rest[++i];
        if (!value) {
          throw new CliUsageError("--seed expects a value");
        }
        seed = value;
        break;
      }
      default:
        throw new CliUsageError(`Unknown argument '${token}'`);
    }
  }

  return {
    algorithm,
    file,
    format,
    ...(seed === undefined ? {} : { seed }),
  };
}

function printUsage(io: CliIO): void {
  io.err("Usage: distsim <chandy-lamport|lai-yang|chang-roberts> <grid.json> [--seed value] [--format text|json]");
  io.err("Examples:");
  io.err("  distsim chang-roberts ring.json");
  io.err("  distsim chandy-lamport grid.json --seed demo --format json");
}

/**
 * Loads the grid, runs the requested algorithm and prints its trace. Returns
 * the process exit code: 0 on a successful run, 1 otherwise.
 */
export async function runCli(argv: readonly string[], io: CliIO = consoleIO): Promise<number> {
  if (argv.length === 0) {
    printUsage(io);
    return 1;
  }

  const config = loadSimulationConfig();
  const logger = new StructuredLogger({ logFile: config.logFile ?? null, stdout: false, minLevel: config.logLevel });
  try {
    const options = parseArgs(argv);
    const grid = await loadNodeGrid(options.file);
    const trace: string[] = [];
    const result = runAlgorithm(options.algorithm, grid, trace, {
      logger,
      ...(options.seed === undefined ? {} : { seed: options.seed }),
    });

    if (options.format === "json") {
      io.out(JSON.stringify({ algorithm: options.algorithm, file: options.file, trace, result }, null, 2));
    } else {
      for (const line of trace) {
        io.out(line);
      }
    }
    return result.ok ? 0 : 1;
  } catch (error) {
    if (error instanceof CliUsageError) {
      io.err(error.message);
      printUsage(io);
      return 1;
    }
    if (error instanceof GraphInputError) {
      io.err(error.message);
      return 1;
    }
    throw error;
  } finally {
    await logger.flush();
  }
}

/**
 * True when {@link executedFromCli} designates this module. npm links `bin`
 * entries through symlinks, so both sides are compared once resolved.
 */
function isCliEntryPoint(executedFromCli: string | undefined, moduleUrl: string = import.meta.url): boolean {
  if (!executedFromCli) {
    return false;
  }

  const thisModulePath = fileURLToPath(moduleUrl);
  try {
    return realpathSync(executedFromCli) === realpathSync(thisModulePath);
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

if (isCliEntryPoint(process.argv[1])) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : error);
      process.exitCode = 1;
    });
}

/** Internal helpers exposed to the test suite. */
export const __testing = {
  parseArgs,
  parseAlgorithm,
  isCliEntryPoint,
};
