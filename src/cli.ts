#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import process from "node:process";
import { fileURLToPath } from "node:url";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { loadPartitionDefaults, type PartitionDefaults } from "./config/partition.js";
import { countCutEdges } from "./graph/cut.js";
import { generateRandomGraph } from "./graph/generate.js";
import {
  assignmentFromParts,
  formatGraphText,
  formatResultText,
  readGraphFile,
  readResultFile,
} from "./io/csrText.js";
import { StructuredLogger, type LogSink } from "./logger.js";
import { checkBalance, computeBalanceBounds, measurePartSizes } from "./partition/balance.js";
import { PartitionEngineError } from "./partition/errors.js";
import { partition } from "./partition/orchestrator.js";
import { ERROR_CODES, type ErrorCode } from "./types.js";

/** Edge probability used by `generate` when `--density` is absent. */
const DEFAULT_EDGE_PROBABILITY = 0.2;

/** Malformed command line; reported with the usage text and exit code 2. */
export class CliUsageError extends Error {
  public readonly code: ErrorCode = ERROR_CODES.CLI_USAGE;

  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

interface PartitionCommand {
  readonly kind: "partition";
  readonly graphFile: string;
  readonly numParts: number;
  readonly marginPercent: number;
  readonly maxPasses: number;
  readonly enforceMinimum: boolean;
  readonly seed?: string;
  readonly trace: boolean;
  readonly format: "text" | "json";
  readonly output?: string;
}

interface GenerateCommand {
  readonly kind: "generate";
  readonly vertexCount: number;
  readonly edgeProbability: number;
  readonly seed?: string;
  readonly output?: string;
}

interface CheckCommand {
  readonly kind: "check";
  readonly graphFile: string;
  readonly resultFile: string;
  readonly marginPercent: number;
  readonly enforceMinimum: boolean;
}

type CliCommand = PartitionCommand | GenerateCommand | CheckCommand;

/** Output channels used by {@link runCli}; tests substitute collectors. */
export interface CliIo {
  stdout(text: string): void;
  stderr(text: string): void;
  /** Destination of structured log lines; `null` silences them. */
  readonly logSink: LogSink | null;
}

const processIo: CliIo = {
  stdout: (text) => process.stdout.write(text.endsWith("\n") ? text : `${text}\n`),
  stderr: (text) => process.stderr.write(text.endsWith("\n") ? text : `${text}\n`),
  logSink: process.stderr,
};

function readValue(rest: string[], index: number, flag: string): string {
  const value = rest[index];
  if (value === undefined || value.startsWith("--")) {
    throw new CliUsageError(`${flag} expects a value`);
  }
  return value;
}

function readNumericValue(rest: string[], index: number, flag: string): number {
  const raw = readValue(rest, index, flag);
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new CliUsageError(`${flag} expects a number, got '${raw}'`);
  }
  return value;
}

function parsePartitionArgs(rest: string[], defaults: PartitionDefaults): PartitionCommand {
  const [graphFile, ...flags] = rest;
  if (!graphFile || graphFile.startsWith("--")) {
    throw new CliUsageError("partition expects the path to a graph file");
  }
  let numParts: number | undefined;
  let marginPercent = defaults.marginPercent;
  let maxPasses = defaults.maxPasses;
  let enforceMinimum = defaults.enforceMinimum;
  let seed: string | undefined;
  let trace = false;
  let format: "text" | "json" = "text";
  let output: string | undefined;

  for (let i = 0; i < flags.length; i++) {
    const token = flags[i];
    switch (token) {
      case "--parts":
        numParts = readNumericValue(flags, ++i, token);
        break;
      case "--margin":
        marginPercent = readNumericValue(flags, ++i, token);
        break;
      case "--max-passes":
        maxPasses = readNumericValue(flags, ++i, token);
        break;
      case "--seed":
        seed = readValue(flags, ++i, token);
        break;
      case "--enforce-min":
        enforceMinimum = true;
        break;
      case "--trace":
        trace = true;
        break;
      case "--format": {
        const value = readValue(flags, ++i, token);
        if (value !== "json" && value !== "text") {
          throw new CliUsageError("--format must be 'json' or 'text'");
        }
        format = value;
        break;
      }
      case "--output":
        output = readValue(flags, ++i, token);
        break;
      default:
        throw new CliUsageError(`Unknown argument '${token}'`);
    }
  }

  if (numParts === undefined) {
    throw new CliUsageError("partition requires --parts");
  }

  return {
    kind: "partition",
    graphFile,
    numParts,
    marginPercent,
    maxPasses,
    enforceMinimum,
    trace,
    format,
    ...(seed === undefined ? {} : { seed }),
    ...(output === undefined ? {} : { output }),
  };
}

function parseGenerateArgs(flags: string[]): GenerateCommand {
  let vertexCount: number | undefined;
  let edgeProbability = DEFAULT_EDGE_PROBABILITY;
  let seed: string | undefined;
  let output: string | undefined;

  for (let i = 0; i < flags.length; i++) {
    const token = flags[i];
    switch (token) {
      case "--vertices":
        vertexCount = readNumericValue(flags, ++i, token);
        break;
      case "--density":
        edgeProbability = readNumericValue(flags, ++i, token);
        break;
      case "--seed":
        seed = readValue(flags, ++i, token);
        break;
      case "--output":
        output = readValue(flags, ++i, token);
        break;
      default:
        throw new CliUsageError(`Unknown argument '${token}'`);
    }
  }

  if (vertexCount === undefined) {
    throw new CliUsageError("generate requires --vertices");
  }

  return {
    kind: "generate",
    vertexCount,
    edgeProbability,
    ...(seed === undefined ? {} : { seed }),
    ...(output === undefined ? {} : { output }),
  };
}

function parseCheckArgs(rest: string[], defaults: PartitionDefaults): CheckCommand {
  const [graphFile, resultFile, ...flags] = rest;
  if (!graphFile || !resultFile || graphFile.startsWith("--") || resultFile.startsWith("--")) {
    throw new CliUsageError("check expects a graph file and a result file");
  }
  let marginPercent = defaults.marginPercent;
  let enforceMinimum = defaults.enforceMinimum;

  for (let i = 0; i < flags.length; i++) {
    const token = flags[i];
    switch (token) {
      case "--margin":
        marginPercent = readNumericValue(flags, ++i, token);
        break;
      case "--enforce-min":
        enforceMinimum = true;
        break;
      default:
        throw new CliUsageError(`Unknown argument '${token}'`);
    }
  }

  return { kind: "check", graphFile, resultFile, marginPercent, enforceMinimum };
}

function parseArgs(argv: string[], defaults: PartitionDefaults): CliCommand {
  const [command, ...rest] = argv;
  switch (command) {
    case "partition":
      return parsePartitionArgs(rest, defaults);
    case "generate":
      return parseGenerateArgs(rest);
    case "check":
      return parseCheckArgs(rest, defaults);
    case undefined:
      throw new CliUsageError("missing command");
    default:
      throw new CliUsageError(`Unknown command '${command}'`);
  }
}

async function emit(io: CliIo, text: string, output: string | undefined): Promise<void> {
  if (output === undefined) {
    io.stdout(text);
    return;
  }
  await writeFile(output, text, "utf8");
  io.stdout(`wrote ${output}`);
}

async function runPartition(
  command: PartitionCommand,
  io: CliIo,
  logger: StructuredLogger,
): Promise<number> {
  const graph = await readGraphFile(command.graphFile);
  logger.info("graph_loaded", {
    file: command.graphFile,
    vertices: graph.vertexCount,
    edges: graph.edgeCount,
  });

  const result = partition(graph, command.numParts, command.marginPercent, {
    maxPasses: command.maxPasses,
    enforceMinimum: command.enforceMinimum,
    recordSwaps: command.trace,
    logger,
    ...(command.seed === undefined ? {} : { seed: command.seed }),
  });

  if (command.format === "json") {
    const report = {
      file: command.graphFile,
      numParts: command.numParts,
      cutEdges: result.cutEdges,
      passes: result.passes,
      converged: result.converged,
      sizes: result.sizes,
      bounds: result.bounds,
      parts: result.parts,
      ...(result.trace === undefined ? {} : { trace: result.trace }),
    };
    await emit(io, `${JSON.stringify(report, null, 2)}\n`, command.output);
    return 0;
  }

  await emit(io, formatResultText(result), command.output);
  return 0;
}

async function runGenerate(command: GenerateCommand, io: CliIo, logger: StructuredLogger): Promise<number> {
  const graph = generateRandomGraph({
    vertexCount: command.vertexCount,
    edgeProbability: command.edgeProbability,
    ...(command.seed === undefined ? {} : { seed: command.seed }),
  });
  logger.info("graph_generated", { vertices: graph.vertexCount, edges: graph.edgeCount });
  await emit(io, formatGraphText(graph), command.output);
  return 0;
}

async function runCheck(command: CheckCommand, io: CliIo, logger: StructuredLogger): Promise<number> {
  const graph = await readGraphFile(command.graphFile);
  const recorded = await readResultFile(command.resultFile);
  const assignment = assignmentFromParts(recorded.parts, graph.vertexCount);
  const cutEdges = countCutEdges(graph, assignment);
  const sizes = measurePartSizes(assignment, recorded.numParts);
  const bounds = computeBalanceBounds(graph.vertexCount, recorded.numParts, {
    marginPercent: command.marginPercent,
    enforceMinimum: command.enforceMinimum,
  });
  const balance = checkBalance(sizes, bounds);

  io.stdout(`cut edges: recorded ${recorded.cutEdges}, recomputed ${cutEdges}`);
  if (balance.ok) {
    io.stdout(`balance: ok (max ${bounds.maxAllowed}${bounds.minAllowed === null ? "" : `, min ${bounds.minAllowed}`})`);
  } else {
    for (const violation of balance.violations) {
      io.stdout(
        `balance: part ${violation.part} has ${violation.size} vertices (${violation.bound} ${violation.limit})`,
      );
    }
  }

  const consistent = cutEdges === recorded.cutEdges && balance.ok;
  logger.info("result_checked", { consistent, cut_edges: cutEdges, recorded: recorded.cutEdges });
  return consistent ? 0 : 1;
}

/**
 * Runs one CLI invocation and resolves with the process exit code: `0` on
 * success, `1` when the engine rejects the input or a check fails, `2` on a
 * usage error. Unexpected failures (unreadable files, ...) reject.
 */
export async function runCli(
  argv: string[],
  io: CliIo = processIo,
  defaults: PartitionDefaults = loadPartitionDefaults(),
): Promise<number> {
  let command: CliCommand;
  try {
    command = parseArgs(argv, defaults);
  } catch (error) {
    if (error instanceof CliUsageError) {
      io.stderr(`${error.message}\n`);
      io.stderr(usage());
      return 2;
    }
    throw error;
  }

  const logger = new StructuredLogger({
    level: defaults.logLevel,
    logFile: defaults.logFile,
    sink: io.logSink,
  });
  try {
    switch (command.kind) {
      case "partition":
        return await runPartition(command, io, logger);
      case "generate":
        return await runGenerate(command, io, logger);
      case "check":
        return await runCheck(command, io, logger);
    }
  } catch (error) {
    if (error instanceof PartitionEngineError) {
      io.stderr(`${error.name} [${error.code}]: ${error.message}`);
      return 1;
    }
    throw error;
  } finally {
    await logger.flush();
  }
}

function usage(): string {
  return [
    "Usage:",
    "  kl-partition partition <graph> --parts <k> [--margin <pct>] [--seed <s>] [--max-passes <n>]",
    "                         [--enforce-min] [--trace] [--format text|json] [--output <file>]",
    "  kl-partition generate --vertices <n> [--density <p>] [--seed <s>] [--output <file>]",
    "  kl-partition check <graph> <result> [--margin <pct>] [--enforce-min]",
    "",
  ].join("\n");
}

const isCliEntryPoint = (() => {
  const executedFromCli = process.argv[1];
  if (!executedFromCli) {
    return false;
  }

  const thisModulePath = fileURLToPath(import.meta.url);
  try {
    return thisModulePath === realpathSync(executedFromCli);
  } catch {
    return false;
  }
})();

if (isCliEntryPoint) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : error);
      process.exitCode = 1;
    });
}

/**
 * Exposes internal helpers for the test suite without making them part of
 * the public API surface.
 */
export const __testing = {
  parseArgs,
};
