import { readFile } from "node:fs/promises";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { findAsymmetricEdges, loadGraph, type CsrGraph } from "../graph/csr.js";
import { StructuralError } from "../partition/errors.js";

/**
 * Text formats exchanged with the outside world.
 *
 * Graph files hold three lines: the vertex count, the `;`-separated
 * concatenation of every adjacency list, and the `;`-separated offsets into
 * that list. Any further lines are ignored. Result files hold the subset
 * count, the cut-edge count, then one line per subset with its size followed
 * by its member ids, all space separated.
 */

export interface GraphTextOptions {
  /** Reject graphs whose adjacency is not symmetric. Defaults to `true`. */
  verifySymmetry?: boolean;
}

export interface PartitionResultText {
  cutEdges: number;
  parts: readonly (readonly number[])[];
}

export interface ParsedPartitionResult {
  numParts: number;
  cutEdges: number;
  parts: number[][];
}

const INTEGER_PATTERN = /^[-+]?\d+$/;

function parseInteger(token: string, lineNumber: number): number {
  const trimmed = token.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new StructuralError(`line ${lineNumber}: '${trimmed}' is not an integer`, {
      line: lineNumber,
      token: trimmed,
    });
  }
  return Number.parseInt(trimmed, 10);
}

/** Parses a `;`-separated list; a blank line is an empty list and one trailing separator is tolerated. */
function parseIntegerList(line: string, lineNumber: number): number[] {
  const trimmed = line.trim();
  if (trimmed.length === 0) {
    return [];
  }
  const tokens = trimmed.split(";");
  if (tokens.length > 1 && tokens[tokens.length - 1].trim().length === 0) {
    tokens.pop();
  }
  return tokens.map((token) => parseInteger(token, lineNumber));
}

export function parseGraphText(text: string, options: GraphTextOptions = {}): CsrGraph {
  const lines = text.split(/\r?\n/);
  if (lines.length < 3 || lines[0].trim().length === 0 || lines[2].trim().length === 0) {
    throw new StructuralError("graph text needs a vertex count, a neighbour line and an offset line", {
      lines: lines.length,
    });
  }

  const vertexCount = parseInteger(lines[0], 1);
  const neighbours = parseIntegerList(lines[1], 2);
  const offsets = parseIntegerList(lines[2], 3);
  const graph = loadGraph(vertexCount, neighbours, offsets);

  if (options.verifySymmetry !== false) {
    const asymmetric = findAsymmetricEdges(graph);
    if (asymmetric.length > 0) {
      const [from, to] = asymmetric[0];
      throw new StructuralError(
        `adjacency is not symmetric: ${to} does not list ${from} (${asymmetric.length} entries affected)`,
        { asymmetric: asymmetric.slice(0, 10) },
      );
    }
  }

  return graph;
}

export function formatGraphText(graph: CsrGraph): string {
  const { neighbours, offsets } = graph.toArrays();
  return `${graph.vertexCount}\n${neighbours.join(";")}\n${offsets.join(";")}\n`;
}

export async function readGraphFile(path: string, options: GraphTextOptions = {}): Promise<CsrGraph> {
  return parseGraphText(await readFile(path, "utf8"), options);
}

export function formatResultText(result: PartitionResultText): string {
  const lines = [String(result.parts.length), String(result.cutEdges)];
  for (const members of result.parts) {
    lines.push([members.length, ...members].join(" "));
  }
  return `${lines.join("\n")}\n`;
}

export function parseResultText(text: string): ParsedPartitionResult {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  if (lines.length < 2) {
    throw new StructuralError("result text needs a subset count and a cut-edge count", {
      lines: lines.length,
    });
  }

  const numParts = parseInteger(lines[0], 1);
  const cutEdges = parseInteger(lines[1], 2);
  if (numParts < 1 || cutEdges < 0) {
    throw new StructuralError(`invalid result header ${numParts}/${cutEdges}`, { numParts, cutEdges });
  }
  if (lines.length - 2 !== numParts) {
    throw new StructuralError(`expected ${numParts} subset lines, found ${lines.length - 2}`, {
      numParts,
      found: lines.length - 2,
    });
  }

  const parts = lines.slice(2).map((line, index) => {
    const lineNumber = index + 3;
    const [sizeToken, ...memberTokens] = line.split(/\s+/);
    const size = parseInteger(sizeToken, lineNumber);
    if (size !== memberTokens.length) {
      throw new StructuralError(
        `line ${lineNumber}: declared size ${size} but ${memberTokens.length} members listed`,
        { line: lineNumber, size, members: memberTokens.length },
      );
    }
    return memberTokens.map((token) => parseInteger(token, lineNumber));
  });

  return { numParts, cutEdges, parts };
}

export async function readResultFile(path: string): Promise<ParsedPartitionResult> {
  return parseResultText(await readFile(path, "utf8"));
}

/**
 * Rebuilds the vertex → subset mapping from per-subset member lists. Every
 * vertex must appear exactly once.
 */
export function assignmentFromParts(
  parts: readonly (readonly number[])[],
  vertexCount: number,
): Int32Array {
  const assignment = new Int32Array(vertexCount).fill(-1);
  parts.forEach((members, part) => {
    for (const vertex of members) {
      if (!Number.isInteger(vertex) || vertex < 0 || vertex >= vertexCount) {
        throw new StructuralError(`subset ${part} lists unknown vertex ${vertex}`, { part, vertex });
      }
      if (assignment[vertex] !== -1) {
        throw new StructuralError(`vertex ${vertex} appears in subsets ${assignment[vertex]} and ${part}`, {
          vertex,
          parts: [assignment[vertex], part],
        });
      }
      assignment[vertex] = part;
    }
  });
  const missing = assignment.indexOf(-1);
  if (missing !== -1) {
    throw new StructuralError(`vertex ${missing} is not assigned to any subset`, { vertex: missing });
  }
  return assignment;
}
