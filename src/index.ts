export { CsrGraph, findAsymmetricEdges, fromEdgeList, loadGraph, type EdgePair } from "./graph/csr.js";
export { countCutEdges } from "./graph/cut.js";
export { findComponents, generateRandomGraph, isConnected, type RandomGraphOptions } from "./graph/generate.js";
export {
  assignmentFromParts,
  formatGraphText,
  formatResultText,
  parseGraphText,
  parseResultText,
  readGraphFile,
  readResultFile,
  type GraphTextOptions,
  type ParsedPartitionResult,
  type PartitionResultText,
} from "./io/csrText.js";
export {
  assertBalanced,
  checkBalance,
  computeBalanceBounds,
  measurePartSizes,
  type BalanceBounds,
  type BalancePolicy,
  type BalanceReport,
} from "./partition/balance.js";
export {
  BalanceViolationError,
  ParameterError,
  PartitionEngineError,
  StructuralError,
  type BalanceViolation,
} from "./partition/errors.js";
export { computeGain, refreshGains } from "./partition/gain.js";
export { buildInitialAssignment, type Assignment } from "./partition/initial.js";
export {
  PartitionRun,
  partition,
  type PartitionOptions,
  type PartitionResult,
  type PartitionState,
  type RefinementStep,
} from "./partition/orchestrator.js";
export {
  refinePair,
  type PairRefinementOptions,
  type PairRefinementResult,
  type SwapRecord,
} from "./partition/refiner.js";
export {
  DEFAULT_MAX_PASSES,
  DEFAULT_MARGIN_PERCENT,
  loadPartitionDefaults,
  parsePartitionSettings,
  type PartitionDefaults,
  type PartitionSettings,
} from "./config/partition.js";
export { StructuredLogger, type EngineLogger, type LogEntry, type LogLevel, type LoggerOptions } from "./logger.js";
export { createRandomSource, shuffleInPlace, type RandomSource } from "./utils/random.js";
export { ERROR_CODES, type ErrorCode } from "./types.js";
