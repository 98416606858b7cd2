export { runAlgorithm, type RunOptions, type RunResult } from "./algorithms/index.js";
export type {
  CutTotals,
  ElectionVerdict,
  SnapshotNodeReport,
  SnapshotVerdict,
  TrafficPlan,
  Verdict,
} from "./algorithms/index.js";
export { DEFAULT_TRAFFIC, NO_TRAFFIC } from "./algorithms/traffic.js";
export { loadSimulationConfig, type SimulationConfig } from "./config/simulation.js";
export type { Connection, GraphNode, NodeGrid } from "./graph/model.js";
export { GraphInputError, loadNodeGrid, NodeGridSchema, parseNodeGrid } from "./graph/loader.js";
export { LOG_LEVELS, StructuredLogger, type LogEntry, type LoggerOptions, type LogLevel } from "./logger.js";
export { LamportClock } from "./sim/clock.js";
export { MessageQueue, type ChannelDiscipline } from "./sim/channels.js";
export {
  ClockOverflowError,
  EmptyGraphError,
  InternalInvariantError,
  SimulationError,
  TopologyError,
  UnknownInitiatorError,
  UnknownNodeError,
} from "./sim/errors.js";
export { createSeededRandom, systemRandom, type RandomSource } from "./sim/random.js";
export { ALGORITHMS, ERROR_CODES, type AlgorithmName, type ErrorCode } from "./types.js";
