import { randomUUID } from "node:crypto";

import { loadSimulationConfig } from "../config/simulation.js";
import { findDanglingConnections, type GraphNode, type NodeGrid } from "../graph/model.js";
import type { StructuredLogger } from "../logger.js";
import { EmptyGraphError, SimulationError, TopologyError, UnknownInitiatorError } from "../sim/errors.js";
import { createSeededRandom, systemRandom, type RandomSource } from "../sim/random.js";
import { TraceLog } from "../sim/trace.js";
import { ALGORITHM_LABELS, type AlgorithmName, type ErrorCode } from "../types.js";
import { runChandyLamport } from "./chandyLamport.js";
import { runChangRoberts } from "./changRoberts.js";
import type { CutTotals } from "./context.js";
import { runLaiYang } from "./laiYang.js";
import type { TrafficPlan } from "./traffic.js";
import type { Verdict } from "./verdict.js";

export interface RunOptions {
  /** Explicit random source; wins over {@link seed}. */
  readonly random?: RandomSource;
  /** Seed for a Park–Miller source, for reproducible traces. */
  readonly seed?: string | number;
  /** Snapshot initiator; drawn at random when omitted. */
  readonly initiator?: string;
  /** Background traffic overrides; unset fields come from configuration. */
  readonly traffic?: Partial<TrafficPlan>;
  readonly logger?: StructuredLogger;
  readonly onCut?: (totals: CutTotals) => void;
}

export type RunResult =
  | { readonly ok: true; readonly algorithm: AlgorithmName; readonly runId: string; readonly verdict: Verdict }
  | {
      readonly ok: false;
      readonly algorithm: AlgorithmName;
      readonly runId: string;
      readonly code: ErrorCode;
      readonly reason: string;
    };

function resolveRandom(options: RunOptions, configuredSeed: string | undefined): RandomSource {
  if (options.random) {
    return options.random;
  }
  const seed = options.seed ?? configuredSeed;
  return seed !== undefined ? createSeededRandom(seed) : systemRandom;
}

/** Rejects graphs the algorithms cannot run on, before any simulation. */
function checkGraph(algorithm: AlgorithmName, nodes: readonly GraphNode[], initiator: string | undefined): void {
  if (nodes.length === 0) {
    throw new EmptyGraphError(ALGORITHM_LABELS[algorithm]);
  }
  const [dangling] = findDanglingConnections(nodes);
  if (dangling) {
    throw new TopologyError(`Node ${dangling.node} is connected to ${dangling.peer}, which does not exist.`, dangling);
  }
  // Chang-Roberts starts every node, so only the snapshot algorithms read an initiator.
  if (algorithm !== "chang_roberts" && initiator !== undefined && !nodes.some((node) => node.name === initiator)) {
    throw new UnknownInitiatorError(initiator);
  }
}

function execute(
  algorithm: AlgorithmName,
  nodes: readonly GraphNode[],
  trace: TraceLog,
  random: RandomSource,
  traffic: TrafficPlan,
  options: RunOptions,
): Verdict {
  switch (algorithm) {
    case "chandy_lamport":
      return runChandyLamport(nodes, { random, trace, traffic, initiator: options.initiator, onCut: options.onCut });
    case "lai_yang":
      return runLaiYang(nodes, { random, trace, traffic, initiator: options.initiator, onCut: options.onCut });
    case "chang_roberts":
      return runChangRoberts(nodes, { random, trace });
  }
}

/**
 * Runs {@link algorithm} over {@link graph}, appending the trace to
 * {@link log}. Graph problems and engine invariant violations come back as
 * failure results; the trace keeps every line written before the failure.
 */
export function runAlgorithm(
  algorithm: AlgorithmName,
  graph: NodeGrid | readonly GraphNode[],
  log: string[],
  options: RunOptions = {},
): RunResult {
  const config = loadSimulationConfig();
  const runId = randomUUID();
  const logger = options.logger?.child(runId);
  const trace = new TraceLog(log, logger);
  const nodes = "nodes" in graph ? graph.nodes : graph;
  const label = ALGORITHM_LABELS[algorithm];
  const traffic: TrafficPlan = { ...config.traffic, ...options.traffic };

  logger?.info("simulation_started", { algorithm, nodes: nodes.length });
  try {
    checkGraph(algorithm, nodes, options.initiator);
    const verdict = execute(algorithm, nodes, trace, resolveRandom(options, config.seed), traffic, options);
    logger?.info("simulation_finished", { algorithm, verdict: summarise(verdict), trace_lines: trace.length });
    return { ok: true, algorithm, runId, verdict };
  } catch (error) {
    if (!(error instanceof SimulationError)) {
      throw error;
    }
    trace.append(error.message);
    trace.append(`${label} did not complete.`);
    logger?.warn("simulation_failed", { algorithm, code: error.code, reason: error.message, hint: error.hint ?? null });
    return { ok: false, algorithm, runId, code: error.code, reason: error.message };
  }
}

function summarise(verdict: Verdict): Record<string, unknown> {
  if (verdict.kind === "election") {
    return { leader: verdict.leader, delivered: verdict.delivered };
  }
  return {
    completed: verdict.completed,
    consistent: verdict.consistent,
    grand_total: verdict.grandTotal,
    delivered: verdict.delivered,
  };
}

export type { CutTotals } from "./context.js";
export type { TrafficPlan } from "./traffic.js";
export type { ElectionVerdict, SnapshotNodeReport, SnapshotVerdict, Verdict } from "./verdict.js";
