import type { SimulationDriver } from "../sim/driver.js";
import type { Envelope } from "../sim/messages.js";
import type { RandomSource } from "../sim/random.js";
import type { TraceLog } from "../sim/trace.js";
import type { AccountNode, TrafficPlan } from "./traffic.js";

/** Collaborators every algorithm run receives from the runner. */
export interface AlgorithmContext {
  readonly random: RandomSource;
  readonly trace: TraceLog;
}

/** Balances and in-flight effects observed when the initiator snapshots. */
export interface CutTotals {
  readonly nodeTotal: number;
  readonly inFlightTotal: number;
}

export interface SnapshotRunOptions extends AlgorithmContext {
  readonly traffic: TrafficPlan;
  /** Forces the initiator instead of drawing it at random. */
  readonly initiator?: string;
  /** Observes the system at the instant the initiator records its state. */
  readonly onCut?: (totals: CutTotals) => void;
}

/** Sums balances and the effect of every message still queued. */
export function measureCut<N extends AccountNode, M extends Envelope>(
  driver: SimulationDriver<N, M>,
  adjustment: (message: M) => number,
): CutTotals {
  const nodeTotal = driver.nodes.reduce((total, entry) => total + entry.state, 0);
  const inFlightTotal = driver.pending().reduce((total, message) => total + adjustment(message), 0);
  return { nodeTotal, inFlightTotal };
}
