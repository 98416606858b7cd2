import type { SimulationDriver } from "../sim/driver.js";
import { formatSnapshot, sumAdjustments, type Envelope, type SnapshotRecord } from "../sim/messages.js";
import type { AccountNode } from "./traffic.js";

/** Per-node view of a snapshot run, with messages rendered as trace strings. */
export interface SnapshotNodeReport {
  readonly node: string;
  /** Balance at the end of the run. */
  readonly finalState: number;
  readonly snapshot: {
    readonly state: number;
    readonly timestamp: number;
    readonly messages: string[];
  } | null;
}

export interface SnapshotVerdict {
  readonly kind: "snapshot";
  /** Every node recorded a snapshot and every channel was accounted for. */
  readonly completed: boolean;
  readonly nodeTotal: number | null;
  readonly messageTotal: number | null;
  readonly grandTotal: number | null;
  /** Conserved total of the diffusing computation (sum of initial balances). */
  readonly expectedTotal: number;
  /** Completed and the grand total matches the conserved total. */
  readonly consistent: boolean;
  /** Nodes that have not finished their part of the snapshot. */
  readonly pending: string[];
  readonly delivered: number;
  readonly nodes: SnapshotNodeReport[];
}

export interface ElectionVerdict {
  readonly kind: "election";
  readonly leader: string | null;
  readonly delivered: number;
  readonly states: Record<string, string>;
}

export type Verdict = SnapshotVerdict | ElectionVerdict;

/** Node state the snapshot verification reads. */
export interface SnapshottingNode<M> extends AccountNode {
  snapshot: SnapshotRecord<M> | null;
}

export interface SnapshotVerification<N, M> {
  readonly expectedTotal: number;
  readonly delivered: number;
  /** Effect of one recorded message on the total (+1, −1, or 0 for control messages). */
  readonly adjustment: (message: M) => number;
  /** Extra completion requirement beyond "has a snapshot". */
  readonly finished?: (node: N) => boolean;
}

/**
 * Appends the verdict block shared by the snapshot algorithms and returns
 * the structured verdict.
 */
export function verifySnapshot<N extends SnapshottingNode<M>, M extends Envelope>(
  driver: SimulationDriver<N, M>,
  verification: SnapshotVerification<N, M>,
): SnapshotVerdict {
  const { trace, protocol, nodes } = driver;
  const pending = nodes
    .filter((entry) => entry.snapshot === null || !(verification.finished?.(entry) ?? true))
    .map((entry) => entry.node.name);
  const completed = pending.length === 0;

  let nodeTotal: number | null = null;
  let messageTotal: number | null = null;
  let grandTotal: number | null = null;

  trace.blank();
  if (completed) {
    nodeTotal = 0;
    messageTotal = 0;
    for (const entry of nodes) {
      if (entry.snapshot) {
        nodeTotal += entry.snapshot.state;
        messageTotal += sumAdjustments(entry.snapshot.messages, verification.adjustment);
      }
    }
    grandTotal = nodeTotal + messageTotal;
    trace.append("Snapshot completed.");
    trace.append(`Node total: ${nodeTotal}`);
    trace.append(`Message total: ${messageTotal}`);
    trace.append(`Grand total: ${grandTotal} (expected ${verification.expectedTotal})`);
    trace.append(
      grandTotal === verification.expectedTotal ? "The snapshot is consistent." : "The snapshot is inconsistent.",
    );
  } else {
    trace.append("Snapshot did not complete.");
    trace.append(`Waiting on: ${pending.join(", ")}`);
  }
  for (const entry of nodes) {
    trace.append(`${entry.node.name}: ${entry.snapshot ? formatSnapshot(entry.snapshot, protocol) : "None"}`);
  }
  trace.blank();

  return {
    kind: "snapshot",
    completed,
    nodeTotal,
    messageTotal,
    grandTotal,
    expectedTotal: verification.expectedTotal,
    consistent: completed && grandTotal === verification.expectedTotal,
    pending,
    delivered: verification.delivered,
    nodes: nodes.map((entry) => ({
      node: entry.node.name,
      finalState: entry.state,
      snapshot: entry.snapshot
        ? {
            state: entry.snapshot.state,
            timestamp: entry.snapshot.timestamp,
            messages: entry.snapshot.messages.map((message) => protocol.format(message)),
          }
        : null,
    })),
  };
}
