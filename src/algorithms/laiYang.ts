import { incomingNeighbours, outgoingNeighbours, type GraphNode } from "../graph/model.js";
import { LamportClock } from "../sim/clock.js";
import { SimulationDriver } from "../sim/driver.js";
import { createSnapshot, defineProtocol, type Envelope, type SnapshotRecord } from "../sim/messages.js";
import { measureCut, type SnapshotRunOptions } from "./context.js";
import { injectBackgroundTraffic, receiverEffect, type AccountNode, type TransferKind } from "./traffic.js";
import { verifySnapshot, type SnapshotVerdict } from "./verdict.js";

/**
 * `mark` advertises how many transfers the sender emitted on this channel
 * before its snapshot; transfers carry whether their sender had already
 * snapshotted.
 */
export type LaiYangPayload =
  | { readonly kind: "mark"; readonly count: number }
  | { readonly kind: TransferKind; readonly postSnapshot: boolean };

export type LaiYangMessage = Envelope & { readonly time: number } & LaiYangPayload;

function formatPayload(message: LaiYangMessage): string {
  return message.kind === "mark" ? `mark(${message.count})` : `${message.kind}(${message.postSnapshot})`;
}

/** Counters make the cut independent of delivery order, so channels are non-FIFO. */
export const laiYangProtocol = defineProtocol<LaiYangMessage, "non_fifo">(
  "non_fifo",
  (message) => `<${formatPayload(message)}> ${message.sender}->${message.destination}`,
);

export interface LaiYangNode extends AccountNode {
  readonly clock: LamportClock;
  /** Transfers emitted per outgoing neighbour. */
  readonly sent: Map<string, number>;
  /** Pre-snapshot transfers received per incoming neighbour. */
  readonly received: Map<string, number>;
  /** Pre-snapshot sent counts advertised by incoming neighbours. */
  readonly expected: Map<string, number>;
  readonly inbound: readonly string[];
  /** `sent` frozen at the moment this node snapshotted. */
  preSnapshotSent: Map<string, number> | null;
  snapshot: SnapshotRecord<LaiYangMessage> | null;
  done: boolean;
}

export function wrapLaiYangNode(node: GraphNode, graph: readonly GraphNode[]): LaiYangNode {
  const inbound = incomingNeighbours(graph, node.name);
  return {
    node,
    state: 0,
    clock: new LamportClock(),
    sent: new Map(outgoingNeighbours(node).map((peer) => [peer, 0])),
    received: new Map(inbound.map((peer) => [peer, 0])),
    expected: new Map(),
    inbound,
    preSnapshotSent: null,
    snapshot: null,
    done: false,
  };
}

type Driver = SimulationDriver<LaiYangNode, LaiYangMessage>;

/** Only pre-snapshot transfers count towards the recorded channel state. */
function messageEffect(message: LaiYangMessage): number {
  if (message.kind === "mark" || message.postSnapshot) {
    return 0;
  }
  return receiverEffect(message.kind);
}

/** Effect of a queued message on the conserved total, whatever its flag. */
function inFlightEffect(message: LaiYangMessage): number {
  return message.kind === "mark" ? 0 : receiverEffect(message.kind);
}

/**
 * A node is done once every incoming channel delivered exactly the number of
 * pre-snapshot transfers its sender advertised.
 */
function checkDone(driver: Driver, entry: LaiYangNode): void {
  if (entry.done || entry.snapshot === null) {
    return;
  }
  const complete = entry.inbound.every((peer) => {
    const expected = entry.expected.get(peer);
    return expected !== undefined && entry.received.get(peer) === expected;
  });
  if (complete) {
    entry.done = true;
    driver.trace.append(`${entry.node.name} has received every pre-snapshot message.`);
  }
}

function takeSnapshot(driver: Driver, entry: LaiYangNode): LaiYangMessage[] {
  const snapshot = createSnapshot<LaiYangMessage>(entry.state, entry.clock.tick());
  entry.snapshot = snapshot;
  entry.preSnapshotSent = new Map(entry.sent);
  driver.trace.append(`${entry.node.name} took Snapshot(${snapshot.state}, []) at LC(${snapshot.timestamp})`);

  const markers = outgoingNeighbours(entry.node).map(
    (destination): LaiYangMessage => ({
      sender: entry.node.name,
      destination,
      kind: "mark",
      count: entry.preSnapshotSent?.get(destination) ?? 0,
      time: entry.clock.tick(),
    }),
  );
  driver.logSent(markers);
  checkDone(driver, entry);
  return markers;
}

function handleMessage(driver: Driver, entry: LaiYangNode, message: LaiYangMessage): LaiYangMessage[] {
  const name = entry.node.name;
  const label = driver.protocol.format(message);
  entry.clock.receive(message.time);
  driver.trace.append(`${name} received ${label}`);

  let emitted: LaiYangMessage[] = [];
  if (message.kind === "mark") {
    if (entry.snapshot === null) {
      emitted = takeSnapshot(driver, entry);
    }
    entry.expected.set(message.sender, message.count);
    driver.trace.append(`${name} expects ${message.count} pre-snapshot messages from ${message.sender}.`);
  } else {
    if (message.postSnapshot && entry.snapshot === null) {
      // The sender is past its cut, so this transfer must stay out of ours.
      driver.trace.append(`${name} takes a snapshot, because ${label} was sent after a snapshot.`);
      emitted = takeSnapshot(driver, entry);
    }
    if (!message.postSnapshot) {
      entry.received.set(message.sender, (entry.received.get(message.sender) ?? 0) + 1);
      if (entry.snapshot !== null) {
        driver.trace.append(`${name} saves ${label} in snapshot.`);
        entry.snapshot.messages.push(message);
      }
    }
    entry.state += receiverEffect(message.kind);
  }

  checkDone(driver, entry);
  return emitted;
}

function sendTransfer(sender: LaiYangNode, destination: string, kind: TransferKind): LaiYangMessage {
  sender.sent.set(destination, (sender.sent.get(destination) ?? 0) + 1);
  return {
    sender: sender.node.name,
    destination,
    kind,
    postSnapshot: sender.snapshot !== null,
    time: sender.clock.tick(),
  };
}

/**
 * Lai-Yang snapshot over non-FIFO channels: transfers are coloured by their
 * sender's snapshot status, and markers carry per-channel pre-snapshot send
 * counts so receivers know when a channel's in-flight share is complete.
 */
export function runLaiYang(graph: readonly GraphNode[], options: SnapshotRunOptions): SnapshotVerdict {
  const driver: Driver = new SimulationDriver({
    graph,
    wrap: wrapLaiYangNode,
    protocol: laiYangProtocol,
    random: options.random,
    trace: options.trace,
  });
  const { traffic } = options;
  const expectedTotal = driver.nodes.reduce((total, entry) => total + entry.state, 0);
  driver.trace.append(`Started Lai-Yang snapshot with ${driver.nodes.length} nodes.`);

  const initiator = driver.chooseInitiator(options.initiator);
  injectBackgroundTraffic(driver, traffic.beforeCut, sendTransfer);

  const markers = takeSnapshot(driver, initiator);
  options.onCut?.(measureCut(driver, inFlightEffect));
  driver.sendAll(markers);

  injectBackgroundTraffic(driver, traffic.afterCut, sendTransfer);

  const delivered = driver.dispatchLoop((entry, message) => handleMessage(driver, entry, message), {
    afterDispatch: (emitted) => {
      if (emitted.length > 0) {
        injectBackgroundTraffic(driver, traffic.perResponse, sendTransfer);
      }
    },
  });

  return verifySnapshot(driver, {
    expectedTotal,
    delivered,
    adjustment: messageEffect,
    finished: (entry) => entry.done,
  });
}
