import { outgoingNeighbours, type GraphNode } from "../graph/model.js";
import { LamportClock } from "../sim/clock.js";
import { SimulationDriver } from "../sim/driver.js";
import { createSnapshot, defineProtocol, type Envelope, type SnapshotRecord } from "../sim/messages.js";
import { measureCut, type SnapshotRunOptions } from "./context.js";
import { injectBackgroundTraffic, receiverEffect, type AccountNode, type TransferKind } from "./traffic.js";
import { verifySnapshot, type SnapshotVerdict } from "./verdict.js";

export type ChandyLamportKind = "mark" | TransferKind;

export interface ChandyLamportMessage extends Envelope {
  readonly kind: ChandyLamportKind;
  /** Lamport time of the send event. */
  readonly time: number;
}

/** Markers rely on FIFO channels: nothing sent after a marker may overtake it. */
export const chandyLamportProtocol = defineProtocol<ChandyLamportMessage, "fifo">(
  "fifo",
  (message) => `<${message.kind}> ${message.sender}->${message.destination}`,
);

export interface ChandyLamportNode extends AccountNode {
  readonly clock: LamportClock;
  /** Peers whose marker has been delivered. */
  readonly received: Set<string>;
  snapshot: SnapshotRecord<ChandyLamportMessage> | null;
}

export function wrapChandyLamportNode(node: GraphNode): ChandyLamportNode {
  return { node, state: 0, clock: new LamportClock(), received: new Set(), snapshot: null };
}

type Driver = SimulationDriver<ChandyLamportNode, ChandyLamportMessage>;

function messageEffect(message: ChandyLamportMessage): number {
  return message.kind === "mark" ? 0 : receiverEffect(message.kind);
}

/** Records the local state and returns one marker per outgoing neighbour. */
function takeSnapshot(driver: Driver, entry: ChandyLamportNode): ChandyLamportMessage[] {
  const snapshot = createSnapshot<ChandyLamportMessage>(entry.state, entry.clock.tick());
  entry.snapshot = snapshot;
  driver.trace.append(`${entry.node.name} took Snapshot(${snapshot.state}, []) at LC(${snapshot.timestamp})`);

  const markers = outgoingNeighbours(entry.node).map(
    (destination): ChandyLamportMessage => ({
      sender: entry.node.name,
      destination,
      kind: "mark",
      time: entry.clock.tick(),
    }),
  );
  driver.logSent(markers);
  return markers;
}

function handleMessage(driver: Driver, entry: ChandyLamportNode, message: ChandyLamportMessage): ChandyLamportMessage[] {
  const name = entry.node.name;
  const label = driver.protocol.format(message);
  entry.clock.receive(message.time);
  driver.trace.append(`${name} received ${label}`);

  if (message.kind === "mark") {
    const emitted = entry.snapshot === null ? takeSnapshot(driver, entry) : [];
    entry.received.add(message.sender);
    driver.trace.append(`${name} notes it has received <mark> from ${message.sender}.`);
    return emitted;
  }

  // Traffic on a channel whose marker is still missing crossed the cut.
  if (entry.snapshot !== null && !entry.received.has(message.sender)) {
    driver.trace.append(`${name} saves ${label} in snapshot.`);
    entry.snapshot.messages.push(message);
  }
  entry.state += receiverEffect(message.kind);
  return [];
}

function sendTransfer(sender: ChandyLamportNode, destination: string, kind: TransferKind): ChandyLamportMessage {
  return { sender: sender.node.name, destination, kind, time: sender.clock.tick() };
}

/**
 * Chandy-Lamport snapshot over FIFO channels: the initiator records its
 * balance and floods markers; every node records on its first marker and
 * logs the transfers arriving on channels whose marker is still missing.
 */
export function runChandyLamport(graph: readonly GraphNode[], options: SnapshotRunOptions): SnapshotVerdict {
  const driver: Driver = new SimulationDriver({
    graph,
    wrap: wrapChandyLamportNode,
    protocol: chandyLamportProtocol,
    random: options.random,
    trace: options.trace,
  });
  const { traffic } = options;
  const expectedTotal = driver.nodes.reduce((total, entry) => total + entry.state, 0);
  driver.trace.append(`Started Chandy-Lamport snapshot with ${driver.nodes.length} nodes.`);

  const initiator = driver.chooseInitiator(options.initiator);
  injectBackgroundTraffic(driver, traffic.beforeCut, sendTransfer);

  const markers = takeSnapshot(driver, initiator);
  options.onCut?.(measureCut(driver, messageEffect));
  driver.sendAll(markers);

  injectBackgroundTraffic(driver, traffic.afterCut, sendTransfer);

  const delivered = driver.dispatchLoop((entry, message) => handleMessage(driver, entry, message), {
    afterDispatch: (emitted) => {
      if (emitted.length > 0) {
        injectBackgroundTraffic(driver, traffic.perResponse, sendTransfer);
      }
    },
  });

  return verifySnapshot(driver, { expectedTotal, delivered, adjustment: messageEffect });
}
