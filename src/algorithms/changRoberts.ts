import type { GraphNode } from "../graph/model.js";
import { SimulationDriver, type SimNode } from "../sim/driver.js";
import { TopologyError } from "../sim/errors.js";
import { defineProtocol, type Envelope } from "../sim/messages.js";
import type { AlgorithmContext } from "./context.js";
import type { ElectionVerdict } from "./verdict.js";

export type ElectionState = "active" | "passive" | "leader";

export interface ChangRobertsMessage extends Envelope {
  readonly kind: "leader";
  /** Candidate id travelling around the ring. */
  readonly id: number;
  /** Number of sends this candidate has gone through. */
  readonly hops: number;
}

/** Correctness only depends on ids and the ring, so delivery order is random. */
export const changRobertsProtocol = defineProtocol<ChangRobertsMessage, "non_fifo">(
  "non_fifo",
  (message) => `<leader=${message.id}> ${message.sender}->${message.destination}`,
);

export interface ChangRobertsNode extends SimNode {
  state: ElectionState;
  /** `connections[0]`: the single neighbour this node forwards to. */
  readonly successor: string;
}

/** Every node must designate its ring successor through its first connection. */
export function wrapChangRobertsNode(node: GraphNode): ChangRobertsNode {
  const first = node.connections[0];
  if (!first) {
    throw new TopologyError(`Node ${node.name} has no outgoing connection to forward to.`, { node: node.name });
  }
  return { node, state: "active", successor: first.other };
}

type Driver = SimulationDriver<ChangRobertsNode, ChangRobertsMessage>;

function forward(entry: ChangRobertsNode, message: ChangRobertsMessage): ChangRobertsMessage {
  return { kind: "leader", id: message.id, hops: message.hops + 1, sender: entry.node.name, destination: entry.successor };
}

function handleMessage(driver: Driver, entry: ChangRobertsNode, message: ChangRobertsMessage): ChangRobertsMessage[] {
  const name = entry.node.name;
  const ownId = entry.node.id;
  const shown = entry.state === "passive" ? "passive" : String(ownId);
  driver.trace.append(`${name}=${shown} received ${driver.protocol.format(message)}`);

  // On a ring a candidate returns home within one lap.
  if (message.hops > driver.nodes.length) {
    driver.trace.append(`${message.id} travelled ${message.hops} hops without returning, so the message is dropped.`);
    return [];
  }

  switch (entry.state) {
    case "passive":
      return [forward(entry, message)];
    case "leader":
      return [];
    case "active":
      if (message.id < ownId) {
        driver.trace.append(`${message.id}<${ownId} so the message is dismissed.`);
        return [];
      }
      if (message.id > ownId) {
        driver.trace.append(`${message.id}>${ownId} so ${name} is now passive.`);
        entry.state = "passive";
        return [forward(entry, message)];
      }
      driver.trace.append(`${message.id}=${ownId} so ${name} declares itself the leader.`);
      entry.state = "leader";
      return [];
  }
}

/**
 * Chang-Roberts election on a unidirectional ring: every node launches its
 * id, larger ids turn active nodes passive, and the id that makes it back to
 * its origin elects that node.
 */
export function runChangRoberts(graph: readonly GraphNode[], context: AlgorithmContext): ElectionVerdict {
  const driver: Driver = new SimulationDriver({
    graph,
    wrap: wrapChangRobertsNode,
    protocol: changRobertsProtocol,
    random: context.random,
    trace: context.trace,
  });
  driver.trace.append(`Started Chang-Roberts election with ${driver.nodes.length} nodes.`);

  for (const entry of driver.nodes) {
    driver.send({ kind: "leader", id: entry.node.id, hops: 1, sender: entry.node.name, destination: entry.successor });
  }

  const findLeader = (): ChangRobertsNode | undefined => driver.nodes.find((entry) => entry.state === "leader");
  const delivered = driver.dispatchLoop((entry, message) => handleMessage(driver, entry, message), {
    until: () => findLeader() !== undefined,
  });

  const leader = findLeader();
  driver.trace.append(leader ? `Node ${leader.node.name} was chosen as leader.` : "Leader election failed.");

  return {
    kind: "election",
    leader: leader?.node.name ?? null,
    delivered,
    states: Object.fromEntries(driver.nodes.map((entry) => [entry.node.name, entry.state])),
  };
}
