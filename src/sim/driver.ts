import { cloneNode, type GraphNode } from "../graph/model.js";
import { MessageQueue } from "./channels.js";
import { UnknownNodeError } from "./errors.js";
import type { Envelope, MessageProtocol } from "./messages.js";
import { pickMany, pickOne, type RandomSource } from "./random.js";
import type { TraceLog } from "./trace.js";

/** Algorithm-specific node state wrapping an owned copy of a graph node. */
export interface SimNode {
  readonly node: GraphNode;
}

/**
 * Builds the algorithm state for one node. The full graph is available so
 * factories can derive incoming neighbours; the node itself is already a
 * private copy.
 */
export type NodeFactory<N extends SimNode> = (node: GraphNode, graph: readonly GraphNode[]) => N;

/** Consumes one message and returns the messages it emits. */
export type MessageHandler<N extends SimNode, M extends Envelope> = (node: N, message: M) => M[];

export interface DriverOptions<N extends SimNode, M extends Envelope> {
  readonly graph: readonly GraphNode[];
  readonly wrap: NodeFactory<N>;
  readonly protocol: MessageProtocol<M>;
  readonly random: RandomSource;
  readonly trace: TraceLog;
}

export interface DispatchOptions<M> {
  /** Stops the loop as soon as it returns true (checked before each dispatch). */
  readonly until?: () => boolean;
  /** Runs after the emitted messages of a dispatch were enqueued. */
  readonly afterDispatch?: (emitted: readonly M[]) => void;
}

/**
 * Sequential event loop shared by every algorithm: it owns the wrapped nodes
 * and the pending queue, and is the only component that moves messages from
 * the queue into handlers.
 */
export class SimulationDriver<N extends SimNode, M extends Envelope> {
  readonly nodes: readonly N[];
  readonly protocol: MessageProtocol<M>;
  readonly random: RandomSource;
  readonly trace: TraceLog;
  private readonly queue: MessageQueue<M>;
  private readonly byName: Map<string, N>;

  constructor(options: DriverOptions<N, M>) {
    this.protocol = options.protocol;
    this.random = options.random;
    this.trace = options.trace;
    this.queue = new MessageQueue<M>(options.protocol.discipline, options.random);
    this.nodes = SimulationDriver.wrap(options.graph, options.wrap);
    this.byName = new Map(this.nodes.map((entry) => [entry.node.name, entry]));
  }

  /** One state per graph node, each holding its own copy of the node. */
  static wrap<N extends SimNode>(graph: readonly GraphNode[], factory: NodeFactory<N>): N[] {
    return graph.map((node) => factory(cloneNode(node), graph));
  }

  pickRandomNode(filter?: (candidate: N) => boolean): N | undefined {
    const candidates = filter ? this.nodes.filter(filter) : this.nodes;
    return candidates.length === 0 ? undefined : pickOne(this.random, candidates);
  }

  /** Draws up to {@link amount} distinct nodes and logs their names. */
  pickRandomNodes(amount: number): N[] {
    const picked = pickMany(this.random, this.nodes, amount);
    this.trace.append(`Picked ${picked.map((entry) => entry.node.name).join(", ")} at random.`);
    return picked;
  }

  /** Picks and logs the initiator, honouring an explicit choice. */
  chooseInitiator(preferred?: string): N {
    const initiator = preferred !== undefined ? this.findByName(preferred) : pickOne(this.random, this.nodes);
    this.trace.append(`Choose ${initiator.node.name} as initiator.`);
    return initiator;
  }

  findByName(name: string): N {
    const found = this.byName.get(name);
    if (!found) {
      throw new UnknownNodeError(name);
    }
    return found;
  }

  send(message: M): void {
    this.queue.enqueue(message);
  }

  sendAll(messages: readonly M[]): void {
    this.queue.enqueueAll(messages);
  }

  hasMessages(): boolean {
    return !this.queue.isEmpty();
  }

  /** Messages still waiting for delivery, front first. */
  pending(): M[] {
    return this.queue.toArray();
  }

  /**
   * Drains the queue, dispatching each message to its destination's handler.
   * Returns the number of delivered messages.
   */
  dispatchLoop(handler: MessageHandler<N, M>, options: DispatchOptions<M> = {}): number {
    let delivered = 0;
    while (!(options.until?.() ?? false)) {
      const message = this.queue.dequeue();
      if (message === undefined) {
        break;
      }
      const destination = this.findByName(message.destination);
      const emitted = handler(destination, message);
      delivered += 1;
      this.queue.enqueueAll(emitted);
      options.afterDispatch?.(emitted);
    }
    return delivered;
  }

  /** Logs one `Sent ...` line per message. */
  logSent(messages: readonly M[]): void {
    for (const message of messages) {
      this.trace.append(`Sent ${this.protocol.format(message)}.`);
    }
  }
}
