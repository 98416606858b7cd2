import type { ChannelDiscipline } from "./channels.js";

/** Addressing shared by every algorithm's messages. */
export interface Envelope {
  readonly sender: string;
  readonly destination: string;
}

/**
 * Static description of an algorithm's message type. Binding the channel
 * discipline here means a driver built for a protocol can only ever enqueue
 * that protocol's messages under that protocol's delivery policy.
 */
export interface MessageProtocol<M extends Envelope> {
  readonly discipline: ChannelDiscipline;
  /** Trace representation, e.g. `<increment> a->b`. */
  format(message: M): string;
}

/** Declares a protocol while keeping its discipline literal in the type. */
export function defineProtocol<M extends Envelope, D extends ChannelDiscipline>(
  discipline: D,
  format: (message: M) => string,
): MessageProtocol<M> & { readonly discipline: D } {
  return { discipline, format };
}

/** Local state recorded by one node plus the traffic it saw crossing the cut. */
export interface SnapshotRecord<M> {
  readonly state: number;
  /** Lamport time of the recording event. */
  readonly timestamp: number;
  readonly messages: M[];
}

export function createSnapshot<M>(state: number, timestamp: number): SnapshotRecord<M> {
  return { state, timestamp, messages: [] };
}

export function formatSnapshot<M extends Envelope>(
  snapshot: SnapshotRecord<M>,
  protocol: MessageProtocol<M>,
): string {
  const messages = snapshot.messages.map((message) => protocol.format(message)).join(", ");
  return `Snapshot(${snapshot.state}, [${messages}]) at LC(${snapshot.timestamp})`;
}

/** Net effect of recorded diffusing-computation messages: +1 / −1 each. */
export function sumAdjustments<M>(messages: readonly M[], adjustment: (message: M) => number): number {
  return messages.reduce((total, message) => total + adjustment(message), 0);
}
