import type { SimNode, SimulationDriver } from "../sim/driver.js";
import type { Envelope } from "../sim/messages.js";
import { pickOne } from "../sim/random.js";

/**
 * Amount of background (diffusing computation) traffic injected around the
 * cut: before the initiator snapshots, right after, and after every dispatch
 * that emitted messages.
 */
export interface TrafficPlan {
  readonly beforeCut: number;
  readonly afterCut: number;
  readonly perResponse: number;
}

export const DEFAULT_TRAFFIC: TrafficPlan = { beforeCut: 5, afterCut: 5, perResponse: 3 };

/** No background traffic at all; the cut then only sees markers. */
export const NO_TRAFFIC: TrafficPlan = { beforeCut: 0, afterCut: 0, perResponse: 0 };

export type TransferKind = "increment" | "decrement";

const TRANSFER_KINDS: readonly TransferKind[] = ["increment", "decrement"];

/** Node taking part in the diffusing computation through an account balance. */
export interface AccountNode extends SimNode {
  state: number;
}

/**
 * Effect of a transfer on its receiver. The sender applies the opposite
 * sign when emitting, so balances plus in-flight effects stay constant.
 */
export function receiverEffect(kind: TransferKind): number {
  return kind === "increment" ? 1 : -1;
}

/**
 * Emits {@link count} random transfers from random nodes that own at least
 * one connection. `build` creates the algorithm's message (and updates its
 * counters or clock); the sender's balance moves by the opposite of the
 * receiver's effect.
 */
export function injectBackgroundTraffic<N extends AccountNode, M extends Envelope>(
  driver: SimulationDriver<N, M>,
  count: number,
  build: (sender: N, destination: string, kind: TransferKind) => M,
): void {
  for (let index = 0; index < count; index += 1) {
    const sender = driver.pickRandomNode((candidate) => candidate.node.connections.length > 0);
    if (!sender) {
      driver.trace.append("No node has an outgoing connection, background traffic skipped.");
      return;
    }
    const destination = pickOne(driver.random, sender.node.connections).other;
    const kind = pickOne(driver.random, TRANSFER_KINDS);
    const message = build(sender, destination, kind);
    sender.state -= receiverEffect(kind);
    driver.trace.append(`${sender.node.name}=${sender.state} and send ${driver.protocol.format(message)}`);
    driver.send(message);
  }
}
