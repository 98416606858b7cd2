import { randomIndex, type RandomSource } from "./random.js";

/**
 * Delivery policy of the logically fused channels. `fifo` preserves emission
 * order; `non_fifo` lets any pending message overtake any other.
 */
export type ChannelDiscipline = "fifo" | "non_fifo";

/**
 * Pending-message queue shared by every channel of a run. Both disciplines
 * dequeue from the front and differ only in where new messages land.
 */
export class MessageQueue<M> {
  private readonly pending: M[] = [];

  constructor(
    readonly discipline: ChannelDiscipline,
    private readonly random: RandomSource,
  ) {}

  get size(): number {
    return this.pending.length;
  }

  isEmpty(): boolean {
    return this.pending.length === 0;
  }

  enqueue(message: M): void {
    if (this.discipline === "fifo") {
      this.pending.push(message);
      return;
    }
    // Uniform over [0, len]: both ends are valid landing spots.
    const index = randomIndex(this.random, this.pending.length + 1);
    this.pending.splice(index, 0, message);
  }

  /** FIFO keeps batch order; non-FIFO places each message independently. */
  enqueueAll(messages: Iterable<M>): void {
    for (const message of messages) {
      this.enqueue(message);
    }
  }

  dequeue(): M | undefined {
    return this.pending.shift();
  }

  /** Copy of the pending messages, front first. */
  toArray(): M[] {
    return [...this.pending];
  }
}
