import { describe, it } from "mocha";
import { expect } from "chai";

import { MessageQueue } from "../../src/sim/channels.js";
import { createSeededRandom } from "../../src/sim/random.js";
import { constantRandom } from "../helpers/random.js";

function drain<M>(queue: MessageQueue<M>): M[] {
  const drained: M[] = [];
  for (let message = queue.dequeue(); message !== undefined; message = queue.dequeue()) {
    drained.push(message);
  }
  return drained;
}

describe("sim/channels", () => {
  it("delivers in emission order under the fifo discipline", () => {
    const queue = new MessageQueue<number>("fifo", createSeededRandom("fifo"));
    queue.enqueueAll([1, 2, 3]);
    queue.enqueue(4);

    expect(queue.size).to.equal(4);
    expect(queue.toArray()).to.deep.equal([1, 2, 3, 4]);
    expect(drain(queue)).to.deep.equal([1, 2, 3, 4]);
    expect(queue.isEmpty()).to.equal(true);
    expect(queue.dequeue()).to.equal(undefined);
  });

  it("can insert non-fifo messages at the front", () => {
    const queue = new MessageQueue<string>("non_fifo", constantRandom(0));
    queue.enqueueAll(["a", "b", "c"]);
    expect(drain(queue)).to.deep.equal(["c", "b", "a"]);
  });

  it("can insert non-fifo messages at the back", () => {
    const queue = new MessageQueue<string>("non_fifo", constantRandom(0.999999));
    queue.enqueueAll(["a", "b", "c"]);
    expect(drain(queue)).to.deep.equal(["a", "b", "c"]);
  });

  it("reorders non-fifo deliveries over repeated runs", () => {
    const random = createSeededRandom("reorder");
    const emitted = Array.from({ length: 10 }, (_, index) => index);
    let reordered = 0;

    for (let trial = 0; trial < 50; trial += 1) {
      const queue = new MessageQueue<number>("non_fifo", random);
      queue.enqueueAll(emitted);
      const delivered = drain(queue);
      expect([...delivered].sort((left, right) => left - right)).to.deep.equal(emitted);
      if (delivered.some((value, index) => value !== index)) {
        reordered += 1;
      }
    }

    expect(reordered).to.be.greaterThan(0);
  });
});
