import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { SimulationDriver, type SimNode } from "../../src/sim/driver.js";
import { UnknownNodeError } from "../../src/sim/errors.js";
import { defineProtocol, type Envelope } from "../../src/sim/messages.js";
import { createSeededRandom } from "../../src/sim/random.js";
import { TraceLog } from "../../src/sim/trace.js";
import { graphFromEdges } from "../helpers/graphs.js";

interface Ping extends Envelope {
  readonly ttl: number;
}

interface Counter extends SimNode {
  seen: number;
}

const pingProtocol = defineProtocol<Ping, "fifo">("fifo", (message) => `<ping ${message.ttl}> ${message.sender}->${message.destination}`);

function createDriver(lines: string[] = []): SimulationDriver<Counter, Ping> {
  return new SimulationDriver<Counter, Ping>({
    graph: graphFromEdges({ a: ["b"], b: ["a"], c: ["a"] }),
    wrap: (node) => ({ node, seen: 0 }),
    protocol: pingProtocol,
    random: createSeededRandom("driver"),
    trace: new TraceLog(lines),
  });
}

/** Bounces the ping back to its sender until its ttl runs out. */
function bounce(node: Counter, message: Ping): Ping[] {
  node.seen += 1;
  if (message.ttl === 0) {
    return [];
  }
  return [{ sender: node.node.name, destination: message.sender, ttl: message.ttl - 1 }];
}

describe("sim/driver", () => {
  it("wraps private copies of the graph nodes", () => {
    const graph = graphFromEdges({ a: ["b"], b: [] });
    const factory = sinon.spy((node: (typeof graph)[number]) => ({ node }));

    const wrapped = SimulationDriver.wrap(graph, factory);

    expect(factory.callCount).to.equal(2);
    expect(wrapped.map((entry) => entry.node.name)).to.deep.equal(["a", "b"]);
    expect(wrapped[0]?.node).to.not.equal(graph[0]);
    expect(wrapped[0]?.node.connections).to.not.equal(graph[0]?.connections);
    expect(wrapped[0]?.node).to.deep.equal(graph[0]);
  });

  it("hands the full graph to node factories", () => {
    const graph = graphFromEdges({ a: ["b"], b: ["a"] });
    const factory = sinon.spy((node: (typeof graph)[number], all: readonly (typeof graph)[number][]) => ({
      node,
      size: all.length,
    }));

    SimulationDriver.wrap(graph, factory);

    expect(factory.firstCall.args[1]).to.equal(graph);
  });

  it("looks nodes up by name", () => {
    const driver = createDriver();
    expect(driver.findByName("b").node.name).to.equal("b");
    expect(() => driver.findByName("zz")).to.throw(UnknownNodeError, 'No simulated node named "zz".');
  });

  it("logs the chosen initiator and honours an explicit choice", () => {
    const lines: string[] = [];
    const driver = createDriver(lines);

    expect(driver.chooseInitiator("c").node.name).to.equal("c");
    const drawn = driver.chooseInitiator();

    expect(lines).to.deep.equal(["Choose c as initiator.", `Choose ${drawn.node.name} as initiator.`]);
    expect(["a", "b", "c"]).to.include(drawn.node.name);
  });

  it("picks random nodes honouring filters", () => {
    const lines: string[] = [];
    const driver = createDriver(lines);

    const picked = driver.pickRandomNodes(2);
    const names = picked.map((entry) => entry.node.name);
    expect(picked).to.have.length(2);
    expect(new Set(names).size).to.equal(2);
    expect(lines).to.deep.equal([`Picked ${names.join(", ")} at random.`]);

    expect(driver.pickRandomNode((entry) => entry.node.name === "c")?.node.name).to.equal("c");
    expect(driver.pickRandomNode(() => false)).to.equal(undefined);
  });

  it("dispatches until the queue drains and counts deliveries", () => {
    const driver = createDriver();
    driver.send({ sender: "a", destination: "b", ttl: 3 });

    const delivered = driver.dispatchLoop(bounce);

    expect(delivered).to.equal(4);
    expect(driver.findByName("a").seen).to.equal(2);
    expect(driver.findByName("b").seen).to.equal(2);
    expect(driver.hasMessages()).to.equal(false);
  });

  it("stops as soon as the predicate holds and reports every emission", () => {
    const driver = createDriver();
    driver.sendAll([
      { sender: "a", destination: "b", ttl: 5 },
      { sender: "c", destination: "a", ttl: 0 },
    ]);
    const afterDispatch = sinon.spy();

    const delivered = driver.dispatchLoop(bounce, {
      until: () => driver.findByName("a").seen >= 1,
      afterDispatch,
    });

    expect(delivered).to.equal(2);
    expect(afterDispatch.callCount).to.equal(2);
    expect(afterDispatch.firstCall.args[0]).to.deep.equal([{ sender: "b", destination: "a", ttl: 4 }]);
    expect(afterDispatch.secondCall.args[0]).to.deep.equal([]);
    expect(driver.pending()).to.deep.equal([{ sender: "b", destination: "a", ttl: 4 }]);
  });

  it("fails loudly on messages addressed to unknown nodes", () => {
    const driver = createDriver();
    driver.send({ sender: "a", destination: "ghost", ttl: 0 });
    expect(() => driver.dispatchLoop(bounce)).to.throw(UnknownNodeError);
  });

  it("logs one line per sent message", () => {
    const lines: string[] = [];
    const driver = createDriver(lines);

    driver.logSent([
      { sender: "a", destination: "b", ttl: 1 },
      { sender: "b", destination: "a", ttl: 0 },
    ]);

    expect(lines).to.deep.equal(["Sent <ping 1> a->b.", "Sent <ping 0> b->a."]);
  });
});
