import { describe, it } from "mocha";
import { expect } from "chai";

import { cloneNode, findDanglingConnections, incomingNeighbours, outgoingNeighbours } from "../../src/graph/model.js";
import { graphFromEdges } from "../helpers/graphs.js";

describe("graph/model", () => {
  const graph = graphFromEdges({ a: ["b", "c", "b"], b: ["a", "ghost"], c: [] });
  const [a] = graph;
  if (!a) {
    throw new Error("expected a node");
  }

  it("lists distinct outgoing neighbours in connection order", () => {
    expect(outgoingNeighbours(a)).to.deep.equal(["b", "c"]);
  });

  it("lists the nodes pointing at a name", () => {
    expect(incomingNeighbours(graph, "b")).to.deep.equal(["a"]);
    expect(incomingNeighbours(graph, "a")).to.deep.equal(["b"]);
    expect(incomingNeighbours(graph, "c")).to.deep.equal(["a"]);
  });

  it("finds connections towards missing nodes", () => {
    expect(findDanglingConnections(graph)).to.deep.equal([{ node: "b", peer: "ghost" }]);
  });

  it("clones connections deeply", () => {
    const copy = cloneNode(a);
    expect(copy).to.deep.equal(a);
    expect(copy.connections).to.not.equal(a.connections);
    expect(copy.connections[0]).to.not.equal(a.connections[0]);
  });
});
