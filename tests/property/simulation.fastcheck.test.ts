import { describe, it } from "mocha";
import { expect } from "chai";
import fc from "fast-check";

import { runAlgorithm } from "../../src/algorithms/index.js";
import { ALGORITHMS, ERROR_CODES } from "../../src/types.js";
import { anyGraphArb } from "../helpers/graphs.js";

/**
 * Property-based coverage ensuring every algorithm runs to completion on
 * arbitrary topologies, whether or not the graph suits it.
 */
describe("simulation runs (property-based)", () => {
  it("terminates on arbitrary topologies", () => {
    fc.assert(
      fc.property(anyGraphArb, fc.constantFrom(...ALGORITHMS), fc.integer({ min: 1, max: 1_000_000 }), (graph, algorithm, seed) => {
        const log: string[] = [];
        const result = runAlgorithm(algorithm, graph, log, { seed });

        if (result.ok) {
          expect(result.verdict.kind).to.equal(algorithm === "chang_roberts" ? "election" : "snapshot");
        } else {
          // Only the election needs every node to own a successor.
          expect(algorithm).to.equal("chang_roberts");
          expect(result.code).to.equal(ERROR_CODES.SIM_TOPOLOGY);
        }
        expect(log.length).to.be.greaterThan(0);
      }),
      { numRuns: 80 },
    );
  });

  it("elects the largest id on every ring, whatever the delivery order", () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 20 }), fc.integer({ min: 1, max: 1_000_000 }), (size, seed) => {
        const graph = Array.from({ length: size }, (_, index) => ({
          name: `n${index}`,
          id: size - index,
          connections: [{ other: `n${(index + 1) % size}`, weight: 1 }],
        }));
        const log: string[] = [];
        const result = runAlgorithm("chang_roberts", graph, log, { seed });

        expect(result.ok).to.equal(true);
        expect(log[log.length - 1]).to.equal("Node n0 was chosen as leader.");
      }),
      { numRuns: 60 },
    );
  });
});
