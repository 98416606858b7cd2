import { describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { GraphInputError, loadNodeGrid, parseNodeGrid } from "../../src/graph/loader.js";
import { ERROR_CODES } from "../../src/types.js";

const fixtures = path.resolve(process.cwd(), "tests", "fixtures", "grids");

describe("graph/loader", () => {
  it("loads editor grids and drops node locations", async () => {
    const grid = await loadNodeGrid(path.join(fixtures, "ring.json"));

    expect(grid).to.deep.equal({
      nodes: [
        { name: "a", id: 1, connections: [{ other: "b", weight: 1 }] },
        { name: "b", id: 2, connections: [{ other: "c", weight: 1 }] },
        { name: "c", id: 3, connections: [{ other: "a", weight: 1 }] },
      ],
    });
  });

  it("accepts editor locations and rejects malformed ones", () => {
    expect(
      parseNodeGrid({ nodes: [{ name: "a", id: 1, connections: [], location: { horizontal: 3, vertical: 4 } }] }),
    ).to.deep.equal({ nodes: [{ name: "a", id: 1, connections: [] }] });
    expect(() =>
      parseNodeGrid({ nodes: [{ name: "a", id: 1, connections: [], location: { horizontal: -1, vertical: 4 } }] }),
    ).to.throw(/^invalid node grid: nodes\.0\.location\.horizontal: /);
  });

  it("defaults missing connections to an empty list", () => {
    expect(parseNodeGrid({ nodes: [{ name: "solo", id: 0 }] })).to.deep.equal({
      nodes: [{ name: "solo", id: 0, connections: [] }],
    });
  });

  it("rejects duplicate node names", async () => {
    try {
      await loadNodeGrid(path.join(fixtures, "duplicate.json"));
      expect.fail("duplicate names should be rejected");
    } catch (error) {
      expect(error).to.be.instanceOf(GraphInputError);
      if (error instanceof GraphInputError) {
        expect(error.code).to.equal(ERROR_CODES.GRAPH_INPUT);
        expect(error.issues).to.deep.equal(['nodes.1.name: duplicate node name "a"']);
        expect(error.message).to.equal('invalid node grid: nodes.1.name: duplicate node name "a"');
      }
    }
  });

  it("points at the offending field", () => {
    expect(() => parseNodeGrid({ nodes: [{ name: "a", id: -1, connections: [] }] }))
      .to.throw(GraphInputError)
      .with.property("issues")
      .that.has.length(1);
    expect(() => parseNodeGrid({ nodes: [{ name: "a", id: -1, connections: [] }] })).to.throw(/^invalid node grid: nodes\.0\.id: /);
    expect(() => parseNodeGrid({ nodes: [{ name: "a", id: 1, connections: [{ other: "b" }] }] })).to.throw(
      /nodes\.0\.connections\.0\.weight: /,
    );
    expect(() => parseNodeGrid([])).to.throw(/^invalid node grid: <root>: /);
  });

  it("reports unreadable and malformed files", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "distsim-grid-"));
    try {
      const missing = path.join(directory, "missing.json");
      const broken = path.join(directory, "broken.json");
      await writeFile(broken, "{ nodes: ", "utf8");

      const missingError = await loadNodeGrid(missing).then(
        () => null,
        (error: unknown) => error,
      );
      expect(missingError).to.be.instanceOf(GraphInputError);
      expect(String(missingError)).to.contain(`cannot read ${missing}: `);

      const brokenError = await loadNodeGrid(broken).then(
        () => null,
        (error: unknown) => error,
      );
      expect(brokenError).to.be.instanceOf(GraphInputError);
      expect(String(brokenError)).to.contain(`${broken} is not valid JSON: `);
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });
});
