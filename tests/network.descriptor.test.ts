import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";

import { ValidationError } from "../src/errors.js";
import { describeNetwork } from "../src/network/describe.js";
import { loadNetworkFile, parseNetworkDescriptor } from "../src/network/descriptor.js";
import { fixturePath } from "./helpers/networks.js";

describe("network/descriptor", () => {
  it("accepts 0/1 and boolean truth-table entries alike", () => {
    const fromBits = parseNetworkDescriptor({ nodes: [{ parents: [0], truthTable: [1, 0] }] });
    const fromBooleans = parseNetworkDescriptor({ nodes: [{ parents: [0], truthTable: [true, false] }] });
    expect(fromBits.toDescriptor()).to.deep.equal(fromBooleans.toDescriptor());
    expect(fromBits.node(0).truthTable).to.deep.equal([true, false]);
  });

  it("reports schema issues with JSON pointers", () => {
    let caught: unknown;
    try {
      parseNetworkDescriptor({ nodes: [{ parents: [0], truthTable: [1, 2] }] });
    } catch (error) {
      caught = error;
    }
    expect(caught).to.be.instanceOf(ValidationError);
    if (caught instanceof ValidationError) {
      expect(caught.violations.map((violation) => violation.path)).to.deep.equal(["/nodes/0/truthTable/1"]);
    }
  });

  it("rejects unknown keys", () => {
    expect(() => parseNetworkDescriptor({ nodes: [], extra: true })).to.throw(ValidationError);
  });

  it("applies structural validation after the schema", () => {
    expect(() => parseNetworkDescriptor({ nodes: [{ parents: [3], truthTable: [0, 1] }] })).to.throw(
      ValidationError,
      "parent 3 is outside [0, 1)",
    );
  });

  describe("loadNetworkFile", () => {
    let directory: string;

    beforeEach(async () => {
      directory = await mkdtemp(join(tmpdir(), "attractors-descriptor-"));
    });

    afterEach(async () => {
      await rm(directory, { recursive: true, force: true });
    });

    it("loads the bundled fixture", async () => {
      const network = await loadNetworkFile(fixturePath("six-node.json"));
      expect(network.nodeCount).to.equal(6);
      expect(network.node(4).parents).to.deep.equal([0, 1, 3, 5]);
    });

    it("turns malformed JSON into a validation error", async () => {
      const file = join(directory, "broken.json");
      await writeFile(file, "{ nodes: ", "utf8");
      let caught: unknown;
      try {
        await loadNetworkFile(file);
      } catch (error) {
        caught = error;
      }
      expect(caught).to.be.instanceOf(ValidationError);
    });
  });

  it("describes every node", () => {
    const network = parseNetworkDescriptor({
      nodes: [
        { parents: [], truthTable: [0] },
        { parents: [0], truthTable: [1, 0] },
      ],
    });
    expect(describeNetwork(network).split("\n")).to.deep.equal([
      "The network has 2 nodes:",
      "",
      "Node 0:",
      "  no parents (value is carried over)",
      "  truth table: [0]",
      "",
      "Node 1:",
      "  parents: 0",
      "  truth table: [1, 0]",
    ]);
  });
});
