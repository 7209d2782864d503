import { describe, it } from "mocha";
import { expect } from "chai";

import { classifyAsynchronous } from "../src/analysis/asynchronous.js";
import { requireComplete } from "../src/analysis/index.js";
import { ClassificationWriter } from "../src/analysis/store.js";
import { classifySynchronous } from "../src/analysis/synchronous.js";
import {
  ERROR_CODES,
  InvariantViolationError,
  ModeMismatchError,
  OutOfRangeError,
  UnknownAttractorError,
} from "../src/errors.js";
import { loadFixtureNetwork, swapNetwork } from "./helpers/networks.js";

describe("analysis/store", () => {
  const threeNode = loadFixtureNetwork("three-node.json");

  it("rejects states outside [0, 2^N)", () => {
    const store = requireComplete(classifySynchronous(threeNode));
    for (const state of [-1, 8, 2.5]) {
      expect(() => store.isAttractor(state)).to.throw(OutOfRangeError);
    }
    try {
      store.attractorIdOf(8);
    } catch (error) {
      expect(error).to.be.instanceOf(OutOfRangeError);
      if (error instanceof OutOfRangeError) {
        expect(error.code).to.equal(ERROR_CODES.STORE_OUT_OF_RANGE);
        expect(error.details).to.deep.equal({ value: 8, stateCount: 8 });
      }
    }
  });

  it("rejects synchronous-only queries on an asynchronous store", () => {
    const store = requireComplete(classifyAsynchronous(threeNode));
    expect(() => store.distanceOf(0)).to.throw(ModeMismatchError, "distanceOf is not available for asynchronous classifications");
    expect(() => store.statesByDistance()).to.throw(ModeMismatchError);
    expect(() => store.basinOf(0)).to.throw(ModeMismatchError);
  });

  it("rejects unknown attractor ids", () => {
    const store = requireComplete(classifySynchronous(threeNode));
    expect(() => store.attractorMembers(3)).to.throw(UnknownAttractorError);
    expect(() => store.attractorMembers(-1)).to.throw(UnknownAttractorError);
  });

  it("groups states by distance and by basin", () => {
    const store = requireComplete(classifySynchronous(threeNode));
    expect([...store.statesByDistance()]).to.deep.equal([
      [0, [1, 3, 5]],
      [1, [0, 4, 7]],
      [2, [2, 6]],
    ]);
    expect(store.basinOf(0)).to.deep.equal([0, 1, 2]);
    expect(store.basinOf(1)).to.deep.equal([3, 7]);
    expect(store.basinOf(2)).to.deep.equal([4, 5, 6]);
  });

  it("summarises both modes", () => {
    expect(requireComplete(classifySynchronous(threeNode)).summary()).to.deep.equal({
      mode: "synchronous",
      nodeCount: 3,
      stateCount: 8,
      classifiedCount: 8,
      complete: true,
      attractorCount: 3,
      attractorSizes: [1, 1, 1],
      maxDistance: 2,
    });
    expect(requireComplete(classifyAsynchronous(swapNetwork())).summary()).to.deep.equal({
      mode: "asynchronous",
      nodeCount: 2,
      stateCount: 4,
      classifiedCount: 4,
      complete: true,
      attractorCount: 2,
      attractorSizes: [1, 1],
      maxDistance: null,
    });
  });

  it("serialises to JSON, omitting distances in asynchronous mode", () => {
    const json = requireComplete(classifyAsynchronous(swapNetwork())).toJSON();
    expect(json.attractors).to.deep.equal([[0], [3]]);
    expect(json.records[1]).to.deep.equal({ state: 1, isAttractor: false, attractorId: null });
    const syncJson = requireComplete(classifySynchronous(swapNetwork())).toJSON();
    expect(syncJson.records[1]).to.deep.equal({ state: 1, isAttractor: true, attractorId: 1, distance: 0 });
  });

  it("returns the same set instance on repeated attractor queries", () => {
    const store = requireComplete(classifySynchronous(threeNode));
    expect(store.allAttractors()).to.equal(store.allAttractors());
    expect(store.attractorMembers(2)).to.equal(store.allAttractors()[2]);
  });

  describe("writer", () => {
    it("refuses to classify a state twice", () => {
      const writer = new ClassificationWriter("synchronous", 1);
      const id = writer.allocateAttractor();
      writer.markAttractor(0, id);
      expect(() => writer.markTransient(0, id, 1)).to.throw(InvariantViolationError, "state 0 was classified twice");
    });

    it("requires a distance in synchronous mode", () => {
      const writer = new ClassificationWriter("synchronous", 1);
      expect(() => writer.markTransient(0, null, null)).to.throw(InvariantViolationError);
    });

    it("refuses attractors that were never allocated", () => {
      const writer = new ClassificationWriter("asynchronous", 1);
      expect(() => writer.markAttractor(0, 0)).to.throw(InvariantViolationError);
    });

    it("refuses writes after sealing", () => {
      const writer = new ClassificationWriter("asynchronous", 1);
      writer.markTransient(0, null, null);
      const store = writer.finish();
      expect(store.complete).to.equal(false);
      expect(() => writer.markTransient(1, null, null)).to.throw(InvariantViolationError);
      expect(() => writer.finish()).to.throw(InvariantViolationError);
    });
  });
});
