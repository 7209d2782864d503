import { describe, it } from "mocha";
import { expect } from "chai";

import { requireComplete } from "../src/analysis/index.js";
import { classifySynchronous } from "../src/analysis/synchronous.js";
import { bruteForceSynchronousCycles, storeAttractors } from "./helpers/bruteForce.js";
import { constantNetwork, loadFixtureNetwork, oscillatorNetwork, swapNetwork } from "./helpers/networks.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

describe("analysis/synchronous", () => {
  it("classifies the three-node example walk by walk", () => {
    const store = requireComplete(classifySynchronous(loadFixtureNetwork("three-node.json")));
    expect(Array.from(store.records(), ([state, record]) => [state, record])).to.deep.equal([
      [0, { isAttractor: false, attractorId: 0, distance: 1 }],
      [1, { isAttractor: true, attractorId: 0, distance: 0 }],
      [2, { isAttractor: false, attractorId: 0, distance: 2 }],
      [3, { isAttractor: true, attractorId: 1, distance: 0 }],
      [4, { isAttractor: false, attractorId: 2, distance: 1 }],
      [5, { isAttractor: true, attractorId: 2, distance: 0 }],
      [6, { isAttractor: false, attractorId: 2, distance: 2 }],
      [7, { isAttractor: false, attractorId: 1, distance: 1 }],
    ]);
    expect(storeAttractors(store)).to.deep.equal([[1], [3], [5]]);
  });

  it("treats both states of a parentless node as fixed points", () => {
    const store = requireComplete(classifySynchronous(constantNetwork()));
    expect(store.attractorCount).to.equal(2);
    expect([...store.attractorMembers(0)]).to.deep.equal([0]);
    expect([...store.attractorMembers(1)]).to.deep.equal([1]);
    expect(store.distanceOf(0)).to.equal(0);
    expect(store.distanceOf(1)).to.equal(0);
  });

  it("finds a two-state oscillation as one attractor", () => {
    const store = requireComplete(classifySynchronous(oscillatorNetwork()));
    expect(storeAttractors(store)).to.deep.equal([[0, 1]]);
    expect(store.isAttractor(0)).to.equal(true);
    expect(store.isAttractor(1)).to.equal(true);
  });

  it("numbers attractors in discovery order", () => {
    const store = requireComplete(classifySynchronous(swapNetwork()));
    expect([...store.attractorMembers(0)]).to.deep.equal([0]);
    expect([...store.attractorMembers(1)]).to.deep.equal([1, 2]);
    expect([...store.attractorMembers(2)]).to.deep.equal([3]);
  });

  it("matches brute-force cycle enumeration on the six-node example", () => {
    const network = loadFixtureNetwork("six-node.json");
    const store = requireComplete(classifySynchronous(network));
    expect(store.classifiedCount).to.equal(64);
    expect(storeAttractors(store)).to.deep.equal(bruteForceSynchronousCycles(network));
  });

  it("lands on the attractor after exactly `distance` steps", () => {
    const network = loadFixtureNetwork("six-node.json");
    const store = requireComplete(classifySynchronous(network));
    for (let state = 0; state < network.stateCount; state += 1) {
      let current = state;
      const distance = store.distanceOf(state);
      for (let step = 0; step < distance; step += 1) {
        expect(store.distanceOf(current)).to.equal(distance - step);
        current = network.synchronousSuccessor(current);
      }
      expect(store.distanceOf(current)).to.equal(0);
      expect(store.attractorIdOf(current)).to.equal(store.attractorIdOf(state));
    }
  });

  it("logs the start, each attractor and the completion", () => {
    const logger = new RecordingLogger();
    classifySynchronous(loadFixtureNetwork("three-node.json"), { logger });
    expect(logger.messages()).to.deep.equal([
      "state_space_analysis_started",
      "attractor_discovered",
      "attractor_discovered",
      "attractor_discovered",
      "state_space_analysis_completed",
    ]);
    expect(logger.entries[0].payload).to.deep.equal({ mode: "synchronous", nodes: 3, states: 8 });
    expect(logger.entries[2].payload).to.deep.equal({ mode: "synchronous", attractor_id: 1, size: 1 });
  });
});
