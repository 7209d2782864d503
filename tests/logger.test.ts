import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";

import { type LogEntry, StructuredLogger } from "../src/logger.js";

describe("StructuredLogger", () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), "attractors-logger-"));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it("writes one JSON line per entry to the sink", () => {
    const lines: string[] = [];
    const logger = new StructuredLogger({ sink: (line) => lines.push(line) });
    logger.info("state_space_analysis_started", { mode: "synchronous", nodes: 3 });

    expect(lines).to.have.length(1);
    expect(lines[0].endsWith("\n")).to.equal(true);
    const parsed: unknown = JSON.parse(lines[0]);
    expect(parsed).to.include({ level: "info", message: "state_space_analysis_started" });
    expect(parsed).to.have.deep.property("payload", { mode: "synchronous", nodes: 3 });
  });

  it("drops entries below the minimum level", () => {
    const lines: string[] = [];
    const logger = new StructuredLogger({ minLevel: "warn", sink: (line) => lines.push(line) });
    logger.debug("attractor_discovered");
    logger.info("state_space_analysis_completed");
    logger.warn("state_space_analysis_aborted");

    expect(lines).to.have.length(1);
    expect(logger.isLevelEnabled("error")).to.equal(true);
    expect(logger.isLevelEnabled("info")).to.equal(false);
  });

  it("hands a copy of every entry to the listener", () => {
    const entries: LogEntry[] = [];
    const payload = { attractor_id: 0 };
    const logger = new StructuredLogger({ sink: null, onEntry: (entry) => entries.push(entry) });
    logger.debug("attractor_discovered", payload);
    payload.attractor_id = 5;

    expect(entries).to.have.length(1);
    expect(entries[0].level).to.equal("debug");
    expect(entries[0].payload).to.deep.equal({ attractor_id: 0 });
  });

  it("omits the payload key when none is given", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({ sink: null, onEntry: (entry) => entries.push(entry) });
    logger.error("boom");
    expect(entries[0]).to.not.have.property("payload");
  });

  it("mirrors entries to the log file in order", async () => {
    const logFile = join(workDir, "nested", "analysis.log");
    const logger = new StructuredLogger({ sink: null, logFile });
    logger.info("first");
    logger.info("second");
    await logger.flush();

    const lines = (await readFile(logFile, "utf8")).trim().split("\n");
    expect(lines.map((line) => JSON.parse(line).message)).to.deep.equal(["first", "second"]);
  });

  it("rotates the log file once it exceeds the size limit", async () => {
    const logFile = join(workDir, "rotating.log");
    const logger = new StructuredLogger({ sink: null, logFile, maxFileSizeBytes: 10, maxFileCount: 2 });
    logger.info("first");
    logger.info("second");
    await logger.flush();

    const active = (await readFile(logFile, "utf8")).trim();
    const rotated = (await readFile(`${logFile}.1`, "utf8")).trim();
    expect(JSON.parse(active).message).to.equal("second");
    expect(JSON.parse(rotated).message).to.equal("first");
  });
});
