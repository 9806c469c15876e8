import { describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { StructuredLogger, type LogEntry } from "../src/logger.js";
import { captureStdout } from "./helpers/stdout.js";

describe("StructuredLogger", () => {
  it("writes one JSON line per entry on stdout", () => {
    const capture = captureStdout();
    try {
      const logger = new StructuredLogger();
      logger.info("plan_completed", { components: 3 });
    } finally {
      capture.restore();
    }

    expect(capture.chunks).to.have.length(1);
    expect(capture.chunks[0].endsWith("\n")).to.equal(true);
    const entries = capture.entries();
    expect(entries).to.have.length(1);
    expect(entries[0]).to.include({ level: "info", message: "plan_completed" });
    expect(entries[0].payload).to.deep.equal({ components: 3 });
  });

  it("writes to the configured stream, children included", () => {
    const lines: string[] = [];
    const stream = {
      write(chunk: string) {
        lines.push(chunk);
        return true;
      },
    };
    const capture = captureStdout();
    try {
      const logger = new StructuredLogger({ stream });
      logger.warn("parent_line");
      logger.child({ graph: "chain.json" }).info("child_line");
    } finally {
      capture.restore();
    }

    expect(capture.chunks).to.deep.equal([]);
    expect(lines.map((line) => JSON.parse(line).message)).to.deep.equal(["parent_line", "child_line"]);
    expect(JSON.parse(lines[1]).payload).to.deep.equal({ graph: "chain.json" });
  });

  it("drops entries below the configured level", () => {
    const messages: string[] = [];
    const capture = captureStdout();
    try {
      const logger = new StructuredLogger({ level: "warn", onEntry: (entry) => messages.push(entry.message) });
      logger.debug("hidden_debug");
      logger.info("hidden_info");
      logger.warn("visible_warn");
      logger.error("visible_error");

      expect(logger.isLevelEnabled("info")).to.equal(false);
      expect(logger.isLevelEnabled("error")).to.equal(true);
    } finally {
      capture.restore();
    }

    expect(messages).to.deep.equal(["visible_warn", "visible_error"]);
  });

  it("merges child bindings into every payload", () => {
    const entries: LogEntry[] = [];
    const capture = captureStdout();
    try {
      const logger = new StructuredLogger({ onEntry: (entry) => entries.push(entry) });
      const child = logger.child({ graph: "small_dag.json" });
      child.info("with_object", { components: 2 });
      child.info("without_payload");
      child.info("with_scalar", 42);
      logger.info("parent_untouched", { components: 1 });
    } finally {
      capture.restore();
    }

    expect(entries.map((entry) => entry.payload)).to.deep.equal([
      { graph: "small_dag.json", components: 2 },
      { graph: "small_dag.json" },
      { graph: "small_dag.json", value: 42 },
      { components: 1 },
    ]);
  });

  it("hands listeners a copy of the entry", () => {
    const payload = { nested: { count: 1 } };
    const received: LogEntry[] = [];
    const capture = captureStdout();
    try {
      const logger = new StructuredLogger({ onEntry: (entry) => received.push(entry) });
      logger.debug("copied", payload);
    } finally {
      capture.restore();
    }

    payload.nested.count = 2;
    expect(received[0].payload).to.deep.equal({ nested: { count: 1 } });
  });

  it("rotates the log file when the configured size is exceeded", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "logger-"));
    const logFile = path.join(directory, "planner.log");
    const capture = captureStdout();

    try {
      const logger = new StructuredLogger({
        logFile,
        maxFileSizeBytes: 256,
        maxFileCount: 3,
      });

      for (let index = 0; index < 6; index += 1) {
        logger.info("rotation_test_entry", { index, payload: "x".repeat(120) });
      }

      await logger.flush();
      capture.restore();

      const files = await readdir(directory);
      expect(files).to.include("planner.log");
      expect(files).to.include("planner.log.1");
      expect(files).to.not.include("planner.log.3");

      const archived = await readFile(path.join(directory, "planner.log.1"), "utf8");
      expect(archived).to.contain("rotation_test_entry");
    } finally {
      capture.restore();
      await rm(directory, { recursive: true, force: true });
    }
  });

  it("shares the file sink with child loggers", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "logger-"));
    const logFile = path.join(directory, "nested", "planner.log");
    const capture = captureStdout();

    try {
      const logger = new StructuredLogger({ logFile });
      logger.info("first");
      logger.child({ graph: "g" }).info("second");
      logger.info("third");
      await logger.flush();
      capture.restore();

      const lines = (await readFile(logFile, "utf8")).trim().split("\n");
      expect(lines.map((line) => JSON.parse(line).message)).to.deep.equal(["first", "second", "third"]);
    } finally {
      capture.restore();
      await rm(directory, { recursive: true, force: true });
    }
  });

  it("omits file mirroring when callers pass a null logFile override", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "logger-"));
    const capture = captureStdout();
    try {
      const entries: Array<{ message: string }> = [];
      const logger = new StructuredLogger({ logFile: null, onEntry: (entry) => entries.push({ message: entry.message }) });

      logger.warn("null_logfile_sanitised", { detail: "capture" });
      await logger.flush();
      capture.restore();

      const files = await readdir(directory);
      expect(files.length, "the logger should not create files when mirroring is disabled").to.equal(0);
      expect(entries.map((entry) => entry.message)).to.deep.equal(["null_logfile_sanitised"]);
    } finally {
      capture.restore();
      await rm(directory, { recursive: true, force: true });
    }
  });
});
