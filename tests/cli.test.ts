import { describe, it } from "mocha";
import { expect } from "chai";
import { access, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { __testing, runCli } from "../src/cli.js";
import { resolvePlannerOptions } from "../src/plannerOptions.js";
import { ERROR_CODES } from "../src/types.js";
import { captureStderr, captureStdout } from "./helpers/stdout.js";

const { mergeOptions, parseArgs, resolveDescriptorPath } = __testing;

const CHAIN_DESCRIPTOR = {
  directed: true,
  n: 3,
  edges: [
    { u: 0, v: 1, w: 2 },
    { u: 1, v: 2, w: 3 },
  ],
  source: 0,
  weight_model: "edge",
};

async function withWorkspace(run: (directory: string) => Promise<void>): Promise<void> {
  const directory = await mkdtemp(path.join(tmpdir(), "planner-cli-"));
  try {
    await run(directory);
  } finally {
    await rm(directory, { recursive: true, force: true });
  }
}

describe("planner CLI", () => {
  describe("argument parsing", () => {
    it("collects files and flags", () => {
      expect(
        parseArgs(["a.json", "--format", "json", "b.json", "--source", "2", "--no-export", "--results-dir", "out"]),
      ).to.deep.equal({
        files: ["a.json", "b.json"],
        format: "json",
        source: 2,
        exportResults: false,
        resultsDir: "out",
      });
    });

    it("rejects unknown flags, bad values and missing files", () => {
      expect(() => parseArgs(["a.json", "--verbose"])).to.throw("Unknown argument '--verbose'");
      expect(() => parseArgs(["a.json", "--format", "xml"])).to.throw("--format must be 'json' or 'text'");
      expect(() => parseArgs(["a.json", "--source", "-1"])).to.throw("--source expects a non-negative integer");
      expect(() => parseArgs(["--no-export"])).to.throw("At least one graph descriptor file is required");
    });

    it("lets flags override the environment", () => {
      const base = { ...resolvePlannerOptions(), resultsDir: "env-results", exportResults: true };
      const merged = mergeOptions(base, parseArgs(["a.json", "--no-export", "--source", "1"]));

      expect(merged.exportResults).to.equal(false);
      expect(merged.sourceOverride).to.equal(1);
      expect(merged.resultsDir).to.equal("env-results");
    });

    it("looks bare file names up in the data directory", () => {
      expect(resolveDescriptorPath("small.json", "data")).to.equal(path.resolve("data", "small.json"));
      expect(resolveDescriptorPath("graphs/small.json", "data")).to.equal(path.resolve("graphs/small.json"));
      const absolute = path.resolve(tmpdir(), "small.json");
      expect(resolveDescriptorPath(absolute, "data")).to.equal(absolute);
    });
  });

  describe("runs", () => {
    it("plans, prints and exports every descriptor", async () => {
      await withWorkspace(async (directory) => {
        const descriptorPath = path.join(directory, "chain.json");
        const resultsDir = path.join(directory, "results");
        await writeFile(descriptorPath, JSON.stringify(CHAIN_DESCRIPTOR), "utf8");

        const stdout = captureStdout();
        const stderr = captureStderr();
        const exitCode = await runCli([descriptorPath, "--format", "json", "--results-dir", resultsDir]).finally(() => {
          stdout.restore();
          stderr.restore();
        });

        expect(exitCode).to.equal(0);
        // stdout carries the report and nothing else.
        const parsed: unknown = JSON.parse(stdout.chunks.join(""));
        expect(parsed).to.have.nested.property("plans[0].filename", "chain.json");
        expect(parsed).to.have.nested.property("plans[0].critical_path.length", 5);
        expect(parsed).to.have.nested.property("performance[0].nodeCount", 3);
        expect(stdout.entries()).to.deep.equal([]);

        await access(path.join(resultsDir, "json", "chain_full.json"));
        await access(path.join(resultsDir, "csv", "chain_paths.csv"));
        const summary = await readFile(path.join(resultsDir, "summary.csv"), "utf8");
        expect(summary.split("\n")[1]).to.match(/^chain\.json,3,2,3,/);
        expect(stderr.entries().map((entry) => entry.message)).to.include.members([
          "plan_completed",
          "plan_exported",
          "summary_exported",
          "run_completed",
        ]);
      });
    });

    it("keeps going after a failing descriptor and reports it", async () => {
      await withWorkspace(async (directory) => {
        const valid = path.join(directory, "chain.json");
        const invalid = path.join(directory, "invalid.json");
        const missing = path.join(directory, "missing.json");
        await writeFile(valid, JSON.stringify(CHAIN_DESCRIPTOR), "utf8");
        await writeFile(invalid, JSON.stringify({ n: 2, edges: [{ u: 0, v: 3, w: 1 }] }), "utf8");

        const capture = captureStdout();
        const exitCode = await runCli([invalid, missing, valid, "--no-export"]).finally(() => capture.restore());

        expect(exitCode).to.equal(1);
        const failures = capture.entries().filter((entry) => entry.message === "graph_processing_failed");
        expect(failures).to.have.length(2);
        expect(failures[0].payload).to.include({
          file: invalid,
          code: ERROR_CODES.GRAPH_INVALID_INPUT,
          message: "/edges/0/v: node 3 is out of range [0, 1]",
          hint: "graph_descriptor_invalid",
        });
        expect(failures[1].payload).to.include({ file: missing, code: ERROR_CODES.PLAN_UNEXPECTED });

        const completed = capture.entries().find((entry) => entry.message === "run_completed");
        expect(completed?.payload).to.deep.equal({ processed: 1, failed: 2 });
        expect(capture.chunks.some((chunk) => chunk.startsWith("PLAN: chain.json"))).to.equal(true);
      });
    });

    it("prints a single parsable document in json mode when a descriptor fails", async () => {
      await withWorkspace(async (directory) => {
        const valid = path.join(directory, "chain.json");
        const missing = path.join(directory, "missing.json");
        await writeFile(valid, JSON.stringify(CHAIN_DESCRIPTOR), "utf8");

        const stdout = captureStdout();
        const stderr = captureStderr();
        const exitCode = await runCli([missing, valid, "--format", "json", "--no-export"]).finally(() => {
          stdout.restore();
          stderr.restore();
        });

        expect(exitCode).to.equal(1);
        const parsed: unknown = JSON.parse(stdout.chunks.join(""));
        expect(parsed).to.have.nested.property("plans.length", 1);
        expect(parsed).to.have.nested.property("plans[0].filename", "chain.json");
        const failures = stderr.entries().filter((entry) => entry.message === "graph_processing_failed");
        expect(failures).to.have.length(1);
        expect(failures[0].payload).to.include({ file: missing });
      });
    });

    it("rejects a source override on an empty graph", async () => {
      await withWorkspace(async (directory) => {
        const empty = path.join(directory, "empty.json");
        await writeFile(empty, JSON.stringify({ n: 0 }), "utf8");

        const capture = captureStdout();
        const exitCode = await runCli([empty, "--source", "4", "--no-export"]).finally(() => capture.restore());

        expect(exitCode).to.equal(1);
        const failure = capture.entries().find((entry) => entry.message === "graph_processing_failed");
        expect(failure?.payload).to.include({
          file: empty,
          code: ERROR_CODES.GRAPH_NODE_RANGE,
          message: "Source node 4 is out of range: the graph has no nodes",
        });
      });
    });
  });
});
