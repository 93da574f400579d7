import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { RunNotFoundError } from "../src/core/errors.js";
import type { RunReport } from "../src/core/types.js";
import { createRunId, getStepLogFileName, RUN_RECORD_SCHEMA_VERSION, RunStore } from "../src/store/run-store.js";

function createStore(): { store: RunStore; baseDir: string } {
	const stateDir = fs.mkdtempSync(path.join(os.tmpdir(), "pipewright-store-"));
	return { store: RunStore.forStateDir(stateDir), baseDir: path.join(stateDir, "runs") };
}

function report(runId: string, runNumber: number, pipeline = "shop"): RunReport {
	return {
		schemaVersion: RUN_RECORD_SCHEMA_VERSION,
		runId,
		runNumber,
		pipeline,
		parameters: { TARGET: "staging" },
		status: "success",
		createdAt: `2024-05-0${runNumber}T10:00:00.000Z`,
		stages: [
			{
				name: "build",
				path: ["build"],
				kind: "steps",
				status: "success",
				bestEffort: false,
				steps: [],
			},
		],
		hooks: [],
		artifactDir: `/tmp/${runId}/artifacts`,
		logDir: `/tmp/${runId}/logs`,
	};
}

describe("run store", () => {
	it("writes and reads run records", () => {
		const { store, baseDir } = createStore();
		const run = report("run-1", 1);
		store.writeRun(run);

		expect(store.readRun("run-1")).toEqual(run);
		expect(fs.readdirSync(path.join(baseDir, "run-1"))).toEqual(["run.json"]);
	});

	it("throws RunNotFoundError for unknown runs", () => {
		const { store } = createStore();
		expect(() => store.readRun("missing")).toThrow(RunNotFoundError);
		expect(() => store.readRun("missing")).toThrow("Run not found: missing");
	});

	it("rejects run ids that escape the store", () => {
		const { store } = createStore();
		expect(() => store.readRun("../outside")).toThrow();
	});

	it("lists runs newest first and filters by pipeline", () => {
		const { store } = createStore();
		store.writeRun(report("run-a", 1));
		store.writeRun(report("run-c", 3));
		store.writeRun(report("run-b", 2));
		store.writeRun(report("other-1", 1, "docs"));

		expect(store.listRuns("shop").map((run) => run.runId)).toEqual(["run-c", "run-b", "run-a"]);
		expect(store.listRuns()).toHaveLength(4);
		expect(store.nextRunNumber("shop")).toBe(4);
		expect(store.nextRunNumber("docs")).toBe(2);
		expect(store.nextRunNumber("new")).toBe(1);
	});

	it("skips directories without a readable record", () => {
		const { store, baseDir } = createStore();
		store.writeRun(report("run-a", 1));
		fs.mkdirSync(path.join(baseDir, "stray"));
		fs.mkdirSync(path.join(baseDir, "old"));
		fs.writeFileSync(path.join(baseDir, "old", "run.json"), JSON.stringify({ schemaVersion: 0 }));

		expect(store.listRuns().map((run) => run.runId)).toEqual(["run-a"]);
	});

	it("purges runs beyond the newest K of one pipeline", () => {
		const { store, baseDir } = createStore();
		for (const runNumber of [1, 2, 3, 4]) {
			store.writeRun(report(`run-${runNumber}`, runNumber));
		}
		store.writeRun(report("other-1", 1, "docs"));

		expect(store.purge("shop", 2)).toEqual(["run-2", "run-1"]);
		expect(fs.readdirSync(baseDir).sort()).toEqual(["other-1", "run-3", "run-4"]);
		expect(store.purge("shop", 2)).toEqual([]);
	});

	it("creates log and artifact directories inside the run", () => {
		const { store, baseDir } = createStore();
		expect(store.createLogsDir("run-1")).toBe(path.join(baseDir, "run-1", "logs"));
		expect(store.createArtifactsDir("run-1")).toBe(path.join(baseDir, "run-1", "artifacts"));
		expect(store.logFilePath("run-1", "build#1", 2)).toBe(
			path.join(baseDir, "run-1", "logs", getStepLogFileName("build#1", 2)),
		);
	});
});

describe("getStepLogFileName", () => {
	it("keeps distinct ids apart after sanitizing", () => {
		const first = getStepLogFileName("Build#1", 1);
		const second = getStepLogFileName("build#1", 1);

		expect(first).toMatch(/\.1\.log$/);
		expect(first).not.toBe(second);
		expect(getStepLogFileName("build#1", 1)).toBe(second);
	});
});

describe("createRunId", () => {
	it("starts with a compact UTC timestamp", () => {
		expect(createRunId(new Date("2024-05-01T10:20:30.456Z"))).toMatch(/^20240501T102030-[0-9a-f]{6}$/);
	});
});
