import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { createActionRegistry } from "../src/actions/factory.js";
import { MemorySecretStore } from "../src/core/credentials.js";
import { type EngineOptions, type EngineRuntimeEvent, PipelineEngine } from "../src/core/engine.js";
import { ConcurrentRunError } from "../src/core/errors.js";
import { LockManager } from "../src/core/locks.js";
import { parsePipeline } from "../src/core/parser.js";
import { type ExecutionPlan, planRun, resolvePipeline } from "../src/core/resolver.js";
import type { RunReport } from "../src/core/types.js";
import { RunStore } from "../src/store/run-store.js";

type Harness = {
	workspace: string;
	store: RunStore;
	locks: LockManager;
	events: EngineRuntimeEvent[];
	engine: PipelineEngine;
};

function createHarness(overrides: Partial<EngineOptions> = {}): Harness {
	const workspace = fs.mkdtempSync(path.join(os.tmpdir(), "pipewright-engine-"));
	const stateDir = path.join(workspace, ".pipewright");
	const store = RunStore.forStateDir(stateDir);
	const locks = new LockManager();
	const events: EngineRuntimeEvent[] = [];
	const engine = new PipelineEngine({
		workspace,
		stateDir,
		store,
		locks,
		secrets: new MemorySecretStore(),
		actions: createActionRegistry({ killGraceMs: 200 }),
		baseEnv: { PATH: process.env.PATH ?? "/usr/bin:/bin" },
		onEvent: (event) => events.push(event),
		...overrides,
	});
	return { workspace, store, locks, events, engine };
}

function planOf(lines: string[], parameters: Record<string, string> = {}): ExecutionPlan {
	return planRun(resolvePipeline(parsePipeline(lines.join("\n"))), parameters);
}

function stageStatuses(report: RunReport): Record<string, string> {
	return Object.fromEntries(
		report.stages.map((stage) => [
			stage.name,
			stage.skipReason ? `${stage.status}:${stage.skipReason}` : stage.status,
		]),
	);
}

describe("pipeline engine", () => {
	it("runs stages in order and records success", async () => {
		const { engine, store, events, workspace } = createHarness();
		const report = await engine.run(
			planOf([
				"name: demo",
				"stages:",
				"  - name: build",
				"    steps:",
				"      - run: 'echo build >> order.txt'",
				"  - name: test",
				"    steps:",
				"      - run: 'echo test >> order.txt'",
			]),
		);

		expect(report.status).toBe("success");
		expect(report.runNumber).toBe(1);
		expect(stageStatuses(report)).toEqual({ build: "success", test: "success" });
		expect(fs.readFileSync(path.join(workspace, "order.txt"), "utf-8")).toBe("build\ntest\n");
		expect(store.readRun(report.runId).status).toBe("success");
		expect(events.map((event) => event.type)).toEqual([
			"run-started",
			"stage-started",
			"step-started",
			"step-finished",
			"stage-finished",
			"stage-started",
			"step-started",
			"step-finished",
			"stage-finished",
			"run-finished",
		]);
	});

	it("joins every parallel branch before failing the run", async () => {
		const { engine, workspace } = createHarness();
		const report = await engine.run(
			planOf([
				"name: fan",
				"stages:",
				"  - name: checks",
				"    parallel:",
				"      - name: one",
				"        steps:",
				"          - run: 'sleep 0.2; echo one'",
				"      - name: two",
				"        steps:",
				"          - run: 'exit 2'",
				"      - name: three",
				"        steps:",
				"          - run: 'sleep 0.3; touch three.done'",
				"  - name: release",
				"    steps:",
				"      - run: 'touch release.done'",
			]),
		);

		expect(report.status).toBe("failure");
		expect(stageStatuses(report)).toEqual({
			checks: "failure",
			one: "success",
			two: "failure",
			three: "success",
			release: "skipped:upstream-failure",
		});
		expect(report.failedStage).toBe("two");
		expect(report.failedStep).toBe("two#1");
		expect(fs.existsSync(path.join(workspace, "three.done"))).toBe(true);
		expect(fs.existsSync(path.join(workspace, "release.done"))).toBe(false);
	});

	it("aborts on the run timeout and releases held locks", async () => {
		const { engine, locks } = createHarness();
		const startedAt = Date.now();
		const report = await engine.run(
			planOf([
				"name: slow",
				"options:",
				"  timeout: 300ms",
				"stages:",
				"  - name: deploy",
				"    lock: production",
				"    steps:",
				"      - run: 'sleep 5'",
				"  - name: verify",
				"    steps:",
				"      - run: 'true'",
				"post:",
				"  always:",
				"    - run: 'echo cleanup'",
				"  aborted:",
				"    - run: 'echo aborted'",
			]),
		);

		expect(Date.now() - startedAt).toBeLessThan(3000);
		expect(report.status).toBe("aborted");
		expect(report.abortReason).toBe("timeout");
		expect(stageStatuses(report)).toEqual({ deploy: "failure", verify: "skipped:aborted" });
		expect(report.stages[0]?.steps[0]?.status).toBe("aborted");
		expect(locks.isHeld("production")).toBe(false);
		expect(report.hooks.map((hook) => [hook.scope, hook.kind, hook.status])).toEqual([
			["pipeline", "always", "success"],
			["pipeline", "aborted", "success"],
		]);
	});

	it("records a canceled run", async () => {
		const { engine } = createHarness();
		const handle = engine.start(
			planOf(["name: cancel-me", "stages:", "  - name: wait", "    steps:", "      - run: 'sleep 5'"]),
		);
		setTimeout(handle.cancel, 100);

		const report = await handle.report;
		expect(report.status).toBe("aborted");
		expect(report.abortReason).toBe("canceled");
	});

	it("runs always hooks before outcome hooks and ignores hook failures", async () => {
		const { engine } = createHarness();
		const report = await engine.run(
			planOf([
				"name: hooks",
				"stages:",
				"  - name: build",
				"    steps:",
				"      - run: 'exit 1'",
				"    post:",
				"      success:",
				"        - run: 'echo never'",
				"      failure:",
				"        - run: 'echo rollback'",
				"      always:",
				"        - run: 'echo tidy'",
				"post:",
				"  failure:",
				"    - run: 'exit 9'",
				"  always:",
				"    - run: 'echo done'",
			]),
		);

		expect(report.status).toBe("failure");
		expect(report.hooks.map((hook) => [hook.scope, hook.kind, hook.status])).toEqual([
			["build", "always", "success"],
			["build", "failure", "success"],
			["pipeline", "always", "success"],
			["pipeline", "failure", "failure"],
		]);
	});

	it("keeps the outcome when a success hook fails", async () => {
		const { engine } = createHarness();
		const report = await engine.run(
			planOf([
				"name: hooks",
				"stages:",
				"  - name: build",
				"    steps:",
				"      - run: 'true'",
				"post:",
				"  success:",
				"    - run: 'exit 1'",
			]),
		);

		expect(report.status).toBe("success");
		expect(report.hooks[0]).toMatchObject({ scope: "pipeline", kind: "success", status: "failure" });
	});

	it("marks the run unstable when a best-effort stage fails", async () => {
		const { engine } = createHarness();
		const report = await engine.run(
			planOf([
				"name: lenient",
				"stages:",
				"  - name: lint",
				"    bestEffort: true",
				"    steps:",
				"      - run: 'exit 1'",
				"  - name: build",
				"    steps:",
				"      - run: 'true'",
			]),
		);

		expect(report.status).toBe("unstable");
		expect(stageStatuses(report)).toEqual({ lint: "failure", build: "success" });
	});

	it("marks the run unstable on an unstable exit code", async () => {
		const { engine } = createHarness();
		const report = await engine.run(
			planOf([
				"name: flaky",
				"stages:",
				"  - name: test",
				"    steps:",
				"      - run: 'exit 3'",
				"        unstableExitCodes: [3]",
			]),
		);

		expect(report.status).toBe("unstable");
		expect(stageStatuses(report)).toEqual({ test: "unstable" });
	});

	it("skips stages whose guard does not hold", async () => {
		const lines = [
			"name: guarded",
			"parameters:",
			"  TARGET:",
			"    default: staging",
			"stages:",
			"  - name: build",
			"    steps:",
			"      - run: 'true'",
			"  - name: deploy",
			"    when: { param: TARGET, equals: prod }",
			"    steps:",
			"      - run: 'true'",
		];

		const staging = await createHarness().engine.run(planOf(lines));
		expect(staging.status).toBe("success");
		expect(stageStatuses(staging)).toEqual({ build: "success", deploy: "skipped:guard" });

		const prod = await createHarness().engine.run(planOf(lines, { TARGET: "prod" }));
		expect(stageStatuses(prod)).toEqual({ build: "success", deploy: "success" });
	});

	it("serializes stages that share a lock", async () => {
		const { engine, workspace } = createHarness();
		const report = await engine.run(
			planOf([
				"name: locked",
				"stages:",
				"  - name: migrate",
				"    parallel:",
				"      - name: a",
				"        lock: db",
				"        steps:",
				"          - run: 'echo start-a >> log.txt; sleep 0.2; echo end-a >> log.txt'",
				"      - name: b",
				"        lock: db",
				"        steps:",
				"          - run: 'echo start-b >> log.txt; sleep 0.2; echo end-b >> log.txt'",
			]),
		);

		expect(report.status).toBe("success");
		const lines = fs.readFileSync(path.join(workspace, "log.txt"), "utf-8").trim().split("\n");
		expect(lines).toHaveLength(4);
		expect(lines[1]).toBe(lines[0]?.replace("start", "end"));
		expect(lines[3]).toBe(lines[2]?.replace("start", "end"));
	});

	it("fails a stage whose lock stays busy past its lock timeout", async () => {
		const { engine, locks } = createHarness();
		const holder = await locks.acquire("db");
		try {
			const report = await engine.run(
				planOf([
					"name: contended",
					"stages:",
					"  - name: migrate",
					"    lock: db",
					"    lockTimeout: 100ms",
					"    steps:",
					"      - run: 'true'",
					"  - name: verify",
					"    steps:",
					"      - run: 'true'",
				]),
			);

			expect(report.status).toBe("failure");
			expect(report.failedStage).toBe("migrate");
			expect(stageStatuses(report)).toEqual({ migrate: "failure", verify: "skipped:upstream-failure" });
			expect(report.stages[0]?.message).toMatch(/^Lock "db" still busy after \d+ms$/);
			expect(report.stages[0]?.steps).toEqual([]);
		} finally {
			holder();
		}
		expect(locks.isHeld("db")).toBe(false);
		expect(locks.waiting("db")).toBe(0);
	});

	it("refuses a second run of the same pipeline while one is in flight", async () => {
		const { engine } = createHarness();
		const plan = planOf(["name: single", "stages:", "  - name: wait", "    steps:", "      - run: 'sleep 0.3'"]);

		const first = engine.start(plan);
		expect(() => engine.start(plan)).toThrow(ConcurrentRunError);
		await first.report;

		const second = await engine.run(plan);
		expect(second.runNumber).toBe(2);
	});

	it("purges runs beyond the retention limit", async () => {
		const { engine, store, events } = createHarness();
		const plan = planOf([
			"name: keep-two",
			"options:",
			"  retention: 2",
			"stages:",
			"  - name: build",
			"    steps:",
			"      - run: 'true'",
		]);

		const first = await engine.run(plan);
		await engine.run(plan);
		await engine.run(plan);

		expect(store.listRuns("keep-two").map((run) => run.runNumber)).toEqual([3, 2]);
		expect(events.filter((event) => event.type === "runs-purged")).toEqual([
			{ type: "runs-purged", runId: expect.any(String), purged: [first.runId] },
		]);
	});
});
