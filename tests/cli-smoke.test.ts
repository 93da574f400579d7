import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { ensureGitignore } from "../src/cli/init.js";
import { exitCodeFor, runCli } from "../src/cli/run-cli.js";

type Captured = {
	code: number;
	stdout: string;
	stderr: string;
};

function decode(chunk: string | Uint8Array): string {
	return typeof chunk === "string" ? chunk : Buffer.from(chunk).toString("utf-8");
}

async function invoke(args: string[], repoRoot: string): Promise<Captured> {
	const stdout: string[] = [];
	const stderr: string[] = [];
	vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array) => {
		stdout.push(decode(chunk));
		return true;
	});
	vi.spyOn(process.stderr, "write").mockImplementation((chunk: string | Uint8Array) => {
		stderr.push(decode(chunk));
		return true;
	});
	try {
		const code = await runCli(args, repoRoot);
		return { code, stdout: stdout.join(""), stderr: stderr.join("") };
	} finally {
		vi.restoreAllMocks();
	}
}

function createRepo(pipeline?: string[]): string {
	const repo = fs.mkdtempSync(path.join(os.tmpdir(), "pipewright-cli-"));
	if (pipeline) {
		fs.writeFileSync(path.join(repo, "pipeline.yml"), pipeline.join("\n"));
	}
	return repo;
}

function pipelineWith(command: string): string[] {
	return [
		"name: demo",
		"stages:",
		"  - name: build",
		"    steps:",
		`      - run: '${command}'`,
		"  - name: checks",
		"    parallel:",
		"      - name: unit",
		"        steps:",
		"          - run: 'true'",
	];
}

function parseJson(text: string): unknown {
	return JSON.parse(text.trim());
}

afterEach(() => {
	process.exitCode = undefined;
});

describe("cli", () => {
	it("prints help", async () => {
		const result = await invoke(["--help"], createRepo());
		expect(result.code).toBe(0);
		expect(result.stdout.startsWith("pipewright <command> [options]\n")).toBe(true);
	});

	it("prints the package version", async () => {
		const result = await invoke(["--version"], createRepo());
		expect(result.code).toBe(0);
		expect(result.stdout).toMatch(/^pipewright \d+\.\d+\.\d+\n$/);
	});

	it("rejects unknown options with a usage exit code", async () => {
		const result = await invoke(["run", "--bogus"], createRepo());
		expect(result.code).toBe(2);
		expect(result.stderr).toBe("Unknown option(s): --bogus\nRun `pipewright --help` for usage.\n");
	});

	it("reports a missing pipeline definition", async () => {
		const repo = createRepo();
		const result = await invoke(["run"], repo);
		expect(result.code).toBe(2);
		expect(result.stderr).toBe(`Pipeline definition not found: ${path.join(repo, "pipeline.yml")}\n`);
	});

	it("validates a pipeline and prints its outline", async () => {
		const result = await invoke(["validate"], createRepo(pipelineWith("true")));
		expect(result.code).toBe(0);
		expect(result.stdout).toBe(
			[
				"demo",
				"  build (1 step(s))",
				"  checks (parallel)",
				"    unit (1 step(s))",
				'Pipeline "demo" is valid (3 stage(s)).',
				"",
			].join("\n"),
		);
	});

	it("lists every validation issue as JSON", async () => {
		const repo = createRepo([
			"name: broken",
			"stages:",
			"  - name: build",
			"    steps: []",
			"  - name: build",
			"    steps:",
			"      - run: 'true'",
		]);
		const result = await invoke(["validate", "--json"], repo);

		expect(result.code).toBe(2);
		expect(parseJson(result.stdout)).toEqual({
			valid: false,
			issues: [
				{ path: "stages.0.steps", message: "stage has no steps" },
				{ path: "stages", message: 'duplicate stage name "build" (2 occurrences)' },
			],
		});
	});

	it("runs a pipeline, records it and shows its status", async () => {
		const repo = createRepo(pipelineWith("echo built"));
		const run = await invoke(["run", "--json"], repo);

		expect(run.code).toBe(0);
		const summary = parseJson(run.stdout);
		expect(summary).toMatchObject({
			pipeline: "demo",
			runNumber: 1,
			status: "success",
			stages: [
				{ name: "build", status: "success" },
				{ name: "checks", status: "success" },
				{ name: "unit", parent: "checks", status: "success" },
			],
		});

		const runId =
			typeof summary === "object" && summary !== null && "runId" in summary && typeof summary.runId === "string"
				? summary.runId
				: "";
		const status = await invoke(["status", runId], repo);
		expect(status.code).toBe(0);
		expect(status.stdout.split("\n")[0]).toBe(`demo #1 · ${runId}`);
		expect(status.stdout).toContain("\n  build: success ");

		const runs = await invoke(["runs"], repo);
		expect(runs.stdout.startsWith(`#1\t${runId}\tsuccess\t`)).toBe(true);
	});

	it("exits 1 when the run fails", async () => {
		const result = await invoke(["run", "--json"], createRepo(pipelineWith("exit 4")));
		expect(result.code).toBe(1);
		expect(process.exitCode).toBe(1);
		expect(parseJson(result.stdout)).toMatchObject({
			status: "failure",
			failedStage: "build",
			failedStep: "build#1",
			stages: [
				{ name: "build", status: "failure", steps: [{ exitCode: 4, reason: "exit-code" }] },
				{ name: "checks", status: "skipped", skipReason: "upstream-failure" },
				{ name: "unit", status: "skipped", skipReason: "upstream-failure" },
			],
		});
	});

	it("exits 0 when the run is unstable", async () => {
		const repo = createRepo([
			"name: lenient",
			"stages:",
			"  - name: lint",
			"    bestEffort: true",
			"    steps:",
			"      - run: 'exit 1'",
		]);
		const result = await invoke(["run", "--json"], repo);
		expect(result.code).toBe(0);
		expect(parseJson(result.stdout)).toMatchObject({ status: "unstable" });
	});

	it("prints progress lines outside a terminal", async () => {
		const result = await invoke(["run"], createRepo(pipelineWith("true")));
		expect(result.code).toBe(0);
		const lines = result.stdout.trimEnd().split("\n");
		expect(lines[0]).toMatch(/^Run \S+ \(#1\) started$/);
		expect(lines[1]).toBe("▶ build");
		expect(lines.at(-1)).toMatch(/^Finished SUCCESS in /);
	});

	it("passes parameters to the run", async () => {
		const repo = createRepo([
			"name: params",
			"parameters:",
			"  TARGET: {}",
			"stages:",
			"  - name: show",
			"    steps:",
			"      - run: 'echo ${{ TARGET }} > target.txt'",
		]);

		const missing = await invoke(["run", "--json"], repo);
		expect(missing.code).toBe(2);
		expect(missing.stderr).toContain("parameters.TARGET: no value given and no default");

		const given = await invoke(["run", "--json", "-p", "TARGET=qa"], repo);
		expect(given.code).toBe(0);
		expect(fs.readFileSync(path.join(repo, "target.txt"), "utf-8")).toBe("qa\n");
	});

	it("prunes runs beyond --keep", async () => {
		const repo = createRepo(pipelineWith("true"));
		await invoke(["run", "--json"], repo);
		await invoke(["run", "--json"], repo);

		const result = await invoke(["prune", "--keep", "1"], repo);
		expect(result.stdout).toBe('Removed 1 run(s) of "demo", keeping 1.\n');
		const runs = await invoke(["runs", "--json"], repo);
		expect(parseJson(runs.stdout)).toMatchObject([{ runNumber: 2 }]);
	});

	it("reports unknown runs", async () => {
		const result = await invoke(["status", "nope"], createRepo());
		expect(result.code).toBe(1);
		expect(result.stderr).toBe("Run not found: nope\n");
	});

	it("adds the state directory to .gitignore", async () => {
		const repo = createRepo();
		fs.mkdirSync(path.join(repo, ".git"));

		const result = await invoke(["init"], repo);
		expect(result.stdout).toBe("Added '.pipewright' to .gitignore.\n");
		expect(fs.readFileSync(path.join(repo, ".gitignore"), "utf-8")).toBe(".pipewright\n");
	});
});

describe("exitCodeFor", () => {
	it("treats unstable runs as passing", () => {
		expect(exitCodeFor("success")).toBe(0);
		expect(exitCodeFor("unstable")).toBe(0);
		expect(exitCodeFor("failure")).toBe(1);
		expect(exitCodeFor("aborted")).toBe(130);
	});
});

describe("ensureGitignore", () => {
	it("appends the entry once and skips non-git directories", () => {
		const repo = createRepo();
		expect(ensureGitignore(repo)).toBe("skipped");

		fs.mkdirSync(path.join(repo, ".git"));
		fs.writeFileSync(path.join(repo, ".gitignore"), "node_modules");
		expect(ensureGitignore(repo, "./.pipewright/")).toBe("added");
		expect(ensureGitignore(repo)).toBe("present");
		expect(fs.readFileSync(path.join(repo, ".gitignore"), "utf-8")).toBe("node_modules\n.pipewright\n");
	});
});
