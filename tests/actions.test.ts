import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { ArchiveAction } from "../src/actions/archive.js";
import { createActionRegistry } from "../src/actions/factory.js";
import { SleepAction } from "../src/actions/sleep.js";
import type { ActionRequest } from "../src/core/action.js";
import { StepFailure } from "../src/core/errors.js";

function createRequest(inputs: Record<string, string>, signal = new AbortController().signal) {
	const workspace = fs.mkdtempSync(path.join(os.tmpdir(), "pipewright-actions-"));
	const stateDir = path.join(workspace, ".pipewright");
	const output: string[] = [];
	const request: ActionRequest = {
		stepId: "package#1",
		inputs,
		env: {},
		cwd: workspace,
		workspace,
		stateDir,
		artifactDir: path.join(stateDir, "runs", "run-1", "artifacts"),
		signal,
		write: (chunk) => output.push(chunk),
	};
	return { request, workspace, output };
}

function writeFile(root: string, relative: string, content = relative): void {
	const target = path.join(root, relative);
	fs.mkdirSync(path.dirname(target), { recursive: true });
	fs.writeFileSync(target, content);
}

describe("archive action", () => {
	it("copies matching files into the artifact directory", async () => {
		const { request, workspace, output } = createRequest({ paths: "dist/**, README.md" });
		writeFile(workspace, "dist/app.js");
		writeFile(workspace, "dist/assets/logo.svg");
		writeFile(workspace, "src/app.ts");
		writeFile(workspace, "README.md");

		const outcome = await new ArchiveAction().run(request);

		expect(outcome).toEqual({ exitCode: 0 });
		expect(output).toEqual([
			"archived README.md\n",
			"archived dist/app.js\n",
			"archived dist/assets/logo.svg\n",
			"Archived 3 file(s)\n",
		]);
		expect(fs.readFileSync(path.join(request.artifactDir, "dist/assets/logo.svg"), "utf-8")).toBe(
			"dist/assets/logo.svg",
		);
		expect(fs.existsSync(path.join(request.artifactDir, "src"))).toBe(false);
	});

	it("never archives the state directory", async () => {
		const { request, workspace } = createRequest({ paths: "**/*.log" });
		writeFile(workspace, "build.log");
		writeFile(workspace, ".pipewright/runs/run-0/logs/old.log");

		await new ArchiveAction().run(request);
		expect(fs.readdirSync(request.artifactDir)).toEqual(["build.log"]);
	});

	it("fails when nothing matches unless empty results are allowed", async () => {
		const strict = createRequest({ paths: "coverage/**" });
		await expect(new ArchiveAction().run(strict.request)).rejects.toThrow(
			new StepFailure("package#1", "no files matched coverage/**"),
		);

		const lenient = createRequest({ paths: "coverage/**", allowEmpty: "true" });
		await expect(new ArchiveAction().run(lenient.request)).resolves.toEqual({ exitCode: 0 });
		expect(lenient.output).toEqual(["No files matched coverage/**\n"]);
	});

	it("requires at least one pattern", async () => {
		const { request } = createRequest({});
		await expect(new ArchiveAction().run(request)).rejects.toThrow("archive needs at least one path pattern");
	});
});

describe("sleep action", () => {
	it("waits for the given duration", async () => {
		const { request, output } = createRequest({ duration: "20ms" });
		await expect(new SleepAction().run(request)).resolves.toEqual({ exitCode: 0 });
		expect(output).toEqual(["Sleeping 20ms\n"]);
	});

	it("stops early when the signal aborts", async () => {
		const controller = new AbortController();
		const { request } = createRequest({ duration: "1m" }, controller.signal);
		const pending = new SleepAction().run(request);
		setTimeout(() => controller.abort(), 20);

		await expect(pending).resolves.toEqual({ exitCode: 130 });
	});

	it("rejects an invalid duration", async () => {
		const { request } = createRequest({ duration: "soon" });
		await expect(new SleepAction().run(request)).rejects.toThrow('sleep needs a valid `duration`, got "soon"');

		const tooLong = createRequest({ duration: "1000h" });
		await expect(new SleepAction().run(tooLong.request)).rejects.toThrow('sleep needs a valid `duration`, got "1000h"');
	});
});

describe("action registry", () => {
	it("looks up built-in and extra actions by id", () => {
		const registry = createActionRegistry({}, [new SleepAction()]);
		expect(registry.ids()).toEqual(["shell", "archive", "sleep"]);
		expect(registry.get(" Archive ")?.id).toBe("archive");
		expect(registry.get("teleport")).toBeUndefined();
	});
});
