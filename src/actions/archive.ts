import fs from "node:fs";
import path from "node:path";
import type { ActionOutcome, ActionRequest, ActionRunner } from "../core/action.js";
import { StepFailure } from "../core/errors.js";
import { compilePathPattern, ensureWithinBase, toPosixRelative } from "../utils/path-safety.js";

const SKIPPED_DIRS = new Set([".git", "node_modules"]);

/**
 * Copies workspace files matching `with.paths` (comma or newline separated
 * patterns) into the run's artifact directory, keeping their relative
 * layout. Fails when nothing matches unless `with.allowEmpty` is "true".
 */
export class ArchiveAction implements ActionRunner {
	readonly id = "archive";

	async run(request: ActionRequest): Promise<ActionOutcome> {
		const patterns = (request.inputs.paths ?? "")
			.split(/[,\n]/)
			.map((value) => value.trim())
			.filter(Boolean);
		if (patterns.length === 0) {
			throw new StepFailure(request.stepId, "archive needs at least one path pattern in `paths`");
		}

		const matchers = patterns.map(compilePathPattern);
		const stateDir = path.resolve(request.stateDir);
		const matched: string[] = [];
		walk(request.cwd, (filePath, isFile) => {
			if (isInside(stateDir, filePath)) {
				return false;
			}
			const relative = toPosixRelative(request.cwd, filePath);
			if (isFile && matchers.some((matches) => matches(relative))) {
				matched.push(relative);
			}
			return true;
		});

		if (matched.length === 0) {
			if (request.inputs.allowEmpty === "true") {
				request.write(`No files matched ${patterns.join(", ")}\n`, "stdout");
				return { exitCode: 0 };
			}
			throw new StepFailure(request.stepId, `no files matched ${patterns.join(", ")}`);
		}

		for (const relative of matched.sort()) {
			request.signal.throwIfAborted();
			const target = ensureWithinBase(request.artifactDir, relative, "artifact path");
			fs.mkdirSync(path.dirname(target), { recursive: true });
			fs.copyFileSync(path.join(request.cwd, relative), target);
			request.write(`archived ${relative}\n`, "stdout");
		}
		request.write(`Archived ${matched.length} file(s)\n`, "stdout");
		return { exitCode: 0 };
	}
}

function walk(dir: string, visit: (filePath: string, isFile: boolean) => boolean): void {
	for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
		const entryPath = path.join(dir, entry.name);
		if (entry.isDirectory()) {
			if (SKIPPED_DIRS.has(entry.name) || !visit(entryPath, false)) {
				continue;
			}
			walk(entryPath, visit);
		} else if (entry.isFile()) {
			visit(entryPath, true);
		}
	}
}

function isInside(base: string, target: string): boolean {
	const rel = path.relative(base, path.resolve(target));
	return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}
