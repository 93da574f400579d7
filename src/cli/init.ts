import fs from "node:fs";
import path from "node:path";

export type GitignoreResult = "added" | "present" | "skipped";

export function ensureGitignore(repoRoot: string, stateDir = ".pipewright"): GitignoreResult {
	const gitDir = path.join(repoRoot, ".git");
	if (!fs.existsSync(gitDir)) {
		return "skipped";
	}

	const ignoreEntry = normalizeIgnoreLine(stateDir);
	const ignorePath = path.join(repoRoot, ".gitignore");
	const hasIgnoreFile = fs.existsSync(ignorePath);
	const current = hasIgnoreFile ? fs.readFileSync(ignorePath, "utf-8") : "";
	const lines = current.split(/\r?\n/);
	const hasEntry = lines.some((line) => normalizeIgnoreLine(line) === ignoreEntry);

	if (hasEntry) {
		return "present";
	}

	fs.writeFileSync(ignorePath, buildUpdatedIgnore(current, hasIgnoreFile, ignoreEntry));
	return "added";
}

export function runInit(repoRoot: string, stateDir = ".pipewright"): void {
	const result = ensureGitignore(repoRoot, stateDir);
	const entry = normalizeIgnoreLine(stateDir);
	if (result === "added") {
		process.stdout.write(`Added '${entry}' to .gitignore.\n`);
		return;
	}
	if (result === "present") {
		process.stdout.write(`'${entry}' is already in .gitignore.\n`);
		return;
	}
	process.stdout.write("Skipped: not a git repository.\n");
}

function normalizeIgnoreLine(line: string): string {
	const trimmed = line.trim();
	if (!trimmed) {
		return "";
	}
	return trimmed.replace(/^\.\/+/, "").replace(/^\/+/, "").replace(/\/+$/, "");
}

function buildUpdatedIgnore(current: string, hasIgnoreFile: boolean, ignoreEntry: string): string {
	if (!hasIgnoreFile || current.trim().length === 0) {
		return `${ignoreEntry}\n`;
	}
	const endsWithNewline = current.endsWith("\n");
	const prefix = endsWithNewline ? current : `${current}\n`;
	return `${prefix}${ignoreEntry}\n`;
}
