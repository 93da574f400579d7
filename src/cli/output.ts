import { isTerminal } from "../core/engine.js";
import { describeGuard } from "../core/guard.js";
import type { ExecutionResult, PipelineDefinition, RunReport, StageDefinition, StageReport } from "../core/types.js";
import { formatDuration } from "../utils/duration.js";

export type JsonStepSummary = {
	id: string;
	name: string;
	status: ExecutionResult["status"];
	attempts: number;
	exitCode?: number;
	reason?: ExecutionResult["reason"];
	durationMs: number;
	outputPath?: string;
};

export type JsonRunSummary = {
	runId: string;
	runNumber: number;
	pipeline: string;
	status: RunReport["status"];
	abortReason?: RunReport["abortReason"];
	parameters: Record<string, string>;
	durationMs?: number;
	failedStage?: string;
	failedStep?: string;
	stages: {
		name: string;
		parent?: string;
		status: StageReport["status"];
		skipReason?: StageReport["skipReason"];
		durationMs?: number;
		steps: JsonStepSummary[];
	}[];
	logsDir: string;
	artifactsDir: string;
};

export function buildJsonSummary(run: RunReport): JsonRunSummary {
	return {
		runId: run.runId,
		runNumber: run.runNumber,
		pipeline: run.pipeline,
		status: run.status,
		abortReason: run.abortReason,
		parameters: run.parameters,
		durationMs: run.durationMs,
		failedStage: run.failedStage,
		failedStep: run.failedStep,
		stages: run.stages.map((stage) => ({
			name: stage.name,
			parent: stage.parent,
			status: stage.status,
			skipReason: stage.skipReason,
			durationMs: stage.durationMs,
			steps: stage.steps.map((step) => ({
				id: step.id,
				name: step.name,
				status: step.status,
				attempts: step.attempts.length,
				exitCode: step.exitCode,
				reason: step.reason,
				durationMs: step.durationMs,
				outputPath: step.outputPath,
			})),
		})),
		logsDir: run.logDir,
		artifactsDir: run.artifactDir,
	};
}

/** Plain-text report used by `status` and by non-interactive runs. */
export function formatRunReport(run: RunReport): string {
	const lines = [
		`${run.pipeline} #${run.runNumber} · ${run.runId}`,
		`Status: ${run.status.toUpperCase()}${run.abortReason ? ` (${run.abortReason})` : ""}${
			run.durationMs !== undefined ? ` in ${formatDuration(run.durationMs)}` : ""
		}${isTerminal(run.status) ? "" : " (in progress)"}`,
	];
	for (const stage of run.stages) {
		const indent = "  ".repeat(stage.path.length);
		const detail =
			stage.status === "skipped"
				? ` (${stage.skipReason ?? "skipped"})`
				: stage.durationMs !== undefined
					? ` ${formatDuration(stage.durationMs)}`
					: "";
		lines.push(`${indent}${stage.name}: ${stage.status}${detail}`);
		for (const step of stage.steps) {
			const attempts = step.attempts.length > 1 ? ` after ${step.attempts.length} attempts` : "";
			const message = step.message ? ` · ${step.message}` : "";
			lines.push(`${indent}  - ${step.name}: ${step.status}${attempts}${message}`);
		}
	}
	for (const hook of run.hooks) {
		lines.push(`  post ${hook.kind} (${hook.scope}): ${hook.status}`);
	}
	if (run.failedStep) {
		lines.push(`Failed at ${run.failedStage ?? "?"} / ${run.failedStep}`);
	}
	lines.push(`Logs: ${run.logDir}`);
	return `${lines.join("\n")}\n`;
}

export function formatRunList(runs: readonly RunReport[]): string {
	if (runs.length === 0) {
		return "No runs recorded.\n";
	}
	return `${runs
		.map((run) => {
			const duration = run.durationMs !== undefined ? formatDuration(run.durationMs) : "-";
			return `#${run.runNumber}\t${run.runId}\t${run.status}\t${duration}\t${run.createdAt}`;
		})
		.join("\n")}\n`;
}

/** Stage tree printed by `validate`. */
export function formatPipelineOutline(definition: Readonly<PipelineDefinition>): string {
	const lines = [`${definition.name}`];
	const visit = (stage: StageDefinition, depth: number): void => {
		const notes: string[] = [];
		if (stage.kind === "parallel") {
			notes.push("parallel");
		} else {
			notes.push(`${stage.steps.length} step(s)`);
		}
		if (stage.when) {
			notes.push(`when ${describeGuard(stage.when)}`);
		}
		if (stage.lock) {
			notes.push(`lock ${stage.lock}`);
		}
		if (stage.bestEffort) {
			notes.push("best effort");
		}
		lines.push(`${"  ".repeat(depth)}${stage.name} (${notes.join(", ")})`);
		if (stage.kind === "parallel") {
			for (const branch of stage.branches) {
				visit(branch, depth + 1);
			}
		}
	};
	for (const stage of definition.stages) {
		visit(stage, 1);
	}
	return `${lines.join("\n")}\n`;
}
