import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { RunNotFoundError } from "../core/errors.js";
import type { RunReport } from "../core/types.js";
import { ensureWithinBase, sanitizePathSegment } from "../utils/path-safety.js";

export const RUN_RECORD_SCHEMA_VERSION = 1;

const ResultStatusSchema = z.enum(["success", "failure", "unstable", "aborted"]);
const FailureReasonSchema = z.enum(["exit-code", "timeout", "aborted", "credentials", "action-error"]);

const AttemptSchema = z.object({
	attempt: z.number(),
	status: ResultStatusSchema,
	startedAt: z.string(),
	finishedAt: z.string(),
	durationMs: z.number(),
	exitCode: z.number().optional(),
	reason: FailureReasonSchema.optional(),
	message: z.string().optional(),
	outputPath: z.string().optional(),
});

const ExecutionResultSchema = z.object({
	id: z.string(),
	name: z.string(),
	status: ResultStatusSchema,
	startedAt: z.string(),
	finishedAt: z.string(),
	durationMs: z.number(),
	exitCode: z.number().optional(),
	reason: FailureReasonSchema.optional(),
	message: z.string().optional(),
	outputPath: z.string().optional(),
	attempts: z.array(AttemptSchema),
});

export const RunReportSchema = z.object({
	schemaVersion: z.literal(RUN_RECORD_SCHEMA_VERSION),
	runId: z.string(),
	runNumber: z.number(),
	pipeline: z.string(),
	parameters: z.record(z.string()),
	status: z.enum(["pending", "running", "success", "failure", "unstable", "aborted"]),
	createdAt: z.string(),
	finishedAt: z.string().optional(),
	durationMs: z.number().optional(),
	abortReason: z.enum(["timeout", "canceled"]).optional(),
	stages: z.array(
		z.object({
			name: z.string(),
			path: z.array(z.string()),
			parent: z.string().optional(),
			kind: z.enum(["steps", "parallel"]),
			status: z.enum(["pending", "running", "success", "failure", "unstable", "skipped"]),
			bestEffort: z.boolean(),
			startedAt: z.string().optional(),
			finishedAt: z.string().optional(),
			durationMs: z.number().optional(),
			skipReason: z.enum(["guard", "upstream-failure", "aborted"]).optional(),
			lock: z.string().optional(),
			message: z.string().optional(),
			steps: z.array(ExecutionResultSchema),
		}),
	),
	hooks: z.array(
		z.object({
			scope: z.string(),
			kind: z.enum(["always", "success", "failure", "unstable", "aborted"]),
			status: ResultStatusSchema,
			results: z.array(ExecutionResultSchema),
		}),
	),
	failedStage: z.string().optional(),
	failedStep: z.string().optional(),
	artifactDir: z.string(),
	logDir: z.string(),
});

/**
 * Run directories live under `<stateDir>/runs/<runId>` and hold `run.json`,
 * per-attempt logs and archived artifacts.
 */
export class RunStore {
	constructor(private readonly baseDir: string) {}

	static forStateDir(stateDir: string): RunStore {
		return new RunStore(path.join(stateDir, "runs"));
	}

	ensureBaseDir(): void {
		fs.mkdirSync(this.baseDir, { recursive: true });
	}

	runDir(runId: string): string {
		return ensureWithinBase(this.baseDir, runId, "run id");
	}

	createRunDir(runId: string): string {
		this.ensureBaseDir();
		const runDir = this.runDir(runId);
		fs.mkdirSync(runDir, { recursive: true });
		return runDir;
	}

	createLogsDir(runId: string): string {
		const logsDir = path.join(this.createRunDir(runId), "logs");
		fs.mkdirSync(logsDir, { recursive: true });
		return logsDir;
	}

	createArtifactsDir(runId: string): string {
		const artifactsDir = path.join(this.createRunDir(runId), "artifacts");
		fs.mkdirSync(artifactsDir, { recursive: true });
		return artifactsDir;
	}

	logFilePath(runId: string, stepId: string, attempt: number): string {
		const logsDir = path.join(this.runDir(runId), "logs");
		return ensureWithinBase(logsDir, getStepLogFileName(stepId, attempt), "step log file");
	}

	writeRun(run: RunReport): void {
		const runDir = this.createRunDir(run.runId);
		const recordPath = path.join(runDir, "run.json");
		// Readers in other processes must never see a half-written record.
		const tempPath = `${recordPath}.${process.pid}.tmp`;
		fs.writeFileSync(tempPath, JSON.stringify(run, null, 2));
		fs.renameSync(tempPath, recordPath);
	}

	readRun(runId: string): RunReport {
		const recordPath = path.join(this.runDir(runId), "run.json");
		if (!fs.existsSync(recordPath)) {
			throw new RunNotFoundError(runId);
		}
		const raw: unknown = JSON.parse(fs.readFileSync(recordPath, "utf-8"));
		return RunReportSchema.parse(raw);
	}

	/** Runs of `pipeline` (or all pipelines), newest first. */
	listRuns(pipeline?: string): RunReport[] {
		if (!fs.existsSync(this.baseDir)) {
			return [];
		}
		const runs: RunReport[] = [];
		for (const entry of fs.readdirSync(this.baseDir, { withFileTypes: true })) {
			if (!entry.isDirectory()) {
				continue;
			}
			const recordPath = path.join(this.baseDir, entry.name, "run.json");
			if (!fs.existsSync(recordPath)) {
				continue;
			}
			const parsed = RunReportSchema.safeParse(JSON.parse(fs.readFileSync(recordPath, "utf-8")));
			if (!parsed.success) {
				continue;
			}
			if (pipeline === undefined || parsed.data.pipeline === pipeline) {
				runs.push(parsed.data);
			}
		}
		return runs.sort(
			(a, b) => b.runNumber - a.runNumber || b.createdAt.localeCompare(a.createdAt),
		);
	}

	nextRunNumber(pipeline: string): number {
		const latest = this.listRuns(pipeline)[0];
		return (latest?.runNumber ?? 0) + 1;
	}

	/** Deletes every run of `pipeline` beyond the newest `keep`; returns the purged run ids. */
	purge(pipeline: string, keep: number): string[] {
		const stale = this.listRuns(pipeline).slice(Math.max(keep, 0));
		for (const run of stale) {
			fs.rmSync(this.runDir(run.runId), { recursive: true, force: true });
		}
		return stale.map((run) => run.runId);
	}
}

export function getStepLogFileName(stepId: string, attempt: number): string {
	const normalized = sanitizePathSegment(stepId.toLowerCase(), "step");
	const hash = crypto.createHash("sha1").update(stepId).digest("hex").slice(0, 8);
	return `${normalized}-${hash}.${attempt}.log`;
}

export function createRunId(now = new Date()): string {
	const stamp = now.toISOString().replace(/[-:]/g, "").split(".")[0];
	const random = crypto.randomBytes(3).toString("hex");
	return `${stamp}-${random}`;
}
