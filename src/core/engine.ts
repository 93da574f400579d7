import pLimit, { type LimitFunction } from "p-limit";
import { createActionRegistry } from "../actions/factory.js";
import { createRunId, RUN_RECORD_SCHEMA_VERSION, type RunStore } from "../store/run-store.js";
import { SecretMasker } from "../utils/redact.js";
import type { ActionRegistry, OutputSource } from "./action.js";
import type { SecretStore } from "./credentials.js";
import { LockContentionError, TimeoutError } from "./errors.js";
import { runStep, type StepContext } from "./executor.js";
import { LockManager, type Release, RunGuard, runLockDir } from "./locks.js";
import type { ExecutionPlan, PlanNode } from "./resolver.js";
import type {
	AttemptResult,
	ExecutionResult,
	HookKind,
	HookReport,
	PostHooks,
	ResultStatus,
	RunReport,
	RunStatus,
	SkipReason,
	StageReport,
	StageOutcome,
	StageStatus,
	StepDefinition,
} from "./types.js";

export type EngineRuntimeEvent =
	| {
			type: "run-started";
			runId: string;
			runNumber: number;
			pipeline: string;
			stages: { name: string; path: string[]; kind: StageReport["kind"] }[];
			createdAt: string;
	  }
	| { type: "stage-started"; runId: string; stage: string; startedAt: string }
	| { type: "stage-skipped"; runId: string; stage: string; reason: SkipReason }
	| {
			type: "stage-finished";
			runId: string;
			stage: string;
			status: StageOutcome;
			durationMs: number;
	  }
	| { type: "step-started"; runId: string; stage: string; stepId: string; name: string; attempt: number }
	| {
			type: "step-retry";
			runId: string;
			stage: string;
			stepId: string;
			previous: AttemptResult;
			nextAttempt: number;
			delayMs: number;
	  }
	| { type: "step-finished"; runId: string; stage: string; result: ExecutionResult }
	| { type: "hook-finished"; runId: string; hook: HookReport }
	| { type: "run-finished"; runId: string; status: ResultStatus; finishedAt: string; durationMs: number }
	| { type: "runs-purged"; runId: string; purged: string[] };

export type EngineOptions = {
	workspace: string;
	stateDir: string;
	store: RunStore;
	secrets: SecretStore;
	actions?: ActionRegistry;
	locks?: LockManager;
	runGuard?: RunGuard;
	baseEnv?: Record<string, string>;
	defaultStepTimeoutMs?: number;
	signal?: AbortSignal;
	onEvent?: (event: EngineRuntimeEvent) => void;
	onOutput?: (stepId: string, text: string, source: OutputSource) => void;
};

export type RunHandle = {
	runId: string;
	runNumber: number;
	report: Promise<RunReport>;
	cancel: () => void;
};

type RunState = {
	report: RunReport;
	stageReports: Map<string, StageReport>;
	masker: SecretMasker;
	variables: Readonly<Record<string, string>>;
	signal: AbortSignal;
	limit: LimitFunction;
	stepTimeoutMs?: number;
	halted: boolean;
};

/**
 * Interprets an execution plan. Stages run in order; parallel groups fan out
 * and join before the next stage starts. Every status change is persisted to
 * the run store so other processes can follow the run.
 */
export class PipelineEngine {
	private readonly actions: ActionRegistry;
	private readonly locks: LockManager;
	private readonly runGuard: RunGuard;

	constructor(private readonly options: EngineOptions) {
		this.actions = options.actions ?? createActionRegistry();
		this.locks = options.locks ?? new LockManager();
		this.runGuard = options.runGuard ?? new RunGuard(runLockDir(options.stateDir));
	}

	async run(plan: ExecutionPlan): Promise<RunReport> {
		return this.start(plan).report;
	}

	/**
	 * Claims the pipeline, records the run and starts executing it. Throws
	 * ConcurrentRunError synchronously when another run of the same pipeline
	 * is in flight.
	 */
	start(plan: ExecutionPlan): RunHandle {
		const { pipeline } = plan;
		const runId = createRunId();
		const releaseRun = pipeline.options.disableConcurrentRuns
			? this.runGuard.acquire(pipeline.name, runId)
			: () => undefined;

		let report: RunReport;
		try {
			report = this.createReport(plan, runId);
		} catch (error) {
			releaseRun();
			throw error;
		}
		const { runNumber } = report;

		const controller = new AbortController();
		const cancel = (): void => controller.abort(new Error("run canceled"));
		const external = this.options.signal;
		if (external?.aborted) {
			cancel();
		} else {
			external?.addEventListener("abort", cancel, { once: true });
		}

		const execute = async (): Promise<RunReport> => {
			try {
				return await this.execute(plan, report, controller);
			} finally {
				external?.removeEventListener("abort", cancel);
				releaseRun();
			}
		};

		return { runId, runNumber, report: execute(), cancel };
	}

	private createReport(plan: ExecutionPlan, runId: string): RunReport {
		const { store } = this.options;
		const report: RunReport = {
			schemaVersion: RUN_RECORD_SCHEMA_VERSION,
			runId,
			runNumber: store.nextRunNumber(plan.pipeline.name),
			pipeline: plan.pipeline.name,
			parameters: { ...plan.parameters },
			status: "pending",
			createdAt: new Date().toISOString(),
			stages: flattenStages(plan.stages),
			hooks: [],
			artifactDir: store.createArtifactsDir(runId),
			logDir: store.createLogsDir(runId),
		};
		store.writeRun(report);
		return report;
	}

	private async execute(
		plan: ExecutionPlan,
		report: RunReport,
		controller: AbortController,
	): Promise<RunReport> {
		const { pipeline } = plan;
		const startedAt = Date.now();
		const state: RunState = {
			report,
			stageReports: new Map(report.stages.map((stage) => [stage.name, stage])),
			masker: new SecretMasker(),
			variables: Object.freeze({
				...pipeline.environment,
				...plan.parameters,
				RUN_ID: report.runId,
				RUN_NUMBER: String(report.runNumber),
				PIPELINE_NAME: pipeline.name,
				WORKSPACE: this.options.workspace,
			}),
			signal: controller.signal,
			limit: pLimit(pipeline.options.maxParallel),
			stepTimeoutMs: pipeline.options.stepTimeoutMs ?? this.options.defaultStepTimeoutMs,
			halted: false,
		};

		const timeoutMs = pipeline.options.timeoutMs;
		const timer =
			timeoutMs !== undefined
				? setTimeout(() => controller.abort(new TimeoutError("run", timeoutMs)), timeoutMs)
				: undefined;

		report.status = "running";
		this.persist(report);
		this.emit({
			type: "run-started",
			runId: report.runId,
			runNumber: report.runNumber,
			pipeline: pipeline.name,
			stages: report.stages.map((stage) => ({ name: stage.name, path: stage.path, kind: stage.kind })),
			createdAt: report.createdAt,
		});

		try {
			await this.runSequence(plan.stages, state);
		} finally {
			if (timer) {
				clearTimeout(timer);
			}
		}

		const status = this.finalStatus(state);
		if (status === "aborted") {
			report.abortReason = controller.signal.reason instanceof TimeoutError ? "timeout" : "canceled";
		}

		if (pipeline.post) {
			// Pipeline hooks get their own signal: they run even after an abort.
			await this.runHooks(pipeline.post, "pipeline", status, { ...state, signal: new AbortController().signal });
		}

		const finishedAt = new Date();
		report.status = status;
		report.finishedAt = finishedAt.toISOString();
		report.durationMs = finishedAt.getTime() - startedAt;
		this.persist(report);
		this.emit({
			type: "run-finished",
			runId: report.runId,
			status,
			finishedAt: report.finishedAt,
			durationMs: report.durationMs,
		});

		const purged = this.options.store.purge(pipeline.name, pipeline.options.retention);
		if (purged.length > 0) {
			this.emit({ type: "runs-purged", runId: report.runId, purged });
		}
		return report;
	}

	private async runSequence(nodes: readonly PlanNode[], state: RunState): Promise<void> {
		for (const node of nodes) {
			if (state.signal.aborted) {
				this.skipTree(node, "aborted", state);
				continue;
			}
			if (state.halted) {
				this.skipTree(node, "upstream-failure", state);
				continue;
			}
			if (node.skip) {
				this.skipTree(node, "guard", state);
				continue;
			}
			const status = await this.runStage(node, state, false);
			if (status === "failure" && !node.stage.bestEffort) {
				state.halted = true;
			}
		}
	}

	private async runStage(
		node: PlanNode,
		state: RunState,
		inParallel: boolean,
	): Promise<StageOutcome> {
		const { stage } = node;
		const stageReport = this.stageReport(state, stage.name);
		const startedAt = new Date();
		stageReport.status = "running";
		stageReport.startedAt = startedAt.toISOString();
		this.persist(state.report);
		this.emit({
			type: "stage-started",
			runId: state.report.runId,
			stage: stage.name,
			startedAt: stageReport.startedAt,
		});

		let status: StageOutcome;
		let release: Release | null = null;
		try {
			if (stage.lock) {
				release = await this.locks.acquire(stage.lock, {
					signal: state.signal,
					timeoutMs: stage.lockTimeoutMs,
				});
			}
			if (stage.kind === "parallel") {
				status = await this.runParallel(node, state);
			} else if (inParallel) {
				status = await state.limit(() => this.runSteps(stage.name, stage.steps, state));
			} else {
				status = await this.runSteps(stage.name, stage.steps, state);
			}
		} catch (error) {
			if (error instanceof LockContentionError) {
				stageReport.message = error.message;
				state.report.failedStage ??= stage.name;
			} else if (!state.signal.aborted) {
				throw error;
			}
			// Lock wait timed out, or the run was aborted while waiting.
			status = "failure";
		} finally {
			release?.();
		}

		const finishedAt = new Date();
		stageReport.status = status;
		stageReport.finishedAt = finishedAt.toISOString();
		stageReport.durationMs = finishedAt.getTime() - startedAt.getTime();
		this.persist(state.report);
		this.emit({
			type: "stage-finished",
			runId: state.report.runId,
			stage: stage.name,
			status,
			durationMs: stageReport.durationMs,
		});

		if (stage.post && !state.signal.aborted) {
			await this.runHooks(stage.post, stage.name, status, state);
		}
		return status;
	}

	private async runParallel(
		node: PlanNode,
		state: RunState,
	): Promise<StageOutcome> {
		// Branches never cancel each other; the group waits for all of them.
		const outcomes = await Promise.all(
			node.children.map(async (child) => {
				if (child.skip) {
					this.skipTree(child, "guard", state);
					return "skipped" as const;
				}
				if (state.signal.aborted) {
					this.skipTree(child, "aborted", state);
					return "failure" as const;
				}
				const status = await this.runStage(child, state, true);
				return status === "failure" && child.stage.bestEffort ? "unstable" : status;
			}),
		);
		return aggregate(outcomes);
	}

	private async runSteps(
		stageName: string,
		steps: readonly StepDefinition[],
		state: RunState,
	): Promise<StageOutcome> {
		const stageReport = this.stageReport(state, stageName);
		const statuses: StageStatus[] = [];
		for (const step of steps) {
			const result = await runStep(step, this.stepContext(stageName, state, state.signal));
			stageReport.steps.push(result);
			statuses.push(result.status === "aborted" ? "failure" : result.status);
			if ((result.status === "failure" || result.status === "aborted") && !state.report.failedStep) {
				state.report.failedStage = stageName;
				state.report.failedStep = step.id;
			}
			this.persist(state.report);
			this.emit({ type: "step-finished", runId: state.report.runId, stage: stageName, result });
			if (result.status === "failure" || result.status === "aborted") {
				break;
			}
		}
		return aggregate(statuses);
	}

	/**
	 * Runs `always`, then the hook matching the outcome. Hook failures are
	 * reported but never change the outcome.
	 */
	private async runHooks(
		post: PostHooks,
		scope: string,
		outcome: StageStatus | ResultStatus,
		state: RunState,
	): Promise<void> {
		const kinds: HookKind[] = ["always"];
		if (
			outcome === "success" ||
			outcome === "failure" ||
			outcome === "unstable" ||
			outcome === "aborted"
		) {
			kinds.push(outcome);
		}
		for (const kind of kinds) {
			const steps = post[kind];
			if (!steps || steps.length === 0) {
				continue;
			}
			const results: ExecutionResult[] = [];
			for (const step of steps) {
				const result = await runStep(step, this.stepContext(scope, state, state.signal));
				results.push(result);
				if (result.status === "failure" || result.status === "aborted") {
					break;
				}
			}
			const hook: HookReport = {
				scope,
				kind,
				status: aggregateResults(results),
				results,
			};
			state.report.hooks.push(hook);
			this.persist(state.report);
			this.emit({ type: "hook-finished", runId: state.report.runId, hook });
		}
	}

	private stepContext(stageName: string, state: RunState, signal: AbortSignal): StepContext {
		const { report } = state;
		return {
			runId: report.runId,
			stageName,
			variables: state.variables,
			baseEnv: this.options.baseEnv ?? processEnv(),
			workspace: this.options.workspace,
			stateDir: this.options.stateDir,
			artifactDir: report.artifactDir,
			defaultTimeoutMs: state.stepTimeoutMs,
			signal,
			actions: this.actions,
			secrets: this.options.secrets,
			masker: state.masker,
			logFileFor: (stepId, attempt) => this.options.store.logFilePath(report.runId, stepId, attempt),
			onOutput: this.options.onOutput,
			onAttemptStarted: (step, attempt) =>
				this.emit({
					type: "step-started",
					runId: report.runId,
					stage: stageName,
					stepId: step.id,
					name: step.name,
					attempt,
				}),
			onRetry: (step, previous, nextAttempt, delayMs) =>
				this.emit({
					type: "step-retry",
					runId: report.runId,
					stage: stageName,
					stepId: step.id,
					previous,
					nextAttempt,
					delayMs,
				}),
		};
	}

	private skipTree(node: PlanNode, reason: SkipReason, state: RunState): void {
		const stageReport = this.stageReport(state, node.stage.name);
		if (stageReport.status !== "pending") {
			return;
		}
		stageReport.status = "skipped";
		stageReport.skipReason = reason;
		this.emit({ type: "stage-skipped", runId: state.report.runId, stage: node.stage.name, reason });
		for (const child of node.children) {
			this.skipTree(child, reason, state);
		}
		this.persist(state.report);
	}

	private finalStatus(state: RunState): ResultStatus {
		if (state.signal.aborted) {
			return "aborted";
		}
		if (state.halted) {
			return "failure";
		}
		const unstable = state.report.stages.some(
			(stage) => stage.status === "unstable" || (stage.status === "failure" && stage.bestEffort),
		);
		return unstable ? "unstable" : "success";
	}

	private stageReport(state: RunState, name: string): StageReport {
		const stageReport = state.stageReports.get(name);
		if (!stageReport) {
			throw new Error(`Stage "${name}" is not part of run ${state.report.runId}`);
		}
		return stageReport;
	}

	private persist(report: RunReport): void {
		this.options.store.writeRun(report);
	}

	private emit(event: EngineRuntimeEvent): void {
		this.options.onEvent?.(event);
	}
}

function flattenStages(nodes: readonly PlanNode[], parent?: string): StageReport[] {
	return nodes.flatMap((node) => {
		const stageReport: StageReport = {
			name: node.stage.name,
			path: [...node.path],
			kind: node.stage.kind,
			status: "pending",
			bestEffort: node.stage.bestEffort ?? false,
			steps: [],
		};
		if (parent !== undefined) {
			stageReport.parent = parent;
		}
		if (node.stage.lock !== undefined) {
			stageReport.lock = node.stage.lock;
		}
		return [stageReport, ...flattenStages(node.children, node.stage.name)];
	});
}

function aggregate(
	statuses: readonly StageStatus[],
): StageOutcome {
	if (statuses.includes("failure")) {
		return "failure";
	}
	if (statuses.includes("unstable")) {
		return "unstable";
	}
	return "success";
}

function aggregateResults(results: readonly ExecutionResult[]): ResultStatus {
	if (results.some((result) => result.status === "aborted")) {
		return "aborted";
	}
	if (results.some((result) => result.status === "failure")) {
		return "failure";
	}
	if (results.some((result) => result.status === "unstable")) {
		return "unstable";
	}
	return "success";
}

function processEnv(): Record<string, string> {
	const env: Record<string, string> = {};
	for (const [key, value] of Object.entries(process.env)) {
		if (value !== undefined) {
			env[key] = value;
		}
	}
	return env;
}

export function isTerminal(status: RunStatus): boolean {
	return status !== "pending" && status !== "running";
}
