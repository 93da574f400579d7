export type PipelineDefinition = {
	name: string;
	source?: string;
	options: PipelineOptions;
	parameters: Record<string, ParameterDefinition>;
	environment: Record<string, string>;
	stages: StageDefinition[];
	post?: PostHooks;
};

export type PipelineOptions = {
	maxParallel: number;
	retention: number;
	timeoutMs?: number;
	stepTimeoutMs?: number;
	disableConcurrentRuns: boolean;
};

export type ParameterDefinition = {
	default?: string;
	description?: string;
	choices?: string[];
};

type StageCommon = {
	name: string;
	when?: Guard;
	post?: PostHooks;
	lock?: string;
	lockTimeoutMs?: number;
	bestEffort?: boolean;
};

export type StepsStage = StageCommon & {
	kind: "steps";
	steps: StepDefinition[];
};

export type ParallelStage = StageCommon & {
	kind: "parallel";
	branches: StageDefinition[];
};

export type StageDefinition = StepsStage | ParallelStage;

export type HookKind = "always" | "success" | "failure" | "unstable" | "aborted";

export type PostHooks = Partial<Record<HookKind, StepDefinition[]>>;

export type StepAction =
	| { type: "run"; command: string }
	| { type: "uses"; action: string; with: Record<string, string> };

export type StepDefinition = {
	id: string;
	name: string;
	action: StepAction;
	credentials: CredentialBinding[];
	retry: RetryPolicy;
	timeoutMs?: number;
	env?: Record<string, string>;
	dir?: string;
	unstableExitCodes?: number[];
};

export type RetryPolicy = {
	count: number;
	backoffMs?: number;
	factor?: number;
};

export type CredentialBinding =
	| { kind: "string"; credentialId: string; variable: string }
	| {
			kind: "usernamePassword";
			credentialId: string;
			usernameVariable: string;
			passwordVariable: string;
	  }
	| { kind: "file"; credentialId: string; variable: string };

export type Guard =
	| { param: string; equals: string }
	| { param: string; notEquals: string }
	| { param: string; in: string[] }
	| { allOf: Guard[] }
	| { anyOf: Guard[] }
	| { not: Guard };

export type RunStatus = "pending" | "running" | "success" | "failure" | "unstable" | "aborted";

export type ResultStatus = Extract<RunStatus, "success" | "failure" | "unstable" | "aborted">;

export type StageStatus = "pending" | "running" | "success" | "failure" | "unstable" | "skipped";

export type StageOutcome = Extract<StageStatus, "success" | "failure" | "unstable">;

export type FailureReason = "exit-code" | "timeout" | "aborted" | "credentials" | "action-error";

export type AttemptResult = {
	attempt: number;
	status: ResultStatus;
	startedAt: string;
	finishedAt: string;
	durationMs: number;
	exitCode?: number;
	reason?: FailureReason;
	message?: string;
	outputPath?: string;
};

export type ExecutionResult = {
	id: string;
	name: string;
	status: ResultStatus;
	startedAt: string;
	finishedAt: string;
	durationMs: number;
	exitCode?: number;
	reason?: FailureReason;
	message?: string;
	outputPath?: string;
	attempts: AttemptResult[];
};

export type SkipReason = "guard" | "upstream-failure" | "aborted";

export type StageReport = {
	name: string;
	path: string[];
	parent?: string;
	kind: StageDefinition["kind"];
	status: StageStatus;
	bestEffort: boolean;
	startedAt?: string;
	finishedAt?: string;
	durationMs?: number;
	skipReason?: SkipReason;
	lock?: string;
	message?: string;
	steps: ExecutionResult[];
};

export type HookReport = {
	scope: string;
	kind: HookKind;
	status: ResultStatus;
	results: ExecutionResult[];
};

export type RunReport = {
	schemaVersion: number;
	runId: string;
	runNumber: number;
	pipeline: string;
	parameters: Record<string, string>;
	status: RunStatus;
	createdAt: string;
	finishedAt?: string;
	durationMs?: number;
	abortReason?: "timeout" | "canceled";
	stages: StageReport[];
	hooks: HookReport[];
	failedStage?: string;
	failedStep?: string;
	artifactDir: string;
	logDir: string;
};
