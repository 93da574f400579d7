export type PipelineErrorCode =
	| "VALIDATION"
	| "STEP_FAILURE"
	| "TIMEOUT"
	| "CREDENTIAL_RESOLUTION"
	| "LOCK_CONTENTION"
	| "CONCURRENT_RUN"
	| "RUN_NOT_FOUND";

export class PipelineError extends Error {
	constructor(
		readonly code: PipelineErrorCode,
		message: string,
	) {
		super(message);
		this.name = new.target.name;
	}
}

export type ValidationIssue = {
	path: string;
	message: string;
};

export class ValidationError extends PipelineError {
	constructor(readonly issues: ValidationIssue[]) {
		super("VALIDATION", formatIssues(issues));
	}
}

export class StepFailure extends PipelineError {
	constructor(
		readonly stepId: string,
		message: string,
		readonly exitCode?: number,
	) {
		super("STEP_FAILURE", message);
	}
}

export class TimeoutError extends PipelineError {
	constructor(
		readonly scope: string,
		readonly timeoutMs: number,
	) {
		super("TIMEOUT", `${scope} exceeded ${timeoutMs}ms`);
	}
}

export class CredentialResolutionError extends PipelineError {
	constructor(
		readonly credentialId: string,
		detail: string,
	) {
		super("CREDENTIAL_RESOLUTION", `Cannot resolve credential "${credentialId}": ${detail}`);
	}
}

export class LockContentionError extends PipelineError {
	constructor(
		readonly resource: string,
		readonly waitedMs: number,
	) {
		super("LOCK_CONTENTION", `Lock "${resource}" still busy after ${waitedMs}ms`);
	}
}

export class ConcurrentRunError extends PipelineError {
	constructor(
		readonly pipeline: string,
		readonly holder?: string,
	) {
		super(
			"CONCURRENT_RUN",
			holder
				? `Pipeline "${pipeline}" already has a run in progress (${holder})`
				: `Pipeline "${pipeline}" already has a run in progress`,
		);
	}
}

export class RunNotFoundError extends PipelineError {
	constructor(readonly runId: string) {
		super("RUN_NOT_FOUND", `Run not found: ${runId}`);
	}
}

function formatIssues(issues: ValidationIssue[]): string {
	if (issues.length === 0) {
		return "Invalid pipeline definition";
	}
	const lines = issues.map((issue) => `  - ${issue.path}: ${issue.message}`);
	return `Invalid pipeline definition (${issues.length} issue(s)):\n${lines.join("\n")}`;
}
