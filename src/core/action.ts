export type OutputSource = "stdout" | "stderr";

export type ActionRequest = {
	stepId: string;
	/** Rendered command for `run` steps; absent for typed actions. */
	command?: string;
	inputs: Readonly<Record<string, string>>;
	env: Readonly<Record<string, string>>;
	cwd: string;
	workspace: string;
	stateDir: string;
	artifactDir: string;
	signal: AbortSignal;
	write: (chunk: string, source: OutputSource) => void;
};

export type ActionOutcome = {
	exitCode: number;
};

/**
 * One external action. Implementations must settle only once everything they
 * started has finished, and must stop promptly once `signal` aborts.
 */
export interface ActionRunner {
	readonly id: string;
	run(request: ActionRequest): Promise<ActionOutcome>;
}

export interface ActionRegistry {
	get(id: string): ActionRunner | undefined;
	ids(): string[];
}
