import type { EngineRuntimeEvent } from "../../core/engine.js";
import type { HookReport, ResultStatus, RunStatus, SkipReason, StageReport, StageStatus } from "../../core/types.js";
import { LOG_TAIL_LINES } from "./constants.js";

export type StepRow = {
	id: string;
	name: string;
	status: "running" | ResultStatus;
	attempt: number;
	durationMs?: number;
	message?: string;
};

export type StageRow = {
	name: string;
	depth: number;
	kind: StageReport["kind"];
	status: StageStatus;
	durationMs?: number;
	skipReason?: SkipReason;
	steps: StepRow[];
};

export type RunViewState = {
	runId?: string;
	runNumber?: number;
	pipeline?: string;
	status: RunStatus;
	durationMs?: number;
	stages: StageRow[];
	hooks: HookReport[];
	purged: string[];
	output: string[];
	partial: string;
};

export const INITIAL_RUN_VIEW_STATE: RunViewState = {
	status: "pending",
	stages: [],
	hooks: [],
	purged: [],
	output: [],
	partial: "",
};

export function reduceRunView(state: RunViewState, event: EngineRuntimeEvent): RunViewState {
	switch (event.type) {
		case "run-started":
			return {
				...state,
				runId: event.runId,
				runNumber: event.runNumber,
				pipeline: event.pipeline,
				status: "running",
				stages: event.stages.map((stage) => ({
					name: stage.name,
					depth: stage.path.length - 1,
					kind: stage.kind,
					status: "pending",
					steps: [],
				})),
			};
		case "stage-started":
			return updateStage(state, event.stage, (stage) => ({ ...stage, status: "running" }));
		case "stage-skipped":
			return updateStage(state, event.stage, (stage) => ({
				...stage,
				status: "skipped",
				skipReason: event.reason,
			}));
		case "stage-finished":
			return updateStage(state, event.stage, (stage) => ({
				...stage,
				status: event.status,
				durationMs: event.durationMs,
			}));
		case "step-started":
			return updateStage(state, event.stage, (stage) => {
				const row: StepRow = { id: event.stepId, name: event.name, status: "running", attempt: event.attempt };
				const exists = stage.steps.some((step) => step.id === event.stepId);
				return {
					...stage,
					steps: exists
						? stage.steps.map((step) => (step.id === event.stepId ? row : step))
						: [...stage.steps, row],
				};
			});
		case "step-retry":
			return state;
		case "step-finished":
			return updateStage(state, event.stage, (stage) => ({
				...stage,
				steps: stage.steps.map((step) =>
					step.id === event.result.id
						? {
								...step,
								status: event.result.status,
								durationMs: event.result.durationMs,
								message: event.result.message,
							}
						: step,
				),
			}));
		case "hook-finished":
			return { ...state, hooks: [...state.hooks, event.hook] };
		case "run-finished":
			return { ...state, status: event.status, durationMs: event.durationMs };
		case "runs-purged":
			return { ...state, purged: [...state.purged, ...event.purged] };
	}
}

/** Keeps the last complete output lines; a trailing partial line is held back. */
export function appendOutput(state: RunViewState, chunk: string): RunViewState {
	const combined = state.partial + chunk;
	const pieces = combined.split(/\r?\n/);
	const partial = pieces.pop() ?? "";
	if (pieces.length === 0) {
		return { ...state, partial };
	}
	return { ...state, partial, output: [...state.output, ...pieces].slice(-LOG_TAIL_LINES) };
}

function updateStage(
	state: RunViewState,
	name: string,
	update: (stage: StageRow) => StageRow,
): RunViewState {
	return {
		...state,
		stages: state.stages.map((stage) => (stage.name === name ? update(stage) : stage)),
	};
}
