import { MAX_TIMER_MS } from "../utils/duration.js";
import { deepFreeze } from "../utils/freeze.js";
import { templateNames } from "../utils/template.js";
import { ValidationError, type ValidationIssue } from "./errors.js";
import { evaluateGuard, guardParameters } from "./guard.js";
import type {
	PipelineDefinition,
	PostHooks,
	StageDefinition,
	StepDefinition,
} from "./types.js";

export const BUILTIN_VARIABLES = [
	"RUN_ID",
	"RUN_NUMBER",
	"PIPELINE_NAME",
	"STAGE_NAME",
	"WORKSPACE",
] as const;

export type ResolvedPipeline = {
	readonly definition: Readonly<PipelineDefinition>;
	readonly stageNames: readonly string[];
};

export type PlanNode = {
	readonly stage: StageDefinition;
	readonly path: readonly string[];
	readonly skip: boolean;
	readonly children: readonly PlanNode[];
};

export type ExecutionPlan = {
	readonly pipeline: Readonly<PipelineDefinition>;
	readonly parameters: Readonly<Record<string, string>>;
	readonly stages: readonly PlanNode[];
};

export type ResolveOptions = {
	actions?: readonly string[];
};

type Scope = {
	issues: ValidationIssue[];
	names: Map<string, number>;
	stepIds: Map<string, number>;
	parameters: Set<string>;
	variables: Set<string>;
	actions?: ReadonlySet<string>;
};

/**
 * Validates a definition and returns a deep-frozen copy of it. Every problem
 * found is reported in a single ValidationError.
 */
export function resolvePipeline(
	definition: PipelineDefinition,
	options: ResolveOptions = {},
): ResolvedPipeline {
	const scope: Scope = {
		issues: [],
		names: new Map(),
		stepIds: new Map(),
		parameters: new Set(Object.keys(definition.parameters)),
		variables: new Set([
			...Object.keys(definition.parameters),
			...Object.keys(definition.environment),
			...BUILTIN_VARIABLES,
		]),
		actions: options.actions ? new Set(options.actions) : undefined,
	};

	checkOptions(definition, scope.issues);
	checkParameters(definition, scope.issues);

	if (definition.stages.length === 0) {
		scope.issues.push({ path: "stages", message: "pipeline has no stages" });
	}
	definition.stages.forEach((stage, index) => {
		visitStage(stage, `stages.${index}`, new Set(), new Set(), scope);
	});
	if (definition.post) {
		checkPost(definition.post, "post", scope);
	}

	for (const [name, count] of scope.names) {
		if (count > 1) {
			scope.issues.push({
				path: "stages",
				message: `duplicate stage name "${name}" (${count} occurrences)`,
			});
		}
	}
	// Step ids key the log files, so two steps may never share one.
	for (const [id, count] of scope.stepIds) {
		if (count > 1) {
			scope.issues.push({
				path: "stages",
				message: `duplicate step id "${id}" (${count} occurrences)`,
			});
		}
	}

	if (scope.issues.length > 0) {
		throw new ValidationError(scope.issues);
	}

	return deepFreeze({
		definition: structuredClone(definition),
		stageNames: Array.from(scope.names.keys()),
	});
}

function checkOptions(definition: PipelineDefinition, issues: ValidationIssue[]): void {
	const { maxParallel, retention, timeoutMs, stepTimeoutMs } = definition.options;
	if (!Number.isInteger(maxParallel) || maxParallel < 1) {
		issues.push({ path: "options.maxParallel", message: "must be a positive integer" });
	}
	if (!Number.isInteger(retention) || retention < 1) {
		issues.push({ path: "options.retention", message: "must be a positive integer" });
	}
	checkTimeout(timeoutMs, "options.timeout", issues);
	checkTimeout(stepTimeoutMs, "options.stepTimeout", issues);
}

function checkParameters(definition: PipelineDefinition, issues: ValidationIssue[]): void {
	for (const [name, parameter] of Object.entries(definition.parameters)) {
		if (
			parameter.choices &&
			parameter.default !== undefined &&
			!parameter.choices.includes(parameter.default)
		) {
			issues.push({
				path: `parameters.${name}`,
				message: `default "${parameter.default}" is not one of the choices`,
			});
		}
	}
}

function visitStage(
	stage: StageDefinition,
	at: string,
	ancestors: Set<StageDefinition>,
	heldLocks: ReadonlySet<string>,
	scope: Scope,
): void {
	if (ancestors.has(stage)) {
		scope.issues.push({
			path: at,
			message: `stage "${stage.name}" is nested inside itself`,
		});
		return;
	}

	if (stage.name.trim().length === 0) {
		scope.issues.push({ path: `${at}.name`, message: "stage name is empty" });
	}
	scope.names.set(stage.name, (scope.names.get(stage.name) ?? 0) + 1);

	if (stage.lock !== undefined && stage.lock.trim().length === 0) {
		scope.issues.push({ path: `${at}.lock`, message: "lock name is empty" });
	}
	// Locks are not re-entrant: a branch waiting on its parent's lock never wakes.
	if (stage.lock !== undefined && heldLocks.has(stage.lock)) {
		scope.issues.push({
			path: `${at}.lock`,
			message: `lock "${stage.lock}" is already held by an enclosing stage`,
		});
	}
	if (stage.lockTimeoutMs !== undefined && stage.lock === undefined) {
		scope.issues.push({ path: `${at}.lockTimeout`, message: "lockTimeout needs a lock" });
	}
	checkTimeout(stage.lockTimeoutMs, `${at}.lockTimeout`, scope.issues);

	if (stage.when) {
		for (const param of guardParameters(stage.when)) {
			if (!scope.parameters.has(param)) {
				scope.issues.push({
					path: `${at}.when`,
					message: `guard references undefined parameter "${param}"`,
				});
			}
		}
	}

	if (stage.post) {
		checkPost(stage.post, `${at}.post`, scope);
	}

	if (stage.kind === "parallel") {
		if (stage.branches.length === 0) {
			scope.issues.push({ path: `${at}.parallel`, message: "parallel group has no branches" });
		}
		const nested = new Set(ancestors).add(stage);
		const locks = stage.lock !== undefined ? new Set(heldLocks).add(stage.lock) : heldLocks;
		stage.branches.forEach((branch, index) => {
			visitStage(branch, `${at}.parallel.${index}`, nested, locks, scope);
		});
		return;
	}

	if (stage.steps.length === 0) {
		scope.issues.push({ path: `${at}.steps`, message: "stage has no steps" });
	}
	stage.steps.forEach((step, index) => {
		checkStep(step, `${at}.steps.${index}`, scope);
	});
}

function checkPost(post: PostHooks, at: string, scope: Scope): void {
	for (const [kind, steps] of Object.entries(post)) {
		steps?.forEach((step, index) => {
			checkStep(step, `${at}.${kind}.${index}`, scope);
		});
	}
}

function checkStep(step: StepDefinition, at: string, scope: Scope): void {
	const { issues } = scope;
	scope.stepIds.set(step.id, (scope.stepIds.get(step.id) ?? 0) + 1);
	const { count, backoffMs, factor } = step.retry;
	if (!Number.isInteger(count) || count < 0) {
		issues.push({ path: `${at}.retry`, message: "retry count must be a non-negative integer" });
	}
	if (backoffMs !== undefined && (!Number.isFinite(backoffMs) || backoffMs < 0)) {
		issues.push({ path: `${at}.retry.backoff`, message: "backoff must be a non-negative duration" });
	} else if (backoffMs !== undefined && backoffMs > MAX_TIMER_MS) {
		issues.push({ path: `${at}.retry.backoff`, message: `backoff must not exceed ${MAX_TIMER_MS}ms` });
	}
	if (factor !== undefined && (!Number.isFinite(factor) || factor < 1)) {
		issues.push({ path: `${at}.retry.factor`, message: "backoff factor must be at least 1" });
	}
	checkTimeout(step.timeoutMs, `${at}.timeout`, issues);

	const variables = new Set([...scope.variables, ...Object.keys(step.env ?? {})]);
	const templates =
		step.action.type === "run" ? [step.action.command] : Object.values(step.action.with);
	if (step.action.type === "run" && step.action.command.trim().length === 0) {
		issues.push({ path: `${at}.run`, message: "command is empty" });
	}
	if (step.action.type === "uses" && scope.actions && !scope.actions.has(step.action.action)) {
		issues.push({ path: `${at}.uses`, message: `unknown action "${step.action.action}"` });
	}
	for (const template of templates) {
		for (const name of templateNames(template)) {
			if (!variables.has(name)) {
				issues.push({ path: at, message: `template references unknown name "${name}"` });
			}
		}
	}

	const exposed = new Set<string>();
	for (const binding of step.credentials) {
		if (binding.credentialId.trim().length === 0) {
			issues.push({ path: `${at}.credentials`, message: "credential id is empty" });
		}
		const names =
			binding.kind === "usernamePassword"
				? [binding.usernameVariable, binding.passwordVariable]
				: [binding.variable];
		for (const name of names) {
			if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(name)) {
				issues.push({ path: `${at}.credentials`, message: `invalid variable name "${name}"` });
			} else if (exposed.has(name)) {
				issues.push({ path: `${at}.credentials`, message: `variable "${name}" bound twice` });
			}
			exposed.add(name);
		}
	}
}

function checkTimeout(value: number | undefined, at: string, issues: ValidationIssue[]): void {
	if (value === undefined) {
		return;
	}
	if (!Number.isFinite(value) || value <= 0) {
		issues.push({ path: at, message: "timeout must be a positive finite duration" });
	} else if (value > MAX_TIMER_MS) {
		issues.push({ path: at, message: `timeout must not exceed ${MAX_TIMER_MS}ms` });
	}
}

/**
 * Binds run parameters to a resolved pipeline and evaluates every stage guard
 * up front, so the engine only ever sees a fixed tree of scheduled and
 * skipped stages.
 */
export function planRun(
	resolved: ResolvedPipeline,
	provided: Readonly<Record<string, string>> = {},
): ExecutionPlan {
	const { definition } = resolved;
	const issues: ValidationIssue[] = [];
	const parameters: Record<string, string> = {};

	for (const name of Object.keys(provided)) {
		if (!Object.hasOwn(definition.parameters, name)) {
			issues.push({ path: `parameters.${name}`, message: "unknown parameter" });
		}
	}
	for (const [name, parameter] of Object.entries(definition.parameters)) {
		const value = provided[name] ?? parameter.default;
		if (value === undefined) {
			issues.push({ path: `parameters.${name}`, message: "no value given and no default" });
			continue;
		}
		if (parameter.choices && !parameter.choices.includes(value)) {
			issues.push({
				path: `parameters.${name}`,
				message: `"${value}" is not one of: ${parameter.choices.join(", ")}`,
			});
			continue;
		}
		parameters[name] = value;
	}
	if (issues.length > 0) {
		throw new ValidationError(issues);
	}

	const build = (stage: StageDefinition, parent: readonly string[], parentSkipped: boolean): PlanNode => {
		const path = [...parent, stage.name];
		const skip = parentSkipped || (stage.when ? !evaluateGuard(stage.when, parameters) : false);
		const children =
			stage.kind === "parallel" ? stage.branches.map((branch) => build(branch, path, skip)) : [];
		return { stage, path, skip, children };
	};

	return deepFreeze({
		pipeline: definition,
		parameters,
		stages: definition.stages.map((stage) => build(stage, [], false)),
	});
}
