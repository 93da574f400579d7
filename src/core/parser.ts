import fs from "node:fs";
import YAML from "yaml";
import { z } from "zod";
import { parseDuration } from "../utils/duration.js";
import { ValidationError, type ValidationIssue } from "./errors.js";
import type {
	CredentialBinding,
	Guard,
	HookKind,
	PipelineDefinition,
	PipelineOptions,
	PostHooks,
	StageDefinition,
	StepDefinition,
} from "./types.js";

type DurationYaml = number | string;

type CredentialYaml =
	| { string: string; variable: string }
	| { usernamePassword: string; usernameVariable: string; passwordVariable: string }
	| { file: string; variable: string };

type StepYaml = {
	id?: string;
	name?: string;
	run?: string;
	uses?: string;
	with?: Record<string, string | number | boolean>;
	credentials?: CredentialYaml[];
	retry?: number | { count: number; backoff?: DurationYaml; factor?: number };
	timeout?: DurationYaml;
	env?: Record<string, string>;
	dir?: string;
	unstableExitCodes?: number[];
};

type PostYaml = Partial<Record<HookKind, StepYaml[]>>;

type StageYaml = {
	name: string;
	steps?: StepYaml[];
	parallel?: StageYaml[];
	when?: Guard;
	post?: PostYaml;
	lock?: string;
	lockTimeout?: DurationYaml;
	bestEffort?: boolean;
};

const HOOK_KINDS: HookKind[] = ["always", "success", "failure", "unstable", "aborted"];

const DurationSchema = z.union([z.number(), z.string()]);

const GuardSchema: z.ZodType<Guard> = z.lazy(() =>
	z.union([
		z.object({ param: z.string(), equals: z.string() }).strict(),
		z.object({ param: z.string(), notEquals: z.string() }).strict(),
		z.object({ param: z.string(), in: z.array(z.string()) }).strict(),
		z.object({ allOf: z.array(GuardSchema) }).strict(),
		z.object({ anyOf: z.array(GuardSchema) }).strict(),
		z.object({ not: GuardSchema }).strict(),
	]),
);

const CredentialSchema: z.ZodType<CredentialYaml> = z.union([
	z.object({ string: z.string(), variable: z.string() }).strict(),
	z
		.object({
			usernamePassword: z.string(),
			usernameVariable: z.string(),
			passwordVariable: z.string(),
		})
		.strict(),
	z.object({ file: z.string(), variable: z.string() }).strict(),
]);

const StepSchema: z.ZodType<StepYaml> = z
	.object({
		id: z.string().optional(),
		name: z.string().optional(),
		run: z.string().optional(),
		uses: z.string().optional(),
		with: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
		credentials: z.array(CredentialSchema).optional(),
		retry: z
			.union([
				z.number(),
				z
					.object({
						count: z.number(),
						backoff: DurationSchema.optional(),
						factor: z.number().optional(),
					})
					.strict(),
			])
			.optional(),
		timeout: DurationSchema.optional(),
		env: z.record(z.string()).optional(),
		dir: z.string().optional(),
		unstableExitCodes: z.array(z.number().int()).optional(),
	})
	.strict()
	.refine((step) => (step.run === undefined) !== (step.uses === undefined), {
		message: "step needs exactly one of `run` or `uses`",
	});

const PostSchema: z.ZodType<PostYaml> = z
	.object({
		always: z.array(StepSchema).optional(),
		success: z.array(StepSchema).optional(),
		failure: z.array(StepSchema).optional(),
		unstable: z.array(StepSchema).optional(),
		aborted: z.array(StepSchema).optional(),
	})
	.strict();

const StageSchema: z.ZodType<StageYaml> = z.lazy(() =>
	z
		.object({
			name: z.string(),
			steps: z.array(StepSchema).optional(),
			parallel: z.array(StageSchema).optional(),
			when: GuardSchema.optional(),
			post: PostSchema.optional(),
			lock: z.string().optional(),
			lockTimeout: DurationSchema.optional(),
			bestEffort: z.boolean().optional(),
		})
		.strict()
		.refine((stage) => (stage.steps === undefined) !== (stage.parallel === undefined), {
			message: "stage needs exactly one of `steps` or `parallel`",
		}),
);

export const PipelineSchema = z
	.object({
		name: z.string().min(1),
		options: z
			.object({
				maxParallel: z.number().int().positive().optional(),
				retention: z.number().int().optional(),
				timeout: DurationSchema.optional(),
				stepTimeout: DurationSchema.optional(),
				disableConcurrentRuns: z.boolean().optional(),
			})
			.strict()
			.default({}),
		parameters: z
			.record(
				z
					.object({
						default: z.string().optional(),
						description: z.string().optional(),
						choices: z.array(z.string()).optional(),
					})
					.strict(),
			)
			.default({}),
		environment: z.record(z.string()).default({}),
		stages: z.array(StageSchema),
		post: PostSchema.optional(),
	})
	.strict();

export type PipelineYaml = z.infer<typeof PipelineSchema>;

export const DEFAULT_PIPELINE_OPTIONS: PipelineOptions = {
	maxParallel: 4,
	retention: 10,
	disableConcurrentRuns: true,
};

export function loadPipeline(
	pipelinePath: string,
	defaults: Partial<PipelineOptions> = {},
): PipelineDefinition {
	const raw = fs.readFileSync(pipelinePath, "utf-8");
	return parsePipeline(raw, pipelinePath, defaults);
}

export function parsePipeline(
	text: string,
	source = "<inline>",
	defaults: Partial<PipelineOptions> = {},
): PipelineDefinition {
	const doc = YAML.parseDocument(text);
	if (doc.errors.length > 0) {
		const error = doc.errors[0];
		const line = error.linePos?.[0]?.line ?? 0;
		const col = error.linePos?.[0]?.col ?? 0;
		throw new Error(`${source}:${line}:${col} ${error.message}`);
	}

	const parsed = PipelineSchema.safeParse(doc.toJSON());
	if (!parsed.success) {
		throw new ValidationError(
			parsed.error.issues.map((issue) => ({
				path: issue.path.length > 0 ? issue.path.join(".") : "(root)",
				message: issue.message,
			})),
		);
	}

	const issues: ValidationIssue[] = [];
	const definition = toDefinition(parsed.data, source, defaults, issues);
	if (issues.length > 0) {
		throw new ValidationError(issues);
	}
	return definition;
}

function toDefinition(
	data: PipelineYaml,
	source: string,
	defaults: Partial<PipelineOptions>,
	issues: ValidationIssue[],
): PipelineDefinition {
	const options: PipelineOptions = {
		...DEFAULT_PIPELINE_OPTIONS,
		...defaults,
	};
	if (data.options.maxParallel !== undefined) {
		options.maxParallel = data.options.maxParallel;
	}
	if (data.options.retention !== undefined) {
		options.retention = data.options.retention;
	}
	if (data.options.disableConcurrentRuns !== undefined) {
		options.disableConcurrentRuns = data.options.disableConcurrentRuns;
	}
	const timeoutMs = toDuration(data.options.timeout, "options.timeout", issues);
	if (timeoutMs !== undefined) {
		options.timeoutMs = timeoutMs;
	}
	const stepTimeoutMs = toDuration(data.options.stepTimeout, "options.stepTimeout", issues);
	if (stepTimeoutMs !== undefined) {
		options.stepTimeoutMs = stepTimeoutMs;
	}

	const definition: PipelineDefinition = {
		name: data.name,
		source,
		options,
		parameters: data.parameters,
		environment: data.environment,
		stages: data.stages.map((stage, index) => toStage(stage, `stages.${index}`, issues)),
	};
	if (data.post) {
		definition.post = toPost(data.post, "pipeline", "post", issues);
	}
	return definition;
}

function toStage(stage: StageYaml, at: string, issues: ValidationIssue[]): StageDefinition {
	const lockTimeoutMs = toDuration(stage.lockTimeout, `${at}.lockTimeout`, issues);
	const common = {
		name: stage.name,
		...(stage.when ? { when: stage.when } : {}),
		...(stage.post ? { post: toPost(stage.post, stage.name, `${at}.post`, issues) } : {}),
		...(stage.lock !== undefined ? { lock: stage.lock } : {}),
		...(lockTimeoutMs !== undefined ? { lockTimeoutMs } : {}),
		...(stage.bestEffort !== undefined ? { bestEffort: stage.bestEffort } : {}),
	};
	if (stage.parallel) {
		return {
			...common,
			kind: "parallel",
			branches: stage.parallel.map((branch, index) =>
				toStage(branch, `${at}.parallel.${index}`, issues),
			),
		};
	}
	return {
		...common,
		kind: "steps",
		steps: (stage.steps ?? []).map((step, index) =>
			toStep(step, `${stage.name}#${index + 1}`, `${at}.steps.${index}`, issues),
		),
	};
}

function toPost(post: PostYaml, scope: string, at: string, issues: ValidationIssue[]): PostHooks {
	const hooks: PostHooks = {};
	for (const kind of HOOK_KINDS) {
		const steps = post[kind];
		if (!steps) {
			continue;
		}
		hooks[kind] = steps.map((step, index) =>
			toStep(step, `${scope}/post-${kind}#${index + 1}`, `${at}.${kind}.${index}`, issues),
		);
	}
	return hooks;
}

function toStep(
	step: StepYaml,
	fallbackId: string,
	at: string,
	issues: ValidationIssue[],
): StepDefinition {
	const action: StepDefinition["action"] =
		step.uses !== undefined
			? { type: "uses", action: step.uses, with: stringifyInputs(step.with ?? {}) }
			: { type: "run", command: step.run ?? "" };

	const definition: StepDefinition = {
		id: step.id ?? fallbackId,
		name: step.name ?? (action.type === "run" ? firstLine(action.command) : action.action),
		action,
		credentials: (step.credentials ?? []).map(toBinding),
		retry: toRetry(step.retry, `${at}.retry`, issues),
	};
	const timeoutMs = toDuration(step.timeout, `${at}.timeout`, issues);
	if (timeoutMs !== undefined) {
		definition.timeoutMs = timeoutMs;
	}
	if (step.env) {
		definition.env = step.env;
	}
	if (step.dir !== undefined) {
		definition.dir = step.dir;
	}
	if (step.unstableExitCodes) {
		definition.unstableExitCodes = step.unstableExitCodes;
	}
	return definition;
}

function toRetry(
	retry: StepYaml["retry"],
	at: string,
	issues: ValidationIssue[],
): StepDefinition["retry"] {
	if (retry === undefined) {
		return { count: 0 };
	}
	if (typeof retry === "number") {
		return { count: retry };
	}
	const policy: StepDefinition["retry"] = { count: retry.count };
	const backoffMs = toDuration(retry.backoff, `${at}.backoff`, issues);
	if (backoffMs !== undefined) {
		policy.backoffMs = backoffMs;
	}
	if (retry.factor !== undefined) {
		policy.factor = retry.factor;
	}
	return policy;
}

function toBinding(binding: CredentialYaml): CredentialBinding {
	if ("usernamePassword" in binding) {
		return {
			kind: "usernamePassword",
			credentialId: binding.usernamePassword,
			usernameVariable: binding.usernameVariable,
			passwordVariable: binding.passwordVariable,
		};
	}
	if ("file" in binding) {
		return { kind: "file", credentialId: binding.file, variable: binding.variable };
	}
	return { kind: "string", credentialId: binding.string, variable: binding.variable };
}

function toDuration(
	value: DurationYaml | undefined,
	at: string,
	issues: ValidationIssue[],
): number | undefined {
	if (value === undefined) {
		return undefined;
	}
	const parsed = parseDuration(value);
	if (parsed === undefined) {
		issues.push({ path: at, message: `invalid duration "${value}"` });
	}
	return parsed;
}

function stringifyInputs(inputs: Record<string, string | number | boolean>): Record<string, string> {
	return Object.fromEntries(Object.entries(inputs).map(([key, value]) => [key, String(value)]));
}

function firstLine(command: string): string {
	return command.trim().split("\n")[0] ?? command;
}

/**
 * Renders the canonical YAML form of a definition. Every derived value (step
 * ids, names, option defaults) is written out, so parsing the output yields
 * a definition deep-equal to the input.
 */
export function serializePipeline(definition: PipelineDefinition): string {
	const options: Record<string, unknown> = {
		maxParallel: definition.options.maxParallel,
		retention: definition.options.retention,
		disableConcurrentRuns: definition.options.disableConcurrentRuns,
	};
	if (definition.options.timeoutMs !== undefined) {
		options.timeout = definition.options.timeoutMs;
	}
	if (definition.options.stepTimeoutMs !== undefined) {
		options.stepTimeout = definition.options.stepTimeoutMs;
	}

	const doc: Record<string, unknown> = {
		name: definition.name,
		options,
		parameters: definition.parameters,
		environment: definition.environment,
		stages: definition.stages.map(stageToYaml),
	};
	if (definition.post) {
		doc.post = postToYaml(definition.post);
	}
	return YAML.stringify(doc);
}

function stageToYaml(stage: StageDefinition): StageYaml {
	const out: StageYaml = { name: stage.name };
	if (stage.kind === "parallel") {
		out.parallel = stage.branches.map(stageToYaml);
	} else {
		out.steps = stage.steps.map(stepToYaml);
	}
	if (stage.when) {
		out.when = stage.when;
	}
	if (stage.post) {
		out.post = postToYaml(stage.post);
	}
	if (stage.lock !== undefined) {
		out.lock = stage.lock;
	}
	if (stage.lockTimeoutMs !== undefined) {
		out.lockTimeout = stage.lockTimeoutMs;
	}
	if (stage.bestEffort !== undefined) {
		out.bestEffort = stage.bestEffort;
	}
	return out;
}

function postToYaml(post: PostHooks): PostYaml {
	const out: PostYaml = {};
	for (const kind of HOOK_KINDS) {
		const steps = post[kind];
		if (steps) {
			out[kind] = steps.map(stepToYaml);
		}
	}
	return out;
}

function stepToYaml(step: StepDefinition): StepYaml {
	const out: StepYaml = { id: step.id, name: step.name };
	if (step.action.type === "run") {
		out.run = step.action.command;
	} else {
		out.uses = step.action.action;
		out.with = step.action.with;
	}
	if (step.credentials.length > 0) {
		out.credentials = step.credentials.map(bindingToYaml);
	}
	const { count, backoffMs, factor } = step.retry;
	if (backoffMs === undefined && factor === undefined) {
		out.retry = count;
	} else {
		out.retry = {
			count,
			...(backoffMs !== undefined ? { backoff: backoffMs } : {}),
			...(factor !== undefined ? { factor } : {}),
		};
	}
	if (step.timeoutMs !== undefined) {
		out.timeout = step.timeoutMs;
	}
	if (step.env) {
		out.env = step.env;
	}
	if (step.dir !== undefined) {
		out.dir = step.dir;
	}
	if (step.unstableExitCodes) {
		out.unstableExitCodes = step.unstableExitCodes;
	}
	return out;
}

function bindingToYaml(binding: CredentialBinding): CredentialYaml {
	switch (binding.kind) {
		case "usernamePassword":
			return {
				usernamePassword: binding.credentialId,
				usernameVariable: binding.usernameVariable,
				passwordVariable: binding.passwordVariable,
			};
		case "file":
			return { file: binding.credentialId, variable: binding.variable };
		default:
			return { string: binding.credentialId, variable: binding.variable };
	}
}
