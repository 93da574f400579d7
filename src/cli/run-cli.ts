import fs from "node:fs";
import path from "node:path";
import process from "node:process";
import { cancel, intro, isCancel, select, text } from "@clack/prompts";
import { createActionRegistry } from "../actions/factory.js";
import { loadConfig } from "../config/load-config.js";
import type { PipewrightConfig } from "../config/schema.js";
import type { ActionRegistry } from "../core/action.js";
import { ChainSecretStore, EnvSecretStore, FileSecretStore, type SecretStore } from "../core/credentials.js";
import { PipelineEngine, type RunHandle } from "../core/engine.js";
import { ConcurrentRunError, RunNotFoundError, ValidationError } from "../core/errors.js";
import { loadPipeline } from "../core/parser.js";
import { type ExecutionPlan, planRun, resolvePipeline, type ResolvedPipeline } from "../core/resolver.js";
import type { PipelineDefinition, RunStatus } from "../core/types.js";
import { RunStore } from "../store/run-store.js";
import { RunFeed } from "../tui/run-view/feed.js";
import { type CliOptions, parseArgs, printHelp, readPackageVersion } from "./args.js";
import { executeRun } from "./execute-run.js";
import { runInit } from "./init.js";
import { buildJsonSummary, formatPipelineOutline, formatRunList, formatRunReport } from "./output.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
export const EXIT_CONCURRENT_RUN = 3;
export const EXIT_ABORTED = 130;

type Workspace = {
	repoRoot: string;
	config: PipewrightConfig;
	stateDir: string;
	store: RunStore;
};

export async function runCli(argv = process.argv.slice(2), repoRoot = process.cwd()): Promise<number> {
	const exitCode = await main(argv, repoRoot);
	process.exitCode = exitCode;
	return exitCode;
}

async function main(argv: string[], repoRoot: string): Promise<number> {
	const args = parseArgs(argv);
	if (args.help) {
		printHelp();
		return EXIT_OK;
	}
	if (args.version) {
		process.stdout.write(`pipewright ${readPackageVersion()}\n`);
		return EXIT_OK;
	}
	if (args.unknown.length) {
		process.stderr.write(`Unknown option(s): ${args.unknown.join(", ")}\n`);
		process.stderr.write("Run `pipewright --help` for usage.\n");
		return EXIT_USAGE;
	}
	if (args.errors.length) {
		for (const error of args.errors) {
			process.stderr.write(`${error}\n`);
		}
		return EXIT_USAGE;
	}

	let workspace: Workspace;
	try {
		workspace = openWorkspace(repoRoot);
	} catch (error) {
		process.stderr.write(`Config error: ${errorMessage(error)}\n`);
		return EXIT_USAGE;
	}

	switch (args.command) {
		case "init":
			runInit(repoRoot, workspace.config.stateDir);
			return EXIT_OK;
		case "status":
			return showStatus(workspace, args);
		case "runs":
			return listRuns(workspace, args);
		case "validate":
			return validate(workspace, args);
		case "prune":
			return prune(workspace, args);
		case "run":
			return startRun(workspace, args);
	}
}

function openWorkspace(repoRoot: string): Workspace {
	const { config } = loadConfig(repoRoot);
	const stateDir = path.resolve(repoRoot, config.stateDir);
	return { repoRoot, config, stateDir, store: RunStore.forStateDir(stateDir) };
}

function pipelinePath(workspace: Workspace, args: CliOptions): string {
	return path.resolve(workspace.repoRoot, args.file ?? workspace.config.pipeline);
}

function readDefinition(workspace: Workspace, args: CliOptions): PipelineDefinition {
	const { defaults } = workspace.config;
	return loadPipeline(pipelinePath(workspace, args), {
		maxParallel: defaults.maxParallel,
		retention: defaults.retention,
	});
}

/** Loads and resolves the pipeline, reporting problems on stderr. */
function loadResolved(workspace: Workspace, args: CliOptions): ResolvedPipeline | number {
	const file = pipelinePath(workspace, args);
	if (!fs.existsSync(file)) {
		process.stderr.write(`Pipeline definition not found: ${file}\n`);
		return EXIT_USAGE;
	}
	try {
		const definition = readDefinition(workspace, args);
		if (args.timeoutMs !== undefined) {
			definition.options.timeoutMs = args.timeoutMs;
		}
		return resolvePipeline(definition, { actions: actionRegistry(workspace.config).ids() });
	} catch (error) {
		process.stderr.write(`${errorMessage(error)}\n`);
		return EXIT_USAGE;
	}
}

async function startRun(workspace: Workspace, args: CliOptions): Promise<number> {
	const resolved = loadResolved(workspace, args);
	if (typeof resolved === "number") {
		return resolved;
	}
	const isTty = Boolean(process.stdout.isTTY) && !args.json;

	const parameters = await collectParameters(resolved, workspace.config, args, isTty);
	if (parameters === null) {
		return EXIT_ABORTED;
	}

	let plan: ExecutionPlan;
	try {
		plan = planRun(resolved, parameters);
	} catch (error) {
		process.stderr.write(`${errorMessage(error)}\n`);
		return EXIT_USAGE;
	}

	const feed = new RunFeed();
	const engine = new PipelineEngine({
		workspace: workspace.repoRoot,
		stateDir: workspace.stateDir,
		store: workspace.store,
		secrets: secretStore(workspace),
		actions: actionRegistry(workspace.config),
		defaultStepTimeoutMs: workspace.config.defaults.stepTimeoutMs,
		onEvent: (event) => feed.push({ kind: "event", event }),
		onOutput: (stepId, chunk) => feed.push({ kind: "output", stepId, text: chunk }),
	});

	let handle: RunHandle;
	try {
		handle = engine.start(plan);
	} catch (error) {
		if (error instanceof ConcurrentRunError) {
			process.stderr.write(`${error.message}\n`);
			return EXIT_CONCURRENT_RUN;
		}
		throw error;
	}

	const report = await executeRun({ handle, feed, isTty, json: Boolean(args.json) });
	if (args.json) {
		process.stdout.write(`${JSON.stringify(buildJsonSummary(report))}\n`);
	}
	return exitCodeFor(report.status);
}

async function collectParameters(
	resolved: ResolvedPipeline,
	config: PipewrightConfig,
	args: CliOptions,
	isTty: boolean,
): Promise<Record<string, string> | null> {
	const declared = resolved.definition.parameters;
	const values: Record<string, string> = {};
	for (const [name, value] of Object.entries(config.parameters)) {
		if (name in declared) {
			values[name] = value;
		}
	}
	Object.assign(values, args.params);

	const missing = Object.entries(declared).filter(
		([name, parameter]) => values[name] === undefined && parameter.default === undefined,
	);
	if (!isTty || missing.length === 0) {
		return values;
	}

	intro(resolved.definition.name);
	for (const [name, parameter] of missing) {
		const answer = parameter.choices
			? await select<{ value: string; label: string }[], string>({
					message: parameter.description ?? `Value for ${name}`,
					options: parameter.choices.map((choice) => ({ value: choice, label: choice })),
				})
			: await text({
					message: parameter.description ?? `Value for ${name}`,
					validate: (input) => (input.length === 0 ? "A value is required" : undefined),
				});
		if (isCancel(answer)) {
			cancel("Canceled.");
			return null;
		}
		values[name] = answer;
	}
	return values;
}

function showStatus(workspace: Workspace, args: CliOptions): number {
	if (!args.runId) {
		return EXIT_USAGE;
	}
	try {
		const run = workspace.store.readRun(args.runId);
		process.stdout.write(args.json ? `${JSON.stringify(buildJsonSummary(run))}\n` : formatRunReport(run));
		return EXIT_OK;
	} catch (error) {
		if (error instanceof RunNotFoundError) {
			process.stderr.write(`${error.message}\n`);
			return EXIT_FAILURE;
		}
		throw error;
	}
}

function listRuns(workspace: Workspace, args: CliOptions): number {
	const pipeline = pipelineName(workspace, args);
	const runs = workspace.store.listRuns(pipeline);
	process.stdout.write(
		args.json ? `${JSON.stringify(runs.map((run) => buildJsonSummary(run)))}\n` : formatRunList(runs),
	);
	return EXIT_OK;
}

function validate(workspace: Workspace, args: CliOptions): number {
	const file = pipelinePath(workspace, args);
	if (!fs.existsSync(file)) {
		process.stderr.write(`Pipeline definition not found: ${file}\n`);
		return EXIT_USAGE;
	}
	try {
		const resolved = resolvePipeline(readDefinition(workspace, args), {
			actions: actionRegistry(workspace.config).ids(),
		});
		if (args.json) {
			process.stdout.write(`${JSON.stringify({ valid: true, pipeline: resolved.definition.name, issues: [] })}\n`);
		} else {
			process.stdout.write(formatPipelineOutline(resolved.definition));
			process.stdout.write(
				`Pipeline "${resolved.definition.name}" is valid (${resolved.stageNames.length} stage(s)).\n`,
			);
		}
		return EXIT_OK;
	} catch (error) {
		if (args.json && error instanceof ValidationError) {
			process.stdout.write(`${JSON.stringify({ valid: false, issues: error.issues })}\n`);
		} else {
			process.stderr.write(`${errorMessage(error)}\n`);
		}
		return EXIT_USAGE;
	}
}

function prune(workspace: Workspace, args: CliOptions): number {
	let definition: PipelineDefinition;
	try {
		definition = readDefinition(workspace, args);
	} catch (error) {
		process.stderr.write(`${errorMessage(error)}\n`);
		return EXIT_USAGE;
	}
	const keep = args.keep ?? definition.options.retention;
	const purged = workspace.store.purge(definition.name, keep);
	if (args.json) {
		process.stdout.write(`${JSON.stringify({ pipeline: definition.name, keep, purged })}\n`);
	} else {
		process.stdout.write(`Removed ${purged.length} run(s) of "${definition.name}", keeping ${keep}.\n`);
	}
	return EXIT_OK;
}

function pipelineName(workspace: Workspace, args: CliOptions): string | undefined {
	const file = pipelinePath(workspace, args);
	if (!fs.existsSync(file)) {
		return undefined;
	}
	try {
		return readDefinition(workspace, args).name;
	} catch (error) {
		process.stderr.write(`Listing runs of every pipeline: ${errorMessage(error)}\n`);
		return undefined;
	}
}

function actionRegistry(config: PipewrightConfig): ActionRegistry {
	return createActionRegistry({ shell: config.shell });
}

function secretStore(workspace: Workspace): SecretStore {
	const { secrets } = workspace.config;
	const stores: SecretStore[] = [new EnvSecretStore(secrets.envPrefix)];
	if (secrets.file) {
		stores.push(new FileSecretStore(path.resolve(workspace.repoRoot, secrets.file)));
	}
	return new ChainSecretStore(stores);
}

export function exitCodeFor(status: RunStatus): number {
	switch (status) {
		case "success":
		case "unstable":
			return EXIT_OK;
		case "aborted":
			return EXIT_ABORTED;
		default:
			return EXIT_FAILURE;
	}
}

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
