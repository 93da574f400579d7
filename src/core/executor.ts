import fs from "node:fs";
import path from "node:path";
import { createMaskingWriter, type SecretMasker } from "../utils/redact.js";
import { ensureWithinBase } from "../utils/path-safety.js";
import { renderTemplate } from "../utils/template.js";
import type { ActionRegistry, OutputSource } from "./action.js";
import { withCredentials, type SecretStore } from "./credentials.js";
import { CredentialResolutionError, StepFailure, TimeoutError } from "./errors.js";
import { withRetry } from "./retry.js";
import type { AttemptResult, ExecutionResult, StepDefinition } from "./types.js";

export type StepContext = {
	readonly runId: string;
	readonly stageName: string;
	/** Parameters, pipeline environment and built-ins; also exported to the action's env. */
	readonly variables: Readonly<Record<string, string>>;
	readonly baseEnv: Readonly<Record<string, string>>;
	readonly workspace: string;
	readonly stateDir: string;
	readonly artifactDir: string;
	readonly defaultTimeoutMs?: number;
	readonly signal: AbortSignal;
	readonly actions: ActionRegistry;
	readonly secrets: SecretStore;
	readonly masker: SecretMasker;
	readonly logFileFor: (stepId: string, attempt: number) => string;
	readonly onOutput?: (stepId: string, text: string, source: OutputSource) => void;
	readonly onAttemptStarted?: (step: StepDefinition, attempt: number) => void;
	readonly onRetry?: (step: StepDefinition, previous: AttemptResult, nextAttempt: number, delayMs: number) => void;
};

/**
 * Runs a step with its retry policy. The returned result is the final
 * attempt's, with the full attempt chain attached.
 */
export async function runStep(step: StepDefinition, context: StepContext): Promise<ExecutionResult> {
	const { final, attempts } = await withRetry(
		step.retry,
		(attempt) => executeAttempt(step, context, attempt),
		{
			signal: context.signal,
			onRetry: (previous, nextAttempt, delayMs) =>
				context.onRetry?.(step, previous, nextAttempt, delayMs),
		},
	);
	return toExecutionResult(step, final, attempts);
}

/** Single attempt, no retries. */
export async function executeStep(step: StepDefinition, context: StepContext): Promise<ExecutionResult> {
	const attempt = await executeAttempt(step, context, 1);
	return toExecutionResult(step, attempt, [attempt]);
}

export async function executeAttempt(
	step: StepDefinition,
	context: StepContext,
	attempt: number,
): Promise<AttemptResult> {
	const startedAt = new Date();
	const outputPath = context.logFileFor(step.id, attempt);
	fs.mkdirSync(path.dirname(outputPath), { recursive: true });
	const log = fs.createWriteStream(outputPath, { flags: "a" });
	const finish = (result: Omit<AttemptResult, "attempt" | "startedAt" | "finishedAt" | "durationMs" | "outputPath">): AttemptResult => {
		const finishedAt = new Date();
		return {
			attempt,
			startedAt: startedAt.toISOString(),
			finishedAt: finishedAt.toISOString(),
			durationMs: finishedAt.getTime() - startedAt.getTime(),
			outputPath,
			...result,
			...(result.message !== undefined ? { message: context.masker.mask(result.message) } : {}),
		};
	};

	context.onAttemptStarted?.(step, attempt);

	if (context.signal.aborted) {
		await closeLog(log);
		return finish({ status: "aborted", reason: "aborted", message: "run was aborted before the step started" });
	}

	const timeoutMs = step.timeoutMs ?? context.defaultTimeoutMs;
	const controller = new AbortController();
	let timedOut = false;
	const forwardAbort = (): void => controller.abort(context.signal.reason);
	context.signal.addEventListener("abort", forwardAbort, { once: true });
	const timer =
		timeoutMs !== undefined
			? setTimeout(() => {
					timedOut = true;
					controller.abort(new TimeoutError(`step ${step.id}`, timeoutMs));
				}, timeoutMs)
			: undefined;

	try {
		const exitCode = await withCredentials(
			step.credentials,
			{ store: context.secrets, masker: context.masker },
			async (scope) => {
				const emit = (source: OutputSource) => (text: string) => {
					log.write(text);
					context.onOutput?.(step.id, text, source);
				};
				const stdout = createMaskingWriter(context.masker, emit("stdout"));
				const stderr = createMaskingWriter(context.masker, emit("stderr"));
				const env: Record<string, string> = {
					...context.baseEnv,
					...context.variables,
					STAGE_NAME: context.stageName,
					...(step.env ?? {}),
					...scope.env,
				};
				try {
					const runner =
						step.action.type === "run"
							? context.actions.get("shell")
							: context.actions.get(step.action.action);
					if (!runner) {
						throw new StepFailure(
							step.id,
							`unknown action "${step.action.type === "run" ? "shell" : step.action.action}"`,
						);
					}
					const templateValues = { ...context.variables, STAGE_NAME: context.stageName, ...(step.env ?? {}) };
					const command =
						step.action.type === "run" ? renderTemplate(step.action.command, templateValues) : undefined;
					const inputs =
						step.action.type === "uses"
							? Object.fromEntries(
									Object.entries(step.action.with).map(([key, value]) => [
										key,
										renderTemplate(value, templateValues),
									]),
								)
							: {};
					stdout.write(`$ ${command ?? `uses ${runner.id}`}\n`);

					const outcome = await runner.run({
						stepId: step.id,
						command,
						inputs,
						env,
						cwd: step.dir ? ensureWithinBase(context.workspace, step.dir, "step dir") : context.workspace,
						workspace: context.workspace,
						stateDir: context.stateDir,
						artifactDir: context.artifactDir,
						signal: controller.signal,
						write: (chunk, source) => (source === "stdout" ? stdout : stderr).write(chunk),
					});
					return outcome.exitCode;
				} catch (error) {
					if (error instanceof Error) {
						error.message = context.masker.mask(error.message);
					}
					throw error;
				} finally {
					// Flush while the scope's secrets are still registered for masking.
					stdout.flush();
					stderr.flush();
					for (const key of Object.keys(scope.env)) {
						delete env[key];
					}
				}
			},
		);

		if (timedOut) {
			return finish({ status: "failure", reason: "timeout", exitCode, message: `timed out after ${timeoutMs}ms` });
		}
		if (context.signal.aborted) {
			return finish({ status: "aborted", reason: "aborted", exitCode, message: "aborted" });
		}
		if (exitCode === 0) {
			return finish({ status: "success", exitCode });
		}
		if (step.unstableExitCodes?.includes(exitCode)) {
			return finish({ status: "unstable", exitCode, message: `exit code ${exitCode} marks the step unstable` });
		}
		return finish({ status: "failure", reason: "exit-code", exitCode, message: `exit code ${exitCode}` });
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		log.write(`${context.masker.mask(message)}\n`);
		if (error instanceof CredentialResolutionError) {
			return finish({ status: "failure", reason: "credentials", message });
		}
		if (timedOut) {
			return finish({ status: "failure", reason: "timeout", message: `timed out after ${timeoutMs}ms` });
		}
		if (context.signal.aborted) {
			return finish({ status: "aborted", reason: "aborted", message: "aborted" });
		}
		return finish({ status: "failure", reason: "action-error", message });
	} finally {
		if (timer) {
			clearTimeout(timer);
		}
		context.signal.removeEventListener("abort", forwardAbort);
		await closeLog(log);
	}
}

function toExecutionResult(
	step: StepDefinition,
	final: AttemptResult,
	attempts: AttemptResult[],
): ExecutionResult {
	const first = attempts[0] ?? final;
	const result: ExecutionResult = {
		id: step.id,
		name: step.name,
		status: final.status,
		startedAt: first.startedAt,
		finishedAt: final.finishedAt,
		durationMs: new Date(final.finishedAt).getTime() - new Date(first.startedAt).getTime(),
		attempts,
	};
	if (final.exitCode !== undefined) {
		result.exitCode = final.exitCode;
	}
	if (final.reason !== undefined) {
		result.reason = final.reason;
	}
	if (final.message !== undefined) {
		result.message = final.message;
	}
	if (final.outputPath !== undefined) {
		result.outputPath = final.outputPath;
	}
	return result;
}

function closeLog(log: fs.WriteStream): Promise<void> {
	return new Promise((resolve) => {
		log.end(() => resolve());
	});
}
