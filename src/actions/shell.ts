import { spawn } from "node:child_process";
import type { ActionOutcome, ActionRequest, ActionRunner } from "../core/action.js";
import { StepFailure } from "../core/errors.js";

export type ShellActionOptions = {
	shell?: string;
	killGraceMs?: number;
};

const DEFAULT_KILL_GRACE_MS = 2000;

/**
 * Runs `shell -c <command>` in its own process group. On abort the whole
 * group gets SIGTERM, then SIGKILL after the grace period; once the shell
 * exits, anything it left behind in the group is killed as well.
 */
export class ShellAction implements ActionRunner {
	readonly id = "shell";
	private readonly shell: string;
	private readonly killGraceMs: number;

	constructor(options: ShellActionOptions = {}) {
		this.shell = options.shell ?? "/bin/sh";
		this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
	}

	run(request: ActionRequest): Promise<ActionOutcome> {
		const { command, signal } = request;
		if (command === undefined) {
			return Promise.reject(new StepFailure(request.stepId, "shell action needs a command"));
		}
		if (signal.aborted) {
			return Promise.resolve({ exitCode: 130 });
		}

		return new Promise((resolve, reject) => {
			const usesGroups = process.platform !== "win32";
			const child = spawn(this.shell, ["-c", command], {
				cwd: request.cwd,
				env: request.env,
				detached: usesGroups,
				stdio: ["ignore", "pipe", "pipe"],
			});
			let killTimer: NodeJS.Timeout | undefined;
			let exitCode: number | null = null;
			let exitSignal: NodeJS.Signals | null = null;

			const terminate = (): void => {
				signalTree(child.pid, "SIGTERM", usesGroups, () => child.kill("SIGTERM"));
				killTimer = setTimeout(() => {
					signalTree(child.pid, "SIGKILL", usesGroups, () => child.kill("SIGKILL"));
				}, this.killGraceMs);
			};
			signal.addEventListener("abort", terminate, { once: true });

			child.stdout.on("data", (chunk: Buffer) => {
				request.write(chunk.toString(), "stdout");
			});
			child.stderr.on("data", (chunk: Buffer) => {
				request.write(chunk.toString(), "stderr");
			});

			child.on("exit", (code, killedBy) => {
				exitCode = code;
				exitSignal = killedBy;
				// Reap background processes still holding the output pipes.
				signalTree(child.pid, "SIGKILL", usesGroups, () => undefined);
			});

			child.on("error", (error) => {
				signal.removeEventListener("abort", terminate);
				if (killTimer) {
					clearTimeout(killTimer);
				}
				reject(new StepFailure(request.stepId, `failed to start ${this.shell}: ${error.message}`));
			});

			child.on("close", (code, killedBy) => {
				signal.removeEventListener("abort", terminate);
				if (killTimer) {
					clearTimeout(killTimer);
				}
				resolve({ exitCode: toExitCode(exitCode ?? code, exitSignal ?? killedBy) });
			});
		});
	}
}

function signalTree(
	pid: number | undefined,
	signal: NodeJS.Signals,
	usesGroups: boolean,
	fallback: () => void,
): void {
	if (pid === undefined) {
		return;
	}
	if (!usesGroups) {
		fallback();
		return;
	}
	try {
		process.kill(-pid, signal);
	} catch {
		// The group is already gone.
		fallback();
	}
}

const SIGNAL_NUMBERS: Partial<Record<NodeJS.Signals, number>> = {
	SIGHUP: 1,
	SIGINT: 2,
	SIGKILL: 9,
	SIGTERM: 15,
};

function toExitCode(code: number | null, signal: NodeJS.Signals | null): number {
	if (code !== null) {
		return code;
	}
	if (signal) {
		return 128 + (SIGNAL_NUMBERS[signal] ?? 0);
	}
	return 1;
}
