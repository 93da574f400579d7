import type { ActionRegistry, ActionRunner } from "../core/action.js";
import { ArchiveAction } from "./archive.js";
import { ShellAction, type ShellActionOptions } from "./shell.js";
import { SleepAction } from "./sleep.js";

export function createActionRegistry(
	options: ShellActionOptions = {},
	extra: ActionRunner[] = [],
): ActionRegistry {
	const runners = new Map<string, ActionRunner>();
	for (const runner of [new ShellAction(options), new ArchiveAction(), new SleepAction(), ...extra]) {
		runners.set(runner.id, runner);
	}
	return {
		get: (id) => runners.get(id.trim().toLowerCase()) ?? runners.get(id),
		ids: () => Array.from(runners.keys()),
	};
}
