import React from "react";
import { outro } from "@clack/prompts";
import { render } from "ink";
import type { EngineRuntimeEvent, RunHandle } from "../core/engine.js";
import type { RunReport } from "../core/types.js";
import { formatDuration } from "../utils/duration.js";
import type { RunFeed } from "../tui/run-view/feed.js";
import { RunView } from "../tui/run-view/run-view.js";

export type ExecuteRunInput = {
	handle: RunHandle;
	feed: RunFeed;
	isTty: boolean;
	json: boolean;
};

export async function executeRun({ handle, feed, isTty, json }: ExecuteRunInput): Promise<RunReport> {
	const onSigint = (): void => {
		if (!json) {
			process.stderr.write("\nCanceling run...\n");
		}
		handle.cancel();
	};
	process.once("SIGINT", onSigint);

	try {
		if (isTty && !json) {
			const report = await runWithInk(handle, feed);
			outro(`Logs: ${report.logDir}`);
			return report;
		}

		if (!json) {
			process.stdout.write(`Run ${handle.runId} (#${handle.runNumber}) started\n`);
			const unsubscribe = feed.subscribe((item) => {
				if (item.kind === "event") {
					const line = describeEvent(item.event);
					if (line) {
						process.stdout.write(`${line}\n`);
					}
				}
			});
			try {
				return await handle.report;
			} finally {
				unsubscribe();
			}
		}
		return await handle.report;
	} finally {
		process.off("SIGINT", onSigint);
	}
}

export function describeEvent(event: EngineRuntimeEvent): string | undefined {
	switch (event.type) {
		case "stage-started":
			return `▶ ${event.stage}`;
		case "stage-skipped":
			return `- ${event.stage} skipped (${event.reason})`;
		case "stage-finished":
			return `■ ${event.stage} ${event.status} in ${formatDuration(event.durationMs)}`;
		case "step-retry":
			return `  ↻ ${event.stepId} failed (${event.previous.message ?? event.previous.status}), attempt ${event.nextAttempt} in ${formatDuration(event.delayMs)}`;
		case "step-finished":
			return `  ${event.result.status === "success" ? "✓" : "✕"} ${event.result.name} ${event.result.status}${
				event.result.message ? ` · ${event.result.message}` : ""
			}`;
		case "hook-finished":
			return `  post ${event.hook.kind} (${event.hook.scope}) ${event.hook.status}`;
		case "run-finished":
			return `Finished ${event.status.toUpperCase()} in ${formatDuration(event.durationMs)}`;
		case "runs-purged":
			return `Retention removed ${event.purged.length} old run(s)`;
		default:
			return undefined;
	}
}

async function runWithInk(handle: RunHandle, feed: RunFeed): Promise<RunReport> {
	const { waitUntilExit, unmount } = render(
		React.createElement(RunView, { feed, onCancel: handle.cancel }),
		{ exitOnCtrlC: false },
	);
	let report: RunReport;
	try {
		report = await handle.report;
	} catch (error) {
		unmount();
		throw error;
	}
	// The view exits by itself once it has rendered run-finished.
	await waitUntilExit();
	return report;
}
