import { Box, Text, useApp, useInput } from "ink";
import { useEffect, useState } from "react";
import { formatDuration } from "../../utils/duration.js";
import { SPINNER_FRAMES, SPINNER_INTERVAL_MS } from "./constants.js";
import type { RunFeed } from "./feed.js";
import { appendOutput, INITIAL_RUN_VIEW_STATE, reduceRunView, type RunViewState } from "./model.js";
import { colorForStatus, renderStatusGlyph, STATUS_LABELS } from "./status.js";

export type RunViewProps = {
	feed: RunFeed;
	onCancel: () => void;
};

export function RunView({ feed, onCancel }: RunViewProps): JSX.Element {
	const { exit } = useApp();
	const [view, setView] = useState<RunViewState>(INITIAL_RUN_VIEW_STATE);
	const [spinnerIndex, setSpinnerIndex] = useState(0);
	const [canceling, setCanceling] = useState(false);
	const [showOutput, setShowOutput] = useState(true);
	const finished = view.status !== "pending" && view.status !== "running";

	useEffect(() => {
		return feed.subscribe((item) => {
			setView((prev) =>
				item.kind === "event" ? reduceRunView(prev, item.event) : appendOutput(prev, item.text),
			);
		});
	}, [feed]);

	useEffect(() => {
		const interval = setInterval(() => {
			setSpinnerIndex((prev) => (prev + 1) % SPINNER_FRAMES.length);
		}, SPINNER_INTERVAL_MS);
		return () => clearInterval(interval);
	}, []);

	useEffect(() => {
		if (finished) {
			exit();
		}
	}, [exit, finished]);

	useInput((input, key) => {
		if ((key.ctrl && input === "c") || input === "q") {
			if (!canceling && !finished) {
				setCanceling(true);
				onCancel();
			}
			return;
		}
		if (input === "o") {
			setShowOutput((prev) => !prev);
		}
	});

	return (
		<Box flexDirection="column" padding={1}>
			<Box flexDirection="column" marginBottom={1}>
				<Text>
					{view.pipeline ?? "pipeline"} · #{view.runNumber ?? "?"} · {view.runId ?? "starting"}
				</Text>
				<Text color={colorForStatus(view.status)} dimColor={view.status === "pending"}>
					{renderStatusGlyph(view.status, spinnerIndex)} {STATUS_LABELS[view.status]}
					{view.durationMs !== undefined ? ` · ${formatDuration(view.durationMs)}` : ""}
					{canceling && !finished ? " · canceling…" : ""}
				</Text>
			</Box>

			<Box flexDirection="column" borderStyle="round" paddingX={2} paddingY={1}>
				<Text dimColor>Stages</Text>
				{view.stages.map((stage) => (
					<Box flexDirection="column" key={stage.name}>
						<Text color={colorForStatus(stage.status)} dimColor={stage.status === "pending"}>
							{"  ".repeat(stage.depth)}
							{renderStatusGlyph(stage.status, spinnerIndex)} {stage.name}
							{stage.kind === "parallel" ? " ⇉" : ""}
							{stage.durationMs !== undefined ? ` · ${formatDuration(stage.durationMs)}` : ""}
							{stage.skipReason ? ` · ${stage.skipReason}` : ""}
						</Text>
						{stage.steps.map((step) => (
							<Text key={step.id} color={colorForStatus(step.status)} dimColor={step.status === "success"}>
								{"  ".repeat(stage.depth + 1)}
								{renderStatusGlyph(step.status, spinnerIndex)} {step.name}
								{step.attempt > 1 ? ` (attempt ${step.attempt})` : ""}
								{step.durationMs !== undefined ? ` · ${formatDuration(step.durationMs)}` : ""}
								{step.message && step.status !== "success" ? ` · ${step.message}` : ""}
							</Text>
						))}
					</Box>
				))}
				{view.hooks.map((hook, index) => (
					<Text key={`${hook.scope}-${hook.kind}-${index}`} color={colorForStatus(hook.status)}>
						{renderStatusGlyph(hook.status, spinnerIndex)} post {hook.kind} ({hook.scope})
					</Text>
				))}
			</Box>

			{showOutput && view.output.length > 0 ? (
				<Box flexDirection="column" marginTop={1}>
					<Text dimColor>Output</Text>
					{view.output.map((line, index) => (
						<Text key={`output-${index}`} dimColor>
							{line}
						</Text>
					))}
				</Box>
			) : null}

			<Box marginTop={1}>
				<Text dimColor>O: toggle output · Q/Ctrl+C: cancel run</Text>
			</Box>
		</Box>
	);
}
