import type { RunStatus, StageStatus } from "../../core/types.js";
import { SPINNER_FRAMES } from "./constants.js";

export type DisplayStatus = RunStatus | StageStatus;

export type StatusColor = "green" | "red" | "yellow" | "magenta" | "gray" | undefined;

export const STATUS_LABELS: Record<DisplayStatus, string> = {
	pending: "queued",
	running: "running",
	success: "success",
	failure: "failed",
	unstable: "unstable",
	aborted: "aborted",
	skipped: "skipped",
};

export function renderStatusGlyph(status: DisplayStatus, spinnerIndex: number): string {
	switch (status) {
		case "success":
			return "●";
		case "failure":
			return "✕";
		case "unstable":
			return "▲";
		case "running":
			return SPINNER_FRAMES[spinnerIndex % SPINNER_FRAMES.length] ?? "⠋";
		case "aborted":
			return "◌";
		case "skipped":
			return "–";
		default:
			return "○";
	}
}

export function colorForStatus(status: DisplayStatus): StatusColor {
	switch (status) {
		case "success":
			return "green";
		case "failure":
			return "red";
		case "unstable":
			return "magenta";
		case "running":
			return "yellow";
		case "aborted":
		case "skipped":
			return "gray";
		default:
			return undefined;
	}
}
