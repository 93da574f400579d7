// Longest delay setTimeout honours; larger values fire immediately.
export const MAX_TIMER_MS = 2_147_483_647;

const UNIT_MS: Record<string, number> = {
	ms: 1,
	s: 1000,
	m: 60_000,
	h: 3_600_000,
};

// Accepts milliseconds as a number or a string like "250ms", "30s", "5m", "1h".
export function parseDuration(value: number | string): number | undefined {
	if (typeof value === "number") {
		return value;
	}
	const match = value.trim().match(/^(-?\d+(?:\.\d+)?)\s*(ms|s|m|h)?$/);
	if (!match) {
		return undefined;
	}
	const amount = Number(match[1]);
	const unit = match[2] ?? "ms";
	return Math.round(amount * UNIT_MS[unit]);
}

export function formatDuration(durationMs: number): string {
	if (durationMs < 1000) {
		return `${durationMs}ms`;
	}
	const seconds = durationMs / 1000;
	if (seconds < 60) {
		return `${seconds.toFixed(1)}s`;
	}
	const minutes = Math.floor(seconds / 60);
	const remainder = Math.round(seconds % 60);
	return `${minutes}m${remainder}s`;
}
