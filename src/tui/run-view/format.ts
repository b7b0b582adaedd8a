import type { PhaseRow } from "./state.js";

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

export function formatPhaseLine(phase: PhaseRow): string {
	const parts = [`${phase.phaseId.padEnd(12)} ${phase.playbook}`];
	if (phase.taskCount > 0) {
		parts.push(`${phase.taskCount} task(s)`);
	}
	if (phase.durationMs !== undefined) {
		parts.push(formatDuration(phase.durationMs));
	}
	return parts.join(" · ");
}

export function clipText(value: string, width: number): string {
	if (value.length <= width) {
		return value;
	}
	return width > 1 ? `${value.slice(0, width - 1)}…` : value.slice(0, width);
}
