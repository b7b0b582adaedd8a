import type { JobOutcome, PhaseStatus, RunStatus } from "../../../core/types.js";
import { SPINNER_FRAMES } from "../constants.js";

export type RowStatus = JobOutcome | PhaseStatus;
export type StatusColor = "green" | "red" | "yellow" | "gray" | undefined;

export const RUN_STATUS_LABELS: Record<RunStatus, string> = {
	init: "preparing",
	validating: "validating",
	validation_failed: "validation failed",
	running: "running",
	finished: "finished",
	crashed: "crashed",
	aborting: "aborting",
	aborted: "aborted",
};

export function renderStatusGlyph(status: RowStatus, spinnerIndex: number): string {
	switch (status) {
		case "success":
			return "●";
		case "failed":
			return "✕";
		case "running":
			return SPINNER_FRAMES[spinnerIndex % SPINNER_FRAMES.length] ?? "⠋";
		case "skipped":
			return "⊘";
		case "aborted":
			return "◌";
		default:
			return "○";
	}
}

export function colorForStatus(status: RowStatus): StatusColor {
	switch (status) {
		case "success":
			return "green";
		case "failed":
			return "red";
		case "running":
			return "yellow";
		case "skipped":
		case "aborted":
			return "gray";
		default:
			return undefined;
	}
}

export function colorForRunStatus(status: RunStatus): StatusColor {
	switch (status) {
		case "finished":
			return "green";
		case "validation_failed":
		case "crashed":
			return "red";
		case "running":
		case "validating":
		case "aborting":
			return "yellow";
		case "aborted":
			return "gray";
		default:
			return undefined;
	}
}

export function isRunActive(status: RunStatus): boolean {
	return status === "init" || status === "validating" || status === "running" || status === "aborting";
}
