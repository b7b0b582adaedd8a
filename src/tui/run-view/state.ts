import type { EngineRuntimeEvent } from "../../core/engine.js";
import type { JobOutcome, PhaseKind, PhaseStatus, RunPlan, RunStatus } from "../../core/types.js";
import { LOG_TAIL_LINES } from "./constants.js";

export type PhaseRow = {
	phaseId: string;
	kind: PhaseKind;
	playbook: string;
	status: PhaseStatus;
	durationMs?: number;
	taskCount: number;
	lastTask?: string;
};

export type JobRow = {
	jobName: string;
	status: JobOutcome;
	phases: PhaseRow[];
};

export type RunViewState = {
	status: RunStatus;
	exitCode?: number;
	jobs: JobRow[];
	logTail: Record<string, string[]>;
};

export function createInitialState(plan: RunPlan): RunViewState {
	return {
		status: "init",
		jobs: plan.jobs.map((job) => ({
			jobName: job.jobName,
			status: "pending",
			phases: job.phases.map((phase) => ({
				phaseId: phase.id,
				kind: phase.kind,
				playbook: phase.playbook,
				status: "pending",
				taskCount: 0,
			})),
		})),
		logTail: {},
	};
}

export function applyRuntimeEvent(state: RunViewState, event: EngineRuntimeEvent): RunViewState {
	switch (event.type) {
		case "run-started":
			return { ...state, status: "running" };
		case "job-started":
			return updateJob(state, event.jobName, (job) => ({ ...job, status: "running" }));
		case "job-finished":
			return updateJob(state, event.jobName, (job) => ({
				...job,
				status: event.status,
				phases: job.phases.map((phase) =>
					phase.status === "pending" ? { ...phase, status: pendingOutcome(event.status) } : phase,
				),
			}));
		case "phase-started":
			return updatePhase(state, event.jobName, event.phaseId, (phase) => ({
				...phase,
				status: "running",
			}));
		case "task-finished":
			return updatePhase(state, event.jobName, event.phaseId, (phase) => ({
				...phase,
				taskCount: phase.taskCount + 1,
				lastTask: event.task.name,
			}));
		case "phase-finished":
			return updatePhase(state, event.jobName, event.phaseId, (phase) => ({
				...phase,
				status: event.status,
				durationMs: event.durationMs,
			}));
		case "run-finished":
			return { ...state, status: event.status, exitCode: event.exitCode };
	}
}

export function appendLogTail(state: RunViewState, jobName: string, chunk: string): RunViewState {
	const lines = chunk.split("\n").filter((line) => line.trim().length > 0);
	if (lines.length === 0) {
		return state;
	}
	const current = state.logTail[jobName] ?? [];
	return {
		...state,
		logTail: { ...state.logTail, [jobName]: [...current, ...lines].slice(-LOG_TAIL_LINES) },
	};
}

function pendingOutcome(status: JobOutcome): PhaseStatus {
	return status === "aborted" ? "aborted" : "skipped";
}

function updateJob(
	state: RunViewState,
	jobName: string,
	update: (job: JobRow) => JobRow,
): RunViewState {
	return {
		...state,
		jobs: state.jobs.map((job) => (job.jobName === jobName ? update(job) : job)),
	};
}

function updatePhase(
	state: RunViewState,
	jobName: string,
	phaseId: string,
	update: (phase: PhaseRow) => PhaseRow,
): RunViewState {
	return updateJob(state, jobName, (job) => ({
		...job,
		phases: job.phases.map((phase) => (phase.phaseId === phaseId ? update(phase) : phase)),
	}));
}
