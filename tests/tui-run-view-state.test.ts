import { describe, expect, it } from "vitest";
import type { RunPlan } from "../src/core/types.js";
import { LOG_TAIL_LINES } from "../src/tui/run-view/constants.js";
import { formatDuration, formatPhaseLine } from "../src/tui/run-view/format.js";
import { appendLogTail, applyRuntimeEvent, createInitialState } from "../src/tui/run-view/state.js";
import { formatHelpText } from "../src/tui/run-view/utils/help.js";

const plan: RunPlan = {
	runId: "run-1",
	pipeline: "check",
	jobs: [
		{
			jobName: "lint",
			job: { name: "lint", ancestors: [], preRun: ["pre.yaml"], run: "lint.yaml", postRun: [], vars: {} },
			phases: [
				{ id: "pre-run-1", kind: "pre-run", playbook: "pre.yaml" },
				{ id: "run", kind: "run", playbook: "lint.yaml" },
			],
			vars: {},
		},
	],
};

describe("run view state", () => {
	it("starts with pending rows for every planned phase", () => {
		const state = createInitialState(plan);
		expect(state.status).toBe("init");
		expect(state.jobs).toEqual([
			{
				jobName: "lint",
				status: "pending",
				phases: [
					{ phaseId: "pre-run-1", kind: "pre-run", playbook: "pre.yaml", status: "pending", taskCount: 0 },
					{ phaseId: "run", kind: "run", playbook: "lint.yaml", status: "pending", taskCount: 0 },
				],
			},
		]);
	});

	it("tracks phases, tasks and the final status", () => {
		let state = createInitialState(plan);
		state = applyRuntimeEvent(state, {
			type: "run-started",
			runId: "run-1",
			engine: "dry-run",
			jobs: ["lint"],
			logDir: "/tmp/logs",
			createdAt: "2026-01-01T00:00:00.000Z",
		});
		state = applyRuntimeEvent(state, { type: "job-started", runId: "run-1", jobName: "lint" });
		state = applyRuntimeEvent(state, {
			type: "phase-started",
			runId: "run-1",
			jobName: "lint",
			phaseId: "pre-run-1",
			kind: "pre-run",
			playbook: "pre.yaml",
			startedAt: "2026-01-01T00:00:00.000Z",
		});
		state = applyRuntimeEvent(state, {
			type: "task-finished",
			runId: "run-1",
			jobName: "lint",
			phaseId: "pre-run-1",
			task: { taskId: "play1-task1", name: "probe", outcome: "failed", rc: 1 },
		});
		state = applyRuntimeEvent(state, {
			type: "phase-finished",
			runId: "run-1",
			jobName: "lint",
			phaseId: "pre-run-1",
			status: "failed",
			durationMs: 1500,
		});
		state = applyRuntimeEvent(state, {
			type: "job-finished",
			runId: "run-1",
			jobName: "lint",
			status: "failed",
		});
		state = applyRuntimeEvent(state, {
			type: "run-finished",
			runId: "run-1",
			status: "finished",
			exitCode: 1,
			finishedAt: "2026-01-01T00:00:02.000Z",
		});

		expect(state.status).toBe("finished");
		expect(state.exitCode).toBe(1);
		expect(state.jobs[0].status).toBe("failed");
		expect(state.jobs[0].phases[0]).toEqual({
			phaseId: "pre-run-1",
			kind: "pre-run",
			playbook: "pre.yaml",
			status: "failed",
			durationMs: 1500,
			taskCount: 1,
			lastTask: "probe",
		});
		expect(state.jobs[0].phases[1].status).toBe("skipped");
		expect(formatPhaseLine(state.jobs[0].phases[0])).toBe("pre-run-1    pre.yaml · 1 task(s) · 1.5s");
	});

	it("keeps a bounded log tail per job", () => {
		let state = createInitialState(plan);
		for (let index = 0; index < LOG_TAIL_LINES + 3; index += 1) {
			state = appendLogTail(state, "lint", `line ${index}\n`);
		}
		state = appendLogTail(state, "lint", "\n  \n");
		const tail = state.logTail.lint ?? [];
		expect(tail).toHaveLength(LOG_TAIL_LINES);
		expect(tail[0]).toBe("line 3");
		expect(tail[tail.length - 1]).toBe(`line ${LOG_TAIL_LINES + 2}`);
	});
});

describe("run view text", () => {
	it("formats durations", () => {
		expect(formatDuration(250)).toBe("250ms");
		expect(formatDuration(12_340)).toBe("12.3s");
		expect(formatDuration(125_000)).toBe("2m5s");
	});

	it("describes the controls for each mode", () => {
		expect(formatHelpText({ viewMode: "summary", quitPromptVisible: false, active: true })).toBe(
			"Tab: switch view · D: details · Q: abort",
		);
		expect(formatHelpText({ viewMode: "details", quitPromptVisible: false, active: false })).toBe(
			"Up/Down: select job · Tab: switch view · S: summary · Q: exit",
		);
		expect(formatHelpText({ viewMode: "details", quitPromptVisible: true, active: true })).toBe(
			"Y: abort run · N/Enter/Esc: continue run",
		);
	});
});
