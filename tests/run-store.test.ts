import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import type { RunRecord } from "../src/core/types.js";
import { PathEscapeError } from "../src/utils/path-safety.js";
import {
	abortRun,
	createRunRecord,
	getLogFileName,
	RunStatusError,
	RunStore,
	updateRunStatus,
} from "../src/store/run-store.js";
import { createTempRepo } from "./helpers/temp-repo.js";

function runIn(status: RunRecord["status"]): RunRecord {
	return { ...createRunRecord("run-1", "dry-run"), status };
}

describe("run store", () => {
	it("writes run records and log files under the run directory", () => {
		const base = path.join(createTempRepo("store"), "runs");
		const store = new RunStore(base);
		const run = createRunRecord("20260101T000000-abcdef", "local", "check");
		store.writeRun(run);

		const written = JSON.parse(fs.readFileSync(path.join(base, run.id, "run.json"), "utf-8"));
		expect(written).toMatchObject({
			schemaVersion: 1,
			id: run.id,
			engine: "local",
			pipeline: "check",
			status: "init",
			jobs: [],
		});

		const logPath = store.createLogFile(run.id, "install-centos-7-pre-run-1");
		expect(path.dirname(logPath)).toBe(path.join(base, run.id, "logs"));
	});

	it("refuses run ids that escape the base directory", () => {
		const store = new RunStore(path.join(createTempRepo("store-escape"), "runs"));
		expect(() => store.createRunDir("../elsewhere")).toThrow(PathEscapeError);
	});

	it("names log files safely and uniquely", () => {
		const name = getLogFileName("Job/With Spaces");
		expect(name).toMatch(/^job-with-spaces-[0-9a-f]{8}\.log$/);
		expect(getLogFileName("job/with spaces")).not.toBe(name);
	});
});

describe("run status lifecycle", () => {
	it("follows the allowed transitions", () => {
		const run = createRunRecord("run-1", "dry-run");
		updateRunStatus(run, "validating", ["init"]);
		updateRunStatus(run, "running", ["validating"]);
		updateRunStatus(run, "finished", ["running"]);
		expect(run.status).toBe("finished");
		expect(run.finishedAt).toBeDefined();
	});

	it("rejects transitions from the wrong status", () => {
		const run = runIn("init");
		expect(() => updateRunStatus(run, "running", ["validating"])).toThrow(
			new RunStatusError('Run run-1 cannot move from "init" to "running" (allowed from: validating)'),
		);
	});

	it("rejects any move out of a terminal status", () => {
		expect(() => updateRunStatus(runIn("crashed"), "running")).toThrow(RunStatusError);
	});

	it("aborts running runs only", () => {
		const running = runIn("running");
		abortRun(running);
		expect(running.status).toBe("aborting");

		expect(() => abortRun(runIn("validating"))).toThrow(
			'Aborting run run-1 is not implemented for the "validating" stage',
		);
		expect(() => abortRun(runIn("finished"))).toThrow("Run run-1 is already finished");
	});
});
