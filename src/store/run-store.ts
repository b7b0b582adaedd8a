import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import type { RunRecord, RunStatus } from "../core/types.js";
import { ensureWithinBase, sanitizePathSegment } from "../utils/path-safety.js";

export const RUN_RECORD_SCHEMA_VERSION = 1;

const TERMINAL_STATUSES: RunStatus[] = ["finished", "crashed", "aborted", "validation_failed"];
const ABORT_NOT_IMPLEMENTED: RunStatus[] = ["init", "validating"];

export class RunStatusError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "RunStatusError";
	}
}

export class RunStore {
	constructor(private readonly baseDir: string) {}

	ensureBaseDir(): void {
		fs.mkdirSync(this.baseDir, { recursive: true });
	}

	createRunDir(runId: string): string {
		this.ensureBaseDir();
		const runDir = ensureWithinBase(this.baseDir, runId, "run id");
		fs.mkdirSync(runDir, { recursive: true });
		return runDir;
	}

	createLogsDir(runId: string): string {
		const runDir = this.createRunDir(runId);
		const logsDir = path.join(runDir, "logs");
		fs.mkdirSync(logsDir, { recursive: true });
		return logsDir;
	}

	createLogFile(runId: string, name: string): string {
		const logsDir = this.createLogsDir(runId);
		return ensureWithinBase(logsDir, getLogFileName(name), "log file");
	}

	writeRun(run: RunRecord): void {
		const runDir = this.createRunDir(run.id);
		const recordPath = path.join(runDir, "run.json");
		fs.writeFileSync(recordPath, JSON.stringify(run, null, 2));
	}
}

export function createRunRecord(runId: string, engine: string, pipeline?: string): RunRecord {
	return {
		schemaVersion: RUN_RECORD_SCHEMA_VERSION,
		id: runId,
		engine,
		pipeline,
		status: "init",
		createdAt: new Date().toISOString(),
		jobs: [],
	};
}

/**
 * Moves a run to `next` when its current status is one of `allowed`.
 * Without `allowed`, any non-terminal status may move.
 */
export function updateRunStatus(run: RunRecord, next: RunStatus, allowed?: RunStatus[]): void {
	const permitted = allowed ?? nonTerminalStatuses();
	if (!permitted.includes(run.status)) {
		throw new RunStatusError(
			`Run ${run.id} cannot move from "${run.status}" to "${next}" (allowed from: ${permitted.join(", ")})`,
		);
	}
	run.status = next;
	if (TERMINAL_STATUSES.includes(next)) {
		run.finishedAt = new Date().toISOString();
	}
}

export function abortRun(run: RunRecord): void {
	if (ABORT_NOT_IMPLEMENTED.includes(run.status)) {
		throw new RunStatusError(
			`Aborting run ${run.id} is not implemented for the "${run.status}" stage`,
		);
	}
	if (TERMINAL_STATUSES.includes(run.status)) {
		throw new RunStatusError(`Run ${run.id} is already ${run.status}`);
	}
	updateRunStatus(run, "aborting", ["running", "aborting"]);
}

export function getLogFileName(name: string): string {
	const normalized = sanitizePathSegment(name.toLowerCase(), "log");
	const hash = crypto.createHash("sha1").update(name).digest("hex").slice(0, 8);
	return `${normalized}-${hash}.log`;
}

function nonTerminalStatuses(): RunStatus[] {
	const all: RunStatus[] = [
		"init",
		"validating",
		"validation_failed",
		"running",
		"aborting",
		"aborted",
		"finished",
		"crashed",
	];
	return all.filter((status) => !TERMINAL_STATUSES.includes(status));
}
