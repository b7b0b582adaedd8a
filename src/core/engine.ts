import type {
	JobOutcome,
	PhaseKind,
	PhaseStatus,
	RunPlan,
	RunRecord,
	RunStatus,
	TaskRun,
} from "./types.js";

export type EngineCapabilities = {
	spawnsProcesses: boolean;
	timeouts: boolean;
	cancellation: boolean;
};

export type OutputSource = "stdout" | "stderr";

export type EngineContext = {
	repoRoot: string;
	runStoreBase: string;
	project?: string;
	secrets?: string[];
	signal?: AbortSignal;
	onOutput?: (chunk: string, source: OutputSource, jobName?: string) => void;
	onEvent?: (event: EngineRuntimeEvent) => void;
};

export type EngineRunResult = {
	exitCode: number;
	logsPath: string;
	run: RunRecord;
};

export type EngineRuntimeEvent =
	| {
			type: "run-started";
			runId: string;
			engine: string;
			jobs: string[];
			logDir: string;
			createdAt: string;
	  }
	| {
			type: "job-started";
			runId: string;
			jobName: string;
	  }
	| {
			type: "phase-started";
			runId: string;
			jobName: string;
			phaseId: string;
			kind: PhaseKind;
			playbook: string;
			startedAt: string;
	  }
	| {
			type: "task-finished";
			runId: string;
			jobName: string;
			phaseId: string;
			task: TaskRun;
	  }
	| {
			type: "phase-finished";
			runId: string;
			jobName: string;
			phaseId: string;
			status: PhaseStatus;
			durationMs: number;
	  }
	| {
			type: "job-finished";
			runId: string;
			jobName: string;
			status: JobOutcome;
	  }
	| {
			type: "run-finished";
			runId: string;
			status: RunStatus;
			exitCode: number;
			finishedAt: string;
	  };

export type ShellCommand = {
	module: "shell" | "command";
	command: string;
	executable?: string;
	cwd: string;
	become: boolean;
	timeoutMs?: number;
	signal?: AbortSignal;
};

export type ShellResult = {
	rc: number;
	stdout: string;
	stderr: string;
	timedOut: boolean;
	aborted: boolean;
};

export interface ShellRunner {
	run(command: ShellCommand, onOutput?: (chunk: string, source: OutputSource) => void): Promise<ShellResult>;
}

export interface EngineAdapter {
	readonly id: string;
	capabilities(): EngineCapabilities;
	run(plan: RunPlan, context: EngineContext): Promise<EngineRunResult>;
}
