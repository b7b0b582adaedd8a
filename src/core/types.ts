export type ShellAction = {
	module: "shell" | "command";
	cmd: string;
	executable?: string;
	chdir?: string;
};

export type Task = {
	id: string;
	name: string;
	hosts: string;
	action: ShellAction | { module: "unsupported"; name: string };
	when: string[];
	register?: string;
	ignoreErrors: boolean;
	become: boolean;
};

export type Play = {
	name: string;
	hosts: string;
	tasks: Task[];
};

export type Playbook = {
	path: string;
	plays: Play[];
};

export type JobDefinition = {
	name: string;
	parent?: string;
	description?: string;
	nodeset?: string;
	preRun: string[];
	run?: string;
	postRun: string[];
	timeout?: number;
	vars: Record<string, unknown>;
	source: string;
};

export type Nodeset = {
	name: string;
	labels: string[];
	source: string;
};

export type JobReference = {
	name: string;
	vars: Record<string, unknown>;
};

export type Pipeline = {
	name: string;
	jobs: JobReference[];
};

export type Project = {
	templates: string[];
	vars: Record<string, unknown>;
	pipelines: Pipeline[];
	source: string;
};

export type ZuulConfig = {
	sources: string[];
	jobs: JobDefinition[];
	nodesets: Nodeset[];
	projects: Project[];
};

export type ResolvedJob = {
	name: string;
	ancestors: string[];
	description?: string;
	nodeset?: string;
	preRun: string[];
	run?: string;
	postRun: string[];
	timeout?: number;
	vars: Record<string, unknown>;
};

export type PhaseKind = "pre-run" | "run" | "post-run";

export type PlannedPhase = {
	id: string;
	kind: PhaseKind;
	playbook: string;
};

export type JobPlan = {
	jobName: string;
	job: ResolvedJob;
	phases: PlannedPhase[];
	timeoutMs?: number;
	vars: Record<string, unknown>;
	unrunnable?: string;
};

export type RunPlan = {
	runId: string;
	pipeline?: string;
	jobs: JobPlan[];
};

export type TaskResult = {
	rc?: number;
	stdout?: string;
	stderr?: string;
	failed: boolean;
	skipped: boolean;
	changed: boolean;
};

export type TaskOutcome = "ok" | "failed" | "ignored" | "skipped" | "unsupported";

export type TaskRun = {
	taskId: string;
	name: string;
	outcome: TaskOutcome;
	rc?: number;
	durationMs?: number;
};

export type PhaseStatus = "pending" | "running" | "success" | "failed" | "skipped" | "aborted";

export type PhaseRun = {
	phaseId: string;
	kind: PhaseKind;
	playbook: string;
	status: PhaseStatus;
	startedAt?: string;
	finishedAt?: string;
	durationMs?: number;
	logPath?: string;
	error?: string;
	tasks: TaskRun[];
};

export type JobOutcome = "pending" | "running" | "success" | "failed" | "skipped" | "aborted";

export type JobRun = {
	jobName: string;
	status: JobOutcome;
	nodeset?: string;
	reason?: string;
	phases: PhaseRun[];
};

export type RunStatus =
	| "init"
	| "validating"
	| "validation_failed"
	| "running"
	| "aborting"
	| "aborted"
	| "finished"
	| "crashed";

export type RunRecord = {
	schemaVersion: number;
	id: string;
	engine: string;
	pipeline?: string;
	status: RunStatus;
	createdAt: string;
	finishedAt?: string;
	error?: string;
	jobs: JobRun[];
	logDir?: string;
};
