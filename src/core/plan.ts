import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { resolveWithinBase } from "../utils/path-safety.js";
import { ConfigError } from "./errors.js";
import { mergeVars, resolveJob } from "./resolve.js";
import type {
	JobPlan,
	JobReference,
	PlannedPhase,
	RunPlan,
	ZuulConfig,
} from "./types.js";

export type PlanOptions = {
	repoRoot: string;
	externalJobs: string[];
	vars?: Record<string, unknown>;
};

export function planJob(
	config: ZuulConfig,
	reference: JobReference | string,
	options: PlanOptions,
): JobPlan {
	const ref = typeof reference === "string" ? { name: reference, vars: {} } : reference;
	const job = resolveJob(config, ref.name, options);

	const phases: PlannedPhase[] = [
		...job.preRun.map((playbook, index) => ({
			id: `pre-run-${index + 1}`,
			kind: "pre-run" as const,
			playbook,
		})),
		...(job.run ? [{ id: "run", kind: "run" as const, playbook: job.run }] : []),
		...job.postRun.map((playbook, index) => ({
			id: `post-run-${index + 1}`,
			kind: "post-run" as const,
			playbook,
		})),
	];

	const projectVars = config.projects.reduce<Record<string, unknown>>(
		(merged, project) => mergeVars(merged, project.vars),
		{},
	);
	const vars = [job.vars, ref.vars, options.vars ?? {}].reduce(mergeVars, projectVars);

	return {
		jobName: ref.name,
		job,
		phases,
		timeoutMs: job.timeout ? job.timeout * 1000 : undefined,
		vars,
		unrunnable: findUnrunnableReason(job.run, phases, options.repoRoot),
	};
}

export function listPipelines(config: ZuulConfig): string[] {
	const names = new Set<string>();
	for (const project of config.projects) {
		for (const pipeline of project.pipelines) {
			names.add(pipeline.name);
		}
	}
	return Array.from(names);
}

export function pipelineJobs(config: ZuulConfig, pipelineName: string): JobReference[] {
	const refs = config.projects.flatMap((project) =>
		project.pipelines
			.filter((pipeline) => pipeline.name === pipelineName)
			.flatMap((pipeline) => pipeline.jobs),
	);
	if (refs.length === 0 && !listPipelines(config).includes(pipelineName)) {
		throw new ConfigError(
			`Unknown pipeline "${pipelineName}". Available pipelines: ${listPipelines(config).join(", ")}`,
		);
	}
	return refs;
}

/** Plans every job the pipeline references, in list order. */
export function planPipeline(config: ZuulConfig, pipelineName: string, options: PlanOptions): JobPlan[] {
	return pipelineJobs(config, pipelineName).map((ref) => planJob(config, ref, options));
}

export function buildRunPlan(
	config: ZuulConfig,
	selection: { pipeline?: string; jobs?: string[] },
	options: PlanOptions,
): RunPlan {
	const names = selection.jobs ?? [];
	let jobs: JobPlan[];
	if (selection.pipeline && names.length === 0) {
		jobs = planPipeline(config, selection.pipeline, options);
	} else {
		const fromPipeline = selection.pipeline ? pipelineJobs(config, selection.pipeline) : [];
		jobs = names.map((name) =>
			planJob(config, fromPipeline.find((ref) => ref.name === name) ?? { name, vars: {} }, options),
		);
	}

	return {
		runId: createRunId(),
		pipeline: selection.pipeline,
		jobs,
	};
}

/** Wraps one playbook in a job of its own, with no inheritance and no pre/post phases. */
export function planPlaybook(playbook: string, options: PlanOptions): RunPlan {
	const name = path.basename(playbook, path.extname(playbook));
	const phases: PlannedPhase[] = [{ id: "run", kind: "run", playbook }];
	return {
		runId: createRunId(),
		jobs: [
			{
				jobName: name,
				job: { name, ancestors: [], preRun: [], run: playbook, postRun: [], vars: {} },
				phases,
				vars: options.vars ?? {},
				unrunnable: findUnrunnableReason(playbook, phases, options.repoRoot),
			},
		],
	};
}

function findUnrunnableReason(
	run: string | undefined,
	phases: PlannedPhase[],
	repoRoot: string,
): string | undefined {
	if (!run) {
		return "job has no run playbook";
	}
	const missing = phases
		.map((phase) => phase.playbook)
		.filter((playbook) => {
			const playbookPath = resolveWithinBase(repoRoot, playbook);
			return !playbookPath || !fs.existsSync(playbookPath);
		});
	if (missing.length > 0) {
		return `missing playbook(s): ${missing.join(", ")}`;
	}
	return undefined;
}

function createRunId(): string {
	const now = new Date();
	const stamp = now.toISOString().replace(/[-:]/g, "").split(".")[0];
	const random = crypto.randomBytes(3).toString("hex");
	return `${stamp}-${random}`;
}
