import fs from "node:fs";
import path from "node:path";
import type {
	EngineAdapter,
	EngineCapabilities,
	EngineContext,
	EngineRunResult,
	EngineRuntimeEvent,
	OutputSource,
	ShellRunner,
} from "../core/engine.js";
import { describeError, PlaybookError } from "../core/errors.js";
import { parsePlaybook } from "../core/playbook-parser.js";
import { mergeVars } from "../core/resolve.js";
import type { JobPlan, JobRun, PhaseRun, Playbook, RunPlan, RunRecord } from "../core/types.js";
import {
	abortRun,
	createRunRecord,
	RunStore,
	updateRunStatus,
} from "../store/run-store.js";
import { redactSecrets } from "../utils/redact.js";
import { runPlaybook } from "./playbook-interpreter.js";

export const EXIT_CANCELED = 130;

/**
 * Shared job lifecycle for engines that interpret playbooks themselves.
 * Subclasses only decide how a shell command is carried out.
 */
export abstract class PlaybookEngine implements EngineAdapter {
	abstract readonly id: string;

	abstract capabilities(): EngineCapabilities;

	protected abstract createRunner(context: EngineContext): ShellRunner;

	async run(plan: RunPlan, context: EngineContext): Promise<EngineRunResult> {
		const store = new RunStore(context.runStoreBase);
		const logDir = store.createLogsDir(plan.runId);
		const run = createRunRecord(plan.runId, this.id, plan.pipeline);
		run.logDir = logDir;
		run.jobs = plan.jobs.map((job) => ({
			jobName: job.jobName,
			status: "pending" as const,
			nodeset: job.job.nodeset,
			phases: job.phases.map((phase) => ({
				phaseId: phase.id,
				kind: phase.kind,
				playbook: phase.playbook,
				status: "pending" as const,
				tasks: [],
			})),
		}));

		const emit = (event: EngineRuntimeEvent): void => {
			store.writeRun(run);
			context.onEvent?.(event);
		};
		const finish = (exitCode: number): EngineRunResult => {
			emit({
				type: "run-finished",
				runId: run.id,
				status: run.status,
				exitCode,
				finishedAt: run.finishedAt ?? new Date().toISOString(),
			});
			return { exitCode, logsPath: logDir, run };
		};

		emit({
			type: "run-started",
			runId: run.id,
			engine: this.id,
			jobs: plan.jobs.map((job) => job.jobName),
			logDir,
			createdAt: run.createdAt,
		});

		updateRunStatus(run, "validating", ["init"]);
		let playbooks: Map<string, Playbook>;
		try {
			playbooks = loadPlaybooks(plan, context.repoRoot);
		} catch (error) {
			if (!(error instanceof PlaybookError)) {
				throw error;
			}
			run.error = error.message;
			updateRunStatus(run, "validation_failed", ["validating"]);
			return finish(1);
		}
		updateRunStatus(run, "running", ["validating"]);

		const onAbort = (): void => {
			if (run.status === "running") {
				abortRun(run);
				store.writeRun(run);
			}
		};
		if (context.signal?.aborted) {
			onAbort();
		}
		context.signal?.addEventListener("abort", onAbort);

		const runner = this.createRunner(context);
		try {
			for (const [index, jobPlan] of plan.jobs.entries()) {
				const jobRun = run.jobs[index];
				if (run.status === "aborting") {
					jobRun.status = "aborted";
					jobRun.phases.forEach((phase) => {
						phase.status = "aborted";
					});
					emit({ type: "job-finished", runId: run.id, jobName: jobRun.jobName, status: "aborted" });
					continue;
				}
				if (jobPlan.unrunnable) {
					jobRun.status = "skipped";
					jobRun.reason = jobPlan.unrunnable;
					jobRun.phases.forEach((phase) => {
						phase.status = "skipped";
					});
					emit({ type: "job-finished", runId: run.id, jobName: jobRun.jobName, status: "skipped" });
					continue;
				}
				await this.runJob(plan, jobPlan, jobRun, { run, store, runner, playbooks, context, emit });
			}
		} catch (error) {
			run.error = describeError(error, "Unknown engine error.");
			updateRunStatus(run, "crashed");
			finish(1);
			throw error;
		} finally {
			context.signal?.removeEventListener("abort", onAbort);
		}

		if (run.status === "aborting") {
			updateRunStatus(run, "aborted", ["aborting"]);
			return finish(EXIT_CANCELED);
		}
		updateRunStatus(run, "finished", ["running"]);
		const succeeded = run.jobs.some((job) => job.status === "success");
		const failed = run.jobs.some((job) => job.status === "failed");
		return finish(failed || !succeeded ? 1 : 0);
	}

	private async runJob(
		plan: RunPlan,
		jobPlan: JobPlan,
		jobRun: JobRun,
		deps: {
			run: RunRecord;
			store: RunStore;
			runner: ShellRunner;
			playbooks: Map<string, Playbook>;
			context: EngineContext;
			emit: (event: EngineRuntimeEvent) => void;
		},
	): Promise<void> {
		const { run, store, runner, playbooks, context, emit } = deps;
		jobRun.status = "running";
		emit({ type: "job-started", runId: run.id, jobName: jobRun.jobName });

		const deadline = jobPlan.timeoutMs ? Date.now() + jobPlan.timeoutMs : undefined;
		const vars = mergeVars(buildZuulVars(plan, jobPlan, context), jobPlan.vars);
		let failed = false;
		let aborted = false;

		for (const [index, phase] of jobPlan.phases.entries()) {
			const phaseRun = jobRun.phases[index];
			if (aborted || run.status === "aborting") {
				aborted = true;
				phaseRun.status = "aborted";
				continue;
			}
			if (failed && phase.kind !== "post-run") {
				phaseRun.status = "skipped";
				continue;
			}
			const playbook = playbooks.get(phase.playbook);
			if (!playbook) {
				throw new Error(`Playbook ${phase.playbook} was not loaded`);
			}

			const logPath = store.createLogFile(run.id, `${jobRun.jobName}-${phase.id}`);
			const status = await this.runPhase(phaseRun, playbook, {
				logPath,
				runner,
				vars,
				deadline: phase.kind === "post-run" ? undefined : deadline,
				context,
				jobName: jobRun.jobName,
				runId: run.id,
				emit,
			});
			failed = failed || status === "failed";
			aborted = aborted || status === "aborted";
		}

		jobRun.status = aborted ? "aborted" : failed ? "failed" : "success";
		emit({ type: "job-finished", runId: run.id, jobName: jobRun.jobName, status: jobRun.status });
	}

	private async runPhase(
		phaseRun: PhaseRun,
		playbook: Playbook,
		options: {
			logPath: string;
			runner: ShellRunner;
			vars: Record<string, unknown>;
			deadline?: number;
			context: EngineContext;
			jobName: string;
			runId: string;
			emit: (event: EngineRuntimeEvent) => void;
		},
	): Promise<PhaseRun["status"]> {
		const { context, emit, jobName, runId } = options;
		const startedAt = new Date();
		phaseRun.status = "running";
		phaseRun.startedAt = startedAt.toISOString();
		phaseRun.logPath = options.logPath;
		emit({
			type: "phase-started",
			runId,
			jobName,
			phaseId: phaseRun.phaseId,
			kind: phaseRun.kind,
			playbook: phaseRun.playbook,
			startedAt: phaseRun.startedAt,
		});

		const logStream = fs.createWriteStream(options.logPath, { flags: "a" });
		const log = (line: string, source: OutputSource = "stdout"): void => {
			const text = `${redactSecrets(line, context.secrets ?? [])}\n`;
			logStream.write(text);
			if (context.onOutput) {
				context.onOutput(text, source, jobName);
			} else if (source === "stderr") {
				process.stderr.write(text);
			} else {
				process.stdout.write(text);
			}
		};

		log(`$ playbook ${phaseRun.playbook} (${phaseRun.kind})`);
		const result = await runPlaybook(playbook, {
			runner: options.runner,
			vars: options.vars,
			cwd: context.repoRoot,
			deadline: options.deadline,
			signal: context.signal,
			log,
			onTask: (task) => {
				phaseRun.tasks.push(task);
				emit({ type: "task-finished", runId, jobName, phaseId: phaseRun.phaseId, task });
			},
		});
		if (result.error) {
			log(`error: ${result.error}`, "stderr");
		}
		await new Promise<void>((resolve) => logStream.end(resolve));

		const finishedAt = new Date();
		phaseRun.status = result.status;
		phaseRun.error = result.error;
		phaseRun.finishedAt = finishedAt.toISOString();
		phaseRun.durationMs = finishedAt.getTime() - startedAt.getTime();
		emit({
			type: "phase-finished",
			runId,
			jobName,
			phaseId: phaseRun.phaseId,
			status: phaseRun.status,
			durationMs: phaseRun.durationMs,
		});
		return phaseRun.status;
	}
}

export function buildZuulVars(
	plan: RunPlan,
	jobPlan: JobPlan,
	context: EngineContext,
): Record<string, unknown> {
	return {
		zuul: {
			build: plan.runId,
			job: jobPlan.jobName,
			pipeline: plan.pipeline ?? "local",
			timeout: jobPlan.job.timeout,
			project: {
				name: context.project ?? path.basename(context.repoRoot),
				src_dir: context.repoRoot,
			},
		},
	};
}

function loadPlaybooks(plan: RunPlan, repoRoot: string): Map<string, Playbook> {
	const playbooks = new Map<string, Playbook>();
	for (const job of plan.jobs) {
		if (job.unrunnable) {
			continue;
		}
		for (const phase of job.phases) {
			if (!playbooks.has(phase.playbook)) {
				playbooks.set(phase.playbook, parsePlaybook(path.resolve(repoRoot, phase.playbook)));
			}
		}
	}
	return playbooks;
}
