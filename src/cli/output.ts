import type { ProbeReport } from "../core/probes.js";
import type { JobPlan, RunPlan, RunRecord } from "../core/types.js";
import type { ValidationReport } from "../core/validate.js";

export function writeLine(text = ""): void {
	process.stdout.write(`${text}\n`);
}

export function writeError(text: string): void {
	process.stderr.write(`${text}\n`);
}

export function printValidationReport(report: ValidationReport, sources: string[]): void {
	writeLine(`Checked ${sources.length} configuration file(s).`);
	for (const issue of report.errors) {
		writeLine(`error   [${issue.code}] ${issue.message}`);
	}
	for (const issue of report.warnings) {
		writeLine(`warning [${issue.code}] ${issue.message}`);
	}
	writeLine(
		report.ok
			? `OK (${report.warnings.length} warning(s))`
			: `${report.errors.length} error(s), ${report.warnings.length} warning(s)`,
	);
}

export function formatJobPlan(job: JobPlan): string[] {
	const lines = [`${job.jobName}${job.job.nodeset ? ` [${job.job.nodeset}]` : ""}`];
	if (job.job.ancestors.length > 0) {
		lines.push(`  inherits: ${job.job.ancestors.join(" -> ")}`);
	}
	if (job.job.timeout) {
		lines.push(`  timeout: ${job.job.timeout}s`);
	}
	for (const phase of job.phases) {
		lines.push(`  ${phase.kind.padEnd(8)} ${phase.playbook}`);
	}
	if (job.unrunnable) {
		lines.push(`  cannot run locally: ${job.unrunnable}`);
	}
	return lines;
}

export function printPlan(plan: RunPlan): void {
	if (plan.pipeline) {
		writeLine(`Pipeline ${plan.pipeline}: ${plan.jobs.length} job(s)`);
	}
	for (const job of plan.jobs) {
		formatJobPlan(job).forEach((line) => writeLine(line));
	}
}

export function printProbeReport(report: ProbeReport): void {
	if (report.probes.length === 0) {
		return;
	}
	const detected = report.detected.length > 0 ? report.detected.join(", ") : "none";
	writeLine(`Package managers detected: ${detected}`);
	for (const branch of report.branches) {
		writeLine(`  ${branch.executed ? "ran    " : "skipped"} ${branch.name} (when: ${branch.guard})`);
	}
	for (const warning of report.warnings) {
		writeError(`warning: ${warning}`);
	}
}

export function buildJsonSummary(run: RunRecord, exitCode: number): Record<string, unknown> {
	return {
		runId: run.id,
		engine: run.engine,
		pipeline: run.pipeline,
		status: run.status,
		exitCode,
		error: run.error,
		jobs: run.jobs.map((job) => ({
			jobName: job.jobName,
			status: job.status,
			reason: job.reason,
			phases: job.phases.map((phase) => ({
				phaseId: phase.phaseId,
				playbook: phase.playbook,
				status: phase.status,
				durationMs: phase.durationMs,
				error: phase.error,
				tasks: phase.tasks.map((task) => ({
					name: task.name,
					outcome: task.outcome,
					rc: task.rc,
				})),
			})),
		})),
		logsDir: run.logDir,
	};
}

export function printRunSummary(run: RunRecord): void {
	for (const job of run.jobs) {
		writeLine(`${job.jobName}: ${job.status}${job.reason ? ` (${job.reason})` : ""}`);
		for (const phase of job.phases) {
			const error = phase.error ? ` - ${phase.error}` : "";
			writeLine(`  ${phase.phaseId.padEnd(12)} ${phase.status}${error}`);
		}
	}
}
