import fs from "node:fs";
import { resolveWithinBase } from "../utils/path-safety.js";
import { ConfigError, JobChainError } from "./errors.js";
import { ancestorChain, buildJobMap, resolveJob } from "./resolve.js";
import type { ZuulConfig } from "./types.js";

export type IssueCode =
	| "unknown-job"
	| "unknown-parent"
	| "parent-cycle"
	| "duplicate-job"
	| "unknown-nodeset"
	| "invalid-timeout"
	| "missing-playbook"
	| "unused-job";

export type ValidationIssue = {
	severity: "error" | "warning";
	code: IssueCode;
	message: string;
	job?: string;
	pipeline?: string;
};

export type ValidationOptions = {
	repoRoot: string;
	externalJobs: string[];
	nodesets: string[];
};

export type ValidationReport = {
	ok: boolean;
	errors: ValidationIssue[];
	warnings: ValidationIssue[];
};

export function validateConfig(config: ZuulConfig, options: ValidationOptions): ValidationReport {
	const issues: ValidationIssue[] = [];
	const external = new Set(options.externalJobs);
	const jobs = buildJobMap(config);
	const knownNodesets = new Set([
		...options.nodesets,
		...config.nodesets.map((nodeset) => nodeset.name),
	]);

	const counts = new Map<string, number>();
	for (const job of config.jobs) {
		counts.set(job.name, (counts.get(job.name) ?? 0) + 1);
	}
	for (const [name, count] of counts) {
		if (count > 1) {
			issues.push({
				severity: "error",
				code: "duplicate-job",
				job: name,
				message: `Job "${name}" is defined ${count} times`,
			});
		}
	}

	const referenced = new Set<string>();
	for (const project of config.projects) {
		for (const pipeline of project.pipelines) {
			for (const ref of pipeline.jobs) {
				referenced.add(ref.name);
				if (!jobs.has(ref.name) && !external.has(ref.name)) {
					issues.push({
						severity: "error",
						code: "unknown-job",
						job: ref.name,
						pipeline: pipeline.name,
						message: `Pipeline "${pipeline.name}" references undefined job "${ref.name}"`,
					});
				}
			}
		}
	}

	for (const job of config.jobs) {
		if (job.parent) {
			referenced.add(job.parent);
		}
	}

	for (const job of jobs.values()) {
		try {
			ancestorChain(jobs, job.name, options);
		} catch (error) {
			if (!(error instanceof JobChainError)) {
				throw error;
			}
			issues.push({
				severity: "error",
				code: error.reason === "parent-cycle" ? "parent-cycle" : "unknown-parent",
				job: job.name,
				message: error.message,
			});
			continue;
		}

		if (job.timeout !== undefined && (!Number.isInteger(job.timeout) || job.timeout <= 0)) {
			issues.push({
				severity: "error",
				code: "invalid-timeout",
				job: job.name,
				message: `Job "${job.name}" has invalid timeout ${job.timeout} (expected a positive number of seconds)`,
			});
		}

		const resolved = resolveJob(config, job.name, options);
		if (resolved.nodeset && !knownNodesets.has(resolved.nodeset)) {
			issues.push({
				severity: "error",
				code: "unknown-nodeset",
				job: job.name,
				message: `Job "${job.name}" uses unknown nodeset "${resolved.nodeset}"`,
			});
		}

		const playbooks = [...job.preRun, ...(job.run ? [job.run] : []), ...job.postRun];
		for (const playbook of playbooks) {
			const playbookPath = resolveWithinBase(options.repoRoot, playbook);
			if (!playbookPath || !fs.existsSync(playbookPath)) {
				issues.push({
					severity: "warning",
					code: "missing-playbook",
					job: job.name,
					message: `Job "${job.name}" references missing playbook ${playbook}`,
				});
			}
		}

		if (!referenced.has(job.name)) {
			issues.push({
				severity: "warning",
				code: "unused-job",
				job: job.name,
				message: `Job "${job.name}" is not used by any pipeline or child job`,
			});
		}
	}

	const errors = issues.filter((issue) => issue.severity === "error");
	const warnings = issues.filter((issue) => issue.severity === "warning");
	return { ok: errors.length === 0, errors, warnings };
}

export function assertValidConfig(config: ZuulConfig, options: ValidationOptions): ValidationReport {
	const report = validateConfig(config, options);
	if (!report.ok) {
		const details = report.errors.map((issue) => `  - ${issue.message}`).join("\n");
		throw new ConfigError(`Zuul configuration has ${report.errors.length} error(s):\n${details}`);
	}
	return report;
}
