import { JobChainError } from "./errors.js";
import type { JobDefinition, ResolvedJob, ZuulConfig } from "./types.js";
import { isRecord } from "./yaml.js";

export type ResolveOptions = {
	externalJobs: string[];
};

export function buildJobMap(config: ZuulConfig): Map<string, JobDefinition> {
	return new Map(config.jobs.map((job) => [job.name, job]));
}

/**
 * Walks the parent chain from the job up to its root. The chain ends at a job
 * with no parent or at a parent that is provided outside this repository.
 * Throws on an unknown parent or a cycle.
 */
export function ancestorChain(
	jobs: Map<string, JobDefinition>,
	jobName: string,
	options: ResolveOptions,
): JobDefinition[] {
	const external = new Set(options.externalJobs);
	const chain: JobDefinition[] = [];
	const seen = new Set<string>();
	let current: string | undefined = jobName;

	while (current) {
		if (seen.has(current)) {
			throw new JobChainError(
				`Job "${jobName}" has a parent cycle: ${[...seen, current].join(" -> ")}`,
				"parent-cycle",
			);
		}
		seen.add(current);
		const job = jobs.get(current);
		if (!job) {
			if (current !== jobName && external.has(current)) {
				break;
			}
			if (current === jobName) {
				throw new JobChainError(`Job "${jobName}" is not defined`, "unknown-job");
			}
			throw new JobChainError(
				`Job "${chain[chain.length - 1]?.name ?? jobName}" has unknown parent "${current}"`,
				"unknown-parent",
			);
		}
		chain.push(job);
		current = job.parent;
	}

	return chain;
}

export function resolveJob(
	config: ZuulConfig,
	jobName: string,
	options: ResolveOptions,
): ResolvedJob {
	const chain = ancestorChain(buildJobMap(config), jobName, options);
	const rootFirst = [...chain].reverse();

	const resolved: ResolvedJob = {
		name: jobName,
		ancestors: chain.slice(1).map((job) => job.name),
		preRun: [],
		postRun: [],
		vars: {},
	};

	for (const job of rootFirst) {
		resolved.description = job.description ?? resolved.description;
		resolved.nodeset = job.nodeset ?? resolved.nodeset;
		resolved.run = job.run ?? resolved.run;
		resolved.timeout = job.timeout ?? resolved.timeout;
		resolved.preRun = [...resolved.preRun, ...job.preRun];
		resolved.postRun = [...job.postRun, ...resolved.postRun];
		resolved.vars = mergeVars(resolved.vars, job.vars);
	}

	return resolved;
}

export function mergeVars(
	base: Record<string, unknown>,
	override: Record<string, unknown>,
): Record<string, unknown> {
	const merged: Record<string, unknown> = { ...base };
	for (const [key, value] of Object.entries(override)) {
		const current = merged[key];
		merged[key] = isRecord(current) && isRecord(value) ? mergeVars(current, value) : value;
	}
	return merged;
}
