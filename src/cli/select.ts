import { cancel, isCancel, multiselect, select } from "@clack/prompts";
import type { JobReference, ZuulConfig } from "../core/types.js";
import type { CliOptions } from "./args.js";

export function resolveJobsFromArgs(
	options: CliOptions,
	defaultJob?: string,
): string[] | undefined {
	if (options.jobs?.length) {
		return options.jobs;
	}
	if (!options.pipeline && defaultJob) {
		return [defaultJob];
	}
	return undefined;
}

export function runnableJobNames(config: ZuulConfig, refs: JobReference[]): string[] {
	const names = refs.length > 0 ? refs.map((ref) => ref.name) : config.jobs.map((job) => job.name);
	return Array.from(new Set(names));
}

export async function selectPipeline(pipelines: string[]): Promise<string | null> {
	const selection = await select<{ value: string; label: string }[], string>({
		message: "Select a pipeline",
		options: pipelines.map((pipeline) => ({ value: pipeline, label: pipeline })),
	});
	if (isCancel(selection)) {
		cancel("Canceled.");
		return null;
	}
	return selection;
}

export async function selectJobs(
	config: ZuulConfig,
	names: string[],
): Promise<string[] | null> {
	const nodesets = new Map(config.jobs.map((job) => [job.name, job.nodeset]));
	const selection = await multiselect<{ value: string; label: string; hint?: string }[], string>({
		message: "Select jobs to run",
		options: names.map((name) => {
			const nodeset = nodesets.get(name);
			return {
				value: name,
				label: name,
				hint: nodeset,
			};
		}),
		required: true,
	});
	if (isCancel(selection)) {
		cancel("Canceled.");
		return null;
	}
	return selection;
}
