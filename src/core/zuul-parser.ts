import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ConfigError, formatZodError } from "./errors.js";
import type {
	JobDefinition,
	JobReference,
	Nodeset,
	Pipeline,
	Project,
	ZuulConfig,
} from "./types.js";
import { isRecord, readYamlFile } from "./yaml.js";

export const DEFAULT_ZUUL_SOURCES = ["zuul.yaml", ".zuul.yaml", "zuul.d", ".zuul.d"];

const IGNORED_ITEMS = new Set(["project-template", "pipeline", "semaphore", "secret", "queue"]);
const PROJECT_SETTINGS = new Set([
	"name",
	"templates",
	"vars",
	"default-branch",
	"merge-mode",
	"queue",
	"description",
]);

const StringListSchema = z
	.union([z.string(), z.array(z.string())])
	.optional()
	.transform((value) => {
		if (value === undefined) {
			return [];
		}
		return Array.isArray(value) ? value : [value];
	});

const VarsSchema = z.record(z.unknown()).nullish().transform((value) => value ?? {});

const JobSchema = z.object({
	name: z.string().min(1),
	parent: z.string().optional(),
	description: z.string().optional(),
	nodeset: z.string().optional(),
	"pre-run": StringListSchema,
	run: z.string().optional(),
	"post-run": StringListSchema,
	timeout: z.number().optional(),
	vars: VarsSchema,
});

const NodesetSchema = z.object({
	name: z.string().min(1),
	nodes: z
		.array(
			z.object({
				name: z.union([z.string(), z.array(z.string())]),
				label: z.string(),
			}),
		)
		.default([]),
});

const PipelineSchema = z.object({
	jobs: z
		.array(z.union([z.string(), z.record(z.object({ vars: VarsSchema }).passthrough().nullable())]))
		.default([]),
});

const ProjectSchema = z
	.object({
		templates: z.array(z.string()).default([]),
		vars: VarsSchema,
	})
	.passthrough();

export function findZuulConfigFiles(
	repoRoot: string,
	sources: string[] = DEFAULT_ZUUL_SOURCES,
): string[] {
	const files: string[] = [];
	for (const source of sources) {
		const target = path.resolve(repoRoot, source);
		if (!fs.existsSync(target)) {
			continue;
		}
		if (fs.statSync(target).isDirectory()) {
			const entries = fs
				.readdirSync(target)
				.filter((file: string) => isYamlFile(file))
				.sort()
				.map((file: string) => path.join(target, file));
			files.push(...entries);
		} else if (isYamlFile(target)) {
			files.push(target);
		}
	}
	return files;
}

export function loadZuulConfig(repoRoot: string, sources?: string[]): ZuulConfig {
	const files = findZuulConfigFiles(repoRoot, sources);
	const merged: ZuulConfig = { sources: files, jobs: [], nodesets: [], projects: [] };
	for (const file of files) {
		const parsed = parseZuulFile(file);
		merged.jobs.push(...parsed.jobs);
		merged.nodesets.push(...parsed.nodesets);
		merged.projects.push(...parsed.projects);
	}
	return merged;
}

export function parseZuulFile(filePath: string): ZuulConfig {
	const doc = readYamlFile(filePath, (message) => new ConfigError(message));
	const result: ZuulConfig = { sources: [filePath], jobs: [], nodesets: [], projects: [] };
	if (doc === null || doc === undefined) {
		return result;
	}
	if (!Array.isArray(doc)) {
		throw new ConfigError(`${filePath}: expected a list of configuration items`);
	}

	doc.forEach((item: unknown, index: number) => {
		const where = `${filePath}#${index}`;
		if (!isRecord(item) || Object.keys(item).length !== 1) {
			throw new ConfigError(`${where} each item must be a map with a single key`);
		}
		const [kind, body] = Object.entries(item)[0];
		switch (kind) {
			case "job":
				result.jobs.push(parseJob(body, where));
				return;
			case "nodeset":
				result.nodesets.push(parseNodeset(body, where));
				return;
			case "project":
				result.projects.push(parseProject(body, where));
				return;
			default:
				if (IGNORED_ITEMS.has(kind)) {
					return;
				}
				throw new ConfigError(`${where} unknown configuration item "${kind}"`);
		}
	});

	return result;
}

function parseJob(body: unknown, where: string): JobDefinition {
	const parsed = JobSchema.safeParse(body);
	if (!parsed.success) {
		throw new ConfigError(`${where} invalid job: ${formatZodError(parsed.error)}`);
	}
	const job = parsed.data;
	return {
		name: job.name,
		parent: job.parent,
		description: job.description,
		nodeset: job.nodeset,
		preRun: job["pre-run"],
		run: job.run,
		postRun: job["post-run"],
		timeout: job.timeout,
		vars: job.vars,
		source: where,
	};
}

function parseNodeset(body: unknown, where: string): Nodeset {
	const parsed = NodesetSchema.safeParse(body);
	if (!parsed.success) {
		throw new ConfigError(`${where} invalid nodeset: ${formatZodError(parsed.error)}`);
	}
	return {
		name: parsed.data.name,
		labels: parsed.data.nodes.map((node) => node.label),
		source: where,
	};
}

function parseProject(body: unknown, where: string): Project {
	const parsed = ProjectSchema.safeParse(body ?? {});
	if (!parsed.success) {
		throw new ConfigError(`${where} invalid project: ${formatZodError(parsed.error)}`);
	}

	const pipelines: Pipeline[] = [];
	for (const [key, value] of Object.entries(parsed.data)) {
		if (PROJECT_SETTINGS.has(key)) {
			continue;
		}
		const pipeline = PipelineSchema.safeParse(value ?? {});
		if (!pipeline.success) {
			throw new ConfigError(
				`${where} invalid pipeline "${key}": ${formatZodError(pipeline.error)}`,
			);
		}
		pipelines.push({
			name: key,
			jobs: pipeline.data.jobs.map((entry) => parseJobReference(entry, where, key)),
		});
	}

	return {
		templates: parsed.data.templates,
		vars: parsed.data.vars,
		pipelines,
		source: where,
	};
}

function parseJobReference(
	entry: string | Record<string, { vars: Record<string, unknown> } | null>,
	where: string,
	pipeline: string,
): JobReference {
	if (typeof entry === "string") {
		return { name: entry, vars: {} };
	}
	const keys = Object.keys(entry);
	if (keys.length !== 1) {
		throw new ConfigError(
			`${where} pipeline "${pipeline}" job entries must name exactly one job`,
		);
	}
	const name = keys[0];
	return { name, vars: entry[name]?.vars ?? {} };
}

function isYamlFile(file: string): boolean {
	return file.endsWith(".yaml") || file.endsWith(".yml");
}
