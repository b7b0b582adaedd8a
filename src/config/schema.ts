import { z } from "zod";
import { DEFAULT_ZUUL_SOURCES } from "../core/zuul-parser.js";

export const DEFAULT_EXTERNAL_JOBS = ["base"];
export const DEFAULT_NODESETS = ["ubuntu-bionic", "ubuntu-focal", "ubuntu-jammy", "centos-7", "centos-8"];

export const ConfigSchema = z.object({
	engine: z.enum(["local", "dry-run"]).default("local"),
	project: z.string().optional(),
	zuul: z
		.object({
			sources: z.array(z.string()).default(DEFAULT_ZUUL_SOURCES),
			externalJobs: z.array(z.string()).default(DEFAULT_EXTERNAL_JOBS),
			nodesets: z.array(z.string()).default(DEFAULT_NODESETS),
		})
		.default({
			sources: DEFAULT_ZUUL_SOURCES,
			externalJobs: DEFAULT_EXTERNAL_JOBS,
			nodesets: DEFAULT_NODESETS,
		}),
	vars: z.record(z.unknown()).default({}),
	secrets: z.record(z.unknown()).default({}),
	simulate: z.record(z.number().int()).default({}),
	defaultJob: z.string().optional(),
	defaultPipeline: z.string().optional(),
});

export type CistageConfig = z.infer<typeof ConfigSchema>;
