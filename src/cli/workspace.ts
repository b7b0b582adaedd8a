import path from "node:path";
import { loadConfig } from "../config/load-config.js";
import type { CistageConfig } from "../config/schema.js";
import type { PlanOptions } from "../core/plan.js";
import { mergeVars } from "../core/resolve.js";
import { setVariable } from "../core/template.js";
import type { ZuulConfig } from "../core/types.js";
import type { ValidationOptions, ValidationReport } from "../core/validate.js";
import { validateConfig } from "../core/validate.js";
import { loadZuulConfig } from "../core/zuul-parser.js";
import { collectSecretValues } from "../utils/redact.js";

export type Workspace = {
	repoRoot: string;
	config: CistageConfig;
	configPath?: string;
	zuul: ZuulConfig;
	validation: ValidationReport;
	runStoreBase: string;
};

export function loadWorkspace(repoRoot: string): Workspace {
	const { config, path: configPath } = loadConfig(repoRoot);
	const zuul = loadZuulConfig(repoRoot, config.zuul.sources);
	const validation = validateConfig(zuul, validationOptions(repoRoot, config));
	return {
		repoRoot,
		config,
		configPath,
		zuul,
		validation,
		runStoreBase: runStoreBaseFor(repoRoot),
	};
}

export function validationOptions(repoRoot: string, config: CistageConfig): ValidationOptions {
	return {
		repoRoot,
		externalJobs: config.zuul.externalJobs,
		nodesets: config.zuul.nodesets,
	};
}

export function planOptions(
	repoRoot: string,
	config: CistageConfig,
	cliVars: Record<string, string> = {},
): PlanOptions {
	const extra = Object.entries(cliVars).reduce<Record<string, unknown>>(
		(vars, [key, value]) => setVariable(vars, key, value),
		{},
	);
	return {
		repoRoot,
		externalJobs: config.zuul.externalJobs,
		vars: [config.secrets, extra].reduce(mergeVars, config.vars),
	};
}

export function secretValues(config: CistageConfig): string[] {
	return collectSecretValues(config.secrets);
}

export function runStoreBaseFor(repoRoot: string): string {
	return path.join(repoRoot, ".cistage", "runs");
}
