import fs from "node:fs";
import path from "node:path";
import process from "node:process";
import { intro } from "@clack/prompts";
import { loadConfig } from "../config/load-config.js";
import type { CistageConfig } from "../config/schema.js";
import type { EngineContext, EngineRunResult } from "../core/engine.js";
import { ConfigError, PlaybookError, TemplateError } from "../core/errors.js";
import { buildRunPlan, listPipelines, pipelineJobs, planPlaybook } from "../core/plan.js";
import { parsePlaybook } from "../core/playbook-parser.js";
import { summarizeProbes } from "../core/probes.js";
import type { RunPlan } from "../core/types.js";
import { createEngineAdapter } from "../engines/factory.js";
import { EXIT_CANCELED } from "../engines/playbook-engine.js";
import type { CliOptions } from "./args.js";
import { parseArgs, printHelp, readPackageVersion } from "./args.js";
import { executeRun } from "./execute-run.js";
import { runInit } from "./init.js";
import {
	buildJsonSummary,
	printPlan,
	printProbeReport,
	printRunSummary,
	printValidationReport,
	writeError,
	writeLine,
} from "./output.js";
import { resolveJobsFromArgs, runnableJobNames, selectJobs, selectPipeline } from "./select.js";
import type { Workspace } from "./workspace.js";
import { loadWorkspace, planOptions, runStoreBaseFor, secretValues } from "./workspace.js";

export const EXIT_USAGE = 2;

type Selection = { pipeline?: string; jobs?: string[] };

export async function runCli(
	argv: string[] = process.argv.slice(2),
	cwd: string = process.cwd(),
): Promise<number> {
	const args = parseArgs(argv);
	if (args.help) {
		printHelp();
		return 0;
	}
	if (args.version) {
		writeLine(`cistage ${readPackageVersion()}`);
		return 0;
	}
	if (args.errors?.length || args.unknown?.length) {
		args.errors?.forEach((error) => writeError(error));
		if (args.unknown?.length) {
			writeError(`Unknown option(s): ${args.unknown.join(", ")}`);
		}
		writeError("Run `cistage --help` for usage.");
		return EXIT_USAGE;
	}

	try {
		return await dispatch(args, cwd);
	} catch (error) {
		const label = errorLabel(error);
		if (!label || !(error instanceof Error)) {
			throw error;
		}
		writeError(`${label}: ${error.message}`);
		return 1;
	}
}

async function dispatch(args: CliOptions, repoRoot: string): Promise<number> {
	switch (args.command) {
		case "init":
			runInit(repoRoot);
			return 0;
		case "validate":
			return validateCommand(args, repoRoot);
		case "plan":
			return planCommand(args, repoRoot);
		case "playbook":
			return playbookCommand(args, repoRoot);
		case "run":
			return runCommand(args, repoRoot);
	}
}

function validateCommand(args: CliOptions, repoRoot: string): number {
	const workspace = loadWorkspace(repoRoot);
	if (args.json) {
		writeLine(JSON.stringify({ sources: workspace.zuul.sources, ...workspace.validation }));
	} else {
		printValidationReport(workspace.validation, workspace.zuul.sources);
	}
	return workspace.validation.ok ? 0 : 1;
}

async function planCommand(args: CliOptions, repoRoot: string): Promise<number> {
	const workspace = loadWorkspace(repoRoot);
	if (!rejectInvalid(workspace)) {
		return 1;
	}
	const selection = await resolveSelection(args, workspace);
	if (!selection) {
		return EXIT_CANCELED;
	}
	if (!selection.jobs && !selection.pipeline) {
		return reportNoSelection();
	}
	const plan = buildRunPlan(
		workspace.zuul,
		selection,
		planOptions(repoRoot, workspace.config, args.vars),
	);
	if (args.json) {
		writeLine(JSON.stringify(plan));
	} else {
		printPlan(plan);
	}
	return 0;
}

async function runCommand(args: CliOptions, repoRoot: string): Promise<number> {
	const workspace = loadWorkspace(repoRoot);
	if (!rejectInvalid(workspace)) {
		return 1;
	}
	const selection = await resolveSelection(args, workspace);
	if (!selection) {
		return EXIT_CANCELED;
	}
	if (!selection.jobs && !selection.pipeline) {
		return reportNoSelection();
	}
	const plan = buildRunPlan(
		workspace.zuul,
		selection,
		planOptions(repoRoot, workspace.config, args.vars),
	);
	if (plan.jobs.length === 0) {
		writeError(`Pipeline "${plan.pipeline ?? ""}" has no jobs.`);
		return 1;
	}
	const result = await execute(args, workspace.config, repoRoot, plan);
	if (args.json) {
		writeLine(JSON.stringify(buildJsonSummary(result.run, result.exitCode)));
	}
	return result.exitCode;
}

async function playbookCommand(args: CliOptions, repoRoot: string): Promise<number> {
	if (!args.playbook) {
		writeError("Missing playbook path. Usage: cistage playbook <file>");
		return EXIT_USAGE;
	}
	const playbookPath = path.resolve(repoRoot, args.playbook);
	if (!fs.existsSync(playbookPath)) {
		writeError(`Playbook not found: ${args.playbook}`);
		return 1;
	}
	const { config } = loadConfig(repoRoot);
	const playbook = parsePlaybook(playbookPath);
	const plan = planPlaybook(
		path.relative(repoRoot, playbookPath),
		planOptions(repoRoot, config, args.vars),
	);

	const result = await execute(args, config, repoRoot, plan);
	const tasks = result.run.jobs.flatMap((job) => job.phases.flatMap((phase) => phase.tasks));
	const probes = summarizeProbes(playbook, tasks);
	if (args.json) {
		writeLine(JSON.stringify({ ...buildJsonSummary(result.run, result.exitCode), probes }));
	} else {
		printProbeReport(probes);
	}
	return result.exitCode;
}

async function execute(
	args: CliOptions,
	config: CistageConfig,
	repoRoot: string,
	plan: RunPlan,
): Promise<EngineRunResult> {
	const adapter = createEngineAdapter(args.engine ?? config.engine, {
		simulate: { ...config.simulate, ...args.simulate },
	});
	const isTty = Boolean(process.stdout.isTTY);
	const controller = new AbortController();
	const onSigint = (): void => controller.abort();
	process.on("SIGINT", onSigint);

	const context: EngineContext = {
		repoRoot,
		runStoreBase: runStoreBaseFor(repoRoot),
		project: config.project,
		secrets: secretValues(config),
		signal: controller.signal,
	};

	try {
		if (isTty && !args.json) {
			intro(`cistage · ${adapter.id}`);
		}
		const result = await executeRun({
			adapter,
			plan,
			context,
			isTty,
			json: Boolean(args.json),
		});
		if (!args.json && !isTty) {
			printRunSummary(result.run);
		}
		return result;
	} finally {
		process.off("SIGINT", onSigint);
	}
}

function rejectInvalid(workspace: Workspace): boolean {
	if (workspace.validation.ok) {
		return true;
	}
	printValidationReport(workspace.validation, workspace.zuul.sources);
	writeError("Refusing to run: fix the configuration errors above.");
	return false;
}

async function resolveSelection(
	args: CliOptions,
	workspace: Workspace,
): Promise<Selection | null> {
	const jobs = resolveJobsFromArgs(args, workspace.config.defaultJob);
	const pipeline = args.pipeline ?? (jobs ? undefined : workspace.config.defaultPipeline);
	if (jobs || pipeline || !process.stdout.isTTY || args.json) {
		return { pipeline, jobs };
	}

	intro("cistage");
	const pipelines = listPipelines(workspace.zuul);
	let selectedPipeline: string | undefined;
	if (pipelines.length > 0) {
		const choice = await selectPipeline(pipelines);
		if (choice === null) {
			return null;
		}
		selectedPipeline = choice;
	}
	const refs = selectedPipeline ? pipelineJobs(workspace.zuul, selectedPipeline) : [];
	const selectedJobs = await selectJobs(workspace.zuul, runnableJobNames(workspace.zuul, refs));
	if (selectedJobs === null) {
		return null;
	}
	return { pipeline: selectedPipeline, jobs: selectedJobs };
}

function reportNoSelection(): number {
	writeError("No job selected. Use --job or --pipeline.");
	return EXIT_USAGE;
}

function errorLabel(error: unknown): string | undefined {
	if (error instanceof ConfigError) {
		return "Configuration error";
	}
	if (error instanceof PlaybookError) {
		return "Playbook error";
	}
	if (error instanceof TemplateError) {
		return "Template error";
	}
	return undefined;
}
