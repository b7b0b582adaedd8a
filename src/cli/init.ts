import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { DEFAULT_EXTERNAL_JOBS, DEFAULT_NODESETS } from "../config/schema.js";
import { writeLine } from "./output.js";

const IGNORE_ENTRY = ".cistage";
const CONFIG_FILE = ".cistage.yml";

export type InitStep = "added" | "present" | "skipped";

export type InitResult = {
	gitignore: InitStep;
	config: InitStep;
};

export function ensureGitignore(repoRoot: string): InitStep {
	if (!fs.existsSync(path.join(repoRoot, ".git"))) {
		return "skipped";
	}

	const ignorePath = path.join(repoRoot, ".gitignore");
	const current = fs.existsSync(ignorePath) ? fs.readFileSync(ignorePath, "utf-8") : "";
	const present = current
		.split(/\r?\n/)
		.some((line) => line.trim().replace(/^\/+/, "").replace(/\/+$/, "") === IGNORE_ENTRY);
	if (present) {
		return "present";
	}

	const prefix = current.length === 0 || current.endsWith("\n") ? current : `${current}\n`;
	fs.writeFileSync(ignorePath, `${prefix}${IGNORE_ENTRY}\n`);
	return "added";
}

export function ensureConfigFile(repoRoot: string): InitStep {
	const configPath = path.join(repoRoot, CONFIG_FILE);
	if (fs.existsSync(configPath)) {
		return "present";
	}
	const starter = {
		engine: "dry-run",
		zuul: {
			externalJobs: DEFAULT_EXTERNAL_JOBS,
			nodesets: DEFAULT_NODESETS,
		},
		simulate: {
			"apt-get --version": 0,
			"dnf --version": 127,
			"yum --version": 127,
		},
	};
	fs.writeFileSync(configPath, YAML.stringify(starter));
	return "added";
}

export function runInit(repoRoot: string): InitResult {
	const result = { gitignore: ensureGitignore(repoRoot), config: ensureConfigFile(repoRoot) };
	switch (result.gitignore) {
		case "added":
			writeLine(`Added '${IGNORE_ENTRY}' to .gitignore.`);
			break;
		case "present":
			writeLine(`'${IGNORE_ENTRY}' is already in .gitignore.`);
			break;
		default:
			writeLine("Skipped .gitignore: not a git repository.");
	}
	writeLine(
		result.config === "added"
			? `Wrote ${CONFIG_FILE} with dry-run defaults.`
			: `${CONFIG_FILE} already exists.`,
	);
	return result;
}
