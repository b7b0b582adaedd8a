import type { ZodError } from "zod";

export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

export class JobChainError extends ConfigError {
	constructor(
		message: string,
		readonly reason: "unknown-job" | "unknown-parent" | "parent-cycle",
	) {
		super(message);
		this.name = "JobChainError";
	}
}

export class PlaybookError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "PlaybookError";
	}
}

export class TemplateError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "TemplateError";
	}
}

export function formatZodError(error: ZodError): string {
	const issue = error.issues[0];
	if (!issue) {
		return "invalid value";
	}
	const where = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
	return `${where}${issue.message}`;
}

export function describeError(error: unknown, fallback: string): string {
	return error instanceof Error ? error.message : fallback;
}
