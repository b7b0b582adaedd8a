import path from "node:path";

export class PathEscapeError extends Error {
	constructor(
		readonly label: string,
		readonly childPath: string,
	) {
		super(`Invalid ${label}: ${childPath} escapes its base directory`);
		this.name = "PathEscapeError";
	}
}

/** Resolves `childPath` against `baseDir`, or undefined when it lands outside. */
export function resolveWithinBase(baseDir: string, childPath: string): string | undefined {
	const base = path.resolve(baseDir);
	const resolved = path.resolve(base, childPath);
	const rel = path.relative(base, resolved);
	if (rel.startsWith("..") || path.isAbsolute(rel)) {
		return undefined;
	}
	return resolved;
}

export function ensureWithinBase(baseDir: string, childPath: string, label: string): string {
	const resolved = resolveWithinBase(baseDir, childPath);
	if (!resolved) {
		throw new PathEscapeError(label, childPath);
	}
	return resolved;
}

// Job and phase names end up in log file names.
export function sanitizePathSegment(value: string, fallback: string, maxLength = 64): string {
	const normalized = value
		.trim()
		.replace(/[\\/]+/g, "-")
		.replace(/[^a-zA-Z0-9._-]+/g, "-")
		.replace(/^-+|-+$/g, "")
		.slice(0, maxLength);
	return normalized.length > 0 ? normalized : fallback;
}
