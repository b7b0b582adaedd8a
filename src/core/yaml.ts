import fs from "node:fs";
import YAML from "yaml";

export function readYamlFile(filePath: string, onError: (message: string) => Error): unknown {
	const raw = fs.readFileSync(filePath, "utf-8");
	const doc = YAML.parseDocument(raw);
	if (doc.errors.length > 0) {
		const error = doc.errors[0];
		const line = error.linePos?.[0]?.line ?? 0;
		const col = error.linePos?.[0]?.col ?? 0;
		throw onError(`${filePath}:${line}:${col} ${error.message}`);
	}
	return doc.toJSON();
}

export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}
