import fs from "node:fs";
import path from "node:path";
import { ConfigError, formatZodError } from "../core/errors.js";
import { readYamlFile } from "../core/yaml.js";
import type { CistageConfig } from "./schema.js";
import { ConfigSchema } from "./schema.js";

export type ConfigLoadResult = {
	config: CistageConfig;
	path?: string;
};

const DEFAULT_CONFIG_PATH = ".cistage.yml";

export function loadConfig(repoRoot: string): ConfigLoadResult {
	const configPath = path.join(repoRoot, DEFAULT_CONFIG_PATH);
	if (!fs.existsSync(configPath)) {
		return { config: ConfigSchema.parse({}), path: undefined };
	}

	const raw = readYamlFile(configPath, (message) => new ConfigError(message));
	const parsed = ConfigSchema.safeParse(raw ?? {});
	if (!parsed.success) {
		throw new ConfigError(`${configPath}: ${formatZodError(parsed.error)}`);
	}
	return { config: parsed.data, path: configPath };
}
