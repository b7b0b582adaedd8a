import type { EngineAdapter } from "../core/engine.js";
import { ConfigError } from "../core/errors.js";
import { DryRunAdapter } from "./dry-run/dry-run-adapter.js";
import { LocalAdapter } from "./local/local-adapter.js";

export type EngineOptions = {
	simulate?: Record<string, number>;
};

type EngineAdapterFactory = (options: EngineOptions) => EngineAdapter;

const ENGINE_REGISTRY: Record<string, EngineAdapterFactory> = {
	local: () => new LocalAdapter(),
	"dry-run": (options) => new DryRunAdapter(options.simulate),
};

export function createEngineAdapter(engineId: string, options: EngineOptions = {}): EngineAdapter {
	const normalized = engineId.trim().toLowerCase();
	const factory = ENGINE_REGISTRY[normalized];
	if (!factory) {
		throw new ConfigError(
			`Unsupported engine "${engineId}". Available engines: ${listRegisteredEngines().join(", ")}`,
		);
	}
	return factory(options);
}

export function listRegisteredEngines(): string[] {
	return Object.keys(ENGINE_REGISTRY);
}
