import React from "react";
import { outro } from "@clack/prompts";
import { render } from "ink";
import type { EngineAdapter, EngineContext, EngineRunResult } from "../core/engine.js";
import type { RunPlan } from "../core/types.js";
import { RunView } from "../tui/run-view/run-view.js";
import { writeLine } from "./output.js";

export type ExecuteRunInput = {
	adapter: EngineAdapter;
	plan: RunPlan;
	context: EngineContext;
	isTty: boolean;
	json: boolean;
};

export async function executeRun({
	adapter,
	plan,
	context,
	isTty,
	json,
}: ExecuteRunInput): Promise<EngineRunResult> {
	if (isTty && !json) {
		const result = await runWithInk(adapter, plan, context);
		outro(`Logs: ${result.logsPath}`);
		return result;
	}

	if (json) {
		return adapter.run(plan, { ...context, onOutput: () => undefined });
	}

	writeLine(`Running ${plan.jobs.length} job(s) with ${adapter.id}...`);
	if (!adapter.capabilities().spawnsProcesses) {
		writeLine("Commands are simulated; nothing is executed.");
	}
	const result = await adapter.run(plan, context);
	writeLine(`Finished with exit code ${result.exitCode}`);
	writeLine(`Logs: ${result.logsPath}`);
	return result;
}

async function runWithInk(
	adapter: EngineAdapter,
	plan: RunPlan,
	context: EngineContext,
): Promise<EngineRunResult> {
	const outcome: { result?: EngineRunResult } = {};
	const { waitUntilExit, unmount } = render(
		React.createElement(RunView, {
			adapter,
			context,
			plan,
			onComplete: (result: EngineRunResult) => {
				outcome.result = result;
			},
		}),
		{ exitOnCtrlC: false },
	);

	try {
		await waitUntilExit();
	} finally {
		unmount();
	}
	if (!outcome.result) {
		throw new Error("Run view closed before the run finished.");
	}
	return outcome.result;
}
