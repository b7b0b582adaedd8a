import type {
	EngineCapabilities,
	OutputSource,
	ShellCommand,
	ShellResult,
	ShellRunner,
} from "../../core/engine.js";
import { PlaybookEngine } from "../playbook-engine.js";

export type SimulatedCommand = {
	module: ShellCommand["module"];
	command: string;
	cwd: string;
	become: boolean;
	rc: number;
};

/**
 * Interprets playbooks without spawning anything. Exit statuses come from
 * the simulate map: an exact command match wins, then the longest key the
 * command starts with; anything else exits 0.
 */
export class DryRunAdapter extends PlaybookEngine {
	readonly id = "dry-run";
	readonly commands: SimulatedCommand[] = [];

	constructor(private readonly simulate: Record<string, number> = {}) {
		super();
	}

	capabilities(): EngineCapabilities {
		return {
			spawnsProcesses: false,
			timeouts: false,
			cancellation: true,
		};
	}

	protected createRunner(): ShellRunner {
		return new SimulatedShellRunner(this.simulate, this.commands);
	}
}

export class SimulatedShellRunner implements ShellRunner {
	constructor(
		private readonly simulate: Record<string, number>,
		private readonly history: SimulatedCommand[] = [],
	) {}

	async run(
		command: ShellCommand,
		onOutput?: (chunk: string, source: OutputSource) => void,
	): Promise<ShellResult> {
		if (command.signal?.aborted) {
			return { rc: 130, stdout: "", stderr: "", timedOut: false, aborted: true };
		}
		const rc = resolveSimulatedExit(this.simulate, command.command);
		this.history.push({
			module: command.module,
			command: command.command,
			cwd: command.cwd,
			become: command.become,
			rc,
		});
		onOutput?.(`[dry-run] ${command.command.trim()}\n`, "stdout");
		return { rc, stdout: "", stderr: "", timedOut: false, aborted: false };
	}
}

export function resolveSimulatedExit(simulate: Record<string, number>, command: string): number {
	const trimmed = command.trim();
	if (Object.prototype.hasOwnProperty.call(simulate, trimmed)) {
		return simulate[trimmed];
	}
	const prefix = Object.keys(simulate)
		.filter((key) => key.length > 0 && trimmed.startsWith(key))
		.sort((left, right) => right.length - left.length)[0];
	return prefix === undefined ? 0 : simulate[prefix];
}
