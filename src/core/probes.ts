import type { Playbook, Task, TaskOutcome, TaskRun } from "./types.js";

export type PackageManager = "apt-get" | "dnf" | "yum";

export const PACKAGE_MANAGER_PROBES: { manager: PackageManager; command: string }[] = [
	{ manager: "apt-get", command: "apt-get --version" },
	{ manager: "dnf", command: "dnf --version" },
	{ manager: "yum", command: "yum --version" },
];

export type ProbeResult = {
	manager: PackageManager;
	taskId: string;
	register?: string;
	rc?: number;
	available: boolean;
};

export type InstallBranch = {
	taskId: string;
	name: string;
	guard: string;
	manager: PackageManager;
	executed: boolean;
};

export type ProbeReport = {
	probes: ProbeResult[];
	branches: InstallBranch[];
	detected: PackageManager[];
	warnings: string[];
};

/**
 * Summarizes which package managers a host-preparation playbook found and
 * which guarded install branches ran. Two branches running on one host is
 * reported, not resolved.
 */
export function summarizeProbes(playbook: Playbook, runs: TaskRun[]): ProbeReport {
	const tasks = playbook.plays.flatMap((play) => play.tasks);
	const runById = new Map(runs.map((run) => [run.taskId, run]));

	const probes: ProbeResult[] = [];
	for (const task of tasks) {
		const manager = probedManager(task);
		if (!manager) {
			continue;
		}
		const rc = runById.get(task.id)?.rc;
		probes.push({ manager, taskId: task.id, register: task.register, rc, available: rc === 0 });
	}

	const byRegister = new Map(
		probes
			.filter((probe) => probe.register)
			.map((probe) => [probe.register ?? "", probe.manager]),
	);

	const branches: InstallBranch[] = [];
	for (const task of tasks) {
		for (const guard of task.when) {
			const register = guard.trim().split(/[.\s]/)[0];
			const manager = byRegister.get(register);
			if (!manager) {
				continue;
			}
			const run = runById.get(task.id);
			branches.push({
				taskId: task.id,
				name: task.name,
				guard,
				manager,
				executed: run !== undefined && run.rc !== undefined && EXECUTED_OUTCOMES.includes(run.outcome),
			});
			break;
		}
	}

	const warnings: string[] = [];
	const executed = branches.filter((branch) => branch.executed);
	if (executed.length > 1) {
		warnings.push(
			`More than one install branch ran: ${executed.map((branch) => branch.name).join(", ")}`,
		);
	}

	return {
		probes,
		branches,
		detected: probes.filter((probe) => probe.available).map((probe) => probe.manager),
		warnings,
	};
}

const EXECUTED_OUTCOMES: TaskOutcome[] = ["ok", "ignored", "failed"];

function probedManager(task: Task): PackageManager | undefined {
	if (task.action.module === "unsupported") {
		return undefined;
	}
	const command = task.action.cmd.trim();
	return PACKAGE_MANAGER_PROBES.find((probe) => probe.command === command)?.manager;
}
