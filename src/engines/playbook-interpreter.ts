import type { OutputSource, ShellRunner } from "../core/engine.js";
import { TemplateError } from "../core/errors.js";
import { evaluateGuards } from "../core/guards.js";
import { renderTemplate } from "../core/template.js";
import type { PhaseStatus, Playbook, TaskResult, TaskRun } from "../core/types.js";

export type InterpreterOptions = {
	runner: ShellRunner;
	vars: Record<string, unknown>;
	cwd: string;
	deadline?: number;
	signal?: AbortSignal;
	log: (line: string, source?: OutputSource) => void;
	onTask?: (task: TaskRun) => void;
};

export type PlaybookRunResult = {
	status: Extract<PhaseStatus, "success" | "failed" | "aborted">;
	tasks: TaskRun[];
	registered: Record<string, TaskResult>;
	error?: string;
};

const SKIPPED_RESULT: TaskResult = { skipped: true, changed: false, failed: false };

/**
 * Runs the tasks of every play in file order. A task that fails without
 * `ignore_errors` ends the playbook; registered results are visible to the
 * guards of later tasks.
 */
export async function runPlaybook(
	playbook: Playbook,
	options: InterpreterOptions,
): Promise<PlaybookRunResult> {
	const tasks: TaskRun[] = [];
	const registered: Record<string, TaskResult> = {};

	const record = (run: TaskRun): void => {
		tasks.push(run);
		options.onTask?.(run);
	};

	for (const play of playbook.plays) {
		options.log(`PLAY [${play.name}]`);
		for (const task of play.tasks) {
			if (options.signal?.aborted) {
				return { status: "aborted", tasks, registered, error: "run was canceled" };
			}

			options.log(`TASK [${task.name}]`);
			const scope = { ...options.vars, ...registered };

			if (task.action.module === "unsupported") {
				options.log(`skipping: module "${task.action.name}" is not supported`, "stderr");
				record({ taskId: task.id, name: task.name, outcome: "unsupported" });
				continue;
			}

			let command: string | undefined;
			let cwd = options.cwd;
			try {
				if (evaluateGuards(task.when, scope)) {
					command = renderTemplate(task.action.cmd, scope);
					cwd = task.action.chdir ? renderTemplate(task.action.chdir, scope) : options.cwd;
				}
			} catch (error) {
				if (!(error instanceof TemplateError)) {
					throw error;
				}
				const message = `${task.name}: ${error.message}`;
				options.log(`fatal: ${message}`, "stderr");
				record({ taskId: task.id, name: task.name, outcome: "failed" });
				return { status: "failed", tasks, registered, error: message };
			}

			if (command === undefined) {
				options.log(`skipping: condition not met (${task.when.join(" and ")})`);
				if (task.register) {
					registered[task.register] = SKIPPED_RESULT;
				}
				record({ taskId: task.id, name: task.name, outcome: "skipped" });
				continue;
			}

			const startedAt = Date.now();
			const result = await options.runner.run(
				{
					module: task.action.module,
					command,
					executable: task.action.executable,
					cwd,
					become: task.become,
					timeoutMs: remainingTime(options.deadline),
					signal: options.signal,
				},
				(chunk, source) => options.log(chunk.replace(/\n$/, ""), source),
			);
			const durationMs = Date.now() - startedAt;

			if (task.register) {
				registered[task.register] = {
					rc: result.rc,
					stdout: result.stdout,
					stderr: result.stderr,
					failed: result.rc !== 0,
					skipped: false,
					changed: true,
				};
			}

			if (result.aborted) {
				record({ taskId: task.id, name: task.name, outcome: "failed", rc: result.rc, durationMs });
				return { status: "aborted", tasks, registered, error: "run was canceled" };
			}
			if (result.timedOut) {
				record({ taskId: task.id, name: task.name, outcome: "failed", rc: result.rc, durationMs });
				return { status: "failed", tasks, registered, error: `${task.name}: timed out` };
			}

			if (result.rc === 0) {
				options.log(`ok: rc=0`);
				record({ taskId: task.id, name: task.name, outcome: "ok", rc: 0, durationMs });
				continue;
			}

			if (task.ignoreErrors) {
				options.log(`failed: rc=${result.rc} (ignored)`);
				record({ taskId: task.id, name: task.name, outcome: "ignored", rc: result.rc, durationMs });
				continue;
			}

			options.log(`fatal: rc=${result.rc}`, "stderr");
			record({ taskId: task.id, name: task.name, outcome: "failed", rc: result.rc, durationMs });
			return {
				status: "failed",
				tasks,
				registered,
				error: `${task.name}: command exited with ${result.rc}`,
			};
		}
	}

	return { status: "success", tasks, registered };
}

function remainingTime(deadline?: number): number | undefined {
	if (deadline === undefined) {
		return undefined;
	}
	return Math.max(0, deadline - Date.now());
}
