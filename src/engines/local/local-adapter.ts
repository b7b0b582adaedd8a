import { spawn } from "node:child_process";
import type {
	EngineCapabilities,
	OutputSource,
	ShellCommand,
	ShellResult,
	ShellRunner,
} from "../../core/engine.js";
import { PlaybookEngine } from "../playbook-engine.js";

export const EXIT_TIMED_OUT = 124;

export class LocalAdapter extends PlaybookEngine {
	readonly id = "local";

	capabilities(): EngineCapabilities {
		return {
			spawnsProcesses: true,
			timeouts: true,
			cancellation: true,
		};
	}

	protected createRunner(): ShellRunner {
		return new LocalShellRunner();
	}
}

export class LocalShellRunner implements ShellRunner {
	run(
		command: ShellCommand,
		onOutput?: (chunk: string, source: OutputSource) => void,
	): Promise<ShellResult> {
		return new Promise((resolve) => {
			const [file, ...args] = buildCommandLine(command);
			if (!file) {
				resolve({ rc: 2, stdout: "", stderr: "empty command\n", timedOut: false, aborted: false });
				return;
			}
			let stdout = "";
			let stderr = "";
			let timedOut = false;
			let aborted = false;
			let settled = false;

			// Own process group, so a stop reaches every process the shell forked.
			const child = spawn(file, args, { cwd: command.cwd, env: process.env, detached: true });

			const kill = (): void => {
				if (child.pid === undefined) {
					return;
				}
				try {
					process.kill(-child.pid, "SIGTERM");
				} catch {
					child.kill("SIGTERM");
				}
			};
			const timer =
				command.timeoutMs === undefined
					? undefined
					: setTimeout(() => {
							timedOut = true;
							kill();
						}, command.timeoutMs);
			const onAbort = (): void => {
				aborted = true;
				kill();
			};
			if (command.signal?.aborted) {
				onAbort();
			}
			command.signal?.addEventListener("abort", onAbort);

			const settle = (rc: number): void => {
				if (settled) {
					return;
				}
				settled = true;
				if (timer) {
					clearTimeout(timer);
				}
				command.signal?.removeEventListener("abort", onAbort);
				resolve({
					rc: timedOut ? EXIT_TIMED_OUT : rc,
					stdout,
					stderr,
					timedOut,
					aborted,
				});
			};

			child.stdout.on("data", (chunk: Buffer) => {
				const text = chunk.toString();
				stdout += text;
				onOutput?.(text, "stdout");
			});

			child.stderr.on("data", (chunk: Buffer) => {
				const text = chunk.toString();
				stderr += text;
				onOutput?.(text, "stderr");
			});

			child.on("error", (error: Error) => {
				stderr += `${error.message}\n`;
				onOutput?.(`${error.message}\n`, "stderr");
				settle(127);
			});

			child.on("close", (code: number | null) => {
				settle(code ?? 1);
			});
		});
	}
}

export function buildCommandLine(command: ShellCommand): string[] {
	const base =
		command.module === "command"
			? splitCommand(command.command)
			: [command.executable ?? "/bin/sh", "-c", command.command];
	return command.become ? ["sudo", "-n", ...base] : base;
}

function splitCommand(command: string): string[] {
	const parts: string[] = [];
	const pattern = /"([^"]*)"|'([^']*)'|(\S+)/g;
	for (const match of command.matchAll(pattern)) {
		parts.push(match[1] ?? match[2] ?? match[3]);
	}
	return parts;
}
