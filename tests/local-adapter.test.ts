import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import type { ShellCommand } from "../src/core/engine.js";
import { planPlaybook } from "../src/core/plan.js";
import {
	buildCommandLine,
	EXIT_TIMED_OUT,
	LocalAdapter,
	LocalShellRunner,
} from "../src/engines/local/local-adapter.js";
import { createTempRepo } from "./helpers/temp-repo.js";

function shell(command: string, fields: Partial<ShellCommand> = {}): ShellCommand {
	return { module: "shell", command, cwd: os.tmpdir(), become: false, ...fields };
}

describe("local shell runner", () => {
	const runner = new LocalShellRunner();

	it("captures output and exit status", async () => {
		const chunks: string[] = [];
		const result = await runner.run(shell("echo hello; echo oops >&2; exit 3"), (chunk) =>
			chunks.push(chunk),
		);
		expect(result).toEqual({
			rc: 3,
			stdout: "hello\n",
			stderr: "oops\n",
			timedOut: false,
			aborted: false,
		});
		expect(chunks.join("")).toContain("hello\n");
	});

	it("runs in the requested directory", async () => {
		const dir = createTempRepo("local-cwd");
		const result = await runner.run(shell("pwd", { cwd: dir }));
		expect(path.basename(result.stdout.trim())).toBe(path.basename(dir));
	});

	it("reports missing executables as 127", async () => {
		const result = await runner.run({
			module: "command",
			command: "cistage-no-such-binary --version",
			cwd: os.tmpdir(),
			become: false,
		});
		expect(result.rc).toBe(127);
	});

	it("stops commands that outlive their timeout", async () => {
		const result = await runner.run(shell("sleep 5", { timeoutMs: 100 }));
		expect(result.timedOut).toBe(true);
		expect(result.rc).toBe(EXIT_TIMED_OUT);
	});

	it("stops every command of a multi-command script on timeout", async () => {
		const startedAt = Date.now();
		const result = await runner.run(shell("sleep 4; echo done", { timeoutMs: 200 }));
		expect(Date.now() - startedAt).toBeLessThan(2000);
		expect(result).toMatchObject({ rc: EXIT_TIMED_OUT, timedOut: true, stdout: "" });
	});

	it("stops every command of a multi-command script on abort", async () => {
		const controller = new AbortController();
		setTimeout(() => controller.abort(), 200);
		const startedAt = Date.now();
		const result = await runner.run(shell("sleep 4; echo done", { signal: controller.signal }));
		expect(Date.now() - startedAt).toBeLessThan(2000);
		expect(result).toMatchObject({ aborted: true, timedOut: false, stdout: "" });
	});

	it("stops commands when the signal aborts", async () => {
		const controller = new AbortController();
		setTimeout(() => controller.abort(), 100);
		const result = await runner.run(shell("sleep 5", { signal: controller.signal }));
		expect(result.aborted).toBe(true);
	});
});

describe("command lines", () => {
	it("wraps shell commands in the executable", () => {
		expect(buildCommandLine(shell("ls | wc -l", { executable: "/bin/bash" }))).toEqual([
			"/bin/bash",
			"-c",
			"ls | wc -l",
		]);
	});

	it("splits command arguments without a shell", () => {
		expect(
			buildCommandLine({
				module: "command",
				command: `git commit -m "two words" --author 'A B'`,
				cwd: "/",
				become: false,
			}),
		).toEqual(["git", "commit", "-m", "two words", "--author", "A B"]);
	});

	it("prefixes non-interactive sudo for become", () => {
		expect(buildCommandLine(shell("id -u", { become: true }))).toEqual([
			"sudo",
			"-n",
			"/bin/sh",
			"-c",
			"id -u",
		]);
	});
});

describe("local adapter", () => {
	it("runs a playbook through /bin/sh", async () => {
		const repoRoot = createTempRepo("local-run", {
			"site.yaml": [
				"- hosts: localhost",
				"  tasks:",
				"    - name: write marker",
				"      shell: echo {{ zuul.job }} > marker.txt",
				"    - name: check marker",
				"      shell: grep -q site marker.txt",
			].join("\n"),
		});
		const output: string[] = [];
		const result = await new LocalAdapter().run(planPlaybook("site.yaml", { repoRoot, externalJobs: [] }), {
			repoRoot,
			runStoreBase: path.join(repoRoot, ".cistage", "runs"),
			onOutput: (chunk) => output.push(chunk),
		});
		expect(result.exitCode).toBe(0);
		expect(result.run.jobs[0].phases[0].tasks.map((task) => task.outcome)).toEqual(["ok", "ok"]);
	});
});
