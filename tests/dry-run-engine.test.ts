import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import type { EngineContext, EngineRuntimeEvent } from "../src/core/engine.js";
import { buildRunPlan, planPlaybook } from "../src/core/plan.js";
import { ConfigError } from "../src/core/errors.js";
import type { RunRecord } from "../src/core/types.js";
import { loadZuulConfig } from "../src/core/zuul-parser.js";
import { DryRunAdapter, resolveSimulatedExit } from "../src/engines/dry-run/dry-run-adapter.js";
import { createEngineAdapter } from "../src/engines/factory.js";
import { buildZuulVars, EXIT_CANCELED } from "../src/engines/playbook-engine.js";
import { createFixtureRepo, writeRepoFile } from "./helpers/temp-repo.js";

const INSTALL_PROBES = { "apt-get --version": 1, "dnf --version": 127, "yum --version": 0 };

function setup(prefix: string) {
	const repoRoot = createFixtureRepo(prefix);
	const zuul = loadZuulConfig(repoRoot);
	const output: string[] = [];
	const events: EngineRuntimeEvent[] = [];
	const context: EngineContext = {
		repoRoot,
		runStoreBase: path.join(repoRoot, ".cistage", "runs"),
		project: "demo",
		onOutput: (chunk) => output.push(chunk),
		onEvent: (event) => events.push(event),
	};
	const plan = (selection: { pipeline?: string; jobs?: string[] }, vars = {}) =>
		buildRunPlan(zuul, selection, { repoRoot, externalJobs: ["base"], vars });
	return { repoRoot, zuul, output, events, context, plan };
}

function readRecord(context: EngineContext, runId: string): RunRecord {
	const raw = fs.readFileSync(path.join(context.runStoreBase, runId, "run.json"), "utf-8");
	return JSON.parse(raw);
}

describe("dry-run engine", () => {
	it("runs every phase of every pipeline job", async () => {
		const { context, plan } = setup("engine-ok");
		const adapter = new DryRunAdapter(INSTALL_PROBES);
		const runPlan = plan({ pipeline: "check" });
		const result = await adapter.run(runPlan, context);

		expect(result.exitCode).toBe(0);
		expect(result.run.status).toBe("finished");
		expect(result.run.jobs.map((job) => [job.jobName, job.status])).toEqual([
			["install-ubuntu-jammy", "success"],
			["install-centos-7", "success"],
		]);
		expect(result.run.jobs[1].phases.map((phase) => [phase.phaseId, phase.status])).toEqual([
			["pre-run-1", "success"],
			["run", "success"],
			["post-run-1", "success"],
		]);
		expect(readRecord(context, runPlan.runId).status).toBe("finished");
		expect(result.logsPath).toBe(path.join(context.runStoreBase, runPlan.runId, "logs"));
		const logPath = result.run.jobs[0].phases[0].logPath ?? "";
		expect(fs.readFileSync(logPath, "utf-8")).toContain("[dry-run] yum --version");
	});

	it("skips run after a failed pre-run but still runs post-run", async () => {
		const { context, plan } = setup("engine-pre-fail");
		const adapter = new DryRunAdapter({ ...INSTALL_PROBES, "sudo pip3": 1 });
		const result = await adapter.run(plan({ jobs: ["install-centos-7"] }), context);

		expect(result.exitCode).toBe(1);
		const [job] = result.run.jobs;
		expect(job.status).toBe("failed");
		expect(job.phases.map((phase) => phase.status)).toEqual(["failed", "skipped", "success"]);
		expect(job.phases[0].error).toBe("Install bindep: command exited with 1");
	});

	it("marks the job failed when the run playbook fails", async () => {
		const { context, plan } = setup("engine-run-fail");
		const adapter = new DryRunAdapter({ ...INSTALL_PROBES, "pip3 install --user .": 3 });
		const result = await adapter.run(plan({ jobs: ["install-ubuntu-jammy"] }), context);

		expect(result.exitCode).toBe(1);
		expect(result.run.jobs[0].phases.map((phase) => phase.status)).toEqual([
			"success",
			"failed",
			"success",
		]);
	});

	it("emits lifecycle events in order", async () => {
		const { context, events, plan } = setup("engine-events");
		const runPlan = plan({ jobs: ["install-ubuntu-jammy"] });
		await new DryRunAdapter(INSTALL_PROBES).run(runPlan, context);

		const kinds = events
			.filter((event) => event.type !== "task-finished")
			.map((event) => ("phaseId" in event ? `${event.type}:${event.phaseId}` : event.type));
		expect(kinds).toEqual([
			"run-started",
			"job-started",
			"phase-started:pre-run-1",
			"phase-finished:pre-run-1",
			"phase-started:run",
			"phase-finished:run",
			"phase-started:post-run-1",
			"phase-finished:post-run-1",
			"job-finished",
			"run-finished",
		]);
		expect(events.filter((event) => event.type === "task-finished")).toHaveLength(8);
	});

	it("skips jobs that cannot run locally", async () => {
		const { repoRoot, context } = setup("engine-unrunnable");
		writeRepoFile(repoRoot, ".zuul.d/extra.yaml", "- job:\n    name: abstract-only\n");
		const zuul = loadZuulConfig(repoRoot);
		const runPlan = buildRunPlan(
			zuul,
			{ jobs: ["abstract-only"] },
			{ repoRoot, externalJobs: ["base"] },
		);
		const result = await new DryRunAdapter().run(runPlan, context);

		expect(result.exitCode).toBe(1);
		expect(result.run.jobs[0]).toMatchObject({
			status: "skipped",
			reason: "job has no run playbook",
		});
	});

	it("aborts remaining work when the signal fires", async () => {
		const { context, plan } = setup("engine-abort");
		const controller = new AbortController();
		controller.abort();
		const result = await new DryRunAdapter(INSTALL_PROBES).run(plan({ pipeline: "check" }), {
			...context,
			signal: controller.signal,
		});

		expect(result.exitCode).toBe(EXIT_CANCELED);
		expect(result.run.status).toBe("aborted");
		expect(result.run.jobs.map((job) => job.status)).toEqual(["aborted", "aborted"]);
		expect(result.run.jobs[0].phases.map((phase) => phase.status)).toEqual([
			"aborted",
			"aborted",
			"aborted",
		]);
	});

	it("fails validation when a playbook cannot be parsed", async () => {
		const { repoRoot, context } = setup("engine-invalid");
		writeRepoFile(repoRoot, "playbooks/broken.yaml", "hosts: all\n");
		const runPlan = planPlaybook("playbooks/broken.yaml", { repoRoot, externalJobs: [] });
		const result = await new DryRunAdapter().run(runPlan, context);

		expect(result.exitCode).toBe(1);
		expect(result.run.status).toBe("validation_failed");
		expect(result.run.error).toBe(
			`${path.join(repoRoot, "playbooks", "broken.yaml")}: expected a list of plays`,
		);
	});

	it("redacts secret values from output", async () => {
		const { repoRoot, context, output } = setup("engine-secrets");
		writeRepoFile(
			repoRoot,
			"playbooks/upload.yaml",
			"- hosts: all\n  tasks:\n    - name: upload\n      shell: upload --token {{ token }}\n",
		);
		const runPlan = planPlaybook("playbooks/upload.yaml", {
			repoRoot,
			externalJobs: [],
			vars: { token: "test-secret" },
		});
		const result = await new DryRunAdapter().run(runPlan, { ...context, secrets: ["test-secret"] });

		expect(result.exitCode).toBe(0);
		expect(output).toContain("[dry-run] upload --token <redacted>\n");
		expect(output.join("")).not.toContain("test-secret");
	});

	it("lets run variables override the zuul defaults", async () => {
		const { repoRoot, context, output } = setup("engine-zuul-override");
		writeRepoFile(
			repoRoot,
			"playbooks/plugins.yaml",
			"- hosts: all\n  tasks:\n    - name: copy\n      shell: cp {{ zuul.project.src_dir }}/x ~/{{ zuul.job }}\n",
		);
		const runPlan = planPlaybook("playbooks/plugins.yaml", {
			repoRoot,
			externalJobs: [],
			vars: { zuul: { project: { src_dir: "/custom" } } },
		});
		const result = await new DryRunAdapter().run(runPlan, context);

		expect(result.exitCode).toBe(0);
		expect(output).toContain("[dry-run] cp /custom/x ~/plugins\n");
	});

	it("exposes zuul variables to playbooks", () => {
		const { context, plan } = setup("engine-vars");
		const runPlan = plan({ pipeline: "gate" });
		expect(buildZuulVars(runPlan, runPlan.jobs[0], context)).toEqual({
			zuul: {
				build: runPlan.runId,
				job: "install-ubuntu-jammy",
				pipeline: "gate",
				timeout: 1800,
				project: { name: "demo", src_dir: context.repoRoot },
			},
		});
	});
});

describe("simulated exit codes", () => {
	const simulate = { "yum --version": 0, yum: 5, "yum install": 7 };

	it("prefers an exact match, then the longest prefix", () => {
		expect(resolveSimulatedExit(simulate, "  yum --version ")).toBe(0);
		expect(resolveSimulatedExit(simulate, "yum install -y git")).toBe(7);
		expect(resolveSimulatedExit(simulate, "yum update")).toBe(5);
		expect(resolveSimulatedExit(simulate, "apt-get update")).toBe(0);
	});
});

describe("engine factory", () => {
	it("creates registered engines by name", () => {
		const adapter = createEngineAdapter(" Dry-Run ", { simulate: { "yum --version": 0 } });
		expect(adapter.id).toBe("dry-run");
		expect(adapter.capabilities()).toEqual({ spawnsProcesses: false, timeouts: false, cancellation: true });
		expect(createEngineAdapter("local").capabilities().spawnsProcesses).toBe(true);
	});

	it("rejects unknown engines", () => {
		expect(() => createEngineAdapter("docker")).toThrow(
			new ConfigError('Unsupported engine "docker". Available engines: local, dry-run'),
		);
	});
});
