import { z } from "zod";
import { PlaybookError, formatZodError } from "./errors.js";
import type { Play, Playbook, ShellAction, Task } from "./types.js";
import { isRecord, readYamlFile } from "./yaml.js";

export const DEFAULT_EXECUTABLE = "/bin/sh";

const SHELL_MODULES = new Set(["shell", "command", "ansible.builtin.shell", "ansible.builtin.command"]);
const TASK_KEYWORDS = new Set([
	"name",
	"when",
	"register",
	"ignore_errors",
	"become",
	"args",
	"changed_when",
	"failed_when",
	"tags",
	"environment",
	"no_log",
]);

const FlagSchema = z
	.union([z.boolean(), z.enum(["yes", "no", "true", "false", "True", "False"])])
	.optional()
	.transform((value) => value === true || value === "yes" || value === "true" || value === "True");

const WhenSchema = z
	.union([z.string(), z.boolean(), z.array(z.union([z.string(), z.boolean()]))])
	.optional()
	.transform((value) => {
		if (value === undefined) {
			return [];
		}
		const items = Array.isArray(value) ? value : [value];
		return items.map((item) => String(item));
	});

const TaskSchema = z
	.object({
		name: z.string().optional(),
		when: WhenSchema,
		register: z.string().optional(),
		ignore_errors: FlagSchema,
		become: FlagSchema,
		args: z.record(z.unknown()).optional(),
	})
	.passthrough();

const ShellArgsSchema = z.union([
	z.string(),
	z.object({
		cmd: z.string(),
		executable: z.string().optional(),
		chdir: z.string().optional(),
	}),
]);

const PlaySchema = z.object({
	name: z.string().optional(),
	hosts: z.union([z.string(), z.array(z.string())]).transform((value) =>
		Array.isArray(value) ? value.join(",") : value,
	),
	tasks: z.array(z.unknown()).nullish().transform((value) => value ?? []),
});

export function parsePlaybook(playbookPath: string): Playbook {
	const doc = readYamlFile(playbookPath, (message) => new PlaybookError(message));
	if (doc === null || doc === undefined) {
		return { path: playbookPath, plays: [] };
	}
	if (!Array.isArray(doc)) {
		throw new PlaybookError(`${playbookPath}: expected a list of plays`);
	}

	const plays = doc.map((play: unknown, index: number) =>
		parsePlay(play, `${playbookPath}#${index}`, index),
	);
	return { path: playbookPath, plays };
}

function parsePlay(body: unknown, where: string, index: number): Play {
	const parsed = PlaySchema.safeParse(body);
	if (!parsed.success) {
		throw new PlaybookError(`${where} invalid play: ${formatZodError(parsed.error)}`);
	}
	const { hosts } = parsed.data;
	const name = parsed.data.name ?? `Play ${index + 1}`;
	const tasks = parsed.data.tasks.map((task, taskIndex) =>
		parseTask(task, `${where}.tasks#${taskIndex}`, hosts, `play${index + 1}-task${taskIndex + 1}`),
	);
	return { name, hosts, tasks };
}

function parseTask(body: unknown, where: string, hosts: string, id: string): Task {
	const parsed = TaskSchema.safeParse(body);
	if (!parsed.success) {
		throw new PlaybookError(`${where} invalid task: ${formatZodError(parsed.error)}`);
	}
	const task = parsed.data;
	const moduleName = Object.keys(task).find((key) => !TASK_KEYWORDS.has(key));
	if (!moduleName) {
		throw new PlaybookError(`${where} task has no action`);
	}

	const action = SHELL_MODULES.has(moduleName)
		? parseShellAction(moduleName, task[moduleName], task.args, where)
		: { module: "unsupported" as const, name: moduleName };

	const fallbackName = action.module === "unsupported" ? moduleName : action.cmd.trim().split("\n")[0];
	return {
		id,
		name: task.name ?? fallbackName,
		hosts,
		action,
		when: task.when,
		register: task.register,
		ignoreErrors: task.ignore_errors,
		become: task.become,
	};
}

function parseShellAction(
	moduleName: string,
	value: unknown,
	extraArgs: Record<string, unknown> | undefined,
	where: string,
): ShellAction {
	const parsed = ShellArgsSchema.safeParse(value);
	if (!parsed.success) {
		throw new PlaybookError(`${where} invalid ${moduleName} arguments: ${formatZodError(parsed.error)}`);
	}
	const module = moduleName.split(".").pop() ?? moduleName;
	const args = typeof parsed.data === "string" ? { cmd: parsed.data } : parsed.data;
	const executable = args.executable ?? readString(extraArgs, "executable");
	const chdir = args.chdir ?? readString(extraArgs, "chdir");

	return {
		module: module === "command" ? "command" : "shell",
		cmd: args.cmd,
		executable: module === "command" ? undefined : executable ?? DEFAULT_EXECUTABLE,
		chdir,
	};
}

function readString(record: Record<string, unknown> | undefined, key: string): string | undefined {
	if (!isRecord(record)) {
		return undefined;
	}
	const value = record[key];
	return typeof value === "string" ? value : undefined;
}
