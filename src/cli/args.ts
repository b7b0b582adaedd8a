import fs from "node:fs";

export const COMMANDS = ["run", "validate", "plan", "playbook", "init"] as const;

export type CliCommand = (typeof COMMANDS)[number];

export type CliOptions = {
	command: CliCommand;
	playbook?: string;
	jobs?: string[];
	pipeline?: string;
	engine?: string;
	simulate?: Record<string, number>;
	vars?: Record<string, string>;
	json?: boolean;
	help?: boolean;
	version?: boolean;
	unknown?: string[];
	errors?: string[];
};

export function parseArgs(argv: string[]): CliOptions {
	const options: CliOptions = { command: "run", unknown: [], errors: [] };
	const args = [...argv];
	if (args[0] && !args[0].startsWith("-")) {
		const command = args[0];
		const known = COMMANDS.find((item) => item === command);
		if (known) {
			options.command = known;
		} else {
			options.errors?.push(`Unknown command: ${command}`);
		}
		args.shift();
	}

	if (options.command === "playbook" && args[0] && !args[0].startsWith("-")) {
		options.playbook = args.shift();
	}

	while (args.length) {
		const arg = args.shift();
		switch (arg) {
			case "--help":
			case "-h":
				options.help = true;
				break;
			case "--version":
			case "-v":
				options.version = true;
				break;
			case "--job":
				{
					const value = takeValue("--job", args, options);
					if (value) {
						options.jobs = value.split(",").filter(Boolean);
					}
				}
				break;
			case "--pipeline":
				options.pipeline = takeValue("--pipeline", args, options);
				break;
			case "--engine":
				options.engine = takeValue("--engine", args, options);
				break;
			case "--simulate":
				{
					const value = takeValue("--simulate", args, options);
					if (value) {
						const entry = parseSimulateEntry(value);
						if (entry) {
							options.simulate = { ...options.simulate, [entry.command]: entry.rc };
						} else {
							options.errors?.push(
								`Invalid value for --simulate: ${value} (expected <command>=<exit code>)`,
							);
						}
					}
				}
				break;
			case "--var":
				{
					const value = takeValue("--var", args, options);
					if (value) {
						const separator = value.indexOf("=");
						if (separator > 0) {
							options.vars = {
								...options.vars,
								[value.slice(0, separator)]: value.slice(separator + 1),
							};
						} else {
							options.errors?.push(`Invalid value for --var: ${value} (expected key=value)`);
						}
					}
				}
				break;
			case "--json":
				options.json = true;
				break;
			default:
				if (arg) {
					options.unknown?.push(arg);
				}
				break;
		}
	}

	return options;
}

export function printHelp(): void {
	process.stdout.write(`cistage <command> [options]\n\n`);
	process.stdout.write(`Commands:\n`);
	process.stdout.write(`  run                  Run a job's playbooks (default)\n`);
	process.stdout.write(`  validate             Check job, nodeset and pipeline consistency\n`);
	process.stdout.write(`  plan                 Show the phases a job or pipeline would run\n`);
	process.stdout.write(`  playbook <file>      Run a single playbook\n`);
	process.stdout.write(`  init                 Write .cistage.yml and ignore .cistage in git\n\n`);
	process.stdout.write(`Options:\n`);
	process.stdout.write(`  --job <names>         Comma-separated job names\n`);
	process.stdout.write(`  --pipeline <name>     Pipeline (check, gate, post, release, ...)\n`);
	process.stdout.write(`  --engine <id>         Engine: local|dry-run\n`);
	process.stdout.write(`  --simulate <cmd=rc>   Dry-run exit status for a command (repeatable)\n`);
	process.stdout.write(`  --var <key=value>     Extra variable, dotted keys allowed (repeatable)\n`);
	process.stdout.write(`  --json                Print JSON summary\n`);
	process.stdout.write(`  -h, --help            Show help\n`);
	process.stdout.write(`  -v, --version         Show version\n`);
}

export function readPackageVersion(): string {
	const pkgUrl = new URL("../../package.json", import.meta.url);
	const raw = fs.readFileSync(pkgUrl, "utf-8");
	const parsed: unknown = JSON.parse(raw);
	if (typeof parsed === "object" && parsed !== null && "version" in parsed) {
		return String(parsed.version);
	}
	return "0.0.0";
}

export function parseSimulateEntry(value: string): { command: string; rc: number } | undefined {
	const separator = value.lastIndexOf("=");
	if (separator <= 0) {
		return undefined;
	}
	const command = value.slice(0, separator).trim();
	const rc = value.slice(separator + 1).trim();
	if (!command || !/^\d+$/.test(rc)) {
		return undefined;
	}
	return { command, rc: Number(rc) };
}

function takeValue(flag: string, args: string[], options: CliOptions): string | undefined {
	const value = args.shift();
	if (!value || value.startsWith("-")) {
		options.errors?.push(`Missing value for ${flag}`);
		if (value) {
			args.unshift(value);
		}
		return undefined;
	}
	return value;
}
