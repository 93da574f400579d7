import fs from "node:fs";
import { parseDuration } from "../utils/duration.js";

export const COMMANDS = ["run", "status", "runs", "validate", "prune", "init"] as const;

export type CliCommand = (typeof COMMANDS)[number];

export type CliOptions = {
	command: CliCommand;
	file?: string;
	params: Record<string, string>;
	timeoutMs?: number;
	keep?: number;
	runId?: string;
	json?: boolean;
	help?: boolean;
	version?: boolean;
	unknown: string[];
	errors: string[];
};

export function parseArgs(argv: string[]): CliOptions {
	const options: CliOptions = { command: "run", params: {}, unknown: [], errors: [] };
	const args = [...argv];
	if (args[0] && !args[0].startsWith("-")) {
		const command = args[0];
		if (isCommand(command)) {
			options.command = command;
		} else {
			options.errors.push(`Unknown command: ${command}`);
		}
		args.shift();
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
			case "--file":
			case "-f":
				options.file = takeValue(arg, args, options);
				break;
			case "--param":
			case "-p":
				{
					const value = takeValue(arg, args, options);
					if (value) {
						collectParam(options, value);
					}
				}
				break;
			case "--timeout":
				{
					const value = takeValue("--timeout", args, options);
					if (value) {
						const parsed = parseDuration(value);
						if (parsed !== undefined && parsed > 0) {
							options.timeoutMs = parsed;
						} else {
							options.errors.push(`Invalid value for --timeout: ${value} (expected e.g. 90s, 5m, 1500)`);
						}
					}
				}
				break;
			case "--keep":
				{
					const value = takeValue("--keep", args, options);
					if (value) {
						const keep = Number(value);
						if (Number.isInteger(keep) && keep >= 1) {
							options.keep = keep;
						} else {
							options.errors.push(`Invalid value for --keep: ${value} (expected a whole number >= 1)`);
						}
					}
				}
				break;
			case "--json":
				options.json = true;
				break;
			default:
				if (arg && !arg.startsWith("-") && options.command === "status" && !options.runId) {
					options.runId = arg;
				} else if (arg) {
					options.unknown.push(arg);
				}
				break;
		}
	}

	if (options.command === "status" && !options.runId && !options.help && !options.version) {
		options.errors.push("Missing run id: pipewright status <run-id>");
	}

	return options;
}

export function printHelp(): void {
	process.stdout.write(`pipewright <command> [options]\n\n`);
	process.stdout.write(`Commands:\n`);
	process.stdout.write(`  run                   Run the pipeline (default)\n`);
	process.stdout.write(`  status <run-id>       Show the status of a run\n`);
	process.stdout.write(`  runs                  List retained runs, newest first\n`);
	process.stdout.write(`  validate              Check the pipeline definition and list every issue\n`);
	process.stdout.write(`  prune                 Apply the retention policy now\n`);
	process.stdout.write(`  init                  Add .pipewright to .gitignore\n\n`);
	process.stdout.write(`Options:\n`);
	process.stdout.write(`  -f, --file <file>     Pipeline definition (default from .pipewright.yml)\n`);
	process.stdout.write(`  -p, --param <k=v>     Parameter value (repeatable)\n`);
	process.stdout.write(`  --timeout <duration>  Abort the run after this long (e.g. 90s, 10m)\n`);
	process.stdout.write(`  --keep <n>            For prune, number of runs to keep\n`);
	process.stdout.write(`  --json                Print JSON output\n`);
	process.stdout.write(`  -h, --help            Show help\n`);
	process.stdout.write(`  -v, --version         Show version\n`);
}

export function readPackageVersion(): string {
	const pkgUrl = new URL("../../package.json", import.meta.url);
	const raw = fs.readFileSync(pkgUrl, "utf-8");
	const parsed: unknown = JSON.parse(raw);
	if (typeof parsed === "object" && parsed !== null && "version" in parsed && typeof parsed.version === "string") {
		return parsed.version;
	}
	return "0.0.0";
}

function isCommand(value: string): value is CliCommand {
	return COMMANDS.some((command) => command === value);
}

function collectParam(options: CliOptions, value: string): void {
	const separator = value.indexOf("=");
	if (separator <= 0) {
		options.errors.push(`Invalid value for --param: ${value} (expected key=value)`);
		return;
	}
	options.params[value.slice(0, separator).trim()] = value.slice(separator + 1);
}

function takeValue(flag: string, args: string[], options: CliOptions): string | undefined {
	const value = args.shift();
	if (!value || value.startsWith("-")) {
		options.errors.push(`Missing value for ${flag}`);
		if (value) {
			args.unshift(value);
		}
		return undefined;
	}
	return value;
}
