import { describe, expect, it } from "vitest";
import { parseArgs } from "../src/cli/args.js";

describe("cli args", () => {
	it("parses run options and repeatable params", () => {
		const parsed = parseArgs([
			"run",
			"--file",
			"ci/pipeline.yml",
			"--param",
			"TARGET=prod",
			"-p",
			"TAG=v1=rc",
			"--timeout",
			"90s",
			"--json",
		]);

		expect(parsed).toMatchObject({
			command: "run",
			file: "ci/pipeline.yml",
			params: { TARGET: "prod", TAG: "v1=rc" },
			timeoutMs: 90_000,
			json: true,
			unknown: [],
			errors: [],
		});
	});

	it("defaults to the run command", () => {
		expect(parseArgs([]).command).toBe("run");
		expect(parseArgs(["--json"]).command).toBe("run");
	});

	it("captures unknown options", () => {
		const parsed = parseArgs(["--wat", "--json"]);
		expect(parsed.unknown).toEqual(["--wat"]);
		expect(parsed.json).toBe(true);
	});

	it("reports missing values for valued flags", () => {
		const parsed = parseArgs(["--file", "--param", "A=1"]);
		expect(parsed.errors).toEqual(["Missing value for --file"]);
		expect(parsed.params).toEqual({ A: "1" });
	});

	it("reports malformed params, timeouts and keep counts", () => {
		expect(parseArgs(["--param", "novalue"]).errors).toEqual([
			"Invalid value for --param: novalue (expected key=value)",
		]);
		expect(parseArgs(["--timeout", "soon"]).errors).toEqual([
			"Invalid value for --timeout: soon (expected e.g. 90s, 5m, 1500)",
		]);
		expect(parseArgs(["prune", "--keep", "0"]).errors).toEqual([
			"Invalid value for --keep: 0 (expected a whole number >= 1)",
		]);
	});

	it("takes the run id as the status positional", () => {
		const parsed = parseArgs(["status", "20240101T000000-abcdef", "--json"]);
		expect(parsed.command).toBe("status");
		expect(parsed.runId).toBe("20240101T000000-abcdef");
		expect(parsed.errors).toEqual([]);
	});

	it("requires a run id for status", () => {
		expect(parseArgs(["status"]).errors).toEqual(["Missing run id: pipewright status <run-id>"]);
	});

	it("parses other subcommands", () => {
		expect(parseArgs(["init"]).command).toBe("init");
		expect(parseArgs(["runs"]).command).toBe("runs");
		expect(parseArgs(["validate", "-f", "p.yml"]).file).toBe("p.yml");
		expect(parseArgs(["prune", "--keep", "3"]).keep).toBe(3);
		expect(parseArgs(["deploy"]).errors).toEqual(["Unknown command: deploy"]);
	});
});
