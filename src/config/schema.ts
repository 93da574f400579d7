import { z } from "zod";
import { MAX_TIMER_MS } from "../utils/duration.js";

export const DEFAULT_STEP_TIMEOUT_MS = 30 * 60 * 1000;

const DefaultsSchema = z.object({
	stepTimeoutMs: z.number().int().positive().max(MAX_TIMER_MS).default(DEFAULT_STEP_TIMEOUT_MS),
	retention: z.number().int().min(1).default(10),
	maxParallel: z.number().int().min(1).default(4),
});

const SecretsSchema = z.object({
	file: z.string().optional(),
	envPrefix: z.string().min(1).default("PIPEWRIGHT_SECRET_"),
});

export const ConfigSchema = z
	.object({
		pipeline: z.string().default("pipeline.yml"),
		stateDir: z.string().default(".pipewright"),
		shell: z.string().default("/bin/sh"),
		defaults: DefaultsSchema.default({
			stepTimeoutMs: DEFAULT_STEP_TIMEOUT_MS,
			retention: 10,
			maxParallel: 4,
		}),
		secrets: SecretsSchema.default({ envPrefix: "PIPEWRIGHT_SECRET_" }),
		parameters: z.record(z.string()).default({}),
	})
	.strict();

export type PipewrightConfig = z.infer<typeof ConfigSchema>;
