import { setTimeout as delay } from "node:timers/promises";
import type { ActionOutcome, ActionRequest, ActionRunner } from "../core/action.js";
import { StepFailure } from "../core/errors.js";
import { MAX_TIMER_MS, parseDuration } from "../utils/duration.js";

export class SleepAction implements ActionRunner {
	readonly id = "sleep";

	async run(request: ActionRequest): Promise<ActionOutcome> {
		const duration = parseDuration(request.inputs.duration ?? "");
		if (duration === undefined || duration < 0 || duration > MAX_TIMER_MS) {
			throw new StepFailure(request.stepId, `sleep needs a valid \`duration\`, got "${request.inputs.duration ?? ""}"`);
		}
		if (request.signal.aborted) {
			return { exitCode: 130 };
		}
		request.write(`Sleeping ${duration}ms\n`, "stdout");
		try {
			await delay(duration, undefined, { signal: request.signal });
		} catch (error) {
			if (request.signal.aborted) {
				return { exitCode: 130 };
			}
			throw error;
		}
		return { exitCode: 0 };
	}
}
