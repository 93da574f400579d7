import type { Guard } from "./types.js";

export function evaluateGuard(guard: Guard, parameters: Readonly<Record<string, string>>): boolean {
	if ("allOf" in guard) {
		return guard.allOf.every((inner) => evaluateGuard(inner, parameters));
	}
	if ("anyOf" in guard) {
		return guard.anyOf.some((inner) => evaluateGuard(inner, parameters));
	}
	if ("not" in guard) {
		return !evaluateGuard(guard.not, parameters);
	}
	const value = parameters[guard.param];
	if ("equals" in guard) {
		return value === guard.equals;
	}
	if ("notEquals" in guard) {
		return value !== guard.notEquals;
	}
	return value !== undefined && guard.in.includes(value);
}

export function guardParameters(guard: Guard): string[] {
	if ("allOf" in guard) {
		return guard.allOf.flatMap(guardParameters);
	}
	if ("anyOf" in guard) {
		return guard.anyOf.flatMap(guardParameters);
	}
	if ("not" in guard) {
		return guardParameters(guard.not);
	}
	return [guard.param];
}

export function describeGuard(guard: Guard): string {
	if ("allOf" in guard) {
		return `(${guard.allOf.map(describeGuard).join(" && ")})`;
	}
	if ("anyOf" in guard) {
		return `(${guard.anyOf.map(describeGuard).join(" || ")})`;
	}
	if ("not" in guard) {
		return `!${describeGuard(guard.not)}`;
	}
	if ("equals" in guard) {
		return `${guard.param} == ${JSON.stringify(guard.equals)}`;
	}
	if ("notEquals" in guard) {
		return `${guard.param} != ${JSON.stringify(guard.notEquals)}`;
	}
	return `${guard.param} in [${guard.in.map((value) => JSON.stringify(value)).join(", ")}]`;
}
