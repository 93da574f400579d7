import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import YAML from "yaml";
import { z } from "zod";
import type { SecretMasker } from "../utils/redact.js";
import { CredentialResolutionError } from "./errors.js";
import type { CredentialBinding } from "./types.js";

export type Secret = string | { username: string; password: string };

export interface SecretStore {
	readonly id: string;
	resolve(credentialId: string): Promise<Secret>;
}

export class MemorySecretStore implements SecretStore {
	readonly id = "memory";
	private readonly secrets: Map<string, Secret>;

	constructor(secrets: Record<string, Secret> = {}) {
		this.secrets = new Map(Object.entries(secrets));
	}

	async resolve(credentialId: string): Promise<Secret> {
		const secret = this.secrets.get(credentialId);
		if (secret === undefined) {
			throw new CredentialResolutionError(credentialId, `not found in ${this.id} store`);
		}
		return secret;
	}
}

/**
 * Reads `<prefix><ID>` for plain secrets and `<prefix><ID>_USERNAME` /
 * `<prefix><ID>_PASSWORD` for username/password pairs. The id is upper-cased
 * and every character outside [A-Z0-9] becomes `_`.
 */
export class EnvSecretStore implements SecretStore {
	readonly id = "env";

	constructor(
		private readonly prefix: string,
		private readonly env: NodeJS.ProcessEnv = process.env,
	) {}

	async resolve(credentialId: string): Promise<Secret> {
		const key = `${this.prefix}${envKey(credentialId)}`;
		const username = this.env[`${key}_USERNAME`];
		const password = this.env[`${key}_PASSWORD`];
		if (username !== undefined && password !== undefined) {
			return { username, password };
		}
		const value = this.env[key];
		if (value === undefined) {
			throw new CredentialResolutionError(credentialId, `${key} is not set`);
		}
		return value;
	}
}

const SecretFileSchema = z.record(
	z.union([z.string(), z.object({ username: z.string(), password: z.string() }).strict()]),
);

export class FileSecretStore implements SecretStore {
	readonly id = "file";
	private cache: Map<string, Secret> | null = null;

	constructor(private readonly filePath: string) {}

	async resolve(credentialId: string): Promise<Secret> {
		const secrets = this.load(credentialId);
		const secret = secrets.get(credentialId);
		if (secret === undefined) {
			throw new CredentialResolutionError(credentialId, `not found in ${this.filePath}`);
		}
		return secret;
	}

	private load(credentialId: string): Map<string, Secret> {
		if (this.cache) {
			return this.cache;
		}
		if (!fs.existsSync(this.filePath)) {
			throw new CredentialResolutionError(credentialId, `secret file ${this.filePath} is missing`);
		}
		const parsed = SecretFileSchema.safeParse(YAML.parse(fs.readFileSync(this.filePath, "utf-8")) ?? {});
		if (!parsed.success) {
			throw new CredentialResolutionError(credentialId, `secret file ${this.filePath} is malformed`);
		}
		this.cache = new Map(Object.entries(parsed.data));
		return this.cache;
	}
}

export class ChainSecretStore implements SecretStore {
	readonly id: string;

	constructor(private readonly stores: SecretStore[]) {
		this.id = stores.map((store) => store.id).join("+") || "empty";
	}

	async resolve(credentialId: string): Promise<Secret> {
		const misses: string[] = [];
		for (const store of this.stores) {
			try {
				return await store.resolve(credentialId);
			} catch (error) {
				if (!(error instanceof CredentialResolutionError)) {
					throw error;
				}
				misses.push(error.message);
			}
		}
		throw new CredentialResolutionError(
			credentialId,
			misses.length > 0 ? `no store could supply it (${this.id})` : "no secret stores configured",
		);
	}
}

export type CredentialScope = {
	readonly env: Record<string, string>;
};

export type CredentialScopeOptions = {
	store: SecretStore;
	masker: SecretMasker;
	tempRoot?: string;
};

/**
 * Resolves the bindings, exposes them to `block` through `scope.env`, and
 * tears everything down on every exit path: the variables are deleted from
 * the overlay, secret files are removed and the values stop being masked.
 */
export async function withCredentials<T>(
	bindings: readonly CredentialBinding[],
	options: CredentialScopeOptions,
	block: (scope: CredentialScope) => Promise<T>,
): Promise<T> {
	const env: Record<string, string> = {};
	const registered: string[] = [];
	let tempDir: string | null = null;

	const protect = (secret: string): void => {
		options.masker.add(secret);
		registered.push(secret);
	};
	const expose = (variable: string, value: string): void => {
		env[variable] = value;
		protect(value);
	};

	try {
		for (const binding of bindings) {
			const secret = await options.store.resolve(binding.credentialId);
			switch (binding.kind) {
				case "usernamePassword":
					if (typeof secret === "string") {
						throw new CredentialResolutionError(binding.credentialId, "expected a username/password pair");
					}
					expose(binding.usernameVariable, secret.username);
					expose(binding.passwordVariable, secret.password);
					break;
				case "file": {
					const value = typeof secret === "string" ? secret : `${secret.username}:${secret.password}`;
					tempDir ??= fs.mkdtempSync(path.join(options.tempRoot ?? os.tmpdir(), "pipewright-cred-"));
					const filePath = path.join(tempDir, `${binding.variable}.secret`);
					fs.writeFileSync(filePath, value, { mode: 0o600 });
					env[binding.variable] = filePath;
					protect(value);
					if (typeof secret !== "string") {
						// Either half of the pair may be printed on its own.
						protect(secret.username);
						protect(secret.password);
					}
					break;
				}
				default:
					if (typeof secret !== "string") {
						throw new CredentialResolutionError(binding.credentialId, "expected a plain secret");
					}
					expose(binding.variable, secret);
					break;
			}
		}

		return await block({ env });
	} finally {
		for (const key of Object.keys(env)) {
			delete env[key];
		}
		if (tempDir) {
			fs.rmSync(tempDir, { recursive: true, force: true });
		}
		for (const secret of registered) {
			options.masker.remove(secret);
		}
	}
}

function envKey(credentialId: string): string {
	return credentialId.toUpperCase().replace(/[^A-Z0-9]/g, "_");
}
