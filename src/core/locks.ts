import fs from "node:fs";
import path from "node:path";
import { ensureWithinBase, sanitizePathSegment } from "../utils/path-safety.js";
import { ConcurrentRunError, LockContentionError } from "./errors.js";

export type Release = () => void;

export type AcquireOptions = {
	signal?: AbortSignal;
	timeoutMs?: number;
};

type Waiter = {
	grant: () => void;
};

/**
 * Named FIFO mutexes shared by every stage of every run in this process.
 * Waiting is unbounded unless `timeoutMs` is given.
 */
export class LockManager {
	private readonly held = new Set<string>();
	private readonly queues = new Map<string, Waiter[]>();

	isHeld(name: string): boolean {
		return this.held.has(name);
	}

	waiting(name: string): number {
		return this.queues.get(name)?.length ?? 0;
	}

	async acquire(name: string, options: AcquireOptions = {}): Promise<Release> {
		const { signal, timeoutMs } = options;
		signal?.throwIfAborted();

		if (!this.held.has(name)) {
			this.held.add(name);
			return this.releaser(name);
		}

		const startedAt = Date.now();
		return new Promise<Release>((resolve, reject) => {
			let timer: NodeJS.Timeout | undefined;
			const cleanup = (): void => {
				if (timer) {
					clearTimeout(timer);
				}
				signal?.removeEventListener("abort", onAbort);
				this.dropWaiter(name, waiter);
			};
			const waiter: Waiter = {
				grant: () => {
					cleanup();
					resolve(this.releaser(name));
				},
			};
			const onAbort = (): void => {
				cleanup();
				reject(signal?.reason);
			};

			const queue = this.queues.get(name) ?? [];
			queue.push(waiter);
			this.queues.set(name, queue);
			signal?.addEventListener("abort", onAbort, { once: true });
			if (timeoutMs !== undefined) {
				timer = setTimeout(() => {
					cleanup();
					reject(new LockContentionError(name, Date.now() - startedAt));
				}, timeoutMs);
			}
		});
	}

	private releaser(name: string): Release {
		let released = false;
		return () => {
			if (released) {
				return;
			}
			released = true;
			const next = this.queues.get(name)?.[0];
			if (next) {
				// Ownership passes straight to the next waiter; the name stays held.
				next.grant();
				return;
			}
			this.held.delete(name);
		};
	}

	private dropWaiter(name: string, waiter: Waiter): void {
		const queue = this.queues.get(name);
		if (!queue) {
			return;
		}
		const index = queue.indexOf(waiter);
		if (index !== -1) {
			queue.splice(index, 1);
		}
		if (queue.length === 0) {
			this.queues.delete(name);
		}
	}
}

type RunLockRecord = {
	pid: number;
	runId: string;
	startedAt: string;
};

const activeRunLocks = new Set<string>();

/**
 * Refuses to start a second run of a pipeline while one is in flight, in
 * this process and in any other process sharing the state directory.
 */
export class RunGuard {
	constructor(private readonly lockDir: string) {}

	acquire(pipeline: string, runId: string): Release {
		fs.mkdirSync(this.lockDir, { recursive: true });
		const lockPath = ensureWithinBase(
			this.lockDir,
			`${sanitizePathSegment(pipeline, "pipeline")}.lock`,
			"run lock",
		);

		if (activeRunLocks.has(lockPath)) {
			throw new ConcurrentRunError(pipeline, describeHolder(readRecord(lockPath)));
		}

		const record: RunLockRecord = { pid: process.pid, runId, startedAt: new Date().toISOString() };
		if (!tryCreate(lockPath, record)) {
			const holder = readRecord(lockPath);
			if (holder && isAlive(holder.pid)) {
				throw new ConcurrentRunError(pipeline, describeHolder(holder));
			}
			const claimedPath = `${lockPath}.${process.pid}.${runId}.stale`;
			if (!claimStale(lockPath, holder, claimedPath) || !tryCreate(lockPath, record)) {
				throw new ConcurrentRunError(pipeline, describeHolder(readRecord(lockPath)));
			}
		}
		activeRunLocks.add(lockPath);

		let released = false;
		return () => {
			if (released) {
				return;
			}
			released = true;
			activeRunLocks.delete(lockPath);
			fs.rmSync(lockPath, { force: true });
		};
	}
}

function tryCreate(lockPath: string, record: RunLockRecord): boolean {
	try {
		fs.writeFileSync(lockPath, JSON.stringify(record), { flag: "wx" });
		return true;
	} catch (error) {
		if (isErrno(error, "EEXIST")) {
			return false;
		}
		throw error;
	}
}

/**
 * Moves a stale lock file aside before it is replaced. The rename is atomic,
 * so of two processes clearing the same stale lock only one moves it; if what
 * was moved turns out to be a live holder's fresh lock, it is put back.
 */
function claimStale(lockPath: string, stale: RunLockRecord | null, claimedPath: string): boolean {
	try {
		fs.renameSync(lockPath, claimedPath);
	} catch (error) {
		if (isErrno(error, "ENOENT")) {
			return true;
		}
		throw error;
	}
	try {
		const moved = readRecord(claimedPath);
		if (moved && !sameRecord(moved, stale) && isAlive(moved.pid)) {
			restore(claimedPath, lockPath);
			return false;
		}
		return true;
	} finally {
		fs.rmSync(claimedPath, { force: true });
	}
}

function restore(claimedPath: string, lockPath: string): void {
	try {
		// link, unlike rename, never replaces a file created in the meantime.
		fs.linkSync(claimedPath, lockPath);
	} catch (error) {
		if (!isErrno(error, "EEXIST")) {
			throw error;
		}
	}
}

function sameRecord(a: RunLockRecord, b: RunLockRecord | null): boolean {
	return b !== null && a.pid === b.pid && a.runId === b.runId && a.startedAt === b.startedAt;
}

function readRecord(lockPath: string): RunLockRecord | null {
	if (!fs.existsSync(lockPath)) {
		return null;
	}
	let parsed: unknown;
	try {
		parsed = JSON.parse(fs.readFileSync(lockPath, "utf-8"));
	} catch (error) {
		// A holder that died mid-write leaves a truncated record; treat it as stale.
		if (error instanceof SyntaxError) {
			return null;
		}
		throw error;
	}
	if (
		typeof parsed === "object" &&
		parsed !== null &&
		"pid" in parsed &&
		typeof parsed.pid === "number" &&
		"runId" in parsed &&
		typeof parsed.runId === "string" &&
		"startedAt" in parsed &&
		typeof parsed.startedAt === "string"
	) {
		return { pid: parsed.pid, runId: parsed.runId, startedAt: parsed.startedAt };
	}
	return null;
}

function describeHolder(record: RunLockRecord | null): string | undefined {
	return record ? `run ${record.runId}, pid ${record.pid}` : undefined;
}

function isAlive(pid: number): boolean {
	try {
		process.kill(pid, 0);
		return true;
	} catch (error) {
		return isErrno(error, "EPERM");
	}
}

export function isErrno(error: unknown, code: string): boolean {
	return error instanceof Error && "code" in error && error.code === code;
}

export function runLockDir(stateDir: string): string {
	return path.join(stateDir, "locks");
}
