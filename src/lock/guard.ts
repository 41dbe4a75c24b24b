import fs from "fs";
import path from "path";
import { randomBytes } from "crypto";
import type { Logger } from "../logger.js";
import { AlreadyRunningError, ConfigError, toErrorMessage } from "../errors.js";

export interface LockHandle {
	readonly path: string;
	/** Idempotent. Removes the lock file if it still names this process. */
	release(): void;
}

/** A lock file without a readable PID is only stale once it is this old. */
export const STALE_LOCK_GRACE_MS = 30_000;

/**
 * Take the single-instance lock at `lockPath`.
 *
 * The lock file appears with the owner's PID already in it: the PID is written to a
 * private staging file that is then hard-linked into place, and the link fails with
 * EEXIST while another owner holds the lock. A lock whose PID is no longer running, or
 * which has no readable PID and is older than the grace period, is stale and gets
 * reclaimed.
 */
export function acquireLock(lockPath: string, log: Logger): LockHandle {
	if (fs.existsSync(lockPath) && fs.statSync(lockPath).isDirectory()) {
		throw new ConfigError(`Lock file path ${lockPath} is a directory`);
	}

	fs.mkdirSync(path.dirname(lockPath), { recursive: true });

	for (let attempt = 0; attempt < 3; attempt++) {
		if (tryCreate(lockPath)) {
			log.debug({ lockPath, pid: process.pid }, "Lock acquired");
			return createHandle(lockPath, log);
		}

		const state = inspectLock(lockPath);
		if (!state) {
			continue;
		}

		const held = state.owner !== undefined ? isProcessAlive(state.owner) : state.ageMs < STALE_LOCK_GRACE_MS;
		if (held) {
			throw new AlreadyRunningError(lockPath, state.owner);
		}

		log.warn({ lockPath, owner: state.owner }, "Removing stale lock file");
		reclaimStaleLock(lockPath, state.owner);
	}

	throw new AlreadyRunningError(lockPath);
}

/**
 * Remove a stale lock file without ever deleting a lock another process has just taken.
 * The file is renamed aside first; if the renamed file no longer names `staleOwner` it
 * is linked back into place. Returns true when the stale file was removed.
 */
export function reclaimStaleLock(lockPath: string, staleOwner: number | undefined): boolean {
	const aside = `${lockPath}.${process.pid}.${randomBytes(4).toString("hex")}.stale`;
	try {
		fs.renameSync(lockPath, aside);
	} catch (e) {
		if (isErrno(e, "ENOENT")) {
			return false;
		}
		throw e;
	}

	if (parsePid(fs.readFileSync(aside, "utf-8")) === staleOwner) {
		fs.unlinkSync(aside);
		return true;
	}

	try {
		fs.linkSync(aside, lockPath);
	} catch (e) {
		if (!isErrno(e, "EEXIST")) {
			throw e;
		}
	}
	fs.unlinkSync(aside);
	return false;
}

/**
 * Run `fn` while holding the lock; the lock is released however `fn` ends.
 */
export async function withLock<T>(lockPath: string, log: Logger, fn: () => Promise<T>): Promise<T> {
	const handle = acquireLock(lockPath, log);
	try {
		return await fn();
	} finally {
		handle.release();
	}
}

export function isProcessAlive(pid: number): boolean {
	try {
		process.kill(pid, 0);
		return true;
	} catch (e) {
		// EPERM: the process exists but belongs to someone else
		return isErrno(e, "EPERM");
	}
}

function tryCreate(lockPath: string): boolean {
	const staging = `${lockPath}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`;
	try {
		fs.writeFileSync(staging, `${process.pid}\n`, { flag: "wx" });
		fs.linkSync(staging, lockPath);
		return true;
	} catch (e) {
		if (isErrno(e, "EEXIST")) {
			return false;
		}
		throw new ConfigError(`Cannot create lock file ${lockPath}`, [toErrorMessage(e)]);
	} finally {
		fs.rmSync(staging, { force: true });
	}
}

function inspectLock(lockPath: string): { owner?: number; ageMs: number } | undefined {
	try {
		const { mtimeMs } = fs.statSync(lockPath);
		return { owner: parsePid(fs.readFileSync(lockPath, "utf-8")), ageMs: Date.now() - mtimeMs };
	} catch (e) {
		if (isErrno(e, "ENOENT")) {
			return undefined;
		}
		throw e;
	}
}

function readOwner(lockPath: string): number | undefined {
	try {
		return parsePid(fs.readFileSync(lockPath, "utf-8"));
	} catch (e) {
		if (isErrno(e, "ENOENT")) {
			return undefined;
		}
		throw e;
	}
}

function parsePid(content: string): number | undefined {
	const pid = Number.parseInt(content.trim(), 10);
	return Number.isInteger(pid) && pid > 0 ? pid : undefined;
}

function isErrno(error: unknown, code: string): boolean {
	return error instanceof Error && "code" in error && error.code === code;
}

function removeIfPresent(lockPath: string): void {
	try {
		fs.unlinkSync(lockPath);
	} catch (e) {
		if (!isErrno(e, "ENOENT")) {
			throw e;
		}
	}
}

function createHandle(lockPath: string, log: Logger): LockHandle {
	let released = false;

	const release = (): void => {
		if (released) return;
		released = true;
		process.removeListener("exit", release);

		try {
			if (readOwner(lockPath) === process.pid) {
				removeIfPresent(lockPath);
				log.debug({ lockPath }, "Lock released");
			}
		} catch (e) {
			log.warn({ lockPath, err: e }, `Failed to remove lock file: ${toErrorMessage(e)}`);
		}
	};

	process.once("exit", release);
	return { path: lockPath, release };
}
