/**
 * Error taxonomy for a sync run.
 *
 * Fatal kinds (ConfigError, AuthError, ListingError) end the run with exit code 1.
 * AlreadyRunningError ends it with exit code 0. Per-file kinds (NetworkError from a
 * download or delete, OrganizeError) are caught at the file loop; NotifyError is
 * logged and never changes the exit code.
 */

export class SyncError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

export class ConfigError extends SyncError {
	readonly issues: string[];

	constructor(message: string, issues: string[] = []) {
		super(issues.length ? `${message}: ${issues.join("; ")}` : message);
		this.issues = issues;
	}
}

export class AlreadyRunningError extends SyncError {
	readonly lockPath: string;
	readonly ownerPid?: number;

	constructor(lockPath: string, ownerPid?: number) {
		super(
			ownerPid
				? `Another instance (pid ${ownerPid}) holds ${lockPath}`
				: `Another instance holds ${lockPath}`
		);
		this.lockPath = lockPath;
		this.ownerPid = ownerPid;
	}
}

export class NetworkError extends SyncError {
	readonly operation: string;
	readonly fileId?: string;
	readonly statusCode?: number;

	constructor(
		operation: string,
		message: string,
		details: { fileId?: string; statusCode?: number; cause?: unknown } = {}
	) {
		const subject = details.fileId ? `${operation} ${details.fileId}` : operation;
		super(`${subject}: ${message}`, { cause: details.cause });
		this.operation = operation;
		this.fileId = details.fileId;
		this.statusCode = details.statusCode;
	}
}

export class AuthError extends NetworkError {}

export class ListingError extends NetworkError {}

export class NotifyError extends NetworkError {}

export class OrganizeError extends SyncError {
	readonly filePath: string;

	constructor(filePath: string, message: string, options?: { cause?: unknown }) {
		super(`${filePath}: ${message}`, options);
		this.filePath = filePath;
	}
}

export function toErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/** Fatal errors end the run with exit code 1 after the lock is released. */
export function isFatal(error: unknown): boolean {
	return error instanceof ConfigError || error instanceof AuthError || error instanceof ListingError;
}
