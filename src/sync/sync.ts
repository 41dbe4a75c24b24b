import fs from "fs";
import path from "path";
import type { Logger } from "../logger.js";
import type { LibraryNotifier } from "../library/plex.js";
import type { PlacementStrategy } from "../organizer/index.js";
import type { MediaSource } from "../source/client.js";
import { localFileName, type RemoteFile, type Session } from "../source/types.js";
import { toErrorMessage } from "../errors.js";
import { logSyncComplete, logSyncStart, summarize } from "./logger.js";
import type {
	FileOutcome,
	FileStage,
	RescanStatus,
	SyncOptions,
	SyncPhase,
	SyncReport,
} from "./types.js";

export interface SyncDependencies {
	source: MediaSource;
	placement: PlacementStrategy;
	/** Present only when the library server is fully configured. */
	notifier?: LibraryNotifier;
	log: Logger;
}

/**
 * One sync pass: authenticate, list, then download, place and delete each file, an
 * optional deferred cleanup, and a library rescan.
 *
 * Authentication and listing failures abort the pass by throwing. Anything that goes
 * wrong with a single file is logged and recorded in its outcome; the loop moves on.
 */
export async function runSync(options: SyncOptions, deps: SyncDependencies): Promise<SyncReport> {
	const startTime = Date.now();
	const { log } = deps;
	const enter = (phase: SyncPhase): void => {
		log.debug({ phase }, `Sync phase: ${phase}`);
		options.onPhase?.(phase);
	};

	enter("idle");
	logSyncStart(log, {
		baseUrl: options.baseUrl,
		downloadDir: options.downloadDir,
		placement: deps.placement.name,
		remoteDelete: options.remoteDelete,
	});

	let session: Session;
	let files: RemoteFile[];
	try {
		session = await openSession(options, deps, enter);
		enter("listing");
		files = await deps.source.listFiles(session);
	} catch (e) {
		enter("aborted");
		throw e;
	}

	const outcomes: FileOutcome[] = [];
	if (files.length === 0) {
		log.info("No files on the media source, nothing to sync");
	} else {
		log.info({ count: files.length }, `Found ${files.length} file(s) on the media source`);
		fs.mkdirSync(options.downloadDir, { recursive: true });

		enter("per-file");
		for (let i = 0; i < files.length; i++) {
			const outcome = await syncFile(files[i], session, options, deps);
			outcomes.push(outcome);
			options.onFileComplete?.(outcome, i + 1, files.length);
		}
	}

	let cleanedUp = 0;
	if (options.remoteDelete === "deferred" && outcomes.length > 0) {
		enter("cleanup");
		cleanedUp = await cleanupSynced(outcomes, session, deps);
	}

	let rescan: RescanStatus = "skipped";
	if (deps.notifier) {
		enter("rescanning");
		try {
			await deps.notifier.rescan();
			rescan = "triggered";
			log.info("Library rescan triggered");
		} catch (e) {
			rescan = "failed";
			log.error({ err: e }, `Failed to trigger library rescan: ${toErrorMessage(e)}`);
		}
	}

	enter("done");
	const summary = summarize(outcomes, rescan, Date.now() - startTime);
	logSyncComplete(log, summary);

	return { phase: "done", outcomes, rescan, cleanedUp, summary };
}

async function openSession(
	options: SyncOptions,
	deps: SyncDependencies,
	enter: (phase: SyncPhase) => void
): Promise<Session> {
	const { baseUrl, apiKey, username, password } = options;

	if (!username || !password) {
		deps.log.warn("No media source username/password provided, attempting unauthenticated sync");
		return { baseUrl, apiKey };
	}

	enter("authenticating");
	const session = await deps.source.authenticate(baseUrl, apiKey, { username, password });
	deps.log.info({ username }, "Authenticated with the media source");
	return session;
}

/**
 * Process one remote file. Never throws: every failure becomes a `failed` outcome.
 */
export async function syncFile(
	file: RemoteFile,
	session: Session,
	options: Pick<SyncOptions, "downloadDir" | "remoteDelete">,
	deps: SyncDependencies
): Promise<FileOutcome> {
	const { log, source, placement } = deps;
	let label = file.title || file.uid;
	let stage: FileStage = "download";
	let localPath: string | undefined;

	try {
		const fileName = localFileName(file);
		label = fileName;
		const destPath = path.join(options.downloadDir, fileName);

		if (fs.existsSync(destPath)) {
			log.info({ file: fileName, uid: file.uid }, `File already exists: ${fileName}, skipping`);
			return { status: "skipped", file, reason: "exists", localPath: destPath, deleted: false };
		}

		log.info({ file: fileName, uid: file.uid }, `Downloading: ${fileName}`);
		const bytes = await source.downloadFile(session, file, destPath);
		localPath = destPath;

		stage = "organize";
		const placed = await placement.organize(destPath);
		localPath = placed.finalPath;

		let deleted = false;
		if (options.remoteDelete === "immediate") {
			stage = "delete";
			await source.deleteFile(session, file);
			deleted = true;
		}

		log.info(
			{ file: fileName, uid: file.uid, bytes, finalPath: placed.finalPath, placement: placed.placement, deleted },
			`Downloaded: ${fileName}`
		);
		return {
			status: "downloaded",
			file,
			finalPath: placed.finalPath,
			placement: placed.placement,
			bytes,
			deleted,
		};
	} catch (e) {
		const reason = toErrorMessage(e);
		log.error({ file: label, uid: file.uid, stage, err: e }, `Error processing ${label} (${stage}): ${reason}`);
		return { status: "failed", file, stage, reason, localPath };
	}
}

/**
 * Deferred removal: delete every listed file whose local copy is confirmed. Failed
 * files are never deleted.
 */
async function cleanupSynced(
	outcomes: FileOutcome[],
	session: Session,
	deps: SyncDependencies
): Promise<number> {
	const { log, source } = deps;
	log.info("Cleaning up synced files from the media source");

	let removed = 0;
	for (const outcome of outcomes) {
		if (outcome.status === "failed") continue;

		try {
			await source.deleteFile(session, outcome.file);
			outcome.deleted = true;
			removed++;
		} catch (e) {
			log.error(
				{ uid: outcome.file.uid, err: e },
				`Failed to delete ${outcome.file.uid} from the media source: ${toErrorMessage(e)}`
			);
		}
	}

	log.info({ removed }, `Removed ${removed} synced file(s) from the media source`);
	return removed;
}
