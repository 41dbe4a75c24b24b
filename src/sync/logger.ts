import type { Logger } from "../logger.js";
import type { FileOutcome, RescanStatus, SyncSummary } from "./types.js";

/**
 * Log sync start
 */
export function logSyncStart(
	log: Logger,
	options: { baseUrl: string; downloadDir: string; placement: string; remoteDelete: string }
): void {
	log.info(
		options,
		`Starting sync from ${options.baseUrl} into ${options.downloadDir} (${options.placement} placement, remote delete: ${options.remoteDelete})`
	);
}

export function summarize(
	outcomes: FileOutcome[],
	rescan: RescanStatus,
	duration: number
): SyncSummary {
	const summary: SyncSummary = {
		listed: outcomes.length,
		downloaded: 0,
		organized: 0,
		skipped: 0,
		failed: 0,
		deleted: 0,
		rescan,
		duration,
	};

	for (const outcome of outcomes) {
		switch (outcome.status) {
			case "downloaded":
				summary.downloaded++;
				if (outcome.placement === "organized") summary.organized++;
				if (outcome.deleted) summary.deleted++;
				break;
			case "skipped":
				summary.skipped++;
				if (outcome.deleted) summary.deleted++;
				break;
			case "failed":
				summary.failed++;
				break;
		}
	}

	return summary;
}

/**
 * Log sync complete with summary
 */
export function logSyncComplete(log: Logger, summary: SyncSummary): void {
	const durationSeconds = (summary.duration / 1000).toFixed(1);
	const parts = [
		`${summary.downloaded} downloaded`,
		`${summary.organized} organized`,
		`${summary.skipped} skipped`,
		`${summary.deleted} removed from source`,
	];
	if (summary.failed > 0) {
		parts.push(`${summary.failed} failed`);
	}

	const message = `Sync completed in ${durationSeconds}s: ${parts.join(", ")}`;
	if (summary.failed > 0) {
		log.warn(summary, message);
	} else {
		log.info(summary, message);
	}
}
