import type { RemoteDeleteMode } from "../config.js";
import type { PlacementKind } from "../organizer/index.js";
import type { RemoteFile } from "../source/types.js";

export type SyncPhase =
	| "idle"
	| "authenticating"
	| "listing"
	| "per-file"
	| "cleanup"
	| "rescanning"
	| "done"
	| "aborted";

export type FileStage = "download" | "organize" | "delete";

export interface DownloadedOutcome {
	status: "downloaded";
	file: RemoteFile;
	finalPath: string;
	placement: PlacementKind;
	bytes: number;
	deleted: boolean;
}

export interface SkippedOutcome {
	status: "skipped";
	file: RemoteFile;
	reason: "exists";
	localPath: string;
	deleted: boolean;
}

export interface FailedOutcome {
	status: "failed";
	file: RemoteFile;
	stage: FileStage;
	reason: string;
	/** Set when the bytes reached the disk before the failing stage. */
	localPath?: string;
}

export type FileOutcome = DownloadedOutcome | SkippedOutcome | FailedOutcome;

export type RescanStatus = "skipped" | "triggered" | "failed";

export interface SyncSummary {
	listed: number;
	downloaded: number;
	organized: number;
	skipped: number;
	failed: number;
	deleted: number;
	rescan: RescanStatus;
	duration: number; // milliseconds
}

export interface SyncReport {
	phase: "done";
	outcomes: FileOutcome[];
	rescan: RescanStatus;
	cleanedUp: number;
	summary: SyncSummary;
}

export interface SyncOptions {
	baseUrl: string;
	apiKey: string;
	username?: string;
	password?: string;
	downloadDir: string;
	remoteDelete: RemoteDeleteMode;
	onPhase?: (phase: SyncPhase) => void;
	onFileComplete?: (outcome: FileOutcome, index: number, total: number) => void;
}
