import fs from "fs";
import path from "path";
import type { Logger } from "../logger.js";
import { OrganizeError, toErrorMessage } from "../errors.js";
import type { MetadataCatalog } from "./catalog.js";
import { readTags, writeTags, type CanonicalTrack } from "./tags.js";

export type PlacementKind = "flat" | "organized";

export type SkipReason = "missing-tags" | "no-match" | "lookup-failed";

export interface PlacementResult {
	finalPath: string;
	placement: PlacementKind;
	skipReason?: SkipReason;
}

/** Decides where a freshly downloaded file ends up. */
export interface PlacementStrategy {
	readonly name: PlacementKind;
	organize(localPath: string): Promise<PlacementResult>;
}

/**
 * Sanitize a tag value for use as one path component. Separators, reserved and control
 * characters become "_", so a value can never add or climb a directory level.
 */
export function sanitizePathComponent(name: string): string {
	const collapsed = name
		.replace(/[<>:"/\\|?*\u0000-\u001f]/g, "_")
		.replace(/\s+/g, " ")
		.trim();
	// Cut by code point so a surrogate pair is never split.
	const cleaned = Array.from(collapsed).slice(0, 200).join("").replace(/[\s.]+$/g, "");
	return cleaned || "_";
}

/** `<root>/<artist>/<album>/<title><ext>` with every component sanitized. */
export function buildLibraryPath(rootPath: string, track: CanonicalTrack, extension: string): string {
	return path.join(
		rootPath,
		sanitizePathComponent(track.artist),
		sanitizePathComponent(track.album),
		`${sanitizePathComponent(track.title)}${extension}`
	);
}

/** Leaves the file where it was downloaded: `<downloadDir>/<original filename>`. */
export class FlatPlacement implements PlacementStrategy {
	readonly name = "flat";

	async organize(localPath: string): Promise<PlacementResult> {
		return { finalPath: localPath, placement: "flat" };
	}
}

/**
 * Resolves canonical artist/album/title through the catalog, rewrites the tags and
 * moves the file into the library tree. Any reason not to organize degrades to the
 * as-downloaded placement.
 */
export class OrganizedPlacement implements PlacementStrategy {
	readonly name = "organized";

	private rootPath: string;
	private catalog: MetadataCatalog;
	private log: Logger;

	constructor(rootPath: string, catalog: MetadataCatalog, log: Logger) {
		this.rootPath = rootPath;
		this.catalog = catalog;
		this.log = log;
	}

	async organize(localPath: string): Promise<PlacementResult> {
		const fileName = path.basename(localPath);
		const tags = readTags(localPath);

		if (!tags.title || !tags.artist) {
			this.log.warn({ file: fileName }, `Missing title or artist tag, leaving ${fileName} unsorted`);
			return unsorted(localPath, "missing-tags");
		}

		let match: CanonicalTrack | null;
		try {
			match = await this.catalog.lookup(tags.title, tags.artist);
		} catch (e) {
			this.log.error(
				{ file: fileName, err: e },
				`Catalog lookup failed for ${fileName}, leaving it unsorted: ${toErrorMessage(e)}`
			);
			return unsorted(localPath, "lookup-failed");
		}

		if (!match) {
			this.log.warn(
				{ file: fileName, title: tags.title, artist: tags.artist },
				`No catalog match for ${fileName}, leaving it unsorted`
			);
			return unsorted(localPath, "no-match");
		}

		writeTags(localPath, match);

		const finalPath = buildLibraryPath(this.rootPath, match, path.extname(localPath));
		try {
			fs.mkdirSync(path.dirname(finalPath), { recursive: true });
			fs.renameSync(localPath, finalPath);
		} catch (e) {
			throw new OrganizeError(localPath, `failed to move to ${finalPath}: ${toErrorMessage(e)}`, { cause: e });
		}

		this.log.debug({ file: fileName, finalPath }, "Organized");
		return { finalPath, placement: "organized" };
	}
}

function unsorted(localPath: string, skipReason: SkipReason): PlacementResult {
	return { finalPath: localPath, placement: "flat", skipReason };
}
