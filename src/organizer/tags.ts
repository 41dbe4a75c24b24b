import NodeID3 from "node-id3";
import { OrganizeError, toErrorMessage } from "../errors.js";

export interface TrackTags {
	title?: string;
	artist?: string;
	album?: string;
}

/** Canonical identity of a track as resolved by the catalog. */
export interface CanonicalTrack {
	title: string;
	artist: string;
	album: string;
}

/**
 * Read the title, artist and album frames. Files without an ID3 tag (or in a format
 * node-id3 does not handle) yield empty tags rather than an error.
 */
export function readTags(filePath: string): TrackTags {
	const tags = NodeID3.read(filePath);
	return {
		title: clean(tags.title),
		artist: clean(tags.artist),
		album: clean(tags.album),
	};
}

/** Overwrite title, artist and album in place; every other frame is kept. */
export function writeTags(filePath: string, track: CanonicalTrack): void {
	const tags: NodeID3.Tags = {
		title: track.title,
		artist: track.artist,
		album: track.album,
	};

	let result: true | Error;
	try {
		result = NodeID3.update(tags, filePath);
	} catch (e) {
		throw new OrganizeError(filePath, `failed to write tags: ${toErrorMessage(e)}`, { cause: e });
	}
	if (result !== true) {
		throw new OrganizeError(filePath, `failed to write tags: ${result.message}`, { cause: result });
	}
}

function clean(value: string | undefined): string | undefined {
	const trimmed = value?.trim();
	return trimmed ? trimmed : undefined;
}
