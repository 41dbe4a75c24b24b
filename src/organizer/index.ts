import type { Config } from "../config.js";
import type { Logger } from "../logger.js";
import { DeezerCatalog } from "./catalog.js";
import { FlatPlacement, OrganizedPlacement, type PlacementStrategy } from "./placement.js";

export { DeezerCatalog, buildQuery, type MetadataCatalog } from "./catalog.js";
export {
	FlatPlacement,
	OrganizedPlacement,
	buildLibraryPath,
	sanitizePathComponent,
	type PlacementKind,
	type PlacementResult,
	type PlacementStrategy,
	type SkipReason,
} from "./placement.js";
export { readTags, writeTags, type CanonicalTrack, type TrackTags } from "./tags.js";

/** Organized placement when a catalog is configured, flat placement otherwise. */
export function createPlacementStrategy(config: Config, log: Logger): PlacementStrategy {
	if (!config.catalog) {
		return new FlatPlacement();
	}
	const catalog = new DeezerCatalog(config.catalog.url, config.http.requestTimeoutMs);
	return new OrganizedPlacement(config.paths.downloadDir, catalog, log);
}
