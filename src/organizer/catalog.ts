import type { Got } from "got";
import { z } from "zod";
import { NetworkError } from "../errors.js";
import { createHttpClient, describeFailure, endpoint } from "../http.js";
import type { CanonicalTrack } from "./tags.js";

export interface MetadataCatalog {
	/** Resolves with null when the catalog has no match. */
	lookup(title: string, artist: string): Promise<CanonicalTrack | null>;
}

const searchResponseSchema = z.object({
	data: z.array(
		z.object({
			title: z.string(),
			artist: z.object({ name: z.string() }),
			album: z.object({ title: z.string() }),
		})
	),
	total: z.number().optional(),
});

const errorResponseSchema = z.object({
	error: z.object({ code: z.number().optional(), message: z.string().optional() }),
});

/**
 * Track search against a Deezer-compatible public API (`GET /search?q=...`).
 * The first hit of an `artist:"..." track:"..."` query is taken as canonical.
 */
export class DeezerCatalog implements MetadataCatalog {
	private http: Got;
	private baseUrl: string;

	constructor(baseUrl: string, requestTimeoutMs: number) {
		this.baseUrl = baseUrl;
		this.http = createHttpClient(requestTimeoutMs);
	}

	async lookup(title: string, artist: string): Promise<CanonicalTrack | null> {
		const q = buildQuery(title, artist);

		let body: unknown;
		try {
			body = await this.http
				.get(endpoint(this.baseUrl, "search"), { searchParams: { q, limit: 1 } })
				.json<unknown>();
		} catch (e) {
			const { message, statusCode } = describeFailure(e);
			throw new NetworkError("catalog lookup", message, { statusCode, cause: e });
		}

		const failure = errorResponseSchema.safeParse(body);
		if (failure.success) {
			throw new NetworkError("catalog lookup", failure.data.error.message ?? JSON.stringify(failure.data.error));
		}

		const parsed = searchResponseSchema.safeParse(body);
		if (!parsed.success) {
			throw new NetworkError("catalog lookup", "malformed search response");
		}

		const hit = parsed.data.data[0];
		if (!hit) {
			return null;
		}
		return { artist: hit.artist.name, album: hit.album.title, title: hit.title };
	}
}

export function buildQuery(title: string, artist: string): string {
	return `artist:"${normalizeQuote(artist)}" track:"${normalizeQuote(title)}"`;
}

function normalizeQuote(value: string): string {
	return value.replace(/–/g, "-").replace(/"/g, "");
}
