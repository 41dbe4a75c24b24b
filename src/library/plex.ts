/**
 * Plex Media Server calls: library rescan after a sync and section discovery for setup.
 */

import type { Got } from "got";
import { z } from "zod";
import { NotifyError } from "../errors.js";
import { createHttpClient, describeFailure, endpoint } from "../http.js";

export interface LibraryNotifier {
	rescan(): Promise<void>;
}

export interface PlexSection {
	id: string;
	title: string;
	type: string;
}

const sectionsResponseSchema = z.object({
	MediaContainer: z.object({
		Directory: z
			.array(
				z.object({
					key: z.string(),
					title: z.string(),
					type: z.string().optional(),
				})
			)
			.optional(),
	}),
});

export class PlexNotifier implements LibraryNotifier {
	private http: Got;
	private serverUrl: string;
	private token: string;
	private sectionId?: string;

	constructor(options: { url: string; token: string; sectionId?: string; requestTimeoutMs: number }) {
		this.serverUrl = options.url;
		this.token = options.token;
		this.sectionId = options.sectionId;
		this.http = createHttpClient(options.requestTimeoutMs);
	}

	/** Fire-and-forget refresh of the configured section; any 2xx counts as success. */
	async rescan(): Promise<void> {
		if (!this.sectionId) {
			throw new NotifyError("rescan", "no library section configured");
		}

		const url = new URL(endpoint(this.serverUrl, `library/sections/${encodeURIComponent(this.sectionId)}/refresh`));
		url.searchParams.set("X-Plex-Token", this.token);

		try {
			await this.http.get(url.toString());
		} catch (e) {
			const { message, statusCode } = describeFailure(e);
			throw new NotifyError("rescan", message, { fileId: this.sectionId, statusCode, cause: e });
		}
	}

	async listSections(): Promise<PlexSection[]> {
		const url = new URL(endpoint(this.serverUrl, "library/sections"));
		url.searchParams.set("X-Plex-Token", this.token);

		let body: unknown;
		try {
			body = await this.http.get(url.toString(), { headers: { Accept: "application/json" } }).json<unknown>();
		} catch (e) {
			const { message, statusCode } = describeFailure(e);
			throw new NotifyError("list sections", message, { statusCode, cause: e });
		}

		const parsed = sectionsResponseSchema.safeParse(body);
		if (!parsed.success) {
			throw new NotifyError("list sections", "malformed sections response");
		}

		return (parsed.data.MediaContainer.Directory ?? []).map((dir) => ({
			id: dir.key,
			title: dir.title,
			type: dir.type ?? "unknown",
		}));
	}
}
