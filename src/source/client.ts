import type { Got } from "got";
import { AuthError, ListingError, NetworkError } from "../errors.js";
import { createHttpClient, describeFailure, endpoint } from "../http.js";
import { streamToFile } from "./stream.js";
import {
	fileListSchema,
	loginResponseSchema,
	type Credentials,
	type RemoteFile,
	type Session,
	type SourceClientOptions,
} from "./types.js";

const ENDPOINTS = {
	login: "api/auth/login",
	list: "api/getMp3s",
	download: "api/downloadFileFromServer",
	delete: "api/deleteFile",
} as const;

/** What the orchestrator needs from a media source. */
export interface MediaSource {
	authenticate(baseUrl: string, apiKey: string, credentials: Credentials): Promise<Session>;
	listFiles(session: Session): Promise<RemoteFile[]>;
	/** Resolves with the number of bytes written to `destPath`. */
	downloadFile(session: Session, file: RemoteFile, destPath: string): Promise<number>;
	deleteFile(session: Session, file: RemoteFile): Promise<void>;
}

export class MediaSourceClient implements MediaSource {
	private http: Got;
	private options: SourceClientOptions;

	constructor(options: SourceClientOptions) {
		this.options = options;
		this.http = createHttpClient(options.requestTimeoutMs);
	}

	async authenticate(baseUrl: string, apiKey: string, credentials: Credentials): Promise<Session> {
		let body: unknown;
		try {
			body = await this.http
				.post(endpoint(baseUrl, ENDPOINTS.login), {
					json: { username: credentials.username, password: credentials.password },
					searchParams: { apiKey },
				})
				.json<unknown>();
		} catch (e) {
			const { message, statusCode } = describeFailure(e);
			throw new AuthError("authenticate", message, { statusCode, cause: e });
		}

		const parsed = loginResponseSchema.safeParse(body);
		if (!parsed.success) {
			throw new AuthError("authenticate", "login response carried no token");
		}

		return { baseUrl, apiKey, token: parsed.data.token };
	}

	async listFiles(session: Session): Promise<RemoteFile[]> {
		let body: unknown;
		try {
			body = await this.http
				.get(endpoint(session.baseUrl, ENDPOINTS.list), { searchParams: authParams(session) })
				.json<unknown>();
		} catch (e) {
			const { message, statusCode } = describeFailure(e);
			throw new ListingError("list", message, { statusCode, cause: e });
		}

		const parsed = fileListSchema.safeParse(body);
		if (!parsed.success) {
			const issue = parsed.error.issues[0];
			throw new ListingError("list", `malformed file list (${issue ? issue.message : "unknown shape"})`);
		}
		return parsed.data;
	}

	async downloadFile(session: Session, file: RemoteFile, destPath: string): Promise<number> {
		const url = endpoint(session.baseUrl, ENDPOINTS.download);
		try {
			return await streamToFile(
				() =>
					this.http.stream.post(url, {
						json: { uid: file.uid, type: "audio" },
						searchParams: authParams(session),
					}),
				destPath,
				{ retries: this.options.downloadRetries ?? 0 }
			);
		} catch (e) {
			const { message, statusCode } = describeFailure(e);
			throw new NetworkError("download", message, { fileId: file.uid, statusCode, cause: e });
		}
	}

	async deleteFile(session: Session, file: RemoteFile): Promise<void> {
		try {
			await this.http.post(endpoint(session.baseUrl, ENDPOINTS.delete), {
				json: { uid: file.uid },
				searchParams: authParams(session),
			});
		} catch (e) {
			const { message, statusCode } = describeFailure(e);
			throw new NetworkError("delete", message, { fileId: file.uid, statusCode, cause: e });
		}
	}
}

export function authParams(session: Session): Record<string, string> {
	return session.token ? { apiKey: session.apiKey, jwt: session.token } : { apiKey: session.apiKey };
}
