import path from "path";
import { z } from "zod";

export const remoteFileSchema = z.object({
	uid: z.string().min(1),
	title: z.string(),
	path: z.string(),
});

export type RemoteFile = z.infer<typeof remoteFileSchema>;

/** The source answers with either a bare list or its native `{ mp3s: [...] }` wrapper. */
export const fileListSchema = z
	.union([z.array(remoteFileSchema), z.object({ mp3s: z.array(remoteFileSchema) })])
	.transform((body) => (Array.isArray(body) ? body : body.mp3s));

export const loginResponseSchema = z.object({
	token: z.string().min(1),
});

export interface Session {
	baseUrl: string;
	apiKey: string;
	token?: string;
}

export interface Credentials {
	username: string;
	password: string;
}

export interface SourceClientOptions {
	requestTimeoutMs: number;
	downloadRetries?: number;
}

/**
 * Local filename for a remote file: the last segment of its source path, or the title
 * when the source reports no path. Either separator style is stripped.
 */
export function localFileName(file: RemoteFile): string {
	const candidate = file.path.trim() || file.title.trim();
	const name = path.posix.basename(candidate.replace(/\\/g, "/"));
	if (!name || name === "." || name === "..") {
		throw new Error(`Remote file ${file.uid} has no usable file name`);
	}
	return name;
}
