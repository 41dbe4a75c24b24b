import fs from "fs";
import path from "path";
import { randomBytes } from "crypto";
import type { Readable } from "stream";
import { pipeline as streamPipeline } from "stream/promises";

const RETRYABLE_CODES = ["ETIMEDOUT", "ESOCKETTIMEDOUT", "ECONNRESET", "ECONNREFUSED", "EPIPE", "ERR_STREAM_PREMATURE_CLOSE"];

export interface StreamToFileOptions {
	/** Extra attempts after a transient transport failure. */
	retries?: number;
	retryDelayMs?: number;
}

/**
 * Drain the stream returned by `open` into `destPath`.
 *
 * Bytes land in a hidden `.part` file beside the destination and are renamed into place
 * only once the stream has fully drained, so an aborted transfer never leaves a file at
 * `destPath`. Resolves with the number of bytes written.
 */
export async function streamToFile(
	open: () => Readable,
	destPath: string,
	options: StreamToFileOptions = {},
	retryCount = 0
): Promise<number> {
	const { retries = 0, retryDelayMs = 1000 } = options;

	try {
		return await streamOnce(open, destPath);
	} catch (e) {
		if (isRetryable(e) && retryCount < retries) {
			const delay = Math.min(retryDelayMs * Math.pow(2, retryCount), 5000);
			await new Promise((r) => setTimeout(r, delay));
			return streamToFile(open, destPath, options, retryCount + 1);
		}
		throw e;
	}
}

export function isRetryable(error: unknown): boolean {
	if (!(error instanceof Error)) return false;
	const code = "code" in error && typeof error.code === "string" ? error.code : "";
	return error.name === "TimeoutError" || RETRYABLE_CODES.includes(code);
}

export function stagingPath(destPath: string): string {
	const suffix = randomBytes(4).toString("hex");
	return path.join(path.dirname(destPath), `.${path.basename(destPath)}.${suffix}.part`);
}

async function streamOnce(open: () => Readable, destPath: string): Promise<number> {
	const tempPath = stagingPath(destPath);
	let written = 0;

	async function* counter(source: AsyncIterable<Buffer>): AsyncGenerator<Buffer> {
		for await (const chunk of source) {
			written += chunk.length;
			yield chunk;
		}
	}

	try {
		await streamPipeline(open(), counter, fs.createWriteStream(tempPath));
		fs.renameSync(tempPath, destPath);
	} catch (e) {
		fs.rmSync(tempPath, { force: true });
		throw e;
	}

	return written;
}
