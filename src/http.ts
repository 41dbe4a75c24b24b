import got, { HTTPError, ParseError, type Got } from "got";
import { toErrorMessage } from "./errors.js";

/** got instance shared by every outbound call: fixed timeouts, no automatic retry. */
export function createHttpClient(timeoutMs: number): Got {
	return got.extend({
		timeout: {
			connect: timeoutMs,
			response: timeoutMs,
			socket: timeoutMs,
		},
		retry: { limit: 0 },
	});
}

export function describeFailure(error: unknown): { message: string; statusCode?: number } {
	if (error instanceof HTTPError) {
		const { statusCode, statusMessage } = error.response;
		return { message: `HTTP ${statusCode}${statusMessage ? ` ${statusMessage}` : ""}`, statusCode };
	}
	if (error instanceof ParseError) {
		return { message: `malformed response body: ${error.message}` };
	}
	return { message: toErrorMessage(error) };
}

/** Resolve `route` under `baseUrl`, keeping any path prefix the base carries. */
export function endpoint(baseUrl: string, route: string): string {
	const base = baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
	return new URL(route, base).toString();
}
