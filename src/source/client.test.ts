import { describe, test, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import path from "path";
import os from "os";
import { http, HttpResponse } from "msw";
import { server } from "../../test/setup/msw-setup.js";
import { MediaSourceClient, authParams } from "./client.js";
import { localFileName, type RemoteFile, type Session } from "./types.js";
import { AuthError, ListingError, NetworkError } from "../errors.js";

const BASE_URL = "http://source.test";
const SONG: RemoteFile = { uid: "u1", title: "Song A", path: "audio/Song A.mp3" };

describe("MediaSourceClient", () => {
	const testRoot = path.join(os.tmpdir(), `mediasync-client-test-${Date.now()}`);
	let client: MediaSourceClient;

	beforeEach(() => {
		fs.mkdirSync(testRoot, { recursive: true });
		client = new MediaSourceClient({ requestTimeoutMs: 5000 });
	});

	afterEach(() => {
		fs.rmSync(testRoot, { recursive: true, force: true });
	});

	describe("authenticate", () => {
		test("posts credentials with the API key and keeps the returned token", async () => {
			let received: { apiKey: string | null; body: unknown } | undefined;
			server.use(
				http.post(`${BASE_URL}/api/auth/login`, async ({ request }) => {
					received = {
						apiKey: new URL(request.url).searchParams.get("apiKey"),
						body: await request.json(),
					};
					return HttpResponse.json({ token: "test-token" });
				})
			);

			const session = await client.authenticate(BASE_URL, "test-key", {
				username: "alice",
				password: "test-secret",
			});

			expect(session).toEqual({ baseUrl: BASE_URL, apiKey: "test-key", token: "test-token" });
			expect(received).toEqual({ apiKey: "test-key", body: { username: "alice", password: "test-secret" } });
		});

		test("rejected credentials raise AuthError with the status code", async () => {
			server.use(http.post(`${BASE_URL}/api/auth/login`, () => new HttpResponse(null, { status: 401 })));

			const failure = client.authenticate(BASE_URL, "test-key", { username: "alice", password: "wrong" });

			await expect(failure).rejects.toBeInstanceOf(AuthError);
			await expect(failure).rejects.toMatchObject({ operation: "authenticate", statusCode: 401 });
		});

		test("a login response without a token raises AuthError", async () => {
			server.use(http.post(`${BASE_URL}/api/auth/login`, () => HttpResponse.json({ success: true })));

			await expect(
				client.authenticate(BASE_URL, "test-key", { username: "alice", password: "test-secret" })
			).rejects.toThrow("authenticate: login response carried no token");
		});
	});

	describe("listFiles", () => {
		test("sends the API key and token and unwraps the mp3s list", async () => {
			let params: Record<string, string> | undefined;
			server.use(
				http.get(`${BASE_URL}/api/getMp3s`, ({ request }) => {
					params = Object.fromEntries(new URL(request.url).searchParams);
					return HttpResponse.json({ mp3s: [SONG] });
				})
			);

			const files = await client.listFiles({ baseUrl: BASE_URL, apiKey: "test-key", token: "test-token" });

			expect(files).toEqual([SONG]);
			expect(params).toEqual({ apiKey: "test-key", jwt: "test-token" });
		});

		test("accepts a bare array and omits the token when unauthenticated", async () => {
			let params: Record<string, string> | undefined;
			server.use(
				http.get(`${BASE_URL}/api/getMp3s`, ({ request }) => {
					params = Object.fromEntries(new URL(request.url).searchParams);
					return HttpResponse.json([SONG]);
				})
			);

			const files = await client.listFiles({ baseUrl: BASE_URL, apiKey: "test-key" });

			expect(files).toEqual([SONG]);
			expect(params).toEqual({ apiKey: "test-key" });
		});

		test("an empty list is not an error", async () => {
			server.use(http.get(`${BASE_URL}/api/getMp3s`, () => HttpResponse.json({ mp3s: [] })));

			await expect(client.listFiles({ baseUrl: BASE_URL, apiKey: "test-key" })).resolves.toEqual([]);
		});

		test("a server error raises ListingError", async () => {
			server.use(http.get(`${BASE_URL}/api/getMp3s`, () => new HttpResponse(null, { status: 500 })));

			const failure = client.listFiles({ baseUrl: BASE_URL, apiKey: "test-key" });

			await expect(failure).rejects.toBeInstanceOf(ListingError);
			await expect(failure).rejects.toMatchObject({ statusCode: 500 });
		});

		test("a malformed body raises ListingError", async () => {
			server.use(http.get(`${BASE_URL}/api/getMp3s`, () => HttpResponse.json({ files: "nope" })));

			await expect(client.listFiles({ baseUrl: BASE_URL, apiKey: "test-key" })).rejects.toBeInstanceOf(
				ListingError
			);
		});

		test("keeps a path prefix on the base URL", async () => {
			server.use(http.get(`${BASE_URL}/media/api/getMp3s`, () => HttpResponse.json([SONG])));

			await expect(client.listFiles({ baseUrl: `${BASE_URL}/media`, apiKey: "test-key" })).resolves.toEqual([
				SONG,
			]);
		});
	});

	describe("downloadFile", () => {
		const session: Session = { baseUrl: BASE_URL, apiKey: "test-key", token: "test-token" };

		test("streams the body to the destination", async () => {
			let body: unknown;
			server.use(
				http.post(`${BASE_URL}/api/downloadFileFromServer`, async ({ request }) => {
					body = await request.json();
					return new HttpResponse("ID3-audio-bytes", {
						headers: { "Content-Type": "application/octet-stream" },
					});
				})
			);
			const dest = path.join(testRoot, "Song A.mp3");

			const bytes = await client.downloadFile(session, SONG, dest);

			expect(body).toEqual({ uid: "u1", type: "audio" });
			expect(bytes).toBe(15);
			expect(fs.readFileSync(dest, "utf-8")).toBe("ID3-audio-bytes");
		});

		test("a failed download raises NetworkError and leaves no file", async () => {
			server.use(
				http.post(`${BASE_URL}/api/downloadFileFromServer`, () => new HttpResponse(null, { status: 500 }))
			);
			const dest = path.join(testRoot, "Song A.mp3");

			const failure = client.downloadFile(session, SONG, dest);

			await expect(failure).rejects.toBeInstanceOf(NetworkError);
			await expect(failure).rejects.toMatchObject({ operation: "download", fileId: "u1", statusCode: 500 });
			expect(fs.readdirSync(testRoot)).toEqual([]);
		});
	});

	describe("deleteFile", () => {
		test("posts the uid with the session parameters", async () => {
			let received: { params: Record<string, string>; body: unknown } | undefined;
			server.use(
				http.post(`${BASE_URL}/api/deleteFile`, async ({ request }) => {
					received = {
						params: Object.fromEntries(new URL(request.url).searchParams),
						body: await request.json(),
					};
					return HttpResponse.json({ success: true });
				})
			);

			await client.deleteFile({ baseUrl: BASE_URL, apiKey: "test-key", token: "test-token" }, SONG);

			expect(received).toEqual({ params: { apiKey: "test-key", jwt: "test-token" }, body: { uid: "u1" } });
		});

		test("a refused delete raises NetworkError", async () => {
			server.use(http.post(`${BASE_URL}/api/deleteFile`, () => new HttpResponse(null, { status: 403 })));

			await expect(client.deleteFile({ baseUrl: BASE_URL, apiKey: "test-key" }, SONG)).rejects.toMatchObject({
				operation: "delete",
				fileId: "u1",
				statusCode: 403,
			});
		});
	});
});

describe("authParams", () => {
	test("adds jwt only when the session has a token", () => {
		expect(authParams({ baseUrl: BASE_URL, apiKey: "k" })).toEqual({ apiKey: "k" });
		expect(authParams({ baseUrl: BASE_URL, apiKey: "k", token: "t" })).toEqual({ apiKey: "k", jwt: "t" });
	});
});

describe("localFileName", () => {
	test("uses the last path segment", () => {
		expect(localFileName(SONG)).toBe("Song A.mp3");
		expect(localFileName({ uid: "u2", title: "B", path: "C:\\media\\audio\\Song B.mp3" })).toBe("Song B.mp3");
	});

	test("falls back to the title without a path", () => {
		expect(localFileName({ uid: "u3", title: "Song C.mp3", path: "" })).toBe("Song C.mp3");
	});

	test("rejects names that would escape the download directory", () => {
		expect(() => localFileName({ uid: "u4", title: "", path: "audio/.." })).toThrow(
			"Remote file u4 has no usable file name"
		);
	});
});
