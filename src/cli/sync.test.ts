import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "fs";
import path from "path";
import os from "os";
import { http, HttpResponse } from "msw";
import { server } from "../../test/setup/msw-setup.js";
import { createDependencies, listSectionsCommand, syncCommand, toSyncOptions } from "./sync.js";
import { resolveConfig, type Config } from "../config.js";
import type { Logger } from "../logger.js";
import { acquireLock } from "../lock/guard.js";
import { AuthError } from "../errors.js";
import { FlatPlacement, OrganizedPlacement } from "../organizer/placement.js";
import { PlexNotifier } from "../library/plex.js";
import type { MediaSource } from "../source/client.js";
import type { SyncDependencies } from "../sync/sync.js";
import { createMockLogger } from "../../test/mocks/logger.js";

function stubSource(overrides: Partial<MediaSource> = {}): MediaSource {
	return {
		authenticate: async (baseUrl, apiKey) => ({ baseUrl, apiKey, token: "test-token" }),
		listFiles: async () => [],
		downloadFile: async () => 0,
		deleteFile: async () => undefined,
		...overrides,
	};
}

describe("syncCommand", () => {
	const testRoot = path.join(os.tmpdir(), `mediasync-cli-test-${Date.now()}`);
	const lockPath = path.join(testRoot, "mediasync.lock");
	const env = {
		SOURCE_URL: "http://source.test",
		SOURCE_API_KEY: "test-key",
		SOURCE_USER: "alice",
		SOURCE_PASSWORD: "test-secret",
		LOCAL_DOWNLOAD_DIR: path.join(testRoot, "music"),
		LOCK_FILE_PATH: lockPath,
		LOG_LEVEL: "silent",
	};

	beforeEach(() => {
		fs.mkdirSync(testRoot, { recursive: true });
	});

	afterEach(() => {
		fs.rmSync(testRoot, { recursive: true, force: true });
		vi.restoreAllMocks();
	});

	test("a completed sync exits 0 and releases the lock", async () => {
		const source = stubSource({ listFiles: vi.fn(async () => []) });
		const makeDependencies = vi.fn<(config: Config, log: Logger) => SyncDependencies>((_config, log) => ({
			source,
			placement: new FlatPlacement(),
			log,
		}));

		const code = await syncCommand({}, env, makeDependencies);

		expect(code).toBe(0);
		expect(source.listFiles).toHaveBeenCalledTimes(1);
		expect(fs.existsSync(lockPath)).toBe(false);
	});

	test("invalid configuration exits 1 before taking the lock", async () => {
		const consoleError = vi.spyOn(console, "error").mockImplementation(() => undefined);
		const makeDependencies = vi.fn();

		const code = await syncCommand({}, { LOCK_FILE_PATH: lockPath }, makeDependencies);

		expect(code).toBe(1);
		expect(consoleError).toHaveBeenCalledTimes(1);
		expect(makeDependencies).not.toHaveBeenCalled();
		expect(fs.existsSync(lockPath)).toBe(false);
	});

	test("a held lock exits 0 without syncing", async () => {
		const held = acquireLock(lockPath, createMockLogger());
		const makeDependencies = vi.fn();

		const code = await syncCommand({}, env, makeDependencies);

		expect(code).toBe(0);
		expect(makeDependencies).not.toHaveBeenCalled();
		expect(fs.readFileSync(lockPath, "utf-8")).toBe(`${process.pid}\n`);
		held.release();
	});

	test("an authentication failure exits 1 and releases the lock", async () => {
		const source = stubSource({
			authenticate: async () => {
				throw new AuthError("authenticate", "HTTP 401", { statusCode: 401 });
			},
		});

		const code = await syncCommand({}, env, (_config, log) => ({ source, placement: new FlatPlacement(), log }));

		expect(code).toBe(1);
		expect(fs.existsSync(lockPath)).toBe(false);
	});

	test("an unexpected error exits 1", async () => {
		const source = stubSource({
			listFiles: async () => {
				throw new TypeError("boom");
			},
		});

		const code = await syncCommand({}, env, (_config, log) => ({ source, placement: new FlatPlacement(), log }));

		expect(code).toBe(1);
	});

	test("per-file failures still exit 0", async () => {
		const source = stubSource({
			listFiles: async () => [{ uid: "a1", title: "Song A.mp3", path: "Song A.mp3" }],
			downloadFile: async () => {
				throw new Error("socket hang up");
			},
		});

		const code = await syncCommand({}, env, (_config, log) => ({ source, placement: new FlatPlacement(), log }));

		expect(code).toBe(0);
	});
});

describe("createDependencies", () => {
	const base = { SOURCE_URL: "http://source.test", SOURCE_API_KEY: "test-key" };

	test("flat placement and no notifier by default", () => {
		const deps = createDependencies(resolveConfig({}, base), createMockLogger());

		expect(deps.placement).toBeInstanceOf(FlatPlacement);
		expect(deps.notifier).toBeUndefined();
	});

	test("a catalog enables organized placement and full Plex settings enable the notifier", () => {
		const config = resolveConfig(
			{ catalogUrl: "https://catalog.test" },
			{ ...base, PLEX_URL: "http://plex.test:32400", PLEX_TOKEN: "test-token", PLEX_MUSIC_SECTION_ID: "3" }
		);

		const deps = createDependencies(config, createMockLogger());

		expect(deps.placement).toBeInstanceOf(OrganizedPlacement);
		expect(deps.notifier).toBeInstanceOf(PlexNotifier);
	});

	test("toSyncOptions carries the source settings", () => {
		const config = resolveConfig({ remoteDelete: "keep", downloadDir: "/srv/music" }, base);

		expect(toSyncOptions(config)).toEqual({
			baseUrl: "http://source.test",
			apiKey: "test-key",
			username: undefined,
			password: undefined,
			downloadDir: "/srv/music",
			remoteDelete: "keep",
		});
	});
});

describe("listSectionsCommand", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	test("prints each section", async () => {
		server.use(
			http.get("http://plex.test:32400/library/sections", () =>
				HttpResponse.json({ MediaContainer: { Directory: [{ key: "3", title: "Music", type: "artist" }] } })
			)
		);
		const lines: string[] = [];
		vi.spyOn(console, "log").mockImplementation((line?: unknown) => {
			lines.push(String(line ?? ""));
		});

		const code = await listSectionsCommand({ plexUrl: "http://plex.test:32400", plexToken: "test-token" }, {});

		expect(code).toBe(0);
		expect(lines.some((line) => line.includes("Music") && line.includes("artist"))).toBe(true);
	});

	test("missing token exits 1", async () => {
		vi.spyOn(console, "error").mockImplementation(() => undefined);

		await expect(listSectionsCommand({ plexUrl: "http://plex.test:32400" }, {})).resolves.toBe(1);
	});

	test("an unreachable or refusing server exits 1", async () => {
		server.use(
			http.get("http://plex.test:32400/library/sections", () => new HttpResponse(null, { status: 401 }))
		);
		vi.spyOn(console, "error").mockImplementation(() => undefined);

		await expect(
			listSectionsCommand({ plexUrl: "http://plex.test:32400", plexToken: "wrong" }, {})
		).resolves.toBe(1);
	});
});
