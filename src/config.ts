import fs from "fs";
import os from "os";
import path from "path";
import dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export const ENV_FILE_NAME = ".mediasync.env";

export const DEFAULT_DOWNLOAD_DIR = "/music";
export const DEFAULT_LOCK_FILE = "/tmp/mediasync.lock";
export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export const REMOTE_DELETE_MODES = ["immediate", "deferred", "keep"] as const;

export type RemoteDeleteMode = (typeof REMOTE_DELETE_MODES)[number];

/** Options as commander hands them over; every field is optional so the environment can fill it. */
export interface CliOptions {
	sourceUrl?: string;
	sourceApiKey?: string;
	sourceUser?: string;
	sourcePassword?: string;
	remoteDelete?: string;
	cleanupSynced?: boolean;
	catalogUrl?: string;
	plexUrl?: string;
	plexToken?: string;
	plexSectionId?: string;
	plexListSections?: boolean;
	downloadDir?: string;
	lockFile?: string;
	logPath?: string;
	logLevel?: string;
	requestTimeout?: string;
	downloadRetries?: string;
}

type Env = Record<string, string | undefined>;

const plexSchema = z
	.object({
		url: z.string().url().optional(),
		token: z.string().optional(),
		sectionId: z.string().optional(),
	})
	.superRefine((plex, ctx) => {
		const set = [plex.url, plex.token, plex.sectionId].filter((v) => v !== undefined).length;
		if (set > 0 && set < 3) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: "Plex URL, token and section id must be set together or not at all",
			});
		}
	})
	.transform((plex) =>
		plex.url && plex.token && plex.sectionId
			? { url: plex.url, token: plex.token, sectionId: plex.sectionId }
			: undefined
	);

const logSchema = z.object({
	level: z.enum(LOG_LEVELS),
	path: z.string().optional(),
});

const configSchema = z.object({
	source: z.object({
		url: z.string({ required_error: "source URL is required" }).url(),
		apiKey: z.string({ required_error: "source API key is required" }).min(1),
		username: z.string().optional(),
		password: z.string().optional(),
		remoteDelete: z.enum(REMOTE_DELETE_MODES),
	}),
	catalog: z.object({ url: z.string().url() }).optional(),
	plex: plexSchema,
	paths: z.object({
		downloadDir: z.string().min(1),
		lockFile: z.string().min(1),
	}),
	log: logSchema,
	http: z.object({
		requestTimeoutMs: z.number().int().positive(),
		downloadRetries: z.number().int().min(0),
	}),
});

const plexAccessSchema = z.object({
	plex: z.object({
		url: z.string({ required_error: "Plex URL is required" }).url(),
		token: z.string({ required_error: "Plex token is required" }).min(1),
	}),
	requestTimeoutMs: z.number().int().positive(),
});

export type Config = z.infer<typeof configSchema>;
export type LogConfig = Config["log"];
export type PlexAccessConfig = z.infer<typeof plexAccessSchema>;

/**
 * Load the dotenv file into `env`. Uses CONFIG_PATH when set, otherwise the first of
 * ~/.mediasync.env and ./.mediasync.env that exists. Variables already present win.
 */
export function loadEnvFile(
	env: Env = process.env,
	homeDir: string = os.homedir(),
	cwd: string = process.cwd()
): string | undefined {
	let configPath = blank(env.CONFIG_PATH);
	if (!configPath) {
		configPath = [path.join(homeDir, ENV_FILE_NAME), path.join(cwd, ENV_FILE_NAME)].find((candidate) =>
			fs.existsSync(candidate)
		);
	}
	if (!configPath) {
		return undefined;
	}

	const processEnv: dotenv.DotenvPopulateInput = {};
	const result = dotenv.config({ path: configPath, processEnv });
	if (result.error) {
		throw new ConfigError(`Cannot read config file ${configPath}`, [result.error.message]);
	}
	for (const [key, value] of Object.entries(processEnv)) {
		if (env[key] === undefined) {
			env[key] = value;
		}
	}
	return configPath;
}

/**
 * Build the effective configuration for a sync run. Flags take precedence over the
 * environment; the environment already includes the dotenv file.
 */
export function resolveConfig(cli: CliOptions, env: Env = process.env): Config {
	const rawConfig = {
		source: {
			url: blank(cli.sourceUrl) ?? blank(env.SOURCE_URL),
			apiKey: blank(cli.sourceApiKey) ?? blank(env.SOURCE_API_KEY),
			username: blank(cli.sourceUser) ?? blank(env.SOURCE_USER),
			password: blank(cli.sourcePassword) ?? blank(env.SOURCE_PASSWORD),
			remoteDelete: resolveRemoteDelete(cli, env),
		},
		catalog: optionalUrl(blank(cli.catalogUrl) ?? blank(env.CATALOG_URL)),
		plex: {
			url: blank(cli.plexUrl) ?? blank(env.PLEX_URL),
			token: blank(cli.plexToken) ?? blank(env.PLEX_TOKEN),
			sectionId: blank(cli.plexSectionId) ?? blank(env.PLEX_MUSIC_SECTION_ID),
		},
		paths: {
			downloadDir: blank(cli.downloadDir) ?? blank(env.LOCAL_DOWNLOAD_DIR) ?? DEFAULT_DOWNLOAD_DIR,
			lockFile: blank(cli.lockFile) ?? blank(env.LOCK_FILE_PATH) ?? DEFAULT_LOCK_FILE,
		},
		log: resolveLog(cli, env),
		http: {
			requestTimeoutMs: resolveTimeout(cli, env),
			downloadRetries: parseInteger(blank(cli.downloadRetries) ?? blank(env.DOWNLOAD_RETRIES), 0),
		},
	};

	return Object.freeze(parseOrThrow(configSchema, rawConfig));
}

/** Configuration for `--plex-list-sections`, which needs no media source. */
export function resolvePlexAccess(cli: CliOptions, env: Env = process.env): PlexAccessConfig {
	return parseOrThrow(plexAccessSchema, {
		plex: {
			url: blank(cli.plexUrl) ?? blank(env.PLEX_URL),
			token: blank(cli.plexToken) ?? blank(env.PLEX_TOKEN),
		},
		requestTimeoutMs: resolveTimeout(cli, env),
	});
}

function resolveLog(cli: CliOptions, env: Env): { level: string; path?: string } {
	return {
		level: blank(cli.logLevel) ?? blank(env.LOG_LEVEL) ?? "info",
		path: blank(cli.logPath) ?? blank(env.LOG_PATH),
	};
}

function resolveTimeout(cli: CliOptions, env: Env): number {
	return parseInteger(blank(cli.requestTimeout) ?? blank(env.REQUEST_TIMEOUT_MS), DEFAULT_REQUEST_TIMEOUT_MS);
}

function resolveRemoteDelete(cli: CliOptions, env: Env): string {
	return (
		blank(cli.remoteDelete) ??
		(cli.cleanupSynced ? "deferred" : undefined) ??
		blank(env.REMOTE_DELETE) ??
		(isTruthy(env.SOURCE_CLEANUP_SYNCED) ? "deferred" : undefined) ??
		"immediate"
	);
}

function parseOrThrow<T extends z.ZodTypeAny>(schema: T, raw: unknown): z.output<T> {
	const parsed = schema.safeParse(raw);
	if (!parsed.success) {
		const issues = parsed.error.issues.map((issue) =>
			issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message
		);
		throw new ConfigError("Invalid configuration", issues);
	}
	return parsed.data;
}

function optionalUrl(url: string | undefined): { url: string } | undefined {
	return url ? { url } : undefined;
}

function parseInteger(value: string | undefined, fallback: number): number {
	if (value === undefined) return fallback;
	return Number(value);
}

function isTruthy(value: string | undefined): boolean {
	return ["1", "true", "yes", "on"].includes((value ?? "").trim().toLowerCase());
}

function blank(value: string | undefined): string | undefined {
	const trimmed = value?.trim();
	return trimmed ? trimmed : undefined;
}
