import pc from "picocolors";
import { resolveConfig, resolvePlexAccess, type CliOptions, type Config } from "../config.js";
import { AlreadyRunningError, ConfigError, isFatal, toErrorMessage } from "../errors.js";
import { PlexNotifier } from "../library/plex.js";
import { withLock } from "../lock/guard.js";
import { createLogger, type Logger } from "../logger.js";
import { createPlacementStrategy } from "../organizer/index.js";
import { MediaSourceClient } from "../source/client.js";
import { runSync, type SyncDependencies } from "../sync/sync.js";
import type { SyncOptions } from "../sync/types.js";

type Env = Record<string, string | undefined>;

export function createDependencies(config: Config, log: Logger): SyncDependencies {
	return {
		source: new MediaSourceClient({
			requestTimeoutMs: config.http.requestTimeoutMs,
			downloadRetries: config.http.downloadRetries,
		}),
		placement: createPlacementStrategy(config, log),
		notifier: config.plex
			? new PlexNotifier({ ...config.plex, requestTimeoutMs: config.http.requestTimeoutMs })
			: undefined,
		log,
	};
}

export function toSyncOptions(config: Config): SyncOptions {
	return {
		baseUrl: config.source.url,
		apiKey: config.source.apiKey,
		username: config.source.username,
		password: config.source.password,
		downloadDir: config.paths.downloadDir,
		remoteDelete: config.source.remoteDelete,
	};
}

/**
 * Run one sync pass under the single-instance lock. Resolves with the process exit code:
 * 0 on success or when another instance holds the lock, 1 on a fatal error.
 */
export async function syncCommand(
	opts: CliOptions,
	env: Env = process.env,
	makeDependencies: (config: Config, log: Logger) => SyncDependencies = createDependencies
): Promise<number> {
	let config: Config;
	try {
		config = resolveConfig(opts, env);
	} catch (e) {
		if (e instanceof ConfigError) {
			console.error(pc.red("Error:"), e.message);
			return 1;
		}
		throw e;
	}

	const log = createLogger(config.log);

	try {
		await withLock(config.paths.lockFile, log, () => runSync(toSyncOptions(config), makeDependencies(config, log)));
		return 0;
	} catch (e) {
		if (e instanceof AlreadyRunningError) {
			log.warn({ lockPath: e.lockPath, ownerPid: e.ownerPid }, "Another instance is running. Exiting.");
			return 0;
		}
		if (isFatal(e)) {
			log.error({ err: e }, `${toErrorMessage(e)}. Exiting.`);
		} else {
			log.fatal({ err: e }, `Unexpected error: ${toErrorMessage(e)}`);
		}
		return 1;
	}
}

/** Print the Plex library sections so the right section id can be configured. */
export async function listSectionsCommand(opts: CliOptions, env: Env = process.env): Promise<number> {
	let notifier: PlexNotifier;
	try {
		const access = resolvePlexAccess(opts, env);
		notifier = new PlexNotifier({
			url: access.plex.url,
			token: access.plex.token,
			requestTimeoutMs: access.requestTimeoutMs,
		});
	} catch (e) {
		if (e instanceof ConfigError) {
			console.error(pc.red("Error:"), e.message);
			return 1;
		}
		throw e;
	}

	try {
		const sections = await notifier.listSections();
		if (sections.length === 0) {
			console.log(pc.yellow("  No library sections found."));
			return 0;
		}

		console.log();
		console.log(pc.bold("  Section ID  Type      Name"));
		for (const section of sections) {
			console.log(`  ${pc.cyan(section.id.padEnd(10))}  ${section.type.padEnd(8)}  ${section.title}`);
		}
		console.log();
		return 0;
	} catch (e) {
		console.error(pc.red("Error:"), toErrorMessage(e));
		return 1;
	}
}
