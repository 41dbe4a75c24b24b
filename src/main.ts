#!/usr/bin/env node

import { Command } from "commander";
import pc from "picocolors";
import { listSectionsCommand, syncCommand } from "./cli/sync.js";
import { loadEnvFile, type CliOptions } from "./config.js";
import { toErrorMessage } from "./errors.js";

const program = new Command();

program
	.name("mediasync")
	.description("Pull finished downloads from the media source into the music library, then rescan Plex")
	.version("1.0.0")
	.option("--source-url <url>", "Media source base URL (SOURCE_URL)")
	.option("--source-api-key <key>", "Media source API key (SOURCE_API_KEY)")
	.option("--source-user <name>", "Media source username (SOURCE_USER)")
	.option("--source-password <password>", "Media source password (SOURCE_PASSWORD)")
	.option("--remote-delete <mode>", "When to delete synced files from the source: immediate, deferred, keep (REMOTE_DELETE)")
	.option("--cleanup-synced", "Delete synced files from the source after the whole pass (SOURCE_CLEANUP_SYNCED)")
	.option("--catalog-url <url>", "Metadata catalog API; enables Artist/Album/Title placement (CATALOG_URL)")
	.option("--plex-url <url>", "Plex server URL (PLEX_URL)")
	.option("--plex-token <token>", "Plex token (PLEX_TOKEN)")
	.option("--plex-section-id <id>", "Plex music section to rescan (PLEX_MUSIC_SECTION_ID)")
	.option("--plex-list-sections", "List Plex library sections and exit")
	.option("--download-dir <dir>", "Local library directory (LOCAL_DOWNLOAD_DIR, default /music)")
	.option("--lock-file <path>", "Single-instance lock file (LOCK_FILE_PATH, default /tmp/mediasync.lock)")
	.option("--log-path <path>", "Also write logs to this file (LOG_PATH)")
	.option("--log-level <level>", "fatal, error, warn, info, debug, trace or silent (LOG_LEVEL)")
	.option("--request-timeout <ms>", "Per-request timeout in milliseconds (REQUEST_TIMEOUT_MS, default 30000)")
	.option("--download-retries <n>", "Retries for a download interrupted by a transient network error (DOWNLOAD_RETRIES)")
	.action(async () => {
		const opts = program.opts<CliOptions>();
		const code = opts.plexListSections ? await listSectionsCommand(opts) : await syncCommand(opts);
		process.exit(code);
	});

try {
	loadEnvFile();
} catch (e) {
	console.error(pc.red("Error:"), toErrorMessage(e));
	process.exit(1);
}

program.parseAsync().catch((e) => {
	console.error(pc.red("Error:"), toErrorMessage(e));
	process.exit(1);
});
