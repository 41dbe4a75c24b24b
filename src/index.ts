// Programmatic API
export { runSync, syncFile, type SyncDependencies } from "./sync/sync.js";
export type * from "./sync/types.js";
export { MediaSourceClient, type MediaSource } from "./source/client.js";
export { localFileName, type Credentials, type RemoteFile, type Session } from "./source/types.js";
export { streamToFile } from "./source/stream.js";
export * from "./organizer/index.js";
export { PlexNotifier, type LibraryNotifier, type PlexSection } from "./library/plex.js";
export { acquireLock, withLock, type LockHandle } from "./lock/guard.js";
export { resolveConfig, resolvePlexAccess, loadEnvFile, type CliOptions, type Config } from "./config.js";
export { createLogger, type Logger } from "./logger.js";
export * from "./errors.js";
