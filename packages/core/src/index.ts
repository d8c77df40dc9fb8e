/**
 * @fileoverview PlayHub core.
 *
 * Catalog of versioned game packages, room lifecycle, launches and
 * rating eligibility. Transport, authentication, package storage and
 * process spawning are supplied by the caller.
 */

export { AccountDirectory } from './accounts/AccountDirectory.js';
export {
  CatalogStore,
  type NewVersion,
  slugifyGameName,
  versionIdOf,
} from './catalog/CatalogStore.js';
export { VersionResolver } from './catalog/VersionResolver.js';
export { type CoreOptions, createCore, type PlayHubCore } from './createCore.js';
export {
  AlreadyJoinedError,
  DuplicateAccountError,
  DuplicateGameError,
  DuplicateVersionError,
  type ErrorCategory,
  type ErrorKind,
  GameDelistedError,
  GameNotFoundError,
  GameNotPlayableError,
  InsufficientPlayersError,
  InvalidManifestError,
  InvalidScoreError,
  isPlayHubError,
  LaunchFailedError,
  NotAuthorizedError,
  NotEligibleError,
  NotOwnerError,
  PlayHubError,
  RoomClosedError,
  RoomFullError,
  RoomLimitReachedError,
  RoomNotFoundError,
  RoomNotWaitingError,
  UploadFailedError,
  VersionNotFoundError,
} from './errors.js';
export type {
  BlobStore,
  ProcessHandle,
  ProcessHost,
  SpawnRequest,
} from './launch/collaborators.js';
export {
  SessionLauncher,
  type SessionLauncherConfig,
  type SessionLauncherDeps,
} from './launch/SessionLauncher.js';
export {
  type GameManifest,
  GameManifestSchema,
  isContainedPath,
  manifestEntryPoints,
  normalizePackagePath,
  parseManifest,
} from './manifest.js';
export { PlayTracker } from './play/PlayTracker.js';
export { DEFAULT_SCORE_BOUNDS, RatingLedger, type ScoreBounds } from './play/RatingLedger.js';
export {
  DEFAULT_ROOM_REGISTRY_CONFIG,
  type RoomClosedListener,
  type RoomHandle,
  RoomRegistry,
  type RoomRegistryConfig,
  type RoomRegistryDeps,
} from './rooms/RoomRegistry.js';
export type {
  AccountRecord,
  AccountRepository,
  CoreStores,
  GameRepository,
  PlayRecordRepository,
  RatingRepository,
  RoomRepository,
} from './stores/interfaces.js';
export { JsonFileStores } from './stores/json.js';
export { readJsonFile, writeJsonFile } from './stores/jsonFile.js';
export {
  type ChangeListener,
  createMemoryStores,
  InMemoryAccountRepository,
  InMemoryGameRepository,
  InMemoryPlayRecordRepository,
  InMemoryRatingRepository,
  InMemoryRoomRepository,
} from './stores/memory.js';
export * from './types.js';
export { KeyedMutex } from './utils/KeyedMutex.js';
export {
  formatLog,
  type Logger,
  type LogLevel,
  type LogThreshold,
  logger,
  setLogLevel,
} from './utils/logger.js';
