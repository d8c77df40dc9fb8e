import { AccountDirectory } from './accounts/AccountDirectory.js';
import { CatalogStore } from './catalog/CatalogStore.js';
import { VersionResolver } from './catalog/VersionResolver.js';
import type { BlobStore, ProcessHost } from './launch/collaborators.js';
import { SessionLauncher, type SessionLauncherConfig } from './launch/SessionLauncher.js';
import { PlayTracker } from './play/PlayTracker.js';
import { RatingLedger, type ScoreBounds } from './play/RatingLedger.js';
import { RoomRegistry, type RoomRegistryConfig } from './rooms/RoomRegistry.js';
import type { CoreStores } from './stores/interfaces.js';
import { createMemoryStores } from './stores/memory.js';
import { type Clock, systemClock } from './types.js';

export interface CoreOptions {
  readonly blobs: BlobStore;
  readonly processes: ProcessHost;
  readonly launcher: SessionLauncherConfig;
  readonly rooms?: Partial<RoomRegistryConfig>;
  readonly ratings?: Partial<ScoreBounds>;
  /** Defaults to in-memory stores */
  readonly stores?: CoreStores;
  readonly clock?: Clock;
}

/**
 * The wired set of core components.
 */
export interface PlayHubCore {
  readonly accounts: AccountDirectory;
  readonly catalog: CatalogStore;
  readonly resolver: VersionResolver;
  readonly rooms: RoomRegistry;
  readonly launcher: SessionLauncher;
  readonly tracker: PlayTracker;
  readonly ratings: RatingLedger;
}

/**
 * Wire the core components around one set of stores.
 *
 * @example
 * ```typescript
 * const core = createCore({
 *   blobs: new FileBlobStore('/srv/playhub/blobs'),
 *   processes: new NodeProcessHost(),
 *   launcher: { runtimeRoot: '/srv/playhub/runtime', publicHost: 'games.example.com' },
 * });
 *
 * const room = await core.rooms.createRoom('alice', 'dice-duel');
 * ```
 */
export function createCore(options: CoreOptions): PlayHubCore {
  const stores = options.stores ?? createMemoryStores();
  const clock = options.clock ?? systemClock;

  const accounts = new AccountDirectory(stores.accounts, clock);
  const catalog = new CatalogStore(stores.games, accounts, clock);
  const resolver = new VersionResolver(catalog);
  const rooms = new RoomRegistry(
    { rooms: stores.rooms, catalog, resolver, accounts },
    options.rooms,
    clock
  );
  const tracker = new PlayTracker(stores.playRecords, clock);
  const ratings = new RatingLedger(stores.ratings, tracker, catalog, options.ratings, clock);
  const launcher = new SessionLauncher(
    { registry: rooms, catalog, tracker, blobs: options.blobs, processes: options.processes },
    options.launcher
  );

  return { accounts, catalog, resolver, rooms, launcher, tracker, ratings };
}
