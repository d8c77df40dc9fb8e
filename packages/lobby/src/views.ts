import type { Game, PlayerId, PlayHubCore, PlayRecord, Rating, Room, Version } from '@playhub/core';
import type {
  GameDetail,
  GameSummary,
  PlayView,
  RatingView,
  RoomView,
  VersionView,
} from './types.js';

function iso(date: Date | undefined): string | null {
  return date === undefined ? null : date.toISOString();
}

export function roomView(room: Room): RoomView {
  return {
    id: room.id,
    gameId: room.gameId,
    version: room.version,
    hostId: room.hostId,
    players: [...room.roster],
    minPlayers: room.manifest.min_players,
    maxPlayers: room.manifest.max_players,
    state: room.state,
    connection: room.connection,
    createdAt: room.createdAt.toISOString(),
    startedAt: iso(room.startedAt),
    closedAt: iso(room.closedAt),
    closedReason: room.closedReason ?? null,
  };
}

export function versionView(version: Version): VersionView {
  return {
    label: version.label,
    notes: version.notes,
    uploadedAt: version.uploadedAt.toISOString(),
    manifest: version.manifest,
  };
}

export function ratingView(rating: Rating): RatingView {
  return {
    playerId: rating.playerId,
    score: rating.score,
    comment: rating.comment,
    submittedAt: rating.submittedAt.toISOString(),
  };
}

export function playView(record: PlayRecord): PlayView {
  return {
    gameId: record.gameId,
    plays: record.plays,
    firstStartedAt: record.firstStartedAt.toISOString(),
    lastStartedAt: record.lastStartedAt.toISOString(),
  };
}

export function gameSummary(core: PlayHubCore, game: Game): GameSummary {
  return {
    id: game.id,
    name: game.name,
    description: game.description,
    gameType: game.gameType,
    developerId: game.developerId,
    listing: game.listing,
    latestVersion: game.versions.at(-1)?.label ?? null,
    rating: core.ratings.aggregate(game.id),
    createdAt: game.createdAt.toISOString(),
  };
}

export function gameDetail(core: PlayHubCore, game: Game): GameDetail {
  return {
    ...gameSummary(core, game),
    versions: game.versions.map(versionView),
    ratings: core.ratings.ratingsFor(game.id).map(ratingView),
    rooms: core.rooms.roomsForGame(game.id).map(roomView),
  };
}

export function playsOf(core: PlayHubCore, playerId: PlayerId): PlayView[] {
  return core.tracker.recordsForPlayer(playerId).map(playView);
}
