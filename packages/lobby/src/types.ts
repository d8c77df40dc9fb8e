/**
 * Request and response shapes of the lobby HTTP API.
 */

import type {
  AccountRole,
  ConnectionInfo,
  GameManifest,
  ListingState,
  RatingAggregate,
  RoomState,
} from '@playhub/core';
import { z } from 'zod';

// ============ Requests ============

const NAME = /^[A-Za-z0-9_.-]+$/;

export const RoleSchema = z.enum(['developer', 'player']);

export const RoleParamsSchema = z.object({ role: RoleSchema });

export const CredentialsSchema = z.object({
  id: z.string().min(1).max(64).regex(NAME, 'may only contain letters, digits, _ . and -'),
  password: z.string().min(1).max(256),
});

export const VersionUploadSchema = z.object({
  /** Developer-chosen label, also used as the stored file name */
  label: z
    .string()
    .min(1)
    .max(64)
    .regex(/^[A-Za-z0-9][A-Za-z0-9_.-]*$/, 'must start with a letter or digit'),
  notes: z.string().max(2000).default(''),
  manifest: z.unknown(),
  /** Package contents: path → base64 */
  files: z.record(z.string(), z.string()),
});

export const CreateGameSchema = z.object({
  name: z.string().trim().min(1).max(80),
  description: z.string().max(2000).default(''),
  gameType: z.string().min(1).max(32).default('cli'),
  version: VersionUploadSchema,
});

export const CreateRoomSchema = z.object({
  gameId: z.string().min(1),
  /** Version label; the latest version when omitted */
  version: z.string().min(1).optional(),
});

export const SubmitRatingSchema = z.object({
  score: z.number(),
  comment: z.string().max(1000).default(''),
});

export type Credentials = z.infer<typeof CredentialsSchema>;
export type VersionUpload = z.infer<typeof VersionUploadSchema>;
export type CreateGameRequest = z.infer<typeof CreateGameSchema>;
export type CreateRoomRequest = z.infer<typeof CreateRoomSchema>;
export type SubmitRatingRequest = z.infer<typeof SubmitRatingSchema>;

// ============ Responses ============

export interface ErrorResponse {
  error: {
    kind: string;
    entityId: string;
    message: string;
  };
}

export interface LoginResponse {
  token: string;
  role: AccountRole;
  id: string;
}

export interface VersionView {
  label: string;
  notes: string;
  uploadedAt: string;
  manifest: GameManifest;
}

export interface GameSummary {
  id: string;
  name: string;
  description: string;
  gameType: string;
  developerId: string;
  listing: ListingState;
  /** Label of the latest version, null before the first upload */
  latestVersion: string | null;
  rating: RatingAggregate;
  createdAt: string;
}

export interface RatingView {
  playerId: string;
  score: number;
  comment: string;
  submittedAt: string;
}

export interface GameDetail extends GameSummary {
  versions: VersionView[];
  ratings: RatingView[];
  rooms: RoomView[];
}

export interface RoomView {
  id: string;
  gameId: string;
  version: string;
  hostId: string;
  players: string[];
  minPlayers: number;
  maxPlayers: number;
  state: RoomState;
  connection: ConnectionInfo | null;
  createdAt: string;
  startedAt: string | null;
  closedAt: string | null;
  closedReason: string | null;
}

export interface PlayerView {
  id: string;
  online: boolean;
}

export interface PlayView {
  gameId: string;
  plays: number;
  firstStartedAt: string;
  lastStartedAt: string;
}

export interface ProfileView extends PlayerView {
  plays: PlayView[];
}

export interface DownloadResponse {
  gameId: string;
  version: string;
  manifest: GameManifest;
  files: Record<string, string>;
}
