/**
 * @fileoverview Game package manifest.
 *
 * Every version carries a manifest declaring its entry point, an optional
 * server entry point and its player-count bounds. Field names are persisted
 * as-is. Manifests are validated once, when a version is added; everything
 * downstream works with the parsed {@link GameManifest}.
 */

import { z } from 'zod';
import { InvalidManifestError } from './errors.js';

/**
 * Normalize a package-relative path: forward slashes, no leading `./` or `/`.
 */
export function normalizePackagePath(path: string): string {
  let normalized = path.trim().replace(/\\/g, '/');
  while (normalized.startsWith('./')) {
    normalized = normalized.slice(2);
  }
  return normalized.replace(/^\/+/, '');
}

/**
 * Whether a normalized package path stays inside the package root.
 */
export function isContainedPath(path: string): boolean {
  return path.length > 0 && !path.split('/').includes('..');
}

const PackagePathSchema = z
  .string()
  .transform(normalizePackagePath)
  .refine((path) => path.length > 0, { message: 'must be a non-empty path' })
  .refine(isContainedPath, { message: 'must not contain ..' });

export const GameManifestSchema = z
  .object({
    entry: PackagePathSchema,
    server_entry: PackagePathSchema.optional(),
    min_players: z.number().int().positive(),
    max_players: z.number().int().positive(),
  })
  .strict()
  .refine((m) => m.min_players <= m.max_players, {
    message: 'min_players must not exceed max_players',
    path: ['max_players'],
  });

export type GameManifest = z.infer<typeof GameManifestSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')} ${issue.message}` : issue.message
    )
    .join('; ');
}

/**
 * Parse and normalize a manifest.
 * @param versionId - Used as the entity id of the error
 * @throws {InvalidManifestError} if the manifest is malformed
 */
export function parseManifest(raw: unknown, versionId: string): GameManifest {
  const result = GameManifestSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidManifestError(versionId, describeIssues(result.error));
  }
  return result.data;
}

/**
 * Entry points a package must contain for its manifest to be usable.
 */
export function manifestEntryPoints(manifest: GameManifest): string[] {
  return manifest.server_entry === undefined
    ? [manifest.entry]
    : [manifest.entry, manifest.server_entry];
}
