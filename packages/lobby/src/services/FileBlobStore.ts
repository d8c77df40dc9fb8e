import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { dirname, join, relative, resolve, sep } from 'node:path';
import {
  type BlobId,
  type BlobStore,
  DuplicateVersionError,
  type GameManifest,
  InvalidManifestError,
  isContainedPath,
  logger,
  manifestEntryPoints,
  normalizePackagePath,
  UploadFailedError,
} from '@playhub/core';
import { z } from 'zod';
import { InvalidRequestError } from '../errors.js';

/**
 * Package files keyed by package-relative path, contents base64-encoded.
 */
export type PackageFiles = Record<string, string>;

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

export const PackageBundleSchema = z.object({
  files: z.record(z.string(), z.string().regex(BASE64, 'must be base64')),
});

export type PackageBundle = z.infer<typeof PackageBundleSchema>;

function hasCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

/**
 * Validate and normalize the paths of an uploaded package.
 * @throws {InvalidRequestError} if a path is absolute or leaves the package
 * @throws {InvalidManifestError} if an entry point is not in the package
 */
export function normalizePackageFiles(
  files: PackageFiles,
  manifest: GameManifest,
  versionId: string
): PackageFiles {
  const normalized: PackageFiles = {};
  for (const [rawPath, contents] of Object.entries(files)) {
    if (rawPath.startsWith('/') || /^[A-Za-z]:/.test(rawPath)) {
      throw new InvalidRequestError(`File path ${rawPath} must be relative`, versionId);
    }
    const path = normalizePackagePath(rawPath);
    if (!isContainedPath(path)) {
      throw new InvalidRequestError(`File path ${rawPath} leaves the package`, versionId);
    }
    normalized[path] = contents;
  }

  for (const entry of manifestEntryPoints(manifest)) {
    if (!(entry in normalized)) {
      throw new InvalidManifestError(versionId, `${entry} is not part of the package`);
    }
  }
  return normalized;
}

/**
 * Stores each package as a JSON bundle at `<root>/<gameId>/<label>.json` and
 * materializes bundles into working directories for game servers.
 */
export class FileBlobStore implements BlobStore {
  private readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  /**
   * Write a new package. Never overwrites an existing version.
   * @returns The blob id to record on the version
   * @throws {DuplicateVersionError} if the bundle already exists
   * @throws {UploadFailedError} if the bundle cannot be written
   */
  async put(gameId: string, label: string, files: PackageFiles): Promise<BlobId> {
    const blobId = `${gameId}/${label}`;
    const path = this.pathOf(blobId);
    const bundle: PackageBundle = { files };

    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, JSON.stringify(bundle), { flag: 'wx' });
    } catch (err) {
      if (hasCode(err, 'EEXIST')) {
        throw new DuplicateVersionError(gameId, label);
      }
      throw new UploadFailedError(`${gameId}@${label}`, 'could not store package', err);
    }

    logger.info('Package stored', { blobId, files: Object.keys(files).length });
    return blobId;
  }

  /**
   * Delete a stored package, for uploads the catalog rejected.
   */
  async remove(blobId: BlobId): Promise<void> {
    await rm(this.pathOf(blobId), { force: true });
  }

  async fetch(blobId: BlobId): Promise<Uint8Array> {
    try {
      return await readFile(this.pathOf(blobId));
    } catch (err) {
      if (hasCode(err, 'ENOENT')) {
        throw new Error(`Package ${blobId} is missing from storage`);
      }
      throw err;
    }
  }

  /**
   * Read a stored package as a bundle, e.g. for downloads.
   */
  async readBundle(blobId: BlobId): Promise<PackageBundle> {
    return this.decode(await this.fetch(blobId));
  }

  async unpack(bytes: Uint8Array, targetDir: string): Promise<void> {
    const bundle = this.decode(bytes);
    await rm(targetDir, { recursive: true, force: true });
    await mkdir(targetDir, { recursive: true });

    for (const [rawPath, contents] of Object.entries(bundle.files)) {
      const path = normalizePackagePath(rawPath);
      if (!isContainedPath(path)) {
        throw new Error(`Package path ${rawPath} leaves the package`);
      }
      const target = join(targetDir, path);
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, Buffer.from(contents, 'base64'));
    }
  }

  async discard(targetDir: string): Promise<void> {
    await rm(targetDir, { recursive: true, force: true });
  }

  private decode(bytes: Uint8Array): PackageBundle {
    const raw: unknown = JSON.parse(Buffer.from(bytes).toString('utf8'));
    return PackageBundleSchema.parse(raw);
  }

  private pathOf(blobId: BlobId): string {
    const path = resolve(this.root, `${blobId}.json`);
    const rel = relative(this.root, path);
    if (rel.startsWith('..') || rel.startsWith(sep) || rel === '') {
      throw new Error(`Blob id ${blobId} resolves outside the blob root`);
    }
    return path;
  }
}
