import { readJsonFile, writeJsonFile } from '@playhub/core';
import { z } from 'zod';

/**
 * Password hash of one account, keyed by `<role>:<id>`.
 */
export interface StoredCredentials {
  readonly salt: string;
  /** scrypt key, hex encoded */
  readonly hash: string;
}

export interface CredentialRepository {
  get(key: string): StoredCredentials | undefined;
  save(key: string, credentials: StoredCredentials): void;
}

export class InMemoryCredentialRepository implements CredentialRepository {
  protected readonly entries = new Map<string, StoredCredentials>();

  get(key: string): StoredCredentials | undefined {
    return this.entries.get(key);
  }

  save(key: string, credentials: StoredCredentials): void {
    this.entries.set(key, credentials);
  }
}

const CredentialsFileSchema = z.object({
  format: z.literal(1),
  credentials: z.record(
    z.string(),
    z.object({
      salt: z.string().min(1),
      hash: z.string().regex(/^[0-9a-f]+$/),
    })
  ),
});

/**
 * Credentials kept in their own JSON file, apart from the core data file,
 * and rewritten on every save.
 */
export class JsonFileCredentialRepository extends InMemoryCredentialRepository {
  constructor(private readonly path: string) {
    super();
    const saved = readJsonFile(path, CredentialsFileSchema);
    if (saved) {
      for (const [key, credentials] of Object.entries(saved.credentials)) {
        this.entries.set(key, credentials);
      }
    }
  }

  override save(key: string, credentials: StoredCredentials): void {
    super.save(key, credentials);
    writeJsonFile(this.path, {
      format: 1,
      credentials: Object.fromEntries(this.entries),
    });
  }
}
