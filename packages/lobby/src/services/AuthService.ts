import { randomBytes, scrypt, timingSafeEqual } from 'node:crypto';
import {
  type AccountDirectory,
  type AccountRecord,
  type AccountRole,
  type Clock,
  logger,
  systemClock,
} from '@playhub/core';
import { AlreadyLoggedInError, UnauthenticatedError } from '../errors.js';
import { type CredentialRepository, InMemoryCredentialRepository } from './CredentialStore.js';

/**
 * Configuration for sessions.
 */
export interface AuthConfig {
  /** A session expires this long after its last authenticated request */
  sessionTimeoutSeconds: number;
  /** An account counts as online this long after its last request */
  onlineTimeoutSeconds: number;
  /** A second login is refused while the current session was used this recently */
  loginLockSeconds: number;
}

const DEFAULT_CONFIG: AuthConfig = {
  sessionTimeoutSeconds: 3600,
  onlineTimeoutSeconds: 20,
  loginLockSeconds: 30,
};

const KEY_LENGTH = 64;

export interface Principal {
  readonly role: AccountRole;
  readonly id: string;
  readonly token: string;
}

export interface AuthServiceDeps {
  readonly accounts: AccountDirectory;
  /** Defaults to credentials held in memory */
  readonly credentials?: CredentialRepository;
}

interface Session extends Principal {
  lastSeen: Date;
}

function deriveKey(password: string, salt: string): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(password, salt, KEY_LENGTH, (err, key) => {
      if (err) {
        reject(err);
        return;
      }
      resolve(key);
    });
  });
}

function accountKey(role: AccountRole, id: string): string {
  return `${role}:${id}`;
}

/**
 * Password accounts and bearer-token sessions for developers and players.
 *
 * The core only knows identities; this service decides which identity a
 * request carries.
 */
export class AuthService {
  private readonly config: AuthConfig;
  private readonly accounts: AccountDirectory;
  private readonly credentials: CredentialRepository;
  private readonly sessions = new Map<string, Session>();
  /** Account key → token of its current session */
  private readonly activeTokens = new Map<string, string>();

  constructor(
    deps: AuthServiceDeps,
    config: Partial<AuthConfig> = {},
    private readonly clock: Clock = systemClock
  ) {
    this.accounts = deps.accounts;
    this.credentials = deps.credentials ?? new InMemoryCredentialRepository();
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * @throws {DuplicateAccountError} if the name is taken for that role
   */
  async register(role: AccountRole, id: string, password: string): Promise<AccountRecord> {
    const salt = randomBytes(16).toString('hex');
    const hash = await deriveKey(password, salt);
    const account = await this.accounts.register(role, id);
    this.credentials.save(accountKey(role, id), { salt, hash: hash.toString('hex') });
    return account;
  }

  /**
   * @throws {UnauthenticatedError} on an unknown name or wrong password
   * @throws {AlreadyLoggedInError} while another session of the account is fresh
   */
  async login(role: AccountRole, id: string, password: string): Promise<Principal> {
    const key = accountKey(role, id);
    const credentials = this.credentials.get(key);
    if (!credentials) {
      throw new UnauthenticatedError('Invalid name or password');
    }
    const candidate = await deriveKey(password, credentials.salt);
    const expected = Buffer.from(credentials.hash, 'hex');
    if (candidate.length !== expected.length || !timingSafeEqual(candidate, expected)) {
      throw new UnauthenticatedError('Invalid name or password');
    }

    const now = this.clock();
    const current = this.currentSession(key);
    if (current) {
      if (now.getTime() - current.lastSeen.getTime() < this.config.loginLockSeconds * 1000) {
        throw new AlreadyLoggedInError(id);
      }
      this.sessions.delete(current.token);
    }

    const token = randomBytes(32).toString('base64url');
    this.sessions.set(token, { role, id, token, lastSeen: now });
    this.activeTokens.set(key, token);
    logger.info('Logged in', { role, id });
    return { role, id, token };
  }

  logout(token: string): void {
    const session = this.sessions.get(token);
    if (!session) {
      return;
    }
    this.sessions.delete(token);
    this.activeTokens.delete(accountKey(session.role, session.id));
    logger.info('Logged out', { role: session.role, id: session.id });
  }

  /**
   * Resolve a bearer token and refresh its session.
   * @throws {UnauthenticatedError} if the token is unknown or expired
   */
  authenticate(token: string): Principal {
    const session = this.sessions.get(token);
    const now = this.clock();
    if (!session || this.isExpired(session, now)) {
      if (session) {
        this.logout(token);
      }
      throw new UnauthenticatedError();
    }
    session.lastSeen = now;
    return { role: session.role, id: session.id, token };
  }

  isOnline(role: AccountRole, id: string, now: Date = this.clock()): boolean {
    const session = this.currentSession(accountKey(role, id));
    return (
      session !== undefined &&
      now.getTime() - session.lastSeen.getTime() <= this.config.onlineTimeoutSeconds * 1000
    );
  }

  /**
   * Drop expired sessions.
   * @returns Number of sessions removed
   */
  pruneExpired(now: Date = this.clock()): number {
    let pruned = 0;
    for (const session of Array.from(this.sessions.values())) {
      if (this.isExpired(session, now)) {
        this.logout(session.token);
        pruned++;
      }
    }
    return pruned;
  }

  private currentSession(key: string): Session | undefined {
    const token = this.activeTokens.get(key);
    return token === undefined ? undefined : this.sessions.get(token);
  }

  private isExpired(session: Session, now: Date): boolean {
    return now.getTime() - session.lastSeen.getTime() > this.config.sessionTimeoutSeconds * 1000;
  }
}
