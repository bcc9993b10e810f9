import type { AppAuthData, RefreshNote, UserAuthData } from '../types/token.js';
import { AppAuthDataSchema, RefreshNoteSchema, UserAuthDataSchema } from '../types/token.js';
import type { Secret } from '../types/secret-store.js';
import type { CredentialStore } from './credential-store.js';
import {
  CredentialUnavailableError,
  NotFoundError,
  describeError,
  isCredentialError,
} from './errors.js';
import { needsRefresh } from './token-lifecycle.js';
import logger from '../config/logger.js';

export const BEARER = 'Bearer';

/**
 * Outcome of one write-through, failures are reported and never thrown
 */
export interface PersistReport {
  cache: boolean;
  refreshToken: boolean;
  accessToken: boolean;
}

export function serializeRefreshNote(data: UserAuthData): string {
  if (data.lastRefresh === undefined) {
    return '';
  }
  const note: RefreshNote = { expires_in: data.expiresIn, last_refresh: data.lastRefresh };
  return JSON.stringify(note);
}

/**
 * Recover freshness from a secret note; missing or malformed notes read as
 * zero expiry with no refresh time
 */
export function parseRefreshNote(note: string): RefreshNote {
  try {
    const result = RefreshNoteSchema.safeParse(JSON.parse(note));
    if (result.success) {
      return result.data;
    }
  } catch {
    // Not JSON: fall through to the default
  }
  return { expires_in: 0 };
}

/**
 * CredentialResolver merges the local cache and the secret store into one
 * authoritative credential state. It never talks to the authorization server.
 */
export class CredentialResolver {
  private store: CredentialStore;

  constructor(store: CredentialStore) {
    this.store = store;
  }

  /**
   * Application identity: the cache is trusted indefinitely, the secret
   * store fills it in when it is missing or unreadable
   */
  async resolveAppAuth(): Promise<AppAuthData> {
    const { cache, keys } = this.store;

    try {
      return await cache.load(keys.appAuthFile, AppAuthDataSchema);
    } catch (error) {
      if (isCredentialError(error, 'absent')) {
        logger.warn({ file: keys.appAuthFile }, 'App auth file does not exist yet');
      } else {
        logger.error({ file: keys.appAuthFile, error: describeError(error) }, 'App auth file unusable');
      }
    }

    let secret: Secret;
    try {
      secret = await this.fetchSecret(keys.clientIdKey);
    } catch (error) {
      logger.error({ key: keys.clientIdKey, error: describeError(error) }, 'Could not fetch client id');
      throw new CredentialUnavailableError(
        `No application identity: ${keys.clientIdKey} unavailable (${describeError(error)})`,
        { cause: error }
      );
    }

    const app: AppAuthData = { clientId: secret.value };
    try {
      await cache.store(keys.appAuthFile, app);
    } catch (error) {
      logger.warn({ file: keys.appAuthFile, error: describeError(error) }, 'Failed to cache app auth');
    }
    return app;
  }

  /**
   * User credentials, or null when neither store has anything usable and
   * the interactive flow must run
   */
  async resolveUserAuth(user: string): Promise<UserAuthData | null> {
    const local = await this.loadLocalUserAuth(user);

    if (local && !needsRefresh(local, this.store.now())) {
      logger.debug({ user }, 'Local user auth is fresh');
      return local;
    }

    const refreshKey = this.store.refreshTokenKey(user);
    let remote: Secret;
    try {
      remote = await this.fetchSecret(refreshKey);
    } catch (error) {
      logger.warn({ user, key: refreshKey, error: describeError(error) }, 'Refresh token not available remotely');
      return local;
    }

    if (local && local.refreshToken === remote.value) {
      logger.debug({ user }, 'Local and remote refresh tokens agree');
      return local;
    }

    logger.info({ user, hadLocal: local !== null }, 'Using refresh token from the secret store');

    const accessKey = this.store.accessTokenKey(user);
    let accessToken = '';
    try {
      accessToken = (await this.fetchSecret(accessKey)).value;
    } catch (error) {
      logger.warn({ user, key: accessKey, error: describeError(error) }, 'Access token not available remotely, continuing without one');
    }

    const note = parseRefreshNote(remote.note);
    const synthesized: UserAuthData = {
      accessToken,
      refreshToken: remote.value,
      tokenType: BEARER,
      scope: this.store.scope,
      expiresIn: note.expires_in,
      // Without an access token the bundle must be refreshed before use
      lastRefresh: accessToken === '' ? undefined : note.last_refresh,
    };

    const file = this.store.userAuthFile(user);
    try {
      await this.store.cache.store(file, synthesized);
    } catch (error) {
      logger.warn({ user, file, error: describeError(error) }, 'Failed to cache user auth');
    }
    return synthesized;
  }

  /**
   * Write the bundle to the cache, then through to both token secrets
   */
  async persistUserAuth(data: UserAuthData, user: string): Promise<PersistReport> {
    const report: PersistReport = { cache: true, refreshToken: true, accessToken: true };
    const file = this.store.userAuthFile(user);

    try {
      await this.store.cache.store(file, data);
    } catch (error) {
      report.cache = false;
      logger.warn({ user, file, error: describeError(error) }, 'Failed to cache user auth');
    }

    const note = serializeRefreshNote(data);
    const writes: Array<[keyof PersistReport, string, string]> = [
      ['refreshToken', this.store.refreshTokenKey(user), data.refreshToken],
      ['accessToken', this.store.accessTokenKey(user), data.accessToken],
    ];
    for (const [field, key, value] of writes) {
      try {
        await this.upsertSecret(key, value, note);
      } catch (error) {
        report[field] = false;
        logger.error({ user, key, error: describeError(error) }, 'Failed to store secret');
      }
    }

    return report;
  }

  private async loadLocalUserAuth(user: string): Promise<UserAuthData | null> {
    const file = this.store.userAuthFile(user);
    try {
      return await this.store.cache.load(file, UserAuthDataSchema);
    } catch (error) {
      if (isCredentialError(error, 'absent')) {
        logger.warn({ user, file }, 'User auth file does not exist yet');
      } else {
        logger.error({ user, file, error: describeError(error) }, 'User auth file unusable');
      }
      return null;
    }
  }

  // The store has no lookup by name, so every access lists first
  private async resolveSecretId(key: string): Promise<string | undefined> {
    const ids = await this.store.secrets.list();
    return ids.get(key);
  }

  private async fetchSecret(key: string): Promise<Secret> {
    const id = await this.resolveSecretId(key);
    if (id === undefined) {
      throw new NotFoundError(`Secret ${key} not found`);
    }
    return this.store.secrets.get(id);
  }

  private async upsertSecret(key: string, value: string, note: string): Promise<void> {
    const id = await this.resolveSecretId(key);
    if (id === undefined) {
      logger.info({ key }, 'Creating secret');
      await this.store.secrets.create(key, value, note);
      return;
    }
    await this.store.secrets.update(id, key, value, note);
  }
}
