import type { Configuration } from '../config/types.js';
import type { SecretStore } from '../types/secret-store.js';
import { LocalCache } from './local-cache.js';
import { UserLock } from './user-lock.js';

export const USER_PLACEHOLDER = '{user}';

/**
 * Logical names of the documents and secrets, `{user}` marks the user id
 */
export interface CredentialKeys {
  appAuthFile: string;
  userAuthFile: string;
  clientIdKey: string;
  accessTokenKey: string;
  refreshTokenKey: string;
}

export interface CredentialStoreOptions {
  cache: LocalCache;
  secrets: SecretStore;
  keys: CredentialKeys;
  scope: string;
  now?: () => number;
  lock?: UserLock;
}

export function secretKey(template: string, user: string): string {
  return template.split(USER_PLACEHOLDER).join(user);
}

/**
 * Context shared by the resolver, the token lifecycle and the
 * authorization flow: both stores, key names, the clock and the user lock
 */
export class CredentialStore {
  readonly cache: LocalCache;
  readonly secrets: SecretStore;
  readonly keys: CredentialKeys;
  readonly scope: string;
  readonly now: () => number;
  readonly lock: UserLock;

  constructor(options: CredentialStoreOptions) {
    this.cache = options.cache;
    this.secrets = options.secrets;
    this.keys = options.keys;
    this.scope = options.scope;
    this.now = options.now ?? Date.now;
    this.lock = options.lock ?? new UserLock();
  }

  static fromConfig(config: Configuration, secrets: SecretStore): CredentialStore {
    return new CredentialStore({
      cache: new LocalCache(config.cache.directory),
      secrets,
      keys: {
        appAuthFile: config.cache.appAuthFile,
        userAuthFile: config.cache.userAuthFile,
        clientIdKey: config.secrets.clientIdKey,
        accessTokenKey: config.secrets.accessTokenKey,
        refreshTokenKey: config.secrets.refreshTokenKey,
      },
      scope: config.spotify.scope,
    });
  }

  userAuthFile(user: string): string {
    return secretKey(this.keys.userAuthFile, user);
  }

  accessTokenKey(user: string): string {
    return secretKey(this.keys.accessTokenKey, user);
  }

  refreshTokenKey(user: string): string {
    return secretKey(this.keys.refreshTokenKey, user);
  }
}
