import type { AppAuthData, UserAuthData } from '../types/token.js';
import type { CredentialStore } from './credential-store.js';
import type { CredentialResolver } from './credential-resolver.js';
import type { TokenEndpointOptions } from './token-endpoint.js';
import { requestToken, toUserAuthData } from './token-endpoint.js';
import { RefreshFailedError, describeError } from './errors.js';
import logger from '../config/logger.js';

// Refresh this many seconds before the access token actually expires
export const REFRESH_MARGIN_SECONDS = 5;

/**
 * Whether the access token must be refreshed before use.
 * A bundle that was never stamped, or whose stamp lies in the future,
 * always needs one.
 */
export function needsRefresh(data: UserAuthData, now: number): boolean {
  if (data.lastRefresh === undefined) {
    return true;
  }

  const elapsedMs = now - data.lastRefresh;
  if (elapsedMs < 0) {
    logger.warn({ lastRefresh: data.lastRefresh, now }, 'Last refresh is in the future, refreshing anyway');
    return true;
  }

  const elapsedSeconds = Math.floor(elapsedMs / 1000);
  return elapsedSeconds >= data.expiresIn - REFRESH_MARGIN_SECONDS;
}

/**
 * TokenLifecycle refreshes expiring access tokens and writes the result
 * to both stores
 */
export class TokenLifecycle {
  private store: CredentialStore;
  private resolver: CredentialResolver;
  private endpoint: TokenEndpointOptions;

  constructor(store: CredentialStore, resolver: CredentialResolver, endpoint: TokenEndpointOptions) {
    this.store = store;
    this.resolver = resolver;
    this.endpoint = endpoint;
  }

  /**
   * Resolve the user's bundle and refresh it if needed. Null means neither
   * store has credentials and the authorization flow has to run.
   */
  async ensureFresh(app: AppAuthData, user: string): Promise<UserAuthData | null> {
    const data = await this.resolver.resolveUserAuth(user);
    if (!data) {
      return null;
    }
    return this.refresh(app, data, user);
  }

  needsRefresh(data: UserAuthData): boolean {
    return needsRefresh(data, this.store.now());
  }

  /**
   * Returns the bundle unchanged while it is fresh, otherwise exchanges the
   * refresh token and persists the new bundle.
   * Rejects with RefreshFailedError when the exchange fails.
   */
  async refresh(app: AppAuthData, data: UserAuthData, user: string): Promise<UserAuthData> {
    if (!this.needsRefresh(data)) {
      logger.debug({ user }, 'No need to refresh the access token at this time');
      return data;
    }

    logger.info({ user }, 'Refreshing API access token');

    let refreshed: UserAuthData;
    try {
      const response = await requestToken(this.endpoint, {
        grant_type: 'refresh_token',
        refresh_token: data.refreshToken,
        client_id: app.clientId,
      });
      refreshed = toUserAuthData(response, this.store.now(), data.refreshToken);
    } catch (error) {
      logger.error({ user, error: describeError(error) }, 'Failed to refresh access token');
      throw new RefreshFailedError(`Failed to refresh access token for ${user}: ${describeError(error)}`, {
        cause: error,
      });
    }

    await this.resolver.persistUserAuth(refreshed, user);
    logger.info({ user }, 'Access token refreshed');
    return refreshed;
  }
}
