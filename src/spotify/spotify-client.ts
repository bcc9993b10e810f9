import axios, { AxiosInstance } from 'axios';
import type { Configuration } from '../config/types.js';
import type { AppAuthData, UserAuthData } from '../types/token.js';
import type { SecretStore } from '../types/secret-store.js';
import type { CurrentlyPlayingTrack, Track } from '../types/spotify.js';
import { CurrentlyPlayingCodec, TrackCodec } from '../types/spotify.js';
import { CredentialStore } from '../auth/credential-store.js';
import { CredentialResolver } from '../auth/credential-resolver.js';
import { TokenLifecycle } from '../auth/token-lifecycle.js';
import { AuthorizationFlow } from '../auth/authorization-flow.js';
import type { OperatorConsole } from '../auth/operator-console.js';
import { describeError } from '../auth/errors.js';
import logger from '../config/logger.js';

export interface SpotifyClientDeps {
  store: CredentialStore;
  resolver: CredentialResolver;
  lifecycle: TokenLifecycle;
  flow: AuthorizationFlow;
  apiUrl: string;
  timeoutMs: number;
}

/**
 * The track inside a currently-playing payload, or null for episodes, ads
 * and anything else that does not parse as a track
 */
export function getTrackData(playing: CurrentlyPlayingTrack): Track | null {
  const result = TrackCodec.safeParse(playing.item);
  return result.success ? result.data : null;
}

/**
 * SpotifyClient resolves one user's credentials and serves calls to the
 * Spotify Web API on their behalf
 */
export class SpotifyClient {
  private userId: string;
  private deps: SpotifyClientDeps;
  private client: AxiosInstance;
  private app?: AppAuthData;
  private userAuth?: UserAuthData;

  constructor(userId: string, deps: SpotifyClientDeps) {
    this.userId = userId;
    this.deps = deps;
    this.client = axios.create({ baseURL: deps.apiUrl, timeout: deps.timeoutMs });
  }

  static fromConfig(
    userId: string,
    config: Configuration,
    secrets: SecretStore,
    operator: OperatorConsole
  ): SpotifyClient {
    const store = CredentialStore.fromConfig(config, secrets);
    const resolver = new CredentialResolver(store);
    const lifecycle = new TokenLifecycle(store, resolver, config.spotify);
    const flow = new AuthorizationFlow(store, resolver, operator, config.spotify);
    return new SpotifyClient(userId, {
      store,
      resolver,
      lifecycle,
      flow,
      apiUrl: config.spotify.apiUrl,
      timeoutMs: config.spotify.timeoutMs,
    });
  }

  credsAreLoaded(): boolean {
    return this.app !== undefined && this.userAuth !== undefined;
  }

  /**
   * Resolve the app identity and user tokens, refreshing or running the
   * interactive flow as needed. Rejects with RefreshFailedError,
   * AuthExchangeFailedError or CredentialUnavailableError.
   */
  async setupCredentials(): Promise<void> {
    const { store, resolver, lifecycle, flow } = this.deps;

    await store.lock.run(this.userId, async () => {
      const app = await resolver.resolveAppAuth();
      this.app = app;

      const userAuth = await lifecycle.ensureFresh(app, this.userId);
      if (userAuth) {
        this.userAuth = userAuth;
        logger.info({ user: this.userId }, 'Spotify API creds are ready to go');
        return;
      }

      this.userAuth = await flow.run(app, this.userId);
    });
  }

  /**
   * Run the interactive flow even when stored credentials exist
   */
  async login(): Promise<void> {
    const { store, resolver, flow } = this.deps;

    await store.lock.run(this.userId, async () => {
      const app = await resolver.resolveAppAuth();
      this.app = app;
      this.userAuth = await flow.run(app, this.userId);
    });
  }

  /**
   * Forget the locally cached user tokens; the secret store is untouched
   */
  async logout(): Promise<void> {
    const { store } = this.deps;
    await store.lock.run(this.userId, async () => {
      await store.cache.remove(store.userAuthFile(this.userId));
      this.userAuth = undefined;
      logger.info({ user: this.userId }, 'Local user auth removed');
    });
  }

  private accessToken(): string {
    if (!this.userAuth) {
      throw new Error('Creds are misconfigured, cannot execute API');
    }
    return this.userAuth.accessToken;
  }

  buildHeaders(accessToken: string): Record<string, string> {
    return {
      'Authorization': `Bearer ${accessToken}`,
      'Accept': 'application/json',
    };
  }

  /**
   * The user's currently playing item, null when nothing is playing
   */
  async getCurrentlyPlaying(): Promise<CurrentlyPlayingTrack | null> {
    if (!this.credsAreLoaded()) {
      throw new Error('Creds are misconfigured, cannot execute API');
    }

    let status: number;
    let data: unknown;
    try {
      const response = await this.client.get('/me/player/currently-playing', {
        headers: this.buildHeaders(this.accessToken()),
      });
      status = response.status;
      data = response.data;
    } catch (error) {
      logger.error({ user: this.userId, error: describeError(error) }, 'Spotify API call failed');
      throw new Error(`Problem calling Spotify API: ${describeError(error)}`, { cause: error });
    }

    if (status === 204 || data === '' || data === undefined || data === null) {
      return null;
    }

    const result = CurrentlyPlayingCodec.safeParse(data);
    if (!result.success) {
      throw new Error(`Problem calling Spotify API: unexpected payload: ${result.error.message}`);
    }
    return result.data;
  }
}
