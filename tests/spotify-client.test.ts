import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

const http = vi.hoisted(() => ({
  instance: { get: vi.fn() },
}));

// Mock axios before importing the client
vi.mock('axios', () => ({
  default: {
    post: vi.fn(),
    create: vi.fn(() => http.instance),
  },
}));

// Mock logger
vi.mock('../src/config/logger.js', () => ({
  default: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

import axios from 'axios';
import { SpotifyClient, getTrackData } from '../src/spotify/spotify-client.js';
import { ConfigurationSchema } from '../src/config/types.js';
import { RefreshFailedError } from '../src/auth/errors.js';
import { UserAuthDataSchema } from '../src/types/token.js';
import type { UserAuthData } from '../src/types/token.js';
import type { CurrentlyPlayingTrack } from '../src/types/spotify.js';
import type { OperatorConsole } from '../src/auth/operator-console.js';
import { MemorySecretStore } from './helpers/memory-secret-store.js';

const track = {
  name: 'Test Song',
  id: 'track-1',
  album: {
    name: 'Test Album',
    id: 'album-1',
    total_tracks: 10,
    release_date: '2020-01-01',
    album_type: 'album',
    artists: [{ name: 'Test Artist', id: 'artist-1' }],
  },
  artists: [{ name: 'Test Artist', id: 'artist-1' }],
  disc_number: 1,
  duration_ms: 215000,
  external_ids: { isrc: 'XX0000000001' },
  explicit: false,
};

const playing: CurrentlyPlayingTrack = {
  timestamp: 1700000000000,
  progress_ms: 42000,
  currently_playing_type: 'track',
  is_playing: true,
  item: track,
};

function freshBundle(): UserAuthData {
  return {
    accessToken: 'at-local',
    refreshToken: 'rt-local',
    tokenType: 'Bearer',
    scope: 'user-read-currently-playing',
    expiresIn: 3600,
    lastRefresh: Date.now(),
  };
}

describe('getTrackData', () => {
  it('should parse a track item', () => {
    expect(getTrackData(playing)).toEqual(track);
  });

  it('should return null for an episode item', () => {
    expect(getTrackData({ ...playing, currently_playing_type: 'episode', item: { name: 'Episode', id: 'ep-1' } })).toBeNull();
  });

  it('should return null without an item', () => {
    expect(getTrackData({ ...playing, item: undefined })).toBeNull();
  });
});

describe('SpotifyClient', () => {
  let dir: string;
  let secrets: MemorySecretStore;
  let operator: OperatorConsole;
  let client: SpotifyClient;

  beforeEach(async () => {
    vi.clearAllMocks();
    dir = await fs.mkdtemp(join(tmpdir(), 'spotify-client-'));
    secrets = new MemorySecretStore();
    secrets.seed('spotify_client_id', 'test-client-id');
    operator = {
      showAuthorizationUrl: vi.fn(async () => {}),
      readRedirectUrl: vi.fn(async () => 'http://localhost:8080/?code=the-code'),
    };
    const config = ConfigurationSchema.parse({ cache: { directory: dir } });
    client = SpotifyClient.fromConfig('alice', config, secrets, operator);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should create the API client against the configured base URL', () => {
    expect(axios.create).toHaveBeenCalledWith({ baseURL: 'https://api.spotify.com/v1', timeout: 30000 });
  });

  it('should refuse API calls before credentials are set up', async () => {
    await expect(client.getCurrentlyPlaying()).rejects.toThrow('Creds are misconfigured, cannot execute API');
  });

  it('should use fresh local credentials as they are', async () => {
    await fs.writeFile(join(dir, 'user_auth.json'), JSON.stringify(freshBundle()), 'utf-8');
    http.instance.get.mockResolvedValueOnce({ status: 200, data: playing });

    await client.setupCredentials();
    const result = await client.getCurrentlyPlaying();

    expect(client.credsAreLoaded()).toBe(true);
    expect(axios.post).not.toHaveBeenCalled();
    expect(http.instance.get).toHaveBeenCalledWith('/me/player/currently-playing', {
      headers: { Authorization: 'Bearer at-local', Accept: 'application/json' },
    });
    expect(result).toEqual(playing);
  });

  it('should refresh stale credentials before use', async () => {
    await fs.writeFile(
      join(dir, 'user_auth.json'),
      JSON.stringify({ ...freshBundle(), lastRefresh: undefined }),
      'utf-8'
    );
    secrets.seed('spotify_refresh_token_alice', 'rt-local');
    vi.mocked(axios.post).mockResolvedValueOnce({
      data: { access_token: 'at-refreshed', token_type: 'Bearer', scope: '', expires_in: 3600 },
    });
    http.instance.get.mockResolvedValueOnce({ status: 204, data: '' });

    await client.setupCredentials();

    await expect(client.getCurrentlyPlaying()).resolves.toBeNull();
    expect(http.instance.get).toHaveBeenCalledWith('/me/player/currently-playing', {
      headers: { Authorization: 'Bearer at-refreshed', Accept: 'application/json' },
    });
    expect(secrets.byKey('spotify_access_token_alice')?.value).toBe('at-refreshed');
  });

  it('should refresh before calling the API when only the refresh token is stored', async () => {
    secrets.seed(
      'spotify_refresh_token_alice',
      'rt-remote',
      JSON.stringify({ expires_in: 3600, last_refresh: Date.now() })
    );
    vi.mocked(axios.post).mockResolvedValueOnce({
      data: { access_token: 'at-refreshed', token_type: 'Bearer', scope: '', expires_in: 3600 },
    });
    http.instance.get.mockResolvedValueOnce({ status: 200, data: playing });

    await client.setupCredentials();
    await client.getCurrentlyPlaying();

    expect(axios.post).toHaveBeenCalledTimes(1);
    expect(http.instance.get).toHaveBeenCalledWith('/me/player/currently-playing', {
      headers: { Authorization: 'Bearer at-refreshed', Accept: 'application/json' },
    });
  });

  it('should run the authorization flow when no credentials exist', async () => {
    vi.mocked(axios.post).mockResolvedValueOnce({
      data: {
        access_token: 'at-granted',
        token_type: 'Bearer',
        scope: 'user-read-currently-playing',
        expires_in: 3600,
        refresh_token: 'rt-granted',
      },
    });

    await client.setupCredentials();

    expect(operator.showAuthorizationUrl).toHaveBeenCalledTimes(1);
    const stored = JSON.parse(await fs.readFile(join(dir, 'user_auth.json'), 'utf-8'));
    expect(UserAuthDataSchema.parse(stored).refreshToken).toBe('rt-granted');
    expect(secrets.byKey('spotify_refresh_token_alice')?.value).toBe('rt-granted');
  });

  it('should surface a failed refresh', async () => {
    await fs.writeFile(
      join(dir, 'user_auth.json'),
      JSON.stringify({ ...freshBundle(), lastRefresh: undefined }),
      'utf-8'
    );
    vi.mocked(axios.post).mockRejectedValueOnce(new Error('Request failed with status code 400'));

    await expect(client.setupCredentials()).rejects.toBeInstanceOf(RefreshFailedError);
    expect(client.credsAreLoaded()).toBe(false);
  });

  it('should report API failures', async () => {
    await fs.writeFile(join(dir, 'user_auth.json'), JSON.stringify(freshBundle()), 'utf-8');
    http.instance.get.mockRejectedValueOnce(new Error('Request failed with status code 401'));

    await client.setupCredentials();

    await expect(client.getCurrentlyPlaying()).rejects.toThrow(
      'Problem calling Spotify API: Request failed with status code 401'
    );
  });

  it('should forget local credentials on logout', async () => {
    await fs.writeFile(join(dir, 'user_auth.json'), JSON.stringify(freshBundle()), 'utf-8');
    await client.setupCredentials();

    await client.logout();

    expect(client.credsAreLoaded()).toBe(false);
    await expect(fs.access(join(dir, 'user_auth.json'))).rejects.toThrow();
  });

  it('should force the authorization flow on login', async () => {
    await fs.writeFile(join(dir, 'user_auth.json'), JSON.stringify(freshBundle()), 'utf-8');
    vi.mocked(axios.post).mockResolvedValueOnce({
      data: {
        access_token: 'at-granted',
        token_type: 'Bearer',
        scope: '',
        expires_in: 3600,
        refresh_token: 'rt-granted',
      },
    });

    await client.login();

    expect(operator.readRedirectUrl).toHaveBeenCalledTimes(1);
    expect(secrets.byKey('spotify_access_token_alice')?.value).toBe('at-granted');
  });
});
