// Configuration types for the credential manager

import { z } from 'zod';

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_SCOPE =
  'user-read-playback-state user-read-currently-playing playlist-read-private user-read-playback-position user-top-read user-read-recently-played user-library-read';

// ============================================================================
// Configuration Schema
// ============================================================================

export const SpotifyConfigSchema = z.object({
  authorizeUrl: z.string().url().default('https://accounts.spotify.com/authorize'),
  tokenUrl: z.string().url().default('https://accounts.spotify.com/api/token'),
  apiUrl: z.string().url().default('https://api.spotify.com/v1'),
  redirectUri: z.string().url().default('http://localhost:8080'),
  scope: z.string().min(1).default(DEFAULT_SCOPE),
  timeoutMs: z.number().int().positive().default(30000),
});

export const CacheConfigSchema = z.object({
  directory: z.string().default('.'),
  appAuthFile: z.string().min(1).default('app_auth.json'),
  userAuthFile: z.string().min(1).default('user_auth.json'),
});

export const SecretsConfigSchema = z.object({
  bootstrapFile: z.string().min(1).default('bitwarden_config.json'),
  clientIdKey: z.string().min(1).default('spotify_client_id'),
  accessTokenKey: z.string().min(1).default('spotify_access_token_{user}'),
  refreshTokenKey: z.string().min(1).default('spotify_refresh_token_{user}'),
  apiUrl: z.string().url().optional(),
  identityUrl: z.string().url().optional(),
});

export const ConfigurationSchema = z.object({
  user: z.string().min(1).optional(),
  spotify: SpotifyConfigSchema.default({}),
  cache: CacheConfigSchema.default({}),
  secrets: SecretsConfigSchema.default({}),
});

export type SpotifyConfig = z.infer<typeof SpotifyConfigSchema>;
export type CacheConfig = z.infer<typeof CacheConfigSchema>;
export type SecretsConfig = z.infer<typeof SecretsConfigSchema>;
export type Configuration = z.infer<typeof ConfigurationSchema>;

// ============================================================================
// Secret Store Bootstrap
// ============================================================================

/**
 * Machine credentials used once at startup to log in to the secret store.
 */
export const SecretStoreBootstrapSchema = z.object({
  access_token: z.string().min(1),
  org_id: z.string().uuid(),
  project_id: z.string().uuid().optional(),
});

export type SecretStoreBootstrap = z.infer<typeof SecretStoreBootstrapSchema>;
