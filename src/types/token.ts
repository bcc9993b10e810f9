/**
 * Credential type definitions
 */

import { z } from 'zod';

/**
 * Identifies the registered client application
 */
export const AppAuthDataSchema = z.object({
  clientId: z.string().min(1),
  // PKCE clients leave it out
  clientSecret: z.string().optional(),
});

export type AppAuthData = z.infer<typeof AppAuthDataSchema>;

/**
 * The bearer-token bundle of one end user
 */
export const UserAuthDataSchema = z.object({
  accessToken: z.string(),
  refreshToken: z.string(),
  tokenType: z.string(),
  // Space-separated list of granted scopes
  scope: z.string(),
  expiresIn: z.number().int(), // seconds
  lastRefresh: z.number().optional(), // Unix timestamp in milliseconds
});

export type UserAuthData = z.infer<typeof UserAuthDataSchema>;

/**
 * Freshness metadata carried in the note of a stored token secret
 */
export const RefreshNoteSchema = z.object({
  expires_in: z.number().int(),
  last_refresh: z.number().optional(),
});

export type RefreshNote = z.infer<typeof RefreshNoteSchema>;

/**
 * Body returned by the authorization server's token endpoint
 */
export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string(),
  scope: z.string().default(''),
  expires_in: z.number().int(),
  refresh_token: z.string().min(1).optional(),
});

export type TokenResponse = z.infer<typeof TokenResponseSchema>;
