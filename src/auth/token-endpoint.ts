import axios from 'axios';
import type { TokenResponse, UserAuthData } from '../types/token.js';
import { TokenResponseSchema } from '../types/token.js';

export interface TokenEndpointOptions {
  tokenUrl: string;
  timeoutMs: number;
}

/**
 * POST a grant to the token endpoint as an url-encoded form and validate
 * the body. Transport, status and shape failures all reject.
 */
export async function requestToken(
  endpoint: TokenEndpointOptions,
  form: Record<string, string>
): Promise<TokenResponse> {
  const response = await axios.post(endpoint.tokenUrl, new URLSearchParams(form).toString(), {
    headers: {
      'Content-Type': 'application/x-www-form-urlencoded',
    },
    timeout: endpoint.timeoutMs,
  });

  const result = TokenResponseSchema.safeParse(response.data);
  if (!result.success) {
    throw new Error(`Could not parse token response: ${result.error.message}`);
  }
  return result.data;
}

export function toUserAuthData(
  response: TokenResponse,
  refreshedAt: number,
  previousRefreshToken?: string
): UserAuthData {
  const refreshToken = response.refresh_token ?? previousRefreshToken;
  if (refreshToken === undefined) {
    throw new Error('Token response carries no refresh_token');
  }
  return {
    accessToken: response.access_token,
    refreshToken,
    tokenType: response.token_type,
    scope: response.scope,
    expiresIn: response.expires_in,
    lastRefresh: refreshedAt,
  };
}
