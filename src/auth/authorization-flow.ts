import type { AppAuthData, UserAuthData } from '../types/token.js';
import type { CredentialStore } from './credential-store.js';
import type { CredentialResolver } from './credential-resolver.js';
import type { OperatorConsole } from './operator-console.js';
import { requestToken, toUserAuthData } from './token-endpoint.js';
import { CHALLENGE_METHOD, generatePkcePair } from './pkce.js';
import { AuthExchangeFailedError, describeError } from './errors.js';
import logger from '../config/logger.js';

export type AuthorizationFlowState = 'idle' | 'awaiting_user_code' | 'exchanging' | 'complete' | 'failed';

export type CodeExtraction =
  | { kind: 'code'; code: string }
  | { kind: 'error'; error: string }
  | { kind: 'missing' }
  | { kind: 'invalid_url'; reason: string };

export interface AuthorizationFlowOptions {
  authorizeUrl: string;
  tokenUrl: string;
  redirectUri: string;
  scope: string;
  timeoutMs: number;
}

/**
 * Read the authorization code out of a pasted redirect URL. Query pairs are
 * scanned in order and the first `code` or `error` decides.
 */
export function extractAuthorizationCode(redirectUrl: string): CodeExtraction {
  let url: URL;
  try {
    url = new URL(redirectUrl.trim());
  } catch (error) {
    return { kind: 'invalid_url', reason: describeError(error) };
  }

  for (const [key, value] of url.searchParams) {
    if (key === 'error') {
      return { kind: 'error', error: value };
    }
    if (key === 'code') {
      return { kind: 'code', code: value };
    }
  }
  return { kind: 'missing' };
}

/**
 * AuthorizationFlow drives the interactive PKCE authorization-code grant.
 * Nothing is retried: a failed flow has to be started again.
 */
export class AuthorizationFlow {
  private store: CredentialStore;
  private resolver: CredentialResolver;
  private operator: OperatorConsole;
  private options: AuthorizationFlowOptions;
  private currentState: AuthorizationFlowState = 'idle';

  constructor(
    store: CredentialStore,
    resolver: CredentialResolver,
    operator: OperatorConsole,
    options: AuthorizationFlowOptions
  ) {
    this.store = store;
    this.resolver = resolver;
    this.operator = operator;
    this.options = options;
  }

  get state(): AuthorizationFlowState {
    return this.currentState;
  }

  buildAuthorizationUrl(clientId: string, codeChallenge: string): string {
    const url = new URL(this.options.authorizeUrl);
    url.search = new URLSearchParams({
      response_type: 'code',
      client_id: clientId,
      scope: this.options.scope,
      code_challenge_method: CHALLENGE_METHOD,
      code_challenge: codeChallenge,
      redirect_uri: this.options.redirectUri,
    }).toString();
    return url.toString();
  }

  async run(app: AppAuthData, user: string): Promise<UserAuthData> {
    if (this.currentState === 'awaiting_user_code' || this.currentState === 'exchanging') {
      throw new Error('Authorization flow already in progress');
    }
    this.currentState = 'idle';
    logger.warn({ user }, 'Generating auth tokens from Spotify, starting now');

    const pkce = generatePkcePair();
    await this.operator.showAuthorizationUrl(this.buildAuthorizationUrl(app.clientId, pkce.challenge));
    this.currentState = 'awaiting_user_code';

    let pasted: string;
    try {
      pasted = await this.operator.readRedirectUrl();
    } catch (error) {
      throw this.fail(user, `Could not read the redirect URL: ${describeError(error)}`, error);
    }

    const extraction = extractAuthorizationCode(pasted);
    if (extraction.kind !== 'code') {
      throw this.fail(user, describeExtraction(extraction));
    }
    this.currentState = 'exchanging';
    logger.debug({ user }, 'Parsed authorization code');

    let data: UserAuthData;
    try {
      const response = await requestToken(this.options, {
        grant_type: 'authorization_code',
        code: extraction.code,
        client_id: app.clientId,
        code_verifier: pkce.verifier,
        redirect_uri: this.options.redirectUri,
      });
      data = toUserAuthData(response, this.store.now());
    } catch (error) {
      throw this.fail(user, `Token exchange failed: ${describeError(error)}`, error);
    }

    await this.resolver.persistUserAuth(data, user);
    this.currentState = 'complete';
    logger.info({ user }, 'Authorization complete');
    return data;
  }

  private fail(user: string, message: string, cause?: unknown): AuthExchangeFailedError {
    this.currentState = 'failed';
    logger.error({ user, reason: message }, 'Authorization flow failed');
    return new AuthExchangeFailedError(message, { cause });
  }
}

function describeExtraction(extraction: Exclude<CodeExtraction, { kind: 'code' }>): string {
  switch (extraction.kind) {
    case 'error':
      return `Authorization denied: ${extraction.error}`;
    case 'missing':
      return 'Redirect URL carries neither code nor error';
    case 'invalid_url':
      return `Invalid redirect URL: ${extraction.reason}`;
  }
}
