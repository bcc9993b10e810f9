import { BitwardenClient, DeviceType } from '@bitwarden/sdk-napi';
import type { ClientSettings } from '@bitwarden/sdk-napi';
import type { Secret, SecretStore } from '../types/secret-store.js';
import type { SecretStoreBootstrap } from '../config/types.js';
import { RemoteError, describeError } from '../auth/errors.js';
import logger from '../config/logger.js';

export interface BitwardenStoreOptions {
  bootstrap: SecretStoreBootstrap;
  apiUrl?: string;
  identityUrl?: string;
}

function clientSettings(options: BitwardenStoreOptions): ClientSettings | undefined {
  if (!options.apiUrl || !options.identityUrl) {
    return undefined;
  }
  return {
    apiUrl: options.apiUrl,
    identityUrl: options.identityUrl,
    userAgent: 'spotify-creds',
    deviceType: DeviceType.SDK,
  };
}

/**
 * Bitwarden Secrets Manager backed SecretStore.
 * Logs in with the machine access token on first use, once per instance.
 */
export class BitwardenSecretStore implements SecretStore {
  private client: BitwardenClient;
  private bootstrap: SecretStoreBootstrap;
  private login?: Promise<void>;

  constructor(options: BitwardenStoreOptions) {
    this.bootstrap = options.bootstrap;
    this.client = new BitwardenClient(clientSettings(options));
  }

  private projectIds(): string[] {
    return this.bootstrap.project_id ? [this.bootstrap.project_id] : [];
  }

  private async authenticate(): Promise<void> {
    if (!this.login) {
      this.login = this.client
        .auth()
        .loginAccessToken(this.bootstrap.access_token)
        .then(
          () => {
            logger.info({ organizationId: this.bootstrap.org_id }, 'Authenticated to the secret store');
          },
          (error: unknown) => {
            // A failed login is retried on the next call
            this.login = undefined;
            throw error;
          }
        );
    }
    return this.login;
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      await this.authenticate();
      return await fn();
    } catch (error) {
      logger.error({ operation, error: describeError(error) }, 'Secret store call failed');
      throw new RemoteError(`Secret store ${operation} failed: ${describeError(error)}`, { cause: error });
    }
  }

  async list(): Promise<Map<string, string>> {
    const response = await this.call('list', () => this.client.secrets().list(this.bootstrap.org_id));
    const ids = new Map<string, string>();
    for (const secret of response.data) {
      if (!ids.has(secret.key)) {
        ids.set(secret.key, secret.id);
      }
    }
    logger.debug({ count: ids.size }, 'Listed secrets');
    return ids;
  }

  async get(id: string): Promise<Secret> {
    const secret = await this.call('get', () => this.client.secrets().get(id));
    return { id: secret.id, key: secret.key, value: secret.value, note: secret.note };
  }

  async create(key: string, value: string, note: string): Promise<string> {
    const secret = await this.call('create', () =>
      this.client.secrets().create(this.bootstrap.org_id, key, value, note, this.projectIds())
    );
    return secret.id;
  }

  async update(id: string, key: string, value: string, note: string): Promise<void> {
    await this.call('update', () =>
      this.client.secrets().update(this.bootstrap.org_id, id, key, value, note, this.projectIds())
    );
  }
}
