/**
 * Remote secret store contract
 */

/**
 * A secret as returned by the store
 */
export interface Secret {
  id: string;
  key: string;
  value: string;
  // Free text, carries a serialized RefreshNote for token secrets
  note: string;
}

/**
 * Key-value secrets scoped to one organization and project.
 * Every operation rejects with a RemoteError on transport or auth failure.
 */
export interface SecretStore {
  /**
   * Map every logical key name to the store's identifier
   */
  list(): Promise<Map<string, string>>;

  /**
   * Fetch one secret by identifier
   */
  get(id: string): Promise<Secret>;

  /**
   * Create a secret and return its identifier
   */
  create(key: string, value: string, note: string): Promise<string>;

  /**
   * Replace the key, value and note of an existing secret
   */
  update(id: string, key: string, value: string, note: string): Promise<void>;
}
