import type { KeyValueStore } from './KeyValueStore';

export const AUTH_TOKEN_KEY = 'auth_token';

/** Persists the single bearer token used for silent resume. */
export class TokenStore {
  constructor(private readonly store: KeyValueStore) {}

  async load(): Promise<string | undefined> {
    const token = await this.store.get(AUTH_TOKEN_KEY);
    return token && token.trim().length > 0 ? token : undefined;
  }

  save(token: string): Promise<void> {
    return this.store.set(AUTH_TOKEN_KEY, token);
  }

  async clear(): Promise<void> {
    await this.store.delete(AUTH_TOKEN_KEY);
  }
}
