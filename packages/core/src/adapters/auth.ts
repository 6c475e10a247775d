/**
 * @circles/core: Authentication Adapter
 *
 * Token storage and refresh live outside the client core (keychain,
 * browser storage, etc.). The core only needs to read the current access
 * token and to ask for a refresh after a 401.
 */

export interface AuthTokenProvider {
  /** Current bearer token, or null for anonymous callers. */
  getAccessToken(): string | null;

  /** Exchange the refresh token for a new access token. */
  refreshAccessToken(): Promise<void>;
}

/** Provider for unauthenticated sessions (taxonomy browsing, tests). */
export class AnonymousAuth implements AuthTokenProvider {
  getAccessToken(): string | null {
    return null;
  }

  async refreshAccessToken(): Promise<void> {}
}

/** Holds a token in memory; `onRefresh` supplies the next one. */
export class StaticTokenAuth implements AuthTokenProvider {
  constructor(
    private token: string | null,
    private onRefresh?: () => Promise<string | null>,
  ) {}

  getAccessToken(): string | null {
    return this.token;
  }

  setAccessToken(token: string | null): void {
    this.token = token;
  }

  async refreshAccessToken(): Promise<void> {
    if (!this.onRefresh) return;
    this.token = await this.onRefresh();
  }
}
