import type { AuthResponse, User } from '../api/schemas';
import { clientLogger, normalizeError, type ClientLogger } from '../observability/logger';
import { ValueStream, type Listener } from '../session/streams';
import type { Unsubscribe } from '../types';
import type { TokenStore } from './TokenStore';

/** The account endpoints of the REST client. */
export interface AccountApi {
  register(name: string, email: string, password: string): Promise<AuthResponse>;
  login(email: string, password: string): Promise<AuthResponse>;
  currentUser(token: string): Promise<User>;
}

export type AuthState =
  | { status: 'signedOut' }
  | { status: 'signedIn'; user: User; token: string };

export interface AuthSessionOptions {
  api: AccountApi;
  tokens: TokenStore;
  logger?: ClientLogger;
}

export class AuthSession {
  private readonly api: AccountApi;
  private readonly tokens: TokenStore;
  private readonly logger: ClientLogger;
  private readonly stateStream: ValueStream<AuthState>;

  constructor(options: AuthSessionOptions) {
    this.api = options.api;
    this.tokens = options.tokens;
    this.logger = (options.logger ?? clientLogger).child({ component: 'auth' });
    this.stateStream = new ValueStream<AuthState>({ status: 'signedOut' }, 'auth', this.logger);
  }

  get state(): AuthState {
    return this.stateStream.value;
  }

  get token(): string | undefined {
    const state = this.stateStream.value;
    return state.status === 'signedIn' ? state.token : undefined;
  }

  onChange(listener: Listener<AuthState>): Unsubscribe {
    return this.stateStream.subscribe(listener);
  }

  /**
   * Validates a previously stored token against the server. A token that
   * cannot be read or that the server no longer accepts is removed.
   */
  async resume(): Promise<User | undefined> {
    try {
      const token = await this.tokens.load();
      if (!token) {
        return undefined;
      }
      const user = await this.api.currentUser(token);
      this.stateStream.emit({ status: 'signedIn', user, token });
      this.logger.info({ userId: user.id }, 'session resumed');
      return user;
    } catch (error) {
      this.logger.warn({ err: normalizeError(error) }, 'stored session unusable, signing out');
      await this.tokens.clear();
      this.stateStream.emit({ status: 'signedOut' });
      return undefined;
    }
  }

  async login(email: string, password: string): Promise<User> {
    return this.establish(await this.api.login(email, password));
  }

  async register(name: string, email: string, password: string): Promise<User> {
    return this.establish(await this.api.register(name, email, password));
  }

  async logout(): Promise<void> {
    await this.tokens.clear();
    this.stateStream.emit({ status: 'signedOut' });
  }

  private async establish(response: AuthResponse): Promise<User> {
    await this.tokens.save(response.token);
    this.stateStream.emit({ status: 'signedIn', user: response.user, token: response.token });
    this.logger.info({ userId: response.user.id }, 'signed in');
    return response.user;
  }
}
