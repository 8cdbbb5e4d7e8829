import type { NewUser, User } from '../domain/user';
import { withoutDigest } from '../domain/user';
import { conflict, forbidden, unauthenticated } from '../errors';
import type { UserRepository } from '../repositories/userRepository';
import type { AccessToken, TokenService } from './tokenService';

export class AuthService {
  constructor(
    private readonly users: UserRepository,
    private readonly tokens: TokenService,
  ) {}

  async register(input: NewUser): Promise<User> {
    // Fast path only; the unique indexes reject whatever races past these.
    if (await this.users.findByEmail(input.email)) {
      throw conflict('Email already registered');
    }
    if (await this.users.findByUsername(input.username)) {
      throw conflict('Username already taken');
    }

    return this.users.create(input);
  }

  /** Bad credentials are 401; a disabled account with correct credentials is 403. */
  async login(email: string, password: string, failureMessage = 'Invalid email or password'): Promise<AccessToken> {
    const user = await this.users.verifyCredentials(email, password);
    if (!user) throw unauthenticated(failureMessage);
    if (!user.isActive) throw forbidden('User account is disabled');

    return this.tokens.issue(user);
  }

  /**
   * Resolves a bearer token to its user. Fails for an invalid or expired token
   * and for a token whose user no longer exists. Does not look at `isActive`.
   */
  async authenticate(rawToken: string): Promise<User> {
    const userId = this.tokens.validate(rawToken);
    const record = await this.users.findById(userId);
    if (!record) throw unauthenticated();

    return withoutDigest(record);
  }

  refresh(user: User): AccessToken {
    return this.tokens.issue(user);
  }
}
