import { signupSchema, type Signup, type User } from "@shared/schema";
import type { IStorage, UserUpdate } from "../storage";
import type { CredentialService } from "./credentialService";
import type { IssuedToken, TokenService } from "./tokenService";
import { AuthenticationError, ConflictError, NotFoundError } from "../errors";
import { generateRid } from "../utils/rid";
import { logger } from "../logger";
import { parseOrThrow } from "../utils/validation";

export const INCORRECT_LOGIN_MESSAGE = "Incorrect email or password";

export type PublicUser = Omit<User, "passwordHash">;

export function toPublicUser(user: User): PublicUser {
  const { passwordHash: _passwordHash, ...rest } = user;
  return rest;
}

/**
 * Account lifecycle: signup, password login, profile and admin status updates.
 * Login failures never reveal whether the e-mail exists.
 */
export class UserService {
  // Compared against when the e-mail is unknown, so every login costs one bcrypt check.
  private dummyHash?: Promise<string>;

  constructor(
    private readonly storage: IStorage,
    private readonly credentials: CredentialService,
    private readonly tokens: TokenService,
  ) {}

  async signup(data: Signup, options: { isAdmin?: boolean } = {}): Promise<User> {
    const email = data.email.toLowerCase();
    const passwordHash = await this.credentials.hash(data.password);

    const user = await this.storage.createUser({
      id: generateRid("user"),
      email,
      passwordHash,
      fullName: data.fullName ?? null,
      isActive: true,
      isAdmin: options.isAdmin ?? false,
    });
    if (!user) {
      throw new ConflictError("A user with this email already exists");
    }

    logger.info('[Users] Account created', { userId: user.id });
    return user;
  }

  async login(email: string, password: string): Promise<IssuedToken> {
    const user = await this.storage.getUserByEmail(email.toLowerCase());
    const passwordHash = user ? user.passwordHash : await this.getDummyHash();
    const passwordMatches = await this.credentials.verify(password, passwordHash);

    if (!user || !passwordMatches || !user.isActive) {
      logger.warn('[Users] Login rejected', {
        reason: !user ? 'unknown_email' : !passwordMatches ? 'wrong_password' : 'inactive',
      });
      throw new AuthenticationError(INCORRECT_LOGIN_MESSAGE);
    }

    return this.tokens.issue(user.id);
  }

  refresh(token: string): IssuedToken {
    const issued = this.tokens.refresh(token);
    if (!issued) {
      throw new AuthenticationError();
    }
    return issued;
  }

  async getById(id: string): Promise<User> {
    const user = await this.storage.getUser(id);
    if (!user) {
      throw new NotFoundError("User not found");
    }
    return user;
  }

  async updateProfile(id: string, fullName: string | null): Promise<User> {
    return await this.update(id, { fullName });
  }

  async listUsers(): Promise<User[]> {
    return await this.storage.listUsers();
  }

  async updateStatus(id: string, status: Pick<UserUpdate, "isActive" | "isAdmin">): Promise<User> {
    const user = await this.update(id, status);
    logger.info('[Users] Status updated', { userId: id, ...status });
    return user;
  }

  /** Creates the configured superuser unless that e-mail is already registered. */
  async ensureSuperuser(email: string, password: string): Promise<void> {
    const credentials = parseOrThrow(signupSchema, { email, password });
    const existing = await this.storage.getUserByEmail(credentials.email);
    if (existing) {
      return;
    }
    try {
      const user = await this.signup(credentials, { isAdmin: true });
      logger.info('[Users] First superuser created', { userId: user.id });
    } catch (error) {
      // Another instance seeded it between the lookup and the insert.
      if (error instanceof ConflictError) {
        return;
      }
      throw error;
    }
  }

  private getDummyHash(): Promise<string> {
    this.dummyHash ??= this.credentials.hash("unknown-account-placeholder");
    return this.dummyHash;
  }

  private async update(id: string, data: UserUpdate): Promise<User> {
    const user = await this.storage.updateUser(id, data);
    if (!user) {
      throw new NotFoundError("User not found");
    }
    return user;
  }
}
