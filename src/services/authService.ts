/**
 * Password hashing and signed session tokens
 */

import bcrypt from 'bcrypt';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { Settings } from '../config/settings.js';
import type { ClubUserWithRole } from '../models/ClubUser.js';
import type { Repositories } from '../persistence/index.js';
import { AuthenticationError } from '../utils/errors.js';
import { createLogger } from '../utils/loggingConfig.js';
import { parseInput } from '../utils/validation.js';

const logger = createLogger('auth');

export const LoginSchema = z.object({
  email: z.string().trim().min(1, 'This field is required.'),
  password: z.string().min(1, 'This field is required.'),
});

const TokenPayloadSchema = z.object({
  sub: z.string().regex(/^\d+$/),
});

const INVALID_LOGIN =
  'Please enter a correct email and password. Note that both fields may be case-sensitive.';

export async function hashPassword(password: string): Promise<string> {
  return bcrypt.hash(password, Settings.BCRYPT_ROUNDS);
}

export async function verifyPassword(password: string, hash: string): Promise<boolean> {
  if (!hash) {
    return false;
  }
  return bcrypt.compare(password, hash);
}

export interface LoginResult {
  token: string;
  user: ClubUserWithRole;
}

export class AuthService {
  constructor(
    private readonly repos: Repositories,
    private readonly secret: string = Settings.SESSION_SECRET,
  ) {}

  signToken(userId: number): string {
    return jwt.sign({ sub: String(userId) }, this.secret, {
      expiresIn: Settings.getSessionMaxAgeSeconds(),
    });
  }

  /**
   * User id carried by a valid token, or null when the token is bad or expired
   */
  verifyToken(token: string): number | null {
    try {
      const decoded = jwt.verify(token, this.secret);
      const payload = TokenPayloadSchema.safeParse(decoded);
      return payload.success ? Number(payload.data.sub) : null;
    } catch (error) {
      logger.debug('Rejected session token', error);
      return null;
    }
  }

  /**
   * Load the token's user with their role. Inactive users resolve to null.
   */
  resolveUser(token: string): ClubUserWithRole | null {
    const userId = this.verifyToken(token);
    if (userId === null) {
      return null;
    }
    const user = this.repos.users.findWithRole(userId);
    return user && user.isActive ? user : null;
  }

  async login(input: unknown): Promise<LoginResult> {
    const { email, password } = parseInput(LoginSchema, input);
    const found = this.repos.users.findByEmail(email);
    if (!found || !found.isActive || !(await verifyPassword(password, found.passwordHash))) {
      logger.warn(`Failed login attempt for ${email}`);
      throw new AuthenticationError(INVALID_LOGIN);
    }

    this.repos.users.touchLastLogin(found.id);
    const user = this.repos.users.findWithRole(found.id);
    if (!user) {
      throw new AuthenticationError(INVALID_LOGIN);
    }
    logger.info(`User logged in: ${user.email}`);
    return { token: this.signToken(user.id), user };
  }
}
