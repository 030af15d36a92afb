import bcrypt from 'bcryptjs';
import jwt from 'jsonwebtoken';
import { where } from '../shared/document-store';
import { BadRequestError, DuplicateDocumentError, ForbiddenError, UnauthorizedError } from '../shared/errors';
import { log } from '../shared/log';
import type { Principal, Role, StorefrontStore, User } from './types';

const TOKEN_TTL = '12h';
const BCRYPT_ROUNDS = 10;

export interface TokenResponse {
  access_token: string;
  token_type: 'bearer';
}

export interface AuthDeps {
  store: StorefrontStore;
  jwtSecret: string;
}

const user = where<User>();

function isRole(value: unknown): value is Role {
  return value === 'user' || value === 'admin';
}

export function createAuthService({ store, jwtSecret }: AuthDeps) {
  function issueToken(email: string, role: Role): TokenResponse {
    const access_token = jwt.sign({ sub: email, role }, jwtSecret, { algorithm: 'HS256', expiresIn: TOKEN_TTL });
    return { access_token, token_type: 'bearer' };
  }

  async function findUserByEmail(email: string): Promise<User | null> {
    const [found] = await store.find('user', [user.eq('email', email)], 1);
    return found ?? null;
  }

  async function register(input: { email: string; password: string; name?: string | undefined }): Promise<TokenResponse> {
    if (await findUserByEmail(input.email)) {
      throw new BadRequestError('Email already registered');
    }

    const now = new Date().toISOString();
    const password_hash = await bcrypt.hash(input.password, BCRYPT_ROUNDS);
    try {
      await store.create(
        'user',
        { email: input.email, name: input.name ?? null, password_hash, role: 'user', created_at: now, updated_at: now },
        { unique: 'email' }
      );
    } catch (err) {
      if (err instanceof DuplicateDocumentError) {
        throw new BadRequestError('Email already registered');
      }
      throw err;
    }

    log({ level: 'info', action: 'auth.register', email: input.email });
    return issueToken(input.email, 'user');
  }

  async function login(input: { email: string; password: string }): Promise<TokenResponse> {
    const found = await findUserByEmail(input.email);
    // Same message for unknown email and wrong password.
    if (!found || !(await bcrypt.compare(input.password, found.password_hash))) {
      throw new BadRequestError('Invalid credentials');
    }
    return issueToken(found.email, found.role);
  }

  /** Resolves a bearer token to its principal; any failure is a 401. */
  async function authenticate(token: string | undefined): Promise<Principal> {
    if (!token) {
      throw new UnauthorizedError('Missing token');
    }

    let email: string;
    let role: Role;
    try {
      const payload = jwt.verify(token, jwtSecret, { algorithms: ['HS256'] });
      if (typeof payload === 'string' || typeof payload.sub !== 'string' || payload.sub === '') {
        throw new UnauthorizedError();
      }
      email = payload.sub;
      const claim: unknown = payload['role'];
      role = isRole(claim) ? claim : 'user';
    } catch {
      throw new UnauthorizedError();
    }

    const found = await findUserByEmail(email);
    if (!found) {
      throw new UnauthorizedError();
    }
    return { id: found.id, email, role };
  }

  return { register, login, authenticate, issueToken };
}

export type AuthService = ReturnType<typeof createAuthService>;

export function requireAdmin(principal: Principal): void {
  if (principal.role !== 'admin') {
    throw new ForbiddenError('Admin only');
  }
}
