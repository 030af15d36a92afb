import bcrypt from 'bcryptjs';
import jwt from 'jsonwebtoken';
import { createAuthService, requireAdmin } from '../src/storefront/auth';
import { ADMIN, CUSTOMER, TIMESTAMP, createStorefrontStore, silenceLogs } from './support/fixtures';

const SECRET = 'test-secret';

let store: ReturnType<typeof createStorefrontStore>;
let auth: ReturnType<typeof createAuthService>;

beforeEach(() => {
  silenceLogs();
  store = createStorefrontStore();
  auth = createAuthService({ store, jwtSecret: SECRET });
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('register / login', () => {
  test('register then login with the same credentials succeeds', async () => {
    const registered = await auth.register({ email: 'player@example.com', password: 'hunter2', name: 'Player' });
    const loggedIn = await auth.login({ email: 'player@example.com', password: 'hunter2' });

    expect(registered.token_type).toBe('bearer');
    expect(loggedIn.token_type).toBe('bearer');
    const principal = await auth.authenticate(loggedIn.access_token);
    expect(principal).toMatchObject({ email: 'player@example.com', role: 'user' });
  });

  test('stores a salted hash, never the password, with the default role', async () => {
    await auth.register({ email: 'player@example.com', password: 'hunter2' });

    const [user] = store.all('user');
    expect(user).toMatchObject({ email: 'player@example.com', name: null, role: 'user' });
    expect(user?.password_hash).not.toBe('hunter2');
    expect(user?.password_hash).toMatch(/^\$2[aby]\$10\$/);
  });

  test('token carries sub, role and a 12-hour expiry', async () => {
    const { access_token } = await auth.register({ email: 'player@example.com', password: 'hunter2' });

    const payload = jwt.verify(access_token, SECRET);
    if (typeof payload === 'string') throw new Error('expected an object payload');
    expect(payload.sub).toBe('player@example.com');
    expect(payload['role']).toBe('user');
    expect((payload.exp ?? 0) - (payload.iat ?? 0)).toBe(12 * 60 * 60);
  });

  test('registering an existing email → BadRequest', async () => {
    await auth.register({ email: 'player@example.com', password: 'hunter2' });

    await expect(auth.register({ email: 'player@example.com', password: 'other' })).rejects.toMatchObject({
      statusCode: 400,
      message: 'Email already registered',
    });
    expect(store.all('user')).toHaveLength(1);
  });

  test('wrong password and unknown email fail with the same error', async () => {
    await auth.register({ email: 'player@example.com', password: 'hunter2' });

    const wrongPassword = await auth.login({ email: 'player@example.com', password: 'nope' }).catch((err: unknown) => err);
    const unknownEmail = await auth.login({ email: 'ghost@example.com', password: 'hunter2' }).catch((err: unknown) => err);

    expect(wrongPassword).toMatchObject({ statusCode: 400, code: 'BAD_REQUEST', message: 'Invalid credentials' });
    expect(unknownEmail).toMatchObject({ statusCode: 400, code: 'BAD_REQUEST', message: 'Invalid credentials' });
  });

  test('login issues the stored role', async () => {
    await store.create('user', {
      email: 'boss@example.com',
      name: null,
      password_hash: await bcrypt.hash('letmein', 4),
      role: 'admin',
      created_at: TIMESTAMP,
      updated_at: TIMESTAMP,
    });

    const { access_token } = await auth.login({ email: 'boss@example.com', password: 'letmein' });

    await expect(auth.authenticate(access_token)).resolves.toMatchObject({ email: 'boss@example.com', role: 'admin' });
  });
});

describe('authenticate', () => {
  test('missing token → Unauthorized "Missing token"', async () => {
    await expect(auth.authenticate(undefined)).rejects.toMatchObject({ statusCode: 401, message: 'Missing token' });
  });

  test('garbled token → Unauthorized', async () => {
    await expect(auth.authenticate('not-a-jwt')).rejects.toMatchObject({ statusCode: 401, message: 'Could not validate credentials' });
  });

  test('token signed with another secret → Unauthorized', async () => {
    await auth.register({ email: 'player@example.com', password: 'hunter2' });
    const forged = jwt.sign({ sub: 'player@example.com', role: 'admin' }, 'other-secret');

    await expect(auth.authenticate(forged)).rejects.toMatchObject({ statusCode: 401 });
  });

  test('expired token → Unauthorized', async () => {
    await auth.register({ email: 'player@example.com', password: 'hunter2' });
    const expired = jwt.sign({ sub: 'player@example.com', role: 'user', exp: Math.floor(Date.now() / 1000) - 60 }, SECRET);

    await expect(auth.authenticate(expired)).rejects.toMatchObject({ statusCode: 401 });
  });

  test('token without subject → Unauthorized', async () => {
    const token = jwt.sign({ role: 'user' }, SECRET);

    await expect(auth.authenticate(token)).rejects.toMatchObject({ statusCode: 401 });
  });

  test('token for an unknown user → Unauthorized', async () => {
    const { access_token } = auth.issueToken('ghost@example.com', 'user');

    await expect(auth.authenticate(access_token)).rejects.toMatchObject({ statusCode: 401 });
  });
});

describe('requireAdmin', () => {
  test('admins pass', () => {
    expect(() => requireAdmin(ADMIN)).not.toThrow();
  });

  test('users → Forbidden', () => {
    expect(() => requireAdmin(CUSTOMER)).toThrow('Admin only');
  });
});
