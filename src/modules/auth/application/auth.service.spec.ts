import { HttpStatus } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';

import { INJECTION_TOKENS } from '../../../common/constants/injection-tokens';
import {
  InMemoryStore,
  ServiceMocks,
  TEST_REQUEST_ID,
  createInMemoryStore,
  createServiceMocks,
  mockProviders,
  repositoryProviders,
} from '../../../testing/service-mocks';
import { UsersService } from '../../users/application/users.service';
import { UserRegisteredEvent } from '../../users/domain/events/user.events';
import type { IJwtTokenPort } from '../domain/ports/jwt-token.port';
import { JwtTokenAdapter } from '../infrastructure/adapters/jwt-token.adapter';
import { AuthService } from './auth.service';

const SIGNUP = {
  email: 'Reader@Example.com',
  password: 'Password123!',
  firstName: 'Ada',
  lastName: 'Lovelace',
};

describe('AuthService', () => {
  let service: AuthService;
  let tokens: IJwtTokenPort;
  let store: InMemoryStore;
  let mocks: ServiceMocks;

  beforeEach(async () => {
    store = createInMemoryStore();
    mocks = createServiceMocks({
      JWT_SECRET: 'test-secret-value-1234',
      JWT_ACCESS_TTL_SECONDS: 900,
    });

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AuthService,
        UsersService,
        { provide: INJECTION_TOKENS.JWT_TOKEN_PORT, useClass: JwtTokenAdapter },
        ...repositoryProviders(store),
        ...mockProviders(mocks),
      ],
    }).compile();

    service = module.get<AuthService>(AuthService);
    tokens = module.get<IJwtTokenPort>(INJECTION_TOKENS.JWT_TOKEN_PORT);
  });

  describe('signup', () => {
    it('creates the user and returns a session', async () => {
      const response = await service.signup(SIGNUP);

      expect(response.statusCode).toBe(HttpStatus.CREATED);
      expect(response.message).toBe('Usuario registrado exitosamente');
      expect(response.data?.tokenType).toBe('Bearer');
      expect(response.data?.expiresIn).toBe(900);
      expect(response.data?.user.email).toBe('reader@example.com');

      const userId = response.data?.user.id ?? '';
      expect(tokens.verify(response.data?.accessToken ?? '')).toMatchObject({
        sub: `user:${userId}`,
        typ: 'access',
      });
      expect(tokens.verify(response.data?.refreshToken ?? '')).toMatchObject({
        sub: `user:${userId}`,
        typ: 'refresh',
      });
    });

    it('stores an argon2 hash instead of the password', async () => {
      const response = await service.signup(SIGNUP);

      const stored = store.users.snapshot(response.data?.user.id ?? '');
      expect(stored?.passwordHash.startsWith('$argon2')).toBe(true);
    });

    it('emits user.registered', async () => {
      const response = await service.signup(SIGNUP);

      expect(mocks.eventEmitter.emit).toHaveBeenCalledWith(
        'user.registered',
        expect.any(UserRegisteredEvent),
      );
      const [, event] = mocks.eventEmitter.emit.mock.calls[0];
      expect(event).toMatchObject({
        userId: response.data?.user.id,
        email: 'reader@example.com',
        requestId: TEST_REQUEST_ID,
      });
    });

    it('rejects an email already registered in another case', async () => {
      await service.signup(SIGNUP);

      const response = await service.signup({ ...SIGNUP, email: 'READER@example.com' });

      expect(response.statusCode).toBe(HttpStatus.CONFLICT);
      expect(response.errors).toBe('EMAIL_TAKEN');
      expect(mocks.auditService.logDeny).toHaveBeenCalledWith(
        'AUTH_SIGNUP',
        'user',
        'reader@example.com',
        'EMAIL_TAKEN',
        expect.objectContaining({ module: 'auth' }),
      );
    });
  });

  describe('login', () => {
    beforeEach(async () => {
      await service.signup(SIGNUP);
    });

    it('returns a session for valid credentials', async () => {
      const response = await service.login({
        email: 'reader@example.com',
        password: 'Password123!',
      });

      expect(response.statusCode).toBe(HttpStatus.OK);
      expect(response.message).toBe('Login exitoso');
      expect(response.data?.user.email).toBe('reader@example.com');
    });

    it('rejects a wrong password with 401', async () => {
      const response = await service.login({
        email: 'reader@example.com',
        password: 'WrongPassword1!',
      });

      expect(response.statusCode).toBe(HttpStatus.UNAUTHORIZED);
      expect(response.errors).toBe('INVALID_CREDENTIALS');
      expect(response.data).toBeUndefined();
    });

    it('answers an unknown email like a wrong password', async () => {
      const response = await service.login({
        email: 'nobody@example.com',
        password: 'Password123!',
      });

      expect(response.statusCode).toBe(HttpStatus.UNAUTHORIZED);
      expect(response.errors).toBe('INVALID_CREDENTIALS');
    });
  });

  describe('refresh', () => {
    it('issues a new access token from a refresh token', async () => {
      const session = await service.signup(SIGNUP);

      const response = await service.refresh({
        refreshToken: session.data?.refreshToken ?? '',
      });

      expect(response.statusCode).toBe(HttpStatus.OK);
      expect(response.data?.expiresIn).toBe(900);
      expect(tokens.verify(response.data?.accessToken ?? '')?.typ).toBe('access');
    });

    it('rejects an access token', async () => {
      const session = await service.signup(SIGNUP);

      const response = await service.refresh({
        refreshToken: session.data?.accessToken ?? '',
      });

      expect(response.statusCode).toBe(HttpStatus.UNAUTHORIZED);
      expect(response.errors).toBe('INVALID_REFRESH_TOKEN');
    });

    it('returns 404 once the account is disabled', async () => {
      const session = await service.signup(SIGNUP);
      await store.users.disable(session.data?.user.id ?? '');

      const response = await service.refresh({
        refreshToken: session.data?.refreshToken ?? '',
      });

      expect(response.statusCode).toBe(HttpStatus.NOT_FOUND);
    });
  });

  describe('logout', () => {
    it('audits the logout', () => {
      const response = service.logout('user-1');

      expect(response.statusCode).toBe(HttpStatus.OK);
      expect(mocks.auditService.logAllow).toHaveBeenCalledWith(
        'AUTH_LOGOUT',
        'user',
        'user-1',
        expect.objectContaining({ module: 'auth' }),
      );
    });
  });
});
