import { INestApplication, RequestMethod, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { APP_INTERCEPTOR } from '@nestjs/core';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { Test } from '@nestjs/testing';

import request from 'supertest';

import { AppController } from './app.controller';
import { INJECTION_TOKENS } from './common/constants/injection-tokens';
import { AuthenticationInterceptor } from './common/interceptors/authentication.interceptor';
import { AuditService } from './modules/audit/application/audit.service';
import { AuthService } from './modules/auth/application/auth.service';
import { JwtTokenAdapter } from './modules/auth/infrastructure/adapters/jwt-token.adapter';
import { AuthController } from './modules/auth/infrastructure/controllers/auth.controller';
import { JwtStrategy } from './modules/auth/strategies/jwt.strategy';
import { BooksService } from './modules/books/application/books.service';
import { BooksController } from './modules/books/infrastructure/controllers/books.controller';
import { DeviceRegistrationService } from './modules/devices/application/device-registration.service';
import { DeviceController } from './modules/devices/infrastructure/controllers/device.controller';
import { DownloadAuthorizationService } from './modules/entitlements/application/download-authorization.service';
import { DownloadsController } from './modules/entitlements/infrastructure/controllers/downloads.controller';
import { PurchaseQueryService } from './modules/purchases/application/purchase-query.service';
import { PurchaseService } from './modules/purchases/application/purchase.service';
import { PurchasesController } from './modules/purchases/infrastructure/controllers/purchases.controller';
import { UsersService } from './modules/users/application/users.service';
import { ProfileController } from './modules/users/infrastructure/controllers/profile.controller';
import { SharedContextModule } from './shared/shared-context.module';
import {
  InMemoryStore,
  createInMemoryStore,
  createServiceMocks,
  repositoryProviders,
} from './testing/service-mocks';
const REQUEST_ID = '6f1d3c2b-8a4e-4f7a-9b1c-2d3e4f5a6b7c';

describe('HTTP flow', () => {
  let app: INestApplication;
  let store: InMemoryStore;

  beforeAll(async () => {
    store = createInMemoryStore();
    store.books.seed({
      id: 'book-1',
      title: 'The Pragmatic Reader',
      author: 'Jane Doe',
      price: 9.99,
      genre: 'Technology',
    });
    store.books.seed({ id: 'book-2', title: 'Out of Print', price: 5, isAvailable: false });

    const mocks = createServiceMocks();
    const moduleRef = await Test.createTestingModule({
      imports: [SharedContextModule],
      controllers: [
        AppController,
        AuthController,
        BooksController,
        DeviceController,
        DownloadsController,
        ProfileController,
        PurchasesController,
      ],
      providers: [
        AuthService,
        BooksService,
        DeviceRegistrationService,
        DownloadAuthorizationService,
        JwtStrategy,
        PurchaseQueryService,
        PurchaseService,
        UsersService,
        { provide: INJECTION_TOKENS.JWT_TOKEN_PORT, useClass: JwtTokenAdapter },
        ...repositoryProviders(store),
        { provide: AuditService, useValue: mocks.auditService },
        { provide: EventEmitter2, useValue: mocks.eventEmitter },
        {
          provide: ConfigService,
          useValue: new ConfigService({
            JWT_SECRET: 'test-secret-value-1234',
            MAX_DOWNLOADS_PER_PURCHASE: 3,
            DOWNLOAD_LINK_TTL_SECONDS: 600,
          }),
        },
        { provide: APP_INTERCEPTOR, useClass: AuthenticationInterceptor },
      ],
    }).compile();

    app = moduleRef.createNestApplication();
    app.setGlobalPrefix('api', {
      exclude: [{ path: 'health', method: RequestMethod.GET }],
    });
    app.useGlobalPipes(
      new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true, transform: true }),
    );
    await app.init();
  });

  afterAll(async () => {
    await app.close();
  });

  it('answers the health check outside the api prefix', async () => {
    const res = await request(app.getHttpServer()).get('/health').expect(200);

    expect(res.body.data.status).toBe('ok');
  });

  it('lists the catalog without authentication', async () => {
    const res = await request(app.getHttpServer()).get('/api/books').expect(200);

    expect(res.body.data.map((b: { id: string }) => b.id)).toEqual(['book-1']);
  });

  it('rejects a signup with unknown fields', async () => {
    const res = await request(app.getHttpServer())
      .post('/api/auth/signup')
      .send({
        email: 'reader@example.com',
        password: 'Password123!',
        firstName: 'Ada',
        lastName: 'Lovelace',
        role: 'admin',
      })
      .expect(400);

    expect(res.body.message).toEqual(['property role should not exist']);
  });

  it('requires a bearer token on protected routes', async () => {
    await request(app.getHttpServer()).get('/api/purchases').expect(401);
  });

  describe('purchase and download', () => {
    let accessToken: string;

    beforeAll(async () => {
      const res = await request(app.getHttpServer())
        .post('/api/auth/signup')
        .send({
          email: 'reader@example.com',
          password: 'Password123!',
          firstName: 'Ada',
          lastName: 'Lovelace',
        })
        .expect(201);
      accessToken = res.body.data.accessToken;
    });

    it('buys an available book once', async () => {
      const first = await request(app.getHttpServer())
        .post('/api/purchase')
        .set('Authorization', `Bearer ${accessToken}`)
        .send({ bookId: 'book-1', paymentMethod: 'credit_card' })
        .expect(201);

      expect(first.body.data).toMatchObject({
        bookId: 'book-1',
        purchasePrice: 9.99,
        status: 'completed',
      });

      const second = await request(app.getHttpServer())
        .post('/api/purchase')
        .set('Authorization', `Bearer ${accessToken}`)
        .send({ bookId: 'book-1', paymentMethod: 'credit_card' })
        .expect(409);

      expect(second.body.errors).toBe('ALREADY_OWNED');
    });

    it('refuses an unavailable book', async () => {
      const res = await request(app.getHttpServer())
        .post('/api/purchase')
        .set('Authorization', `Bearer ${accessToken}`)
        .send({ bookId: 'book-2', paymentMethod: 'credit_card' })
        .expect(422);

      expect(res.body.errors).toBe('BOOK_UNAVAILABLE');
    });

    it('reports ownership per book', async () => {
      const owned = await request(app.getHttpServer())
        .get('/api/books/check-ownership/book-1')
        .set('Authorization', `Bearer ${accessToken}`)
        .expect(200);
      const notOwned = await request(app.getHttpServer())
        .get('/api/books/check-ownership/book-2')
        .set('Authorization', `Bearer ${accessToken}`)
        .expect(200);

      expect(owned.body.data).toEqual({ bookId: 'book-1', owned: true });
      expect(notOwned.body.data).toEqual({ bookId: 'book-2', owned: false });
    });

    it('needs a registered device before downloading', async () => {
      const denied = await request(app.getHttpServer())
        .get('/api/download-authorization')
        .query({ bookId: 'book-1' })
        .set('Authorization', `Bearer ${accessToken}`)
        .expect(200);

      expect(denied.body.data).toEqual({
        permitted: false,
        reason: 'NO_DEVICE',
        message: 'Registra un dispositivo para descargar libros',
      });

      await request(app.getHttpServer())
        .post('/api/device')
        .set('Authorization', `Bearer ${accessToken}`)
        .send({ deviceId: 'ios-123', deviceName: 'iPhone' })
        .expect(200);

      const allowed = await request(app.getHttpServer())
        .get('/api/download-authorization')
        .query({ bookId: 'book-1' })
        .set('Authorization', `Bearer ${accessToken}`)
        .expect(200);

      expect(allowed.body.data).toMatchObject({
        permitted: true,
        deviceId: 'ios-123',
        downloadsRemaining: 3,
      });
    });

    it('consumes one download per link', async () => {
      const res = await request(app.getHttpServer())
        .get('/api/books/book-1/download')
        .set('Authorization', `Bearer ${accessToken}`)
        .expect(200);

      expect(res.body.data.expiresIn).toBe(600);
      expect(res.body.data.downloadsRemaining).toBe(2);
    });

    it('propagates a valid incoming request id', async () => {
      const res = await request(app.getHttpServer())
        .get('/api/purchases')
        .set('Authorization', `Bearer ${accessToken}`)
        .set('x-request-id', REQUEST_ID)
        .expect(200);

      expect(res.body.meta.requestId).toBe(REQUEST_ID);
      expect(res.body.data).toHaveLength(1);
    });

    it('does not accept the refresh token as bearer', async () => {
      const login = await request(app.getHttpServer())
        .post('/api/auth/login')
        .send({ email: 'reader@example.com', password: 'Password123!' })
        .expect(200);

      await request(app.getHttpServer())
        .get('/api/auth/me')
        .set('Authorization', `Bearer ${login.body.data.refreshToken}`)
        .expect(401);
    });
  });
});
