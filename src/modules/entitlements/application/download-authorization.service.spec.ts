import { HttpStatus } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';

import {
  InMemoryStore,
  ServiceMocks,
  createInMemoryStore,
  createServiceMocks,
  mockProviders,
  repositoryProviders,
} from '../../../testing/service-mocks';
import { DeviceRegistrationService } from '../../devices/application/device-registration.service';
import { PurchaseService } from '../../purchases/application/purchase.service';
import { DownloadGrantedEvent } from '../domain/events/download-granted.event';
import { DownloadAuthorizationService } from './download-authorization.service';

describe('DownloadAuthorizationService', () => {
  let service: DownloadAuthorizationService;
  let purchaseService: PurchaseService;
  let deviceService: DeviceRegistrationService;
  let store: InMemoryStore;
  let mocks: ServiceMocks;

  beforeEach(async () => {
    store = createInMemoryStore();
    mocks = createServiceMocks({ MAX_DOWNLOADS_PER_PURCHASE: 2, DOWNLOAD_LINK_TTL_SECONDS: 900 });

    store.users.seed({ id: 'U1', email: 'u1@example.com' });
    store.books.seed({ id: 'B1', title: 'The Salt Cartographer', price: 9.99 });
    store.books.seed({ id: 'B2', title: 'Lanterns Under Ice', price: 12.5 });

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DownloadAuthorizationService,
        PurchaseService,
        DeviceRegistrationService,
        ...repositoryProviders(store),
        ...mockProviders(mocks),
      ],
    }).compile();

    service = module.get<DownloadAuthorizationService>(DownloadAuthorizationService);
    purchaseService = module.get<PurchaseService>(PurchaseService);
    deviceService = module.get<DeviceRegistrationService>(DeviceRegistrationService);
  });

  it('walks the purchase → device → download flow', async () => {
    const bought = await purchaseService.purchase('U1', 'B1', 'card');
    expect(bought.data?.status).toBe('completed');
    expect(bought.data?.purchasePrice).toBe(9.99);

    const withoutDevice = await service.authorizeDownload('U1', 'B1');
    expect(withoutDevice.statusCode).toBe(HttpStatus.OK);
    expect(withoutDevice.data).toEqual({
      permitted: false,
      reason: 'NO_DEVICE',
      message: 'Registra un dispositivo para descargar libros',
    });

    await deviceService.registerDevice('U1', 'ios-123', "U1's iPhone");

    const permitted = await service.authorizeDownload('U1', 'B1');
    expect(permitted.data).toEqual({
      permitted: true,
      purchaseId: bought.data?.purchaseId,
      deviceId: 'ios-123',
      downloadsRemaining: 2,
    });
  });

  describe('authorizeDownload', () => {
    it('denies NOT_PURCHASED for a book the user never bought', async () => {
      await deviceService.registerDevice('U1', 'ios-123', 'iPhone');

      const response = await service.authorizeDownload('U1', 'B2');

      expect(response.ok).toBe(true);
      expect(response.message).toBe('No has comprado este libro');
      expect(response.data).toMatchObject({ permitted: false, reason: 'NOT_PURCHASED' });
    });

    it('reports NOT_PURCHASED first when both conditions fail', async () => {
      const response = await service.authorizeDownload('U1', 'B2');

      expect(response.data).toMatchObject({ permitted: false, reason: 'NOT_PURCHASED' });
    });

    it('denies again once the device is unregistered', async () => {
      await purchaseService.purchase('U1', 'B1', 'card');
      await deviceService.registerDevice('U1', 'ios-123', 'iPhone');
      await deviceService.unregisterDevice('U1');

      const response = await service.authorizeDownload('U1', 'B1');

      expect(response.data).toMatchObject({ permitted: false, reason: 'NO_DEVICE' });
    });

    it('denies NOT_PURCHASED after a refund', async () => {
      const bought = await purchaseService.purchase('U1', 'B1', 'card');
      await deviceService.registerDevice('U1', 'ios-123', 'iPhone');
      await purchaseService.refund('U1', bought.data?.purchaseId ?? '');

      const response = await service.authorizeDownload('U1', 'B1');

      expect(response.data).toMatchObject({ permitted: false, reason: 'NOT_PURCHASED' });
    });

    it('returns 404 for an unknown user', async () => {
      const response = await service.authorizeDownload('ghost', 'B1');

      expect(response.statusCode).toBe(HttpStatus.NOT_FOUND);
      expect(response.errors).toBe('USER_NOT_FOUND');
    });

    it('does not consume downloads', async () => {
      await purchaseService.purchase('U1', 'B1', 'card');
      await deviceService.registerDevice('U1', 'ios-123', 'iPhone');

      await service.authorizeDownload('U1', 'B1');
      await service.authorizeDownload('U1', 'B1');

      expect(store.purchases.all()[0].downloadCount).toBe(0);
    });
  });

  describe('download', () => {
    beforeEach(async () => {
      await purchaseService.purchase('U1', 'B1', 'card');
      await deviceService.registerDevice('U1', 'ios-123', 'iPhone');
    });

    it('consumes a download and returns a temporary link', async () => {
      const purchaseId = store.purchases.all()[0].id;

      const response = await service.download('U1', 'B1');

      expect(response.statusCode).toBe(HttpStatus.OK);
      expect(response.data).toEqual({
        downloadUrl: `/downloads/B1/${purchaseId}`,
        expiresIn: 900,
        downloadsRemaining: 1,
      });
      expect(store.purchases.all()[0].downloadCount).toBe(1);
      expect(mocks.eventEmitter.emit).toHaveBeenCalledWith(
        'download.granted',
        expect.any(DownloadGrantedEvent),
      );
    });

    it('rejects with DOWNLOAD_LIMIT_REACHED once the limit is used up', async () => {
      await service.download('U1', 'B1');
      await service.download('U1', 'B1');

      const response = await service.download('U1', 'B1');

      expect(response.statusCode).toBe(HttpStatus.FORBIDDEN);
      expect(response.errors).toBe('DOWNLOAD_LIMIT_REACHED');
      expect(store.purchases.all()[0].downloadCount).toBe(2);
    });

    it('rejects with 403 NO_DEVICE without a registered device', async () => {
      await deviceService.unregisterDevice('U1');

      const response = await service.download('U1', 'B1');

      expect(response.statusCode).toBe(HttpStatus.FORBIDDEN);
      expect(response.errors).toBe('NO_DEVICE');
    });

    it('rejects with 403 NOT_PURCHASED for a book not owned', async () => {
      const response = await service.download('U1', 'B2');

      expect(response.statusCode).toBe(HttpStatus.FORBIDDEN);
      expect(response.errors).toBe('NOT_PURCHASED');
    });

    it('returns 404 for an unknown book', async () => {
      const response = await service.download('U1', 'missing');

      expect(response.statusCode).toBe(HttpStatus.NOT_FOUND);
      expect(response.errors).toBe('BOOK_NOT_FOUND');
    });
  });
});
