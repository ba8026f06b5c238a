import { HttpStatus } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';

import {
  ServiceMocks,
  createInMemoryStore,
  createServiceMocks,
  mockProviders,
  repositoryProviders,
  InMemoryStore,
} from '../../../testing/service-mocks';
import { PurchaseStatus } from '../domain/entities/purchase.entity';
import { PurchaseCompletedEvent } from '../domain/events/purchase.events';
import { PurchaseService } from './purchase.service';

describe('PurchaseService', () => {
  let service: PurchaseService;
  let store: InMemoryStore;
  let mocks: ServiceMocks;

  const completedRows = (): number =>
    store.purchases.all().filter((p) => p.status === PurchaseStatus.COMPLETED).length;

  beforeEach(async () => {
    store = createInMemoryStore();
    mocks = createServiceMocks({ MAX_DOWNLOADS_PER_PURCHASE: 3 });

    store.users.seed({ id: 'user-1', email: 'reader@example.com' });
    store.users.seed({ id: 'user-2', email: 'other@example.com' });
    store.books.seed({ id: 'book-1', title: 'The Salt Cartographer', price: 9.99 });
    store.books.seed({ id: 'book-2', title: 'Withdrawn Title', price: 4.5, isAvailable: false });

    const module: TestingModule = await Test.createTestingModule({
      providers: [PurchaseService, ...repositoryProviders(store), ...mockProviders(mocks)],
    }).compile();

    service = module.get<PurchaseService>(PurchaseService);
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  describe('purchase', () => {
    it('completes a purchase and records the entitlement', async () => {
      const response = await service.purchase('user-1', 'book-1', 'card');

      expect(response.ok).toBe(true);
      expect(response.statusCode).toBe(HttpStatus.CREATED);
      expect(response.message).toBe('Libro comprado exitosamente');
      expect(response.data).toMatchObject({
        status: PurchaseStatus.COMPLETED,
        bookId: 'book-1',
        purchasePrice: 9.99,
        downloadUrl: '/books/book-1/download',
      });
      expect(response.data?.transactionId).toMatch(/^txn_/);

      const [row] = store.purchases.all();
      expect(row.id).toBe(response.data?.purchaseId);
      expect(row.maxDownloads).toBe(3);
      expect(row.paymentMethod).toBe('card');
      expect(store.users.snapshot('user-1')?.purchasedBookIds).toEqual(['book-1']);
    });

    it('emits purchase.completed and audits the purchase', async () => {
      await service.purchase('user-1', 'book-1', 'card');

      expect(mocks.eventEmitter.emit).toHaveBeenCalledWith(
        'purchase.completed',
        expect.any(PurchaseCompletedEvent),
      );
      expect(mocks.auditService.logAllow).toHaveBeenCalledWith(
        'PURCHASE_COMPLETED',
        'purchase',
        'user-1',
        expect.objectContaining({ module: 'purchases' }),
      );
    });

    it('rejects a second purchase of an owned book with ALREADY_OWNED', async () => {
      await service.purchase('user-1', 'book-1', 'card');
      const second = await service.purchase('user-1', 'book-1', 'card');

      expect(second.ok).toBe(false);
      expect(second.statusCode).toBe(HttpStatus.CONFLICT);
      expect(second.errors).toBe('ALREADY_OWNED');
      expect(second.message).toBe('Ya posees este libro');
      expect(store.purchases.all()).toHaveLength(1);
      expect(completedRows()).toBe(1);
    });

    it('leaves exactly one completed purchase under concurrent attempts', async () => {
      const responses = await Promise.all(
        Array.from({ length: 5 }, () => service.purchase('user-1', 'book-1', 'card')),
      );

      expect(responses.filter((r) => r.ok)).toHaveLength(1);
      const rejected = responses.filter((r) => !r.ok);
      expect(rejected).toHaveLength(4);
      rejected.forEach((r) => {
        expect(r.statusCode).toBe(HttpStatus.CONFLICT);
        expect(r.errors).toBe('ALREADY_OWNED');
      });
      expect(completedRows()).toBe(1);
      expect(store.users.snapshot('user-1')?.purchasedBookIds).toEqual(['book-1']);
    });

    it('lets different users buy the same book', async () => {
      const first = await service.purchase('user-1', 'book-1', 'card');
      const second = await service.purchase('user-2', 'book-1', 'paypal');

      expect(first.ok).toBe(true);
      expect(second.ok).toBe(true);
      expect(completedRows()).toBe(2);
    });

    it('rejects an unavailable book with BOOK_UNAVAILABLE', async () => {
      const response = await service.purchase('user-1', 'book-2', 'card');

      expect(response.statusCode).toBe(HttpStatus.UNPROCESSABLE_ENTITY);
      expect(response.errors).toBe('BOOK_UNAVAILABLE');
      expect(store.purchases.all()).toHaveLength(0);
    });

    it('returns 404 for an unknown book', async () => {
      const response = await service.purchase('user-1', 'missing-book', 'card');

      expect(response.statusCode).toBe(HttpStatus.NOT_FOUND);
      expect(response.errors).toBe('BOOK_NOT_FOUND');
    });

    it('returns 404 for an unknown user', async () => {
      const response = await service.purchase('ghost', 'book-1', 'card');

      expect(response.statusCode).toBe(HttpStatus.NOT_FOUND);
      expect(response.errors).toBe('USER_NOT_FOUND');
      expect(mocks.auditService.logDeny).toHaveBeenCalledWith(
        'PURCHASE_DENIED',
        'purchase',
        'ghost',
        'USER_NOT_FOUND',
        expect.objectContaining({ module: 'purchases' }),
      );
    });

    it('reports storage failures as a retryable 500', async () => {
      jest.spyOn(store.purchases, 'create').mockRejectedValueOnce(new Error('db down'));

      const response = await service.purchase('user-1', 'book-1', 'card');

      expect(response.statusCode).toBe(HttpStatus.INTERNAL_SERVER_ERROR);
      expect(response.errors).toBe('db down');
      expect(response.meta).toEqual({ requestId: 'test-request-id', retryable: true });
      expect(mocks.auditService.logError).toHaveBeenCalled();
    });

    it('restores the purchased set on retry when it failed after completion', async () => {
      jest
        .spyOn(store.users, 'addPurchasedBook')
        .mockRejectedValueOnce(new Error('connection reset'));

      const first = await service.purchase('user-1', 'book-1', 'card');
      expect(first.statusCode).toBe(HttpStatus.INTERNAL_SERVER_ERROR);
      expect(store.users.snapshot('user-1')?.purchasedBookIds).toEqual([]);

      const retry = await service.purchase('user-1', 'book-1', 'card');

      expect(retry.statusCode).toBe(HttpStatus.CONFLICT);
      expect(retry.errors).toBe('ALREADY_OWNED');
      expect(completedRows()).toBe(1);
      expect(store.users.snapshot('user-1')?.purchasedBookIds).toEqual(['book-1']);
    });
  });

  describe('refund', () => {
    it('refunds a completed purchase and revokes the entitlement', async () => {
      const bought = await service.purchase('user-1', 'book-1', 'card');
      const purchaseId = bought.data?.purchaseId ?? '';

      const response = await service.refund('user-1', purchaseId);

      expect(response.ok).toBe(true);
      expect(response.data?.status).toBe(PurchaseStatus.REFUNDED);
      expect(await store.purchases.findCompleted('user-1', 'book-1')).toBeNull();
      expect(store.users.snapshot('user-1')?.purchasedBookIds).toEqual([]);
      expect(store.purchases.all()).toHaveLength(1);
      expect(mocks.eventEmitter.emit).toHaveBeenCalledWith(
        'purchase.refunded',
        expect.objectContaining({ purchaseId, userId: 'user-1', bookId: 'book-1' }),
      );
    });

    it('rejects refunding twice with INVALID_TRANSITION', async () => {
      const bought = await service.purchase('user-1', 'book-1', 'card');
      const purchaseId = bought.data?.purchaseId ?? '';
      await service.refund('user-1', purchaseId);

      const again = await service.refund('user-1', purchaseId);

      expect(again.statusCode).toBe(HttpStatus.CONFLICT);
      expect(again.errors).toBe('INVALID_TRANSITION');
    });

    it('hides purchases owned by someone else', async () => {
      const bought = await service.purchase('user-1', 'book-1', 'card');

      const response = await service.refund('user-2', bought.data?.purchaseId ?? '');

      expect(response.statusCode).toBe(HttpStatus.NOT_FOUND);
      expect(response.errors).toBe('PURCHASE_NOT_FOUND');
      expect(completedRows()).toBe(1);
    });

    it('allows buying the book again after a refund', async () => {
      const bought = await service.purchase('user-1', 'book-1', 'card');
      await service.refund('user-1', bought.data?.purchaseId ?? '');

      const again = await service.purchase('user-1', 'book-1', 'card');

      expect(again.ok).toBe(true);
      expect(completedRows()).toBe(1);
      expect(store.purchases.all()).toHaveLength(2);
    });
  });
});
