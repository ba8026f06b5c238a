import { getModelToken } from '@nestjs/mongoose';
import { Test, TestingModule } from '@nestjs/testing';

import { ConflictError } from '../../../../common/errors/domain.errors';
import { Purchase, PurchaseStatus } from '../../domain/entities/purchase.entity';
import { PurchaseSchema } from '../schemas/purchase.schema';
import { MongoDbPurchasesRepository } from './mongodb-purchases.repository';

const createdAt = new Date('2026-01-10T10:00:00.000Z');

const document = {
  id: 'purchase-1',
  userId: 'user-1',
  bookId: 'book-1',
  purchasePrice: 9.99,
  paymentMethod: 'credit_card',
  status: PurchaseStatus.COMPLETED,
  transactionId: 'txn_1',
  downloadCount: 1,
  maxDownloads: 5,
  createdAt,
  updatedAt: createdAt,
};

function execReturning(value: unknown) {
  return { exec: jest.fn().mockResolvedValue(value) };
}

describe('MongoDbPurchasesRepository', () => {
  let repository: MongoDbPurchasesRepository;
  let model: {
    create: jest.Mock;
    findOne: jest.Mock;
    find: jest.Mock;
    findOneAndUpdate: jest.Mock;
  };

  beforeEach(async () => {
    model = {
      create: jest.fn(),
      findOne: jest.fn(),
      find: jest.fn(),
      findOneAndUpdate: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MongoDbPurchasesRepository,
        { provide: getModelToken(PurchaseSchema.name), useValue: model },
      ],
    }).compile();

    repository = module.get<MongoDbPurchasesRepository>(MongoDbPurchasesRepository);
  });

  describe('create', () => {
    it('maps the stored document to the entity', async () => {
      model.create.mockResolvedValue(document);

      const purchase = await repository.create(
        new Purchase({ id: 'purchase-1', userId: 'user-1', bookId: 'book-1' }),
      );

      expect(purchase).toBeInstanceOf(Purchase);
      expect(purchase.id).toBe('purchase-1');
      expect(purchase.downloadsRemaining()).toBe(4);
    });

    it('translates a duplicate key into ALREADY_OWNED', async () => {
      model.create.mockRejectedValue({ code: 11000 });

      await expect(
        repository.create(new Purchase({ userId: 'user-1', bookId: 'book-1' })),
      ).rejects.toMatchObject({ code: 'ALREADY_OWNED' });
    });

    it('rethrows any other storage error', async () => {
      const failure = new Error('connection reset');
      model.create.mockRejectedValue(failure);

      await expect(
        repository.create(new Purchase({ userId: 'user-1', bookId: 'book-1' })),
      ).rejects.toBe(failure);
    });
  });

  describe('transition', () => {
    it('guards the update on the current status', async () => {
      model.findOneAndUpdate.mockReturnValue(
        execReturning({ ...document, status: PurchaseStatus.REFUNDED }),
      );

      const refunded = await repository.transition(
        'purchase-1',
        PurchaseStatus.COMPLETED,
        PurchaseStatus.REFUNDED,
      );

      expect(model.findOneAndUpdate).toHaveBeenCalledWith(
        { id: 'purchase-1', status: PurchaseStatus.COMPLETED },
        { $set: { status: PurchaseStatus.REFUNDED } },
        { new: true },
      );
      expect(refunded?.status).toBe(PurchaseStatus.REFUNDED);
    });

    it('returns null when the status no longer matches', async () => {
      model.findOneAndUpdate.mockReturnValue(execReturning(null));

      await expect(
        repository.transition('purchase-1', PurchaseStatus.PENDING, PurchaseStatus.COMPLETED),
      ).resolves.toBeNull();
    });

    it('translates a duplicate key on completion', async () => {
      model.findOneAndUpdate.mockReturnValue({
        exec: jest.fn().mockRejectedValue({ code: 11000 }),
      });

      await expect(
        repository.transition('purchase-2', PurchaseStatus.PENDING, PurchaseStatus.COMPLETED, {
          transactionId: 'txn_2',
        }),
      ).rejects.toBeInstanceOf(ConflictError);
    });
  });

  describe('incrementDownloadCount', () => {
    it('increments only below the limit', async () => {
      model.findOneAndUpdate.mockReturnValue(
        execReturning({ ...document, downloadCount: 2 }),
      );

      const updated = await repository.incrementDownloadCount('purchase-1');

      expect(model.findOneAndUpdate).toHaveBeenCalledWith(
        {
          id: 'purchase-1',
          status: PurchaseStatus.COMPLETED,
          $expr: { $lt: ['$downloadCount', '$maxDownloads'] },
        },
        { $inc: { downloadCount: 1 } },
        { new: true },
      );
      expect(updated?.downloadCount).toBe(2);
    });

    it('returns null once the limit is reached', async () => {
      model.findOneAndUpdate.mockReturnValue(execReturning(null));

      await expect(repository.incrementDownloadCount('purchase-1')).resolves.toBeNull();
    });
  });

  describe('findByUserId', () => {
    it('filters by status and sorts newest first', async () => {
      const sort = jest.fn().mockReturnValue(execReturning([document]));
      model.find.mockReturnValue({ sort });

      const purchases = await repository.findByUserId('user-1', PurchaseStatus.COMPLETED);

      expect(model.find).toHaveBeenCalledWith({
        userId: 'user-1',
        status: PurchaseStatus.COMPLETED,
      });
      expect(sort).toHaveBeenCalledWith({ createdAt: -1 });
      expect(purchases.map((p) => p.id)).toEqual(['purchase-1']);
    });
  });
});
