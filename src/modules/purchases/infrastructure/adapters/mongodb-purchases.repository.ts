import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';

import { ConflictError } from '../../../../common/errors/domain.errors';
import { isDuplicateKeyError } from '../../../../common/errors/mongo-errors';
import {
  Purchase,
  PurchaseStatus,
} from '../../domain/entities/purchase.entity';
import type {
  IPurchasesRepository,
  PurchaseTransitionUpdates,
} from '../../domain/ports/purchases.port';
import { PurchaseSchema } from '../schemas/purchase.schema';

/**
 * Adapter: Implementación de repositorio de compras con MongoDB
 */
@Injectable()
export class MongoDbPurchasesRepository implements IPurchasesRepository {
  private readonly logger = new Logger(MongoDbPurchasesRepository.name);

  constructor(
    @InjectModel(PurchaseSchema.name)
    private readonly purchaseModel: Model<PurchaseSchema>,
  ) {}

  async create(purchase: Purchase): Promise<Purchase> {
    try {
      const created = await this.purchaseModel.create({
        id: purchase.id,
        userId: purchase.userId,
        bookId: purchase.bookId,
        purchasePrice: purchase.purchasePrice,
        paymentMethod: purchase.paymentMethod,
        status: purchase.status,
        transactionId: purchase.transactionId,
        downloadCount: purchase.downloadCount,
        maxDownloads: purchase.maxDownloads,
      });
      return this.mapToDomain(created);
    } catch (error) {
      throw this.translateError(error, 'creando compra');
    }
  }

  async findById(id: string): Promise<Purchase | null> {
    const document = await this.purchaseModel.findOne({ id }).exec();
    return document ? this.mapToDomain(document) : null;
  }

  async findCompleted(userId: string, bookId: string): Promise<Purchase | null> {
    const document = await this.purchaseModel
      .findOne({ userId, bookId, status: PurchaseStatus.COMPLETED })
      .exec();
    return document ? this.mapToDomain(document) : null;
  }

  async findByUserId(
    userId: string,
    status?: PurchaseStatus,
  ): Promise<Purchase[]> {
    const filter = status ? { userId, status } : { userId };
    const documents = await this.purchaseModel
      .find(filter)
      .sort({ createdAt: -1 })
      .exec();
    return documents.map((doc) => this.mapToDomain(doc));
  }

  async transition(
    id: string,
    from: PurchaseStatus,
    to: PurchaseStatus,
    updates: PurchaseTransitionUpdates = {},
  ): Promise<Purchase | null> {
    try {
      const updated = await this.purchaseModel
        .findOneAndUpdate(
          { id, status: from },
          { $set: { status: to, ...updates } },
          { new: true },
        )
        .exec();
      return updated ? this.mapToDomain(updated) : null;
    } catch (error) {
      throw this.translateError(error, `transicionando compra ${from} → ${to}`);
    }
  }

  async incrementDownloadCount(id: string): Promise<Purchase | null> {
    // El guard $expr hace el chequeo de límite y el incremento en una sola operación
    const updated = await this.purchaseModel
      .findOneAndUpdate(
        {
          id,
          status: PurchaseStatus.COMPLETED,
          $expr: { $lt: ['$downloadCount', '$maxDownloads'] },
        },
        { $inc: { downloadCount: 1 } },
        { new: true },
      )
      .exec();
    return updated ? this.mapToDomain(updated) : null;
  }

  /**
   * E11000 sobre el índice parcial (userId, bookId) → ConflictError ALREADY_OWNED.
   * Cualquier otro error se propaga sin cambios.
   */
  private translateError(error: unknown, operation: string): unknown {
    if (isDuplicateKeyError(error)) {
      return new ConflictError('ALREADY_OWNED', 'Ya posees este libro');
    }
    const errorMsg = error instanceof Error ? error.message : String(error);
    this.logger.error(`Error ${operation}: ${errorMsg}`);
    return error;
  }

  /**
   * Mapea documento de MongoDB a entidad de dominio
   */
  private mapToDomain(document: PurchaseSchema): Purchase {
    return new Purchase({
      id: document.id,
      userId: document.userId,
      bookId: document.bookId,
      purchasePrice: document.purchasePrice,
      paymentMethod: document.paymentMethod,
      status: document.status,
      transactionId: document.transactionId ?? null,
      downloadCount: document.downloadCount,
      maxDownloads: document.maxDownloads,
      createdAt: document.createdAt,
      updatedAt: document.updatedAt,
    });
  }
}
