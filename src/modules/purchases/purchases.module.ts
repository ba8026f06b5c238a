import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';

import { INJECTION_TOKENS } from '../../common/constants/injection-tokens';
import { BooksModule } from '../books/books.module';
import { UsersModule } from '../users/users.module';
import { PurchaseQueryService } from './application/purchase-query.service';
import { PurchaseService } from './application/purchase.service';
import { MongoDbPurchasesRepository } from './infrastructure/adapters/mongodb-purchases.repository';
import { PurchasesController } from './infrastructure/controllers/purchases.controller';
import {
  PurchaseSchema,
  PurchaseSchemaFactory,
} from './infrastructure/schemas/purchase.schema';

/**
 * Módulo de compras.
 *
 * Endpoints:
 * - POST /purchase
 * - GET /purchases, GET /purchases/books
 * - GET /books/check-ownership/:bookId
 * - POST /purchases/:purchaseId/refund
 *
 * Eventos: purchase.completed, purchase.failed, purchase.refunded
 */
@Module({
  imports: [
    MongooseModule.forFeature([
      { name: PurchaseSchema.name, schema: PurchaseSchemaFactory },
    ]),
    UsersModule,
    BooksModule,
  ],
  controllers: [PurchasesController],
  providers: [
    PurchaseService,
    PurchaseQueryService,
    {
      provide: INJECTION_TOKENS.PURCHASES_REPOSITORY,
      useClass: MongoDbPurchasesRepository,
    },
  ],
  exports: [INJECTION_TOKENS.PURCHASES_REPOSITORY],
})
export class PurchasesModule {}
