import { Module } from '@nestjs/common';

import { BooksModule } from '../books/books.module';
import { PurchasesModule } from '../purchases/purchases.module';
import { UsersModule } from '../users/users.module';
import { DownloadAuthorizationService } from './application/download-authorization.service';
import { DownloadsController } from './infrastructure/controllers/downloads.controller';

/**
 * Módulo de derechos de descarga.
 *
 * - GET /download-authorization?bookId=
 * - GET /books/:bookId/download
 */
@Module({
  imports: [UsersModule, BooksModule, PurchasesModule],
  controllers: [DownloadsController],
  providers: [DownloadAuthorizationService],
  exports: [DownloadAuthorizationService],
})
export class EntitlementsModule {}
